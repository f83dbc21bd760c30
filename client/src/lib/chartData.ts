/**
 * Chart data shaping for the plot documents.
 * Pure functions: flat rows and signal rows in, chart-ready series out.
 */

import { joinForecastsWithObservations } from '@core/metrics';
import { filterFiniteNumbers, mean } from '@core/stats';
import { sortTimeBuckets } from '@core/time';
import type { FlatForecastRow, FlatObservedRow, MetricRow, SignalRow, TimeBucket } from '@core/types';
import { Y_DOMAIN_MARGIN } from '@/config/chartConfig';

// Folded: forecast tables can exceed the argument limit of Math.min/max
function minOf(values: number[]): number | null {
  return values.reduce<number | null>((min, value) => (min === null || value < min ? value : min), null);
}

function maxOf(values: number[]): number | null {
  return values.reduce<number | null>((max, value) => (max === null || value > max ? value : max), null);
}

// ─────────────────────────────────────────────────────────────────────────────
// Scatter: truth vs prediction
// ─────────────────────────────────────────────────────────────────────────────

export interface ScatterPoint {
  location: string;
  timePeriod: TimeBucket;
  observed: number;
  forecast: number;
}

export interface ScatterData {
  points: ScatterPoint[];
  /** End of the 45° reference line, which runs from (0, 0) to (max, max) */
  referenceMax: number;
}

export function buildScatterData(
  forecasts: FlatForecastRow[],
  observations: FlatObservedRow[]
): ScatterData {
  const joined = joinForecastsWithObservations(forecasts, observations);
  const points: ScatterPoint[] = [];
  const observedValues: number[] = [];
  const forecastValues: number[] = [];

  joined.forEach(({ forecast, diseaseCases }) => {
    if (diseaseCases !== null) observedValues.push(diseaseCases);
    if (forecast.forecast !== null) forecastValues.push(forecast.forecast);
    if (diseaseCases === null || forecast.forecast === null) return;
    points.push({
      location: forecast.location,
      timePeriod: forecast.timePeriod,
      observed: diseaseCases,
      forecast: forecast.forecast
    });
  });

  return {
    points,
    referenceMax: maxOf([...observedValues, ...forecastValues]) ?? 0
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Bars: metric per location and time period
// ─────────────────────────────────────────────────────────────────────────────

export interface MetricBarRow {
  timePeriod: TimeBucket;
  label: string;
  /** location → mean metric; locations without a value are omitted */
  values: Record<string, number>;
}

export interface MetricBarData {
  rows: MetricBarRow[];
  locations: string[];
}

/**
 * One row per time period; several metric rows for the same
 * (location, time period), e.g. one per sample, are averaged.
 */
export function buildMetricBars(metricRows: MetricRow[]): MetricBarData {
  const grouped = new Map<TimeBucket, Map<string, number[]>>();
  const locations = new Set<string>();

  metricRows.forEach((row) => {
    locations.add(row.location);
    const byLocation = grouped.get(row.timePeriod) ?? new Map<string, number[]>();
    const values = byLocation.get(row.location) ?? [];
    if (row.metric !== null) values.push(row.metric);
    byLocation.set(row.location, values);
    grouped.set(row.timePeriod, byLocation);
  });

  const rows = sortTimeBuckets(grouped.keys()).map((timePeriod) => {
    const values: Record<string, number> = {};
    grouped.get(timePeriod)?.forEach((metrics, location) => {
      const avg = mean(filterFiniteNumbers(metrics));
      if (avg !== null) values[location] = avg;
    });
    return { timePeriod, label: String(timePeriod), values };
  });

  return { rows, locations: Array.from(locations).sort() };
}

// ─────────────────────────────────────────────────────────────────────────────
// Outbreak & probability
// ─────────────────────────────────────────────────────────────────────────────

export interface OutbreakChartRow extends SignalRow {
  label: string;
  /** [forecastLo, forecastHi] for the interval band */
  band: [number, number] | null;
}

export function buildOutbreakChartRows(rows: SignalRow[]): OutbreakChartRow[] {
  return rows.map((row) => ({
    ...row,
    label: String(row.timeBucket),
    band: row.forecastLo !== null && row.forecastHi !== null ? [row.forecastLo, row.forecastHi] : null
  }));
}

function finiteOf(values: (number | null)[]): number[] {
  return values.filter((value): value is number => value !== null && Number.isFinite(value));
}

/**
 * Left-axis domain covering the interval band, the threshold and the forecast mean.
 * Falls back to [0, 1] without data, widens a zero span to 1, then adds a margin.
 */
export function computeOutbreakYDomain(rows: SignalRow[]): [number, number] {
  const lows = finiteOf(rows.flatMap((row) => [row.forecastLo, row.threshold, row.forecastMean]));
  const highs = finiteOf(rows.flatMap((row) => [row.forecastHi, row.threshold, row.forecastMean]));

  let yMin = minOf(lows);
  let yMax = maxOf(highs);

  if (yMin === null || yMax === null) {
    yMin = 0;
    yMax = 1;
  }
  if (yMax === yMin) {
    yMax = yMin + 1;
  }

  const margin = Y_DOMAIN_MARGIN * (yMax - yMin);
  return [yMin - margin, yMax + margin];
}
