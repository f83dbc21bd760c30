import { describe, expect, it } from 'vitest';
import type { FlatForecastRow, FlatObservedRow, SignalRow } from '@core/types';
import { buildMetricBars, buildOutbreakChartRows, buildScatterData, computeOutbreakYDomain } from './chartData';

const forecastRow = (location: string, timePeriod: string, forecast: number | null): FlatForecastRow => ({
  location,
  timePeriod,
  horizonDistance: 1,
  sample: 0,
  forecast
});

const observations: FlatObservedRow[] = [
  { location: 'loc1', timePeriod: '2023-W01', diseaseCases: 11 },
  { location: 'loc1', timePeriod: '2023-W02', diseaseCases: 13 },
  { location: 'loc2', timePeriod: '2023-W01', diseaseCases: 19 },
  { location: 'loc2', timePeriod: '2023-W02', diseaseCases: 21 }
];

const emptyRow = (timeBucket: string): SignalRow => ({
  timeBucket,
  observedMean: null,
  smoothedMean: null,
  smoothedSd: null,
  threshold: null,
  forecastMean: null,
  forecastLo: null,
  forecastHi: null,
  exceedProbability: null
});

describe('buildScatterData', () => {
  it('pairs forecasts with observations and sizes the reference line', () => {
    const data = buildScatterData(
      [
        forecastRow('loc1', '2023-W01', 10),
        forecastRow('loc1', '2023-W02', 12),
        forecastRow('loc2', '2023-W01', 21),
        forecastRow('loc2', '2023-W02', 23)
      ],
      observations
    );
    expect(data.points).toHaveLength(4);
    expect(data.points[0]).toEqual({ location: 'loc1', timePeriod: '2023-W01', observed: 11, forecast: 10 });
    expect(data.referenceMax).toBe(23);
  });

  it('skips pairs with a missing side but still counts the present value', () => {
    const data = buildScatterData(
      [forecastRow('loc1', '2023-W09', 40), forecastRow('loc1', '2023-W01', null)],
      observations
    );
    expect(data.points).toEqual([]);
    expect(data.referenceMax).toBe(40);
  });

  it('handles tables larger than the engine argument limit', () => {
    const forecasts = Array.from({ length: 300_000 }, (_, i) => forecastRow('loc1', '2023-W01', i % 1000));
    const data = buildScatterData(forecasts, [{ location: 'loc1', timePeriod: '2023-W01', diseaseCases: 1500 }]);
    expect(data.points).toHaveLength(300_000);
    expect(data.referenceMax).toBe(1500);
  });

  it('starts the reference line at the origin without data', () => {
    expect(buildScatterData([], [])).toEqual({ points: [], referenceMax: 0 });
  });
});

describe('buildMetricBars', () => {
  it('groups by time period and averages per location', () => {
    const data = buildMetricBars([
      { location: 'loc2', timePeriod: 1, metric: 2 },
      { location: 'loc1', timePeriod: 1, metric: 1 },
      { location: 'loc1', timePeriod: 1, metric: 3 },
      { location: 'loc1', timePeriod: 2, metric: null }
    ]);
    expect(data.locations).toEqual(['loc1', 'loc2']);
    expect(data.rows).toEqual([
      { timePeriod: 1, label: '1', values: { loc2: 2, loc1: 2 } },
      { timePeriod: 2, label: '2', values: {} }
    ]);
  });
});

describe('buildOutbreakChartRows', () => {
  it('adds a label and an interval band when both bounds exist', () => {
    const rows = buildOutbreakChartRows([
      { ...emptyRow('W1'), forecastLo: 1, forecastHi: 4 },
      { ...emptyRow('W2'), forecastLo: 1 }
    ]);
    expect(rows[0].label).toBe('W1');
    expect(rows[0].band).toEqual([1, 4]);
    expect(rows[1].band).toBeNull();
  });
});

describe('computeOutbreakYDomain', () => {
  it('spans the band, threshold and mean with a margin', () => {
    const [low, high] = computeOutbreakYDomain([
      {
        ...emptyRow('2023-W01'),
        threshold: 18,
        forecastMean: 15.5,
        forecastLo: 10.275,
        forecastHi: 20.725
      },
      { ...emptyRow('2023-W02'), threshold: 18 }
    ]);
    expect(low).toBeCloseTo(9.7525, 10);
    expect(high).toBeCloseTo(21.2475, 10);
  });

  it('falls back to the unit range without data', () => {
    const [low, high] = computeOutbreakYDomain([emptyRow('W1')]);
    expect(low).toBeCloseTo(-0.05, 10);
    expect(high).toBeCloseTo(1.05, 10);
  });

  it('handles many rows', () => {
    const rows = Array.from({ length: 200_000 }, (_, i) => ({ ...emptyRow(`W${i}`), threshold: i % 100 }));
    const [low, high] = computeOutbreakYDomain(rows);
    expect(low).toBeCloseTo(-4.95, 10);
    expect(high).toBeCloseTo(103.95, 10);
  });

  it('widens a zero span', () => {
    const [low, high] = computeOutbreakYDomain([{ ...emptyRow('W1'), threshold: 5 }]);
    expect(low).toBeCloseTo(4.95, 10);
    expect(high).toBeCloseTo(6.05, 10);
  });
});
