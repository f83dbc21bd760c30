/**
 * Outbreak Signals: Error Metrics
 * Per-row deviations between forecasts and observed case counts.
 */

import { filterFiniteNumbers, mean } from './stats';
import type {
    FlatForecastRow,
    FlatObservedRow,
    LocationMetricSummary,
    MetricRow,
    MetricSpec,
    TimeBucket
} from './types';

export const ABSOLUTE_ERROR_METRIC_SPEC: MetricSpec = {
    metricId: 'absolute_error',
    metricName: 'Absolute Error',
    description: 'Absolute error per location and time_period',
    outputDimensions: ['time_period', 'location']
};

export interface Metric {
    spec: MetricSpec;
    compute(forecasts: FlatForecastRow[], observations: FlatObservedRow[]): MetricRow[];
}

function joinKey(location: string, timePeriod: TimeBucket): string {
    return JSON.stringify([location, timePeriod]);
}

/**
 * Index observations by (location, timePeriod). Several observations may share a key.
 */
export function indexObservations(observations: FlatObservedRow[]): Map<string, FlatObservedRow[]> {
    const index = new Map<string, FlatObservedRow[]>();
    for (const observation of observations) {
        const key = joinKey(observation.location, observation.timePeriod);
        const matches = index.get(key) ?? [];
        matches.push(observation);
        index.set(key, matches);
    }
    return index;
}

export interface JoinedRow {
    forecast: FlatForecastRow;
    diseaseCases: number | null;
}

/**
 * Left join of forecasts onto observations by (location, timePeriod).
 * A forecast without a matching observation is kept with `diseaseCases: null`.
 */
export function joinForecastsWithObservations(
    forecasts: FlatForecastRow[],
    observations: FlatObservedRow[]
): JoinedRow[] {
    const index = indexObservations(observations);
    const joined: JoinedRow[] = [];

    for (const forecast of forecasts) {
        const matches = index.get(joinKey(forecast.location, forecast.timePeriod));
        if (!matches) {
            joined.push({ forecast, diseaseCases: null });
            continue;
        }
        for (const observation of matches) {
            joined.push({ forecast, diseaseCases: observation.diseaseCases });
        }
    }
    return joined;
}

/**
 * |forecast - disease_cases| for every joined row; null when either side is missing.
 */
export function computeAbsoluteError(
    forecasts: FlatForecastRow[],
    observations: FlatObservedRow[]
): MetricRow[] {
    return joinForecastsWithObservations(forecasts, observations).map(({ forecast, diseaseCases }) => ({
        location: forecast.location,
        timePeriod: forecast.timePeriod,
        metric:
            forecast.forecast !== null && diseaseCases !== null
                ? Math.abs(forecast.forecast - diseaseCases)
                : null
    }));
}

/**
 * Mean metric per location over rows that carry a value, ascending by location.
 */
export function summarizeMetricByLocation(rows: MetricRow[]): LocationMetricSummary[] {
    const byLocation = new Map<string, number[]>();
    for (const row of rows) {
        const values = byLocation.get(row.location) ?? [];
        if (row.metric !== null) values.push(row.metric);
        byLocation.set(row.location, values);
    }

    return Array.from(byLocation.keys())
        .sort()
        .map((location) => {
            const values = filterFiniteNumbers(byLocation.get(location) ?? []);
            return { location, meanMetric: mean(values), count: values.length };
        });
}

// =============================================================================
// Registry
// =============================================================================

export const METRICS: readonly Metric[] = [
    { spec: ABSOLUTE_ERROR_METRIC_SPEC, compute: computeAbsoluteError }
];

export function getMetric(metricId: string): Metric | undefined {
    return METRICS.find((metric) => metric.spec.metricId === metricId);
}
