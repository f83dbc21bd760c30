/**
 * Outbreak Signals: Core Type Definitions
 *
 * Input sequences (observations, forecast samples), the derived signal rows,
 * and the flat tabular rows the ingest layer produces.
 * Absent values are always `null`, never zero.
 */

// =============================================================================
// Time Buckets
// =============================================================================

/**
 * A discrete period label used to align observations and forecasts
 * (e.g. "2023-W01" or a numeric week index).
 * All keys inside one computation must be of the same kind.
 */
export type TimeBucket = string | number;

// =============================================================================
// Core Inputs
// =============================================================================

/**
 * A single observed case count for one location in one time bucket.
 */
export interface Observation {
    location: string;
    timeBucket: TimeBucket;
    value: number;
}

/**
 * A single forecast draw for one time bucket.
 * Repeated identical values are distinct samples.
 */
export interface ForecastSample {
    timeBucket: TimeBucket;
    value: number;

    /** Location the sample was produced for, when known */
    location?: string;

    /** Sample (draw) identifier, when known */
    sample?: number;
}

// =============================================================================
// Signal Output
// =============================================================================

/**
 * One row per time bucket present in observations or forecasts.
 */
export interface SignalRow {
    timeBucket: TimeBucket;

    /** Mean of observations in this bucket */
    observedMean: number | null;

    /** Centered moving average of observedMean */
    smoothedMean: number | null;

    /** Population standard deviation over the same window */
    smoothedSd: number | null;

    /** smoothedMean + z * smoothedSd */
    threshold: number | null;

    forecastMean: number | null;

    /** 2.5th percentile of the forecast samples */
    forecastLo: number | null;

    /** 97.5th percentile of the forecast samples */
    forecastHi: number | null;

    /** Fraction of forecast samples strictly above threshold */
    exceedProbability: number | null;
}

export interface OutbreakOptions {
    /** Smoothing radius: positions taken on each side of a bucket */
    window?: number;

    /** Threshold multiplier on the smoothed standard deviation */
    z?: number;
}

// =============================================================================
// Flat Tabular Rows
// =============================================================================

/**
 * Validated row of an observations table
 * (`location,time_period,disease_cases`).
 */
export interface FlatObservedRow {
    location: string;
    timePeriod: TimeBucket;
    diseaseCases: number | null;
}

/**
 * Validated row of a forecasts table
 * (`location,time_period,horizon_distance,sample,forecast`).
 */
export interface FlatForecastRow {
    location: string;
    timePeriod: TimeBucket;
    horizonDistance: number | null;
    sample: number | null;
    forecast: number | null;
}

// =============================================================================
// Metrics
// =============================================================================

export type DataDimension = 'location' | 'time_period' | 'horizon_distance' | 'sample';

export interface MetricSpec {
    metricId: string;
    metricName: string;
    description: string;
    outputDimensions: readonly DataDimension[];
}

export interface MetricRow {
    location: string;
    timePeriod: TimeBucket;
    metric: number | null;
}

export interface LocationMetricSummary {
    location: string;
    meanMetric: number | null;
    count: number;
}
