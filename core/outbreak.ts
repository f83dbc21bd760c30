/**
 * Outbreak Signals: Outbreak Probability
 *
 * Aligns observed case counts and forecast samples on a shared time axis and
 * estimates, per bucket, the probability that the forecast exceeds a dynamic
 * alert threshold derived from the smoothed observations.
 */

import { OUTBREAK_DEFAULTS } from './defaults';
import { InvalidInputError } from './errors';
import { rollingMeanSd } from './smoothing';
import { exceedanceFraction, filterFiniteNumbers, mean, summarizeSamples } from './stats';
import { assertComparableBuckets, sortTimeBuckets } from './time';
import type { ForecastSample, Observation, OutbreakOptions, SignalRow, TimeBucket } from './types';

// =============================================================================
// Aggregation
// =============================================================================

interface ObservedSeries {
    buckets: TimeBucket[];
    means: number[];
}

/**
 * Mean observed value per bucket across locations, ascending by bucket.
 * Non-finite values are skipped; a bucket with no finite value is left out.
 */
export function observedMeansByBucket(observations: Observation[]): ObservedSeries {
    const byBucket = new Map<TimeBucket, number[]>();
    for (const observation of observations) {
        const values = byBucket.get(observation.timeBucket) ?? [];
        values.push(observation.value);
        byBucket.set(observation.timeBucket, values);
    }

    const series: ObservedSeries = { buckets: [], means: [] };
    for (const bucket of sortTimeBuckets(byBucket.keys())) {
        const avg = mean(filterFiniteNumbers(byBucket.get(bucket) ?? []));
        if (avg === null) continue;
        series.buckets.push(bucket);
        series.means.push(avg);
    }
    return series;
}

/**
 * All forecast values per bucket, duplicates kept.
 */
export function samplesByBucket(forecasts: ForecastSample[]): Map<TimeBucket, number[]> {
    const byBucket = new Map<TimeBucket, number[]>();
    for (const forecast of forecasts) {
        const samples = byBucket.get(forecast.timeBucket) ?? [];
        if (Number.isFinite(forecast.value)) samples.push(forecast.value);
        byBucket.set(forecast.timeBucket, samples);
    }
    return byBucket;
}

// =============================================================================
// Signal Computation
// =============================================================================

function resolveOptions(options: OutbreakOptions): Required<OutbreakOptions> {
    const window = options.window ?? OUTBREAK_DEFAULTS.window;
    const z = options.z ?? OUTBREAK_DEFAULTS.z;

    if (!Number.isInteger(window) || window < 0) {
        throw new InvalidInputError(`Smoothing window must be a non-negative integer, got ${window}`, 'window');
    }
    if (!Number.isFinite(z)) {
        throw new InvalidInputError(`Threshold multiplier must be finite, got ${z}`, 'z');
    }
    return { window, z };
}

/**
 * Compute one signal row per time bucket appearing in either input.
 *
 * Throws InvalidInputError when the bucket keys across both inputs have no
 * consistent order, before any row is produced.
 */
export function computeOutbreakSignal(
    observations: Observation[],
    forecasts: ForecastSample[],
    options: OutbreakOptions = {}
): SignalRow[] {
    const { window, z } = resolveOptions(options);

    // Validate the union up front so a mismatch between the two inputs fails as a whole.
    assertComparableBuckets([
        ...observations.map((observation) => observation.timeBucket),
        ...forecasts.map((forecast) => forecast.timeBucket)
    ]);

    const observed = observedMeansByBucket(observations);
    const rolling = rollingMeanSd(observed.means, window);

    const observedByBucket = new Map<TimeBucket, { mean: number; smoothedMean: number; smoothedSd: number }>();
    observed.buckets.forEach((bucket, i) => {
        observedByBucket.set(bucket, {
            mean: observed.means[i],
            smoothedMean: rolling.mean[i],
            smoothedSd: rolling.sd[i]
        });
    });

    const samples = samplesByBucket(forecasts);
    const timeAxis = sortTimeBuckets([
        ...observations.map((observation) => observation.timeBucket),
        ...samples.keys()
    ]);

    return timeAxis.map((timeBucket) => {
        const obs = observedByBucket.get(timeBucket);
        const bag = samples.get(timeBucket) ?? [];
        const summary = summarizeSamples(bag, OUTBREAK_DEFAULTS.lowerPercentile, OUTBREAK_DEFAULTS.upperPercentile);
        const threshold = obs ? obs.smoothedMean + z * obs.smoothedSd : null;

        return {
            timeBucket,
            observedMean: obs?.mean ?? null,
            smoothedMean: obs?.smoothedMean ?? null,
            smoothedSd: obs?.smoothedSd ?? null,
            threshold,
            forecastMean: summary?.mean ?? null,
            forecastLo: summary?.lo ?? null,
            forecastHi: summary?.hi ?? null,
            exceedProbability: threshold !== null ? exceedanceFraction(bag, threshold) : null
        };
    });
}

// =============================================================================
// Per-Location Batches
// =============================================================================

/**
 * Signal rows for each location separately, keyed in ascending location order.
 * Forecast samples without a location are not assigned to any group.
 */
export function computeOutbreakSignalsByLocation(
    observations: Observation[],
    forecasts: ForecastSample[],
    options: OutbreakOptions = {}
): Map<string, SignalRow[]> {
    const observationsByLocation = new Map<string, Observation[]>();
    for (const observation of observations) {
        const group = observationsByLocation.get(observation.location) ?? [];
        group.push(observation);
        observationsByLocation.set(observation.location, group);
    }

    const forecastsByLocation = new Map<string, ForecastSample[]>();
    for (const forecast of forecasts) {
        if (forecast.location === undefined) continue;
        const group = forecastsByLocation.get(forecast.location) ?? [];
        group.push(forecast);
        forecastsByLocation.set(forecast.location, group);
    }

    const locations = Array.from(
        new Set([...observationsByLocation.keys(), ...forecastsByLocation.keys()])
    ).sort();

    const result = new Map<string, SignalRow[]>();
    for (const location of locations) {
        result.set(
            location,
            computeOutbreakSignal(
                observationsByLocation.get(location) ?? [],
                forecastsByLocation.get(location) ?? [],
                options
            )
        );
    }
    return result;
}
