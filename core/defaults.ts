/**
 * Outbreak Signals: Computation Defaults
 *
 * Threshold methodology:
 * - Mean observed cases per time bucket, across locations
 * - Centered rolling mean and population standard deviation, radius `window`
 * - Alert threshold = rolling mean + `z` × rolling standard deviation
 * - P(exceed) = share of forecast samples strictly above the threshold
 */

export const OUTBREAK_DEFAULTS = {
    window: 3,
    z: 2,
    lowerPercentile: 2.5,
    upperPercentile: 97.5
} as const;
