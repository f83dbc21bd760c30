/**
 * Outbreak Signals: Numeric Helpers
 * Shared statistics over plain number arrays.
 */

export function filterFiniteNumbers(values: number[]): number[] {
    return values.filter((value) => Number.isFinite(value));
}

export function mean(values: number[]): number | null {
    if (values.length === 0) return null;
    return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Standard deviation with the slice size as denominator (ddof = 0).
 */
export function populationStdDev(values: number[]): number | null {
    const avg = mean(values);
    if (avg === null) return null;
    const squaredDiffs = values.map((value) => Math.pow(value - avg, 2));
    return Math.sqrt(squaredDiffs.reduce((sum, value) => sum + value, 0) / values.length);
}

/**
 * Percentile with linear interpolation between order statistics.
 * Position h = (n - 1) * p / 100, value = x[floor(h)] + frac(h) * (x[floor(h) + 1] - x[floor(h)]).
 *
 * @param p Percentile in [0, 100]
 */
export function percentileLinear(values: number[], p: number): number | null {
    if (values.length === 0) return null;
    if (!Number.isFinite(p) || p < 0 || p > 100) {
        throw new RangeError(`Percentile must be within [0, 100], got ${p}`);
    }

    const sorted = [...values].sort((a, b) => a - b);
    const h = ((sorted.length - 1) * p) / 100;
    const lo = Math.floor(h);
    const hi = Math.min(lo + 1, sorted.length - 1);
    const lower = sorted[lo];
    const upper = sorted[hi];
    if (lower === undefined || upper === undefined) return null;

    return lower + (h - lo) * (upper - lower);
}

export interface SampleSummary {
    mean: number;
    lo: number;
    hi: number;
    count: number;
}

/**
 * Mean and central interval of a bag of samples; null for an empty bag.
 * The mean is clamped into [lo, hi]: rounding in the sum, or a skewed bag,
 * can otherwise place it outside the interpolated interval.
 */
export function summarizeSamples(
    samples: number[],
    lowerPercentile: number,
    upperPercentile: number
): SampleSummary | null {
    const avg = mean(samples);
    const lo = percentileLinear(samples, lowerPercentile);
    const hi = percentileLinear(samples, upperPercentile);
    if (avg === null || lo === null || hi === null) return null;

    return { mean: Math.min(Math.max(avg, lo), hi), lo, hi, count: samples.length };
}

/**
 * Fraction of samples strictly greater than the threshold.
 */
export function exceedanceFraction(samples: number[], threshold: number): number | null {
    if (samples.length === 0) return null;
    const above = samples.filter((value) => value > threshold).length;
    return above / samples.length;
}
