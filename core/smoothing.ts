/**
 * Outbreak Signals: Rolling Smoothing
 *
 * Centered window of fixed radius over sequence positions. Near either end the
 * window is truncated (asymmetric) rather than padded. Positions are adjacent
 * indices, so a gap in the calendar does not widen or narrow the window.
 */

import { InvalidInputError } from './errors';
import { mean, populationStdDev } from './stats';

export interface RollingStats {
    mean: number[];
    sd: number[];
}

/**
 * Window bounds [lo, hi) for position i in a sequence of length n.
 */
export function windowBounds(i: number, n: number, radius: number): [number, number] {
    return [Math.max(0, i - radius), Math.min(n, i + radius + 1)];
}

export function rollingMeanSd(values: number[], radius: number): RollingStats {
    if (!Number.isInteger(radius) || radius < 0) {
        throw new InvalidInputError(`Smoothing window must be a non-negative integer, got ${radius}`, 'window');
    }

    const n = values.length;
    const result: RollingStats = { mean: [], sd: [] };

    for (let i = 0; i < n; i++) {
        const [lo, hi] = windowBounds(i, n, radius);
        const slice = values.slice(lo, hi);
        // slice always holds values[i], so neither helper returns null here
        result.mean.push(mean(slice) ?? NaN);
        result.sd.push(populationStdDev(slice) ?? NaN);
    }

    return result;
}
