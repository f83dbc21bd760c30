import { describe, it, expect } from 'vitest';
import { computeOutbreakSignal, computeOutbreakSignalsByLocation, observedMeansByBucket } from '../outbreak';
import { InvalidInputError } from '../errors';
import type { ForecastSample, Observation } from '../types';

const observations: Observation[] = [
    { location: 'loc1', timeBucket: '2023-W01', value: 11 },
    { location: 'loc1', timeBucket: '2023-W02', value: 13 },
    { location: 'loc2', timeBucket: '2023-W01', value: 19 },
    { location: 'loc2', timeBucket: '2023-W02', value: 21 }
];

const forecasts: ForecastSample[] = [
    { timeBucket: '2023-W01', value: 10 },
    { timeBucket: '2023-W01', value: 21 }
];

describe('observedMeansByBucket', () => {
    it('averages across locations per bucket', () => {
        expect(observedMeansByBucket(observations)).toEqual({
            buckets: ['2023-W01', '2023-W02'],
            means: [15, 17]
        });
    });
});

describe('computeOutbreakSignal', () => {
    it('computes smoothing, threshold and exceedance for two weeks', () => {
        const rows = computeOutbreakSignal(observations, forecasts);
        expect(rows).toHaveLength(2);

        const [w01, w02] = rows;
        expect(w01.timeBucket).toBe('2023-W01');
        expect(w01.observedMean).toBe(15);
        expect(w01.smoothedMean).toBe(16);
        expect(w01.smoothedSd).toBe(1);
        expect(w01.threshold).toBe(18);
        expect(w01.forecastMean).toBe(15.5);
        expect(w01.forecastLo).toBeCloseTo(10.275, 10);
        expect(w01.forecastHi).toBeCloseTo(20.725, 10);
        expect(w01.exceedProbability).toBe(0.5);

        expect(w02).toEqual({
            timeBucket: '2023-W02',
            observedMean: 17,
            smoothedMean: 16,
            smoothedSd: 1,
            threshold: 18,
            forecastMean: null,
            forecastLo: null,
            forecastHi: null,
            exceedProbability: null
        });
    });

    it('emits one row per bucket of the union, ascending', () => {
        const rows = computeOutbreakSignal(observations, [
            ...forecasts,
            { timeBucket: '2023-W03', value: 30 },
            { timeBucket: '2022-W52', value: 5 }
        ]);

        expect(rows.map((row) => row.timeBucket)).toEqual(['2022-W52', '2023-W01', '2023-W02', '2023-W03']);

        const w03 = rows[3];
        expect(w03.observedMean).toBeNull();
        expect(w03.smoothedMean).toBeNull();
        expect(w03.threshold).toBeNull();
        expect(w03.forecastMean).toBe(30);
        expect(w03.exceedProbability).toBeNull();
    });

    it('keeps repeated sample values as separate draws', () => {
        const rows = computeOutbreakSignal(
            [{ location: 'a', timeBucket: 1, value: 12 }],
            [
                { timeBucket: 1, value: 20 },
                { timeBucket: 1, value: 20 },
                { timeBucket: 1, value: 20 },
                { timeBucket: 1, value: 4 }
            ]
        );
        expect(rows[0].threshold).toBe(12);
        expect(rows[0].forecastMean).toBe(16);
        expect(rows[0].exceedProbability).toBe(3 / 4);
    });

    it('gives the exact share of samples above the threshold', () => {
        const rows = computeOutbreakSignal(
            [{ location: 'a', timeBucket: 1, value: 12 }],
            [11, 12, 13].map((value) => ({ timeBucket: 1, value }))
        );
        expect(rows[0].smoothedSd).toBe(0);
        expect(rows[0].exceedProbability).toBe(1 / 3);
    });

    it('keeps interval bounds around the forecast mean', () => {
        const bag = [3, 9, 1, 7, 7, 2];
        const [row] = computeOutbreakSignal([], bag.map((value) => ({ timeBucket: 'W1', value })));
        expect(row.forecastLo).not.toBeNull();
        expect(row.forecastHi).not.toBeNull();
        expect(row.forecastLo ?? NaN).toBeLessThanOrEqual(row.forecastMean ?? NaN);
        expect(row.forecastMean ?? NaN).toBeLessThanOrEqual(row.forecastHi ?? NaN);
    });

    it('keeps the mean inside the interval for identical decimal samples', () => {
        const [row] = computeOutbreakSignal([], [0.1, 0.1, 0.1].map((value) => ({ timeBucket: 'W1', value })));
        expect(row.forecastLo).toBe(0.1);
        expect(row.forecastMean).toBe(0.1);
        expect(row.forecastHi).toBe(0.1);
    });

    it('keeps the mean inside the interval for a skewed bag', () => {
        const bag = [0, ...Array.from({ length: 99 }, () => 100)];
        const [row] = computeOutbreakSignal([], bag.map((value) => ({ timeBucket: 'W1', value })));
        expect(row.forecastLo).toBe(100);
        expect(row.forecastMean).toBe(100);
        expect(row.forecastHi).toBe(100);
    });

    it('smooths to the global mean when the window spans the series', () => {
        const series = [1, 2, 3, 4, 5].map((value, i) => ({ location: 'a', timeBucket: i + 1, value }));
        const rows = computeOutbreakSignal(series, [], { window: 10 });
        expect(rows.map((row) => row.smoothedMean)).toEqual([3, 3, 3, 3, 3]);
    });

    it('applies the threshold multiplier', () => {
        const rows = computeOutbreakSignal(observations, forecasts, { z: 3 });
        expect(rows[0].threshold).toBe(19);
        expect(rows[0].exceedProbability).toBe(0.5);

        const flat = computeOutbreakSignal(observations, forecasts, { z: 0 });
        expect(flat[0].threshold).toBe(16);
    });

    it('sorts numeric buckets numerically', () => {
        const rows = computeOutbreakSignal(
            [
                { location: 'a', timeBucket: 10, value: 1 },
                { location: 'a', timeBucket: 9, value: 3 }
            ],
            [{ timeBucket: 11, value: 2 }]
        );
        expect(rows.map((row) => row.timeBucket)).toEqual([9, 10, 11]);
    });

    it('keeps a bucket whose observations are all missing, without an observed mean', () => {
        const rows = computeOutbreakSignal(
            [
                { location: 'a', timeBucket: 1, value: NaN },
                { location: 'a', timeBucket: 2, value: 4 },
                { location: 'a', timeBucket: 3, value: 6 }
            ],
            []
        );
        expect(rows).toHaveLength(3);
        expect(rows[0].observedMean).toBeNull();
        expect(rows[0].threshold).toBeNull();
        expect(rows[1].smoothedMean).toBe(5);
        expect(rows[1].smoothedSd).toBe(1);
    });

    it('returns no rows for empty inputs', () => {
        expect(computeOutbreakSignal([], [])).toEqual([]);
    });

    it('fails as a whole on mixed bucket kinds', () => {
        expect(() => computeOutbreakSignal(observations, [{ timeBucket: 1, value: 3 }])).toThrow(InvalidInputError);
    });

    it('rejects an invalid window or multiplier', () => {
        expect(() => computeOutbreakSignal(observations, forecasts, { window: -1 })).toThrow(InvalidInputError);
        expect(() => computeOutbreakSignal(observations, forecasts, { z: NaN })).toThrow(InvalidInputError);
    });

    it('returns identical output for identical input', () => {
        const first = computeOutbreakSignal(observations, forecasts);
        const second = computeOutbreakSignal(observations, forecasts);
        expect(second).toStrictEqual(first);
    });
});

describe('computeOutbreakSignalsByLocation', () => {
    it('computes each location separately', () => {
        const result = computeOutbreakSignalsByLocation(observations, [
            { timeBucket: '2023-W01', value: 20, location: 'loc2' },
            { timeBucket: '2023-W01', value: 24, location: 'loc2' },
            { timeBucket: '2023-W01', value: 99 }
        ]);

        expect(Array.from(result.keys())).toEqual(['loc1', 'loc2']);

        const loc1 = result.get('loc1') ?? [];
        expect(loc1.map((row) => row.threshold)).toEqual([14, 14]);
        expect(loc1[0].forecastMean).toBeNull();

        const loc2 = result.get('loc2') ?? [];
        expect(loc2[0].smoothedMean).toBe(20);
        expect(loc2[0].threshold).toBe(22);
        expect(loc2[0].forecastMean).toBe(22);
        expect(loc2[0].exceedProbability).toBe(0.5);
    });
});
