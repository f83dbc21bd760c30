/**
 * Outbreak Signals: Time Bucket Ordering
 *
 * Buckets must be totally ordered. Strings compare by code unit
 * ("2023-W09" < "2023-W10"), numbers numerically. A computation whose keys
 * mix the two kinds, or contain a non-finite number, cannot be sorted.
 */

import { InvalidInputError } from './errors';
import type { TimeBucket } from './types';

export type BucketKind = 'string' | 'number';

export function bucketKindOf(key: TimeBucket): BucketKind {
    if (typeof key === 'string') return 'string';
    if (Number.isFinite(key)) return 'number';
    throw new InvalidInputError(`Time bucket ${String(key)} is not orderable`, 'timeBucket');
}

/**
 * Throws InvalidInputError unless every key has the same kind.
 * Returns the shared kind, or null for an empty input.
 */
export function assertComparableBuckets(keys: Iterable<TimeBucket>): BucketKind | null {
    let kind: BucketKind | null = null;
    let first: TimeBucket | null = null;

    for (const key of keys) {
        const next = bucketKindOf(key);
        if (kind === null) {
            kind = next;
            first = key;
        } else if (next !== kind) {
            throw new InvalidInputError(
                `Time buckets are not comparable: ${JSON.stringify(first)} (${kind}) vs ${JSON.stringify(key)} (${next})`,
                'timeBucket'
            );
        }
    }

    return kind;
}

export function compareTimeBuckets(a: TimeBucket, b: TimeBucket): number {
    if (typeof a === 'number' && typeof b === 'number') {
        return a - b;
    }
    if (typeof a === 'string' && typeof b === 'string') {
        if (a < b) return -1;
        if (a > b) return 1;
        return 0;
    }
    throw new InvalidInputError(
        `Time buckets are not comparable: ${JSON.stringify(a)} vs ${JSON.stringify(b)}`,
        'timeBucket'
    );
}

/**
 * Distinct keys in ascending order.
 */
export function sortTimeBuckets(keys: Iterable<TimeBucket>): TimeBucket[] {
    const unique = Array.from(new Set(keys));
    assertComparableBuckets(unique);
    return unique.sort(compareTimeBuckets);
}
