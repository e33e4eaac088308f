/**
 * Region and type categorization
 *
 * A rule set maps bucket names to case-insensitive substring patterns. Every
 * bucket is tested for every record, so a record can land in several buckets;
 * records matching none go to the fallback bucket, which always comes last.
 */

import type { BucketMap, GroupKind, ListingRecord, RuleSet } from '@dirshelf/types';

/** Bucket for records that match no rule, per grouping kind. */
export const FALLBACK_BUCKET: Readonly<Record<GroupKind, string>> = {
    region: 'Unknown',
    type: 'None',
};

/**
 * Stable identifier for a record within the whole catalog.
 */
export function recordKey(sourceId: string, record: ListingRecord): string {
    return `${sourceId}::${record.url}`;
}

function valueKey(record: ListingRecord): string {
    return JSON.stringify([record.name, record.url, record.size]);
}

/**
 * Whether any pattern occurs in the name, ignoring case.
 */
export function matchesAny(name: string, patterns: readonly string[]): boolean {
    const lowered = name.toLowerCase();
    return patterns.some((pattern) => lowered.includes(pattern.toLowerCase()));
}

/**
 * Groups records into buckets.
 *
 * With no rules (or an empty rule set) the result is a single fallback bucket
 * holding every record. Otherwise there is one bucket per rule key, in key
 * order, followed by the fallback bucket. Empty buckets are kept so the
 * bucket list stays the same while the user cycles through it.
 *
 * @param records - Records in page order; order is preserved inside buckets
 * @param ruleset - Bucket name to patterns
 * @param kind - Picks the fallback bucket name
 */
export function categorize(
    records: readonly ListingRecord[],
    ruleset: RuleSet | undefined,
    kind: GroupKind,
): BucketMap {
    const fallback = FALLBACK_BUCKET[kind];
    const rules = Object.entries(ruleset ?? {});

    if (rules.length === 0) {
        return new Map([[fallback, [...records]]]);
    }

    const buckets: BucketMap = new Map();
    const seen = new Map<string, Set<string>>();
    for (const [bucket] of rules) {
        buckets.set(bucket, []);
        seen.set(bucket, new Set());
    }
    // A rule key equal to the fallback name shares its bucket
    if (!buckets.has(fallback)) {
        buckets.set(fallback, []);
        seen.set(fallback, new Set());
    }

    const append = (bucket: string, record: ListingRecord): void => {
        const key = valueKey(record);
        const bucketSeen = seen.get(bucket);
        if (!bucketSeen || bucketSeen.has(key)) return;
        bucketSeen.add(key);
        buckets.get(bucket)?.push(record);
    };

    for (const record of records) {
        let matched = false;
        for (const [bucket, patterns] of rules) {
            if (matchesAny(record.name, patterns)) {
                append(bucket, record);
                matched = true;
            }
        }
        if (!matched) {
            append(fallback, record);
        }
    }

    return buckets;
}

/**
 * Bucket names with their record counts, in bucket order.
 */
export function bucketCounts(buckets: BucketMap): Array<{ bucket: string; count: number }> {
    return [...buckets].map(([bucket, records]) => ({
        bucket,
        count: records.length,
    }));
}
