/**
 * `@dirshelf/catalog`
 *
 * Groups catalog records by region or type rules.
 *
 * @packageDocumentation
 */

export {
    FALLBACK_BUCKET,
    bucketCounts,
    categorize,
    matchesAny,
    recordKey,
} from './categorize.js';
