/**
 * Source scraping for `@dirshelf/scraper`
 *
 * Fetches every listing page of a source and turns it into records. A source
 * is all-or-nothing: if any page fails, the whole source comes back empty so
 * the next run's incremental repair scrapes it again.
 */

import type {
    ListingRecord,
    OnVerbose,
    OnWarning,
    SourceConfig,
} from '@dirshelf/types';
import {
    BROWSER_HEADERS,
    HttpStatusError,
    createSignalWithTimeout,
    formatFetchError,
    robustFetch,
} from '@dirshelf/http';
import { bucketCounts, categorize } from '@dirshelf/catalog';
import { extractRecords } from './extract.js';

/** Per-page request timeout in milliseconds */
const PAGE_TIMEOUT_MS = 60_000;

export interface ScrapeOptions {
    onWarning?: OnWarning;
    onVerbose?: OnVerbose;
    signal?: AbortSignal;
    /** Per-page timeout in milliseconds (default: 60000) */
    timeout?: number;
    /** Retry attempts for transient errors, passed to robustFetch */
    retries?: number;
    /** Base backoff delay, passed to robustFetch */
    retryDelay?: number;
    /** Include hints in warning messages */
    verbose?: boolean;
}

/**
 * Signature of a source scraper, so the cache can be driven by a stand-in.
 */
export type ScrapeFn = (
    name: string,
    source: SourceConfig,
    options?: ScrapeOptions,
) => Promise<ListingRecord[]>;

async function fetchListingPage(
    url: string,
    source: SourceConfig,
    options: ScrapeOptions,
): Promise<ListingRecord[]> {
    const response = await robustFetch(url, {
        headers: BROWSER_HEADERS,
        signal: createSignalWithTimeout(options.timeout ?? PAGE_TIMEOUT_MS, options.signal),
        retries: options.retries,
        retryDelay: options.retryDelay,
    });

    if (!response.ok) {
        throw new HttpStatusError(url, response.status, response.statusText);
    }

    const html = await response.text();
    // Use the final URL after redirects as the base for relative links
    return extractRecords(
        html,
        source.entries,
        source.fields,
        source.ignore,
        response.url || url,
    );
}

/**
 * Scrapes all listing pages of a source, concatenating results in URL order.
 *
 * Never throws. Any failure is reported through `onWarning` and yields an
 * empty list for the whole source.
 */
export async function scrapeSource(
    name: string,
    source: SourceConfig,
    options: ScrapeOptions = {},
): Promise<ListingRecord[]> {
    const records: ListingRecord[] = [];

    for (const url of source.urls) {
        options.onVerbose?.(`Fetching ${url}`);
        try {
            const pageRecords = await fetchListingPage(url, source, options);
            options.onVerbose?.(`Found ${pageRecords.length} entries at ${url}`);
            records.push(...pageRecords);
        } catch (error) {
            options.onWarning?.(
                `${name}: ${formatFetchError(error, url, options.verbose)}`,
            );
            return [];
        }
    }

    return records;
}

/**
 * Record count per region bucket, in bucket order.
 */
export function summarizeSource(
    records: readonly ListingRecord[],
    source: SourceConfig,
): Array<{ bucket: string; count: number }> {
    return bucketCounts(categorize(records, source.regions, 'region'));
}
