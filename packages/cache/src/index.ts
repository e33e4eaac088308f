/**
 * `@dirshelf/cache`
 *
 * On-disk catalog of scraped records, keyed by a hash of the configuration
 * that produced it.
 *
 * @packageDocumentation
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { homedir } from 'os';
import { dirname, join } from 'path';
import {
    UNKNOWN_SIZE,
    type AppConfig,
    type CacheMeta,
    type CacheSnapshot,
    type ListingRecord,
    type OnVerbose,
    type OnWarning,
    type SourceConfig,
} from '@dirshelf/types';
import { computeConfigHash } from '@dirshelf/config';

/** Default cache location */
export const DEFAULT_CACHE_PATH = join(homedir(), '.cache', 'dirshelf', 'catalog.json');

// ============================================================================
// TYPES
// ============================================================================

/**
 * Produces the records of one source. Expected never to throw: a failed
 * source is reported as an empty list.
 */
export type SourceScraper = (
    name: string,
    source: SourceConfig,
) => Promise<ListingRecord[]>;

/**
 * Configuration options for the catalog cache.
 */
export interface CatalogCacheOptions {
    /**
     * Path of the cache file.
     * @defaultValue ~/.cache/dirshelf/catalog.json
     */
    cachePath?: string;
    onWarning?: OnWarning;
    onVerbose?: OnVerbose;
    /** Clock in milliseconds, used for the `updated` stamp. */
    now?: () => number;
}

export interface RefreshOptions {
    /** Rebuild everything even when the config hash matches. */
    force?: boolean;
    /** Called before each source is scraped. */
    onSourceStart?: (name: string) => void;
    /** Called after each source is scraped and persisted. */
    onSourceDone?: (name: string, records: readonly ListingRecord[]) => void;
}

/**
 * What a refresh did.
 *
 * - `full`: the cache was rebuilt from scratch
 * - `incremental`: only empty or missing sources were scraped
 * - `none`: nothing needed scraping
 */
export interface RefreshReport {
    mode: 'full' | 'incremental' | 'none';
    /** Sources scraped, in config order. */
    scraped: string[];
    /** Scraped sources that came back with no records. */
    empty: string[];
    /** Persistence problems; the in-memory cache is still up to date. */
    warnings: string[];
}

// ============================================================================
// ERRORS
// ============================================================================

/**
 * Writing the cache file failed.
 */
export class CachePersistError extends Error {
    readonly name = 'CachePersistError';

    constructor(
        public readonly path: string,
        public readonly originalError: unknown,
    ) {
        const detail =
            originalError instanceof Error
                ? originalError.message
                : String(originalError);
        super(`Failed to save cache to ${path}: ${detail}`);
    }
}

// ============================================================================
// FILE PARSING
// ============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseMeta(value: unknown): CacheMeta | null {
    if (
        isObject(value) &&
        typeof value.config_hash === 'string' &&
        typeof value.updated === 'number'
    ) {
        return { config_hash: value.config_hash, updated: value.updated };
    }
    return null;
}

function parseRecord(value: unknown): ListingRecord | null {
    if (
        !isObject(value) ||
        typeof value.name !== 'string' ||
        typeof value.url !== 'string'
    ) {
        return null;
    }
    const size = typeof value.size === 'string' ? value.size : UNKNOWN_SIZE;
    return { name: value.name, url: value.url, size };
}

function parseRecordList(value: unknown[]): ListingRecord[] {
    const records: ListingRecord[] = [];
    for (const item of value) {
        const record = parseRecord(item);
        if (record) records.push(record);
    }
    return records;
}

/**
 * Reads one source entry. Older caches stored records grouped by region;
 * those are flattened into a single list in bucket order.
 */
export function flattenSourceEntry(value: unknown): ListingRecord[] | null {
    if (Array.isArray(value)) {
        return parseRecordList(value);
    }
    if (isObject(value)) {
        const records: ListingRecord[] = [];
        for (const bucket of Object.values(value)) {
            if (Array.isArray(bucket)) {
                records.push(...parseRecordList(bucket));
            }
        }
        return records;
    }
    return null;
}

/**
 * Converts parsed cache JSON into a snapshot.
 *
 * @param onWarning - Receives one message per entry that could not be read
 */
export function parseCacheFile(raw: unknown, onWarning?: OnWarning): CacheSnapshot {
    if (!isObject(raw)) {
        onWarning?.('Cache file is not a JSON object; starting empty');
        return { meta: null, sources: {} };
    }

    const sources: Record<string, ListingRecord[]> = {};
    for (const [key, value] of Object.entries(raw)) {
        if (key === '_meta') continue;
        const records = flattenSourceEntry(value);
        if (records) {
            sources[key] = records;
        } else {
            onWarning?.(`Ignoring unreadable cache entry for ${key}`);
        }
    }

    return { meta: parseMeta(raw._meta), sources };
}

function isMissingFileError(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ============================================================================
// CATALOG CACHE
// ============================================================================

/**
 * Catalog cache backed by a single JSON file.
 *
 * The cache is valid only while its stored hash equals the hash of the live
 * config. A mismatch invalidates every source at once.
 *
 * @example
 * ```typescript
 * const cache = await initCache({ cachePath: './catalog.json' });
 * const report = await cache.refresh(config, (name, source) =>
 *     scrapeSource(name, source),
 * );
 * const records = cache.getRecords('Game Boy');
 * ```
 */
export class CatalogCache {
    readonly cachePath: string;
    private onWarning?: OnWarning;
    private onVerbose?: OnVerbose;
    private now: () => number;
    private meta: CacheMeta | null = null;
    private sources: Record<string, ListingRecord[]> = {};

    constructor(options: CatalogCacheOptions = {}) {
        this.cachePath = options.cachePath || DEFAULT_CACHE_PATH;
        this.onWarning = options.onWarning;
        this.onVerbose = options.onVerbose;
        this.now = options.now ?? Date.now;
    }

    /**
     * Reads the cache file. A missing or unreadable file leaves the cache empty.
     */
    async load(): Promise<void> {
        this.meta = null;
        this.sources = {};

        let text: string;
        try {
            text = await readFile(this.cachePath, 'utf-8');
        } catch (error) {
            if (!isMissingFileError(error)) {
                this.onWarning?.(
                    `Could not read cache ${this.cachePath}: ${error instanceof Error ? error.message : String(error)}`,
                );
            }
            return;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(text);
        } catch {
            this.onWarning?.(`Cache ${this.cachePath} is not valid JSON; starting empty`);
            return;
        }

        const snapshot = parseCacheFile(raw, this.onWarning);
        this.meta = snapshot.meta;
        this.sources = snapshot.sources;
        this.onVerbose?.(
            `Loaded cache with ${Object.keys(this.sources).length} sources from ${this.cachePath}`,
        );
    }

    /**
     * Overwrites the cache file with the current contents.
     *
     * @throws CachePersistError when the file cannot be written
     */
    async save(): Promise<void> {
        const data: Record<string, unknown> = {};
        if (this.meta) {
            data._meta = this.meta;
        }
        for (const [name, records] of Object.entries(this.sources)) {
            data[name] = records;
        }

        try {
            await mkdir(dirname(this.cachePath), { recursive: true });
            await writeFile(this.cachePath, JSON.stringify(data, null, 2), 'utf-8');
        } catch (error) {
            throw new CachePersistError(this.cachePath, error);
        }
    }

    /**
     * Whether the cache was built from a different config (or never stamped).
     */
    isStale(config: AppConfig): boolean {
        return this.meta?.config_hash !== computeConfigHash(config);
    }

    /**
     * Brings the cache up to date with the config.
     *
     * When stale (or forced) every source is scraped again and sources no
     * longer configured are dropped. Otherwise only sources with no records
     * are scraped. The file is written after each source.
     */
    async refresh(
        config: AppConfig,
        scrape: SourceScraper,
        options: RefreshOptions = {},
    ): Promise<RefreshReport> {
        const full = options.force === true || this.isStale(config);
        const names = Object.keys(config.systems);
        const report: RefreshReport = {
            mode: full ? 'full' : 'incremental',
            scraped: [],
            empty: [],
            warnings: [],
        };

        let targets: string[];
        if (full) {
            this.onVerbose?.('Config changed or refresh forced; rebuilding cache');
            this.sources = {};
            this.meta = {
                config_hash: computeConfigHash(config),
                updated: Math.floor(this.now() / 1000),
            };
            targets = names;
        } else {
            targets = names.filter((name) => !this.sources[name]?.length);
            if (targets.length === 0) {
                report.mode = 'none';
                return report;
            }
        }

        for (const name of targets) {
            const source = config.systems[name];
            if (!source) continue;

            options.onSourceStart?.(name);
            const records = await scrape(name, source);
            this.sources[name] = records;
            report.scraped.push(name);
            if (records.length === 0) {
                report.empty.push(name);
            }

            await this.persist(report);
            options.onSourceDone?.(name, records);
        }

        return report;
    }

    private async persist(report: RefreshReport): Promise<void> {
        try {
            await this.save();
        } catch (error) {
            if (!(error instanceof CachePersistError)) throw error;
            report.warnings.push(error.message);
            this.onWarning?.(error.message);
        }
    }

    /** Records of a source, or an empty list when it has none. */
    getRecords(name: string): ListingRecord[] {
        return this.sources[name] ?? [];
    }

    /** Unix timestamp (seconds) of the last full rebuild, or null. */
    updatedAt(): number | null {
        return this.meta?.updated ?? null;
    }

    /** Names of all cached sources, in insertion order. */
    sourceNames(): string[] {
        return Object.keys(this.sources);
    }

    snapshot(): CacheSnapshot {
        return {
            meta: this.meta ? { ...this.meta } : null,
            sources: { ...this.sources },
        };
    }
}

// ============================================================================
// GLOBAL INSTANCE
// ============================================================================

let globalCache: CatalogCache | null = null;

/**
 * Returns the global cache instance, creating an unloaded default on first use.
 */
export function getCache(): CatalogCache {
    if (!globalCache) {
        globalCache = new CatalogCache();
    }
    return globalCache;
}

/**
 * Initializes (or reinitializes) the global cache and loads it from disk.
 *
 * @param options - Optional cache configuration
 * @returns The loaded CatalogCache instance
 */
export async function initCache(options?: CatalogCacheOptions): Promise<CatalogCache> {
    globalCache = new CatalogCache(options);
    await globalCache.load();
    return globalCache;
}
