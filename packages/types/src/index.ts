/**
 * `@dirshelf/types`
 *
 * Shared TypeScript types for dirshelf packages.
 * This module provides the catalog data model, the on-disk configuration and
 * cache shapes, and the logging callbacks threaded through library packages.
 *
 * @packageDocumentation
 */

// ============================================================================
// CATALOG RECORDS
// ============================================================================

/**
 * One downloadable entry extracted from a listing page.
 *
 * Records are immutable once extracted; a re-scrape replaces them wholesale.
 * Within a source, a record is identified by its `url`.
 */
export interface ListingRecord {
    /** Display name taken from the name element's text. */
    readonly name: string;
    /** Absolute download URL. */
    readonly url: string;
    /** Size text as shown on the page, or `"?"` when the page has none. */
    readonly size: string;
}

/** Size placeholder used when a listing entry has no size element. */
export const UNKNOWN_SIZE = '?';

// ============================================================================
// CONFIGURATION
// ============================================================================

/**
 * CSS selectors used to pull record fields out of a single entry node.
 */
export interface FieldSelectors {
    /** Selector for the element whose text is the record name. */
    name: string;
    /** Selector for the element whose `href` is the record URL. */
    url: string;
    /** Selector for the element whose text is the size (optional). */
    size?: string;
}

/**
 * Record-level filters applied before a record is kept.
 */
export interface IgnoreRules {
    /** Exact match against the trimmed size text (e.g. `"-"` for directories). */
    size?: string;
    /** Case-insensitive substring of the record name. */
    name_contains?: string;
}

/**
 * Bucket name to ordered list of case-insensitive substring patterns.
 */
export type RuleSet = Record<string, string[]>;

/**
 * A download folder setting: either a single path or a list of paths.
 */
export type FolderSetting = string | string[];

/**
 * A configured listing source (for example one console or platform).
 */
export interface SourceConfig {
    /** Short identifier shown in the UI header. */
    id: string;
    /** One or more listing page URLs; results are concatenated in order. */
    urls: string[];
    /** Selector matching one node per listing entry. */
    entries: string;
    fields: FieldSelectors;
    ignore?: IgnoreRules;
    /** Region grouping rules. */
    regions?: RuleSet;
    /** Type grouping rules (e.g. demos, betas, hacks). */
    types?: RuleSet;
    /** Per-source download folder override. */
    download_folders?: FolderSetting;
}

/**
 * Versioning block stored at the top of the configuration file.
 */
export interface ConfigMeta {
    version: number;
}

/**
 * The steady-state configuration shape, as stored on disk.
 *
 * Older layouts are migrated into this shape when the file is loaded.
 */
export interface AppConfig {
    _meta: ConfigMeta;
    /** Global download folders used when a source has no override. */
    download_folders?: FolderSetting;
    /** Sources keyed by their display name, in display order. */
    systems: Record<string, SourceConfig>;
}

// ============================================================================
// CACHE
// ============================================================================

/**
 * Metadata stored alongside cached records.
 */
export interface CacheMeta {
    /** SHA-256 hex digest of the configuration that produced the cache. */
    config_hash: string;
    /** Unix timestamp (seconds) of the last rebuild. */
    updated: number;
}

/**
 * In-memory view of the catalog cache.
 */
export interface CacheSnapshot {
    /** Null when the cache has never been stamped (new or legacy file). */
    meta: CacheMeta | null;
    /** Records per source name. */
    sources: Record<string, ListingRecord[]>;
}

// ============================================================================
// GROUPING
// ============================================================================

/**
 * Which rule set a grouping uses.
 */
export type GroupKind = 'region' | 'type';

/**
 * Ordered mapping from bucket name to the records in that bucket.
 */
export type BucketMap = Map<string, ListingRecord[]>;

// ============================================================================
// LOGGING CALLBACKS
// ============================================================================

/**
 * Receives non-fatal problems (failed fetches, persistence failures).
 */
export type OnWarning = (message: string) => void;

/**
 * Receives detailed progress messages, shown only in verbose mode.
 */
export type OnVerbose = (message: string) => void;
