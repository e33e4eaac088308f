/**
 * Browse session state machine
 *
 * Holds which source, view, bucket, search and item are current, and derives
 * the list on screen from them. Every change that replaces the displayed
 * list resets the item index to 0.
 */

import type {
    BucketMap,
    GroupKind,
    ListingRecord,
    SourceConfig,
} from '@dirshelf/types';
import { categorize } from '@dirshelf/catalog';
import { FLAT_VIEW, type ViewMode } from './view-mode.js';
import { computeViewportStart } from './viewport.js';

/**
 * Read access to sources and their records.
 */
export interface CatalogProvider {
    /** Source names in display order. */
    sourceNames(): string[];
    getSource(name: string): SourceConfig | undefined;
    getRecords(name: string): readonly ListingRecord[];
}

export class BrowseSession {
    private sourceIdx = 0;
    private viewMode: ViewMode = FLAT_VIEW;
    private itemIdx = 0;
    private searchQuery: string | null = null;
    private bucketCache: { source: string; by: GroupKind; buckets: BucketMap } | null =
        null;

    /**
     * @throws Error when the provider has no sources
     */
    constructor(private readonly catalog: CatalogProvider) {
        if (catalog.sourceNames().length === 0) {
            throw new Error('No sources configured');
        }
    }

    // ========================================================================
    // STATE
    // ========================================================================

    get sourceIndex(): number {
        return this.sourceIdx;
    }

    get view(): ViewMode {
        return this.viewMode;
    }

    /** Lowercased search text, or null when no filter is active. */
    get query(): string | null {
        return this.searchQuery;
    }

    get sourceName(): string {
        return this.catalog.sourceNames()[this.sourceIdx] ?? '';
    }

    get source(): SourceConfig | undefined {
        return this.catalog.getSource(this.sourceName);
    }

    /** All records of the current source. */
    records(): readonly ListingRecord[] {
        return this.catalog.getRecords(this.sourceName);
    }

    /** Buckets of the current grouping, or null in flat view. */
    buckets(): BucketMap | null {
        if (this.viewMode.kind !== 'grouped') return null;

        const { by } = this.viewMode;
        const source = this.sourceName;
        if (this.bucketCache?.source !== source || this.bucketCache.by !== by) {
            const rules = by === 'region' ? this.source?.regions : this.source?.types;
            this.bucketCache = {
                source,
                by,
                buckets: categorize(this.records(), rules, by),
            };
        }
        return this.bucketCache.buckets;
    }

    bucketNames(): string[] {
        const buckets = this.buckets();
        return buckets ? [...buckets.keys()] : [];
    }

    /** Name of the bucket on screen, or null in flat view. */
    currentBucket(): string | null {
        if (this.viewMode.kind !== 'grouped') return null;
        const names = this.bucketNames();
        if (names.length === 0) return null;
        return names[this.viewMode.bucketIndex % names.length] ?? null;
    }

    /** The list before the search filter: all records, or the current bucket. */
    baseList(): readonly ListingRecord[] {
        if (this.viewMode.kind === 'flat') {
            return this.records();
        }
        const bucket = this.currentBucket();
        return bucket === null ? [] : (this.buckets()?.get(bucket) ?? []);
    }

    /** The list on screen. */
    displayList(): readonly ListingRecord[] {
        const base = this.baseList();
        const query = this.searchQuery;
        if (query === null) return base;
        return base.filter((record) => record.name.toLowerCase().includes(query));
    }

    /** Selected index, clamped to the displayed list (0 when empty). */
    get selectedIndex(): number {
        const last = this.displayList().length - 1;
        return Math.max(0, Math.min(this.itemIdx, last));
    }

    selected(): ListingRecord | undefined {
        return this.displayList()[this.selectedIndex];
    }

    /** First row to draw for a list area of `visible` rows. */
    viewportStart(visible: number): number {
        return computeViewportStart(
            this.selectedIndex,
            this.displayList().length,
            visible,
        );
    }

    // ========================================================================
    // TRANSITIONS
    // ========================================================================

    private resetSource(): void {
        this.viewMode = FLAT_VIEW;
        this.itemIdx = 0;
        this.searchQuery = null;
    }

    /** Moves to the next (or previous) source, wrapping around. */
    switchSource(delta: 1 | -1): void {
        const count = this.catalog.sourceNames().length;
        this.sourceIdx = (((this.sourceIdx + delta) % count) + count) % count;
        this.resetSource();
    }

    /**
     * Enters grouping by `by`, or returns to the flat list when already
     * grouped that way. Clears the search.
     */
    toggleGrouping(by: GroupKind): void {
        if (this.viewMode.kind === 'grouped' && this.viewMode.by === by) {
            this.viewMode = FLAT_VIEW;
        } else {
            this.viewMode = { kind: 'grouped', by, bucketIndex: 0 };
        }
        this.itemIdx = 0;
        this.searchQuery = null;
    }

    /** Shows the next bucket, wrapping. The search stays active. */
    cycleBucket(): void {
        if (this.viewMode.kind !== 'grouped') return;
        const count = this.bucketNames().length;
        if (count === 0) return;
        this.viewMode = {
            ...this.viewMode,
            bucketIndex: (this.viewMode.bucketIndex + 1) % count,
        };
        this.itemIdx = 0;
    }

    /**
     * Applies search input. Blank input clears the filter.
     *
     * @returns Number of records now displayed
     */
    setSearch(input: string): number {
        const trimmed = input.trim();
        this.searchQuery = trimmed === '' ? null : trimmed.toLowerCase();
        this.itemIdx = 0;
        return this.displayList().length;
    }

    /** Moves the selection, clamped to the list. Never wraps. */
    moveSelection(delta: number): void {
        const last = Math.max(0, this.displayList().length - 1);
        this.itemIdx = Math.max(0, Math.min(this.selectedIndex + delta, last));
    }

    selectFirst(): void {
        this.itemIdx = 0;
    }

    selectLast(): void {
        this.itemIdx = Math.max(0, this.displayList().length - 1);
    }
}
