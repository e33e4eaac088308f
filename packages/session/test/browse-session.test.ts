/**
 * Tests for the browse session state machine
 */

import { describe, it, expect } from 'vitest';
import type { ListingRecord } from '@dirshelf/types';
import { BrowseSession, computeViewportStart } from '../src/index.js';
import {
    ALPHA,
    BETA,
    DELTA,
    GAMMA,
    PONG,
    createCatalog,
    createConfig,
} from './catalog.js';

function createSession(
    records?: Record<string, readonly ListingRecord[]>,
): BrowseSession {
    const config = createConfig();
    return new BrowseSession(createCatalog(config, records));
}

function manyRecords(count: number): ListingRecord[] {
    return Array.from({ length: count }, (_, i) => ({
        name: `Title ${i}.zip`,
        url: `https://files.example.com/gb/Title%20${i}.zip`,
        size: '1.0 KiB',
    }));
}

describe('BrowseSession', () => {
    it('should refuse a catalog without sources', () => {
        expect(
            () =>
                new BrowseSession({
                    sourceNames: () => [],
                    getSource: () => undefined,
                    getRecords: () => [],
                }),
        ).toThrow('No sources configured');
    });

    it('should start on the first source in flat view', () => {
        const session = createSession();

        expect(session.sourceName).toBe('Game Boy');
        expect(session.view).toEqual({ kind: 'flat' });
        expect(session.displayList()).toEqual([ALPHA, BETA, GAMMA, DELTA]);
        expect(session.selectedIndex).toBe(0);
        expect(session.selected()).toEqual(ALPHA);
    });

    describe('item navigation', () => {
        it('should clamp at both ends without wrapping', () => {
            const session = createSession();

            session.moveSelection(-1);
            expect(session.selectedIndex).toBe(0);

            session.moveSelection(10);
            expect(session.selectedIndex).toBe(3);

            session.moveSelection(1);
            expect(session.selectedIndex).toBe(3);
            expect(session.selected()).toEqual(DELTA);
        });

        it('should jump to the first and last item', () => {
            const session = createSession();

            session.selectLast();
            expect(session.selectedIndex).toBe(3);

            session.selectFirst();
            expect(session.selectedIndex).toBe(0);
        });

        it('should keep index 0 on an empty list', () => {
            const session = createSession({ 'Game Boy': [], Atari: [PONG] });

            session.moveSelection(1);
            session.selectLast();

            expect(session.displayList()).toEqual([]);
            expect(session.selectedIndex).toBe(0);
            expect(session.selected()).toBeUndefined();
        });
    });

    describe('source navigation', () => {
        it('should wrap around in both directions', () => {
            const session = createSession();

            session.switchSource(1);
            expect(session.sourceName).toBe('Atari');

            session.switchSource(1);
            expect(session.sourceName).toBe('Game Boy');

            session.switchSource(-1);
            expect(session.sourceName).toBe('Atari');
        });

        it('should reset view, search and selection', () => {
            const session = createSession();
            session.toggleGrouping('region');
            session.setSearch('a');
            session.moveSelection(1);

            session.switchSource(1);

            expect(session.view).toEqual({ kind: 'flat' });
            expect(session.query).toBeNull();
            expect(session.selectedIndex).toBe(0);
            expect(session.displayList()).toEqual([PONG]);
        });
    });

    describe('grouping', () => {
        it('should group by region with the fallback bucket last', () => {
            const session = createSession();

            session.toggleGrouping('region');

            expect(session.bucketNames()).toEqual(['USA', 'Europe', 'Unknown']);
            expect(session.currentBucket()).toBe('USA');
            expect(session.displayList()).toEqual([ALPHA, DELTA]);
        });

        it('should return to the flat list when toggled twice', () => {
            const session = createSession();

            session.toggleGrouping('region');
            session.toggleGrouping('region');

            expect(session.view).toEqual({ kind: 'flat' });
            expect(session.currentBucket()).toBeNull();
            expect(session.displayList()).toHaveLength(4);
        });

        it('should switch directly from region to type grouping', () => {
            const session = createSession();

            session.toggleGrouping('region');
            session.cycleBucket();
            session.toggleGrouping('type');

            expect(session.view).toEqual({ kind: 'grouped', by: 'type', bucketIndex: 0 });
            expect(session.bucketNames()).toEqual(['Demo', 'None']);
            expect(session.displayList()).toEqual([GAMMA]);
        });

        it('should put everything in the fallback bucket when a source has no rules', () => {
            const session = createSession();
            session.switchSource(1);

            session.toggleGrouping('region');

            expect(session.bucketNames()).toEqual(['Unknown']);
            expect(session.displayList()).toEqual([PONG]);
        });

        it('should clear the search when toggling', () => {
            const session = createSession();
            session.setSearch('beta');

            session.toggleGrouping('region');

            expect(session.query).toBeNull();
        });

        it('should cycle buckets with wrap-around and reset the selection', () => {
            const session = createSession();
            session.toggleGrouping('region');
            session.moveSelection(1);

            session.cycleBucket();
            expect(session.currentBucket()).toBe('Europe');
            expect(session.selectedIndex).toBe(0);
            expect(session.displayList()).toEqual([BETA, DELTA]);

            session.cycleBucket();
            expect(session.currentBucket()).toBe('Unknown');

            session.cycleBucket();
            expect(session.currentBucket()).toBe('USA');
        });

        it('should keep the search while cycling buckets', () => {
            const session = createSession();
            session.toggleGrouping('region');
            session.setSearch('delta');

            session.cycleBucket();

            expect(session.query).toBe('delta');
            expect(session.displayList()).toEqual([DELTA]);
        });

        it('should ignore bucket cycling in flat view', () => {
            const session = createSession();

            session.cycleBucket();

            expect(session.view).toEqual({ kind: 'flat' });
        });
    });

    describe('search', () => {
        it('should filter by lowercased substring and reset the selection', () => {
            const session = createSession();
            session.moveSelection(2);

            const count = session.setSearch('  BETA ');

            expect(count).toBe(1);
            expect(session.query).toBe('beta');
            expect(session.selectedIndex).toBe(0);
            expect(session.displayList()).toEqual([BETA]);
        });

        it('should clear the filter on blank input', () => {
            const session = createSession();
            session.setSearch('beta');

            const count = session.setSearch('   ');

            expect(count).toBe(4);
            expect(session.query).toBeNull();
        });

        it('should allow an empty result', () => {
            const session = createSession();

            expect(session.setSearch('zzz')).toBe(0);
            expect(session.selectedIndex).toBe(0);
            expect(session.selected()).toBeUndefined();
        });

        it('should search within the current bucket only', () => {
            const session = createSession();
            session.toggleGrouping('region');

            expect(session.setSearch('beta')).toBe(0);
        });
    });

    describe('viewport', () => {
        it('should center the selection in a long list', () => {
            const session = createSession({ 'Game Boy': manyRecords(50), Atari: [] });

            session.moveSelection(25);
            expect(session.viewportStart(10)).toBe(20);

            session.selectLast();
            expect(session.viewportStart(10)).toBe(40);

            session.selectFirst();
            expect(session.viewportStart(10)).toBe(0);
        });
    });
});

describe('computeViewportStart', () => {
    it('should start at 0 when the list fits', () => {
        expect(computeViewportStart(4, 5, 10)).toBe(0);
        expect(computeViewportStart(9, 10, 10)).toBe(0);
    });

    it('should clamp to the start and the end', () => {
        expect(computeViewportStart(2, 50, 10)).toBe(0);
        expect(computeViewportStart(49, 50, 10)).toBe(40);
    });

    it('should center between the ends', () => {
        expect(computeViewportStart(25, 50, 10)).toBe(20);
        expect(computeViewportStart(25, 50, 9)).toBe(21);
    });

    it('should return 0 when nothing is visible', () => {
        expect(computeViewportStart(25, 50, 0)).toBe(0);
    });
});
