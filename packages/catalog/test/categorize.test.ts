/**
 * Tests for record categorization
 */

import { describe, it, expect } from 'vitest';
import type { ListingRecord } from '@dirshelf/types';
import { bucketCounts, categorize, recordKey } from '../src/index.js';

function record(name: string): ListingRecord {
    return {
        name,
        url: `https://files.example.com/gb/${encodeURIComponent(name)}`,
        size: '1.0 MiB',
    };
}

const alpha = record('Alpha Quest (USA).zip');
const beta = record('Beta Racer (Europe).zip');
const gamma = record('Gamma World (Japan) (Demo).zip');
const delta = record('Delta Force (USA, Europe).zip');
const omega = record('Omega (World).zip');

const RECORDS = [alpha, beta, gamma, delta, omega];

const REGIONS = {
    USA: ['(USA', 'USA)'],
    Europe: ['europe'],
    Japan: ['(Japan)'],
};

describe('categorize', () => {
    it('should put everything in the fallback bucket without rules', () => {
        expect([...categorize(RECORDS, undefined, 'region')]).toEqual([
            ['Unknown', RECORDS],
        ]);
        expect([...categorize(RECORDS, {}, 'type')]).toEqual([['None', RECORDS]]);
    });

    it('should keep rule order with the fallback last', () => {
        const buckets = categorize(RECORDS, REGIONS, 'region');

        expect([...buckets.keys()]).toEqual(['USA', 'Europe', 'Japan', 'Unknown']);
    });

    it('should allow a record in several buckets', () => {
        const buckets = categorize(RECORDS, REGIONS, 'region');

        expect(buckets.get('USA')).toEqual([alpha, delta]);
        expect(buckets.get('Europe')).toEqual([beta, delta]);
        expect(buckets.get('Japan')).toEqual([gamma]);
    });

    it('should not append a record twice when several patterns match', () => {
        const buckets = categorize([alpha], REGIONS, 'region');

        expect(buckets.get('USA')).toEqual([alpha]);
    });

    it('should send only unmatched records to the fallback', () => {
        const buckets = categorize(RECORDS, REGIONS, 'region');

        expect(buckets.get('Unknown')).toEqual([omega]);
    });

    it('should cover every record', () => {
        const buckets = categorize(RECORDS, REGIONS, 'region');
        const covered = new Set([...buckets.values()].flat());

        expect(RECORDS.every((r) => covered.has(r))).toBe(true);
    });

    it('should keep empty buckets', () => {
        const buckets = categorize([omega], { Demo: ['(Demo)'] }, 'type');

        expect([...buckets]).toEqual([
            ['Demo', []],
            ['None', [omega]],
        ]);
    });
});

describe('bucketCounts', () => {
    it('should list counts in bucket order', () => {
        expect(bucketCounts(categorize(RECORDS, REGIONS, 'region'))).toEqual([
            { bucket: 'USA', count: 2 },
            { bucket: 'Europe', count: 2 },
            { bucket: 'Japan', count: 1 },
            { bucket: 'Unknown', count: 1 },
        ]);
    });
});

describe('recordKey', () => {
    it('should combine the source id and URL', () => {
        expect(recordKey('gb', alpha)).toBe(
            'gb::https://files.example.com/gb/Alpha%20Quest%20(USA).zip',
        );
    });
});
