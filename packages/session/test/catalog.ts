/**
 * Shared catalog for session tests
 */

import type { AppConfig, ListingRecord } from '@dirshelf/types';
import type { CatalogProvider } from '../src/index.js';

export const ALPHA: ListingRecord = {
    name: 'Alpha Quest (USA).zip',
    url: 'https://files.example.com/gb/Alpha%20Quest%20(USA).zip',
    size: '1.2 MiB',
};
export const BETA: ListingRecord = {
    name: 'Beta Racer (Europe).zip',
    url: 'https://files.example.com/gb/Beta%20Racer%20(Europe).zip',
    size: '800.5 KiB',
};
export const GAMMA: ListingRecord = {
    name: 'Gamma World (Japan) (Demo).zip',
    url: 'https://files.example.com/gb/Gamma%20World%20(Japan)%20(Demo).zip',
    size: '2.0 MiB',
};
export const DELTA: ListingRecord = {
    name: 'Delta Force (USA, Europe).zip',
    url: 'https://files.example.com/gb/Delta%20Force%20(USA,%20Europe).zip',
    size: '512.0 KiB',
};
export const PONG: ListingRecord = {
    name: 'Paddle Game.a26',
    url: 'https://files.example.com/atari/Paddle%20Game.a26',
    size: '4.0 KiB',
};

/** A fresh config with two sources: one with rules, one without. */
export function createConfig(): AppConfig {
    return {
        _meta: { version: 1 },
        systems: {
            'Game Boy': {
                id: 'gb',
                urls: ['https://files.example.com/gb/'],
                entries: 'tr',
                fields: { name: 'a', url: 'a' },
                regions: { USA: ['(USA'], Europe: ['Europe)', 'Europe,'] },
                types: { Demo: ['(Demo)'] },
            },
            Atari: {
                id: 'atari',
                urls: ['https://files.example.com/atari/'],
                entries: 'tr',
                fields: { name: 'a', url: 'a' },
            },
        },
    };
}

export function createCatalog(
    config: AppConfig,
    records: Record<string, readonly ListingRecord[]> = {
        'Game Boy': [ALPHA, BETA, GAMMA, DELTA],
        Atari: [PONG],
    },
): CatalogProvider {
    return {
        sourceNames: () => Object.keys(config.systems),
        getSource: (name) => config.systems[name],
        getRecords: (name) => records[name] ?? [],
    };
}
