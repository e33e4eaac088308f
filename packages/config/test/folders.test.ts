/**
 * Tests for folder normalization and hashing
 */

import { describe, it, expect } from 'vitest';
import { homedir } from 'os';
import { join } from 'path';
import type { AppConfig } from '@dirshelf/types';
import {
    computeConfigHash,
    expandEnvVars,
    getDownloadFolders,
    normalizeDownloadFolders,
    parseFolderList,
} from '../src/index.js';

const CONFIG_DIR = '/srv/dirshelf';

function makeConfig(): AppConfig {
    return {
        _meta: { version: 1 },
        download_folders: ['~/roms'],
        systems: {
            'Game Boy': {
                id: 'gb',
                urls: ['https://files.example.com/gb/'],
                entries: 'tbody tr',
                fields: { name: 'a', url: 'a' },
                download_folders: './gb',
            },
            NES: {
                id: 'nes',
                urls: ['https://files.example.com/nes/'],
                entries: 'tbody tr',
                fields: { name: 'a', url: 'a' },
            },
        },
    };
}

describe('expandEnvVars', () => {
    it('should expand bare and braced variables', () => {
        const env = { ROMS: '/data/roms', USER_DIR: 'alex' };
        expect(expandEnvVars('$ROMS/${USER_DIR}/gb', env)).toBe('/data/roms/alex/gb');
    });

    it('should leave unknown variables in place', () => {
        expect(expandEnvVars('$NOPE/x', {})).toBe('$NOPE/x');
    });
});

describe('normalizeDownloadFolders', () => {
    it('should accept a single string', () => {
        expect(normalizeDownloadFolders('/mnt/roms/', CONFIG_DIR)).toEqual(['/mnt/roms']);
    });

    it('should normalize absolute paths', () => {
        expect(
            normalizeDownloadFolders(['/mnt/roms//gb/', '/mnt/roms/../backup/.'], CONFIG_DIR),
        ).toEqual(['/mnt/roms/gb', '/mnt/backup']);
    });

    it('should resolve relative paths against the config directory', () => {
        expect(normalizeDownloadFolders(['./a', '../b'], CONFIG_DIR)).toEqual([
            '/srv/dirshelf/a',
            '/srv/b',
        ]);
    });

    it('should expand the home directory and skip blanks', () => {
        expect(normalizeDownloadFolders(['~/roms', '  '], CONFIG_DIR)).toEqual([
            join(homedir(), 'roms'),
        ]);
    });

    it('should return an empty list for no setting', () => {
        expect(normalizeDownloadFolders(undefined, CONFIG_DIR)).toEqual([]);
    });
});

describe('getDownloadFolders', () => {
    it('should prefer the source override', () => {
        expect(getDownloadFolders(makeConfig(), 'Game Boy', CONFIG_DIR)).toEqual([
            '/srv/dirshelf/gb',
        ]);
    });

    it('should fall back to the global folders', () => {
        expect(getDownloadFolders(makeConfig(), 'NES', CONFIG_DIR)).toEqual([
            join(homedir(), 'roms'),
        ]);
    });
});

describe('parseFolderList', () => {
    it('should split, trim and drop blanks', () => {
        expect(parseFolderList(' ./a , ,~/b,')).toEqual(['./a', '~/b']);
    });

    it('should return an empty list for empty input', () => {
        expect(parseFolderList('')).toEqual([]);
    });
});

describe('computeConfigHash', () => {
    it('should ignore key order', () => {
        const config = makeConfig();
        const reordered: AppConfig = {
            systems: config.systems,
            download_folders: config.download_folders,
            _meta: config._meta,
        };
        expect(computeConfigHash(reordered)).toBe(computeConfigHash(config));
    });

    it('should change when any field changes', () => {
        const base = computeConfigHash(makeConfig());

        const changedUrl = makeConfig();
        const nes = changedUrl.systems.NES;
        if (nes) nes.urls = ['https://files.example.com/nes2/'];
        const changedIgnore = makeConfig();
        const gameBoy = changedIgnore.systems['Game Boy'];
        if (gameBoy) gameBoy.ignore = { size: '-' };

        expect(computeConfigHash(changedUrl)).not.toBe(base);
        expect(computeConfigHash(changedIgnore)).not.toBe(base);
    });

    it('should be a 64-character hex digest', () => {
        expect(computeConfigHash(makeConfig())).toMatch(/^[0-9a-f]{64}$/);
    });
});
