/**
 * Tests for command line parsing
 */

import { describe, it, expect } from 'vitest';
import { resolve } from 'path';
import { createProgram, parseArgs } from '../src/index.js';

describe('parseArgs', () => {
    it('should apply defaults', () => {
        const options = parseArgs(['node', 'dirshelf']);

        expect(options).toEqual({
            config: resolve('config.json'),
            cache: undefined,
            refresh: false,
            downloader: 'ask',
            tool: 'aria2c',
            verbose: false,
            tui: true,
        });
    });

    it('should read every option', () => {
        const options = parseArgs([
            'node',
            'dirshelf',
            '--config',
            '/etc/dirshelf/config.json',
            '--cache',
            '/var/cache/dirshelf.json',
            '--refresh',
            '--downloader',
            'stream',
            '--tool',
            'wget',
            '--verbose',
            '--no-tui',
        ]);

        expect(options).toEqual({
            config: '/etc/dirshelf/config.json',
            cache: '/var/cache/dirshelf.json',
            refresh: true,
            downloader: 'stream',
            tool: 'wget',
            verbose: true,
            tui: false,
        });
    });

    it('should resolve relative paths against the working directory', () => {
        const options = parseArgs(['node', 'dirshelf', '-c', 'conf/listings.json']);

        expect(options.config).toBe(resolve('conf/listings.json'));
    });

    it('should reject an unknown tool', () => {
        const program = createProgram()
            .exitOverride()
            .configureOutput({ writeErr: () => {} });

        expect(() => program.parse(['node', 'dirshelf', '--tool', 'axel'])).toThrow(
            /Allowed choices are aria2c, wget, curl/,
        );
    });
});
