/**
 * Tests for the download engine and its strategies
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, stat, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { http, HttpResponse } from 'msw';
import type { ListingRecord } from '@dirshelf/types';
import {
    DownloadEngine,
    buildToolArgs,
    type DownloadState,
    type DownloadTelemetry,
    type ToolSpawner,
} from '../src/index.js';
import {
    create404Handler,
    createDroppingFileHandler,
    createFileHandler,
    server,
} from '../../../helpers/msw-handlers.js';

const FILE_URL = 'https://files.example.com/gb/alpha_quest.zip';
/** Sanitized from the URL basename. */
const FILE_NAME = 'alpha_quest.zip';

const RECORD: ListingRecord = {
    name: 'Alpha Quest (USA).zip',
    url: FILE_URL,
    size: '1.2 MiB',
};

function bytes(length: number): Uint8Array {
    return new Uint8Array(length).map((_, i) => i % 251);
}

/** Collects everything an engine run reports. */
function recorder() {
    const states: DownloadState[] = [];
    const progress: DownloadTelemetry[] = [];
    const lines: string[] = [];
    return {
        states,
        progress,
        lines,
        callbacks: {
            onStateChange: (state: DownloadState) => states.push(state),
            onProgress: (telemetry: DownloadTelemetry) => progress.push(telemetry),
            onOutput: (line: string) => lines.push(line),
        },
    };
}

describe('DownloadEngine', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'dirshelf-download-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    describe('streaming', () => {
        it('should write the whole body and complete', async () => {
            const body = bytes(20_000);
            server.use(createFileHandler(FILE_URL, body));
            const events = recorder();

            const result = await new DownloadEngine().download(RECORD, dir, events.callbacks);

            expect(result).toMatchObject({
                state: 'completed',
                strategy: 'stream',
                path: join(dir, FILE_NAME),
                downloaded: 20_000,
                total: 20_000,
            });
            expect(events.states).toEqual(['connecting', 'streaming', 'completed']);
            expect(new Uint8Array(await readFile(result.path))).toEqual(body);
            expect(events.progress.at(-1)?.percent).toBe(100);
        });

        it('should never write more than one chunk at a time', async () => {
            server.use(createFileHandler(FILE_URL, bytes(20_000)));
            const events = recorder();

            await new DownloadEngine().download(RECORD, dir, events.callbacks);

            const steps = events.progress
                .slice(1)
                .map((t, i) => t.downloaded - (events.progress[i]?.downloaded ?? 0));
            expect(steps.every((step) => step > 0 && step <= 8192)).toBe(true);
        });

        it('should complete a zero-byte file with no percentage', async () => {
            server.use(createFileHandler(FILE_URL, new Uint8Array(0)));
            const events = recorder();

            const result = await new DownloadEngine().download(RECORD, dir, events.callbacks);

            expect(result.state).toBe('completed');
            expect(result.downloaded).toBe(0);
            expect(events.progress.every((t) => t.percent === undefined)).toBe(true);
            expect((await stat(result.path)).size).toBe(0);
        });

        it('should keep the partial file when the connection drops', async () => {
            server.use(createDroppingFileHandler(FILE_URL, 100, 1000));

            const result = await new DownloadEngine({ retries: 0 }).download(RECORD, dir);

            expect(result.state).toBe('failed');
            expect(result.downloaded).toBe(100);
            expect(result.total).toBe(1000);
            expect(result.error).toBeTruthy();
            expect((await stat(result.path)).size).toBe(100);
        });

        it('should handle an unknown total', async () => {
            server.use(createFileHandler(FILE_URL, bytes(3000), false));
            const events = recorder();

            const result = await new DownloadEngine().download(RECORD, dir, events.callbacks);

            expect(result.state).toBe('completed');
            expect(result.total).toBeNull();
            expect(events.progress.every((t) => t.percent === undefined)).toBe(true);
            expect(events.progress.every((t) => t.etaSeconds === undefined)).toBe(true);
        });

        it('should fail on an error status without creating a file', async () => {
            const url = 'https://files.example.com/missing/Gone.zip';
            server.use(create404Handler(url));

            const result = await new DownloadEngine().download(
                { name: 'Gone.zip', url, size: '?' },
                dir,
            );

            expect(result.state).toBe('failed');
            expect(result.error).toMatch(/^HTTP 404/);
            await expect(stat(result.path)).rejects.toThrow();
        });

        it('should report a cancelled download', async () => {
            server.use(createFileHandler(FILE_URL, bytes(10)));
            const controller = new AbortController();
            controller.abort();

            const result = await new DownloadEngine().download(RECORD, dir, {
                signal: controller.signal,
            });

            expect(result).toMatchObject({ state: 'failed', error: 'Download cancelled' });
        });

        it('should create missing destination directories', async () => {
            server.use(createFileHandler(FILE_URL, bytes(10)));
            const nested = join(dir, 'a', 'b');

            const result = await new DownloadEngine().download(RECORD, nested);

            expect(result.path).toBe(join(nested, FILE_NAME));
            expect((await stat(result.path)).size).toBe(10);
        });
    });

    describe('external tool', () => {
        function fakeTool(destPath: string, size: number, code: number, output: string[]) {
            const calls: Array<{ command: string; args: string[] }> = [];
            const spawn: ToolSpawner = (command, args) => {
                calls.push({ command, args });
                const listeners: Array<(line: string) => void> = [];
                const exited = (async () => {
                    await Promise.resolve();
                    for (const line of output) {
                        listeners.forEach((listener) => listener(line));
                    }
                    await writeFile(destPath, bytes(size));
                    return code;
                })();
                return {
                    onLine: (listener) => {
                        listeners.push(listener);
                    },
                    exited,
                    kill: () => undefined,
                };
            };
            return { calls, spawn };
        }

        beforeEach(() => {
            server.use(
                http.head(FILE_URL, () => {
                    return new HttpResponse(null, { headers: { 'Content-Length': '300' } });
                }),
            );
        });

        it('should fall back to streaming when the tool is missing', async () => {
            server.use(createFileHandler(FILE_URL, bytes(10)));
            const engine = new DownloadEngine({ locate: async () => null });

            expect(await engine.externalToolAvailable()).toBe(false);
            const result = await engine.download(RECORD, dir, { strategy: 'external' });

            expect(result).toMatchObject({ state: 'completed', strategy: 'stream' });
        });

        it('should run the tool with resume enabled', async () => {
            const destPath = join(dir, FILE_NAME);
            const tool = fakeTool(destPath, 300, 0, ['[#1 300B/300B(100%)]']);
            const engine = new DownloadEngine({
                tool: 'wget',
                locate: async () => '/usr/bin/wget',
                spawn: tool.spawn,
                pollIntervalMs: 5,
            });
            const events = recorder();

            const result = await engine.download(RECORD, dir, {
                strategy: 'external',
                ...events.callbacks,
            });

            expect(result).toMatchObject({
                state: 'completed',
                strategy: 'external',
                path: destPath,
                downloaded: 300,
                total: 300,
            });
            expect(tool.calls).toEqual([
                { command: '/usr/bin/wget', args: buildToolArgs('wget', FILE_URL, destPath) },
            ]);
            expect(events.lines).toEqual(['[#1 300B/300B(100%)]']);
            expect(events.states).toEqual(['connecting', 'streaming', 'completed']);
            expect(events.progress.at(-1)?.percent).toBe(100);
        });

        it('should fail on a non-zero exit code', async () => {
            const destPath = join(dir, FILE_NAME);
            const tool = fakeTool(destPath, 40, 3, ['resource not found']);
            const engine = new DownloadEngine({
                locate: async () => '/usr/bin/aria2c',
                spawn: tool.spawn,
            });

            const result = await engine.download(RECORD, dir, { strategy: 'external' });

            expect(result).toMatchObject({
                state: 'failed',
                strategy: 'external',
                downloaded: 40,
                error: 'aria2c exited with code 3: resource not found',
            });
        });
    });
});

describe('buildToolArgs', () => {
    it('should enable resume for every tool', () => {
        expect(buildToolArgs('aria2c', FILE_URL, '/dl/a.zip')).toContain('--continue=true');
        expect(buildToolArgs('wget', FILE_URL, '/dl/a.zip')).toContain('-c');
        expect(buildToolArgs('curl', FILE_URL, '/dl/a.zip').slice(2, 4)).toEqual(['-C', '-']);
    });

    it('should split the destination for aria2c', () => {
        const args = buildToolArgs('aria2c', FILE_URL, '/dl/a.zip');

        expect(args).toContain('--dir=/dl');
        expect(args).toContain('--out=a.zip');
        expect(args.at(-1)).toBe(FILE_URL);
    });
});
