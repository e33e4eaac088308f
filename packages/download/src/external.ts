/**
 * External resumable downloader strategy
 *
 * Runs aria2c, wget or curl as a subprocess with resume enabled. The tool
 * writes straight to the destination; progress comes from polling the file
 * size and from the tool's last output line.
 */

import { execFile, spawn } from 'child_process';
import { stat } from 'fs/promises';
import { basename, dirname } from 'path';
import { promisify } from 'util';
import {
    DOWNLOAD_HEADERS,
    parseContentLength,
    robustFetch,
} from '@dirshelf/http';
import { computeTelemetry } from './telemetry.js';
import { describeDownloadError } from './streaming.js';
import type {
    DownloadRequest,
    DownloadResult,
    DownloadStrategy,
    ExternalTool,
} from './types.js';

const execFileAsync = promisify(execFile);

/** How often the destination file size is sampled */
const DEFAULT_POLL_INTERVAL_MS = 500;

// ============================================================================
// PROCESS SEAMS
// ============================================================================

/**
 * Finds an executable on PATH.
 *
 * @returns The absolute path, or null when the tool is not installed
 */
export type ToolLocator = (tool: string) => Promise<string | null>;

/**
 * A running tool, reduced to what the strategy needs.
 */
export interface ToolProcess {
    /** Registers a listener for each non-empty output line (stdout and stderr). */
    onLine(listener: (line: string) => void): void;
    /** Resolves with the exit code once the process has exited. */
    exited: Promise<number | null>;
    kill(): void;
}

export type ToolSpawner = (command: string, args: string[]) => ToolProcess;

/**
 * Looks a tool up with `which`.
 */
export const locateWithWhich: ToolLocator = async (tool) => {
    try {
        const { stdout } = await execFileAsync('which', [tool]);
        const path = stdout.trim();
        return path || null;
    } catch {
        // `which` exits non-zero when the tool is missing
        return null;
    }
};

/**
 * Spawns a tool with `child_process.spawn`.
 */
export const spawnTool: ToolSpawner = (command, args) => {
    const proc = spawn(command, args, {
        env: { ...process.env, FORCE_COLOR: '0' },
        stdio: ['ignore', 'pipe', 'pipe'],
    });
    const listeners: Array<(line: string) => void> = [];

    const forward = (data: Buffer): void => {
        for (const line of data.toString().split(/\r?\n|\r/)) {
            if (line.trim()) {
                listeners.forEach((listener) => listener(line.trim()));
            }
        }
    };
    proc.stdout?.on('data', forward);
    proc.stderr?.on('data', forward);

    const exited = new Promise<number | null>((resolve, reject) => {
        proc.on('error', reject);
        proc.on('close', (code) => resolve(code));
    });

    return {
        onLine: (listener) => {
            listeners.push(listener);
        },
        exited,
        kill: () => {
            proc.kill();
        },
    };
};

// ============================================================================
// TOOL ARGUMENTS
// ============================================================================

/**
 * Command line for a tool, with resume enabled and output at `destPath`.
 */
export function buildToolArgs(
    tool: ExternalTool,
    url: string,
    destPath: string,
): string[] {
    const userAgent = DOWNLOAD_HEADERS['User-Agent'];
    switch (tool) {
        case 'aria2c':
            return [
                '--continue=true',
                '--auto-file-renaming=false',
                '--allow-overwrite=true',
                '--console-log-level=warn',
                '--summary-interval=1',
                `--user-agent=${userAgent}`,
                `--dir=${dirname(destPath)}`,
                `--out=${basename(destPath)}`,
                url,
            ];
        case 'wget':
            return ['-c', `--user-agent=${userAgent}`, '-O', destPath, url];
        case 'curl':
            return ['-L', '-f', '-C', '-', '-A', userAgent, '-o', destPath, url];
    }
}

// ============================================================================
// STRATEGY
// ============================================================================

export interface ExternalStrategyOptions {
    /** Absolute path of the tool, as found by a {@link ToolLocator} */
    command: string;
    tool: ExternalTool;
    spawn?: ToolSpawner;
    pollIntervalMs?: number;
    now?: () => number;
}

async function fileSize(path: string): Promise<number> {
    try {
        return (await stat(path)).size;
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return 0;
        }
        throw error;
    }
}

/**
 * Best-effort size lookup with a HEAD request.
 */
export async function probeContentLength(url: string): Promise<number | null> {
    try {
        const response = await robustFetch(url, {
            method: 'HEAD',
            headers: DOWNLOAD_HEADERS,
            retries: 0,
        });
        return response.ok ? parseContentLength(response.headers) : null;
    } catch {
        // The tool will still try the download; only the percentage is lost
        return null;
    }
}

export class ExternalToolStrategy implements DownloadStrategy {
    readonly name = 'external';
    readonly tool: ExternalTool;
    private command: string;
    private spawn: ToolSpawner;
    private pollIntervalMs: number;
    private now: () => number;

    constructor(options: ExternalStrategyOptions) {
        this.command = options.command;
        this.tool = options.tool;
        this.spawn = options.spawn ?? spawnTool;
        this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
        this.now = options.now ?? Date.now;
    }

    async download(request: DownloadRequest): Promise<DownloadResult> {
        const { url, destPath, signal } = request;
        const start = this.now();
        let downloaded = 0;
        let lastLine = '';

        request.onStateChange?.('connecting');
        const total = await probeContentLength(url);

        const finish = (state: 'completed' | 'failed', error?: string): DownloadResult => {
            request.onStateChange?.(state);
            const result: DownloadResult = {
                state,
                strategy: this.name,
                path: destPath,
                downloaded,
                total,
                elapsedMs: this.now() - start,
            };
            if (error !== undefined) {
                result.error = error;
            }
            return result;
        };

        if (signal?.aborted) {
            return finish('failed', describeDownloadError(signal.reason, signal));
        }

        const sample = async (): Promise<void> => {
            downloaded = await fileSize(destPath);
            request.onProgress?.(computeTelemetry(downloaded, total, this.now() - start));
        };

        const proc = this.spawn(this.command, buildToolArgs(this.tool, url, destPath));
        request.onStateChange?.('streaming');
        proc.onLine((line) => {
            lastLine = line;
            request.onOutput?.(line);
        });

        const onAbort = (): void => proc.kill();
        signal?.addEventListener('abort', onAbort, { once: true });

        let pollError: unknown;
        const timer = setInterval(() => {
            sample().catch((error: unknown) => {
                pollError = error;
            });
        }, this.pollIntervalMs);

        try {
            const code = await proc.exited;
            clearInterval(timer);
            await sample();

            if (signal?.aborted) {
                return finish('failed', describeDownloadError(signal.reason, signal));
            }
            if (code !== 0) {
                const detail = lastLine ? `: ${lastLine}` : '';
                return finish('failed', `${this.tool} exited with code ${code}${detail}`);
            }
            if (pollError !== undefined) {
                request.onOutput?.(describeDownloadError(pollError));
            }
            return finish('completed');
        } catch (error) {
            return finish('failed', describeDownloadError(error, signal));
        } finally {
            clearInterval(timer);
            signal?.removeEventListener('abort', onAbort);
        }
    }
}
