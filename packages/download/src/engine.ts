/**
 * Download engine: picks a strategy and prepares the destination
 */

import { mkdir } from 'fs/promises';
import { join } from 'path';
import type { ListingRecord } from '@dirshelf/types';
import { sanitizeFilename } from './filename.js';
import { StreamingStrategy, describeDownloadError } from './streaming.js';
import {
    ExternalToolStrategy,
    locateWithWhich,
    type ToolLocator,
    type ToolSpawner,
} from './external.js';
import type {
    DownloadCallbacks,
    DownloadResult,
    ExternalTool,
    StrategyName,
} from './types.js';

export interface DownloadEngineOptions {
    /** External tool to use (default: aria2c) */
    tool?: ExternalTool;
    locate?: ToolLocator;
    spawn?: ToolSpawner;
    /** File size polling interval for the external tool */
    pollIntervalMs?: number;
    /** Retry attempts for the streaming request */
    retries?: number;
    now?: () => number;
}

export interface DownloadOptions extends DownloadCallbacks {
    /** Requested strategy. `external` falls back to streaming when the tool is missing. */
    strategy?: StrategyName;
    signal?: AbortSignal;
}

/**
 * Runs downloads for catalog records.
 *
 * @example
 * ```typescript
 * const engine = new DownloadEngine({ tool: 'wget' });
 * const result = await engine.download(record, '/srv/roms', {
 *     strategy: (await engine.externalToolAvailable()) ? 'external' : 'stream',
 *     onProgress: (t) => render(t),
 * });
 * ```
 */
export class DownloadEngine {
    readonly tool: ExternalTool;
    private locate: ToolLocator;
    private options: DownloadEngineOptions;
    private toolPath: Promise<string | null> | undefined;
    private streaming: StreamingStrategy;

    constructor(options: DownloadEngineOptions = {}) {
        this.options = options;
        this.tool = options.tool ?? 'aria2c';
        this.locate = options.locate ?? locateWithWhich;
        this.streaming = new StreamingStrategy({
            retries: options.retries,
            now: options.now,
        });
    }

    private findTool(): Promise<string | null> {
        if (!this.toolPath) {
            this.toolPath = this.locate(this.tool);
        }
        return this.toolPath;
    }

    /**
     * Whether the configured external tool is on PATH. The lookup runs once.
     */
    async externalToolAvailable(): Promise<boolean> {
        return (await this.findTool()) !== null;
    }

    /**
     * Downloads a record into a directory, creating the directory if needed.
     *
     * Never throws for transfer problems: failures are reported in the result,
     * with any partial file left in place.
     */
    async download(
        record: ListingRecord,
        destDir: string,
        options: DownloadOptions = {},
    ): Promise<DownloadResult> {
        const destPath = join(destDir, sanitizeFilename(record.url, record.name));
        const request = {
            url: record.url,
            destPath,
            signal: options.signal,
            onStateChange: options.onStateChange,
            onProgress: options.onProgress,
            onOutput: options.onOutput,
        };

        try {
            await mkdir(destDir, { recursive: true });
        } catch (error) {
            options.onStateChange?.('failed');
            return {
                state: 'failed',
                strategy: options.strategy ?? 'stream',
                path: destPath,
                downloaded: 0,
                total: null,
                elapsedMs: 0,
                error: describeDownloadError(error),
            };
        }

        if (options.strategy === 'external') {
            const command = await this.findTool();
            if (command) {
                const external = new ExternalToolStrategy({
                    command,
                    tool: this.tool,
                    spawn: this.options.spawn,
                    pollIntervalMs: this.options.pollIntervalMs,
                    now: this.options.now,
                });
                return external.download(request);
            }
        }

        return this.streaming.download(request);
    }
}
