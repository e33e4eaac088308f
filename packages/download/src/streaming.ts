/**
 * Built-in streaming download strategy
 */

import { open } from 'fs/promises';
import type { ReadableStreamDefaultReader } from 'stream/web';
import {
    DOWNLOAD_HEADERS,
    HttpStatusError,
    parseContentLength,
    robustFetch,
    type RobustFetchOptions,
} from '@dirshelf/http';
import { computeTelemetry } from './telemetry.js';
import type {
    DownloadRequest,
    DownloadResult,
    DownloadState,
    DownloadStrategy,
} from './types.js';

/** Largest slice written per write call */
export const CHUNK_SIZE = 8192;

/**
 * Where downloaded bytes go. A `FileHandle` is one.
 */
export interface ChunkSink {
    write(chunk: Uint8Array): Promise<unknown>;
    close(): Promise<void>;
}

export interface StreamingOptions {
    /** Retry attempts for getting a response (default: 2) */
    retries?: number;
    /** Clock in milliseconds */
    now?: () => number;
    /** Gets the response (default: robustFetch) */
    fetch?: (url: string, init: RobustFetchOptions) => Promise<Response>;
    /** Opens the destination, truncating it (default: `fs.open(path, 'w')`) */
    openFile?: (path: string) => Promise<ChunkSink>;
}

const openForWrite = (path: string): Promise<ChunkSink> => open(path, 'w');

/**
 * Cancels a body that will not be read to the end, closing its connection.
 */
async function discardBody(
    response: Response | undefined,
    reader: ReadableStreamDefaultReader<Uint8Array> | undefined,
    reason: unknown,
): Promise<void> {
    try {
        if (reader) {
            await reader.cancel(reason);
        } else if (response?.body && !response.body.locked) {
            await response.body.cancel(reason);
        }
    } catch {
        // An errored stream rejects cancel() with its own error, already reported
        return;
    }
}

/**
 * Turns a failure into the message shown on the summary screen.
 */
export function describeDownloadError(error: unknown, signal?: AbortSignal): string {
    if (signal?.aborted) {
        return 'Download cancelled';
    }
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

/**
 * Yields the stream's bytes in slices of at most `size` bytes.
 */
export async function* boundedChunks(
    reader: ReadableStreamDefaultReader<Uint8Array>,
    size: number,
): AsyncGenerator<Uint8Array> {
    for (;;) {
        const { done, value } = await reader.read();
        if (done) return;

        for (let offset = 0; offset < value.byteLength; offset += size) {
            yield value.subarray(offset, offset + size);
        }
    }
}

/**
 * Downloads over HTTP, writing the body as it arrives.
 *
 * Partial files are left on disk when the transfer fails or is cancelled.
 */
export class StreamingStrategy implements DownloadStrategy {
    readonly name = 'stream';
    private retries?: number;
    private now: () => number;
    private fetch: (url: string, init: RobustFetchOptions) => Promise<Response>;
    private openFile: (path: string) => Promise<ChunkSink>;

    constructor(options: StreamingOptions = {}) {
        this.retries = options.retries;
        this.now = options.now ?? Date.now;
        this.fetch = options.fetch ?? robustFetch;
        this.openFile = options.openFile ?? openForWrite;
    }

    async download(request: DownloadRequest): Promise<DownloadResult> {
        const { url, destPath, signal } = request;
        const start = this.now();
        let downloaded = 0;
        let total: number | null = null;
        let handle: ChunkSink | undefined;
        let response: Response | undefined;
        let reader: ReadableStreamDefaultReader<Uint8Array> | undefined;

        const setState = (state: DownloadState): void => {
            request.onStateChange?.(state);
        };
        const emit = (): void => {
            request.onProgress?.(computeTelemetry(downloaded, total, this.now() - start));
        };
        const finish = (state: 'completed' | 'failed', error?: string): DownloadResult => {
            setState(state);
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

        setState('connecting');
        try {
            response = await this.fetch(url, {
                headers: DOWNLOAD_HEADERS,
                signal,
                retries: this.retries,
            });
            if (!response.ok) {
                throw new HttpStatusError(url, response.status, response.statusText);
            }

            total = parseContentLength(response.headers);
            handle = await this.openFile(destPath);
            setState('streaming');
            emit();

            if (response.body) {
                reader = response.body.getReader();
                for await (const chunk of boundedChunks(reader, CHUNK_SIZE)) {
                    signal?.throwIfAborted();
                    await handle.write(chunk);
                    downloaded += chunk.byteLength;
                    emit();
                }
            }

            return finish('completed');
        } catch (error) {
            await discardBody(response, reader, error);
            return finish('failed', describeDownloadError(error, signal));
        } finally {
            await handle?.close();
        }
    }
}
