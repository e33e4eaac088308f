/**
 * Download engine types
 */

/**
 * Lifecycle of one download attempt:
 * `idle → connecting → streaming → completed | failed`.
 */
export type DownloadState =
    | 'idle'
    | 'connecting'
    | 'streaming'
    | 'completed'
    | 'failed';

/** Which strategy carried out a download. */
export type StrategyName = 'stream' | 'external';

/** Supported external resumable downloaders. */
export type ExternalTool = 'aria2c' | 'wget' | 'curl';

export const EXTERNAL_TOOLS: readonly ExternalTool[] = ['aria2c', 'wget', 'curl'];

/**
 * Progress snapshot emitted while a download runs.
 */
export interface DownloadTelemetry {
    /** Bytes written so far. */
    downloaded: number;
    /** Total size from Content-Length, or null when unknown. */
    total: number | null;
    elapsedMs: number;
    /** Average bytes per second since the start. */
    speed: number;
    /** Only set when the total is known and non-zero. */
    percent?: number;
    /** Only set when the total is known and the speed is positive. */
    etaSeconds?: number;
}

export interface DownloadCallbacks {
    onStateChange?: (state: DownloadState) => void;
    onProgress?: (telemetry: DownloadTelemetry) => void;
    /** Last output line of an external tool. */
    onOutput?: (line: string) => void;
}

/**
 * A single transfer handed to a strategy.
 */
export interface DownloadRequest extends DownloadCallbacks {
    url: string;
    /** Full destination file path. The directory already exists. */
    destPath: string;
    signal?: AbortSignal;
}

export interface DownloadResult {
    state: 'completed' | 'failed';
    strategy: StrategyName;
    /** Full path of the destination file. */
    path: string;
    downloaded: number;
    total: number | null;
    elapsedMs: number;
    /** Failure description; set only when `state` is `failed`. */
    error?: string;
}

export interface DownloadStrategy {
    readonly name: StrategyName;
    download(request: DownloadRequest): Promise<DownloadResult>;
}
