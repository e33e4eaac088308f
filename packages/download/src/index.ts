/**
 * `@dirshelf/download`
 *
 * Downloads catalog records to disk, either by streaming over HTTP or by
 * handing the transfer to an external resumable downloader.
 *
 * @packageDocumentation
 */

export type {
    DownloadCallbacks,
    DownloadRequest,
    DownloadResult,
    DownloadState,
    DownloadStrategy,
    DownloadTelemetry,
    ExternalTool,
    StrategyName,
} from './types.js';
export { EXTERNAL_TOOLS } from './types.js';
export { computeTelemetry } from './telemetry.js';
export { sanitizeFilename, urlBasename } from './filename.js';
export {
    CHUNK_SIZE,
    StreamingStrategy,
    boundedChunks,
    describeDownloadError,
    type ChunkSink,
    type StreamingOptions,
} from './streaming.js';
export {
    ExternalToolStrategy,
    buildToolArgs,
    locateWithWhich,
    probeContentLength,
    spawnTool,
    type ExternalStrategyOptions,
    type ToolLocator,
    type ToolProcess,
    type ToolSpawner,
} from './external.js';
export {
    DownloadEngine,
    type DownloadEngineOptions,
    type DownloadOptions,
} from './engine.js';
