import type { DownloadTelemetry } from './types.js';

/**
 * Builds a progress snapshot from raw counters.
 *
 * @param downloaded - Bytes written so far
 * @param total - Expected size, or null when unknown
 * @param elapsedMs - Time since the transfer started
 */
export function computeTelemetry(
    downloaded: number,
    total: number | null,
    elapsedMs: number,
): DownloadTelemetry {
    const speed = elapsedMs > 0 ? downloaded / (elapsedMs / 1000) : 0;
    const telemetry: DownloadTelemetry = { downloaded, total, elapsedMs, speed };

    if (total) {
        telemetry.percent = (downloaded / total) * 100;
    }
    if (total !== null && speed > 0) {
        telemetry.etaSeconds = Math.max(0, total - downloaded) / speed;
    }

    return telemetry;
}
