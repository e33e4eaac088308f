/**
 * Download progress and summary screens
 */

import type { ListingRecord } from '@dirshelf/types';
import type {
    DownloadResult,
    DownloadState,
    DownloadTelemetry,
    StrategyName,
} from '@dirshelf/download';
import { formatBytes } from '@dirshelf/utils';
import { truncate } from './render.js';
import type { Screen } from './screen.js';

/**
 * Formats seconds as `m:ss`, or `h:mm:ss` from one hour up.
 */
export function formatDuration(seconds: number): string {
    const total = Math.max(0, Math.round(seconds));
    const h = Math.floor(total / 3600);
    const m = Math.floor((total % 3600) / 60);
    const s = String(total % 60).padStart(2, '0');
    return h > 0 ? `${h}:${String(m).padStart(2, '0')}:${s}` : `${m}:${s}`;
}

/**
 * A text progress bar of exactly `width` characters, brackets included.
 */
export function progressBar(percent: number, width: number): string {
    const inner = Math.max(0, width - 2);
    const clamped = Math.min(100, Math.max(0, percent));
    const filled = Math.round((clamped / 100) * inner);
    return `[${'#'.repeat(filled)}${'-'.repeat(inner - filled)}]`;
}

/**
 * A bar for downloads of unknown size. The filled part grows three cells a
 * second and wraps at the bar's inner width.
 */
export function indeterminateBar(elapsedMs: number, width: number): string {
    const inner = Math.max(0, width - 2);
    const filled = inner > 0 ? Math.floor(((Math.max(0, elapsedMs) / 1000) * 3) % inner) : 0;
    return `[${'#'.repeat(filled)}${'-'.repeat(inner - filled)}]`;
}

export interface ProgressView {
    record: ListingRecord;
    /** Destination directory. */
    destDir: string;
    strategy: StrategyName;
    state: DownloadState;
    telemetry: DownloadTelemetry;
    /** Last output line of the external tool. */
    outputLine: string | null;
}

export function renderProgress(screen: Screen, view: ProgressView): void {
    const { rows, cols } = screen.size();
    const width = cols - 4;
    const { telemetry } = view;
    screen.clear();

    screen.draw(1, 2, truncate(`Downloading: ${view.record.name}`, width), 'header');
    screen.draw(2, 2, truncate(`To: ${view.destDir}`, width), 'normal');
    screen.draw(3, 2, `Size: ${formatBytes(telemetry.total)}`, 'normal');

    const percent =
        telemetry.percent === undefined ? '' : ` (${telemetry.percent.toFixed(1)}%)`;
    screen.draw(5, 2, `Downloaded: ${formatBytes(telemetry.downloaded)}${percent}`, 'normal');

    const eta =
        telemetry.etaSeconds === undefined ? '--' : formatDuration(telemetry.etaSeconds);
    screen.draw(
        6,
        2,
        truncate(
            `Speed: ${formatBytes(telemetry.speed)}/s  Elapsed: ${formatDuration(telemetry.elapsedMs / 1000)}  ETA: ${eta}`,
            width,
        ),
        'info',
    );

    const barWidth = Math.max(10, cols - 12);
    screen.draw(
        8,
        2,
        telemetry.percent === undefined
            ? indeterminateBar(telemetry.elapsedMs, barWidth)
            : progressBar(telemetry.percent, barWidth),
        'success',
    );

    screen.draw(10, 2, `State: ${view.state} (${view.strategy})`, 'normal');
    if (view.outputLine !== null) {
        screen.draw(11, 2, truncate(`> ${view.outputLine}`, width), 'info');
    }

    screen.draw(rows - 1, 2, 'Esc to cancel', 'instructions');
    screen.flush();
}

export function renderSummary(
    screen: Screen,
    record: ListingRecord,
    result: DownloadResult,
): void {
    const { cols } = screen.size();
    const width = cols - 4;
    screen.clear();

    if (result.state === 'completed') {
        const seconds = result.elapsedMs / 1000;
        const average = seconds > 0 ? result.downloaded / seconds : 0;
        screen.draw(1, 2, 'Download complete', 'success');
        screen.draw(3, 2, truncate(`Name: ${record.name}`, width), 'normal');
        screen.draw(4, 2, truncate(`Saved to: ${result.path}`, width), 'normal');
        screen.draw(5, 2, `Total: ${formatBytes(result.downloaded)}`, 'normal');
        screen.draw(
            6,
            2,
            `Time: ${formatDuration(seconds)}  Avg speed: ${formatBytes(average)}/s`,
            'normal',
        );
    } else {
        screen.draw(1, 2, 'Download failed', 'error');
        screen.draw(3, 2, truncate(`Name: ${record.name}`, width), 'normal');
        screen.draw(4, 2, truncate(`URL: ${record.url}`, width), 'normal');
        screen.draw(5, 2, truncate(`Error: ${result.error ?? 'Unknown error'}`, width), 'error');
        screen.draw(
            6,
            2,
            `Partial bytes downloaded: ${result.downloaded} (${formatBytes(result.downloaded)})`,
            'normal',
        );
    }

    screen.draw(8, 2, 'Press any key to continue...', 'instructions');
    screen.flush();
}
