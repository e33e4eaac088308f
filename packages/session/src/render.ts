/**
 * Browse, confirm and info screens
 *
 * Pure drawing against {@link Screen}. Nothing here reads keys or mutates the
 * session.
 */

import { basename } from 'path';
import type { ListingRecord } from '@dirshelf/types';
import { recordKey } from '@dirshelf/catalog';
import type { BrowseSession } from './browse-session.js';
import type { MarqueeState } from './marquee.js';
import type { Screen } from './screen.js';

export const BROWSE_INSTRUCTIONS =
    '←/→ source  ↑/↓ move  Enter download  D quick  r/t group  Tab bucket  f search  g/d folders  i info  q quit';

/** Rows above the list: header, instructions, view line. */
const LIST_TOP = 3;
/** Rows below the list: status line and footer. */
const LIST_BOTTOM_MARGIN = 2;

export interface BrowseFrame {
    /** Resolved download folders of the current source. */
    folders: readonly string[];
    /** Warning shown until the next key. */
    banner: string | null;
    /** Transient message, already filtered for expiry. */
    notice: string | null;
    marquee: MarqueeState;
    now: number;
}

export function truncate(text: string, width: number): string {
    if (width <= 0) return '';
    return text.length > width ? text.slice(0, width) : text;
}

/** Number of list rows for a screen height. */
export function listRows(rows: number): number {
    return Math.max(0, rows - LIST_TOP - LIST_BOTTOM_MARGIN);
}

/** Width of the name column. */
export function nameWidth(cols: number): number {
    return Math.max(10, cols - 20);
}

/**
 * Text of the line under the instructions describing what is listed.
 */
export function viewLine(session: BrowseSession): string {
    const count = session.displayList().length;
    if (session.query !== null) {
        return `Search: '${session.query}' - ${count} results`;
    }
    const { view } = session;
    if (view.kind === 'flat') {
        return 'Listing: All entries';
    }
    return `Grouped by ${view.by}: ${session.currentBucket() ?? ''} - ${count} entries`;
}

/** Bucket footer: the current bucket in brackets, all joined by `|`. */
export function bucketFooter(session: BrowseSession): string | null {
    const current = session.currentBucket();
    if (current === null) return null;
    return session
        .bucketNames()
        .map((name) => (name === current ? `[${name}]` : name))
        .join(' | ');
}

function headerRight(session: BrowseSession, folders: readonly string[]): string {
    const id = session.source?.id ?? '';
    const folder = folders[0];
    return folder === undefined ? `[id:${id}]` : `[id:${id}] ${basename(folder)}`;
}

export function renderBrowse(
    screen: Screen,
    session: BrowseSession,
    frame: BrowseFrame,
): void {
    const { rows, cols } = screen.size();
    screen.clear();

    screen.draw(
        0,
        2,
        `${session.sourceName} - ${session.records().length} entries`,
        'header',
    );
    screen.draw(0, Math.max(0, cols - 40), truncate(headerRight(session, frame.folders), 38), 'size');
    screen.draw(1, 2, truncate(BROWSE_INSTRUCTIONS, cols - 4), 'instructions');
    screen.draw(2, 2, truncate(viewLine(session), cols - 4), 'info');

    const list = session.displayList();
    const visible = listRows(rows);
    const width = nameWidth(cols);

    if (list.length === 0) {
        if (visible > 0) screen.draw(LIST_TOP, 4, '(no entries)', 'info');
    } else {
        const start = session.viewportStart(visible);
        const selected = session.selectedIndex;
        const sourceId = session.source?.id || session.sourceName;
        const end = Math.min(list.length, start + visible);

        for (let i = start; i < end; i++) {
            const record = list[i];
            if (!record) continue;
            const row = LIST_TOP + (i - start);
            const isSelected = i === selected;
            const name = isSelected
                ? frame.marquee.window(recordKey(sourceId, record), record.name, width, frame.now)
                : truncate(record.name, width);

            screen.draw(row, 2, `${isSelected ? '> ' : '  '}${name}`, isSelected ? 'selected' : 'normal');
            screen.draw(row, Math.max(0, cols - 12), record.size.padStart(10), 'size');
        }
    }

    if (frame.banner !== null) {
        screen.draw(rows - 2, 2, truncate(frame.banner, cols - 4), 'error');
    } else if (frame.notice !== null) {
        screen.draw(rows - 2, 2, truncate(frame.notice, cols - 4), 'info');
    }

    const footer = bucketFooter(session);
    if (footer !== null) {
        screen.draw(rows - 1, 2, truncate(footer, cols - 4), 'instructions');
    }
}

// ============================================================================
// CONFIRM AND INFO
// ============================================================================

export interface ConfirmChoices {
    /** The source's first download folder, when it has one. */
    sourceFolder: string | null;
    defaultFolder: string;
}

export function renderConfirm(
    screen: Screen,
    record: ListingRecord,
    choices: ConfirmChoices,
): void {
    const { cols } = screen.size();
    const width = cols - 4;
    screen.clear();

    screen.draw(1, 2, 'Download', 'header');
    screen.draw(3, 2, truncate(`Name: ${record.name}`, width), 'normal');
    screen.draw(4, 2, truncate(`Size: ${record.size}`, width), 'normal');
    screen.draw(5, 2, truncate(`URL: ${record.url}`, width), 'normal');

    screen.draw(7, 2, 'Choose destination:', 'instructions');
    let row = 8;
    if (choices.sourceFolder !== null) {
        screen.draw(row++, 4, truncate(`1) Source folder: ${choices.sourceFolder}`, width - 2), 'normal');
    }
    screen.draw(row++, 4, truncate(`2) Default folder: ${choices.defaultFolder}`, width - 2), 'normal');
    screen.draw(row++, 4, '3) Other path...', 'normal');
    screen.draw(row + 1, 2, 'c or Esc to cancel', 'instructions');
}

export interface SourceInfo {
    name: string;
    id: string;
    recordCount: number;
    folders: readonly string[];
    /** Unix seconds of the last cache rebuild, or null when never stamped. */
    cacheUpdatedAt: number | null;
}

export function renderInfo(screen: Screen, info: SourceInfo): void {
    const { cols } = screen.size();
    const width = cols - 4;
    screen.clear();

    screen.draw(1, 2, 'Source info', 'header');
    screen.draw(3, 2, truncate(`Name: ${info.name}`, width), 'normal');
    screen.draw(4, 2, truncate(`ID: ${info.id}`, width), 'normal');
    screen.draw(5, 2, `Entries: ${info.recordCount}`, 'normal');
    screen.draw(6, 2, 'Download folders:', 'normal');

    let row = 7;
    if (info.folders.length === 0) {
        screen.draw(row++, 4, '(none)', 'info');
    }
    for (const folder of info.folders) {
        screen.draw(row++, 4, truncate(folder, width - 2), 'info');
    }

    const updated =
        info.cacheUpdatedAt === null
            ? 'never'
            : new Date(info.cacheUpdatedAt * 1000).toISOString();
    screen.draw(row + 1, 2, `Cache updated: ${updated}`, 'normal');
    screen.draw(row + 3, 2, 'Press any key to continue...', 'instructions');
}
