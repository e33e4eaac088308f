/**
 * Session controller
 *
 * Runs the browse loop: draws a frame, waits for a key, applies it. Modal
 * flows (search, folder edits, downloads) take over the screen until they
 * finish and then hand control back to the loop.
 */

import type { ListingRecord } from '@dirshelf/types';
import {
    ConfigPersistError,
    DEFAULT_DOWNLOAD_FOLDER,
    parseFolderList,
    resolveFolder,
} from '@dirshelf/config';
import {
    computeTelemetry,
    type DownloadOptions,
    type DownloadResult,
    type DownloadState,
    type ExternalTool,
    type StrategyName,
} from '@dirshelf/download';
import type { BrowseSession } from './browse-session.js';
import { renderProgress, renderSummary } from './download-view.js';
import { MarqueeState } from './marquee.js';
import { promptKey, promptLine } from './prompt.js';
import {
    listRows,
    renderBrowse,
    renderConfirm,
    renderInfo,
    type ConfirmChoices,
} from './render.js';
import {
    isChar,
    isSpecial,
    type KeyInput,
    type KeyPress,
    type Screen,
} from './screen.js';

// ============================================================================
// COLLABORATORS
// ============================================================================

/**
 * Download folder settings, read and written by the folder edit prompts.
 */
export interface FolderSettings {
    /** Resolved folders for a source, falling back to the global folders. */
    downloadFolders(sourceName: string): string[];
    globalDownloadFolders(): string[];
    setGlobalFolders(folders: string[]): Promise<void>;
    setSourceFolders(sourceName: string, folders: string[]): Promise<void>;
}

/**
 * The part of the download engine the session drives.
 */
export interface Downloader {
    readonly tool: ExternalTool;
    externalToolAvailable(): Promise<boolean>;
    download(
        record: ListingRecord,
        destDir: string,
        options?: DownloadOptions,
    ): Promise<DownloadResult>;
}

/**
 * `ask` prompts per download when the external tool is present.
 */
export type StrategyMode = 'ask' | StrategyName;

export interface SessionControllerOptions {
    screen: Screen;
    input: KeyInput;
    session: BrowseSession;
    engine: Downloader;
    folders: FolderSettings;
    /** Default: ask */
    strategyMode?: StrategyMode;
    /** Absolute fallback destination (default: ~/Downloads) */
    defaultFolder?: string;
    /** Unix seconds of the last cache rebuild, shown on the info screen */
    cacheUpdatedAt?: number | null;
    /** Directory free-form paths resolve against (default: process.cwd()) */
    cwd?: string;
    now?: () => number;
    /** Browse loop key poll timeout (default: 150) */
    pollTimeoutMs?: number;
    /** Minimum time between progress redraws (default: 100) */
    redrawIntervalMs?: number;
    /** How long transient notices stay up (default: 1200) */
    noticeMs?: number;
}

interface Notice {
    text: string;
    until: number;
}

type KeyOutcome = 'continue' | 'quit';

// ============================================================================
// CONTROLLER
// ============================================================================

export class SessionController {
    private readonly screen: Screen;
    private readonly input: KeyInput;
    private readonly session: BrowseSession;
    private readonly engine: Downloader;
    private readonly folders: FolderSettings;
    private readonly strategyMode: StrategyMode;
    private readonly cwd: string;
    private readonly defaultFolder: string;
    private readonly cacheUpdatedAt: number | null;
    private readonly now: () => number;
    private readonly pollTimeoutMs: number;
    private readonly redrawIntervalMs: number;
    private readonly noticeMs: number;
    private readonly marquee = new MarqueeState();
    private banner: string | null = null;
    private notice: Notice | null = null;

    constructor(options: SessionControllerOptions) {
        this.screen = options.screen;
        this.input = options.input;
        this.session = options.session;
        this.engine = options.engine;
        this.folders = options.folders;
        this.strategyMode = options.strategyMode ?? 'ask';
        this.cwd = options.cwd ?? process.cwd();
        this.defaultFolder =
            options.defaultFolder ?? resolveFolder(DEFAULT_DOWNLOAD_FOLDER, this.cwd);
        this.cacheUpdatedAt = options.cacheUpdatedAt ?? null;
        this.now = options.now ?? Date.now;
        this.pollTimeoutMs = options.pollTimeoutMs ?? 150;
        this.redrawIntervalMs = options.redrawIntervalMs ?? 100;
        this.noticeMs = options.noticeMs ?? 1200;
    }

    /** Current warning banner, if any. */
    get warning(): string | null {
        return this.banner;
    }

    /**
     * Runs until the user quits.
     */
    async run(): Promise<void> {
        for (;;) {
            this.renderFrame();
            this.screen.flush();

            const key = await this.input.nextKey({
                kind: 'poll',
                timeoutMs: this.pollTimeoutMs,
            });
            if (key === null) continue;

            this.banner = null;
            if ((await this.handleKey(key)) === 'quit') return;
        }
    }

    private renderFrame(): void {
        const now = this.now();
        if (this.notice && now >= this.notice.until) {
            this.notice = null;
        }
        renderBrowse(this.screen, this.session, {
            folders: this.folders.downloadFolders(this.session.sourceName),
            banner: this.banner,
            notice: this.notice?.text ?? null,
            marquee: this.marquee,
            now,
        });
    }

    private showNotice(text: string): void {
        this.notice = { text, until: this.now() + this.noticeMs };
    }

    private get rows(): number {
        return this.screen.size().rows;
    }

    private async handleKey(key: KeyPress): Promise<KeyOutcome> {
        const { session } = this;

        if (key.kind === 'special') {
            switch (key.name) {
                case 'left':
                    session.switchSource(-1);
                    break;
                case 'right':
                    session.switchSource(1);
                    break;
                case 'up':
                    session.moveSelection(-1);
                    break;
                case 'down':
                    session.moveSelection(1);
                    break;
                case 'pageup':
                    session.moveSelection(-Math.max(1, listRows(this.rows)));
                    break;
                case 'pagedown':
                    session.moveSelection(Math.max(1, listRows(this.rows)));
                    break;
                case 'home':
                    session.selectFirst();
                    break;
                case 'end':
                    session.selectLast();
                    break;
                case 'tab':
                    session.cycleBucket();
                    break;
                case 'enter':
                    await this.confirmDownload();
                    break;
                case 'ctrl-c':
                    return 'quit';
                default:
                    break;
            }
            return 'continue';
        }

        switch (key.char) {
            case 'q':
                return 'quit';
            case 'r':
                session.toggleGrouping('region');
                break;
            case 't':
                session.toggleGrouping('type');
                break;
            case 'f':
            case '/':
                await this.search();
                break;
            case 'D':
                await this.quickDownload();
                break;
            case 'g':
                await this.editFolders('global');
                break;
            case 'd':
                await this.editFolders('source');
                break;
            case 'i':
                await this.showInfo();
                break;
            default:
                break;
        }
        return 'continue';
    }

    // ========================================================================
    // SEARCH AND FOLDERS
    // ========================================================================

    private async search(): Promise<void> {
        const text = await promptLine(this.screen, this.input, {
            row: this.rows - 2,
            label: 'Search: ',
            background: () => this.renderFrame(),
        });
        if (text === null) return;

        const count = this.session.setSearch(text);
        if (count === 0 && this.session.query !== null) {
            this.showNotice(`No results for '${text.trim()}'`);
        }
    }

    private async editFolders(scope: 'global' | 'source'): Promise<void> {
        const sourceName = this.session.sourceName;
        const current =
            scope === 'global'
                ? this.folders.globalDownloadFolders()
                : this.folders.downloadFolders(sourceName);
        const rows = this.rows;

        const text = await promptLine(this.screen, this.input, {
            row: rows - 2,
            label: scope === 'global' ? 'Global folders: ' : `Folders for ${sourceName}: `,
            background: () => {
                this.renderFrame();
                this.screen.draw(
                    rows - 4,
                    2,
                    `Current: ${current.length > 0 ? current.join(', ') : '(none)'}`,
                    'info',
                );
                this.screen.draw(
                    rows - 3,
                    2,
                    'Comma-separated paths; empty clears; Esc cancels',
                    'instructions',
                );
            },
        });
        if (text === null) return;

        const folders = parseFolderList(text);
        try {
            if (scope === 'global') {
                await this.folders.setGlobalFolders(folders);
            } else {
                await this.folders.setSourceFolders(sourceName, folders);
            }
            this.showNotice(folders.length > 0 ? 'Download folders saved' : 'Download folders cleared');
        } catch (error) {
            if (!(error instanceof ConfigPersistError)) throw error;
            this.banner = `Warning: ${error.message}`;
        }
    }

    private async showInfo(): Promise<void> {
        const { session } = this;
        renderInfo(this.screen, {
            name: session.sourceName,
            id: session.source?.id ?? '',
            recordCount: session.records().length,
            folders: this.folders.downloadFolders(session.sourceName),
            cacheUpdatedAt: this.cacheUpdatedAt,
        });
        this.screen.flush();
        await this.input.nextKey({ kind: 'wait' });
    }

    // ========================================================================
    // DOWNLOADS
    // ========================================================================

    private sourceFolder(): string | null {
        return this.folders.downloadFolders(this.session.sourceName)[0] ?? null;
    }

    /** Resolves a typed path. Empty input means the default folder. */
    private resolveTypedPath(text: string): string {
        return text.trim() === '' ? this.defaultFolder : resolveFolder(text, this.cwd);
    }

    private async confirmDownload(): Promise<void> {
        const record = this.session.selected();
        if (!record) return;

        const choices: ConfirmChoices = {
            sourceFolder: this.sourceFolder(),
            defaultFolder: this.defaultFolder,
        };

        for (;;) {
            renderConfirm(this.screen, record, choices);
            this.screen.flush();
            const key = await this.input.nextKey({ kind: 'wait' });

            if (key === null || isChar(key, 'c') || isSpecial(key, 'escape')) {
                return;
            }
            if (isChar(key, '1') && choices.sourceFolder !== null) {
                await this.runDownload(record, choices.sourceFolder);
                return;
            }
            if (isChar(key, '2')) {
                await this.runDownload(record, this.defaultFolder);
                return;
            }
            if (isChar(key, '3')) {
                const text = await promptLine(this.screen, this.input, {
                    row: this.rows - 2,
                    label: 'Path: ',
                    background: () => renderConfirm(this.screen, record, choices),
                });
                if (text === null) continue;
                await this.runDownload(record, this.resolveTypedPath(text));
                return;
            }
        }
    }

    private async quickDownload(): Promise<void> {
        const record = this.session.selected();
        if (!record) return;

        const sourceFolder = this.sourceFolder();
        if (sourceFolder === null) {
            await this.runDownload(record, this.defaultFolder);
            return;
        }

        const promptOptions = {
            row: this.rows - 2,
            background: () => this.renderFrame(),
        };
        const key = await promptKey(this.screen, this.input, {
            ...promptOptions,
            label: `Download to: 1) ${sourceFolder}  2) ${this.defaultFolder}  3) other  (Esc cancels)`,
        });
        if (key === null || isSpecial(key, 'escape') || isSpecial(key, 'ctrl-c')) {
            return;
        }

        if (isChar(key, '1')) {
            await this.runDownload(record, sourceFolder);
        } else if (isChar(key, '3')) {
            const text = await promptLine(this.screen, this.input, {
                ...promptOptions,
                label: 'Path: ',
            });
            if (text === null) return;
            await this.runDownload(record, this.resolveTypedPath(text));
        } else {
            await this.runDownload(record, this.defaultFolder);
        }
    }

    /**
     * Picks the strategy for one download.
     *
     * @returns null when the user cancelled
     */
    private async chooseStrategy(): Promise<StrategyName | null> {
        if (this.strategyMode !== 'ask') return this.strategyMode;
        if (!(await this.engine.externalToolAvailable())) return 'stream';

        for (;;) {
            const key = await promptKey(this.screen, this.input, {
                row: this.rows - 2,
                label: `Use ${this.engine.tool} for this download? (y/n, Esc cancels)`,
            });
            if (key === null || isSpecial(key, 'escape')) return null;
            if (isChar(key, 'y') || isChar(key, 'Y')) return 'external';
            if (isChar(key, 'n') || isChar(key, 'N')) return 'stream';
        }
    }

    /**
     * Reads keys while a download runs and aborts it on Esc.
     */
    private async watchForCancel(
        download: AbortController,
        stop: AbortSignal,
    ): Promise<void> {
        while (!stop.aborted) {
            const key = await this.input.nextKey({ kind: 'wait' }, stop);
            if (key === null) return;
            if (isSpecial(key, 'escape') || isSpecial(key, 'ctrl-c')) {
                download.abort();
                return;
            }
        }
    }

    private async runDownload(record: ListingRecord, destDir: string): Promise<void> {
        const strategy = await this.chooseStrategy();
        if (strategy === null) return;

        let state: DownloadState = 'idle';
        let telemetry = computeTelemetry(0, null, 0);
        let outputLine: string | null = null;
        let lastDraw = 0;

        const draw = (force: boolean): void => {
            const now = this.now();
            if (!force && now - lastDraw < this.redrawIntervalMs) return;
            lastDraw = now;
            renderProgress(this.screen, {
                record,
                destDir,
                strategy,
                state,
                telemetry,
                outputLine,
            });
        };

        const cancel = new AbortController();
        const stopWatching = new AbortController();
        draw(true);
        const watcher = this.watchForCancel(cancel, stopWatching.signal);

        let result: DownloadResult;
        try {
            result = await this.engine.download(record, destDir, {
                strategy,
                signal: cancel.signal,
                onStateChange: (next) => {
                    state = next;
                    draw(true);
                },
                onProgress: (next) => {
                    telemetry = next;
                    draw(false);
                },
                onOutput: (line) => {
                    outputLine = line;
                    draw(false);
                },
            });
        } finally {
            stopWatching.abort();
            await watcher;
        }

        renderSummary(this.screen, record, result);
        await this.input.nextKey({ kind: 'wait' });
    }
}
