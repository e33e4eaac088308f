/**
 * Main entry point and orchestration logic for the dirshelf CLI.
 *
 * This module coordinates a run:
 * - Loading (or creating) the config file
 * - Bringing the catalog cache up to date, one spinner per scraped source
 * - Either printing a summary or opening the interactive browser
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { ListingRecord, SourceConfig } from '@dirshelf/types';
import { initCache, type CatalogCache } from '@dirshelf/cache';
import {
    ConfigNotFoundError,
    ConfigParseError,
    ConfigPersistError,
    ConfigStore,
    ConfigValidationError,
    ConfigVersionError,
} from '@dirshelf/config';
import { DownloadEngine } from '@dirshelf/download';
import { scrapeSource, summarizeSource, type ScrapeFn } from '@dirshelf/scraper';
import {
    BrowseSession,
    SessionController,
    type CatalogProvider,
} from '@dirshelf/session';
import { parseArgs, type CliOptions } from './cli.js';
import { SpinnerRegistry } from './spinner-registry.js';
import { TerminalKeyInput, type KeypressSource } from './tui/key-input.js';
import { TerminalScreen, type TerminalOutput } from './tui/terminal-screen.js';
import { createTheme } from './tui/theme.js';

export { parseArgs, createProgram, type CliOptions } from './cli.js';
export { SpinnerRegistry, formatTimestamp, type LogLevel } from './spinner-registry.js';
export { ansi } from './tui/ansi.js';
export { createTheme, type Theme } from './tui/theme.js';
export { TerminalScreen, type TerminalOutput } from './tui/terminal-screen.js';
export { TerminalKeyInput, toKeyPress, type KeypressSource } from './tui/key-input.js';

/**
 * Process streams and collaborators a run uses. Tests replace them.
 */
export interface RunContext {
    stdin?: KeypressSource;
    stdout?: TerminalOutput & { isTTY?: boolean };
    registry?: SpinnerRegistry;
    scrape?: ScrapeFn;
    /** Passed to ora; silent spinners print nothing. */
    silentSpinners?: boolean;
}

/**
 * Joins the live config and the cache into the session's read model.
 */
export function createCatalogProvider(
    store: ConfigStore,
    cache: CatalogCache,
): CatalogProvider {
    return {
        sourceNames: () => store.sourceNames(),
        getSource: (name) => store.getSource(name),
        getRecords: (name) => cache.getRecords(name),
    };
}

/**
 * Loads the config, printing configuration problems.
 *
 * @returns The store, or an exit code when the run cannot continue
 */
async function loadConfigStore(path: string): Promise<ConfigStore | number> {
    try {
        return await ConfigStore.load(path);
    } catch (error) {
        if (error instanceof ConfigNotFoundError) {
            console.log(chalk.yellow(`\n  ${error.message}`));
            console.log(
                chalk.gray(
                    '  Add your listing sources under "systems", then run dirshelf again.\n',
                ),
            );
            return 0;
        }
        if (
            error instanceof ConfigParseError ||
            error instanceof ConfigValidationError ||
            error instanceof ConfigVersionError ||
            error instanceof ConfigPersistError
        ) {
            console.error(chalk.red(`\n  ${error.message}\n`));
            return 1;
        }
        throw error;
    }
}

/**
 * Scrapes what the cache is missing, one spinner per source.
 */
async function refreshCatalog(
    store: ConfigStore,
    cache: CatalogCache,
    options: CliOptions,
    context: RunContext,
    registry: SpinnerRegistry,
): Promise<void> {
    const scrape = context.scrape ?? scrapeSource;
    let current: Ora | undefined;

    const report = await cache.refresh(
        store.config,
        async (name: string, source: SourceConfig): Promise<ListingRecord[]> => {
            try {
                return await scrape(name, source, {
                    onWarning: registry.warn,
                    onVerbose: options.verbose ? registry.verbose : undefined,
                    verbose: options.verbose,
                });
            } catch (error) {
                current?.fail(`${name}: ${error instanceof Error ? error.message : String(error)}`);
                throw error;
            }
        },
        {
            force: options.refresh,
            onSourceStart: (name) => {
                current = ora({
                    text: `Scraping ${name}...`,
                    color: 'cyan',
                    discardStdin: false,
                    isSilent: context.silentSpinners,
                }).start();
                registry.register(current);
            },
            onSourceDone: (name, records) => {
                const spinner = current;
                if (!spinner) return;
                if (records.length === 0) {
                    spinner.warn(`${name}: no entries`);
                } else {
                    spinner.succeed(`${name}: ${chalk.bold(records.length)} entries`);
                }
                registry.unregister(spinner);
                current = undefined;
            },
        },
    );

    if (report.mode === 'none') {
        registry.safeLog('Catalog is up to date', 'verbose');
    } else if (report.mode === 'full') {
        registry.safeLog(`Rebuilt catalog for ${report.scraped.length} sources`);
    }
}

function printSummary(store: ConfigStore, cache: CatalogCache): void {
    console.log();
    for (const name of store.sourceNames()) {
        const source = store.getSource(name);
        if (!source) continue;
        const records = cache.getRecords(name);
        console.log(`  ${chalk.bold(name)}: ${records.length} entries`);
        for (const { bucket, count } of summarizeSource(records, source)) {
            console.log(chalk.gray(`    ${bucket}: ${count}`));
        }
    }
    console.log();
}

/**
 * Runs dirshelf with parsed options.
 *
 * @returns Process exit code
 */
export async function runMain(
    options: CliOptions,
    context: RunContext = {},
): Promise<number> {
    const registry = context.registry ?? new SpinnerRegistry();
    const stdin = context.stdin ?? process.stdin;
    const stdout = context.stdout ?? process.stdout;

    console.log(chalk.bold.cyan('\n  dirshelf'));
    console.log(chalk.gray('  ' + '─'.repeat(10)));

    const loaded = await loadConfigStore(options.config);
    if (typeof loaded === 'number') {
        return loaded;
    }
    const store = loaded;

    const cache = await initCache({
        cachePath: options.cache,
        onWarning: registry.warn,
        onVerbose: options.verbose ? registry.verbose : undefined,
    });

    await refreshCatalog(store, cache, options, context, registry);

    if (!options.tui) {
        printSummary(store, cache);
        return 0;
    }

    if (!stdin.isTTY || !stdout.isTTY) {
        console.error(
            chalk.red('\n  Interactive mode needs a terminal. Use --no-tui to refresh only.\n'),
        );
        return 1;
    }

    const screen = new TerminalScreen(stdout, createTheme());
    const input = new TerminalKeyInput(stdin);
    const controller = new SessionController({
        screen,
        input,
        session: new BrowseSession(createCatalogProvider(store, cache)),
        engine: new DownloadEngine({ tool: options.tool }),
        folders: store,
        strategyMode: options.downloader,
        cacheUpdatedAt: cache.updatedAt(),
    });

    screen.enter();
    input.start();
    try {
        await controller.run();
    } finally {
        input.stop();
        screen.leave();
    }
    return 0;
}

/**
 * CLI entry point: parses arguments, runs, and sets the exit code.
 *
 * Called by the `dirshelf` executable wrapper, which handles anything that
 * escapes as a fatal error.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
    const options = parseArgs(argv);
    const registry = new SpinnerRegistry();
    registry.setupSignalHandlers();
    try {
        process.exitCode = await runMain(options, { registry });
    } finally {
        registry.cleanup();
    }
}
