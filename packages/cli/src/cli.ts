/**
 * Command line argument parsing for dirshelf.
 *
 * Defines the options of the single `dirshelf` command using commander.js and
 * exports the parsed option type used by the run flow.
 */

import { resolve } from 'path';
import { Command, Option } from 'commander';
import { DEFAULT_CONFIG_FILE } from '@dirshelf/config';
import { EXTERNAL_TOOLS, type ExternalTool } from '@dirshelf/download';
import type { StrategyMode } from '@dirshelf/session';
import { VERSION } from '@dirshelf/utils';

const STRATEGY_MODES: readonly StrategyMode[] = ['ask', 'stream', 'external'];

/**
 * Parsed options for the `dirshelf` command.
 */
export interface CliOptions {
    /** Absolute path of the config file. */
    config: string;
    /** Cache file path. If not specified, defaults to ~/.cache/dirshelf/catalog.json. */
    cache?: string;
    /** Re-scrape every source even when the cache is current. */
    refresh: boolean;
    /** How downloads pick between streaming and the external tool. */
    downloader: StrategyMode;
    /** External resumable downloader to look for. */
    tool: ExternalTool;
    /** Enable verbose logging. */
    verbose: boolean;
    /** Open the interactive browser after refreshing (negatable via --no-tui). */
    tui: boolean;
}

/**
 * Raw option values as commander hands them over.
 */
interface RawCliOptions {
    config: string;
    cache?: string;
    refresh?: boolean;
    downloader: string;
    tool: string;
    verbose?: boolean;
    tui?: boolean;
}

function isStrategyMode(value: string): value is StrategyMode {
    return STRATEGY_MODES.some((mode) => mode === value);
}

function isExternalTool(value: string): value is ExternalTool {
    return EXTERNAL_TOOLS.some((tool) => tool === value);
}

/**
 * Builds the commander program without parsing anything.
 */
export function createProgram(): Command {
    return new Command()
        .name('dirshelf')
        .description(
            'Browse HTML directory listings in the terminal and download entries. ' +
                'Listings are scraped once and cached until the config changes.',
        )
        .version(VERSION)
        .option('-c, --config <path>', 'Path to the config file', DEFAULT_CONFIG_FILE)
        .option(
            '--cache <path>',
            'Path to the catalog cache (default: ~/.cache/dirshelf/catalog.json)',
        )
        .option('--refresh', 'Re-scrape every source, ignoring the cache', false)
        .addOption(
            new Option('--downloader <mode>', 'Download strategy')
                .choices(STRATEGY_MODES)
                .default('ask'),
        )
        .addOption(
            new Option('--tool <name>', 'External resumable downloader')
                .choices(EXTERNAL_TOOLS)
                .default('aria2c'),
        )
        .option('-v, --verbose', 'Enable verbose logging', false)
        .option('--no-tui', 'Only refresh the catalog and print a summary');
}

/**
 * Parses command line arguments.
 *
 * @param argv - Full argument vector, including the node and script entries
 * @returns The parsed CLI options
 *
 * @example
 * ```typescript
 * const options = parseArgs(['node', 'dirshelf', '--no-tui', '--refresh']);
 * // options.tui === false, options.refresh === true
 * ```
 */
export function parseArgs(argv: string[] = process.argv): CliOptions {
    const program: Command = createProgram();
    program.parse(argv);

    const options = program.opts<RawCliOptions>();

    // choices() has already rejected anything else
    if (!isStrategyMode(options.downloader)) {
        program.error(`Unknown downloader mode: ${options.downloader}`);
    }
    if (!isExternalTool(options.tool)) {
        program.error(`Unknown tool: ${options.tool}`);
    }

    return {
        config: resolve(options.config),
        cache: options.cache ? resolve(options.cache) : undefined,
        refresh: options.refresh || false,
        downloader: options.downloader,
        tool: options.tool,
        verbose: options.verbose || false,
        tui: options.tui !== false,
    };
}
