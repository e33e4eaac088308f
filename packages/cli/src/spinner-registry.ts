/**
 * Spinner registry for ora spinners and the log lines printed around them.
 *
 * Library packages report through `onWarning`/`onVerbose` callbacks; the CLI
 * routes those here so that messages never tear an active spinner line.
 */

import type { Ora } from 'ora';
import chalk from 'chalk';

/** How a log line is colored. */
export type LogLevel = 'info' | 'verbose' | 'warning';

export interface SpinnerRegistryOptions {
    /** Line sink (default: console.log). */
    write?: (line: string) => void;
    /** Clock used for timestamps (default: current time). */
    now?: () => Date;
}

/**
 * Formats a time as `HH:MM:SS.mmm`.
 */
export function formatTimestamp(date: Date): string {
    const pad = (value: number, width = 2) => value.toString().padStart(width, '0');
    return (
        `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
        `.${pad(date.getMilliseconds(), 3)}`
    );
}

/**
 * Registry for ora spinners with synchronized, timestamped logging.
 *
 * @example
 * ```typescript
 * const registry = new SpinnerRegistry();
 * const spinner = ora('Scraping Game Boy...').start();
 * registry.register(spinner);
 *
 * registry.safeLog('Game Boy: Failed to fetch ...', 'warning');
 *
 * spinner.succeed('Game Boy: 3 entries');
 * registry.unregister(spinner);
 * ```
 */
export class SpinnerRegistry {
    private spinners: Set<Ora> = new Set();
    private signalHandlers: Array<() => void> = [];
    private readonly write: (line: string) => void;
    private readonly now: () => Date;

    constructor(options: SpinnerRegistryOptions = {}) {
        this.write = options.write ?? ((line) => console.log(line));
        this.now = options.now ?? (() => new Date());
    }

    register(spinner: Ora) {
        this.spinners.add(spinner);
    }

    unregister(spinner: Ora) {
        this.spinners.delete(spinner);
    }

    /**
     * Logs a message without interfering with active spinners.
     *
     * Spinning spinners are cleared, the timestamped message is printed, and
     * the spinners are drawn again.
     */
    safeLog(message: string, level: LogLevel = 'info') {
        const line = `[${formatTimestamp(this.now())}] ${message}`;
        const formatted =
            level === 'verbose'
                ? chalk.gray(line)
                : level === 'warning'
                  ? chalk.yellow(line)
                  : chalk.cyan(line);

        for (const spinner of this.spinners) {
            if (spinner.isSpinning) {
                spinner.clear();
            }
        }

        this.write(formatted);

        for (const spinner of this.spinners) {
            if (spinner.isSpinning) {
                spinner.render();
            }
        }
    }

    /** Callback for `onWarning` options. */
    warn = (message: string): void => {
        this.safeLog(message, 'warning');
    };

    /** Callback for `onVerbose` options. */
    verbose = (message: string): void => {
        this.safeLog(message, 'verbose');
    };

    /**
     * Clears spinners on SIGINT/SIGTERM before exiting.
     *
     * Call `cleanup()` when done to remove the handlers.
     */
    setupSignalHandlers() {
        const cleanup = () => {
            this.clearAll();
            process.exit(130);
        };

        process.on('SIGINT', cleanup);
        process.on('SIGTERM', cleanup);

        this.signalHandlers.push(() => {
            process.off('SIGINT', cleanup);
            process.off('SIGTERM', cleanup);
        });
    }

    clearAll() {
        for (const spinner of this.spinners) {
            spinner.clear();
        }
    }

    /**
     * Clears spinners and removes signal handlers.
     */
    cleanup() {
        this.clearAll();
        this.signalHandlers.forEach((remove) => remove());
        this.signalHandlers = [];
    }
}
