/**
 * Mapping from the session's semantic styles to terminal colors.
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { Style } from '@dirshelf/session';

export type Theme = Record<Style, (text: string) => string>;

/**
 * Builds the default theme.
 *
 * @param painter - Chalk instance to color with; pass one with `level: 0`
 *   for plain text
 */
export function createTheme(painter: ChalkInstance = chalk): Theme {
    return {
        header: painter.bold.cyan,
        instructions: painter.gray,
        selected: painter.black.bgCyan,
        normal: (text) => text,
        size: painter.yellow,
        info: painter.cyan,
        error: painter.white.bgRed,
        success: painter.green,
    };
}
