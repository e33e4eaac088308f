/**
 * ANSI escape sequences for full-screen terminal output.
 */

/**
 * Escape sequence builders. Rows and columns are 1-indexed.
 *
 * @example
 * ```typescript
 * output.write(ansi.enterAltScreen() + ansi.hideCursor());
 * output.write(ansi.moveTo(1, 1) + ansi.clearLine() + 'Game Boy');
 * output.write(ansi.showCursor() + ansi.leaveAltScreen());
 * ```
 */
export const ansi = {
    hideCursor: (): string => '\x1b[?25l',

    showCursor: (): string => '\x1b[?25h',

    /** Switches to the alternate screen buffer, keeping the shell's scrollback. */
    enterAltScreen: (): string => '\x1b[?1049h',

    leaveAltScreen: (): string => '\x1b[?1049l',

    moveTo: (row: number, col: number): string => `\x1b[${row};${col}H`,

    clearLine: (): string => '\x1b[2K',

    clearScreen: (): string => '\x1b[2J',
};
