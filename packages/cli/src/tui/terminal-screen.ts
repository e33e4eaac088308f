/**
 * Screen implementation that paints a character grid to a terminal stream.
 */

import type { Screen, ScreenSize, Style } from '@dirshelf/session';
import { ansi } from './ansi.js';
import type { Theme } from './theme.js';

/**
 * The parts of a TTY write stream the screen uses.
 */
export interface TerminalOutput {
    columns?: number;
    rows?: number;
    write(chunk: string): unknown;
}

interface Cell {
    char: string;
    style: Style;
}

/**
 * Full-screen renderer. Each frame is drawn into an in-memory grid and
 * written out in one chunk on {@link flush}.
 */
export class TerminalScreen implements Screen {
    private grid: Cell[][] = [];
    private active = false;

    constructor(
        private readonly output: TerminalOutput,
        private readonly theme: Theme,
    ) {}

    size(): ScreenSize {
        return {
            rows: this.output.rows || 24,
            cols: this.output.columns || 80,
        };
    }

    /** Switches to the alternate screen and hides the cursor. */
    enter(): void {
        if (this.active) return;
        this.active = true;
        this.output.write(ansi.enterAltScreen() + ansi.hideCursor() + ansi.clearScreen());
    }

    /** Restores the cursor and the original screen. */
    leave(): void {
        if (!this.active) return;
        this.active = false;
        this.output.write(ansi.showCursor() + ansi.leaveAltScreen());
    }

    clear(): void {
        const { rows, cols } = this.size();
        this.grid = Array.from({ length: rows }, () =>
            Array.from({ length: cols }, (): Cell => ({ char: ' ', style: 'normal' })),
        );
    }

    draw(row: number, col: number, text: string, style: Style = 'normal'): void {
        const line = this.grid[row];
        if (!line) return;
        // One cell per code point, so surrogate pairs stay whole
        let index = col;
        for (const char of text) {
            const cell = line[index++];
            if (!cell) continue;
            cell.char = char;
            cell.style = style;
        }
    }

    /**
     * Renders one row, coloring each run of same-styled cells once.
     */
    renderRow(row: number): string {
        const line = this.grid[row] ?? [];
        let result = '';
        let run = '';
        let runStyle: Style | null = null;

        for (const cell of line) {
            if (cell.style !== runStyle) {
                if (runStyle !== null) result += this.theme[runStyle](run);
                run = '';
                runStyle = cell.style;
            }
            run += cell.char;
        }
        if (runStyle !== null) result += this.theme[runStyle](run);

        return result;
    }

    flush(): void {
        let frame = '';
        for (let row = 0; row < this.grid.length; row++) {
            frame += ansi.moveTo(row + 1, 1) + ansi.clearLine() + this.renderRow(row);
        }
        this.output.write(frame);
    }
}
