/**
 * In-memory terminal for session tests
 *
 * FakeScreen keeps a character grid and a copy of every flushed frame.
 * FakeKeyInput replays a key script and never blocks: when the script runs
 * out on a plain read it throws, so a test that forgets to quit fails fast.
 */

import type {
    InputWaitMode,
    KeyInput,
    KeyPress,
    Screen,
    ScreenSize,
    SpecialKey,
    Style,
} from '@dirshelf/session';

// ============================================================================
// SCREEN
// ============================================================================

export class FakeScreen implements Screen {
    private grid: string[][] = [];
    private styles = new Map<string, Style>();
    /** Every flushed frame, one string per row with trailing spaces removed. */
    readonly frames: string[][] = [];

    constructor(
        private readonly rows = 24,
        private readonly cols = 80,
    ) {
        this.clear();
    }

    size(): ScreenSize {
        return { rows: this.rows, cols: this.cols };
    }

    clear(): void {
        this.grid = Array.from({ length: this.rows }, () =>
            Array.from({ length: this.cols }, () => ' '),
        );
        this.styles.clear();
    }

    draw(row: number, col: number, text: string, style: Style = 'normal'): void {
        const line = this.grid[row];
        if (!line) return;
        for (let i = 0; i < text.length; i++) {
            const at = col + i;
            if (at < 0 || at >= this.cols) continue;
            line[at] = text.charAt(i);
            this.styles.set(`${row}:${at}`, style);
        }
    }

    flush(): void {
        this.frames.push(this.lines());
    }

    /** Current contents of one row, trailing spaces removed. */
    line(row: number): string {
        return (this.grid[row] ?? []).join('').trimEnd();
    }

    lines(): string[] {
        return this.grid.map((_, row) => this.line(row));
    }

    styleAt(row: number, col: number): Style | undefined {
        return this.styles.get(`${row}:${col}`);
    }

    /** Whether any flushed frame had a line containing `text`. */
    sawText(text: string): boolean {
        return this.frames.some((frame) => frame.some((line) => line.includes(text)));
    }
}

// ============================================================================
// KEYS
// ============================================================================

const SPECIAL_KEYS: readonly SpecialKey[] = [
    'up',
    'down',
    'left',
    'right',
    'pageup',
    'pagedown',
    'home',
    'end',
    'enter',
    'escape',
    'tab',
    'backspace',
    'ctrl-c',
];

/**
 * Expands key tokens: `<name>` is a special key, any other string is typed
 * character by character.
 */
export function parseKeys(tokens: readonly string[]): KeyPress[] {
    const keys: KeyPress[] = [];
    for (const token of tokens) {
        const match = /^<([a-z-]+)>$/.exec(token);
        if (match) {
            const name = SPECIAL_KEYS.find((key) => key === match[1]);
            if (!name) throw new Error(`Unknown special key: ${token}`);
            keys.push({ kind: 'special', name });
            continue;
        }
        for (const char of token) {
            keys.push({ kind: 'char', char });
        }
    }
    return keys;
}

export class FakeKeyInput implements KeyInput {
    private readonly script: KeyPress[];
    private readonly interrupts: KeyPress[] = [];
    /** Modes of every read, in order. */
    readonly reads: InputWaitMode[] = [];

    constructor(tokens: readonly string[]) {
        this.script = parseKeys(tokens);
    }

    /**
     * Queues keys for reads that pass an abort signal, i.e. keys pressed
     * while a download is running.
     */
    interrupt(...tokens: string[]): void {
        this.interrupts.push(...parseKeys(tokens));
    }

    remaining(): number {
        return this.script.length;
    }

    async nextKey(mode: InputWaitMode, signal?: AbortSignal): Promise<KeyPress | null> {
        this.reads.push(mode);
        await new Promise((resolve) => setTimeout(resolve, 0));
        if (signal?.aborted) return null;

        if (signal) {
            const key = this.interrupts.shift();
            if (key) return key;
            return new Promise<KeyPress | null>((resolve) => {
                signal.addEventListener('abort', () => resolve(null), { once: true });
            });
        }

        const key = this.script.shift();
        if (!key) throw new Error('Key script exhausted');
        return key;
    }
}
