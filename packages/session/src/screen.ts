/**
 * Terminal seams
 *
 * The session draws and reads keys only through these interfaces. The CLI
 * provides ANSI implementations; tests provide in-memory ones.
 */

/** Semantic text styles. The front end decides how each one looks. */
export type Style =
    | 'header'
    | 'instructions'
    | 'selected'
    | 'normal'
    | 'size'
    | 'info'
    | 'error'
    | 'success';

export interface ScreenSize {
    rows: number;
    cols: number;
}

/**
 * A character grid that is cleared, drawn into and then flushed once per frame.
 */
export interface Screen {
    size(): ScreenSize;
    clear(): void;
    /** Draws text at a position. Text past the right edge is cut off. */
    draw(row: number, col: number, text: string, style?: Style): void;
    flush(): void;
}

export type SpecialKey =
    | 'up'
    | 'down'
    | 'left'
    | 'right'
    | 'pageup'
    | 'pagedown'
    | 'home'
    | 'end'
    | 'enter'
    | 'escape'
    | 'tab'
    | 'backspace'
    | 'ctrl-c';

export type KeyPress =
    | { kind: 'char'; char: string }
    | { kind: 'special'; name: SpecialKey };

/**
 * How long a key read may block: `poll` gives up after a timeout so the
 * caller can animate, `wait` blocks until a key arrives.
 */
export type InputWaitMode = { kind: 'poll'; timeoutMs: number } | { kind: 'wait' };

export interface KeyInput {
    /**
     * Reads the next key.
     *
     * Resolves null when a poll times out or when `signal` aborts first; a key
     * is never consumed by a read that resolved null.
     */
    nextKey(mode: InputWaitMode, signal?: AbortSignal): Promise<KeyPress | null>;
}

export function isChar(key: KeyPress | null, char: string): boolean {
    return key?.kind === 'char' && key.char === char;
}

export function isSpecial(key: KeyPress | null, name: SpecialKey): boolean {
    return key?.kind === 'special' && key.name === name;
}
