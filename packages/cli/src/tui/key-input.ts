/**
 * Keyboard input from a raw-mode TTY via readline keypress events.
 */

import { emitKeypressEvents, type Key } from 'readline';
import type { InputWaitMode, KeyInput, KeyPress, SpecialKey } from '@dirshelf/session';

/**
 * The parts of a TTY read stream the input uses.
 */
export type KeypressSource = NodeJS.ReadableStream & {
    isTTY?: boolean;
    setRawMode?: (mode: boolean) => unknown;
};

const NAMED_KEYS: Readonly<Record<string, SpecialKey>> = {
    up: 'up',
    down: 'down',
    left: 'left',
    right: 'right',
    pageup: 'pageup',
    pagedown: 'pagedown',
    home: 'home',
    end: 'end',
    return: 'enter',
    enter: 'enter',
    escape: 'escape',
    tab: 'tab',
    backspace: 'backspace',
};

/**
 * Converts a readline keypress into a {@link KeyPress}.
 *
 * @returns null for keys the session has no use for
 */
export function toKeyPress(text: string | undefined, key: Key | undefined): KeyPress | null {
    if (key?.ctrl && key.name === 'c') {
        return { kind: 'special', name: 'ctrl-c' };
    }

    const named = key?.name === undefined ? undefined : NAMED_KEYS[key.name];
    if (named) {
        return { kind: 'special', name: named };
    }

    if (key?.ctrl || key?.meta) return null;

    if (text !== undefined && text.length === 1 && text >= ' ' && text !== '\x7f') {
        return { kind: 'char', char: text };
    }
    return null;
}

/**
 * Buffers keypresses and hands them out one read at a time.
 *
 * A key that arrives while nobody is reading is queued, so keys typed during
 * a redraw are never lost.
 */
export class TerminalKeyInput implements KeyInput {
    private queue: KeyPress[] = [];
    private waiter: ((key: KeyPress) => void) | null = null;
    private listening = false;

    constructor(private readonly stream: KeypressSource) {}

    private onKeypress = (text: string | undefined, key: Key | undefined): void => {
        const press = toKeyPress(text, key);
        if (!press) return;

        const waiter = this.waiter;
        if (waiter) {
            this.waiter = null;
            waiter(press);
        } else {
            this.queue.push(press);
        }
    };

    /** Puts the stream in raw mode and starts listening. */
    start(): void {
        if (this.listening) return;
        this.listening = true;
        emitKeypressEvents(this.stream);
        if (this.stream.isTTY) {
            this.stream.setRawMode?.(true);
        }
        this.stream.on('keypress', this.onKeypress);
        this.stream.resume();
    }

    /** Stops listening and restores cooked mode. */
    stop(): void {
        if (!this.listening) return;
        this.listening = false;
        this.stream.off('keypress', this.onKeypress);
        if (this.stream.isTTY) {
            this.stream.setRawMode?.(false);
        }
        this.stream.pause();
    }

    nextKey(mode: InputWaitMode, signal?: AbortSignal): Promise<KeyPress | null> {
        const queued = this.queue.shift();
        if (queued) return Promise.resolve(queued);
        if (signal?.aborted) return Promise.resolve(null);

        return new Promise<KeyPress | null>((resolve) => {
            let timer: NodeJS.Timeout | undefined;

            const finish = (key: KeyPress | null): void => {
                if (timer) clearTimeout(timer);
                signal?.removeEventListener('abort', onAbort);
                if (this.waiter === deliver) this.waiter = null;
                resolve(key);
            };
            const deliver = (key: KeyPress): void => finish(key);
            const onAbort = (): void => finish(null);

            this.waiter = deliver;
            if (mode.kind === 'poll') {
                timer = setTimeout(() => finish(null), mode.timeoutMs);
            }
            signal?.addEventListener('abort', onAbort, { once: true });
        });
    }
}
