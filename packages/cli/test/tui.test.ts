/**
 * Tests for the terminal screen, key input and log formatting
 */

import { describe, it, expect, afterEach } from 'vitest';
import { PassThrough } from 'stream';
import { stripVTControlCharacters } from 'util';
import { Chalk } from 'chalk';
import {
    SpinnerRegistry,
    TerminalKeyInput,
    TerminalScreen,
    createTheme,
    formatTimestamp,
    toKeyPress,
    type Theme,
} from '../src/index.js';

function tag(name: string) {
    return (text: string) => `<${name}>${text}</${name}>`;
}

const TAGGED: Theme = {
    header: tag('header'),
    instructions: tag('instructions'),
    selected: tag('selected'),
    normal: (text) => text,
    size: tag('size'),
    info: tag('info'),
    error: tag('error'),
    success: tag('success'),
};

function createOutput(columns: number, rows: number) {
    const writes: string[] = [];
    return {
        writes,
        output: {
            columns,
            rows,
            write: (chunk: string) => {
                writes.push(chunk);
                return true;
            },
        },
    };
}

describe('TerminalScreen', () => {
    it('should write every row on flush', () => {
        const { writes, output } = createOutput(12, 2);
        const screen = new TerminalScreen(output, createTheme(new Chalk({ level: 0 })));

        screen.clear();
        screen.draw(0, 2, 'Game Boy', 'header');
        screen.flush();

        expect(writes).toEqual([
            '\x1b[1;1H\x1b[2K  Game Boy  ' + '\x1b[2;1H\x1b[2K' + ' '.repeat(12),
        ]);
    });

    it('should cut text at the right edge', () => {
        const { output } = createOutput(20, 2);
        const screen = new TerminalScreen(output, createTheme(new Chalk({ level: 0 })));

        screen.clear();
        screen.draw(1, 15, 'overflowing');

        expect(screen.renderRow(1)).toBe(`${' '.repeat(15)}overf`);
    });

    it('should keep characters outside the basic plane in one cell', () => {
        const { output } = createOutput(8, 1);
        const screen = new TerminalScreen(output, createTheme(new Chalk({ level: 0 })));

        screen.clear();
        screen.draw(0, 0, 'a\u{1F3AE}b');
        screen.draw(0, 6, '\u{1F47E}\u{1F47E}\u{1F47E}');

        expect(screen.renderRow(0)).toBe('a\u{1F3AE}b   \u{1F47E}\u{1F47E}');
    });

    it('should color each run of styled cells once', () => {
        const { output } = createOutput(8, 1);
        const screen = new TerminalScreen(output, TAGGED);

        screen.clear();
        screen.draw(0, 1, 'Hi', 'header');
        screen.draw(0, 4, '3', 'size');

        expect(screen.renderRow(0)).toBe(' <header>Hi</header> <size>3</size>   ');
    });

    it('should fall back to 80x24 without a size', () => {
        const screen = new TerminalScreen({ write: () => true }, TAGGED);

        expect(screen.size()).toEqual({ rows: 24, cols: 80 });
    });

    it('should enter and leave the alternate screen once', () => {
        const { writes, output } = createOutput(10, 2);
        const screen = new TerminalScreen(output, TAGGED);

        screen.enter();
        screen.enter();
        screen.leave();
        screen.leave();

        expect(writes).toEqual([
            '\x1b[?1049h\x1b[?25l\x1b[2J',
            '\x1b[?25h\x1b[?1049l',
        ]);
    });
});

describe('toKeyPress', () => {
    it('should map named keys', () => {
        expect(toKeyPress(undefined, { name: 'up' })).toEqual({ kind: 'special', name: 'up' });
        expect(toKeyPress('\r', { name: 'return' })).toEqual({ kind: 'special', name: 'enter' });
        expect(toKeyPress('\x1b', { name: 'escape' })).toEqual({
            kind: 'special',
            name: 'escape',
        });
        expect(toKeyPress('\t', { name: 'tab' })).toEqual({ kind: 'special', name: 'tab' });
    });

    it('should map Ctrl+C', () => {
        expect(toKeyPress('\x03', { name: 'c', ctrl: true })).toEqual({
            kind: 'special',
            name: 'ctrl-c',
        });
    });

    it('should keep printable characters, including shifted ones', () => {
        expect(toKeyPress('q', { name: 'q' })).toEqual({ kind: 'char', char: 'q' });
        expect(toKeyPress('D', { name: 'd', shift: true })).toEqual({ kind: 'char', char: 'D' });
        expect(toKeyPress('/', undefined)).toEqual({ kind: 'char', char: '/' });
    });

    it('should drop other control keys', () => {
        expect(toKeyPress('\x01', { name: 'a', ctrl: true })).toBeNull();
        expect(toKeyPress(undefined, { name: 'f5' })).toBeNull();
    });
});

describe('TerminalKeyInput', () => {
    let stream: PassThrough;
    let input: TerminalKeyInput;

    function press(text: string | undefined, name: string): void {
        stream.emit('keypress', text, { name });
    }

    afterEach(() => {
        input.stop();
    });

    function setup(): void {
        stream = new PassThrough();
        input = new TerminalKeyInput(stream);
        input.start();
    }

    it('should return keys pressed before the read', async () => {
        setup();
        press('a', 'a');

        await expect(input.nextKey({ kind: 'poll', timeoutMs: 10 })).resolves.toEqual({
            kind: 'char',
            char: 'a',
        });
    });

    it('should hand a key to a waiting read', async () => {
        setup();
        const pending = input.nextKey({ kind: 'wait' });

        press(undefined, 'down');

        await expect(pending).resolves.toEqual({ kind: 'special', name: 'down' });
    });

    it('should keep a key that arrives after a poll timed out', async () => {
        setup();

        await expect(input.nextKey({ kind: 'poll', timeoutMs: 5 })).resolves.toBeNull();
        press('b', 'b');

        await expect(input.nextKey({ kind: 'wait' })).resolves.toEqual({
            kind: 'char',
            char: 'b',
        });
    });

    it('should resolve null on abort without taking later keys', async () => {
        setup();
        const controller = new AbortController();
        const pending = input.nextKey({ kind: 'wait' }, controller.signal);

        controller.abort();
        press('x', 'x');

        await expect(pending).resolves.toBeNull();
        await expect(input.nextKey({ kind: 'wait' })).resolves.toEqual({
            kind: 'char',
            char: 'x',
        });
    });

    it('should decode raw input bytes', async () => {
        setup();

        stream.write('\x1b[A');

        await expect(input.nextKey({ kind: 'wait' })).resolves.toEqual({
            kind: 'special',
            name: 'up',
        });
    });
});

describe('SpinnerRegistry', () => {
    const at = new Date(2024, 0, 2, 3, 4, 5, 6);

    it('should format local timestamps', () => {
        expect(formatTimestamp(at)).toBe('03:04:05.006');
    });

    it('should timestamp warnings and verbose lines', () => {
        const lines: string[] = [];
        const registry = new SpinnerRegistry({
            write: (line) => lines.push(line),
            now: () => at,
        });

        registry.warn('Game Boy: Failed to fetch');
        registry.verbose('Fetching https://files.example.com/gb/');

        expect(lines.map((line) => stripVTControlCharacters(line))).toEqual([
            '[03:04:05.006] Game Boy: Failed to fetch',
            '[03:04:05.006] Fetching https://files.example.com/gb/',
        ]);
    });
});
