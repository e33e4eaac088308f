/**
 * Modal prompts drawn over an existing frame
 */

import type { KeyInput, KeyPress, Screen } from './screen.js';

export interface PromptOptions {
    /** Row the prompt is drawn on. */
    row: number;
    label: string;
    /** Draws the frame behind the prompt, without flushing. */
    background?: () => void;
}

function drawPrompt(screen: Screen, options: PromptOptions, text: string): void {
    const { cols } = screen.size();
    options.background?.();
    screen.draw(options.row, 0, ' '.repeat(cols));
    screen.draw(options.row, 2, text.slice(0, Math.max(0, cols - 4)), 'info');
    screen.flush();
}

/**
 * Reads one line of text.
 *
 * @returns The entered text, or null when cancelled with Esc or Ctrl+C
 */
export async function promptLine(
    screen: Screen,
    input: KeyInput,
    options: PromptOptions,
): Promise<string | null> {
    let value = '';

    for (;;) {
        drawPrompt(screen, options, `${options.label}${value}_`);
        const key = await input.nextKey({ kind: 'wait' });
        if (key === null) return null;

        if (key.kind === 'char') {
            value += key.char;
            continue;
        }
        switch (key.name) {
            case 'enter':
                return value;
            case 'escape':
            case 'ctrl-c':
                return null;
            case 'backspace':
                value = value.slice(0, -1);
                break;
            default:
                break;
        }
    }
}

/**
 * Shows a one-line question and returns the next key, whatever it is.
 */
export async function promptKey(
    screen: Screen,
    input: KeyInput,
    options: PromptOptions,
): Promise<KeyPress | null> {
    drawPrompt(screen, options, options.label);
    return input.nextKey({ kind: 'wait' });
}
