/**
 * Horizontal scrolling for names wider than their column.
 *
 * The offset is derived from wall-clock time since the key last changed, so
 * the speed does not depend on how often the screen is redrawn.
 */

export interface MarqueeOptions {
    /** Milliseconds per one-character step (default: 250) */
    stepMs?: number;
    /** Steps to hold at the start of each cycle (default: 4) */
    pauseSteps?: number;
    /** Separator drawn between the end of the text and its restart */
    gap?: string;
}

export class MarqueeState {
    private key: string | null = null;
    private startedAt = 0;
    private readonly stepMs: number;
    private readonly pauseSteps: number;
    private readonly gap: string;

    constructor(options: MarqueeOptions = {}) {
        this.stepMs = options.stepMs ?? 250;
        this.pauseSteps = options.pauseSteps ?? 4;
        this.gap = options.gap ?? '   ';
    }

    /** Forgets the current key so the next window starts from offset 0. */
    reset(): void {
        this.key = null;
    }

    /**
     * Returns the visible slice of `text` for a column of `width` characters.
     *
     * @param key - Identity of the scrolling item; a new key restarts the scroll
     * @param now - Current time in milliseconds
     */
    window(key: string, text: string, width: number, now: number): string {
        if (width <= 0) return '';
        if (text.length <= width) {
            this.key = key;
            this.startedAt = now;
            return text;
        }

        if (key !== this.key) {
            this.key = key;
            this.startedAt = now;
        }

        const loop = text + this.gap;
        const cycle = loop.length + this.pauseSteps;
        const step = Math.floor(Math.max(0, now - this.startedAt) / this.stepMs) % cycle;
        const offset = Math.max(0, step - this.pauseSteps);

        return (loop + loop).slice(offset, offset + width);
    }
}
