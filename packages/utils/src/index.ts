/**
 * @dirshelf/utils
 *
 * Shared utility functions for dirshelf packages
 */

/**
 * The current version of dirshelf
 *
 * Used for displaying version information in CLI and error messages.
 */
export const VERSION = '0.1.0';

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];

/**
 * Formats a byte count for display with one decimal place.
 *
 * @param bytes - Byte count, or null when the size is not known
 * @returns A string such as `"1.5 MB"`, or `"Unknown"` for null
 *
 * @example
 * ```ts
 * formatBytes(1536); // "1.5 KB"
 * formatBytes(null); // "Unknown"
 * ```
 */
export function formatBytes(bytes: number | null): string {
    if (bytes === null || !Number.isFinite(bytes)) {
        return 'Unknown';
    }

    let value = bytes;
    for (const unit of BYTE_UNITS) {
        if (Math.abs(value) < 1024) {
            return `${value.toFixed(1)} ${unit}`;
        }
        value /= 1024;
    }
    return `${(value * 1024).toFixed(1)} PB`;
}

/**
 * Serializes a JSON-compatible value with object keys sorted at every level.
 *
 * Two values that differ only in key insertion order produce the same string,
 * which makes the output suitable for content hashing. Array order is kept.
 * Properties whose value is `undefined` are omitted, as with `JSON.stringify`.
 *
 * @param value - The value to serialize
 * @returns Deterministic JSON text
 */
export function stableStringify(value: unknown): string {
    return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(sortKeys);
    }
    if (value !== null && typeof value === 'object') {
        const sorted: Record<string, unknown> = {};
        for (const [key, entry] of Object.entries(value).sort(([a], [b]) =>
            a < b ? -1 : a > b ? 1 : 0,
        )) {
            sorted[key] = sortKeys(entry);
        }
        return sorted;
    }
    return value;
}
