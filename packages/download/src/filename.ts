/**
 * Destination file names
 */

const FALLBACK_NAME = 'download';

function safeDecode(value: string): string {
    try {
        return decodeURIComponent(value);
    } catch {
        // Malformed percent-encoding; keep the raw text
        return value;
    }
}

/**
 * Percent-decoded last path segment of a URL, ignoring the query string.
 */
export function urlBasename(url: string): string {
    const path = safeDecode(url.split('?')[0] ?? '');
    return path.slice(path.lastIndexOf('/') + 1);
}

function extensionOf(value: string): string {
    const dot = value.lastIndexOf('.');
    return dot === -1 ? '' : value.slice(dot + 1);
}

/**
 * Derives a safe local file name from a record's URL and name.
 *
 * Starts from the URL basename (falling back to the name, then to
 * `download`), turns `+` into spaces, replaces anything other than letters,
 * digits, `_ . -`, whitespace and parentheses with a space, and collapses
 * whitespace. A result without a dot borrows the extension of the URL
 * basename or the name.
 *
 * @example
 * ```typescript
 * sanitizeFilename('https://x/a%20b.zip?x=1'); // 'a b.zip'
 * ```
 */
export function sanitizeFilename(url: string, name?: string): string {
    const base = urlBasename(url);
    let candidate = (base || name || FALLBACK_NAME)
        .replace(/\+/g, ' ')
        .replace(/[^\p{L}\p{N}_.\-\s()]+/gu, ' ')
        .replace(/\s+/g, ' ')
        .trim();

    if (!candidate) {
        candidate = FALLBACK_NAME;
    }

    if (!candidate.includes('.')) {
        const ext = base.includes('.')
            ? extensionOf(base)
            : name?.includes('.')
              ? extensionOf(name)
              : '';
        if (ext) {
            candidate = `${candidate}.${ext}`;
        }
    }

    return candidate;
}
