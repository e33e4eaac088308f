/**
 * Record extraction from listing HTML
 */

import { parse as parseHTML } from 'node-html-parser';
import {
    UNKNOWN_SIZE,
    type FieldSelectors,
    type IgnoreRules,
    type ListingRecord,
} from '@dirshelf/types';

/**
 * Resolves a potentially relative URL against a base URL.
 *
 * Absolute http(s) URLs are returned exactly as written.
 *
 * @returns The absolute URL, or null when it cannot be resolved
 */
export function resolveUrl(url: string, baseUrl: string): string | null {
    if (url.startsWith('http://') || url.startsWith('https://')) {
        return url;
    }
    if (!URL.canParse(url, baseUrl)) {
        return null;
    }
    return new URL(url, baseUrl).href;
}

function isIgnored(name: string, size: string, ignore: IgnoreRules | undefined): boolean {
    if (!ignore) return false;
    if (ignore.name_contains && name.toLowerCase().includes(ignore.name_contains.toLowerCase())) {
        return true;
    }
    return ignore.size !== undefined && ignore.size !== '' && size === ignore.size;
}

/**
 * Extracts listing records from a page.
 *
 * For every node matched by `entries`, the name and URL elements are looked up
 * inside it. Entries without either element, without an `href`, or with a
 * blank name are skipped, as are entries hit by the ignore rules. Records keep
 * page order.
 *
 * @param html - Page markup
 * @param entries - Selector matching one node per listing entry
 * @param fields - Selectors for the name, URL and optional size elements
 * @param ignore - Name and size filters
 * @param baseUrl - URL relative links resolve against
 */
export function extractRecords(
    html: string,
    entries: string,
    fields: FieldSelectors,
    ignore: IgnoreRules | undefined,
    baseUrl: string,
): ListingRecord[] {
    const root = parseHTML(html);
    const records: ListingRecord[] = [];

    for (const entry of root.querySelectorAll(entries)) {
        const nameElement = entry.querySelector(fields.name);
        const urlElement = entry.querySelector(fields.url);
        if (!nameElement || !urlElement) continue;

        const href = urlElement.getAttribute('href');
        if (!href) continue;

        const name = nameElement.text.trim();
        if (!name) continue;

        const sizeElement = fields.size ? entry.querySelector(fields.size) : null;
        const size = sizeElement ? sizeElement.text.trim() : UNKNOWN_SIZE;

        if (isIgnored(name, size, ignore)) continue;

        const url = resolveUrl(href.trim(), baseUrl);
        if (!url) continue;

        records.push({ name, url, size });
    }

    return records;
}
