/**
 * `@dirshelf/scraper`
 *
 * Turns configured listing pages into catalog records.
 *
 * @packageDocumentation
 */

export { extractRecords, resolveUrl } from './extract.js';
export {
    scrapeSource,
    summarizeSource,
    type ScrapeFn,
    type ScrapeOptions,
} from './scraper.js';
