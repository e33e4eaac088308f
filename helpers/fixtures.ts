/**
 * Test Fixtures
 *
 * Uses Vitest's test.extend() pattern (Playwright-style) for type-safe fixture loading.
 * Fixtures are lazily loaded, providing a clean API for tests.
 */

import { test as base } from 'vitest';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

const FIXTURES_DIR = join(dirname(fileURLToPath(import.meta.url)), '../fixtures');

// ============================================================================
// FIXTURE TYPES
// ============================================================================

/**
 * All available fixtures
 */
export interface TestFixtures {
    /** Table-style listing page with five raw entries. */
    gameBoyListing: string;
    /** A configuration file in the layout used before `_meta` existed. */
    legacyConfig: unknown;

    // Helpers
    loadFixture: (relativePath: string) => string;
}

// ============================================================================
// LOADERS
// ============================================================================

/**
 * Loads a fixture file as a string
 */
export function loadFixture(relativePath: string): string {
    return readFileSync(join(FIXTURES_DIR, relativePath), 'utf-8');
}

/**
 * Loads a fixture file as parsed JSON
 */
export function loadJsonFixture(relativePath: string): unknown {
    return JSON.parse(loadFixture(relativePath));
}

// ============================================================================
// EXTENDED TEST
// ============================================================================

/**
 * Extended test with typed fixtures.
 *
 * Usage:
 * ```ts
 * import { test, expect } from '../../../helpers/fixtures.js';
 *
 * test('extracts records', async ({ gameBoyListing }) => {
 *   expect(extractRecords(gameBoyListing, ...)).toHaveLength(3);
 * });
 * ```
 */
export const test = base.extend<TestFixtures>({
    gameBoyListing: async ({}, use) => {
        await use(loadFixture('listings/game-boy.html'));
    },

    legacyConfig: async ({}, use) => {
        await use(loadJsonFixture('configs/legacy-config.json'));
    },

    loadFixture: async ({}, use) => {
        await use(loadFixture);
    },
});

export { expect, describe } from 'vitest';
