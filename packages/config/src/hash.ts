import { createHash } from 'crypto';
import type { AppConfig } from '@dirshelf/types';
import { stableStringify } from '@dirshelf/utils';

/**
 * SHA-256 hex digest of the configuration with keys sorted at every level.
 *
 * Two configs that differ only in key order hash the same; any changed value
 * (including folder settings) produces a different hash.
 */
export function computeConfigHash(config: AppConfig): string {
    return createHash('sha256').update(stableStringify(config)).digest('hex');
}
