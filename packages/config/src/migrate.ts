/**
 * Legacy config migration
 *
 * Files written before `_meta` existed keep their sources at the top level,
 * next to a global `download_folder(s)` key, and describe each source with a
 * single `base_url`. This module rewrites that layout into the current one so
 * the validator only ever sees one shape.
 */

import { CONFIG_VERSION } from './constants.js';

export type RawObject = Record<string, unknown>;

export function isRawObject(value: unknown): value is RawObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Whether a parsed config file predates the `_meta` block.
 */
export function isLegacyConfig(raw: RawObject): boolean {
    return !('_meta' in raw);
}

/**
 * Renames the singular folder key to the plural one, keeping the plural one
 * when both are present.
 */
function migrateFolderKey(raw: RawObject): RawObject {
    const { download_folder: legacyFolder, ...rest } = raw;
    if (legacyFolder === undefined || rest.download_folders !== undefined) {
        return rest;
    }
    return { ...rest, download_folders: legacyFolder };
}

function migrateSource(raw: RawObject): RawObject {
    const { base_url: baseUrl, ...rest } = migrateFolderKey(raw);
    if (baseUrl === undefined || rest.urls !== undefined) {
        return rest;
    }
    return { ...rest, urls: [baseUrl] };
}

/**
 * Converts a legacy config object into the current layout.
 *
 * Top-level object values become sources under `systems`, in file order.
 * Any other top-level value apart from the folder keys is dropped.
 * Objects already carrying `_meta` are returned with only their per-source
 * keys migrated.
 */
export function migrateLegacyConfig(raw: RawObject): RawObject {
    if (!isLegacyConfig(raw)) {
        if (!isRawObject(raw.systems)) {
            return raw;
        }
        const systems: RawObject = {};
        for (const [name, value] of Object.entries(raw.systems)) {
            systems[name] = isRawObject(value) ? migrateSource(value) : value;
        }
        return { ...raw, systems };
    }

    const top = migrateFolderKey(raw);
    const systems: RawObject = {};
    for (const [key, value] of Object.entries(top)) {
        if (key !== 'download_folders' && isRawObject(value)) {
            systems[key] = migrateSource(value);
        }
    }

    const migrated: RawObject = {
        _meta: { version: CONFIG_VERSION },
    };
    if (top.download_folders !== undefined) {
        migrated.download_folders = top.download_folders;
    }
    migrated.systems = systems;
    return migrated;
}
