/**
 * Config file loading and persistence
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import type { AppConfig, SourceConfig } from '@dirshelf/types';
import sampleConfig from './sample-config.json' with { type: 'json' };
import { CONFIG_VERSION } from './constants.js';
import {
    ConfigNotFoundError,
    ConfigParseError,
    ConfigPersistError,
    ConfigValidationError,
    ConfigVersionError,
} from './errors.js';
import {
    isLegacyConfig,
    isRawObject,
    migrateLegacyConfig,
    type RawObject,
} from './migrate.js';
import { readConfigVersion, validateConfig } from './validation.js';
import {
    getDownloadFolders,
    normalizeDownloadFolders,
    setGlobalDownloadFolders,
    setSourceDownloadFolders,
} from './folders.js';
import { computeConfigHash } from './hash.js';

export interface LoadedConfig {
    config: AppConfig;
    /**
     * The file's object after migration, before validation. Keys validation
     * does not know about are still here.
     */
    raw: RawObject;
    /** Absolute path of the file that was read. */
    path: string;
    /** True when the file used the pre-`_meta` layout. */
    migrated: boolean;
}

function isMissingFileError(error: unknown): boolean {
    return (
        error instanceof Error &&
        'code' in error &&
        error.code === 'ENOENT'
    );
}

function serializeConfig(config: unknown): string {
    return `${JSON.stringify(config, null, 2)}\n`;
}

async function writeSampleConfig(path: string): Promise<void> {
    try {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, serializeConfig(sampleConfig), 'utf-8');
    } catch (error) {
        throw new ConfigPersistError(path, error);
    }
}

/**
 * Reads, migrates and validates a config file.
 *
 * @throws ConfigNotFoundError when the file is missing (after writing a sample)
 * @throws ConfigPersistError when the sample cannot be written
 * @throws ConfigParseError when the file is not valid JSON
 * @throws ConfigVersionError when `_meta.version` is not {@link CONFIG_VERSION}
 * @throws ConfigValidationError when the shape is wrong
 */
export async function loadConfig(configPath: string): Promise<LoadedConfig> {
    const path = resolve(configPath);

    let text: string;
    try {
        text = await readFile(path, 'utf-8');
    } catch (error) {
        if (isMissingFileError(error)) {
            await writeSampleConfig(path);
            throw new ConfigNotFoundError(path, true);
        }
        throw error;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        throw new ConfigParseError(path, error);
    }

    if (!isRawObject(parsed)) {
        throw new ConfigValidationError(path, [
            { path: '(root)', message: 'must be a JSON object' },
        ]);
    }

    const migrated = isLegacyConfig(parsed);
    const raw = migrateLegacyConfig(parsed);

    const version = readConfigVersion(raw);
    if (version !== CONFIG_VERSION) {
        throw new ConfigVersionError(path, version, CONFIG_VERSION);
    }

    const { config, issues } = validateConfig(raw);
    if (!config) {
        throw new ConfigValidationError(path, issues);
    }

    return { config, raw, path, migrated };
}

/**
 * Overwrites the config file with the given config.
 *
 * @throws ConfigPersistError when the write fails
 */
export async function saveConfig(path: string, config: AppConfig | RawObject): Promise<void> {
    try {
        await writeFile(path, serializeConfig(config), 'utf-8');
    } catch (error) {
        throw new ConfigPersistError(path, error);
    }
}

// ============================================================================
// CONFIG STORE
// ============================================================================

function setFolderKey(target: RawObject, folders: string[]): void {
    if (folders.length === 0) {
        delete target.download_folders;
    } else {
        target.download_folders = [...folders];
    }
}

function snapshotConfig(config: AppConfig): RawObject {
    const copy: unknown = structuredClone(config);
    return isRawObject(copy) ? copy : {};
}

/**
 * The live configuration plus the file it came from.
 *
 * Folder edits change both the validated config and the file's own object,
 * and the file's object is what gets written back, so keys and values the
 * user wrote survive an edit untouched.
 */
export class ConfigStore {
    private readonly raw: RawObject;

    /**
     * @param raw - The file's object as loaded; defaults to a copy of `config`
     */
    constructor(
        public readonly config: AppConfig,
        public readonly path: string,
        raw?: RawObject,
    ) {
        this.raw = raw ?? snapshotConfig(config);
    }

    static async load(configPath: string): Promise<ConfigStore> {
        const { config, raw, path } = await loadConfig(configPath);
        return new ConfigStore(config, path, raw);
    }

    /** Directory that relative folder settings resolve against. */
    get configDir(): string {
        return dirname(this.path);
    }

    /** Source names in config order. */
    sourceNames(): string[] {
        return Object.keys(this.config.systems);
    }

    getSource(name: string): SourceConfig | undefined {
        return this.config.systems[name];
    }

    hash(): string {
        return computeConfigHash(this.config);
    }

    /** Resolved folders for a source, falling back to the global folders. */
    downloadFolders(sourceName: string): string[] {
        return getDownloadFolders(this.config, sourceName, this.configDir);
    }

    globalDownloadFolders(): string[] {
        return normalizeDownloadFolders(this.config.download_folders, this.configDir);
    }

    /**
     * Replaces the global folders and saves. An empty list clears them.
     *
     * @throws ConfigPersistError when the write fails; the in-memory change is kept
     */
    async setGlobalFolders(folders: string[]): Promise<void> {
        setGlobalDownloadFolders(this.config, folders);
        setFolderKey(this.raw, folders);
        await saveConfig(this.path, this.raw);
    }

    /**
     * Replaces a source's folder override and saves. An empty list clears it.
     *
     * @throws ConfigPersistError when the write fails; the in-memory change is kept
     */
    async setSourceFolders(sourceName: string, folders: string[]): Promise<void> {
        setSourceDownloadFolders(this.config, sourceName, folders);
        const systems = this.raw.systems;
        const source = isRawObject(systems) ? systems[sourceName] : undefined;
        if (isRawObject(source)) {
            setFolderKey(source, folders);
        }
        await saveConfig(this.path, this.raw);
    }
}
