/**
 * Download folder settings
 *
 * Folder values in the config are kept exactly as the user wrote them. They
 * are only expanded when a destination is needed, so the file stays portable.
 */

import { homedir } from 'os';
import { resolve } from 'path';
import type { AppConfig, FolderSetting } from '@dirshelf/types';

type Environment = Record<string, string | undefined>;

/**
 * Expands `$VAR` and `${VAR}` references. Unknown variables are left as written.
 */
export function expandEnvVars(value: string, env: Environment = process.env): string {
    return value.replace(
        /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g,
        (match: string, braced: string | undefined, bare: string | undefined) => {
            const name = braced ?? bare;
            if (name === undefined) return match;
            return env[name] ?? match;
        },
    );
}

/**
 * Expands a leading `~` or `~/` to the user's home directory.
 */
export function expandHome(value: string): string {
    if (value === '~') return homedir();
    if (value.startsWith('~/')) return resolve(homedir(), value.slice(2));
    return value;
}

/**
 * Resolves one folder entry to an absolute, normalized path.
 *
 * @param folder - The path as written in the config
 * @param configDir - Directory relative paths are resolved against
 */
export function resolveFolder(
    folder: string,
    configDir: string,
    env: Environment = process.env,
): string {
    // resolve() also drops trailing separators and `..` segments
    return resolve(configDir, expandHome(expandEnvVars(folder.trim(), env)));
}

/**
 * Turns a folder setting into a list of absolute paths.
 *
 * Accepts a single path or a list. Blank entries are skipped.
 */
export function normalizeDownloadFolders(
    folders: FolderSetting | undefined,
    configDir: string,
    env: Environment = process.env,
): string[] {
    if (folders === undefined) return [];
    const list = typeof folders === 'string' ? [folders] : folders;
    return list
        .filter((folder) => folder.trim() !== '')
        .map((folder) => resolveFolder(folder, configDir, env));
}

function hasFolders(folders: FolderSetting | undefined): folders is FolderSetting {
    if (folders === undefined) return false;
    return typeof folders === 'string' ? folders.trim() !== '' : folders.length > 0;
}

/**
 * Resolved download folders for a source: its own override when set,
 * otherwise the global folders, otherwise an empty list.
 */
export function getDownloadFolders(
    config: AppConfig,
    sourceName: string,
    configDir: string,
): string[] {
    const override = config.systems[sourceName]?.download_folders;
    if (hasFolders(override)) {
        return normalizeDownloadFolders(override, configDir);
    }
    return normalizeDownloadFolders(config.download_folders, configDir);
}

/**
 * Parses comma-separated user input into a trimmed list without blanks.
 */
export function parseFolderList(input: string): string[] {
    return input
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part !== '');
}

/**
 * Sets the global folders. An empty list removes the setting.
 */
export function setGlobalDownloadFolders(config: AppConfig, folders: string[]): void {
    if (folders.length === 0) {
        delete config.download_folders;
    } else {
        config.download_folders = folders;
    }
}

/**
 * Sets a source's folder override. An empty list removes the override.
 *
 * @throws Error if the source is not configured
 */
export function setSourceDownloadFolders(
    config: AppConfig,
    sourceName: string,
    folders: string[],
): void {
    const source = config.systems[sourceName];
    if (!source) {
        throw new Error(`Unknown source: ${sourceName}`);
    }
    if (folders.length === 0) {
        delete source.download_folders;
    } else {
        source.download_folders = folders;
    }
}
