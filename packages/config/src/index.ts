/**
 * `@dirshelf/config`
 *
 * Loads the JSON configuration that lists the sources to scrape, migrates the
 * older layout, validates it and writes folder edits back. Also computes the
 * config hash the catalog cache is keyed by.
 *
 * @packageDocumentation
 */

export {
    CONFIG_VERSION,
    DEFAULT_CONFIG_FILE,
    DEFAULT_DOWNLOAD_FOLDER,
} from './constants.js';
export {
    ConfigNotFoundError,
    ConfigParseError,
    ConfigPersistError,
    ConfigValidationError,
    ConfigVersionError,
    type ConfigIssue,
} from './errors.js';
export { isLegacyConfig, migrateLegacyConfig, type RawObject } from './migrate.js';
export { validateConfig, type ConfigValidationResult } from './validation.js';
export {
    expandEnvVars,
    expandHome,
    getDownloadFolders,
    normalizeDownloadFolders,
    parseFolderList,
    resolveFolder,
    setGlobalDownloadFolders,
    setSourceDownloadFolders,
} from './folders.js';
export { computeConfigHash } from './hash.js';
export { ConfigStore, loadConfig, saveConfig, type LoadedConfig } from './store.js';
