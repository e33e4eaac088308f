/**
 * Configuration constants
 */

/** Version stamped into `_meta.version`. Files with another version are rejected. */
export const CONFIG_VERSION = 1;

/** Config file name looked up in the working directory when no path is given. */
export const DEFAULT_CONFIG_FILE = 'config.json';

/** Destination offered when a source has no configured folder. */
export const DEFAULT_DOWNLOAD_FOLDER = '~/Downloads';
