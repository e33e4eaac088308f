/**
 * Configuration Errors
 *
 * Every error here is fatal to startup except ConfigPersistError, which the
 * session reports as a warning banner.
 */

/**
 * The configuration file does not exist.
 *
 * When `sampleCreated` is true a documented sample was written to `path` and
 * the user only needs to edit it and run again.
 */
export class ConfigNotFoundError extends Error {
    readonly name = 'ConfigNotFoundError';

    constructor(
        public readonly path: string,
        public readonly sampleCreated: boolean,
    ) {
        super(
            sampleCreated
                ? `Config file not found. A sample config was created at ${path}`
                : `Config file not found: ${path}`,
        );
    }
}

/**
 * The configuration declares a version this build does not understand.
 */
export class ConfigVersionError extends Error {
    readonly name = 'ConfigVersionError';

    constructor(
        public readonly path: string,
        public readonly found: unknown,
        public readonly expected: number,
    ) {
        super(
            `Unsupported config version in ${path}: expected ${expected}, got ${JSON.stringify(found)}`,
        );
    }
}

/**
 * The configuration file is not valid JSON.
 */
export class ConfigParseError extends Error {
    readonly name = 'ConfigParseError';

    constructor(
        public readonly path: string,
        public readonly originalError: unknown,
    ) {
        const detail =
            originalError instanceof Error
                ? originalError.message
                : String(originalError);
        super(`Invalid JSON in config file ${path}: ${detail}`);
    }
}

/**
 * A single problem found while validating the configuration shape.
 */
export interface ConfigIssue {
    /** Dotted path to the offending value, e.g. `systems.Game Boy.urls`. */
    path: string;
    message: string;
}

/**
 * The configuration parsed but has the wrong shape.
 */
export class ConfigValidationError extends Error {
    readonly name = 'ConfigValidationError';

    constructor(
        public readonly path: string,
        public readonly issues: readonly ConfigIssue[],
    ) {
        const lines = issues.map((issue) => `  - ${issue.path}: ${issue.message}`);
        super(`Invalid config file ${path}:\n${lines.join('\n')}`);
    }
}

/**
 * Writing the configuration back to disk failed.
 */
export class ConfigPersistError extends Error {
    readonly name = 'ConfigPersistError';

    constructor(
        public readonly path: string,
        public readonly originalError: unknown,
    ) {
        const detail =
            originalError instanceof Error
                ? originalError.message
                : String(originalError);
        super(`Failed to save config to ${path}: ${detail}`);
    }
}
