/**
 * Config shape validation
 *
 * Works on the parsed JSON as `unknown` and builds a typed {@link AppConfig}
 * field by field, collecting every problem instead of stopping at the first.
 */

import type {
    AppConfig,
    FieldSelectors,
    FolderSetting,
    IgnoreRules,
    RuleSet,
    SourceConfig,
} from '@dirshelf/types';
import type { ConfigIssue } from './errors.js';
import { isRawObject, type RawObject } from './migrate.js';
import { CONFIG_VERSION } from './constants.js';

/** Selector used for `entries`, `fields.name` and `fields.url` when omitted. */
const DEFAULT_SELECTOR = 'a';

export interface ConfigValidationResult {
    /** Present only when `issues` is empty. */
    config?: AppConfig;
    issues: ConfigIssue[];
}

// ============================================================================
// FIELD VALIDATORS
// ============================================================================

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function optionalString(
    value: unknown,
    path: string,
    issues: ConfigIssue[],
): string | undefined {
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
        issues.push({ path, message: 'must be a string' });
        return undefined;
    }
    return value;
}

function validateFolderSetting(
    value: unknown,
    path: string,
    issues: ConfigIssue[],
): FolderSetting | undefined {
    if (value === undefined) return undefined;
    if (typeof value === 'string' || isStringArray(value)) {
        return value;
    }
    issues.push({ path, message: 'must be a string or an array of strings' });
    return undefined;
}

function validateRuleSet(
    value: unknown,
    path: string,
    issues: ConfigIssue[],
): RuleSet | undefined {
    if (value === undefined) return undefined;
    if (!isRawObject(value)) {
        issues.push({ path, message: 'must be an object of pattern lists' });
        return undefined;
    }

    const rules: RuleSet = {};
    for (const [bucket, patterns] of Object.entries(value)) {
        if (!isStringArray(patterns)) {
            issues.push({
                path: `${path}.${bucket}`,
                message: 'must be an array of strings',
            });
            continue;
        }
        rules[bucket] = patterns;
    }
    return rules;
}

function validateUrls(
    raw: RawObject,
    path: string,
    issues: ConfigIssue[],
): string[] {
    const urls = raw.urls;
    if (urls === undefined) {
        issues.push({ path: `${path}.urls`, message: 'is required' });
        return [];
    }
    if (!isStringArray(urls) || urls.length === 0) {
        issues.push({
            path: `${path}.urls`,
            message: 'must be a non-empty array of strings',
        });
        return [];
    }
    for (const [index, url] of urls.entries()) {
        if (!URL.canParse(url)) {
            issues.push({
                path: `${path}.urls.${index}`,
                message: `is not a valid URL: ${url}`,
            });
        }
    }
    return urls;
}

function validateFields(
    value: unknown,
    path: string,
    issues: ConfigIssue[],
): FieldSelectors {
    if (value === undefined) {
        return { name: DEFAULT_SELECTOR, url: DEFAULT_SELECTOR };
    }
    if (!isRawObject(value)) {
        issues.push({ path, message: 'must be an object' });
        return { name: DEFAULT_SELECTOR, url: DEFAULT_SELECTOR };
    }

    const fields: FieldSelectors = {
        name: optionalString(value.name, `${path}.name`, issues) ?? DEFAULT_SELECTOR,
        url: optionalString(value.url, `${path}.url`, issues) ?? DEFAULT_SELECTOR,
    };
    const size = optionalString(value.size, `${path}.size`, issues);
    if (size !== undefined) {
        fields.size = size;
    }
    return fields;
}

function validateIgnore(
    value: unknown,
    path: string,
    issues: ConfigIssue[],
): IgnoreRules | undefined {
    if (value === undefined) return undefined;
    if (!isRawObject(value)) {
        issues.push({ path, message: 'must be an object' });
        return undefined;
    }

    const ignore: IgnoreRules = {};
    const size = optionalString(value.size, `${path}.size`, issues);
    const nameContains = optionalString(
        value.name_contains,
        `${path}.name_contains`,
        issues,
    );
    if (size !== undefined) ignore.size = size;
    if (nameContains !== undefined) ignore.name_contains = nameContains;
    return ignore;
}

function validateSource(
    value: unknown,
    path: string,
    issues: ConfigIssue[],
): SourceConfig | undefined {
    if (!isRawObject(value)) {
        issues.push({ path, message: 'must be an object' });
        return undefined;
    }

    const source: SourceConfig = {
        id: optionalString(value.id, `${path}.id`, issues) ?? '',
        urls: validateUrls(value, path, issues),
        entries:
            optionalString(value.entries, `${path}.entries`, issues) ??
            DEFAULT_SELECTOR,
        fields: validateFields(value.fields, `${path}.fields`, issues),
    };

    const ignore = validateIgnore(value.ignore, `${path}.ignore`, issues);
    const regions = validateRuleSet(value.regions, `${path}.regions`, issues);
    const types = validateRuleSet(value.types, `${path}.types`, issues);
    const folders = validateFolderSetting(
        value.download_folders,
        `${path}.download_folders`,
        issues,
    );

    if (ignore) source.ignore = ignore;
    if (regions) source.regions = regions;
    if (types) source.types = types;
    if (folders !== undefined) source.download_folders = folders;

    return source;
}

// ============================================================================
// ENTRY POINTS
// ============================================================================

/**
 * Reads `_meta.version` from a parsed config, or undefined when absent.
 */
export function readConfigVersion(raw: RawObject): unknown {
    return isRawObject(raw._meta) ? raw._meta.version : undefined;
}

/**
 * Validates a migrated config object.
 *
 * The version is checked separately by the loader so that an unknown version
 * is reported as such rather than as a list of shape problems.
 */
export function validateConfig(raw: unknown): ConfigValidationResult {
    const issues: ConfigIssue[] = [];

    if (!isRawObject(raw)) {
        return {
            issues: [{ path: '(root)', message: 'must be a JSON object' }],
        };
    }

    const folders = validateFolderSetting(
        raw.download_folders,
        'download_folders',
        issues,
    );

    const systems: Record<string, SourceConfig> = {};
    if (!isRawObject(raw.systems)) {
        issues.push({ path: 'systems', message: 'must be an object of sources' });
    } else {
        const entries = Object.entries(raw.systems);
        if (entries.length === 0) {
            issues.push({ path: 'systems', message: 'must define at least one source' });
        }
        for (const [name, value] of entries) {
            const source = validateSource(value, `systems.${name}`, issues);
            if (source) {
                systems[name] = source;
            }
        }
    }

    if (issues.length > 0) {
        return { issues };
    }

    const config: AppConfig =
        folders === undefined
            ? { _meta: { version: CONFIG_VERSION }, systems }
            : {
                  _meta: { version: CONFIG_VERSION },
                  download_folders: folders,
                  systems,
              };
    return { config, issues };
}
