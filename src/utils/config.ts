import { cosmiconfig } from 'cosmiconfig';
import {
    ALERT_SOURCE_TAGS,
    DEFAULT_CONFIG,
    LIBRARY_TYPES,
    type AlertSourceTag,
    type LibraryType,
    type LogLevel,
    type MatchPolicy,
    type ProxySeparator,
    type PubSporkConfig,
} from '../types/index.js';
import { isIsoDate } from './dates.js';
import { ConfigError } from './errors.js';
import { getLogger } from './logger.js';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];
const PROXY_SEPARATORS: readonly ProxySeparator[] = ['dot', 'dash'];

/**
 * Load configuration from pubspork.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults are used then.
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<PubSporkConfig> | null> {
    const explorer = cosmiconfig('pubspork', {
        searchPlaces: ['pubspork.config.json'],
    });

    let result: Awaited<ReturnType<typeof explorer.search>>;
    try {
        result = await explorer.search(searchFrom);
    } catch (error) {
        throw new ConfigError(`Config file cannot be read: ${String(error)}`, 'config');
    }

    if (result && !result.isEmpty) {
        getLogger().debug({ path: result.filepath }, 'Loaded config file');
        return parseConfigObject(result.config);
    }

    return null;
}

/**
 * Merge configuration from multiple sources and validate the result.
 * Precedence: CLI flags > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<PubSporkConfig>,
    searchFrom?: string
): Promise<PubSporkConfig> {
    const fileConfig = await loadConfigFile(searchFrom);

    const merged: PubSporkConfig = {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...definedOnly(cliFlags),
        matching: {
            ...DEFAULT_CONFIG.matching,
            ...fileConfig?.matching,
            ...cliFlags.matching,
        },
    };

    validateConfig(merged);
    return merged;
}

/**
 * Check the cross-field rules a merged configuration must satisfy.
 */
export function validateConfig(config: PubSporkConfig): void {
    for (const option of ['since', 'before'] as const) {
        const value = config[option];
        if (value !== undefined && !isIsoDate(value)) {
            throw new ConfigError(`--${option} must be a date as YYYY-MM-DD, got "${value}"`, option);
        }
    }
    if (config.since !== undefined && config.before !== undefined && config.since >= config.before) {
        throw new ConfigError(`--since ${config.since} is not before --before ${config.before}`, 'since');
    }

    const { fuzzyThreshold, yearTolerance, minTruncatedLength } = config.matching;
    if (!(fuzzyThreshold >= 0 && fuzzyThreshold <= 1)) {
        throw new ConfigError(`matching.fuzzyThreshold must be between 0 and 1, got ${fuzzyThreshold}`, 'matching');
    }
    if (!Number.isInteger(yearTolerance) || yearTolerance < 0) {
        throw new ConfigError(`matching.yearTolerance must be a non-negative integer, got ${yearTolerance}`, 'matching');
    }
    if (!Number.isInteger(minTruncatedLength) || minTruncatedLength < 1) {
        throw new ConfigError(
            `matching.minTruncatedLength must be a positive integer, got ${minTruncatedLength}`,
            'matching'
        );
    }
}

// ─── Option parsing ───────────────────────────────────────

/**
 * Parse a source list: `all`, a comma-separated string, or an array of tags.
 */
export function parseSources(value: string | readonly string[]): AlertSourceTag[] {
    const tags = typeof value === 'string' ? value.split(',') : value;
    const trimmed = tags.map((tag) => tag.trim()).filter((tag) => tag.length > 0);

    if (trimmed.length === 1 && trimmed[0] === 'all') {
        return [...ALERT_SOURCE_TAGS];
    }
    if (trimmed.length === 0) {
        throw new ConfigError('No alert sources given', 'sources');
    }

    return trimmed.map((tag) => {
        const source = ALERT_SOURCE_TAGS.find((known) => known === tag);
        if (!source) {
            throw new ConfigError(
                `Unknown alert source "${tag}". Valid: all, ${ALERT_SOURCE_TAGS.join(', ')}`,
                'sources'
            );
        }
        return source;
    });
}

export function parseLibraryType(value: string): LibraryType {
    const libType = LIBRARY_TYPES.find((known) => known === value);
    if (!libType) {
        throw new ConfigError(`Unknown library type "${value}". Valid: ${LIBRARY_TYPES.join(', ')}`, 'libType');
    }
    return libType;
}

export function parseProxySeparator(value: string): ProxySeparator {
    return oneOf(value, PROXY_SEPARATORS, 'proxySeparator');
}

export function parseLogLevel(value: string): LogLevel {
    return oneOf(value, LOG_LEVELS, 'logLevel');
}

/**
 * Validate the contents of a config file field by field.
 */
export function parseConfigObject(value: unknown): Partial<PubSporkConfig> {
    if (!isObject(value)) {
        throw new ConfigError('Config file must contain a JSON object', 'config');
    }

    const config: Partial<PubSporkConfig> = {};

    const libType = stringOption(value, 'libType');
    if (libType !== undefined) config.libType = parseLibraryType(libType);
    config.libPath = stringOption(value, 'libPath');
    config.onlineLibUrl = stringOption(value, 'onlineLibUrl');
    config.alertsDir = stringOption(value, 'alertsDir');

    const sources = value['sources'];
    if (sources !== undefined) {
        if (typeof sources === 'string') {
            config.sources = parseSources(sources);
        } else if (Array.isArray(sources) && sources.every((tag) => typeof tag === 'string')) {
            config.sources = parseSources(sources);
        } else {
            throw new ConfigError('sources must be a string or a list of strings', 'sources');
        }
    }

    config.since = stringOption(value, 'since');
    config.before = stringOption(value, 'before');
    config.ledgerIn = stringOption(value, 'ledgerIn');
    config.ledgerOut = stringOption(value, 'ledgerOut');
    config.curationPage = stringOption(value, 'curationPage');
    config.proxy = stringOption(value, 'proxy');

    const proxySeparator = stringOption(value, 'proxySeparator');
    if (proxySeparator !== undefined) config.proxySeparator = parseProxySeparator(proxySeparator);

    config.customSearchUrl = stringOption(value, 'customSearchUrl');
    config.okDuplicateTitles = stringOption(value, 'okDuplicateTitles');
    config.showIgnored = booleanOption(value, 'showIgnored');

    const logLevel = stringOption(value, 'logLevel');
    if (logLevel !== undefined) config.logLevel = parseLogLevel(logLevel);
    config.jsonLogs = booleanOption(value, 'jsonLogs');

    const matching = value['matching'];
    if (matching !== undefined) {
        if (!isObject(matching)) {
            throw new ConfigError('matching must be an object', 'matching');
        }
        const policy: Partial<MatchPolicy> = {};
        policy.fuzzyThreshold = numberOption(matching, 'fuzzyThreshold');
        policy.yearTolerance = numberOption(matching, 'yearTolerance');
        policy.minTruncatedLength = numberOption(matching, 'minTruncatedLength');
        config.matching = { ...DEFAULT_CONFIG.matching, ...definedOnly(policy) };
    }

    return definedOnly(config);
}

// ─── Helpers ──────────────────────────────────────────────

function oneOf<T extends string>(value: string, allowed: readonly T[], option: string): T {
    const found = allowed.find((candidate) => candidate === value);
    if (!found) {
        throw new ConfigError(`Invalid ${option} "${value}". Valid: ${allowed.join(', ')}`, option);
    }
    return found;
}

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringOption(source: Record<string, unknown>, key: string): string | undefined {
    const value = source[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
        throw new ConfigError(`${key} must be a string`, key);
    }
    return value;
}

function booleanOption(source: Record<string, unknown>, key: string): boolean | undefined {
    const value = source[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'boolean') {
        throw new ConfigError(`${key} must be true or false`, key);
    }
    return value;
}

function numberOption(source: Record<string, unknown>, key: string): number | undefined {
    const value = source[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'number') {
        throw new ConfigError(`matching.${key} must be a number`, 'matching');
    }
    return value;
}

/**
 * Drop keys whose value is undefined, so they do not shadow lower-precedence sources.
 */
function definedOnly<T extends object>(value: T): Partial<T> {
    const result: Partial<T> = {};
    for (const key of Object.keys(value)) {
        if (isKeyOf(value, key) && value[key] !== undefined) {
            result[key] = value[key];
        }
    }
    return result;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
    return key in value;
}
