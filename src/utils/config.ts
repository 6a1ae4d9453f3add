import { cosmiconfig } from 'cosmiconfig';
import {
    DEFAULT_CONFIG,
    EXPORT_FORMATS,
    LOG_LEVELS,
    type ExportFormat,
    type HarvestConfig,
    type LogLevel,
} from '../types/index.js';
import { ConfigError } from './errors.js';
import { getLogger } from './logger.js';

const MODULE_NAME = 'sinta-harvest';

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep only the keys of a config file that have the expected primitive type.
 * Unknown keys and mistyped values are ignored with a warning.
 */
export function pickConfigFields(raw: unknown): Partial<HarvestConfig> {
    const picked: Partial<HarvestConfig> = {};
    if (!isObject(raw)) return picked;

    const str = (key: string): string | undefined => {
        const value = raw[key];
        return typeof value === 'string' ? value : undefined;
    };
    const num = (key: string): number | undefined => {
        const value = raw[key];
        return typeof value === 'number' ? value : undefined;
    };

    picked.url = str('url');
    picked.cookies = str('cookies');
    picked.maxPages = num('maxPages');
    picked.delayMs = num('delayMs');
    picked.timeoutMs = num('timeoutMs');
    picked.maxRetries = num('maxRetries');
    picked.userAgent = str('userAgent');
    picked.acceptLanguage = str('acceptLanguage');
    picked.out = str('out');

    const format = str('format');
    if (format !== undefined) picked.format = parseExportFormat(format);
    const logLevel = str('logLevel');
    if (logLevel !== undefined) picked.logLevel = parseLogLevel(logLevel);
    const jsonLogs = raw['jsonLogs'];
    if (typeof jsonLogs === 'boolean') picked.jsonLogs = jsonLogs;

    const known = new Set<string>(Object.keys(DEFAULT_CONFIG).concat(['url', 'cookies']));
    const unknown = Object.keys(raw).filter((key) => !known.has(key));
    if (unknown.length > 0) {
        getLogger().warn({ keys: unknown }, 'Ignoring unknown config keys');
    }

    return definedOnly(picked);
}

/**
 * Load configuration from sinta-harvest.config.json using cosmiconfig.
 * Returns null when no config file is found.
 */
async function loadConfigFile(): Promise<Partial<HarvestConfig> | null> {
    const explorer = cosmiconfig(MODULE_NAME, {
        searchPlaces: ['package.json', `${MODULE_NAME}.config.json`],
    });

    try {
        const result = await explorer.search();
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return pickConfigFields(result.config);
        }
    } catch (error) {
        if (error instanceof ConfigError) throw error;
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): Partial<HarvestConfig> {
    return definedOnly({
        cookies: env['SINTA_HARVEST_COOKIES'] || undefined,
        userAgent: env['SINTA_HARVEST_USER_AGENT'] || undefined,
    });
}

/**
 * Drop keys whose value is undefined so they do not shadow lower-precedence
 * sources when spread.
 */
export function definedOnly<T extends object>(value: T): Partial<T> {
    const result: Partial<T> = {};
    for (const key in value) {
        if (value[key] !== undefined) {
            result[key] = value[key];
        }
    }
    return result;
}

export function parseExportFormat(value: string): ExportFormat {
    const format = EXPORT_FORMATS.find((f) => f === value.toLowerCase());
    if (!format) {
        throw new ConfigError(`Invalid format: ${value}. Valid: ${EXPORT_FORMATS.join(', ')}`);
    }
    return format;
}

export function parseLogLevel(value: string): LogLevel {
    const level = LOG_LEVELS.find((l) => l === value.toLowerCase());
    if (!level) {
        throw new ConfigError(`Invalid log level: ${value}. Valid: ${LOG_LEVELS.join(', ')}`);
    }
    return level;
}

/**
 * Check option ranges. Throws ConfigError on the first violation.
 */
export function validateConfig(config: HarvestConfig): HarvestConfig {
    if (!Number.isInteger(config.maxPages) || config.maxPages < 1) {
        throw new ConfigError(`maxPages must be an integer >= 1 (got ${config.maxPages})`);
    }
    if (!Number.isFinite(config.delayMs) || config.delayMs < 0) {
        throw new ConfigError(`delay must be a non-negative number (got ${config.delayMs}ms)`);
    }
    if (!Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0) {
        throw new ConfigError(`timeout must be a positive number (got ${config.timeoutMs}ms)`);
    }
    if (!Number.isInteger(config.maxRetries) || config.maxRetries < 0) {
        throw new ConfigError(`retries must be an integer >= 0 (got ${config.maxRetries})`);
    }
    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<HarvestConfig>
): Promise<HarvestConfig> {
    const fileConfig = await loadConfigFile();
    const envConfig = loadEnvVars();

    const merged: HarvestConfig = {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...definedOnly(cliFlags),
    };

    return validateConfig(merged);
}
