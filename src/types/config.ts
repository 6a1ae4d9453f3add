/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Export formats for the final record table.
 */
export type ExportFormat = 'csv' | 'json';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['csv', 'json'];

/**
 * Full harvest configuration merged from CLI flags, env vars, and config file.
 */
export interface HarvestConfig {
    // Input
    url?: string;
    cookies?: string;

    // Crawl policy
    maxPages: number;
    delayMs: number;

    // HTTP session
    timeoutMs: number;
    maxRetries: number;
    userAgent: string;
    acceptLanguage: string;

    // Output
    out: string;
    format: ExportFormat;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: HarvestConfig = {
    maxPages: 100,
    delayMs: 600,
    timeoutMs: 25000,
    maxRetries: 0,
    userAgent: 'Mozilla/5.0',
    acceptLanguage: 'en-US,en;q=0.9,id;q=0.8',
    out: 'sinta_export.csv',
    format: 'csv',
    logLevel: 'info',
    jsonLogs: false,
};
