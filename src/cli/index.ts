#!/usr/bin/env node
import { Command } from 'commander';
import { parseExportFormat, parseLogLevel, resolveConfig } from '../utils/config.js';
import { ConfigError } from '../utils/errors.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { harvestFiles, harvestFromConfig } from '../harvest/harvester.js';
import { exportRecords } from '../exporters/export.js';
import { CrawlOutcome, type CrawlObserver, type HarvestConfig } from '../types/index.js';

const VERSION = '1.0.0';

/** Exit code when every page parsed cleanly but yielded no records. */
const EXIT_NO_DATA = 2;

function parseNumber(value: string, flag: string): number {
    const parsed = Number(value);
    if (value.trim() === '' || Number.isNaN(parsed)) {
        throw new ConfigError(`${flag} expects a number (got "${value}")`);
    }
    return parsed;
}

function fail(error: unknown, label: string): never {
    const logger = getLogger();
    if (error instanceof ConfigError) {
        logger.error({ error: error.message }, `${label}: invalid configuration`);
    } else {
        logger.error({ error }, `${label} failed`);
    }
    process.exit(1);
}

const program = new Command();

program
    .name('sinta-harvest')
    .description('Harvest publication records from SINTA profile listings and export them as semicolon-delimited text.')
    .version(VERSION);

// ─── CRAWL command ───────────────────────────────────────

program
    .command('crawl')
    .description('Fetch every listing page of a profile, deduplicate, and export')
    .option('-u, --url <url>', 'Profile URL (any page of the listing)')
    .option('-c, --cookies <path>', 'Cookies JSON exported from a logged-in browser')
    .option('-m, --max-pages <n>', 'Maximum pages to fetch (safety cap)')
    .option('--delay <seconds>', 'Pause between pages, in seconds')
    .option('--timeout <ms>', 'Per-request timeout in milliseconds')
    .option('--retries <n>', 'Retries for retryable network errors')
    .option('-o, --out <path>', 'Output file path')
    .option('-f, --format <format>', 'Export format: csv | json')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts) => {
        let config: HarvestConfig;
        try {
            const cliConfig: Partial<HarvestConfig> = {
                url: opts.url,
                cookies: opts.cookies,
                maxPages: opts.maxPages !== undefined ? parseNumber(opts.maxPages, '--max-pages') : undefined,
                delayMs: opts.delay !== undefined ? Math.round(parseNumber(opts.delay, '--delay') * 1000) : undefined,
                timeoutMs: opts.timeout !== undefined ? parseNumber(opts.timeout, '--timeout') : undefined,
                maxRetries: opts.retries !== undefined ? parseNumber(opts.retries, '--retries') : undefined,
                out: opts.out,
                format: opts.format !== undefined ? parseExportFormat(opts.format) : undefined,
                logLevel: opts.logLevel !== undefined ? parseLogLevel(opts.logLevel) : undefined,
                jsonLogs: opts.jsonLogs,
            };
            config = await resolveConfig(cliConfig);
        } catch (error) {
            fail(error, 'Crawl');
        }

        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        const logger = getLogger();

        const observer: CrawlObserver = {
            onPage: ({ page, rows, status }) => {
                logger.info({ page, rows, status }, `Page ${page}: extracted ${rows} rows | HTTP ${status}`);
            },
            onStop: ({ outcome, reason }) => {
                if (outcome === CrawlOutcome.STOP_ERROR) {
                    logger.error({ outcome }, reason);
                } else {
                    logger.info({ outcome }, reason);
                }
            },
        };

        const controller = new AbortController();
        process.once('SIGINT', () => {
            logger.warn('Interrupt received, stopping after the current page');
            controller.abort();
        });

        try {
            const report = await harvestFromConfig(config, observer, controller.signal);

            if (report.rowsBefore === 0) {
                logger.warn({ outcome: report.outcome }, 'No data extracted.');
                process.exitCode = report.error ? 1 : EXIT_NO_DATA;
                return;
            }

            logger.info(
                { rowsBefore: report.rowsBefore, rowsAfter: report.rowsAfter },
                `Done. Rows before dedup: ${report.rowsBefore} | After smart dedup: ${report.rowsAfter}`
            );
            exportRecords(report.records, config.out, config.format);

            if (report.error) {
                process.exitCode = 1;
            }
        } catch (error) {
            fail(error, 'Crawl');
        }
    });

// ─── PARSE command ───────────────────────────────────────

program
    .command('parse')
    .description('Parse saved listing pages (HTML files), deduplicate, and export')
    .argument('<files...>', 'HTML files saved from the profile listing')
    .option('-o, --out <path>', 'Output file path', 'sinta_export.csv')
    .option('-f, --format <format>', 'Export format: csv | json', 'csv')
    .option('--log-level <level>', 'Log level: debug | info | warn | error', 'info')
    .option('--json-logs', 'Output JSON logs', false)
    .action((files: string[], opts) => {
        try {
            const format = parseExportFormat(opts.format);
            initLogger({ level: parseLogLevel(opts.logLevel), jsonLogs: opts.jsonLogs });

            const report = harvestFiles(files);
            if (report.rowsBefore === 0) {
                getLogger().warn('No data extracted.');
                process.exitCode = EXIT_NO_DATA;
                return;
            }

            getLogger().info(
                { rowsBefore: report.rowsBefore, rowsAfter: report.rowsAfter },
                `Done. Rows before dedup: ${report.rowsBefore} | After smart dedup: ${report.rowsAfter}`
            );
            exportRecords(report.records, opts.out, format);
        } catch (error) {
            fail(error, 'Parse');
        }
    });

program.parseAsync().catch((error: unknown) => fail(error, 'Command'));
