import { readFileSync } from 'node:fs';
import { basename } from 'node:path';
import type {
    BibRecord,
    CookieJar,
    CrawlObserver,
    CrawlOutcome,
    HarvestConfig,
    PageFetcher,
} from '../types/index.js';
import { normalizeProfileUrl } from '../crawl/profile-url.js';
import { runPagination } from '../crawl/pagination.js';
import { parsePage } from '../extract/item-parser.js';
import { dedupRecords } from '../dedup/dedup.js';
import { loadCookieFile } from '../utils/cookies.js';
import { ConfigError } from '../utils/errors.js';
import { createHttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

export interface HarvestOptions {
    url: string;
    cookies?: CookieJar;
    maxPages: number;
    delayMs: number;
    observer?: CrawlObserver;
    signal?: AbortSignal;
}

export interface HarvestDeps {
    fetcher: PageFetcher;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Final table of a crawl plus how the crawl ended.
 */
export interface HarvestReport {
    /** Deduplicated records, first-seen order */
    records: BibRecord[];
    rowsBefore: number;
    rowsAfter: number;
    outcome: CrawlOutcome;
    reason: string;
    pagesFetched: number;
    /** Transport failure that ended the crawl, when outcome is STOP_ERROR */
    error?: Error;
}

/**
 * Crawl a profile listing and return its deduplicated records.
 */
export async function harvestProfile(
    options: HarvestOptions,
    deps: HarvestDeps
): Promise<HarvestReport> {
    const logger = getLogger();
    const baseUrl = normalizeProfileUrl(options.url);
    logger.info({ baseUrl, maxPages: options.maxPages, delayMs: options.delayMs }, 'Starting crawl');

    const run = await runPagination(
        {
            baseUrl,
            cookies: options.cookies,
            maxPages: options.maxPages,
            delayMs: options.delayMs,
            observer: options.observer,
            signal: options.signal,
        },
        { fetcher: deps.fetcher, sleep: deps.sleep }
    );

    const records = dedupRecords(run.records);
    logger.info(
        { rowsBefore: run.records.length, rowsAfter: records.length, outcome: run.outcome },
        'Crawl finished'
    );

    return {
        records,
        rowsBefore: run.records.length,
        rowsAfter: records.length,
        outcome: run.outcome,
        reason: run.reason,
        pagesFetched: run.pagesFetched,
        error: run.error,
    };
}

/**
 * Build the HTTP session from configuration and crawl.
 * Configuration problems (no URL, unreadable cookies) throw before any request.
 */
export async function harvestFromConfig(
    config: HarvestConfig,
    observer?: CrawlObserver,
    signal?: AbortSignal
): Promise<HarvestReport> {
    if (!config.url) {
        throw new ConfigError('Please provide a profile URL');
    }
    const baseUrl = normalizeProfileUrl(config.url);
    const cookies = config.cookies ? loadCookieFile(config.cookies, baseUrl) : undefined;
    if (cookies) {
        getLogger().info({ count: cookies.size }, 'Cookies loaded into session');
    }

    const fetcher = createHttpClient({
        timeout: config.timeoutMs,
        maxRetries: config.maxRetries,
        userAgent: config.userAgent,
        acceptLanguage: config.acceptLanguage,
    });

    return harvestProfile(
        { url: baseUrl, cookies, maxPages: config.maxPages, delayMs: config.delayMs, observer, signal },
        { fetcher }
    );
}

export interface FileHarvestReport {
    records: BibRecord[];
    rowsBefore: number;
    rowsAfter: number;
    files: Array<{ file: string; rows: number }>;
}

/**
 * Parse saved listing pages, in argument order, and deduplicate across them.
 * Each record's source is the file's base name.
 */
export function harvestFiles(paths: readonly string[]): FileHarvestReport {
    const all: BibRecord[] = [];
    const files: FileHarvestReport['files'] = [];

    for (const filePath of paths) {
        let html: string;
        try {
            html = readFileSync(filePath, 'utf-8');
        } catch (error) {
            throw new ConfigError(`Cannot read HTML file: ${filePath}`, { cause: error });
        }
        const file = basename(filePath);
        const records = parsePage(html, file);
        getLogger().info({ file, rows: records.length }, 'File parsed');
        files.push({ file, rows: records.length });
        all.push(...records);
    }

    const records = dedupRecords(all);
    return { records, rowsBefore: all.length, rowsAfter: records.length, files };
}
