import {
    CrawlOutcome,
    type BibRecord,
    type CookieJar,
    type CrawlObserver,
    type CrawlRun,
    type CrawlState,
    type FetchedPage,
    type PageFetcher,
} from '../types/index.js';
import { parsePage } from '../extract/item-parser.js';
import { ConfigError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';
import { pageFingerprint } from './fingerprint.js';
import { normalizeProfileUrl, pageUrl } from './profile-url.js';

/** Consecutive record-less pages that mark the end of the listing. */
export const EMPTY_STREAK_LIMIT = 2;

export type PageParser = (html: string, sourcePage: string) => BibRecord[];

export interface PaginationOptions {
    baseUrl: string;
    cookies?: CookieJar;
    /** Hard cap on pages fetched (>= 1) */
    maxPages: number;
    /** Pause between pages, in milliseconds */
    delayMs: number;
    observer?: CrawlObserver;
    /** Checked before each page; an aborted signal ends the run at that boundary */
    signal?: AbortSignal;
}

export interface PaginationDeps {
    fetcher: PageFetcher;
    sleep?: (ms: number) => Promise<void>;
    parse?: PageParser;
}

export interface PageEvaluation {
    outcome: CrawlOutcome;
    records: BibRecord[];
}

export function createCrawlState(): CrawlState {
    return {
        seenFingerprints: new Set(),
        records: [],
        emptyStreak: 0,
        pagesFetched: 0,
    };
}

/** Provenance label for records of a crawled page. */
export function sourcePageLabel(page: number): string {
    return `page_${page}`;
}

/**
 * Decide what one successfully fetched page means for the run.
 *
 * A body already seen this run stops the crawl without being parsed. Otherwise
 * the page's records join the state, and the second record-less page in a row
 * stops the crawl.
 */
export function evaluatePage(
    state: CrawlState,
    page: number,
    body: string,
    parse: PageParser = parsePage
): PageEvaluation {
    const fingerprint = pageFingerprint(body);
    if (state.seenFingerprints.has(fingerprint)) {
        return { outcome: CrawlOutcome.STOP_DUPLICATE, records: [] };
    }
    state.seenFingerprints.add(fingerprint);

    const records = parse(body, sourcePageLabel(page));
    state.records.push(...records);

    if (records.length > 0) {
        state.emptyStreak = 0;
        return { outcome: CrawlOutcome.CONTINUE, records };
    }

    state.emptyStreak++;
    const outcome = state.emptyStreak >= EMPTY_STREAK_LIMIT
        ? CrawlOutcome.STOP_EMPTY_STREAK
        : CrawlOutcome.CONTINUE;
    return { outcome, records };
}

/**
 * Fetch listing pages 1, 2, 3… one at a time until a stop condition fires.
 *
 * Transport failures end the run with STOP_ERROR; records gathered from
 * earlier pages stay in the result.
 */
export async function runPagination(
    options: PaginationOptions,
    deps: PaginationDeps
): Promise<CrawlRun> {
    if (!Number.isInteger(options.maxPages) || options.maxPages < 1) {
        throw new ConfigError(`maxPages must be an integer >= 1 (got ${options.maxPages})`);
    }

    const logger = getLogger();
    const baseUrl = normalizeProfileUrl(options.baseUrl);
    const wait = deps.sleep ?? sleep;
    const parse = deps.parse ?? parsePage;
    const state = createCrawlState();
    // Run-scoped session jar: starts from the caller's cookies, then follows Set-Cookie.
    const cookies: CookieJar = new Map(options.cookies ?? []);

    const finish = (outcome: CrawlOutcome, page: number, reason: string, error?: Error): CrawlRun => {
        logger.debug({ outcome, page, pagesFetched: state.pagesFetched }, 'Crawl stopped');
        options.observer?.onStop?.({ outcome, reason, page });
        return {
            records: state.records,
            outcome,
            reason,
            pagesFetched: state.pagesFetched,
            error,
        };
    };

    for (let page = 1; ; page++) {
        if (options.signal?.aborted) {
            return finish(CrawlOutcome.STOP_CANCELLED, page, `Stopped: cancelled before page ${page}.`);
        }

        const url = pageUrl(baseUrl, page);
        let fetched: FetchedPage;
        try {
            fetched = await deps.fetcher.fetchPage(url, cookies);
        } catch (error) {
            const cause = error instanceof Error ? error : new Error(String(error));
            return finish(
                CrawlOutcome.STOP_ERROR,
                page,
                `Stopped: request failed on page ${page}: ${cause.message}`,
                cause
            );
        }
        state.pagesFetched++;

        const { outcome, records } = evaluatePage(state, page, fetched.body, parse);

        if (outcome === CrawlOutcome.STOP_DUPLICATE) {
            return finish(
                outcome,
                page,
                `Stopped: page ${page} is identical to a previous page (end reached / pagination not changing).`
            );
        }

        logger.debug({ page, url, status: fetched.status, rows: records.length }, 'Page processed');
        options.observer?.onPage?.({ page, url, status: fetched.status, rows: records.length });

        if (outcome === CrawlOutcome.STOP_EMPTY_STREAK) {
            return finish(outcome, page, `Stopped: ${EMPTY_STREAK_LIMIT} pages in a row returned 0 rows.`);
        }

        if (page >= options.maxPages) {
            return finish(
                CrawlOutcome.STOP_CAP_REACHED,
                page,
                `Stopped: reached the ${options.maxPages}-page cap.`
            );
        }

        if (options.delayMs > 0) {
            await wait(options.delayMs);
        }
    }
}
