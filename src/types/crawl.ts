import type { BibRecord } from './record.js';

/**
 * Per-page outcome of the pagination controller.
 *
 * CONTINUE is the only non-terminal outcome; every STOP_* ends the run.
 */
export enum CrawlOutcome {
    CONTINUE = 'CONTINUE',
    STOP_DUPLICATE = 'STOP_DUPLICATE',
    STOP_EMPTY_STREAK = 'STOP_EMPTY_STREAK',
    STOP_ERROR = 'STOP_ERROR',
    STOP_CAP_REACHED = 'STOP_CAP_REACHED',
    STOP_CANCELLED = 'STOP_CANCELLED',
}

/**
 * A cookie value scoped to a domain and path.
 */
export interface CookieEntry {
    value: string;
    domain: string;
    path: string;
}

/** Session credentials: cookie name → scoped value. */
export type CookieJar = Map<string, CookieEntry>;

/**
 * A fetched listing page.
 */
export interface FetchedPage {
    /** Final URL after redirects */
    url: string;
    status: number;
    body: string;
}

/**
 * Fetches one page. Throws on transport failure (timeout, connection error,
 * unreadable body); HTTP error statuses are returned, not thrown.
 * Cookies the response sets are stored back into `cookies`.
 */
export interface PageFetcher {
    fetchPage(url: string, cookies?: CookieJar): Promise<FetchedPage>;
}

/**
 * Run-scoped accumulator owned by a single crawl.
 */
export interface CrawlState {
    seenFingerprints: Set<string>;
    records: BibRecord[];
    emptyStreak: number;
    pagesFetched: number;
}

export interface PageProgress {
    page: number;
    url: string;
    status: number;
    rows: number;
}

export interface CrawlStop {
    outcome: CrawlOutcome;
    reason: string;
    page: number;
}

/**
 * Display hooks invoked by the crawl. Not part of its control flow.
 */
export interface CrawlObserver {
    onPage?(progress: PageProgress): void;
    onStop?(stop: CrawlStop): void;
}

/**
 * Result of the pagination loop, before deduplication.
 */
export interface CrawlRun {
    records: BibRecord[];
    outcome: CrawlOutcome;
    reason: string;
    pagesFetched: number;
    error?: Error;
}
