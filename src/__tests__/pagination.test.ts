import { describe, it, expect, vi } from 'vitest';
import {
    EMPTY_STREAK_LIMIT,
    createCrawlState,
    evaluatePage,
    runPagination,
    sourcePageLabel,
} from '../crawl/pagination.js';
import { pageFingerprint } from '../crawl/fingerprint.js';
import { parsePage } from '../extract/item-parser.js';
import { ConfigError } from '../utils/errors.js';
import { HttpError } from '../utils/http-client.js';
import { CrawlOutcome, type CookieJar, type CrawlObserver, type PageFetcher } from '../types/index.js';

const BASE = 'https://sinta.example.org/authors/profile/42';

function item(n: number): string {
    return (
        '<div class="ar-list-item">' +
        `<a href="documents/detail/${n}">Publication Number ${n}</a>` +
        `<a class="ar-cited">DOI: 10.100/p${n}</a>` +
        '</div>'
    );
}

function listing(...numbers: number[]): string {
    return `<html><body><div class="ar-list">${numbers.map(item).join('')}</div></body></html>`;
}

function emptyPage(marker: string): string {
    return `<html><body><p>No more publications (${marker})</p></body></html>`;
}

/**
 * Serves the given bodies in order; an Error entry is thrown as a transport failure.
 */
function fakeFetcher(responses: Array<string | Error>): { fetcher: PageFetcher; urls: string[] } {
    const urls: string[] = [];
    const fetcher: PageFetcher = {
        fetchPage: async (url) => {
            const next = responses[urls.length];
            urls.push(url);
            if (next === undefined) throw new Error(`unexpected fetch: ${url}`);
            if (next instanceof Error) throw next;
            return { url, status: 200, body: next };
        },
    };
    return { fetcher, urls };
}

describe('Pagination controller', () => {
    describe('evaluatePage', () => {
        it('should add records and reset the empty streak on a non-empty page', () => {
            const state = createCrawlState();
            state.emptyStreak = 1;
            const { outcome, records } = evaluatePage(state, 2, listing(1, 2));
            expect(outcome).toBe(CrawlOutcome.CONTINUE);
            expect(records).toHaveLength(2);
            expect(state.records).toHaveLength(2);
            expect(state.emptyStreak).toBe(0);
            expect(state.seenFingerprints.has(pageFingerprint(listing(1, 2)))).toBe(true);
        });

        it('should continue after a single empty page', () => {
            const state = createCrawlState();
            expect(evaluatePage(state, 1, emptyPage('a')).outcome).toBe(CrawlOutcome.CONTINUE);
            expect(state.emptyStreak).toBe(1);
        });

        it('should stop on the second consecutive empty page', () => {
            const state = createCrawlState();
            evaluatePage(state, 1, emptyPage('a'));
            expect(evaluatePage(state, 2, emptyPage('b')).outcome).toBe(CrawlOutcome.STOP_EMPTY_STREAK);
            expect(EMPTY_STREAK_LIMIT).toBe(2);
        });

        it('should stop on a repeated body without parsing it', () => {
            const state = createCrawlState();
            const parse = vi.fn(parsePage);
            evaluatePage(state, 1, listing(1), parse);
            const result = evaluatePage(state, 2, listing(1), parse);
            expect(result).toEqual({ outcome: CrawlOutcome.STOP_DUPLICATE, records: [] });
            expect(parse).toHaveBeenCalledTimes(1);
            expect(state.records).toHaveLength(1);
        });

        it('should label records with their page', () => {
            const state = createCrawlState();
            const { records } = evaluatePage(state, 7, listing(1));
            expect(records[0]?.sourcePage).toBe(sourcePageLabel(7));
            expect(sourcePageLabel(7)).toBe('page_7');
        });
    });

    describe('runPagination', () => {
        it('should stop on the second page when it repeats the first', async () => {
            const { fetcher } = fakeFetcher([listing(1, 2), listing(1, 2)]);
            const parse = vi.fn(parsePage);
            const onPage = vi.fn();

            const run = await runPagination(
                { baseUrl: BASE, maxPages: 10, delayMs: 0, observer: { onPage } },
                { fetcher, parse }
            );

            expect(run.outcome).toBe(CrawlOutcome.STOP_DUPLICATE);
            expect(run.reason).toBe(
                'Stopped: page 2 is identical to a previous page (end reached / pagination not changing).'
            );
            expect(run.pagesFetched).toBe(2);
            expect(run.records.map((r) => r.sourcePage)).toEqual(['page_1', 'page_1']);
            expect(parse).toHaveBeenCalledTimes(1);
            expect(onPage).toHaveBeenCalledTimes(1);
        });

        it('should request page 1 without a page parameter and later pages with one', async () => {
            const { fetcher, urls } = fakeFetcher([listing(1), listing(2), listing(2)]);
            await runPagination({ baseUrl: `${BASE}?page=5`, maxPages: 10, delayMs: 0 }, { fetcher });
            expect(urls).toEqual([
                `${BASE}?view=garuda`,
                `${BASE}?view=garuda&page=2`,
                `${BASE}?view=garuda&page=3`,
            ]);
        });

        it('should stop after two consecutive empty pages', async () => {
            const { fetcher } = fakeFetcher([listing(1), emptyPage('a'), emptyPage('b')]);
            const run = await runPagination({ baseUrl: BASE, maxPages: 10, delayMs: 0 }, { fetcher });
            expect(run.outcome).toBe(CrawlOutcome.STOP_EMPTY_STREAK);
            expect(run.reason).toBe('Stopped: 2 pages in a row returned 0 rows.');
            expect(run.pagesFetched).toBe(3);
            expect(run.records).toHaveLength(1);
        });

        it('should reset the streak when a non-empty page intervenes', async () => {
            const { fetcher } = fakeFetcher([
                listing(1),
                emptyPage('a'),
                listing(2, 3),
                emptyPage('b'),
                emptyPage('c'),
            ]);
            const run = await runPagination({ baseUrl: BASE, maxPages: 10, delayMs: 0 }, { fetcher });
            expect(run.outcome).toBe(CrawlOutcome.STOP_EMPTY_STREAK);
            expect(run.pagesFetched).toBe(5);
            expect(run.records.map((r) => r.title)).toEqual([
                'Publication Number 1',
                'Publication Number 2',
                'Publication Number 3',
            ]);
        });

        it('should stop at the page cap', async () => {
            const { fetcher, urls } = fakeFetcher([listing(1), listing(2)]);
            const run = await runPagination({ baseUrl: BASE, maxPages: 2, delayMs: 0 }, { fetcher });
            expect(run.outcome).toBe(CrawlOutcome.STOP_CAP_REACHED);
            expect(run.reason).toBe('Stopped: reached the 2-page cap.');
            expect(urls).toHaveLength(2);
            expect(run.records).toHaveLength(2);
        });

        it('should keep earlier records when a fetch fails', async () => {
            const timeout = new HttpError('Request timeout after 25000ms: x', 0, true);
            const { fetcher } = fakeFetcher([listing(1, 2), timeout]);
            const onStop = vi.fn();

            const run = await runPagination(
                { baseUrl: BASE, maxPages: 10, delayMs: 0, observer: { onStop } },
                { fetcher }
            );

            expect(run.outcome).toBe(CrawlOutcome.STOP_ERROR);
            expect(run.error).toBe(timeout);
            expect(run.reason).toBe('Stopped: request failed on page 2: Request timeout after 25000ms: x');
            expect(run.pagesFetched).toBe(1);
            expect(run.records).toHaveLength(2);
            expect(onStop).toHaveBeenCalledWith({ outcome: CrawlOutcome.STOP_ERROR, reason: run.reason, page: 2 });
        });

        it('should pause between pages but not after the last one', async () => {
            const { fetcher } = fakeFetcher([listing(1), listing(2), listing(1)]);
            const sleep = vi.fn(async () => {});
            await runPagination({ baseUrl: BASE, maxPages: 10, delayMs: 600 }, { fetcher, sleep });
            expect(sleep).toHaveBeenCalledTimes(2);
            expect(sleep).toHaveBeenCalledWith(600);
        });

        it('should not pause when the delay is zero', async () => {
            const { fetcher } = fakeFetcher([listing(1), listing(1)]);
            const sleep = vi.fn(async () => {});
            await runPagination({ baseUrl: BASE, maxPages: 10, delayMs: 0 }, { fetcher, sleep });
            expect(sleep).not.toHaveBeenCalled();
        });

        it('should report every parsed page to the observer', async () => {
            const { fetcher } = fakeFetcher([listing(1, 2), emptyPage('a'), emptyPage('b')]);
            const pages: Array<[number, number, number]> = [];
            const observer: CrawlObserver = {
                onPage: ({ page, rows, status }) => {
                    pages.push([page, rows, status]);
                },
            };
            await runPagination({ baseUrl: BASE, maxPages: 10, delayMs: 0, observer }, { fetcher });
            expect(pages).toEqual([
                [1, 2, 200],
                [2, 0, 200],
                [3, 0, 200],
            ]);
        });

        it('should stop at the next page boundary once cancelled', async () => {
            const { fetcher, urls } = fakeFetcher([listing(1), listing(2)]);
            const controller = new AbortController();
            const observer: CrawlObserver = { onPage: () => controller.abort() };

            const run = await runPagination(
                { baseUrl: BASE, maxPages: 10, delayMs: 0, observer, signal: controller.signal },
                { fetcher }
            );

            expect(run.outcome).toBe(CrawlOutcome.STOP_CANCELLED);
            expect(run.reason).toBe('Stopped: cancelled before page 2.');
            expect(urls).toHaveLength(1);
            expect(run.records).toHaveLength(1);
        });

        it('should carry cookies set during the run without touching the caller jar', async () => {
            const sent: Array<string | undefined> = [];
            const fetcher: PageFetcher = {
                fetchPage: async (url, cookies) => {
                    sent.push(cookies?.get('sid')?.value);
                    cookies?.set('sid', { value: 'rotated-secret', domain: 'sinta.example.org', path: '/' });
                    return { url, status: 200, body: listing(1) };
                },
            };
            const jar: CookieJar = new Map([['sid', { value: 'test-secret', domain: 'sinta.example.org', path: '/' }]]);

            await runPagination({ baseUrl: BASE, cookies: jar, maxPages: 10, delayMs: 0 }, { fetcher });

            expect(sent).toEqual(['test-secret', 'rotated-secret']);
            expect(jar.get('sid')?.value).toBe('test-secret');
        });

        it('should reject a page cap below one before fetching', async () => {
            const { fetcher, urls } = fakeFetcher([listing(1)]);
            await expect(
                runPagination({ baseUrl: BASE, maxPages: 0, delayMs: 0 }, { fetcher })
            ).rejects.toBeInstanceOf(ConfigError);
            expect(urls).toHaveLength(0);
        });

        it('should isolate state between runs', async () => {
            const first = fakeFetcher([listing(1), listing(1)]);
            const second = fakeFetcher([listing(1), listing(1)]);
            const a = await runPagination({ baseUrl: BASE, maxPages: 10, delayMs: 0 }, { fetcher: first.fetcher });
            const b = await runPagination({ baseUrl: BASE, maxPages: 10, delayMs: 0 }, { fetcher: second.fetcher });
            expect(a.records).toHaveLength(1);
            expect(b.records).toHaveLength(1);
            expect(b.pagesFetched).toBe(2);
        });
    });
});
