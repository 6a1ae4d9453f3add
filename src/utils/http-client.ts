import type { CookieJar, FetchedPage, PageFetcher } from '../types/index.js';
import { cookieHeaderFor, storeSetCookies } from './cookies.js';
import { getLogger } from './logger.js';
import { sleep } from './sleep.js';

/**
 * Error classification for transport failures.
 */
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * HTTP client options.
 */
export interface HttpClientOptions {
    /** Per-request timeout in milliseconds, body read included */
    timeout?: number;
    /** Retries for retryable network errors (0 = fail on first error) */
    maxRetries?: number;
    userAgent?: string;
    acceptLanguage?: string;
}

/**
 * Transport failure: timeout, connection error, or unreadable body.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'HttpError';
    }
}

/**
 * Walk an error and its causes for a Node/undici error code.
 */
function errorCode(error: unknown): string | undefined {
    if (!(error instanceof Error)) return undefined;
    const code = 'code' in error ? error.code : undefined;
    if (typeof code === 'string') return code;
    return error.cause === undefined ? undefined : errorCode(error.cause);
}

function isAbort(error: unknown): boolean {
    return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * Session-style HTML client: fixed browser headers, cookies from a jar,
 * a per-request timeout and optional retry of network errors.
 *
 * HTTP error statuses are returned to the caller; only transport failures throw.
 */
export class HttpClient implements PageFetcher {
    private requestCount = 0;
    private readonly timeout: number;
    private readonly maxRetries: number;
    private readonly headers: Record<string, string>;

    constructor(options: HttpClientOptions = {}) {
        this.timeout = options.timeout ?? 25000;
        this.maxRetries = Math.max(0, options.maxRetries ?? 0);
        this.headers = {
            'User-Agent': options.userAgent ?? 'Mozilla/5.0',
            'Accept-Language': options.acceptLanguage ?? 'en-US,en;q=0.9,id;q=0.8',
        };
    }

    async fetchPage(url: string, cookies?: CookieJar): Promise<FetchedPage> {
        const requestHeaders: Record<string, string> = { ...this.headers };
        const cookieHeader = cookieHeaderFor(url, cookies);
        if (cookieHeader) {
            requestHeaders['Cookie'] = cookieHeader;
        }

        const initialBackoff = 1000;
        const maxBackoff = 30000;

        for (let attempt = 0; ; attempt++) {
            this.requestCount++;
            try {
                return await this.fetchOnce(url, requestHeaders, cookies);
            } catch (error) {
                const httpError = this.classify(error, url);
                if (httpError.retryable && attempt < this.maxRetries) {
                    const backoff = this.calculateBackoff(attempt, initialBackoff, maxBackoff);
                    getLogger().warn(
                        { error: httpError.message, attempt: attempt + 1, backoffMs: backoff, url },
                        'Retryable network error, backing off'
                    );
                    await sleep(backoff);
                    continue;
                }
                throw httpError;
            }
        }
    }

    /**
     * Number of requests issued, retries included.
     */
    getRequestCount(): number {
        return this.requestCount;
    }

    private async fetchOnce(
        url: string,
        headers: Record<string, string>,
        cookies?: CookieJar
    ): Promise<FetchedPage> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.timeout);

        try {
            const response = await fetch(url, {
                method: 'GET',
                headers,
                redirect: 'follow',
                signal: controller.signal,
            });

            let body: string;
            try {
                body = await response.text();
            } catch (error) {
                if (isAbort(error)) throw error;
                throw new HttpError(`Unreadable response body from ${url}`, response.status, false, { cause: error });
            }

            if (cookies) {
                storeSetCookies(cookies, response.headers.getSetCookie(), response.url || url);
            }

            if (!response.ok) {
                getLogger().warn({ status: response.status, url }, 'Non-success HTTP status');
            }

            return { url: response.url || url, status: response.status, body };
        } finally {
            clearTimeout(timeoutId);
        }
    }

    private classify(error: unknown, url: string): HttpError {
        if (error instanceof HttpError) return error;

        if (isAbort(error)) {
            return new HttpError(`Request timeout after ${this.timeout}ms: ${url}`, 0, true, { cause: error });
        }

        const code = errorCode(error);
        const retryable = code ? RETRYABLE_ERROR_CODES.has(code) : false;
        return new HttpError(
            `Network error: ${error instanceof Error ? error.message : String(error)}`,
            0,
            retryable,
            { cause: error }
        );
    }

    private calculateBackoff(attempt: number, initial: number, max: number): number {
        // Exponential backoff with jitter
        const exponential = initial * Math.pow(2, attempt);
        const jitter = Math.random() * exponential * 0.5;
        return Math.min(max, exponential + jitter);
    }
}

/**
 * Create a new HTTP client.
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
