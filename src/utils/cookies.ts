import { readFileSync } from 'node:fs';
import type { CookieJar } from '../types/index.js';
import { ConfigError } from './errors.js';

/**
 * Session cookies exported from a logged-in browser.
 *
 * Accepts either shape:
 * - a bare array (browser export style): [{ "name", "value", "domain", "path" }]
 * - an object wrapping it: { "cookies": [...] }
 */

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hostOf(baseUrl: string): string {
    try {
        return new URL(baseUrl).hostname;
    } catch (error) {
        throw new ConfigError(`Invalid profile URL: ${baseUrl}`, { cause: error });
    }
}

function asText(value: unknown): string {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return '';
}

/**
 * Parse cookie JSON into a jar keyed by cookie name.
 * Entries without a name are skipped; a missing domain falls back to the
 * profile host and a missing path to "/". Later entries replace earlier ones
 * with the same name.
 */
export function parseCookieJson(json: string, baseUrl: string): CookieJar {
    let data: unknown;
    try {
        data = JSON.parse(json);
    } catch (error) {
        throw new ConfigError(
            `Cookie JSON is malformed: ${error instanceof Error ? error.message : String(error)}`,
            { cause: error }
        );
    }

    const cookies = isObject(data) && 'cookies' in data ? data['cookies'] : data;
    if (!Array.isArray(cookies)) {
        throw new ConfigError("Cookie JSON must be a list or {'cookies':[...]}");
    }

    const host = hostOf(baseUrl);
    const jar: CookieJar = new Map();

    for (const cookie of cookies) {
        if (!isObject(cookie)) continue;
        const name = asText(cookie['name']);
        if (!name) continue;

        jar.set(name, {
            value: asText(cookie['value']),
            domain: asText(cookie['domain']) || host,
            path: asText(cookie['path']) || '/',
        });
    }

    return jar;
}

/**
 * Read and parse a cookie file.
 */
export function loadCookieFile(filePath: string, baseUrl: string): CookieJar {
    let raw: string;
    try {
        raw = readFileSync(filePath, 'utf-8');
    } catch (error) {
        throw new ConfigError(`Cannot read cookie file: ${filePath}`, { cause: error });
    }
    return parseCookieJson(raw, baseUrl);
}

function domainMatches(host: string, domain: string): boolean {
    const bare = domain.replace(/^\./, '').toLowerCase();
    const target = host.toLowerCase();
    return target === bare || target.endsWith(`.${bare}`);
}

function pathMatches(requestPath: string, cookiePath: string): boolean {
    if (cookiePath === '/' || requestPath === cookiePath) return true;
    const prefix = cookiePath.endsWith('/') ? cookiePath : `${cookiePath}/`;
    return requestPath.startsWith(prefix);
}

/**
 * Build the Cookie header for a request, or undefined when no cookie applies.
 */
export function cookieHeaderFor(url: string, jar: CookieJar | undefined): string | undefined {
    if (!jar || jar.size === 0) return undefined;

    const { hostname, pathname } = new URL(url);
    const pairs: string[] = [];
    for (const [name, cookie] of jar) {
        if (domainMatches(hostname, cookie.domain) && pathMatches(pathname, cookie.path)) {
            pairs.push(`${name}=${cookie.value}`);
        }
    }

    return pairs.length > 0 ? pairs.join('; ') : undefined;
}

/**
 * Store `Set-Cookie` replies into the jar, the way a browser session would
 * between page requests. A cookie without a Domain attribute is scoped to the
 * responding host; Max-Age <= 0 or a past Expires removes it.
 */
export function storeSetCookies(
    jar: CookieJar,
    setCookies: readonly string[],
    responseUrl: string,
    now: Date = new Date()
): void {
    const host = new URL(responseUrl).hostname;

    for (const header of setCookies) {
        const [pair = '', ...attributes] = header.split(';');
        const eq = pair.indexOf('=');
        if (eq <= 0) continue;
        const name = pair.slice(0, eq).trim();
        if (!name) continue;

        let domain = host;
        let path = '/';
        let expired = false;
        for (const attribute of attributes) {
            const [rawKey = '', ...rest] = attribute.split('=');
            const key = rawKey.trim().toLowerCase();
            const value = rest.join('=').trim();
            if (key === 'domain' && value) domain = value;
            else if (key === 'path' && value.startsWith('/')) path = value;
            else if (key === 'max-age' && value !== '' && Number(value) <= 0) expired = true;
            else if (key === 'expires') {
                const expires = Date.parse(value);
                if (!Number.isNaN(expires) && expires <= now.getTime()) expired = true;
            }
        }

        if (expired) {
            jar.delete(name);
        } else {
            jar.set(name, { value: pair.slice(eq + 1).trim(), domain, path });
        }
    }
}
