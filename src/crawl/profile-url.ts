import { ConfigError } from '../utils/errors.js';

/**
 * Query parameter selecting the listing view that carries accreditation
 * metadata ("Accred: Sinta N") on every item.
 */
export const VIEW_PARAM = 'view';
export const VIEW_VALUE = 'garuda';
export const PAGE_PARAM = 'page';

function parseProfileUrl(input: string): URL {
    const trimmed = input.trim();
    if (!trimmed) {
        throw new ConfigError('Please provide a profile URL');
    }

    let url: URL;
    try {
        url = new URL(trimmed);
    } catch (error) {
        throw new ConfigError(`Invalid profile URL: ${trimmed}`, { cause: error });
    }

    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        throw new ConfigError(`Profile URL must use http or https: ${trimmed}`);
    }
    return url;
}

/**
 * Canonical first-page URL: garuda view forced, any page parameter removed.
 * Other query parameters and the fragment are kept.
 */
export function normalizeProfileUrl(input: string): string {
    const url = parseProfileUrl(input);
    url.searchParams.set(VIEW_PARAM, VIEW_VALUE);
    url.searchParams.delete(PAGE_PARAM);
    return url.toString();
}

/**
 * URL of listing page `page` (1-based). Page 1 carries no page parameter.
 */
export function pageUrl(baseUrl: string, page: number): string {
    const url = parseProfileUrl(baseUrl);
    url.searchParams.set(VIEW_PARAM, VIEW_VALUE);
    if (page > 1) {
        url.searchParams.set(PAGE_PARAM, String(page));
    } else {
        url.searchParams.delete(PAGE_PARAM);
    }
    return url.toString();
}
