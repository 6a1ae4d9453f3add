import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { ExtractedFields } from '../types/index.js';
import {
    normalizeText,
    nodeText,
    extractYear,
    extractDoi,
    extractTier,
    isNoiseLinkText,
    YEAR_PATTERN,
} from './text.js';

// ─── Item context ────────────────────────────────────────

/**
 * One listing item, loaded once and shared by every extractor.
 */
export interface ItemContext {
    $: CheerioAPI;
    item: Cheerio<Element>;
    /** Item text, text nodes joined by single spaces */
    text: string;
    /** Item text split into non-empty trimmed lines, one per text node */
    lines: string[];
}

export function createItemContext($: CheerioAPI, element: Element): ItemContext {
    const lines = nodeText(element, '\n')
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.length > 0);

    return {
        $,
        item: $(element),
        text: nodeText(element, ' '),
        lines,
    };
}

/**
 * Load a standalone item fragment (its first top-level element).
 */
export function loadItem(fragment: string): ItemContext {
    const $ = cheerio.load(fragment);
    const element = $('body').children().get(0) ?? $('body').get(0);
    if (!element) {
        throw new Error('Item fragment has no element');
    }
    return createItemContext($, element);
}

// ─── Attempt chains ──────────────────────────────────────

/**
 * One strategy for a field. `undefined` falls through to the next strategy;
 * any string (even '') settles the field.
 */
export type FieldAttempt = (ctx: ItemContext) => string | undefined;

export function runAttempts(ctx: ItemContext, attempts: readonly FieldAttempt[]): string {
    for (const attempt of attempts) {
        const value = attempt(ctx);
        if (value !== undefined) return normalizeText(value);
    }
    return '';
}

const DETAIL_HREF = /documents\/detail\//i;
const MIN_TITLE_LENGTH = 8;
const VOLUME_TOKEN = /(?<![\p{L}\p{N}_])(?:Vol|No|Volume)(?![\p{L}\p{N}_])/u;
const AUTHOR_ORDER = /(?<![\p{L}\p{N}_])Author Order(?![\p{L}\p{N}_])/iu;
const AUTHOR_ORDER_LABEL = /Author Order\s*:\s*\d+\s*of\s*\d+\s*/gi;
const AUTHOR_CUT_MARKERS = [YEAR_PATTERN, /(?<![\p{L}\p{N}_])DOI\s*:/iu, /(?<![\p{L}\p{N}_])Accred\s*:/iu];
const AUTHOR_EDGE_SEPARATORS = /^[ \-–—|]+|[ \-–—|]+$/g;
const SINGLE_AUTHOR_SHAPE =
    /^[A-Za-zÀ-ÖØ-öø-ÿ'’.\- ]+,\s*[A-Za-zÀ-ÖØ-öø-ÿ'’.\- ]+$/;

// Title

const titleFromDetailLink: FieldAttempt = ({ $, item }) => {
    const link = item
        .find('a[href]')
        .filter((_, a) => DETAIL_HREF.test($(a).attr('href') ?? ''))
        .get(0);
    return link ? nodeText(link) : undefined;
};

const titleFromAnyLink: FieldAttempt = ({ item }) => {
    for (const link of item.find('a[href]').toArray()) {
        const text = normalizeText(nodeText(link));
        if (text.length < MIN_TITLE_LENGTH || isNoiseLinkText(text)) continue;
        return text;
    }
    return undefined;
};

// Journal

const journalFromPubLink: FieldAttempt = ({ item }) => {
    const pub = item.find('a.ar-pub').get(0);
    return pub ? nodeText(pub) : undefined;
};

const journalFromVolumeLine: FieldAttempt = ({ lines }) =>
    lines.find((line) => VOLUME_TOKEN.test(line));

// Year

const yearFromYearLink: FieldAttempt = ({ item }) => {
    const year = item.find('a.ar-year').get(0);
    return year ? extractYear(nodeText(year)) : undefined;
};

const yearFromItemText: FieldAttempt = ({ text }) => extractYear(text);

// DOI

const doiFromCitedLink: FieldAttempt = ({ item }) => {
    const cited = item.find('a.ar-cited').get(0);
    if (!cited) return undefined;
    return extractDoi(nodeText(cited)) || undefined;
};

const doiFromItemText: FieldAttempt = ({ text }) => extractDoi(text);

// Tier

const tierFromItemText: FieldAttempt = ({ text }) => extractTier(text);

// Authors

/**
 * Pull the author list out of an "Author Order: X of Y …" metadata line.
 * Returns '' when the remainder does not look like a list of names.
 */
export function extractAuthorsFromMeta(metaText: string): string {
    const text = normalizeText(metaText).replace(AUTHOR_ORDER_LABEL, '').trim();

    let cut = text.length;
    for (const marker of AUTHOR_CUT_MARKERS) {
        const match = marker.exec(text);
        if (match) cut = Math.min(cut, match.index);
    }

    const authors = normalizeText(text.slice(0, cut).replace(AUTHOR_EDGE_SEPARATORS, ''));
    if (!authors) return '';

    if (!authors.includes(';') && !authors.includes(',') && !SINGLE_AUTHOR_SHAPE.test(authors)) {
        return '';
    }
    return authors;
}

const authorsFromMetaBlock: FieldAttempt = ({ item }) => {
    const meta = item
        .find('div.ar-meta')
        .toArray()
        .find((div) => AUTHOR_ORDER.test(nodeText(div)));
    if (!meta) return undefined;
    return extractAuthorsFromMeta(nodeText(meta)) || undefined;
};

const authorsFromLinkList: FieldAttempt = ({ item }) => {
    for (const link of item.find('a').toArray()) {
        const text = normalizeText(nodeText(link));
        if (!text || isNoiseLinkText(text)) continue;
        if (text.includes(';')) return text;
    }
    return undefined;
};

// ─── Field extractors ───────────────────────────────────

const TITLE_ATTEMPTS = [titleFromDetailLink, titleFromAnyLink] as const;
const JOURNAL_ATTEMPTS = [journalFromPubLink, journalFromVolumeLine] as const;
const YEAR_ATTEMPTS = [yearFromYearLink, yearFromItemText] as const;
const DOI_ATTEMPTS = [doiFromCitedLink, doiFromItemText] as const;
const TIER_ATTEMPTS = [tierFromItemText] as const;
const AUTHORS_ATTEMPTS = [authorsFromMetaBlock, authorsFromLinkList] as const;

export const extractTitle = (ctx: ItemContext): string => runAttempts(ctx, TITLE_ATTEMPTS);
export const extractJournal = (ctx: ItemContext): string => runAttempts(ctx, JOURNAL_ATTEMPTS);
export const extractItemYear = (ctx: ItemContext): string => runAttempts(ctx, YEAR_ATTEMPTS);
export const extractItemDoi = (ctx: ItemContext): string => runAttempts(ctx, DOI_ATTEMPTS);
export const extractItemTier = (ctx: ItemContext): string => runAttempts(ctx, TIER_ATTEMPTS);
export const extractAuthors = (ctx: ItemContext): string => runAttempts(ctx, AUTHORS_ATTEMPTS);

/**
 * Run all six extractors on one item.
 */
export function extractFields(ctx: ItemContext): ExtractedFields {
    return {
        title: extractTitle(ctx),
        year: extractItemYear(ctx),
        authors: extractAuthors(ctx),
        journal: extractJournal(ctx),
        tier: extractItemTier(ctx),
        doi: extractItemDoi(ctx),
    };
}
