import * as cheerio from 'cheerio';
import type { BibRecord, ExtractedFields } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { createItemContext, extractFields } from './fields.js';

/** Listing items on a profile page in the garuda view. */
export const LIST_ITEM_SELECTOR = 'div.ar-list-item';

/**
 * A record is kept only when it carries a title, a DOI, or a journal.
 * Anything else is a malformed or decorative list item.
 */
export function isValidRecord(fields: ExtractedFields): boolean {
    return Boolean(fields.title || fields.doi || fields.journal);
}

/**
 * Parse one listing page into records, in document order.
 *
 * @param html - Raw page body
 * @param sourcePage - Provenance label stored on every record (e.g. "page_2")
 */
export function parsePage(html: string, sourcePage: string): BibRecord[] {
    const $ = cheerio.load(html);
    const items = $(LIST_ITEM_SELECTOR).toArray();
    const records: BibRecord[] = [];

    for (const element of items) {
        const fields = extractFields(createItemContext($, element));
        if (!isValidRecord(fields)) continue;
        records.push({ ...fields, sourcePage });
    }

    getLogger().debug(
        { sourcePage, items: items.length, records: records.length },
        'Page parsed'
    );

    return records;
}
