import type { BibRecord, DedupKey } from '../types/index.js';
import { normalizeText } from '../extract/text.js';

/**
 * Identity of a record: its lowercased DOI when it has one, otherwise the
 * exact lowercased (title, year, journal, authors) tuple.
 */
export function dedupKey(record: BibRecord): DedupKey {
    const doi = normalizeText(record.doi);
    if (doi) {
        return { kind: 'doi', value: doi.toLowerCase() };
    }
    return {
        kind: 'meta',
        values: [
            normalizeText(record.title).toLowerCase(),
            normalizeText(record.year).toLowerCase(),
            normalizeText(record.journal).toLowerCase(),
            normalizeText(record.authors).toLowerCase(),
        ],
    };
}

/**
 * Serialize a key for map/set lookup. JSON keeps field boundaries unambiguous
 * whatever characters the fields contain.
 */
export function dedupKeyString(key: DedupKey): string {
    return key.kind === 'doi'
        ? JSON.stringify(['doi', key.value])
        : JSON.stringify(['meta', ...key.values]);
}

/**
 * Collapse duplicates, keeping the first record seen for each key and the
 * relative order of the kept records.
 *
 * Metadata matching is exact: records that differ by any character in title,
 * year, journal or authors stay distinct.
 */
export function dedupRecords(records: readonly BibRecord[]): BibRecord[] {
    const seen = new Set<string>();
    const kept: BibRecord[] = [];

    for (const record of records) {
        const key = dedupKeyString(dedupKey(record));
        if (seen.has(key)) continue;
        seen.add(key);
        kept.push(record);
    }

    return kept;
}
