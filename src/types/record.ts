/**
 * BibRecord — one bibliographic entry extracted from a profile listing item.
 * Every field is a normalized string; a field the extractors could not
 * recover is the empty string.
 */
export interface BibRecord {
    /** Article title */
    title: string;

    /** Four-digit publication year (1900–2099) */
    year: string;

    /** Author list as printed, usually semicolon-separated "Lastname, F." names */
    authors: string;

    /** Journal / venue line, often including volume and issue */
    journal: string;

    /** Accreditation tier, a single digit 1–6 */
    tier: string;

    /** DOI as printed on the listing (compared lowercased) */
    doi: string;

    /** Page the record was extracted from (provenance only, e.g. "page_3") */
    sourcePage: string;
}

/** Fields produced by the extractors, before provenance is attached. */
export type ExtractedFields = Omit<BibRecord, 'sourcePage'>;

/**
 * Identity of a record for deduplication.
 * A DOI, when present, takes precedence over metadata.
 */
export type DedupKey =
    | { kind: 'doi'; value: string }
    | { kind: 'meta'; values: [title: string, year: string, journal: string, authors: string] };
