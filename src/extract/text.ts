import { hasChildren, isTag, isText, type AnyNode } from 'domhandler';

/**
 * Text helpers shared by the field extractors.
 */

// Whole-word edges: a letter in any script, a digit or '_' on either side
// means the token is part of a longer word.
export const YEAR_PATTERN = /(?<![\p{L}\p{N}_])(19\d{2}|20\d{2})(?![\p{L}\p{N}_])/u;
const DOI_PATTERN = /(?<![\p{L}\p{N}_])DOI\s*:\s*([^\s<]+)/iu;
const TIER_PATTERN = /Accred\s*:\s*Sinta\s*(\d)/i;
const VOLUME_TOKEN_LOWER = /(?<![\p{L}\p{N}_])(?:vol|no|volume)(?![\p{L}\p{N}_])/u;
const DOI_PLACEHOLDERS = new Set(['-', '—', 'n/a', 'na']);
const SKIPPED_TAGS = new Set(['script', 'style']);

/**
 * Collapse every whitespace run (newlines included) to a single space and trim.
 */
export function normalizeText(text: string | null | undefined): string {
    return (text ?? '').replace(/\s+/g, ' ').trim();
}

/**
 * Collect the descendant text of a node: each text node trimmed, empty ones
 * dropped, the rest joined with `separator`.
 *
 * Joining per text node keeps adjacent inline elements from gluing their
 * words together ("Title" + "2021" never becomes "Title2021").
 */
export function nodeText(node: AnyNode, separator = ' '): string {
    const parts: string[] = [];
    collectText(node, parts);
    return parts.join(separator);
}

function collectText(node: AnyNode, parts: string[]): void {
    if (isText(node)) {
        const trimmed = node.data.trim();
        if (trimmed) parts.push(trimmed);
        return;
    }
    if (isTag(node) && SKIPPED_TAGS.has(node.name)) return;
    if (hasChildren(node)) {
        for (const child of node.children) {
            collectText(child, parts);
        }
    }
}

/**
 * First 1900–2099 whole-word year token, or ''.
 */
export function extractYear(text: string): string {
    return YEAR_PATTERN.exec(text)?.[1] ?? '';
}

/**
 * Token following a "DOI:" label, or '' when missing or a placeholder.
 */
export function extractDoi(text: string): string {
    const doi = DOI_PATTERN.exec(text)?.[1]?.trim() ?? '';
    return DOI_PLACEHOLDERS.has(doi.toLowerCase()) ? '' : doi;
}

/**
 * Accreditation digit following "Accred: Sinta", or ''.
 */
export function extractTier(text: string): string {
    return TIER_PATTERN.exec(text)?.[1] ?? '';
}

/**
 * Link text that is never a title or an author list: metadata labels and
 * volume/issue lines.
 */
export function isNoiseLinkText(text: string): boolean {
    const low = text.toLowerCase();
    if (low.includes('author order') || low.includes('accred') || low.includes('doi:')) {
        return true;
    }
    return VOLUME_TOKEN_LOWER.test(low);
}
