import { createHash } from 'node:crypto';

/**
 * Digest of a fetched page body, compared only within one crawl run.
 */
export function pageFingerprint(body: string): string {
    return createHash('sha256').update(body, 'utf8').digest('hex');
}
