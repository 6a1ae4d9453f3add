/**
 * Barrel export for all shared types.
 */
export type { BibRecord, ExtractedFields, DedupKey } from './record.js';
export { CrawlOutcome } from './crawl.js';
export type {
    CookieEntry,
    CookieJar,
    FetchedPage,
    PageFetcher,
    CrawlState,
    PageProgress,
    CrawlStop,
    CrawlObserver,
    CrawlRun,
} from './crawl.js';
export { DEFAULT_CONFIG, LOG_LEVELS, EXPORT_FORMATS } from './config.js';
export type { HarvestConfig, LogLevel, ExportFormat } from './config.js';
