export * from './types/index.js';
export { normalizeText, nodeText, extractYear, extractDoi, extractTier } from './extract/text.js';
export {
    loadItem,
    createItemContext,
    extractFields,
    extractTitle,
    extractJournal,
    extractItemYear,
    extractItemDoi,
    extractItemTier,
    extractAuthors,
    extractAuthorsFromMeta,
} from './extract/fields.js';
export type { ItemContext, FieldAttempt } from './extract/fields.js';
export { parsePage, isValidRecord, LIST_ITEM_SELECTOR } from './extract/item-parser.js';
export { dedupKey, dedupKeyString, dedupRecords } from './dedup/dedup.js';
export { normalizeProfileUrl, pageUrl } from './crawl/profile-url.js';
export { pageFingerprint } from './crawl/fingerprint.js';
export {
    EMPTY_STREAK_LIMIT,
    createCrawlState,
    evaluatePage,
    runPagination,
} from './crawl/pagination.js';
export type { PaginationOptions, PaginationDeps, PageParser } from './crawl/pagination.js';
export { harvestProfile, harvestFromConfig, harvestFiles } from './harvest/harvester.js';
export type { HarvestOptions, HarvestDeps, HarvestReport, FileHarvestReport } from './harvest/harvester.js';
export { EXPORT_COLUMNS, exportDelimited, exportJson, exportRecords, renderRecords } from './exporters/export.js';
export { parseCookieJson, loadCookieFile, cookieHeaderFor, storeSetCookies } from './utils/cookies.js';
export { HttpClient, HttpError, createHttpClient } from './utils/http-client.js';
export { ConfigError } from './utils/errors.js';
export { resolveConfig, validateConfig } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
