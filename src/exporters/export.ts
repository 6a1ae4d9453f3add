import { writeFileSync } from 'node:fs';
import type { BibRecord, ExportFormat } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

// ─── Types ───────────────────────────────────────────────

/** Column names of the export, in order. */
export const EXPORT_COLUMNS = [
    'No',
    'Judul Artikel',
    'Tahun',
    'Authors',
    'Nama Jurnal',
    'Sinta',
    'DOI',
    'SourceFile',
] as const;

export type ExportColumn = (typeof EXPORT_COLUMNS)[number];

export type ExportRow = Record<ExportColumn, string>;

export const CSV_DELIMITER = ';';

// ─── Rows ────────────────────────────────────────────────

/**
 * Map records to export rows; `No` is the 1-based position in the final table.
 */
export function toExportRows(records: readonly BibRecord[]): ExportRow[] {
    return records.map((record, index) => ({
        'No': String(index + 1),
        'Judul Artikel': record.title,
        'Tahun': record.year,
        'Authors': record.authors,
        'Nama Jurnal': record.journal,
        'Sinta': record.tier,
        'DOI': record.doi,
        'SourceFile': record.sourcePage,
    }));
}

// ─── Format Implementations ─────────────────────────────

/**
 * Quote a field only when it contains the delimiter, a quote, or a line break.
 */
export function escapeField(value: string, delimiter: string = CSV_DELIMITER): string {
    const needsQuotes = value.includes(delimiter) || /["\r\n]/.test(value);
    return needsQuotes ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Delimiter-separated text with a header row and one line per record.
 */
export function exportDelimited(records: readonly BibRecord[], delimiter: string = CSV_DELIMITER): string {
    const lines = [EXPORT_COLUMNS.join(delimiter)];
    for (const row of toExportRows(records)) {
        lines.push(EXPORT_COLUMNS.map((column) => escapeField(row[column], delimiter)).join(delimiter));
    }
    return lines.join('\n') + '\n';
}

export function exportJson(records: readonly BibRecord[]): string {
    return JSON.stringify(toExportRows(records), null, 2) + '\n';
}

// ─── Main Export Function ────────────────────────────────

export function renderRecords(records: readonly BibRecord[], format: ExportFormat): string {
    switch (format) {
        case 'csv':
            return exportDelimited(records);
        case 'json':
            return exportJson(records);
    }
}

/**
 * Write the final record table to `outputPath` as UTF-8.
 */
export function exportRecords(
    records: readonly BibRecord[],
    outputPath: string,
    format: ExportFormat
): void {
    writeFileSync(outputPath, renderRecords(records, format), 'utf-8');
    getLogger().info({ format, outputPath, rows: records.length }, 'Records exported');
}
