import { writeFileSync } from 'node:fs';
import ExcelJS from 'exceljs';
import type { Fill, Workbook } from 'exceljs';
import { RESULT_COLUMNS, type ReportFormat, type ResultRecord, type YearFilter } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

// ─── Types ───────────────────────────────────────────────

export interface ReportOptions {
    format: ReportFormat;
    /** RRGGBB, optionally prefixed with '#' */
    highlightColor: string;
}

/** Formats rendered to a string; xlsx goes through {@link buildWorkbook}. */
export type TextReportFormat = Exclude<ReportFormat, 'xlsx'>;

export type ReportResult =
    | { ok: true; path: string; rows: number }
    | { ok: false; reason: 'empty' | 'invalid_color' | 'write_failed'; message: string };

const EXTENSIONS: Record<ReportFormat, string> = {
    xlsx: '.xlsx',
    csv: '.csv',
    html: '.html',
    json: '.json',
};

// ─── Main Export Function ────────────────────────────────

const SHEET_NAME = 'New articles';

/**
 * Upper-case RRGGBB from "RRGGBB" or "#RRGGBB", or null for anything else.
 */
export function parseHighlightColor(color: string): string | null {
    const match = /^#?([0-9a-fA-F]{6})$/.exec(color.trim());
    return match?.[1] ? match[1].toUpperCase() : null;
}

function requireColor(color: string): string {
    const hex = parseHighlightColor(color);
    if (hex === null) {
        throw new Error(`Invalid highlight color: ${JSON.stringify(color)} (expected a 6-digit hex color)`);
    }
    return hex;
}

/**
 * Render result records in a text format. Internal highlight fields never become columns.
 * Throws when the highlight color is not a 6-digit hex value.
 */
export function renderReport(
    records: readonly ResultRecord[],
    options: { format: TextReportFormat; highlightColor: string }
): string {
    switch (options.format) {
        case 'csv':
            return renderCsv(records);
        case 'html':
            return renderHtml(records, requireColor(options.highlightColor));
        case 'json':
            return renderJson(records);
    }
}

/**
 * One worksheet with the visible columns. The Departament cell of every flagged
 * record gets a solid fill in `highlightColor`.
 */
export function buildWorkbook(records: readonly ResultRecord[], highlightColor: string): Workbook {
    const fill: Fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: `FF${requireColor(highlightColor)}` },
    };

    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet(SHEET_NAME);
    sheet.addRow(RESULT_COLUMNS.map((c) => c.header));

    for (const record of records) {
        const row = sheet.addRow(RESULT_COLUMNS.map((c) => record[c.key]));
        if (record.needsHighlight) {
            row.getCell(1).fill = fill;
        }
    }

    return workbook;
}

/**
 * Write a report file. Failures come back as a value instead of being thrown,
 * so the caller decides how to surface them.
 */
export async function writeReport(
    records: readonly ResultRecord[],
    outputPath: string,
    options: ReportOptions
): Promise<ReportResult> {
    if (records.length === 0) {
        return { ok: false, reason: 'empty', message: 'No records to export' };
    }

    const color = parseHighlightColor(options.highlightColor);
    if (color === null) {
        return { ok: false, reason: 'invalid_color', message: `Invalid highlight color: ${options.highlightColor}` };
    }

    try {
        if (options.format === 'xlsx') {
            await buildWorkbook(records, color).xlsx.writeFile(outputPath);
        } else {
            writeFileSync(outputPath, renderReport(records, { format: options.format, highlightColor: color }), 'utf-8');
        }
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        getLogger().error({ outputPath, error: message }, 'Report export failed');
        return { ok: false, reason: 'write_failed', message };
    }

    const highlighted = records.filter((r) => r.needsHighlight).length;
    getLogger().info({ format: options.format, outputPath, rows: records.length, highlighted }, 'Report exported');
    return { ok: true, path: outputPath, rows: records.length };
}

/**
 * new_articles_<years>_<YYYY-MM-DD_HH-mm-ss>.<ext>, years sorted and joined with '-'.
 */
export function defaultReportName(yearFilter: YearFilter, now: Date, format: ReportFormat): string {
    let years: string;
    if (yearFilter === null || (typeof yearFilter !== 'number' && yearFilter.length === 0)) {
        years = 'all_years';
    } else if (typeof yearFilter === 'number') {
        years = String(yearFilter);
    } else {
        years = [...yearFilter].sort((a, b) => a - b).join('-');
    }

    const pad = (n: number) => String(n).padStart(2, '0');
    const stamp =
        `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}` +
        `_${pad(now.getHours())}-${pad(now.getMinutes())}-${pad(now.getSeconds())}`;

    return `new_articles_${years}_${stamp}${EXTENSIONS[format]}`;
}

// ─── Format Implementations ─────────────────────────────

function cellText(record: ResultRecord, key: (typeof RESULT_COLUMNS)[number]['key']): string {
    const value = record[key];
    return value === null ? '' : String(value);
}

function renderCsv(records: readonly ResultRecord[]): string {
    const quote = (s: string) => (/[",\n\r]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s);

    let csv = RESULT_COLUMNS.map((c) => quote(c.header)).join(',') + '\n';
    for (const record of records) {
        csv += RESULT_COLUMNS.map((c) => quote(cellText(record, c.key))).join(',') + '\n';
    }
    return csv;
}

/** `highlightColor` is already validated RRGGBB. */
function renderHtml(records: readonly ResultRecord[], highlightColor: string): string {
    const esc = (s: string) =>
        s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
    const fill = `background-color:#${highlightColor}`;

    let html = `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<title>New articles</title>
<style>
  table { border-collapse: collapse; font-family: sans-serif; font-size: 12px; }
  th, td { border: 1px solid #ccc; padding: 4px 6px; vertical-align: top; }
  th { background: #f3f4f6; }
</style>
</head>
<body>
<table>
  <thead>
    <tr>${RESULT_COLUMNS.map((c) => `<th>${esc(c.header)}</th>`).join('')}</tr>
  </thead>
  <tbody>
`;

    for (const record of records) {
        const cells = RESULT_COLUMNS.map((c) => {
            const style = c.key === 'department' && record.needsHighlight
                ? ` style="${fill}" data-reason="${record.highlightReason}"`
                : '';
            return `<td${style}>${esc(cellText(record, c.key))}</td>`;
        });
        html += `    <tr>${cells.join('')}</tr>\n`;
    }

    html += `  </tbody>
</table>
</body>
</html>
`;

    return html;
}

function renderJson(records: readonly ResultRecord[]): string {
    return JSON.stringify(
        records.map((record) => {
            const row: Record<string, string | number | null> = {};
            for (const column of RESULT_COLUMNS) {
                row[column.header] = record[column.key];
            }
            return { ...row, highlight: record.highlightReason };
        }),
        null,
        2
    );
}
