import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import ExcelJS from 'exceljs';
import type { Worksheet } from 'exceljs';
import {
    createReferenceRecord,
    createSourceRecord,
    type DepartmentMappingEntry,
    type ReferenceRecord,
    type SourceRecord,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/** Header → cell text */
export type TableRow = Record<string, string>;

export class TableLoadError extends Error {
    constructor(
        message: string,
        public readonly path: string,
        options?: ErrorOptions
    ) {
        super(message, options);
        this.name = 'TableLoadError';
    }
}

// ─── Parsing ─────────────────────────────────────────────

/**
 * Parse RFC 4180 CSV text. The first row is the header; a leading BOM is dropped.
 * Quoted fields may contain commas, doubled quotes and line breaks.
 */
export function parseCsv(text: string): TableRow[] {
    const rows: string[][] = [];
    let row: string[] = [];
    let field = '';
    let inQuotes = false;

    const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

    for (let i = 0; i < input.length; i++) {
        const ch = input.charAt(i);

        if (inQuotes) {
            if (ch === '"') {
                if (input.charAt(i + 1) === '"') {
                    field += '"';
                    i++;
                } else {
                    inQuotes = false;
                }
            } else {
                field += ch;
            }
            continue;
        }

        switch (ch) {
            case '"':
                inQuotes = true;
                break;
            case ',':
                row.push(field);
                field = '';
                break;
            case '\r':
                break;
            case '\n':
                row.push(field);
                rows.push(row);
                row = [];
                field = '';
                break;
            default:
                field += ch;
        }
    }

    if (field.length > 0 || row.length > 0) {
        row.push(field);
        rows.push(row);
    }

    const [header, ...body] = rows;
    if (!header) return [];

    const headers = header.map((h) => h.trim());
    return body
        .filter((cells) => cells.some((c) => c.trim().length > 0))
        .map((cells) => {
            const out: TableRow = {};
            headers.forEach((h, idx) => {
                out[h] = cells[idx] ?? '';
            });
            return out;
        });
}

/**
 * Parse a JSON array of flat row objects. Non-string cells are stringified; null becomes ''.
 */
export function parseJsonRows(text: string): TableRow[] {
    const data: unknown = JSON.parse(text);
    if (!Array.isArray(data)) {
        throw new Error('Expected a JSON array of rows');
    }

    return data.map((item: unknown, idx) => {
        if (typeof item !== 'object' || item === null || Array.isArray(item)) {
            throw new Error(`Row ${idx} is not an object`);
        }
        const out: TableRow = {};
        for (const [key, value] of Object.entries(item)) {
            out[key.trim()] = value === null || value === undefined ? '' : String(value);
        }
        return out;
    });
}

/**
 * Rows of a worksheet, keyed by the header cells of its first row. Cells are read as
 * their display text, so a numeric Year of 2024 comes back as "2024".
 * Rows with no text under any header are skipped.
 */
function worksheetRows(sheet: Worksheet): TableRow[] {
    const headers = new Map<number, string>();
    sheet.getRow(1).eachCell((cell, col) => {
        const header = cell.text.trim();
        if (header) headers.set(col, header);
    });

    const rows: TableRow[] = [];
    sheet.eachRow((row, rowNumber) => {
        if (rowNumber === 1) return;
        const out: TableRow = {};
        let blank = true;
        for (const [col, header] of headers) {
            const text = row.getCell(col).text;
            if (text.trim() !== '') blank = false;
            out[header] = text;
        }
        if (!blank) rows.push(out);
    });
    return rows;
}

async function readWorkbook(path: string, sheetName: string | undefined): Promise<TableRow[]> {
    const workbook = new ExcelJS.Workbook();
    try {
        await workbook.xlsx.readFile(path);
    } catch (error) {
        throw new TableLoadError(`Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`, path, { cause: error });
    }

    const sheet = sheetName === undefined ? workbook.worksheets[0] : workbook.getWorksheet(sheetName);
    if (!sheet) {
        const available = workbook.worksheets.map((ws) => ws.name).join(', ') || '(none)';
        throw new TableLoadError(
            sheetName === undefined
                ? `${path} has no worksheets`
                : `Sheet "${sheetName}" not found in ${path} (available: ${available})`,
            path
        );
    }

    return worksheetRows(sheet);
}

export interface LoadTableOptions {
    /** Worksheet to read from an .xlsx file; the first sheet when omitted. Ignored for text formats. */
    sheet?: string;
}

/**
 * Load a table from an .xlsx, .csv or .json file.
 */
export async function loadTable(path: string, options: LoadTableOptions = {}): Promise<TableRow[]> {
    const ext = extname(path).toLowerCase();
    if (ext !== '.xlsx' && ext !== '.csv' && ext !== '.json') {
        throw new TableLoadError(`Unsupported table format "${ext || '(none)'}", expected .xlsx, .csv or .json`, path);
    }

    if (ext === '.xlsx') {
        const rows = await readWorkbook(path, options.sheet);
        getLogger().debug({ path, sheet: options.sheet, rows: rows.length }, 'Table loaded');
        return rows;
    }

    let text: string;
    try {
        text = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new TableLoadError(`Cannot read ${path}`, path, { cause: error });
    }

    try {
        const rows = ext === '.csv' ? parseCsv(text) : parseJsonRows(text);
        getLogger().debug({ path, rows: rows.length }, 'Table loaded');
        return rows;
    } catch (error) {
        throw new TableLoadError(`Cannot parse ${path}: ${error instanceof Error ? error.message : String(error)}`, path, { cause: error });
    }
}

/**
 * Header names of the first row, for inspection.
 */
export function tableHeaders(rows: readonly TableRow[]): string[] {
    const first = rows[0];
    return first ? Object.keys(first) : [];
}

// ─── Column schema ───────────────────────────────────────

/**
 * Export/registry headers for each record field. The first header present in a row wins.
 */
const SOURCE_COLUMNS = {
    title: ['Title'],
    year: ['Year'],
    authors: ['Authors'],
    authorsWithAffiliations: ['Authors with affiliations'],
    authorFullNames: ['Author full names'],
    sourceTitle: ['Source title'],
    volume: ['Volume'],
    issue: ['Issue'],
    articleNumber: ['Art. No.'],
    pageStart: ['Page start'],
    pageEnd: ['Page end'],
    pageCount: ['Page count'],
} as const satisfies Record<keyof SourceRecord, readonly string[]>;

const DEPARTMENT_COLUMNS = {
    authorName: ['Author Name'],
    department: ['Departament', 'Department'],
} as const satisfies Record<keyof DepartmentMappingEntry, readonly string[]>;

function cell(row: TableRow, headers: readonly string[]): string | null {
    for (const header of headers) {
        const value = row[header];
        if (value !== undefined) return value;
    }
    return null;
}

function textCell(row: TableRow, headers: readonly string[]): string {
    return cell(row, headers)?.trim() ?? '';
}

function nullableText(row: TableRow, headers: readonly string[]): string | null {
    const value = cell(row, headers);
    return value === null || value.trim() === '' ? null : value;
}

/**
 * Parse a year cell. Accepts "2024" and spreadsheet-style "2024.0"; anything else is null.
 */
export function parseYear(value: string | null): number | null {
    if (value === null) return null;
    const trimmed = value.trim();
    if (!/^\d{4}(\.0+)?$/.test(trimmed)) return null;
    return parseInt(trimmed, 10);
}

export function toSourceRecords(rows: readonly TableRow[]): SourceRecord[] {
    return rows.map((row) =>
        createSourceRecord({
            title: nullableText(row, SOURCE_COLUMNS.title),
            year: parseYear(cell(row, SOURCE_COLUMNS.year)),
            authors: textCell(row, SOURCE_COLUMNS.authors),
            authorsWithAffiliations: nullableText(row, SOURCE_COLUMNS.authorsWithAffiliations),
            authorFullNames: nullableText(row, SOURCE_COLUMNS.authorFullNames),
            sourceTitle: textCell(row, SOURCE_COLUMNS.sourceTitle),
            volume: textCell(row, SOURCE_COLUMNS.volume),
            issue: textCell(row, SOURCE_COLUMNS.issue),
            articleNumber: textCell(row, SOURCE_COLUMNS.articleNumber),
            pageStart: textCell(row, SOURCE_COLUMNS.pageStart),
            pageEnd: textCell(row, SOURCE_COLUMNS.pageEnd),
            pageCount: textCell(row, SOURCE_COLUMNS.pageCount),
        })
    );
}

export function toReferenceRecords(rows: readonly TableRow[]): ReferenceRecord[] {
    return rows.map((row) =>
        createReferenceRecord({
            title: nullableText(row, SOURCE_COLUMNS.title),
            year: parseYear(cell(row, SOURCE_COLUMNS.year)),
        })
    );
}

/**
 * Rows without an author name carry nothing to match on and are dropped.
 */
export function toDepartmentMapping(rows: readonly TableRow[]): DepartmentMappingEntry[] {
    const entries: DepartmentMappingEntry[] = [];
    for (const row of rows) {
        const authorName = textCell(row, DEPARTMENT_COLUMNS.authorName);
        if (!authorName) continue;
        entries.push({ authorName, department: nullableText(row, DEPARTMENT_COLUMNS.department) });
    }
    return entries;
}
