/**
 * One entry of a bibliographic export (Scopus column layout).
 * Text fields default to empty strings; the fields the pipeline parses stay nullable.
 */
export interface SourceRecord {
    title: string | null;
    year: number | null;

    /** All authors as exported, e.g. "Smith J.; Doe A." */
    authors: string;

    /** Semicolon-delimited "Last, First, affiliation..." blocks */
    authorsWithAffiliations: string | null;

    /** Semicolon-delimited "Last, First (id)" entries */
    authorFullNames: string | null;

    sourceTitle: string;
    volume: string;
    issue: string;
    articleNumber: string;
    pageStart: string;
    pageEnd: string;
    pageCount: string;
}

/**
 * Existing registry entry. Only used for duplicate comparison.
 */
export interface ReferenceRecord {
    title: string | null;
    year: number | null;
}

/**
 * One row of the author → department table.
 */
export interface DepartmentMappingEntry {
    /** Short form, "Last, F." */
    authorName: string;
    department: string | null;
}

const SOURCE_RECORD_DEFAULTS: SourceRecord = {
    title: null,
    year: null,
    authors: '',
    authorsWithAffiliations: null,
    authorFullNames: null,
    sourceTitle: '',
    volume: '',
    issue: '',
    articleNumber: '',
    pageStart: '',
    pageEnd: '',
    pageCount: '',
};

export function createSourceRecord(fields: Partial<SourceRecord> = {}): SourceRecord {
    return { ...SOURCE_RECORD_DEFAULTS, ...fields };
}

export function createReferenceRecord(fields: Partial<ReferenceRecord> = {}): ReferenceRecord {
    return { title: null, year: null, ...fields };
}

export type HighlightReason = 'none' | 'not_found' | 'multiple';

/**
 * Output row in registry layout.
 * `needsHighlight` and `highlightReason` are for report rendering only and never become columns.
 */
export interface ResultRecord {
    department: string;
    affiliatedAuthors: string;
    allAuthors: string;
    allAuthorFullNames: string;
    title: string;
    year: number | null;
    sourceTitle: string;
    volume: string;
    issue: string;
    articleNumber: string;
    pageStart: string;
    pageEnd: string;
    pageCount: string;
    source: 'Scopus';

    // Filled in by hand downstream
    submission: '';
    date: '';
    amount: '';
    quartile: '';

    needsHighlight: boolean;
    highlightReason: HighlightReason;
}

export type ResultColumnKey = Exclude<keyof ResultRecord, 'needsHighlight' | 'highlightReason'>;

/**
 * Visible columns, in registry order, with the registry's own header names.
 */
export const RESULT_COLUMNS: ReadonlyArray<{ key: ResultColumnKey; header: string }> = [
    { key: 'department', header: 'Departament' },
    { key: 'affiliatedAuthors', header: 'Authors' },
    { key: 'allAuthors', header: 'Authors.1' },
    { key: 'allAuthorFullNames', header: 'Author full names' },
    { key: 'title', header: 'Title' },
    { key: 'year', header: 'Year' },
    { key: 'sourceTitle', header: 'Source title' },
    { key: 'volume', header: 'Volume' },
    { key: 'issue', header: 'Issue' },
    { key: 'articleNumber', header: 'Art. No.' },
    { key: 'pageStart', header: 'Page start' },
    { key: 'pageEnd', header: 'Page end' },
    { key: 'pageCount', header: 'Page count' },
    { key: 'source', header: 'Source' },
    { key: 'submission', header: 'Təqdimat' },
    { key: 'date', header: 'Data' },
    { key: 'amount', header: 'Amount' },
    { key: 'quartile', header: 'Quartil' },
];
