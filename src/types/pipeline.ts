
/**
 * Institution-affiliated authors of one record, aligned by position.
 */
export interface ExtractedAuthors {
    /** "Last, F." */
    shortNames: string[];
    /** "Last, First (id)", or "Last, First" when no identifier was found */
    namesWithIds: string[];
    fullNames: string[];
    count: number;
    /** Short names whose identifier lookup matched several full-name entries */
    ambiguousNames: string[];
}

export interface ResolutionBase {
    /** Deduplicated departments joined with "; " */
    department: string;
    departments: string[];
    unresolvedAuthors: string[];
}

/**
 * Outcome of mapping a record's authors to departments.
 * `not_found` wins over `multiple` when both apply.
 */
export type DepartmentResolution =
    | (ResolutionBase & { reason: 'none'; needsHighlight: false })
    | (ResolutionBase & { reason: 'not_found'; needsHighlight: true })
    | (ResolutionBase & { reason: 'multiple'; needsHighlight: true });


/**
 * A source record dropped because its title matched the reference corpus.
 */
export interface DuplicateMatch {
    sourceTitle: string | null;
    matchedTitle: string;
    score: number;
}

export type YearFilter = number | readonly number[] | null;

export interface PipelineOptions {
    /** Similarity threshold, 0–100 */
    threshold: number;
    yearFilter: YearFilter;
    titleExcludeKeywords: readonly string[];
    affiliationKeywords: readonly string[];
    affiliationExcludeKeywords: readonly string[];
}

/**
 * Counters accumulated over one run.
 */
export interface PipelineStats {
    originalSourceCount: number;
    originalReferenceCount: number;
    afterYearFilterSource: number;
    afterYearFilterReference: number;
    afterTitleFilter: number;
    excludedByTitle: number;
    newArticles: number;
    duplicatesFound: number;
    affiliatedArticles: number;
    noAffiliatedAuthors: number;
    highlightedDepartments: number;
    departmentsNotFound: number;
    multipleDepartments: number;
}
