import type {
    DepartmentMappingEntry,
    DuplicateMatch,
    PipelineOptions,
    PipelineStats,
    ReferenceRecord,
    ResultRecord,
    SourceRecord,
    YearFilter,
} from '../types/index.js';
import { findNewRecords } from '../matching/duplicates.js';
import { extractAffiliatedAuthors, formatAuthors } from '../affiliation/extractor.js';
import { buildDepartmentIndex, resolveDepartments } from '../departments/resolver.js';
import { getLogger } from '../utils/logger.js';

export interface PipelineInput {
    sourceRecords: readonly SourceRecord[];
    referenceRecords: readonly ReferenceRecord[];
    departmentMapping: readonly DepartmentMappingEntry[];
}

export interface PipelineResult {
    records: ResultRecord[];
    stats: PipelineStats;
    duplicates: DuplicateMatch[];
}

function emptyStats(): PipelineStats {
    return {
        originalSourceCount: 0,
        originalReferenceCount: 0,
        afterYearFilterSource: 0,
        afterYearFilterReference: 0,
        afterTitleFilter: 0,
        excludedByTitle: 0,
        newArticles: 0,
        duplicatesFound: 0,
        affiliatedArticles: 0,
        noAffiliatedAuthors: 0,
        highlightedDepartments: 0,
        departmentsNotFound: 0,
        multipleDepartments: 0,
    };
}

/**
 * Normalize a year filter to a set, or null when no filtering applies.
 */
export function toYearSet(filter: YearFilter): Set<number> | null {
    if (filter === null) return null;
    if (typeof filter === 'number') return new Set([filter]);
    return new Set(filter);
}

function clampThreshold(threshold: number): number {
    if (Number.isNaN(threshold)) return 100;
    return Math.min(100, Math.max(0, threshold));
}

/**
 * True when the title contains none of the exclusion substrings (case-insensitive).
 * Records without a title are always kept.
 */
export function keepByTitle(title: string | null, excludeKeywords: readonly string[]): boolean {
    if (title === null) return true;
    const lowered = title.toLowerCase();
    return !excludeKeywords.some((keyword) => lowered.includes(keyword.toLowerCase()));
}

/**
 * Reconcile a bibliographic export against the registry:
 *
 * 1. Year filter (sources and references)
 * 2. Title exclusion filter (sources)
 * 3. Duplicate detection against the references
 * 4. Institution-affiliated author extraction; records without any are dropped
 * 5. Department resolution and result assembly
 */
export function processRecords(input: PipelineInput, options: PipelineOptions): PipelineResult {
    const logger = getLogger();
    const stats = emptyStats();

    stats.originalSourceCount = input.sourceRecords.length;
    stats.originalReferenceCount = input.referenceRecords.length;

    // ──────────────────────────────────────────────────
    // Step 1: Year filter
    // ──────────────────────────────────────────────────
    let sources: SourceRecord[] = [...input.sourceRecords];
    let references: ReferenceRecord[] = [...input.referenceRecords];

    const years = toYearSet(options.yearFilter);
    if (years) {
        sources = sources.filter((r) => r.year !== null && years.has(r.year));
        references = references.filter((r) => r.year !== null && years.has(r.year));
    }
    stats.afterYearFilterSource = sources.length;
    stats.afterYearFilterReference = references.length;

    // ──────────────────────────────────────────────────
    // Step 2: Title exclusion
    // ──────────────────────────────────────────────────
    const excludeKeywords = options.titleExcludeKeywords.filter((k) => k.length > 0);
    if (excludeKeywords.length > 0) {
        const before = sources.length;
        sources = sources.filter((r) => keepByTitle(r.title, excludeKeywords));
        stats.excludedByTitle = before - sources.length;
    }
    stats.afterTitleFilter = sources.length;

    logger.info(
        {
            years: years ? [...years] : 'all',
            sources: stats.afterYearFilterSource,
            references: stats.afterYearFilterReference,
            excludedByTitle: stats.excludedByTitle,
        },
        'Filters applied'
    );

    // ──────────────────────────────────────────────────
    // Step 3: Duplicate detection
    // ──────────────────────────────────────────────────
    const threshold = clampThreshold(options.threshold);
    if (threshold !== options.threshold) {
        logger.warn({ requested: options.threshold, used: threshold }, 'Similarity threshold out of range, clamped');
    }

    const { newRecords, duplicates } = findNewRecords(sources, references, threshold);
    stats.newArticles = newRecords.length;
    stats.duplicatesFound = duplicates.length;

    logger.info({ newArticles: stats.newArticles, duplicates: stats.duplicatesFound, threshold }, 'Duplicate scan complete');

    if (newRecords.length === 0) {
        return { records: [], stats, duplicates };
    }

    // ──────────────────────────────────────────────────
    // Step 4–5: Authors and departments
    // ──────────────────────────────────────────────────
    const departmentIndex = buildDepartmentIndex(input.departmentMapping);
    const records: ResultRecord[] = [];

    for (const record of newRecords) {
        const authors = extractAffiliatedAuthors(
            record.authorsWithAffiliations,
            record.authorFullNames,
            options.affiliationKeywords,
            options.affiliationExcludeKeywords
        );

        if (authors.count === 0) {
            stats.noAffiliatedAuthors++;
            continue;
        }
        stats.affiliatedArticles++;

        if (authors.ambiguousNames.length > 0) {
            logger.debug({ title: record.title, authors: authors.ambiguousNames }, 'Ambiguous full-name lookup');
        }

        const { authorsShort } = formatAuthors(authors);
        const resolution = resolveDepartments(authorsShort, departmentIndex);

        switch (resolution.reason) {
            case 'not_found':
                stats.highlightedDepartments++;
                stats.departmentsNotFound++;
                logger.debug({ title: record.title, authors: resolution.unresolvedAuthors }, 'Authors missing from department table');
                break;
            case 'multiple':
                stats.highlightedDepartments++;
                stats.multipleDepartments++;
                break;
            case 'none':
                break;
        }

        records.push({
            department: resolution.department,
            affiliatedAuthors: authorsShort,
            allAuthors: record.authors,
            allAuthorFullNames: record.authorFullNames ?? '',
            title: record.title ?? '',
            year: record.year,
            sourceTitle: record.sourceTitle,
            volume: record.volume,
            issue: record.issue,
            articleNumber: record.articleNumber,
            pageStart: record.pageStart,
            pageEnd: record.pageEnd,
            pageCount: record.pageCount,
            source: 'Scopus',
            submission: '',
            date: '',
            amount: '',
            quartile: '',
            needsHighlight: resolution.needsHighlight,
            highlightReason: resolution.reason,
        });
    }

    logger.info(
        {
            affiliated: stats.affiliatedArticles,
            withoutAffiliation: stats.noAffiliatedAuthors,
            needsReview: stats.highlightedDepartments,
        },
        'Records enriched'
    );

    return { records, stats, duplicates };
}
