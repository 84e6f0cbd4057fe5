import type { ExtractedAuthors } from '../types/index.js';

/** "Last, First (12345)" */
const FULL_NAME_ENTRY = /^(.+?)\s*\((\d+)\)/;

export interface FullNameEntry {
    /** "Last, First" as written in the full-name field */
    full: string;
    id: string;
    firstName: string;
}

/**
 * Index the full-name field by last name.
 * Entries that don't look like "Name (digits)" are skipped.
 */
export function indexFullNames(authorFullNames: string | null | undefined): Map<string, FullNameEntry[]> {
    const index = new Map<string, FullNameEntry[]>();
    if (!authorFullNames) return index;

    for (const rawPart of authorFullNames.split(';')) {
        const match = FULL_NAME_ENTRY.exec(rawPart.trim());
        if (!match?.[1] || !match[2]) continue;

        const full = match[1].trim();
        const [lastName = '', firstName = ''] = full.split(',').map((s) => s.trim());

        const entries = index.get(lastName) ?? [];
        entries.push({ full, id: match[2], firstName });
        index.set(lastName, entries);
    }

    return index;
}

/**
 * Pick the full-name entry for an author. A single candidate is taken as-is; several
 * candidates sharing a last name are narrowed by first name, then by initial.
 * Returns 'ambiguous' when more than one candidate survives.
 */
function lookupFullName(
    index: Map<string, FullNameEntry[]>,
    lastName: string,
    firstName: string
): FullNameEntry | 'ambiguous' | null {
    const candidates = index.get(lastName);
    if (!candidates || candidates.length === 0) return null;
    if (candidates.length === 1) return candidates[0] ?? null;

    const first = firstName.toLowerCase();
    const exact = candidates.filter((c) => c.firstName.toLowerCase() === first);
    if (exact.length === 1) return exact[0] ?? null;

    const initial = initialOf(first);
    const byInitial = initial
        ? candidates.filter((c) => initialOf(c.firstName.toLowerCase()) === initial)
        : [];
    if (byInitial.length === 1) return byInitial[0] ?? null;

    return 'ambiguous';
}

/** First code point, so names starting outside the BMP keep the whole character. */
function initialOf(name: string): string {
    return [...name][0] ?? '';
}

function containsAny(haystack: string, keywords: readonly string[]): boolean {
    return keywords.some((keyword) => keyword.length > 0 && haystack.includes(keyword.toLowerCase()));
}

/**
 * Pull out the authors of a record whose affiliation block mentions one of `keywords`.
 *
 * `authorsWithAffiliations` is "Last, First, affiliation...; Last, First, affiliation...".
 * Matching is a case-insensitive substring test over the whole block, so a keyword in any
 * part of the block qualifies it. Blocks that also mention an `excludeKeywords` entry are
 * rejected.
 */
export function extractAffiliatedAuthors(
    authorsWithAffiliations: string | null | undefined,
    authorFullNames: string | null | undefined,
    keywords: readonly string[],
    excludeKeywords: readonly string[] = []
): ExtractedAuthors {
    const result: ExtractedAuthors = {
        shortNames: [],
        namesWithIds: [],
        fullNames: [],
        count: 0,
        ambiguousNames: [],
    };

    if (!authorsWithAffiliations || keywords.length === 0) return result;

    const fullNameIndex = indexFullNames(authorFullNames);

    for (const rawBlock of authorsWithAffiliations.split(';')) {
        const block = rawBlock.trim();
        if (!block) continue;

        const lowered = block.toLowerCase();
        if (!containsAny(lowered, keywords)) continue;
        if (containsAny(lowered, excludeKeywords)) continue;

        const parts = block.split(',');
        if (parts.length < 2) continue;

        const lastName = (parts[0] ?? '').trim();
        const firstName = (parts[1] ?? '').trim();
        const shortName = `${lastName}, ${firstName ? `${initialOf(firstName)}.` : ''}`;

        result.shortNames.push(shortName);

        const entry = lookupFullName(fullNameIndex, lastName, firstName);
        if (entry && entry !== 'ambiguous') {
            result.namesWithIds.push(`${entry.full} (${entry.id})`);
            result.fullNames.push(entry.full);
        } else {
            if (entry === 'ambiguous') result.ambiguousNames.push(shortName);
            const fallback = `${lastName}, ${firstName}`;
            result.namesWithIds.push(fallback);
            result.fullNames.push(fallback);
        }
    }

    result.count = result.shortNames.length;
    return result;
}

/**
 * The three "; "-joined representations used in result records and reports.
 */
export function formatAuthors(authors: ExtractedAuthors): {
    authorsShort: string;
    authorsWithIds: string;
    authorsFull: string;
} {
    return {
        authorsShort: authors.shortNames.join('; '),
        authorsWithIds: authors.namesWithIds.join('; '),
        authorsFull: authors.fullNames.join('; '),
    };
}
