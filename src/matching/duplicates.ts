import type { DuplicateMatch, ReferenceRecord, SourceRecord } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { normalizeTitle, similarityRatio } from './title.js';

export interface DuplicateScanResult<T extends SourceRecord> {
    /** Sources with no qualifying reference match, in input order */
    newRecords: T[];
    duplicates: DuplicateMatch[];
}

/**
 * Split source records into new ones and ones already present in the reference corpus.
 *
 * References are scanned in their given order and the first title scoring at or above
 * `threshold` decides the match. A later, better-scoring reference is never looked at.
 */
export function findNewRecords<T extends SourceRecord>(
    sources: readonly T[],
    references: readonly ReferenceRecord[],
    threshold: number
): DuplicateScanResult<T> {
    const referenceTitles = references.map((r) => normalizeTitle(r.title));

    const newRecords: T[] = [];
    const duplicates: DuplicateMatch[] = [];

    for (const record of sources) {
        const sourceTitle = normalizeTitle(record.title);

        let match: DuplicateMatch | null = null;
        let bestScore = 0;
        let bestTitle = '';

        for (const referenceTitle of referenceTitles) {
            const score = similarityRatio(sourceTitle, referenceTitle);

            if (score > bestScore) {
                bestScore = score;
                bestTitle = referenceTitle;
            }

            if (score >= threshold) {
                match = { sourceTitle: record.title, matchedTitle: referenceTitle, score };
                break;
            }
        }

        if (match) {
            duplicates.push(match);
        } else {
            newRecords.push(record);
            if (bestScore > 0) {
                getLogger().debug({ title: record.title, bestTitle, bestScore, threshold }, 'Closest reference below threshold');
            }
        }
    }

    return { newRecords, duplicates };
}
