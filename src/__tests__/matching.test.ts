import { describe, it, expect } from 'vitest';
import { normalizeTitle, indelDistance, similarityRatio } from '../matching/title.js';
import { findNewRecords } from '../matching/duplicates.js';
import { createReferenceRecord, createSourceRecord } from '../types/index.js';

describe('Title matching', () => {
    describe('normalizeTitle', () => {
        it('should lowercase, collapse whitespace and trim', () => {
            expect(normalizeTitle('  Deep   Learning\tin\nHealthcare ')).toBe('deep learning in healthcare');
        });

        it('should map absent titles to an empty string', () => {
            expect(normalizeTitle(null)).toBe('');
            expect(normalizeTitle(undefined)).toBe('');
        });

        it('should be idempotent', () => {
            const titles = ['  A  B ', 'Already normal', '', 'MiXeD Case  Title'];
            for (const t of titles) {
                expect(normalizeTitle(normalizeTitle(t))).toBe(normalizeTitle(t));
            }
        });
    });

    describe('indelDistance', () => {
        it('should count insertions and deletions only', () => {
            // LCS("kitten", "sitting") = "ittn"
            expect(indelDistance('kitten', 'sitting')).toBe(5);
        });

        it('should handle empty strings', () => {
            expect(indelDistance('', 'abc')).toBe(3);
            expect(indelDistance('abc', '')).toBe(3);
            expect(indelDistance('', '')).toBe(0);
        });
    });

    describe('similarityRatio', () => {
        it('should return 100 for identical strings', () => {
            expect(similarityRatio('deep learning', 'deep learning')).toBe(100);
        });

        it('should round the ratio to an integer', () => {
            // total 6, distance 2 → 66.67
            expect(similarityRatio('abc', 'abd')).toBe(67);
        });

        it('should round exact halves to the even neighbour', () => {
            // total 16, common subsequence "abcde" → 62.5
            expect(similarityRatio('abcdefgh', 'abcdexyz')).toBe(62);
            // total 16, common subsequence "abc" → 37.5
            expect(similarityRatio('abcdefgh', 'abcxyzuv')).toBe(38);
        });

        it('should be symmetric', () => {
            expect(similarityRatio('graph neural networks', 'neural graph networks'))
                .toBe(similarityRatio('neural graph networks', 'graph neural networks'));
        });

        it('should score 0 when either side is empty', () => {
            expect(similarityRatio('', 'abc')).toBe(0);
            expect(similarityRatio('abc', '')).toBe(0);
            expect(similarityRatio('', '')).toBe(0);
        });
    });
});

describe('Duplicate Detector', () => {
    const source = (title: string | null) => createSourceRecord({ title, year: 2024 });
    const reference = (title: string | null) => createReferenceRecord({ title, year: 2024 });

    it('should treat case and spacing variants as duplicates at threshold 100', () => {
        const { newRecords, duplicates } = findNewRecords(
            [source('Deep Learning in Healthcare')],
            [reference('Deep learning  in healthcare ')],
            100
        );

        expect(newRecords).toEqual([]);
        expect(duplicates).toEqual([
            { sourceTitle: 'Deep Learning in Healthcare', matchedTitle: 'deep learning in healthcare', score: 100 },
        ]);
    });

    it('should report the first qualifying reference, not the best one', () => {
        // "abcde" vs "abcdx" scores 80; the exact match comes later
        const { duplicates } = findNewRecords([source('abcde')], [reference('abcdx'), reference('abcde')], 80);

        expect(duplicates).toEqual([{ sourceTitle: 'abcde', matchedTitle: 'abcdx', score: 80 }]);
    });

    it('should keep a half-point score below the next threshold', () => {
        const sources = [source('abcdefgh')];
        const references = [reference('abcdexyz')];

        expect(findNewRecords(sources, references, 63).newRecords).toHaveLength(1);
        expect(findNewRecords(sources, references, 62).duplicates).toEqual([
            { sourceTitle: 'abcdefgh', matchedTitle: 'abcdexyz', score: 62 },
        ]);
    });

    it('should keep new records in input order', () => {
        const sources = [source('Quantum Annealing'), source('Known Paper'), source('Soil Salinity Mapping')];
        const { newRecords, duplicates } = findNewRecords(sources, [reference('known paper')], 90);

        expect(newRecords.map((r) => r.title)).toEqual(['Quantum Annealing', 'Soil Salinity Mapping']);
        expect(duplicates).toHaveLength(1);
    });

    it('should never find more duplicates at a higher threshold', () => {
        const sources = [
            source('Attention Is All You Need'),
            source('Attention Is All We Need'),
            source('Image Classification With CNNs'),
            source('Deep Residual Learning'),
        ];
        const references = [reference('Attention is all you need'), reference('Deep residual learning for images')];

        let previous = Infinity;
        for (const threshold of [0, 50, 70, 85, 95, 100]) {
            const count = findNewRecords(sources, references, threshold).duplicates.length;
            expect(count).toBeLessThanOrEqual(previous);
            previous = count;
        }
    });

    it('should flag exact normalized matches at every threshold', () => {
        for (const threshold of [0, 42, 90, 100]) {
            const { duplicates } = findNewRecords([source('Robust  Control')], [reference('robust control')], threshold);
            expect(duplicates).toHaveLength(1);
        }
    });

    it('should only match untitled records at threshold 0', () => {
        expect(findNewRecords([source(null)], [reference('anything')], 0).duplicates).toHaveLength(1);
        expect(findNewRecords([source(null)], [reference('anything')], 1).newRecords).toHaveLength(1);
    });

    it('should keep everything when the reference corpus is empty', () => {
        const { newRecords, duplicates } = findNewRecords([source('A'), source('B')], [], 0);
        expect(newRecords).toHaveLength(2);
        expect(duplicates).toEqual([]);
    });
});
