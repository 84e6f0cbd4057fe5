import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, RESULT_COLUMNS, createSourceRecord, createReferenceRecord } from '../types/index.js';

describe('Types', () => {
    describe('RESULT_COLUMNS', () => {
        it('should have 18 visible columns starting with Departament', () => {
            expect(RESULT_COLUMNS).toHaveLength(18);
            expect(RESULT_COLUMNS[0]).toEqual({ key: 'department', header: 'Departament' });
        });

        it('should end with the reserved manual-entry columns', () => {
            expect(RESULT_COLUMNS.slice(-5).map((c) => c.header)).toEqual(['Source', 'Təqdimat', 'Data', 'Amount', 'Quartil']);
        });

        it('should have unique headers', () => {
            const headers = RESULT_COLUMNS.map((c) => c.header);
            expect(new Set(headers).size).toBe(headers.length);
        });
    });

    describe('record factories', () => {
        it('should fill absent source fields', () => {
            const record = createSourceRecord({ title: 'A' });
            expect(record.year).toBeNull();
            expect(record.authorsWithAffiliations).toBeNull();
            expect(record.volume).toBe('');
        });

        it('should fill absent reference fields', () => {
            expect(createReferenceRecord()).toEqual({ title: null, year: null });
        });
    });

    describe('DEFAULT_CONFIG', () => {
        it('should write a spreadsheet and read the registry from its Last sheet by default', () => {
            expect(DEFAULT_CONFIG.format).toBe('xlsx');
            expect(DEFAULT_CONFIG.referenceSheet).toBe('Last');
            expect(DEFAULT_CONFIG.sourceSheet).toBeUndefined();
        });

        it('should default the threshold to 90', () => {
            expect(DEFAULT_CONFIG.threshold).toBe(90);
        });

        it('should not filter by year by default', () => {
            expect(DEFAULT_CONFIG.years).toEqual([]);
        });

        it('should exclude correction notices by default', () => {
            expect(DEFAULT_CONFIG.titleExcludeKeywords).toContain('Correction to:');
        });

        it('should highlight in yellow', () => {
            expect(DEFAULT_CONFIG.highlightColor).toBe('FFFF00');
        });
    });
});
