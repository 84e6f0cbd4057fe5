import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError, loadEnvVars, mergeConfig, resolveConfig, toPipelineOptions } from '../utils/config.js';
import { DEFAULT_CONFIG } from '../types/index.js';

describe('Configuration', () => {
    describe('mergeConfig', () => {
        it('should return the defaults with no layers', () => {
            expect(mergeConfig()).toEqual(DEFAULT_CONFIG);
        });

        it('should let later layers win', () => {
            expect(mergeConfig({ threshold: 95 }, { threshold: 80 }).threshold).toBe(80);
        });

        it('should ignore undefined values', () => {
            expect(mergeConfig({ threshold: 95 }, { threshold: undefined }).threshold).toBe(95);
        });

        it('should override the registry sheet and reject blank sheet names', () => {
            expect(mergeConfig({ referenceSheet: '2024' }).referenceSheet).toBe('2024');
            expect(() => mergeConfig({ referenceSheet: '  ' })).toThrow(ConfigError);
        });

        it('should reject out-of-range thresholds', () => {
            expect(() => mergeConfig({ threshold: 101 })).toThrow(ConfigError);
        });

        it('should list every invalid field', () => {
            try {
                mergeConfig({ threshold: -1, highlightColor: 'yellow' });
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(ConfigError);
                if (error instanceof ConfigError) {
                    expect(error.issues).toHaveLength(2);
                    expect(error.issues).toContain('highlightColor: expected a 6-digit hex color');
                }
            }
        });
    });

    describe('loadEnvVars', () => {
        it('should read threshold and log level', () => {
            expect(loadEnvVars({ PUBSYNC_THRESHOLD: '85', PUBSYNC_LOG_LEVEL: 'debug' })).toEqual({
                threshold: 85,
                logLevel: 'debug',
            });
        });

        it('should ignore unknown log levels', () => {
            expect(loadEnvVars({ PUBSYNC_LOG_LEVEL: 'verbose' })).toEqual({});
        });

        it('should reject a non-numeric threshold', () => {
            expect(() => loadEnvVars({ PUBSYNC_THRESHOLD: 'high' })).toThrow(ConfigError);
        });
    });

    describe('resolveConfig', () => {
        let dir: string;

        beforeEach(() => {
            dir = mkdtempSync(join(tmpdir(), 'pubsync-config-'));
        });

        afterEach(() => {
            rmSync(dir, { recursive: true, force: true });
        });

        it('should merge file, env and CLI layers', async () => {
            writeFileSync(join(dir, 'pubsync.config.json'), JSON.stringify({ threshold: 95, years: [2024], format: 'json' }));

            const config = await resolveConfig({ format: 'csv' }, { searchFrom: dir, env: { PUBSYNC_THRESHOLD: '88' } });

            expect(config.threshold).toBe(88);
            expect(config.years).toEqual([2024]);
            expect(config.format).toBe('csv');
            expect(config.affiliationKeywords).toEqual(DEFAULT_CONFIG.affiliationKeywords);
        });

        it('should use defaults when no file exists', async () => {
            const config = await resolveConfig({}, { searchFrom: dir, env: {} });
            expect(config).toEqual(DEFAULT_CONFIG);
        });

        it('should reject invalid or unknown keys in the file', async () => {
            writeFileSync(join(dir, 'pubsync.config.json'), JSON.stringify({ threshold: 'high' }));
            await expect(resolveConfig({}, { searchFrom: dir, env: {} })).rejects.toThrow(ConfigError);

            writeFileSync(join(dir, 'pubsync.config.json'), JSON.stringify({ spine: 'citation' }));
            await expect(resolveConfig({}, { searchFrom: dir, env: {} })).rejects.toThrow(ConfigError);
        });
    });

    describe('toPipelineOptions', () => {
        it('should disable year filtering when no years are set', () => {
            expect(toPipelineOptions(DEFAULT_CONFIG)).toEqual({
                threshold: 90,
                yearFilter: null,
                titleExcludeKeywords: DEFAULT_CONFIG.titleExcludeKeywords,
                affiliationKeywords: DEFAULT_CONFIG.affiliationKeywords,
                affiliationExcludeKeywords: [],
            });
        });

        it('should pass selected years through', () => {
            expect(toPipelineOptions({ ...DEFAULT_CONFIG, years: [2023, 2024] }).yearFilter).toEqual([2023, 2024]);
        });
    });
});
