import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type PipelineOptions, type PubSyncConfig } from '../types/index.js';
import { getLogger } from './logger.js';

export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly issues: string[] = []
    ) {
        super(message);
        this.name = 'ConfigError';
    }
}

const keywordList = z.array(z.string().trim().min(1));

export const ConfigSchema = z.object({
    source: z.string().optional(),
    reference: z.string().optional(),
    departments: z.string().optional(),
    sourceSheet: z.string().trim().min(1).optional(),
    referenceSheet: z.string().trim().min(1).optional(),
    departmentsSheet: z.string().trim().min(1).optional(),
    out: z.string().optional(),
    format: z.enum(['xlsx', 'csv', 'html', 'json']),
    highlightColor: z.string().regex(/^#?[0-9a-fA-F]{6}$/, 'expected a 6-digit hex color'),
    threshold: z.number().int().min(0).max(100),
    years: z.array(z.number().int().min(1000).max(9999)),
    titleExcludeKeywords: keywordList,
    affiliationKeywords: keywordList,
    affiliationExcludeKeywords: keywordList,
    logLevel: z.enum(['error', 'warn', 'info', 'debug']),
    jsonLogs: z.boolean(),
});

/** Shape accepted in pubsync.config.json; every key optional, unknown keys rejected. */
export const ConfigFileSchema = ConfigSchema.partial().strict();

export type ConfigOverrides = z.infer<typeof ConfigFileSchema>;

function describeIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Load configuration from pubsync.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('pubsync', {
        searchPlaces: ['pubsync.config.json', 'package.json'],
    });

    const result = await explorer.search(searchFrom);
    if (!result || result.isEmpty) return null;

    const parsed = ConfigFileSchema.safeParse(result.config);
    if (!parsed.success) {
        throw new ConfigError(`Invalid config file ${result.filepath}`, describeIssues(parsed.error));
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const overrides: ConfigOverrides = {};

    const threshold = env['PUBSYNC_THRESHOLD'];
    if (threshold !== undefined && threshold.trim() !== '') {
        const value = Number(threshold);
        if (!Number.isFinite(value)) {
            throw new ConfigError(`PUBSYNC_THRESHOLD is not a number: ${threshold}`);
        }
        overrides.threshold = value;
    }

    const logLevel = env['PUBSYNC_LOG_LEVEL'];
    if (logLevel === 'error' || logLevel === 'warn' || logLevel === 'info' || logLevel === 'debug') {
        overrides.logLevel = logLevel;
    }

    return overrides;
}

/**
 * Merge and validate configuration layers.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export function mergeConfig(...layers: Array<ConfigOverrides | null | undefined>): PubSyncConfig {
    let merged: Record<string, unknown> = { ...DEFAULT_CONFIG };
    for (const layer of layers) {
        if (!layer) continue;
        for (const [key, value] of Object.entries(layer)) {
            if (value !== undefined) merged = { ...merged, [key]: value };
        }
    }

    const parsed = ConfigSchema.safeParse(merged);
    if (!parsed.success) {
        throw new ConfigError('Invalid configuration', describeIssues(parsed.error));
    }
    return parsed.data;
}

export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<PubSyncConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);
    return mergeConfig(fileConfig, envConfig, cliFlags);
}

/**
 * Pipeline parameters derived from a resolved configuration.
 */
export function toPipelineOptions(config: PubSyncConfig): PipelineOptions {
    return {
        threshold: config.threshold,
        yearFilter: config.years.length === 0 ? null : config.years,
        titleExcludeKeywords: config.titleExcludeKeywords,
        affiliationKeywords: config.affiliationKeywords,
        affiliationExcludeKeywords: config.affiliationExcludeKeywords,
    };
}
