/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Report formats the exporter can write.
 */
export type ReportFormat = 'xlsx' | 'csv' | 'html' | 'json';

/**
 * Full pubsync configuration merged from CLI flags, env vars, and config file.
 */
export interface PubSyncConfig {
    // Input
    source?: string;
    reference?: string;
    departments?: string;
    /** Worksheet names for .xlsx inputs; an unset name means the first sheet */
    sourceSheet?: string;
    referenceSheet?: string;
    departmentsSheet?: string;

    // Output
    out?: string;
    format: ReportFormat;
    /** RGB hex without '#', used for cells that need review */
    highlightColor: string;

    // Matching
    threshold: number;
    /** Empty means no year filtering */
    years: number[];
    titleExcludeKeywords: string[];
    affiliationKeywords: string[];
    affiliationExcludeKeywords: string[];

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: PubSyncConfig = {
    referenceSheet: 'Last',
    format: 'xlsx',
    highlightColor: 'FFFF00',
    threshold: 90,
    years: [],
    titleExcludeKeywords: ['Correction:', 'Correction to:', 'Erratum to', 'Corrigendum to', '<FOR VERIFICATION>'],
    affiliationKeywords: ['Khazar University', 'Khazar', 'Xəzər Universiteti'],
    affiliationExcludeKeywords: [],
    logLevel: 'info',
    jsonLogs: false,
};
