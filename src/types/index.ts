/**
 * Barrel export for all shared types.
 */
export { createSourceRecord, createReferenceRecord, RESULT_COLUMNS } from './record.js';
export type {
    SourceRecord,
    ReferenceRecord,
    DepartmentMappingEntry,
    ResultRecord,
    ResultColumnKey,
    HighlightReason,
} from './record.js';
export type {
    ExtractedAuthors,
    DepartmentResolution,
    DuplicateMatch,
    YearFilter,
    PipelineOptions,
    PipelineStats,
} from './pipeline.js';
export { DEFAULT_CONFIG } from './config.js';
export type { PubSyncConfig, LogLevel, ReportFormat } from './config.js';
