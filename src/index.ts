/**
 * Library entry point: the reconciliation pipeline and its building blocks.
 */
export { processRecords, keepByTitle, toYearSet } from './pipeline/process.js';
export type { PipelineInput, PipelineResult } from './pipeline/process.js';
export { normalizeTitle, similarityRatio, indelDistance } from './matching/title.js';
export { findNewRecords } from './matching/duplicates.js';
export type { DuplicateScanResult } from './matching/duplicates.js';
export { extractAffiliatedAuthors, formatAuthors, indexFullNames } from './affiliation/extractor.js';
export { resolveDepartments, buildDepartmentIndex } from './departments/resolver.js';
export type { DepartmentIndex } from './departments/resolver.js';
export { loadTable, parseCsv, parseJsonRows, toSourceRecords, toReferenceRecords, toDepartmentMapping, TableLoadError } from './io/tabular.js';
export type { LoadTableOptions, TableRow } from './io/tabular.js';
export { renderReport, writeReport, buildWorkbook, parseHighlightColor, defaultReportName } from './exporters/report.js';
export type { ReportOptions, ReportResult, TextReportFormat } from './exporters/report.js';
export { resolveConfig, mergeConfig, toPipelineOptions, ConfigError } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export * from './types/index.js';
