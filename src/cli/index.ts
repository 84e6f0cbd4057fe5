#!/usr/bin/env node
import { Command, Option } from 'commander';
import { dirname, join } from 'node:path';
import { ConfigError, resolveConfig, toPipelineOptions, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { loadTable, tableHeaders, toDepartmentMapping, toReferenceRecords, toSourceRecords } from '../io/tabular.js';
import { processRecords } from '../pipeline/process.js';
import { defaultReportName, writeReport } from '../exporters/report.js';
import type { PipelineStats, ReportFormat, LogLevel } from '../types/index.js';

const VERSION = '1.0.0';

const program = new Command();

program
    .name('pubsync')
    .description('Reconcile a bibliographic export against an institutional publication registry.')
    .version(VERSION);

function parseInteger(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n)) {
        throw new Error(`Not an integer: ${value}`);
    }
    return n;
}

function collectYears(value: string, previous: number[] | undefined): number[] {
    return [...(previous ?? []), parseInteger(value)];
}

function printStats(stats: PipelineStats): void {
    console.log('\n📊 Processing Results\n');
    console.log(`  Source articles:            ${stats.originalSourceCount}`);
    if (stats.afterYearFilterSource !== stats.originalSourceCount) {
        console.log(`    after year filter:        ${stats.afterYearFilterSource}`);
    }
    console.log(`  Registry articles:          ${stats.originalReferenceCount}`);
    if (stats.afterYearFilterReference !== stats.originalReferenceCount) {
        console.log(`    after year filter:        ${stats.afterYearFilterReference}`);
    }
    if (stats.excludedByTitle > 0) {
        console.log(`  Excluded by title:          ${stats.excludedByTitle}`);
    }
    console.log(`  New articles:               ${stats.newArticles}`);
    console.log(`  Duplicates:                 ${stats.duplicatesFound}`);
    console.log(`  With affiliated authors:    ${stats.affiliatedArticles}`);
    console.log(`  Without affiliated authors: ${stats.noAffiliatedAuthors}`);
    console.log(`  Require review:             ${stats.highlightedDepartments}`);
    console.log(`    department not found:     ${stats.departmentsNotFound}`);
    console.log(`    multiple departments:     ${stats.multipleDepartments}`);
    console.log('');
}

// ─── PROCESS command ──────────────────────────────────────

program
    .command('process')
    .description('Find new records, keep those with affiliated authors, and assign departments')
    .option('-s, --source <path>', 'Bibliographic export (.xlsx, .csv or .json)')
    .option('-r, --reference <path>', 'Existing registry records (.xlsx, .csv or .json)')
    .option('--sheet <name>', 'Registry worksheet to read from an .xlsx reference (default: Last)')
    .option('-d, --departments <path>', 'Author → department table (.xlsx, .csv or .json)')
    .option('-o, --out <path>', 'Output report path')
    .addOption(new Option('-f, --format <format>', 'Report format').choices(['xlsx', 'csv', 'html', 'json']))
    .option('-t, --threshold <n>', 'Title similarity threshold, 0-100', parseInteger)
    .option('-y, --year <year>', 'Keep only this year (repeatable)', collectYears)
    .option('--title-exclude <keywords...>', 'Drop records whose title contains any of these')
    .option('--no-title-filter', 'Disable title exclusion')
    .option('-a, --affiliation <keywords...>', 'Institution keywords')
    .option('--affiliation-exclude <keywords...>', 'Reject author blocks containing any of these')
    .option('--color <hex>', 'Highlight color for cells that need review')
    .addOption(new Option('--log-level <level>', 'Log level').choices(['debug', 'info', 'warn', 'error']))
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: {
        source?: string;
        reference?: string;
        sheet?: string;
        departments?: string;
        out?: string;
        format?: ReportFormat;
        threshold?: number;
        year?: number[];
        titleExclude?: string[];
        titleFilter: boolean;
        affiliation?: string[];
        affiliationExclude?: string[];
        color?: string;
        logLevel?: LogLevel;
        jsonLogs?: boolean;
    }) => {
        const cliConfig: ConfigOverrides = {
            source: opts.source,
            reference: opts.reference,
            referenceSheet: opts.sheet,
            departments: opts.departments,
            out: opts.out,
            format: opts.format,
            threshold: opts.threshold,
            years: opts.year,
            titleExcludeKeywords: opts.titleFilter ? opts.titleExclude : [],
            affiliationKeywords: opts.affiliation,
            affiliationExcludeKeywords: opts.affiliationExclude,
            highlightColor: opts.color,
            logLevel: opts.logLevel,
            jsonLogs: opts.jsonLogs,
        };

        try {
            const config = await resolveConfig(cliConfig);
            initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
            const logger = getLogger();

            if (!config.source || !config.reference) {
                logger.error('Both --source and --reference are required (flag or config file)');
                process.exit(1);
            }

            const sourceRecords = toSourceRecords(await loadTable(config.source, { sheet: config.sourceSheet }));
            const referenceRecords = toReferenceRecords(
                await loadTable(config.reference, { sheet: config.referenceSheet })
            );
            const departmentMapping = config.departments
                ? toDepartmentMapping(await loadTable(config.departments, { sheet: config.departmentsSheet }))
                : [];

            logger.info(
                { source: sourceRecords.length, reference: referenceRecords.length, departments: departmentMapping.length },
                'Inputs loaded'
            );

            const options = toPipelineOptions(config);
            const result = processRecords({ sourceRecords, referenceRecords, departmentMapping }, options);
            printStats(result.stats);

            const outputPath = config.out
                ?? join(dirname(config.source), defaultReportName(options.yearFilter, new Date(), config.format));
            const report = await writeReport(result.records, outputPath, {
                format: config.format,
                highlightColor: config.highlightColor,
            });

            if (report.ok) {
                console.log(`Report written: ${report.path} (${report.rows} rows)`);
                if (result.stats.highlightedDepartments > 0) {
                    console.log('Highlighted Departament cells require manual review.');
                }
            } else if (report.reason === 'empty') {
                console.log('No new affiliated articles, no report written.');
            } else {
                logger.error({ reason: report.reason, message: report.message }, 'Report not written');
                process.exit(1);
            }
        } catch (error) {
            if (error instanceof ConfigError) {
                console.error(`${error.message}\n  ${error.issues.join('\n  ')}`);
            } else {
                getLogger().error({ error }, 'Processing failed');
            }
            process.exit(1);
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show the row count and headers of a table')
    .requiredOption('-i, --input <path>', 'Table path (.xlsx, .csv or .json)')
    .option('--sheet <name>', 'Worksheet of an .xlsx table (default: first sheet)')
    .action(async (opts: { input: string; sheet?: string }) => {
        try {
            const rows = await loadTable(opts.input, { sheet: opts.sheet });
            console.log(`\n📄 ${opts.input}\n`);
            console.log(`  Rows:    ${rows.length}`);
            console.log(`  Columns: ${tableHeaders(rows).join(' | ')}`);
            console.log('');
        } catch (error) {
            console.error('Inspect failed:', error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

program.parseAsync().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
});
