#!/usr/bin/env node

import { writeFileSync } from 'node:fs';
import { Command } from 'commander';
import { parseLibraryType, parseLogLevel, parseProxySeparator, parseSources, resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { todayIso, isIsoDate } from '../utils/dates.js';
import { AdapterError, ConfigError, LedgerLoadError } from '../utils/errors.js';
import { runTriage } from '../orchestrator/pipeline.js';
import { runReport } from '../orchestrator/report-run.js';
import { REPORT_FORMATS, REPORT_KINDS } from '../reports/library-report.js';
import type { PubSporkConfig } from '../types/index.js';

const VERSION = '1.0.0';

interface LibraryFlags {
    libType?: string;
    lib?: string;
    onlineLibUrl?: string;
    logLevel?: string;
    jsonLogs?: boolean;
}

interface MatchFlags extends LibraryFlags {
    alerts?: string;
    sources?: string;
    since?: string;
    before?: string;
    ledgerIn?: string;
    ledgerOut?: string;
    curationPage?: string;
    proxy?: string;
    proxySeparator?: string;
    customSearchUrl?: string;
    okDuplicateTitles?: string;
    showIgnored?: boolean;
    today?: string;
}

interface ReportFlags extends LibraryFlags {
    kind: string;
    format: string;
    entryStart?: string;
    entryEnd?: string;
    tags?: string;
    out?: string;
}

const program = new Command();

program
    .name('pubspork')
    .description('Match publication alerts against a curated library and a ledger of every publication already seen.')
    .version(VERSION);

// ─── MATCH command ────────────────────────────────────────

program
    .command('match')
    .description('Classify a batch of alerts and write the curation page')
    .option('--lib-type <type>', 'Library export type: zotero-csv | citeulike-json')
    .option('--lib <path>', 'Library export file')
    .option('--online-lib-url <url>', 'Base URL of the online library')
    .option('--alerts <dir>', 'Alert inbox directory')
    .option('--sources <tags>', 'Alert sources: all, or a comma-separated list')
    .option('--since <date>', 'Only alerts dated on or after YYYY-MM-DD')
    .option('--before <date>', 'Only alerts dated before YYYY-MM-DD')
    .option('--ledger-in <tsv>', 'Ledger of previously seen publications')
    .option('--ledger-out <tsv>', 'Where to write the updated ledger')
    .option('--curation-page <html>', 'Curation page output path')
    .option('--proxy <suffix>', 'Paywall proxy host suffix')
    .option('--proxy-separator <sep>', 'How the proxy rewrites host dots: dot | dash')
    .option('--custom-search-url <url>', 'Extra search engine URL, the title is appended as q=')
    .option('--ok-duplicate-titles <file>', 'Library titles that may appear more than once, one per line')
    .option('--show-ignored', 'List previously ignored publications too')
    .option('--today <date>', 'Run date YYYY-MM-DD (defaults to today)')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: MatchFlags) => {
        await runCommand('Match run', async () => {
            const config = await resolveConfig({
                ...libraryFlags(opts),
                alertsDir: opts.alerts,
                sources: opts.sources === undefined ? undefined : parseSources(opts.sources),
                since: opts.since,
                before: opts.before,
                ledgerIn: opts.ledgerIn,
                ledgerOut: opts.ledgerOut,
                curationPage: opts.curationPage,
                proxy: opts.proxy,
                proxySeparator: opts.proxySeparator === undefined ? undefined : parseProxySeparator(opts.proxySeparator),
                customSearchUrl: opts.customSearchUrl,
                okDuplicateTitles: opts.okDuplicateTitles,
                showIgnored: opts.showIgnored,
            });
            initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

            const today = opts.today ?? todayIso();
            if (!isIsoDate(today)) {
                throw new ConfigError(`--today must be a date as YYYY-MM-DD, got "${today}"`, 'today');
            }

            const { stats } = runTriage(config, { today });
            getLogger().info(
                {
                    new: stats.newlyReported,
                    repeatNew: stats.repeatNew,
                    inLibrary: stats.alreadyInLibrary,
                    ignored: stats.previouslyIgnored,
                },
                'Curation page ready'
            );
        });
    });

// ─── REPORT command ───────────────────────────────────────

program
    .command('report')
    .description('Summarize the library export')
    .option('--lib-type <type>', 'Library export type: zotero-csv | citeulike-json')
    .option('--lib <path>', 'Library export file')
    .option('--online-lib-url <url>', 'Base URL of the online library')
    .requiredOption('-k, --kind <kind>', `Report: ${REPORT_KINDS.join(' | ')}`)
    .option('-f, --format <format>', `Output format: ${REPORT_FORMATS.join(' | ')}`, 'markdown')
    .option('--entry-start <date>', 'First library entry date included (YYYY-MM-DD)')
    .option('--entry-end <date>', 'Last library entry date included (YYYY-MM-DD)')
    .option('--tags <file>', 'Only the tags listed in this file, one per line')
    .option('-o, --out <path>', 'Output file path (defaults to stdout)')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: ReportFlags) => {
        await runCommand('Report', async () => {
            const config = await resolveConfig(libraryFlags(opts));
            initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

            const kind = REPORT_KINDS.find((known) => known === opts.kind);
            if (!kind) {
                throw new ConfigError(`Invalid report "${opts.kind}". Valid: ${REPORT_KINDS.join(', ')}`, 'kind');
            }
            const format = REPORT_FORMATS.find((known) => known === opts.format);
            if (!format) {
                throw new ConfigError(`Invalid format "${opts.format}". Valid: ${REPORT_FORMATS.join(', ')}`, 'format');
            }
            const output = runReport(config, {
                kind,
                format,
                entryStart: opts.entryStart,
                entryEnd: opts.entryEnd,
                tagsFile: opts.tags,
            });

            if (opts.out) {
                writeFileSync(opts.out, output, 'utf-8');
                getLogger().info({ path: opts.out, kind, format }, 'Report written');
            } else {
                process.stdout.write(output);
            }
        });
    });

// ─── Shared ───────────────────────────────────────────────

function libraryFlags(opts: LibraryFlags): Partial<PubSporkConfig> {
    return {
        libType: opts.libType === undefined ? undefined : parseLibraryType(opts.libType),
        libPath: opts.lib,
        onlineLibUrl: opts.onlineLibUrl,
        logLevel: opts.logLevel === undefined ? undefined : parseLogLevel(opts.logLevel),
        jsonLogs: opts.jsonLogs,
    };
}

/**
 * Run a command body; configuration, ledger and library errors end the process with status 1.
 */
async function runCommand(name: string, body: () => Promise<void>): Promise<void> {
    try {
        await body();
    } catch (error) {
        if (error instanceof ConfigError || error instanceof LedgerLoadError || error instanceof AdapterError) {
            getLogger().error({ err: error }, `${name} failed: ${error.message}`);
        } else {
            getLogger().error({ err: error }, `${name} failed`);
        }
        process.exit(1);
    }
}

await program.parseAsync();
