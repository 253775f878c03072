import { existsSync, readFileSync } from 'node:fs';
import type { LibraryType, PubSporkConfig } from '../types/index.js';
import { Ledger } from '../ledger/ledger.js';
import { loadLedger, saveLedger } from '../ledger/ledger-file.js';
import { getLibraryAdapter, readLibrary } from '../adapters/library/index.js';
import { readAlertInbox } from '../adapters/alerts/index.js';
import { writeCurationPage } from '../viewer/curation-page.js';
import { ConfigError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { runMatch, type MatchRunResult } from './match-run.js';

export interface TriageOptions {
    /** ISO date of the run, stamped on ledger entries */
    today: string;
}

/**
 * Full triage run from files on disk:
 *
 * 1. Load the ledger (before anything is written)
 * 2. Read the library export and the alert inbox
 * 3. Match and classify
 * 4. Write the curation page, then the ledger
 */
export function runTriage(config: PubSporkConfig, options: TriageOptions): MatchRunResult {
    const log = getLogger();
    const { libType, libPath, onlineLibUrl, alertsDir, curationPage } = requireMatchOptions(config);

    // ──────────────────────────────────────────────────
    // Step 1: Ledger
    // ──────────────────────────────────────────────────
    let ledger: Ledger;
    if (config.ledgerIn) {
        const loaded = loadLedger(config.ledgerIn, config.matching);
        ledger = loaded.ledger;
    } else {
        log.warn('No input ledger given; starting an empty one, every alert will be reported as new');
        ledger = new Ledger({ policy: config.matching });
    }

    const okDuplicateTitles = config.okDuplicateTitles ? readTitleList(config.okDuplicateTitles) : [];

    // ──────────────────────────────────────────────────
    // Step 2: Library and alerts
    // ──────────────────────────────────────────────────
    const library = getLibraryAdapter(libType, { onlineLibUrl });
    const libraryRecords = readLibrary(library, libPath);

    const inbox = readAlertInbox({
        dir: alertsDir,
        sources: config.sources,
        since: config.since,
        before: config.before,
    });

    // ──────────────────────────────────────────────────
    // Step 3: Match
    // ──────────────────────────────────────────────────
    const result = runMatch({
        alertRecords: inbox.records,
        libraryRecords,
        libType,
        ledger,
        today: options.today,
        policy: config.matching,
        okDuplicateTitles,
    });

    // ──────────────────────────────────────────────────
    // Step 4: Outputs
    // ──────────────────────────────────────────────────
    writeCurationPage(curationPage, result.classified, {
        library,
        proxy: config.proxy,
        proxySeparator: config.proxySeparator,
        customSearchUrl: config.customSearchUrl,
        showIgnored: config.showIgnored,
        runDate: options.today,
        stats: result.stats,
    });

    if (config.ledgerOut) {
        saveLedger(result.ledger, config.ledgerOut);
    } else {
        log.warn('No output ledger given; this run will not be remembered');
    }

    log.info({ ...result.stats }, 'Match run complete');
    return result;
}

// ─── Internal helpers ─────────────────────────────────

function requireMatchOptions(config: PubSporkConfig): {
    libType: LibraryType;
    libPath: string;
    onlineLibUrl: string;
    alertsDir: string;
    curationPage: string;
} {
    const { libType, libPath, onlineLibUrl, alertsDir, curationPage } = config;
    if (!libType) throw new ConfigError('A library type is required (--lib-type)', 'libType');
    if (!libPath) throw new ConfigError('A library export is required (--lib)', 'libPath');
    if (!onlineLibUrl) throw new ConfigError('The online library URL is required (--online-lib-url)', 'onlineLibUrl');
    if (!alertsDir) throw new ConfigError('An alerts directory is required (--alerts)', 'alertsDir');
    if (!curationPage) throw new ConfigError('A curation page path is required (--curation-page)', 'curationPage');
    return { libType, libPath, onlineLibUrl, alertsDir, curationPage };
}

/**
 * One entry per line; blank lines and `#` comments are skipped.
 */
export function readTitleList(path: string, option = 'okDuplicateTitles'): string[] {
    if (!existsSync(path)) {
        throw new ConfigError(`List file not found: ${path}`, option);
    }
    return readFileSync(path, 'utf-8')
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0 && !line.startsWith('#'));
}
