import type {
    AlertRecord,
    AlertReport,
    CanonicalRecord,
    Classification,
    ClassifiedRecord,
    LedgerEntry,
    LibraryType,
    MatchPolicy,
    MatchRunStats,
    RawRecord,
} from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { withFields } from '../model/canonical-record.js';
import { normalizeRecords } from '../normalize/normalizer.js';
import { normalizeTitle } from '../normalize/text.js';
import { match } from '../matching/matcher.js';
import type { Ledger } from '../ledger/ledger.js';
import { getLogger } from '../utils/logger.js';

export interface MatchRunInput {
    alertRecords: readonly AlertRecord[];
    libraryRecords: readonly RawRecord[];
    libType: LibraryType;
    ledger: Ledger;
    /** ISO date stamped on every ledger entry written by this run */
    today: string;
    policy?: MatchPolicy;
    /** Library titles that are allowed to appear more than once (any formatting; normalized here) */
    okDuplicateTitles?: Iterable<string>;
}

export interface MatchRunResult {
    /** Deduplicated alert records, sorted by title */
    classified: ClassifiedRecord[];
    ledger: Ledger;
    stats: MatchRunStats;
}

/**
 * Alert records of one batch that denote the same publication.
 */
interface AlertGroup {
    record: CanonicalRecord;
    reports: AlertReport[];
}

/**
 * Run one triage batch:
 *
 * 1. Record every library publication in the ledger as in_library
 * 2. Merge alert records that report the same publication
 * 3. Classify each merged record against the ledger
 *
 * The ledger is mutated in place; saving it is the caller's job.
 */
export function runMatch(input: MatchRunInput): MatchRunResult {
    const { ledger, today } = input;
    const policy = input.policy ?? DEFAULT_CONFIG.matching;
    const log = getLogger();

    const stats: MatchRunStats = {
        libraryRecords: input.libraryRecords.length,
        libraryRejected: 0,
        libraryDuplicates: 0,
        alertRecords: input.alertRecords.length,
        alertRejected: 0,
        alertDuplicatesMerged: 0,
        newlyReported: 0,
        repeatNew: 0,
        alreadyInLibrary: 0,
        previouslyIgnored: 0,
        ledgerEntries: 0,
        ledgerRowErrors: ledger.getRejectedRows().length,
    };

    // ──────────────────────────────────────────────────
    // Step 1: Library
    // ──────────────────────────────────────────────────
    const library = normalizeRecords(input.libraryRecords, input.libType);
    const libraryRecords = library.records;
    stats.libraryRejected = library.rejected;
    stats.libraryDuplicates = reportLibraryDuplicates(libraryRecords, new Set([...(input.okDuplicateTitles ?? [])].map(normalizeTitle)));

    const libraryByEntry = new Map<LedgerEntry, CanonicalRecord>();
    for (const record of libraryRecords) {
        const entry = ledger.upsert(record, 'in_library', today);
        if (!libraryByEntry.has(entry)) libraryByEntry.set(entry, record);
    }
    log.info({ records: libraryRecords.length, rejected: stats.libraryRejected }, 'Library recorded in ledger');

    // ──────────────────────────────────────────────────
    // Step 2: Alert batch deduplication
    // ──────────────────────────────────────────────────
    const groups: AlertGroup[] = [];

    for (const { source, raw } of input.alertRecords) {
        const [record] = normalizeRecords([raw], source).records;
        if (!record) {
            stats.alertRejected++;
            continue;
        }

        const report: AlertReport = {
            source,
            rawTitle: record.rawTitle,
            searchText: record.searchText,
            excerpt: record.excerpt,
            reference: record.reference,
        };

        const same = match(record, groups.map((group) => group.record), policy);
        const group = same ? groups[same.index] : undefined;
        if (group) {
            group.record = mergeRecords(group.record, record);
            group.reports.push(report);
            stats.alertDuplicatesMerged++;
        } else {
            groups.push({ record, reports: [report] });
        }
    }
    log.info(
        { alerts: stats.alertRecords, publications: groups.length, merged: stats.alertDuplicatesMerged },
        'Alert batch deduplicated'
    );

    // ──────────────────────────────────────────────────
    // Step 3: Classification
    // ──────────────────────────────────────────────────
    const classified = groups.map((group): ClassifiedRecord => {
        const { record, reports } = group;
        const resolved = ledger.resolve(record);

        if (!resolved) {
            const entry = ledger.upsert(record, 'new', today);
            return { record, classification: 'newly-reported', tier: null, entry, libraryRecord: null, reports };
        }

        const entry = updateMatchedEntry(ledger, resolved.entry, record, today);
        return {
            record,
            classification: classify(entry),
            tier: resolved.tier,
            entry,
            libraryRecord: libraryByEntry.get(entry) ?? null,
            reports,
        };
    });

    classified.sort(compareClassified);

    for (const item of classified) {
        countClassification(stats, item.classification);
    }
    stats.ledgerEntries = ledger.size;

    log.info(
        {
            newlyReported: stats.newlyReported,
            repeatNew: stats.repeatNew,
            alreadyInLibrary: stats.alreadyInLibrary,
            previouslyIgnored: stats.previouslyIgnored,
        },
        'Alert records classified'
    );

    return { classified, ledger, stats };
}

/**
 * Warn about library items that share a title or a DOI. Returns how many were reported.
 */
function reportLibraryDuplicates(records: readonly CanonicalRecord[], okTitles: ReadonlySet<string>): number {
    const log = getLogger();
    const byTitle = new Map<string, CanonicalRecord>();
    const byDoi = new Map<string, CanonicalRecord>();
    let duplicates = 0;

    for (const record of records) {
        const sameTitle = record.title ? byTitle.get(record.title) : undefined;
        const sameDoi = record.doi ? byDoi.get(record.doi) : undefined;

        if ((sameTitle || sameDoi) && !okTitles.has(record.title)) {
            duplicates++;
            log.warn(
                {
                    title: record.rawTitle,
                    doi: record.doi,
                    libraryId: record.libraryId,
                    otherLibraryId: (sameDoi ?? sameTitle)?.libraryId ?? null,
                },
                sameDoi ? 'Duplicate DOI in library' : 'Duplicate title in library'
            );
        }

        if (record.title && !sameTitle) byTitle.set(record.title, record);
        if (record.doi && !sameDoi) byDoi.set(record.doi, record);
    }

    return duplicates;
}

/**
 * The richer of two records of the same publication: the one with a DOI,
 * else the one with the longer title. Gaps in the survivor are filled from the other.
 */
function mergeRecords(current: CanonicalRecord, incoming: CanonicalRecord): CanonicalRecord {
    const incomingIsRicher =
        (incoming.doi !== null && current.doi === null) ||
        ((incoming.doi === null) === (current.doi === null) && incoming.rawTitle.length > current.rawTitle.length);

    const [survivor, other] = incomingIsRicher ? [incoming, current] : [current, incoming];

    return withFields(survivor, {
        authors: survivor.authors.length > 0 ? survivor.authors : other.authors,
        journal: survivor.journal ?? other.journal,
        year: survivor.year ?? other.year,
        sourceUrl: survivor.sourceUrl ?? other.sourceUrl,
    });
}

/**
 * Refresh a matched entry: a DOI the entry lacks goes in through upsert
 * (keeping the entry's state); otherwise the entry is only touched.
 */
function updateMatchedEntry(ledger: Ledger, entry: LedgerEntry, record: CanonicalRecord, today: string): LedgerEntry {
    if (entry.record.doi === null && record.doi !== null) {
        return ledger.upsert(record, entry.state, today);
    }
    ledger.touch(entry, today);
    return entry;
}

function classify(entry: LedgerEntry): Classification {
    switch (entry.state) {
        case 'in_library':
            return 'already-in-library';
        case 'ignore':
            return 'previously-ignored';
        case 'new':
            return 'repeat-new';
    }
}

function countClassification(stats: MatchRunStats, classification: Classification): void {
    switch (classification) {
        case 'newly-reported':
            stats.newlyReported++;
            break;
        case 'repeat-new':
            stats.repeatNew++;
            break;
        case 'already-in-library':
            stats.alreadyInLibrary++;
            break;
        case 'previously-ignored':
            stats.previouslyIgnored++;
            break;
    }
}

function compareClassified(a: ClassifiedRecord, b: ClassifiedRecord): number {
    const keyA = `${a.record.title}\u0000${a.entry.identityKey}`;
    const keyB = `${b.record.title}\u0000${b.entry.identityKey}`;
    if (keyA === keyB) return 0;
    return keyA < keyB ? -1 : 1;
}
