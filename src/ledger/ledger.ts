import type { CanonicalRecord, LedgerEntry, LedgerRowError, LedgerState, MatchPolicy, MatchTier } from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { createCanonicalRecord, withFields } from '../model/canonical-record.js';
import { identityKey } from '../matching/identity.js';
import { match } from '../matching/matcher.js';
import { foldTitle } from '../normalize/text.js';
import { getLogger } from '../utils/logger.js';

/**
 * A ledger entry found for a record, with the strength of the identification.
 */
export interface ResolvedEntry {
    entry: LedgerEntry;
    tier: MatchTier;
}

export interface LedgerOptions {
    policy?: MatchPolicy;
    /** Unmanaged column names, in file order */
    extraColumns?: readonly string[];
    /** Rows that failed validation on load; written back untouched */
    rejectedRows?: readonly LedgerRowError[];
}

/**
 * In-memory known-pubs ledger: one entry per publication identity ever seen.
 *
 * Entries are never removed. Besides creation, the automated mutations are the
 * `new -> in_library` state transition, `entryDate` refreshes, and filling in
 * canonical fields a row lacked. `ignore` and `annotation` belong to the user.
 */
export class Ledger {
    private readonly entries: LedgerEntry[] = [];
    private readonly byKey = new Map<string, LedgerEntry>();
    private readonly policy: MatchPolicy;
    private readonly extraColumns: readonly string[];
    private readonly rejectedRows: readonly LedgerRowError[];

    constructor(options: LedgerOptions = {}) {
        this.policy = options.policy ?? DEFAULT_CONFIG.matching;
        this.extraColumns = options.extraColumns ?? [];
        this.rejectedRows = options.rejectedRows ?? [];
    }

    get size(): number {
        return this.entries.length;
    }

    getEntries(): readonly LedgerEntry[] {
        return this.entries;
    }

    get(key: string): LedgerEntry | undefined {
        return this.byKey.get(key);
    }

    getExtraColumns(): readonly string[] {
        return this.extraColumns;
    }

    getRejectedRows(): readonly LedgerRowError[] {
        return this.rejectedRows;
    }

    /**
     * Add a fully-formed entry (used by the loader).
     * Returns false, leaving the ledger unchanged, if its identity key is already taken.
     */
    add(entry: LedgerEntry): boolean {
        if (this.byKey.has(entry.identityKey)) return false;
        this.entries.push(entry);
        this.byKey.set(entry.identityKey, entry);
        return true;
    }

    /**
     * Find the entry that denotes the same publication as `record`:
     * by identity key first, then through the identity matcher.
     */
    resolve(record: CanonicalRecord): ResolvedEntry | null {
        const keyed = this.byKey.get(identityKey(record));
        if (keyed) {
            return { entry: keyed, tier: record.doi ? 'certain' : 'high' };
        }

        const result = match(record, this.entries.map((entry) => entry.record), this.policy);
        const entry = result ? this.entries[result.index] : undefined;
        return result && entry ? { entry, tier: result.tier } : null;
    }

    /**
     * Record that `record` was observed today with the given disposition.
     *
     * Creates an entry the first time an identity is seen. Otherwise refreshes
     * `entryDate`, fills in canonical fields the entry lacked, and applies the
     * only automatic state transition (`new -> in_library`).
     */
    upsert(record: CanonicalRecord, state: LedgerState, today: string): LedgerEntry {
        const resolved = this.resolve(record);

        if (!resolved) {
            const entry: LedgerEntry = {
                identityKey: identityKey(record),
                record: toLedgerRecord(record),
                state,
                firstSeenDate: today,
                entryDate: today,
                annotation: '',
                extra: {},
            };
            this.add(entry);
            return entry;
        }

        const { entry, tier } = resolved;
        this.refresh(entry, record, tier);
        entry.state = nextState(entry.state, state);
        entry.entryDate = today;
        return entry;
    }

    /**
     * Refresh an entry's `entryDate` without touching anything else.
     */
    touch(entry: LedgerEntry, today: string): void {
        entry.entryDate = today;
    }

    /**
     * Fill in what the entry lacks from a newly observed record.
     */
    private refresh(entry: LedgerEntry, record: CanonicalRecord, tier: MatchTier): void {
        const current = entry.record;

        if (!current.doi && record.doi) {
            this.replaceRecord(entry, withFields(current, {
                doi: record.doi,
                sourceUrl: `https://doi.org/${record.doi}`,
            }), 'DOI backfilled');
        }

        if (tier === 'certain' && record.title && record.title !== entry.record.title) {
            // Same DOI under a new title: a preprint retitled on publication
            this.replaceRecord(entry, withFields(entry.record, {
                title: record.title,
                rawTitle: record.rawTitle,
                truncated: record.truncated,
            }), 'Title refreshed');
        } else if (
            entry.record.truncated &&
            !record.truncated &&
            foldTitle(record.title).startsWith(foldTitle(entry.record.title))
        ) {
            this.replaceRecord(entry, withFields(entry.record, {
                title: record.title,
                rawTitle: record.rawTitle,
                truncated: false,
            }), 'Truncated title completed');
        }

        const fill: { authors?: readonly string[]; journal?: string; year?: number } = {};
        if (entry.record.authors.length === 0 && record.authors.length > 0) fill.authors = record.authors;
        if (entry.record.journal === null && record.journal !== null) fill.journal = record.journal;
        // year is part of a title-based key, so only fill it on DOI-keyed rows
        if (entry.record.doi && entry.record.year === null && record.year !== null) fill.year = record.year;
        if (Object.keys(fill).length > 0) {
            this.replaceRecord(entry, withFields(entry.record, fill), 'Fields backfilled');
        }
    }

    /**
     * Swap an entry's record, re-keying it if its identity key changes.
     * A change that would collide with another entry's key is dropped.
     */
    private replaceRecord(entry: LedgerEntry, record: CanonicalRecord, reason: string): void {
        const newKey = identityKey(record);

        if (newKey !== entry.identityKey) {
            const holder = this.byKey.get(newKey);
            if (holder && holder !== entry) {
                getLogger().warn(
                    { key: entry.identityKey, collidesWith: newKey, reason },
                    'Ledger update skipped: identity key already used by another entry'
                );
                return;
            }
            this.byKey.delete(entry.identityKey);
            this.byKey.set(newKey, entry);
            entry.identityKey = newKey;
        }

        entry.record = record;
        getLogger().debug({ key: entry.identityKey, reason }, 'Ledger entry updated');
    }
}

/**
 * State after observing a publication with `observed` disposition.
 * Only `new -> in_library` happens automatically; `ignore` is only ever set or cleared by hand.
 */
export function nextState(current: LedgerState, observed: LedgerState): LedgerState {
    if (current === 'new' && observed === 'in_library') return 'in_library';
    return current;
}

/**
 * The part of a record a ledger row persists.
 */
export function toLedgerRecord(record: CanonicalRecord): CanonicalRecord {
    return createCanonicalRecord({
        title: record.title,
        rawTitle: record.rawTitle,
        origin: 'ledger',
        authors: record.authors,
        doi: record.doi,
        year: record.year,
        journal: record.journal,
        sourceUrl: record.sourceUrl,
        truncated: record.truncated,
    });
}
