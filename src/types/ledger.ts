import type { CanonicalRecord } from './record.js';

/**
 * Disposition of a publication in the known-pubs ledger.
 *
 *   new         seen in an alert, not curated yet
 *   in_library  present in the relevant-pubs library
 *   ignore      marked irrelevant by the user (only ever set by hand)
 */
export const LEDGER_STATES = ['new', 'in_library', 'ignore'] as const;

export type LedgerState = (typeof LEDGER_STATES)[number];

/**
 * One row of the known-pubs ledger.
 */
export interface LedgerEntry {
    /** `doi:<doi>` or `title:<title>|<year>` */
    identityKey: string;

    /** Record view of the row, used for matching (origin is always 'ledger') */
    record: CanonicalRecord;

    state: LedgerState;

    /** ISO date the publication was first reported, null for rows that predate the column */
    firstSeenDate: string | null;

    /** ISO date the row was last written by a run */
    entryDate: string | null;

    /** Free-text user comment, carried verbatim */
    annotation: string;

    /** Columns the engine does not manage, carried verbatim */
    extra: Record<string, string>;
}

/**
 * A ledger row that failed validation. It is kept so it can be written back untouched.
 */
export interface LedgerRowError {
    /** 1-based data row number (the header is not counted) */
    row: number;
    reason: string;
    /** Cell values by header name, as read */
    values: Record<string, string>;
    /** Cells beyond the last header column */
    overflow: string[];
}
