import type { CanonicalRecord, AlertSourceTag } from './record.js';
import type { LedgerEntry } from './ledger.js';

/**
 * Confidence of an identity match, strongest first.
 *
 *   certain   equal DOIs
 *   high      equal normalized titles, years compatible
 *   probable  fuzzy title match (or truncated-title prefix), years equal
 */
export type MatchTier = 'certain' | 'high' | 'probable';

export interface MatchResult<T extends CanonicalRecord = CanonicalRecord> {
    record: T;
    /** Position of the matched record in the population */
    index: number;
    tier: MatchTier;
    /** 1.0 for certain/high; the similarity ratio for probable */
    score: number;
}

/**
 * Tunable parameters of the fuzzy tier. Defaults live in DEFAULT_CONFIG.matching.
 */
export interface MatchPolicy {
    /** Minimum similarity ratio (0..1) for a probable match */
    fuzzyThreshold: number;
    /** Largest year difference tolerated by an exact-title match */
    yearTolerance: number;
    /** Shortest folded title that may be prefix-matched as a truncation */
    minTruncatedLength: number;
}

/**
 * Outcome of classifying one deduplicated alert record against the ledger.
 */
export type Classification = 'newly-reported' | 'repeat-new' | 'already-in-library' | 'previously-ignored';

/**
 * One alert that reported a publication.
 */
export interface AlertReport {
    source: AlertSourceTag;
    rawTitle: string;
    searchText: string | null;
    excerpt: string | null;
    reference: string | null;
}

/**
 * A deduplicated alert record with its classification, handed to the curation page renderer.
 */
export interface ClassifiedRecord {
    record: CanonicalRecord;
    classification: Classification;
    /** Tier of the ledger match; null for newly-reported records */
    tier: MatchTier | null;
    entry: LedgerEntry;
    /** The library item behind an in_library entry, when this run's library export has it */
    libraryRecord: CanonicalRecord | null;
    /** Every alert in the batch that reported this publication, in batch order */
    reports: AlertReport[];
}

/**
 * Counters reported at the end of a match run.
 */
export interface MatchRunStats {
    libraryRecords: number;
    /** Library records dropped for having neither a title nor a DOI */
    libraryRejected: number;
    /** Library records sharing a title or DOI with an earlier one, not on the ok list */
    libraryDuplicates: number;
    alertRecords: number;
    alertRejected: number;
    /** Alert records folded into an earlier record of the same batch */
    alertDuplicatesMerged: number;
    newlyReported: number;
    repeatNew: number;
    alreadyInLibrary: number;
    previouslyIgnored: number;
    ledgerEntries: number;
    ledgerRowErrors: number;
}
