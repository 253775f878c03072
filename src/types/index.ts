/**
 * Barrel export for all shared types.
 */
export { ALERT_SOURCE_TAGS, LIBRARY_TYPES } from './record.js';
export type { AlertSourceTag, LibraryType, RecordOrigin, RawRecord, CanonicalRecord } from './record.js';
export { LEDGER_STATES } from './ledger.js';
export type { LedgerState, LedgerEntry, LedgerRowError } from './ledger.js';
export type {
    MatchTier,
    MatchResult,
    MatchPolicy,
    Classification,
    AlertReport,
    ClassifiedRecord,
    MatchRunStats,
} from './match.js';
export { DEFAULT_CONFIG } from './config.js';
export type { PubSporkConfig, LogLevel, ProxySeparator } from './config.js';
export type { AlertAdapter, AlertMessage, AlertRecord, LibraryAdapter, LibraryAdapterOptions } from './adapters.js';
