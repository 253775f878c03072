/**
 * PubSpork library entry point.
 */
export * from './types/index.js';
export { normalize, normalizeRecords } from './normalize/normalizer.js';
export { normalizeTitle, extractDoi, doiFromUrl, extractYear, splitAuthors, titleSimilarity } from './normalize/text.js';
export { createCanonicalRecord, withFields } from './model/canonical-record.js';
export { identityKey } from './matching/identity.js';
export { match, compareRecords } from './matching/matcher.js';
export { Ledger, nextState, type LedgerOptions, type ResolvedEntry } from './ledger/ledger.js';
export { loadLedger, parseLedger, serializeLedger, saveLedger, LEDGER_COLUMNS } from './ledger/ledger-file.js';
export { runMatch, type MatchRunInput, type MatchRunResult } from './orchestrator/match-run.js';
export { runTriage, readTitleList, type TriageOptions } from './orchestrator/pipeline.js';
export { runReport, type ReportRunOptions } from './orchestrator/report-run.js';
export * from './adapters/alerts/index.js';
export { getLibraryAdapter, readLibrary, CiteULikeJsonAdapter, ZoteroCsvAdapter } from './adapters/library/index.js';
export { curationLinks, proxyUrl, type CurationLink, type CurationLinkOptions } from './links/curation-links.js';
export { renderCurationPage, writeCurationPage, type CurationPageOptions } from './viewer/curation-page.js';
export { generateReport, REPORT_KINDS, REPORT_FORMATS, type ReportKind, type ReportFormat } from './reports/library-report.js';
export { resolveConfig } from './utils/config.js';
export { InvalidRecordError, LedgerLoadError, ConfigError, AdapterError } from './utils/errors.js';
export { initLogger, getLogger } from './utils/logger.js';
