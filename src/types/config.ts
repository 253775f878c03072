import { ALERT_SOURCE_TAGS, type AlertSourceTag, type LibraryType } from './record.js';
import type { MatchPolicy } from './match.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * How a paywall proxy rewrites the host of a publication URL.
 * Some proxies keep the dots of the original host, others replace them with dashes.
 */
export type ProxySeparator = 'dot' | 'dash';

/**
 * Full PubSpork configuration merged from CLI flags and the config file.
 * Dates are ISO `YYYY-MM-DD` strings, validated before they get here.
 */
export interface PubSporkConfig {
    // Library of already-accepted pubs
    libType?: LibraryType;
    libPath?: string;
    onlineLibUrl?: string;

    // Alerts
    alertsDir?: string;
    sources: AlertSourceTag[];
    since?: string;
    before?: string;

    // Ledger
    ledgerIn?: string;
    ledgerOut?: string;

    // Curation page
    curationPage?: string;
    proxy?: string;
    proxySeparator: ProxySeparator;
    customSearchUrl?: string;
    okDuplicateTitles?: string;
    showIgnored: boolean;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    // Identity matching policy
    matching: MatchPolicy;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: PubSporkConfig = {
    sources: [...ALERT_SOURCE_TAGS],
    proxySeparator: 'dot',
    showIgnored: false,
    logLevel: 'info',
    jsonLogs: false,
    matching: {
        fuzzyThreshold: 0.9,
        yearTolerance: 1,
        minTruncatedLength: 50,
    },
};
