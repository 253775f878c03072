/**
 * Error taxonomy.
 *
 * InvalidRecordError and per-row ledger problems are recovered where they happen;
 * LedgerLoadError, ConfigError and a library-level AdapterError abort the run.
 */

/**
 * A raw record normalized to neither a usable title nor a DOI.
 */
export class InvalidRecordError extends Error {
    constructor(
        message: string,
        public readonly rawTitle: string
    ) {
        super(message);
        this.name = 'InvalidRecordError';
    }
}

/**
 * The ledger file exists (or was named) but cannot be parsed as a ledger.
 */
export class LedgerLoadError extends Error {
    constructor(
        message: string,
        public readonly path: string | null,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'LedgerLoadError';
    }
}

/**
 * An invalid option value from the command line or config file.
 */
export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly option: string
    ) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * A library export or alert message that an adapter cannot parse.
 */
export class AdapterError extends Error {
    constructor(
        message: string,
        public readonly adapter: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'AdapterError';
    }
}
