import type { AlertSourceTag, CanonicalRecord, LibraryType, RawRecord } from './record.js';

/**
 * A saved alert message, read from the alert inbox.
 */
export interface AlertMessage {
    source: AlertSourceTag;
    /** ISO date the message was received, taken from the file name */
    receivedDate: string;
    /** Path of the saved message, for log context */
    path: string;
    /** HTML body of the message */
    body: string;
}

/**
 * Interface for alert adapters (Google Scholar, MyNCBI, ScienceDirect, Wiley, Web of Science).
 * Each adapter turns one alert message into the raw records it reports.
 */
export interface AlertAdapter {
    /** Human-readable source name, used in messages */
    readonly name: string;

    readonly sourceTag: AlertSourceTag;

    /**
     * Extract every reported publication from a message.
     * An empty array is a valid result; a message that is not a recognizable alert throws AdapterError.
     */
    parse(message: AlertMessage): RawRecord[];
}

/**
 * Interface for library adapters (Zotero CSV export, CiteULike JSON export).
 * Each adapter parses an exported library and knows how to link into the online library.
 */
export interface LibraryAdapter {
    /** Human-readable service name, used in links */
    readonly serviceName: string;

    readonly libType: LibraryType;

    /**
     * Parse an exported library file's content into raw records.
     */
    parse(content: string): RawRecord[];

    /**
     * URL of a library record in the online library, or null if the service has no per-item URL.
     */
    itemUrl(record: CanonicalRecord): string | null;

    /**
     * URL searching the online library for a title.
     */
    searchUrl(title: string): string;

    /**
     * URL listing every item with a tag.
     */
    tagUrl(tag: string): string;

    /**
     * URL listing the items with a tag published in a year, or null if the service cannot express it.
     */
    tagYearUrl(tag: string, year: number): string | null;
}

/**
 * Options for library adapter initialization.
 */
export interface LibraryAdapterOptions {
    /** Base URL of the online version of the library */
    onlineLibUrl: string;
}

/**
 * A raw record together with the alert source that reported it.
 */
export interface AlertRecord {
    source: AlertSourceTag;
    raw: RawRecord;
}
