/**
 * Alert sources PubSpork can read. Each tag selects one alert adapter.
 */
export const ALERT_SOURCE_TAGS = [
    'googlescholar-email',
    'myncbi-email',
    'sciencedirect-email',
    'wiley-email',
    'webofscience-email',
] as const;

export type AlertSourceTag = (typeof ALERT_SOURCE_TAGS)[number];

/**
 * Library export formats PubSpork can read. Each type selects one library adapter.
 */
export const LIBRARY_TYPES = ['zotero-csv', 'citeulike-json'] as const;

export type LibraryType = (typeof LIBRARY_TYPES)[number];

/**
 * Which adapter produced a record.
 */
export type RecordOrigin = AlertSourceTag | LibraryType | 'ledger';

/**
 * Raw record as produced by an alert or library adapter, before normalization.
 * Only the title is guaranteed; everything else depends on the source format.
 */
export interface RawRecord {
    title: string;
    url?: string | null;
    /** DOI in any format: bare, `doi:` prefixed, or a doi.org URL */
    doi?: string | null;
    /** Either a delimited author string or an already-split list */
    authors?: string | string[] | null;
    journal?: string | null;
    year?: number | string | null;
    /** Date string whose leading four digits are the publication year */
    date?: string | null;
    tags?: string[];
    /** Date the item was added to the library (libraries only) */
    entryDate?: string | null;
    /** Item key in the library (libraries only) */
    libraryId?: string | null;
    /** The saved search the alert was sent for (alerts only) */
    searchText?: string | null;
    /** Text the alert quoted from the publication (alerts only) */
    excerpt?: string | null;
    /** Free-text citation: volume, issue, pages */
    reference?: string | null;
}

/**
 * CanonicalRecord: one publication as understood by the matching engine,
 * independent of the format it came from.
 */
export interface CanonicalRecord {
    /** Comparison title: case-folded, whitespace-collapsed, export punctuation stripped */
    readonly title: string;

    /** Title as given by the source, for display */
    readonly rawTitle: string;

    /** Author names in source order */
    readonly authors: readonly string[];

    /** Lower-case DOI without URL or `doi:` prefix */
    readonly doi: string | null;

    readonly year: number | null;

    readonly journal: string | null;

    /** DOI resolver URL when a DOI is known, otherwise the direct URL */
    readonly sourceUrl: string | null;

    readonly origin: RecordOrigin;

    /** True when the source cut the title short with an ellipsis */
    readonly truncated: boolean;

    readonly tags: readonly string[];

    /** ISO date (YYYY-MM-DD) the item was added to the library */
    readonly entryDate: string | null;

    readonly libraryId: string | null;

    readonly searchText: string | null;

    readonly excerpt: string | null;

    readonly reference: string | null;
}
