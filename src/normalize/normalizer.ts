import type { CanonicalRecord, RawRecord, RecordOrigin } from '../types/index.js';
import { createCanonicalRecord } from '../model/canonical-record.js';
import { InvalidRecordError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import {
    collapseWhitespace,
    doiFromUrl,
    extractDoi,
    extractYear,
    normalizeTitle,
    splitAuthors,
    stripTitleDecorations,
} from './text.js';

const ISO_DATE_PREFIX_RE = /^(\d{4}-\d{2}-\d{2})/;

/**
 * Convert a raw record from any alert or library adapter into a canonical record.
 *
 * No side effects beyond a warning for a DOI field that holds no DOI.
 * Throws InvalidRecordError when the result has neither a title nor a DOI.
 */
export function normalize(raw: RawRecord, origin: RecordOrigin): CanonicalRecord {
    const rawTitle = collapseWhitespace(raw.title);
    const { truncated } = stripTitleDecorations(rawTitle);

    const doi = normalizeDoi(raw, origin);

    return createCanonicalRecord({
        title: normalizeTitle(rawTitle),
        rawTitle,
        origin,
        authors: splitAuthors(raw.authors),
        doi,
        year: extractYear(raw.year) ?? extractYear(raw.date),
        journal: optionalText(raw.journal),
        sourceUrl: doi ? `https://doi.org/${doi}` : optionalText(raw.url),
        truncated,
        tags: (raw.tags ?? []).map(collapseWhitespace).filter((tag) => tag.length > 0),
        entryDate: isoDatePrefix(raw.entryDate),
        libraryId: optionalText(raw.libraryId),
        searchText: optionalText(raw.searchText),
        excerpt: optionalText(raw.excerpt),
        reference: optionalText(raw.reference),
    });
}

/**
 * Normalize a batch of raw records. Records without identity are logged and
 * left out; `rejected` counts them.
 */
export function normalizeRecords(
    raws: readonly RawRecord[],
    origin: RecordOrigin
): { records: CanonicalRecord[]; rejected: number } {
    const records: CanonicalRecord[] = [];
    let rejected = 0;
    for (const raw of raws) {
        try {
            records.push(normalize(raw, origin));
        } catch (error) {
            if (!(error instanceof InvalidRecordError)) throw error;
            getLogger().warn({ origin, rawTitle: error.rawTitle }, error.message);
            rejected++;
        }
    }
    return { records, rejected };
}

/**
 * DOI from the dedicated field, falling back to a doi.org link.
 */
function normalizeDoi(raw: RawRecord, origin: RecordOrigin): string | null {
    const field = raw.doi?.trim();
    if (field) {
        const doi = extractDoi(field);
        if (doi) return doi;
        getLogger().warn({ origin, title: raw.title, doi: field }, 'DOI field is not a DOI, ignoring it');
    }
    return doiFromUrl(raw.url);
}

function optionalText(value: string | null | undefined): string | null {
    if (!value) return null;
    const text = collapseWhitespace(value);
    return text.length > 0 ? text : null;
}

function isoDatePrefix(value: string | null | undefined): string | null {
    const match = value?.trim().match(ISO_DATE_PREFIX_RE);
    return match?.[1] ?? null;
}
