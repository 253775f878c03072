import type { CanonicalRecord, RecordOrigin } from '../types/index.js';
import { InvalidRecordError } from '../utils/errors.js';

/**
 * Fields accepted by createCanonicalRecord. Optional fields default to empty/null.
 */
export interface CanonicalRecordFields {
    title: string;
    rawTitle: string;
    origin: RecordOrigin;
    authors?: readonly string[];
    doi?: string | null;
    year?: number | null;
    journal?: string | null;
    sourceUrl?: string | null;
    truncated?: boolean;
    tags?: readonly string[];
    entryDate?: string | null;
    libraryId?: string | null;
    searchText?: string | null;
    excerpt?: string | null;
    reference?: string | null;
}

/**
 * Build an immutable canonical record.
 *
 * A record with neither a title nor a DOI carries no identity, so it cannot be
 * matched or stored: construction throws InvalidRecordError.
 */
export function createCanonicalRecord(fields: CanonicalRecordFields): CanonicalRecord {
    const doi = fields.doi ? fields.doi : null;

    if (fields.title.length === 0 && doi === null) {
        throw new InvalidRecordError(
            `Record from ${fields.origin} has neither a title nor a DOI`,
            fields.rawTitle
        );
    }

    return Object.freeze({
        title: fields.title,
        rawTitle: fields.rawTitle,
        authors: Object.freeze([...(fields.authors ?? [])]),
        doi,
        year: fields.year ?? null,
        journal: fields.journal ?? null,
        sourceUrl: fields.sourceUrl ?? null,
        origin: fields.origin,
        truncated: fields.truncated ?? false,
        tags: Object.freeze([...(fields.tags ?? [])]),
        entryDate: fields.entryDate ?? null,
        libraryId: fields.libraryId ?? null,
        searchText: fields.searchText ?? null,
        excerpt: fields.excerpt ?? null,
        reference: fields.reference ?? null,
    });
}

/**
 * Copy a record, replacing some fields. The result is validated like a new record.
 */
export function withFields(record: CanonicalRecord, changes: Partial<CanonicalRecordFields>): CanonicalRecord {
    return createCanonicalRecord({ ...record, ...changes });
}
