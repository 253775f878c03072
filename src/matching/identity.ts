import type { CanonicalRecord } from '../types/index.js';

/**
 * Identity key of a record, computed from the record alone:
 * the DOI when there is one, otherwise the normalized title and year.
 *
 *   doi:10.1234/abc
 *   title:deep learning for x|2020
 *   title:untitled preprint|
 */
export function identityKey(record: CanonicalRecord): string {
    return record.doi ? `doi:${record.doi}` : titleKey(record);
}

function titleKey(record: CanonicalRecord): string {
    return `title:${record.title}|${record.year ?? ''}`;
}
