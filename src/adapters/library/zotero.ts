import { parse as csvParse } from 'csv-parse/sync';
import type { CanonicalRecord, LibraryAdapter, LibraryAdapterOptions, RawRecord } from '../../types/index.js';
import { AdapterError } from '../../utils/errors.js';

const REQUIRED_COLUMNS = ['Key', 'Title'] as const;

/**
 * Zotero library, read from the CSV the Zotero client exports.
 *
 * The online library URL is a user or group library page:
 *   https://www.zotero.org/someuser/library
 *   https://www.zotero.org/groups/1234567/somegroup/library
 */
export class ZoteroCsvAdapter implements LibraryAdapter {
    readonly serviceName = 'Zotero';
    readonly libType = 'zotero-csv' as const;
    private readonly baseUrl: string;

    constructor(options: LibraryAdapterOptions) {
        this.baseUrl = options.onlineLibUrl.replace(/\/+$/, '').replace(/\/library$/, '');
    }

    parse(content: string): RawRecord[] {
        let rows: unknown;
        try {
            rows = csvParse(content, {
                columns: true,
                bom: true,
                skip_empty_lines: true,
                relax_column_count: true,
            });
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new AdapterError(`Cannot parse Zotero CSV export: ${reason}`, this.libType, { cause: error });
        }

        if (!Array.isArray(rows) || !rows.every(isStringRecord)) {
            throw new AdapterError('Zotero CSV export did not parse into rows', this.libType);
        }

        const first = rows[0];
        const missing = first ? REQUIRED_COLUMNS.filter((column) => !(column in first)) : [];
        if (missing.length > 0) {
            throw new AdapterError(`Zotero CSV export lacks column(s): ${missing.join(', ')}`, this.libType);
        }

        return rows.map((row) => ({
            title: row['Title'] ?? '',
            libraryId: row['Key'] ?? null,
            // "Gloaguen, Yoann; Morton, Fraser"
            authors: row['Author'] ?? null,
            doi: row['DOI'] ?? null,
            url: row['Url'] ?? null,
            year: row['Publication Year'] ?? null,
            journal: row['Item Type'] === 'journalArticle' ? (row['Publication Title'] ?? null) : null,
            tags: (row['Manual Tags'] ?? '').split('; ').filter((tag) => tag.trim().length > 0),
            // "2017-09-14 17:48:40"
            entryDate: row['Date Added'] ?? null,
        }));
    }

    itemUrl(record: CanonicalRecord): string | null {
        return record.libraryId ? `${this.baseUrl}/items/${encodeURIComponent(record.libraryId)}` : null;
    }

    searchUrl(title: string): string {
        return `${this.baseUrl}/search/${encodeURIComponent(title)}/titleCreatorYear/item-list`;
    }

    tagUrl(tag: string): string {
        return `${this.baseUrl}/tags/${encodeURIComponent(tag)}`;
    }

    tagYearUrl(): string | null {
        return null;
    }
}

function isStringRecord(row: unknown): row is Record<string, string> {
    return (
        typeof row === 'object' &&
        row !== null &&
        !Array.isArray(row) &&
        Object.values(row).every((value) => typeof value === 'string')
    );
}
