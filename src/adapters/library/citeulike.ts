import type { CanonicalRecord, LibraryAdapter, LibraryAdapterOptions, RawRecord } from '../../types/index.js';
import { AdapterError } from '../../utils/errors.js';

const CITEULIKE_BASE_URL = 'http://www.citeulike.org';

/**
 * CiteULike library, read from the JSON export of a user or group library.
 *
 *   http://www.citeulike.org/user/someuser
 *   http://www.citeulike.org/group/16008/library
 */
export class CiteULikeJsonAdapter implements LibraryAdapter {
    readonly serviceName = 'CiteULike';
    readonly libType = 'citeulike-json' as const;
    private readonly owner: { kind: 'user'; name: string } | { kind: 'group'; id: string };

    constructor(options: LibraryAdapterOptions) {
        let path: string;
        try {
            path = new URL(options.onlineLibUrl).pathname;
        } catch (error) {
            throw new AdapterError(`Library URL is not a URL: ${options.onlineLibUrl}`, this.libType, { cause: error });
        }

        const [kind, id] = path.split('/').filter((part) => part.length > 0);
        if (kind === 'user' && id) {
            this.owner = { kind: 'user', name: id };
        } else if (kind === 'group' && id) {
            this.owner = { kind: 'group', id };
        } else {
            throw new AdapterError(
                `Library URL is not a CiteULike user or group library: ${options.onlineLibUrl}`,
                this.libType
            );
        }
    }

    parse(content: string): RawRecord[] {
        let items: unknown;
        try {
            items = JSON.parse(content);
        } catch (error) {
            throw new AdapterError('CiteULike export is not valid JSON', this.libType, { cause: error });
        }

        if (!Array.isArray(items)) {
            throw new AdapterError('CiteULike export is not a JSON array', this.libType);
        }

        return items.filter(isObject).map((item) => {
            const published = item['published'];
            return {
                title: stringField(item, 'title') ?? '',
                libraryId: stringField(item, 'article_id'),
                // ["Enis Afgan", "Dannon Baker"]
                authors: stringList(item['authors']),
                doi: stringField(item, 'doi'),
                url: stringField(item, 'href'),
                year: Array.isArray(published) && typeof published[0] === 'string' ? published[0] : null,
                journal: stringField(item, 'journal'),
                tags: stringList(item['tags']),
                // "2016-12-22 00:18:58"
                entryDate: stringField(item, 'date'),
            };
        });
    }

    itemUrl(record: CanonicalRecord): string | null {
        return record.libraryId ? `${this.ownerUrl()}/article/${encodeURIComponent(record.libraryId)}` : null;
    }

    searchUrl(title: string): string {
        return this.searchLibraryUrl(`title:${title}`);
    }

    tagUrl(tag: string): string {
        return `${this.ownerUrl()}/tag/${encodeURIComponent(tag)}`;
    }

    tagYearUrl(tag: string, year: number): string {
        return this.searchLibraryUrl(`tag:${tag} && year:${year}`);
    }

    private ownerUrl(): string {
        return this.owner.kind === 'user'
            ? `${CITEULIKE_BASE_URL}/user/${this.owner.name}`
            : `${CITEULIKE_BASE_URL}/group/${this.owner.id}`;
    }

    private searchLibraryUrl(query: string): string {
        const params = new URLSearchParams({ q: query, search: 'Search library' });
        if (this.owner.kind === 'user') {
            params.set('username', this.owner.name);
            return `${CITEULIKE_BASE_URL}/search/username?${params.toString()}`;
        }
        params.set('group_id', this.owner.id);
        return `${CITEULIKE_BASE_URL}/search/group?${params.toString()}`;
    }
}

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(item: Record<string, unknown>, key: string): string | null {
    const value = item[key];
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    return null;
}

function stringList(value: unknown): string[] {
    return Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === 'string') : [];
}
