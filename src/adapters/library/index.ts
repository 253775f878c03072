import { existsSync, readFileSync } from 'node:fs';
import type { LibraryAdapter, LibraryAdapterOptions, LibraryType, RawRecord } from '../../types/index.js';
import { ConfigError } from '../../utils/errors.js';
import { getLogger } from '../../utils/logger.js';
import { CiteULikeJsonAdapter } from './citeulike.js';
import { ZoteroCsvAdapter } from './zotero.js';

const LIBRARY_ADAPTERS: Record<LibraryType, (options: LibraryAdapterOptions) => LibraryAdapter> = {
    'zotero-csv': (options) => new ZoteroCsvAdapter(options),
    'citeulike-json': (options) => new CiteULikeJsonAdapter(options),
};

/**
 * Resolve the library adapter for a library type.
 */
export function getLibraryAdapter(libType: LibraryType, options: LibraryAdapterOptions): LibraryAdapter {
    return LIBRARY_ADAPTERS[libType](options);
}

/**
 * Read a library export file through its adapter. Parse failures surface as AdapterError.
 */
export function readLibrary(adapter: LibraryAdapter, path: string): RawRecord[] {
    if (!existsSync(path)) {
        throw new ConfigError(`Library export not found: ${path}`, 'lib');
    }

    const records = adapter.parse(readFileSync(path, 'utf-8'));
    getLogger().info({ path, libType: adapter.libType, records: records.length }, 'Library export read');
    return records;
}

export { CiteULikeJsonAdapter, ZoteroCsvAdapter };
