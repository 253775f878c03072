import type { PubSporkConfig } from '../types/index.js';
import { getLibraryAdapter, readLibrary } from '../adapters/library/index.js';
import { normalizeRecords } from '../normalize/normalizer.js';
import { generateReport, type ReportFormat, type ReportKind } from '../reports/library-report.js';
import { isIsoDate } from '../utils/dates.js';
import { ConfigError } from '../utils/errors.js';
import { readTitleList } from './pipeline.js';

export interface ReportRunOptions {
    kind: ReportKind;
    format: ReportFormat;
    entryStart?: string;
    entryEnd?: string;
    /** File listing the tags to report, one per line */
    tagsFile?: string;
}

/**
 * Read the library export and render one report from it.
 */
export function runReport(config: PubSporkConfig, options: ReportRunOptions): string {
    for (const [option, value] of [['entry-start', options.entryStart], ['entry-end', options.entryEnd]] as const) {
        if (value !== undefined && !isIsoDate(value)) {
            throw new ConfigError(`--${option} must be a date as YYYY-MM-DD, got "${value}"`, option);
        }
    }

    if (!config.libType || !config.libPath || !config.onlineLibUrl) {
        throw new ConfigError('A report needs --lib-type, --lib and --online-lib-url', 'lib');
    }
    const onlyTags = options.tagsFile ? readTitleList(options.tagsFile, 'tags') : undefined;

    const library = getLibraryAdapter(config.libType, { onlineLibUrl: config.onlineLibUrl });
    const { records } = normalizeRecords(readLibrary(library, config.libPath), config.libType);

    return generateReport(options.kind, options.format, records, library, {
        entryStart: options.entryStart,
        entryEnd: options.entryEnd,
        onlyTags,
    });
}
