import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { parse } from 'csv-parse/sync';
import type { CanonicalRecord, LedgerEntry, LedgerRowError, LedgerState, MatchPolicy } from '../types/index.js';
import { LEDGER_STATES } from '../types/index.js';
import { identityKey } from '../matching/identity.js';
import { normalize } from '../normalize/normalizer.js';
import { collapseWhitespace, extractDoi } from '../normalize/text.js';
import { isIsoDate } from '../utils/dates.js';
import { InvalidRecordError, LedgerLoadError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { Ledger } from './ledger.js';

// ─── File format ────────────────────────────────────────────

/**
 * Managed columns, in the order they are written.
 * Any other column in a loaded file is carried through verbatim after these.
 */
export const LEDGER_COLUMNS = [
    'title',
    'authors',
    'doi',
    'year',
    'journal',
    'state',
    'first_seen_date',
    'entry_date',
    'annotation',
] as const;

export type LedgerColumn = (typeof LEDGER_COLUMNS)[number];

const REQUIRED_COLUMNS: readonly LedgerColumn[] = ['title', 'state'];

/** Spellings written by older versions */
const STATE_ALIASES: Record<string, LedgerState> = {
    inlib: 'in_library',
};

export interface LedgerLoadResult {
    ledger: Ledger;
    rowErrors: LedgerRowError[];
}

export interface ParseLedgerOptions {
    /** Path the text was read from, for errors and log context */
    path?: string | null;
    policy?: MatchPolicy;
}

// ─── Loading ────────────────────────────────────────────────

/**
 * Load a ledger file. Throws LedgerLoadError when the file is missing or is not a ledger;
 * individual bad rows are reported in `rowErrors` and kept for the next save.
 */
export function loadLedger(path: string, policy?: MatchPolicy): LedgerLoadResult {
    if (!existsSync(path)) {
        throw new LedgerLoadError(`Ledger file not found: ${path}`, path);
    }

    let text: string;
    try {
        text = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new LedgerLoadError(`Cannot read ledger file: ${path}`, path, { cause: error });
    }

    const result = parseLedger(text, { path, policy });
    getLogger().info(
        { path, entries: result.ledger.size, rejected: result.rowErrors.length },
        'Ledger loaded'
    );
    return result;
}

/**
 * Parse ledger text: tab-separated, header row first.
 */
export function parseLedger(text: string, options: ParseLedgerOptions = {}): LedgerLoadResult {
    const path = options.path ?? null;
    const log = getLogger();

    if (text.trim().length === 0) {
        throw new LedgerLoadError('Ledger is empty (no header row)', path);
    }

    const [headerRow, ...dataRows] = readRows(text, path);
    const header = readHeader(headerRow ?? [], path);
    const extraColumns = header.filter((column) => !isLedgerColumn(column));

    const rowErrors: LedgerRowError[] = [];
    const entries: LedgerEntry[] = [];
    const rowOfKey = new Map<string, number>();

    dataRows.forEach((cells, i) => {
        const row = i + 1;
        const values: Record<string, string> = {};
        header.forEach((column, index) => {
            values[column] = cells[index] ?? '';
        });
        const overflow = cells.slice(header.length);

        const parsed = overflow.length > 0
            ? `row has ${cells.length} fields, header has ${header.length}`
            : parseRow(values, extraColumns);

        if (typeof parsed === 'string') {
            rowErrors.push({ row, reason: parsed, values, overflow });
            return;
        }

        const firstRow = rowOfKey.get(parsed.identityKey);
        if (firstRow !== undefined) {
            rowErrors.push({ row, reason: `duplicate of row ${firstRow} (${parsed.identityKey})`, values, overflow });
            return;
        }

        rowOfKey.set(parsed.identityKey, row);
        entries.push(parsed);
    });

    for (const error of rowErrors) {
        log.warn({ path, row: error.row, reason: error.reason }, 'Skipping malformed ledger row');
    }

    const ledger = new Ledger({ policy: options.policy, extraColumns, rejectedRows: rowErrors });
    for (const entry of entries) {
        ledger.add(entry);
    }

    return { ledger, rowErrors };
}

function readRows(text: string, path: string | null): string[][] {
    let rows: unknown;
    try {
        rows = parse(text, {
            delimiter: '\t',
            bom: true,
            relax_column_count: true,
            relax_quotes: true,
            skip_empty_lines: true,
            skip_records_with_empty_values: true,
        });
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new LedgerLoadError(`Ledger is not valid tab-separated text: ${reason}`, path, { cause: error });
    }

    if (!Array.isArray(rows) || !rows.every(isStringRow)) {
        throw new LedgerLoadError('Ledger parser returned unexpected rows', path);
    }
    return rows;
}

function isStringRow(row: unknown): row is string[] {
    return Array.isArray(row) && row.every((cell) => typeof cell === 'string');
}

/**
 * Column names of a header row. Managed columns are matched case-insensitively
 * and returned in their canonical spelling; other names are kept as written.
 */
function readHeader(cells: readonly string[], path: string | null): string[] {
    const header = cells.map((cell) => {
        const name = cell.trim();
        return LEDGER_COLUMNS.find((column) => column === name.toLowerCase()) ?? name;
    });

    const seen = new Set<string>();
    for (const column of header) {
        if (seen.has(column)) {
            throw new LedgerLoadError(`Ledger header repeats column "${column}"`, path);
        }
        seen.add(column);
    }

    const missing = REQUIRED_COLUMNS.filter((column) => !seen.has(column));
    if (missing.length > 0) {
        throw new LedgerLoadError(`Ledger header lacks required column(s): ${missing.join(', ')}`, path);
    }

    return header;
}

/**
 * A validated entry, or the reason the row was rejected.
 */
function parseRow(values: Record<string, string>, extraColumns: readonly string[]): LedgerEntry | string {
    const cell = (column: LedgerColumn): string => (values[column] ?? '').trim();

    const stateText = cell('state').toLowerCase();
    const state = parseState(stateText);
    if (!state) return `unknown state "${stateText}"`;

    const title = values['title'] ?? '';
    const doiText = cell('doi');
    if (collapseWhitespace(title).length === 0 && doiText.length === 0) {
        return 'row has neither a title nor a DOI';
    }
    if (doiText && !extractDoi(doiText)) return `doi "${doiText}" is not a DOI`;

    const yearText = cell('year');
    if (yearText && !/^\d{4}$/.test(yearText)) return `year "${yearText}" is not a four-digit year`;

    for (const column of ['first_seen_date', 'entry_date'] as const) {
        const date = cell(column);
        if (date && !isIsoDate(date)) return `${column} "${date}" is not a YYYY-MM-DD date`;
    }

    let record: CanonicalRecord;
    try {
        record = normalize(
            {
                title,
                authors: cell('authors').split(';'),
                doi: doiText || null,
                year: yearText || null,
                journal: cell('journal'),
            },
            'ledger'
        );
    } catch (error) {
        if (error instanceof InvalidRecordError) return error.message;
        throw error;
    }

    const extra: Record<string, string> = {};
    for (const column of extraColumns) {
        extra[column] = values[column] ?? '';
    }

    return {
        identityKey: identityKey(record),
        record,
        state,
        firstSeenDate: cell('first_seen_date') || null,
        entryDate: cell('entry_date') || null,
        annotation: values['annotation'] ?? '',
        extra,
    };
}

function parseState(text: string): LedgerState | null {
    const name = STATE_ALIASES[text] ?? text;
    return LEDGER_STATES.find((state) => state === name) ?? null;
}

function isLedgerColumn(column: string): boolean {
    return LEDGER_COLUMNS.some((managed) => managed === column);
}

// ─── Saving ─────────────────────────────────────────────────

/**
 * Ledger as TSV text. Output depends only on the ledger contents:
 * fixed column order, rows sorted by entry date then identity key,
 * rejected rows last in their original order.
 */
export function serializeLedger(ledger: Ledger): string {
    const header = [...LEDGER_COLUMNS, ...ledger.getExtraColumns()];
    const lines = [formatRow(header)];

    const entries = [...ledger.getEntries()].sort(compareEntries);
    for (const entry of entries) {
        lines.push(formatRow(header.map((column) => entryValue(entry, column))));
    }

    for (const rejected of ledger.getRejectedRows()) {
        lines.push(formatRow([...header.map((column) => rejected.values[column] ?? ''), ...rejected.overflow]));
    }

    return lines.join('\n') + '\n';
}

/**
 * Write the ledger to `path` atomically: the text goes to a temporary
 * sibling first, which is then renamed over the target.
 */
export function saveLedger(ledger: Ledger, path: string): void {
    const content = serializeLedger(ledger);
    const tempPath = `${path}.${process.pid}.tmp`;

    mkdirSync(dirname(path), { recursive: true });
    try {
        writeFileSync(tempPath, content, 'utf-8');
        renameSync(tempPath, path);
    } catch (error) {
        rmSync(tempPath, { force: true });
        throw error;
    }

    getLogger().info({ path, entries: ledger.size }, 'Ledger saved');
}

function compareEntries(a: LedgerEntry, b: LedgerEntry): number {
    const dateA = a.entryDate ?? '';
    const dateB = b.entryDate ?? '';
    if (dateA !== dateB) return dateA < dateB ? -1 : 1;
    if (a.identityKey === b.identityKey) return 0;
    return a.identityKey < b.identityKey ? -1 : 1;
}

function entryValue(entry: LedgerEntry, column: string): string {
    const managed = LEDGER_COLUMNS.find((name) => name === column);
    const record = entry.record;

    switch (managed) {
        case 'title':
            return record.rawTitle;
        case 'authors':
            return record.authors.join('; ');
        case 'doi':
            return record.doi ?? '';
        case 'year':
            return record.year === null ? '' : String(record.year);
        case 'journal':
            return record.journal ?? '';
        case 'state':
            return entry.state;
        case 'first_seen_date':
            return entry.firstSeenDate ?? '';
        case 'entry_date':
            return entry.entryDate ?? '';
        case 'annotation':
            return entry.annotation;
        case undefined:
            return entry.extra[column] ?? '';
    }
}

function formatRow(fields: readonly string[]): string {
    return fields.map(escapeField).join('\t');
}

/**
 * Quote a field containing a tab, a line break or a double quote.
 */
function escapeField(value: string): string {
    if (/[\t\n\r"]/.test(value)) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}
