import type { CanonicalRecord, LibraryAdapter } from '../types/index.js';
import { escapeHtml } from '../utils/html.js';

// ─── Types ───────────────────────────────────────────────

export const REPORT_KINDS = ['year', 'journal', 'tagyear', 'tagcount', 'pubs'] as const;
export type ReportKind = (typeof REPORT_KINDS)[number];

export const REPORT_FORMATS = ['markdown', 'html', 'json'] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export interface ReportOptions {
    /** First entry date included (tagcount and pubs reports) */
    entryStart?: string;
    /** Last entry date included (tagcount and pubs reports) */
    entryEnd?: string;
    /** Report only these tags, in tag reports */
    onlyTags?: readonly string[];
    /** Tag/count pairs per row of a markdown or HTML tagcount report */
    tagColumnGroups?: number;
}

export interface YearRow {
    year: number | null;
    count: number;
}

export interface JournalRow {
    /** Competition rank: journals with equal counts share a rank */
    rank: number;
    journal: string;
    count: number;
}

export interface TagYearRow {
    tag: string;
    total: number;
    /** Count per year, aligned with TagYearTable.years */
    counts: number[];
}

export interface TagYearTable {
    years: Array<number | null>;
    rows: TagYearRow[];
}

export interface TagCount {
    tag: string;
    count: number;
}

// ─── Main Report Function ────────────────────────────────

/**
 * Render one library report.
 */
export function generateReport(
    kind: ReportKind,
    format: ReportFormat,
    records: readonly CanonicalRecord[],
    library: LibraryAdapter,
    options: ReportOptions = {}
): string {
    switch (kind) {
        case 'year': {
            const rows = yearCounts(records);
            if (format === 'json') return toJson({ kind, total: records.length, years: rows });
            return format === 'markdown' ? yearMarkdown(rows) : yearHtml(rows);
        }
        case 'journal': {
            const rows = journalCounts(records);
            if (format === 'json') return toJson({ kind, journals: rows });
            return format === 'markdown' ? journalMarkdown(rows) : journalHtml(rows);
        }
        case 'tagyear': {
            const table = tagYearTable(records, options.onlyTags);
            if (format === 'json') return toJson({ kind, ...table });
            return format === 'markdown' ? tagYearMarkdown(table, library) : tagYearHtml(table, library);
        }
        case 'tagcount': {
            const inRange = recordsEnteredBetween(records, options.entryStart, options.entryEnd);
            const tags = tagCounts(inRange, options.onlyTags);
            if (format === 'json') {
                return toJson({ kind, entryStart: options.entryStart ?? null, entryEnd: options.entryEnd ?? null, total: inRange.length, tags });
            }
            const groups = Math.max(1, options.tagColumnGroups ?? 4);
            return format === 'markdown'
                ? tagCountMarkdown(tags, inRange.length, groups, library, options)
                : tagCountHtml(tags, inRange.length, groups, library, options);
        }
        case 'pubs': {
            const pubs = [...recordsEnteredBetween(records, options.entryStart, options.entryEnd)].sort(compareByEntry);
            if (format === 'json') {
                return toJson({
                    kind,
                    entryStart: options.entryStart ?? null,
                    entryEnd: options.entryEnd ?? null,
                    pubs: pubs.map((record) => ({
                        title: record.rawTitle,
                        authors: record.authors,
                        doi: record.doi,
                        year: record.year,
                        journal: record.journal,
                        entryDate: record.entryDate,
                        tags: record.tags,
                        url: pubLink(record, library),
                    })),
                });
            }
            return format === 'markdown' ? pubsMarkdown(pubs, library) : pubsHtml(pubs, library);
        }
    }
}

// ─── Counting ────────────────────────────────────────────

/**
 * Publications per publication year, oldest first; unknown years last.
 */
export function yearCounts(records: readonly CanonicalRecord[]): YearRow[] {
    const counts = new Map<number | null, number>();
    for (const record of records) {
        counts.set(record.year, (counts.get(record.year) ?? 0) + 1);
    }
    return [...counts.entries()]
        .map(([year, count]) => ({ year, count }))
        .sort((a, b) => compareYears(a.year, b.year));
}

/**
 * Publications per journal, most first. Journal names are grouped case-insensitively.
 */
export function journalCounts(records: readonly CanonicalRecord[]): JournalRow[] {
    const byJournal = new Map<string, { journal: string; count: number }>();
    for (const record of records) {
        if (!record.journal) continue;
        const key = record.journal.toLowerCase();
        const row = byJournal.get(key) ?? { journal: record.journal, count: 0 };
        row.count++;
        byJournal.set(key, row);
    }

    const sorted = [...byJournal.entries()]
        .sort(([keyA, a], [keyB, b]) => b.count - a.count || compareText(keyA, keyB))
        .map(([, row]) => row);

    let rank = 0;
    return sorted.map((row, index) => {
        if (index === 0 || sorted[index - 1]?.count !== row.count) rank = index + 1;
        return { rank, journal: row.journal, count: row.count };
    });
}

/**
 * Publications per tag per publication year. Tags with the most publications come first.
 */
export function tagYearTable(records: readonly CanonicalRecord[], onlyTags?: readonly string[]): TagYearTable {
    const years = yearCounts(records).map((row) => row.year);
    const yearIndex = new Map(years.map((year, index): [number | null, number] => [year, index]));
    const rows = new Map<string, TagYearRow>();

    for (const tag of onlyTags ?? []) {
        rows.set(tag, { tag, total: 0, counts: years.map(() => 0) });
    }

    for (const record of records) {
        for (const tag of record.tags) {
            if (onlyTags && !rows.has(tag)) continue;
            const row = rows.get(tag) ?? { tag, total: 0, counts: years.map(() => 0) };
            const index = yearIndex.get(record.year) ?? 0;
            row.total++;
            row.counts[index] = (row.counts[index] ?? 0) + 1;
            rows.set(tag, row);
        }
    }

    return {
        years,
        rows: [...rows.values()].sort((a, b) => b.total - a.total || compareText(a.tag, b.tag)),
    };
}

/**
 * Publications per tag, most first, leaving out tags nothing carries.
 */
export function tagCounts(records: readonly CanonicalRecord[], onlyTags?: readonly string[]): TagCount[] {
    const counts = new Map<string, number>();
    for (const record of records) {
        for (const tag of record.tags) {
            if (onlyTags && !onlyTags.includes(tag)) continue;
            counts.set(tag, (counts.get(tag) ?? 0) + 1);
        }
    }
    return [...counts.entries()]
        .map(([tag, count]) => ({ tag, count }))
        .sort((a, b) => b.count - a.count || compareText(a.tag, b.tag));
}

/**
 * Records whose entry date lies in [start, end], both ends included.
 * Without bounds every record qualifies; with bounds, records lacking an entry date do not.
 */
export function recordsEnteredBetween(
    records: readonly CanonicalRecord[],
    start?: string,
    end?: string
): CanonicalRecord[] {
    if (start === undefined && end === undefined) return [...records];
    return records.filter((record) => {
        if (record.entryDate === null) return false;
        if (start !== undefined && record.entryDate < start) return false;
        if (end !== undefined && record.entryDate > end) return false;
        return true;
    });
}

function compareYears(a: number | null, b: number | null): number {
    if (a === b) return 0;
    if (a === null) return 1;
    if (b === null) return -1;
    return a - b;
}

function compareText(a: string, b: string): number {
    const lowerA = a.toLowerCase();
    const lowerB = b.toLowerCase();
    if (lowerA === lowerB) return 0;
    return lowerA < lowerB ? -1 : 1;
}

function compareByEntry(a: CanonicalRecord, b: CanonicalRecord): number {
    const dateA = a.entryDate ?? '';
    const dateB = b.entryDate ?? '';
    if (dateA !== dateB) return dateA < dateB ? -1 : 1;
    return compareText(a.title, b.title);
}

function yearLabel(year: number | null): string {
    return year === null ? 'unknown' : String(year);
}

function pubLink(record: CanonicalRecord, library: LibraryAdapter): string | null {
    return library.itemUrl(record) ?? record.sourceUrl;
}

function toJson(data: unknown): string {
    return JSON.stringify(data, null, 2) + '\n';
}

// ─── Markdown ────────────────────────────────────────────

function mdLink(text: string, url: string | null): string {
    const label = text.replace(/([\\[\]|])/g, '\\$1');
    return url ? `[${label}](${url.replace(/\)/g, '%29')})` : label;
}

function yearMarkdown(rows: readonly YearRow[]): string {
    const total = rows.reduce((sum, row) => sum + row.count, 0);
    return [
        '| Year | # |',
        '| ----: | ----: |',
        ...rows.map((row) => `| ${yearLabel(row.year)} | ${row.count} |`),
        `| Total | ${total} |`,
    ].join('\n') + '\n';
}

function journalMarkdown(rows: readonly JournalRow[]): string {
    return [
        '| Rank | Journal | # |',
        '| ----: | ---- | ----: |',
        ...rows.map((row) => `| ${row.rank} | ${mdLink(row.journal, null)} | ${row.count} |`),
    ].join('\n') + '\n';
}

function tagYearMarkdown(table: TagYearTable, library: LibraryAdapter): string {
    const lines = [
        `| Tag | # | ${table.years.map(yearLabel).join(' | ')} |`,
        `| --- | ---: | ${table.years.map(() => '---:').join(' | ')} |`,
    ];
    for (const row of table.rows) {
        const cells = row.counts.map((count, index) => {
            const year = table.years[index];
            if (count === 0) return '';
            const url = year === null || year === undefined ? null : library.tagYearUrl(row.tag, year);
            return url ? `[${count}](${url})` : String(count);
        });
        lines.push(`| ${mdLink(row.tag, library.tagUrl(row.tag))} | ${row.total} | ${cells.join(' | ')} |`);
    }
    return lines.join('\n') + '\n';
}

function tagCountMarkdown(
    tags: readonly TagCount[],
    total: number,
    groups: number,
    library: LibraryAdapter,
    options: ReportOptions
): string {
    const lines = [
        `${total} papers added between ${options.entryStart ?? 'the beginning'} and ${options.entryEnd ?? 'now'}`,
        '',
        '| # | Tag '.repeat(groups) + '|',
        '| ---: | --- '.repeat(groups) + '|',
    ];
    for (let start = 0; start < tags.length; start += groups) {
        const cells = Array.from({ length: groups }, (_, offset) => {
            const entry = tags[start + offset];
            return entry ? `| ${entry.count} | ${mdLink(entry.tag, library.tagUrl(entry.tag))} ` : '| | ';
        });
        lines.push(cells.join('') + '|');
    }
    return lines.join('\n') + '\n';
}

function pubsMarkdown(pubs: readonly CanonicalRecord[], library: LibraryAdapter): string {
    return pubs
        .map((record) => {
            const details = [
                record.authors.join(', '),
                [record.journal, record.year === null ? null : String(record.year)].filter(Boolean).join(' '),
                record.entryDate ? `added ${record.entryDate}` : '',
            ].filter((part) => part.length > 0);
            return `- ${mdLink(record.rawTitle, pubLink(record, library))}${details.length > 0 ? ` · ${details.join(' · ')}` : ''}`;
        })
        .join('\n') + '\n';
}

// ─── HTML ────────────────────────────────────────────────

function htmlLink(text: string, url: string | null): string {
    return url ? `<a href="${escapeHtml(url)}">${escapeHtml(text)}</a>` : escapeHtml(text);
}

function htmlTable(header: readonly string[], rows: readonly string[][]): string {
    return [
        '<table>',
        `  <tr>${header.map((cell) => `<th>${cell}</th>`).join('')}</tr>`,
        ...rows.map((row) => `  <tr>${row.map((cell) => `<td>${cell}</td>`).join('')}</tr>`),
        '</table>',
    ].join('\n') + '\n';
}

function yearHtml(rows: readonly YearRow[]): string {
    const total = rows.reduce((sum, row) => sum + row.count, 0);
    return htmlTable(
        ['Year', '#'],
        [...rows.map((row) => [yearLabel(row.year), String(row.count)]), ['Total', String(total)]]
    );
}

function journalHtml(rows: readonly JournalRow[]): string {
    return htmlTable(
        ['Rank', 'Journal', '#'],
        rows.map((row) => [String(row.rank), escapeHtml(row.journal), String(row.count)])
    );
}

function tagYearHtml(table: TagYearTable, library: LibraryAdapter): string {
    return htmlTable(
        ['Tag', '#', ...table.years.map(yearLabel)],
        table.rows.map((row) => [
            htmlLink(row.tag, library.tagUrl(row.tag)),
            String(row.total),
            ...row.counts.map((count, index) => {
                const year = table.years[index];
                if (count === 0) return '';
                return htmlLink(String(count), year === null || year === undefined ? null : library.tagYearUrl(row.tag, year));
            }),
        ])
    );
}

function tagCountHtml(
    tags: readonly TagCount[],
    total: number,
    groups: number,
    library: LibraryAdapter,
    options: ReportOptions
): string {
    const rows: string[][] = [];
    for (let start = 0; start < tags.length; start += groups) {
        rows.push(
            Array.from({ length: groups }, (_, offset) => {
                const entry = tags[start + offset];
                return entry ? [String(entry.count), htmlLink(entry.tag, library.tagUrl(entry.tag))] : ['', ''];
            }).flat()
        );
    }
    const caption = `<p>${total} papers added between ${escapeHtml(options.entryStart ?? 'the beginning')} and ${escapeHtml(options.entryEnd ?? 'now')}</p>\n`;
    return caption + htmlTable(Array.from({ length: groups }, () => ['#', 'Tag']).flat(), rows);
}

function pubsHtml(pubs: readonly CanonicalRecord[], library: LibraryAdapter): string {
    return htmlTable(
        ['Added', 'Title', 'Authors', 'Journal', 'Year'],
        pubs.map((record) => [
            escapeHtml(record.entryDate ?? ''),
            htmlLink(record.rawTitle, pubLink(record, library)),
            escapeHtml(record.authors.join(', ')),
            escapeHtml(record.journal ?? ''),
            record.year === null ? '' : String(record.year),
        ])
    );
}
