import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadLedger, parseLedger, saveLedger, serializeLedger } from '../ledger/ledger-file.js';
import { Ledger } from '../ledger/ledger.js';
import { normalize } from '../normalize/normalizer.js';
import { LedgerLoadError } from '../utils/errors.js';

const HEADER = 'title\tauthors\tdoi\tyear\tjournal\tstate\tfirst_seen_date\tentry_date\tannotation';

const tsv = (...lines: string[]) => lines.join('\n') + '\n';

describe('Ledger file', () => {
    describe('parseLedger', () => {
        const text = tsv(
            `${HEADER}\tmy_notes`,
            'Deep Learning for X\tSmith, J; Doe, A\t\t2020\tNature\tnew\t2024-01-01\t2024-01-01\tlooks good\tread later',
            'Some DOI Paper\t\t10.1234/abc\t2019\t\tinlib\t\t2023-05-05\t\t'
        );

        it('should read managed and extra columns', () => {
            const { ledger, rowErrors } = parseLedger(text);
            expect(rowErrors).toEqual([]);
            expect(ledger.size).toBe(2);

            const entry = ledger.get('title:deep learning for x|2020');
            expect(entry?.record.authors).toEqual(['Smith, J', 'Doe, A']);
            expect(entry?.record.journal).toBe('Nature');
            expect(entry?.state).toBe('new');
            expect(entry?.annotation).toBe('looks good');
            expect(entry?.extra).toEqual({ my_notes: 'read later' });
            expect(ledger.getExtraColumns()).toEqual(['my_notes']);
        });

        it('should accept the inlib state spelling', () => {
            const entry = parseLedger(text).ledger.get('doi:10.1234/abc');
            expect(entry?.state).toBe('in_library');
            expect(entry?.firstSeenDate).toBeNull();
            expect(entry?.entryDate).toBe('2023-05-05');
        });

        it('should match managed header names case-insensitively', () => {
            const { ledger } = parseLedger(tsv('Title\tSTATE', 'X\tnew'));
            expect(ledger.get('title:x|')?.state).toBe('new');
        });

        it('should reject bad rows and keep the rest', () => {
            const { ledger, rowErrors } = parseLedger(
                tsv(
                    'title\tstate\tdoi\tyear',
                    'Good\tnew\t\t',
                    'Bad state\tmaybe\t\t',
                    '\tnew\t\t',
                    'Bad doi\tnew\tnot-a-doi\t',
                    'Bad year\tnew\t\t20x0',
                    'Good\tnew\t\t',
                    'Overflow\tnew\t\t\textra'
                )
            );

            expect(ledger.size).toBe(1);
            expect(rowErrors.map(({ row, reason }) => [row, reason])).toEqual([
                [2, 'unknown state "maybe"'],
                [3, 'row has neither a title nor a DOI'],
                [4, 'doi "not-a-doi" is not a DOI'],
                [5, 'year "20x0" is not a four-digit year'],
                [6, 'duplicate of row 1 (title:good|)'],
                [7, 'row has 5 fields, header has 4'],
            ]);
        });

        it('should reject a bad date', () => {
            const { rowErrors } = parseLedger(tsv('title\tstate\tentry_date', 'A\tnew\t2024-13-01'));
            expect(rowErrors[0]?.reason).toBe('entry_date "2024-13-01" is not a YYYY-MM-DD date');
        });

        it('should fail on an empty file', () => {
            expect(() => parseLedger('')).toThrow(LedgerLoadError);
        });

        it('should fail on a repeated column', () => {
            expect(() => parseLedger(tsv('title\ttitle\tstate'))).toThrow('Ledger header repeats column "title"');
        });

        it('should fail without the state column', () => {
            expect(() => parseLedger(tsv('title\tyear'))).toThrow('Ledger header lacks required column(s): state');
        });
    });

    describe('serializeLedger', () => {
        it('should write managed columns, then extras, sorted by entry date', () => {
            const { ledger } = parseLedger(
                tsv(
                    `${HEADER}\tmy_notes`,
                    'Deep Learning for X\tSmith, J; Doe, A\t\t2020\tNature\tnew\t2024-01-01\t2024-01-01\tlooks good\tread later',
                    'Some DOI Paper\t\t10.1234/abc\t2019\t\tinlib\t\t2023-05-05\t\t'
                )
            );

            expect(serializeLedger(ledger)).toBe(
                tsv(
                    `${HEADER}\tmy_notes`,
                    'Some DOI Paper\t\t10.1234/abc\t2019\t\tin_library\t\t2023-05-05\t\t',
                    'Deep Learning for X\tSmith, J; Doe, A\t\t2020\tNature\tnew\t2024-01-01\t2024-01-01\tlooks good\tread later'
                )
            );
        });

        it('should write rejected rows back verbatim after the entries', () => {
            const { ledger } = parseLedger(
                tsv('title\tstate\tdoi\tyear', 'Bad state\tmaybe\t\t', 'Good\tnew\t\t', 'Overflow\tnew\t\t\textra')
            );

            expect(serializeLedger(ledger)).toBe(
                tsv(
                    HEADER,
                    'Good\t\t\t\t\tnew\t\t\t',
                    'Bad state\t\t\t\t\tmaybe\t\t\t',
                    'Overflow\t\t\t\t\tnew\t\t\t\textra'
                )
            );
        });

        it('should quote fields with quotes and line breaks and read them back', () => {
            const ledger = new Ledger();
            const entry = ledger.upsert(normalize({ title: 'The "quoted" word' }, 'googlescholar-email'), 'new', '2024-01-01');
            entry.annotation = 'line one\nline two';

            const text = serializeLedger(ledger);
            expect(text).toBe(
                tsv(HEADER, '"The ""quoted"" word"\t\t\t\t\tnew\t2024-01-01\t2024-01-01\t"line one\nline two"')
            );

            const reread = parseLedger(text).ledger.getEntries()[0];
            expect(reread?.record.rawTitle).toBe('The "quoted" word');
            expect(reread?.annotation).toBe('line one\nline two');
        });

        it('should be stable across a load and save', () => {
            const first = serializeLedger(
                parseLedger(
                    tsv(
                        `${HEADER}\tmy_notes`,
                        'B paper\t\t\t2021\t\tignore\t2024-01-01\t2024-01-02\tnot relevant\t',
                        'A paper\tDoe, A\t10.1/a\t2020\tCell\tin_library\t2024-01-01\t2024-01-02\t\tx',
                        'Broken\tmaybe\t\t\t\t\t\t\t\t'
                    )
                ).ledger
            );
            expect(serializeLedger(parseLedger(first).ledger)).toBe(first);
        });
    });

    describe('saveLedger / loadLedger', () => {
        let tmpDir: string;

        beforeEach(() => {
            tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pubspork-ledger-'));
        });

        afterEach(() => {
            fs.rmSync(tmpDir, { recursive: true, force: true });
        });

        it('should write atomically and leave no temporary file', () => {
            const ledger = new Ledger();
            ledger.upsert(normalize({ title: 'Alpha', year: 2020 }, 'googlescholar-email'), 'new', '2024-01-01');
            const target = path.join(tmpDir, 'out', 'ledger.tsv');

            saveLedger(ledger, target);

            expect(fs.readdirSync(path.join(tmpDir, 'out'))).toEqual(['ledger.tsv']);
            expect(fs.readFileSync(target, 'utf-8')).toBe(tsv(HEADER, 'Alpha\t\t\t2020\t\tnew\t2024-01-01\t2024-01-01\t'));
        });

        it('should load what it saved', () => {
            const ledger = new Ledger();
            ledger.upsert(normalize({ title: 'Alpha', doi: '10.1/a' }, 'googlescholar-email'), 'in_library', '2024-01-01');
            const target = path.join(tmpDir, 'ledger.tsv');
            saveLedger(ledger, target);

            const { ledger: loaded, rowErrors } = loadLedger(target);
            expect(rowErrors).toEqual([]);
            expect(loaded.get('doi:10.1/a')?.state).toBe('in_library');
        });

        it('should fail on a missing file', () => {
            expect(() => loadLedger(path.join(tmpDir, 'missing.tsv'))).toThrow(LedgerLoadError);
        });
    });
});
