import { describe, it, expect } from 'vitest';
import {
    collapseWhitespace,
    extractDoi,
    extractYear,
    foldTitle,
    levenshteinDistance,
    normalizeTitle,
    similarityRatio,
    splitAuthors,
    stripTitleDecorations,
} from '../normalize/text.js';
import { normalize, normalizeRecords } from '../normalize/normalizer.js';
import { identityKey } from '../matching/identity.js';
import { InvalidRecordError } from '../utils/errors.js';

describe('Text utilities', () => {
    describe('collapseWhitespace', () => {
        it('should collapse runs of whitespace, newlines and nbsp', () => {
            expect(collapseWhitespace('  a \n b\u00a0c ')).toBe('a b c');
        });
    });

    describe('stripTitleDecorations', () => {
        it('should strip quotes and trailing punctuation', () => {
            expect(stripTitleDecorations('"Deep learning for X."')).toEqual({
                text: 'Deep learning for X',
                truncated: false,
            });
        });

        it('should flag a truncation ellipsis', () => {
            expect(stripTitleDecorations('A very long title that was cut …')).toEqual({
                text: 'A very long title that was cut',
                truncated: true,
            });
        });

        it('should treat three dots as an ellipsis', () => {
            expect(stripTitleDecorations('Cut short...').truncated).toBe(true);
        });
    });

    describe('normalizeTitle', () => {
        it('should case-fold and strip decorations', () => {
            expect(normalizeTitle('  Deep  Learning for X. ')).toBe('deep learning for x');
        });

        it('should give the same form for differently decorated titles', () => {
            expect(normalizeTitle('Deep Learning for X')).toBe(normalizeTitle('"Deep learning for X."'));
        });
    });

    describe('foldTitle', () => {
        it('should remove diacritics and punctuation', () => {
            expect(foldTitle('Échelle: a Study')).toBe('echelle a study');
        });
    });

    describe('extractDoi', () => {
        it('should read a doi.org URL and lowercase it', () => {
            expect(extractDoi('https://doi.org/10.1234/Test')).toBe('10.1234/test');
        });

        it('should strip a doi: prefix and trailing punctuation', () => {
            expect(extractDoi('doi:10.1234/test.')).toBe('10.1234/test');
        });

        it('should read a dx.doi.org URL with an encoded slash', () => {
            expect(extractDoi('http://dx.doi.org/10.5555%2FABC')).toBe('10.5555/abc');
        });

        it('should not read DOI-like paths of publisher URLs', () => {
            expect(extractDoi('https://www.biorxiv.org/content/10.1101/2020.05.05.079004v1')).toBeNull();
            expect(extractDoi('https://link.springer.com/content/pdf/10.1007/s00401-020-02100-5.pdf')).toBeNull();
            expect(extractDoi('https://example.org/x?doi=10.5555%2Fabc&y=1')).toBeNull();
        });

        it('should return null when there is no DOI', () => {
            expect(extractDoi('https://example.org/paper')).toBeNull();
            expect(extractDoi('')).toBeNull();
            expect(extractDoi(null)).toBeNull();
        });
    });

    describe('extractYear', () => {
        it('should parse years and date prefixes', () => {
            expect(extractYear(2020)).toBe(2020);
            expect(extractYear('2019-11-30 12:00')).toBe(2019);
        });

        it('should reject non-years', () => {
            expect(extractYear('unknown')).toBeNull();
            expect(extractYear('20201')).toBeNull();
            expect(extractYear(999)).toBeNull();
            expect(extractYear(null)).toBeNull();
        });
    });

    describe('splitAuthors', () => {
        it('should split library author lists on semicolons', () => {
            expect(splitAuthors('Smith, J; Doe, A')).toEqual(['Smith, J', 'Doe, A']);
        });

        it('should split alert author lists on commas', () => {
            expect(splitAuthors('J Smith, A Doe…')).toEqual(['J Smith', 'A Doe']);
        });

        it('should split on "and"', () => {
            expect(splitAuthors('Smith and Doe')).toEqual(['Smith', 'Doe']);
        });

        it('should accept lists and empty values', () => {
            expect(splitAuthors([' Smith ', ''])).toEqual(['Smith']);
            expect(splitAuthors(null)).toEqual([]);
        });
    });

    describe('similarity', () => {
        it('should compute edit distance', () => {
            expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
            expect(levenshteinDistance('', 'abc')).toBe(3);
        });

        it('should compute a ratio between 0 and 1', () => {
            expect(similarityRatio('abc', 'abc')).toBe(1);
            expect(similarityRatio('abc', 'abd')).toBeCloseTo(2 / 3);
            expect(similarityRatio('', '')).toBe(1);
        });
    });
});

describe('normalize', () => {
    it('should build a canonical record from a library row', () => {
        const record = normalize(
            {
                title: ' "Deep Learning for X." ',
                doi: 'https://doi.org/10.1234/ABC',
                authors: 'Smith, J; Doe, A',
                year: '2020',
                url: 'https://example.org/p',
                entryDate: '2016-12-22 00:18:58',
                libraryId: 'ABCD1234',
            },
            'zotero-csv'
        );

        expect(record.title).toBe('deep learning for x');
        expect(record.rawTitle).toBe('"Deep Learning for X."');
        expect(record.doi).toBe('10.1234/abc');
        expect(record.sourceUrl).toBe('https://doi.org/10.1234/abc');
        expect(record.year).toBe(2020);
        expect(record.authors).toEqual(['Smith, J', 'Doe, A']);
        expect(record.entryDate).toBe('2016-12-22');
        expect(record.libraryId).toBe('ABCD1234');
        expect(record.origin).toBe('zotero-csv');
        expect(record.truncated).toBe(false);
    });

    it('should fall back to a DOI in the URL when the DOI field holds none', () => {
        const record = normalize({ title: 'T', doi: 'n/a', url: 'https://doi.org/10.9/z' }, 'googlescholar-email');
        expect(record.doi).toBe('10.9/z');
    });

    it('should take the year from a date', () => {
        expect(normalize({ title: 'T', date: '2018-05-01' }, 'myncbi-email').year).toBe(2018);
    });

    it('should keep the URL when there is no DOI', () => {
        expect(normalize({ title: 'T', url: 'https://example.org/p' }, 'myncbi-email').sourceUrl).toBe(
            'https://example.org/p'
        );
    });

    it('should accept a DOI-only record', () => {
        const record = normalize({ title: '', doi: '10.1/x' }, 'ledger');
        expect(identityKey(record)).toBe('doi:10.1/x');
    });

    it('should reject a record with neither title nor DOI', () => {
        expect(() => normalize({ title: '   ' }, 'ledger')).toThrow(InvalidRecordError);
    });

    it('should produce frozen records', () => {
        expect(Object.isFrozen(normalize({ title: 'T' }, 'ledger'))).toBe(true);
    });

    it('should give a deterministic identity key', () => {
        const raw = { title: 'Deep Learning for X', year: 2020 };
        expect(identityKey(normalize(raw, 'googlescholar-email'))).toBe('title:deep learning for x|2020');
        expect(identityKey(normalize(raw, 'googlescholar-email'))).toBe(identityKey(normalize(raw, 'myncbi-email')));
    });

    it('should key a record without a year by title alone', () => {
        expect(identityKey(normalize({ title: 'Untitled Preprint' }, 'ledger'))).toBe('title:untitled preprint|');
    });
});

describe('normalizeRecords', () => {
    it('should drop and count records without identity', () => {
        const { records, rejected } = normalizeRecords([{ title: 'A' }, { title: '  ' }], 'googlescholar-email');
        expect(records.map((record) => record.title)).toEqual(['a']);
        expect(rejected).toBe(1);
    });
});
