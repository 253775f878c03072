import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { CiteULikeJsonAdapter, getLibraryAdapter, readLibrary, ZoteroCsvAdapter } from '../adapters/library/index.js';
import { normalize } from '../normalize/normalizer.js';
import { AdapterError, ConfigError } from '../utils/errors.js';

const ZOTERO_CSV = [
    '"Key","Item Type","Publication Year","Author","Title","Publication Title","DOI","Url","Date Added","Manual Tags"',
    '"ABCD1234","journalArticle","2017","Gloaguen, Yoann; Morton, Fraser","Galaxy workflows at scale","Bioinformatics","10.1093/bioinformatics/btx123","","2017-09-14 17:48:40","workflows; reproducibility"',
    '"EFGH5678","conferencePaper","2019","Doe, Jane","A conference talk","Proceedings of Something","","https://example.org/talk","2019-01-02 08:00:00",""',
].join('\n');

const CITEULIKE_JSON = JSON.stringify([
    {
        article_id: '14246042',
        title: 'Dissemination of scientific software with Galaxy ToolShed',
        authors: ['Enis Afgan', 'Dannon Baker'],
        doi: '10.1186/gb4161',
        href: 'http://www.citeulike.org/user/someuser/article/14246042',
        published: ['2014', '02', '20'],
        journal: 'Genome Biology',
        tags: ['galaxy', 'toolshed'],
        date: '2016-12-22 00:18:58',
    },
    'not an object',
]);

describe('Library adapters', () => {
    describe('ZoteroCsvAdapter', () => {
        const adapter = new ZoteroCsvAdapter({ onlineLibUrl: 'https://www.zotero.org/someuser/library/' });

        it('should parse the CSV export', () => {
            const records = adapter.parse(ZOTERO_CSV);

            expect(records).toEqual([
                {
                    title: 'Galaxy workflows at scale',
                    libraryId: 'ABCD1234',
                    authors: 'Gloaguen, Yoann; Morton, Fraser',
                    doi: '10.1093/bioinformatics/btx123',
                    url: '',
                    year: '2017',
                    journal: 'Bioinformatics',
                    tags: ['workflows', 'reproducibility'],
                    entryDate: '2017-09-14 17:48:40',
                },
                {
                    title: 'A conference talk',
                    libraryId: 'EFGH5678',
                    authors: 'Doe, Jane',
                    doi: '',
                    url: 'https://example.org/talk',
                    year: '2019',
                    journal: null,
                    tags: [],
                    entryDate: '2019-01-02 08:00:00',
                },
            ]);
        });

        it('should normalize into library records', () => {
            const [raw] = adapter.parse(ZOTERO_CSV);
            const record = normalize(raw ?? { title: '' }, 'zotero-csv');
            expect(record.authors).toEqual(['Gloaguen, Yoann', 'Morton, Fraser']);
            expect(record.entryDate).toBe('2017-09-14');
            expect(record.tags).toEqual(['workflows', 'reproducibility']);
        });

        it('should reject an export without the Title column', () => {
            expect(() => adapter.parse('"Key","Name"\n"A","B"\n')).toThrow(AdapterError);
        });

        it('should link into the online library', () => {
            const record = normalize({ title: 'T', libraryId: 'ABCD1234' }, 'zotero-csv');
            expect(adapter.itemUrl(record)).toBe('https://www.zotero.org/someuser/items/ABCD1234');
            expect(adapter.searchUrl('deep learning')).toBe(
                'https://www.zotero.org/someuser/search/deep%20learning/titleCreatorYear/item-list'
            );
            expect(adapter.tagUrl('gene expression')).toBe('https://www.zotero.org/someuser/tags/gene%20expression');
            expect(adapter.tagYearUrl()).toBeNull();
        });
    });

    describe('CiteULikeJsonAdapter', () => {
        it('should parse the JSON export and skip non-objects', () => {
            const adapter = new CiteULikeJsonAdapter({ onlineLibUrl: 'http://www.citeulike.org/user/someuser' });

            expect(adapter.parse(CITEULIKE_JSON)).toEqual([
                {
                    title: 'Dissemination of scientific software with Galaxy ToolShed',
                    libraryId: '14246042',
                    authors: ['Enis Afgan', 'Dannon Baker'],
                    doi: '10.1186/gb4161',
                    url: 'http://www.citeulike.org/user/someuser/article/14246042',
                    year: '2014',
                    journal: 'Genome Biology',
                    tags: ['galaxy', 'toolshed'],
                    entryDate: '2016-12-22 00:18:58',
                },
            ]);
        });

        it('should build user library links', () => {
            const adapter = new CiteULikeJsonAdapter({ onlineLibUrl: 'http://www.citeulike.org/user/someuser' });
            const record = normalize({ title: 'T', libraryId: '42' }, 'citeulike-json');

            expect(adapter.itemUrl(record)).toBe('http://www.citeulike.org/user/someuser/article/42');
            expect(adapter.tagUrl('galaxy')).toBe('http://www.citeulike.org/user/someuser/tag/galaxy');
            expect(adapter.searchUrl('Deep learning')).toBe(
                'http://www.citeulike.org/search/username?q=title%3ADeep+learning&search=Search+library&username=someuser'
            );
        });

        it('should build group library links', () => {
            const adapter = new CiteULikeJsonAdapter({ onlineLibUrl: 'http://www.citeulike.org/group/16008/library' });
            expect(adapter.tagYearUrl('galaxy', 2015)).toBe(
                'http://www.citeulike.org/search/group?q=tag%3Agalaxy+%26%26+year%3A2015&search=Search+library&group_id=16008'
            );
        });

        it('should reject a URL that is not a library', () => {
            expect(() => new CiteULikeJsonAdapter({ onlineLibUrl: 'http://www.citeulike.org/about' })).toThrow(AdapterError);
            expect(() => new CiteULikeJsonAdapter({ onlineLibUrl: 'not a url' })).toThrow(AdapterError);
        });

        it('should reject invalid JSON', () => {
            const adapter = new CiteULikeJsonAdapter({ onlineLibUrl: 'http://www.citeulike.org/user/someuser' });
            expect(() => adapter.parse('{')).toThrow(AdapterError);
            expect(() => adapter.parse('{}')).toThrow('CiteULike export is not a JSON array');
        });
    });

    describe('readLibrary', () => {
        let tmpDir: string;

        beforeEach(() => {
            tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pubspork-lib-'));
        });

        afterEach(() => {
            fs.rmSync(tmpDir, { recursive: true, force: true });
        });

        it('should read an export through the selected adapter', () => {
            const file = path.join(tmpDir, 'library.csv');
            fs.writeFileSync(file, ZOTERO_CSV, 'utf-8');
            const adapter = getLibraryAdapter('zotero-csv', { onlineLibUrl: 'https://www.zotero.org/someuser/library' });

            expect(readLibrary(adapter, file)).toHaveLength(2);
        });

        it('should fail on a missing export', () => {
            const adapter = getLibraryAdapter('citeulike-json', { onlineLibUrl: 'http://www.citeulike.org/user/someuser' });
            expect(() => readLibrary(adapter, path.join(tmpDir, 'missing.json'))).toThrow(ConfigError);
        });
    });
});
