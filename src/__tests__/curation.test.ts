import { describe, it, expect } from 'vitest';
import type { ClassifiedRecord, RawRecord } from '../types/index.js';
import { ZoteroCsvAdapter } from '../adapters/library/zotero.js';
import { Ledger } from '../ledger/ledger.js';
import { normalize } from '../normalize/normalizer.js';
import { curationLinks, proxyUrl } from '../links/curation-links.js';
import { renderCurationPage } from '../viewer/curation-page.js';

const library = new ZoteroCsvAdapter({ onlineLibUrl: 'https://www.zotero.org/someuser/library' });

function classified(raw: RawRecord, overrides: Partial<ClassifiedRecord> = {}): ClassifiedRecord {
    const record = normalize(raw, 'googlescholar-email');
    const entry = new Ledger().upsert(record, 'new', '2024-03-01');
    return {
        record,
        classification: 'newly-reported',
        tier: null,
        entry,
        libraryRecord: null,
        reports: [
            {
                source: 'googlescholar-email',
                rawTitle: record.rawTitle,
                searchText: record.searchText,
                excerpt: record.excerpt,
                reference: record.reference,
            },
        ],
        ...overrides,
    };
}

describe('Curation links', () => {
    describe('proxyUrl', () => {
        it('should append the proxy to the host', () => {
            expect(proxyUrl('https://thisandthat.org/paper/etc', '.proxy.example.edu')).toBe(
                'https://thisandthat.org.proxy.example.edu/paper/etc'
            );
        });

        it('should replace host dots with dashes', () => {
            expect(proxyUrl('https://thisandthat.org/paper/etc', '.proxy.example.edu', 'dash')).toBe(
                'https://thisandthat-org.proxy.example.edu/paper/etc'
            );
        });

        it('should add a path to a bare host', () => {
            expect(proxyUrl('https://example.org', '.p.example.edu')).toBe('https://example.org.p.example.edu/');
        });
    });

    describe('curationLinks', () => {
        it('should link a library item, the publication, its proxy and searches', () => {
            const libraryRecord = normalize({ title: 'Deep learning for X.', libraryId: 'K1' }, 'zotero-csv');
            const item = classified(
                { title: 'Deep Learning for X', doi: '10.1/abc' },
                { classification: 'already-in-library', tier: 'high', libraryRecord }
            );

            const links = curationLinks(item, {
                library,
                proxy: '.proxy.example.edu',
                proxySeparator: 'dash',
                customSearchUrl: 'https://search.example.edu/find?',
            });

            expect(links.map(({ label, url }) => [label, url])).toEqual([
                ['See pub at Zotero', 'https://www.zotero.org/someuser/items/K1'],
                ['See pub', 'https://doi.org/10.1/abc'],
                ['See pub via proxy', 'https://doi-org.proxy.example.edu/10.1/abc'],
                ['Search for pub at https://search.example.edu', 'https://search.example.edu/find?q=Deep+Learning+for+X'],
                ['Search Google', 'https://www.google.com/search?q=Deep%20Learning%20for%20X'],
                ['Search Google Scholar', 'https://scholar.google.com/scholar?q=Deep%20Learning%20for%20X'],
                ['Search PubMed', 'https://pubmed.ncbi.nlm.nih.gov/?term=Deep%20Learning%20for%20X'],
            ]);
        });

        it('should search the library when the item is not in it', () => {
            const links = curationLinks(classified({ title: 'A & B: "the" sequel…' }), { library });

            expect(links[0]).toEqual({
                label: 'Search Zotero',
                url: 'https://www.zotero.org/someuser/search/A%20%26%20B%3A%20%22the%22%20sequel/titleCreatorYear/item-list',
                target: 'library',
            });
            expect(links.map((link) => link.label)).toEqual([
                'Search Zotero',
                'Search Google',
                'Search Google Scholar',
                'Search PubMed',
            ]);
        });
    });
});

describe('Curation page', () => {
    const items: ClassifiedRecord[] = [
        classified({ title: 'New <script> paper', searchText: 'Google Scholar Email: genomics', excerpt: 'Quote & more' }),
        classified({ title: 'Ignored paper' }, { classification: 'previously-ignored', tier: 'high' }),
        classified({ title: 'Library paper' }, { classification: 'already-in-library', tier: 'probable' }),
    ];

    it('should escape publication text', () => {
        const html = renderCurationPage(items, { library, runDate: '2024-03-01' });

        expect(html).toContain('<h3>New &lt;script&gt; paper</h3>');
        expect(html).toContain('<span class="source">Google Scholar Email: genomics</span>');
        expect(html).toContain('<blockquote>Quote &amp; more</blockquote>');
    });

    it('should group by classification and hide ignored publications', () => {
        const html = renderCurationPage(items, { library, runDate: '2024-03-01' });

        expect(html).toContain('<h2>New <span class="count">1</span></h2>');
        expect(html).toContain('<h2>Already in library <span class="count">1</span></h2>');
        expect(html).not.toContain('Ignored paper');
        expect(html).toContain('2024-03-01 · 3 publications · 1 ignored not shown');
        expect(html.indexOf('<section class="newly-reported">')).toBeLessThan(
            html.indexOf('<section class="already-in-library">')
        );
    });

    it('should show ignored publications on request', () => {
        const html = renderCurationPage(items, { library, runDate: '2024-03-01', showIgnored: true });

        expect(html).toContain('<h2>Previously ignored <span class="count">1</span></h2>');
        expect(html).toContain('<h3>Ignored paper <span class="tier high">high match</span></h3>');
        expect(html).toContain('2024-03-01 · 3 publications</span>');
    });
});
