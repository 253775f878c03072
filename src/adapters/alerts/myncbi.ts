import type { AlertAdapter, AlertMessage, RawRecord } from '../../types/index.js';
import { AdapterError } from '../../utils/errors.js';
import { findByOwnText, loadHtml, textOf, yearIn } from './html.js';

const DOI_RE = /doi:\s*(10\.\S+?)\.?(?:\s|$)/i;

/**
 * MyNCBI (PubMed) saved-search alert emails.
 *
 * Publications are laid out as table rows: a title link carrying a `ref`
 * attribute, a row of authors ("Wreczycka K, Gosdschan A."), then a citation
 * row whose `span.jrnl` names the journal in its title attribute, followed by
 * volume, pages and "doi: 10.x/y.".
 */
export class MyNcbiAlertAdapter implements AlertAdapter {
    readonly name = 'My NCBI';
    readonly sourceTag = 'myncbi-email' as const;

    parse(message: AlertMessage): RawRecord[] {
        if (!/ncbi\.nlm\.nih\.gov|My NCBI/i.test(message.body)) {
            throw new AdapterError(`Not a MyNCBI alert: ${message.path}`, this.sourceTag);
        }

        const $ = loadHtml(message.body);
        const label = findByOwnText($, /^Search:$/);
        const search = label ? textOf(label.nextAll('b').first()) || textOf(label.find('b').first()) : '';
        const searchText = search ? `${this.name}: ${search}` : null;
        const records: RawRecord[] = [];

        $('a[ref]').each((_, anchor) => {
            const link = $(anchor);
            const href = link.attr('href') ?? '';
            // "Similar articles" links point back into PubMed's neighbour lists
            if (href.includes('linkname=pubmed_pubmed')) return;

            const titleRow = link.closest('tr');
            const authorsRow = titleRow.nextAll('tr').first();
            const citationRow = authorsRow.nextAll('tr').first();

            const journalSpan = citationRow.find('span.jrnl').first();
            const journalAbbrev = textOf(journalSpan);
            const citation = textOf(citationRow);
            // "Nucleic Acids Res. 2020 Jan 8;48(1):1-10. doi: 10.1093/nar/gkz100. Online ahead of print."
            const details = citation
                .slice(citation.indexOf(journalAbbrev) + journalAbbrev.length)
                .replace(/^[.\s]+/, '');
            const volumeAndPages = details.split(/\s*doi:/i)[0]?.trim() ?? '';

            records.push({
                title: textOf(link),
                url: href || null,
                authors: textOf(authorsRow.find('td').last()).replace(/\.$/, ''),
                journal: journalSpan.attr('title') ?? (journalAbbrev || null),
                doi: details.match(DOI_RE)?.[1] ?? null,
                year: yearIn(volumeAndPages),
                reference: volumeAndPages || null,
                searchText,
            });
        });

        return records;
    }
}
