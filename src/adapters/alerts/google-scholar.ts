import type { AlertAdapter, AlertMessage, RawRecord } from '../../types/index.js';
import { AdapterError } from '../../utils/errors.js';
import { findByOwnText, loadHtml, queryParam, textOf, yearIn } from './html.js';

const SEARCH_LABEL_RE = /Scholar Alert:|\[.*\]\s*-\s*new (?:results|citations|articles)/;

/**
 * Google Scholar alert emails.
 *
 * Each reported publication is an `h3` holding a redirect link with the title,
 * followed by a div of authors and source ("EB Alonso, L Cockx - Nature, 2020")
 * and usually a div quoting the publication. Long titles arrive cut short with "…".
 */
export class GoogleScholarAlertAdapter implements AlertAdapter {
    readonly name = 'Google Scholar Email';
    readonly sourceTag = 'googlescholar-email' as const;

    parse(message: AlertMessage): RawRecord[] {
        if (!/scholar\.google\.|Scholar Alert/i.test(message.body)) {
            throw new AdapterError(`Not a Google Scholar alert: ${message.path}`, this.sourceTag);
        }

        const $ = loadHtml(message.body);
        const searchText = this.searchText(findByOwnText($, SEARCH_LABEL_RE)?.text() ?? null);
        const records: RawRecord[] = [];

        $('h3').each((_, h3) => {
            const heading = $(h3);
            const link = heading.find('a').first();
            const href = link.attr('href') ?? '';

            const byline = heading.nextAll('div').first();
            const [authors = '', ...source] = textOf(byline).split(' - ');
            const reference = source.join(' - ').trim() || null;
            const excerpt = textOf(byline.next('div')) || null;

            records.push({
                // "[PDF]" and "[HTML]" format badges precede some titles
                title: textOf(heading).replace(/^(?:\[[A-Z]+\]\s*)+/, ''),
                url: href ? (queryParam(href, 'url') ?? queryParam(href, 'q') ?? href) : null,
                authors,
                year: yearIn(reference),
                reference,
                excerpt,
                searchText,
            });
        });

        return records;
    }

    private searchText(label: string | null): string | null {
        if (!label) return null;
        const quoted = label.match(/\[\s*(.*?)\s*\]/);
        return `${this.name}: ${quoted?.[1] ?? label.replace('Scholar Alert:', '').trim()}`;
    }
}
