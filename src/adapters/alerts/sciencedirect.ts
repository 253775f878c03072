import type { AlertAdapter, AlertMessage, RawRecord } from '../../types/index.js';
import { AdapterError } from '../../utils/errors.js';
import { findByOwnText, loadHtml, queryParam, textOf, yearIn } from './html.js';

export const SCIENCEDIRECT_ARTICLE_URL = 'https://www.sciencedirect.com/science/article/pii/';

/**
 * ScienceDirect search alert emails.
 *
 * Each publication sits in a `td.txtcontent`: a tracking link whose `_piikey`
 * parameter identifies the article, `span.artTitle`, an italic source line and
 * `span.authorTxt`. The alerts carry no DOI.
 */
export class ScienceDirectAlertAdapter implements AlertAdapter {
    readonly name = 'ScienceDirect Email';
    readonly sourceTag = 'sciencedirect-email' as const;

    parse(message: AlertMessage): RawRecord[] {
        if (!/sciencedirect\.com/i.test(message.body)) {
            throw new AdapterError(`Not a ScienceDirect alert: ${message.path}`, this.sourceTag);
        }

        const $ = loadHtml(message.body);
        const label = findByOwnText($, /Access (?:the|all \d+) new results?/);
        const search = label ? textOf(label.next()) : '';
        const searchText = search ? `${this.name}: ${search}` : null;
        const records: RawRecord[] = [];

        $('td.txtcontent').each((_, cell) => {
            const content = $(cell);
            const pii = content
                .find('a')
                .toArray()
                .map((a) => queryParam($(a).attr('href') ?? '', '_piikey'))
                .find((key) => key !== null);

            const reference = textOf(content.find('i').first()) || null;

            records.push({
                title: textOf(content.find('span.artTitle').first()),
                url: pii ? `${SCIENCEDIRECT_ARTICLE_URL}${pii}` : null,
                authors: textOf(content.find('span.authorTxt').first()),
                reference,
                year: yearIn(reference),
                searchText,
            });
        });

        return records;
    }
}
