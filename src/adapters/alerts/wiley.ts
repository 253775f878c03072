import type * as cheerio from 'cheerio';
import type { AlertAdapter, AlertMessage, RawRecord } from '../../types/index.js';
import { collapseWhitespace } from '../../normalize/text.js';
import { AdapterError } from '../../utils/errors.js';
import { findByOwnText, loadHtml, textOf, yearIn, type Selection } from './html.js';

const DOI_TOKEN_RE = /\b10\.\d{4,9}\/[^\s,]+/;

/**
 * Wiley Online Library alert emails, in two layouts.
 *
 * Saved-search alerts name the search after "Your criteria:" and list each
 * publication as a title link, a `span` with the journal, then a line break and
 * a byline that runs the date into the authors
 * ("March 2015Pieter-Jan L. Maenhaut, Hend Moens and Filip De Turck").
 *
 * Citation alerts put the cited publication in the only `h5` and give one
 * paragraph per citing publication: author `span`s, the title, the journal in
 * `em`, the DOI, the volume in `strong`, then pages and date.
 */
export class WileyAlertAdapter implements AlertAdapter {
    readonly name = 'Wiley Online Library';
    readonly sourceTag = 'wiley-email' as const;

    parse(message: AlertMessage): RawRecord[] {
        if (!/wiley\.com/i.test(message.body)) {
            throw new AdapterError(`Not a Wiley alert: ${message.path}`, this.sourceTag);
        }

        const $ = loadHtml(message.body);
        const cited = $('h5').first();
        return cited.length > 0 ? this.parseCitationAlert($, cited) : this.parseSearchAlert($);
    }

    private parseSearchAlert($: cheerio.CheerioAPI): RawRecord[] {
        const label = findByOwnText($, /^Your criteria:$/);
        const search = label ? textOf(label.parent()).replace(/^Your criteria:\s*/, '') : '';
        const searchText = search ? `${this.name}: ${search}` : null;
        const records: RawRecord[] = [];

        $('a').each((_, anchor) => {
            const link = $(anchor);
            const journal = link.next('span');
            if (journal.length === 0) return;

            const bylineNode = link.nextAll('br').first().get(0)?.nextSibling;
            const byline = bylineNode ? collapseWhitespace($(bylineNode).text()) : '';
            const parts = byline.split(/(\d{4})/);
            const href = link.attr('href') ?? '';
            // Some alerts drop the scheme from their links
            const url = href && !/^https?:\/\//i.test(href) ? `http://${href}` : href;

            records.push({
                title: textOf(link),
                url: url || null,
                doi: url ? wileyDoi(url) : null,
                authors: (parts[parts.length - 1] ?? '').replace(/\s+and\s+/g, ', ').trim(),
                journal: textOf(journal) || null,
                year: parts.length >= 3 ? (parts[parts.length - 2] ?? null) : null,
                searchText,
            });
        });

        return records;
    }

    private parseCitationAlert($: cheerio.CheerioAPI, cited: Selection): RawRecord[] {
        const searchText = `${this.name}: ${textOf(cited)}`;
        const records: RawRecord[] = [];

        $('p').each((_, paragraph) => {
            const pub = $(paragraph);
            const authorSpans = pub.children('span');
            if (authorSpans.length === 0) return;

            const nodes = pub.contents().toArray();
            const lastAuthor = nodes.map((node) => $(node).is('span')).lastIndexOf(true);
            const tail = collapseWhitespace(
                nodes
                    .slice(lastAuthor + 1)
                    .map((node) => $(node).text())
                    .join('')
            );

            const journal = textOf(pub.children('em').first());
            const doiMatch = DOI_TOKEN_RE.exec(tail);
            const doiAt = doiMatch?.index ?? tail.length;
            const journalAt = journal ? tail.lastIndexOf(journal, doiAt) : -1;
            const titleEnd = journalAt >= 0 ? journalAt : doiAt;
            const referenceStart = doiMatch
                ? doiAt + doiMatch[0].length
                : journalAt >= 0
                  ? journalAt + journal.length
                  : tail.length;
            const reference = tail.slice(referenceStart).replace(/^[\s,]+|[\s,.]+$/g, '');

            records.push({
                title: tail.slice(0, titleEnd).replace(/^[\s,]+|[\s,]+$/g, ''),
                authors: authorSpans.toArray().map((span) => textOf($(span))),
                journal: journal || null,
                doi: doiMatch?.[0] ?? null,
                year: yearIn(reference),
                reference: reference || null,
                searchText,
            });
        });

        return records;
    }
}

/**
 * DOI of an onlinelibrary.wiley.com/doi/... link; tracking links carry none.
 */
function wileyDoi(url: string): string | null {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch (error) {
        if (error instanceof TypeError) return null;
        throw error;
    }
    if (!parsed.hostname.endsWith('onlinelibrary.wiley.com')) return null;

    const segments = parsed.pathname.split('/').filter((segment) => segment.length > 0);
    const doiAt = segments.indexOf('doi');
    if (doiAt < 0) return null;

    // "/doi/10.1002/spe.2320/abstract" and "/doi/full/10.1002/spe.2320"
    const prefixAt = segments.findIndex((segment, i) => i > doiAt && /^10\.\d+$/.test(segment));
    const prefix = segments[prefixAt];
    const suffix = segments[prefixAt + 1];
    if (prefixAt < 0 || !prefix || !suffix) return null;
    return `${prefix}/${suffix}`;
}
