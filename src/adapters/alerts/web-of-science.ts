import type * as cheerio from 'cheerio';
import type { AlertAdapter, AlertMessage, RawRecord } from '../../types/index.js';
import { AdapterError } from '../../utils/errors.js';
import { loadHtml, ownText, yearIn } from './html.js';

const GREETING_RE = /^Greetings! You have a (?:saved search|citation) alert/;
const SEARCH_INTRO_RE = /^Your search,/;
const CITATION_INTRO_RE = /View (?:all \d+|this) citations?/;
const SEARCH_RESULT_RE = /^\((.*?)\) has (\d+)/;
const SHOWING_RE = /Showing (\d+) of(?: the)* (\d+)/;
/** Rule drawn under a citing publication; the only element styled with this colour */
const PUBLICATION_RULE_RE = /#797979/;

type Step =
    | 'awaiting-content'
    | 'starting-content'
    | 'search-type-next'
    | 'search-result-next'
    | 'cited-pub-next'
    | 'citation-count-next'
    | 'citing-pub-next'
    | 'authors-next'
    | 'source-next'
    | 'excerpt-next'
    | 'done';

type Token = { kind: 'text'; text: string } | { kind: 'rule' };

/**
 * Web of Science alert emails (saved search and citation alerts).
 *
 * The layout is table soup with no usable classes, so the body is read as a
 * stream of text pieces. After the greeting and the search (or cited
 * publication) each publication arrives as title, authors
 * ("Halbritter, Dale A.; Storer, Caroline G."), source and an optional excerpt.
 * "Showing n of m" closes the list.
 */
export class WebOfScienceAlertAdapter implements AlertAdapter {
    readonly name = 'Web of Science Email';
    readonly sourceTag = 'webofscience-email' as const;

    parse(message: AlertMessage): RawRecord[] {
        if (!/Web of Science|webofscience\.com|clarivate\.com/i.test(message.body)) {
            throw new AdapterError(`Not a Web of Science alert: ${message.path}`, this.sourceTag);
        }

        let step: Step = 'awaiting-content';
        let search = '';
        let current: RawRecord | null = null;
        const records: RawRecord[] = [];

        for (const token of tokenize(loadHtml(message.body))) {
            if (token.kind === 'rule') {
                if (step === 'excerpt-next') step = 'citing-pub-next';
                continue;
            }
            const { text } = token;

            switch (step) {
                case 'awaiting-content':
                    if (GREETING_RE.test(text)) step = 'starting-content';
                    break;
                case 'starting-content':
                    if (SEARCH_INTRO_RE.test(text)) step = 'search-type-next';
                    else if (CITATION_INTRO_RE.test(text)) step = 'cited-pub-next';
                    break;
                case 'search-type-next':
                    search = `${text} `;
                    step = 'search-result-next';
                    break;
                case 'search-result-next': {
                    // "(TS=(galaxy workflow)) has 3 new records as of ..."
                    const result = SEARCH_RESULT_RE.exec(text);
                    if (!result) {
                        throw new AdapterError(`Unrecognized saved search line "${text}": ${message.path}`, this.sourceTag);
                    }
                    search += result[1] ?? '';
                    step = Number(result[2]) === 0 ? 'done' : 'citing-pub-next';
                    break;
                }
                case 'cited-pub-next':
                    search = text;
                    step = 'citation-count-next';
                    break;
                case 'citation-count-next':
                    step = 'citing-pub-next';
                    break;
                case 'citing-pub-next': {
                    const showing = SHOWING_RE.exec(text);
                    if (showing) {
                        if (Number(showing[1]) === records.length) step = 'done';
                        break;
                    }
                    current = { title: text, authors: null, reference: null, year: null, excerpt: null, searchText: null };
                    records.push(current);
                    step = 'authors-next';
                    break;
                }
                case 'authors-next':
                    if (current) current.authors = text;
                    step = 'source-next';
                    break;
                case 'source-next':
                    if (current) {
                        current.reference = text;
                        current.year = yearIn(text);
                    }
                    step = 'excerpt-next';
                    break;
                case 'excerpt-next':
                    if (current) current.excerpt = text;
                    step = 'citing-pub-next';
                    break;
                case 'done':
                    break;
            }
        }

        if (step === 'awaiting-content' || step === 'starting-content') {
            throw new AdapterError(`Unrecognized Web of Science alert layout: ${message.path}`, this.sourceTag);
        }

        const searchText = search ? `${this.name}: ${search}` : null;
        return records.map((record) => ({ ...record, searchText }));
    }
}

/**
 * Non-empty text pieces of the body in document order, with a marker for each publication rule.
 */
function tokenize($: cheerio.CheerioAPI): Token[] {
    const tokens: Token[] = [];
    $('body *').each((_, el) => {
        const element = $(el);
        if (PUBLICATION_RULE_RE.test(element.attr('style') ?? '')) {
            tokens.push({ kind: 'rule' });
        }
        const text = ownText(element);
        if (text) tokens.push({ kind: 'text', text });
    });
    return tokens;
}
