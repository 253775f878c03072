import * as cheerio from 'cheerio';
import { collapseWhitespace } from '../../normalize/text.js';

export type Selection = ReturnType<cheerio.CheerioAPI>;

export function loadHtml(body: string): cheerio.CheerioAPI {
    return cheerio.load(body);
}

/**
 * Whitespace-collapsed text of a selection.
 */
export function textOf(selection: Selection): string {
    return collapseWhitespace(selection.text());
}

/**
 * Text of a selection's own text nodes, leaving out its child elements.
 */
export function ownText(selection: Selection): string {
    return collapseWhitespace(selection.clone().children().remove().end().text());
}

/**
 * First element whose own text matches `pattern`.
 */
export function findByOwnText($: cheerio.CheerioAPI, pattern: RegExp): Selection | null {
    const found = $('body *')
        .filter((_, el) => pattern.test(ownText($(el))))
        .first();
    return found.length > 0 ? found : null;
}

/**
 * Value of a query parameter in a link, or null. Works on relative and malformed links.
 */
export function queryParam(href: string, name: string): string | null {
    const query = href.slice(href.indexOf('?') + 1);
    for (const pair of query.split('&')) {
        const eq = pair.indexOf('=');
        if (eq < 0 || pair.slice(0, eq) !== name) continue;
        const value = pair.slice(eq + 1);
        try {
            return decodeURIComponent(value.replace(/\+/g, ' '));
        } catch (error) {
            if (error instanceof URIError) return value;
            throw error;
        }
    }
    return null;
}

/**
 * Last plausible publication year in free text, as a string.
 */
export function yearIn(text: string | null): string | null {
    const years = text?.match(/\b(?:1[89]|20)\d{2}\b/g);
    return years?.[years.length - 1] ?? null;
}
