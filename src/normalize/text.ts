/**
 * Text utilities shared by the normalizer and the identity matcher.
 */

const ELLIPSIS_RE = /(?:…|\.{3})$/;
const TRAILING_PUNCTUATION_RE = /[.,;:]+$/;
const QUOTE_PAIRS: ReadonlyArray<readonly [string, string]> = [
    ['"', '"'],
    ["'", "'"],
    ['“', '”'],
    ['‘', '’'],
    ['«', '»'],
];

/** Bare DOI inside a free-text field: runs to the next whitespace. */
const DOI_IN_TEXT_RE = /10\.[^\s/]+\/\S+/;

/** DOI as the path of a resolver URL. */
const DOI_IN_PATH_RE = /^10\.[^\s/]+\/\S+/;

const DOI_RESOLVER_HOSTS: ReadonlySet<string> = new Set(['doi.org', 'dx.doi.org', 'www.doi.org']);

const DOI_TRAILING_PUNCTUATION_RE = /[.,;:)\]}>'"]+$/;

/**
 * Collapse whitespace runs (including non-breaking spaces and newlines) to one space and trim.
 */
export function collapseWhitespace(text: string): string {
    return text.replace(/\s+/gu, ' ').trim();
}

/**
 * Strip what alert and export formats wrap around a title: surrounding quotes,
 * trailing punctuation, and a truncation ellipsis.
 *
 * "\"Deep learning for X.\"" → { text: "Deep learning for X", truncated: false }
 * "A very long title that Google cut …" → { text: "A very long title that Google cut", truncated: true }
 */
export function stripTitleDecorations(title: string): { text: string; truncated: boolean } {
    let text = collapseWhitespace(title);
    let truncated = false;

    let previous: string;
    do {
        previous = text;

        if (ELLIPSIS_RE.test(text)) {
            text = text.replace(ELLIPSIS_RE, '').trim();
            truncated = true;
        }

        text = text.replace(TRAILING_PUNCTUATION_RE, '').trim();

        for (const [open, close] of QUOTE_PAIRS) {
            if (text.length >= 2 && text.startsWith(open) && text.endsWith(close)) {
                text = text.slice(open.length, text.length - close.length).trim();
                break;
            }
        }
    } while (text !== previous);

    return { text, truncated };
}

/**
 * Comparison form of a title: decorations stripped, case-folded.
 */
export function normalizeTitle(title: string): string {
    return stripTitleDecorations(title).text.normalize('NFC').toLowerCase();
}

/**
 * Form used by the fuzzy tier: diacritics and punctuation removed, whitespace collapsed.
 * "Échelle: a Study" → "echelle a study"
 */
export function foldTitle(title: string): string {
    return collapseWhitespace(
        title
            .normalize('NFD')
            .replace(/\p{M}/gu, '')
            .toLowerCase()
            .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    );
}

/**
 * Extract a canonical DOI from a DOI field: a bare DOI, `doi:` prefixed, or a resolver URL.
 * Any other URL yields null, even when a DOI-like string appears in its path.
 *
 * "https://doi.org/10.1234/Test" → "10.1234/test"
 * "doi:10.1234/test."            → "10.1234/test"
 * "https://example.org/paper"    → null
 */
export function extractDoi(value: string | null | undefined): string | null {
    if (!value) return null;

    const text = value.trim();
    if (/^[a-z][a-z0-9+.-]*:\/\//i.test(text)) {
        return doiFromUrl(text);
    }
    return cleanDoi(text.match(DOI_IN_TEXT_RE)?.[0]);
}

/**
 * DOI of a doi.org or dx.doi.org link, or null for every other URL.
 * Publisher links often embed a DOI followed by version or format suffixes
 * ("…/10.1101/2020.05.05.079004v1", "…/10.1007/x.pdf"), so they are not read.
 */
export function doiFromUrl(url: string | null | undefined): string | null {
    if (!url) return null;

    let parsed: URL;
    try {
        parsed = new URL(url.trim());
    } catch (error) {
        if (error instanceof TypeError) return null;
        throw error;
    }
    if (!DOI_RESOLVER_HOSTS.has(parsed.hostname.toLowerCase())) return null;

    return cleanDoi(safeDecodeUri(parsed.pathname.slice(1)).match(DOI_IN_PATH_RE)?.[0]);
}

function cleanDoi(candidate: string | undefined): string | null {
    if (!candidate) return null;
    const doi = candidate.replace(DOI_TRAILING_PUNCTUATION_RE, '').toLowerCase();
    return doi || null;
}

function safeDecodeUri(url: string): string {
    try {
        return decodeURIComponent(url);
    } catch (error) {
        if (error instanceof URIError) {
            // Malformed escapes: the undecoded URL still carries any plain-text DOI.
            return url;
        }
        throw error;
    }
}

/**
 * Parse a publication year from a dedicated field or the lead of a date string.
 * "2020" → 2020, "2019-11-30 12:00" → 2019, "unknown" → null
 */
export function extractYear(value: number | string | null | undefined): number | null {
    if (value === null || value === undefined) return null;

    if (typeof value === 'number') {
        return Number.isInteger(value) && value >= 1000 && value <= 9999 ? value : null;
    }

    const match = value.trim().match(/^(\d{4})(?!\d)/);
    return match?.[1] ? Number.parseInt(match[1], 10) : null;
}

/**
 * Split an author field into names, keeping source order.
 *
 * Library exports separate "Last, First" names with semicolons; alert formats
 * separate "F Last" names with commas.
 */
export function splitAuthors(authors: string | readonly string[] | null | undefined): string[] {
    if (!authors) return [];

    let names: readonly string[];
    if (typeof authors !== 'string') {
        names = authors;
    } else if (authors.includes(';')) {
        names = authors.split(';');
    } else if (authors.includes(',')) {
        names = authors.split(',');
    } else {
        names = authors.split(/\s+and\s+/i);
    }

    return names
        .map((name) => collapseWhitespace(name).replace(/…$/, '').trim())
        .filter((name) => name.length > 0);
}

/**
 * Levenshtein distance, computed with two rolling rows.
 */
export function levenshteinDistance(a: string, b: string): number {
    const m = a.length;
    const n = b.length;

    if (m === 0) return n;
    if (n === 0) return m;

    let previous = Array.from({ length: n + 1 }, (_, j) => j);
    let current = new Array<number>(n + 1).fill(0);

    for (let i = 1; i <= m; i++) {
        current[0] = i;
        for (let j = 1; j <= n; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            current[j] = Math.min(
                (previous[j] ?? 0) + 1,         // deletion
                (current[j - 1] ?? 0) + 1,      // insertion
                (previous[j - 1] ?? 0) + cost   // substitution
            );
        }
        [previous, current] = [current, previous];
    }

    return previous[n] ?? 0;
}

/**
 * Normalized Levenshtein similarity (0.0 to 1.0) of two already-folded strings.
 * 1.0 = identical, 0.0 = completely different.
 */
export function similarityRatio(a: string, b: string): number {
    if (a === b) return 1.0;

    const maxLen = Math.max(a.length, b.length);
    if (maxLen === 0) return 1.0;

    return 1.0 - levenshteinDistance(a, b) / maxLen;
}

/**
 * Similarity of two titles in any format.
 */
export function titleSimilarity(a: string, b: string): number {
    return similarityRatio(foldTitle(a), foldTitle(b));
}
