import type { ClassifiedRecord, LibraryAdapter, ProxySeparator } from '../types/index.js';
import { stripTitleDecorations } from '../normalize/text.js';

export interface CurationLink {
    label: string;
    url: string;
    /** Browser window name, so each kind of link reuses one tab */
    target: string;
}

export interface CurationLinkOptions {
    library: LibraryAdapter;
    /** Host suffix of a paywall proxy, e.g. ".proxy1.library.example.edu" */
    proxy?: string;
    proxySeparator?: ProxySeparator;
    /** Search URL the query string `q=<title>` is appended to */
    customSearchUrl?: string;
}

const PROXY_SEPARATORS: Record<ProxySeparator, string> = {
    dot: '.',
    dash: '-',
};

/**
 * Route a publication URL through a paywall proxy by rewriting its host:
 *
 *   https://thisandthat.org/paper/etc
 *   → https://thisandthat.org.proxy.example.edu/paper/etc      (dot)
 *   → https://thisandthat-org.proxy.example.edu/paper/etc      (dash)
 */
export function proxyUrl(url: string, proxy: string, separator: ProxySeparator = 'dot'): string {
    const parts = url.split('/');
    const host = parts[2];
    if (host === undefined) return url;

    parts[2] = host.replace(/\./g, PROXY_SEPARATORS[separator]) + proxy;
    return parts.length > 3 ? parts.join('/') : `${parts.join('/')}/`;
}

/**
 * Links that help decide what to do with a reported publication.
 */
export function curationLinks(item: ClassifiedRecord, options: CurationLinkOptions): CurationLink[] {
    const { library } = options;
    const links: CurationLink[] = [];
    const title = stripTitleDecorations(item.record.rawTitle).text;
    const pubUrl = item.record.sourceUrl ?? item.libraryRecord?.sourceUrl ?? null;

    const itemUrl = item.libraryRecord ? library.itemUrl(item.libraryRecord) : null;
    if (itemUrl) {
        links.push({ label: `See pub at ${library.serviceName}`, url: itemUrl, target: 'library' });
    } else if (title) {
        links.push({ label: `Search ${library.serviceName}`, url: library.searchUrl(title), target: 'library' });
    }

    if (pubUrl) {
        links.push({ label: 'See pub', url: pubUrl, target: 'nativepub' });
        if (options.proxy) {
            links.push({
                label: 'See pub via proxy',
                url: proxyUrl(pubUrl, options.proxy, options.proxySeparator),
                target: 'proxypub',
            });
        }
    }

    if (!title) return links;

    if (options.customSearchUrl) {
        const site = options.customSearchUrl.split('/').slice(0, 3).join('/');
        links.push({
            label: `Search for pub at ${site}`,
            url: options.customSearchUrl + new URLSearchParams({ q: title }).toString(),
            target: 'custom-search',
        });
    }

    const query = encodeURIComponent(title);
    links.push(
        { label: 'Search Google', url: `https://www.google.com/search?q=${query}`, target: 'googletitlesearch' },
        { label: 'Search Google Scholar', url: `https://scholar.google.com/scholar?q=${query}`, target: 'googlescholarsearch' },
        { label: 'Search PubMed', url: `https://pubmed.ncbi.nlm.nih.gov/?term=${query}`, target: 'pubmedtitlesearch' }
    );

    return links;
}
