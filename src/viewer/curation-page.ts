import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Classification, ClassifiedRecord, MatchRunStats } from '../types/index.js';
import { curationLinks, type CurationLinkOptions } from '../links/curation-links.js';
import { escapeHtml } from '../utils/html.js';
import { getLogger } from '../utils/logger.js';

export interface CurationPageOptions extends CurationLinkOptions {
    /** Include publications the user already marked `ignore` */
    showIgnored?: boolean;
    /** Run date shown in the page header */
    runDate: string;
    stats?: MatchRunStats;
}

const SECTIONS: ReadonlyArray<{ classification: Classification; heading: string }> = [
    { classification: 'newly-reported', heading: 'New' },
    { classification: 'repeat-new', heading: 'Seen before, not yet curated' },
    { classification: 'already-in-library', heading: 'Already in library' },
    { classification: 'previously-ignored', heading: 'Previously ignored' },
];

/**
 * Write the curation page for a match run.
 */
export function writeCurationPage(path: string, items: readonly ClassifiedRecord[], options: CurationPageOptions): void {
    const html = renderCurationPage(items, options);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, html, 'utf-8');
    getLogger().info({ path, publications: items.length }, 'Curation page written');
}

/**
 * Self-contained HTML page listing every publication the alerts reported,
 * grouped by classification, each with its alerts and curation links.
 */
export function renderCurationPage(items: readonly ClassifiedRecord[], options: CurationPageOptions): string {
    const sections = SECTIONS
        .filter(({ classification }) => options.showIgnored || classification !== 'previously-ignored')
        .map(({ classification, heading }) => {
            const inSection = items.filter((item) => item.classification === classification);
            if (inSection.length === 0) return '';
            return `<section class="${classification}">
  <h2>${escapeHtml(heading)} <span class="count">${inSection.length}</span></h2>
${inSection.map((item) => renderItem(item, options)).join('\n')}
</section>`;
        })
        .filter((section) => section.length > 0);

    const hidden = options.showIgnored
        ? 0
        : items.filter((item) => item.classification === 'previously-ignored').length;

    return buildHtml(sections.join('\n'), options.runDate, items.length, hidden);
}

function renderItem(item: ClassifiedRecord, options: CurationLinkOptions): string {
    const { record, entry } = item;
    const details = [
        record.authors.length > 0 ? record.authors.join(', ') : null,
        record.journal,
        record.year === null ? null : String(record.year),
        record.doi ? `doi:${record.doi}` : null,
    ].filter((value): value is string => value !== null);

    const reports = item.reports.map((report) => {
        const parts = [
            `<span class="source">${escapeHtml(report.searchText ?? report.source)}</span>`,
            report.reference ? `<span class="ref">${escapeHtml(report.reference)}</span>` : '',
            report.excerpt ? `<blockquote>${escapeHtml(report.excerpt)}</blockquote>` : '',
        ];
        return `      <li>${parts.filter((part) => part.length > 0).join(' ')}</li>`;
    });

    const links = curationLinks(item, options).map(
        (link) =>
            `      <li><a href="${escapeHtml(link.url)}" target="${escapeHtml(link.target)}">${escapeHtml(link.label)}</a></li>`
    );

    const tier = item.tier ? ` <span class="tier ${item.tier}">${item.tier} match</span>` : '';
    const annotation = entry.annotation
        ? `\n    <p class="annotation">${escapeHtml(entry.annotation)}</p>`
        : '';

    return `  <article class="pub" data-search="${escapeHtml(`${record.title} ${record.doi ?? ''}`)}">
    <h3>${escapeHtml(record.rawTitle || record.doi || '')}${tier}</h3>
    <p class="details">${escapeHtml(details.join(' · '))}</p>
    <p class="seen">First seen ${escapeHtml(entry.firstSeenDate ?? 'before dates were recorded')}</p>${annotation}
    <ul class="reports">
${reports.join('\n')}
    </ul>
    <ul class="links">
${links.join('\n')}
    </ul>
  </article>`;
}

function buildHtml(body: string, runDate: string, count: number, hidden: number): string {
    const hiddenNote = hidden > 0 ? ` · ${hidden} ignored not shown` : '';
    return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>PubSpork curation ${escapeHtml(runDate)}</title>
<style>
  * { margin: 0; padding: 0; box-sizing: border-box; }
  body {
    font-family: 'Inter', -apple-system, BlinkMacSystemFont, sans-serif;
    background: #0f172a;
    color: #e2e8f0;
    padding: 24px;
  }
  .header {
    display: flex;
    align-items: center;
    gap: 12px;
    margin-bottom: 16px;
  }
  .header h1 {
    font-size: 20px;
    font-weight: 700;
    background: linear-gradient(135deg, #6366f1, #a855f7);
    -webkit-background-clip: text;
    -webkit-text-fill-color: transparent;
  }
  .stats { font-size: 12px; color: #94a3b8; }
  #search {
    width: 100%;
    max-width: 480px;
    padding: 8px 12px;
    margin-bottom: 24px;
    background: rgba(30, 41, 59, 0.8);
    border: 1px solid rgba(100, 116, 139, 0.3);
    border-radius: 8px;
    color: #e2e8f0;
    font-size: 14px;
    outline: none;
  }
  #search:focus { border-color: #6366f1; }
  h2 { font-size: 16px; margin: 24px 0 12px; }
  h2 .count { font-size: 12px; color: #94a3b8; }
  .pub {
    background: rgba(15, 23, 42, 0.85);
    border: 1px solid rgba(100, 116, 139, 0.3);
    border-radius: 12px;
    padding: 16px;
    margin-bottom: 12px;
  }
  .pub h3 { font-size: 15px; font-weight: 600; line-height: 1.3; margin-bottom: 6px; }
  .details, .seen { font-size: 12px; color: #94a3b8; }
  .annotation { font-size: 12px; color: #f59e0b; margin-top: 4px; }
  .tier { font-size: 11px; font-weight: 400; color: #10b981; margin-left: 6px; }
  .tier.probable { color: #f59e0b; }
  ul { list-style: none; font-size: 13px; margin-top: 8px; }
  .reports li { padding: 4px 0; border-bottom: 1px solid rgba(100, 116, 139, 0.15); }
  .reports .ref { color: #94a3b8; }
  blockquote { color: #cbd5e1; font-style: italic; margin-top: 2px; }
  .links li { display: inline-block; margin-right: 12px; }
  a { color: #6366f1; text-decoration: none; }
  a:hover { text-decoration: underline; }
  .hidden { display: none; }
</style>
</head>
<body>
  <div class="header">
    <h1>PubSpork</h1>
    <span class="stats">${escapeHtml(runDate)} · ${count} publications${hiddenNote}</span>
  </div>

  <input type="text" id="search" placeholder="Filter publications..." autocomplete="off" />

${body}

<script>
document.getElementById('search').addEventListener('input', function(e) {
  const q = e.target.value.toLowerCase().trim();
  document.querySelectorAll('.pub').forEach(function(pub) {
    pub.classList.toggle('hidden', q !== '' && !pub.dataset.search.includes(q));
  });
});
</script>
</body>
</html>`;
}
