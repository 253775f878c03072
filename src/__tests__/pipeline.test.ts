import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_CONFIG, type PubSporkConfig } from '../types/index.js';
import { runTriage } from '../orchestrator/pipeline.js';
import { runReport } from '../orchestrator/report-run.js';
import { loadLedger } from '../ledger/ledger-file.js';
import { ConfigError, LedgerLoadError } from '../utils/errors.js';

const SCHOLAR_HTML = `<html><body>
<div>Scholar Alert: [ protein folding ] - new results</div>
<h3><a href="https://scholar.google.com/scholar_url?url=https%3A%2F%2Fexample.org%2Fpaper%3Fid%3D1&amp;hl=en">[PDF] Deep learning for protein folding</a></h3>
<div>EB Alonso, L Cockx - Nature, 2020</div>
<h3><a href="https://scholar.google.com/scholar_url?url=https%3A%2F%2Fdoi.org%2F10.5555%2Fxyz&amp;hl=en">A second paper about protein structures</a></h3>
<div>J Smith - bioRxiv, 2021</div>
</body></html>`;

const LIBRARY_CSV = [
    '"Key","Item Type","Publication Year","Author","Title","Publication Title","DOI","Url","Date Added","Manual Tags"',
    '"K1","journalArticle","2020","Alonso, E","Deep learning for protein folding","Nature","10.1/fold","","2020-05-01 10:00:00","folding; deep learning"',
    '"E1","journalArticle","","","Editorial","Nature","","","2021-01-01 10:00:00",""',
    '"E2","journalArticle","","","Editorial","Science","","","2021-02-01 10:00:00","folding"',
].join('\n');

const SEEN_LEDGER =
    'title\tdoi\tyear\tstate\tfirst_seen_date\tentry_date\n' +
    'A second paper about protein structures\t10.5555/xyz\t2021\tnew\t2024-01-01\t2024-01-01\n';

describe('Pipeline', () => {
    let tmpDir: string;
    let config: PubSporkConfig;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pubspork-pipeline-'));
        const alertsDir = path.join(tmpDir, 'alerts');
        fs.mkdirSync(path.join(alertsDir, 'googlescholar-email'), { recursive: true });
        fs.writeFileSync(path.join(alertsDir, 'googlescholar-email', '2024-03-01-alert.html'), SCHOLAR_HTML);
        fs.writeFileSync(path.join(tmpDir, 'library.csv'), LIBRARY_CSV);

        config = {
            ...DEFAULT_CONFIG,
            sources: ['googlescholar-email'],
            libType: 'zotero-csv',
            libPath: path.join(tmpDir, 'library.csv'),
            onlineLibUrl: 'https://www.zotero.org/someuser/library',
            alertsDir,
            curationPage: path.join(tmpDir, 'curation.html'),
        };
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    describe('runTriage', () => {
        it('should start from an empty ledger without an input ledger', () => {
            const ledgerOut = path.join(tmpDir, 'out.tsv');

            const { stats } = runTriage({ ...config, ledgerOut }, { today: '2024-03-05' });

            expect(stats.alreadyInLibrary).toBe(1);
            expect(stats.newlyReported).toBe(1);
            expect(stats.repeatNew).toBe(0);
            expect(fs.existsSync(config.curationPage ?? '')).toBe(true);

            const saved = loadLedger(ledgerOut).ledger;
            expect(saved.get('doi:10.5555/xyz')?.state).toBe('new');
            expect(saved.get('doi:10.1/fold')?.state).toBe('in_library');
        });

        it('should write the ledger to the output path and leave the input ledger alone', () => {
            const ledgerIn = path.join(tmpDir, 'in.tsv');
            const ledgerOut = path.join(tmpDir, 'out.tsv');
            fs.writeFileSync(ledgerIn, SEEN_LEDGER);

            const { stats } = runTriage({ ...config, ledgerIn, ledgerOut }, { today: '2024-03-05' });

            expect(stats.repeatNew).toBe(1);
            expect(stats.newlyReported).toBe(0);
            expect(fs.readFileSync(ledgerIn, 'utf-8')).toBe(SEEN_LEDGER);

            const entry = loadLedger(ledgerOut).ledger.get('doi:10.5555/xyz');
            expect(entry?.firstSeenDate).toBe('2024-01-01');
            expect(entry?.entryDate).toBe('2024-03-05');
        });

        it('should abort on a malformed ledger before writing anything', () => {
            const ledgerIn = path.join(tmpDir, 'in.tsv');
            const ledgerOut = path.join(tmpDir, 'out.tsv');
            fs.writeFileSync(ledgerIn, 'title\tyear\nSomething\t2020\n');

            expect(() => runTriage({ ...config, ledgerIn, ledgerOut }, { today: '2024-03-05' })).toThrow(LedgerLoadError);
            expect(fs.existsSync(config.curationPage ?? '')).toBe(false);
            expect(fs.existsSync(ledgerOut)).toBe(false);
        });

        it('should read the titles allowed to repeat in the library', () => {
            const okDuplicateTitles = path.join(tmpDir, 'ok-duplicates.txt');
            fs.writeFileSync(okDuplicateTitles, '# front matter\neditorial\n');

            expect(runTriage(config, { today: '2024-03-05' }).stats.libraryDuplicates).toBe(1);
            expect(runTriage({ ...config, okDuplicateTitles }, { today: '2024-03-05' }).stats.libraryDuplicates).toBe(0);
        });

        it('should fail on a missing duplicate titles file', () => {
            const okDuplicateTitles = path.join(tmpDir, 'missing.txt');
            expect(() => runTriage({ ...config, okDuplicateTitles }, { today: '2024-03-05' })).toThrow(
                `List file not found: ${okDuplicateTitles}`
            );
        });
    });

    describe('runReport', () => {
        it('should count only the tags listed in the tags file', () => {
            const tagsFile = path.join(tmpDir, 'tags.txt');
            fs.writeFileSync(tagsFile, '# tags to report\nfolding\n\n');

            const output = runReport(config, { kind: 'tagcount', format: 'json', tagsFile });

            expect(JSON.parse(output)).toEqual({
                kind: 'tagcount',
                entryStart: null,
                entryEnd: null,
                total: 3,
                tags: [{ tag: 'folding', count: 2 }],
            });
        });

        it('should report every tag without a tags file', () => {
            const output = runReport(config, { kind: 'tagcount', format: 'json' });

            expect(JSON.parse(output).tags).toEqual([
                { tag: 'folding', count: 2 },
                { tag: 'deep learning', count: 1 },
            ]);
        });

        it('should name the tags option when its file is missing', () => {
            const tagsFile = path.join(tmpDir, 'missing.txt');
            let thrown: unknown;
            try {
                runReport(config, { kind: 'tagcount', format: 'json', tagsFile });
            } catch (error) {
                thrown = error;
            }
            expect(thrown).toBeInstanceOf(ConfigError);
            expect(thrown instanceof ConfigError ? thrown.option : null).toBe('tags');
        });
    });
});
