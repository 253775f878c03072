import { existsSync, readdirSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import type { AlertMessage, AlertRecord, AlertSourceTag } from '../../types/index.js';
import { inDateRange, isIsoDate } from '../../utils/dates.js';
import { AdapterError, ConfigError } from '../../utils/errors.js';
import { getLogger } from '../../utils/logger.js';
import { getAlertAdapter } from './registry.js';

const MESSAGE_FILE_RE = /^(\d{4}-\d{2}-\d{2})-.*\.html?$/i;

export interface AlertInboxOptions {
    /** Directory holding one sub-directory per alert source tag */
    dir: string;
    sources: readonly AlertSourceTag[];
    /** Inclusive lower bound on the received date */
    since?: string;
    /** Exclusive upper bound on the received date */
    before?: string;
}

export interface AlertInboxResult {
    records: AlertRecord[];
    messages: number;
    /** Messages the adapter could not parse; they are skipped */
    failedMessages: number;
}

/**
 * Saved alert messages for the selected sources and date range,
 * ordered by source (as given) and then by file name.
 */
export function listAlertMessages(options: AlertInboxOptions): AlertMessage[] {
    const log = getLogger();

    if (!existsSync(options.dir) || !statSync(options.dir).isDirectory()) {
        throw new ConfigError(`Alerts directory not found: ${options.dir}`, 'alerts');
    }

    const messages: AlertMessage[] = [];

    for (const source of options.sources) {
        const sourceDir = join(options.dir, source);
        if (!existsSync(sourceDir)) {
            log.debug({ source, dir: sourceDir }, 'No saved alerts for source');
            continue;
        }

        for (const file of readdirSync(sourceDir).sort()) {
            const path = join(sourceDir, file);
            if (!statSync(path).isFile()) continue;

            const receivedDate = file.match(MESSAGE_FILE_RE)?.[1];
            if (!receivedDate || !isIsoDate(receivedDate)) {
                log.warn({ path }, 'Skipping alert file without a YYYY-MM-DD- name prefix');
                continue;
            }
            if (!inDateRange(receivedDate, options.since, options.before)) continue;

            messages.push({ source, receivedDate, path, body: readFileSync(path, 'utf-8') });
        }
    }

    return messages;
}

/**
 * Read and parse every selected alert message.
 * A message its adapter rejects is logged and skipped; the rest of the batch goes on.
 */
export function readAlertInbox(options: AlertInboxOptions): AlertInboxResult {
    const log = getLogger();
    const messages = listAlertMessages(options);
    const records: AlertRecord[] = [];
    let failedMessages = 0;

    for (const message of messages) {
        try {
            const raws = getAlertAdapter(message.source).parse(message);
            records.push(...raws.map((raw) => ({ source: message.source, raw })));
            log.debug({ path: message.path, records: raws.length }, 'Alert message parsed');
        } catch (error) {
            if (!(error instanceof AdapterError)) throw error;
            failedMessages++;
            log.warn({ path: message.path, adapter: error.adapter }, error.message);
        }
    }

    log.info(
        { messages: messages.length, records: records.length, failed: failedMessages },
        'Alert inbox read'
    );
    return { records, messages: messages.length, failedMessages };
}
