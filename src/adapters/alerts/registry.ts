import type { AlertAdapter, AlertSourceTag } from '../../types/index.js';
import { GoogleScholarAlertAdapter } from './google-scholar.js';
import { MyNcbiAlertAdapter } from './myncbi.js';
import { ScienceDirectAlertAdapter } from './sciencedirect.js';
import { WebOfScienceAlertAdapter } from './web-of-science.js';
import { WileyAlertAdapter } from './wiley.js';

const ALERT_ADAPTERS: Record<AlertSourceTag, () => AlertAdapter> = {
    'googlescholar-email': () => new GoogleScholarAlertAdapter(),
    'myncbi-email': () => new MyNcbiAlertAdapter(),
    'sciencedirect-email': () => new ScienceDirectAlertAdapter(),
    'wiley-email': () => new WileyAlertAdapter(),
    'webofscience-email': () => new WebOfScienceAlertAdapter(),
};

/**
 * Resolve the alert adapter for a source tag.
 */
export function getAlertAdapter(source: AlertSourceTag): AlertAdapter {
    return ALERT_ADAPTERS[source]();
}
