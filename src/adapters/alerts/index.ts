export { getAlertAdapter } from './registry.js';
export { GoogleScholarAlertAdapter } from './google-scholar.js';
export { MyNcbiAlertAdapter } from './myncbi.js';
export { ScienceDirectAlertAdapter } from './sciencedirect.js';
export { WileyAlertAdapter } from './wiley.js';
export { WebOfScienceAlertAdapter } from './web-of-science.js';
export { readAlertInbox, listAlertMessages } from './inbox.js';
export type { AlertInboxOptions, AlertInboxResult } from './inbox.js';
