export { formatSyncSummary, type SyncSummaryInput } from './summary-formatter.js';
