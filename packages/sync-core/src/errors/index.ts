export { SyncError, type SyncErrorCode, type SyncErrorDetails } from './sync-error.js';
