export {
  parseSyncKey,
  formatSyncKey,
  SYNC_KEY_DELIMITER,
  DEFAULT_TAG_PREFIX,
} from './sync-key.js';
export { correlateGroups } from './identity-correlator.js';
