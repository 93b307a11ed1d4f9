/**
 * Sync tag codec
 *
 * Owned target groups carry `externalId = "<prefix>;<stableId>"`. The raw
 * string is parsed once on ingestion and never compared ad hoc.
 */

import type { SyncKey } from '../types/index.js';

export const SYNC_KEY_DELIMITER = ';';
export const DEFAULT_TAG_PREFIX = 'DDG';

export function formatSyncKey(prefix: string, stableId: string): string {
  return `${prefix}${SYNC_KEY_DELIMITER}${stableId}`;
}

export function parseSyncKey(externalId: string | undefined, prefix: string): SyncKey {
  const raw = externalId ?? '';
  if (raw === prefix || raw === `${prefix}${SYNC_KEY_DELIMITER}`) {
    return { kind: 'malformed', prefix, raw };
  }

  const head = `${prefix}${SYNC_KEY_DELIMITER}`;
  if (!raw.startsWith(head)) {
    return { kind: 'foreign', raw };
  }

  return { kind: 'tagged', prefix, stableId: raw.slice(head.length) };
}
