import type { AbortReason, SyncResult, SyncStats } from '../types/index.js';

export function createSyncStats(): SyncStats {
  return {
    sourceGroups: 0,
    targetGroups: 0,
    processed: 0,
    matched: 0,
    created: 0,
    updated: 0,
    unchanged: 0,
    deleted: 0,
    skipped: 0,
    membersAdded: 0,
    membersRemoved: 0,
    notFound: 0,
    ambiguous: 0,
    errors: 0,
  };
}

/** `ok` follows the error counter only; an aborted phase with no errors is ok */
export function finishResult(stats: SyncStats, aborted?: AbortReason): SyncResult {
  return aborted === undefined
    ? { ok: stats.errors === 0, stats }
    : { ok: stats.errors === 0, stats, aborted };
}
