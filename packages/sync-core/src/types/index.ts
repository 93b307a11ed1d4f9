/**
 * Type exports for sync-core
 */

export type {
  SyncKey,
  GroupCorrelation,
  RemovalMatch,
  AmbiguousHandle,
  MembershipPlan,
  SyncCounter,
  SyncStats,
  AbortReason,
  SyncResult,
  SyncOptions,
} from './sync.js';
export { SYNC_COUNTERS } from './sync.js';
