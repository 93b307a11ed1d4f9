/**
 * Sync engine types
 */

import type { MembershipDiagnostics, SourceMemberHandle, TargetGroup, TargetUser } from '@dirsync/core';

/**
 * Parsed form of a target group's externalId.
 *
 * - tagged: `<prefix>;<stableId>` with a non-empty stableId
 * - malformed: the prefix alone, or `<prefix>;` with nothing after it
 * - foreign: anything else, including absent values and other prefixes
 */
export type SyncKey =
  | { readonly kind: 'tagged'; readonly prefix: string; readonly stableId: string }
  | { readonly kind: 'malformed'; readonly prefix: string; readonly raw: string }
  | { readonly kind: 'foreign'; readonly raw: string };

/** Pairing of source and target groups for one pass */
export interface GroupCorrelation {
  /** stableId → paired target group */
  readonly pairs: ReadonlyMap<string, TargetGroup>;
  /** Tagged target groups whose stableId has no source group at all */
  readonly orphans: readonly TargetGroup[];
  /** Target groups carrying the prefix without a usable stableId */
  readonly malformed: readonly TargetGroup[];
  /** Tagged target groups whose stableId was already claimed by an earlier group */
  readonly duplicates: readonly TargetGroup[];
}

/**
 * How current members are matched against source handles when deciding removals.
 *
 * - equivalence: a member stays if any of its handles (primary or alias) is in the source
 * - primary: a member stays only if its primary handle is in the source
 */
export type RemovalMatch = 'equivalence' | 'primary';

export interface AmbiguousHandle {
  readonly handle: SourceMemberHandle;
  readonly users: readonly TargetUser[];
}

/** Membership changes for one group */
export interface MembershipPlan {
  readonly toAdd: readonly TargetUser[];
  readonly toRemove: readonly TargetUser[];
  readonly notFound: readonly SourceMemberHandle[];
  readonly ambiguous: readonly AmbiguousHandle[];
}

export const SYNC_COUNTERS = [
  'sourceGroups',
  'targetGroups',
  'processed',
  'matched',
  'created',
  'updated',
  'unchanged',
  'deleted',
  'skipped',
  'membersAdded',
  'membersRemoved',
  'notFound',
  'ambiguous',
  'errors',
] as const;

export type SyncCounter = (typeof SYNC_COUNTERS)[number];

/** Counters for one phase invocation */
export type SyncStats = Record<SyncCounter, number>;

export type AbortReason =
  | 'empty-source-groups'
  | 'empty-target-groups'
  | 'empty-target-users'
  | 'alias-conflict';

export interface SyncResult {
  /** True iff stats.errors is zero */
  readonly ok: boolean;
  readonly stats: SyncStats;
  /** Set when a precondition stopped the phase before any entity was processed */
  readonly aborted?: AbortReason;
}

export interface SyncOptions {
  /** Tag prefix of owned groups (default: 'DDG') */
  tagPrefix?: string;
  /** Count decisions without calling mutating operations (default: false) */
  dryRun?: boolean;
  /** Pause between consecutive mutating calls in live runs (default: 500) */
  mutationDelayMs?: number;
  /** Removal policy (default: 'equivalence') */
  removalMatch?: RemovalMatch;
  /** Abort the membership phase when two users share a handle (default: false) */
  failOnAliasConflict?: boolean;
  /** Receives the current members of each processed group */
  diagnostics?: MembershipDiagnostics;
  /** Timer used for pacing; replaced in tests */
  sleep?: (ms: number) => Promise<void>;
}
