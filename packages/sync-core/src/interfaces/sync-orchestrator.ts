/**
 * Sync Orchestrator Interface
 */

import type {
  MembershipSource,
  SourceGroup,
  TargetGroup,
  TargetUser,
} from '@dirsync/core';
import type { SyncResult } from '../types/index.js';

export interface ISyncOrchestrator {
  /**
   * Group-level pass: create unmatched, patch drifted, delete orphaned.
   *
   * @param sourceGroups - Source snapshot
   * @param targetGroups - Target snapshot taken before this pass
   */
  syncGroups(
    sourceGroups: readonly SourceGroup[],
    targetGroups: readonly TargetGroup[]
  ): Promise<SyncResult>;

  /**
   * Membership pass over every tagged target group.
   *
   * @param targetGroups - Target snapshot re-fetched after the group pass
   * @param members - Supplies desired member handles per source group
   */
  syncMembership(
    sourceGroups: readonly SourceGroup[],
    targetGroups: readonly TargetGroup[],
    targetUsers: readonly TargetUser[],
    members: MembershipSource
  ): Promise<SyncResult>;
}
