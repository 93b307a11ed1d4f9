/**
 * Source-side collaborator contracts
 */

import type { SourceGroup, SourceMemberHandle, TargetUser } from '../types/index.js';

/** Authoritative directory the groups are read from */
export interface SourceDirectory {
  /**
   * Read all distribution groups matching the filter
   * @throws ConnectorError if the directory cannot be queried
   */
  fetchGroups(filter?: string): Promise<SourceGroup[]>;
}

/** Supplies the desired member handles of one source group */
export interface MembershipSource {
  /**
   * Resolve the member handles of a group.
   * An empty array means "no data" and must never be read as "no members".
   */
  fetchMemberHandles(group: SourceGroup): Promise<SourceMemberHandle[]>;
}

/** Optional sink for the current target members of each processed group */
export interface MembershipDiagnostics {
  exportMembers(groupName: string, members: readonly TargetUser[]): Promise<void>;
}
