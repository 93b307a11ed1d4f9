/**
 * Target Service Interface
 *
 * The organisation directory that groups and memberships are written to.
 * Implementations own transport, authentication, pagination and retry;
 * every method settles to a RemoteResult and never rejects.
 */

import type {
  TargetGroup,
  TargetUser,
  MemberType,
  GroupPatch,
  CreateGroupPayload,
  RemoteResult,
  DeleteOutcome,
  AddMemberOutcome,
  RemoveMemberOutcome,
} from '../types/index.js';

export interface TargetService {
  /** All groups in the organisation (fully paginated) */
  listGroups(): Promise<RemoteResult<TargetGroup[]>>;

  /** All human user accounts (robots and system accounts filtered out) */
  listUsers(): Promise<RemoteResult<TargetUser[]>>;

  /** User members of one group; nested groups and departments are not returned */
  listGroupMembers(groupId: number): Promise<RemoteResult<TargetUser[]>>;

  createGroup(payload: CreateGroupPayload): Promise<RemoteResult<TargetGroup>>;

  patchGroup(groupId: number, patch: GroupPatch): Promise<RemoteResult<TargetGroup>>;

  deleteGroup(groupId: number): Promise<RemoteResult<DeleteOutcome>>;

  addMember(
    groupId: number,
    type: MemberType,
    memberId: string
  ): Promise<RemoteResult<AddMemberOutcome>>;

  removeMember(
    groupId: number,
    type: MemberType,
    memberId: string
  ): Promise<RemoteResult<RemoveMemberOutcome>>;

  /**
   * Verify credentials with a cheap read
   * @returns true if the token is accepted
   */
  testConnection(): Promise<boolean>;
}
