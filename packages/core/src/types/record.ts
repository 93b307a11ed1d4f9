/**
 * Directory records exchanged between connectors and the sync engine.
 *
 * All records are read-only snapshots taken once per pass.
 */

/** Member kinds the target service understands. The engine only issues `user`. */
export type MemberType = 'user' | 'group' | 'department';

/** A distribution group as read from the authoritative source directory */
export interface SourceGroup {
  /** Immutable identifier (rendered objectGUID); empty when the directory has none */
  readonly stableId: string;
  /** Display name; becomes the target group's `name` */
  readonly displayName: string;
  /** Full group mail address; its local part becomes the target `label` */
  readonly mail?: string;
  readonly description?: string;
  /** Distinguished name, kept for log output */
  readonly dn?: string;
}

/** A group as it currently exists in the target service */
export interface TargetGroup {
  readonly id: number;
  /** Raw externalId as stored by the target; parse it before use */
  readonly externalId?: string;
  readonly name: string;
  readonly label?: string;
  readonly description?: string;
  readonly membersCount: number;
}

export interface TargetUserName {
  readonly first?: string;
  readonly last?: string;
  readonly middle?: string;
}

/** A user account in the target service */
export interface TargetUser {
  readonly id: string;
  /** Primary handle (the target's `nickname`) */
  readonly primaryHandle: string;
  /** Secondary handles; may be empty */
  readonly aliasHandles: readonly string[];
  readonly email?: string;
  readonly name?: TargetUserName;
  readonly position?: string;
  readonly departmentId?: number;
  readonly isRobot?: boolean;
}

/** Lower-cased local part of a source member address */
export type SourceMemberHandle = string & { readonly __brand: 'SourceMemberHandle' };

/** Attributes to change on a target group. An empty object means "in sync". */
export interface GroupPatch {
  name?: string;
  label?: string;
  description?: string;
}

/** Body sent to the target service to create a group */
export interface CreateGroupPayload {
  name: string;
  externalId: string;
  label?: string;
  description?: string;
}
