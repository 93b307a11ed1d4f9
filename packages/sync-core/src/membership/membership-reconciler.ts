/**
 * Membership Reconciler
 *
 * Set reconciliation of one group's members against the source handles.
 * The source always wins; the current members are only a starting point.
 */

import { normalizeHandle, type SourceMemberHandle, type TargetUser } from '@dirsync/core';
import type { AliasIndex } from '../alias/index.js';
import type { AmbiguousHandle, MembershipPlan, RemovalMatch } from '../types/index.js';

export interface ReconcileOptions {
  /** Default: 'equivalence' */
  removalMatch?: RemovalMatch;
}

export function reconcileMembership(
  currentMembers: readonly TargetUser[],
  sourceHandles: readonly SourceMemberHandle[],
  index: AliasIndex,
  options: ReconcileOptions = {}
): MembershipPlan {
  const removalMatch = options.removalMatch ?? 'equivalence';

  const memberIds = new Set<string>();
  const targetHandleSet = new Set<string>();
  for (const member of currentMembers) {
    memberIds.add(member.id);
    for (const handle of index.equivalenceClass(member)) targetHandleSet.add(handle);
  }

  const uniqueHandles = [...new Set(sourceHandles)];
  const sourceSet: ReadonlySet<string> = new Set<string>(uniqueHandles);

  const toAdd: TargetUser[] = [];
  const addedIds = new Set<string>();
  const notFound: SourceMemberHandle[] = [];
  const ambiguous: AmbiguousHandle[] = [];

  for (const handle of uniqueHandles) {
    if (targetHandleSet.has(handle)) continue;

    const resolution = index.resolve(handle);
    switch (resolution.status) {
      case 'not_found':
        notFound.push(handle);
        break;
      case 'ambiguous':
        ambiguous.push({ handle, users: resolution.users });
        break;
      case 'found': {
        const { user } = resolution;
        if (memberIds.has(user.id) || addedIds.has(user.id)) break;
        addedIds.add(user.id);
        toAdd.push(user);
        break;
      }
    }
  }

  const isWanted = (member: TargetUser): boolean => {
    if (removalMatch === 'primary') {
      return sourceSet.has(normalizeHandle(member.primaryHandle));
    }
    for (const handle of index.equivalenceClass(member)) {
      if (sourceSet.has(handle)) return true;
    }
    return false;
  };

  const toRemove = currentMembers.filter((member) => !isWanted(member));

  return { toAdd, toRemove, notFound, ambiguous };
}
