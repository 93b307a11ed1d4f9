/**
 * Wire → domain mapping for directory API payloads.
 */

import type { TargetGroup, TargetUser, WireGroup, WireUser } from '@dirsync/core';

export function toTargetGroup(group: WireGroup): TargetGroup {
  return {
    id: group.id,
    externalId: group.externalId ?? undefined,
    name: group.name,
    label: group.label ?? undefined,
    description: group.description ?? undefined,
    membersCount: group.membersCount,
  };
}

export function toTargetUser(user: WireUser): TargetUser {
  return {
    id: user.id,
    primaryHandle: user.nickname,
    aliasHandles: user.aliases,
    email: user.email ?? undefined,
    name: user.name
      ? {
          first: user.name.first ?? undefined,
          last: user.name.last ?? undefined,
          middle: user.name.middle ?? undefined,
        }
      : undefined,
    position: user.position ?? undefined,
    departmentId: user.departmentId ?? undefined,
    isRobot: user.isRobot ?? undefined,
  };
}
