/**
 * Alias Index
 *
 * Case-insensitive handle → user lookup over one user snapshot. Every
 * primary handle and alias gets an entry. A handle claimed by two different
 * users is kept as a conflict and resolves as ambiguous, never to either
 * user.
 */

import { normalizeHandle, type TargetUser } from '@dirsync/core';
import { SyncError } from '../errors/index.js';

export type AliasResolution =
  | { readonly status: 'found'; readonly user: TargetUser }
  | { readonly status: 'not_found' }
  | { readonly status: 'ambiguous'; readonly users: readonly TargetUser[] };

export interface AliasConflict {
  readonly handle: string;
  readonly users: readonly TargetUser[];
}

function handlesOf(user: TargetUser): string[] {
  return [user.primaryHandle, ...user.aliasHandles].map(normalizeHandle).filter(Boolean);
}

export class AliasIndex {
  private constructor(
    private readonly byHandle: ReadonlyMap<string, readonly TargetUser[]>,
    private readonly byId: ReadonlyMap<string, TargetUser>
  ) {}

  static build(users: readonly TargetUser[]): AliasIndex {
    const byHandle = new Map<string, TargetUser[]>();
    const byId = new Map<string, TargetUser>();

    for (const user of users) {
      if (!byId.has(user.id)) byId.set(user.id, user);

      for (const handle of handlesOf(user)) {
        const claimants = byHandle.get(handle);
        if (!claimants) {
          byHandle.set(handle, [user]);
        } else if (!claimants.some((u) => u.id === user.id)) {
          claimants.push(user);
        }
      }
    }

    return new AliasIndex(byHandle, byId);
  }

  /** Number of distinct handles */
  get size(): number {
    return this.byHandle.size;
  }

  get conflicts(): AliasConflict[] {
    const conflicts: AliasConflict[] = [];
    for (const [handle, users] of this.byHandle) {
      if (users.length > 1) conflicts.push({ handle, users });
    }
    return conflicts;
  }

  resolve(handle: string): AliasResolution {
    const users = this.byHandle.get(normalizeHandle(handle));
    const [first] = users ?? [];
    if (!users || !first) return { status: 'not_found' };
    if (users.length > 1) return { status: 'ambiguous', users };
    return { status: 'found', user: first };
  }

  /**
   * All lower-cased handles of a user. Member listings carry no aliases,
   * so the indexed record with the same id is preferred when present.
   */
  equivalenceClass(user: TargetUser): Set<string> {
    return new Set(handlesOf(this.byId.get(user.id) ?? user));
  }

  /**
   * @throws SyncError ALIAS_CONFLICT if any handle has more than one claimant
   */
  assertNoConflicts(): void {
    const conflicts = this.conflicts;
    if (conflicts.length === 0) return;

    throw new SyncError({
      code: 'ALIAS_CONFLICT',
      message: `${conflicts.length} handle(s) are claimed by more than one user: ${conflicts
        .map((c) => `${c.handle} (${c.users.map((u) => u.primaryHandle).join(', ')})`)
        .join('; ')}`,
      suggestion: 'Remove the duplicate alias from one of the users in the target directory.',
      context: { handles: conflicts.map((c) => c.handle) },
    });
  }
}
