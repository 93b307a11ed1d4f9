/**
 * Sync Orchestrator
 *
 * Runs the group phase and the membership phase over one snapshot.
 * Both phases are fail-soft: a failure on one entity is counted and the
 * loop moves on. In dry-run mode every decision is counted as if applied
 * and no mutating call is made.
 */

import {
  createSilentLogger,
  type Logger,
  type MembershipSource,
  type SourceGroup,
  type TargetGroup,
  type TargetService,
  type TargetUser,
} from '@dirsync/core';
import type { ISyncOrchestrator } from '../interfaces/index.js';
import type {
  GroupCorrelation,
  RemovalMatch,
  SyncOptions,
  SyncResult,
  SyncStats,
} from '../types/index.js';
import { SyncError } from '../errors/index.js';
import { correlateGroups, parseSyncKey, DEFAULT_TAG_PREFIX, SYNC_KEY_DELIMITER } from '../correlation/index.js';
import { buildCreatePayload, diffGroup, isEmptyPatch } from '../diff/index.js';
import { AliasIndex } from '../alias/index.js';
import { reconcileMembership } from '../membership/index.js';
import { MutationPacer } from './mutation-pacer.js';
import { createSyncStats, finishResult } from './stats.js';

type ResolvedOptions = Required<Omit<SyncOptions, 'diagnostics' | 'sleep'>> &
  Pick<SyncOptions, 'diagnostics' | 'sleep'>;

const REMOVAL_MATCHES: readonly RemovalMatch[] = ['equivalence', 'primary'];

function missingAttributes(group: SourceGroup): string[] {
  const missing: string[] = [];
  if (!group.stableId.trim()) missing.push('stableId');
  if (!group.displayName.trim()) missing.push('displayName');
  if (!group.mail?.trim()) missing.push('mail');
  return missing;
}

export class SyncOrchestrator implements ISyncOrchestrator {
  private readonly options: ResolvedOptions;

  constructor(
    private readonly target: TargetService,
    private readonly logger: Logger = createSilentLogger(),
    options: SyncOptions = {}
  ) {
    this.options = this.validateOptions(options);
  }

  get dryRun(): boolean {
    return this.options.dryRun;
  }

  /**
   * Create, update and delete target groups so they mirror the source.
   * Aborts before touching anything when the source list is empty; an
   * empty target list is a normal first run.
   */
  async syncGroups(
    sourceGroups: readonly SourceGroup[],
    targetGroups: readonly TargetGroup[]
  ): Promise<SyncResult> {
    const stats = createSyncStats();
    stats.sourceGroups = sourceGroups.length;
    stats.targetGroups = targetGroups.length;
    const log = this.logger.child({ phase: 'groups' });

    if (sourceGroups.length === 0) {
      log.error('Source group list is empty; group sync aborted');
      return finishResult(stats, 'empty-source-groups');
    }

    const correlation = correlateGroups(sourceGroups, targetGroups, this.options.tagPrefix);
    this.reportUnusableTargets(correlation, stats, log);

    log.info('Group sync started', {
      sourceGroups: sourceGroups.length,
      targetGroups: targetGroups.length,
      paired: correlation.pairs.size,
      orphans: correlation.orphans.length,
      dryRun: this.options.dryRun,
    });

    const pacer = this.createPacer();
    const seen = new Set<string>();

    for (const source of sourceGroups) {
      stats.processed += 1;
      try {
        await this.syncGroup(source, correlation, seen, stats, pacer, log);
      } catch (error) {
        stats.errors += 1;
        log.error('Group sync failed', { group: source.displayName, error });
      }
    }

    for (const orphan of correlation.orphans) {
      try {
        await this.deleteOrphan(orphan, stats, pacer, log);
      } catch (error) {
        stats.errors += 1;
        log.error('Group delete failed', { groupId: orphan.id, group: orphan.name, error });
      }
    }

    log.info('Group sync finished', { ...stats });
    return finishResult(stats);
  }

  /**
   * Converge the members of every tagged target group on its source group's
   * member handles. Pass a target group snapshot taken after `syncGroups`,
   * so groups created in that phase have their ids.
   */
  async syncMembership(
    sourceGroups: readonly SourceGroup[],
    targetGroups: readonly TargetGroup[],
    targetUsers: readonly TargetUser[],
    members: MembershipSource
  ): Promise<SyncResult> {
    const stats = createSyncStats();
    stats.sourceGroups = sourceGroups.length;
    stats.targetGroups = targetGroups.length;
    const log = this.logger.child({ phase: 'membership' });

    if (sourceGroups.length === 0) {
      log.error('Source group list is empty; membership sync aborted');
      return finishResult(stats, 'empty-source-groups');
    }
    if (targetGroups.length === 0) {
      log.error('Target group list is empty; membership sync aborted');
      return finishResult(stats, 'empty-target-groups');
    }
    if (targetUsers.length === 0) {
      log.error('Target user list is empty; membership sync aborted');
      return finishResult(stats, 'empty-target-users');
    }

    const index = AliasIndex.build(targetUsers);
    for (const conflict of index.conflicts) {
      log.warn('Handle claimed by more than one user; it will not be resolved', {
        handle: conflict.handle,
        users: conflict.users.map((u) => u.primaryHandle),
      });
    }
    if (this.options.failOnAliasConflict) {
      try {
        index.assertNoConflicts();
      } catch (error) {
        if (!(error instanceof SyncError)) throw error;
        log.error('Alias conflicts present; membership sync aborted', {
          conflicts: index.conflicts.length,
          error,
        });
        return finishResult(stats, 'alias-conflict');
      }
    }

    const sourceById = new Map<string, SourceGroup>();
    for (const group of sourceGroups) {
      if (group.stableId && !sourceById.has(group.stableId)) sourceById.set(group.stableId, group);
    }

    log.info('Membership sync started', {
      targetGroups: targetGroups.length,
      targetUsers: targetUsers.length,
      handles: index.size,
      dryRun: this.options.dryRun,
    });

    const pacer = this.createPacer();
    const claimed = new Set<string>();

    for (const group of targetGroups) {
      const key = parseSyncKey(group.externalId, this.options.tagPrefix);
      if (key.kind === 'foreign') continue;

      stats.processed += 1;
      const groupLog = log.child({ groupId: group.id, group: group.name });

      if (key.kind === 'malformed') {
        stats.skipped += 1;
        groupLog.warn('Sync tag has no stable id; group skipped', { externalId: key.raw });
        continue;
      }
      if (claimed.has(key.stableId)) {
        stats.skipped += 1;
        groupLog.warn('Sync tag already used by another group; group skipped', {
          externalId: group.externalId,
        });
        continue;
      }
      claimed.add(key.stableId);

      const source = sourceById.get(key.stableId);
      if (!source) {
        stats.skipped += 1;
        groupLog.info('No source group for sync tag; group skipped', { stableId: key.stableId });
        continue;
      }
      stats.matched += 1;

      try {
        await this.syncGroupMembers(group, source, index, members, stats, pacer, groupLog);
      } catch (error) {
        stats.errors += 1;
        groupLog.error('Membership sync failed', { error });
      }
    }

    log.info('Membership sync finished', { ...stats });
    return finishResult(stats);
  }

  private async syncGroup(
    source: SourceGroup,
    correlation: GroupCorrelation,
    seen: Set<string>,
    stats: SyncStats,
    pacer: MutationPacer,
    log: Logger
  ): Promise<void> {
    const missing = missingAttributes(source);
    if (missing.length > 0) {
      stats.skipped += 1;
      log.warn('Source group is missing required attributes; skipped', {
        group: source.displayName || source.dn,
        missing,
      });
      return;
    }

    if (seen.has(source.stableId)) {
      stats.skipped += 1;
      log.warn('Source stable id seen twice; later group skipped', {
        group: source.displayName,
        stableId: source.stableId,
      });
      return;
    }
    seen.add(source.stableId);

    const existing = correlation.pairs.get(source.stableId);
    if (!existing) {
      await this.createGroup(source, stats, pacer, log);
      return;
    }

    stats.matched += 1;
    const patch = diffGroup(source, existing);
    if (isEmptyPatch(patch)) {
      stats.unchanged += 1;
      log.debug('Group in sync', { groupId: existing.id, group: existing.name });
      return;
    }

    if (this.options.dryRun) {
      stats.updated += 1;
      log.info('[dry-run] Would update group', { groupId: existing.id, group: existing.name, patch });
      return;
    }

    const result = await pacer.run(() => this.target.patchGroup(existing.id, patch));
    if (!result.ok) {
      stats.errors += 1;
      log.error('Group update failed', { groupId: existing.id, group: existing.name, error: result.error });
      return;
    }
    stats.updated += 1;
    log.info('Group updated', { groupId: existing.id, group: existing.name, patch });
  }

  private async createGroup(
    source: SourceGroup,
    stats: SyncStats,
    pacer: MutationPacer,
    log: Logger
  ): Promise<void> {
    const payload = buildCreatePayload(source, this.options.tagPrefix);

    if (this.options.dryRun) {
      stats.created += 1;
      log.info('[dry-run] Would create group', { group: payload.name, externalId: payload.externalId });
      return;
    }

    const result = await pacer.run(() => this.target.createGroup(payload));
    if (!result.ok) {
      stats.errors += 1;
      log.error('Group create failed', { group: payload.name, error: result.error });
      return;
    }
    stats.created += 1;
    log.info('Group created', { groupId: result.value.id, group: payload.name, externalId: payload.externalId });
  }

  private async deleteOrphan(
    orphan: TargetGroup,
    stats: SyncStats,
    pacer: MutationPacer,
    log: Logger
  ): Promise<void> {
    if (this.options.dryRun) {
      stats.deleted += 1;
      log.info('[dry-run] Would delete group', { groupId: orphan.id, group: orphan.name });
      return;
    }

    const result = await pacer.run(() => this.target.deleteGroup(orphan.id));
    if (!result.ok) {
      stats.errors += 1;
      log.error('Group delete failed', { groupId: orphan.id, group: orphan.name, error: result.error });
      return;
    }
    if (!result.value.removed) {
      stats.errors += 1;
      log.error('Group delete was not confirmed', { groupId: orphan.id, group: orphan.name });
      return;
    }
    stats.deleted += 1;
    log.info('Group deleted', { groupId: orphan.id, group: orphan.name });
  }

  private async syncGroupMembers(
    group: TargetGroup,
    source: SourceGroup,
    index: AliasIndex,
    members: MembershipSource,
    stats: SyncStats,
    pacer: MutationPacer,
    log: Logger
  ): Promise<void> {
    const current = await this.target.listGroupMembers(group.id);
    if (!current.ok) {
      stats.errors += 1;
      log.error('Could not read group members', { error: current.error });
      return;
    }

    if (this.options.diagnostics) {
      try {
        await this.options.diagnostics.exportMembers(group.name, current.value);
      } catch (error) {
        log.warn('Member export failed', { error });
      }
    }

    const handles = await members.fetchMemberHandles(source);
    if (handles.length === 0) {
      stats.skipped += 1;
      log.warn('No source members found; group skipped');
      return;
    }

    const plan = reconcileMembership(current.value, handles, index, {
      removalMatch: this.options.removalMatch,
    });

    stats.notFound += plan.notFound.length;
    for (const handle of plan.notFound) {
      log.warn('Source member has no target user', { handle });
    }
    stats.ambiguous += plan.ambiguous.length;
    for (const { handle, users } of plan.ambiguous) {
      log.warn('Source member matches several target users; not added', {
        handle,
        users: users.map((u) => u.primaryHandle),
      });
    }

    log.info('Membership compared', {
      current: current.value.length,
      source: handles.length,
      toAdd: plan.toAdd.length,
      toRemove: plan.toRemove.length,
    });

    for (const user of plan.toAdd) {
      if (this.options.dryRun) {
        stats.membersAdded += 1;
        log.info('[dry-run] Would add member', { user: user.primaryHandle });
        continue;
      }
      const result = await pacer.run(() => this.target.addMember(group.id, 'user', user.id));
      if (!result.ok) {
        stats.errors += 1;
        log.error('Member add failed', { user: user.primaryHandle, error: result.error });
      } else if (result.value.added) {
        stats.membersAdded += 1;
        log.info('Member added', { user: user.primaryHandle });
      } else {
        log.debug('Member already present', { user: user.primaryHandle });
      }
    }

    for (const user of plan.toRemove) {
      if (this.options.dryRun) {
        stats.membersRemoved += 1;
        log.info('[dry-run] Would remove member', { user: user.primaryHandle });
        continue;
      }
      const result = await pacer.run(() => this.target.removeMember(group.id, 'user', user.id));
      if (!result.ok) {
        stats.errors += 1;
        log.error('Member removal failed', { user: user.primaryHandle, error: result.error });
      } else if (result.value.removed) {
        stats.membersRemoved += 1;
        log.info('Member removed', { user: user.primaryHandle });
      } else {
        log.debug('Member already absent', { user: user.primaryHandle });
      }
    }
  }

  private reportUnusableTargets(correlation: GroupCorrelation, stats: SyncStats, log: Logger): void {
    for (const group of correlation.malformed) {
      stats.skipped += 1;
      log.warn('Sync tag has no stable id; group left untouched', {
        groupId: group.id,
        group: group.name,
        externalId: group.externalId,
      });
    }
    for (const group of correlation.duplicates) {
      stats.skipped += 1;
      log.warn('Sync tag already used by another group; group left untouched', {
        groupId: group.id,
        group: group.name,
        externalId: group.externalId,
      });
    }
  }

  private createPacer(): MutationPacer {
    return new MutationPacer(this.options.mutationDelayMs, this.options.dryRun, this.options.sleep);
  }

  private validateOptions(options: SyncOptions): ResolvedOptions {
    const tagPrefix = options.tagPrefix ?? DEFAULT_TAG_PREFIX;
    if (!tagPrefix.trim() || tagPrefix.includes(SYNC_KEY_DELIMITER) || tagPrefix !== tagPrefix.trim()) {
      throw new SyncError({
        code: 'INVALID_OPTIONS',
        message: `Invalid tag prefix: "${tagPrefix}"`,
        suggestion: `Use a non-empty prefix without whitespace padding or "${SYNC_KEY_DELIMITER}".`,
      });
    }

    const mutationDelayMs = options.mutationDelayMs ?? 500;
    if (!Number.isFinite(mutationDelayMs) || mutationDelayMs < 0) {
      throw new SyncError({
        code: 'INVALID_OPTIONS',
        message: `mutationDelayMs must be a non-negative number, got ${mutationDelayMs}`,
      });
    }

    const removalMatch = options.removalMatch ?? 'equivalence';
    if (!REMOVAL_MATCHES.includes(removalMatch)) {
      throw new SyncError({
        code: 'INVALID_OPTIONS',
        message: `Unknown removalMatch: ${String(removalMatch)}`,
        suggestion: `Use one of: ${REMOVAL_MATCHES.join(', ')}`,
      });
    }

    return {
      tagPrefix,
      dryRun: options.dryRun ?? false,
      mutationDelayMs,
      removalMatch,
      failOnAliasConflict: options.failOnAliasConflict ?? false,
      diagnostics: options.diagnostics,
      sleep: options.sleep,
    };
  }
}

export function createSyncOrchestrator(
  target: TargetService,
  logger?: Logger,
  options?: SyncOptions
): SyncOrchestrator {
  return new SyncOrchestrator(target, logger, options);
}
