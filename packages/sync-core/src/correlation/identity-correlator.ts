/**
 * Identity Correlator
 *
 * Pairs source groups with the target groups that carry their sync tag.
 */

import type { SourceGroup, TargetGroup } from '@dirsync/core';
import type { GroupCorrelation } from '../types/index.js';
import { parseSyncKey } from './sync-key.js';

/**
 * Correlate source and target groups.
 *
 * The first tagged target group for a stableId, in snapshot order, is the
 * one paired; later groups with the same tag land in `duplicates` and are
 * neither paired nor deleted. A tagged group is an orphan only when no
 * source group has its stableId, including source groups that will be
 * skipped for missing attributes.
 */
export function correlateGroups(
  sourceGroups: readonly SourceGroup[],
  targetGroups: readonly TargetGroup[],
  prefix: string
): GroupCorrelation {
  const sourceIds = new Set<string>();
  for (const group of sourceGroups) {
    if (group.stableId) sourceIds.add(group.stableId);
  }

  const pairs = new Map<string, TargetGroup>();
  const claimed = new Set<string>();
  const orphans: TargetGroup[] = [];
  const malformed: TargetGroup[] = [];
  const duplicates: TargetGroup[] = [];

  for (const target of targetGroups) {
    const key = parseSyncKey(target.externalId, prefix);

    if (key.kind === 'foreign') continue;

    if (key.kind === 'malformed') {
      malformed.push(target);
      continue;
    }

    if (claimed.has(key.stableId)) {
      duplicates.push(target);
      continue;
    }
    claimed.add(key.stableId);

    if (sourceIds.has(key.stableId)) {
      pairs.set(key.stableId, target);
    } else {
      orphans.push(target);
    }
  }

  return { pairs, orphans, malformed, duplicates };
}
