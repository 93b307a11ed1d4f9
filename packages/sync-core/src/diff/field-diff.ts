/**
 * Field Diff Engine
 *
 * Pure comparison of the three synced group attributes.
 */

import { labelFromMail, type CreateGroupPayload, type GroupPatch, type SourceGroup, type TargetGroup } from '@dirsync/core';
import { formatSyncKey } from '../correlation/index.js';

export const SYNCED_GROUP_FIELDS = ['name', 'label', 'description'] as const;

/**
 * Minimal patch turning `target` into `source`.
 *
 * `label` is only managed when the source has a mail address with a local
 * part; otherwise whatever label the target has is left alone. An absent
 * description compares equal to the empty string on both sides.
 */
export function diffGroup(source: SourceGroup, target: TargetGroup): GroupPatch {
  const patch: GroupPatch = {};

  if (source.displayName !== target.name) {
    patch.name = source.displayName;
  }

  const label = labelFromMail(source.mail);
  if (label !== undefined && label !== (target.label ?? '')) {
    patch.label = label;
  }

  const description = source.description ?? '';
  if (description !== (target.description ?? '')) {
    patch.description = description;
  }

  return patch;
}

export function isEmptyPatch(patch: GroupPatch): boolean {
  return SYNCED_GROUP_FIELDS.every((field) => patch[field] === undefined);
}

export function buildCreatePayload(source: SourceGroup, prefix: string): CreateGroupPayload {
  const payload: CreateGroupPayload = {
    name: source.displayName,
    externalId: formatSyncKey(prefix, source.stableId),
  };

  const label = labelFromMail(source.mail);
  if (label !== undefined) payload.label = label;
  if (source.description) payload.description = source.description;

  return payload;
}
