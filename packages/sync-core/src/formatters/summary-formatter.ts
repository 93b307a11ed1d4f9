/**
 * Sync Summary Formatter
 *
 * Renders phase results as plain log lines.
 */

import type { SyncCounter, SyncResult } from '../types/index.js';

export interface SyncSummaryInput {
  groups?: SyncResult;
  membership?: SyncResult;
  dryRun?: boolean;
}

type Column = [label: string, counter: SyncCounter];

const GROUP_COLUMNS: Column[] = [
  ['source', 'sourceGroups'],
  ['target', 'targetGroups'],
  ['created', 'created'],
  ['updated', 'updated'],
  ['unchanged', 'unchanged'],
  ['deleted', 'deleted'],
  ['skipped', 'skipped'],
  ['errors', 'errors'],
];

const MEMBERSHIP_COLUMNS: Column[] = [
  ['groups', 'processed'],
  ['matched', 'matched'],
  ['added', 'membersAdded'],
  ['removed', 'membersRemoved'],
  ['skipped', 'skipped'],
  ['errors', 'errors'],
];

/** Shown only when non-zero */
const MEMBERSHIP_WARNINGS: Column[] = [
  ['notFound', 'notFound'],
  ['ambiguous', 'ambiguous'],
];

function formatPhase(title: string, result: SyncResult, columns: Column[], warnings: Column[] = []): string {
  if (result.aborted) {
    return `${title}: aborted (${result.aborted})`;
  }

  const parts = columns.map(([label, counter]) => `${label}=${result.stats[counter]}`);
  for (const [label, counter] of warnings) {
    if (result.stats[counter] > 0) parts.push(`${label}=${result.stats[counter]}`);
  }
  return `${title}: ${parts.join(' ')}`;
}

export function formatSyncSummary(input: SyncSummaryInput): string[] {
  const lines: string[] = [];

  lines.push(input.dryRun ? 'Sync summary (dry run, nothing was changed)' : 'Sync summary');

  if (input.groups) {
    lines.push(formatPhase('Groups', input.groups, GROUP_COLUMNS));
  }

  if (input.membership) {
    lines.push(formatPhase('Membership', input.membership, MEMBERSHIP_COLUMNS, MEMBERSHIP_WARNINGS));
  }

  const failed = [input.groups, input.membership].some((result) => result && !result.ok);
  lines.push(failed ? 'Result: completed with errors' : 'Result: ok');

  return lines;
}
