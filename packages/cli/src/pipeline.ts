/**
 * Sync pipeline
 *
 * Top-level sequence of one run: token check, snapshots, group phase,
 * fresh group snapshot, membership phase, summary. Every precondition
 * failure ends the run with exit code 1; phase errors only raise the
 * exit code to 2 once the summary has been printed.
 */

import {
  createSilentLogger,
  type Logger,
  type MembershipDiagnostics,
  type MembershipSource,
  type SourceDirectory,
  type SourceGroup,
  type TargetGroup,
  type TargetService,
  type TargetUser,
} from '@dirsync/core';
import {
  createSyncOrchestrator,
  formatSyncSummary,
  refreshIfStale,
  type CachedValue,
  type SyncOptions,
  type SyncResult,
} from '@dirsync/sync-core';

export const SYNC_PHASES = ['groups', 'membership', 'all'] as const;
export type SyncPhase = (typeof SYNC_PHASES)[number];

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_SYNC_ERRORS = 2;
export type ExitCode = typeof EXIT_OK | typeof EXIT_FAILURE | typeof EXIT_SYNC_ERRORS;

export const DEFAULT_USER_CACHE_MAX_AGE_MS = 10 * 60 * 1000;

export type PipelineFailure =
  | 'target-unavailable'
  | 'target-users'
  | 'empty-target-users'
  | 'source-groups'
  | 'empty-source-groups'
  | 'target-groups';

export interface PipelineDeps {
  target: TargetService;
  source: SourceDirectory;
  members: MembershipSource;
  diagnostics?: MembershipDiagnostics;
  logger?: Logger;
  /** Receives the summary lines (default: stdout) */
  print?: (line: string) => void;
  now?: () => Date;
}

export interface PipelineOptions {
  phase?: SyncPhase;
  /** The user snapshot is refetched before the membership phase once older than this */
  userCacheMaxAgeMs?: number;
  sync?: Omit<SyncOptions, 'diagnostics'>;
}

export interface PipelineOutcome {
  exitCode: ExitCode;
  failure?: PipelineFailure;
  groups?: SyncResult;
  membership?: SyncResult;
}

class PipelineAbort extends Error {
  constructor(readonly failure: PipelineFailure) {
    super(failure);
    this.name = 'PipelineAbort';
  }
}

async function fetchUsers(target: TargetService, logger: Logger): Promise<TargetUser[]> {
  const result = await target.listUsers();
  if (!result.ok) {
    logger.error('Could not fetch target users', { error: result.error });
    throw new PipelineAbort('target-users');
  }
  if (result.value.length === 0) {
    logger.error('Target user list is empty');
    throw new PipelineAbort('empty-target-users');
  }
  return result.value;
}

async function fetchTargetGroups(target: TargetService, logger: Logger): Promise<TargetGroup[]> {
  const result = await target.listGroups();
  if (!result.ok) {
    logger.error('Could not fetch target groups', { error: result.error });
    throw new PipelineAbort('target-groups');
  }
  return result.value;
}

async function fetchSourceGroups(source: SourceDirectory, logger: Logger): Promise<SourceGroup[]> {
  let groups: SourceGroup[];
  try {
    groups = await source.fetchGroups();
  } catch (error) {
    logger.error('Source directory query failed', { error });
    throw new PipelineAbort('source-groups');
  }
  if (groups.length === 0) {
    logger.error('Source directory returned no groups');
    throw new PipelineAbort('empty-source-groups');
  }
  return groups;
}

/** A dry first run sees no target groups yet; that abort is not a failure */
function isFailedAbort(result: SyncResult | undefined): boolean {
  return result?.aborted !== undefined && result.aborted !== 'empty-target-groups';
}

function exitCodeFor(results: Array<SyncResult | undefined>): ExitCode {
  if (results.some(isFailedAbort)) return EXIT_FAILURE;
  if (results.some((r) => r && !r.ok)) return EXIT_SYNC_ERRORS;
  return EXIT_OK;
}

/**
 * Run one sync pass.
 * @throws SyncError INVALID_OPTIONS for unusable sync options
 */
export async function runSync(deps: PipelineDeps, options: PipelineOptions = {}): Promise<PipelineOutcome> {
  const logger = deps.logger ?? createSilentLogger();
  const print = deps.print ?? ((line: string) => process.stdout.write(`${line}\n`));
  const now = deps.now ?? (() => new Date());
  const phase = options.phase ?? 'all';
  const maxAgeMs = options.userCacheMaxAgeMs ?? DEFAULT_USER_CACHE_MAX_AGE_MS;
  const runGroups = phase !== 'membership';
  const runMembership = phase !== 'groups';

  const orchestrator = createSyncOrchestrator(deps.target, logger, {
    ...options.sync,
    diagnostics: deps.diagnostics,
  });

  let groups: SyncResult | undefined;
  let membership: SyncResult | undefined;

  try {
    if (!(await deps.target.testConnection())) {
      logger.error('Target directory rejected the token or is unreachable');
      throw new PipelineAbort('target-unavailable');
    }

    let users: CachedValue<TargetUser[]> | undefined;
    if (runMembership) {
      users = await refreshIfStale(users, maxAgeMs, () => fetchUsers(deps.target, logger), now);
    }

    const sourceGroups = await fetchSourceGroups(deps.source, logger);
    let targetGroups = await fetchTargetGroups(deps.target, logger);

    if (runGroups) {
      groups = await orchestrator.syncGroups(sourceGroups, targetGroups);
      if (!groups.ok) {
        logger.warn('Group sync reported errors; continuing', { errors: groups.stats.errors });
      }
      if (runMembership && !orchestrator.dryRun) {
        targetGroups = await fetchTargetGroups(deps.target, logger);
      }
    }

    if (runMembership) {
      users = await refreshIfStale(users, maxAgeMs, () => fetchUsers(deps.target, logger), now);
      membership = await orchestrator.syncMembership(sourceGroups, targetGroups, users.data, deps.members);
      if (!membership.ok) {
        logger.warn('Membership sync reported errors', { errors: membership.stats.errors });
      }
    }
  } catch (error) {
    if (error instanceof PipelineAbort) {
      return { exitCode: EXIT_FAILURE, failure: error.failure, groups, membership };
    }
    throw error;
  }

  for (const line of formatSyncSummary({ groups, membership, dryRun: orchestrator.dryRun })) {
    print(line);
  }

  return { exitCode: exitCodeFor([groups, membership]), groups, membership };
}
