import { SYNC_PHASES, type SyncPhase } from './pipeline.js';

export const USAGE = 'Usage: dirsync --config <config.json> [--dry-run] [--phase groups|membership|all]';

export interface CliArgs {
  configPath: string;
  /** Forces a dry run regardless of sync.dryRun */
  dryRun: boolean;
  phase: SyncPhase;
}

export type ParsedArgs = { ok: true; args: CliArgs } | { ok: false; message: string };

function isSyncPhase(value: string): value is SyncPhase {
  return SYNC_PHASES.some((phase) => phase === value);
}

export function parseCliArgs(args: readonly string[]): ParsedArgs {
  const configIndex = args.indexOf('--config');
  const configPath = configIndex !== -1 ? args[configIndex + 1] : undefined;
  if (!configPath || configPath.startsWith('--')) {
    return { ok: false, message: 'Missing --config <path>' };
  }

  let phase: SyncPhase = 'all';
  const phaseIndex = args.indexOf('--phase');
  if (phaseIndex !== -1) {
    const value = args[phaseIndex + 1] ?? '';
    if (!isSyncPhase(value)) {
      return { ok: false, message: `Unknown phase "${value}", expected one of: ${SYNC_PHASES.join(', ')}` };
    }
    phase = value;
  }

  return { ok: true, args: { configPath, dryRun: args.includes('--dry-run'), phase } };
}
