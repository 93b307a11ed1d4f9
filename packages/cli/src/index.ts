/**
 * @dirsync/cli
 *
 * Configuration, wiring and run sequencing for directory group sync
 */

export {
  ConfigError,
  configFileSchema,
  expandEnvVars,
  formatZodError,
  loadConfig,
  parseConfig,
  type ConfigFile,
  type EnvExpansionOptions,
} from './config.js';
export { parseCliArgs, USAGE, type CliArgs, type ParsedArgs } from './args.js';
export { createLogger, createPipelineDeps, createPipelineOptions } from './runtime.js';
export {
  runSync,
  SYNC_PHASES,
  EXIT_OK,
  EXIT_FAILURE,
  EXIT_SYNC_ERRORS,
  DEFAULT_USER_CACHE_MAX_AGE_MS,
  type SyncPhase,
  type ExitCode,
  type PipelineDeps,
  type PipelineOptions,
  type PipelineOutcome,
  type PipelineFailure,
} from './pipeline.js';
