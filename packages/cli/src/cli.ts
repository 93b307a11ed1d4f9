#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   dirsync --config ./config.json [--dry-run] [--phase groups|membership|all]
 */

import { Logger, createRunId } from '@dirsync/core';
import { ConfigError, loadConfig } from './config.js';
import { USAGE, parseCliArgs } from './args.js';
import { createLogger, createPipelineDeps, createPipelineOptions } from './runtime.js';
import { EXIT_FAILURE, runSync } from './pipeline.js';

async function main(): Promise<number> {
  let logger = new Logger();
  const parsed = parseCliArgs(process.argv.slice(2));

  if (!parsed.ok) {
    console.error(parsed.message);
    console.error(USAGE);
    return EXIT_FAILURE;
  }

  try {
    const config = await loadConfig(parsed.args.configPath);
    logger = createLogger(config.logging).child({ runId: createRunId() });

    const options = createPipelineOptions(config, parsed.args);
    logger.info('Sync run started', { phase: options.phase, dryRun: options.sync?.dryRun });

    const outcome = await runSync(createPipelineDeps(config, logger), options);
    logger.info('Sync run finished', { exitCode: outcome.exitCode, failure: outcome.failure });
    return outcome.exitCode;
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      return EXIT_FAILURE;
    }
    logger.error('Sync run failed', { error });
    return EXIT_FAILURE;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = EXIT_FAILURE;
  }
);
