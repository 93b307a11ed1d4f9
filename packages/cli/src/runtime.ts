/**
 * Runtime wiring
 *
 * Turns a validated config file into the logger, connectors and pipeline
 * options of one run.
 */

import { resolve } from 'node:path';
import {
  Logger,
  createFileSink,
  stderrSink,
  teeSinks,
  type LogSink,
} from '@dirsync/core';
import { createOrgDirectoryConnector } from '@dirsync/connector-api';
import { createLdapGroupSource } from '@dirsync/connector-ldap';
import { createMemberCsvExporter, createMembersFileSource } from '@dirsync/connector-file';
import type { ConfigFile, LoggingConfig } from './config.js';
import type { CliArgs } from './args.js';
import type { PipelineDeps, PipelineOptions } from './pipeline.js';

export function createLogger(config: LoggingConfig = {}, sink: LogSink = stderrSink): Logger {
  const file = config.file
    ? createFileSink(resolve(process.cwd(), config.file), {
        maxBytes: config.maxFileBytes,
        backups: config.fileBackups,
      })
    : undefined;
  return new Logger({
    level: config.level,
    format: config.format,
    sink: file ? teeSinks(sink, file) : sink,
  });
}

export function createPipelineDeps(config: ConfigFile, logger: Logger): PipelineDeps {
  const { target, source, membership, diagnostics } = config;

  return {
    target: createOrgDirectoryConnector({
      orgId: target.orgId,
      token: target.token,
      baseUrl: target.baseUrl,
      timeoutMs: target.timeoutMs,
      retry: target.retry,
      groupsPageSize: target.groupsPageSize,
      usersPageSize: target.usersPageSize,
      minUserId: target.minUserId,
      logger: logger.child({ connector: 'target' }),
    }),
    source: createLdapGroupSource({
      url: source.url,
      bindDN: source.bindDN,
      password: source.password,
      baseDN: source.baseDN,
      filter: source.filter,
      groupObjectClass: source.groupObjectClass,
      timeoutMs: source.timeoutMs,
      tlsRejectUnauthorized: source.tlsRejectUnauthorized,
      logger: logger.child({ connector: 'ldap' }),
    }),
    members: createMembersFileSource({
      dir: resolve(process.cwd(), membership.dir),
      filePrefix: membership.filePrefix,
      delimiter: membership.delimiter,
      addressColumn: membership.addressColumn,
      headers: membership.headers,
      logger: logger.child({ connector: 'members-file' }),
    }),
    diagnostics:
      diagnostics?.enabled && diagnostics.dir
        ? createMemberCsvExporter({
            dir: resolve(process.cwd(), diagnostics.dir),
            logger: logger.child({ connector: 'member-export' }),
          })
        : undefined,
    logger,
  };
}

export function createPipelineOptions(config: ConfigFile, args: CliArgs): PipelineOptions {
  const sync = config.sync ?? {};
  return {
    phase: args.phase,
    userCacheMaxAgeMs: sync.userCacheMaxAgeMs,
    sync: {
      tagPrefix: sync.tagPrefix,
      dryRun: args.dryRun || (sync.dryRun ?? false),
      mutationDelayMs: sync.mutationDelayMs,
      removalMatch: sync.removalMatch,
      failOnAliasConflict: sync.failOnAliasConflict,
    },
  };
}
