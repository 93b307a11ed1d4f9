import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, expandEnvVars, loadConfig, parseConfig } from '../src/config.js';

const BASE = {
  target: { orgId: '${ORG_ID}', token: '${DIR_TOKEN}' },
  source: {
    url: 'ldaps://dc.corp.example',
    bindDN: 'CN=svc-sync,OU=Service,DC=corp,DC=example',
    password: '${LDAP_PASSWORD}',
    baseDN: 'OU=Groups,DC=corp,DC=example',
  },
  membership: { dir: './members', filePrefix: 'Группа_рассылки_' },
};

const ENV = { ORG_ID: '1234', DIR_TOKEN: 'test-secret', LDAP_PASSWORD: 'test-secret' };

describe('expandEnvVars', () => {
  it('substitutes variables and defaults inside nested values', () => {
    const env = { HOST: 'dc.corp.example' };

    expect(expandEnvVars({ url: 'ldap://${HOST}', list: ['${PORT:-389}'], n: 3 }, { env })).toEqual({
      url: 'ldap://dc.corp.example',
      list: ['389'],
      n: 3,
    });
  });

  it('fails on a missing variable unless told otherwise', () => {
    expect(() => expandEnvVars('${NOPE}', { env: {} })).toThrow(ConfigError);
    expect(expandEnvVars('${NOPE}', { env: {}, allowMissing: true })).toBe('${NOPE}');
  });
});

describe('parseConfig', () => {
  it('accepts a minimal config and coerces expanded strings', () => {
    const config = parseConfig(
      { ...BASE, sync: { dryRun: '${DRY_RUN:-true}', mutationDelayMs: '${DELAY:-250}' } },
      { env: ENV }
    );

    expect(config.target).toEqual({ orgId: '1234', token: 'test-secret' });
    expect(config.sync).toEqual({ dryRun: true, mutationDelayMs: 250 });
    expect(config.membership.filePrefix).toBe('Группа_рассылки_');
  });

  it('reads the log rotation settings', () => {
    const config = parseConfig(
      { ...BASE, logging: { file: './logs/sync.log', maxFileBytes: '${LOG_MAX:-1048576}', fileBackups: 3 } },
      { env: ENV }
    );

    expect(config.logging).toEqual({ file: './logs/sync.log', maxFileBytes: 1048576, fileBackups: 3 });
  });

  it('lists every schema violation with its path', () => {
    const raw = {
      ...BASE,
      target: { orgId: '1234' },
      sync: { tagPrefix: 'DDG;', removalMatch: 'fuzzy' },
    };

    expect(() => parseConfig(raw, { env: ENV })).toThrow(ConfigError);
    expect(() => parseConfig(raw, { env: ENV })).toThrow('- target.token: Required');
    expect(() => parseConfig(raw, { env: ENV })).toThrow(
      '- sync.tagPrefix: must not contain ";" or surrounding whitespace'
    );
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfig({ ...BASE, extra: true }, { env: ENV })).toThrow(/Unrecognized key/);
  });

  it('requires a directory when diagnostics are enabled', () => {
    expect(() => parseConfig({ ...BASE, diagnostics: { enabled: true } }, { env: ENV })).toThrow(
      '- diagnostics.dir: diagnostics.dir is required when diagnostics are enabled'
    );
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'dirsync-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads a file with a byte order mark', async () => {
    const file = join(dir, 'config.json');
    writeFileSync(file, `\uFEFF${JSON.stringify(BASE)}`, 'utf-8');

    const config = await loadConfig(file, { env: ENV });

    expect(config.source.password).toBe('test-secret');
  });

  it('reports invalid JSON and missing files as config errors', async () => {
    const file = join(dir, 'broken.json');
    writeFileSync(file, '{ "target": ', 'utf-8');

    await expect(loadConfig(file, { env: ENV })).rejects.toThrow(/is not valid JSON/);
    await expect(loadConfig(join(dir, 'missing.json'), { env: ENV })).rejects.toThrow(/Cannot read config file/);
  });
});
