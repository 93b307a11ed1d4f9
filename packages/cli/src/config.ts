import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  /** Variables to read from (default: process.env) */
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Expand `${VAR}` and `${VAR:-default}` in every string of a parsed JSON
 * value. The result is unvalidated; run it through the schema.
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

// Env expansion yields strings, so numeric and boolean settings accept both.
const intSetting = (min: number, max: number) =>
  z.union([z.number(), z.string().regex(/^\d+$/).transform(Number)]).pipe(z.number().int().min(min).max(max));

const boolSetting = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((value) => value === 'true'),
]);

const retrySchema = z
  .object({
    attempts: intSetting(1, 10).optional(),
    baseDelayMs: intSetting(0, 60_000).optional(),
    maxDelayMs: intSetting(0, 300_000).optional(),
    jitter: z.number().min(0).max(1).optional(),
    backoff: z.enum(['linear', 'exponential']).optional(),
  })
  .strict();

export const targetSchema = z
  .object({
    baseUrl: z.string().url().optional(),
    orgId: z.union([z.string().min(1), z.number().int().positive().transform(String)]),
    token: z.string().min(1),
    timeoutMs: intSetting(1, 300_000).optional(),
    retry: retrySchema.optional(),
    groupsPageSize: intSetting(1, 1000).optional(),
    usersPageSize: intSetting(1, 1000).optional(),
    minUserId: intSetting(0, Number.MAX_SAFE_INTEGER).optional(),
  })
  .strict();

export const sourceSchema = z
  .object({
    url: z.string().regex(/^ldaps?:\/\//i, 'must start with ldap:// or ldaps://'),
    bindDN: z.string().min(1),
    password: z.string().min(1),
    baseDN: z.string().min(1),
    filter: z.string().min(1).optional(),
    groupObjectClass: z.string().min(1).optional(),
    timeoutMs: intSetting(1, 300_000).optional(),
    tlsRejectUnauthorized: boolSetting.optional(),
  })
  .strict();

export const membershipSchema = z
  .object({
    dir: z.string().min(1),
    filePrefix: z.string().optional(),
    delimiter: z.string().length(1).optional(),
    addressColumn: intSetting(0, 1000).optional(),
    headers: boolSetting.optional(),
  })
  .strict();

export const syncSchema = z
  .object({
    tagPrefix: z
      .string()
      .min(1)
      .refine((value) => !value.includes(';') && value === value.trim(), {
        message: 'must not contain ";" or surrounding whitespace',
      })
      .optional(),
    dryRun: boolSetting.optional(),
    mutationDelayMs: intSetting(0, 60_000).optional(),
    removalMatch: z.enum(['equivalence', 'primary']).optional(),
    failOnAliasConflict: boolSetting.optional(),
    userCacheMaxAgeMs: intSetting(0, 86_400_000).optional(),
  })
  .strict();

export const diagnosticsSchema = z
  .object({
    enabled: boolSetting.optional(),
    dir: z.string().min(1).optional(),
  })
  .strict();

export const loggingSchema = z
  .object({
    format: z.enum(['text', 'json']).optional(),
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    file: z.string().min(1).optional(),
    maxFileBytes: intSetting(1, Number.MAX_SAFE_INTEGER).optional(),
    fileBackups: intSetting(0, 1000).optional(),
  })
  .strict();

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    target: targetSchema,
    source: sourceSchema,
    membership: membershipSchema,
    sync: syncSchema.optional(),
    diagnostics: diagnosticsSchema.optional(),
    logging: loggingSchema.optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.diagnostics?.enabled && !value.diagnostics.dir) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'diagnostics.dir is required when diagnostics are enabled',
        path: ['diagnostics', 'dir'],
      });
    }
  });

export type ConfigFile = z.infer<typeof configFileSchema>;
export type TargetConfig = z.infer<typeof targetSchema>;
export type SourceConfig = z.infer<typeof sourceSchema>;
export type LoggingConfig = z.infer<typeof loggingSchema>;

export function formatZodError(err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid config file:\n${issues}`;
}

/**
 * Validate an already parsed config value.
 * @throws ConfigError on a missing variable or a schema violation
 */
export function parseConfig(raw: unknown, options?: EnvExpansionOptions): ConfigFile {
  const expanded = expandEnvVars(raw, options);
  const result = configFileSchema.safeParse(expanded);
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return result.data;
}

export async function loadConfig(configPath: string, options?: EnvExpansionOptions): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read config file ${absolutePath}: ${reason}`);
  }

  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');
  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file ${absolutePath} is not valid JSON: ${reason}`);
  }

  return parseConfig(parsed, options);
}
