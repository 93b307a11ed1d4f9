/**
 * Bounded retry combinator shared by every remote call.
 */

export type BackoffStrategy = 'linear' | 'exponential';

export type RetryConfig = {
  /** Total attempts including the first (default: 1, i.e. no retries). */
  attempts?: number;
  /** Base delay before the first retry (default: 200ms). */
  baseDelayMs?: number;
  /** Max backoff delay (default: 5000ms). */
  maxDelayMs?: number;
  /** Random jitter factor between 0 and 1 (default: 0.2). */
  jitter?: number;
  /** linear: base × (attempt-1); exponential: base × 2^(attempt-2) (default: exponential). */
  backoff?: BackoffStrategy;
};

export type RetryContext = {
  attempt: number;
  attempts: number;
  delayMs?: number;
};

export type RetryHooks = {
  /** Replaces the real timer; tests pass a recorder. */
  sleep?: (ms: number) => Promise<void>;
  /** Called after a retryable failure, before the next attempt's delay. */
  onRetry?: (err: unknown, next: RetryContext) => void;
};

function clampNumber(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function computeBackoffDelayMs(cfg: Required<RetryConfig>, attempt: number): number {
  if (attempt <= 1) return 0;
  const raw =
    cfg.backoff === 'linear'
      ? cfg.baseDelayMs * (attempt - 1)
      : cfg.baseDelayMs * 2 ** (attempt - 2);
  const capped = Math.min(cfg.maxDelayMs, raw);
  if (cfg.jitter === 0) return capped;
  const jitterFactor = 1 + (Math.random() * 2 - 1) * cfg.jitter; // +/- jitter
  return Math.max(0, Math.round(capped * jitterFactor));
}

export async function sleep(ms: number): Promise<void> {
  await new Promise<void>((resolve) => setTimeout(resolve, ms));
}

export function resolveRetryConfig(cfg: RetryConfig | undefined): Required<RetryConfig> {
  return {
    attempts: Math.max(1, cfg?.attempts ?? 1),
    baseDelayMs: Math.max(0, cfg?.baseDelayMs ?? 200),
    maxDelayMs: Math.max(0, cfg?.maxDelayMs ?? 5000),
    jitter: clampNumber(cfg?.jitter ?? 0.2, 0, 1),
    backoff: cfg?.backoff ?? 'exponential',
  };
}

export async function withRetries<T>(
  fn: (ctx: RetryContext) => Promise<T>,
  cfg: RetryConfig | undefined,
  isRetryable: (err: unknown) => boolean,
  hooks: RetryHooks = {}
): Promise<T> {
  const config = resolveRetryConfig(cfg);
  const { attempts } = config;
  const wait = hooks.sleep ?? sleep;

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    const delayMs = computeBackoffDelayMs(config, attempt);
    if (delayMs > 0) {
      await wait(delayMs);
    }

    try {
      return await fn({ attempt, attempts, delayMs: delayMs > 0 ? delayMs : undefined });
    } catch (err) {
      lastError = err;
      if (attempt >= attempts || !isRetryable(err)) {
        throw err;
      }
      hooks.onRetry?.(err, {
        attempt: attempt + 1,
        attempts,
        delayMs: computeBackoffDelayMs({ ...config, jitter: 0 }, attempt + 1),
      });
    }
  }

  // Should be unreachable.
  throw lastError;
}
