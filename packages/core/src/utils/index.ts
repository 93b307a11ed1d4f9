export {
  normalizeHandle,
  localPart,
  isSourceMemberHandle,
  toMemberHandle,
  labelFromMail,
} from './handles.js';

export {
  withRetries,
  sleep,
  computeBackoffDelayMs,
  resolveRetryConfig,
  type BackoffStrategy,
  type RetryConfig,
  type RetryContext,
  type RetryHooks,
} from './retry.js';
