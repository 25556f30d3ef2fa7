/**
 * Retry Module
 *
 * Retry policies with fixed, linear, or exponential backoff, and the
 * failure classification they use to decide what is worth retrying.
 */

export {
  FailureKind,
  FAILURE_KINDS,
  OperationFailure,
  classifyFailure,
  classifyStatus,
  isFailureKind,
  parseRetryAfter,
  retryAfterMs,
} from './failure';

export {
  BackoffStrategy,
  JitterMode,
  BACKOFF_STRATEGIES,
  JITTER_MODES,
  DEFAULT_RETRY_CONFIG,
  MAX_RETRY_DELAY_MS,
  isBackoffStrategy,
  isJitterMode,
  type RetryPolicyConfig,
} from './types';

export { RetryPolicy, resolveRetryConfig, validateRetryConfig } from './retry-policy';
