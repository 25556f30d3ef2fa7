/**
 * Retry Policy Types
 *
 * Configuration shapes for attempt counts, backoff schedules, and which
 * failure kinds are worth retrying.
 */

import { FailureKind } from './failure';

/**
 * How the delay grows between attempts
 */
export enum BackoffStrategy {
  /** Same delay before every retry */
  FIXED = 'fixed',
  /** baseDelay × attempt */
  LINEAR = 'linear',
  /** baseDelay × backoffFactor^(attempt-1) */
  EXPONENTIAL = 'exponential',
}

/**
 * Randomization applied to the computed delay before waiting
 */
export enum JitterMode {
  /** Wait exactly the computed delay */
  NONE = 'none',
  /** Uniform in [0, delay] */
  FULL = 'full',
  /** Uniform in [delay/2, delay] */
  EQUAL = 'equal',
}

export const BACKOFF_STRATEGIES: BackoffStrategy[] = Object.values(BackoffStrategy);
export const JITTER_MODES: JitterMode[] = Object.values(JitterMode);

export function isBackoffStrategy(value: unknown): value is BackoffStrategy {
  return BACKOFF_STRATEGIES.some(strategy => strategy === value);
}

export function isJitterMode(value: unknown): value is JitterMode {
  return JITTER_MODES.some(mode => mode === value);
}

/** Largest delay a timer can wait; longer ones fire after 1 ms */
export const MAX_RETRY_DELAY_MS = 2_147_483_647;

/**
 * Resolved retry policy configuration
 */
export interface RetryPolicyConfig {
  /** Total attempts including the first (≥ 1) */
  maxAttempts: number;
  /** Delay before the first retry in ms (≥ 0) */
  baseDelayMs: number;
  /** Growth factor for exponential backoff (≥ 1) */
  backoffFactor: number;
  /** Upper bound on any computed delay in ms (≤ MAX_RETRY_DELAY_MS) */
  maxDelayMs: number;
  /** Failure kinds that trigger another attempt */
  retryableKinds: FailureKind[];
  /** Delay growth strategy */
  backoff: BackoffStrategy;
  /** Randomization of the actual wait */
  jitter: JitterMode;
}

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: Readonly<RetryPolicyConfig> = Object.freeze({
  maxAttempts: 3,
  baseDelayMs: 1000,
  backoffFactor: 2,
  maxDelayMs: 60_000,
  retryableKinds: [
    FailureKind.TIMEOUT,
    FailureKind.CONNECTION,
    FailureKind.RATE_LIMIT,
    FailureKind.UNAVAILABLE,
  ],
  backoff: BackoffStrategy.EXPONENTIAL,
  jitter: JitterMode.NONE,
});
