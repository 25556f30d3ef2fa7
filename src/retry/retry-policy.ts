/**
 * Retry Policy
 *
 * Immutable rule set deciding how many attempts a run gets, how long to
 * wait between them, and which failures are worth another attempt.
 * Shared read-only across concurrent runs.
 */

import { InvalidConfigurationError, type ValidationIssue } from '../errors';
import { isNonNegativeNumber, isPositiveInteger } from '../utils/guards';
import { classifyFailure, FailureKind, isFailureKind, retryAfterMs } from './failure';
import {
  BackoffStrategy,
  DEFAULT_RETRY_CONFIG,
  JitterMode,
  MAX_RETRY_DELAY_MS,
  type RetryPolicyConfig,
  BACKOFF_STRATEGIES,
  JITTER_MODES,
  isBackoffStrategy,
  isJitterMode,
} from './types';

/**
 * Fill omitted fields from the defaults. `undefined` counts as omitted.
 */
export function resolveRetryConfig(config: Partial<RetryPolicyConfig> = {}): RetryPolicyConfig {
  return {
    maxAttempts: config.maxAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts,
    baseDelayMs: config.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    backoffFactor: config.backoffFactor ?? DEFAULT_RETRY_CONFIG.backoffFactor,
    maxDelayMs: config.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
    retryableKinds: [...(config.retryableKinds ?? DEFAULT_RETRY_CONFIG.retryableKinds)],
    backoff: config.backoff ?? DEFAULT_RETRY_CONFIG.backoff,
    jitter: config.jitter ?? DEFAULT_RETRY_CONFIG.jitter,
  };
}

/**
 * Check a resolved retry configuration.
 *
 * @param prefix - Path prefix for reported issues
 */
export function validateRetryConfig(config: RetryPolicyConfig, prefix = ''): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const at = (field: string) => (prefix ? `${prefix}.${field}` : field);

  if (!isPositiveInteger(config.maxAttempts)) {
    issues.push({ path: at('maxAttempts'), message: 'Must be an integer >= 1' });
  }
  if (!isNonNegativeNumber(config.baseDelayMs)) {
    issues.push({ path: at('baseDelayMs'), message: 'Must be a finite number >= 0' });
  }
  if (typeof config.backoffFactor !== 'number' || !Number.isFinite(config.backoffFactor) || config.backoffFactor < 1) {
    issues.push({ path: at('backoffFactor'), message: 'Must be a finite number >= 1' });
  }
  if (!isNonNegativeNumber(config.maxDelayMs)) {
    issues.push({ path: at('maxDelayMs'), message: 'Must be a finite number >= 0' });
  } else if (config.maxDelayMs > MAX_RETRY_DELAY_MS) {
    issues.push({ path: at('maxDelayMs'), message: `Must be at most ${MAX_RETRY_DELAY_MS}` });
  } else if (isNonNegativeNumber(config.baseDelayMs) && config.maxDelayMs < config.baseDelayMs) {
    issues.push({ path: at('maxDelayMs'), message: 'Must be greater than or equal to baseDelayMs' });
  }
  if (!Array.isArray(config.retryableKinds)) {
    issues.push({ path: at('retryableKinds'), message: 'Must be an array of failure kinds' });
  } else {
    config.retryableKinds.forEach((kind, i) => {
      if (!isFailureKind(kind)) {
        issues.push({ path: at(`retryableKinds[${i}]`), message: `Unknown failure kind: ${String(kind)}` });
      }
    });
  }
  if (!isBackoffStrategy(config.backoff)) {
    issues.push({ path: at('backoff'), message: `Must be one of: ${BACKOFF_STRATEGIES.join(', ')}` });
  }
  if (!isJitterMode(config.jitter)) {
    issues.push({ path: at('jitter'), message: `Must be one of: ${JITTER_MODES.join(', ')}` });
  }

  return issues;
}

/**
 * Retry policy.
 *
 * @example
 * ```typescript
 * const policy = new RetryPolicy({ maxAttempts: 4, baseDelayMs: 250 });
 * policy.computeDelay(1); // 250
 * policy.computeDelay(3); // 1000
 * policy.isRetryable(new OperationFailure(FailureKind.TIMEOUT, 'slow')); // true
 * ```
 */
export class RetryPolicy {
  private readonly _config: Readonly<RetryPolicyConfig>;
  private readonly _retryable: ReadonlySet<FailureKind>;

  /**
   * @throws InvalidConfigurationError if any field is out of range
   */
  constructor(config: Partial<RetryPolicyConfig> = {}) {
    const resolved = resolveRetryConfig(config);
    const issues = validateRetryConfig(resolved);
    if (issues.length > 0) {
      throw new InvalidConfigurationError('retry policy', issues);
    }
    this._config = Object.freeze({ ...resolved, retryableKinds: [...resolved.retryableKinds] });
    this._retryable = new Set(resolved.retryableKinds);
  }

  get maxAttempts(): number {
    return this._config.maxAttempts;
  }

  get baseDelayMs(): number {
    return this._config.baseDelayMs;
  }

  get backoffFactor(): number {
    return this._config.backoffFactor;
  }

  get maxDelayMs(): number {
    return this._config.maxDelayMs;
  }

  get backoff(): BackoffStrategy {
    return this._config.backoff;
  }

  get jitter(): JitterMode {
    return this._config.jitter;
  }

  get retryableKinds(): FailureKind[] {
    return [...this._retryable];
  }

  /**
   * Delay to wait after failed attempt `attempt` (1-based), before the
   * next one. Non-decreasing in `attempt` and never above `maxDelayMs`.
   */
  computeDelay(attempt: number): number {
    if (!isPositiveInteger(attempt)) {
      throw new RangeError(`Attempt index must be an integer >= 1, got ${attempt}`);
    }

    const delay = this.uncappedDelay(attempt);
    // factor^n overflows to Infinity for large attempt numbers
    return Number.isFinite(delay) ? Math.min(delay, this._config.maxDelayMs) : this._config.maxDelayMs;
  }

  /**
   * Actual wait after attempt `attempt`, with jitter applied
   *
   * @param random - Source of uniform values in [0, 1)
   */
  jitteredDelay(attempt: number, random: () => number = Math.random): number {
    const delay = this.computeDelay(attempt);
    switch (this._config.jitter) {
      case JitterMode.NONE:
        return delay;
      case JitterMode.FULL:
        return random() * delay;
      case JitterMode.EQUAL:
        return delay / 2 + random() * (delay / 2);
    }
  }

  /**
   * Wait before the attempt after `attempt`, given the failure it ended
   * with. A Retry-After hint on the failure raises the jittered delay to
   * at least the hinted wait; the result never exceeds `maxDelayMs`.
   */
  delayFor(attempt: number, failure: unknown, random: () => number = Math.random): number {
    const delay = this.jitteredDelay(attempt, random);
    const hint = retryAfterMs(failure);
    if (hint === undefined) {
      return delay;
    }
    return Math.min(Math.max(delay, hint), this._config.maxDelayMs);
  }

  /**
   * Whether a failure should be retried. Failures that cannot be classified
   * are only retried if `unknown` is listed explicitly.
   */
  isRetryable(failure: unknown): boolean {
    return this._retryable.has(classifyFailure(failure));
  }

  toJSON(): RetryPolicyConfig {
    return { ...this._config, retryableKinds: [...this._config.retryableKinds] };
  }

  private uncappedDelay(attempt: number): number {
    const { baseDelayMs, backoffFactor } = this._config;
    if (baseDelayMs === 0) {
      return 0;
    }
    switch (this._config.backoff) {
      case BackoffStrategy.FIXED:
        return baseDelayMs;
      case BackoffStrategy.LINEAR:
        return baseDelayMs * attempt;
      case BackoffStrategy.EXPONENTIAL:
        return baseDelayMs * backoffFactor ** (attempt - 1);
    }
  }
}
