/**
 * Resilient Executor
 *
 * Runs one opaque asynchronous operation under a retry policy and a
 * circuit breaker. `run()` is the only entry point and awaits every
 * breaker and operation call itself.
 */

import { randomUUID } from 'crypto';
import type { CircuitBreaker } from '../circuit-breaker/circuit-breaker';
import {
  CircuitOpenError,
  NonRetryableError,
  RetryExhaustedError,
  RunCancelledError,
} from '../errors';
import { silentLogger, type Logger } from '../logging';
import { classifyFailure } from '../retry/failure';
import type { RetryPolicy } from '../retry/retry-policy';
import { toError } from '../utils/guards';
import { sleep } from './sleep';
import type {
  Operation,
  ResilientExecutorOptions,
  RetryEvent,
  RunContext,
  RunOptions,
} from './types';

type AttemptOutcome<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; error: unknown }
  | { status: 'cancelled' };

/**
 * Invoke the operation once. Resolves with `cancelled` as soon as the
 * signal aborts, without waiting for the operation to settle.
 */
function runAttempt<T>(operation: Operation<T>, context: RunContext): Promise<AttemptOutcome<T>> {
  const { signal } = context;
  if (signal?.aborted) {
    return Promise.resolve({ status: 'cancelled' });
  }

  const settled = Promise.resolve()
    .then(() => operation(context))
    .then(
      (value): AttemptOutcome<T> => ({ status: 'fulfilled', value }),
      (error: unknown): AttemptOutcome<T> => ({ status: 'rejected', error })
    );

  if (!signal) {
    return settled;
  }

  return new Promise(resolve => {
    const onAbort = () => resolve({ status: 'cancelled' });
    signal.addEventListener('abort', onAbort, { once: true });
    void settled.then(outcome => {
      signal.removeEventListener('abort', onAbort);
      resolve(outcome);
    });
  });
}

/**
 * Composes a RetryPolicy and a CircuitBreaker around single operations.
 *
 * Outcomes:
 * - the operation's result, on success
 * - {@link CircuitOpenError}: rejected without invoking the operation
 * - {@link NonRetryableError}: stopped at the first non-retryable failure
 * - {@link RetryExhaustedError}: every permitted attempt failed
 * - {@link RunCancelledError}: the caller aborted the run
 *
 * Cancellation records nothing on the breaker for the interrupted attempt;
 * a HALF_OPEN probe slot that produced no outcome is released.
 *
 * @example
 * ```typescript
 * const executor = new ResilientExecutor(
 *   new RetryPolicy({ maxAttempts: 3, baseDelayMs: 500 }),
 *   registry.getCircuit('session-create'),
 * );
 * const session = await executor.run(({ attempt }) => createSession(attempt));
 * ```
 */
export class ResilientExecutor {
  private readonly _policy: RetryPolicy;
  private readonly _breaker: CircuitBreaker;
  private readonly logger: Logger;
  private readonly onRetry?: (event: RetryEvent) => void;
  private readonly random: () => number;

  constructor(policy: RetryPolicy, breaker: CircuitBreaker, options: ResilientExecutorOptions = {}) {
    this._policy = policy;
    this._breaker = breaker;
    this.logger = options.logger ?? silentLogger;
    this.onRetry = options.onRetry;
    this.random = options.random ?? Math.random;
  }

  get policy(): RetryPolicy {
    return this._policy;
  }

  get breaker(): CircuitBreaker {
    return this._breaker;
  }

  /**
   * Run `operation` until it succeeds, fails terminally, or is cancelled
   */
  async run<T>(operation: Operation<T>, options: RunOptions = {}): Promise<T> {
    const runId = options.runId ?? randomUUID();
    const { signal } = options;
    const circuitName = this._breaker.name;

    if (signal?.aborted) {
      throw new RunCancelledError({
        runId,
        circuitName,
        attempts: 0,
        circuitState: this._breaker.state,
        reason: signal.reason,
      });
    }

    const admission = this._breaker.admit();
    if (!admission.allowed) {
      this.logger.warn('run rejected by open circuit', { runId, circuit: circuitName, state: admission.state });
      throw new CircuitOpenError({
        runId,
        circuitName,
        circuitState: admission.state,
        reason: admission.reason,
        resetAt: admission.resetAt,
      });
    }

    for (let attempt = 1; ; attempt++) {
      const outcome = await runAttempt(operation, { runId, attempt, signal });

      if (outcome.status === 'cancelled') {
        if (admission.probe !== undefined && attempt === 1) {
          this._breaker.release(admission.probe);
        }
        this.logger.info('run cancelled', { runId, circuit: circuitName, attempt });
        throw new RunCancelledError({
          runId,
          circuitName,
          attempts: attempt - 1,
          circuitState: this._breaker.state,
          reason: signal?.reason,
        });
      }

      if (outcome.status === 'fulfilled') {
        this._breaker.recordOutcome(true);
        this.logger.debug('run succeeded', { runId, circuit: circuitName, attempts: attempt });
        return outcome.value;
      }

      this._breaker.recordOutcome(false);
      const failureKind = classifyFailure(outcome.error);
      const details = {
        runId,
        circuitName,
        attempts: attempt,
        circuitState: this._breaker.state,
        lastError: toError(outcome.error),
        failureKind,
      };

      if (!this._policy.isRetryable(outcome.error)) {
        this.logger.warn('run failed with non-retryable error', { runId, circuit: circuitName, attempt, failureKind });
        throw new NonRetryableError(details);
      }
      if (attempt >= this._policy.maxAttempts) {
        this.logger.warn('run exhausted retries', { runId, circuit: circuitName, attempts: attempt, failureKind });
        throw new RetryExhaustedError(details);
      }

      const delayMs = this._policy.delayFor(attempt, outcome.error, this.random);
      this.notifyRetry({ runId, circuitName, attempt, delayMs, error: outcome.error, failureKind });

      const waited = await sleep(delayMs, signal);
      if (!waited) {
        this.logger.info('run cancelled while waiting to retry', { runId, circuit: circuitName, attempt });
        throw new RunCancelledError({
          runId,
          circuitName,
          attempts: attempt,
          circuitState: this._breaker.state,
          reason: signal?.reason,
        });
      }
    }
  }

  private notifyRetry(event: RetryEvent): void {
    this.logger.debug('retrying after failure', {
      runId: event.runId,
      circuit: event.circuitName,
      attempt: event.attempt,
      delayMs: event.delayMs,
      failureKind: event.failureKind,
    });
    if (!this.onRetry) {
      return;
    }
    try {
      this.onRetry(event);
    } catch (error) {
      this.logger.warn('onRetry hook failed', {
        runId: event.runId,
        error: toError(error).message,
      });
    }
  }
}
