/**
 * Resilient Executor Types
 */

import type { Logger } from '../logging';
import type { FailureKind } from '../retry/failure';

/**
 * Passed to the operation on every attempt
 */
export interface RunContext {
  /** Identifier of the run, stable across its attempts */
  runId: string;
  /** 1-based attempt number */
  attempt: number;
  /** Aborted when the caller cancels the run */
  signal?: AbortSignal;
}

/**
 * Any asynchronous unit of work. The executor knows nothing about what it
 * does; failures are classified from whatever it throws.
 */
export type Operation<T> = (context: RunContext) => Promise<T>;

/**
 * Per-run options
 */
export interface RunOptions {
  /** Run identifier; generated when omitted */
  runId?: string;
  /** Cancels the in-flight attempt or the wait between attempts */
  signal?: AbortSignal;
}

/**
 * Reported before the executor waits for the next attempt
 */
export interface RetryEvent {
  runId: string;
  circuitName: string;
  /** Attempt that just failed */
  attempt: number;
  /** Wait before the next attempt (ms) */
  delayMs: number;
  error: unknown;
  failureKind: FailureKind;
}

/**
 * Construction options for ResilientExecutor
 */
export interface ResilientExecutorOptions {
  logger?: Logger;
  /** Called before each wait between attempts */
  onRetry?: (event: RetryEvent) => void;
  /** Source of uniform values in [0, 1) for jitter */
  random?: () => number;
}
