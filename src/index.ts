/**
 * Resilient Executor
 *
 * Run asynchronous operations under a retry policy and a circuit breaker,
 * with distinct errors for every way a run can end.
 *
 * @license Apache-2.0
 */

// Errors
export {
  ResilienceError,
  ResilienceErrorCode,
  CircuitOpenError,
  RetryExhaustedError,
  NonRetryableError,
  RunCancelledError,
  InvalidConfigurationError,
  SnapshotIntegrityError,
  StorageError,
  type AttemptFailureDetails,
  type RunFailureDetails,
  type ValidationIssue,
} from './errors';

// Logging
export * from './logging';

// Retry policies and failure classification
export * from './retry';

// Circuit breakers
export * from './circuit-breaker';

// Storage adapters and breaker snapshots
export * from './storage';

// YAML configuration
export * from './config';

// Executor
export * from './executor';
