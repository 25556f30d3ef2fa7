/**
 * Error Taxonomy
 *
 * Every terminal outcome of a resilient run other than success is one of
 * these classes, so callers can tell "failed after N attempts" apart from
 * "rejected without attempting".
 */

import type { CircuitState } from './circuit-breaker/types';
import type { FailureKind } from './retry/failure';

/**
 * Machine-readable error codes
 */
export enum ResilienceErrorCode {
  CIRCUIT_OPEN = 'CIRCUIT_OPEN',
  RETRY_EXHAUSTED = 'RETRY_EXHAUSTED',
  NON_RETRYABLE = 'NON_RETRYABLE',
  RUN_CANCELLED = 'RUN_CANCELLED',
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  SNAPSHOT_INTEGRITY = 'SNAPSHOT_INTEGRITY',
  STORAGE_FAILURE = 'STORAGE_FAILURE',
}

/**
 * A single problem found while validating configuration or stored data
 */
export interface ValidationIssue {
  /** Dotted path to the offending field */
  path: string;
  message: string;
}

/**
 * Base class for all errors raised by this package
 */
export class ResilienceError extends Error {
  readonly code: ResilienceErrorCode;

  constructor(code: ResilienceErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResilienceError';
    this.code = code;
  }
}

/**
 * Context shared by the errors a run can end with
 */
export interface RunFailureDetails {
  /** Identifier of the run that failed */
  runId: string;
  /** Name of the circuit guarding the operation */
  circuitName: string;
  /** Attempts actually made (0 when rejected before invoking) */
  attempts: number;
  /** Circuit state when the run ended */
  circuitState: CircuitState;
}

/**
 * Details carried by failures of an invoked operation
 */
export interface AttemptFailureDetails extends RunFailureDetails {
  /** Last error raised by the operation */
  lastError: Error;
  /** Classification of the last error */
  failureKind: FailureKind;
}

/**
 * The circuit refused admission; the operation was never invoked.
 */
export class CircuitOpenError extends ResilienceError {
  readonly runId: string;
  readonly circuitName: string;
  readonly attempts: number = 0;
  readonly circuitState: CircuitState;
  /** When the circuit will allow a probe again (ISO 8601), if known */
  readonly resetAt: string | null;

  constructor(details: Omit<RunFailureDetails, 'attempts'> & { reason?: string; resetAt?: string }) {
    super(
      ResilienceErrorCode.CIRCUIT_OPEN,
      `Circuit "${details.circuitName}" rejected run ${details.runId}: ${details.reason ?? 'circuit is open'}`
    );
    this.name = 'CircuitOpenError';
    this.runId = details.runId;
    this.circuitName = details.circuitName;
    this.circuitState = details.circuitState;
    this.resetAt = details.resetAt ?? null;
  }
}

/**
 * Every permitted attempt was made and the last one failed.
 */
export class RetryExhaustedError extends ResilienceError {
  readonly runId: string;
  readonly circuitName: string;
  readonly attempts: number;
  readonly circuitState: CircuitState;
  readonly lastError: Error;
  readonly failureKind: FailureKind;

  constructor(details: AttemptFailureDetails) {
    super(
      ResilienceErrorCode.RETRY_EXHAUSTED,
      `Run ${details.runId} failed after ${details.attempts} attempts. ` +
        `Last error (${details.failureKind}): ${details.lastError.message}`,
      { cause: details.lastError }
    );
    this.name = 'RetryExhaustedError';
    this.runId = details.runId;
    this.circuitName = details.circuitName;
    this.attempts = details.attempts;
    this.circuitState = details.circuitState;
    this.lastError = details.lastError;
    this.failureKind = details.failureKind;
  }
}

/**
 * The operation failed with an error the retry policy does not retry.
 */
export class NonRetryableError extends ResilienceError {
  readonly runId: string;
  readonly circuitName: string;
  readonly attempts: number;
  readonly circuitState: CircuitState;
  readonly lastError: Error;
  readonly failureKind: FailureKind;

  constructor(details: AttemptFailureDetails) {
    super(
      ResilienceErrorCode.NON_RETRYABLE,
      `Run ${details.runId} stopped on attempt ${details.attempts} ` +
        `with non-retryable ${details.failureKind} failure: ${details.lastError.message}`,
      { cause: details.lastError }
    );
    this.name = 'NonRetryableError';
    this.runId = details.runId;
    this.circuitName = details.circuitName;
    this.attempts = details.attempts;
    this.circuitState = details.circuitState;
    this.lastError = details.lastError;
    this.failureKind = details.failureKind;
  }
}

/**
 * The caller aborted the run during an attempt or between attempts.
 */
export class RunCancelledError extends ResilienceError {
  readonly runId: string;
  readonly circuitName: string;
  /** Attempts whose outcome was recorded before cancellation */
  readonly attempts: number;
  readonly circuitState: CircuitState;

  constructor(details: RunFailureDetails & { reason?: unknown }) {
    super(
      ResilienceErrorCode.RUN_CANCELLED,
      `Run ${details.runId} was cancelled after ${details.attempts} recorded attempts`,
      { cause: details.reason }
    );
    this.name = 'RunCancelledError';
    this.runId = details.runId;
    this.circuitName = details.circuitName;
    this.attempts = details.attempts;
    this.circuitState = details.circuitState;
  }
}

/**
 * Retry, breaker, or file configuration failed validation.
 */
export class InvalidConfigurationError extends ResilienceError {
  readonly issues: ValidationIssue[];

  constructor(subject: string, issues: ValidationIssue[]) {
    const details = issues.map(issue => `  ${issue.path}: ${issue.message}`).join('\n');
    super(ResilienceErrorCode.INVALID_CONFIGURATION, `Invalid ${subject}:\n${details}`);
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}

/**
 * A stored breaker snapshot is malformed or its checksum does not match.
 */
export class SnapshotIntegrityError extends ResilienceError {
  readonly key: string;

  constructor(key: string, message: string) {
    super(ResilienceErrorCode.SNAPSHOT_INTEGRITY, `Snapshot "${key}" failed integrity check: ${message}`);
    this.name = 'SnapshotIntegrityError';
    this.key = key;
  }
}

/**
 * A storage adapter could not complete an operation.
 */
export class StorageError extends ResilienceError {
  readonly operation: string;
  readonly key: string;

  constructor(operation: string, key: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(ResilienceErrorCode.STORAGE_FAILURE, `Storage ${operation} failed for "${key}": ${reason}`, { cause });
    this.name = 'StorageError';
    this.operation = operation;
    this.key = key;
  }
}
