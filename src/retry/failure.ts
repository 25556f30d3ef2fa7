/**
 * Failure Classification
 *
 * Maps whatever an operation threw onto a small set of failure kinds. The
 * retry policy decides retryability from the kind alone.
 */

import { isNonNegativeNumber, isRecord, readProperty } from '../utils/guards';

/**
 * Categories of operation failure
 */
export enum FailureKind {
  /** Operation or I/O timed out */
  TIMEOUT = 'timeout',
  /** Connection refused, reset, or unreachable */
  CONNECTION = 'connection',
  /** Remote side throttled the caller */
  RATE_LIMIT = 'rate_limit',
  /** Remote side temporarily unavailable */
  UNAVAILABLE = 'unavailable',
  /** Credentials rejected */
  AUTHENTICATION = 'authentication',
  /** Target does not exist */
  NOT_FOUND = 'not_found',
  /** Request or input rejected as malformed */
  VALIDATION = 'validation',
  /** Could not be classified */
  UNKNOWN = 'unknown',
}

export const FAILURE_KINDS: FailureKind[] = Object.values(FailureKind);

export function isFailureKind(value: unknown): value is FailureKind {
  return FAILURE_KINDS.some(kind => kind === value);
}

/**
 * Error an operation can throw to state its failure kind explicitly.
 *
 * @example
 * ```typescript
 * throw new OperationFailure(FailureKind.TIMEOUT, 'page did not load in 30s');
 * ```
 */
export class OperationFailure extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OperationFailure';
    this.kind = kind;
  }
}

/** Node.js system error codes */
const ERROR_CODE_KINDS: Record<string, FailureKind> = {
  ETIMEDOUT: FailureKind.TIMEOUT,
  ESOCKETTIMEDOUT: FailureKind.TIMEOUT,
  ECONNREFUSED: FailureKind.CONNECTION,
  ECONNRESET: FailureKind.CONNECTION,
  ECONNABORTED: FailureKind.CONNECTION,
  EPIPE: FailureKind.CONNECTION,
  ENETUNREACH: FailureKind.CONNECTION,
  EHOSTUNREACH: FailureKind.CONNECTION,
  EAI_AGAIN: FailureKind.CONNECTION,
  ENOTFOUND: FailureKind.CONNECTION,
  ENOENT: FailureKind.NOT_FOUND,
  EACCES: FailureKind.AUTHENTICATION,
  EPERM: FailureKind.AUTHENTICATION,
};

/**
 * Message patterns, checked in order. Permanent kinds come first so that
 * e.g. "403 forbidden: request timed out" is not retried.
 */
const MESSAGE_PATTERNS: Array<[RegExp, FailureKind]> = [
  [/unauthori[sz]ed|forbidden|authentication failed|access denied|permission denied|invalid (credentials|token)|token expired/i, FailureKind.AUTHENTICATION],
  [/not found|no such file/i, FailureKind.NOT_FOUND],
  [/bad request|invalid request|malformed|validation failed/i, FailureKind.VALIDATION],
  [/rate.?limit|too many requests|throttl|quota exceeded/i, FailureKind.RATE_LIMIT],
  [/time[ds]?\s?out/i, FailureKind.TIMEOUT],
  [/connection (refused|reset|lost|closed)|socket hang up|network (error|unreachable)|host unreachable|dns/i, FailureKind.CONNECTION],
  [/service unavailable|temporarily unavailable|try again later|overloaded|server busy|bad gateway/i, FailureKind.UNAVAILABLE],
];

const MAX_CAUSE_DEPTH = 5;

/**
 * Classify an HTTP-style status code, if the error carries one
 */
export function classifyStatus(status: number): FailureKind | undefined {
  if (status === 408 || status === 504) return FailureKind.TIMEOUT;
  if (status === 429) return FailureKind.RATE_LIMIT;
  if (status === 502 || status === 503) return FailureKind.UNAVAILABLE;
  if (status === 401 || status === 403) return FailureKind.AUTHENTICATION;
  if (status === 404 || status === 410) return FailureKind.NOT_FOUND;
  if (status === 400 || status === 422) return FailureKind.VALIDATION;
  return undefined;
}

/**
 * Classify an arbitrary thrown value.
 *
 * Precedence: explicit {@link OperationFailure} kind, system error code,
 * `status`/`statusCode` property, error name, then message patterns.
 * Anything else is {@link FailureKind.UNKNOWN}.
 */
export function classifyFailure(failure: unknown, depth = 0): FailureKind {
  if (failure instanceof OperationFailure) {
    return failure.kind;
  }

  const kind = readProperty(failure, 'kind');
  if (isFailureKind(kind)) {
    return kind;
  }

  const code = readProperty(failure, 'code');
  if (typeof code === 'string' && Object.prototype.hasOwnProperty.call(ERROR_CODE_KINDS, code)) {
    return ERROR_CODE_KINDS[code];
  }

  const status = readProperty(failure, 'status') ?? readProperty(failure, 'statusCode');
  if (typeof status === 'number') {
    const byStatus = classifyStatus(status);
    if (byStatus) {
      return byStatus;
    }
  }

  const name = readProperty(failure, 'name');
  if (name === 'TimeoutError') {
    return FailureKind.TIMEOUT;
  }

  const message = typeof failure === 'string' ? failure : readProperty(failure, 'message');
  if (typeof message === 'string') {
    for (const [pattern, patternKind] of MESSAGE_PATTERNS) {
      if (pattern.test(message)) {
        return patternKind;
      }
    }
  }

  // Wrapped errors: classify the cause
  const cause = readProperty(failure, 'cause');
  if (cause !== undefined && cause !== failure && depth < MAX_CAUSE_DEPTH) {
    return classifyFailure(cause, depth + 1);
  }

  return FailureKind.UNKNOWN;
}

/** "retry after 30 seconds", "try again in 2 minutes" */
const RETRY_AFTER_MESSAGE = /(?:retry\b.*?\bafter|try\s+again\s+in)\D*?(\d+(?:\.\d+)?)\s*(seconds?|secs?|minutes?|mins?)\b/i;

const DELAY_SECONDS = /^\s*\d+(?:\.\d+)?\s*$/;

/**
 * Parse a Retry-After value: delay seconds or an HTTP date
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
  if (isNonNegativeNumber(value)) {
    return value * 1000;
  }
  if (typeof value !== 'string') {
    return undefined;
  }
  if (DELAY_SECONDS.test(value)) {
    return Number(value) * 1000;
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

function readHeader(headers: unknown, name: string): unknown {
  const get = readProperty(headers, 'get');
  if (typeof get === 'function') {
    const value: unknown = Reflect.apply(get, headers, [name]);
    return value ?? undefined;
  }
  if (!isRecord(headers)) {
    return undefined;
  }
  const key = Object.keys(headers).find(header => header.toLowerCase() === name);
  return key === undefined ? undefined : headers[key];
}

/**
 * How long the remote side asked the caller to wait, in ms, if the failure
 * says so. Looks at `retryAfterMs`, `retryAfter` (seconds or HTTP date), a
 * `Retry-After` header on the error or its `response`, the message, and
 * then the `cause` chain.
 */
export function retryAfterMs(failure: unknown, now: number = Date.now(), depth = 0): number | undefined {
  const explicit = readProperty(failure, 'retryAfterMs');
  if (isNonNegativeNumber(explicit)) {
    return explicit;
  }

  const fromProperty = parseRetryAfter(readProperty(failure, 'retryAfter'), now);
  if (fromProperty !== undefined) {
    return fromProperty;
  }

  const header =
    readHeader(readProperty(failure, 'headers'), 'retry-after') ??
    readHeader(readProperty(readProperty(failure, 'response'), 'headers'), 'retry-after');
  const fromHeader = parseRetryAfter(header, now);
  if (fromHeader !== undefined) {
    return fromHeader;
  }

  const message = typeof failure === 'string' ? failure : readProperty(failure, 'message');
  if (typeof message === 'string') {
    const match = RETRY_AFTER_MESSAGE.exec(message);
    if (match) {
      const amount = Number(match[1]);
      return match[2].toLowerCase().startsWith('min') ? amount * 60_000 : amount * 1000;
    }
  }

  const cause = readProperty(failure, 'cause');
  if (cause !== undefined && cause !== failure && depth < MAX_CAUSE_DEPTH) {
    return retryAfterMs(cause, now, depth + 1);
  }
  return undefined;
}
