/**
 * Failure Classification Tests
 */

import { describe, it, expect } from 'vitest';
import {
  classifyFailure,
  classifyStatus,
  FailureKind,
  isFailureKind,
  OperationFailure,
  parseRetryAfter,
  retryAfterMs,
} from '../failure';

function errorWithCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('classifyFailure', () => {
  it('uses the kind of an OperationFailure', () => {
    expect(classifyFailure(new OperationFailure(FailureKind.RATE_LIMIT, 'not found'))).toBe(FailureKind.RATE_LIMIT);
  });

  it('uses a kind property on plain objects', () => {
    expect(classifyFailure({ kind: 'validation', message: 'timeout' })).toBe(FailureKind.VALIDATION);
  });

  it('maps Node.js system error codes', () => {
    expect(classifyFailure(errorWithCode('boom', 'ECONNREFUSED'))).toBe(FailureKind.CONNECTION);
    expect(classifyFailure(errorWithCode('boom', 'ETIMEDOUT'))).toBe(FailureKind.TIMEOUT);
    expect(classifyFailure(errorWithCode('boom', 'ENOENT'))).toBe(FailureKind.NOT_FOUND);
    expect(classifyFailure(errorWithCode('boom', 'EACCES'))).toBe(FailureKind.AUTHENTICATION);
  });

  it('ignores codes that only exist on Object.prototype', () => {
    expect(classifyFailure(errorWithCode('boom', 'toString'))).toBe(FailureKind.UNKNOWN);
  });

  it('maps HTTP status codes', () => {
    expect(classifyFailure({ status: 429 })).toBe(FailureKind.RATE_LIMIT);
    expect(classifyFailure({ statusCode: 504 })).toBe(FailureKind.TIMEOUT);
    expect(classifyFailure({ status: 401 })).toBe(FailureKind.AUTHENTICATION);
  });

  it('treats TimeoutError by name', () => {
    const error = new Error('aborted');
    error.name = 'TimeoutError';
    expect(classifyFailure(error)).toBe(FailureKind.TIMEOUT);
  });

  it('matches message patterns', () => {
    expect(classifyFailure(new Error('Navigation timed out after 30000ms'))).toBe(FailureKind.TIMEOUT);
    expect(classifyFailure(new Error('socket hang up'))).toBe(FailureKind.CONNECTION);
    expect(classifyFailure(new Error('429 Too Many Requests'))).toBe(FailureKind.RATE_LIMIT);
    expect(classifyFailure(new Error('Service Unavailable'))).toBe(FailureKind.UNAVAILABLE);
    expect(classifyFailure(new Error('Malformed selector'))).toBe(FailureKind.VALIDATION);
    expect(classifyFailure('Element not found')).toBe(FailureKind.NOT_FOUND);
  });

  it('prefers permanent kinds when a message mentions both', () => {
    expect(classifyFailure(new Error('403 Forbidden: request timed out'))).toBe(FailureKind.AUTHENTICATION);
  });

  it('classifies through the cause chain', () => {
    const wrapped = new Error('page load failed', { cause: errorWithCode('inner', 'ECONNRESET') });
    expect(classifyFailure(wrapped)).toBe(FailureKind.CONNECTION);
  });

  it('stops on cyclic causes', () => {
    const a: { message: string; cause?: unknown } = { message: 'a' };
    const b = { message: 'b', cause: a };
    a.cause = b;
    expect(classifyFailure(a)).toBe(FailureKind.UNKNOWN);
  });

  it('returns unknown for anything else', () => {
    expect(classifyFailure(new Error('weird'))).toBe(FailureKind.UNKNOWN);
    expect(classifyFailure(42)).toBe(FailureKind.UNKNOWN);
    expect(classifyFailure(null)).toBe(FailureKind.UNKNOWN);
  });
});

describe('classifyStatus', () => {
  it('returns undefined for unmapped statuses', () => {
    expect(classifyStatus(200)).toBeUndefined();
    expect(classifyStatus(500)).toBeUndefined();
  });
});

describe('isFailureKind', () => {
  it('accepts only known kinds', () => {
    expect(isFailureKind('timeout')).toBe(true);
    expect(isFailureKind('TIMEOUT')).toBe(false);
    expect(isFailureKind(undefined)).toBe(false);
  });
});

describe('retryAfterMs', () => {
  const now = Date.parse('2026-03-01T10:00:00Z');

  it('reads retryAfterMs and retryAfter seconds', () => {
    expect(retryAfterMs(Object.assign(new Error('throttled'), { retryAfterMs: 1500 }), now)).toBe(1500);
    expect(retryAfterMs(Object.assign(new Error('throttled'), { retryAfter: 2 }), now)).toBe(2000);
    expect(retryAfterMs(Object.assign(new Error('throttled'), { retryAfter: '3' }), now)).toBe(3000);
  });

  it('reads a Retry-After header in any case', () => {
    expect(retryAfterMs({ status: 429, headers: { 'Retry-After': '4' } }, now)).toBe(4000);
    expect(retryAfterMs({ response: { headers: { 'retry-after': '5' } } }, now)).toBe(5000);
    expect(retryAfterMs({ headers: new Map([['retry-after', '6']]) }, now)).toBe(6000);
  });

  it('turns an HTTP date into the time remaining', () => {
    expect(retryAfterMs({ headers: { 'retry-after': 'Sun, 01 Mar 2026 10:00:45 GMT' } }, now)).toBe(45_000);
    expect(retryAfterMs({ retryAfter: 'Sun, 01 Mar 2026 09:00:00 GMT' }, now)).toBe(0);
  });

  it('reads the wait from the message', () => {
    expect(retryAfterMs(new Error('rate limited, retry after 30 seconds'), now)).toBe(30_000);
    expect(retryAfterMs(new Error('Too many requests. Try again in 2 minutes'), now)).toBe(120_000);
  });

  it('follows the cause chain', () => {
    const cause = Object.assign(new Error('throttled'), { retryAfterMs: 700 });
    expect(retryAfterMs(new Error('scrape failed', { cause }), now)).toBe(700);
  });

  it('returns undefined without a usable hint', () => {
    expect(retryAfterMs(new Error('connection refused'), now)).toBeUndefined();
    expect(retryAfterMs(Object.assign(new Error('throttled'), { retryAfterMs: -1 }), now)).toBeUndefined();
    expect(retryAfterMs({ headers: { 'retry-after': 'soon' } }, now)).toBeUndefined();
    expect(retryAfterMs(null, now)).toBeUndefined();
  });
});

describe('parseRetryAfter', () => {
  it('accepts seconds and dates only', () => {
    expect(parseRetryAfter(' 10 ')).toBe(10_000);
    expect(parseRetryAfter(0.5)).toBe(500);
    expect(parseRetryAfter(-3)).toBeUndefined();
    expect(parseRetryAfter(['10'])).toBeUndefined();
  });
});
