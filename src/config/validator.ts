/**
 * Resilience Config Validator
 *
 * Validate a parsed YAML document and turn it into a typed configuration.
 */

import { resolveCircuitConfig, validateCircuitConfig } from '../circuit-breaker/circuit-breaker';
import type { CircuitBreakerConfig } from '../circuit-breaker/types';
import type { ValidationIssue } from '../errors';
import { isLogLevel, LOG_LEVELS } from '../logging';
import { isFailureKind, FAILURE_KINDS, type FailureKind } from '../retry/failure';
import { resolveRetryConfig, validateRetryConfig } from '../retry/retry-policy';
import {
  BACKOFF_STRATEGIES,
  JITTER_MODES,
  isBackoffStrategy,
  isJitterMode,
  type RetryPolicyConfig,
} from '../retry/types';
import { isRecord } from '../utils/guards';
import type { ConfigValidationResult, ResilienceConfig, ResilienceProfileOverrides } from './types';

const RETRY_FIELDS = ['maxAttempts', 'baseDelayMs', 'backoffFactor', 'maxDelayMs', 'retryableKinds', 'backoff', 'jitter'];
const CIRCUIT_FIELDS = ['failureThreshold', 'resetTimeoutMs'];
const PROFILE_NAME = /^[a-z0-9][a-z0-9._-]*$/;

function readNumber(
  section: Record<string, unknown>,
  field: string,
  path: string,
  errors: ValidationIssue[]
): number | undefined {
  const value = section[field];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    errors.push({ path: `${path}.${field}`, message: 'Must be a number' });
    return undefined;
  }
  return value;
}

function reportUnknownFields(
  section: Record<string, unknown>,
  known: string[],
  path: string,
  errors: ValidationIssue[]
): void {
  for (const key of Object.keys(section)) {
    if (!known.includes(key)) {
      errors.push({ path: `${path}.${key}`, message: 'Unknown field' });
    }
  }
}

function parseRetrySection(raw: unknown, path: string, errors: ValidationIssue[]): Partial<RetryPolicyConfig> {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isRecord(raw)) {
    errors.push({ path, message: 'Must be a mapping' });
    return {};
  }
  reportUnknownFields(raw, RETRY_FIELDS, path, errors);

  const retry: Partial<RetryPolicyConfig> = {
    maxAttempts: readNumber(raw, 'maxAttempts', path, errors),
    baseDelayMs: readNumber(raw, 'baseDelayMs', path, errors),
    backoffFactor: readNumber(raw, 'backoffFactor', path, errors),
    maxDelayMs: readNumber(raw, 'maxDelayMs', path, errors),
  };

  if (raw.retryableKinds !== undefined) {
    if (!Array.isArray(raw.retryableKinds)) {
      errors.push({ path: `${path}.retryableKinds`, message: 'Must be a list of failure kinds' });
    } else {
      const kinds: FailureKind[] = [];
      raw.retryableKinds.forEach((kind: unknown, i: number) => {
        if (isFailureKind(kind)) {
          kinds.push(kind);
        } else {
          errors.push({
            path: `${path}.retryableKinds[${i}]`,
            message: `Must be one of: ${FAILURE_KINDS.join(', ')}`,
          });
        }
      });
      retry.retryableKinds = kinds;
    }
  }

  if (raw.backoff !== undefined) {
    if (isBackoffStrategy(raw.backoff)) {
      retry.backoff = raw.backoff;
    } else {
      errors.push({ path: `${path}.backoff`, message: `Must be one of: ${BACKOFF_STRATEGIES.join(', ')}` });
    }
  }

  if (raw.jitter !== undefined) {
    if (isJitterMode(raw.jitter)) {
      retry.jitter = raw.jitter;
    } else {
      errors.push({ path: `${path}.jitter`, message: `Must be one of: ${JITTER_MODES.join(', ')}` });
    }
  }

  return retry;
}

function parseCircuitSection(raw: unknown, path: string, errors: ValidationIssue[]): Partial<CircuitBreakerConfig> {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isRecord(raw)) {
    errors.push({ path, message: 'Must be a mapping' });
    return {};
  }
  reportUnknownFields(raw, CIRCUIT_FIELDS, path, errors);
  return {
    failureThreshold: readNumber(raw, 'failureThreshold', path, errors),
    resetTimeoutMs: readNumber(raw, 'resetTimeoutMs', path, errors),
  };
}

/**
 * Apply overrides on top of resolved settings, ignoring undefined fields
 */
export function mergeRetryConfig(base: RetryPolicyConfig, overrides: Partial<RetryPolicyConfig> = {}): RetryPolicyConfig {
  return resolveRetryConfig({
    maxAttempts: overrides.maxAttempts ?? base.maxAttempts,
    baseDelayMs: overrides.baseDelayMs ?? base.baseDelayMs,
    backoffFactor: overrides.backoffFactor ?? base.backoffFactor,
    maxDelayMs: overrides.maxDelayMs ?? base.maxDelayMs,
    retryableKinds: overrides.retryableKinds ?? base.retryableKinds,
    backoff: overrides.backoff ?? base.backoff,
    jitter: overrides.jitter ?? base.jitter,
  });
}

export function mergeCircuitConfig(
  base: CircuitBreakerConfig,
  overrides: Partial<CircuitBreakerConfig> = {}
): CircuitBreakerConfig {
  return {
    failureThreshold: overrides.failureThreshold ?? base.failureThreshold,
    resetTimeoutMs: overrides.resetTimeoutMs ?? base.resetTimeoutMs,
  };
}

/**
 * Validate a parsed configuration document
 *
 * @example
 * ```typescript
 * const result = validateResilienceConfig(yaml.load(text));
 * if (!result.valid) {
 *   result.errors.forEach(e => console.error(`${e.path}: ${e.message}`));
 * }
 * ```
 */
export function validateResilienceConfig(raw: unknown): ConfigValidationResult {
  const errors: ValidationIssue[] = [];

  if (raw === undefined || raw === null) {
    raw = {};
  }
  if (!isRecord(raw)) {
    return { valid: false, errors: [{ path: '', message: 'Config must be a mapping' }] };
  }
  reportUnknownFields(raw, ['logLevel', 'defaults', 'profiles'], '', errors);

  // Log level
  let logLevel: ResilienceConfig['logLevel'] = 'info';
  if (raw.logLevel !== undefined) {
    if (isLogLevel(raw.logLevel)) {
      logLevel = raw.logLevel;
    } else {
      errors.push({ path: 'logLevel', message: `Must be one of: ${LOG_LEVELS.join(', ')}` });
    }
  }

  // Defaults
  let defaultsSection: Record<string, unknown> = {};
  if (raw.defaults !== undefined && raw.defaults !== null) {
    if (isRecord(raw.defaults)) {
      defaultsSection = raw.defaults;
      reportUnknownFields(defaultsSection, ['retry', 'circuitBreaker'], 'defaults', errors);
    } else {
      errors.push({ path: 'defaults', message: 'Must be a mapping' });
    }
  }
  const defaultRetry = resolveRetryConfig(parseRetrySection(defaultsSection.retry, 'defaults.retry', errors));
  const defaultCircuit = resolveCircuitConfig(
    parseCircuitSection(defaultsSection.circuitBreaker, 'defaults.circuitBreaker', errors)
  );
  errors.push(...validateRetryConfig(defaultRetry, 'defaults.retry'));
  errors.push(...validateCircuitConfig(defaultCircuit, 'defaults.circuitBreaker'));

  // Profiles
  const profiles: Record<string, ResilienceProfileOverrides> = {};
  if (raw.profiles !== undefined && raw.profiles !== null) {
    if (!isRecord(raw.profiles)) {
      errors.push({ path: 'profiles', message: 'Must be a mapping of profile names' });
    } else {
      for (const [name, section] of Object.entries(raw.profiles)) {
        const path = `profiles.${name}`;
        if (!PROFILE_NAME.test(name)) {
          errors.push({ path, message: 'Profile name must be lowercase alphanumeric with . _ -' });
          continue;
        }
        const body: unknown = section ?? {};
        if (!isRecord(body)) {
          errors.push({ path, message: 'Must be a mapping' });
          continue;
        }
        reportUnknownFields(body, ['retry', 'circuitBreaker'], path, errors);
        const overrides: ResilienceProfileOverrides = {
          retry: parseRetrySection(body.retry, `${path}.retry`, errors),
          circuitBreaker: parseCircuitSection(body.circuitBreaker, `${path}.circuitBreaker`, errors),
        };
        errors.push(...validateRetryConfig(mergeRetryConfig(defaultRetry, overrides.retry), `${path}.retry`));
        errors.push(
          ...validateCircuitConfig(mergeCircuitConfig(defaultCircuit, overrides.circuitBreaker), `${path}.circuitBreaker`)
        );
        profiles[name] = overrides;
      }
    }
  }

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  return {
    valid: true,
    config: {
      logLevel,
      defaults: { retry: defaultRetry, circuitBreaker: defaultCircuit },
      profiles,
    },
    errors: [],
  };
}
