/**
 * Resilience Configuration Types
 *
 * Shape of the YAML file that names retry and circuit settings per
 * operation type.
 */

import type { CircuitBreakerConfig } from '../circuit-breaker/types';
import type { ValidationIssue } from '../errors';
import type { LogLevel } from '../logging';
import type { RetryPolicyConfig } from '../retry/types';

/**
 * Settings for one operation type; omitted fields fall back to defaults
 */
export interface ResilienceProfileOverrides {
  retry?: Partial<RetryPolicyConfig>;
  circuitBreaker?: Partial<CircuitBreakerConfig>;
}

/**
 * Fully resolved settings for one operation type
 */
export interface ResolvedProfile {
  name: string;
  retry: RetryPolicyConfig;
  circuitBreaker: CircuitBreakerConfig;
}

/**
 * Validated resilience configuration
 */
export interface ResilienceConfig {
  logLevel: LogLevel;
  defaults: {
    retry: RetryPolicyConfig;
    circuitBreaker: CircuitBreakerConfig;
  };
  profiles: Record<string, ResilienceProfileOverrides>;
}

export type ConfigValidationResult =
  | { valid: true; config: ResilienceConfig; errors: [] }
  | { valid: false; errors: ValidationIssue[] };
