/**
 * Circuit Breaker Module
 *
 * Circuit breakers that stop invoking a failing operation for a cooling-off
 * period, and a registry holding one breaker per protected resource.
 */

// Types
export {
  CircuitState,
  CircuitTransitionReason,
  CIRCUIT_STATE_NAMES,
  DEFAULT_CIRCUIT_CONFIG,
  isCircuitState,
  type CircuitBreakerConfig,
  type CircuitBreakerStatus,
  type CircuitCheckResult,
  type CircuitStateChangeEvent,
} from './types';

// Circuit Breaker
export {
  CircuitBreaker,
  resolveCircuitConfig,
  validateCircuitConfig,
  type CircuitBreakerOptions,
} from './circuit-breaker';

// Registry
export {
  CircuitBreakerRegistry,
  DEFAULT_SNAPSHOT_KEY,
  type CircuitBreakerRegistryOptions,
  type CircuitBreakerRegistryStats,
} from './registry';
