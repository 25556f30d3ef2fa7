/**
 * Circuit Breaker Types
 *
 * Defines circuit states, transitions, and status tracking.
 */

/**
 * Circuit breaker states following standard state machine pattern.
 *
 * State machine:
 * - CLOSED (normal) → failureThreshold consecutive failures → OPEN
 * - OPEN (blocked) → resetTimeoutMs → HALF_OPEN
 * - HALF_OPEN (probing) → success → CLOSED, failure → OPEN
 */
export enum CircuitState {
  /** Normal operation, requests allowed */
  CLOSED = 'closed',
  /** Circuit tripped, all requests blocked */
  OPEN = 'open',
  /** Testing recovery, single probe allowed */
  HALF_OPEN = 'half_open',
}

/**
 * Human-readable names for circuit states
 */
export const CIRCUIT_STATE_NAMES: Record<CircuitState, string> = {
  [CircuitState.CLOSED]: 'CLOSED',
  [CircuitState.OPEN]: 'OPEN',
  [CircuitState.HALF_OPEN]: 'HALF_OPEN',
};

export function isCircuitState(value: unknown): value is CircuitState {
  return Object.values(CircuitState).some(state => state === value);
}

/**
 * Configuration for circuit breaker behavior
 */
export interface CircuitBreakerConfig {
  /** Number of consecutive failures before opening circuit */
  failureThreshold: number;
  /** Time before OPEN → HALF_OPEN transition (ms) */
  resetTimeoutMs: number;
}

/**
 * Default circuit breaker configuration
 */
export const DEFAULT_CIRCUIT_CONFIG: Readonly<CircuitBreakerConfig> = Object.freeze({
  failureThreshold: 5,
  resetTimeoutMs: 30_000,
});

/**
 * Serializable circuit breaker status
 */
export interface CircuitBreakerStatus {
  /** Resource or operation type this circuit guards */
  name: string;
  /** Current circuit state */
  state: CircuitState;
  /** Human-readable state name */
  stateName: string;
  /** Consecutive failure count */
  failureCount: number;
  /** Total failure count */
  totalFailures: number;
  /** Total success count */
  totalSuccesses: number;
  /** When circuit was last tripped (ISO 8601) or null */
  lastTrippedAt: string | null;
  /** Why circuit was last tripped or null */
  lastTripReason: string | null;
  /** When circuit will transition to HALF_OPEN (ISO 8601) or null */
  resetAt: string | null;
  /** When the circuit was created (ISO 8601) */
  createdAt: string;
  /** Configuration for this circuit breaker */
  config: CircuitBreakerConfig;
}

/**
 * Event emitted when circuit state changes
 */
export interface CircuitStateChangeEvent {
  /** Circuit name */
  name: string;
  /** Previous state */
  fromState: CircuitState;
  /** New state */
  toState: CircuitState;
  /** Why the transition happened */
  reason: CircuitTransitionReason;
  /** Extra detail, e.g. the manual trip message */
  details?: string;
  /** When the transition occurred (ISO 8601) */
  timestamp: string;
}

/**
 * Reasons for circuit state transitions
 */
export enum CircuitTransitionReason {
  /** Consecutive failure threshold reached */
  CONSECUTIVE_FAILURES = 'consecutive_failures',
  /** Manual trip by operator */
  MANUAL_TRIP = 'manual_trip',
  /** Reset timeout expired (OPEN → HALF_OPEN) */
  TIMEOUT_EXPIRED = 'timeout_expired',
  /** Success in HALF_OPEN state */
  HALF_OPEN_SUCCESS = 'half_open_success',
  /** Failure in HALF_OPEN state */
  HALF_OPEN_FAILURE = 'half_open_failure',
  /** Manual reset by operator */
  MANUAL_RESET = 'manual_reset',
}

/**
 * Result of asking a circuit for admission
 */
export interface CircuitCheckResult {
  /** Whether the request can proceed */
  allowed: boolean;
  /** Current circuit state */
  state: CircuitState;
  /** Reason if not allowed */
  reason?: string;
  /** When the circuit will reset (ISO 8601) if OPEN */
  resetAt?: string;
  /** Set when this admission took the HALF_OPEN probe slot; pass to release() */
  probe?: number;
}
