/**
 * Circuit Breaker
 *
 * One breaker guards one resource or operation type and is shared by every
 * concurrent run against it. Each method that changes state does so in a
 * single synchronous block, so interleaved runs on the event loop cannot
 * lose an update.
 */

import { InvalidConfigurationError, type ValidationIssue } from '../errors';
import { silentLogger, type Logger } from '../logging';
import { isNonNegativeNumber, isPositiveInteger, toError } from '../utils/guards';
import {
  CircuitState,
  CircuitTransitionReason,
  DEFAULT_CIRCUIT_CONFIG,
  CIRCUIT_STATE_NAMES,
  type CircuitBreakerConfig,
  type CircuitBreakerStatus,
  type CircuitCheckResult,
  type CircuitStateChangeEvent,
} from './types';

/**
 * Fill omitted fields from the defaults. `undefined` counts as omitted.
 */
export function resolveCircuitConfig(config: Partial<CircuitBreakerConfig> = {}): CircuitBreakerConfig {
  return {
    failureThreshold: config.failureThreshold ?? DEFAULT_CIRCUIT_CONFIG.failureThreshold,
    resetTimeoutMs: config.resetTimeoutMs ?? DEFAULT_CIRCUIT_CONFIG.resetTimeoutMs,
  };
}

export function validateCircuitConfig(config: CircuitBreakerConfig, prefix = ''): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const at = (field: string) => (prefix ? `${prefix}.${field}` : field);

  if (!isPositiveInteger(config.failureThreshold)) {
    issues.push({ path: at('failureThreshold'), message: 'Must be an integer >= 1' });
  }
  if (!isNonNegativeNumber(config.resetTimeoutMs)) {
    issues.push({ path: at('resetTimeoutMs'), message: 'Must be a finite number >= 0' });
  }
  return issues;
}

/**
 * Construction options for a circuit breaker
 */
export interface CircuitBreakerOptions {
  /** Overrides for the default configuration */
  config?: Partial<CircuitBreakerConfig>;
  /** Receives transition and listener-failure logs */
  logger?: Logger;
}

/**
 * Circuit breaker for a single protected resource
 *
 * Tracks failures and manages state transitions:
 * - CLOSED: Normal operation, requests allowed
 * - OPEN: Circuit tripped, all requests blocked
 * - HALF_OPEN: Testing recovery, single probe allowed
 *
 * @example
 * ```typescript
 * const breaker = new CircuitBreaker('session-create', { config: { failureThreshold: 3 } });
 * const check = breaker.admit();
 * if (check.allowed) {
 *   breaker.recordOutcome(await tryCreateSession());
 * }
 * ```
 */
export class CircuitBreaker {
  readonly name: string;
  private _state: CircuitState;
  private _failureCount: number;
  private _totalFailures: number;
  private _totalSuccesses: number;
  private _lastTrippedAt: Date | null;
  private _lastTripReason: string | null;
  private _createdAt: Date;
  private _probeInFlight: boolean;
  private _probeSequence: number;
  private _config: Readonly<CircuitBreakerConfig>;
  private readonly _logger: Logger;
  private _stateChangeListeners: Array<(event: CircuitStateChangeEvent) => void>;

  /**
   * @throws InvalidConfigurationError if the configuration is out of range
   */
  constructor(name: string, options: CircuitBreakerOptions = {}) {
    const config = resolveCircuitConfig(options.config);
    const issues = validateCircuitConfig(config);
    if (issues.length > 0) {
      throw new InvalidConfigurationError(`circuit breaker "${name}"`, issues);
    }

    this.name = name;
    this._state = CircuitState.CLOSED;
    this._failureCount = 0;
    this._totalFailures = 0;
    this._totalSuccesses = 0;
    this._lastTrippedAt = null;
    this._lastTripReason = null;
    this._createdAt = new Date();
    this._probeInFlight = false;
    this._probeSequence = 0;
    this._config = Object.freeze(config);
    this._logger = options.logger ?? silentLogger;
    this._stateChangeListeners = [];
  }

  /**
   * Current circuit state
   */
  get state(): CircuitState {
    // Check if we should transition from OPEN to HALF_OPEN
    this.checkAutoTransition();
    return this._state;
  }

  get isOpen(): boolean {
    return this.state === CircuitState.OPEN;
  }

  get isClosed(): boolean {
    return this.state === CircuitState.CLOSED;
  }

  get isHalfOpen(): boolean {
    return this.state === CircuitState.HALF_OPEN;
  }

  /**
   * Consecutive failure count; reset by any success
   */
  get failureCount(): number {
    return this._failureCount;
  }

  get totalFailures(): number {
    return this._totalFailures;
  }

  get totalSuccesses(): number {
    return this._totalSuccesses;
  }

  /**
   * Whether a HALF_OPEN probe has been admitted and not yet resolved
   */
  get probeInFlight(): boolean {
    return this._probeInFlight;
  }

  get config(): CircuitBreakerConfig {
    return { ...this._config };
  }

  /**
   * Ask whether a call may proceed. In HALF_OPEN the first caller takes
   * the single probe slot and later callers are refused until the probe's
   * outcome is recorded or {@link release} is called. Never changes the
   * failure count.
   */
  admit(): CircuitCheckResult {
    const currentState = this.state; // triggers auto-transition check

    switch (currentState) {
      case CircuitState.CLOSED:
        return {
          allowed: true,
          state: currentState,
        };

      case CircuitState.OPEN:
        return {
          allowed: false,
          state: currentState,
          reason: `Circuit is OPEN: ${this._lastTripReason ?? 'tripped'}`,
          resetAt: this.getResetTime()?.toISOString(),
        };

      case CircuitState.HALF_OPEN:
        if (this._probeInFlight) {
          return {
            allowed: false,
            state: currentState,
            reason: 'Circuit is HALF_OPEN: probe already in flight',
          };
        }
        this._probeInFlight = true;
        this._probeSequence++;
        return {
          allowed: true,
          state: currentState,
          probe: this._probeSequence,
        };
    }
  }

  /**
   * Record the outcome of one invoked attempt
   */
  recordOutcome(success: boolean): void {
    if (success) {
      this.recordSuccess();
    } else {
      this.recordFailure();
    }
  }

  /**
   * Give back a HALF_OPEN probe slot whose attempt never produced an
   * outcome (e.g. the caller cancelled it). Only the admission that took
   * the current slot can release it.
   *
   * @param probe - The `probe` token returned by {@link admit}
   * @returns Whether the slot was released
   */
  release(probe: number): boolean {
    if (
      this._state !== CircuitState.HALF_OPEN ||
      !this._probeInFlight ||
      probe !== this._probeSequence
    ) {
      return false;
    }
    this._probeInFlight = false;
    this._logger.debug('half-open probe released', { circuit: this.name, probe });
    return true;
  }

  /**
   * Manually trip the circuit
   */
  trip(reason: string): void {
    this.tripCircuit(CircuitTransitionReason.MANUAL_TRIP, reason);
  }

  /**
   * Manually reset the circuit to CLOSED
   */
  reset(): void {
    this._failureCount = 0;
    this._probeInFlight = false;
    this.transitionTo(CircuitState.CLOSED, CircuitTransitionReason.MANUAL_RESET);
  }

  /**
   * Add a listener for state changes
   *
   * @returns Function that removes the listener
   */
  onStateChange(listener: (event: CircuitStateChangeEvent) => void): () => void {
    this._stateChangeListeners.push(listener);
    return () => {
      const index = this._stateChangeListeners.indexOf(listener);
      if (index !== -1) {
        this._stateChangeListeners.splice(index, 1);
      }
    };
  }

  /**
   * Get serializable status
   */
  toJSON(): CircuitBreakerStatus {
    return {
      name: this.name,
      state: this._state,
      stateName: CIRCUIT_STATE_NAMES[this._state],
      failureCount: this._failureCount,
      totalFailures: this._totalFailures,
      totalSuccesses: this._totalSuccesses,
      lastTrippedAt: this._lastTrippedAt?.toISOString() ?? null,
      lastTripReason: this._lastTripReason,
      resetAt: this.getResetTime()?.toISOString() ?? null,
      createdAt: this._createdAt.toISOString(),
      config: { ...this._config },
    };
  }

  /**
   * Restore from serialized status. A restored HALF_OPEN circuit has no
   * probe in flight.
   */
  static fromJSON(data: CircuitBreakerStatus, logger?: Logger): CircuitBreaker {
    const breaker = new CircuitBreaker(data.name, { config: data.config, logger });
    breaker.restoreFrom(data);
    return breaker;
  }

  /**
   * Overwrite this breaker's state with a serialized status, keeping the
   * instance (and its listeners) in place. Listeners are not notified.
   *
   * @throws InvalidConfigurationError if the status carries an invalid config
   */
  restoreFrom(data: CircuitBreakerStatus): void {
    const config = resolveCircuitConfig(data.config);
    const issues = validateCircuitConfig(config);
    if (issues.length > 0) {
      throw new InvalidConfigurationError(`circuit breaker "${this.name}"`, issues);
    }

    this._config = Object.freeze(config);
    this._state = data.state;
    this._failureCount = data.failureCount;
    this._totalFailures = data.totalFailures;
    this._totalSuccesses = data.totalSuccesses;
    this._lastTrippedAt = data.lastTrippedAt ? new Date(data.lastTrippedAt) : null;
    this._lastTripReason = data.lastTripReason;
    this._createdAt = new Date(data.createdAt);
    this._probeInFlight = false;
    this._probeSequence++;
  }

  // === Private Methods ===

  private recordSuccess(): void {
    this._failureCount = 0;
    this._totalSuccesses++;

    if (this._state === CircuitState.HALF_OPEN) {
      this.transitionTo(CircuitState.CLOSED, CircuitTransitionReason.HALF_OPEN_SUCCESS);
    }
  }

  private recordFailure(): void {
    this._failureCount++;
    this._totalFailures++;

    if (this._state === CircuitState.HALF_OPEN) {
      this.tripCircuit(CircuitTransitionReason.HALF_OPEN_FAILURE, 'Half-open probe failed');
    } else if (
      this._state === CircuitState.CLOSED &&
      this._failureCount >= this._config.failureThreshold
    ) {
      this.tripCircuit(
        CircuitTransitionReason.CONSECUTIVE_FAILURES,
        `${this._failureCount} consecutive failures`
      );
    }
  }

  private checkAutoTransition(): void {
    if (this._state === CircuitState.OPEN && this._lastTrippedAt) {
      const resetTime = this.getResetTime();
      if (resetTime && resetTime.getTime() <= Date.now()) {
        this.transitionTo(CircuitState.HALF_OPEN, CircuitTransitionReason.TIMEOUT_EXPIRED);
      }
    }
  }

  private getResetTime(): Date | null {
    if (this._state !== CircuitState.OPEN || !this._lastTrippedAt) {
      return null;
    }
    return new Date(this._lastTrippedAt.getTime() + this._config.resetTimeoutMs);
  }

  private tripCircuit(transitionReason: CircuitTransitionReason, failureReason: string): void {
    this._lastTrippedAt = new Date();
    this._lastTripReason = failureReason;
    this.transitionTo(CircuitState.OPEN, transitionReason, failureReason);
  }

  private transitionTo(
    newState: CircuitState,
    reason: CircuitTransitionReason,
    details?: string
  ): void {
    const previousState = this._state;
    if (previousState === newState) {
      return;
    }

    this._state = newState;
    this._probeInFlight = false;

    const event: CircuitStateChangeEvent = {
      name: this.name,
      fromState: previousState,
      toState: newState,
      reason,
      details,
      timestamp: new Date().toISOString(),
    };

    this._logger.info('circuit state change', {
      circuit: this.name,
      from: CIRCUIT_STATE_NAMES[previousState],
      to: CIRCUIT_STATE_NAMES[newState],
      reason,
      failureCount: this._failureCount,
    });

    for (const listener of this._stateChangeListeners) {
      try {
        listener(event);
      } catch (error) {
        this._logger.warn('state change listener failed', {
          circuit: this.name,
          error: toError(error).message,
        });
      }
    }
  }
}
