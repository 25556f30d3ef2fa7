/**
 * Circuit Breaker Registry
 *
 * Central management for the circuit breakers of every protected resource.
 * Handles creation, lookup, bulk operations, and optional persistence of
 * breaker state through a storage adapter.
 */

import { silentLogger, type Logger } from '../logging';
import { loadBreakerSnapshot, saveBreakerSnapshot } from '../storage/breaker-snapshot';
import type { StorageAdapter } from '../storage/types';
import { toError } from '../utils/guards';
import { CircuitBreaker, resolveCircuitConfig } from './circuit-breaker';
import {
  CircuitState,
  type CircuitBreakerConfig,
  type CircuitBreakerStatus,
  type CircuitCheckResult,
  type CircuitStateChangeEvent,
} from './types';

/** Storage key used when none is configured */
export const DEFAULT_SNAPSHOT_KEY = 'circuit-breakers';

/**
 * Configuration options for CircuitBreakerRegistry
 */
export interface CircuitBreakerRegistryOptions {
  /** Default circuit breaker configuration */
  defaultConfig?: Partial<CircuitBreakerConfig>;
  /** Logger handed to every breaker */
  logger?: Logger;
  /** Where breaker snapshots are saved and loaded */
  storage?: StorageAdapter;
  /** Storage key for the snapshot */
  snapshotKey?: string;
  /** Save a snapshot after every state change (requires storage) */
  autoSave?: boolean;
}

/**
 * Statistics about the circuit breaker registry
 */
export interface CircuitBreakerRegistryStats {
  /** Total number of circuits */
  totalCircuits: number;
  /** Count of circuits in each state */
  stateCounts: Record<CircuitState, number>;
  /** Total failures across all circuits */
  totalFailures: number;
  /** Total successes across all circuits */
  totalSuccesses: number;
}

/**
 * Central registry for managing circuit breakers
 */
export class CircuitBreakerRegistry {
  private breakers: Map<string, CircuitBreaker>;
  private defaultConfig: CircuitBreakerConfig;
  private globalListeners: Array<(event: CircuitStateChangeEvent) => void>;
  private logger: Logger;
  private storage?: StorageAdapter;
  private snapshotKey: string;
  private autoSave: boolean;
  private saveChain: Promise<void>;

  constructor(options: CircuitBreakerRegistryOptions = {}) {
    this.breakers = new Map();
    this.defaultConfig = resolveCircuitConfig(options.defaultConfig);
    this.globalListeners = [];
    this.logger = options.logger ?? silentLogger;
    this.storage = options.storage;
    this.snapshotKey = options.snapshotKey ?? DEFAULT_SNAPSHOT_KEY;
    this.autoSave = (options.autoSave ?? false) && options.storage !== undefined;
    this.saveChain = Promise.resolve();
  }

  /**
   * Get or create the circuit breaker for a resource. `config` only
   * applies when the breaker is created.
   */
  getCircuit(name: string, config?: Partial<CircuitBreakerConfig>): CircuitBreaker {
    let breaker = this.breakers.get(name);

    if (!breaker) {
      breaker = new CircuitBreaker(name, {
        config: { ...this.defaultConfig, ...resolveOverrides(config) },
        logger: this.logger,
      });
      this.attach(breaker);
    }

    return breaker;
  }

  /**
   * Check if a resource's circuit allows requests
   */
  admit(name: string): CircuitCheckResult {
    return this.getCircuit(name).admit();
  }

  /**
   * Record an attempt outcome for a resource
   */
  recordOutcome(name: string, success: boolean): void {
    this.getCircuit(name).recordOutcome(success);
  }

  isOpen(name: string): boolean {
    return this.getCircuit(name).isOpen;
  }

  /**
   * Trip a circuit manually
   */
  trip(name: string, reason: string): void {
    this.getCircuit(name).trip(reason);
  }

  /**
   * Reset a circuit manually
   */
  reset(name: string): void {
    this.getCircuit(name).reset();
  }

  hasCircuit(name: string): boolean {
    return this.breakers.has(name);
  }

  removeCircuit(name: string): boolean {
    return this.breakers.delete(name);
  }

  getStatus(name: string): CircuitBreakerStatus {
    return this.getCircuit(name).toJSON();
  }

  listNames(): string[] {
    return Array.from(this.breakers.keys());
  }

  listCircuits(): CircuitBreaker[] {
    return Array.from(this.breakers.values());
  }

  getOpenCircuits(): CircuitBreaker[] {
    return this.listCircuits().filter(b => b.isOpen);
  }

  getCircuitsByState(state: CircuitState): CircuitBreaker[] {
    return this.listCircuits().filter(b => b.state === state);
  }

  /**
   * Add a state change listener for every circuit in the registry
   *
   * @returns Function that removes the listener
   */
  onStateChange(listener: (event: CircuitStateChangeEvent) => void): () => void {
    this.globalListeners.push(listener);
    return () => {
      const index = this.globalListeners.indexOf(listener);
      if (index !== -1) {
        this.globalListeners.splice(index, 1);
      }
    };
  }

  /**
   * Get statistics about all circuits
   */
  getStats(): CircuitBreakerRegistryStats {
    const circuits = this.listCircuits();
    const stateCounts: Record<CircuitState, number> = {
      [CircuitState.CLOSED]: 0,
      [CircuitState.OPEN]: 0,
      [CircuitState.HALF_OPEN]: 0,
    };

    let totalFailures = 0;
    let totalSuccesses = 0;

    for (const circuit of circuits) {
      stateCounts[circuit.state]++;
      totalFailures += circuit.totalFailures;
      totalSuccesses += circuit.totalSuccesses;
    }

    return {
      totalCircuits: circuits.length,
      stateCounts,
      totalFailures,
      totalSuccesses,
    };
  }

  /**
   * Reset all circuits
   */
  resetAll(): void {
    for (const breaker of this.breakers.values()) {
      breaker.reset();
    }
  }

  /**
   * Export all circuit statuses
   */
  exportAll(): CircuitBreakerStatus[] {
    return this.listCircuits().map(b => b.toJSON());
  }

  /**
   * Import circuit statuses. A circuit that already exists is restored in
   * place, so executors holding it keep sharing the registry's instance.
   */
  importAll(statuses: CircuitBreakerStatus[]): void {
    for (const status of statuses) {
      const existing = this.breakers.get(status.name);
      if (existing) {
        existing.restoreFrom(status);
      } else {
        this.attach(CircuitBreaker.fromJSON(status, this.logger));
      }
    }
  }

  /**
   * Clear all circuits
   */
  clear(): void {
    this.breakers.clear();
  }

  /**
   * Write a snapshot of every circuit to storage. Saves are queued so
   * concurrent callers never interleave writes.
   */
  save(): Promise<void> {
    const storage = this.storage;
    if (!storage) {
      return Promise.reject(new Error('CircuitBreakerRegistry has no storage adapter'));
    }
    const next = this.saveChain.then(() => this.writeSnapshot(storage));
    // Keep the queue usable after a failed write; the caller still sees the error
    this.saveChain = next.catch(error => this.logSaveFailure(error));
    return next;
  }

  /**
   * Wait for queued snapshot writes to finish
   */
  flush(): Promise<void> {
    return this.saveChain;
  }

  /**
   * Restore circuits from the stored snapshot
   *
   * @returns Number of circuits restored (0 if nothing was stored)
   */
  async load(): Promise<number> {
    if (!this.storage) {
      throw new Error('CircuitBreakerRegistry has no storage adapter');
    }
    const statuses = await loadBreakerSnapshot(this.storage, this.snapshotKey);
    if (!statuses) {
      return 0;
    }
    this.importAll(statuses);
    this.logger.info('circuit breakers restored', { key: this.snapshotKey, count: statuses.length });
    return statuses.length;
  }

  private attach(breaker: CircuitBreaker): void {
    breaker.onStateChange(event => {
      for (const listener of this.globalListeners) {
        try {
          listener(event);
        } catch (error) {
          this.logger.warn('registry state change listener failed', {
            circuit: event.name,
            error: toError(error).message,
          });
        }
      }
      const storage = this.storage;
      if (this.autoSave && storage) {
        this.saveChain = this.saveChain
          .then(() => this.writeSnapshot(storage))
          .catch(error => this.logSaveFailure(error));
      }
    });
    this.breakers.set(breaker.name, breaker);
  }

  private async writeSnapshot(storage: StorageAdapter): Promise<void> {
    await saveBreakerSnapshot(storage, this.snapshotKey, this.exportAll());
  }

  private logSaveFailure(error: unknown): void {
    this.logger.error('breaker snapshot save failed', {
      key: this.snapshotKey,
      error: toError(error).message,
    });
  }
}

/**
 * Drop `undefined` fields so they do not override defaults
 */
function resolveOverrides(config?: Partial<CircuitBreakerConfig>): Partial<CircuitBreakerConfig> {
  const overrides: Partial<CircuitBreakerConfig> = {};
  if (config?.failureThreshold !== undefined) overrides.failureThreshold = config.failureThreshold;
  if (config?.resetTimeoutMs !== undefined) overrides.resetTimeoutMs = config.resetTimeoutMs;
  return overrides;
}
