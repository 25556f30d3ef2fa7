/**
 * Circuit Breaker Registry Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CircuitBreakerRegistry, DEFAULT_SNAPSHOT_KEY } from '../registry';
import { CircuitState, type CircuitStateChangeEvent } from '../types';
import { InMemoryStorageAdapter } from '../../storage/memory-adapter';
import { SnapshotIntegrityError } from '../../errors';
import type { StorageAdapter } from '../../storage/types';
import type { Logger } from '../../logging';
import { isRecord } from '../../utils/guards';

function spyLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('CircuitBreakerRegistry', () => {
  let registry: CircuitBreakerRegistry;

  beforeEach(() => {
    registry = new CircuitBreakerRegistry({ defaultConfig: { failureThreshold: 2 } });
  });

  describe('getCircuit', () => {
    it('creates a circuit on first use and returns the same one later', () => {
      const first = registry.getCircuit('navigation');
      const second = registry.getCircuit('navigation');
      expect(first).toBe(second);
      expect(registry.hasCircuit('navigation')).toBe(true);
    });

    it('applies the registry default config', () => {
      expect(registry.getCircuit('navigation').config).toEqual({ failureThreshold: 2, resetTimeoutMs: 30_000 });
    });

    it('applies per-circuit overrides only at creation', () => {
      registry.getCircuit('upload', { resetTimeoutMs: 1_000 });
      const again = registry.getCircuit('upload', { resetTimeoutMs: 5_000 });
      expect(again.config).toEqual({ failureThreshold: 2, resetTimeoutMs: 1_000 });
    });

    it('ignores undefined override fields', () => {
      const circuit = registry.getCircuit('upload', { failureThreshold: undefined });
      expect(circuit.config.failureThreshold).toBe(2);
    });
  });

  describe('delegation', () => {
    it('records outcomes and trips by name', () => {
      registry.recordOutcome('navigation', false);
      registry.recordOutcome('navigation', false);
      expect(registry.isOpen('navigation')).toBe(true);
      expect(registry.admit('navigation').allowed).toBe(false);
    });

    it('trips and resets manually', () => {
      registry.trip('navigation', 'maintenance');
      expect(registry.getStatus('navigation').lastTripReason).toBe('maintenance');
      registry.reset('navigation');
      expect(registry.isOpen('navigation')).toBe(false);
    });
  });

  describe('queries', () => {
    beforeEach(() => {
      registry.getCircuit('a');
      registry.trip('b', 'down');
      registry.recordOutcome('c', true);
    });

    it('lists names and open circuits', () => {
      expect(registry.listNames()).toEqual(['a', 'b', 'c']);
      expect(registry.getOpenCircuits().map(c => c.name)).toEqual(['b']);
      expect(registry.getCircuitsByState(CircuitState.CLOSED).map(c => c.name)).toEqual(['a', 'c']);
    });

    it('computes stats', () => {
      expect(registry.getStats()).toEqual({
        totalCircuits: 3,
        stateCounts: {
          [CircuitState.CLOSED]: 2,
          [CircuitState.OPEN]: 1,
          [CircuitState.HALF_OPEN]: 0,
        },
        totalFailures: 0,
        totalSuccesses: 1,
      });
    });

    it('resetAll closes every circuit', () => {
      registry.resetAll();
      expect(registry.getOpenCircuits()).toEqual([]);
    });

    it('removeCircuit and clear drop circuits', () => {
      expect(registry.removeCircuit('a')).toBe(true);
      expect(registry.removeCircuit('a')).toBe(false);
      registry.clear();
      expect(registry.listNames()).toEqual([]);
    });
  });

  describe('global listeners', () => {
    it('receives events from every circuit until unsubscribed', () => {
      const events: CircuitStateChangeEvent[] = [];
      const unsubscribe = registry.onStateChange(event => events.push(event));

      registry.trip('a', 'down');
      registry.trip('b', 'down');
      unsubscribe();
      registry.trip('c', 'down');

      expect(events.map(e => e.name)).toEqual(['a', 'b']);
    });

    it('logs a throwing listener and keeps notifying the rest', () => {
      const logger = spyLogger();
      const logged = new CircuitBreakerRegistry({ logger });
      const second = vi.fn();
      logged.onStateChange(() => {
        throw new Error('boom');
      });
      logged.onStateChange(second);

      logged.trip('a', 'down');

      expect(second).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith('registry state change listener failed', {
        circuit: 'a',
        error: 'boom',
      });
    });
  });

  describe('export and import', () => {
    it('restores exported circuits into another registry', () => {
      registry.trip('a', 'down');
      registry.recordOutcome('b', false);

      const other = new CircuitBreakerRegistry();
      other.importAll(registry.exportAll());

      expect(other.isOpen('a')).toBe(true);
      expect(other.getCircuit('b').failureCount).toBe(1);
      expect(other.getCircuit('b').config.failureThreshold).toBe(2);
    });
  });

  describe('persistence', () => {
    let storage: InMemoryStorageAdapter;

    beforeEach(() => {
      storage = new InMemoryStorageAdapter();
    });

    it('save without storage rejects', async () => {
      await expect(registry.save()).rejects.toThrow('CircuitBreakerRegistry has no storage adapter');
      await expect(registry.load()).rejects.toThrow('CircuitBreakerRegistry has no storage adapter');
    });

    it('saves and loads a snapshot', async () => {
      const source = new CircuitBreakerRegistry({ storage });
      source.trip('navigation', 'down');
      source.recordOutcome('upload', false);
      await source.save();

      expect(await storage.list()).toEqual([DEFAULT_SNAPSHOT_KEY]);

      const target = new CircuitBreakerRegistry({ storage });
      expect(await target.load()).toBe(2);
      expect(target.isOpen('navigation')).toBe(true);
      expect(target.getCircuit('upload').failureCount).toBe(1);
    });

    it('load restores into circuits that already exist', async () => {
      const live = new CircuitBreakerRegistry({ storage });
      const held = live.getCircuit('navigation');
      const events: CircuitStateChangeEvent[] = [];
      live.onStateChange(event => events.push(event));
      await live.save();

      expect(await live.load()).toBe(1);
      expect(live.getCircuit('navigation')).toBe(held);

      held.trip('down');
      expect(live.isOpen('navigation')).toBe(true);
      expect(events.map(e => e.name)).toEqual(['navigation']);
    });

    it('importAll overwrites the state of an existing circuit', () => {
      const held = registry.getCircuit('navigation');
      const other = new CircuitBreakerRegistry();
      other.trip('navigation', 'down');

      registry.importAll(other.exportAll());

      expect(registry.getCircuit('navigation')).toBe(held);
      expect(held.isOpen).toBe(true);
      expect(held.config.failureThreshold).toBe(5);
    });

    it('load returns 0 when nothing is stored', async () => {
      const target = new CircuitBreakerRegistry({ storage, snapshotKey: 'empty' });
      expect(await target.load()).toBe(0);
    });

    it('load rejects a tampered snapshot', async () => {
      const source = new CircuitBreakerRegistry({ storage });
      source.trip('navigation', 'down');
      await source.save();

      const stored = await storage.retrieve(DEFAULT_SNAPSHOT_KEY);
      if (!isRecord(stored)) {
        throw new Error('snapshot was not stored');
      }
      await storage.store(DEFAULT_SNAPSHOT_KEY, { ...stored, checksum: 'not-the-checksum' });

      await expect(new CircuitBreakerRegistry({ storage }).load()).rejects.toThrow(SnapshotIntegrityError);
    });

    it('autoSave writes a snapshot after each state change', async () => {
      const auto = new CircuitBreakerRegistry({ storage, autoSave: true, snapshotKey: 'auto' });
      auto.trip('navigation', 'down');
      await auto.flush();

      const target = new CircuitBreakerRegistry({ storage, snapshotKey: 'auto' });
      expect(await target.load()).toBe(1);
      expect(target.isOpen('navigation')).toBe(true);
    });

    it('logs failed automatic saves and keeps the queue usable', async () => {
      const logger = spyLogger();
      const failing: StorageAdapter = {
        store: vi.fn().mockRejectedValueOnce(new Error('disk full')).mockResolvedValue(undefined),
        retrieve: vi.fn().mockResolvedValue(null),
        delete: vi.fn().mockResolvedValue(false),
        list: vi.fn().mockResolvedValue([]),
      };
      const auto = new CircuitBreakerRegistry({ storage: failing, autoSave: true, logger });

      auto.trip('navigation', 'down');
      await auto.flush();
      expect(logger.error).toHaveBeenCalledWith('breaker snapshot save failed', {
        key: DEFAULT_SNAPSHOT_KEY,
        error: 'disk full',
      });

      await auto.save();
      expect(failing.store).toHaveBeenCalledTimes(2);
    });
  });
});
