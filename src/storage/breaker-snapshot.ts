/**
 * Breaker Snapshots
 *
 * Persists circuit breaker statuses through a storage adapter together
 * with a SHA-256 checksum over their RFC 8785 canonical JSON, so a
 * tampered or truncated snapshot is rejected instead of restoring a
 * wrong circuit state.
 */

import { createHash } from 'crypto';
import { canonicalize } from 'json-canonicalize';
import { CircuitState, isCircuitState, type CircuitBreakerStatus } from '../circuit-breaker/types';
import { SnapshotIntegrityError } from '../errors';
import { isNonNegativeNumber, isRecord } from '../utils/guards';
import type { StorageAdapter } from './types';

/** Current snapshot schema version */
export const SNAPSHOT_VERSION = 1;

/**
 * Stored form of a set of breaker statuses
 */
export interface BreakerSnapshot {
  version: number;
  /** When the snapshot was written (ISO 8601) */
  savedAt: string;
  breakers: CircuitBreakerStatus[];
  /** Hex SHA-256 of the canonical JSON of `breakers` */
  checksum: string;
}

/**
 * Compute the checksum stored alongside breaker statuses
 */
export function computeSnapshotChecksum(breakers: CircuitBreakerStatus[]): string {
  return createHash('sha256').update(canonicalize(breakers)).digest('hex');
}

export function createBreakerSnapshot(breakers: CircuitBreakerStatus[]): BreakerSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    savedAt: new Date().toISOString(),
    breakers,
    checksum: computeSnapshotChecksum(breakers),
  };
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

/**
 * Validate one stored status, returning a description of the first
 * problem found or null if it is well formed
 */
function describeStatusProblem(value: unknown): string | null {
  if (!isRecord(value)) return 'entry is not an object';
  if (typeof value.name !== 'string') return 'name must be a string';
  if (!isCircuitState(value.state)) return `unknown state ${String(value.state)}`;
  if (typeof value.stateName !== 'string') return 'stateName must be a string';
  for (const counter of ['failureCount', 'totalFailures', 'totalSuccesses']) {
    if (!isNonNegativeNumber(value[counter])) return `${counter} must be a non-negative number`;
  }
  if (!isNullableString(value.lastTrippedAt)) return 'lastTrippedAt must be a string or null';
  if (!isNullableString(value.lastTripReason)) return 'lastTripReason must be a string or null';
  if (!isNullableString(value.resetAt)) return 'resetAt must be a string or null';
  if (typeof value.createdAt !== 'string') return 'createdAt must be a string';
  for (const field of ['lastTrippedAt', 'resetAt', 'createdAt']) {
    const date = value[field];
    if (typeof date === 'string' && Number.isNaN(Date.parse(date))) return `${field} is not a valid date`;
  }
  if (value.state === CircuitState.OPEN && value.lastTrippedAt === null) return 'open circuit has no lastTrippedAt';
  if (!isRecord(value.config)) return 'config must be an object';
  if (!isNonNegativeNumber(value.config.failureThreshold)) return 'config.failureThreshold must be a number';
  if (!isNonNegativeNumber(value.config.resetTimeoutMs)) return 'config.resetTimeoutMs must be a number';
  return null;
}

function isCircuitBreakerStatus(value: unknown): value is CircuitBreakerStatus {
  return describeStatusProblem(value) === null;
}

/**
 * Check a value read from storage and return its breaker statuses
 *
 * @throws SnapshotIntegrityError if the shape or checksum is wrong
 */
export function parseBreakerSnapshot(key: string, value: unknown): CircuitBreakerStatus[] {
  if (!isRecord(value)) {
    throw new SnapshotIntegrityError(key, 'snapshot is not an object');
  }
  if (value.version !== SNAPSHOT_VERSION) {
    throw new SnapshotIntegrityError(key, `unsupported version ${String(value.version)}`);
  }
  if (!Array.isArray(value.breakers)) {
    throw new SnapshotIntegrityError(key, 'breakers must be an array');
  }
  if (typeof value.checksum !== 'string') {
    throw new SnapshotIntegrityError(key, 'checksum is missing');
  }

  const breakers: CircuitBreakerStatus[] = [];
  value.breakers.forEach((entry: unknown, index: number) => {
    if (!isCircuitBreakerStatus(entry)) {
      throw new SnapshotIntegrityError(key, `breakers[${index}]: ${describeStatusProblem(entry)}`);
    }
    breakers.push(entry);
  });

  if (computeSnapshotChecksum(breakers) !== value.checksum) {
    throw new SnapshotIntegrityError(key, 'checksum mismatch');
  }
  return breakers;
}

/**
 * Write breaker statuses under `key`
 */
export async function saveBreakerSnapshot(
  storage: StorageAdapter,
  key: string,
  breakers: CircuitBreakerStatus[]
): Promise<BreakerSnapshot> {
  const snapshot = createBreakerSnapshot(breakers);
  await storage.store(key, snapshot);
  return snapshot;
}

/**
 * Read breaker statuses stored under `key`
 *
 * @returns The statuses, or null if nothing is stored under `key`
 * @throws SnapshotIntegrityError if the stored snapshot is invalid
 */
export async function loadBreakerSnapshot(
  storage: StorageAdapter,
  key: string
): Promise<CircuitBreakerStatus[] | null> {
  const value = await storage.retrieve(key);
  if (value === null || value === undefined) {
    return null;
  }
  return parseBreakerSnapshot(key, value);
}
