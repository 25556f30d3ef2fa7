/**
 * Storage Module
 *
 * Key/value storage adapters and breaker snapshot persistence.
 */

export type { StorageAdapter } from './types';
export { InMemoryStorageAdapter } from './memory-adapter';
export {
  FileSystemStorageAdapter,
  getDefaultStorageDir,
  type FileSystemStorageOptions,
} from './filesystem-adapter';
export { matchesPattern, patternToRegExp } from './pattern';
export {
  SNAPSHOT_VERSION,
  computeSnapshotChecksum,
  createBreakerSnapshot,
  parseBreakerSnapshot,
  saveBreakerSnapshot,
  loadBreakerSnapshot,
  type BreakerSnapshot,
} from './breaker-snapshot';
