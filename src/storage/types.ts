/**
 * Storage Adapter Types
 */

/**
 * Key/value persistence used for breaker snapshots. Values must be
 * JSON-serializable.
 */
export interface StorageAdapter {
  /** Write `value` under `key`, replacing any previous value */
  store(key: string, value: unknown): Promise<void>;
  /** Read the value under `key`, or null if there is none */
  retrieve(key: string): Promise<unknown>;
  /** Remove `key`; resolves to whether it existed */
  delete(key: string): Promise<boolean>;
  /**
   * Keys matching `pattern` (`*` matches any run of characters), sorted.
   * Resolves to an empty list when the backing location does not exist.
   */
  list(pattern?: string): Promise<string[]>;
}
