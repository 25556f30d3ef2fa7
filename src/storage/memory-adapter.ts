/**
 * In-memory storage adapter. Values are deep-copied through JSON on the way
 * in and out, so callers cannot mutate stored state.
 */

import { patternToRegExp } from './pattern';
import type { StorageAdapter } from './types';

export class InMemoryStorageAdapter implements StorageAdapter {
  private entries: Map<string, string>;

  constructor() {
    this.entries = new Map();
  }

  async store(key: string, value: unknown): Promise<void> {
    this.entries.set(key, JSON.stringify(value));
  }

  async retrieve(key: string): Promise<unknown> {
    const raw = this.entries.get(key);
    if (raw === undefined) {
      return null;
    }
    const value: unknown = JSON.parse(raw);
    return value;
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async list(pattern = '*'): Promise<string[]> {
    const matcher = patternToRegExp(pattern);
    return Array.from(this.entries.keys())
      .filter(key => matcher.test(key))
      .sort();
  }

  /**
   * Number of stored keys
   */
  get size(): number {
    return this.entries.size;
  }
}
