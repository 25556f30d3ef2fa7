/**
 * File System Storage Adapter Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { FileSystemStorageAdapter } from '../filesystem-adapter';
import { StorageError } from '../../errors';
import type { Logger } from '../../logging';

describe('FileSystemStorageAdapter', () => {
  let testDir: string;
  let storage: FileSystemStorageAdapter;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'resilience-storage-test-'));
    storage = new FileSystemStorageAdapter({ baseDir: path.join(testDir, 'store') });
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('returns null for a missing key', async () => {
    expect(await storage.retrieve('checkpoint-1')).toBeNull();
  });

  it('stores and retrieves a value, creating the directory', async () => {
    await storage.store('checkpoint-1', { step: 3, urls: ['a', 'b'] });
    expect(await storage.retrieve('checkpoint-1')).toEqual({ step: 3, urls: ['a', 'b'] });
    expect(fs.existsSync(path.join(testDir, 'store', 'checkpoint-1.json'))).toBe(true);
  });

  it('keeps the previous value as a backup and leaves no temp file', async () => {
    await storage.store('checkpoint-1', { step: 1 });
    await storage.store('checkpoint-1', { step: 2 });

    const filePath = storage.pathFor('checkpoint-1');
    expect(JSON.parse(fs.readFileSync(filePath + '.backup', 'utf-8'))).toEqual({ step: 1 });
    expect(fs.readdirSync(path.dirname(filePath)).filter(file => file.endsWith('.tmp'))).toEqual([]);
  });

  it('handles concurrent stores of the same key', async () => {
    await storage.store('checkpoint-1', { step: 0 });
    const steps = Array.from({ length: 10 }, (_, i) => i + 1);

    const results = await Promise.allSettled(steps.map(step => storage.store('checkpoint-1', { step })));

    expect(results.map(result => result.status)).toEqual(steps.map(() => 'fulfilled'));
    const stored = await storage.retrieve('checkpoint-1');
    expect(steps.map(step => ({ step }))).toContainEqual(stored);
    expect(fs.readdirSync(path.join(testDir, 'store')).filter(file => file.endsWith('.tmp'))).toEqual([]);
    expect(await storage.list()).toEqual(['checkpoint-1']);
  });

  it('recovers from the backup when the main file is corrupted', async () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    storage = new FileSystemStorageAdapter({ baseDir: path.join(testDir, 'store'), logger });
    await storage.store('checkpoint-1', { step: 1 });
    await storage.store('checkpoint-1', { step: 2 });
    fs.writeFileSync(storage.pathFor('checkpoint-1'), '{ not json');

    expect(await storage.retrieve('checkpoint-1')).toEqual({ step: 1 });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('throws StorageError when the file is corrupted and there is no backup', async () => {
    await storage.store('checkpoint-1', { step: 1 });
    fs.writeFileSync(storage.pathFor('checkpoint-1'), '{ not json');

    await expect(storage.retrieve('checkpoint-1')).rejects.toThrow(StorageError);
  });

  it('deletes the value and its backup', async () => {
    await storage.store('checkpoint-1', { step: 1 });
    await storage.store('checkpoint-1', { step: 2 });

    expect(await storage.delete('checkpoint-1')).toBe(true);
    expect(await storage.retrieve('checkpoint-1')).toBeNull();
    expect(fs.existsSync(storage.pathFor('checkpoint-1') + '.backup')).toBe(false);
    expect(await storage.delete('checkpoint-1')).toBe(false);
  });

  it('lists nothing when the directory does not exist', async () => {
    expect(await storage.list()).toEqual([]);
  });

  it('lists keys sorted and filtered by wildcard', async () => {
    await storage.store('session-b', 1);
    await storage.store('session-a', 2);
    await storage.store('checkpoint-1', 3);
    await storage.store('session-a', 4);

    expect(await storage.list()).toEqual(['checkpoint-1', 'session-a', 'session-b']);
    expect(await storage.list('session-*')).toEqual(['session-a', 'session-b']);
    expect(await storage.list('*-1')).toEqual(['checkpoint-1']);
  });

  it('rejects keys that are not safe file names', () => {
    expect(() => storage.pathFor('../escape')).toThrow(StorageError);
    expect(() => storage.pathFor('a/b')).toThrow(StorageError);
    expect(storage.pathFor('run:42')).toBe(path.join(testDir, 'store', 'run:42.json'));
  });
});
