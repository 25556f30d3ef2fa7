/**
 * File System Storage Adapter
 *
 * Stores each key as a JSON file under a base directory. Uses atomic
 * writes and keeps a backup of the previous value to survive corruption.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { randomUUID } from 'crypto';
import { StorageError } from '../errors';
import { toError } from '../utils/guards';
import { silentLogger, type Logger } from '../logging';
import { patternToRegExp } from './pattern';
import type { StorageAdapter } from './types';

const FILE_SUFFIX = '.json';
const BACKUP_SUFFIX = '.backup';
const TEMP_SUFFIX = '.tmp';

function tempPathFor(filePath: string): string {
  return `${filePath}.${randomUUID()}${TEMP_SUFFIX}`;
}

/** Keys become file names, so they are restricted to a safe alphabet */
const VALID_KEY = /^[A-Za-z0-9][A-Za-z0-9._:-]*$/;

/**
 * Default storage directory
 */
export function getDefaultStorageDir(): string {
  return path.join(os.homedir(), '.resilience', 'storage');
}

export interface FileSystemStorageOptions {
  /** Directory holding one file per key */
  baseDir?: string;
  /** Receives backup-recovery warnings */
  logger?: Logger;
}

export class FileSystemStorageAdapter implements StorageAdapter {
  readonly baseDir: string;
  private readonly logger: Logger;

  constructor(options: FileSystemStorageOptions = {}) {
    this.baseDir = options.baseDir ?? getDefaultStorageDir();
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Path of the file holding `key`
   *
   * @throws StorageError if the key contains characters outside [A-Za-z0-9._:-]
   */
  pathFor(key: string): string {
    if (!VALID_KEY.test(key)) {
      throw new StorageError('resolve', key, new Error('Key must match ' + VALID_KEY.source));
    }
    return path.join(this.baseDir, key + FILE_SUFFIX);
  }

  async store(key: string, value: unknown): Promise<void> {
    const filePath = this.pathFor(key);
    try {
      await fs.promises.mkdir(this.baseDir, { recursive: true });

      // Create backup of existing file
      if (fs.existsSync(filePath)) {
        const backupTemp = tempPathFor(filePath);
        await fs.promises.copyFile(filePath, backupTemp);
        await fs.promises.rename(backupTemp, filePath + BACKUP_SUFFIX);
      }

      // Write to temp file first, then rename into place.
      // Each write gets its own temp file so concurrent stores of one key never share it.
      const tempPath = tempPathFor(filePath);
      await fs.promises.writeFile(tempPath, JSON.stringify(value, null, 2), 'utf-8');
      await fs.promises.rename(tempPath, filePath);
    } catch (error) {
      throw new StorageError('store', key, error);
    }
  }

  async retrieve(key: string): Promise<unknown> {
    const filePath = this.pathFor(key);
    if (!fs.existsSync(filePath)) {
      return null;
    }

    try {
      return await this.readJson(filePath);
    } catch (error) {
      // If main file is corrupted, try backup
      const backupPath = filePath + BACKUP_SUFFIX;
      if (fs.existsSync(backupPath)) {
        this.logger.warn('stored value corrupted, loading from backup', {
          key,
          error: toError(error).message,
        });
        try {
          return await this.readJson(backupPath);
        } catch (backupError) {
          throw new StorageError('retrieve', key, backupError);
        }
      }
      throw new StorageError('retrieve', key, error);
    }
  }

  async delete(key: string): Promise<boolean> {
    const filePath = this.pathFor(key);
    const existed = fs.existsSync(filePath);
    try {
      await fs.promises.rm(filePath, { force: true });
      await fs.promises.rm(filePath + BACKUP_SUFFIX, { force: true });
    } catch (error) {
      throw new StorageError('delete', key, error);
    }
    return existed;
  }

  async list(pattern = '*'): Promise<string[]> {
    if (!fs.existsSync(this.baseDir)) {
      return [];
    }

    const matcher = patternToRegExp(pattern);
    const files = await fs.promises.readdir(this.baseDir);
    return files
      .filter(file => file.endsWith(FILE_SUFFIX))
      .map(file => file.slice(0, -FILE_SUFFIX.length))
      .filter(key => matcher.test(key))
      .sort();
  }

  private async readJson(filePath: string): Promise<unknown> {
    const content = await fs.promises.readFile(filePath, 'utf-8');
    const value: unknown = JSON.parse(content);
    return value;
  }
}
