import { mkdir, readFile, writeFile, unlink, access, rename, copyFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Storage } from './storage.js';
import type { Logger } from '../types/logger.js';
import { isFileNotFound } from '../utils/fs.js';

/**
 * Configuration for JSONStorage.
 */
export interface JSONStorageConfig {
  /** Base directory for storage files */
  basePath: string;
  /** Keep a copy of the previous version before overwriting (default: true) */
  createBackup?: boolean;
  /** Logger for warnings (optional) */
  logger?: Logger;
}

const EXTENSION = '.json';

/**
 * JSON file-based storage: one file per key.
 *
 * Writes go to a temp file which is then renamed over the target, so readers
 * never see a half-written document. A syntactically broken file falls back
 * to the backup copy.
 */
export class JSONStorage implements Storage {
  private readonly basePath: string;
  private readonly createBackup: boolean;
  private readonly logger: Logger | undefined;

  constructor(config: JSONStorageConfig) {
    this.basePath = config.basePath;
    this.createBackup = config.createBackup ?? true;
    this.logger = config.logger;
  }

  async load(key: string): Promise<unknown> {
    try {
      return await this.readJson(this.getPath(key));
    } catch (error) {
      if (isFileNotFound(error)) {
        return null;
      }

      if (error instanceof SyntaxError) {
        const backup = await this.loadBackup(key);
        if (backup !== null) {
          this.logger?.warn({ key }, 'Corrupted JSON file, loaded backup instead');
          return backup;
        }
      }

      throw error;
    }
  }

  async save(key: string, data: unknown): Promise<void> {
    await mkdir(this.basePath, { recursive: true });

    const path = this.getPath(key);
    const tempPath = join(this.basePath, `${key}.tmp${EXTENSION}`);

    await writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');

    if (this.createBackup && (await this.exists(key))) {
      try {
        await copyFile(path, this.getBackupPath(key));
      } catch (error) {
        this.logger?.warn(
          { key, error: error instanceof Error ? error.message : String(error) },
          'Backup copy failed, continuing with save'
        );
      }
    }

    await rename(tempPath, path);
  }

  async delete(key: string): Promise<boolean> {
    try {
      await unlink(this.getPath(key));
      return true;
    } catch (error) {
      if (isFileNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await access(this.getPath(key));
      return true;
    } catch (error) {
      if (isFileNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  private getPath(key: string): string {
    return join(this.basePath, `${key}${EXTENSION}`);
  }

  private getBackupPath(key: string): string {
    return join(this.basePath, `${key}.backup${EXTENSION}`);
  }

  private async readJson(path: string): Promise<unknown> {
    const content = await readFile(path, 'utf-8');
    const data: unknown = JSON.parse(content);
    return data;
  }

  private async loadBackup(key: string): Promise<unknown> {
    try {
      return await this.readJson(this.getBackupPath(key));
    } catch (error) {
      if (isFileNotFound(error) || error instanceof SyntaxError) {
        return null;
      }
      throw error;
    }
  }
}

/**
 * Factory function for creating JSON storage.
 */
export function createJSONStorage(
  basePath: string,
  options?: Partial<Omit<JSONStorageConfig, 'basePath'>>
): JSONStorage {
  return new JSONStorage({
    basePath,
    ...options,
  });
}
