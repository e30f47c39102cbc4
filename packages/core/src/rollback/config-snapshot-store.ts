/**
 * Config Snapshot Store
 * Copies configuration files into a rollback point's directory keyed by
 * their path relative to the project root, and copies them back on restore.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import {
  createChildLogger,
  ValidationError,
  type ConfigFileStatus,
  type ConfigRestoreResult,
} from '@rewind/shared';
import { errnoCode, hashFile, sha256 } from './fs-utils.js';

function isInsideRoot(relativePath: string): boolean {
  if (!relativePath || isAbsolute(relativePath)) return false;
  return relativePath !== '..' && !relativePath.startsWith(`..${sep}`);
}

export interface ConfigSnapshotStoreOptions {
  projectRoot: string;
  backupRoot: string;
}

export class ConfigSnapshotStore {
  private logger = createChildLogger({ component: 'ConfigSnapshotStore' });
  private readonly projectRoot: string;
  private readonly backupRoot: string;

  constructor(options: ConfigSnapshotStoreOptions) {
    this.projectRoot = resolve(options.projectRoot);
    this.backupRoot = options.backupRoot;
  }

  configDir(rollbackId: string): string {
    return join(this.backupRoot, rollbackId, 'configs');
  }

  /**
   * Normalise a config path to the POSIX relative key used in the index
   */
  toRelativeKey(filePath: string): string {
    const absolute = resolve(this.projectRoot, filePath);
    const relativePath = relative(this.projectRoot, absolute);
    if (!isInsideRoot(relativePath)) {
      throw new ValidationError(`Config path '${filePath}' is outside the project root`, {
        projectRoot: this.projectRoot,
      });
    }
    return relativePath.split(sep).join('/');
  }

  /**
   * Stage every existing file and return relative path -> sha256.
   * Missing files are skipped with a warning.
   */
  async capture(rollbackId: string, filePaths: string[]): Promise<Record<string, string>> {
    const hashes: Record<string, string> = {};
    const keys = [...new Set(filePaths.map((filePath) => this.toRelativeKey(filePath)))];

    for (const key of keys) {
      let content: Buffer;
      try {
        content = await readFile(this.resolveUnder(this.projectRoot, key));
      } catch (error) {
        if (errnoCode(error) === 'ENOENT') {
          this.logger.warn({ rollbackId, path: key }, 'Config file not found, skipping');
          continue;
        }
        throw error;
      }

      const destination = this.resolveUnder(this.configDir(rollbackId), key);
      await mkdir(dirname(destination), { recursive: true });
      await writeFile(destination, content);
      hashes[key] = sha256(content);
    }

    this.logger.info({ rollbackId, fileCount: Object.keys(hashes).length }, 'Config files captured');
    return hashes;
  }

  /**
   * Copy staged files back under `targetRoot`, overwriting what is there.
   * Files outside the snapshot are left alone. A staged copy whose hash no
   * longer matches the recorded one is not written.
   */
  async restore(
    rollbackId: string,
    targetRoot: string,
    configHashes: Record<string, string>
  ): Promise<ConfigRestoreResult> {
    const result: ConfigRestoreResult = { restored: [], failed: [] };

    for (const [key, expectedHash] of Object.entries(configHashes)) {
      try {
        const staged = await readFile(this.resolveUnder(this.configDir(rollbackId), key));
        if (sha256(staged) !== expectedHash) {
          result.failed.push({ path: key, reason: 'staged copy does not match recorded hash' });
          continue;
        }

        const destination = this.resolveUnder(resolve(targetRoot), key);
        await mkdir(dirname(destination), { recursive: true });
        await writeFile(destination, staged);
        result.restored.push(key);
      } catch (error) {
        const reason =
          errnoCode(error) === 'ENOENT'
            ? 'staged copy missing'
            : error instanceof Error
              ? error.message
              : String(error);
        result.failed.push({ path: key, reason });
      }
    }

    if (result.failed.length > 0) {
      this.logger.warn({ rollbackId, failed: result.failed }, 'Some config files were not restored');
    }
    this.logger.info({ rollbackId, restored: result.restored.length }, 'Config files restored');
    return result;
  }

  /**
   * Compare recorded hashes with the files currently under `root`
   */
  async diff(
    configHashes: Record<string, string>,
    root: string = this.projectRoot
  ): Promise<Array<{ path: string; status: ConfigFileStatus }>> {
    const entries: Array<{ path: string; status: ConfigFileStatus }> = [];
    for (const [key, expectedHash] of Object.entries(configHashes)) {
      const current = await hashFile(this.resolveUnder(resolve(root), key));
      const status: ConfigFileStatus =
        current === null ? 'missing' : current === expectedHash ? 'unchanged' : 'changed';
      entries.push({ path: key, status });
    }
    return entries;
  }

  private resolveUnder(root: string, key: string): string {
    const target = resolve(root, ...key.split('/'));
    const relativePath = relative(root, target);
    if (!isInsideRoot(relativePath)) {
      throw new ValidationError(`Config key '${key}' escapes ${root}`);
    }
    return target;
  }
}
