/**
 * Advisory lock file
 * Exclusive-create lock used to serialize index mutations and whole
 * operations across processes sharing one backup root.
 */

import { mkdir, open, rm, stat } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createChildLogger, LockError } from '@rewind/shared';
import { delay } from './concurrency.js';
import { errnoCode } from './fs-utils.js';

export interface FileLockOptions {
  /** How long acquire() keeps retrying; 0 fails on first contention */
  timeoutMs: number;
  /** Locks older than this are considered abandoned and broken */
  staleMs: number;
  retryIntervalMs?: number;
}

const DEFAULT_RETRY_INTERVAL_MS = 50;

export class FileLock {
  private logger = createChildLogger({ component: 'FileLock' });
  private held = false;

  constructor(
    readonly lockPath: string,
    private readonly options: FileLockOptions
  ) {}

  isHeld(): boolean {
    return this.held;
  }

  async acquire(): Promise<void> {
    if (this.held) {
      throw new LockError(`Lock already held by this process: ${this.lockPath}`, this.lockPath);
    }

    await mkdir(dirname(this.lockPath), { recursive: true });
    const deadline = Date.now() + this.options.timeoutMs;

    for (;;) {
      try {
        const handle = await open(this.lockPath, 'wx');
        try {
          await handle.writeFile(
            JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString() })
          );
        } finally {
          await handle.close();
        }
        this.held = true;
        return;
      } catch (error) {
        if (errnoCode(error) !== 'EEXIST') {
          throw new LockError(
            `Cannot create lock ${this.lockPath}: ${error instanceof Error ? error.message : String(error)}`,
            this.lockPath
          );
        }
      }

      if (await this.breakIfStale()) {
        continue;
      }

      if (Date.now() >= deadline) {
        throw new LockError(
          `Another operation holds ${this.lockPath}; try again once it has finished`,
          this.lockPath
        );
      }

      await delay(this.options.retryIntervalMs ?? DEFAULT_RETRY_INTERVAL_MS);
    }
  }

  async release(): Promise<void> {
    if (!this.held) return;
    this.held = false;
    await rm(this.lockPath, { force: true });
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  private async breakIfStale(): Promise<boolean> {
    try {
      const info = await stat(this.lockPath);
      const ageMs = Date.now() - info.mtimeMs;
      if (ageMs <= this.options.staleMs) {
        return false;
      }
      this.logger.warn({ lockPath: this.lockPath, ageMs }, 'Breaking stale lock');
      await rm(this.lockPath, { force: true });
      return true;
    } catch (error) {
      // Released between our open() and stat(); retry immediately
      if (errnoCode(error) === 'ENOENT') {
        return true;
      }
      throw error;
    }
  }
}
