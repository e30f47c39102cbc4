/**
 * Rollback Point Repository
 * Size-bounded JSON index of rollback points plus their backing directories.
 *
 * Layout:
 *   <backupRoot>/rollback-index.json
 *   <backupRoot>/<rollbackId>/configs/...
 *   <backupRoot>/<rollbackId>/volumes/<volume>.tar.gz
 */

import { access, mkdir, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import {
  createChildLogger,
  NotFoundError,
  RepositoryError,
  type RollbackPoint,
} from '@rewind/shared';
import { FileLock } from './file-lock.js';
import { errnoCode, writeFileAtomic } from './fs-utils.js';
import type { RetentionResult } from './types.js';

export const INDEX_FILE_NAME = 'rollback-index.json';
export const INDEX_LOCK_FILE_NAME = 'rollback-index.lock';
const INDEX_VERSION = 1;

const rollbackPointSchema: z.ZodType<RollbackPoint> = z.object({
  id: z.string().min(1),
  timestamp: z.string().datetime({ offset: true }),
  description: z.string(),
  services: z.array(z.string()),
  imageReferences: z.record(z.string(), z.string()),
  configHashes: z.record(z.string(), z.string()),
  volumes: z.array(z.string()),
  metadata: z.record(z.string(), z.union([z.string(), z.number(), z.boolean(), z.null()])),
  createdBy: z.string(),
});

const indexSchema = z.object({
  version: z.literal(INDEX_VERSION),
  lastUpdated: z.string().nullable(),
  rollbackPoints: z.array(rollbackPointSchema),
});

type RollbackIndex = z.infer<typeof indexSchema>;

export interface RollbackRepositoryOptions {
  backupRoot: string;
  lockTimeoutMs?: number;
  staleLockMs?: number;
}

export class RollbackRepository {
  private logger = createChildLogger({ component: 'RollbackRepository' });
  readonly backupRoot: string;
  readonly indexPath: string;
  private readonly indexLock: FileLock;
  private mutationQueue: Promise<void> = Promise.resolve();

  constructor(options: RollbackRepositoryOptions) {
    this.backupRoot = options.backupRoot;
    this.indexPath = join(options.backupRoot, INDEX_FILE_NAME);
    this.indexLock = new FileLock(join(options.backupRoot, INDEX_LOCK_FILE_NAME), {
      timeoutMs: options.lockTimeoutMs ?? 10000,
      staleMs: options.staleLockMs ?? 300000,
    });
  }

  /**
   * Directory holding a point's staged configs and volume archives
   */
  pointDir(rollbackId: string): string {
    return join(this.backupRoot, rollbackId);
  }

  /**
   * Add a point to the index. The index file is replaced atomically; on
   * failure it is left as it was.
   */
  async append(point: RollbackPoint): Promise<void> {
    const parsed = rollbackPointSchema.safeParse(point);
    if (!parsed.success) {
      throw new RepositoryError(`Refusing to store malformed rollback point ${point.id}`, {
        rollbackId: point.id,
        issues: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      });
    }

    await this.mutateIndex(async () => {
      const index = await this.readIndex();
      if (index.rollbackPoints.some((existing) => existing.id === point.id)) {
        throw new RepositoryError(`Rollback point ${point.id} already exists`, {
          rollbackId: point.id,
        });
      }
      index.rollbackPoints.push(parsed.data);
      await this.writeIndex(index);
    });

    this.logger.debug({ rollbackId: point.id }, 'Rollback point appended to index');
  }

  /**
   * All points, newest first. Equal timestamps keep the later insertion first.
   */
  async list(): Promise<RollbackPoint[]> {
    const index = await this.readIndex();
    return orderNewestFirst(index.rollbackPoints);
  }

  async get(rollbackId: string): Promise<RollbackPoint> {
    const index = await this.readIndex();
    const point = index.rollbackPoints.find((entry) => entry.id === rollbackId);
    if (!point) {
      throw new NotFoundError(rollbackId);
    }
    return point;
  }

  /**
   * Whether the id is taken, either by an index entry or by a leftover
   * staging directory from an aborted creation.
   */
  async has(rollbackId: string): Promise<boolean> {
    const index = await this.readIndex();
    if (index.rollbackPoints.some((entry) => entry.id === rollbackId)) {
      return true;
    }
    try {
      await access(this.pointDir(rollbackId));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Remove the index entry and the backing directory.
   * Returns false when the id is unknown.
   */
  async delete(rollbackId: string): Promise<boolean> {
    const removed = await this.mutateIndex(async () => {
      const index = await this.readIndex();
      const position = index.rollbackPoints.findIndex((entry) => entry.id === rollbackId);
      if (position === -1) {
        return false;
      }
      index.rollbackPoints.splice(position, 1);
      await this.writeIndex(index);
      return true;
    });

    if (!removed) {
      return false;
    }

    try {
      await rm(this.pointDir(rollbackId), { recursive: true, force: true });
    } catch (error) {
      throw new RepositoryError(
        `Removed ${rollbackId} from the index but could not delete its directory: ${
          error instanceof Error ? error.message : String(error)
        }`,
        { rollbackId }
      );
    }

    this.logger.info({ rollbackId }, 'Rollback point deleted');
    return true;
  }

  /**
   * Delete the oldest points beyond `maxPoints`. One failed eviction is
   * logged and does not stop the others.
   */
  async enforceRetention(maxPoints: number): Promise<RetentionResult> {
    const ordered = await this.list();
    const excess = ordered.slice(maxPoints).reverse(); // oldest first
    const result: RetentionResult = { evicted: [], failed: [] };

    for (const point of excess) {
      try {
        if (await this.delete(point.id)) {
          result.evicted.push(point.id);
          this.logger.info({ rollbackId: point.id, maxPoints }, 'Evicted rollback point');
        }
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        result.failed.push({ rollbackId: point.id, reason });
        this.logger.warn(
          { event: 'retention_eviction_warning', rollbackId: point.id, reason },
          'Failed to evict old rollback point'
        );
      }
    }

    return result;
  }

  /**
   * Index mutations from this process run one at a time, each under the
   * index lock file shared with other processes
   */
  private mutateIndex<T>(mutation: () => Promise<T>): Promise<T> {
    const run = this.mutationQueue.then(() => this.indexLock.withLock(mutation));
    // The caller observes the failure through `run`; the queue only orders
    this.mutationQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async readIndex(): Promise<RollbackIndex> {
    let raw: string;
    try {
      raw = await readFile(this.indexPath, 'utf8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return { version: INDEX_VERSION, lastUpdated: null, rollbackPoints: [] };
      }
      throw new RepositoryError(
        `Cannot read rollback index ${this.indexPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw new RepositoryError(
        `Rollback index ${this.indexPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const parsed = indexSchema.safeParse(document);
    if (!parsed.success) {
      throw new RepositoryError(`Rollback index ${this.indexPath} is corrupt`, {
        issues: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      });
    }
    return parsed.data;
  }

  private async writeIndex(index: RollbackIndex): Promise<void> {
    const next: RollbackIndex = { ...index, lastUpdated: new Date().toISOString() };
    try {
      await mkdir(this.backupRoot, { recursive: true });
      await writeFileAtomic(this.indexPath, `${JSON.stringify(next, null, 2)}\n`);
    } catch (error) {
      throw new RepositoryError(
        `Cannot write rollback index ${this.indexPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}

function orderNewestFirst(points: RollbackPoint[]): RollbackPoint[] {
  return points
    .map((point, position) => ({ point, position, time: Date.parse(point.timestamp) }))
    .sort((a, b) => b.time - a.time || b.position - a.position)
    .map(({ point }) => point);
}
