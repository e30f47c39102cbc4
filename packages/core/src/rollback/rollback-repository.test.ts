/**
 * Rollback Repository Tests
 */
import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { NotFoundError, RepositoryError, type RollbackPoint } from '@rewind/shared';
import { FileLock } from './file-lock.js';
import { INDEX_FILE_NAME, RollbackRepository } from './rollback-repository.js';

function makePoint(id: string, timestamp: string, overrides: Partial<RollbackPoint> = {}): RollbackPoint {
  return {
    id,
    timestamp,
    description: `point ${id}`,
    services: ['api'],
    imageReferences: { api: 'shop/api:v1' },
    configHashes: {},
    volumes: [],
    metadata: {},
    createdBy: 'tester',
    ...overrides,
  };
}

describe('RollbackRepository', () => {
  let backupRoot: string;
  let repository: RollbackRepository;

  beforeEach(async () => {
    backupRoot = await mkdtemp(join(tmpdir(), 'rewind-repo-'));
    repository = new RollbackRepository({ backupRoot, lockTimeoutMs: 500 });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(backupRoot, { recursive: true, force: true });
  });

  describe('reading', () => {
    it('should treat a missing index as empty', async () => {
      await expect(repository.list()).resolves.toEqual([]);
    });

    it('should throw NotFoundError for an unknown id', async () => {
      await expect(repository.get('rb-000000000000')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should reject an index that is not JSON', async () => {
      await writeFile(join(backupRoot, INDEX_FILE_NAME), '{ not json');

      await expect(repository.list()).rejects.toBeInstanceOf(RepositoryError);
    });

    it('should reject an index with the wrong shape', async () => {
      await writeFile(
        join(backupRoot, INDEX_FILE_NAME),
        JSON.stringify({ version: 1, lastUpdated: null, rollbackPoints: [{ id: 'rb-1' }] })
      );

      await expect(repository.list()).rejects.toThrow(/is corrupt$/);
    });
  });

  describe('append', () => {
    it('should persist the point in a versioned index', async () => {
      const point = makePoint('rb-aaaaaaaaaaaa', '2024-05-01T10:00:00.000Z');

      await repository.append(point);

      const index = JSON.parse(await readFile(join(backupRoot, INDEX_FILE_NAME), 'utf8'));
      expect(index.version).toBe(1);
      expect(typeof index.lastUpdated).toBe('string');
      expect(index.rollbackPoints).toEqual([point]);
      await expect(repository.get('rb-aaaaaaaaaaaa')).resolves.toEqual(point);
    });

    it('should reject a duplicate id', async () => {
      const point = makePoint('rb-aaaaaaaaaaaa', '2024-05-01T10:00:00.000Z');
      await repository.append(point);

      await expect(repository.append(point)).rejects.toThrow('Rollback point rb-aaaaaaaaaaaa already exists');
    });

    it('should refuse a malformed point and leave no index behind', async () => {
      const point = makePoint('rb-bad', 'yesterday');

      await expect(repository.append(point)).rejects.toBeInstanceOf(RepositoryError);
      expect(existsSync(join(backupRoot, INDEX_FILE_NAME))).toBe(false);
    });

    it('should leave no temp files after writing', async () => {
      await repository.append(makePoint('rb-aaaaaaaaaaaa', '2024-05-01T10:00:00.000Z'));

      const leftovers = existsSync(join(backupRoot, `${INDEX_FILE_NAME}.${process.pid}.tmp`));
      expect(leftovers).toBe(false);
    });
  });

  describe('list', () => {
    it('should order points newest first', async () => {
      await repository.append(makePoint('rb-a', '2024-05-01T10:00:00.000Z'));
      await repository.append(makePoint('rb-c', '2024-05-03T10:00:00.000Z'));
      await repository.append(makePoint('rb-b', '2024-05-02T10:00:00.000Z'));

      const ids = (await repository.list()).map((point) => point.id);

      expect(ids).toEqual(['rb-c', 'rb-b', 'rb-a']);
    });

    it('should put the later insertion first on equal timestamps', async () => {
      await repository.append(makePoint('rb-first', '2024-05-01T10:00:00.000Z'));
      await repository.append(makePoint('rb-second', '2024-05-01T10:00:00.000Z'));

      const ids = (await repository.list()).map((point) => point.id);

      expect(ids).toEqual(['rb-second', 'rb-first']);
    });
  });

  describe('has', () => {
    it('should report ids in the index and leftover directories', async () => {
      await repository.append(makePoint('rb-indexed', '2024-05-01T10:00:00.000Z'));
      await mkdir(repository.pointDir('rb-staged'), { recursive: true });

      expect(await repository.has('rb-indexed')).toBe(true);
      expect(await repository.has('rb-staged')).toBe(true);
      expect(await repository.has('rb-free')).toBe(false);
    });
  });

  describe('delete', () => {
    it('should remove the entry and its directory', async () => {
      await repository.append(makePoint('rb-a', '2024-05-01T10:00:00.000Z'));
      await mkdir(join(repository.pointDir('rb-a'), 'configs'), { recursive: true });

      await expect(repository.delete('rb-a')).resolves.toBe(true);

      await expect(repository.list()).resolves.toEqual([]);
      expect(existsSync(repository.pointDir('rb-a'))).toBe(false);
    });

    it('should return false for an unknown id, also on a repeated delete', async () => {
      await repository.append(makePoint('rb-a', '2024-05-01T10:00:00.000Z'));
      await repository.delete('rb-a');

      await expect(repository.delete('rb-a')).resolves.toBe(false);
      await expect(repository.delete('rb-never')).resolves.toBe(false);
    });

    it('should wait for an append already holding the index lock', async () => {
      await repository.append(makePoint('rb-a', '2024-05-01T10:00:00.000Z'));
      const realAcquire = FileLock.prototype.acquire;
      let overlapping: Promise<boolean> | undefined;
      vi.spyOn(FileLock.prototype, 'acquire').mockImplementation(async function (this: FileLock) {
        await realAcquire.call(this);
        if (!overlapping) overlapping = repository.delete('rb-a');
      });

      await repository.append(makePoint('rb-b', '2024-05-02T10:00:00.000Z'));

      await expect(overlapping).resolves.toBe(true);
      expect((await repository.list()).map((point) => point.id)).toEqual(['rb-b']);
    });
  });

  describe('enforceRetention', () => {
    it('should evict the oldest points beyond the limit', async () => {
      await repository.append(makePoint('rb-a', '2024-05-01T10:00:00.000Z'));
      await repository.append(makePoint('rb-b', '2024-05-02T10:00:00.000Z'));
      await repository.append(makePoint('rb-c', '2024-05-03T10:00:00.000Z'));
      await mkdir(repository.pointDir('rb-a'), { recursive: true });

      const result = await repository.enforceRetention(2);

      expect(result).toEqual({ evicted: ['rb-a'], failed: [] });
      expect((await repository.list()).map((point) => point.id)).toEqual(['rb-c', 'rb-b']);
      expect(existsSync(repository.pointDir('rb-a'))).toBe(false);
    });

    it('should do nothing within the limit', async () => {
      await repository.append(makePoint('rb-a', '2024-05-01T10:00:00.000Z'));

      await expect(repository.enforceRetention(2)).resolves.toEqual({ evicted: [], failed: [] });
    });

    it('should keep evicting after one eviction fails', async () => {
      await repository.append(makePoint('rb-a', '2024-05-01T10:00:00.000Z'));
      await repository.append(makePoint('rb-b', '2024-05-02T10:00:00.000Z'));
      await repository.append(makePoint('rb-c', '2024-05-03T10:00:00.000Z'));
      await repository.append(makePoint('rb-d', '2024-05-04T10:00:00.000Z'));
      const realDelete = repository.delete.bind(repository);
      vi.spyOn(repository, 'delete').mockImplementation(async (rollbackId: string) => {
        if (rollbackId === 'rb-a') throw new Error('disk busy');
        return realDelete(rollbackId);
      });

      const result = await repository.enforceRetention(2);

      expect(result).toEqual({
        evicted: ['rb-b'],
        failed: [{ rollbackId: 'rb-a', reason: 'disk busy' }],
      });
      expect((await repository.list()).map((point) => point.id)).toEqual(['rb-d', 'rb-c', 'rb-a']);
    });
  });
});
