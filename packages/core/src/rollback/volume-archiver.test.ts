/**
 * Volume Archiver Tests
 */
import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CreationError } from '@rewind/shared';
import { createFakeRuntime, type FakeRuntime } from './__tests__/fake-runtime.js';
import { VolumeArchiver } from './volume-archiver.js';

describe('VolumeArchiver', () => {
  let backupRoot: string;
  let fake: FakeRuntime;
  let archiver: VolumeArchiver;

  beforeEach(async () => {
    backupRoot = await mkdtemp(join(tmpdir(), 'rewind-volumes-'));
    fake = createFakeRuntime({ db: { image: 'postgres:16', running: true, volumes: ['shop_pgdata'] } });
    archiver = new VolumeArchiver({ backupRoot, runtime: fake.runtime, timeoutMs: 1000 });
  });

  afterEach(async () => {
    await rm(backupRoot, { recursive: true, force: true });
  });

  describe('backup', () => {
    it('should export each volume to an archive inside the point', async () => {
      const archived = await archiver.backup('rb-1', ['shop_pgdata', 'shop_cache']);

      expect(archived).toEqual(['shop_pgdata', 'shop_cache']);
      expect(archiver.archivePath('rb-1', 'shop_pgdata')).toBe(
        join(backupRoot, 'rb-1', 'volumes', 'shop_pgdata.tar.gz')
      );
      expect(await readFile(archiver.archivePath('rb-1', 'shop_cache'), 'utf8')).toBe(
        'archive of shop_cache'
      );
    });

    it('should fail the whole backup when one export fails', async () => {
      fake.runtime.exportVolume.mockResolvedValueOnce(false);

      await expect(archiver.backup('rb-1', ['shop_pgdata', 'shop_cache'])).rejects.toThrow(
        'Volume export failed for shop_pgdata'
      );
      expect(fake.runtime.exportVolume).toHaveBeenCalledTimes(1);
    });

    it('should fail when the export reports success but wrote nothing', async () => {
      fake.runtime.exportVolume.mockResolvedValueOnce(true);

      await expect(archiver.backup('rb-1', ['shop_pgdata'])).rejects.toThrow(
        'Volume export for shop_pgdata produced no archive'
      );
    });

    it('should reject volume names that are not docker names', async () => {
      await expect(archiver.backup('rb-1', ['../escape'])).rejects.toBeInstanceOf(CreationError);
      expect(fake.runtime.exportVolume).not.toHaveBeenCalled();
    });
  });

  describe('restore', () => {
    it('should import every archived volume', async () => {
      await archiver.backup('rb-1', ['shop_pgdata']);

      const results = await archiver.restore('rb-1', ['shop_pgdata']);

      expect(results).toEqual([{ volume: 'shop_pgdata', succeeded: true }]);
      expect(fake.runtime.importVolume).toHaveBeenCalledWith(
        'shop_pgdata',
        archiver.archivePath('rb-1', 'shop_pgdata')
      );
    });

    it('should report missing archives and failed imports without stopping', async () => {
      await archiver.backup('rb-1', ['shop_pgdata', 'shop_cache']);
      await rm(archiver.archivePath('rb-1', 'shop_pgdata'));
      fake.runtime.importVolume.mockRejectedValueOnce(new Error('volume in use'));

      const results = await archiver.restore('rb-1', ['shop_pgdata', 'shop_cache', 'shop_logs']);

      expect(results).toEqual([
        { volume: 'shop_pgdata', succeeded: false, reason: 'archive missing' },
        { volume: 'shop_cache', succeeded: false, reason: 'volume in use' },
        { volume: 'shop_logs', succeeded: false, reason: 'archive missing' },
      ]);
      expect(existsSync(archiver.archivePath('rb-1', 'shop_cache'))).toBe(true);
    });
  });
});
