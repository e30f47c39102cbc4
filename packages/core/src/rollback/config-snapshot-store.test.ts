/**
 * Config Snapshot Store Tests
 */
import { createHash } from 'node:crypto';
import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ValidationError } from '@rewind/shared';
import { ConfigSnapshotStore } from './config-snapshot-store.js';

const hashOf = (content: string) => createHash('sha256').update(content).digest('hex');

describe('ConfigSnapshotStore', () => {
  let root: string;
  let projectRoot: string;
  let backupRoot: string;
  let store: ConfigSnapshotStore;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'rewind-configs-'));
    projectRoot = join(root, 'project');
    backupRoot = join(root, 'backups');
    await mkdir(join(projectRoot, 'deployment'), { recursive: true });
    await writeFile(join(projectRoot, 'docker-compose.yml'), 'services: {}\n');
    await writeFile(join(projectRoot, 'deployment', 'prometheus.yml'), 'scrape_interval: 15s\n');
    store = new ConfigSnapshotStore({ projectRoot, backupRoot });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('toRelativeKey', () => {
    it('should normalise relative and absolute paths to the same key', () => {
      expect(store.toRelativeKey('deployment/prometheus.yml')).toBe('deployment/prometheus.yml');
      expect(store.toRelativeKey(join(projectRoot, 'deployment', 'prometheus.yml'))).toBe(
        'deployment/prometheus.yml'
      );
    });

    it('should reject paths outside the project root', () => {
      expect(() => store.toRelativeKey('../elsewhere.yml')).toThrow(ValidationError);
    });

    it('should accept in-root names that start with two dots', async () => {
      await writeFile(join(projectRoot, '..env.local'), 'DEBUG=1\n');

      expect(store.toRelativeKey('..env.local')).toBe('..env.local');
      await expect(store.capture('rb-1', ['..env.local'])).resolves.toEqual({
        '..env.local': hashOf('DEBUG=1\n'),
      });
    });
  });

  describe('capture', () => {
    it('should stage existing files and record their hashes', async () => {
      const hashes = await store.capture('rb-1', [
        'docker-compose.yml',
        'deployment/prometheus.yml',
        '.env',
      ]);

      expect(hashes).toEqual({
        'docker-compose.yml': hashOf('services: {}\n'),
        'deployment/prometheus.yml': hashOf('scrape_interval: 15s\n'),
      });
      expect(
        await readFile(join(store.configDir('rb-1'), 'deployment', 'prometheus.yml'), 'utf8')
      ).toBe('scrape_interval: 15s\n');
    });

    it('should stage a file listed twice once', async () => {
      const hashes = await store.capture('rb-1', [
        'docker-compose.yml',
        join(projectRoot, 'docker-compose.yml'),
      ]);

      expect(Object.keys(hashes)).toEqual(['docker-compose.yml']);
    });
  });

  describe('restore', () => {
    it('should bring modified and deleted files back byte for byte', async () => {
      const hashes = await store.capture('rb-1', ['docker-compose.yml', 'deployment/prometheus.yml']);
      await writeFile(join(projectRoot, 'docker-compose.yml'), 'services: { broken: true }\n');
      await rm(join(projectRoot, 'deployment'), { recursive: true });

      const result = await store.restore('rb-1', projectRoot, hashes);

      expect(result).toEqual({
        restored: ['docker-compose.yml', 'deployment/prometheus.yml'],
        failed: [],
      });
      expect(await readFile(join(projectRoot, 'docker-compose.yml'), 'utf8')).toBe('services: {}\n');
      expect(await readFile(join(projectRoot, 'deployment', 'prometheus.yml'), 'utf8')).toBe(
        'scrape_interval: 15s\n'
      );
    });

    it('should reproduce identical content in an empty target directory', async () => {
      const hashes = await store.capture('rb-1', ['docker-compose.yml', 'deployment/prometheus.yml']);
      const emptyTarget = join(root, 'fresh');

      const result = await store.restore('rb-1', emptyTarget, hashes);

      expect(result.failed).toEqual([]);
      await expect(store.diff(hashes, emptyTarget)).resolves.toEqual([
        { path: 'docker-compose.yml', status: 'unchanged' },
        { path: 'deployment/prometheus.yml', status: 'unchanged' },
      ]);
    });

    it('should leave files outside the snapshot alone', async () => {
      const hashes = await store.capture('rb-1', ['docker-compose.yml']);
      await writeFile(join(projectRoot, 'extra.yml'), 'keep me');

      await store.restore('rb-1', projectRoot, hashes);

      expect(await readFile(join(projectRoot, 'extra.yml'), 'utf8')).toBe('keep me');
    });

    it('should report a missing staged copy and keep restoring the rest', async () => {
      const hashes = await store.capture('rb-1', ['docker-compose.yml', 'deployment/prometheus.yml']);
      await rm(join(store.configDir('rb-1'), 'docker-compose.yml'));

      const result = await store.restore('rb-1', projectRoot, hashes);

      expect(result).toEqual({
        restored: ['deployment/prometheus.yml'],
        failed: [{ path: 'docker-compose.yml', reason: 'staged copy missing' }],
      });
    });

    it('should not write a staged copy whose content was tampered with', async () => {
      const hashes = await store.capture('rb-1', ['docker-compose.yml']);
      await writeFile(join(store.configDir('rb-1'), 'docker-compose.yml'), 'tampered');
      await writeFile(join(projectRoot, 'docker-compose.yml'), 'current');

      const result = await store.restore('rb-1', projectRoot, hashes);

      expect(result.failed).toEqual([
        { path: 'docker-compose.yml', reason: 'staged copy does not match recorded hash' },
      ]);
      expect(await readFile(join(projectRoot, 'docker-compose.yml'), 'utf8')).toBe('current');
    });
  });

  describe('diff', () => {
    it('should classify files as unchanged, changed or missing', async () => {
      const hashes = await store.capture('rb-1', ['docker-compose.yml', 'deployment/prometheus.yml']);
      await writeFile(join(projectRoot, 'docker-compose.yml'), 'services: { web: {} }\n');
      await rm(join(projectRoot, 'deployment', 'prometheus.yml'));

      await expect(store.diff(hashes)).resolves.toEqual([
        { path: 'docker-compose.yml', status: 'changed' },
        { path: 'deployment/prometheus.yml', status: 'missing' },
      ]);
      expect(existsSync(join(projectRoot, 'deployment', 'prometheus.yml'))).toBe(false);
    });
  });
});
