/**
 * Volume Archiver
 * Exports named volumes to compressed archives inside a rollback point and
 * imports them back. Performs no confirmation; callers gate restore().
 */

import { access, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import {
  createChildLogger,
  CreationError,
  type RuntimeAdapter,
  type VolumeRestoreResult,
} from '@rewind/shared';
import { withTimeout } from './concurrency.js';

// Docker volume name rules
const VOLUME_NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;

export interface VolumeArchiverOptions {
  backupRoot: string;
  runtime: RuntimeAdapter;
  timeoutMs: number;
}

export class VolumeArchiver {
  private logger = createChildLogger({ component: 'VolumeArchiver' });

  constructor(private readonly options: VolumeArchiverOptions) {}

  volumeDir(rollbackId: string): string {
    return join(this.options.backupRoot, rollbackId, 'volumes');
  }

  archivePath(rollbackId: string, volume: string): string {
    return join(this.volumeDir(rollbackId), `${volume}.tar.gz`);
  }

  /**
   * Archive every volume. Any failure aborts with CreationError: a partial
   * volume backup is not usable.
   */
  async backup(rollbackId: string, volumes: string[]): Promise<string[]> {
    await mkdir(this.volumeDir(rollbackId), { recursive: true });
    const archived: string[] = [];

    for (const volume of volumes) {
      if (!VOLUME_NAME_PATTERN.test(volume)) {
        throw new CreationError(`Invalid volume name '${volume}'`, { rollbackId });
      }

      const archive = this.archivePath(rollbackId, volume);
      let exported: boolean;
      try {
        exported = await withTimeout(
          this.options.runtime.exportVolume(volume, archive),
          this.options.timeoutMs,
          `export volume ${volume}`
        );
      } catch (error) {
        throw new CreationError(
          `Volume export failed for ${volume}: ${error instanceof Error ? error.message : String(error)}`,
          { rollbackId, volume, archived }
        );
      }

      if (!exported) {
        throw new CreationError(`Volume export failed for ${volume}`, {
          rollbackId,
          volume,
          archived,
        });
      }

      try {
        await access(archive);
      } catch {
        throw new CreationError(`Volume export for ${volume} produced no archive`, {
          rollbackId,
          volume,
          archived,
        });
      }

      archived.push(volume);
      this.logger.info({ rollbackId, volume }, 'Volume archived');
    }

    return archived;
  }

  /**
   * Replace each volume's contents with its archive. Destructive.
   * One volume's failure is reported and does not stop the rest.
   */
  async restore(rollbackId: string, volumes: string[]): Promise<VolumeRestoreResult[]> {
    const results: VolumeRestoreResult[] = [];

    for (const volume of volumes) {
      const archive = this.archivePath(rollbackId, volume);
      try {
        await access(archive);
      } catch {
        results.push({ volume, succeeded: false, reason: 'archive missing' });
        continue;
      }

      try {
        const imported = await withTimeout(
          this.options.runtime.importVolume(volume, archive),
          this.options.timeoutMs,
          `import volume ${volume}`
        );
        results.push(
          imported ? { volume, succeeded: true } : { volume, succeeded: false, reason: 'import failed' }
        );
      } catch (error) {
        results.push({
          volume,
          succeeded: false,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }

    const failed = results.filter((r) => !r.succeeded);
    if (failed.length > 0) {
      this.logger.warn({ rollbackId, failed }, 'Some volumes were not restored');
    }
    return results;
  }
}
