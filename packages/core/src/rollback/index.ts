/**
 * Rollback Layer
 * Rollback point capture, storage and restore
 */

export * from './types.js';
export {
  RollbackManager,
  createRollbackManagerFromConfig,
  OPERATION_LOCK_FILE_NAME,
} from './rollback-manager.js';
export {
  RollbackRepository,
  INDEX_FILE_NAME,
  INDEX_LOCK_FILE_NAME,
} from './rollback-repository.js';
export type { RollbackRepositoryOptions } from './rollback-repository.js';
export { ConfigSnapshotStore } from './config-snapshot-store.js';
export type { ConfigSnapshotStoreOptions } from './config-snapshot-store.js';
export { VolumeArchiver } from './volume-archiver.js';
export type { VolumeArchiverOptions } from './volume-archiver.js';
export { FileLock } from './file-lock.js';
export type { FileLockOptions } from './file-lock.js';
export {
  ServiceRollbackRun,
  isValidTransition,
  isTerminalState,
} from './service-state-machine.js';
export type { TransitionListener } from './service-state-machine.js';
export { collectCaptureMetadata, getGitCommit } from './capture-metadata.js';
export { mapWithConcurrency, withTimeout } from './concurrency.js';
export * from './strategies/index.js';
