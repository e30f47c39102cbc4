/**
 * Rollback Manager Types
 */

import type {
  MetadataValue,
  RollbackPoint,
  RollbackReport,
  RuntimeAdapter,
  ServiceRollbackState,
  StrategyDefinition,
} from '@rewind/shared';
import type { StrategyTimings } from './strategies/types.js';

// ===========================================
// Rollback Manager Config
// ===========================================

export interface RollbackManagerConfig {
  /** Directory holding the index and one directory per rollback point */
  backupRoot: string;
  /** Root that config paths are relative to and restored into */
  projectRoot: string;
  maxRollbackPoints: number;
  configFiles: string[];
  /** Only volumes whose name contains this are archived */
  volumeFilter?: string;
  /** Bound on every runtime call */
  operationTimeoutMs: number;
  /** Service operations in flight per phase */
  concurrency: number;
  lockTimeoutMs: number;
  staleLockMs: number;
  strategies: Record<string, StrategyDefinition>;
  timings: Partial<StrategyTimings>;
}

export const DEFAULT_ROLLBACK_MANAGER_CONFIG: RollbackManagerConfig = {
  backupRoot: 'rollback/backups',
  projectRoot: '.',
  maxRollbackPoints: 10,
  configFiles: ['docker-compose.yml', 'docker-compose.enterprise.yml', '.env', 'deployment/prometheus.yml'],
  operationTimeoutMs: 60000,
  concurrency: 4,
  lockTimeoutMs: 10000,
  staleLockMs: 300000, // 5 minutes
  strategies: {},
  timings: {},
};

export interface RollbackManagerDependencies {
  runtime: RuntimeAdapter;
  /** Clock for rollback point timestamps */
  now?: () => Date;
  idGenerator?: () => string;
  /** Extra capture metadata (revision, hostname) */
  metadataProvider?: (projectRoot: string) => Promise<Record<string, MetadataValue>>;
}

export interface RollbackOptions {
  dryRun?: boolean;
}

export interface RetentionResult {
  evicted: string[];
  failed: Array<{ rollbackId: string; reason: string }>;
}

// ===========================================
// Rollback Manager Events
// ===========================================

export type RollbackPhase = 'stop' | 'configs' | 'images' | 'volumes' | 'start' | 'verify';

export interface RollbackManagerEvents {
  'point:created': (point: RollbackPoint) => void;
  'point:deleted': (rollbackId: string) => void;
  'retention:evicted': (rollbackId: string) => void;
  'retention:failed': (rollbackId: string, reason: string) => void;
  'rollback:started': (point: RollbackPoint) => void;
  'rollback:phase': (rollbackId: string, phase: RollbackPhase) => void;
  'service:transition': (
    rollbackId: string,
    service: string,
    from: ServiceRollbackState,
    to: ServiceRollbackState
  ) => void;
  'rollback:completed': (report: RollbackReport) => void;
}
