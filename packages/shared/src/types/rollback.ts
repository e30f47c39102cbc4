/**
 * Rollback point and rollback result types
 */

export type MetadataValue = string | number | boolean | null;

/**
 * Point-in-time record of a deployment. Immutable once written to the index.
 */
export interface RollbackPoint {
  /** `rb-` followed by 12 hex characters */
  id: string;
  /** UTC ISO-8601 creation time */
  timestamp: string;
  description: string;
  /** Services covered, in capture order */
  services: string[];
  /** service -> image reference running at capture time */
  imageReferences: Record<string, string>;
  /** relative config path (POSIX separators) -> sha256 of its content */
  configHashes: Record<string, string>;
  /** Archived volume names; empty unless volumes were requested */
  volumes: string[];
  /** Informational only, never read by restore logic */
  metadata: Record<string, MetadataValue>;
  createdBy: string;
}

export interface CreateRollbackPointOptions {
  services?: string[];
  includeVolumes?: boolean;
  createdBy?: string;
}

export const DEFAULT_ROLLBACK_DESCRIPTION = 'Manual rollback point';

/**
 * Per-service lifecycle during a restore
 */
export const SERVICE_ROLLBACK_STATES = {
  PENDING: 'PENDING',
  PRE_HOOK: 'PRE_HOOK',
  STOPPED: 'STOPPED',
  IMAGE_RESTORED: 'IMAGE_RESTORED',
  CONFIG_RESTORED: 'CONFIG_RESTORED',
  STARTED: 'STARTED',
  HEALTH_CHECKING: 'HEALTH_CHECKING',
  HEALTHY: 'HEALTHY',
  UNHEALTHY: 'UNHEALTHY',
} as const;

export type ServiceRollbackState =
  (typeof SERVICE_ROLLBACK_STATES)[keyof typeof SERVICE_ROLLBACK_STATES];

export type StepStatus = 'succeeded' | 'failed' | 'skipped';

export interface StepOutcome {
  status: StepStatus;
  message?: string;
}

export interface ServiceStepRecord extends StepOutcome {
  operation:
    | 'pre_rollback'
    | 'stop'
    | 'restore_image'
    | 'rollback'
    | 'start'
    | 'post_rollback'
    | 'verify_health';
  durationMs: number;
}

/**
 * Outcome of restoring one service. Not persisted.
 */
export interface ServiceRollbackResult {
  service: string;
  succeeded: boolean;
  reason?: string;
  healthVerified: boolean;
  finalState: ServiceRollbackState;
  steps: ServiceStepRecord[];
}

export type ConfigFileStatus = 'changed' | 'unchanged' | 'missing';

export interface ServicePlanEntry {
  service: string;
  targetImage: string | null;
  strategy: string;
  configsChanged: boolean;
  volumesIncluded: boolean;
}

export interface RollbackPlan {
  rollbackId: string;
  description: string;
  timestamp: string;
  services: ServicePlanEntry[];
  configs: Array<{ path: string; status: ConfigFileStatus }>;
  volumes: string[];
}

export interface ConfigRestoreResult {
  restored: string[];
  failed: Array<{ path: string; reason: string }>;
}

export interface VolumeRestoreResult {
  volume: string;
  succeeded: boolean;
  reason?: string;
}

export interface RollbackReport {
  rollbackId: string;
  success: boolean;
  dryRun: boolean;
  plan: RollbackPlan;
  services: ServiceRollbackResult[];
  configResult?: ConfigRestoreResult;
  volumeResults: VolumeRestoreResult[];
  startedAt: string;
  durationMs: number;
}
