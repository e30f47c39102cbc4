/**
 * Service rollback strategy contract
 */

import type { RuntimeAdapter, StepOutcome, StrategyKind } from '@rewind/shared';

export interface StrategyContext {
  runtime: RuntimeAdapter;
  rollbackId: string;
  /** Image recorded for the service in the rollback point */
  targetImage: string | null;
  /** Bound applied to each runtime call */
  operationTimeoutMs: number;
}

export interface StrategyTimings {
  /** Health verification window for the generic running-state poll */
  healthTimeoutMs: number;
  /** Readiness window for HTTP-backed services */
  httpHealthTimeoutMs: number;
  pollIntervalMs: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  requestTimeoutMs: number;
}

export const DEFAULT_STRATEGY_TIMINGS: StrategyTimings = {
  healthTimeoutMs: 10000,
  httpHealthTimeoutMs: 30000,
  pollIntervalMs: 500,
  initialBackoffMs: 250,
  maxBackoffMs: 4000,
  requestTimeoutMs: 5000,
};

export interface ServiceRollbackStrategy {
  readonly kind: StrategyKind;
  readonly service: string;

  /** Runs before the service is stopped */
  preRollback(context: StrategyContext): Promise<StepOutcome>;

  /** Stop, pin image, start; used when rolling back this service alone */
  rollback(context: StrategyContext): Promise<StepOutcome>;

  /** Runs after the service has been started */
  postRollback(context: StrategyContext): Promise<StepOutcome>;

  /** Never throws; false when the service is not healthy in time */
  verifyHealth(context: StrategyContext): Promise<boolean>;
}
