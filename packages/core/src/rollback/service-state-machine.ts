/**
 * Per-service rollback state machine
 *
 * PENDING -> PRE_HOOK -> STOPPED -> IMAGE_RESTORED -> CONFIG_RESTORED
 *         -> STARTED -> HEALTH_CHECKING -> HEALTHY | UNHEALTHY
 *
 * A failed step leaves the state where it is and later steps may still move
 * it forward; UNHEALTHY can be entered from any non-terminal state.
 */

import {
  InvalidTransitionError,
  SERVICE_ROLLBACK_STATES,
  type ServiceRollbackResult,
  type ServiceRollbackState,
  type ServiceStepRecord,
  type StepOutcome,
} from '@rewind/shared';

const STATE_ORDER: readonly ServiceRollbackState[] = [
  SERVICE_ROLLBACK_STATES.PENDING,
  SERVICE_ROLLBACK_STATES.PRE_HOOK,
  SERVICE_ROLLBACK_STATES.STOPPED,
  SERVICE_ROLLBACK_STATES.IMAGE_RESTORED,
  SERVICE_ROLLBACK_STATES.CONFIG_RESTORED,
  SERVICE_ROLLBACK_STATES.STARTED,
  SERVICE_ROLLBACK_STATES.HEALTH_CHECKING,
  SERVICE_ROLLBACK_STATES.HEALTHY,
];

// Hook failures are recorded but do not decide the service's outcome;
// the health check does
const ADVISORY_OPERATIONS: ReadonlySet<ServiceStepRecord['operation']> = new Set<
  ServiceStepRecord['operation']
>([
  'pre_rollback',
  'post_rollback',
]);

export function isTerminalState(state: ServiceRollbackState): boolean {
  return state === SERVICE_ROLLBACK_STATES.HEALTHY || state === SERVICE_ROLLBACK_STATES.UNHEALTHY;
}

export function isValidTransition(from: ServiceRollbackState, to: ServiceRollbackState): boolean {
  if (isTerminalState(from)) return false;
  if (to === SERVICE_ROLLBACK_STATES.UNHEALTHY) return true;
  if (to === SERVICE_ROLLBACK_STATES.HEALTHY) {
    return from === SERVICE_ROLLBACK_STATES.HEALTH_CHECKING;
  }
  return STATE_ORDER.indexOf(to) > STATE_ORDER.indexOf(from);
}

export type TransitionListener = (
  service: string,
  from: ServiceRollbackState,
  to: ServiceRollbackState
) => void;

/**
 * Tracks one service through a restore: its state plus every step attempted.
 */
export class ServiceRollbackRun {
  private currentState: ServiceRollbackState = SERVICE_ROLLBACK_STATES.PENDING;
  private readonly steps: ServiceStepRecord[] = [];

  constructor(
    readonly service: string,
    private readonly onTransition?: TransitionListener
  ) {}

  get state(): ServiceRollbackState {
    return this.currentState;
  }

  transition(to: ServiceRollbackState): void {
    const from = this.currentState;
    if (!isValidTransition(from, to)) {
      throw new InvalidTransitionError(from, to, { service: this.service });
    }
    this.currentState = to;
    this.onTransition?.(this.service, from, to);
  }

  /**
   * Record a step and, unless it failed, advance to `onSuccess`
   */
  record(
    operation: ServiceStepRecord['operation'],
    outcome: StepOutcome,
    durationMs: number,
    onSuccess?: ServiceRollbackState
  ): void {
    this.steps.push({ operation, durationMs, ...outcome });
    if (outcome.status !== 'failed' && onSuccess && isValidTransition(this.currentState, onSuccess)) {
      this.transition(onSuccess);
    }
  }

  hasFailed(operation: ServiceStepRecord['operation']): boolean {
    return this.steps.some((step) => step.operation === operation && step.status === 'failed');
  }

  toResult(): ServiceRollbackResult {
    const healthVerified = this.currentState === SERVICE_ROLLBACK_STATES.HEALTHY;
    const firstFailure = this.steps.find(
      (step) => step.status === 'failed' && !ADVISORY_OPERATIONS.has(step.operation)
    );
    const succeeded = healthVerified && !firstFailure;

    let reason: string | undefined;
    if (firstFailure) {
      reason = `${firstFailure.operation} failed${firstFailure.message ? `: ${firstFailure.message}` : ''}`;
    } else if (!healthVerified) {
      reason = 'health check did not pass';
    }

    return {
      service: this.service,
      succeeded,
      ...(reason !== undefined && { reason }),
      healthVerified,
      finalState: this.currentState,
      steps: [...this.steps],
    };
  }
}
