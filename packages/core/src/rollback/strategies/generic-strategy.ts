/**
 * Generic service strategy
 * Default for every service without a dedicated definition.
 */

import {
  createChildLogger,
  errorMessage,
  STRATEGY_KINDS,
  type Logger,
  type StepOutcome,
  type StrategyKind,
} from '@rewind/shared';
import { delay, withTimeout } from '../concurrency.js';
import {
  DEFAULT_STRATEGY_TIMINGS,
  type ServiceRollbackStrategy,
  type StrategyContext,
  type StrategyTimings,
} from './types.js';

export class GenericStrategy implements ServiceRollbackStrategy {
  readonly kind: StrategyKind = STRATEGY_KINDS.GENERIC;
  protected readonly logger: Logger;
  protected readonly timings: StrategyTimings;

  constructor(
    readonly service: string,
    timings: Partial<StrategyTimings> = {}
  ) {
    this.timings = { ...DEFAULT_STRATEGY_TIMINGS, ...timings };
    this.logger = createChildLogger({ component: 'ServiceStrategy', service });
  }

  async preRollback(_context: StrategyContext): Promise<StepOutcome> {
    return { status: 'skipped' };
  }

  async rollback(context: StrategyContext): Promise<StepOutcome> {
    const failures: string[] = [];

    const stopped = await this.runtimeCall(context, 'stop', () => context.runtime.stop(this.service));
    if (stopped !== true) failures.push(`stop: ${stopped || 'runtime reported failure'}`);

    if (context.targetImage) {
      const image = context.targetImage;
      const restored = await this.runtimeCall(context, 'restore image', () =>
        context.runtime.restoreImage(this.service, image)
      );
      if (restored !== true) failures.push(`restore image: ${restored || 'runtime reported failure'}`);
    }

    // Always attempt the start so the service is not left down
    const started = await this.runtimeCall(context, 'start', () => context.runtime.start(this.service));
    if (started !== true) failures.push(`start: ${started || 'runtime reported failure'}`);

    return failures.length === 0
      ? { status: 'succeeded' }
      : { status: 'failed', message: failures.join('; ') };
  }

  async postRollback(_context: StrategyContext): Promise<StepOutcome> {
    return { status: 'skipped' };
  }

  /**
   * Poll the runtime until the container reports running
   */
  async verifyHealth(context: StrategyContext): Promise<boolean> {
    return this.waitForRunning(context, this.healthTimeoutMs());
  }

  protected healthTimeoutMs(): number {
    return this.timings.healthTimeoutMs;
  }

  protected async waitForRunning(context: StrategyContext, timeoutMs: number): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      try {
        const running = await withTimeout(
          context.runtime.isRunning(this.service),
          Math.max(1, Math.min(context.operationTimeoutMs, deadline - Date.now())),
          `is-running ${this.service}`
        );
        if (running) return true;
      } catch (error) {
        this.logger.debug({ error: errorMessage(error) }, 'Running-state probe failed');
      }

      if (Date.now() + this.timings.pollIntervalMs >= deadline) {
        this.logger.warn({ timeoutMs }, 'Service did not report running in time');
        return false;
      }
      await delay(this.timings.pollIntervalMs);
    }
  }

  /**
   * Bounded runtime call. Resolves true on success, otherwise a reason
   * string ('' when the runtime returned false).
   */
  protected async runtimeCall(
    context: StrategyContext,
    operation: string,
    call: () => Promise<boolean>
  ): Promise<true | string> {
    try {
      const ok = await withTimeout(call(), context.operationTimeoutMs, `${operation} ${this.service}`);
      return ok ? true : '';
    } catch (error) {
      return errorMessage(error);
    }
  }
}
