/**
 * Stateful cache strategy
 * Asks an in-memory store to persist its data before it is stopped. This is
 * a flush of in-flight writes, not a rollback of the store's data.
 */

import {
  errorMessage,
  STRATEGY_KINDS,
  type StatefulCacheStrategyDefinition,
  type StepOutcome,
  type StrategyKind,
} from '@rewind/shared';
import { withTimeout } from '../concurrency.js';
import { GenericStrategy } from './generic-strategy.js';
import type { StrategyContext, StrategyTimings } from './types.js';

export class StatefulCacheStrategy extends GenericStrategy {
  override readonly kind: StrategyKind = STRATEGY_KINDS.STATEFUL_CACHE;

  constructor(
    service: string,
    private readonly definition: StatefulCacheStrategyDefinition,
    timings: Partial<StrategyTimings> = {}
  ) {
    super(service, timings);
  }

  override async preRollback(context: StrategyContext): Promise<StepOutcome> {
    const exec = context.runtime.exec?.bind(context.runtime);
    if (!exec) {
      return { status: 'skipped', message: `${context.runtime.name} cannot exec into containers` };
    }

    try {
      const result = await withTimeout(
        exec(this.service, this.definition.persistCommand),
        context.operationTimeoutMs,
        `persist ${this.service}`
      );
      if (result.exitCode !== 0) {
        this.logger.warn({ exitCode: result.exitCode, stderr: result.stderr }, 'Persist command failed');
        return {
          status: 'failed',
          message: `persist command exited ${result.exitCode}${result.stderr ? `: ${result.stderr.trim()}` : ''}`,
        };
      }
      this.logger.info({ command: this.definition.persistCommand }, 'Store data persisted before stop');
      return { status: 'succeeded' };
    } catch (error) {
      return { status: 'failed', message: errorMessage(error) };
    }
  }

  /**
   * Container running, and the optional liveness command answering as expected
   */
  override async verifyHealth(context: StrategyContext): Promise<boolean> {
    if (!(await super.verifyHealth(context))) {
      return false;
    }

    const healthCommand = this.definition.healthCommand;
    const exec = context.runtime.exec?.bind(context.runtime);
    if (!healthCommand || !exec) {
      return true;
    }

    try {
      const result = await withTimeout(
        exec(this.service, healthCommand),
        context.operationTimeoutMs,
        `health ${this.service}`
      );
      const expected = this.definition.healthExpect;
      return result.exitCode === 0 && (expected === undefined || result.stdout.includes(expected));
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Health command failed');
      return false;
    }
  }

  protected override healthTimeoutMs(): number {
    return this.definition.healthTimeoutMs ?? this.timings.healthTimeoutMs;
  }
}
