/**
 * Config-reload strategy
 * For services that re-read configuration on a signal (e.g. a metrics
 * collector on SIGHUP). Reloads instead of restarting where it can and
 * falls back to a stop/start when the signal cannot be delivered.
 */

import {
  errorMessage,
  STRATEGY_KINDS,
  type ConfigReloadStrategyDefinition,
  type StepOutcome,
  type StrategyKind,
} from '@rewind/shared';
import { withTimeout } from '../concurrency.js';
import { GenericStrategy } from './generic-strategy.js';
import { checkHttpHealth } from './http-health.js';
import type { StrategyContext, StrategyTimings } from './types.js';

const DEFAULT_RELOAD_SIGNAL = 'SIGHUP';

export class ConfigReloadStrategy extends GenericStrategy {
  override readonly kind: StrategyKind = STRATEGY_KINDS.CONFIG_RELOAD;

  constructor(
    service: string,
    private readonly definition: ConfigReloadStrategyDefinition,
    timings: Partial<StrategyTimings> = {}
  ) {
    super(service, timings);
  }

  /**
   * When the recorded image is already running only the config changed,
   * so a reload is enough
   */
  override async rollback(context: StrategyContext): Promise<StepOutcome> {
    if (context.targetImage) {
      try {
        const current = await withTimeout(
          context.runtime.getImage(this.service),
          context.operationTimeoutMs,
          `get image ${this.service}`
        );
        if (current === context.targetImage) {
          return this.reloadOrRestart(context);
        }
      } catch (error) {
        this.logger.debug({ error: errorMessage(error) }, 'Could not read current image, doing full rollback');
      }
    }
    return super.rollback(context);
  }

  override async postRollback(context: StrategyContext): Promise<StepOutcome> {
    return this.reloadOrRestart(context);
  }

  override async verifyHealth(context: StrategyContext): Promise<boolean> {
    if (this.definition.healthUrl) {
      return checkHttpHealth(this.definition.healthUrl, this.timings.requestTimeoutMs);
    }
    return super.verifyHealth(context);
  }

  protected override healthTimeoutMs(): number {
    return this.definition.healthTimeoutMs ?? this.timings.healthTimeoutMs;
  }

  private async reloadOrRestart(context: StrategyContext): Promise<StepOutcome> {
    const signalName = this.definition.reloadSignal ?? DEFAULT_RELOAD_SIGNAL;
    const signal = context.runtime.signal?.bind(context.runtime);

    if (signal) {
      const reloaded = await this.runtimeCall(context, 'reload', () => signal(this.service, signalName));
      if (reloaded === true) {
        this.logger.info({ signal: signalName }, 'Configuration reloaded');
        return { status: 'succeeded', message: `reloaded with ${signalName}` };
      }
      this.logger.warn({ signal: signalName, reason: reloaded }, 'Reload failed, restarting instead');
    }

    const stopped = await this.runtimeCall(context, 'stop', () => context.runtime.stop(this.service));
    const started = await this.runtimeCall(context, 'start', () => context.runtime.start(this.service));
    if (started !== true) {
      return { status: 'failed', message: `restart failed: ${started || 'runtime reported failure'}` };
    }
    return {
      status: 'succeeded',
      message: stopped === true ? 'restarted (reload unavailable)' : 'started (stop failed, reload unavailable)',
    };
  }
}
