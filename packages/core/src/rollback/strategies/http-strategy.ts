/**
 * HTTP-backed service strategy
 * Waits for the service's health endpoint after start and re-checks it to
 * verify.
 */

import {
  STRATEGY_KINDS,
  type HttpStrategyDefinition,
  type StepOutcome,
  type StrategyKind,
} from '@rewind/shared';
import { GenericStrategy } from './generic-strategy.js';
import { checkHttpHealth, waitForHttpHealth } from './http-health.js';
import type { StrategyContext, StrategyTimings } from './types.js';

export class HttpServiceStrategy extends GenericStrategy {
  override readonly kind: StrategyKind = STRATEGY_KINDS.HTTP;

  constructor(
    service: string,
    private readonly definition: HttpStrategyDefinition,
    timings: Partial<StrategyTimings> = {}
  ) {
    super(service, timings);
  }

  override async postRollback(_context: StrategyContext): Promise<StepOutcome> {
    const timeoutMs = this.healthTimeoutMs();
    const ready = await waitForHttpHealth(this.definition.healthUrl, {
      timeoutMs,
      initialBackoffMs: this.timings.initialBackoffMs,
      maxBackoffMs: this.timings.maxBackoffMs,
      requestTimeoutMs: this.timings.requestTimeoutMs,
    });

    if (!ready) {
      this.logger.warn({ url: this.definition.healthUrl, timeoutMs }, 'Service not ready in time');
      return { status: 'failed', message: `${this.definition.healthUrl} not ready within ${timeoutMs}ms` };
    }
    return { status: 'succeeded' };
  }

  override async verifyHealth(_context: StrategyContext): Promise<boolean> {
    return checkHttpHealth(this.definition.healthUrl, this.timings.requestTimeoutMs);
  }

  protected override healthTimeoutMs(): number {
    return this.definition.healthTimeoutMs ?? this.timings.httpHealthTimeoutMs;
  }
}
