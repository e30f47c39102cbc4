/**
 * Strategy registry
 * Maps service names to strategies from their definitions. Built once per
 * manager; services without a definition get the generic strategy.
 */

import { STRATEGY_KINDS, type StrategyDefinition } from '@rewind/shared';
import { ConfigReloadStrategy } from './config-reload-strategy.js';
import { GenericStrategy } from './generic-strategy.js';
import { HttpServiceStrategy } from './http-strategy.js';
import { StatefulCacheStrategy } from './stateful-cache-strategy.js';
import type { ServiceRollbackStrategy, StrategyTimings } from './types.js';

export function createStrategy(
  service: string,
  definition: StrategyDefinition,
  timings: Partial<StrategyTimings> = {}
): ServiceRollbackStrategy {
  switch (definition.kind) {
    case STRATEGY_KINDS.STATEFUL_CACHE:
      return new StatefulCacheStrategy(service, definition, timings);
    case STRATEGY_KINDS.HTTP:
      return new HttpServiceStrategy(service, definition, timings);
    case STRATEGY_KINDS.CONFIG_RELOAD:
      return new ConfigReloadStrategy(service, definition, timings);
    case STRATEGY_KINDS.GENERIC:
      return new GenericStrategy(
        service,
        definition.healthTimeoutMs === undefined
          ? timings
          : { ...timings, healthTimeoutMs: definition.healthTimeoutMs }
      );
  }
}

export class StrategyRegistry {
  private readonly strategies = new Map<string, ServiceRollbackStrategy>();

  constructor(
    definitions: Record<string, StrategyDefinition> = {},
    private readonly timings: Partial<StrategyTimings> = {}
  ) {
    for (const [service, definition] of Object.entries(definitions)) {
      this.strategies.set(service, createStrategy(service, definition, timings));
    }
  }

  /**
   * Register or replace the strategy for a service
   */
  register(strategy: ServiceRollbackStrategy): void {
    this.strategies.set(strategy.service, strategy);
  }

  resolve(service: string): ServiceRollbackStrategy {
    const existing = this.strategies.get(service);
    if (existing) return existing;

    const fallback = new GenericStrategy(service, this.timings);
    this.strategies.set(service, fallback);
    return fallback;
  }

  has(service: string): boolean {
    return this.strategies.has(service);
  }
}
