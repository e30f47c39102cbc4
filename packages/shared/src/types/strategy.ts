/**
 * Service strategy definitions
 */

export const STRATEGY_KINDS = {
  GENERIC: 'generic',
  STATEFUL_CACHE: 'stateful-cache',
  HTTP: 'http',
  CONFIG_RELOAD: 'config-reload',
} as const;

export type StrategyKind = (typeof STRATEGY_KINDS)[keyof typeof STRATEGY_KINDS];

export interface GenericStrategyDefinition {
  kind: 'generic';
  healthTimeoutMs?: number;
}

export interface StatefulCacheStrategyDefinition {
  kind: 'stateful-cache';
  /** Command run inside the container to persist in-memory data, e.g. redis-cli SAVE */
  persistCommand: string[];
  /** Optional liveness command; output must contain `healthExpect` */
  healthCommand?: string[];
  healthExpect?: string;
  healthTimeoutMs?: number;
}

export interface HttpStrategyDefinition {
  kind: 'http';
  healthUrl: string;
  healthTimeoutMs?: number;
}

export interface ConfigReloadStrategyDefinition {
  kind: 'config-reload';
  reloadSignal?: string;
  healthUrl?: string;
  healthTimeoutMs?: number;
}

export type StrategyDefinition =
  | GenericStrategyDefinition
  | StatefulCacheStrategyDefinition
  | HttpStrategyDefinition
  | ConfigReloadStrategyDefinition;
