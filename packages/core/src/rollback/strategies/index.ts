export * from './types.js';
export { GenericStrategy } from './generic-strategy.js';
export { StatefulCacheStrategy } from './stateful-cache-strategy.js';
export { HttpServiceStrategy } from './http-strategy.js';
export { ConfigReloadStrategy } from './config-reload-strategy.js';
export { StrategyRegistry, createStrategy } from './strategy-registry.js';
export { checkHttpHealth, waitForHttpHealth } from './http-health.js';
