/**
 * Core types for Rewind
 */

export * from './rollback.js';
export * from './runtime.js';
export * from './strategy.js';
