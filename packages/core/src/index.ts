/**
 * @rewind/core
 * Rollback points for multi-service container deployments
 */

export * from './rollback/index.js';
