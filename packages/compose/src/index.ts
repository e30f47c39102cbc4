/**
 * @rewind/compose
 * Docker Compose runtime adapter
 */

export {
  ComposeRuntime,
  createComposeRuntimeFromConfig,
  DEFAULT_COMPOSE_RUNTIME_CONFIG,
  parsePsOutput,
} from './compose-runtime.js';
export type { ComposeRuntimeConfig } from './compose-runtime.js';
export { runCommand } from './command-runner.js';
export type { CommandRunner, RunOptions } from './command-runner.js';
