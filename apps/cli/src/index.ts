/**
 * @rewind/cli
 */

export { run, EXIT_CODES, USAGE } from './cli.js';
export type { CliDependencies, CliIo, ExitCode, RollbackCommands } from './cli.js';
export { confirm, isAffirmative } from './prompt.js';
export * from './format.js';
