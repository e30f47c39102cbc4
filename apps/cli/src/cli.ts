/**
 * rewind command line
 */

import { parseArgs } from 'node:util';
import type { RollbackManager } from '@rewind/core';
import {
  errorMessage,
  isRetryableError,
  LockError,
  NotFoundError,
  RewindError,
  ValidationError,
  type RollbackPoint,
  type RollbackReport,
} from '@rewind/shared';
import { formatPlan, formatPointDetails, formatPointTable, formatReport, formatUtc } from './format.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export const USAGE = `Usage: rewind <command> [options]

Commands:
  create <description...> [--volumes] [--service <name>]...
                                   Capture a rollback point of the running services
  list                             List rollback points, newest first
  show <id>                        Show everything recorded in a rollback point
  rollback <id> [--dry-run] [--yes]
                                   Restore the deployment to a rollback point
  quick [--dry-run] [--yes]        Restore the most recent rollback point
  service <service> <id> [--dry-run] [--yes]
                                   Roll back a single service
  delete <id>                      Delete a rollback point and its backups
  help                             Show this message

Options:
  --volumes        Also archive the services' named volumes
  --service, -s    Limit capture to a service (repeatable)
  --dry-run        Print the plan without changing anything
  --yes, -y        Skip the confirmation prompt`;

export type RollbackCommands = Pick<
  RollbackManager,
  | 'createRollbackPoint'
  | 'listRollbackPoints'
  | 'getRollbackPoint'
  | 'latest'
  | 'deleteRollbackPoint'
  | 'execute'
  | 'rollbackService'
>;

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  /** Whether a person can answer a prompt */
  isInteractive: boolean;
  confirm(question: string): Promise<boolean>;
}

export interface CliDependencies {
  manager: RollbackCommands;
  io: CliIo;
  /** Recorded as the point's creator */
  user?: string;
}

interface ParsedCommand {
  command: string | undefined;
  args: string[];
  volumes: boolean;
  services: string[];
  dryRun: boolean;
  yes: boolean;
  help: boolean;
}

function parseCommand(argv: string[]): ParsedCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      volumes: { type: 'boolean', default: false },
      service: { type: 'string', short: 's', multiple: true },
      'dry-run': { type: 'boolean', default: false },
      yes: { type: 'boolean', short: 'y', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  const [command, ...args] = positionals;
  return {
    command,
    args,
    volumes: values.volumes ?? false,
    services: values.service ?? [],
    dryRun: values['dry-run'] ?? false,
    yes: values.yes ?? false,
    help: values.help ?? false,
  };
}

function requireArgs(parsed: ParsedCommand, names: string[]): string[] {
  if (parsed.args.length !== names.length) {
    throw new ValidationError(
      `'${parsed.command ?? ''}' expects ${names.map((name) => `<${name}>`).join(' ')}`
    );
  }
  return parsed.args;
}

export async function run(argv: string[], deps: CliDependencies): Promise<ExitCode> {
  const { io } = deps;

  let parsed: ParsedCommand;
  try {
    parsed = parseCommand(argv);
  } catch (error) {
    io.err(errorMessage(error));
    io.err(USAGE);
    return EXIT_CODES.USAGE;
  }

  if (parsed.help || parsed.command === undefined || parsed.command === 'help') {
    io.out(USAGE);
    return EXIT_CODES.SUCCESS;
  }

  try {
    switch (parsed.command) {
      case 'create':
        return await createCommand(parsed, deps);
      case 'list':
        return await listCommand(parsed, deps);
      case 'show':
        return await showCommand(parsed, deps);
      case 'rollback':
        return await rollbackCommand(parsed, deps);
      case 'quick':
        return await quickCommand(parsed, deps);
      case 'service':
        return await serviceCommand(parsed, deps);
      case 'delete':
        return await deleteCommand(parsed, deps);
      default:
        io.err(`Unknown command '${parsed.command}'`);
        io.err(USAGE);
        return EXIT_CODES.USAGE;
    }
  } catch (error) {
    return reportError(error, io);
  }
}

function reportError(error: unknown, io: CliIo): ExitCode {
  if (error instanceof ValidationError) {
    io.err(`Error: ${error.message}`);
    return EXIT_CODES.USAGE;
  }
  if (error instanceof LockError) {
    io.err(`Error: ${error.message}`);
    return EXIT_CODES.FAILURE;
  }
  if (error instanceof NotFoundError) {
    io.err(`Error: ${error.message}`);
    return EXIT_CODES.FAILURE;
  }
  if (error instanceof RewindError) {
    io.err(`Error [${error.code}]: ${error.message}`);
    if (isRetryableError(error)) {
      io.err('The operation can be retried');
    }
    return EXIT_CODES.FAILURE;
  }
  io.err(`Unexpected error: ${errorMessage(error)}`);
  return EXIT_CODES.FAILURE;
}

// ===========================================
// Commands
// ===========================================

async function createCommand(parsed: ParsedCommand, deps: CliDependencies): Promise<ExitCode> {
  const description = parsed.args.join(' ').trim();
  const point = await deps.manager.createRollbackPoint(description || undefined, {
    includeVolumes: parsed.volumes,
    ...(parsed.services.length > 0 && { services: parsed.services }),
    ...(deps.user !== undefined && { createdBy: deps.user }),
  });

  deps.io.out(`Created rollback point ${point.id}`);
  deps.io.out(`  Description: ${point.description}`);
  deps.io.out(`  Services:    ${point.services.join(', ')}`);
  deps.io.out(`  Configs:     ${Object.keys(point.configHashes).length}`);
  deps.io.out(`  Volumes:     ${point.volumes.length}`);
  return EXIT_CODES.SUCCESS;
}

async function listCommand(parsed: ParsedCommand, deps: CliDependencies): Promise<ExitCode> {
  requireArgs(parsed, []);
  const points = await deps.manager.listRollbackPoints();
  if (points.length === 0) {
    deps.io.out('No rollback points found');
    return EXIT_CODES.SUCCESS;
  }
  for (const line of formatPointTable(points)) {
    deps.io.out(line);
  }
  return EXIT_CODES.SUCCESS;
}

async function showCommand(parsed: ParsedCommand, deps: CliDependencies): Promise<ExitCode> {
  const [rollbackId = ''] = requireArgs(parsed, ['id']);
  const point = await deps.manager.getRollbackPoint(rollbackId);
  for (const line of formatPointDetails(point)) {
    deps.io.out(line);
  }
  return EXIT_CODES.SUCCESS;
}

async function rollbackCommand(parsed: ParsedCommand, deps: CliDependencies): Promise<ExitCode> {
  const [rollbackId = ''] = requireArgs(parsed, ['id']);
  const point = await deps.manager.getRollbackPoint(rollbackId);
  return restore(point, parsed, deps);
}

async function quickCommand(parsed: ParsedCommand, deps: CliDependencies): Promise<ExitCode> {
  requireArgs(parsed, []);
  const point = await deps.manager.latest();
  if (!point) {
    deps.io.err('No rollback points available');
    return EXIT_CODES.FAILURE;
  }
  deps.io.out(`Most recent rollback point: ${point.id}`);
  return restore(point, parsed, deps);
}

async function serviceCommand(parsed: ParsedCommand, deps: CliDependencies): Promise<ExitCode> {
  const [service = '', rollbackId = ''] = requireArgs(parsed, ['service', 'id']);
  const point = await deps.manager.getRollbackPoint(rollbackId);

  const planned = await deps.manager.rollbackService(rollbackId, service, { dryRun: true });
  printLines(formatPlan(planned.plan), deps.io);
  if (parsed.dryRun) {
    deps.io.out('Dry run: no changes made');
    return EXIT_CODES.SUCCESS;
  }

  if (!(await confirmRestore(point, parsed.yes, deps.io))) {
    return EXIT_CODES.FAILURE;
  }
  return finish(await deps.manager.rollbackService(rollbackId, service), deps.io);
}

async function deleteCommand(parsed: ParsedCommand, deps: CliDependencies): Promise<ExitCode> {
  const [rollbackId = ''] = requireArgs(parsed, ['id']);
  if (await deps.manager.deleteRollbackPoint(rollbackId)) {
    deps.io.out(`Deleted rollback point ${rollbackId}`);
    return EXIT_CODES.SUCCESS;
  }
  deps.io.err(`Rollback point not found: ${rollbackId}`);
  return EXIT_CODES.FAILURE;
}

// ===========================================
// Helpers
// ===========================================

async function restore(point: RollbackPoint, parsed: ParsedCommand, deps: CliDependencies): Promise<ExitCode> {
  const planned = await deps.manager.execute(point.id, { dryRun: true });
  printLines(formatPlan(planned.plan), deps.io);
  if (parsed.dryRun) {
    deps.io.out('Dry run: no changes made');
    return EXIT_CODES.SUCCESS;
  }

  if (!(await confirmRestore(point, parsed.yes, deps.io))) {
    return EXIT_CODES.FAILURE;
  }
  return finish(await deps.manager.execute(point.id), deps.io);
}

async function confirmRestore(point: RollbackPoint, yes: boolean, io: CliIo): Promise<boolean> {
  if (yes) return true;

  if (!io.isInteractive) {
    io.err('Refusing to roll back without confirmation; re-run with --yes');
    return false;
  }

  io.out('');
  io.out('WARNING: this will roll the deployment back to a previous state');
  io.out(`  Rollback point: ${point.description}`);
  io.out(`  Created:        ${formatUtc(point.timestamp)} UTC`);
  if (await io.confirm('Proceed? [y/N] ')) {
    return true;
  }
  io.err('Rollback cancelled');
  return false;
}

function finish(report: RollbackReport, io: CliIo): ExitCode {
  printLines(formatReport(report), report.success ? io : { ...io, out: io.err });
  return report.success ? EXIT_CODES.SUCCESS : EXIT_CODES.FAILURE;
}

function printLines(lines: string[], io: Pick<CliIo, 'out'>): void {
  for (const line of lines) {
    io.out(line);
  }
}
