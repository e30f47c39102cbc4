/**
 * Process runner
 * Runs an executable without a shell and collects its output.
 */

import { spawn } from 'node:child_process';
import type { CommandResult } from '@rewind/shared';

export interface RunOptions {
  cwd: string;
  timeoutMs: number;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options: RunOptions
) => Promise<CommandResult>;

// Exit code reported when the process could not be spawned or was killed
const SPAWN_FAILURE_EXIT_CODE = 127;

export const runCommand: CommandRunner = (command, args, options) => {
  return new Promise((resolve) => {
    const proc = spawn(command, args, {
      cwd: options.cwd,
      timeout: options.timeoutMs,
    });

    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
      resolve({
        exitCode: exitCode ?? SPAWN_FAILURE_EXIT_CODE,
        stdout,
        stderr: signal ? `${stderr}terminated by ${signal}` : stderr,
      });
    });

    proc.on('error', (error: Error) => {
      resolve({
        exitCode: SPAWN_FAILURE_EXIT_CODE,
        stdout,
        stderr: error.message,
      });
    });
  });
};
