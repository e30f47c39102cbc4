#!/usr/bin/env node
/**
 * rewind executable
 */

import { userInfo } from 'node:os';
import { createComposeRuntimeFromConfig } from '@rewind/compose';
import { createRollbackManagerFromConfig } from '@rewind/core';
import { errorMessage, getConfig, getLogger, wrapError } from '@rewind/shared';
import { run } from './cli.js';
import { confirm } from './prompt.js';

function currentUser(): string {
  try {
    return userInfo().username;
  } catch (error) {
    getLogger().debug({ error: errorMessage(error) }, 'Cannot resolve OS user');
    return process.env.USER ?? 'system';
  }
}

async function main(): Promise<void> {
  const config = getConfig();
  const manager = createRollbackManagerFromConfig(createComposeRuntimeFromConfig(config), config);

  process.exitCode = await run(process.argv.slice(2), {
    manager,
    user: currentUser(),
    io: {
      out: (line) => process.stdout.write(`${line}\n`),
      err: (line) => process.stderr.write(`${line}\n`),
      isInteractive: Boolean(process.stdin.isTTY),
      confirm,
    },
  });
}

main().catch((error: unknown) => {
  const failure = wrapError(error);
  getLogger().error({ error: failure.toJSON() }, 'rewind failed');
  process.stderr.write(`Error: ${failure.message}\n`);
  process.exitCode = 1;
});
