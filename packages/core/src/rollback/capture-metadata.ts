/**
 * Informational metadata recorded with each rollback point
 */

import { hostname } from 'node:os';
import simpleGit, { type SimpleGitOptions } from 'simple-git';
import { createLogger, errorMessage, type MetadataValue } from '@rewind/shared';

const logger = createLogger('CaptureMetadata');

/**
 * HEAD of the repository containing projectRoot, or null outside a repository
 */
export async function getGitCommit(projectRoot: string): Promise<string | null> {
  const options: Partial<SimpleGitOptions> = {
    baseDir: projectRoot,
    binary: 'git',
    maxConcurrentProcesses: 1,
    trimmed: true,
    timeout: { block: 5000 },
  };

  try {
    const commit = await simpleGit(options).revparse(['HEAD']);
    return commit || null;
  } catch (error) {
    logger.debug({ projectRoot, error: errorMessage(error) }, 'No git revision available');
    return null;
  }
}

export async function collectCaptureMetadata(
  projectRoot: string
): Promise<Record<string, MetadataValue>> {
  return {
    gitCommit: await getGitCommit(projectRoot),
    hostname: hostname(),
  };
}
