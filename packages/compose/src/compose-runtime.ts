/**
 * Docker Compose Runtime
 * Drives a compose project through the docker CLI.
 *
 * Image pins are written to an override compose file that is layered after
 * the project's own files, so `up -d` recreates a service on the pinned
 * image. Volumes are archived with a throwaway helper container.
 */

import { existsSync } from 'node:fs';
import { readFile, rename, writeFile } from 'node:fs/promises';
import { basename, dirname, resolve } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import {
  createChildLogger,
  getConfig,
  RuntimeCommandError,
  ValidationError,
  type CommandResult,
  type Config,
  type RuntimeAdapter,
} from '@rewind/shared';
import { runCommand, type CommandRunner } from './command-runner.js';

export interface ComposeRuntimeConfig {
  /** Directory the compose files live in; commands run here */
  projectRoot: string;
  composeFiles: string[];
  projectName?: string;
  /** Compose file holding image pins, relative to projectRoot */
  overrideFile: string;
  timeoutMs: number;
  /** Image used to tar and untar volumes */
  helperImage: string;
  dockerBinary: string;
}

export const DEFAULT_COMPOSE_RUNTIME_CONFIG: ComposeRuntimeConfig = {
  projectRoot: '.',
  composeFiles: ['docker-compose.yml'],
  overrideFile: 'docker-compose.rollback.yml',
  timeoutMs: 60000,
  helperImage: 'alpine:3.20',
  dockerBinary: 'docker',
};

// Compose service and docker volume names
const NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_.-]{0,254}$/;
// registry/repo:tag or repo@sha256:digest
const IMAGE_REFERENCE_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9._/:@-]{0,254}$/;
const SIGNAL_PATTERN = /^(SIG)?[A-Z0-9]{2,10}$/;

const psEntrySchema = z.object({
  Service: z.string(),
  Image: z.string(),
  State: z.string().optional(),
});

const mountsSchema = z.array(
  z.object({
    Type: z.string(),
    Name: z.string().optional(),
  })
);

const overrideSchema = z.object({
  services: z.record(z.string(), z.record(z.string(), z.unknown())).default({}),
});

type PsEntry = z.infer<typeof psEntrySchema>;

/**
 * Parse `compose ps --format json`, which is a JSON array on older compose
 * releases and one JSON object per line on newer ones
 */
export function parsePsOutput(stdout: string): PsEntry[] {
  const trimmed = stdout.trim();
  if (!trimmed) return [];

  const documents: unknown[] = [];
  if (trimmed.startsWith('[')) {
    const parsed: unknown = JSON.parse(trimmed);
    if (Array.isArray(parsed)) documents.push(...parsed);
  } else {
    for (const line of trimmed.split('\n')) {
      if (line.trim()) documents.push(JSON.parse(line));
    }
  }

  const entries: PsEntry[] = [];
  for (const document of documents) {
    const result = psEntrySchema.safeParse(document);
    if (result.success) entries.push(result.data);
  }
  return entries;
}

function lines(stdout: string): string[] {
  return stdout
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
}

export class ComposeRuntime implements RuntimeAdapter {
  readonly name = 'docker-compose';

  private logger = createChildLogger({ component: 'ComposeRuntime' });
  private readonly config: ComposeRuntimeConfig;
  private readonly projectRoot: string;

  constructor(
    config: Partial<ComposeRuntimeConfig> = {},
    private readonly runner: CommandRunner = runCommand
  ) {
    this.config = { ...DEFAULT_COMPOSE_RUNTIME_CONFIG, ...config };
    this.projectRoot = resolve(this.config.projectRoot);

    if (this.config.projectName !== undefined && !NAME_PATTERN.test(this.config.projectName)) {
      throw new ValidationError(`Invalid compose project name '${this.config.projectName}'`);
    }
  }

  get overridePath(): string {
    return resolve(this.projectRoot, this.config.overrideFile);
  }

  // ===========================================
  // Services
  // ===========================================

  async listServices(): Promise<string[]> {
    const result = await this.compose(['config', '--services']);
    this.ensureSuccess(result, 'list services');
    return lines(result.stdout);
  }

  async getImage(service: string): Promise<string> {
    this.assertName(service, 'service');
    const result = await this.compose(['ps', '--format', 'json', service]);
    this.ensureSuccess(result, `inspect ${service}`);

    const entry = parsePsOutput(result.stdout).find((item) => item.Service === service);
    if (!entry) {
      throw new RuntimeCommandError(`Service '${service}' has no container`, { service });
    }
    return entry.Image;
  }

  async isRunning(service: string): Promise<boolean> {
    this.assertName(service, 'service');
    const result = await this.compose(['ps', '--status', 'running', '--services']);
    if (result.exitCode !== 0) {
      this.logger.warn({ service, stderr: result.stderr.trim() }, 'compose ps failed');
      return false;
    }
    return lines(result.stdout).includes(service);
  }

  async stop(service: string): Promise<boolean> {
    this.assertName(service, 'service');
    return this.succeeded(await this.compose(['stop', service]), `stop ${service}`);
  }

  async start(service: string): Promise<boolean> {
    this.assertName(service, 'service');
    return this.succeeded(await this.compose(['up', '-d', '--no-deps', service]), `start ${service}`);
  }

  /**
   * Make sure the image is present locally, then pin it in the override file
   */
  async restoreImage(service: string, image: string): Promise<boolean> {
    this.assertName(service, 'service');
    if (!IMAGE_REFERENCE_PATTERN.test(image)) {
      throw new ValidationError(`Invalid image reference '${image}'`, { service });
    }

    const inspect = await this.docker(['image', 'inspect', '--format', '{{.Id}}', image]);
    if (inspect.exitCode !== 0) {
      const pull = await this.docker(['pull', image]);
      if (!this.succeeded(pull, `pull ${image}`)) {
        return false;
      }
    }

    await this.pinImage(service, image);
    this.logger.info({ service, image }, 'Image pinned');
    return true;
  }

  // ===========================================
  // Volumes
  // ===========================================

  async listVolumes(services: string[]): Promise<string[]> {
    const volumes = new Set<string>();

    for (const service of services) {
      this.assertName(service, 'service');
      const ids = await this.compose(['ps', '-q', service]);
      this.ensureSuccess(ids, `list containers of ${service}`);

      for (const containerId of lines(ids.stdout)) {
        const inspect = await this.docker(['inspect', '--format', '{{json .Mounts}}', containerId]);
        this.ensureSuccess(inspect, `inspect container ${containerId}`);

        const mounts = mountsSchema.safeParse(JSON.parse(inspect.stdout.trim() || '[]'));
        if (!mounts.success) {
          this.logger.warn({ containerId }, 'Unexpected mount listing');
          continue;
        }
        for (const mount of mounts.data) {
          if (mount.Type === 'volume' && mount.Name) volumes.add(mount.Name);
        }
      }
    }

    return [...volumes].sort();
  }

  async exportVolume(volume: string, destPath: string): Promise<boolean> {
    this.assertName(volume, 'volume');
    const target = resolve(destPath);
    const result = await this.docker([
      'run',
      '--rm',
      '-v',
      `${volume}:/data:ro`,
      '-v',
      `${dirname(target)}:/backup`,
      this.config.helperImage,
      'tar',
      'czf',
      `/backup/${basename(target)}`,
      '-C',
      '/data',
      '.',
    ]);
    return this.succeeded(result, `export volume ${volume}`);
  }

  /**
   * Clears the volume, then extracts the archive into it
   */
  async importVolume(volume: string, srcPath: string): Promise<boolean> {
    this.assertName(volume, 'volume');
    const source = resolve(srcPath);
    const archive = basename(source);
    this.assertName(archive, 'archive');

    const result = await this.docker([
      'run',
      '--rm',
      '-v',
      `${volume}:/data`,
      '-v',
      `${dirname(source)}:/backup:ro`,
      this.config.helperImage,
      'sh',
      '-c',
      `find /data -mindepth 1 -delete && tar xzf /backup/${archive} -C /data`,
    ]);
    return this.succeeded(result, `import volume ${volume}`);
  }

  // ===========================================
  // In-container operations
  // ===========================================

  async exec(service: string, command: string[]): Promise<CommandResult> {
    this.assertName(service, 'service');
    return this.compose(['exec', '-T', service, ...command]);
  }

  async signal(service: string, signal: string): Promise<boolean> {
    this.assertName(service, 'service');
    if (!SIGNAL_PATTERN.test(signal)) {
      throw new ValidationError(`Invalid signal '${signal}'`, { service });
    }
    return this.succeeded(await this.compose(['kill', '-s', signal, service]), `signal ${service}`);
  }

  // ===========================================
  // Helpers
  // ===========================================

  private composeFileArgs(): string[] {
    const files = this.config.composeFiles.map((file) => resolve(this.projectRoot, file));
    if (existsSync(this.overridePath)) {
      files.push(this.overridePath);
    }
    const args = files.flatMap((file) => ['-f', file]);
    if (this.config.projectName) {
      args.push('-p', this.config.projectName);
    }
    return args;
  }

  private compose(args: string[]): Promise<CommandResult> {
    return this.docker(['compose', ...this.composeFileArgs(), ...args]);
  }

  private docker(args: string[]): Promise<CommandResult> {
    this.logger.debug({ args }, 'Running docker');
    return this.runner(this.config.dockerBinary, args, {
      cwd: this.projectRoot,
      timeoutMs: this.config.timeoutMs,
    });
  }

  private async pinImage(service: string, image: string): Promise<void> {
    let document: z.infer<typeof overrideSchema> = { services: {} };
    if (existsSync(this.overridePath)) {
      const raw: unknown = parseYaml(await readFile(this.overridePath, 'utf8'));
      const parsed = overrideSchema.safeParse(raw ?? {});
      if (parsed.success) {
        document = parsed.data;
      } else {
        this.logger.warn({ path: this.overridePath }, 'Replacing unreadable image override file');
      }
    }

    document.services[service] = { ...document.services[service], image };
    const tempPath = `${this.overridePath}.${process.pid}.tmp`;
    await writeFile(tempPath, stringifyYaml(document), 'utf8');
    await rename(tempPath, this.overridePath);
  }

  private assertName(value: string, kind: string): void {
    if (!NAME_PATTERN.test(value)) {
      throw new ValidationError(`Invalid ${kind} name '${value}'`);
    }
  }

  private succeeded(result: CommandResult, operation: string): boolean {
    if (result.exitCode === 0) return true;
    this.logger.warn(
      { operation, exitCode: result.exitCode, stderr: result.stderr.trim() },
      'docker command failed'
    );
    return false;
  }

  private ensureSuccess(result: CommandResult, operation: string): void {
    if (result.exitCode !== 0) {
      throw new RuntimeCommandError(
        `docker failed to ${operation}: ${result.stderr.trim() || `exit ${result.exitCode}`}`,
        { exitCode: result.exitCode }
      );
    }
  }
}

/**
 * Build a runtime for the project described by environment configuration
 */
export function createComposeRuntimeFromConfig(config: Config = getConfig()): ComposeRuntime {
  return new ComposeRuntime({
    projectRoot: config.rollback.projectRoot,
    composeFiles: config.runtime.composeFiles,
    ...(config.runtime.projectName !== undefined && { projectName: config.runtime.projectName }),
    timeoutMs: config.runtime.operationTimeoutMs,
  });
}
