/**
 * Configuration management for Rewind
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError, errorMessage } from '../errors/index.js';
import type { StrategyDefinition } from '../types/strategy.js';

// Load environment variables - the CLI may be started from a workspace
// directory, so the monorepo root is tried as well
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../../');

const envPaths = [resolve(process.cwd(), '.env'), resolve(monorepoRoot, '.env')];

for (const envPath of envPaths) {
  if (existsSync(envPath)) {
    dotenvConfig({ path: envPath });
    break;
  }
}

const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) =>
      val
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean)
    );

// Configuration schema
const configSchema = z.object({
  // Application
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  rollback: z.object({
    projectRoot: z.string().default('.'),
    backupDir: z.string().default('rollback/backups'),
    maxRollbackPoints: z.coerce.number().int().positive().default(10),
    configFiles: commaList(
      'docker-compose.yml,docker-compose.enterprise.yml,.env,deployment/prometheus.yml'
    ),
    volumeFilter: z.string().optional(),
    strategiesFile: z.string().default('rewind.strategies.yaml'),
  }),

  runtime: z.object({
    composeFiles: commaList('docker-compose.yml'),
    projectName: z.string().optional(),
    operationTimeoutMs: z.coerce.number().int().positive().default(60000),
    healthTimeoutMs: z.coerce.number().int().positive().default(10000),
    httpHealthTimeoutMs: z.coerce.number().int().positive().default(30000),
    concurrency: z.coerce.number().int().min(1).max(32).default(4),
  }),

  lock: z.object({
    timeoutMs: z.coerce.number().int().nonnegative().default(10000),
    staleMs: z.coerce.number().int().positive().default(300000), // 5 minutes
  }),
});

export type Config = z.infer<typeof configSchema>;

const strategyDefinitionSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('generic'),
    healthTimeoutMs: z.number().int().positive().optional(),
  }),
  z.object({
    kind: z.literal('stateful-cache'),
    persistCommand: z.array(z.string()).min(1),
    healthCommand: z.array(z.string()).min(1).optional(),
    healthExpect: z.string().optional(),
    healthTimeoutMs: z.number().int().positive().optional(),
  }),
  z.object({
    kind: z.literal('http'),
    healthUrl: z.string().url(),
    healthTimeoutMs: z.number().int().positive().optional(),
  }),
  z.object({
    kind: z.literal('config-reload'),
    reloadSignal: z.string().optional(),
    healthUrl: z.string().url().optional(),
    healthTimeoutMs: z.number().int().positive().optional(),
  }),
]);

const strategiesFileSchema = z.object({
  services: z.record(z.string(), strategyDefinitionSchema).default({}),
});

// Parse and validate configuration
function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env.NODE_ENV,
    logLevel: process.env.LOG_LEVEL,

    rollback: {
      projectRoot: process.env.REWIND_PROJECT_ROOT,
      backupDir: process.env.REWIND_BACKUP_DIR,
      maxRollbackPoints: process.env.REWIND_MAX_ROLLBACK_POINTS,
      configFiles: process.env.REWIND_CONFIG_FILES,
      volumeFilter: process.env.REWIND_VOLUME_FILTER,
      strategiesFile: process.env.REWIND_STRATEGIES_FILE,
    },

    runtime: {
      composeFiles: process.env.REWIND_COMPOSE_FILES,
      projectName: process.env.REWIND_COMPOSE_PROJECT,
      operationTimeoutMs: process.env.REWIND_OPERATION_TIMEOUT_MS,
      healthTimeoutMs: process.env.REWIND_HEALTH_TIMEOUT_MS,
      httpHealthTimeoutMs: process.env.REWIND_HTTP_HEALTH_TIMEOUT_MS,
      concurrency: process.env.REWIND_CONCURRENCY,
    },

    lock: {
      timeoutMs: process.env.REWIND_LOCK_TIMEOUT_MS,
      staleMs: process.env.REWIND_STALE_LOCK_MS,
    },
  };

  return configSchema.parse(rawConfig);
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}

// Validate config without loading (for startup checks)
export function validateConfig(): { valid: boolean; errors?: string[] } {
  try {
    loadConfig();
    return { valid: true };
  } catch (error) {
    if (error instanceof z.ZodError) {
      return {
        valid: false,
        errors: error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      };
    }
    throw error;
  }
}

/**
 * Parse a strategies document (YAML or JSON text).
 * Shape: `services: { <service>: { kind: ..., ... } }`
 */
export function parseStrategyDefinitions(
  source: string,
  origin = 'strategies file'
): Record<string, StrategyDefinition> {
  let document: unknown;
  try {
    document = parseYaml(source);
  } catch (error) {
    throw new ConfigurationError(
      `Cannot parse ${origin}: ${errorMessage(error)}`
    );
  }

  const result = strategiesFileSchema.safeParse(document ?? {});
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${origin}`, {
      issues: result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
    });
  }
  return result.data.services;
}

/**
 * Load service strategy definitions. A missing file means every
 * service uses the generic strategy.
 */
export function loadStrategyDefinitions(filePath: string): Record<string, StrategyDefinition> {
  if (!existsSync(filePath)) {
    return {};
  }
  return parseStrategyDefinitions(readFileSync(filePath, 'utf8'), filePath);
}
