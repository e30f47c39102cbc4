/**
 * Structured logging for Rewind
 */

import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

// Re-export pino.Logger type for convenience
export type Logger = pino.Logger;

export interface LogContext {
  rollbackId?: string;
  service?: string;
  component?: string;
  [key: string]: unknown;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// Create base logger
function createBaseLogger(level: LogLevel = 'info') {
  return pino({
    level,
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    base: {
      service: 'rewind',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}

// Singleton logger instance
let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    const envLevel = process.env.LOG_LEVEL;
    loggerInstance = createBaseLogger(isLogLevel(envLevel) ? envLevel : 'info');
  }
  return loggerInstance;
}

// Create child logger with context
export function createChildLogger(context: LogContext): pino.Logger {
  return getLogger().child(context);
}

// Convenience function to create a named logger
export function createLogger(name: string): pino.Logger {
  return createChildLogger({ component: name });
}

// Structured event logging for rollback phases
export function logRollbackPhase(
  rollbackId: string,
  phase: string,
  detail: Record<string, unknown> = {}
): void {
  getLogger().info(
    {
      event: 'rollback_phase',
      rollbackId,
      phase,
      ...detail,
    },
    `Rollback ${rollbackId}: ${phase}`
  );
}

export function logServiceTransition(
  rollbackId: string,
  service: string,
  fromState: string,
  toState: string
): void {
  getLogger().debug(
    {
      event: 'service_transition',
      rollbackId,
      service,
      fromState,
      toState,
    },
    `${service}: ${fromState} -> ${toState}`
  );
}

// Reset logger (for testing)
export function resetLogger(): void {
  loggerInstance = null;
}
