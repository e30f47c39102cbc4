/**
 * Custom error hierarchy for Rewind
 */

export type ErrorCategory =
  | 'VALIDATION'
  | 'CREATION'
  | 'NOT_FOUND'
  | 'REPOSITORY'
  | 'LOCK'
  | 'SERVICE_OPERATION'
  | 'TIMEOUT'
  | 'RUNTIME'
  | 'STATE_MACHINE'
  | 'CONFIGURATION'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  rollbackId?: string;
  service?: string;
  [key: string]: unknown;
}

export interface RewindErrorJSON {
  name: string;
  code: string;
  message: string;
  category: ErrorCategory;
  retryable: boolean;
  /** The rollback point and service the failure concerns, when known */
  rollbackId: string | null;
  service: string | null;
  context: ErrorContext;
  occurredAt: string;
  stack?: string;
}

/**
 * Base error for every failure Rewind reports. Codes are grouped by area:
 * E1xxx arguments, E2xxx rollback points, E3xxx index and locks, E4xxx
 * runtime calls, E5xxx service state, E6xxx configuration, E9999 unknown.
 */
export class RewindError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly occurredAt: string;

  constructor(message: string, code: string, context: Partial<ErrorContext> = {}) {
    super(message);
    this.name = 'RewindError';
    this.code = code;
    this.context = {
      ...context,
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      retryable: context.retryable ?? false,
    };
    this.occurredAt = new Date().toISOString();
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Log-friendly shape: the point and service are lifted out of the
   * context so log queries can filter on them
   */
  toJSON(): RewindErrorJSON {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.context.category,
      retryable: this.context.retryable,
      rollbackId: this.context.rollbackId ?? null,
      service: this.context.service ?? null,
      context: this.context,
      occurredAt: this.occurredAt,
      stack: this.stack,
    };
  }
}

/**
 * Validation errors (bad arguments, malformed paths)
 */
export class ValidationError extends RewindError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E1001', {
      category: 'VALIDATION',
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'ValidationError';
  }
}

/**
 * A rollback point could not be captured completely.
 * Nothing is written to the index when this is thrown.
 */
export class CreationError extends RewindError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E2001', {
      category: 'CREATION',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'CreationError';
  }
}

export class NotFoundError extends RewindError {
  public readonly rollbackId: string;

  constructor(rollbackId: string, context: Partial<ErrorContext> = {}) {
    super(`Rollback point not found: ${rollbackId}`, 'E2002', {
      category: 'NOT_FOUND',
      severity: 'LOW',
      retryable: false,
      rollbackId,
      ...context,
    });
    this.name = 'NotFoundError';
    this.rollbackId = rollbackId;
  }
}

/**
 * Index file unreadable, corrupt or unwritable
 */
export class RepositoryError extends RewindError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E3001', {
      category: 'REPOSITORY',
      severity: 'CRITICAL',
      retryable: false,
      ...context,
    });
    this.name = 'RepositoryError';
  }
}

export class LockError extends RewindError {
  public readonly lockPath: string;

  constructor(message: string, lockPath: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E3002', {
      category: 'LOCK',
      severity: 'MEDIUM',
      retryable: true,
      lockPath,
      ...context,
    });
    this.name = 'LockError';
    this.lockPath = lockPath;
  }
}

export type ServiceOperation =
  | 'pre_rollback'
  | 'stop'
  | 'restore_image'
  | 'rollback'
  | 'start'
  | 'post_rollback'
  | 'verify_health';

/**
 * Per-service failure during a rollback. Recorded on the service result,
 * never thrown past the manager.
 */
export class ServiceOperationError extends RewindError {
  public readonly service: string;
  public readonly operation: ServiceOperation;

  constructor(
    service: string,
    operation: ServiceOperation,
    message: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(`${operation} failed for ${service}: ${message}`, 'E4001', {
      category: 'SERVICE_OPERATION',
      severity: 'HIGH',
      retryable: true,
      service,
      operation,
      ...context,
    });
    this.name = 'ServiceOperationError';
    this.service = service;
    this.operation = operation;
  }
}

export class OperationTimeoutError extends RewindError {
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number, context: Partial<ErrorContext> = {}) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'E4002', {
      category: 'TIMEOUT',
      severity: 'MEDIUM',
      retryable: true,
      ...context,
    });
    this.name = 'OperationTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The container runtime could not answer a query
 */
export class RuntimeCommandError extends RewindError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E4003', {
      category: 'RUNTIME',
      severity: 'HIGH',
      retryable: true,
      ...context,
    });
    this.name = 'RuntimeCommandError';
  }
}

/**
 * State machine errors
 */
export class InvalidTransitionError extends RewindError {
  constructor(fromState: string, toState: string, context: Partial<ErrorContext> = {}) {
    super(`Invalid state transition: ${fromState} -> ${toState}`, 'E5001', {
      category: 'STATE_MACHINE',
      severity: 'MEDIUM',
      retryable: false,
      ...context,
    });
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends RewindError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E6001', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      retryable: false,
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Helper to check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof RewindError) {
    return error.context.retryable;
  }
  return false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Helper to wrap unknown errors
 */
export function wrapError(error: unknown, context: Partial<ErrorContext> = {}): RewindError {
  if (error instanceof RewindError) {
    return error;
  }

  if (error instanceof Error) {
    return new RewindError(error.message, 'E9999', {
      category: 'UNKNOWN',
      severity: 'MEDIUM',
      retryable: false,
      originalError: error.name,
      ...context,
    });
  }

  return new RewindError(String(error), 'E9999', {
    category: 'UNKNOWN',
    severity: 'MEDIUM',
    retryable: false,
    ...context,
  });
}
