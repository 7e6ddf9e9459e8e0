/**
 * @fileoverview Error hierarchy
 *
 * WayfarerError carries a code, category and structured context. The four
 * structural failures of a request are ValidationError, ConcurrencyTimeoutError,
 * ToolExecutionError and PersistenceError; each aborts or isolates work
 * differently.
 */

import { ErrorCodes, type ErrorCode } from './codes.js';

// =============================================================================
// Types
// =============================================================================

export type ErrorCategory =
  | 'validation'
  | 'concurrency'
  | 'tool'
  | 'persistence'
  | 'session'
  | 'agent'
  | 'configuration'
  | 'unknown';

export type ErrorSeverity = 'fatal' | 'error' | 'warning' | 'transient';

export interface ValidationIssue {
  /** Dotted path to the offending field ('' for the root) */
  path: string;
  message: string;
  code: string;
}

/**
 * Wire-safe error description
 */
export interface ErrorPayload {
  code: string;
  message: string;
  category: ErrorCategory;
  details?: Record<string, unknown>;
}

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base error class with structured context for debugging and logging.
 */
export class WayfarerError extends Error {
  /** Machine-readable error code (e.g., 'STATUS_REGRESSION') */
  readonly code: string;
  /** Error category for classification */
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly timestamp: Date;
  /** Structured context for debugging */
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code: string;
      category?: ErrorCategory;
      severity?: ErrorSeverity;
      context?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options.cause });
    this.name = 'WayfarerError';
    this.code = options.code;
    this.category = options.category ?? 'unknown';
    this.severity = options.severity ?? 'error';
    this.timestamp = new Date();
    this.context = options.context ?? {};
  }

  /**
   * Whether repeating the same operation may succeed
   */
  get isRetryable(): boolean {
    return this.severity === 'transient';
  }

  /**
   * Convert to structured log format
   */
  toStructuredLog(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        category: this.category,
        severity: this.severity,
        stack: this.stack,
        cause: this.cause instanceof Error ? {
          name: this.cause.name,
          message: this.cause.message,
        } : undefined,
      },
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }

  /**
   * Create a WayfarerError from an unknown error value
   */
  static from(error: unknown, additionalContext?: Record<string, unknown>): WayfarerError {
    if (error instanceof WayfarerError) {
      if (additionalContext) {
        return new WayfarerError(error.message, {
          code: error.code,
          category: error.category,
          severity: error.severity,
          context: { ...error.context, ...additionalContext },
          cause: error,
        });
      }
      return error;
    }

    return new WayfarerError(error instanceof Error ? error.message : String(error), {
      code: ErrorCodes.UNKNOWN,
      context: additionalContext,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

// =============================================================================
// Domain Errors
// =============================================================================

/**
 * Malformed diff, missing task id, illegal status transition or a merged
 * state that violates the schema. The offending commit is rejected whole.
 */
export class ValidationError extends WayfarerError {
  readonly issues: ValidationIssue[];

  constructor(
    message: string,
    options: {
      code?: ErrorCode;
      issues?: ValidationIssue[];
      context?: Record<string, unknown>;
      cause?: unknown;
    } = {}
  ) {
    super(message, {
      code: options.code ?? ErrorCodes.VALIDATION_FAILED,
      category: 'validation',
      severity: 'error',
      context: { issues: options.issues, ...options.context },
      cause: options.cause,
    });
    this.name = 'ValidationError';
    this.issues = options.issues ?? [];
  }
}

/**
 * The per-session commit lock could not be acquired within its bound.
 * Retryable: the orchestrator may try the commit again.
 */
export class ConcurrencyTimeoutError extends WayfarerError {
  readonly sessionId: string;
  readonly waitedMs: number;

  constructor(sessionId: string, waitedMs: number) {
    super(`Timed out after ${waitedMs}ms waiting for the state lock of session ${sessionId}`, {
      code: ErrorCodes.CONCURRENCY_TIMEOUT,
      category: 'concurrency',
      severity: 'transient',
      context: { sessionId, waitedMs },
    });
    this.name = 'ConcurrencyTimeoutError';
    this.sessionId = sessionId;
    this.waitedMs = waitedMs;
  }
}

export type ToolFailureReason =
  | 'not_found'
  | 'invalid_params'
  | 'error'
  | 'timeout'
  | 'batch_timeout';

const TOOL_FAILURE_CODES: Record<ToolFailureReason, ErrorCode> = {
  not_found: ErrorCodes.TOOL_NOT_FOUND,
  invalid_params: ErrorCodes.TOOL_INVALID_PARAMS,
  error: ErrorCodes.TOOL_EXECUTION_FAILED,
  timeout: ErrorCodes.TOOL_TIMEOUT,
  batch_timeout: ErrorCodes.BATCH_TIMEOUT,
};

/**
 * A single external call failed or timed out. Never aborts a request; the
 * executor turns it into a failed task.
 */
export class ToolExecutionError extends WayfarerError {
  readonly toolName: string;
  readonly reason: ToolFailureReason;
  readonly taskId?: string;

  constructor(
    message: string,
    options: {
      toolName: string;
      reason: ToolFailureReason;
      taskId?: string;
      context?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, {
      code: TOOL_FAILURE_CODES[options.reason],
      category: 'tool',
      severity: options.reason === 'error' ? 'transient' : 'error',
      context: { toolName: options.toolName, taskId: options.taskId, ...options.context },
      cause: options.cause,
    });
    this.name = 'ToolExecutionError';
    this.toolName = options.toolName;
    this.reason = options.reason;
    this.taskId = options.taskId;
  }
}

/**
 * The session store failed to read, write or delete.
 */
export class PersistenceError extends WayfarerError {
  /** Store key that failed */
  readonly key: string;
  readonly operation: 'read' | 'write' | 'delete';

  constructor(
    message: string,
    options: {
      key: string;
      operation: PersistenceError['operation'];
      context?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, {
      code: `PERSISTENCE_${options.operation.toUpperCase()}_ERROR`,
      category: 'persistence',
      severity: 'error',
      context: { key: options.key, operation: options.operation, ...options.context },
      cause: options.cause,
    });
    this.name = 'PersistenceError';
    this.key = options.key;
    this.operation = options.operation;
  }

  /**
   * Wrap a store failure, passing PersistenceErrors through unchanged
   */
  static wrap(error: unknown, key: string, operation: PersistenceError['operation']): PersistenceError {
    if (error instanceof PersistenceError) return error;
    const reason = error instanceof Error ? error.message : String(error);
    return new PersistenceError(`Failed to ${operation} ${key}: ${reason}`, { key, operation, cause: error });
  }
}

/**
 * Session lifecycle misuse (e.g. reading a session that was never loaded)
 */
export class SessionError extends WayfarerError {
  readonly sessionId: string;

  constructor(
    message: string,
    options: {
      sessionId: string;
      code?: ErrorCode;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, {
      code: options.code ?? ErrorCodes.SESSION_NOT_LOADED,
      category: 'session',
      context: { sessionId: options.sessionId, ...options.context },
    });
    this.name = 'SessionError';
    this.sessionId = options.sessionId;
  }
}

/**
 * A sub-agent threw while producing its proposal
 */
export class AgentError extends WayfarerError {
  readonly agent: string;

  constructor(message: string, options: { agent: string; cause?: unknown }) {
    super(message, {
      code: ErrorCodes.AGENT_FAILED,
      category: 'agent',
      context: { agent: options.agent },
      cause: options.cause,
    });
    this.name = 'AgentError';
    this.agent = options.agent;
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function isWayfarerError(error: unknown): error is WayfarerError {
  return error instanceof WayfarerError;
}

/**
 * Convert any thrown value into a wire-safe payload
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  const wrapped = WayfarerError.from(error);
  const payload: ErrorPayload = {
    code: wrapped.code,
    message: wrapped.message,
    category: wrapped.category,
  };
  if (wrapped instanceof ValidationError && wrapped.issues.length > 0) {
    payload.details = { issues: wrapped.issues };
  }
  return payload;
}
