/**
 * @fileoverview Error categorization for structured logging
 *
 * Maps Wayfarer errors, Node.js error codes and common message patterns to
 * a category/code pair so failures can be grouped in log analysis.
 */

import { WayfarerError } from '../errors/errors.js';
import { ErrorCodes } from '../errors/codes.js';

// =============================================================================
// Error Categories
// =============================================================================

export enum LogErrorCategory {
  // Infrastructure
  DATABASE = 'DB',
  FILESYSTEM = 'FS',

  // State
  STATE_VALIDATION = 'SVAL',
  STATE_CONCURRENCY = 'SLOCK',
  STATE_PERSIST = 'SPERS',
  SESSION = 'SESS',

  // Execution
  TOOL_EXECUTION = 'TOOL',
  TOOL_VALIDATION = 'TVAL',
  AGENT = 'AGENT',

  // Configuration
  CONFIG = 'CFG',

  UNKNOWN = 'UNK',
}

// =============================================================================
// Structured Error Interface
// =============================================================================

export interface StructuredError {
  category: LogErrorCategory;
  /** Specific error code (e.g., 'FS_NOT_FOUND', 'TOOL_TIMEOUT') */
  code: string;
  message: string;
  context: Record<string, unknown>;
  /** Whether the request can continue in degraded mode */
  recoverable: boolean;
  /** Whether retrying may succeed */
  retryable: boolean;
  cause?: Error;
}

export const LogErrorCodes = {
  DB_QUERY: 'DB_QUERY',
  DB_CONSTRAINT: 'DB_CONSTRAINT',
  DB_CORRUPTION: 'DB_CORRUPTION',
  DB_BUSY: 'DB_BUSY',

  FS_NOT_FOUND: 'FS_NOT_FOUND',
  FS_PERMISSION: 'FS_PERMISSION',
  FS_DISK_FULL: 'FS_DISK_FULL',

  TOOL_TIMEOUT: 'TOOL_TIMEOUT',
  TOOL_ERROR: 'TOOL_ERROR',

  UNKNOWN: 'UNKNOWN',
} as const;

export type LogErrorCode = (typeof LogErrorCodes)[keyof typeof LogErrorCodes];

type Classification = Omit<StructuredError, 'message' | 'context' | 'cause' | 'code'>;

// =============================================================================
// Classification Tables
// =============================================================================

const WAYFARER_CATEGORIES: Record<WayfarerError['category'], Classification> = {
  validation: { category: LogErrorCategory.STATE_VALIDATION, recoverable: false, retryable: false },
  concurrency: { category: LogErrorCategory.STATE_CONCURRENCY, recoverable: false, retryable: true },
  persistence: { category: LogErrorCategory.STATE_PERSIST, recoverable: false, retryable: false },
  tool: { category: LogErrorCategory.TOOL_EXECUTION, recoverable: true, retryable: false },
  session: { category: LogErrorCategory.SESSION, recoverable: false, retryable: false },
  agent: { category: LogErrorCategory.AGENT, recoverable: false, retryable: false },
  configuration: { category: LogErrorCategory.CONFIG, recoverable: false, retryable: false },
  unknown: { category: LogErrorCategory.UNKNOWN, recoverable: false, retryable: false },
};

const NODE_ERROR_CATEGORIES: Record<string, { category: LogErrorCategory; code: LogErrorCode; retryable: boolean }> = {
  ENOENT: { category: LogErrorCategory.FILESYSTEM, code: LogErrorCodes.FS_NOT_FOUND, retryable: false },
  EACCES: { category: LogErrorCategory.FILESYSTEM, code: LogErrorCodes.FS_PERMISSION, retryable: false },
  EPERM: { category: LogErrorCategory.FILESYSTEM, code: LogErrorCodes.FS_PERMISSION, retryable: false },
  ENOSPC: { category: LogErrorCategory.FILESYSTEM, code: LogErrorCodes.FS_DISK_FULL, retryable: false },
  SQLITE_BUSY: { category: LogErrorCategory.DATABASE, code: LogErrorCodes.DB_BUSY, retryable: true },
  SQLITE_CONSTRAINT: { category: LogErrorCategory.DATABASE, code: LogErrorCodes.DB_CONSTRAINT, retryable: false },
  SQLITE_CORRUPT: { category: LogErrorCategory.DATABASE, code: LogErrorCodes.DB_CORRUPTION, retryable: false },
};

// =============================================================================
// Error Categorization Function
// =============================================================================

/**
 * Categorize an error with structured metadata
 */
export function categorizeError(error: unknown, context?: Record<string, unknown>): StructuredError {
  const err = error instanceof Error ? error : new Error(String(error));
  const baseContext = context ?? {};

  if (err instanceof WayfarerError) {
    const classification = WAYFARER_CATEGORIES[err.category];
    return {
      ...classification,
      retryable: classification.retryable || err.isRetryable,
      code: err.code,
      message: err.message,
      context: { ...err.context, ...baseContext },
      cause: err,
    };
  }

  const nodeCode = extractNodeErrorCode(err);
  const nodeCategory = nodeCode ? NODE_ERROR_CATEGORIES[nodeCode] : undefined;
  if (nodeCategory) {
    return {
      category: nodeCategory.category,
      code: nodeCategory.code,
      message: err.message,
      context: { ...baseContext, nodeCode },
      recoverable: false,
      retryable: nodeCategory.retryable,
      cause: err,
    };
  }

  const lowerMessage = err.message.toLowerCase();
  if (lowerMessage.includes('timeout') || lowerMessage.includes('timed out')) {
    return {
      category: LogErrorCategory.TOOL_EXECUTION,
      code: LogErrorCodes.TOOL_TIMEOUT,
      message: err.message,
      context: baseContext,
      recoverable: true,
      retryable: true,
      cause: err,
    };
  }

  return {
    category: LogErrorCategory.UNKNOWN,
    code: ErrorCodes.UNKNOWN,
    message: err.message,
    context: baseContext,
    recoverable: false,
    retryable: false,
    cause: err,
  };
}

function extractNodeErrorCode(err: Error): string | undefined {
  if ('code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}
