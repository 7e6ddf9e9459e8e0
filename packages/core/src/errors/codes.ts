/**
 * @fileoverview Error codes
 *
 * Machine-readable codes carried by every WayfarerError. The transport layer
 * maps these to wire responses.
 */

export const ErrorCodes = {
  // Validation
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  INVALID_DIFF: 'INVALID_DIFF',
  MISSING_TASK_ID: 'MISSING_TASK_ID',
  INVALID_TASK: 'INVALID_TASK',
  INVALID_STATUS: 'INVALID_STATUS',
  STATUS_REGRESSION: 'STATUS_REGRESSION',
  TASK_ID_MISMATCH: 'TASK_ID_MISMATCH',
  DUPLICATE_TASK_ID: 'DUPLICATE_TASK_ID',
  STATE_SCHEMA: 'STATE_SCHEMA',
  INVALID_PARAMS: 'INVALID_PARAMS',

  // Concurrency
  CONCURRENCY_TIMEOUT: 'CONCURRENCY_TIMEOUT',

  // Tool execution
  TOOL_NOT_FOUND: 'TOOL_NOT_FOUND',
  TOOL_INVALID_PARAMS: 'TOOL_INVALID_PARAMS',
  TOOL_EXECUTION_FAILED: 'TOOL_EXECUTION_FAILED',
  TOOL_REPORTED_ERROR: 'TOOL_REPORTED_ERROR',
  TOOL_TIMEOUT: 'TOOL_TIMEOUT',
  TOOL_CALL_MISSING: 'TOOL_CALL_MISSING',
  BATCH_TIMEOUT: 'BATCH_TIMEOUT',

  // Persistence
  PERSISTENCE_READ_ERROR: 'PERSISTENCE_READ_ERROR',
  PERSISTENCE_WRITE_ERROR: 'PERSISTENCE_WRITE_ERROR',
  PERSISTENCE_DELETE_ERROR: 'PERSISTENCE_DELETE_ERROR',

  // Session
  SESSION_NOT_LOADED: 'SESSION_NOT_LOADED',

  // Agents
  AGENT_FAILED: 'AGENT_FAILED',

  // Configuration
  TEMPLATE_INVALID: 'TEMPLATE_INVALID',
  SETTINGS_INVALID: 'SETTINGS_INVALID',

  UNKNOWN: 'UNKNOWN',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
