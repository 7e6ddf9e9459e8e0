/**
 * @fileoverview Logging Context - AsyncLocalStorage for automatic context propagation
 *
 * Carries session, request and stage identifiers through async call chains
 * so every log line inside a request is tagged without threading the
 * values through every function.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

// =============================================================================
// Types
// =============================================================================

export interface LoggingContext {
  sessionId?: string;
  requestId?: string;
  stage?: string;
  iteration?: number;
  taskId?: string;
}

// =============================================================================
// AsyncLocalStorage Instance
// =============================================================================

const loggingContext = new AsyncLocalStorage<LoggingContext>();

// =============================================================================
// Public API
// =============================================================================

/**
 * Run a function with the specified logging context.
 * All logs within the function (including async operations) inherit it.
 *
 * @example
 * await withLoggingContext({ sessionId: 'sess_123' }, () => orchestrator.run(ctx, message));
 */
export function withLoggingContext<T>(context: LoggingContext, fn: () => T): T {
  const parentContext = loggingContext.getStore() ?? {};
  return loggingContext.run({ ...parentContext, ...context }, fn);
}

/**
 * Get the current logging context.
 * Returns an empty object outside of a withLoggingContext block.
 */
export function getLoggingContext(): LoggingContext {
  return loggingContext.getStore() ?? {};
}

/**
 * Update the current logging context in place (e.g. the orchestrator stage).
 * Only works inside a withLoggingContext block.
 */
export function updateLoggingContext(updates: Partial<LoggingContext>): void {
  const store = loggingContext.getStore();
  if (store) {
    Object.assign(store, updates);
  }
}
