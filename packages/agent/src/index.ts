/**
 * @fileoverview @wayfarer/agent
 *
 * State manager, task executor, orchestrator loop and session service.
 */

export * from './store/index.js';
export * from './state/index.js';
export * from './executor/index.js';
export * from './agents/index.js';
export * from './orchestrator/index.js';
export * from './session/index.js';
export * from './runtime.js';
export { TimeoutError, withTimeout, sleep } from './utils/async.js';
