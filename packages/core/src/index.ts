/**
 * @fileoverview @wayfarer/core
 *
 * State model, merge engine, error hierarchy, logging and settings shared by
 * every Wayfarer package.
 */

export * from './types/index.js';
export * from './state/index.js';
export * from './errors/index.js';
export * from './logging/index.js';
export * from './settings/index.js';
export * from './utils/validation.js';
export * from './utils/ids.js';
