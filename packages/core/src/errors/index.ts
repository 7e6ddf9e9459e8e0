/**
 * @fileoverview Error types and handling utilities
 */

export * from './codes.js';
export * from './errors.js';
