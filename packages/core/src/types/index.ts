export * from './json.js';
export * from './state.js';
export * from './diff.js';
export * from './execution.js';
export * from './message.js';
