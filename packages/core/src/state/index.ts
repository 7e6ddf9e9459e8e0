export * from './schemas.js';
export * from './status.js';
export * from './diff.js';
export * from './merge.js';
export * from './template.js';
