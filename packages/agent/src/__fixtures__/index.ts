/**
 * @fileoverview Test fixtures: scripted agents, fake tools and store doubles
 */

export * from './agents.js';
export * from './tools.js';
export * from './store.js';
