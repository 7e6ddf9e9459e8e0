export type { SessionStore } from './types.js';
export { stateKey, historyKey } from './keys.js';
export { InMemorySessionStore } from './memory-store.js';
export { SqliteSessionStore, type SqliteSessionStoreConfig } from './sqlite-store.js';
