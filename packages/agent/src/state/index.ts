export { KeyedMutex, type Release } from './keyed-mutex.js';
export { StateManager, type StateManagerConfig } from './state-manager.js';
export { SessionStateHandle, agentViewOf, type AgentStateView, type SessionStateWriter } from './session-handle.js';
