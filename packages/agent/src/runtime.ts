/**
 * @fileoverview Runtime factory
 *
 * Wires settings, store, template, state manager, executor, orchestrator and
 * session service into one object. A transport layer creates one runtime per
 * process and calls `close()` on shutdown.
 */

import {
  configureLogger,
  createLogger,
  loadSettings,
  loadStateTemplate,
  type WayfarerSettings,
} from '@wayfarer/core';
import type { OrchestratorAgents } from './agents/types.js';
import { TaskExecutor } from './executor/task-executor.js';
import { ToolRegistry, type ToolDefinition } from './executor/tool-registry.js';
import { WorkerPool } from './executor/worker-pool.js';
import { Orchestrator } from './orchestrator/orchestrator.js';
import { ConversationHistory } from './session/conversation-history.js';
import { SessionService } from './session/session-service.js';
import { StateManager } from './state/state-manager.js';
import { InMemorySessionStore } from './store/memory-store.js';
import { SqliteSessionStore } from './store/sqlite-store.js';
import type { SessionStore } from './store/types.js';

export interface WayfarerRuntimeOptions {
  agents: OrchestratorAgents;
  /** Tool definitions, or a registry built by the caller */
  tools: ToolDefinition[] | ToolRegistry;
  /** Defaults to `loadSettings()` */
  settings?: WayfarerSettings;
  /** Overrides `settings.store` */
  store?: SessionStore;
}

export interface WayfarerRuntime {
  settings: WayfarerSettings;
  store: SessionStore;
  tools: ToolRegistry;
  pool: WorkerPool;
  stateManager: StateManager;
  executor: TaskExecutor;
  orchestrator: Orchestrator;
  history: ConversationHistory;
  sessions: SessionService;
  close(): Promise<void>;
}

function createStore(settings: WayfarerSettings): SessionStore {
  if (settings.store.kind === 'sqlite') {
    return new SqliteSessionStore({ dbPath: settings.store.sqlitePath });
  }
  return new InMemorySessionStore();
}

export function createWayfarerRuntime(options: WayfarerRuntimeOptions): WayfarerRuntime {
  const settings = options.settings ?? loadSettings();
  configureLogger({
    level: settings.logging.level,
    pretty: settings.logging.pretty ? true : undefined,
  });
  const logger = createLogger('runtime');

  const store = options.store ?? createStore(settings);
  const template = loadStateTemplate(settings.state.templatePath);
  const tools = options.tools instanceof ToolRegistry ? options.tools : new ToolRegistry(options.tools);

  const stateManager = new StateManager({
    store,
    template,
    lockTimeoutMs: settings.state.commitLockTimeoutMs,
  });
  const pool = new WorkerPool(settings.executor.maxConcurrency);
  const executor = new TaskExecutor({
    tools,
    pool,
    taskTimeoutMs: settings.executor.taskTimeoutMs,
    batchTimeoutMs: settings.executor.batchTimeoutMs,
    maxRetries: settings.executor.maxRetries,
    retryDelayMs: settings.executor.retryDelayMs,
    resultCacheTtlMs: settings.executor.resultCacheTtlMs,
  });
  const orchestrator = new Orchestrator({
    agents: options.agents,
    executor,
    maxIterations: settings.orchestrator.maxIterations,
    commitMaxAttempts: settings.state.commitMaxAttempts,
    commitRetryDelayMs: settings.state.commitRetryDelayMs,
  });
  const history = new ConversationHistory({ store });
  const sessions = new SessionService({
    stateManager,
    orchestrator,
    history,
    historyContextMessages: settings.orchestrator.historyContextMessages,
  });

  logger.info('Runtime ready', {
    store: options.store ? 'custom' : settings.store.kind,
    maxConcurrency: settings.executor.maxConcurrency,
    tools: tools.list().length,
  });

  return {
    settings,
    store,
    tools,
    pool,
    stateManager,
    executor,
    orchestrator,
    history,
    sessions,
    close: () => store.close(),
  };
}
