/**
 * @fileoverview Settings Module
 *
 * @example
 * ```typescript
 * const settings = loadSettings();
 * const pool = new WorkerPool(settings.executor.maxConcurrency);
 * ```
 */

export {
  settingsSchema,
  DEFAULT_SETTINGS,
  STORE_KINDS,
  type StoreKind,
  type WayfarerSettings,
  type UserSettings,
  type LoggingSettings,
  type StoreSettings,
  type StateSettings,
  type ExecutorSettings,
  type OrchestratorSettings,
} from './schema.js';

export {
  loadSettings,
  loadSettingsFile,
  applyEnvOverrides,
  SETTINGS_PATH_ENV,
  type LoadSettingsOptions,
} from './loader.js';

export {
  parseEnvInteger,
  parseEnvBoolean,
  parseEnvEnum,
  type EnvParseLogger,
} from './env-parsing.js';
