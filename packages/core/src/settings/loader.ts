/**
 * @fileoverview Settings loader
 *
 * Resolution order: schema defaults, then an optional JSON settings file,
 * then WAYFARER_* environment variables.
 */

import { existsSync, readFileSync } from 'node:fs';
import { LOG_LEVELS } from '../logging/logger.js';
import { createLogger } from '../logging/index.js';
import { WayfarerError } from '../errors/errors.js';
import { ErrorCodes } from '../errors/codes.js';
import { formatValidationMessage, zodErrorToIssues } from '../utils/validation.js';
import { parseEnvBoolean, parseEnvEnum, parseEnvInteger, type EnvParseLogger } from './env-parsing.js';
import { settingsSchema, STORE_KINDS, type WayfarerSettings } from './schema.js';

export const SETTINGS_PATH_ENV = 'WAYFARER_SETTINGS';

export interface LoadSettingsOptions {
  /** Settings file; defaults to $WAYFARER_SETTINGS. A missing file is not an error. */
  path?: string;
  env?: NodeJS.ProcessEnv;
  logger?: EnvParseLogger;
}

/**
 * Read and validate a settings file. Returns null when the file does not exist.
 */
export function loadSettingsFile(path: string): WayfarerSettings | null {
  if (!existsSync(path)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new WayfarerError(`Cannot parse settings file ${path}`, {
      code: ErrorCodes.SETTINGS_INVALID,
      category: 'configuration',
      context: { path },
      cause: error,
    });
  }

  const result = settingsSchema.safeParse(raw);
  if (!result.success) {
    throw new WayfarerError(
      `Invalid settings file ${path}: ${formatValidationMessage(zodErrorToIssues(result.error))}`,
      { code: ErrorCodes.SETTINGS_INVALID, category: 'configuration', context: { path } }
    );
  }
  return result.data;
}

/**
 * Apply environment variable overrides to settings
 */
export function applyEnvOverrides(
  settings: WayfarerSettings,
  env: NodeJS.ProcessEnv = process.env,
  logger: EnvParseLogger = createLogger('settings')
): WayfarerSettings {
  const { logging, store, state, executor, orchestrator } = settings;

  return {
    logging: {
      level: parseEnvEnum(env.WAYFARER_LOG_LEVEL, {
        name: 'WAYFARER_LOG_LEVEL',
        fallback: logging.level,
        allowed: LOG_LEVELS,
        logger,
      }),
      pretty: parseEnvBoolean(env.WAYFARER_LOG_PRETTY, {
        name: 'WAYFARER_LOG_PRETTY',
        fallback: logging.pretty,
        logger,
      }),
    },
    store: {
      kind: parseEnvEnum(env.WAYFARER_STORE, {
        name: 'WAYFARER_STORE',
        fallback: store.kind,
        allowed: STORE_KINDS,
        logger,
      }),
      sqlitePath: env.WAYFARER_SQLITE_PATH?.trim() || store.sqlitePath,
    },
    state: {
      ...state,
      templatePath: env.WAYFARER_TEMPLATE_PATH?.trim() || state.templatePath,
      commitLockTimeoutMs: parseEnvInteger(env.WAYFARER_COMMIT_LOCK_TIMEOUT_MS, {
        name: 'WAYFARER_COMMIT_LOCK_TIMEOUT_MS',
        fallback: state.commitLockTimeoutMs,
        min: 1,
        logger,
      }),
    },
    executor: {
      ...executor,
      maxConcurrency: parseEnvInteger(env.WAYFARER_MAX_CONCURRENCY, {
        name: 'WAYFARER_MAX_CONCURRENCY',
        fallback: executor.maxConcurrency,
        min: 1,
        max: 1024,
        logger,
      }),
      taskTimeoutMs: parseEnvInteger(env.WAYFARER_TASK_TIMEOUT_MS, {
        name: 'WAYFARER_TASK_TIMEOUT_MS',
        fallback: executor.taskTimeoutMs,
        min: 1,
        logger,
      }),
      batchTimeoutMs: parseEnvInteger(env.WAYFARER_BATCH_TIMEOUT_MS, {
        name: 'WAYFARER_BATCH_TIMEOUT_MS',
        fallback: executor.batchTimeoutMs,
        min: 1,
        logger,
      }),
      maxRetries: parseEnvInteger(env.WAYFARER_MAX_RETRIES, {
        name: 'WAYFARER_MAX_RETRIES',
        fallback: executor.maxRetries,
        min: 1,
        max: 10,
        logger,
      }),
      resultCacheTtlMs: parseEnvInteger(env.WAYFARER_RESULT_CACHE_TTL_MS, {
        name: 'WAYFARER_RESULT_CACHE_TTL_MS',
        fallback: executor.resultCacheTtlMs,
        min: 0,
        logger,
      }),
    },
    orchestrator: {
      ...orchestrator,
      maxIterations: parseEnvInteger(env.WAYFARER_MAX_ITERATIONS, {
        name: 'WAYFARER_MAX_ITERATIONS',
        fallback: orchestrator.maxIterations,
        min: 1,
        max: 10,
        logger,
      }),
    },
  };
}

/**
 * Load settings: defaults, then the settings file, then the environment
 */
export function loadSettings(options: LoadSettingsOptions = {}): WayfarerSettings {
  const env = options.env ?? process.env;
  const path = options.path ?? env[SETTINGS_PATH_ENV];
  const fromFile = path ? loadSettingsFile(path) : null;
  return applyEnvOverrides(fromFile ?? settingsSchema.parse({}), env, options.logger);
}
