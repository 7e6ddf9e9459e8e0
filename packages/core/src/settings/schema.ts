/**
 * @fileoverview Settings schema and defaults
 *
 * Every field carries its default, so parsing `{}` yields DEFAULT_SETTINGS
 * and parsing a partial settings file fills in the rest.
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../logging/logger.js';

export const STORE_KINDS = ['memory', 'sqlite'] as const;

export type StoreKind = (typeof STORE_KINDS)[number];

const loggingSettingsSchema = z
  .object({
    level: z.enum(LOG_LEVELS).default('warn'),
    /** Human-readable output through pino-pretty */
    pretty: z.boolean().default(false),
  })
  .default({});

const storeSettingsSchema = z
  .object({
    kind: z.enum(STORE_KINDS).default('memory'),
    /** SQLite database file; ':memory:' keeps it in process */
    sqlitePath: z.string().min(1).default('wayfarer.db'),
  })
  .default({});

const stateSettingsSchema = z
  .object({
    /** Custom session template; the bundled template is used when unset */
    templatePath: z.string().min(1).optional(),
    /** Longest a commit waits for the per-session lock */
    commitLockTimeoutMs: z.number().int().positive().default(5_000),
    /** Commit attempts on lock contention before the request fails */
    commitMaxAttempts: z.number().int().positive().default(3),
    commitRetryDelayMs: z.number().int().nonnegative().default(50),
  })
  .default({});

const executorSettingsSchema = z
  .object({
    /** Worker pool size shared by every session */
    maxConcurrency: z.number().int().positive().default(10),
    /** Bound on a single tool call */
    taskTimeoutMs: z.number().int().positive().default(30_000),
    /** Bound on a whole batch, independent of the per-task bound */
    batchTimeoutMs: z.number().int().positive().default(120_000),
    /** Attempts per task when the tool throws */
    maxRetries: z.number().int().positive().default(3),
    retryDelayMs: z.number().int().nonnegative().default(500),
    /** Lifetime of cached successful tool results; 0 disables caching */
    resultCacheTtlMs: z.number().int().nonnegative().default(300_000),
  })
  .default({});

const orchestratorSettingsSchema = z
  .object({
    /** Execute/reflect rounds per request */
    maxIterations: z.number().int().positive().default(3),
    /** Prior messages handed to the intake agent */
    historyContextMessages: z.number().int().nonnegative().default(10),
  })
  .default({});

export const settingsSchema = z.object({
  logging: loggingSettingsSchema,
  store: storeSettingsSchema,
  state: stateSettingsSchema,
  executor: executorSettingsSchema,
  orchestrator: orchestratorSettingsSchema,
});

export type WayfarerSettings = z.infer<typeof settingsSchema>;

/** Settings as written in a settings file (every field optional) */
export type UserSettings = z.input<typeof settingsSchema>;

export type LoggingSettings = WayfarerSettings['logging'];
export type StoreSettings = WayfarerSettings['store'];
export type StateSettings = WayfarerSettings['state'];
export type ExecutorSettings = WayfarerSettings['executor'];
export type OrchestratorSettings = WayfarerSettings['orchestrator'];

export const DEFAULT_SETTINGS: WayfarerSettings = settingsSchema.parse({});
