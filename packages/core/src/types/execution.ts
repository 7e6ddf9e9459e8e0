/**
 * @fileoverview Task execution types
 */

import type { JsonObject } from './json.js';
import type { Task } from './state.js';

/**
 * External call carried by a task in `metadata.tool`
 */
export interface ToolCall {
  name: string;
  arguments: JsonObject;
}

export type TaskResultStatus = 'done' | 'failed';

/**
 * Outcome of one task. `metadata` holds `tool`, `attempts`, `cached`,
 * `duration_ms` and either `result` or `error`.
 */
export interface TaskResult {
  task_id: string;
  status: TaskResultStatus;
  metadata: JsonObject;
}

export interface ExecutionSummary {
  total: number;
  completed: number;
  failed: number;
  duration_ms: number;
}

/**
 * One batch of tasks submitted to the executor together
 */
export interface TaskIteration {
  iteration: number;
  started_at: string;
  completed_at: string;
  tasks: Task[];
  results: TaskResult[];
  summary: ExecutionSummary;
}
