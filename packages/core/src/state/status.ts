/**
 * @fileoverview Task status transitions
 *
 * pending -> in_progress -> {done, failed}. Terminal statuses never change.
 */

import { TASK_STATUSES, type TaskStatus } from '../types/state.js';

const STATUS_RANK: Record<TaskStatus, number> = {
  pending: 0,
  in_progress: 1,
  done: 2,
  failed: 2,
};

export function isTaskStatus(value: unknown): value is TaskStatus {
  return TASK_STATUSES.some((status) => status === value);
}

export function isTerminalStatus(status: TaskStatus): boolean {
  return status === 'done' || status === 'failed';
}

/**
 * Whether a task may move from `from` to `to`. Same-status writes are allowed.
 */
export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  if (from === to) return true;
  if (isTerminalStatus(from)) return false;
  return STATUS_RANK[to] > STATUS_RANK[from];
}
