/**
 * @fileoverview Diff builders and validation
 *
 * Agents describe the change they want as a plain partial state; these
 * helpers compile it into the tagged Diff the merge engine consumes, and
 * check diffs that arrive from untrusted agent code.
 */

import { isJsonObject, type JsonObject, type JsonValue } from '../types/json.js';
import type { Diff, DiffNode, TaskPatch } from '../types/diff.js';
import type { StateUpdates } from '../types/state.js';
import type { TaskResult } from '../types/execution.js';
import { ValidationError } from '../errors/errors.js';
import { ErrorCodes } from '../errors/codes.js';
import { diffSchema } from './schemas.js';
import { isTaskStatus } from './status.js';
import { parseWithSchema } from '../utils/validation.js';

/** Field name whose list values key-merge by task_id */
export const TASK_LIST_FIELD = 'tasks';

// =============================================================================
// Builders
// =============================================================================

export function emptyDiff(): Diff {
  return { kind: 'object', fields: {} };
}

export function isEmptyDiff(diff: Diff): boolean {
  return Object.keys(diff.fields).length === 0;
}

/**
 * Compile a plain partial state into a Diff.
 *
 * Mappings recurse, arrays under `tasks` key-merge, everything else replaces.
 *
 * @example
 * proposeDiff({ travel_info: { origin: 'DEL' }, tasks: [{ task_id: 't1', status: 'done' }] })
 */
export function proposeDiff(updates: StateUpdates): Diff {
  return { kind: 'object', fields: compileFields(updates, '') };
}

/**
 * Diff touching only the root task list
 */
export function taskDiff(tasks: JsonObject[]): Diff {
  return proposeDiff({ [TASK_LIST_FIELD]: tasks });
}

/**
 * Diff recording executor outcomes: status plus result or error annotations
 */
export function diffFromTaskResults(results: TaskResult[]): Diff {
  return taskDiff(
    results.map((result) => {
      const { result: output, error, ...execution } = result.metadata;
      const metadata: JsonObject = { execution };
      if (output !== undefined) metadata.result = output;
      if (error !== undefined) metadata.error = error;
      return { task_id: result.task_id, status: result.status, metadata };
    })
  );
}

function compileFields(updates: JsonObject, path: string): Record<string, DiffNode> {
  const fields: Record<string, DiffNode> = {};
  for (const [key, value] of Object.entries(updates)) {
    fields[key] = compileNode(key, value, joinPath(path, key));
  }
  return fields;
}

function compileNode(key: string, value: JsonValue, path: string): DiffNode {
  if (key === TASK_LIST_FIELD && Array.isArray(value)) {
    return { kind: 'tasks', entries: value.map((entry, index) => compileTaskPatch(entry, `${path}.${index}`)) };
  }
  if (isJsonObject(value)) {
    return { kind: 'object', fields: compileFields(value, path) };
  }
  return { kind: 'value', value };
}

function compileTaskPatch(entry: JsonValue, path: string): TaskPatch {
  if (!isJsonObject(entry)) {
    throw new ValidationError(`Task entry at ${path} must be an object`, {
      code: ErrorCodes.INVALID_TASK,
      issues: [{ path, message: 'Expected object', code: ErrorCodes.INVALID_TASK }],
    });
  }
  const { task_id: taskId, ...rest } = entry;
  if (typeof taskId !== 'string' || taskId.length === 0) {
    throw new ValidationError(`Task entry at ${path} is missing task_id`, {
      code: ErrorCodes.MISSING_TASK_ID,
      issues: [{ path: `${path}.task_id`, message: 'Required', code: ErrorCodes.MISSING_TASK_ID }],
    });
  }
  if (rest.status !== undefined && !isTaskStatus(rest.status)) {
    throw new ValidationError(`Task ${taskId} has unknown status ${JSON.stringify(rest.status)}`, {
      code: ErrorCodes.INVALID_STATUS,
      issues: [{ path: `${path}.status`, message: 'Unknown status', code: ErrorCodes.INVALID_STATUS }],
    });
  }
  return { task_id: taskId, fields: compileFields(rest, path) };
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Validate a diff received from agent code.
 *
 * Checks the node shape, that task patches never rewrite `task_id`, and that
 * any status they set is a known one.
 */
export function parseDiff(input: unknown): Diff {
  const diff = parseWithSchema(diffSchema, input, 'diff', ErrorCodes.INVALID_DIFF);
  const pending: Array<{ node: DiffNode; path: string }> = [{ node: diff, path: '' }];

  while (pending.length > 0) {
    const current = pending.pop();
    if (!current) break;
    const { node, path } = current;

    if (node.kind === 'object') {
      for (const [key, child] of Object.entries(node.fields)) {
        pending.push({ node: child, path: joinPath(path, key) });
      }
    } else if (node.kind === 'tasks') {
      node.entries.forEach((entry, index) => {
        const entryPath = `${path}.${index}`;
        checkTaskPatch(entry, entryPath);
        for (const [key, child] of Object.entries(entry.fields)) {
          pending.push({ node: child, path: `${entryPath}.${key}` });
        }
      });
    }
  }

  return diff;
}

function checkTaskPatch(patch: TaskPatch, path: string): void {
  const idField = patch.fields.task_id;
  if (idField && !(idField.kind === 'value' && idField.value === patch.task_id)) {
    throw new ValidationError(`Task patch ${patch.task_id} may not change task_id`, {
      code: ErrorCodes.TASK_ID_MISMATCH,
      issues: [{ path: `${path}.task_id`, message: 'task_id is immutable', code: ErrorCodes.TASK_ID_MISMATCH }],
    });
  }
  const statusField = patch.fields.status;
  if (statusField && !(statusField.kind === 'value' && isTaskStatus(statusField.value))) {
    throw new ValidationError(`Task patch ${patch.task_id} sets an unknown status`, {
      code: ErrorCodes.INVALID_STATUS,
      issues: [{ path: `${path}.status`, message: 'Unknown status', code: ErrorCodes.INVALID_STATUS }],
    });
  }
}

function joinPath(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}
