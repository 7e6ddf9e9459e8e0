/**
 * @fileoverview Merge Engine
 *
 * Pure, deterministic reconciliation of a state tree with a Diff. No I/O and
 * no clock reads; inputs are never mutated.
 *
 * Rules, chosen per diff node by {@link resolveMergeRule}:
 * - replace:   `value` nodes overwrite (scalars, sequences, explicit values)
 * - recurse:   `object` nodes merge into the current mapping field by field
 * - key-merge: `tasks` nodes update entries by `task_id` and append unknown
 *              ids in diff order
 *
 * The walk uses an explicit work stack, so nesting depth never grows the
 * call stack.
 */

import { isJsonObject, type JsonObject, type JsonValue } from '../types/json.js';
import type { Diff, DiffNode, MergeRule, ObjectNode, TaskListNode } from '../types/diff.js';
import type { SessionState } from '../types/state.js';
import { ValidationError } from '../errors/errors.js';
import { ErrorCodes } from '../errors/codes.js';
import { sessionStateSchema } from './schemas.js';
import { canTransition, isTaskStatus } from './status.js';
import { parseWithSchema } from '../utils/validation.js';
import { TASK_LIST_FIELD } from './diff.js';

// =============================================================================
// Types
// =============================================================================

export interface MergeOptions {
  /** Timestamp stamped on tasks appended to the root task list */
  timestamp?: string;
}

interface Frame {
  target: JsonObject;
  node: ObjectNode;
  path: string;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * The single rule table: how a diff node merges into the current value
 */
export function resolveMergeRule(node: DiffNode): MergeRule {
  switch (node.kind) {
    case 'value':
      return 'replace';
    case 'object':
      return 'recurse';
    case 'tasks':
      return 'key-merge';
  }
}

/**
 * Merge a diff into session state and validate the result
 *
 * @throws ValidationError on a status regression, a task_id rewrite, a
 *   duplicate id in the current list or a result that violates the schema
 */
export function mergeState(current: SessionState, diff: Diff, options: MergeOptions = {}): SessionState {
  const merged = mergeTree(current, diff, options);
  return parseWithSchema(sessionStateSchema, merged, 'merged state', ErrorCodes.STATE_SCHEMA);
}

/**
 * Merge a diff into any JSON tree. Returns a new tree.
 */
export function mergeTree(current: JsonObject, diff: Diff, options: MergeOptions = {}): JsonObject {
  const root = structuredClone(current);
  const stack: Frame[] = [{ target: root, node: diff, path: '' }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;

    for (const [key, child] of Object.entries(frame.node.fields)) {
      const path = frame.path ? `${frame.path}.${key}` : key;

      switch (resolveMergeRule(child)) {
        case 'replace':
          if (child.kind === 'value') {
            frame.target[key] = structuredClone(child.value);
          }
          break;

        case 'recurse':
          if (child.kind === 'object') {
            const existing = frame.target[key];
            const target: JsonObject = isJsonObject(existing) ? existing : {};
            frame.target[key] = target;
            stack.push({ target, node: child, path });
          }
          break;

        case 'key-merge':
          if (child.kind === 'tasks') {
            const existing = frame.target[key];
            const list = Array.isArray(existing) ? existing : [];
            frame.target[key] = list;
            const isRootTaskList = frame.path === '' && key === TASK_LIST_FIELD;
            // Reversed so patches apply in diff order
            stack.push(...mergeTaskList(list, child, path, isRootTaskList, options).reverse());
          }
          break;
      }
    }
  }

  return root;
}

// =============================================================================
// Task Lists
// =============================================================================

/**
 * Apply task patches to `list` in place (list is already a private copy).
 * Returns the frames that apply each patch's fields.
 */
function mergeTaskList(
  list: JsonValue[],
  node: TaskListNode,
  path: string,
  isRootTaskList: boolean,
  options: MergeOptions
): Frame[] {
  const byId = new Map<string, JsonObject>();
  // Status each entry will hold once earlier patches in this diff apply
  const statuses = new Map<string, JsonValue | undefined>();
  for (const entry of list) {
    if (!isJsonObject(entry) || typeof entry.task_id !== 'string') continue;
    if (byId.has(entry.task_id)) {
      throw new ValidationError(`Duplicate task_id ${entry.task_id} at ${path}`, {
        code: ErrorCodes.DUPLICATE_TASK_ID,
        issues: [{ path, message: `Duplicate task_id ${entry.task_id}`, code: ErrorCodes.DUPLICATE_TASK_ID }],
      });
    }
    byId.set(entry.task_id, entry);
    statuses.set(entry.task_id, entry.status);
  }

  const frames: Frame[] = [];
  node.entries.forEach((patch, index) => {
    const entryPath = `${path}.${index}`;
    const idField = patch.fields.task_id;
    if (idField && !(idField.kind === 'value' && idField.value === patch.task_id)) {
      throw new ValidationError(`Task patch ${patch.task_id} may not change task_id`, {
        code: ErrorCodes.TASK_ID_MISMATCH,
        issues: [{ path: `${entryPath}.task_id`, message: 'task_id is immutable', code: ErrorCodes.TASK_ID_MISMATCH }],
      });
    }

    let target = byId.get(patch.task_id);
    if (target) {
      checkStatusTransition(statuses.get(patch.task_id), patch.fields.status, patch.task_id, entryPath);
    } else {
      target = isRootTaskList ? newTaskEntry(patch.task_id, options) : { task_id: patch.task_id };
      list.push(target);
      byId.set(patch.task_id, target);
    }
    const statusNode = patch.fields.status;
    statuses.set(patch.task_id, statusNode?.kind === 'value' ? statusNode.value : target.status);

    frames.push({ target, node: { kind: 'object', fields: patch.fields }, path: entryPath });
  });
  return frames;
}

function newTaskEntry(taskId: string, options: MergeOptions): JsonObject {
  return {
    task_id: taskId,
    timestamp: options.timestamp ?? '',
    agent_origin: 'unknown',
    intent: '',
    status: 'pending',
    metadata: {},
  };
}

function checkStatusTransition(
  from: JsonValue | undefined,
  statusNode: DiffNode | undefined,
  taskId: string,
  path: string
): void {
  if (!statusNode || statusNode.kind !== 'value') return;
  const to = statusNode.value;
  if (!isTaskStatus(from) || !isTaskStatus(to)) return;
  if (!canTransition(from, to)) {
    throw new ValidationError(`Task ${taskId} cannot move from ${from} to ${to}`, {
      code: ErrorCodes.STATUS_REGRESSION,
      issues: [{ path: `${path}.status`, message: `Illegal status transition ${from} -> ${to}`, code: ErrorCodes.STATUS_REGRESSION }],
    });
  }
}
