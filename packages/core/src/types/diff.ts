/**
 * @fileoverview Diff types
 *
 * A diff is a tagged tree. Each node says how it merges:
 * - `value`  replaces the current value
 * - `object` recurses into a mapping field by field
 * - `tasks`  key-merges a task list by `task_id`
 */

import type { JsonValue } from './json.js';

export interface ValueNode {
  kind: 'value';
  value: JsonValue;
}

export interface ObjectNode {
  kind: 'object';
  fields: Record<string, DiffNode>;
}

export interface TaskListNode {
  kind: 'tasks';
  entries: TaskPatch[];
}

export interface TaskPatch {
  task_id: string;
  fields: Record<string, DiffNode>;
}

export type DiffNode = ValueNode | ObjectNode | TaskListNode;

/** Root of a diff; always an object node */
export type Diff = ObjectNode;

export type MergeRule = 'replace' | 'recurse' | 'key-merge';
