/**
 * @fileoverview Identifier generation
 */

import { randomUUID } from 'node:crypto';

function shortId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 16);
}

export function createSessionId(): string {
  return `sess_${shortId()}`;
}

export function createTaskId(): string {
  return `task_${shortId()}`;
}

export function createRequestId(): string {
  return `req_${shortId()}`;
}
