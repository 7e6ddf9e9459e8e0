/**
 * @fileoverview Store key layout
 */

export function stateKey(sessionId: string): string {
  return `state_${sessionId}`;
}

export function historyKey(sessionId: string): string {
  return `messages_${sessionId}`;
}
