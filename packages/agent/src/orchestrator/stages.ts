/**
 * @fileoverview Orchestrator stages and their legal transitions
 */

export const STAGES = ['intake', 'plan', 'execute', 'reflect', 'finalize', 'done'] as const;

export type Stage = (typeof STAGES)[number];

export const STAGE_TRANSITIONS: Readonly<Record<Stage, readonly Stage[]>> = {
  intake: ['plan', 'done'],
  plan: ['execute'],
  execute: ['reflect'],
  reflect: ['execute', 'finalize'],
  finalize: ['done'],
  done: [],
};

export function canAdvance(from: Stage, to: Stage): boolean {
  return STAGE_TRANSITIONS[from].includes(to);
}

/**
 * @throws Error on a transition outside the table
 */
export function assertTransition(from: Stage, to: Stage): void {
  if (!canAdvance(from, to)) {
    throw new Error(`Illegal stage transition ${from} -> ${to}`);
  }
}
