/**
 * @fileoverview Sub-agent contracts
 *
 * Sub-agents never write state. Each one reads through an AgentStateView and
 * returns its output together with a proposed diff; the orchestrator decides
 * whether and when that diff is committed.
 */

import type { ChatMessage, Diff, TaskIteration, TaskResult } from '@wayfarer/core';
import type { AgentStateView } from '../state/session-handle.js';

export interface AgentProposal<TOutput> {
  output: TOutput;
  diff: Diff;
}

export interface SubAgent<TInput, TOutput> {
  readonly name: string;
  propose(view: AgentStateView, input: TInput): Promise<AgentProposal<TOutput>>;
}

// =============================================================================
// Stage inputs and outputs
// =============================================================================

export interface IntakeInput {
  message: string;
  /** Most recent conversation turns, oldest first */
  history: ChatMessage[];
}

export interface IntakeOutput {
  needsClarification: boolean;
  /** Question for the user when clarification is needed */
  reply?: string;
  /** Task recording the user's intent, if the agent created one */
  intentTaskId?: string;
}

export interface PlanInput {
  message: string;
  intentTaskId?: string;
}

export interface PlanOutput {
  /** Category (flights, hotels, trains, maps, ...) to planned task ids */
  taskStructure: Record<string, string[]>;
}

export interface ReflectInput {
  message: string;
  iteration: number;
  maxIterations: number;
  /** Results of the batch that just ran, in task order */
  results: TaskResult[];
}

export interface ReflectOutput {
  needsAdditionalTasks: boolean;
  reasoning?: string;
}

export interface FinalizeInput {
  message: string;
  iterations: TaskIteration[];
}

export interface FinalizeOutput {
  summary: string;
}

export type IntakeAgent = SubAgent<IntakeInput, IntakeOutput>;
export type PlannerAgent = SubAgent<PlanInput, PlanOutput>;
export type FollowerAgent = SubAgent<ReflectInput, ReflectOutput>;
export type FinalizerAgent = SubAgent<FinalizeInput, FinalizeOutput>;

export interface OrchestratorAgents {
  intake: IntakeAgent;
  planner: PlannerAgent;
  follower: FollowerAgent;
  finalizer: FinalizerAgent;
}
