/**
 * @fileoverview Scripted sub-agents
 *
 * Deterministic stand-ins for the model-backed agents. Each builds its diff
 * through the view, the same way a real agent does.
 */

import {
  diffFromTaskResults,
  type JsonObject,
  type ToolCall,
} from '@wayfarer/core';
import type {
  FinalizerAgent,
  FollowerAgent,
  IntakeAgent,
  OrchestratorAgents,
  PlannerAgent,
} from '../agents/types.js';

export interface PlannedTask {
  task_id: string;
  category: string;
  tool: ToolCall;
  priority?: number;
}

export const INTENT_TASK_ID = 'intent_1';

export function plannedEntry(task: PlannedTask, origin: string): JsonObject {
  const metadata: JsonObject = {
    category: task.category,
    tool: { name: task.tool.name, arguments: task.tool.arguments },
  };
  if (task.priority !== undefined) metadata.priority = task.priority;
  return {
    task_id: task.task_id,
    intent: `${task.category}_search`,
    agent_origin: origin,
    status: 'pending',
    metadata,
  };
}

export function createIntakeAgent(options: { clarify?: string } = {}): IntakeAgent {
  return {
    name: 'intake',
    async propose(view, input) {
      if (options.clarify !== undefined) {
        return {
          output: { needsClarification: true, reply: options.clarify },
          diff: view.proposeDiff({ user_profile: { last_question: options.clarify } }),
        };
      }
      return {
        output: { needsClarification: false, intentTaskId: INTENT_TASK_ID },
        diff: view.proposeDiff({
          tasks: [
            {
              task_id: INTENT_TASK_ID,
              intent: 'trip_request',
              agent_origin: 'intake',
              status: 'in_progress',
              metadata: { message: input.message, history_turns: input.history.length },
            },
          ],
        }),
      };
    },
  };
}

export function createPlannerAgent(plan: PlannedTask[]): PlannerAgent {
  return {
    name: 'planner',
    async propose(view) {
      const taskStructure: Record<string, string[]> = {};
      for (const task of plan) {
        (taskStructure[task.category] ??= []).push(task.task_id);
      }
      return {
        output: { taskStructure },
        diff: view.proposeDiff({ tasks: plan.map((task) => plannedEntry(task, 'planner')) }),
      };
    },
  };
}

/**
 * Records each batch's results; `followUps[i]` is added after iteration i + 1
 */
export function createFollowerAgent(followUps: PlannedTask[][] = []): FollowerAgent {
  return {
    name: 'follower',
    async propose(view, input) {
      const extra = followUps[input.iteration - 1] ?? [];
      if (extra.length === 0) {
        return {
          output: { needsAdditionalTasks: false, reasoning: 'all results collected' },
          diff: diffFromTaskResults(input.results),
        };
      }
      return {
        output: { needsAdditionalTasks: true, reasoning: 'follow-up searches needed' },
        diff: view.proposeDiff({
          tasks: [
            ...input.results.map((result) => ({ task_id: result.task_id, status: result.status })),
            ...extra.map((task) => plannedEntry(task, 'follower')),
          ],
        }),
      };
    },
  };
}

export function createFinalizerAgent(): FinalizerAgent {
  return {
    name: 'finalizer',
    async propose(view, input) {
      const tasks = view.getState().tasks;
      const open = tasks.filter((task) => task.status === 'in_progress');
      const done = tasks.filter((task) => task.status === 'done').length;
      const executed = input.iterations.reduce((sum, iteration) => sum + iteration.summary.total, 0);
      return {
        output: { summary: `Executed ${executed} tasks, ${done} done before finalizing` },
        diff: view.proposeDiff({ tasks: open.map((task) => ({ task_id: task.task_id, status: 'done' })) }),
      };
    },
  };
}

export function createScriptedAgents(
  plan: PlannedTask[],
  overrides: Partial<OrchestratorAgents> = {}
): OrchestratorAgents {
  return {
    intake: overrides.intake ?? createIntakeAgent(),
    planner: overrides.planner ?? createPlannerAgent(plan),
    follower: overrides.follower ?? createFollowerAgent(),
    finalizer: overrides.finalizer ?? createFinalizerAgent(),
  };
}

/**
 * Agents whose task ids derive from the message, so several requests can
 * share one session: intake adds `intent_<message>`, the planner adds one
 * `hotel_<message>` search and the finalizer closes the intent task.
 */
export function createPerMessageAgents(): OrchestratorAgents {
  return {
    intake: {
      name: 'intake',
      async propose(view, input) {
        const intentTaskId = `intent_${input.message}`;
        return {
          output: { needsClarification: false, intentTaskId },
          diff: view.proposeDiff({
            tasks: [{ task_id: intentTaskId, intent: 'trip_request', agent_origin: 'intake', status: 'in_progress' }],
          }),
        };
      },
    },
    planner: {
      name: 'planner',
      async propose(view, input) {
        const task: PlannedTask = {
          task_id: `hotel_${input.message}`,
          category: 'hotel',
          tool: { name: 'hotel_search', arguments: { city: input.message } },
        };
        return {
          output: { taskStructure: { hotel: [task.task_id] } },
          diff: view.proposeDiff({ tasks: [plannedEntry(task, 'planner')] }),
        };
      },
    },
    follower: createFollowerAgent(),
    finalizer: {
      name: 'finalizer',
      async propose(view, input) {
        return {
          output: { summary: `Finished ${input.message}` },
          diff: view.proposeDiff({ tasks: [{ task_id: `intent_${input.message}`, status: 'done' }] }),
        };
      },
    },
  };
}
