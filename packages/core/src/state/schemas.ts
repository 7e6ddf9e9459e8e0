/**
 * @fileoverview Zod schemas for state, diffs and templates
 */

import { z } from 'zod';
import type { JsonValue } from '../types/json.js';
import type { DiffNode, TaskPatch } from '../types/diff.js';
import {
  TASK_STATUSES,
  type SessionState,
  type Task,
  type TravelInfo,
  type UserProfile,
} from '../types/state.js';
import type { ToolCall } from '../types/execution.js';
import type { ChatMessage } from '../types/message.js';

// =============================================================================
// JSON
// =============================================================================

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

export const jsonObjectSchema = z.record(jsonValueSchema);

// =============================================================================
// State
// =============================================================================

export const taskStatusSchema = z.enum(TASK_STATUSES);

export const taskSchema: z.ZodType<Task> = z
  .object({
    task_id: z.string().min(1),
    timestamp: z.string(),
    agent_origin: z.string(),
    intent: z.string(),
    status: taskStatusSchema,
    metadata: jsonObjectSchema,
  })
  .catchall(jsonValueSchema);

export const userProfileSchema: z.ZodType<UserProfile> = z
  .object({
    passport_nationality: jsonValueSchema,
    seat_preference: jsonValueSchema,
    food_preference: jsonValueSchema,
    allergies: jsonValueSchema,
    likes: jsonValueSchema,
    dislikes: jsonValueSchema,
    price_sensitivity: jsonValueSchema,
    home: jsonValueSchema,
  })
  .catchall(jsonValueSchema);

export const travelInfoSchema: z.ZodType<TravelInfo> = z
  .object({
    origin: jsonValueSchema,
    destination: jsonValueSchema,
    start_date: jsonValueSchema,
    end_date: jsonValueSchema,
    itinerary: jsonValueSchema,
    outbound: jsonValueSchema,
    return: jsonValueSchema,
    hotel: jsonValueSchema,
    poi: jsonValueSchema,
    itinerary_datetime: jsonValueSchema,
    itinerary_start_date: jsonValueSchema,
    itinerary_end_date: jsonValueSchema,
  })
  .catchall(jsonValueSchema);

export const sessionStateSchema: z.ZodType<SessionState> = z
  .object({
    user_profile: userProfileSchema,
    tasks: z.array(taskSchema),
    travel_info: travelInfoSchema,
  })
  .catchall(jsonValueSchema);

export const stateTemplateSchema = z.object({
  version: z.number().int().positive(),
  state: sessionStateSchema,
});

export type StateTemplate = z.infer<typeof stateTemplateSchema>;

// =============================================================================
// Diff
// =============================================================================

export const diffNodeSchema: z.ZodType<DiffNode> = z.lazy(() =>
  z.union([
    z.object({ kind: z.literal('value'), value: jsonValueSchema }),
    z.object({ kind: z.literal('object'), fields: z.record(diffNodeSchema) }),
    z.object({ kind: z.literal('tasks'), entries: z.array(taskPatchSchema) }),
  ])
);

export const taskPatchSchema: z.ZodType<TaskPatch> = z.lazy(() =>
  z.object({
    task_id: z.string().min(1),
    fields: z.record(diffNodeSchema),
  })
);

export const diffSchema = z.object({
  kind: z.literal('object'),
  fields: z.record(diffNodeSchema),
});

// =============================================================================
// Execution
// =============================================================================

export const toolCallSchema: z.ZodType<ToolCall, z.ZodTypeDef, unknown> = z.object({
  name: z.string().min(1),
  arguments: jsonObjectSchema.default({}),
});

// =============================================================================
// Conversation
// =============================================================================

export const chatMessageSchema: z.ZodType<ChatMessage> = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  timestamp: z.string(),
});

export const chatHistorySchema = z.array(chatMessageSchema);
