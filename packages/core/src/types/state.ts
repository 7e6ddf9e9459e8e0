/**
 * @fileoverview Session state model
 *
 * The canonical per-session state shared by every agent. Known fields are
 * typed; any additional JSON fields an agent records are preserved.
 */

import type { JsonObject, JsonValue } from './json.js';

// =============================================================================
// Tasks
// =============================================================================

export const TASK_STATUSES = ['pending', 'in_progress', 'done', 'failed'] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

/**
 * A unit of work tracked in session state.
 * `task_id` is unique within a session.
 */
export type Task = {
  task_id: string;
  /** ISO 8601 creation time */
  timestamp: string;
  /** Agent that created the task (intake, planner, follower, ...) */
  agent_origin: string;
  intent: string;
  status: TaskStatus;
  /** Free-form annotations: tool call, priority, results, errors */
  metadata: JsonObject;
  [field: string]: JsonValue;
};

/**
 * Task fields accepted when creating a task; missing fields get defaults
 */
export type NewTask = {
  task_id?: string;
  timestamp?: string;
  agent_origin?: string;
  intent: string;
  status?: TaskStatus;
  metadata?: JsonObject;
};

// =============================================================================
// User Profile
// =============================================================================

/**
 * Traveler preferences. Known keys come from the state template; values are
 * any JSON the agents record (strings, lists, structured selections, null).
 */
export type UserProfile = {
  passport_nationality: JsonValue;
  seat_preference: JsonValue;
  food_preference: JsonValue;
  allergies: JsonValue;
  likes: JsonValue;
  dislikes: JsonValue;
  price_sensitivity: JsonValue;
  home: JsonValue;
  [field: string]: JsonValue;
};

// =============================================================================
// Travel Info
// =============================================================================

/**
 * Trip context. `outbound`, `return` and `hotel` hold per-leg selections,
 * which may be plain strings or structured records.
 */
export type TravelInfo = {
  origin: JsonValue;
  destination: JsonValue;
  start_date: JsonValue;
  end_date: JsonValue;
  itinerary: JsonValue;
  outbound: JsonValue;
  return: JsonValue;
  hotel: JsonValue;
  poi: JsonValue;
  itinerary_datetime: JsonValue;
  itinerary_start_date: JsonValue;
  itinerary_end_date: JsonValue;
  [field: string]: JsonValue;
};

// =============================================================================
// Session State
// =============================================================================

export type SessionState = {
  user_profile: UserProfile;
  tasks: Task[];
  travel_info: TravelInfo;
  [field: string]: JsonValue;
};

/**
 * Plain partial state shape an agent hands to `proposeDiff`
 */
export type StateUpdates = JsonObject;
