/**
 * @fileoverview Conversation history entries
 */

export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
  /** ISO-8601 */
  timestamp: string;
}
