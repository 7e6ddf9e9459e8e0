export { ConversationHistory, type ConversationHistoryConfig } from './conversation-history.js';
export {
  SessionService,
  type CreatedSession,
  type SessionServiceConfig,
} from './session-service.js';
