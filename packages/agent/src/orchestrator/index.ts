export { STAGES, STAGE_TRANSITIONS, canAdvance, assertTransition, type Stage } from './stages.js';
export {
  Orchestrator,
  type OrchestratorConfig,
  type OrchestratorContext,
  type OrchestratorResponse,
  type OrchestratorStatus,
} from './orchestrator.js';
