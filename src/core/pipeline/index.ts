/**
 * Pipeline Module
 *
 * @module
 */

export {
  PipelineOrchestrator,
  createPipelineOrchestrator,
  type IngestionPhase,
  type IngestionProgressEvent,
  type IngestionError,
  type IngestionReport,
  type QuestionOutcome,
  type PipelineStatus,
  type PipelineOrchestratorOptions,
} from "./orchestrator.js";
