/**
 * Ingestion pipeline
 *
 * @module pipeline
 */

export {
  IngestionOrchestrator,
  type IngestionSummary,
  type CategoryStats,
  type RecordOutcome,
  type OrchestratorCallbacks,
  type OrchestratorDeps,
} from './orchestrator.js';
export { createRunContext, type RunContext } from './run-context.js';
