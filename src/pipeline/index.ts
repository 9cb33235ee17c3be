/**
 * Pipeline System
 *
 * Re-exports for the analysis pipeline.
 */

export {
  AnalysisOrchestrator,
  createAnalysisOrchestrator,
  EXTRACT_DIR_NAME,
  type AnalysisRun,
  type FindingsExtractor,
  type OrchestratorConfig,
  type PipelineState,
  type RunStatus,
} from './analysis-orchestrator.js';

export {
  formatAsLegacyString,
  formatAsMarkdown,
  formatAsCompactSummary,
  groupByFile,
  toFindingRecords,
  type FindingRecord,
} from './result-formatter.js';
