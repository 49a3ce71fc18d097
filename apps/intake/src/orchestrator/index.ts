/**
 * Submission Orchestrator
 */

export { processSubmission, failedStepFor } from './submission'
export { processBatch } from './batch'
export { emitBatchSummary, summarizeBatch } from './batch-summary'
export type { BatchRunStatus, BatchRunSummary } from './batch-summary'
export { IntakeMetrics } from './metrics'
export type { IntakeMetricsSnapshot, OutcomeLabel } from './metrics'
export type {
  BatchOptions,
  BatchReport,
  ProcessOptions,
  SubmissionReport,
  SubmissionStatus,
  SubmissionStep,
  ValidationStage,
} from './types'
