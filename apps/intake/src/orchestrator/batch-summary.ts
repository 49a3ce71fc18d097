/**
 * Intake Batch Summary
 *
 * One standardized summary event per batch run, so every run can be found by
 * filtering logs on `event_name: 'INTAKE_BATCH_SUMMARY'`.
 */

import { rootLogger } from '../config/logger'
import type { BatchReport } from './types'

const log = rootLogger.child('batch-summary')

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export type BatchRunStatus = 'SUCCESS' | 'WARNING' | 'FAILED'

export interface BatchRunSummary {
  runId: string
  status: BatchRunStatus
  durationMs: number
  cancelled: boolean

  input: {
    /** Submissions in the batch envelope (0 when the envelope was malformed) */
    totalSubmissions: number
  }

  output: {
    processed: number
    committed: number
    ambiguous: number
    rejected: number
  }

  /** Entity-level decisions of committed submissions */
  entities: {
    created: number
    matched: number
  }

  errors: {
    count: number
    /** Error kind distribution */
    kinds: Record<string, number>
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Summarizing
// ═══════════════════════════════════════════════════════════════════════════════

export function summarizeBatch(report: BatchReport, totalSubmissions: number): BatchRunSummary {
  const output = { processed: report.reports.length, committed: 0, ambiguous: 0, rejected: 0 }
  const entities = { created: 0, matched: 0 }
  const kinds: Record<string, number> = {}

  for (const submission of report.reports) {
    if (submission.status === 'Committed') {
      output.committed++
      for (const outcome of Object.values(submission.resolutions)) {
        if (outcome?.type === 'Created') entities.created++
        if (outcome?.type === 'Matched') entities.matched++
      }
    } else if (submission.status === 'Ambiguous') {
      output.ambiguous++
    } else {
      output.rejected++
    }

    if (submission.status !== 'Committed' && submission.errorKind) {
      kinds[submission.errorKind] = (kinds[submission.errorKind] ?? 0) + 1
    }
  }

  let status: BatchRunStatus = 'SUCCESS'
  if (report.envelopeError || (output.processed > 0 && output.committed === 0)) {
    status = 'FAILED'
  } else if (output.rejected > 0 || output.ambiguous > 0 || report.cancelled) {
    status = 'WARNING'
  }

  return {
    runId: report.runId,
    status,
    durationMs: report.durationMs,
    cancelled: report.cancelled,
    input: { totalSubmissions },
    output,
    entities,
    errors: {
      count: output.rejected + output.ambiguous + (report.envelopeError ? 1 : 0),
      kinds,
    },
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Logging
// ═══════════════════════════════════════════════════════════════════════════════

export function emitBatchSummary(summary: BatchRunSummary): void {
  const logLevel = summary.status === 'FAILED' ? 'error' : summary.status === 'WARNING' ? 'warn' : 'info'
  const processed = summary.output.processed

  log[logLevel]('INTAKE_BATCH_SUMMARY', {
    event_name: 'INTAKE_BATCH_SUMMARY',
    runId: summary.runId,
    status: summary.status,
    cancelled: summary.cancelled,
    durationMs: summary.durationMs,

    // Counts
    totalSubmissions: summary.input.totalSubmissions,
    processed,
    committed: summary.output.committed,
    ambiguous: summary.output.ambiguous,
    rejected: summary.output.rejected,
    entitiesCreated: summary.entities.created,
    entitiesMatched: summary.entities.matched,

    // Errors
    errorCount: summary.errors.count,
    ...(Object.keys(summary.errors.kinds).length > 0 && { errorKinds: summary.errors.kinds }),

    // Derived
    commitRate: processed > 0 ? ((summary.output.committed / processed) * 100).toFixed(2) : '0.00',
  })
}
