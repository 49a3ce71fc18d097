/**
 * Batch intake
 *
 * Runs the submissions of one batch serially, in input order. Entities created
 * by an earlier submission are candidates for later ones through an overlay
 * registry. A rejected, ambiguous or crashed submission never stops the batch;
 * only the abort signal does, checked between submissions.
 */

import { createId } from '@paralleldrive/cuid2'
import { withRequestContext } from '@guitar-registry/logger'
import { logger } from '../config/logger'
import { ERROR_KIND, describeError } from '../errors'
import { OverlayRegistry } from '../registry/overlay-registry'
import type { RegistryView } from '../registry/types'
import { validateBatchShape } from '../schema/validate-shape'
import { emitBatchSummary, summarizeBatch } from './batch-summary'
import { processSubmission } from './submission'
import type { BatchOptions, BatchReport, SubmissionReport } from './types'

const log = logger.orchestrator

export async function processBatch(
  raw: unknown,
  registry: RegistryView,
  options: BatchOptions = {}
): Promise<BatchReport> {
  const runId = options.runId ?? createId()
  return withRequestContext({ runId }, () => runBatch(raw, registry, options, runId))
}

async function runBatch(
  raw: unknown,
  registry: RegistryView,
  options: BatchOptions,
  runId: string
): Promise<BatchReport> {
  const startTime = Date.now()
  const { signal, ...processOptions } = options

  const envelope = validateBatchShape(raw)
  if (!envelope.success) {
    log.warn('INTAKE_BATCH_ENVELOPE_INVALID', { conflictCount: envelope.error.conflicts.length })
    const report: BatchReport = {
      runId,
      reports: [],
      cancelled: false,
      envelopeError: envelope.error,
      durationMs: Date.now() - startTime,
    }
    emitBatchSummary(summarizeBatch(report, 0))
    return report
  }

  const submissions = envelope.data
  const view = new OverlayRegistry(registry)
  const reports: SubmissionReport[] = []
  let cancelled = false

  log.info('INTAKE_BATCH_START', { totalSubmissions: submissions.length })

  for (const [index, item] of submissions.entries()) {
    if (signal?.aborted) {
      cancelled = true
      log.info('INTAKE_BATCH_CANCELLED', { processed: index, totalSubmissions: submissions.length })
      break
    }
    reports.push(await processItem(item, view, processOptions, index))
  }

  const report: BatchReport = {
    runId,
    reports,
    cancelled,
    durationMs: Date.now() - startTime,
  }
  emitBatchSummary(summarizeBatch(report, submissions.length))
  return report
}

/**
 * processSubmission() only throws on programming errors. Contain those to the
 * submission so its siblings still run.
 */
async function processItem(
  item: unknown,
  registry: RegistryView,
  options: Omit<BatchOptions, 'signal'>,
  index: number
): Promise<SubmissionReport> {
  const requestId = createId()
  const startTime = Date.now()
  try {
    return await processSubmission(item, registry, { ...options, requestId })
  } catch (error) {
    log.error('INTAKE_SUBMISSION_CRASHED', { index, requestId }, error)
    const durationMs = Date.now() - startTime
    options.metrics?.recordSubmission('Rejected')
    options.metrics?.recordLatency(durationMs)
    return {
      requestId,
      status: 'Rejected',
      errorKind: ERROR_KIND.INVARIANT_VIOLATION,
      message: describeError(error),
      validation: {},
      conflicts: [],
      resolutions: {},
      resolutionAttempts: 0,
      committedIds: {},
      durationMs,
    }
  }
}
