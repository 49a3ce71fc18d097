/**
 * Submission Orchestrator
 *
 * Drives one guitar submission through the pipeline:
 *
 *   envelope shape -> business rules -> resolve manufacturer -> resolve model
 *   -> resolve guitar -> commit (manufacturer, model, guitar, source evidence)
 *
 * Validation covers every entity before anything is resolved, so a submitter
 * sees all fixes at once. Nothing is committed unless every step resolved.
 * Data problems come back in the report; only programming errors throw.
 */

import { createId } from '@paralleldrive/cuid2'
import { getRequestContext, withRequestContext } from '@guitar-registry/logger'
import { DEFAULT_RESOLVER_CONFIG } from '../config/resolver-config'
import { logger } from '../config/logger'
import {
  ERROR_KIND,
  InvariantViolationError,
  StorageFailureError,
  describeError,
  type ErrorKind,
} from '../errors'
import { normalize } from '../normalizer/name-utils'
import type { RegistryView } from '../registry/types'
import { resolve, type ResolverDecision } from '../resolver/resolver'
import type {
  IndividualGuitarSubject,
  ManufacturerSubject,
  ModelSubject,
  ResolutionSubject,
} from '../resolver/types'
import { createRuleContext, validateCrossEntityRules, validateRules } from '../rules/business-rules'
import type { GuitarSubmission } from '../schema/schemas'
import { validateSubmissionShape } from '../schema/validate-shape'
import { type Conflict, type ValidationResult, validationResult } from '../types'
import type { ProcessOptions, SubmissionReport, SubmissionStatus, SubmissionStep } from './types'

const log = logger.orchestrator

/** Entity order used both for processing and for picking the failed step */
const ENTITY_STEPS = ['manufacturer', 'model', 'individual_guitar', 'source_attribution'] as const

// ═══════════════════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * First entity, in processing order, with an error-severity conflict.
 * Conflicts outside any entity (unknown top-level keys, submission-level
 * specifications or finish) belong to the envelope.
 */
export function failedStepFor(conflicts: readonly Conflict[]): SubmissionStep {
  const errors = conflicts.filter(c => c.severity === 'error')
  for (const step of ENTITY_STEPS) {
    if (errors.some(c => c.path === step || c.path.startsWith(`${step}.`))) {
      return step
    }
  }
  return 'envelope'
}

function decisionId(outcome: Exclude<ResolverDecision, { type: 'Ambiguous' }>): string {
  return outcome.type === 'Matched' ? outcome.existingId : outcome.newId
}

function validateSubmissionRules(submission: GuitarSubmission, options: ProcessOptions): {
  rules: ValidationResult
  crossEntity: ValidationResult
} {
  const ctx = createRuleContext(options.now, options.rulesConfig)
  const conflicts: Conflict[] = [
    ...validateRules('manufacturer', submission.manufacturer, ctx, 'manufacturer').conflicts,
    ...validateRules('model', submission.model, ctx, 'model').conflicts,
  ]
  if (submission.individual_guitar) {
    conflicts.push(
      ...validateRules('individual_guitar', submission.individual_guitar, ctx, 'individual_guitar').conflicts
    )
  }
  conflicts.push(
    ...validateRules('source_attribution', submission.source_attribution, ctx, 'source_attribution').conflicts
  )
  if (submission.specifications) {
    conflicts.push(...validateRules('specifications', submission.specifications, ctx, 'specifications').conflicts)
  }
  if (submission.finish) {
    conflicts.push(...validateRules('finish', submission.finish, ctx, 'finish').conflicts)
  }

  return {
    rules: validationResult(conflicts, ERROR_KIND.BUSINESS_RULE_VIOLATION),
    crossEntity: validateCrossEntityRules(submission),
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Pipeline
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Process one raw submission against the registry.
 *
 * Never rejects for bad data, ambiguity or a registry failure: those end up in
 * the report's status and errorKind.
 */
export async function processSubmission(
  raw: unknown,
  registry: RegistryView,
  options: ProcessOptions = {}
): Promise<SubmissionReport> {
  const requestId = options.requestId ?? createId()
  // Keep an enclosing batch's runId on every entry
  return withRequestContext({ ...getRequestContext(), requestId }, () =>
    runSubmission(raw, registry, options, requestId)
  )
}

async function runSubmission(
  raw: unknown,
  registry: RegistryView,
  options: ProcessOptions,
  requestId: string
): Promise<SubmissionReport> {
  const startTime = Date.now()
  const config = options.resolverConfig ?? DEFAULT_RESOLVER_CONFIG
  const report: SubmissionReport = {
    requestId,
    status: 'Rejected',
    validation: {},
    conflicts: [],
    resolutions: {},
    resolutionAttempts: 0,
    committedIds: {},
    durationMs: 0,
  }

  const finish = (status: SubmissionStatus): SubmissionReport => {
    report.status = status
    report.durationMs = Date.now() - startTime
    options.metrics?.recordSubmission(status)
    options.metrics?.recordLatency(report.durationMs)
    return report
  }

  const reject = (errorKind: ErrorKind, failedStep: SubmissionStep, message: string): SubmissionReport => {
    report.errorKind = errorKind
    report.failedStep = failedStep
    report.message = message
    if (failedStep === 'manufacturer' || failedStep === 'model' || failedStep === 'individual_guitar') {
      report.resolutions[failedStep] = { type: 'Rejected', reason: message, errorKind }
      options.metrics?.recordDecision(failedStep, 'Rejected')
    }
    log.warn('SUBMISSION_REJECTED', {
      errorKind,
      failedStep,
      reason: message,
      conflictCount: report.conflicts.length,
    })
    return finish('Rejected')
  }

  const stopAmbiguous = (kind: SubmissionStep, reason: string): SubmissionReport => {
    report.errorKind = ERROR_KIND.AMBIGUOUS
    report.failedStep = kind
    report.message = reason
    log.info('SUBMISSION_AMBIGUOUS', { step: kind, reason })
    return finish('Ambiguous')
  }

  // ─── 1. Envelope shape ───────────────────────────────────────────────────────
  const shape = validateSubmissionShape(raw)
  if (!shape.success) {
    report.validation.shape = shape.error
    report.conflicts.push(...shape.error.conflicts)
    return reject(
      ERROR_KIND.INVALID_SCHEMA,
      failedStepFor(shape.error.conflicts),
      `Submission has ${shape.error.conflicts.length} schema violation(s)`
    )
  }
  const submission = shape.data
  report.validation.shape = { success: true, conflicts: [] }

  // ─── 2. Business rules ───────────────────────────────────────────────────────
  const { rules, crossEntity } = validateSubmissionRules(submission, options)
  report.validation.rules = rules
  report.validation.cross_entity = crossEntity
  report.conflicts.push(...rules.conflicts, ...crossEntity.conflicts)

  if (!rules.success || !crossEntity.success) {
    const errorCount = report.conflicts.filter(c => c.severity === 'error').length
    return reject(
      ERROR_KIND.BUSINESS_RULE_VIOLATION,
      failedStepFor(report.conflicts),
      `Submission violates ${errorCount} business rule(s)`
    )
  }

  // ─── 3-5. Resolution ─────────────────────────────────────────────────────────
  let step: SubmissionStep = 'manufacturer'

  const fetchCandidates = async (subject: ResolutionSubject, hint: string) => {
    try {
      return await registry.fetchCandidates(subject.kind, hint)
    } catch (error) {
      throw new StorageFailureError(`Candidate lookup failed: ${describeError(error)}`, { cause: error })
    }
  }

  const resolveStep = async (subject: ResolutionSubject, hint: string): Promise<ResolverDecision> => {
    step = subject.kind
    const candidates = await fetchCandidates(subject, hint)
    report.resolutionAttempts++
    const outcome = resolve(subject, candidates, { config, submissionId: requestId })
    report.resolutions[subject.kind] = outcome
    options.metrics?.recordDecision(subject.kind, outcome.type)
    return outcome
  }

  const commit: RegistryView['commit'] = async (kind, entity, resolvedId) => {
    try {
      return await registry.commit(kind, entity, resolvedId)
    } catch (error) {
      throw new StorageFailureError(`Commit of ${kind} failed: ${describeError(error)}`, { cause: error })
    }
  }

  try {
    const manufacturerSubject: ManufacturerSubject = { kind: 'manufacturer', entity: submission.manufacturer }
    const manufacturer = await resolveStep(
      manufacturerSubject,
      normalize(submission.manufacturer.name, 'manufacturer')
    )
    if (manufacturer.type === 'Ambiguous') return stopAmbiguous('manufacturer', manufacturer.reason)

    const manufacturerId = decisionId(manufacturer)
    const modelSubject: ModelSubject = { kind: 'model', entity: submission.model, manufacturerId }
    const model = await resolveStep(modelSubject, manufacturerId)
    if (model.type === 'Ambiguous') return stopAmbiguous('model', model.reason)

    const modelId = decisionId(model)
    let guitarSubject: IndividualGuitarSubject | undefined
    let guitarId: string | undefined
    if (submission.individual_guitar) {
      guitarSubject = { kind: 'individual_guitar', entity: submission.individual_guitar, modelId }
      const guitar = await resolveStep(guitarSubject, modelId)
      if (guitar.type === 'Ambiguous') return stopAmbiguous('individual_guitar', guitar.reason)
      guitarId = decisionId(guitar)
    }

    // ─── 6. Commit ─────────────────────────────────────────────────────────────
    step = 'commit'
    const storedManufacturerId = await commit('manufacturer', manufacturerSubject, manufacturerId)
    report.committedIds.manufacturer = storedManufacturerId

    const storedModelId = await commit(
      'model',
      { ...modelSubject, manufacturerId: storedManufacturerId },
      modelId
    )
    report.committedIds.model = storedModelId

    let evidenceTarget: { kind: 'model' | 'individual_guitar'; id: string } = { kind: 'model', id: storedModelId }
    if (guitarSubject && guitarId !== undefined) {
      const storedGuitarId = await commit(
        'individual_guitar',
        { ...guitarSubject, modelId: storedModelId },
        guitarId
      )
      report.committedIds.individual_guitar = storedGuitarId
      evidenceTarget = { kind: 'individual_guitar', id: storedGuitarId }
    }

    report.committedIds.source_attribution = await commit(
      'source_attribution',
      { attribution: submission.source_attribution, entityKind: evidenceTarget.kind, entityId: evidenceTarget.id },
      evidenceTarget.id
    )
  } catch (error) {
    if (error instanceof InvariantViolationError || error instanceof StorageFailureError) {
      log.error('SUBMISSION_FAILED', { step, errorKind: error.kind }, error)
      return reject(error.kind, step, error.message)
    }
    throw error
  }

  log.info('SUBMISSION_COMMITTED', {
    committedIds: report.committedIds,
    decisions: {
      manufacturer: report.resolutions.manufacturer?.type,
      model: report.resolutions.model?.type,
      individual_guitar: report.resolutions.individual_guitar?.type,
    },
  })
  return finish('Committed')
}
