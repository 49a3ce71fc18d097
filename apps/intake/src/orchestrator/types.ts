/**
 * Submission Orchestrator Types
 */

import type { ResolverConfig } from '../config/resolver-config'
import type { RulesConfig } from '../config/rules-config'
import type { ErrorKind } from '../errors'
import type { CommittableKind } from '../registry/types'
import type { ResolutionOutcome } from '../resolver/types'
import type { Conflict, ResolvableKind, ValidationResult } from '../types'
import type { IntakeMetrics, SubmissionStatus } from './metrics'

export type { SubmissionStatus }

/**
 * Where a submission stopped. Entity steps follow the processing order.
 */
export type SubmissionStep =
  | 'envelope'
  | 'manufacturer'
  | 'model'
  | 'individual_guitar'
  | 'source_attribution'
  | 'commit'

export type ValidationStage = 'shape' | 'rules' | 'cross_entity'

export interface SubmissionReport {
  requestId: string
  status: SubmissionStatus
  errorKind?: ErrorKind
  failedStep?: SubmissionStep
  /** Human-readable reason for Rejected and Ambiguous */
  message?: string
  /** Per validation stage that ran */
  validation: Partial<Record<ValidationStage, ValidationResult>>
  /** Every conflict found, warnings included, in path order of discovery */
  conflicts: Conflict[]
  resolutions: Partial<Record<ResolvableKind, ResolutionOutcome>>
  /** Number of resolve() calls made */
  resolutionAttempts: number
  committedIds: Partial<Record<CommittableKind, string>>
  durationMs: number
}

export interface ProcessOptions {
  resolverConfig?: ResolverConfig
  rulesConfig?: RulesConfig
  /** Reference instant for date rules; defaults to the current time */
  now?: Date
  metrics?: IntakeMetrics
  /** Correlation id for log entries; generated when absent */
  requestId?: string
}

export interface BatchOptions extends Omit<ProcessOptions, 'requestId'> {
  signal?: AbortSignal
  /** Run id for the summary event; generated when absent */
  runId?: string
}

export interface BatchReport {
  runId: string
  /** One report per processed submission, in input order */
  reports: SubmissionReport[]
  /** Set when the signal aborted before every submission was processed */
  cancelled: boolean
  /** Present when the batch envelope itself was malformed */
  envelopeError?: ValidationResult
  durationMs: number
}
