/**
 * Intake error kinds
 *
 * Data problems (schema, business rules, ambiguity) are returned as values.
 * Only contract breaches by a collaborator are thrown, as InvariantViolationError.
 */

export const ERROR_KIND = {
  /** Structural: missing/extra fields, wrong types, out-of-range values */
  INVALID_SCHEMA: 'InvalidSchema',
  /** Semantic: domain rules the schema cannot express */
  BUSINESS_RULE_VIOLATION: 'BusinessRuleViolation',
  /** Contract breach by a caller or collaborator (e.g. corrupt candidate set) */
  INVARIANT_VIOLATION: 'InvariantViolation',
  /** Not strictly an error: needs a human decision */
  AMBIGUOUS: 'Ambiguous',
  /** The storage collaborator failed while committing */
  STORAGE_FAILURE: 'StorageFailure',
} as const

export type ErrorKind = (typeof ERROR_KIND)[keyof typeof ERROR_KIND]

/**
 * Thrown when a collaborator hands the core data that violates its contract.
 * Fatal for the current submission only.
 */
export class InvariantViolationError extends Error {
  readonly kind = ERROR_KIND.INVARIANT_VIOLATION
  readonly details?: Record<string, unknown>

  constructor(message: string, details?: Record<string, unknown>) {
    super(message)
    this.name = 'InvariantViolationError'
    this.details = details
  }
}

/**
 * Wraps a rejection from the registry collaborator (fetch or commit).
 */
export class StorageFailureError extends Error {
  readonly kind = ERROR_KIND.STORAGE_FAILURE

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StorageFailureError'
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
