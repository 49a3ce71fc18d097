/**
 * Shared intake types
 */

import type { ErrorKind } from './errors'

export type EntityKind =
  | 'manufacturer'
  | 'model'
  | 'individual_guitar'
  | 'specifications'
  | 'finish'
  | 'source_attribution'

/** Kinds that carry an identity and go through the uniqueness resolver */
export type ResolvableKind = Extract<EntityKind, 'manufacturer' | 'model' | 'individual_guitar'>

export const RESOLVABLE_KINDS: readonly ResolvableKind[] = ['manufacturer', 'model', 'individual_guitar']

export type ConflictSeverity = 'error' | 'warning'

/**
 * One violated field or rule. `path` is dotted (`model.specifications.0.num_frets`),
 * empty for the entity root.
 */
export interface Conflict {
  path: string
  message: string
  rule?: string
  severity: ConflictSeverity
}

/**
 * Outcome of schema or rule validation. Returned, never thrown.
 * `success` is false iff at least one conflict has severity 'error'.
 */
export interface ValidationResult {
  success: boolean
  errorKind?: ErrorKind
  conflicts: Conflict[]
}

export function validationResult(conflicts: Conflict[], errorKind: ErrorKind): ValidationResult {
  const success = !conflicts.some(c => c.severity === 'error')
  return success ? { success, conflicts } : { success, errorKind, conflicts }
}
