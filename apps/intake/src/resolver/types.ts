/**
 * Uniqueness Resolver Types
 *
 * Type definitions for identity resolution of manufacturers, models and
 * individual guitars against a caller-supplied candidate set.
 */

import type { ResolverConfig } from '../config/resolver-config'
import type { ErrorKind } from '../errors'
import type { IndividualGuitar, Manufacturer, Model } from '../schema/schemas'
import type { ResolvableKind } from '../types'

/**
 * An entity together with the resolved identities of its parents.
 * A model is only comparable within its manufacturer, a guitar within its model.
 */
export interface ManufacturerSubject {
  kind: 'manufacturer'
  entity: Manufacturer
}

export interface ModelSubject {
  kind: 'model'
  entity: Model
  manufacturerId: string
}

export interface IndividualGuitarSubject {
  kind: 'individual_guitar'
  entity: IndividualGuitar
  modelId: string
}

export type ResolutionSubject = ManufacturerSubject | ModelSubject | IndividualGuitarSubject

export type SubjectOf<K extends ResolvableKind> = Extract<ResolutionSubject, { kind: K }>

/**
 * An already-accepted registry entity considered for matching
 */
export interface Candidate<S extends ResolutionSubject = ResolutionSubject> {
  id: string
  subject: S
}

export interface ScoredCandidate {
  id: string
  score: number
  componentScores: Record<string, number>
}

interface OutcomeAudit {
  /** Normalized identity key of the incoming entity */
  identityKey: string
  /** Decision trail, in firing order */
  rulesFired: string[]
}

export interface MatchedOutcome extends OutcomeAudit {
  type: 'Matched'
  existingId: string
  confidence: number
}

export interface CreatedOutcome extends OutcomeAudit {
  type: 'Created'
  newId: string
}

export interface AmbiguousOutcome extends OutcomeAudit {
  type: 'Ambiguous'
  candidates: ScoredCandidate[]
  confidence: number
  reason: string
}

export interface RejectedOutcome {
  type: 'Rejected'
  reason: string
  errorKind: ErrorKind
}

export type ResolutionOutcome = MatchedOutcome | CreatedOutcome | AmbiguousOutcome | RejectedOutcome

export interface ResolveOptions {
  config?: ResolverConfig
  /**
   * Id of the submission being resolved. Scopes the id of a guitar with no
   * automatic identity to that submission; a fresh cuid2 is used when absent.
   */
  submissionId?: string
}
