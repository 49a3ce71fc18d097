/**
 * Uniqueness Resolver
 *
 * Matches incoming manufacturers, models and individual guitars against
 * existing registry entries.
 */

export { RESOLVER_VERSION, resolve } from './resolver'
export type { ResolverDecision } from './resolver'
export { identityKey, newEntityId } from './identity'
export { individualGuitarScoring, manufacturerScoring, modelScoring } from './scoring'
export type { ScoreResult, ScoringStrategy } from './scoring'
export type {
  AmbiguousOutcome,
  Candidate,
  CreatedOutcome,
  IndividualGuitarSubject,
  ManufacturerSubject,
  MatchedOutcome,
  ModelSubject,
  RejectedOutcome,
  ResolutionOutcome,
  ResolutionSubject,
  ResolveOptions,
  ScoredCandidate,
  SubjectOf,
} from './types'
