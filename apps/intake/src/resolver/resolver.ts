/**
 * Uniqueness Resolver Core Algorithm
 *
 * Decides whether an incoming entity is one the registry already holds.
 * Pure and deterministic once a submissionId is given: the outcome depends only on the entity, the candidate
 * set and the options, never on candidate order or wall-clock time.
 *
 * Algorithm priority:
 * 1. Exact identity-key match (confidence 1.0; two or more is AMBIGUOUS)
 * 2. Near-match scoring within the entity's scope, banded by thresholds
 * 3. CREATED with a deterministic id when nothing comes close
 *
 * A guitar with neither serial nor external id is always CREATED, under an id
 * scoped to options.submissionId: equal descriptions are not the same instrument.
 */

import { createId } from '@paralleldrive/cuid2'
import { DEFAULT_RESOLVER_CONFIG, type KindResolverConfig } from '../config/resolver-config'
import { logger } from '../config/logger'
import { InvariantViolationError } from '../errors'
import type { ResolvableKind } from '../types'
import { hasNoAutomaticIdentity, identityKey, newEntityId } from './identity'
import {
  individualGuitarScoring,
  manufacturerScoring,
  modelScoring,
  type ScoringStrategy,
} from './scoring'
import type {
  AmbiguousOutcome,
  Candidate,
  CreatedOutcome,
  MatchedOutcome,
  ResolutionSubject,
  ResolveOptions,
  ScoredCandidate,
  SubjectOf,
} from './types'

const log = logger.resolver

// Bump on algorithm or normalization changes
export const RESOLVER_VERSION = '1.0.0'

export type ResolverDecision = MatchedOutcome | CreatedOutcome | AmbiguousOutcome

// ═══════════════════════════════════════════════════════════════════════════════
// Candidate set checks
// ═══════════════════════════════════════════════════════════════════════════════

function candidatesOfKind<K extends ResolvableKind>(
  candidates: readonly Candidate[],
  kind: K
): Candidate<SubjectOf<K>>[] {
  const matching: Candidate<SubjectOf<K>>[] = []
  for (const candidate of candidates) {
    if (isSubjectOfKind(candidate.subject, kind)) {
      matching.push({ id: candidate.id, subject: candidate.subject })
    }
  }
  return matching
}

function isSubjectOfKind<K extends ResolvableKind>(
  subject: ResolutionSubject,
  kind: K
): subject is SubjectOf<K> {
  return subject.kind === kind
}

/**
 * A candidate set with duplicate ids or entities of another kind is a broken
 * collaborator, not bad user data.
 */
function assertCandidateSet(kind: ResolvableKind, candidates: readonly Candidate[]): void {
  const seen = new Set<string>()
  for (const candidate of candidates) {
    if (candidate.id === '') {
      throw new InvariantViolationError('Candidate with empty id', { kind })
    }
    if (seen.has(candidate.id)) {
      throw new InvariantViolationError(`Duplicate candidate id '${candidate.id}'`, {
        kind,
        candidateId: candidate.id,
      })
    }
    if (candidate.subject.kind !== kind) {
      throw new InvariantViolationError(
        `Candidate '${candidate.id}' is a ${candidate.subject.kind}, expected ${kind}`,
        { kind, candidateId: candidate.id, candidateKind: candidate.subject.kind }
      )
    }
    seen.add(candidate.id)
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Scoring
// ═══════════════════════════════════════════════════════════════════════════════

function byScoreThenId(a: ScoredCandidate, b: ScoredCandidate): number {
  if (b.score !== a.score) return b.score - a.score
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

function scoreWith<S extends ResolutionSubject, W>(
  input: S,
  candidates: Candidate<S>[],
  strategy: ScoringStrategy<S, W>,
  weights: W
): ScoredCandidate[] {
  const scored: ScoredCandidate[] = []
  for (const candidate of candidates) {
    const result = strategy.score(input, candidate.subject, weights)
    if (result === null) continue
    scored.push({ id: candidate.id, score: result.total, componentScores: result.componentScores })
  }
  return scored
}

function scoreCandidates(
  subject: ResolutionSubject,
  candidates: readonly Candidate[],
  options: ResolveOptions
): ScoredCandidate[] {
  const config = options.config ?? DEFAULT_RESOLVER_CONFIG
  switch (subject.kind) {
    case 'manufacturer':
      return scoreWith(
        subject,
        candidatesOfKind(candidates, 'manufacturer'),
        manufacturerScoring,
        config.manufacturer.weights
      )
    case 'model':
      return scoreWith(
        subject,
        candidatesOfKind(candidates, 'model'),
        modelScoring,
        config.model.weights
      )
    case 'individual_guitar':
      return scoreWith(
        subject,
        candidatesOfKind(candidates, 'individual_guitar'),
        individualGuitarScoring,
        config.individual_guitar.weights
      )
  }
}

function kindConfig(kind: ResolvableKind, options: ResolveOptions): KindResolverConfig<unknown> {
  return (options.config ?? DEFAULT_RESOLVER_CONFIG)[kind]
}

function gap(a: number, b: number): number {
  return Math.round((a - b) * 10_000) / 10_000
}

// ═══════════════════════════════════════════════════════════════════════════════
// Resolution
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Resolve an entity against the registry candidates of its kind.
 *
 * Throws InvariantViolationError when the candidate set is malformed.
 */
export function resolve(
  subject: ResolutionSubject,
  candidates: readonly Candidate[],
  options: ResolveOptions = {}
): ResolverDecision {
  const kind = subject.kind
  const config = kindConfig(kind, options)
  const key = identityKey(subject)
  const rulesFired: string[] = []
  const rlog = log.child('decision', { kind, identityKey: key })

  assertCandidateSet(kind, candidates)

  rlog.debug('RESOLVE_START', { candidateCount: candidates.length })

  const created = (rule: string, idKey: string = key): CreatedOutcome => {
    rulesFired.push(rule)
    const newId = newEntityId(kind, idKey)
    rlog.debug('RESOLVE_CREATED', { rule, newId })
    return { type: 'Created', newId, identityKey: key, rulesFired }
  }

  if (subject.kind === 'individual_guitar' && hasNoAutomaticIdentity(subject)) {
    return created('NO_AUTOMATIC_IDENTITY', `${key}|submission:${options.submissionId ?? createId()}`)
  }

  // 1. Exact identity-key match
  const exact = candidates
    .filter(c => identityKey(c.subject) === key)
    .map(c => c.id)
    .sort()

  if (exact.length === 1) {
    rulesFired.push('EXACT_KEY_MATCH')
    rlog.debug('RESOLVE_MATCHED', { existingId: exact[0], confidence: 1 })
    return { type: 'Matched', existingId: exact[0], confidence: 1, identityKey: key, rulesFired }
  }

  if (exact.length > 1) {
    rulesFired.push('EXACT_KEY_AMBIGUOUS')
    const reason = `${exact.length} registry entries share identity key '${key}'`
    rlog.info('RESOLVE_AMBIGUOUS', { reason, candidateIds: exact })
    return {
      type: 'Ambiguous',
      candidates: exact.map(id => ({ id, score: 1, componentScores: {} })),
      confidence: 1,
      reason,
      identityKey: key,
      rulesFired,
    }
  }

  // 2. Near-match scoring
  const scored = scoreCandidates(subject, candidates, options).sort(byScoreThenId)
  const best = scored[0]

  rlog.debug('RESOLVE_SCORING_COMPLETE', {
    comparableCount: scored.length,
    bestScore: best?.score ?? 0,
    secondBestScore: scored[1]?.score ?? 0,
    topCandidates: scored.slice(0, 3).map(c => ({ id: c.id, score: c.score })),
  })

  if (!best) {
    return created('NO_COMPARABLE_CANDIDATES')
  }

  if (best.score >= config.matchThreshold) {
    const contenders = scored.filter(c => gap(best.score, c.score) <= config.ambiguityGap)

    if (contenders.length === 1) {
      rulesFired.push('NEAR_MATCH')
      rlog.debug('RESOLVE_MATCHED', { existingId: best.id, confidence: best.score })
      return { type: 'Matched', existingId: best.id, confidence: best.score, identityKey: key, rulesFired }
    }

    rulesFired.push('NEAR_MATCH_TIE')
    const reason =
      `${contenders.length} candidates score within ${config.ambiguityGap} of best score ${best.score.toFixed(3)}`
    rlog.info('RESOLVE_AMBIGUOUS', { reason, candidateIds: contenders.map(c => c.id) })
    return {
      type: 'Ambiguous',
      candidates: contenders.slice(0, config.topKCandidates),
      confidence: best.score,
      reason,
      identityKey: key,
      rulesFired,
    }
  }

  if (best.score >= config.createThreshold) {
    rulesFired.push('UNCERTAIN_BAND')
    const reason =
      `Best score ${best.score.toFixed(3)} in uncertain band [${config.createThreshold}, ${config.matchThreshold})`
    const banded = scored.filter(c => c.score >= config.createThreshold).slice(0, config.topKCandidates)
    rlog.info('RESOLVE_AMBIGUOUS', { reason, candidateIds: banded.map(c => c.id) })
    return {
      type: 'Ambiguous',
      candidates: banded,
      confidence: best.score,
      reason,
      identityKey: key,
      rulesFired,
    }
  }

  // 3. Nothing close enough
  return created('BELOW_CREATE_THRESHOLD')
}
