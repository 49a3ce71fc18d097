/**
 * Registry collaborator contract
 *
 * The intake core never stores anything itself. It reads candidates through
 * fetchCandidates() and hands accepted entities to commit() once a whole
 * submission has resolved.
 */

import type { Candidate, SubjectOf } from '../resolver/types'
import type { SourceAttribution } from '../schema/schemas'
import type { ResolvableKind } from '../types'

/**
 * Source attribution is stored as evidence attached to the most specific
 * entity of its submission.
 */
export interface SourceEvidence {
  attribution: SourceAttribution
  entityKind: ResolvableKind
  entityId: string
}

export interface CommitPayloads {
  manufacturer: SubjectOf<'manufacturer'>
  model: SubjectOf<'model'>
  individual_guitar: SubjectOf<'individual_guitar'>
  source_attribution: SourceEvidence
}

export type CommittableKind = keyof CommitPayloads

export interface RegistryView {
  /**
   * Existing entities of `kind` that may match. `hint` narrows the lookup:
   * the normalized name for manufacturers, the parent id for models and guitars.
   * Implementations may return a superset; the resolver applies its own scoping.
   */
  fetchCandidates<K extends ResolvableKind>(kind: K, hint?: string): Promise<Candidate<SubjectOf<K>>[]>

  /**
   * Persist an accepted entity under `resolvedId` (the matched id, or the id
   * the resolver minted). Returns the id the registry stored it under, which
   * is authoritative. Rejects on storage failure.
   */
  commit<K extends CommittableKind>(kind: K, entity: CommitPayloads[K], resolvedId: string): Promise<string>
}
