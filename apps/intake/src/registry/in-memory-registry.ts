/**
 * In-memory registry
 *
 * Reference RegistryView used by the intake script and tests. Commits are
 * idempotent: committing under an id that is already stored keeps the stored
 * entity and returns its id.
 */

import { logger } from '../config/logger'
import { matchesParentHint } from '../resolver/identity'
import type { Candidate, SubjectOf } from '../resolver/types'
import type { ResolvableKind } from '../types'
import type { CommitPayloads, CommittableKind, RegistryView, SourceEvidence } from './types'

const log = logger.registry

type EntityStore = { [K in ResolvableKind]: Map<string, SubjectOf<K>> }

type Writers = { [K in CommittableKind]: (entity: CommitPayloads[K], resolvedId: string) => string }

export class InMemoryRegistry implements RegistryView {
  private readonly entities: EntityStore = {
    manufacturer: new Map(),
    model: new Map(),
    individual_guitar: new Map(),
  }

  private readonly evidence = new Map<string, { id: string; evidence: SourceEvidence }[]>()

  private readonly writers: Writers = {
    manufacturer: (entity, id) => this.store('manufacturer', entity, id),
    model: (entity, id) => this.store('model', entity, id),
    individual_guitar: (entity, id) => this.store('individual_guitar', entity, id),
    source_attribution: (entity, id) => this.attach(entity, id),
  }

  /**
   * Pre-populate the registry, e.g. with previously accepted records.
   */
  add<K extends ResolvableKind>(kind: K, id: string, subject: SubjectOf<K>): this {
    const store: Map<string, SubjectOf<K>> = this.entities[kind]
    store.set(id, subject)
    return this
  }

  get<K extends ResolvableKind>(kind: K, id: string): SubjectOf<K> | undefined {
    const store: Map<string, SubjectOf<K>> = this.entities[kind]
    return store.get(id)
  }

  count(kind: ResolvableKind): number {
    return this.entities[kind].size
  }

  evidenceFor(entityId: string): SourceEvidence[] {
    return (this.evidence.get(entityId) ?? []).map(entry => entry.evidence)
  }

  async fetchCandidates<K extends ResolvableKind>(kind: K, hint?: string): Promise<Candidate<SubjectOf<K>>[]> {
    const store: Map<string, SubjectOf<K>> = this.entities[kind]
    const candidates: Candidate<SubjectOf<K>>[] = []

    for (const [id, subject] of store) {
      if (!matchesParentHint(subject, hint)) continue
      candidates.push({ id, subject })
    }

    log.debug('REGISTRY_FETCH_CANDIDATES', { kind, hint, candidateCount: candidates.length })
    return candidates
  }

  async commit<K extends CommittableKind>(kind: K, entity: CommitPayloads[K], resolvedId: string): Promise<string> {
    const write: (entity: CommitPayloads[K], resolvedId: string) => string = this.writers[kind]
    const storedId = write(entity, resolvedId)
    log.debug('REGISTRY_COMMIT', { kind, resolvedId, storedId })
    return storedId
  }

  private store<K extends ResolvableKind>(kind: K, subject: SubjectOf<K>, id: string): string {
    const store: Map<string, SubjectOf<K>> = this.entities[kind]
    if (!store.has(id)) {
      store.set(id, subject)
    }
    return id
  }

  private attach(evidence: SourceEvidence, entityId: string): string {
    const entries = this.evidence.get(entityId) ?? []
    const id = `${entityId}:src:${entries.length + 1}`
    entries.push({ id, evidence })
    this.evidence.set(entityId, entries)
    return id
  }
}

