/**
 * Batch overlay registry
 *
 * Wraps a RegistryView for the duration of one batch. Entities committed by
 * earlier submissions are added to later candidate fetches, so a batch stays
 * referentially consistent even when the underlying registry does not expose
 * its writes right away. Registry results win on duplicate ids.
 */

import { matchesParentHint } from '../resolver/identity'
import type { Candidate, SubjectOf } from '../resolver/types'
import type { ResolvableKind } from '../types'
import type { CommitPayloads, CommittableKind, RegistryView } from './types'

type OverlayStore = { [K in ResolvableKind]: Map<string, SubjectOf<K>> }

type Recorders = { [K in CommittableKind]: (entity: CommitPayloads[K], storedId: string) => void }

export class OverlayRegistry implements RegistryView {
  private readonly committed: OverlayStore = {
    manufacturer: new Map(),
    model: new Map(),
    individual_guitar: new Map(),
  }

  private readonly recorders: Recorders = {
    manufacturer: (entity, id) => this.remember('manufacturer', entity, id),
    model: (entity, id) => this.remember('model', entity, id),
    individual_guitar: (entity, id) => this.remember('individual_guitar', entity, id),
    // Evidence is never a resolution candidate
    source_attribution: () => undefined,
  }

  constructor(private readonly base: RegistryView) {}

  async fetchCandidates<K extends ResolvableKind>(kind: K, hint?: string): Promise<Candidate<SubjectOf<K>>[]> {
    const fromRegistry = await this.base.fetchCandidates(kind, hint)
    const seen = new Set(fromRegistry.map(c => c.id))
    const overlay: Map<string, SubjectOf<K>> = this.committed[kind]

    const merged = [...fromRegistry]
    for (const [id, subject] of overlay) {
      if (seen.has(id) || !matchesParentHint(subject, hint)) continue
      merged.push({ id, subject })
    }
    return merged
  }

  async commit<K extends CommittableKind>(kind: K, entity: CommitPayloads[K], resolvedId: string): Promise<string> {
    const storedId = await this.base.commit(kind, entity, resolvedId)
    const record: (entity: CommitPayloads[K], storedId: string) => void = this.recorders[kind]
    record(entity, storedId)
    return storedId
  }

  private remember<K extends ResolvableKind>(kind: K, subject: SubjectOf<K>, id: string): void {
    const store: Map<string, SubjectOf<K>> = this.committed[kind]
    store.set(id, subject)
  }
}
