export { InMemoryRegistry } from './in-memory-registry'
export type { CommitPayloads, CommittableKind, RegistryView, SourceEvidence } from './types'
export { OverlayRegistry } from './overlay-registry'
