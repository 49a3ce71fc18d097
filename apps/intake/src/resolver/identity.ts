/**
 * Identity keys and deterministic ids
 *
 *   manufacturer       normalize(name)
 *   model              manufacturerId | normalize(name) | year or 'unknown'
 *   individual_guitar  modelId | external:<id>   (explicit registry identity)
 *                      modelId | serial:<serial> (serial present)
 *                      modelId | content:<hash> (no automatic identity)
 */

import { createHash } from 'crypto'
import { normalize, normalizeSerial } from '../normalizer/name-utils'
import type { ResolvableKind } from '../types'
import type { IndividualGuitarSubject, ResolutionSubject } from './types'

const ID_PREFIX: Record<ResolvableKind, string> = {
  manufacturer: 'mfr',
  model: 'mdl',
  individual_guitar: 'gtr',
}

function sha256(value: string): string {
  return createHash('sha256').update(value).digest('hex')
}

/**
 * JSON with object keys sorted, so equal values hash equally regardless of
 * the key order the producer used.
 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`)
    return `{${entries.join(',')}}`
  }
  return JSON.stringify(value) ?? 'null'
}

export function serialKey(subject: IndividualGuitarSubject): string | undefined {
  const serial = subject.entity.serial_number
  if (serial === undefined) return undefined
  const normalized = normalizeSerial(serial)
  return normalized === '' ? undefined : normalized
}

export function identityKey(subject: ResolutionSubject): string {
  switch (subject.kind) {
    case 'manufacturer':
      return normalize(subject.entity.name, 'manufacturer')
    case 'model':
      return [
        subject.manufacturerId,
        normalize(subject.entity.name, 'model'),
        subject.entity.year ?? 'unknown',
      ].join('|')
    case 'individual_guitar': {
      const externalId = subject.entity.external_id?.trim()
      if (externalId) {
        return `${subject.modelId}|external:${externalId}`
      }
      const serial = serialKey(subject)
      if (serial !== undefined) {
        return `${subject.modelId}|serial:${serial}`
      }
      return `${subject.modelId}|content:${sha256(stableStringify(subject.entity)).slice(0, 16)}`
    }
  }
}

/**
 * True when the guitar has neither an external id nor a usable serial, i.e.
 * it can never be matched automatically.
 */
export function hasNoAutomaticIdentity(subject: IndividualGuitarSubject): boolean {
  return !subject.entity.external_id?.trim() && serialKey(subject) === undefined
}

/**
 * Manufacturers are top-level; models hang off a manufacturer, guitars off a model.
 */
export function parentId(subject: ResolutionSubject): string | undefined {
  switch (subject.kind) {
    case 'manufacturer':
      return undefined
    case 'model':
      return subject.manufacturerId
    case 'individual_guitar':
      return subject.modelId
  }
}

/**
 * True when a registry lookup `hint` (a parent id) admits the subject.
 * Manufacturers have no parent, so every hint admits them.
 */
export function matchesParentHint(subject: ResolutionSubject, hint: string | undefined): boolean {
  const parent = parentId(subject)
  return hint === undefined || parent === undefined || parent === hint
}

/**
 * Deterministic id for a newly created entity: the same identity key always
 * yields the same id, so resolve() stays a pure function of its inputs.
 */
export function newEntityId(kind: ResolvableKind, key: string): string {
  return `${ID_PREFIX[kind]}_${sha256(`${kind}\u0000${key}`).slice(0, 24)}`
}
