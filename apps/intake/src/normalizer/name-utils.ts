/**
 * Name Normalization Utilities
 *
 * Deterministic canonicalization of free-text names into comparison keys.
 * Keys are used for matching only, never for display.
 *
 * normalize() is total and idempotent: every string maps to exactly one key and
 * normalize(normalize(x)) === normalize(x). The equivalence tables below must
 * stay closed for that to hold: no replacement value may itself be a key.
 */

import type { EntityKind } from '../types'

// ============================================================================
// EQUIVALENCE TABLES
// ============================================================================

/** Company-name suffixes folded to their short form */
const MANUFACTURER_EQUIVALENCES: Readonly<Record<string, string>> = {
  corporation: 'corp',
  company: 'co',
  incorporated: 'inc',
  limited: 'ltd',
  manufacturing: 'mfg',
  brothers: 'bros',
}

/** Catalog words that appear both spelled out and abbreviated in model names */
const MODEL_EQUIVALENCES: Readonly<Record<string, string>> = {
  standard: 'std',
  deluxe: 'dlx',
  special: 'spl',
  custom: 'cstm',
  reissue: 'ri',
}

const EQUIVALENCES_BY_KIND: Partial<Record<EntityKind, Readonly<Record<string, string>>>> = {
  manufacturer: MANUFACTURER_EQUIVALENCES,
  model: MODEL_EQUIVALENCES,
}

// ============================================================================
// NORMALIZATION
// ============================================================================

const COMBINING_MARKS = /\p{M}/gu

function foldCase(text: string): string {
  // Lower-case on both sides of the decomposition: some upper-case letters lower-case
  // to a base + mark, and some compatibility forms decompose to upper-case letters
  return text.toLowerCase().normalize('NFKD').replace(COMBINING_MARKS, '').toLowerCase()
}

/**
 * Canonical key for a free-text value of the given entity kind.
 *
 * - lower-cased, diacritics stripped
 * - `&` read as `and`, apostrophes dropped, other punctuation treated as a separator
 * - whitespace collapsed and trimmed
 * - kind-specific token equivalences applied (`Corporation` -> `corp`)
 *
 * For individual guitars the only free-text identity is the serial number, so
 * that kind normalizes as a serial.
 */
export function normalize(text: string, kind: EntityKind): string {
  if (kind === 'individual_guitar') {
    return normalizeSerial(text)
  }

  const base = normalizeText(text)
  if (base === '') return ''

  const table = EQUIVALENCES_BY_KIND[kind]
  if (!table) return base

  return base
    .split(' ')
    .map(token => table[token] ?? token)
    .join(' ')
}

/**
 * Kind-independent part of normalize(): folding, punctuation and whitespace only.
 */
export function normalizeText(text: string): string {
  return foldCase(text)
    .replace(/&/g, ' and ')
    .replace(/['’`]/g, '')
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim()
}

/**
 * Serial numbers compare on their letters and digits only: `9-0824`, `9 0824`
 * and `90824` are the same serial.
 */
export function normalizeSerial(serial: string): string {
  return foldCase(serial).replace(/[^\p{L}\p{N}]/gu, '')
}

// ============================================================================
// SIMILARITY
// ============================================================================

/**
 * Levenshtein edit distance over code points.
 */
export function levenshtein(a: string, b: string): number {
  const left = Array.from(a)
  const right = Array.from(b)

  if (left.length === 0) return right.length
  if (right.length === 0) return left.length

  let previous = Array.from({ length: right.length + 1 }, (_, j) => j)
  let current = new Array<number>(right.length + 1).fill(0)

  for (let i = 1; i <= left.length; i++) {
    current[0] = i
    for (let j = 1; j <= right.length; j++) {
      const substitution = left[i - 1] === right[j - 1] ? 0 : 1
      current[j] = Math.min(
        previous[j] + 1,
        current[j - 1] + 1,
        previous[j - 1] + substitution
      )
    }
    ;[previous, current] = [current, previous]
  }

  return previous[right.length]
}

/**
 * Edit-distance ratio in [0, 1]: 1 for identical strings, 0 for nothing in common.
 */
export function similarity(a: string, b: string): number {
  const longest = Math.max(Array.from(a).length, Array.from(b).length)
  if (longest === 0) return 1
  return 1 - levenshtein(a, b) / longest
}
