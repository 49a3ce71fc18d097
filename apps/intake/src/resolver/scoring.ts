/**
 * Near-match scoring strategies
 *
 * Each strategy compares an incoming entity with one candidate of the same kind
 * and returns a weighted score in [0, 1], or null when the two are not comparable
 * at all (different parent, conflicting model year, different external ids,
 * no serial to compare).
 *
 * The total is the weighted mean over the components that apply: a component
 * whose data is missing on both sides drops out instead of scoring 0.
 */

import type {
  IndividualGuitarWeights,
  ManufacturerWeights,
  ModelWeights,
} from '../config/resolver-config'
import { normalize, normalizeText, similarity } from '../normalizer/name-utils'
import { serialKey } from './identity'
import type { IndividualGuitarSubject, ManufacturerSubject, ModelSubject } from './types'

export interface ScoreResult {
  total: number
  componentScores: Record<string, number>
}

export interface ScoringStrategy<S, W> {
  name: string
  version: string
  score(input: S, candidate: S, weights: W): ScoreResult | null
}

type Component = { name: string; weight: number; score: number }

function round(value: number): number {
  return Math.round(value * 10_000) / 10_000
}

function weightedScore(components: Component[]): ScoreResult {
  const componentScores: Record<string, number> = {}
  let weighted = 0
  let totalWeight = 0

  for (const component of components) {
    componentScores[component.name] = round(component.score)
    if (component.weight <= 0) continue
    weighted += component.weight * component.score
    totalWeight += component.weight
  }

  return {
    total: totalWeight === 0 ? 0 : round(weighted / totalWeight),
    componentScores,
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Strategies
// ═══════════════════════════════════════════════════════════════════════════════

export const manufacturerScoring: ScoringStrategy<ManufacturerSubject, ManufacturerWeights> = {
  name: 'manufacturer-name-weighted',
  version: '1.0.0',
  score(input, candidate, weights) {
    const a = input.entity
    const b = candidate.entity
    const components: Component[] = [
      {
        name: 'name',
        weight: weights.name,
        score: similarity(normalize(a.name, 'manufacturer'), normalize(b.name, 'manufacturer')),
      },
    ]

    if (a.founded_year !== undefined && b.founded_year !== undefined) {
      components.push({
        name: 'foundedYear',
        weight: weights.foundedYear,
        score: a.founded_year === b.founded_year ? 1 : 0,
      })
    }
    if (a.country !== undefined && b.country !== undefined) {
      components.push({
        name: 'country',
        weight: weights.country,
        score: normalizeText(a.country) === normalizeText(b.country) ? 1 : 0,
      })
    }

    return weightedScore(components)
  },
}

export const modelScoring: ScoringStrategy<ModelSubject, ModelWeights> = {
  name: 'model-name-year',
  version: '1.0.0',
  score(input, candidate, weights) {
    if (input.manufacturerId !== candidate.manufacturerId) return null

    const yearA = input.entity.year
    const yearB = candidate.entity.year
    // Two known, different years are different models
    if (yearA !== undefined && yearB !== undefined && yearA !== yearB) return null

    const components: Component[] = [
      {
        name: 'name',
        weight: weights.name,
        score: similarity(normalize(input.entity.name, 'model'), normalize(candidate.entity.name, 'model')),
      },
    ]

    if (yearA !== undefined || yearB !== undefined) {
      components.push({
        name: 'year',
        weight: weights.year,
        score: yearA !== undefined && yearB !== undefined ? 1 : 0.5,
      })
    }

    return weightedScore(components)
  },
}

export const individualGuitarScoring: ScoringStrategy<IndividualGuitarSubject, IndividualGuitarWeights> = {
  name: 'guitar-serial',
  version: '1.0.0',
  score(input, candidate, weights) {
    if (input.modelId !== candidate.modelId) return null

    // An external id is the guitar's identity: two different ones never merge
    const externalA = input.entity.external_id?.trim()
    const externalB = candidate.entity.external_id?.trim()
    if (externalA && externalB && externalA !== externalB) return null

    const serialA = serialKey(input)
    const serialB = serialKey(candidate)
    if (serialA === undefined || serialB === undefined) return null

    return weightedScore([{ name: 'serial', weight: weights.serial, score: similarity(serialA, serialB) }])
  },
}
