/**
 * Uniqueness resolver configuration
 *
 * Thresholds and scoring weights are per entity kind: manufacturer names
 * tolerate more fuzziness than serial numbers, which need a near-exact match.
 *
 * Decision bands for the best near-match score s (exact key matches bypass them):
 *   s >= matchThreshold          -> MATCHED, unless a runner-up is within ambiguityGap
 *   createThreshold <= s < match -> AMBIGUOUS
 *   s < createThreshold          -> CREATED
 *
 * Environment overrides (all optional):
 *   RESOLVER_<KIND>_MATCH_THRESHOLD, RESOLVER_<KIND>_CREATE_THRESHOLD,
 *   RESOLVER_<KIND>_AMBIGUITY_GAP, RESOLVER_<KIND>_TOP_K
 *   where <KIND> is MANUFACTURER, MODEL or INDIVIDUAL_GUITAR
 */

import { z } from 'zod'
import type { ResolvableKind } from '../types'
import { RESOLVABLE_KINDS } from '../types'

export interface ManufacturerWeights {
  name: number
  foundedYear: number
  country: number
}

export interface ModelWeights {
  name: number
  year: number
}

export interface IndividualGuitarWeights {
  serial: number
}

export interface WeightsByKind {
  manufacturer: ManufacturerWeights
  model: ModelWeights
  individual_guitar: IndividualGuitarWeights
}

export interface KindResolverConfig<W> {
  matchThreshold: number
  createThreshold: number
  ambiguityGap: number
  /** Max candidates listed in an AMBIGUOUS outcome */
  topKCandidates: number
  weights: W
}

export type ResolverConfig = {
  [K in ResolvableKind]: KindResolverConfig<WeightsByKind[K]>
}

export type ResolverConfigOverrides = {
  [K in ResolvableKind]?: Partial<Omit<KindResolverConfig<WeightsByKind[K]>, 'weights'>> & {
    weights?: Partial<WeightsByKind[K]>
  }
}

type ThresholdOverrides = Partial<Omit<KindResolverConfig<unknown>, 'weights'>>

export const DEFAULT_RESOLVER_CONFIG: ResolverConfig = {
  manufacturer: {
    matchThreshold: 0.9,
    createThreshold: 0.75,
    ambiguityGap: 0.05,
    topKCandidates: 5,
    weights: { name: 0.8, foundedYear: 0.1, country: 0.1 },
  },
  model: {
    matchThreshold: 0.92,
    createThreshold: 0.8,
    ambiguityGap: 0.04,
    topKCandidates: 5,
    weights: { name: 0.85, year: 0.15 },
  },
  individual_guitar: {
    matchThreshold: 0.95,
    createThreshold: 0.85,
    ambiguityGap: 0.02,
    topKCandidates: 3,
    weights: { serial: 1 },
  },
}

const weight = z.number().min(0)

function kindSchema<W extends z.ZodRawShape>(weights: W) {
  return z
    .object({
      matchThreshold: z.number().min(0).max(1),
      createThreshold: z.number().min(0).max(1),
      ambiguityGap: z.number().min(0).lt(1),
      topKCandidates: z.number().int().min(1),
      weights: z
        .object(weights)
        .strict()
        .refine(
          w => Object.values(w).some(v => typeof v === 'number' && v > 0),
          'At least one weight must be positive'
        ),
    })
    .refine(c => c.createThreshold <= c.matchThreshold, {
      message: 'createThreshold must not exceed matchThreshold',
      path: ['createThreshold'],
    })
}

const ResolverConfigSchema = z.object({
  manufacturer: kindSchema({ name: weight, foundedYear: weight, country: weight }),
  model: kindSchema({ name: weight, year: weight }),
  individual_guitar: kindSchema({ serial: weight }),
})

export class ResolverConfigError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid resolver configuration: ${issues.join('; ')}`)
    this.name = 'ResolverConfigError'
    this.issues = issues
  }
}

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws ResolverConfigError: a bad configuration is a startup failure.
 */
export function createResolverConfig(
  overrides: ResolverConfigOverrides = {},
  base: ResolverConfig = DEFAULT_RESOLVER_CONFIG
): ResolverConfig {
  const merged: ResolverConfig = {
    manufacturer: {
      ...base.manufacturer,
      ...overrides.manufacturer,
      weights: { ...base.manufacturer.weights, ...overrides.manufacturer?.weights },
    },
    model: {
      ...base.model,
      ...overrides.model,
      weights: { ...base.model.weights, ...overrides.model?.weights },
    },
    individual_guitar: {
      ...base.individual_guitar,
      ...overrides.individual_guitar,
      weights: { ...base.individual_guitar.weights, ...overrides.individual_guitar?.weights },
    },
  }

  const parsed = ResolverConfigSchema.safeParse(merged)
  if (!parsed.success) {
    throw new ResolverConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    )
  }
  return merged
}

function envNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return undefined
  const value = Number(raw)
  if (Number.isNaN(value)) {
    throw new ResolverConfigError([`${key}: expected a number, got '${raw}'`])
  }
  return value
}

/**
 * Build the resolver configuration from environment variables.
 */
export function loadResolverConfig(env: NodeJS.ProcessEnv = process.env): ResolverConfig {
  const overrides: ResolverConfigOverrides = {}

  for (const kind of RESOLVABLE_KINDS) {
    const prefix = `RESOLVER_${kind.toUpperCase()}_`
    const entry: ThresholdOverrides = {}

    const matchThreshold = envNumber(env, `${prefix}MATCH_THRESHOLD`)
    if (matchThreshold !== undefined) entry.matchThreshold = matchThreshold
    const createThreshold = envNumber(env, `${prefix}CREATE_THRESHOLD`)
    if (createThreshold !== undefined) entry.createThreshold = createThreshold
    const ambiguityGap = envNumber(env, `${prefix}AMBIGUITY_GAP`)
    if (ambiguityGap !== undefined) entry.ambiguityGap = ambiguityGap
    const topKCandidates = envNumber(env, `${prefix}TOP_K`)
    if (topKCandidates !== undefined) entry.topKCandidates = topKCandidates

    if (Object.keys(entry).length > 0) {
      overrides[kind] = entry
    }
  }

  return createResolverConfig(overrides)
}
