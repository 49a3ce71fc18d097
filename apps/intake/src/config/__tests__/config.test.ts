import { describe, it, expect } from 'vitest'
import {
  DEFAULT_RESOLVER_CONFIG,
  ResolverConfigError,
  createResolverConfig,
  loadResolverConfig,
} from '../resolver-config'
import { DEFAULT_RULES_CONFIG, loadRulesConfig } from '../rules-config'

describe('createResolverConfig', () => {
  it('returns the defaults without overrides', () => {
    expect(createResolverConfig()).toEqual(DEFAULT_RESOLVER_CONFIG)
  })

  it('merges overrides per kind, weights included', () => {
    const config = createResolverConfig({
      model: { matchThreshold: 0.95, weights: { year: 0.3 } },
    })

    expect(config.model).toEqual({
      matchThreshold: 0.95,
      createThreshold: 0.8,
      ambiguityGap: 0.04,
      topKCandidates: 5,
      weights: { name: 0.85, year: 0.3 },
    })
    expect(config.manufacturer).toEqual(DEFAULT_RESOLVER_CONFIG.manufacturer)
  })

  it('rejects a create threshold above the match threshold', () => {
    expect(() => createResolverConfig({ manufacturer: { createThreshold: 0.95 } })).toThrow(
      'Invalid resolver configuration: manufacturer.createThreshold: createThreshold must not exceed matchThreshold'
    )
  })

  it('rejects all-zero weights', () => {
    expect(() =>
      createResolverConfig({ individual_guitar: { weights: { serial: 0 } } })
    ).toThrow(ResolverConfigError)
  })
})

describe('loadResolverConfig', () => {
  it('reads thresholds from the environment', () => {
    const config = loadResolverConfig({
      RESOLVER_MANUFACTURER_MATCH_THRESHOLD: '0.88',
      RESOLVER_INDIVIDUAL_GUITAR_TOP_K: '7',
    })

    expect(config.manufacturer.matchThreshold).toBe(0.88)
    expect(config.individual_guitar.topKCandidates).toBe(7)
    expect(config.model).toEqual(DEFAULT_RESOLVER_CONFIG.model)
  })

  it('ignores blank variables and rejects non-numbers', () => {
    expect(loadResolverConfig({ RESOLVER_MODEL_AMBIGUITY_GAP: ' ' })).toEqual(DEFAULT_RESOLVER_CONFIG)
    expect(() => loadResolverConfig({ RESOLVER_MODEL_AMBIGUITY_GAP: 'wide' })).toThrow(
      "RESOLVER_MODEL_AMBIGUITY_GAP: expected a number, got 'wide'"
    )
  })
})

describe('loadRulesConfig', () => {
  it('returns the defaults for an empty environment', () => {
    expect(loadRulesConfig({})).toEqual(DEFAULT_RULES_CONFIG)
  })

  it('reads overrides from the environment', () => {
    expect(
      loadRulesConfig({ RULES_MIN_FOUNDED_YEAR: '1850', RULES_HISTORIC_REQUIRES_SERIAL: 'true' })
    ).toEqual({ ...DEFAULT_RULES_CONFIG, minFoundedYear: 1850, historicRequiresSerial: true })
  })

  it('rejects an invalid flag', () => {
    expect(() => loadRulesConfig({ RULES_HISTORIC_REQUIRES_SERIAL: 'yes' })).toThrow(
      /Invalid rules configuration: RULES_HISTORIC_REQUIRES_SERIAL/
    )
  })
})
