/**
 * Guitar registry intake
 *
 * Validation and uniqueness resolution for third-party guitar submissions.
 */

export * from './errors'
export * from './types'
export { validateEntity } from './validate-entity'
export type { EntityValidation } from './validate-entity'

// Schema
export { validateShape, validateSubmissionShape, validateBatchShape } from './schema/validate-shape'
export type { ShapeResult } from './schema/validate-shape'
export type {
  EntityByKind,
  Finish,
  GuitarSubmission,
  IndividualGuitar,
  Manufacturer,
  Model,
  Photo,
  SourceAttribution,
  Specifications,
} from './schema/schemas'

// Rules
export { RULE, createRuleContext, validateRules, validateCrossEntityRules } from './rules/business-rules'
export type { RuleContext, RuleName } from './rules/business-rules'

// Normalization
export { normalize, normalizeSerial, normalizeText, levenshtein, similarity } from './normalizer/name-utils'

// Configuration
export {
  DEFAULT_RESOLVER_CONFIG,
  ResolverConfigError,
  createResolverConfig,
  loadResolverConfig,
} from './config/resolver-config'
export type { ResolverConfig, ResolverConfigOverrides } from './config/resolver-config'
export { DEFAULT_RULES_CONFIG, loadRulesConfig } from './config/rules-config'
export type { RulesConfig } from './config/rules-config'

export * from './resolver'
export * from './registry'
export * from './orchestrator'
