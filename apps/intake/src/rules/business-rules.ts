/**
 * Business Rule Validator
 *
 * Domain checks the schema cannot express: trimmed lengths, plausible years,
 * date ordering, cross-field consistency. Every violated rule is reported.
 * Rules are pure functions of (entity, context): re-running them on the same
 * value yields the same result.
 */

import { DEFAULT_RULES_CONFIG, type RulesConfig } from '../config/rules-config'
import { ERROR_KIND } from '../errors'
import { normalize } from '../normalizer/name-utils'
import type {
  EntityByKind,
  Finish,
  GuitarSubmission,
  IndividualGuitar,
  Manufacturer,
  Model,
  Photo,
  SourceAttribution,
  Specifications,
} from '../schema/schemas'
import { validationResult, type Conflict, type EntityKind, type ValidationResult } from '../types'

export const RULE = {
  NAME_MIN_LENGTH: 'NAME_MIN_LENGTH',
  COUNTRY_MIN_LENGTH: 'COUNTRY_MIN_LENGTH',
  FOUNDED_YEAR_FUTURE: 'FOUNDED_YEAR_FUTURE',
  FOUNDED_YEAR_TOO_EARLY: 'FOUNDED_YEAR_TOO_EARLY',
  MODEL_YEAR_RANGE: 'MODEL_YEAR_RANGE',
  PRODUCTION_DATE_ORDER: 'PRODUCTION_DATE_ORDER',
  CURRENCY_CODE: 'CURRENCY_CODE',
  SERIAL_FORMAT: 'SERIAL_FORMAT',
  HISTORIC_SERIAL: 'HISTORIC_SERIAL',
  DATE_IN_FUTURE: 'DATE_IN_FUTURE',
  VALUATION_WITHOUT_DATE: 'VALUATION_WITHOUT_DATE',
  CASE_TYPE_WITHOUT_CASE: 'CASE_TYPE_WITHOUT_CASE',
  ISBN_SOURCE_TYPE: 'ISBN_SOURCE_TYPE',
  SINGLE_PRIMARY_PHOTO: 'SINGLE_PRIMARY_PHOTO',
  MANUFACTURER_NAME_MISMATCH: 'MANUFACTURER_NAME_MISMATCH',
  MODEL_PREDATES_MANUFACTURER: 'MODEL_PREDATES_MANUFACTURER',
} as const

export type RuleName = (typeof RULE)[keyof typeof RULE]

export interface RuleContext {
  /** Reference instant for "not in the future" checks */
  now: Date
  config: RulesConfig
}

export function createRuleContext(
  now: Date = new Date(),
  config: RulesConfig = DEFAULT_RULES_CONFIG
): RuleContext {
  return { now, config }
}

type RuleCheck<T> = (entity: T, ctx: RuleContext, path: PathBuilder) => Conflict[]

type PathBuilder = (field?: string | number) => string

function pathBuilder(prefix?: string): PathBuilder {
  return field => {
    if (field === undefined) return prefix ?? ''
    return prefix ? `${prefix}.${field}` : String(field)
  }
}

function error(path: string, rule: RuleName, message: string): Conflict {
  return { path, rule, message, severity: 'error' }
}

function warning(path: string, rule: RuleName, message: string): Conflict {
  return { path, rule, message, severity: 'warning' }
}

function todayIso(ctx: RuleContext): string {
  return ctx.now.toISOString().slice(0, 10)
}

function currentYear(ctx: RuleContext): number {
  return ctx.now.getUTCFullYear()
}

function checkName(value: string, path: string): Conflict[] {
  return value.trim().length < 2
    ? [error(path, RULE.NAME_MIN_LENGTH, 'Name must be at least 2 characters after trimming')]
    : []
}

function checkNotFuture(value: string | undefined, path: string, ctx: RuleContext): Conflict[] {
  // ISO dates compare correctly as strings
  return value !== undefined && value > todayIso(ctx)
    ? [error(path, RULE.DATE_IN_FUTURE, `Date ${value} is in the future`)]
    : []
}

// ═══════════════════════════════════════════════════════════════════════════════
// Sub-record rules
// ═══════════════════════════════════════════════════════════════════════════════

const specificationsRules: RuleCheck<Specifications> = (specs, _ctx, path) => {
  if (specs.case_included === false && specs.case_type) {
    return [
      warning(path('case_type'), RULE.CASE_TYPE_WITHOUT_CASE, 'case_type is set but case_included is false'),
    ]
  }
  return []
}

const finishRules: RuleCheck<Finish> = (finish, _ctx, path) =>
  checkName(finish.finish_name, path('finish_name'))

const photoListRules = (photos: readonly Photo[], path: PathBuilder): Conflict[] => {
  const primaries = photos.filter(photo => photo.is_primary).length
  return primaries > 1
    ? [error(path('photos'), RULE.SINGLE_PRIMARY_PHOTO, `Only one photo may be primary, found ${primaries}`)]
    : []
}

function nestedRules(
  specifications: Specifications | Specifications[] | undefined,
  finishes: readonly Finish[] | undefined,
  ctx: RuleContext,
  path: PathBuilder
): Conflict[] {
  const conflicts: Conflict[] = []

  if (Array.isArray(specifications)) {
    specifications.forEach((specs, i) => {
      conflicts.push(...specificationsRules(specs, ctx, pathBuilder(path(`specifications.${i}`))))
    })
  } else if (specifications) {
    conflicts.push(...specificationsRules(specifications, ctx, pathBuilder(path('specifications'))))
  }

  finishes?.forEach((finish, i) => {
    conflicts.push(...finishRules(finish, ctx, pathBuilder(path(`finishes.${i}`))))
  })

  return conflicts
}

// ═══════════════════════════════════════════════════════════════════════════════
// Entity rules
// ═══════════════════════════════════════════════════════════════════════════════

const manufacturerRules: RuleCheck<Manufacturer> = (manufacturer, ctx, path) => {
  const conflicts = checkName(manufacturer.name, path('name'))

  if (manufacturer.country !== undefined && manufacturer.country.trim().length < 2) {
    conflicts.push(
      error(path('country'), RULE.COUNTRY_MIN_LENGTH, 'Country must be at least 2 characters after trimming')
    )
  }

  const founded = manufacturer.founded_year
  if (founded !== undefined) {
    if (founded > currentYear(ctx)) {
      conflicts.push(
        error(path('founded_year'), RULE.FOUNDED_YEAR_FUTURE, `Founded year ${founded} is in the future`)
      )
    }
    if (founded < ctx.config.minFoundedYear) {
      conflicts.push(
        error(
          path('founded_year'),
          RULE.FOUNDED_YEAR_TOO_EARLY,
          `Founded year ${founded} is before ${ctx.config.minFoundedYear}`
        )
      )
    }
  }

  return conflicts
}

const modelRules: RuleCheck<Model> = (model, ctx, path) => {
  const conflicts = checkName(model.name, path('name'))

  if (model.year !== undefined) {
    const maxYear = currentYear(ctx) + ctx.config.maxModelYearAhead
    if (model.year < ctx.config.minModelYear || model.year > maxYear) {
      conflicts.push(
        error(
          path('year'),
          RULE.MODEL_YEAR_RANGE,
          `Model year ${model.year} is outside ${ctx.config.minModelYear}-${maxYear}`
        )
      )
    }
  }

  if (
    model.production_start_date !== undefined &&
    model.production_end_date !== undefined &&
    model.production_start_date > model.production_end_date
  ) {
    conflicts.push(
      error(
        path('production_end_date'),
        RULE.PRODUCTION_DATE_ORDER,
        'production_end_date is before production_start_date'
      )
    )
  }

  if (!/^[A-Z]{3}$/.test(model.currency)) {
    conflicts.push(
      error(path('currency'), RULE.CURRENCY_CODE, `Currency '${model.currency}' is not an ISO 4217 code`)
    )
  }

  conflicts.push(...nestedRules(model.specifications, model.finishes, ctx, path))
  return conflicts
}

/**
 * Serial numbers: separators (-, space, .) are ignored; what remains must be
 * alphanumeric and of plausible length.
 */
export function isValidSerialFormat(serial: string, config: RulesConfig = DEFAULT_RULES_CONFIG): boolean {
  const cleaned = serial.replace(/[-\s.]/g, '')
  return (
    /^[A-Za-z0-9]+$/.test(cleaned) &&
    cleaned.length >= config.serialMinLength &&
    cleaned.length <= config.serialMaxLength
  )
}

const individualGuitarRules: RuleCheck<IndividualGuitar> = (guitar, ctx, path) => {
  const conflicts: Conflict[] = []
  const serial = guitar.serial_number?.trim() || undefined

  if (serial !== undefined && !isValidSerialFormat(serial, ctx.config)) {
    conflicts.push(
      error(
        path('serial_number'),
        RULE.SERIAL_FORMAT,
        `Serial '${serial}' must be ${ctx.config.serialMinLength}-${ctx.config.serialMaxLength} alphanumeric characters (separators - . and spaces ignored)`
      )
    )
  }

  if (guitar.significance_level === 'historic' && serial === undefined) {
    const message = 'Historic guitars should carry a serial number'
    conflicts.push(
      ctx.config.historicRequiresSerial
        ? error(path('serial_number'), RULE.HISTORIC_SERIAL, message)
        : warning(path('serial_number'), RULE.HISTORIC_SERIAL, message)
    )
  }

  conflicts.push(...checkNotFuture(guitar.production_date, path('production_date'), ctx))
  conflicts.push(...checkNotFuture(guitar.last_valuation_date, path('last_valuation_date'), ctx))

  if (guitar.current_estimated_value !== undefined && guitar.last_valuation_date === undefined) {
    conflicts.push(
      warning(
        path('last_valuation_date'),
        RULE.VALUATION_WITHOUT_DATE,
        'current_estimated_value has no last_valuation_date'
      )
    )
  }

  if (guitar.photos) {
    conflicts.push(...photoListRules(guitar.photos, path))
  }

  conflicts.push(...nestedRules(guitar.specifications, guitar.finishes, ctx, path))
  return conflicts
}

const sourceAttributionRules: RuleCheck<SourceAttribution> = (source, ctx, path) => {
  const conflicts = checkNotFuture(source.publication_date, path('publication_date'), ctx)

  if (source.isbn !== undefined && source.source_type !== undefined && source.source_type !== 'book') {
    conflicts.push(
      warning(path('isbn'), RULE.ISBN_SOURCE_TYPE, `ISBN given for a '${source.source_type}' source`)
    )
  }

  return conflicts
}

const ENTITY_RULES: { [K in EntityKind]: RuleCheck<EntityByKind[K]> } = {
  manufacturer: manufacturerRules,
  model: modelRules,
  individual_guitar: individualGuitarRules,
  specifications: specificationsRules,
  finish: finishRules,
  source_attribution: sourceAttributionRules,
}

// ═══════════════════════════════════════════════════════════════════════════════
// Entry points
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Apply the business rules for one structurally valid entity.
 */
export function validateRules<K extends EntityKind>(
  kind: K,
  entity: EntityByKind[K],
  ctx: RuleContext = createRuleContext(),
  pathPrefix?: string
): ValidationResult {
  const check: RuleCheck<EntityByKind[K]> = ENTITY_RULES[kind]
  return validationResult(check(entity, ctx, pathBuilder(pathPrefix)), ERROR_KIND.BUSINESS_RULE_VIOLATION)
}

/**
 * Rules spanning several entities of one submission.
 */
export function validateCrossEntityRules(submission: GuitarSubmission): ValidationResult {
  const conflicts: Conflict[] = []
  const { manufacturer, model } = submission

  if (normalize(model.manufacturer_name, 'manufacturer') !== normalize(manufacturer.name, 'manufacturer')) {
    conflicts.push(
      error(
        'model.manufacturer_name',
        RULE.MANUFACTURER_NAME_MISMATCH,
        `Model manufacturer '${model.manufacturer_name}' does not match submitted manufacturer '${manufacturer.name}'`
      )
    )
  }

  if (
    model.year !== undefined &&
    manufacturer.founded_year !== undefined &&
    model.year < manufacturer.founded_year
  ) {
    conflicts.push(
      warning(
        'model.year',
        RULE.MODEL_PREDATES_MANUFACTURER,
        `Model year ${model.year} predates manufacturer founding in ${manufacturer.founded_year}`
      )
    )
  }

  return validationResult(conflicts, ERROR_KIND.BUSINESS_RULE_VIOLATION)
}
