/**
 * Guitar registry submission schemas
 *
 * Closed (`.strict()`) zod schemas for every entity kind and the two
 * submission envelopes. Unknown keys are rejected, not stripped, so upstream
 * producers learn about typos instead of silently losing data.
 *
 * Optional fields accept `null` (producers serialize missing values either way)
 * and normalize it to `undefined`.
 */

import { z } from 'zod'

// ═══════════════════════════════════════════════════════════════════════════════
// Enumerations
// ═══════════════════════════════════════════════════════════════════════════════

export const MANUFACTURER_STATUSES = ['active', 'defunct', 'acquired'] as const
export const PRODUCTION_TYPES = ['mass', 'limited', 'custom', 'prototype', 'one-off'] as const
export const SIGNIFICANCE_LEVELS = ['historic', 'notable', 'rare', 'custom', 'standard'] as const
export const CONDITION_RATINGS = ['mint', 'excellent', 'very_good', 'good', 'fair', 'poor', 'relic'] as const
export const SOURCE_TYPES = [
  'manufacturer_catalog',
  'auction_record',
  'museum',
  'book',
  'website',
  'manual_entry',
  'price_guide',
] as const
export const FINISH_RARITIES = ['common', 'uncommon', 'rare', 'very_rare'] as const

export type ManufacturerStatus = (typeof MANUFACTURER_STATUSES)[number]
export type ProductionType = (typeof PRODUCTION_TYPES)[number]
export type SignificanceLevel = (typeof SIGNIFICANCE_LEVELS)[number]
export type ConditionRating = (typeof CONDITION_RATINGS)[number]
export type SourceType = (typeof SOURCE_TYPES)[number]
export type FinishRarity = (typeof FINISH_RARITIES)[number]

// ═══════════════════════════════════════════════════════════════════════════════
// Field helpers
// ═══════════════════════════════════════════════════════════════════════════════

function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value): z.output<T> | undefined => value ?? undefined)
}

const isoDate = z.string().date('Expected an ISO date (YYYY-MM-DD)')
const year = (min: number, max: number) => z.number().int().min(min).max(max)

// ═══════════════════════════════════════════════════════════════════════════════
// Entity schemas
// ═══════════════════════════════════════════════════════════════════════════════

export const SpecificationsSchema = z
  .object({
    body_wood: optional(z.string().max(50)),
    neck_wood: optional(z.string().max(50)),
    fingerboard_wood: optional(z.string().max(50)),
    scale_length_inches: optional(z.number().min(20).max(30)),
    num_frets: optional(z.number().int().min(12).max(36)),
    nut_width_inches: optional(z.number().min(1).max(2.5)),
    neck_profile: optional(z.string().max(50)),
    bridge_type: optional(z.string().max(50)),
    pickup_configuration: optional(z.string().max(150)),
    electronics_description: optional(z.string()),
    hardware_finish: optional(z.string().max(50)),
    body_finish: optional(z.string()),
    weight_lbs: optional(z.number().min(1).max(20)),
    case_included: optional(z.boolean()),
    case_type: optional(z.string().max(50)),
  })
  .strict()

export const FinishSchema = z
  .object({
    finish_name: z.string().min(1).max(100),
    finish_type: optional(z.string().max(50)),
    color_code: optional(z.string().max(20)),
    rarity: optional(z.enum(FINISH_RARITIES)),
    notes: optional(z.string()),
  })
  .strict()

export const ManufacturerSchema = z
  .object({
    name: z.string().min(1).max(100),
    country: optional(z.string().max(50)),
    founded_year: optional(year(1800, 2100)),
    website: optional(z.string().url()),
    status: z.enum(MANUFACTURER_STATUSES).default('active'),
    notes: optional(z.string()),
    logo_source: optional(z.string()),
  })
  .strict()

export const ModelSchema = z
  .object({
    manufacturer_name: z.string().min(1).max(100),
    product_line_name: optional(z.string().max(100)),
    name: z.string().min(1).max(150),
    year: optional(year(1900, 2100)),
    production_type: z.enum(PRODUCTION_TYPES).default('mass'),
    production_start_date: optional(isoDate),
    production_end_date: optional(isoDate),
    estimated_production_quantity: optional(z.number().int().min(1)),
    msrp_original: optional(z.number().min(0)),
    currency: z.string().max(3).default('USD'),
    description: optional(z.string()),
    specifications: optional(z.union([SpecificationsSchema, z.array(SpecificationsSchema)])),
    finishes: optional(z.array(FinishSchema)),
  })
  .strict()

export const PhotoSchema = z
  .object({
    file_path: z.string().min(1),
    photo_type: z.string().min(1),
    description: optional(z.string()),
    is_primary: z.boolean().default(false),
  })
  .strict()

export const IndividualGuitarSchema = z
  .object({
    serial_number: optional(z.string().max(50)),
    external_id: optional(z.string().min(1).max(100)),
    year_estimate: optional(z.string().max(50)),
    description: optional(z.string()),
    production_date: optional(isoDate),
    production_number: optional(z.number().int()),
    significance_level: z.enum(SIGNIFICANCE_LEVELS).default('notable'),
    significance_notes: optional(z.string()),
    current_estimated_value: optional(z.number().min(0)),
    last_valuation_date: optional(isoDate),
    condition_rating: optional(z.enum(CONDITION_RATINGS)),
    modifications: optional(z.string()),
    provenance_notes: optional(z.string()),
    specifications: optional(SpecificationsSchema),
    finishes: optional(z.array(FinishSchema)),
    photos: optional(z.array(PhotoSchema)),
  })
  .strict()

export const SourceAttributionSchema = z
  .object({
    source_name: z.string().min(1).max(100),
    source_type: optional(z.enum(SOURCE_TYPES)),
    url: optional(z.string().url().max(500)),
    isbn: optional(z.string().max(20)),
    publication_date: optional(isoDate),
    reliability_score: optional(z.number().int().min(1).max(10)),
    notes: optional(z.string()),
  })
  .strict()

// ═══════════════════════════════════════════════════════════════════════════════
// Envelopes
// ═══════════════════════════════════════════════════════════════════════════════

export const GuitarSubmissionSchema = z
  .object({
    manufacturer: ManufacturerSchema,
    model: ModelSchema,
    individual_guitar: optional(IndividualGuitarSchema),
    source_attribution: SourceAttributionSchema,
    specifications: optional(SpecificationsSchema),
    finish: optional(FinishSchema),
  })
  .strict()

/**
 * A batch arrives as a bare array or wrapped as `{ submissions: [...] }`.
 * Items are kept raw here: each one is validated on its own so one malformed
 * item does not reject its siblings.
 */
export const BatchSubmissionSchema = z.union([
  z.array(z.unknown()).min(1, 'Batch must contain at least one submission'),
  z
    .object({
      submissions: z.array(z.unknown()).min(1, 'Batch must contain at least one submission'),
    })
    .strict()
    .transform(batch => batch.submissions),
])

// ═══════════════════════════════════════════════════════════════════════════════
// Entity types
// ═══════════════════════════════════════════════════════════════════════════════

export type Specifications = Readonly<z.output<typeof SpecificationsSchema>>
export type Finish = Readonly<z.output<typeof FinishSchema>>
export type Manufacturer = Readonly<z.output<typeof ManufacturerSchema>>
export type Model = Readonly<z.output<typeof ModelSchema>>
export type Photo = Readonly<z.output<typeof PhotoSchema>>
export type IndividualGuitar = Readonly<z.output<typeof IndividualGuitarSchema>>
export type SourceAttribution = Readonly<z.output<typeof SourceAttributionSchema>>
export type GuitarSubmission = Readonly<z.output<typeof GuitarSubmissionSchema>>

export const ENTITY_SCHEMAS = {
  manufacturer: ManufacturerSchema,
  model: ModelSchema,
  individual_guitar: IndividualGuitarSchema,
  specifications: SpecificationsSchema,
  finish: FinishSchema,
  source_attribution: SourceAttributionSchema,
} as const

export interface EntityByKind {
  manufacturer: Manufacturer
  model: Model
  individual_guitar: IndividualGuitar
  specifications: Specifications
  finish: Finish
  source_attribution: SourceAttribution
}
