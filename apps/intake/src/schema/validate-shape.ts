/**
 * Schema Layer
 *
 * validateShape(kind, raw) runs the closed zod schema for an entity kind and
 * reports every violating field, not just the first, as InvalidSchema conflicts.
 * On success the entity comes back with defaults applied and deep-frozen.
 */

import type { z } from 'zod'
import { ERROR_KIND } from '../errors'
import type { Conflict, EntityKind, ValidationResult } from '../types'
import {
  BatchSubmissionSchema,
  ENTITY_SCHEMAS,
  GuitarSubmissionSchema,
  type EntityByKind,
  type GuitarSubmission,
} from './schemas'

export type ShapeResult<T> =
  | { success: true; data: T }
  | { success: false; error: ValidationResult }

type ShapeValidator<T> = (raw: unknown, pathPrefix?: string) => ShapeResult<T>

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
    Object.freeze(value)
  }
  return value
}

function joinPath(prefix: string | undefined, path: ReadonlyArray<string | number>): string {
  const segments = prefix ? [prefix, ...path.map(String)] : path.map(String)
  return segments.join('.')
}

function describeIssue(issue: z.ZodIssue): string {
  if (issue.code === 'invalid_type') {
    if (issue.received === 'undefined') return 'Field is required'
    if (issue.received === 'null') return 'Field must not be null'
  }
  return issue.message
}

/**
 * For a failed union, report the branch whose top-level type matched the input
 * (or failing that, the branch with the fewest issues) instead of zod's
 * generic "Invalid input".
 */
function pickUnionBranch(issue: z.ZodInvalidUnionIssue): z.ZodIssue[] {
  const depth = issue.path.length
  const branches = issue.unionErrors.map(err => err.issues)
  const typeMatched = branches.filter(
    issues => !issues.some(i => i.code === 'invalid_type' && i.path.length === depth)
  )
  const pool = typeMatched.length > 0 ? typeMatched : branches
  return pool.reduce((best, issues) => (issues.length < best.length ? issues : best), pool[0] ?? [])
}

export function issuesToConflicts(issues: readonly z.ZodIssue[], pathPrefix?: string): Conflict[] {
  const conflicts: Conflict[] = []

  for (const issue of issues) {
    if (issue.code === 'unrecognized_keys') {
      for (const key of issue.keys) {
        conflicts.push({
          path: joinPath(pathPrefix, [...issue.path, key]),
          message: `Unrecognized field '${key}'`,
          rule: 'unrecognized_keys',
          severity: 'error',
        })
      }
      continue
    }

    if (issue.code === 'invalid_union') {
      const branch = pickUnionBranch(issue)
      if (branch.length > 0) {
        conflicts.push(...issuesToConflicts(branch, pathPrefix))
        continue
      }
    }

    conflicts.push({
      path: joinPath(pathPrefix, issue.path),
      message: describeIssue(issue),
      rule: issue.code,
      severity: 'error',
    })
  }

  return conflicts
}

function shapeValidator<S extends z.ZodTypeAny>(
  schema: S,
  freeze = true
): ShapeValidator<z.output<S>> {
  return (raw, pathPrefix) => {
    const parsed = schema.safeParse(raw)
    if (parsed.success) {
      return { success: true, data: freeze ? deepFreeze(parsed.data) : parsed.data }
    }
    return {
      success: false,
      error: {
        success: false,
        errorKind: ERROR_KIND.INVALID_SCHEMA,
        conflicts: issuesToConflicts(parsed.error.issues, pathPrefix),
      },
    }
  }
}

const SHAPE_VALIDATORS: { [K in EntityKind]: ShapeValidator<EntityByKind[K]> } = {
  manufacturer: shapeValidator(ENTITY_SCHEMAS.manufacturer),
  model: shapeValidator(ENTITY_SCHEMAS.model),
  individual_guitar: shapeValidator(ENTITY_SCHEMAS.individual_guitar),
  specifications: shapeValidator(ENTITY_SCHEMAS.specifications),
  finish: shapeValidator(ENTITY_SCHEMAS.finish),
  source_attribution: shapeValidator(ENTITY_SCHEMAS.source_attribution),
}

/**
 * Validate the shape of one entity. Pure: no logging, no mutation of `raw`.
 */
export function validateShape<K extends EntityKind>(
  kind: K,
  raw: unknown,
  pathPrefix?: string
): ShapeResult<EntityByKind[K]> {
  return SHAPE_VALIDATORS[kind](raw, pathPrefix)
}

export const validateSubmissionShape: ShapeValidator<GuitarSubmission> =
  shapeValidator(GuitarSubmissionSchema)

/**
 * Validate the batch envelope only. Items stay raw so each submission is
 * shape-checked (and possibly rejected) independently.
 */
export const validateBatchShape: ShapeValidator<readonly unknown[]> =
  shapeValidator(BatchSubmissionSchema, false)
