/**
 * Standalone validation of a single entity: shape first, then business rules.
 * Rules only run on a structurally valid entity.
 */

import { createRuleContext, type RuleContext, validateRules } from './rules/business-rules'
import type { EntityByKind } from './schema/schemas'
import { validateShape } from './schema/validate-shape'
import type { EntityKind, ValidationResult } from './types'

export type EntityValidation<K extends EntityKind> =
  | { success: true; entity: EntityByKind[K]; result: ValidationResult }
  | { success: false; result: ValidationResult }

export function validateEntity<K extends EntityKind>(
  kind: K,
  raw: unknown,
  ctx: RuleContext = createRuleContext()
): EntityValidation<K> {
  const shape = validateShape(kind, raw)
  if (!shape.success) {
    return { success: false, result: shape.error }
  }

  const result = validateRules(kind, shape.data, ctx)
  return result.success
    ? { success: true, entity: shape.data, result }
    : { success: false, result }
}
