import { describe, it, expect } from 'vitest'
import { createRuleContext, RULE } from '../rules/business-rules'
import { validateEntity } from '../validate-entity'

const ctx = createRuleContext(new Date('2024-06-15T12:00:00Z'))

describe('validateEntity', () => {
  it('returns the validated entity with its warnings', () => {
    const result = validateEntity('individual_guitar', { current_estimated_value: 5000 }, ctx)

    expect(result.success).toBe(true)
    if (!result.success) return
    expect(result.entity.significance_level).toBe('notable')
    expect(result.result.conflicts.map(c => c.rule)).toEqual([RULE.VALUATION_WITHOUT_DATE])
  })

  it('stops at the shape stage', () => {
    const result = validateEntity('manufacturer', { name: 'Fender', founded_year: 3000 }, ctx)

    expect(result.success).toBe(false)
    expect(result.result.errorKind).toBe('InvalidSchema')
  })

  it('reports business rule violations of a well-formed entity', () => {
    const result = validateEntity('manufacturer', { name: 'Fender', founded_year: 2030 }, ctx)

    expect(result).toEqual({
      success: false,
      result: {
        success: false,
        errorKind: 'BusinessRuleViolation',
        conflicts: [
          {
            path: 'founded_year',
            rule: RULE.FOUNDED_YEAR_FUTURE,
            message: 'Founded year 2030 is in the future',
            severity: 'error',
          },
        ],
      },
    })
  })
})
