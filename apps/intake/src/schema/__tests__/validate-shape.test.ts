import { describe, it, expect } from 'vitest'
import { createRawSubmission } from '../../resolver/__tests__/factories'
import { validateBatchShape, validateShape, validateSubmissionShape } from '../validate-shape'

describe('validateShape', () => {
  it('reports a missing required field', () => {
    const result = validateShape('manufacturer', {})

    expect(result).toEqual({
      success: false,
      error: {
        success: false,
        errorKind: 'InvalidSchema',
        conflicts: [{ path: 'name', message: 'Field is required', rule: 'invalid_type', severity: 'error' }],
      },
    })
  })

  it('distinguishes null from missing', () => {
    const result = validateShape('manufacturer', { name: null })

    expect(result.success).toBe(false)
    if (result.success) return
    expect(result.error.conflicts[0].message).toBe('Field must not be null')
  })

  it('lists every violation, unknown keys included', () => {
    const result = validateShape('manufacturer', { name: 'Fender', founded_year: 1946.5, colour: 'red', ceo: 'x' })

    expect(result.success).toBe(false)
    if (result.success) return
    expect(result.error.conflicts.map(c => [c.path, c.rule])).toEqual([
      ['founded_year', 'invalid_type'],
      ['colour', 'unrecognized_keys'],
      ['ceo', 'unrecognized_keys'],
    ])
    expect(result.error.conflicts[1].message).toBe("Unrecognized field 'colour'")
  })

  it('applies defaults and maps null optionals to undefined', () => {
    const result = validateShape('manufacturer', { name: 'Fender', country: null })

    expect(result.success).toBe(true)
    if (!result.success) return
    expect(result.data).toEqual({ name: 'Fender', country: undefined, status: 'active' })
  })

  it('defaults photo and significance fields of a guitar', () => {
    const result = validateShape('individual_guitar', {
      photos: [{ file_path: 'front.jpg', photo_type: 'front' }],
    })

    expect(result.success).toBe(true)
    if (!result.success) return
    expect(result.data.significance_level).toBe('notable')
    expect(result.data.photos?.[0].is_primary).toBe(false)
  })

  it('returns a deep-frozen entity without touching the input', () => {
    const raw = { manufacturer_name: 'Fender', name: 'Stratocaster', finishes: [{ finish_name: 'Sunburst' }] }
    const result = validateShape('model', raw)

    expect(result.success).toBe(true)
    if (!result.success) return
    expect(Object.isFrozen(result.data)).toBe(true)
    expect(Object.isFrozen(result.data.finishes?.[0])).toBe(true)
    expect(Object.isFrozen(raw)).toBe(false)
    expect(raw).not.toHaveProperty('currency')
  })

  it('rejects an invalid enum value and a malformed date', () => {
    const result = validateShape('individual_guitar', {
      significance_level: 'legendary',
      production_date: '1954/05/01',
    })

    expect(result.success).toBe(false)
    if (result.success) return
    expect(result.error.conflicts.map(c => c.path)).toEqual(['production_date', 'significance_level'])
  })
})

describe('validateSubmissionShape', () => {
  it('accepts a complete submission', () => {
    expect(validateSubmissionShape(createRawSubmission()).success).toBe(true)
  })

  it('prefixes nested paths with the entity', () => {
    const raw = createRawSubmission({
      model: { manufacturer_name: 'Fender', name: 'Stratocaster', specifications: [{ num_frets: 40 }] },
      manufacturer: { name: 'Fender', ceo: 'unknown' },
    })
    const result = validateSubmissionShape(raw)

    expect(result.success).toBe(false)
    if (result.success) return
    expect(result.error.conflicts.map(c => [c.path, c.rule])).toEqual([
      ['manufacturer.ceo', 'unrecognized_keys'],
      ['model.specifications.0.num_frets', 'too_big'],
    ])
  })

  it('requires manufacturer, model and source attribution', () => {
    const result = validateSubmissionShape({})

    expect(result.success).toBe(false)
    if (result.success) return
    expect(result.error.conflicts.map(c => c.path)).toEqual(['manufacturer', 'model', 'source_attribution'])
  })
})

describe('validateBatchShape', () => {
  it('accepts a bare array and a wrapped one', () => {
    const bare = validateBatchShape([{ a: 1 }])
    const wrapped = validateBatchShape({ submissions: [{ a: 1 }] })

    expect(bare).toEqual({ success: true, data: [{ a: 1 }] })
    expect(wrapped).toEqual({ success: true, data: [{ a: 1 }] })
  })

  it('leaves the raw items unfrozen', () => {
    const item = { a: 1 }
    const result = validateBatchShape([item])

    expect(result.success).toBe(true)
    expect(Object.isFrozen(item)).toBe(false)
  })

  it('rejects an empty batch', () => {
    const result = validateBatchShape([])

    expect(result.success).toBe(false)
    if (result.success) return
    expect(result.error.conflicts).toEqual([
      {
        path: '',
        message: 'Batch must contain at least one submission',
        rule: 'too_small',
        severity: 'error',
      },
    ])
  })

  it('rejects a value that is neither an array nor a wrapper', () => {
    const result = validateBatchShape('not a batch')

    expect(result.success).toBe(false)
    if (result.success) return
    expect(result.error.conflicts).toHaveLength(1)
    expect(result.error.conflicts[0].rule).toBe('invalid_type')
  })
})
