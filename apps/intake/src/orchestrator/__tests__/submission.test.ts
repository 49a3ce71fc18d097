import { describe, it, expect, vi, beforeEach } from 'vitest'

vi.mock('../../config/logger', async () => (await import('../../__tests__/mock-logger')).mockLoggerModule())

import { ERROR_KIND } from '../../errors'
import { InMemoryRegistry } from '../../registry/in-memory-registry'
import { createRawSubmission, manufacturerSubject } from '../../resolver/__tests__/factories'
import { newEntityId } from '../../resolver/identity'
import { IntakeMetrics } from '../metrics'
import { failedStepFor, processSubmission } from '../submission'

const NOW = new Date('2024-06-15T12:00:00Z')

const MANUFACTURER_ID = newEntityId('manufacturer', 'fender')
const MODEL_ID = newEntityId('model', `${MANUFACTURER_ID}|stratocaster|1954`)
const GUITAR_ID = newEntityId('individual_guitar', `${MODEL_ID}|serial:0824`)

describe('processSubmission', () => {
  let registry: InMemoryRegistry

  beforeEach(() => {
    registry = new InMemoryRegistry()
  })

  describe('commit path', () => {
    it('creates every entity of a new submission and attaches the source to the guitar', async () => {
      const report = await processSubmission(createRawSubmission(), registry, { now: NOW, requestId: 'req-1' })

      expect(report).toMatchObject({
        requestId: 'req-1',
        status: 'Committed',
        conflicts: [],
        resolutionAttempts: 3,
        committedIds: {
          manufacturer: MANUFACTURER_ID,
          model: MODEL_ID,
          individual_guitar: GUITAR_ID,
          source_attribution: `${GUITAR_ID}:src:1`,
        },
      })
      expect(report.errorKind).toBeUndefined()
      expect(report.resolutions.manufacturer).toMatchObject({ type: 'Created', rulesFired: ['NO_COMPARABLE_CANDIDATES'] })
      expect(report.resolutions.model).toMatchObject({ type: 'Created', newId: MODEL_ID })
      expect(report.resolutions.individual_guitar).toMatchObject({ type: 'Created', newId: GUITAR_ID })

      expect(registry.get('model', MODEL_ID)?.manufacturerId).toBe(MANUFACTURER_ID)
      expect(registry.get('individual_guitar', GUITAR_ID)?.modelId).toBe(MODEL_ID)
      expect(registry.evidenceFor(GUITAR_ID)).toEqual([
        {
          attribution: { source_name: 'Test Catalog', source_type: 'book' },
          entityKind: 'individual_guitar',
          entityId: GUITAR_ID,
        },
      ])
    })

    it('commits a submission without a guitar against an empty registry', async () => {
      const raw = {
        manufacturer: { name: 'Fender Musical Instruments', country: 'USA' },
        model: { manufacturer_name: 'Fender Musical Instruments', name: 'Stratocaster', year: 1965 },
        source_attribution: { source_name: 'Test' },
      }

      const report = await processSubmission(raw, registry, { now: NOW })

      expect(report.status).toBe('Committed')
      expect(report.resolutions.manufacturer?.type).toBe('Created')
      expect(report.resolutions.model?.type).toBe('Created')
      expect(report.resolutions.individual_guitar).toBeUndefined()
      expect(registry.count('manufacturer')).toBe(1)
      expect(registry.count('model')).toBe(1)
    })

    it('matches every entity when the same submission arrives again', async () => {
      await processSubmission(createRawSubmission(), registry, { now: NOW })
      const report = await processSubmission(createRawSubmission(), registry, { now: NOW })

      expect(report.status).toBe('Committed')
      expect(report.resolutions.manufacturer).toMatchObject({ type: 'Matched', existingId: MANUFACTURER_ID })
      expect(report.resolutions.model).toMatchObject({ type: 'Matched', existingId: MODEL_ID })
      expect(report.resolutions.individual_guitar).toMatchObject({ type: 'Matched', existingId: GUITAR_ID })
      expect(report.committedIds.source_attribution).toBe(`${GUITAR_ID}:src:2`)
      expect(registry.count('manufacturer')).toBe(1)
      expect(registry.count('individual_guitar')).toBe(1)
    })

    it('attaches the source to the model when no guitar is submitted', async () => {
      const raw = createRawSubmission()
      delete raw.individual_guitar

      const report = await processSubmission(raw, registry, { now: NOW })

      expect(report.status).toBe('Committed')
      expect(report.resolutionAttempts).toBe(2)
      expect(report.committedIds.individual_guitar).toBeUndefined()
      expect(report.committedIds.source_attribution).toBe(`${MODEL_ID}:src:1`)
    })

    it('records decisions, status and latency', async () => {
      const metrics = new IntakeMetrics()

      await processSubmission(createRawSubmission(), registry, { now: NOW, metrics })
      const snapshot = metrics.snapshot()

      expect(snapshot.submissions).toEqual({ Committed: 1, Ambiguous: 0, Rejected: 0 })
      expect(snapshot.decisions.model).toEqual({ Matched: 0, Created: 1, Ambiguous: 0, Rejected: 0 })
      expect(snapshot.latency.count).toBe(1)
    })
  })

  describe('validation', () => {
    it('rejects a malformed submission before any resolution', async () => {
      const fetchSpy = vi.spyOn(registry, 'fetchCandidates')

      const report = await processSubmission(createRawSubmission({ manufacturer: {} }), registry, { now: NOW })

      expect(report).toMatchObject({
        status: 'Rejected',
        errorKind: ERROR_KIND.INVALID_SCHEMA,
        failedStep: 'manufacturer',
        message: 'Submission has 1 schema violation(s)',
        resolutionAttempts: 0,
        committedIds: {},
      })
      expect(report.conflicts.map(c => c.path)).toEqual(['manufacturer.name'])
      expect(report.resolutions.manufacturer).toEqual({
        type: 'Rejected',
        reason: 'Submission has 1 schema violation(s)',
        errorKind: ERROR_KIND.INVALID_SCHEMA,
      })
      expect(fetchSpy).not.toHaveBeenCalled()
    })

    it('rejects a business rule violation at the entity that caused it', async () => {
      const report = await processSubmission(
        createRawSubmission({ model: { manufacturer_name: 'Fender', name: 'Stratocaster', year: 2030 } }),
        registry,
        { now: NOW }
      )

      expect(report).toMatchObject({
        status: 'Rejected',
        errorKind: ERROR_KIND.BUSINESS_RULE_VIOLATION,
        failedStep: 'model',
        message: 'Submission violates 1 business rule(s)',
        resolutionAttempts: 0,
      })
      expect(report.validation.shape).toEqual({ success: true, conflicts: [] })
      expect(report.validation.rules?.success).toBe(false)
      expect(registry.count('manufacturer')).toBe(0)
    })

    it('rejects a model that names another manufacturer', async () => {
      const report = await processSubmission(
        createRawSubmission({ model: { manufacturer_name: 'Gibson', name: 'Stratocaster', year: 1954 } }),
        registry,
        { now: NOW }
      )

      expect(report.failedStep).toBe('model')
      expect(report.validation.cross_entity?.success).toBe(false)
      expect(report.conflicts.map(c => c.path)).toEqual(['model.manufacturer_name'])
    })
  })

  describe('ambiguity', () => {
    it('stops without committing when the manufacturer is ambiguous', async () => {
      registry
        .add('manufacturer', 'gib-1', manufacturerSubject({ name: 'Gibson' }))
        .add('manufacturer', 'gib-2', manufacturerSubject({ name: 'GIBSON' }))

      const report = await processSubmission(
        createRawSubmission({
          manufacturer: { name: 'Gibson' },
          model: { manufacturer_name: 'Gibson', name: 'Les Paul', year: 1958 },
        }),
        registry,
        { now: NOW }
      )

      expect(report).toMatchObject({
        status: 'Ambiguous',
        errorKind: ERROR_KIND.AMBIGUOUS,
        failedStep: 'manufacturer',
        message: "2 registry entries share identity key 'gibson'",
        resolutionAttempts: 1,
        committedIds: {},
      })
      expect(report.resolutions.model).toBeUndefined()
      expect(registry.count('model')).toBe(0)
    })
  })

  describe('collaborator failures', () => {
    it('reports a failing commit as a storage failure', async () => {
      vi.spyOn(registry, 'commit').mockRejectedValueOnce(new Error('disk full'))

      const report = await processSubmission(createRawSubmission(), registry, { now: NOW })

      expect(report).toMatchObject({
        status: 'Rejected',
        errorKind: ERROR_KIND.STORAGE_FAILURE,
        failedStep: 'commit',
        message: 'Commit of manufacturer failed: disk full',
        committedIds: {},
      })
      expect(report.resolutions.manufacturer?.type).toBe('Created')
    })

    it('reports a failing lookup at the step that ran it', async () => {
      vi.spyOn(registry, 'fetchCandidates').mockRejectedValueOnce(new Error('timeout'))

      const report = await processSubmission(createRawSubmission(), registry, { now: NOW })

      expect(report).toMatchObject({
        errorKind: ERROR_KIND.STORAGE_FAILURE,
        failedStep: 'manufacturer',
        message: 'Candidate lookup failed: timeout',
        resolutionAttempts: 0,
      })
    })

    it('reports a corrupt candidate set as an invariant violation', async () => {
      const duplicate = { id: 'mfr_dup', subject: manufacturerSubject() }
      vi.spyOn(registry, 'fetchCandidates').mockResolvedValueOnce([duplicate, duplicate])

      const report = await processSubmission(createRawSubmission(), registry, { now: NOW })

      expect(report).toMatchObject({
        status: 'Rejected',
        errorKind: ERROR_KIND.INVARIANT_VIOLATION,
        failedStep: 'manufacturer',
        message: "Duplicate candidate id 'mfr_dup'",
        resolutionAttempts: 1,
      })
      expect(registry.count('manufacturer')).toBe(0)
    })
  })
})

describe('failedStepFor', () => {
  it('picks the first entity in processing order with an error', () => {
    expect(
      failedStepFor([
        { path: 'source_attribution.source_name', message: 'x', severity: 'error' },
        { path: 'manufacturer.country', message: 'x', severity: 'warning' },
        { path: 'model.year', message: 'x', severity: 'error' },
      ])
    ).toBe('model')
  })

  it('falls back to the envelope', () => {
    expect(failedStepFor([{ path: 'specifications.num_frets', message: 'x', severity: 'error' }])).toBe('envelope')
    expect(failedStepFor([{ path: 'modeling', message: 'x', severity: 'error' }])).toBe('envelope')
  })
})
