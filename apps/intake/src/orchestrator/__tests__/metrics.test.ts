import { describe, it, expect } from 'vitest'
import { IntakeMetrics } from '../metrics'

describe('IntakeMetrics', () => {
  it('counts decisions per kind and outcome', () => {
    const metrics = new IntakeMetrics()
    metrics.recordDecision('manufacturer', 'Matched')
    metrics.recordDecision('manufacturer', 'Matched')
    metrics.recordDecision('individual_guitar', 'Ambiguous')

    const { decisions } = metrics.snapshot()

    expect(decisions.manufacturer).toEqual({ Matched: 2, Created: 0, Ambiguous: 0, Rejected: 0 })
    expect(decisions.individual_guitar.Ambiguous).toBe(1)
    expect(decisions.model).toEqual({ Matched: 0, Created: 0, Ambiguous: 0, Rejected: 0 })
  })

  it('fills cumulative latency buckets', () => {
    const metrics = new IntakeMetrics()
    metrics.recordLatency(3)
    metrics.recordLatency(40)
    metrics.recordLatency(9000)

    const { latency } = metrics.snapshot()

    expect(latency.count).toBe(3)
    expect(latency.sum).toBe(9043)
    expect(latency.buckets[1]).toBe(0)
    expect(latency.buckets[5]).toBe(1)
    expect(latency.buckets[50]).toBe(2)
    expect(latency.buckets[5000]).toBe(2)
  })

  it('starts over after reset', () => {
    const metrics = new IntakeMetrics()
    metrics.recordSubmission('Committed')
    metrics.recordLatency(2)
    metrics.reset()

    const snapshot = metrics.snapshot()

    expect(snapshot.submissions).toEqual({ Committed: 0, Ambiguous: 0, Rejected: 0 })
    expect(snapshot.latency.count).toBe(0)
  })
})
