/**
 * Intake Metrics
 *
 * In-memory counters for the intake pipeline, one instance per caller so
 * concurrent pipelines never share state.
 *
 * Metrics:
 * - intake_submissions_total: Counter by status
 * - intake_decisions_total: Counter by entity kind, outcome
 * - intake_latency_ms: Histogram (per submission)
 *
 * No high-cardinality labels (no entity ids, names or request ids).
 */

import type { ResolutionOutcome } from '../resolver/types'
import type { ResolvableKind } from '../types'

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export type SubmissionStatus = 'Committed' | 'Ambiguous' | 'Rejected'

export type OutcomeLabel = ResolutionOutcome['type']

export interface IntakeMetricsSnapshot {
  submissions: Record<SubmissionStatus, number>
  decisions: Record<ResolvableKind, Record<OutcomeLabel, number>>
  latency: {
    count: number
    sum: number
    buckets: Record<number, number> // bucket threshold -> cumulative count
  }
}

// Histogram buckets (milliseconds)
const LATENCY_BUCKETS = [1, 5, 10, 25, 50, 100, 250, 500, 1000, 5000]

// ═══════════════════════════════════════════════════════════════════════════════
// Collector
// ═══════════════════════════════════════════════════════════════════════════════

export class IntakeMetrics {
  private submissions = new Map<SubmissionStatus, number>()
  private decisions = new Map<string, number>() // key: `${kind}:${outcome}`
  private latency = { count: 0, sum: 0, buckets: new Map<number, number>() }

  recordSubmission(status: SubmissionStatus): void {
    this.submissions.set(status, (this.submissions.get(status) ?? 0) + 1)
  }

  recordDecision(kind: ResolvableKind, outcome: OutcomeLabel): void {
    const key = `${kind}:${outcome}`
    this.decisions.set(key, (this.decisions.get(key) ?? 0) + 1)
  }

  recordLatency(durationMs: number): void {
    this.latency.count++
    this.latency.sum += durationMs

    for (const bucket of LATENCY_BUCKETS) {
      if (durationMs <= bucket) {
        this.latency.buckets.set(bucket, (this.latency.buckets.get(bucket) ?? 0) + 1)
      }
    }
  }

  snapshot(): IntakeMetricsSnapshot {
    const buckets: Record<number, number> = {}
    for (const bucket of LATENCY_BUCKETS) {
      buckets[bucket] = this.latency.buckets.get(bucket) ?? 0
    }

    return {
      submissions: {
        Committed: this.submissions.get('Committed') ?? 0,
        Ambiguous: this.submissions.get('Ambiguous') ?? 0,
        Rejected: this.submissions.get('Rejected') ?? 0,
      },
      decisions: {
        manufacturer: this.decisionsFor('manufacturer'),
        model: this.decisionsFor('model'),
        individual_guitar: this.decisionsFor('individual_guitar'),
      },
      latency: { count: this.latency.count, sum: this.latency.sum, buckets },
    }
  }

  reset(): void {
    this.submissions.clear()
    this.decisions.clear()
    this.latency = { count: 0, sum: 0, buckets: new Map() }
  }

  private decisionsFor(kind: ResolvableKind): Record<OutcomeLabel, number> {
    const count = (outcome: OutcomeLabel) => this.decisions.get(`${kind}:${outcome}`) ?? 0
    return {
      Matched: count('Matched'),
      Created: count('Created'),
      Ambiguous: count('Ambiguous'),
      Rejected: count('Rejected'),
    }
  }
}
