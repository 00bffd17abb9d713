import { describe, expect, it } from 'vitest'
import { createCostRecord } from '../costs/calculator'
import type { CostCategory, CostRecord } from '../costs/types'
import { aggregateCosts, bucketKey, mergeTotals, parseBillingPeriod, totalsOf } from './billing'

function record(category: CostCategory, costMicros: number, timestamp: string): CostRecord {
  return createCostRecord(category, costMicros, { model: 'test-model' }, new Date(timestamp))
}

describe('aggregateCosts', () => {
  const records = [
    record('embedding', 180, '2026-01-05T10:00:00Z'),
    record('vision', 0.3, '2026-01-20T10:00:00Z'),
    record('query', 138, '2026-02-01T00:00:00Z')
  ]

  it('should return the total with no breakdown', () => {
    const summary = aggregateCosts(records, 'total')

    expect(summary.breakdown).toEqual([])
    expect(summary.total).toEqual({
      embeddingNanos: 180_000,
      visionNanos: 300,
      queryNanos: 138_000,
      totalNanos: 318_300,
      recordCount: 3
    })
  })

  it('should return two sorted monthly buckets', () => {
    const summary = aggregateCosts([...records].reverse(), 'monthly')

    expect(summary.breakdown.map((b) => b.period)).toEqual(['2026-01', '2026-02'])
    expect(summary.breakdown[0]?.totalNanos).toBe(180_300)
    expect(summary.breakdown[0]?.recordCount).toBe(2)
    expect(summary.breakdown[1]?.queryNanos).toBe(138_000)
  })

  it('should bucket by UTC day', () => {
    const summary = aggregateCosts(
      [record('query', 1, '2026-03-01T23:59:59Z'), record('query', 2, '2026-03-02T00:00:00Z')],
      'daily'
    )

    expect(summary.breakdown.map((b) => [b.period, b.totalNanos])).toEqual([
      ['2026-03-01', 1000],
      ['2026-03-02', 2000]
    ])
  })

  it('should give identical totals for any order of the same records', () => {
    const many = Array.from({ length: 50 }, (_, i) =>
      record(i % 2 === 0 ? 'vision' : 'query', 0.1 + i * 0.0037, '2026-04-01T00:00:00Z')
    )
    const shuffled = many.flatMap((_, i) => {
      const picked = many[(i * 17) % many.length]
      return picked ? [picked] : []
    })

    expect(aggregateCosts(shuffled, 'total').total).toEqual(aggregateCosts(many, 'total').total)
  })

  it('should give the same total as summing the totals of a partition', () => {
    const left = records.slice(0, 1)
    const right = records.slice(1)

    expect(mergeTotals(totalsOf(left), totalsOf(right))).toEqual(totalsOf(records))
  })

  it('should return zeros for an empty ledger', () => {
    expect(aggregateCosts([], 'monthly')).toEqual({
      period: 'monthly',
      total: { embeddingNanos: 0, visionNanos: 0, queryNanos: 0, totalNanos: 0, recordCount: 0 },
      breakdown: []
    })
  })
})

describe('bucketKey', () => {
  it('should normalize offsets to UTC', () => {
    expect(bucketKey('2026-01-31T22:00:00-05:00', 'daily')).toBe('2026-02-01')
    expect(bucketKey('2026-01-31T22:00:00-05:00', 'monthly')).toBe('2026-02')
  })
})

describe('parseBillingPeriod', () => {
  it('should accept known periods', () => {
    expect(parseBillingPeriod('daily')).toBe('daily')
  })

  it('should reject unknown periods', () => {
    expect(() => parseBillingPeriod('weekly')).toThrow("Invalid billing period 'weekly'")
  })
})
