/**
 * Billing Aggregator
 *
 * Sums ledger records into a total or into UTC day/month buckets.
 * Amounts are added as integer nano-dollars, so any partition or ordering of
 * the same records produces the same totals.
 */

import { microsToNanos } from '../costs/calculator'
import { BILLING_PERIODS } from '../costs/types'
import type {
  BillingBucket,
  BillingPeriod,
  BillingSummary,
  CostCategory,
  CostRecord,
  CostTotals
} from '../costs/types'
import { InvalidArgumentError } from '../errors'
import { utcDay, utcMonth } from './paths'

export const EMPTY_TOTALS: CostTotals = Object.freeze({
  embeddingNanos: 0,
  visionNanos: 0,
  queryNanos: 0,
  totalNanos: 0,
  recordCount: 0
})

const CATEGORY_FIELD: Record<CostCategory, 'embeddingNanos' | 'visionNanos' | 'queryNanos'> = {
  embedding: 'embeddingNanos',
  vision: 'visionNanos',
  query: 'queryNanos'
}

export function parseBillingPeriod(value: string): BillingPeriod {
  const period = BILLING_PERIODS.find((candidate) => candidate === value)
  if (!period) {
    throw new InvalidArgumentError(
      `Invalid billing period '${value}'. Expected one of: ${BILLING_PERIODS.join(', ')}`
    )
  }
  return period
}

function addRecord(totals: CostTotals, record: CostRecord): CostTotals {
  const nanos = microsToNanos(record.costMicros)
  const field = CATEGORY_FIELD[record.category]
  return {
    ...totals,
    [field]: totals[field] + nanos,
    totalNanos: totals.totalNanos + nanos,
    recordCount: totals.recordCount + 1
  }
}

export function totalsOf(records: readonly CostRecord[]): CostTotals {
  return records.reduce(addRecord, EMPTY_TOTALS)
}

export function mergeTotals(a: CostTotals, b: CostTotals): CostTotals {
  return {
    embeddingNanos: a.embeddingNanos + b.embeddingNanos,
    visionNanos: a.visionNanos + b.visionNanos,
    queryNanos: a.queryNanos + b.queryNanos,
    totalNanos: a.totalNanos + b.totalNanos,
    recordCount: a.recordCount + b.recordCount
  }
}

/**
 * Bucket key of a record timestamp: YYYY-MM-DD or YYYY-MM in UTC.
 */
export function bucketKey(timestamp: string, period: 'daily' | 'monthly'): string {
  return period === 'daily' ? utcDay(timestamp) : utcMonth(timestamp)
}

export function aggregateCosts(
  records: readonly CostRecord[],
  period: BillingPeriod
): BillingSummary {
  const total = totalsOf(records)
  if (period === 'total') {
    return { period, total, breakdown: [] }
  }

  const buckets = new Map<string, CostTotals>()
  for (const record of records) {
    const key = bucketKey(record.timestamp, period)
    buckets.set(key, addRecord(buckets.get(key) ?? EMPTY_TOTALS, record))
  }

  const breakdown: BillingBucket[] = [...buckets.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, totals]) => ({ period: key, ...totals }))

  return { period, total, breakdown }
}
