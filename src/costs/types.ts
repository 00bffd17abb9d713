/**
 * Cost Tracking Types
 *
 * Type definitions for cost calculation, the cost ledger and billing.
 */

// =============================================================================
// MONEY TYPES
// =============================================================================

/**
 * Amount in micro-dollars (1/1,000,000 of a dollar).
 * Using micro-dollars allows precise fractional token pricing.
 *
 * Example: $0.15 per 1M tokens = 0.15 micro-dollars per token
 */
export type MicroDollars = number

/**
 * Integer amount in nano-dollars (1/1,000 of a micro-dollar).
 * Aggregation adds these as integers so sums are exact in any order.
 */
export type NanoDollars = number

// =============================================================================
// PRICING TYPES
// =============================================================================

/** Metered cost categories */
export type CostCategory = 'embedding' | 'vision' | 'query'

export const COST_CATEGORIES: readonly CostCategory[] = ['embedding', 'vision', 'query']

/**
 * Pricing for a specific model.
 * All prices in micro-dollars per token (= USD per 1M tokens).
 */
export interface ModelPricing {
  /** Model identifier */
  model: string
  /** Input token price (micro-dollars per token) */
  inputTokenPrice: MicroDollars
  /** Output token price (micro-dollars per token) */
  outputTokenPrice: MicroDollars
  /** Last updated date */
  updatedAt: string
}

// =============================================================================
// LEDGER TYPES
// =============================================================================

/**
 * Category-specific metadata attached to a cost record.
 */
export interface CostContext {
  readonly label?: string | undefined
  readonly model: string
  readonly inputTokens?: number | undefined
  readonly outputTokens?: number | undefined
  readonly documentId?: string | undefined
  readonly elapsedMs?: number | undefined
  readonly source?: string | undefined
  readonly operation?: string | undefined
}

/**
 * One immutable cost ledger entry.
 */
export interface CostRecord {
  readonly category: CostCategory
  /** Cost in micro-dollars, unrounded */
  readonly costMicros: MicroDollars
  /** ISO-8601 UTC timestamp */
  readonly timestamp: string
  readonly context: CostContext
}

/**
 * Destination for cost records as they are produced.
 * The filesystem ledger and the in-memory tracker both implement it.
 */
export interface CostSink {
  record(record: CostRecord): Promise<void>
}

// =============================================================================
// BILLING TYPES
// =============================================================================

export type BillingPeriod = 'total' | 'daily' | 'monthly'

export const BILLING_PERIODS: readonly BillingPeriod[] = ['total', 'daily', 'monthly']

/**
 * Per-category totals. Amounts are exact integer nano-dollars.
 */
export interface CostTotals {
  readonly embeddingNanos: NanoDollars
  readonly visionNanos: NanoDollars
  readonly queryNanos: NanoDollars
  readonly totalNanos: NanoDollars
  readonly recordCount: number
}

export interface BillingBucket extends CostTotals {
  /** YYYY-MM-DD for daily buckets, YYYY-MM for monthly */
  readonly period: string
}

export interface BillingSummary {
  readonly period: BillingPeriod
  readonly total: CostTotals
  /** Empty for the total period, sorted ascending otherwise */
  readonly breakdown: readonly BillingBucket[]
}
