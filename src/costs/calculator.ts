/**
 * Cost Calculator
 *
 * Functions for calculating costs of metered Gemini calls and for summing
 * recorded costs. Costs are calculated in micro-dollars and summed in
 * integer nano-dollars so totals do not depend on addition order.
 */

import { InvalidArgumentError, UnknownModelError } from '../errors'
import type { TokenUsage } from '../types/providers'
import { getAIModelPricing, getEmbeddingModelPricing } from './pricing'
import type { CostCategory, CostContext, CostRecord, MicroDollars, NanoDollars } from './types'

// =============================================================================
// CONVERSION UTILITIES
// =============================================================================

/**
 * Convert micro-dollars to dollars.
 */
export function microsToDollars(micros: MicroDollars): number {
  return micros / 1_000_000
}

/**
 * Convert micro-dollars to whole nano-dollars (rounded to nearest).
 */
export function microsToNanos(micros: MicroDollars): NanoDollars {
  return Math.round(micros * 1_000)
}

/**
 * Convert nano-dollars to micro-dollars.
 */
export function nanosToMicros(nanos: NanoDollars): MicroDollars {
  return nanos / 1_000
}

/**
 * Format micro-dollars as a dollar string.
 */
export function formatMicrosAsDollars(micros: MicroDollars): string {
  const dollars = microsToDollars(micros)
  if (dollars < 0.01) {
    return `$${dollars.toFixed(4)}`
  }
  return `$${dollars.toFixed(2)}`
}

/**
 * Format nano-dollars with a fixed number of decimals (billing output).
 */
export function formatNanosAsDollars(nanos: NanoDollars, decimals = 8): string {
  return `$${(nanos / 1_000_000_000).toFixed(decimals)}`
}

// =============================================================================
// TOKEN COST CALCULATIONS
// =============================================================================

/**
 * Calculate cost for generation model input tokens.
 */
export function calculateInputCost(model: string, tokenCount: number): MicroDollars {
  const pricing = getAIModelPricing(model)
  if (!pricing) {
    throw new UnknownModelError(model)
  }
  return pricing.inputTokenPrice * tokenCount
}

/**
 * Calculate cost for generation model output tokens.
 */
export function calculateOutputCost(model: string, tokenCount: number): MicroDollars {
  const pricing = getAIModelPricing(model)
  if (!pricing) {
    throw new UnknownModelError(model)
  }
  return pricing.outputTokenPrice * tokenCount
}

/**
 * Calculate total cost for a completion (query answer or image description).
 */
export function calculateCompletionCost(model: string, usage: TokenUsage): MicroDollars {
  return calculateInputCost(model, usage.inputTokens) + calculateOutputCost(model, usage.outputTokens)
}

/**
 * Calculate cost for indexing tokens with an embedding model.
 */
export function calculateEmbeddingCost(model: string, tokenCount: number): MicroDollars {
  const pricing = getEmbeddingModelPricing(model)
  if (!pricing) {
    throw new UnknownModelError(model)
  }
  return pricing.inputTokenPrice * tokenCount
}

/**
 * Whether a model has pricing for the given use.
 */
export function isPricedModel(model: string, use: 'generation' | 'embedding'): boolean {
  return use === 'embedding'
    ? getEmbeddingModelPricing(model) !== null
    : getAIModelPricing(model) !== null
}

// =============================================================================
// RECORD CREATION
// =============================================================================

/**
 * Create an immutable cost record.
 * Rejects negative or non-finite amounts.
 */
export function createCostRecord(
  category: CostCategory,
  costMicros: MicroDollars,
  context: CostContext,
  timestamp: Date = new Date()
): CostRecord {
  if (!Number.isFinite(costMicros) || costMicros < 0) {
    throw new InvalidArgumentError(`Invalid ${category} cost: ${costMicros}`)
  }
  if (Number.isNaN(timestamp.getTime())) {
    throw new InvalidArgumentError(`Invalid ${category} cost timestamp`)
  }
  return Object.freeze({
    category,
    costMicros,
    timestamp: timestamp.toISOString(),
    context: Object.freeze({ ...context })
  })
}

/**
 * Create the cost record for indexing a document's tokens.
 */
export function createEmbeddingCostRecord(
  model: string,
  tokenCount: number,
  context: Omit<CostContext, 'model' | 'inputTokens'>,
  timestamp?: Date
): CostRecord {
  return createCostRecord(
    'embedding',
    calculateEmbeddingCost(model, tokenCount),
    { ...context, model, inputTokens: tokenCount },
    timestamp
  )
}

/**
 * Create the cost record for a vision or query completion.
 */
export function createCompletionCostRecord(
  category: 'vision' | 'query',
  model: string,
  usage: TokenUsage,
  context: Omit<CostContext, 'model' | 'inputTokens' | 'outputTokens'>,
  timestamp?: Date
): CostRecord {
  return createCostRecord(
    category,
    calculateCompletionCost(model, usage),
    { ...context, model, inputTokens: usage.inputTokens, outputTokens: usage.outputTokens },
    timestamp
  )
}

// =============================================================================
// AGGREGATE CALCULATIONS
// =============================================================================

/**
 * Sum costs of records in nano-dollars.
 * Each record is converted before adding, so the result is independent of order.
 */
export function sumCostsNanos(records: readonly CostRecord[]): NanoDollars {
  return records.reduce((sum, record) => sum + microsToNanos(record.costMicros), 0)
}

/**
 * Group records by category.
 */
export function groupByCategory(
  records: readonly CostRecord[]
): Record<CostCategory, { count: number; nanos: NanoDollars }> {
  const result: Record<CostCategory, { count: number; nanos: NanoDollars }> = {
    embedding: { count: 0, nanos: 0 },
    vision: { count: 0, nanos: 0 },
    query: { count: 0, nanos: 0 }
  }

  for (const record of records) {
    const entry = result[record.category]
    entry.count++
    entry.nanos += microsToNanos(record.costMicros)
  }

  return result
}
