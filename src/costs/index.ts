/**
 * Cost Tracking Module
 *
 * Pricing, cost calculation and per-operation tracking for metered Gemini calls.
 *
 * @example
 * ```typescript
 * import { CostTracker, createCompletionCostRecord } from 'notion-rag'
 *
 * const tracker = new CostTracker()
 * tracker.addRecord(
 *   createCompletionCostRecord('query', 'gemini-2.5-flash-lite', { inputTokens: 900, outputTokens: 120 }, {})
 * )
 * console.log(tracker.getTotalCostMicros()) // 138
 * ```
 *
 * @module
 */

export type {
  BillingBucket,
  BillingPeriod,
  BillingSummary,
  CostCategory,
  CostContext,
  CostRecord,
  CostSink,
  CostTotals,
  MicroDollars,
  ModelPricing,
  NanoDollars
} from './types'

export { BILLING_PERIODS, COST_CATEGORIES } from './types'

export {
  AI_MODEL_PRICING,
  DEFAULT_MODELS,
  EMBEDDING_MODEL_PRICING,
  getAIModelPricing,
  getEmbeddingModelPricing,
  listAIModels,
  listEmbeddingModels
} from './pricing'

export {
  calculateCompletionCost,
  calculateEmbeddingCost,
  calculateInputCost,
  calculateOutputCost,
  createCompletionCostRecord,
  createCostRecord,
  createEmbeddingCostRecord,
  formatMicrosAsDollars,
  formatNanosAsDollars,
  groupByCategory,
  isPricedModel,
  microsToDollars,
  microsToNanos,
  nanosToMicros,
  sumCostsNanos
} from './calculator'

export { CostTracker, teeSinks } from './tracker'
