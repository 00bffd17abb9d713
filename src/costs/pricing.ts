/**
 * Pricing Constants
 *
 * Centralized pricing data for the Gemini models used for indexing, image
 * description and querying. Prices are in micro-dollars per token, which is
 * the same number as USD per 1M tokens.
 *
 * IMPORTANT: Keep these updated as provider pricing changes.
 *
 * Pricing Source:
 * - Google AI: https://ai.google.dev/gemini-api/docs/pricing
 */

import type { ModelPricing } from './types'

// =============================================================================
// MODEL PRICING (per token in micro-dollars)
// =============================================================================

/**
 * Generation models (query answers and image description).
 *
 * Source: https://ai.google.dev/gemini-api/docs/pricing
 */
export const AI_MODEL_PRICING: Record<string, ModelPricing> = {
  'gemini-2.5-flash-lite': {
    model: 'gemini-2.5-flash-lite',
    inputTokenPrice: 0.1, // $0.10 per 1M tokens
    outputTokenPrice: 0.4, // $0.40 per 1M tokens
    updatedAt: '2026-01-01'
  },
  'gemini-2.5-flash': {
    model: 'gemini-2.5-flash',
    inputTokenPrice: 0.15, // $0.15 per 1M tokens
    outputTokenPrice: 0.6, // $0.60 per 1M tokens
    updatedAt: '2026-01-01'
  },
  'gemini-2.5-pro': {
    model: 'gemini-2.5-pro',
    inputTokenPrice: 1.25, // $1.25 per 1M tokens
    outputTokenPrice: 10.0, // $10.00 per 1M tokens
    updatedAt: '2026-01-01'
  },
  'gemini-3-flash-preview': {
    model: 'gemini-3-flash-preview',
    inputTokenPrice: 0.15, // $0.15 per 1M tokens
    outputTokenPrice: 0.6, // $0.60 per 1M tokens
    updatedAt: '2026-01-01'
  },
  'gemini-3-pro-preview': {
    model: 'gemini-3-pro-preview',
    inputTokenPrice: 2.0, // $2.00 per 1M tokens
    outputTokenPrice: 12.0, // $12.00 per 1M tokens
    updatedAt: '2026-01-01'
  }
}

/**
 * Embedding models. Indexing is billed on input tokens only.
 */
export const EMBEDDING_MODEL_PRICING: Record<string, ModelPricing> = {
  'gemini-embedding-001': {
    model: 'gemini-embedding-001',
    inputTokenPrice: 0.15, // $0.15 per 1M tokens
    outputTokenPrice: 0,
    updatedAt: '2026-01-01'
  }
}

// =============================================================================
// DEFAULT MODELS
// =============================================================================

export const DEFAULT_MODELS = {
  query: 'gemini-2.5-flash-lite',
  embedding: 'gemini-embedding-001',
  vision: 'gemini-3-flash-preview'
} as const

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get pricing for a generation model.
 */
export function getAIModelPricing(model: string): ModelPricing | null {
  return AI_MODEL_PRICING[model] ?? null
}

/**
 * Get pricing for an embedding model.
 */
export function getEmbeddingModelPricing(model: string): ModelPricing | null {
  return EMBEDDING_MODEL_PRICING[model] ?? null
}

/**
 * List all priced generation models.
 */
export function listAIModels(): string[] {
  return Object.keys(AI_MODEL_PRICING)
}

/**
 * List all priced embedding models.
 */
export function listEmbeddingModels(): string[] {
  return Object.keys(EMBEDDING_MODEL_PRICING)
}
