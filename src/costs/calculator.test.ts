/**
 * Tests for cost calculator functions
 */

import { describe, expect, it } from 'vitest'
import { InvalidArgumentError, UnknownModelError } from '../errors'
import {
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

describe('microsToDollars', () => {
  it('should convert micro-dollars to dollars', () => {
    expect(microsToDollars(1_000_000)).toBe(1)
    expect(microsToDollars(500_000)).toBe(0.5)
  })
})

describe('microsToNanos', () => {
  it('should convert to whole nano-dollars', () => {
    expect(microsToNanos(1)).toBe(1000)
    expect(microsToNanos(0.0004)).toBe(0)
    expect(microsToNanos(0.0006)).toBe(1)
  })

  it('should round back from nanos', () => {
    expect(nanosToMicros(microsToNanos(138))).toBe(138)
  })
})

describe('formatMicrosAsDollars', () => {
  it('should format dollars with two decimals', () => {
    expect(formatMicrosAsDollars(1_000_000)).toBe('$1.00')
    expect(formatMicrosAsDollars(12_340_000)).toBe('$12.34')
  })

  it('should show four decimals below one cent', () => {
    expect(formatMicrosAsDollars(5_000)).toBe('$0.0050')
  })
})

describe('formatNanosAsDollars', () => {
  it('should format with eight decimals by default', () => {
    expect(formatNanosAsDollars(318_300)).toBe('$0.00031830')
    expect(formatNanosAsDollars(0)).toBe('$0.00000000')
  })

  it('should accept a decimal count', () => {
    expect(formatNanosAsDollars(1_500_000_000, 2)).toBe('$1.50')
  })
})

describe('token costs', () => {
  it('should price input and output tokens separately', () => {
    expect(calculateInputCost('gemini-2.5-flash-lite', 1000)).toBeCloseTo(100)
    expect(calculateOutputCost('gemini-2.5-flash-lite', 1000)).toBeCloseTo(400)
  })

  it('should add input and output for a completion', () => {
    expect(
      calculateCompletionCost('gemini-2.5-pro', { inputTokens: 1000, outputTokens: 100 })
    ).toBeCloseTo(2250)
  })

  it('should price embedding tokens', () => {
    expect(calculateEmbeddingCost('gemini-embedding-001', 1200)).toBeCloseTo(180)
  })

  it('should throw for unpriced models', () => {
    expect(() => calculateInputCost('gpt-unknown', 10)).toThrow(UnknownModelError)
    expect(() => calculateEmbeddingCost('gemini-2.5-flash', 10)).toThrow(UnknownModelError)
  })

  it('should report which models are priced', () => {
    expect(isPricedModel('gemini-2.5-flash', 'generation')).toBe(true)
    expect(isPricedModel('gemini-2.5-flash', 'embedding')).toBe(false)
    expect(isPricedModel('gemini-embedding-001', 'embedding')).toBe(true)
  })
})

describe('createCostRecord', () => {
  const at = new Date('2026-01-10T09:00:00Z')

  it('should create a frozen record with an ISO timestamp', () => {
    const record = createCostRecord('query', 12.5, { model: 'gemini-2.5-flash' }, at)

    expect(record).toEqual({
      category: 'query',
      costMicros: 12.5,
      timestamp: '2026-01-10T09:00:00.000Z',
      context: { model: 'gemini-2.5-flash' }
    })
    expect(Object.isFrozen(record)).toBe(true)
    expect(Object.isFrozen(record.context)).toBe(true)
  })

  it('should reject negative and non-finite amounts', () => {
    expect(() => createCostRecord('query', -1, { model: 'm' })).toThrow(InvalidArgumentError)
    expect(() => createCostRecord('query', Number.NaN, { model: 'm' })).toThrow(
      'Invalid query cost: NaN'
    )
  })

  it('should fill model and tokens for an embedding record', () => {
    const record = createEmbeddingCostRecord(
      'gemini-embedding-001',
      1200,
      { label: 'docs', documentId: 'page-1' },
      at
    )

    expect(record.category).toBe('embedding')
    expect(record.costMicros).toBeCloseTo(180)
    expect(record.context).toEqual({
      label: 'docs',
      documentId: 'page-1',
      model: 'gemini-embedding-001',
      inputTokens: 1200
    })
  })

  it('should fill tokens for a completion record', () => {
    const record = createCompletionCostRecord(
      'vision',
      'gemini-3-flash-preview',
      { inputTokens: 1000, outputTokens: 200 },
      { documentId: 'page-1' },
      at
    )

    expect(record.costMicros).toBeCloseTo(270)
    expect(record.context.inputTokens).toBe(1000)
    expect(record.context.outputTokens).toBe(200)
  })
})

describe('aggregation', () => {
  const records = [
    createCostRecord('embedding', 180, { model: 'm' }),
    createCostRecord('vision', 0.25, { model: 'm' }),
    createCostRecord('vision', 0.5, { model: 'm' }),
    createCostRecord('query', 138, { model: 'm' })
  ]

  it('should sum in nano-dollars', () => {
    expect(sumCostsNanos(records)).toBe(318_750)
    expect(sumCostsNanos([])).toBe(0)
  })

  it('should group by category', () => {
    expect(groupByCategory(records)).toEqual({
      embedding: { count: 1, nanos: 180_000 },
      vision: { count: 2, nanos: 750 },
      query: { count: 1, nanos: 138_000 }
    })
  })
})
