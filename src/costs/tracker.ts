/**
 * Cost Tracker
 *
 * A session-based cost tracker that accumulates the records produced by one
 * init, sync or query so the result can report its own subtotals.
 */

import { groupByCategory, nanosToMicros, sumCostsNanos } from './calculator'
import type { CostCategory, CostRecord, CostSink, MicroDollars } from './types'

/**
 * Cost tracker for accumulating records during an operation.
 *
 * @example
 * ```typescript
 * const tracker = new CostTracker()
 * tracker.addRecord(createEmbeddingCostRecord('gemini-embedding-001', 1200, { label }))
 * tracker.getCategoryCostMicros('embedding') // 180
 * ```
 */
export class CostTracker implements CostSink {
  private records: CostRecord[] = []

  /**
   * Add a cost record.
   */
  addRecord(record: CostRecord): void {
    this.records.push(record)
  }

  /**
   * CostSink implementation.
   */
  async record(record: CostRecord): Promise<void> {
    this.addRecord(record)
  }

  /**
   * Get all records.
   */
  getRecords(): readonly CostRecord[] {
    return this.records
  }

  /**
   * Get the total cost in micro-dollars.
   */
  getTotalCostMicros(): MicroDollars {
    return nanosToMicros(sumCostsNanos(this.records))
  }

  /**
   * Get the cost of one category in micro-dollars.
   */
  getCategoryCostMicros(category: CostCategory): MicroDollars {
    return nanosToMicros(groupByCategory(this.records)[category].nanos)
  }

  /**
   * Get count of records.
   */
  get recordCount(): number {
    return this.records.length
  }

  /**
   * Check if there are any records.
   */
  get hasRecords(): boolean {
    return this.records.length > 0
  }
}

/**
 * A sink that forwards each record to every given sink in order.
 * The first failing sink stops the chain.
 */
export function teeSinks(...sinks: readonly CostSink[]): CostSink {
  return {
    async record(record: CostRecord): Promise<void> {
      for (const sink of sinks) {
        await sink.record(record)
      }
    }
  }
}
