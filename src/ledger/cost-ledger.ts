/**
 * Cost Ledger
 *
 * Append-only record of every metered call, one JSON line per record in
 * `<dataDir>/logs/<day>/costs.jsonl`. Billing reads only this file.
 */

import { COST_CATEGORIES } from '../costs/types'
import type { CostCategory, CostContext, CostRecord, CostSink } from '../costs/types'
import { appendJsonLine, readJsonLines } from './jsonl'
import { COSTS_FILE, getLogDir, guardAgainstUserDataDir } from './paths'

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isCostCategory(value: unknown): value is CostCategory {
  return COST_CATEGORIES.some((category) => category === value)
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function parseContext(value: unknown): CostContext {
  if (!isObject(value)) {
    return { model: '' }
  }
  return {
    model: optionalString(value['model']) ?? '',
    label: optionalString(value['label']),
    inputTokens: optionalNumber(value['inputTokens']),
    outputTokens: optionalNumber(value['outputTokens']),
    documentId: optionalString(value['documentId']),
    elapsedMs: optionalNumber(value['elapsedMs']),
    source: optionalString(value['source']),
    operation: optionalString(value['operation'])
  }
}

/**
 * Validate one parsed ledger line. Returns null for anything that is not a
 * well-formed record.
 */
export function parseCostRecord(value: unknown): CostRecord | null {
  if (!isObject(value)) return null

  const { category, costMicros, timestamp } = value
  if (!isCostCategory(category)) return null
  if (typeof costMicros !== 'number' || !Number.isFinite(costMicros) || costMicros < 0) {
    return null
  }
  if (typeof timestamp !== 'string' || Number.isNaN(Date.parse(timestamp))) return null

  return { category, costMicros, timestamp, context: parseContext(value['context']) }
}

export class CostLedger implements CostSink {
  private readonly logDir: string

  constructor(dataDir: string) {
    guardAgainstUserDataDir(dataDir)
    this.logDir = getLogDir(dataDir)
  }

  async record(record: CostRecord): Promise<void> {
    await appendJsonLine(this.logDir, COSTS_FILE, record.timestamp, record)
  }

  /**
   * Read every record in the ledger, oldest day first.
   * Malformed lines are skipped.
   */
  async readAll(): Promise<CostRecord[]> {
    const lines = await readJsonLines(this.logDir, COSTS_FILE)
    const records: CostRecord[] = []
    for (const line of lines) {
      const record = parseCostRecord(line)
      if (record) records.push(record)
    }
    return records
  }
}
