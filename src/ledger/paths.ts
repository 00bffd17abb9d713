/**
 * Log directory layout shared by the cost ledger and the operation journal.
 *
 * ```
 * <dataDir>/logs/
 * ├── 2026-01-31/
 * │   ├── costs.jsonl
 * │   └── operations.jsonl
 * └── 2026-02-01/
 *     └── costs.jsonl
 * ```
 *
 * Days are UTC days of the entry timestamp.
 */

import { homedir } from 'node:os'
import { join } from 'node:path'

export const COSTS_FILE = 'costs.jsonl'
export const OPERATIONS_FILE = 'operations.jsonl'

const DAY_DIR_PATTERN = /^\d{4}-\d{2}-\d{2}$/

/**
 * Throws if tests try to write into the user's real data directory.
 * Tests must use isolated temp directories.
 */
export function guardAgainstUserDataDir(dataDir: string): void {
  const isTest = process.env['VITEST'] === 'true' || process.env['NODE_ENV'] === 'test'
  if (!isTest) return

  const realDataDir = join(homedir(), '.local', 'share', 'notion-rag')
  if (dataDir.startsWith(realDataDir)) {
    throw new Error(
      `TEST ERROR: Attempted to access user's real data directory!\n` +
        `  Data dir: ${dataDir}\n` +
        `  Tests must use isolated temp directories, not ~/.local/share/notion-rag/`
    )
  }
}

/**
 * UTC day (YYYY-MM-DD) of an ISO timestamp.
 */
export function utcDay(timestamp: string): string {
  return new Date(timestamp).toISOString().slice(0, 10)
}

/**
 * UTC month (YYYY-MM) of an ISO timestamp.
 */
export function utcMonth(timestamp: string): string {
  return new Date(timestamp).toISOString().slice(0, 7)
}

export function isDayDir(name: string): boolean {
  return DAY_DIR_PATTERN.test(name)
}

export function getLogDir(dataDir: string): string {
  return join(dataDir, 'logs')
}
