export {
  aggregateCosts,
  bucketKey,
  EMPTY_TOTALS,
  mergeTotals,
  parseBillingPeriod,
  totalsOf
} from './billing'
export { CostLedger, parseCostRecord } from './cost-ledger'
export type { Journal, JournalEntry, JournalEvent, JournalInput } from './journal'
export { MemoryJournal, OperationJournal } from './journal'
export { COSTS_FILE, getLogDir, guardAgainstUserDataDir, OPERATIONS_FILE } from './paths'
