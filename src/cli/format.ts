/**
 * CLI output formatting
 *
 * Pure functions that turn service results into printable lines.
 */

import { formatMicrosAsDollars, formatNanosAsDollars } from '../costs/calculator'
import type { BillingSummary, CostTotals } from '../costs/types'
import type {
  DocumentFailure,
  DocumentProgressInfo,
  DocumentSummary,
  InitResult,
  StoreSummary,
  SyncResult
} from '../types/sync'

/**
 * Pad a string to a given length.
 */
function padEnd(str: string, len: number): string {
  return str.length >= len ? str : str + ' '.repeat(len - str.length)
}

/**
 * Human-readable byte size (B, KB, MB, GB; 1024-based).
 */
export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB']
  let value = bytes
  let unit = 0
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024
    unit++
  }
  return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`
}

export function formatProgress(info: DocumentProgressInfo): string {
  const status = info.status === 'indexed' ? 'indexed' : `failed (${info.failure?.kind ?? 'error'})`
  return `[${info.index}/${info.total}] ${info.title}: ${status}`
}

function failureLines(failures: readonly DocumentFailure[]): string[] {
  return failures.map(
    (failure) => `  ${failure.title} (${failure.documentId}): ${failure.kind}: ${failure.message}`
  )
}

function costLines(result: InitResult | SyncResult): string[] {
  return [
    `Indexing cost: ${formatMicrosAsDollars(result.indexingCostMicros)}`,
    `Image cost:    ${formatMicrosAsDollars(result.imageCostMicros)}`,
    `Total cost:    ${formatMicrosAsDollars(result.totalCostMicros)}`
  ]
}

export function formatInitResult(result: InitResult): string[] {
  const lines = [
    `${result.created ? 'Created' : 'Re-indexed'} store '${result.label}' (${result.storeHandle})`,
    `Pages: ${result.pagesIndexed}/${result.pagesTotal} indexed, ${result.pagesFailed} failed`,
    ...costLines(result)
  ]
  if (result.failures.length > 0) {
    lines.push('Failures:', ...failureLines(result.failures))
  }
  if (result.cancelled) {
    lines.push('Cancelled before all pages were indexed')
  }
  return lines
}

export function formatSyncResult(result: SyncResult): string[] {
  const lines = [
    `Synced '${result.label}'${result.force ? ' (forced)' : ''}`,
    `Pages: ${result.pagesChecked} checked, ${result.pagesUpdated} updated, ${result.pagesSkipped} unchanged, ${result.pagesFailed} failed`,
    ...costLines(result)
  ]
  if (result.failures.length > 0) {
    lines.push('Failures:', ...failureLines(result.failures))
  }
  if (result.cancelled) {
    lines.push('Cancelled before all pages were indexed')
  }
  return lines
}

export function formatStoreTable(stores: readonly StoreSummary[]): string[] {
  if (stores.length === 0) {
    return ['No stores registered. Run `notion-rag init <label> <url>` to create one.']
  }
  const width = Math.max(5, ...stores.map((s) => s.label.length))
  return [
    `${padEnd('LABEL', width)}  ${padEnd('DOCS', 6)}  ${padEnd('SIZE', 10)}  STORE`,
    ...stores.map((store) => {
      const docs = store.exists ? String(store.documentCount) : '-'
      const size = store.exists ? formatBytes(store.sizeBytes) : 'missing'
      return `${padEnd(store.label, width)}  ${padEnd(docs, 6)}  ${padEnd(size, 10)}  ${store.storeHandle}`
    })
  ]
}

export function formatDocumentTable(documents: readonly DocumentSummary[]): string[] {
  if (documents.length === 0) {
    return ['No documents in this store.']
  }
  return [
    ...documents.map(
      (doc) => `${doc.displayName}  ${doc.lastModified || '-'}  ${formatBytes(doc.sizeBytes)}`
    ),
    `${documents.length} document${documents.length === 1 ? '' : 's'}`
  ]
}

function totalsLine(name: string, totals: CostTotals): string {
  return `${padEnd(name, 10)}  embedding ${formatNanosAsDollars(totals.embeddingNanos)}  vision ${formatNanosAsDollars(totals.visionNanos)}  query ${formatNanosAsDollars(totals.queryNanos)}  total ${formatNanosAsDollars(totals.totalNanos)}  (${totals.recordCount} calls)`
}

export function formatBillingSummary(summary: BillingSummary): string[] {
  if (summary.total.recordCount === 0) {
    return ['No costs recorded.']
  }
  return [
    ...summary.breakdown.map((bucket) => totalsLine(bucket.period, bucket)),
    totalsLine('TOTAL', summary.total)
  ]
}
