import { describe, expect, it } from 'vitest'
import type { BillingSummary } from '../costs/types'
import type { InitResult, SyncResult } from '../types/sync'
import {
  formatBillingSummary,
  formatBytes,
  formatDocumentTable,
  formatInitResult,
  formatProgress,
  formatStoreTable,
  formatSyncResult
} from './format'

describe('formatBytes', () => {
  it('scales by 1024', () => {
    expect(formatBytes(0)).toBe('0 B')
    expect(formatBytes(1023)).toBe('1023 B')
    expect(formatBytes(1536)).toBe('1.5 KB')
    expect(formatBytes(1048576)).toBe('1.0 MB')
  })
})

describe('formatProgress', () => {
  it('shows indexed and failed pages', () => {
    expect(
      formatProgress({ index: 2, total: 5, documentId: 'p2', title: 'Deploy', status: 'indexed' })
    ).toBe('[2/5] Deploy: indexed')
    expect(
      formatProgress({
        index: 3,
        total: 5,
        documentId: 'p3',
        title: 'Backups',
        status: 'failed',
        failure: {
          documentId: 'p3',
          title: 'Backups',
          kind: 'UploadError',
          message: 'boom',
          retryable: false
        }
      })
    ).toBe('[3/5] Backups: failed (UploadError)')
  })
})

describe('formatInitResult', () => {
  const base: InitResult = {
    label: 'team',
    collectionId: 'db1',
    storeHandle: 'fileSearchStores/abc',
    created: true,
    pagesTotal: 3,
    pagesIndexed: 2,
    pagesFailed: 1,
    failures: [
      { documentId: 'p3', title: 'Backups', kind: 'SourceFetchError', message: 'gone', retryable: false }
    ],
    indexingCostMicros: 450000,
    imageCostMicros: 0,
    totalCostMicros: 450000,
    cancelled: false
  }

  it('summarizes pages, costs and failures', () => {
    expect(formatInitResult(base)).toEqual([
      "Created store 'team' (fileSearchStores/abc)",
      'Pages: 2/3 indexed, 1 failed',
      'Indexing cost: $0.45',
      'Image cost:    $0.0000',
      'Total cost:    $0.45',
      'Failures:',
      '  Backups (p3): SourceFetchError: gone'
    ])
  })

  it('notes a re-index and a cancellation', () => {
    const lines = formatInitResult({ ...base, created: false, failures: [], cancelled: true })
    expect(lines[0]).toBe("Re-indexed store 'team' (fileSearchStores/abc)")
    expect(lines[lines.length - 1]).toBe('Cancelled before all pages were indexed')
  })
})

describe('formatSyncResult', () => {
  it('summarizes a forced sync', () => {
    const result: SyncResult = {
      label: 'team',
      collectionId: 'db1',
      pagesChecked: 4,
      pagesUpdated: 1,
      pagesSkipped: 3,
      pagesFailed: 0,
      failures: [],
      indexingCostMicros: 138,
      imageCostMicros: 0,
      totalCostMicros: 138,
      force: true,
      cancelled: false
    }
    expect(formatSyncResult(result)).toEqual([
      "Synced 'team' (forced)",
      'Pages: 4 checked, 1 updated, 3 unchanged, 0 failed',
      'Indexing cost: $0.0001',
      'Image cost:    $0.0000',
      'Total cost:    $0.0001'
    ])
  })
})

describe('formatStoreTable', () => {
  it('hints at init when nothing is registered', () => {
    expect(formatStoreTable([])).toEqual([
      'No stores registered. Run `notion-rag init <label> <url>` to create one.'
    ])
  })

  it('aligns columns and marks missing stores', () => {
    expect(
      formatStoreTable([
        {
          label: 'team',
          collectionId: 'db1',
          storeHandle: 'fileSearchStores/abc',
          exists: true,
          documentCount: 3,
          sizeBytes: 2048
        },
        {
          label: 'old',
          collectionId: 'db2',
          storeHandle: 'fileSearchStores/def',
          exists: false,
          documentCount: 0,
          sizeBytes: 0
        }
      ])
    ).toEqual([
      'LABEL  DOCS    SIZE        STORE',
      'team   3       2.0 KB      fileSearchStores/abc',
      'old    -       missing     fileSearchStores/def'
    ])
  })
})

describe('formatDocumentTable', () => {
  it('lists documents with a count', () => {
    expect(
      formatDocumentTable([
        {
          documentId: 'p1',
          uploadedName: 'fileSearchStores/abc/documents/d1',
          displayName: 'Deploy (p1)',
          lastModified: '2026-02-02T10:00:00.000Z',
          sizeBytes: 512
        }
      ])
    ).toEqual(['Deploy (p1)  2026-02-02T10:00:00.000Z  512 B', '1 document'])
  })

  it('says so when the store is empty', () => {
    expect(formatDocumentTable([])).toEqual(['No documents in this store.'])
  })
})

describe('formatBillingSummary', () => {
  const totals = {
    embeddingNanos: 450000,
    visionNanos: 0,
    queryNanos: 138000,
    totalNanos: 588000,
    recordCount: 4
  }

  it('says so when nothing is recorded', () => {
    const summary: BillingSummary = {
      period: 'total',
      total: { embeddingNanos: 0, visionNanos: 0, queryNanos: 0, totalNanos: 0, recordCount: 0 },
      breakdown: []
    }
    expect(formatBillingSummary(summary)).toEqual(['No costs recorded.'])
  })

  it('prints one line per bucket and a total', () => {
    const summary: BillingSummary = {
      period: 'monthly',
      total: totals,
      breakdown: [{ period: '2026-02', ...totals }]
    }
    const costs =
      'embedding $0.00045000  vision $0.00000000  query $0.00013800  total $0.00058800  (4 calls)'
    expect(formatBillingSummary(summary)).toEqual([`2026-02     ${costs}`, `TOTAL       ${costs}`])
  })
})
