/**
 * Change Detector
 *
 * Classifies listed source documents into those that need (re)indexing and
 * those already indexed at their current version. Pure and deterministic.
 */

import type { SourceDocument, StoredDocument } from '../types/providers'

const DAY_MS = 24 * 60 * 60 * 1000

/** Known artifacts grouped by document id, in store listing order */
export type KnownDocuments = ReadonlyMap<string, readonly StoredDocument[]>

export interface ChangeSet {
  /** Documents to index, in source listing order */
  readonly toIndex: readonly SourceDocument[]
  /** Ids of documents that are up to date */
  readonly toSkip: readonly string[]
}

export interface DetectChangesInput {
  readonly documents: readonly SourceDocument[]
  readonly known: KnownDocuments
  readonly force: boolean
}

export function groupKnownDocuments(stored: readonly StoredDocument[]): KnownDocuments {
  const known = new Map<string, StoredDocument[]>()
  for (const document of stored) {
    const group = known.get(document.documentId)
    if (group) {
      group.push(document)
    } else {
      known.set(document.documentId, [document])
    }
  }
  return known
}

function parseInstant(timestamp: string): number | null {
  if (!timestamp) return null
  const ms = Date.parse(timestamp)
  return Number.isNaN(ms) ? null : ms
}

/**
 * Newest recorded modification instant among a document's artifacts.
 * Null when none carries a parseable timestamp.
 */
export function newestRecordedInstant(records: readonly StoredDocument[]): number | null {
  let newest: number | null = null
  for (const record of records) {
    const instant = parseInstant(record.lastModified)
    if (instant !== null && (newest === null || instant > newest)) {
      newest = instant
    }
  }
  return newest
}

function needsIndexing(document: SourceDocument, known: KnownDocuments): boolean {
  const records = known.get(document.documentId)
  if (!records || records.length === 0) return true

  const recorded = newestRecordedInstant(records)
  const current = parseInstant(document.lastModified)
  if (recorded === null || current === null) return true

  return current > recorded
}

export function detectChanges({ documents, known, force }: DetectChangesInput): ChangeSet {
  if (force) {
    return { toIndex: [...documents], toSkip: [] }
  }

  const toIndex: SourceDocument[] = []
  const toSkip: string[] = []
  for (const document of documents) {
    if (needsIndexing(document, known)) {
      toIndex.push(document)
    } else {
      toSkip.push(document.documentId)
    }
  }
  return { toIndex, toSkip }
}

/**
 * Start of the lookback window: `syncDays` before `now`.
 */
export function lookbackStart(now: Date, syncDays: number): Date {
  return new Date(now.getTime() - syncDays * DAY_MS)
}
