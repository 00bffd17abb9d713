/**
 * Operation Journal
 *
 * Structured event log of indexing work (per-document results, failures and
 * operation summaries) in `<dataDir>/logs/<day>/operations.jsonl`.
 * Billing never reads it.
 */

import { appendJsonLine, readJsonLines } from './jsonl'
import { getLogDir, guardAgainstUserDataDir, OPERATIONS_FILE } from './paths'

export type JournalEvent =
  | 'document_indexed'
  | 'document_failed'
  | 'document_removed'
  | 'reindex_conflict'
  | 'image_omitted'
  | 'init_completed'
  | 'sync_completed'
  | 'cleanup_completed'

/** Fields of an entry other than its timestamp */
export interface JournalInput {
  readonly event: JournalEvent
  readonly label: string
  readonly [key: string]: unknown
}

export interface JournalEntry extends JournalInput {
  readonly timestamp: string
}

export interface Journal {
  append(entry: JournalInput): Promise<void>
}

export class OperationJournal implements Journal {
  private readonly logDir: string
  private readonly now: () => Date

  constructor(dataDir: string, now: () => Date = () => new Date()) {
    guardAgainstUserDataDir(dataDir)
    this.logDir = getLogDir(dataDir)
    this.now = now
  }

  async append(entry: JournalInput): Promise<void> {
    const timestamp = this.now().toISOString()
    await appendJsonLine(this.logDir, OPERATIONS_FILE, timestamp, { ...entry, timestamp })
  }

  async readAll(): Promise<unknown[]> {
    return readJsonLines(this.logDir, OPERATIONS_FILE)
  }
}

/** Journal that keeps entries in memory */
export class MemoryJournal implements Journal {
  readonly entries: JournalInput[] = []

  async append(entry: JournalInput): Promise<void> {
    this.entries.push(entry)
  }

  ofEvent(event: JournalEvent): JournalInput[] {
    return this.entries.filter((entry) => entry.event === event)
  }
}
