/**
 * Sync, Query and Listing Types
 *
 * Value objects returned across the service boundary.
 */

import type { MicroDollars } from '../costs/types'
import type { RagErrorKind } from '../errors'
import type { CallSource } from './common'

/** An image left out of the indexed text because its description failed */
export interface OmittedImage {
  readonly url: string
  readonly caption: string
  readonly reason: string
}

/** Outcome of indexing one document */
export interface IndexOutcome {
  readonly documentId: string
  readonly uploadedName: string
  /** Artifacts replaced by this upload */
  readonly replaced: readonly string[]
  readonly tokens: number
  readonly embeddingCostMicros: MicroDollars
  readonly visionCostMicros: MicroDollars
  readonly imagesDescribed: number
  readonly omittedImages: readonly OmittedImage[]
}

/** A document that failed indexing during init/sync */
export interface DocumentFailure {
  readonly documentId: string
  readonly title: string
  readonly kind: RagErrorKind
  readonly message: string
  readonly retryable: boolean
}

export interface InitResult {
  readonly label: string
  readonly collectionId: string
  readonly storeHandle: string
  /** True when the store was created by this call */
  readonly created: boolean
  readonly pagesTotal: number
  readonly pagesIndexed: number
  readonly pagesFailed: number
  readonly failures: readonly DocumentFailure[]
  readonly indexingCostMicros: MicroDollars
  readonly imageCostMicros: MicroDollars
  readonly totalCostMicros: MicroDollars
  readonly cancelled: boolean
}

export interface SyncResult {
  readonly label: string
  readonly collectionId: string
  readonly pagesChecked: number
  readonly pagesUpdated: number
  readonly pagesSkipped: number
  readonly pagesFailed: number
  readonly failures: readonly DocumentFailure[]
  readonly indexingCostMicros: MicroDollars
  readonly imageCostMicros: MicroDollars
  readonly totalCostMicros: MicroDollars
  readonly force: boolean
  readonly cancelled: boolean
}

/** Per-document progress reported while an init/sync runs */
export interface DocumentProgressInfo {
  readonly index: number
  readonly total: number
  readonly documentId: string
  readonly title: string
  readonly status: 'indexed' | 'failed'
  readonly outcome?: IndexOutcome | undefined
  readonly failure?: DocumentFailure | undefined
}

export interface QueryUsage {
  readonly model: string
  readonly inputTokens: number
  readonly outputTokens: number
  readonly costMicros: MicroDollars
}

export interface QueryResult {
  readonly answer: string
  readonly label: string
  readonly grounding: unknown
  readonly usage: QueryUsage
  readonly elapsedMs: number
}

export interface QueryRequest {
  readonly text: string
  readonly label?: string | undefined
  readonly model?: string | undefined
  readonly source?: CallSource | undefined
}

export interface StoreSummary {
  readonly label: string
  readonly collectionId: string
  readonly storeHandle: string
  /** False when the registered store no longer exists remotely */
  readonly exists: boolean
  readonly documentCount: number
  readonly sizeBytes: number
}

export interface DocumentSummary {
  readonly documentId: string
  readonly uploadedName: string
  readonly displayName: string
  readonly lastModified: string
  readonly sizeBytes: number
}

export interface RemoveResult {
  readonly label: string
  readonly documentId: string
  /** Uploaded artifacts deleted for the document */
  readonly removed: readonly string[]
}

export interface CleanupResult {
  readonly label: string
  readonly collectionId: string
  readonly storeHandle: string
  /** False when the remote store was already gone */
  readonly storeDeleted: boolean
}
