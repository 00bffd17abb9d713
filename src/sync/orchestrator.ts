/**
 * Sync Orchestrator
 *
 * Composes the change detector and the indexing pipeline into `init` (full
 * reindex) and `sync` (incremental), and owns the other mutations of a
 * label's remote state (`removeDocument`, `cleanup`). All four hold the
 * label's lock for their whole run.
 */

import { CostTracker, teeSinks } from '../costs/tracker'
import type { CostSink } from '../costs/types'
import {
  DocumentNotFoundError,
  DuplicateLabelError,
  InvalidArgumentError,
  isRagError,
  ProviderError,
  SyncFailedError,
  UnknownLabelError
} from '../errors'
import type { Journal } from '../ledger/journal'
import type { StoreRegistry } from '../registry/store-registry'
import { sleep as defaultSleep } from '../retry'
import type { CallSource } from '../types/common'
import type { SourceDocument, SourceProvider, VectorStoreProvider } from '../types/providers'
import type { StoreRegistration } from '../types/registry'
import type {
  CleanupResult,
  DocumentFailure,
  DocumentProgressInfo,
  IndexOutcome,
  InitResult,
  RemoveResult,
  SyncResult
} from '../types/sync'
import { runWorkerPool } from '../worker-pool'
import {
  detectChanges,
  groupKnownDocuments,
  type KnownDocuments,
  lookbackStart
} from './change-detector'
import type { IndexContext, IndexingPipeline } from './indexer'
import { KeyedLock } from './keyed-lock'

export interface SyncOrchestratorOptions {
  readonly registry: StoreRegistry
  readonly source: SourceProvider
  readonly vectorStore: VectorStoreProvider
  readonly pipeline: IndexingPipeline
  readonly ledger: CostSink
  readonly journal: Journal
  readonly syncDays: number
  readonly settleMs: number
  readonly indexConcurrency: number
  readonly lock?: KeyedLock | undefined
  readonly sleep?: ((ms: number) => Promise<void>) | undefined
  readonly now?: (() => Date) | undefined
}

interface OperationRequest {
  readonly signal?: AbortSignal | undefined
  readonly source?: CallSource | undefined
  readonly onDocument?: ((info: DocumentProgressInfo) => void) | undefined
}

export interface InitRequest extends OperationRequest {
  readonly label?: string | undefined
  readonly collectionUrl?: string | undefined
}

export interface SyncRequest extends OperationRequest {
  readonly label?: string | undefined
  readonly force?: boolean | undefined
}

type DocumentResult =
  | { readonly status: 'indexed'; readonly outcome: IndexOutcome }
  | { readonly status: 'failed'; readonly failure: DocumentFailure }

interface IndexRun {
  readonly indexed: number
  readonly failures: DocumentFailure[]
  readonly cancelled: boolean
  readonly indexingCostMicros: number
  readonly imageCostMicros: number
  readonly totalCostMicros: number
}

export class SyncOrchestrator {
  private readonly options: SyncOrchestratorOptions
  private readonly lock: KeyedLock
  private readonly sleep: (ms: number) => Promise<void>
  private readonly now: () => Date

  constructor(options: SyncOrchestratorOptions) {
    this.options = options
    this.lock = options.lock ?? new KeyedLock()
    this.sleep = options.sleep ?? defaultSleep
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Full (re)index of a collection. With a URL, an unregistered label gets a
   * new store; a registered label must point at the same collection.
   */
  async init(request: InitRequest): Promise<InitResult> {
    const { registry, source, vectorStore } = this.options

    if (request.collectionUrl === undefined) {
      const registration = await registry.resolve(request.label)
      return this.withRegistration(registration, 'init', (current) =>
        this.fullReindex(current, false, request)
      )
    }

    const label = request.label
    if (!label) {
      throw new InvalidArgumentError('A label is required when a collection URL is given')
    }
    const collectionId = source.parseCollectionId(request.collectionUrl)

    return this.lock.run(label, 'init', async () => {
      const existing = await registry.get(label)
      if (existing) {
        if (existing.collectionId !== collectionId) {
          throw new DuplicateLabelError(label, `registered for collection ${existing.collectionId}`)
        }
        return this.fullReindex(existing, false, request)
      }

      const storeHandle = await vectorStore.createStore(label)
      let registration: StoreRegistration
      try {
        registration = await registry.register({ label, collectionId, storeHandle })
      } catch (error) {
        await vectorStore.deleteStore(storeHandle)
        throw error
      }
      return this.fullReindex(registration, true, request)
    })
  }

  /**
   * Incremental reindex of documents modified within the lookback window.
   */
  async sync(request: SyncRequest): Promise<SyncResult> {
    const registration = await this.options.registry.resolve(request.label)
    return this.withRegistration(registration, 'sync', (current) =>
      this.incremental(current, request)
    )
  }

  async removeDocument(label: string | undefined, documentId: string): Promise<RemoveResult> {
    const { registry, source, vectorStore, journal } = this.options
    const resolved = await registry.resolve(label)
    const target = source.normalizeDocumentId(documentId)

    return this.withRegistration(resolved, 'remove', async (registration) => {
      const stored = await vectorStore.listDocuments(registration.storeHandle)
      const matches = stored.filter(
        (document) => source.normalizeDocumentId(document.documentId) === target
      )
      if (matches.length === 0) {
        throw new DocumentNotFoundError(registration.label, target)
      }

      const removed: string[] = []
      for (const match of matches) {
        await vectorStore.delete(registration.storeHandle, match.uploadedName)
        removed.push(match.uploadedName)
      }

      await journal.append({
        event: 'document_removed',
        label: registration.label,
        documentId: target,
        removed
      })
      return { label: registration.label, documentId: target, removed }
    })
  }

  /**
   * Delete the remote store and the registration. A store that is already
   * gone remotely still has its registration removed.
   */
  async cleanup(label?: string): Promise<CleanupResult> {
    const { registry, vectorStore, journal } = this.options
    const resolved = await registry.resolve(label)

    return this.withRegistration(resolved, 'cleanup', async (registration) => {
      let storeDeleted = true
      try {
        await vectorStore.deleteStore(registration.storeHandle)
      } catch (error) {
        if (!(error instanceof ProviderError && error.apiError.type === 'not_found')) throw error
        storeDeleted = false
      }
      await registry.remove(registration.label)

      const result: CleanupResult = {
        label: registration.label,
        collectionId: registration.collectionId,
        storeHandle: registration.storeHandle,
        storeDeleted
      }
      await journal.append({ event: 'cleanup_completed', ...result })
      return result
    })
  }

  /**
   * Hold the label's lock and re-read its registration. A cleanup that
   * finished between `resolve` and the lock leaves nothing to work on.
   */
  private withRegistration<T>(
    resolved: StoreRegistration,
    operation: string,
    fn: (registration: StoreRegistration) => Promise<T>
  ): Promise<T> {
    const { registry } = this.options
    return this.lock.run(resolved.label, operation, async () => {
      const current = await registry.get(resolved.label)
      if (!current || current.storeHandle !== resolved.storeHandle) {
        const available = (await registry.list()).map((registration) => registration.label)
        throw new UnknownLabelError(resolved.label, available)
      }
      return fn(current)
    })
  }

  private async fullReindex(
    registration: StoreRegistration,
    created: boolean,
    request: InitRequest
  ): Promise<InitResult> {
    const { source, vectorStore, journal } = this.options

    const documents = await source.listDocuments(registration.collectionId)
    const known = groupKnownDocuments(await vectorStore.listDocuments(registration.storeHandle))
    const { toIndex } = detectChanges({ documents, known, force: true })

    const run = await this.indexAll(registration, 'init', toIndex, known, request)

    const result: InitResult = {
      label: registration.label,
      collectionId: registration.collectionId,
      storeHandle: registration.storeHandle,
      created,
      pagesTotal: documents.length,
      pagesIndexed: run.indexed,
      pagesFailed: run.failures.length,
      failures: run.failures,
      indexingCostMicros: run.indexingCostMicros,
      imageCostMicros: run.imageCostMicros,
      totalCostMicros: run.totalCostMicros,
      cancelled: run.cancelled
    }

    await journal.append({ event: 'init_completed', ...result, failures: result.pagesFailed })
    this.throwIfAllFailed(registration.label, result)

    if (!run.cancelled) {
      await this.sleep(this.options.settleMs)
    }
    return result
  }

  private async incremental(
    registration: StoreRegistration,
    request: SyncRequest
  ): Promise<SyncResult> {
    const { source, vectorStore, journal, syncDays } = this.options
    const force = request.force ?? false

    const since = lookbackStart(this.now(), syncDays)
    const documents = await source.listDocuments(registration.collectionId, since)
    const known = groupKnownDocuments(await vectorStore.listDocuments(registration.storeHandle))
    const { toIndex, toSkip } = detectChanges({ documents, known, force })

    const run = await this.indexAll(registration, 'sync', toIndex, known, request)

    const result: SyncResult = {
      label: registration.label,
      collectionId: registration.collectionId,
      pagesChecked: documents.length,
      pagesUpdated: run.indexed,
      pagesSkipped: toSkip.length,
      pagesFailed: run.failures.length,
      failures: run.failures,
      indexingCostMicros: run.indexingCostMicros,
      imageCostMicros: run.imageCostMicros,
      totalCostMicros: run.totalCostMicros,
      force,
      cancelled: run.cancelled
    }

    await journal.append({
      event: 'sync_completed',
      ...result,
      since: since.toISOString(),
      failures: result.pagesFailed
    })
    this.throwIfAllFailed(registration.label, result)

    if (run.indexed > 0 && !run.cancelled) {
      await this.sleep(this.options.settleMs)
    }
    return result
  }

  private throwIfAllFailed(label: string, result: InitResult | SyncResult): void {
    const indexed = 'pagesIndexed' in result ? result.pagesIndexed : result.pagesUpdated
    if (result.pagesFailed > 0 && indexed === 0) {
      throw new SyncFailedError(label, result)
    }
  }

  /**
   * Index documents with bounded concurrency. Per-document RagErrors are
   * journaled and counted; any other error (ledger or journal I/O) aborts
   * the run and propagates.
   */
  private async indexAll(
    registration: StoreRegistration,
    operation: 'init' | 'sync',
    toIndex: readonly SourceDocument[],
    known: KnownDocuments,
    request: OperationRequest
  ): Promise<IndexRun> {
    const { pipeline, journal, ledger, indexConcurrency } = this.options
    const tracker = new CostTracker()
    const context: IndexContext = {
      label: registration.label,
      storeHandle: registration.storeHandle,
      operation,
      source: request.source ?? 'cli',
      costs: teeSinks(ledger, tracker)
    }
    const total = toIndex.length

    const pool = await runWorkerPool(
      toIndex,
      async (document, index): Promise<DocumentResult> => {
        const base = { index, total, documentId: document.documentId, title: document.title }
        try {
          const outcome = await pipeline.indexDocument(
            context,
            document,
            known.get(document.documentId) ?? []
          )
          await journal.append({
            event: 'document_indexed',
            label: registration.label,
            operation,
            status: 'success',
            documentId: document.documentId,
            title: document.title,
            uploadedName: outcome.uploadedName,
            replaced: outcome.replaced,
            tokens: outcome.tokens,
            embeddingCostMicros: outcome.embeddingCostMicros,
            visionCostMicros: outcome.visionCostMicros,
            imagesOmitted: outcome.omittedImages.length
          })
          request.onDocument?.({ ...base, status: 'indexed', outcome })
          return { status: 'indexed', outcome }
        } catch (error) {
          if (!isRagError(error)) throw error
          const failure: DocumentFailure = {
            documentId: document.documentId,
            title: document.title,
            kind: error.kind,
            message: error.message,
            retryable: error.retryable
          }
          await journal.append({
            event: 'document_failed',
            label: registration.label,
            operation,
            status: 'error',
            ...failure
          })
          request.onDocument?.({ ...base, status: 'failed', failure })
          return { status: 'failed', failure }
        }
      },
      { concurrency: indexConcurrency, signal: request.signal }
    )

    let indexed = 0
    const failures: DocumentFailure[] = []
    for (const result of pool.completed) {
      if (result.status === 'indexed') {
        indexed++
      } else {
        failures.push(result.failure)
      }
    }

    return {
      indexed,
      failures,
      cancelled: pool.cancelled,
      indexingCostMicros: tracker.getCategoryCostMicros('embedding'),
      imageCostMicros: tracker.getCategoryCostMicros('vision'),
      totalCostMicros: tracker.getTotalCostMicros()
    }
  }
}
