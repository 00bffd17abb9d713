import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import type { CostSink } from '../costs/types'
import {
  AmbiguousLabelError,
  DocumentNotFoundError,
  DuplicateLabelError,
  InvalidArgumentError,
  ProviderError,
  SyncFailedError,
  SyncInProgressError,
  UnknownLabelError
} from '../errors'
import { CostLedger } from '../ledger/cost-ledger'
import { MemoryJournal } from '../ledger/journal'
import { StoreRegistry } from '../registry/store-registry'
import {
  createTempDataDir,
  FAKE_URL_PREFIX,
  FakeSourceProvider,
  FakeVectorStore,
  FakeVision,
  recordingSleep
} from '../test-support'
import type { StoreRegistration } from '../types/registry'
import { IndexingPipeline } from './indexer'
import { SyncOrchestrator } from './orchestrator'

const COLLECTION = 'collection-1'
const URL = `${FAKE_URL_PREFIX}${COLLECTION}`
const NOW = new Date('2026-01-11T12:00:00.000Z')

/** Runs `afterResolve` once, between a lookup and the caller's next step */
class InterleavingRegistry extends StoreRegistry {
  afterResolve: (() => Promise<unknown>) | undefined

  override async resolve(label?: string): Promise<StoreRegistration> {
    const registration = await super.resolve(label)
    const hook = this.afterResolve
    this.afterResolve = undefined
    if (hook) await hook()
    return registration
  }
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {}
  const promise = new Promise<void>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

describe('SyncOrchestrator', () => {
  let temp: ReturnType<typeof createTempDataDir>
  let source: FakeSourceProvider
  let store: FakeVectorStore
  let journal: MemoryJournal
  let ledger: CostLedger
  let registry: StoreRegistry
  let settle: ReturnType<typeof recordingSleep>
  let orchestrator: SyncOrchestrator

  function build(ledgerSink: CostSink = ledger): SyncOrchestrator {
    const pipeline = new IndexingPipeline({
      source,
      vectorStore: store,
      vision: new FakeVision(),
      journal,
      models: { embedding: 'gemini-embedding-001', vision: 'gemini-3-flash-preview' },
      sleep: async () => {}
    })
    return new SyncOrchestrator({
      registry,
      source,
      vectorStore: store,
      pipeline,
      ledger: ledgerSink,
      journal,
      syncDays: 2,
      settleMs: 5000,
      indexConcurrency: 1,
      sleep: settle.sleep,
      now: () => NOW
    })
  }

  async function storeHandle(label = 'docs'): Promise<string> {
    return (await registry.resolve(label)).storeHandle
  }

  beforeEach(() => {
    temp = createTempDataDir('orchestrator-test')
    source = new FakeSourceProvider()
    store = new FakeVectorStore()
    journal = new MemoryJournal()
    ledger = new CostLedger(temp.dir)
    registry = new StoreRegistry(temp.dir)
    settle = recordingSleep()
    for (const id of ['page-a', 'page-b', 'page-c']) {
      source.setPage(COLLECTION, {
        documentId: id,
        title: `Title ${id}`,
        lastModified: '2026-01-10T10:00:00.000Z'
      })
    }
    orchestrator = build()
  })

  afterEach(() => {
    temp.cleanup()
  })

  describe('init', () => {
    it('should create, register and index a fresh collection', async () => {
      const result = await orchestrator.init({ label: 'docs', collectionUrl: URL })

      expect(result).toMatchObject({
        label: 'docs',
        collectionId: COLLECTION,
        created: true,
        pagesTotal: 3,
        pagesIndexed: 3,
        pagesFailed: 0,
        cancelled: false
      })
      expect(result.indexingCostMicros).toBeCloseTo(450)
      expect(result.imageCostMicros).toBe(0)
      expect(result.totalCostMicros).toBeCloseTo(450)

      const records = await ledger.readAll()
      expect(records.map((r) => r.category)).toEqual(['embedding', 'embedding', 'embedding'])
      expect((await registry.get('docs'))?.storeHandle).toBe(result.storeHandle)
      expect(settle.delays).toEqual([5000])
    })

    it('should list the whole collection without a window', async () => {
      await orchestrator.init({ label: 'docs', collectionUrl: URL })

      expect(source.listCalls).toEqual([{ collectionId: COLLECTION, since: undefined }])
    })

    it('should require a label with a URL', async () => {
      await expect(orchestrator.init({ collectionUrl: URL })).rejects.toThrow(InvalidArgumentError)
      expect(store.calls).toEqual([])
    })

    it('should reindex everything when run again for the same collection', async () => {
      await orchestrator.init({ label: 'docs', collectionUrl: URL })

      const again = await orchestrator.init({ label: 'docs', collectionUrl: URL })

      expect(again.created).toBe(false)
      expect(again.pagesIndexed).toBe(3)
      const stored = await store.listDocuments(await storeHandle())
      expect(stored.map((d) => d.documentId).sort()).toEqual(['page-a', 'page-b', 'page-c'])
      expect(store.calls.filter((c) => c.startsWith('createStore'))).toHaveLength(1)
    })

    it('should reject a registered label for a different collection', async () => {
      source.setPage('collection-2', {
        documentId: 'page-z',
        title: 'Z',
        lastModified: '2026-01-10T10:00:00.000Z'
      })
      await orchestrator.init({ label: 'docs', collectionUrl: URL })

      await expect(
        orchestrator.init({ label: 'docs', collectionUrl: `${FAKE_URL_PREFIX}collection-2` })
      ).rejects.toThrow(DuplicateLabelError)
    })

    it('should resolve the only label when no URL is given', async () => {
      await orchestrator.init({ label: 'docs', collectionUrl: URL })

      const result = await orchestrator.init({})

      expect(result.label).toBe('docs')
      expect(result.pagesIndexed).toBe(3)
    })

    it('should reject a missing label with nothing registered', async () => {
      await expect(orchestrator.init({})).rejects.toThrow(AmbiguousLabelError)
    })

    it('should remove the new store when registration fails', async () => {
      // Registered by another writer after the lookup
      class RacingRegistry extends StoreRegistry {
        override async get(): Promise<null> {
          return null
        }
      }
      registry = new RacingRegistry(temp.dir)
      await new StoreRegistry(temp.dir).register({
        label: 'docs',
        collectionId: COLLECTION,
        storeHandle: 'fileSearchStores/other'
      })

      await expect(build().init({ label: 'docs', collectionUrl: URL })).rejects.toThrow(
        DuplicateLabelError
      )
      expect(store.stores.size).toBe(0)
    })
  })

  describe('sync', () => {
    beforeEach(async () => {
      await orchestrator.init({ label: 'docs', collectionUrl: URL })
      settle.delays.length = 0
    })

    it('should reindex only the changed document', async () => {
      source.touch(COLLECTION, 'page-b', '2026-01-11T08:00:00.000Z')

      const result = await orchestrator.sync({ label: 'docs' })

      expect(result).toMatchObject({
        pagesChecked: 3,
        pagesUpdated: 1,
        pagesSkipped: 2,
        pagesFailed: 0,
        force: false
      })
      expect(result.indexingCostMicros).toBeCloseTo(150)
      expect(settle.delays).toEqual([5000])
    })

    it('should update nothing when nothing changed', async () => {
      await orchestrator.sync({ label: 'docs' })
      const second = await orchestrator.sync({ label: 'docs' })

      expect(second.pagesUpdated).toBe(0)
      expect(second.pagesSkipped).toBe(3)
      expect(settle.delays).toEqual([])
    })

    it('should list only documents inside the lookback window', async () => {
      source.touch(COLLECTION, 'page-c', '2026-01-01T00:00:00.000Z')

      const result = await orchestrator.sync({})

      expect(source.listCalls.at(-1)?.since?.toISOString()).toBe('2026-01-09T12:00:00.000Z')
      expect(result.pagesChecked).toBe(2)
    })

    it('should reindex every listed document when forced, without duplicates', async () => {
      const result = await orchestrator.sync({ label: 'docs', force: true })

      expect(result.pagesUpdated).toBe(3)
      expect(result.pagesSkipped).toBe(0)
      expect(result.force).toBe(true)
      const handle = await storeHandle()
      for (const id of ['page-a', 'page-b', 'page-c']) {
        expect(store.artifactsFor(handle, id)).toHaveLength(1)
      }
    })

    it('should never remove documents that left the source', async () => {
      source.deletePage(COLLECTION, 'page-c')

      await orchestrator.sync({ label: 'docs', force: true })

      expect(store.artifactsFor(await storeHandle(), 'page-c')).toHaveLength(1)
    })

    it('should count a failed document as neither updated nor skipped', async () => {
      source.touch(COLLECTION, 'page-a', '2026-01-11T08:00:00.000Z')
      source.touch(COLLECTION, 'page-b', '2026-01-11T08:00:00.000Z')
      source.fetchFailures.set(
        'page-a',
        new ProviderError({ type: 'auth', message: 'no access', status: 403 }, 'Fetch content')
      )
      const progress: string[] = []

      const result = await orchestrator.sync({
        label: 'docs',
        onDocument: (info) => progress.push(`${info.documentId}:${info.status}`)
      })

      expect(result).toMatchObject({
        pagesChecked: 3,
        pagesUpdated: 1,
        pagesSkipped: 1,
        pagesFailed: 1
      })
      expect(result.failures).toEqual([
        {
          documentId: 'page-a',
          title: 'Title page-a',
          kind: 'SourceFetchError',
          message: 'Could not fetch content of page-a: Fetch content: no access',
          retryable: true
        }
      ])
      expect(progress).toEqual(['page-a:failed', 'page-b:indexed'])
      expect(journal.ofEvent('document_failed')[0]).toMatchObject({
        status: 'error',
        documentId: 'page-a',
        kind: 'SourceFetchError'
      })
    })

    it('should fail when every attempted document failed', async () => {
      source.touch(COLLECTION, 'page-a', '2026-01-11T08:00:00.000Z')
      store.uploadFailures.add('page-a')

      const error = await orchestrator.sync({ label: 'docs' }).catch((e: unknown) => e)

      expect(error).toBeInstanceOf(SyncFailedError)
      expect(error).toHaveProperty('result.pagesFailed', 1)
      expect(error).toHaveProperty('result.pagesSkipped', 2)
      expect(journal.ofEvent('sync_completed')).toHaveLength(1)
      expect(settle.delays).toEqual([])
    })

    it('should journal a summary', async () => {
      await orchestrator.sync({ label: 'docs' })

      expect(journal.ofEvent('sync_completed')[0]).toMatchObject({
        label: 'docs',
        pagesChecked: 3,
        pagesUpdated: 0,
        since: '2026-01-09T12:00:00.000Z'
      })
    })

    it('should propagate ledger write failures', async () => {
      const failing = build({
        async record(): Promise<void> {
          throw new Error('EACCES: ledger not writable')
        }
      })

      await expect(failing.sync({ label: 'docs', force: true })).rejects.toThrow(
        'EACCES: ledger not writable'
      )
    })
  })

  describe('mutual exclusion', () => {
    beforeEach(async () => {
      await orchestrator.init({ label: 'docs', collectionUrl: URL })
    })

    it('should reject a second operation on the same label while one runs', async () => {
      const reached = deferred()
      const gate = deferred()
      source.onFetch = async () => {
        reached.resolve()
        await gate.promise
      }

      const running = orchestrator.sync({ label: 'docs', force: true })
      await reached.promise

      await expect(orchestrator.sync({ label: 'docs' })).rejects.toThrow(SyncInProgressError)
      await expect(orchestrator.init({ label: 'docs' })).rejects.toThrow(SyncInProgressError)
      await expect(orchestrator.cleanup('docs')).rejects.toThrow(SyncInProgressError)

      gate.resolve()
      await expect(running).resolves.toMatchObject({ pagesUpdated: 3 })
    })

    it('should run different labels concurrently', async () => {
      source.setPage('collection-2', {
        documentId: 'page-z',
        title: 'Z',
        lastModified: '2026-01-10T10:00:00.000Z'
      })
      const reached = deferred()
      const gate = deferred()
      source.onFetch = async (documentId) => {
        if (documentId !== 'page-a') return
        reached.resolve()
        await gate.promise
      }

      const running = orchestrator.sync({ label: 'docs', force: true })
      await reached.promise

      const other = await orchestrator.init({
        label: 'wiki',
        collectionUrl: `${FAKE_URL_PREFIX}collection-2`
      })
      expect(other.pagesIndexed).toBe(1)

      gate.resolve()
      await running
    })
  })

  describe('registration changes between lookup and lock', () => {
    let interleaving: InterleavingRegistry

    beforeEach(async () => {
      interleaving = new InterleavingRegistry(temp.dir)
      registry = interleaving
      orchestrator = build()
      await orchestrator.init({ label: 'docs', collectionUrl: URL })
    })

    it('should not sync a store that a cleanup deleted meanwhile', async () => {
      const handle = await storeHandle()
      interleaving.afterResolve = () => orchestrator.cleanup('docs')
      source.touch(COLLECTION, 'page-a', '2026-01-11T09:00:00.000Z')

      await expect(orchestrator.sync({ label: 'docs' })).rejects.toThrow(UnknownLabelError)

      expect(store.stores.has(handle)).toBe(false)
      expect(store.calls.filter((call) => call.startsWith('upload'))).toHaveLength(3)
      expect(await registry.list()).toEqual([])
    })

    it('should not remove documents from a re-created store', async () => {
      interleaving.afterResolve = async () => {
        await orchestrator.cleanup('docs')
        await orchestrator.init({ label: 'docs', collectionUrl: URL })
      }

      await expect(orchestrator.removeDocument('docs', 'page-a')).rejects.toThrow(
        "Unknown label 'docs'. Available labels: docs"
      )

      const stored = await store.listDocuments(await storeHandle())
      expect(stored.map((d) => d.documentId)).toEqual(['page-a', 'page-b', 'page-c'])
    })
  })

  describe('concurrent registrations', () => {
    it('should register every new label when several init at once', async () => {
      const results = await Promise.all([
        orchestrator.init({ label: 'a', collectionUrl: URL }),
        orchestrator.init({ label: 'b', collectionUrl: URL })
      ])

      const registered = await registry.list()
      expect(registered.map((r) => r.label)).toEqual(['a', 'b'])
      expect(registered.map((r) => r.storeHandle)).toEqual(results.map((r) => r.storeHandle))
      expect(store.stores.size).toBe(2)
    })
  })

  describe('cancellation', () => {
    it('should stop starting documents and report partial counts', async () => {
      const controller = new AbortController()
      source.onFetch = (documentId) => {
        if (documentId === 'page-a') controller.abort()
      }

      const result = await orchestrator.init({
        label: 'docs',
        collectionUrl: URL,
        signal: controller.signal
      })

      expect(result.cancelled).toBe(true)
      expect(result.pagesTotal).toBe(3)
      expect(result.pagesIndexed).toBe(1)
      expect(store.artifactsFor(result.storeHandle, 'page-a')).toHaveLength(1)
      expect(settle.delays).toEqual([])
    })
  })

  describe('removeDocument', () => {
    beforeEach(async () => {
      await orchestrator.init({ label: 'docs', collectionUrl: URL })
    })

    it('should remove the document from the listing', async () => {
      const result = await orchestrator.removeDocument('docs', 'page-b')

      expect(result.removed).toHaveLength(1)
      const stored = await store.listDocuments(await storeHandle())
      expect(stored.map((d) => d.documentId)).toEqual(['page-a', 'page-c'])
      expect(journal.ofEvent('document_removed')).toHaveLength(1)
    })

    it('should accept a document URL', async () => {
      const result = await orchestrator.removeDocument(undefined, `${FAKE_URL_PREFIX}page-b`)

      expect(result.documentId).toBe('page-b')
    })

    it('should reject an unknown document', async () => {
      await expect(orchestrator.removeDocument('docs', 'page-x')).rejects.toThrow(
        DocumentNotFoundError
      )
    })
  })

  describe('cleanup', () => {
    beforeEach(async () => {
      await orchestrator.init({ label: 'docs', collectionUrl: URL })
    })

    it('should delete the store and the registration', async () => {
      const handle = await storeHandle()

      const result = await orchestrator.cleanup('docs')

      expect(result).toEqual({
        label: 'docs',
        collectionId: COLLECTION,
        storeHandle: handle,
        storeDeleted: true
      })
      expect(store.stores.has(handle)).toBe(false)
      expect(await registry.list()).toEqual([])
    })

    it('should remove the registration when the store is already gone', async () => {
      await store.deleteStore(await storeHandle())

      const result = await orchestrator.cleanup()

      expect(result.storeDeleted).toBe(false)
      expect(await registry.list()).toEqual([])
    })
  })
})
