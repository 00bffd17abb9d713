/**
 * RAG Service
 *
 * The boundary a CLI or HTTP layer calls. Wires the registry, ledger, journal,
 * orchestrator and query gateway around one set of providers and one
 * immutable AppConfig.
 */

import type { BillingPeriod, BillingSummary } from './costs/types'
import { ConfigError } from './errors'
import { aggregateCosts } from './ledger/billing'
import { CostLedger } from './ledger/cost-ledger'
import { OperationJournal } from './ledger/journal'
import { GeminiClient, GeminiFileSearch, GeminiVision } from './providers/gemini'
import { NotionSource } from './providers/notion'
import { QueryGateway } from './query/gateway'
import { StoreRegistry } from './registry/store-registry'
import { IndexingPipeline } from './sync/indexer'
import { type InitRequest, SyncOrchestrator, type SyncRequest } from './sync/orchestrator'
import type { AppConfig, Secrets } from './types/config'
import type { SourceProvider, VectorStoreProvider, VisionProvider } from './types/providers'
import type {
  CleanupResult,
  DocumentSummary,
  InitResult,
  QueryRequest,
  QueryResult,
  RemoveResult,
  StoreSummary,
  SyncResult
} from './types/sync'

export interface RagProviders {
  readonly source: SourceProvider
  readonly vectorStore: VectorStoreProvider
  readonly vision: VisionProvider
}

export interface RagServiceOptions {
  readonly config: AppConfig
  readonly providers: RagProviders
  readonly sleep?: ((ms: number) => Promise<void>) | undefined
  readonly now?: (() => Date) | undefined
}

export class RagService {
  readonly config: AppConfig
  readonly registry: StoreRegistry
  readonly ledger: CostLedger
  readonly journal: OperationJournal
  private readonly providers: RagProviders
  private readonly orchestrator: SyncOrchestrator
  private readonly gateway: QueryGateway

  constructor(options: RagServiceOptions) {
    const { config, providers } = options
    this.config = config
    this.providers = providers
    this.registry = new StoreRegistry(config.dataDir, options.now)
    this.ledger = new CostLedger(config.dataDir)
    this.journal = new OperationJournal(config.dataDir, options.now)

    const pipeline = new IndexingPipeline({
      source: providers.source,
      vectorStore: providers.vectorStore,
      vision: providers.vision,
      journal: this.journal,
      models: { embedding: config.embeddingModel, vision: config.visionModel },
      sleep: options.sleep
    })

    this.orchestrator = new SyncOrchestrator({
      registry: this.registry,
      source: providers.source,
      vectorStore: providers.vectorStore,
      pipeline,
      ledger: this.ledger,
      journal: this.journal,
      syncDays: config.syncDays,
      settleMs: config.settleSeconds * 1000,
      indexConcurrency: config.indexConcurrency,
      sleep: options.sleep,
      now: options.now
    })

    this.gateway = new QueryGateway({
      registry: this.registry,
      vectorStore: providers.vectorStore,
      ledger: this.ledger,
      defaultModel: config.queryModel
    })
  }

  init(request: InitRequest): Promise<InitResult> {
    return this.orchestrator.init(request)
  }

  sync(request: SyncRequest): Promise<SyncResult> {
    return this.orchestrator.sync(request)
  }

  query(request: QueryRequest): Promise<QueryResult> {
    return this.gateway.query(request)
  }

  /**
   * Registered stores joined with what the vector store reports.
   * A registration whose store is gone remotely is listed with `exists: false`.
   */
  async listStores(): Promise<StoreSummary[]> {
    const registrations = await this.registry.list()
    if (registrations.length === 0) return []

    const remote = new Map(
      (await this.providers.vectorStore.describeStores()).map((store) => [store.storeHandle, store])
    )
    return registrations.map((registration) => {
      const store = remote.get(registration.storeHandle)
      return {
        label: registration.label,
        collectionId: registration.collectionId,
        storeHandle: registration.storeHandle,
        exists: store !== undefined,
        documentCount: store?.documentCount ?? 0,
        sizeBytes: store?.sizeBytes ?? 0
      }
    })
  }

  async listDocuments(label?: string): Promise<DocumentSummary[]> {
    const registration = await this.registry.resolve(label)
    const documents = await this.providers.vectorStore.listDocuments(registration.storeHandle)
    return documents
      .map((document) => ({
        documentId: document.documentId,
        uploadedName: document.uploadedName,
        displayName: document.displayName,
        lastModified: document.lastModified,
        sizeBytes: document.sizeBytes
      }))
      .sort((a, b) => a.displayName.localeCompare(b.displayName))
  }

  removeDocument(label: string | undefined, documentId: string): Promise<RemoveResult> {
    return this.orchestrator.removeDocument(label, documentId)
  }

  cleanup(label?: string): Promise<CleanupResult> {
    return this.orchestrator.cleanup(label)
  }

  async billing(period: BillingPeriod): Promise<BillingSummary> {
    return aggregateCosts(await this.ledger.readAll(), period)
  }
}

/**
 * Read the Notion and Gemini credentials.
 *
 * @throws ConfigError naming the first missing variable
 */
export function readSecrets(env: NodeJS.ProcessEnv = process.env): Secrets {
  const notionToken = env['NOTION_TOKEN']
  if (!notionToken) {
    throw new ConfigError('NOTION_TOKEN environment variable is not set')
  }
  const geminiApiKey = env['GEMINI_API_KEY']
  if (!geminiApiKey) {
    throw new ConfigError('GEMINI_API_KEY environment variable is not set')
  }
  return { notionToken, geminiApiKey }
}

/**
 * Service over the real Notion and Gemini adapters.
 */
export function createRagService(config: AppConfig, secrets: Secrets): RagService {
  const gemini = new GeminiClient({ apiKey: secrets.geminiApiKey })
  return new RagService({
    config,
    providers: {
      source: new NotionSource({ token: secrets.notionToken }),
      vectorStore: new GeminiFileSearch(gemini),
      vision: new GeminiVision(gemini)
    }
  })
}
