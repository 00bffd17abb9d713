/**
 * In-process providers for tests. They keep state in memory, record the calls
 * made to them and can be told to fail.
 */

import { InvalidArgumentError, ProviderError, type RagError } from '../errors'
import type {
  ContentSegment,
  DocumentContent,
  DocumentProperties,
  ImageData,
  ImageDescription,
  ImageRef,
  QueryAnswer,
  SourceDocument,
  SourceProvider,
  StoreDescription,
  StoredDocument,
  TokenUsage,
  UploadRequest,
  VectorStoreProvider,
  VisionProvider
} from '../types/providers'

// =============================================================================
// SOURCE
// =============================================================================

export interface FakePage {
  readonly documentId: string
  readonly title: string
  readonly lastModified: string
  readonly properties?: DocumentProperties | undefined
  readonly segments?: readonly ContentSegment[] | undefined
}

export const FAKE_URL_PREFIX = 'https://notion.test/'

export class FakeSourceProvider implements SourceProvider {
  private readonly collections = new Map<string, Map<string, FakePage>>()
  readonly images = new Map<string, ImageData>()
  readonly fetchFailures = new Map<string, RagError>()
  readonly listCalls: Array<{ collectionId: string; since: Date | undefined }> = []
  readonly fetchCalls: string[] = []
  /** Called before each fetch resolves */
  onFetch: ((documentId: string) => void | Promise<void>) | null = null

  setPage(collectionId: string, page: FakePage): void {
    const pages = this.collections.get(collectionId) ?? new Map<string, FakePage>()
    pages.set(page.documentId, page)
    this.collections.set(collectionId, pages)
  }

  /** Bump a page's modification time */
  touch(collectionId: string, documentId: string, lastModified: string): void {
    const page = this.collections.get(collectionId)?.get(documentId)
    if (!page) throw new Error(`No page ${documentId} in ${collectionId}`)
    this.setPage(collectionId, { ...page, lastModified })
  }

  deletePage(collectionId: string, documentId: string): void {
    this.collections.get(collectionId)?.delete(documentId)
  }

  parseCollectionId(urlOrId: string): string {
    const id = urlOrId.startsWith(FAKE_URL_PREFIX) ? urlOrId.slice(FAKE_URL_PREFIX.length) : urlOrId
    if (!id.trim()) {
      throw new InvalidArgumentError(`Invalid collection URL or ID: ${urlOrId}`)
    }
    return id.trim()
  }

  normalizeDocumentId(urlOrId: string): string {
    const trimmed = urlOrId.trim()
    return trimmed.startsWith(FAKE_URL_PREFIX) ? trimmed.slice(FAKE_URL_PREFIX.length) : trimmed
  }

  async listDocuments(collectionId: string, since?: Date): Promise<SourceDocument[]> {
    this.listCalls.push({ collectionId, since })
    const pages = this.collections.get(collectionId)
    if (!pages) {
      throw new ProviderError(
        { type: 'not_found', message: `Collection ${collectionId} not found`, status: 404 },
        'List documents'
      )
    }
    return [...pages.values()]
      .filter((page) => !since || Date.parse(page.lastModified) >= since.getTime())
      .map((page) => ({
        documentId: page.documentId,
        lastModified: page.lastModified,
        title: page.title,
        properties: page.properties ?? {}
      }))
  }

  async fetchContent(documentId: string): Promise<DocumentContent> {
    this.fetchCalls.push(documentId)
    await this.onFetch?.(documentId)

    const failure = this.fetchFailures.get(documentId)
    if (failure) throw failure

    for (const pages of this.collections.values()) {
      const page = pages.get(documentId)
      if (page) {
        return {
          documentId,
          title: page.title,
          lastModified: page.lastModified,
          properties: page.properties ?? {},
          segments: page.segments ?? [{ kind: 'text', text: `Content of ${page.title}` }]
        }
      }
    }
    throw new ProviderError(
      { type: 'not_found', message: `Page ${documentId} not found`, status: 404 },
      'Fetch content'
    )
  }

  async loadImage(image: ImageRef): Promise<ImageData> {
    const data = this.images.get(image.url)
    if (!data) {
      throw new ProviderError(
        { type: 'not_found', message: `Image could not be downloaded: ${image.url}`, status: 404 },
        'Load image'
      )
    }
    return data
  }
}

// =============================================================================
// VECTOR STORE
// =============================================================================

export interface FakeArtifact extends StoredDocument {
  readonly text: string
}

interface FakeStore {
  readonly displayName: string
  readonly artifacts: FakeArtifact[]
}

export class FakeVectorStore implements VectorStoreProvider {
  readonly stores = new Map<string, FakeStore>()
  /** Document ids whose upload fails */
  readonly uploadFailures = new Set<string>()
  /** Uploaded names whose deletion fails */
  readonly deleteFailures = new Set<string>()
  readonly calls: string[] = []
  tokensPerDocument = 1000
  queryUsage: TokenUsage = { inputTokens: 900, outputTokens: 120 }
  queryError: RagError | null = null
  private nextId = 1

  private store(storeHandle: string): FakeStore {
    const store = this.stores.get(storeHandle)
    if (!store) {
      throw new ProviderError(
        { type: 'not_found', message: `${storeHandle} not found`, status: 404 },
        'Vector store'
      )
    }
    return store
  }

  /** Artifacts for one document id */
  artifactsFor(storeHandle: string, documentId: string): FakeArtifact[] {
    return this.store(storeHandle).artifacts.filter((a) => a.documentId === documentId)
  }

  async createStore(displayName: string): Promise<string> {
    this.calls.push(`createStore ${displayName}`)
    const handle = `fileSearchStores/${displayName}-${this.nextId++}`
    this.stores.set(handle, { displayName, artifacts: [] })
    return handle
  }

  async deleteStore(storeHandle: string): Promise<void> {
    this.calls.push(`deleteStore ${storeHandle}`)
    this.store(storeHandle)
    this.stores.delete(storeHandle)
  }

  async describeStores(): Promise<StoreDescription[]> {
    return [...this.stores.entries()].map(([storeHandle, store]) => ({
      storeHandle,
      displayName: store.displayName,
      documentCount: store.artifacts.length,
      sizeBytes: store.artifacts.reduce((sum, a) => sum + a.sizeBytes, 0)
    }))
  }

  async listDocuments(storeHandle: string): Promise<StoredDocument[]> {
    return this.store(storeHandle).artifacts.map((artifact) => ({
      documentId: artifact.documentId,
      uploadedName: artifact.uploadedName,
      displayName: artifact.displayName,
      lastModified: artifact.lastModified,
      sizeBytes: artifact.sizeBytes
    }))
  }

  async upload(storeHandle: string, request: UploadRequest): Promise<string> {
    this.calls.push(`upload ${request.documentId}`)
    const store = this.store(storeHandle)
    if (this.uploadFailures.has(request.documentId)) {
      throw new ProviderError(
        { type: 'invalid_request', message: 'upload rejected', status: 400 },
        'Upload'
      )
    }
    const uploadedName = `${storeHandle}/documents/doc-${this.nextId++}`
    store.artifacts.push({
      documentId: request.documentId,
      uploadedName,
      displayName: request.displayName,
      lastModified: request.lastModified,
      sizeBytes: new TextEncoder().encode(request.text).length,
      text: request.text
    })
    return uploadedName
  }

  async delete(storeHandle: string, uploadedName: string): Promise<void> {
    this.calls.push(`delete ${uploadedName}`)
    const store = this.store(storeHandle)
    if (this.deleteFailures.has(uploadedName)) {
      throw new ProviderError({ type: 'network', message: 'delete failed' }, 'Delete')
    }
    const index = store.artifacts.findIndex((a) => a.uploadedName === uploadedName)
    if (index === -1) {
      throw new ProviderError(
        { type: 'not_found', message: `${uploadedName} not found`, status: 404 },
        'Delete'
      )
    }
    store.artifacts.splice(index, 1)
  }

  async countTokens(_model: string, _text: string): Promise<number> {
    return this.tokensPerDocument
  }

  async query(storeHandle: string, text: string, model: string): Promise<QueryAnswer> {
    this.calls.push(`query ${model} ${text}`)
    if (this.queryError) throw this.queryError
    const store = this.store(storeHandle)
    return {
      answer: `Answer from ${store.artifacts.length} documents`,
      grounding: { sources: store.artifacts.map((a) => a.documentId) },
      usage: this.queryUsage
    }
  }
}

// =============================================================================
// VISION
// =============================================================================

export class FakeVision implements VisionProvider {
  readonly calls: Array<{ mimeType: string; model: string; caption: string | undefined }> = []
  responseText = 'TYPE: diagram\nDESCRIPTION: A test diagram.'
  usage: TokenUsage = { inputTokens: 1000, outputTokens: 200 }
  error: RagError | null = null

  async describeImage(image: ImageData, model: string, caption?: string): Promise<ImageDescription> {
    this.calls.push({ mimeType: image.mimeType, model, caption })
    if (this.error) throw this.error
    return { text: this.responseText, usage: this.usage }
  }
}
