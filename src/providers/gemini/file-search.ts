/**
 * Gemini File Search Vector Store
 *
 * Each source document is uploaded as one text artifact carrying
 * `page_id` and `last_edited` custom metadata; listing a store's documents
 * is how the engine learns what it has already indexed.
 */

import { fromApiError } from '../../errors'
import type { Result } from '../../types'
import type {
  QueryAnswer,
  StoreDescription,
  StoredDocument,
  UploadRequest,
  VectorStoreProvider
} from '../../types/providers'
import { arrayAt, countAt, stringAt } from '../json'
import { GeminiClient, type GeminiClientConfig } from './client'

export const PAGE_ID_KEY = 'page_id'
export const LAST_EDITED_KEY = 'last_edited'

function unwrap<T>(result: Result<T>, context: string): T {
  if (!result.ok) throw fromApiError(result.error, context)
  return result.value
}

function metadataValue(document: unknown, key: string): string {
  const entry = arrayAt(document, 'customMetadata').find((item) => stringAt(item, 'key') === key)
  return stringAt(entry, 'stringValue')
}

export function toStoredDocument(document: unknown): StoredDocument {
  return {
    documentId: metadataValue(document, PAGE_ID_KEY),
    uploadedName: stringAt(document, 'name'),
    displayName: stringAt(document, 'displayName'),
    lastModified: metadataValue(document, LAST_EDITED_KEY),
    sizeBytes: countAt(document, 'sizeBytes')
  }
}

export function toStoreDescription(store: unknown): StoreDescription {
  return {
    storeHandle: stringAt(store, 'name'),
    displayName: stringAt(store, 'displayName'),
    documentCount: countAt(store, 'activeDocumentsCount') + countAt(store, 'pendingDocumentsCount'),
    sizeBytes: countAt(store, 'sizeBytes')
  }
}

export class GeminiFileSearch implements VectorStoreProvider {
  private readonly client: GeminiClient

  constructor(config: GeminiClientConfig | GeminiClient) {
    this.client = config instanceof GeminiClient ? config : new GeminiClient(config)
  }

  async createStore(displayName: string): Promise<string> {
    return unwrap(await this.client.createStore(displayName), `Create store ${displayName}`)
  }

  async deleteStore(storeHandle: string): Promise<void> {
    unwrap(await this.client.deleteStore(storeHandle), `Delete store ${storeHandle}`)
  }

  async describeStores(): Promise<StoreDescription[]> {
    const stores = unwrap(await this.client.listStores(), 'List stores')
    return stores.map(toStoreDescription)
  }

  async listDocuments(storeHandle: string): Promise<StoredDocument[]> {
    const documents = unwrap(
      await this.client.listDocuments(storeHandle),
      `List documents of ${storeHandle}`
    )
    return documents.map(toStoredDocument)
  }

  async upload(storeHandle: string, request: UploadRequest): Promise<string> {
    const result = await this.client.uploadDocument(storeHandle, {
      displayName: request.displayName,
      customMetadata: [
        { key: LAST_EDITED_KEY, stringValue: request.lastModified },
        { key: PAGE_ID_KEY, stringValue: request.documentId }
      ],
      text: request.text
    })
    return unwrap(result, `Upload ${request.documentId}`)
  }

  async delete(storeHandle: string, uploadedName: string): Promise<void> {
    unwrap(await this.client.deleteDocument(uploadedName), `Delete ${uploadedName} from ${storeHandle}`)
  }

  async countTokens(model: string, text: string): Promise<number> {
    return unwrap(await this.client.countTokens(model, text), 'Count tokens')
  }

  async query(storeHandle: string, text: string, model: string): Promise<QueryAnswer> {
    const result = await this.client.generateContent(model, {
      contents: [{ role: 'user', parts: [{ text }] }],
      tools: [{ fileSearch: { fileSearchStoreNames: [storeHandle] } }]
    })
    const generated = unwrap(result, 'Query')
    return { answer: generated.text, grounding: generated.grounding, usage: generated.usage }
  }
}
