/**
 * Notion Source Provider
 *
 * Lists database pages, renders page content into segments and downloads
 * embedded images.
 */

import { normalizeMimeType } from '../../content/vision'
import { fromApiError, InvalidArgumentError } from '../../errors'
import { type FetchFn, handleHttpError, handleNetworkError, httpFetch } from '../../http'
import type { Result } from '../../types'
import type {
  DocumentContent,
  ImageData,
  ImageRef,
  SourceDocument,
  SourceProvider
} from '../../types/providers'
import { objectAt, stringAt } from '../json'
import { type NotionBlock, parsePageProperties, renderBlocks } from './blocks'
import { NotionClient, type NotionClientConfig } from './client'
import { extractNotionId, normalizeNotionId } from './ids'

function unwrap<T>(result: Result<T>, context: string): T {
  if (!result.ok) throw fromApiError(result.error, context)
  return result.value
}

function toSourceDocument(page: unknown): SourceDocument | null {
  const id = stringAt(page, 'id')
  if (!id) return null
  const { title, properties } = parsePageProperties(objectAt(page, 'properties') ?? {})
  return {
    documentId: normalizeNotionId(id),
    lastModified: stringAt(page, 'last_edited_time'),
    title: title || 'Untitled',
    properties
  }
}

export class NotionSource implements SourceProvider {
  private readonly client: NotionClient
  private readonly fetchFn: FetchFn

  constructor(config: NotionClientConfig) {
    this.client = new NotionClient(config)
    this.fetchFn = config.fetch ?? httpFetch
  }

  parseCollectionId(urlOrId: string): string {
    const id = extractNotionId(urlOrId)
    if (!id) {
      throw new InvalidArgumentError(`Invalid Notion database URL or ID: ${urlOrId}`)
    }
    return id
  }

  normalizeDocumentId(urlOrId: string): string {
    return normalizeNotionId(urlOrId)
  }

  async listDocuments(collectionId: string, since?: Date): Promise<SourceDocument[]> {
    const dataSourceId = unwrap(
      await this.client.getDataSourceId(collectionId),
      `Retrieve database ${collectionId}`
    )
    const pages = unwrap(
      await this.client.queryDataSource(dataSourceId, since),
      `Query database ${collectionId}`
    )
    return pages.flatMap((page) => toSourceDocument(page) ?? [])
  }

  async fetchContent(documentId: string): Promise<DocumentContent> {
    const page = unwrap(await this.client.retrievePage(documentId), `Retrieve page ${documentId}`)
    const { title, properties } = parsePageProperties(objectAt(page, 'properties') ?? {})

    const loadChildren = async (blockId: string): Promise<NotionBlock[]> =>
      unwrap(await this.client.listBlockChildren(blockId), `List blocks of ${blockId}`)

    const segments = await renderBlocks(await loadChildren(documentId), loadChildren)

    return {
      documentId,
      title: title || 'Untitled',
      lastModified: stringAt(page, 'last_edited_time'),
      properties,
      segments
    }
  }

  async loadImage(image: ImageRef): Promise<ImageData> {
    const result = await this.download(image.url)
    return unwrap(result, 'Image could not be downloaded')
  }

  private async download(url: string): Promise<Result<ImageData>> {
    try {
      const response = await this.fetchFn(url, { redirect: 'follow' })
      if (!response.ok) return handleHttpError(response)
      const bytes = new Uint8Array(await response.arrayBuffer())
      return {
        ok: true,
        value: { bytes, mimeType: normalizeMimeType(response.headers.get('content-type')) }
      }
    } catch (error) {
      return handleNetworkError(error)
    }
  }
}
