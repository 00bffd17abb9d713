/**
 * Notion REST Client
 *
 * Thin wrapper over the Notion API (version 2025-09-03, data sources).
 * Every call returns a Result; the source provider converts failures to
 * RagErrors at its public seam.
 */

import { type FetchFn, handleHttpError, handleNetworkError, httpFetch } from '../../http'
import type { Result } from '../../types'
import { arrayAt, booleanAt, type JsonObject, readJsonObject, stringAt } from '../json'
import { type NotionBlock, parseBlock } from './blocks'

export const NOTION_API_URL = 'https://api.notion.com/v1'
export const NOTION_VERSION = '2025-09-03'

/** Largest page size the block children endpoint accepts */
const BLOCK_PAGE_SIZE = 100

export interface NotionClientConfig {
  readonly token: string
  readonly fetch?: FetchFn | undefined
  readonly baseUrl?: string | undefined
}

export class NotionClient {
  private readonly token: string
  private readonly fetchFn: FetchFn
  private readonly baseUrl: string

  constructor(config: NotionClientConfig) {
    this.token = config.token
    this.fetchFn = config.fetch ?? httpFetch
    this.baseUrl = config.baseUrl ?? NOTION_API_URL
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    body?: JsonObject
  ): Promise<Result<JsonObject>> {
    try {
      const response = await this.fetchFn(`${this.baseUrl}${path}`, {
        method,
        headers: {
          Authorization: `Bearer ${this.token}`,
          'Notion-Version': NOTION_VERSION,
          ...(body && { 'Content-Type': 'application/json' })
        },
        ...(body && { body: JSON.stringify(body) })
      })
      if (!response.ok) return handleHttpError(response)
      return await readJsonObject(response)
    } catch (error) {
      return handleNetworkError(error)
    }
  }

  /**
   * First data source of a database.
   */
  async getDataSourceId(databaseId: string): Promise<Result<string>> {
    const result = await this.request('GET', `/databases/${databaseId}`)
    if (!result.ok) return result
    const dataSourceId = stringAt(arrayAt(result.value, 'data_sources')[0], 'id')
    if (!dataSourceId) {
      return {
        ok: false,
        error: { type: 'invalid_response', message: `Database ${databaseId} has no data source` }
      }
    }
    return { ok: true, value: dataSourceId }
  }

  /**
   * All pages of a data source, optionally edited on or after `since`.
   */
  async queryDataSource(dataSourceId: string, since?: Date): Promise<Result<unknown[]>> {
    const pages: unknown[] = []
    let cursor = ''

    do {
      const body: JsonObject = {
        ...(since && {
          filter: {
            timestamp: 'last_edited_time',
            last_edited_time: { on_or_after: since.toISOString() }
          }
        }),
        ...(cursor ? { start_cursor: cursor } : {})
      }
      const result = await this.request('POST', `/data_sources/${dataSourceId}/query`, body)
      if (!result.ok) return result

      pages.push(...arrayAt(result.value, 'results'))
      cursor = booleanAt(result.value, 'has_more') ? stringAt(result.value, 'next_cursor') : ''
    } while (cursor)

    return { ok: true, value: pages }
  }

  async retrievePage(pageId: string): Promise<Result<JsonObject>> {
    return this.request('GET', `/pages/${pageId}`)
  }

  /**
   * All direct children of a block (or page), following pagination.
   */
  async listBlockChildren(blockId: string): Promise<Result<NotionBlock[]>> {
    const blocks: NotionBlock[] = []
    let cursor = ''

    do {
      const query = new URLSearchParams({ page_size: String(BLOCK_PAGE_SIZE) })
      if (cursor) query.set('start_cursor', cursor)
      const result = await this.request('GET', `/blocks/${blockId}/children?${query.toString()}`)
      if (!result.ok) return result

      for (const item of arrayAt(result.value, 'results')) {
        const block = parseBlock(item)
        if (block) blocks.push(block)
      }
      cursor = booleanAt(result.value, 'has_more') ? stringAt(result.value, 'next_cursor') : ''
    } while (cursor)

    return { ok: true, value: blocks }
  }
}
