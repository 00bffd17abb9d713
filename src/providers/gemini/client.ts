/**
 * Gemini REST Client
 *
 * File Search stores, document uploads (multipart + long-running operation
 * polling), token counting and content generation against the v1beta API.
 * Every call returns a Result.
 */

import { type FetchFn, handleHttpError, handleNetworkError, httpFetch } from '../../http'
import { sleep as defaultSleep } from '../../retry'
import type { Result } from '../../types'
import type { TokenUsage } from '../../types/providers'
import {
  arrayAt,
  booleanAt,
  countAt,
  type JsonObject,
  objectAt,
  readJsonObject,
  stringAt
} from '../json'

export const GEMINI_API_URL = 'https://generativelanguage.googleapis.com'

const API_VERSION = 'v1beta'
const LIST_PAGE_SIZE = 20
const DEFAULT_POLL_INTERVAL_MS = 2_000
const DEFAULT_MAX_POLLS = 150

export interface GeminiClientConfig {
  readonly apiKey: string
  readonly fetch?: FetchFn | undefined
  readonly baseUrl?: string | undefined
  readonly pollIntervalMs?: number | undefined
  readonly maxPolls?: number | undefined
  readonly sleep?: ((ms: number) => Promise<void>) | undefined
}

export interface CustomMetadata {
  readonly key: string
  readonly stringValue: string
}

export interface UploadFile {
  readonly displayName: string
  readonly customMetadata: readonly CustomMetadata[]
  readonly text: string
}

export interface GenerateResult {
  readonly text: string
  readonly usage: TokenUsage
  readonly grounding: unknown
}

/**
 * Read text, usage and grounding from a generateContent response.
 * Token counts are int64 and may arrive as strings.
 */
export function parseGenerateResponse(body: JsonObject): GenerateResult {
  const candidate = arrayAt(body, 'candidates')[0]
  const text = arrayAt(objectAt(candidate, 'content'), 'parts')
    .map((part) => stringAt(part, 'text'))
    .join('')
  const usage = objectAt(body, 'usageMetadata')
  return {
    text,
    usage: {
      inputTokens: countAt(usage, 'promptTokenCount'),
      outputTokens: countAt(usage, 'candidatesTokenCount')
    },
    grounding: objectAt(candidate, 'groundingMetadata') ?? null
  }
}

export class GeminiClient {
  private readonly apiKey: string
  private readonly fetchFn: FetchFn
  private readonly baseUrl: string
  private readonly pollIntervalMs: number
  private readonly maxPolls: number
  private readonly sleep: (ms: number) => Promise<void>

  constructor(config: GeminiClientConfig) {
    this.apiKey = config.apiKey
    this.fetchFn = config.fetch ?? httpFetch
    this.baseUrl = config.baseUrl ?? GEMINI_API_URL
    this.pollIntervalMs = config.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS
    this.maxPolls = config.maxPolls ?? DEFAULT_MAX_POLLS
    this.sleep = config.sleep ?? defaultSleep
  }

  private async send(
    url: string,
    method: 'GET' | 'POST' | 'DELETE',
    headers: Readonly<Record<string, string>>,
    body?: string
  ): Promise<Result<JsonObject>> {
    try {
      const response = await this.fetchFn(url, {
        method,
        headers: { 'x-goog-api-key': this.apiKey, ...headers },
        ...(body !== undefined && { body })
      })
      if (!response.ok) return handleHttpError(response)
      return await readJsonObject(response)
    } catch (error) {
      return handleNetworkError(error)
    }
  }

  private request(
    method: 'GET' | 'POST' | 'DELETE',
    path: string,
    body?: JsonObject
  ): Promise<Result<JsonObject>> {
    const url = `${this.baseUrl}/${API_VERSION}/${path}`
    return body
      ? this.send(url, method, { 'Content-Type': 'application/json' }, JSON.stringify(body))
      : this.send(url, method, {})
  }

  /**
   * Follow nextPageToken until every item of `field` is collected.
   */
  private async listAll(path: string, field: string): Promise<Result<unknown[]>> {
    const items: unknown[] = []
    let pageToken = ''
    do {
      const query = new URLSearchParams({ pageSize: String(LIST_PAGE_SIZE) })
      if (pageToken) query.set('pageToken', pageToken)
      const result = await this.request('GET', `${path}?${query.toString()}`)
      if (!result.ok) return result
      items.push(...arrayAt(result.value, field))
      pageToken = stringAt(result.value, 'nextPageToken')
    } while (pageToken)
    return { ok: true, value: items }
  }

  /** Create a store; returns its resource name (`fileSearchStores/...`) */
  async createStore(displayName: string): Promise<Result<string>> {
    const result = await this.request('POST', 'fileSearchStores', { displayName })
    if (!result.ok) return result
    const name = stringAt(result.value, 'name')
    return name
      ? { ok: true, value: name }
      : { ok: false, error: { type: 'invalid_response', message: 'Created store has no name' } }
  }

  async deleteStore(storeName: string): Promise<Result<void>> {
    const result = await this.request('DELETE', `${storeName}?force=true`)
    return result.ok ? { ok: true, value: undefined } : result
  }

  async listStores(): Promise<Result<unknown[]>> {
    return this.listAll('fileSearchStores', 'fileSearchStores')
  }

  async listDocuments(storeName: string): Promise<Result<unknown[]>> {
    return this.listAll(`${storeName}/documents`, 'documents')
  }

  async deleteDocument(documentName: string): Promise<Result<void>> {
    const result = await this.request('DELETE', `${documentName}?force=true`)
    return result.ok ? { ok: true, value: undefined } : result
  }

  /**
   * Upload text into a store and wait for the import operation to finish.
   * Returns the created document's resource name.
   */
  async uploadDocument(storeName: string, file: UploadFile): Promise<Result<string>> {
    const boundary = `notion-rag-${Date.now().toString(36)}`
    const metadata = {
      displayName: file.displayName,
      customMetadata: file.customMetadata,
      mimeType: 'text/plain'
    }
    const body = [
      `--${boundary}`,
      'Content-Type: application/json; charset=UTF-8',
      '',
      JSON.stringify(metadata),
      `--${boundary}`,
      'Content-Type: text/plain; charset=UTF-8',
      '',
      file.text,
      `--${boundary}--`,
      ''
    ].join('\r\n')

    const started = await this.send(
      `${this.baseUrl}/upload/${API_VERSION}/${storeName}:uploadToFileSearchStore?uploadType=multipart`,
      'POST',
      {
        'Content-Type': `multipart/related; boundary=${boundary}`,
        'X-Goog-Upload-Protocol': 'multipart'
      },
      body
    )
    if (!started.ok) return started

    const operation = await this.waitForOperation(started.value)
    if (!operation.ok) return operation

    const documentName = stringAt(objectAt(operation.value, 'response'), 'documentName')
    return documentName
      ? { ok: true, value: documentName }
      : {
          ok: false,
          error: { type: 'invalid_response', message: 'Upload operation returned no document name' }
        }
  }

  private async waitForOperation(initial: JsonObject): Promise<Result<JsonObject>> {
    let operation = initial
    const name = stringAt(initial, 'name')

    for (let poll = 0; !booleanAt(operation, 'done'); poll++) {
      if (!name || poll >= this.maxPolls) {
        return {
          ok: false,
          error: {
            type: 'network',
            message: `Operation ${name || '(unnamed)'} did not finish after ${poll} polls`
          }
        }
      }
      await this.sleep(this.pollIntervalMs)
      const next = await this.request('GET', name)
      if (!next.ok) return next
      operation = next.value
    }

    const error = objectAt(operation, 'error')
    if (error) {
      return {
        ok: false,
        error: {
          type: 'invalid_request',
          message: `Operation ${name} failed: ${stringAt(error, 'message') || 'unknown error'}`
        }
      }
    }
    return { ok: true, value: operation }
  }

  async countTokens(model: string, text: string): Promise<Result<number>> {
    const result = await this.request('POST', `models/${model}:countTokens`, {
      contents: [{ parts: [{ text }] }]
    })
    if (!result.ok) return result
    return { ok: true, value: countAt(result.value, 'totalTokens') }
  }

  async generateContent(model: string, request: JsonObject): Promise<Result<GenerateResult>> {
    const result = await this.request('POST', `models/${model}:generateContent`, request)
    if (!result.ok) return result
    return { ok: true, value: parseGenerateResponse(result.value) }
  }
}
