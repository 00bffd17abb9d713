/**
 * HTTP Utilities
 *
 * Typed fetch wrapper shared by the Notion and Gemini adapters, plus uniform
 * mapping of HTTP failures to Result errors.
 */

import type { Result } from './types'

/**
 * Check if running in CI environment.
 */
function isCI(): boolean {
  return process.env.CI === 'true'
}

/**
 * Check if running tests.
 */
function isTestMode(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true'
}

/**
 * Check if HTTP requests should be blocked.
 * Tests run against in-process fakes, so any real request from a test is a bug.
 */
function shouldBlockHttpRequests(): boolean {
  return isTestMode() || (isCI() && process.env.ALLOW_HTTP !== 'true')
}

/**
 * Error thrown when a real HTTP request is attempted while blocked.
 */
export class BlockedHttpRequestError extends Error {
  constructor(url: string) {
    super(
      `HTTP request to ${url} blocked: ${isTestMode() ? 'running tests' : 'running in CI'}. ` +
        'Tests must use the in-process providers from src/test-support.'
    )
    this.name = 'BlockedHttpRequestError'
  }
}

/**
 * Standard HTTP response interface for API calls.
 */
export interface HttpResponse {
  ok: boolean
  status: number
  headers: {
    get(name: string): string | null
  }
  text(): Promise<string>
  json(): Promise<unknown>
  arrayBuffer(): Promise<ArrayBuffer>
}

/** Signature of httpFetch, injectable into the adapters */
export type FetchFn = (url: string, init?: RequestInit) => Promise<HttpResponse>

/**
 * Perform a fetch request and return a typed response.
 *
 * @throws BlockedHttpRequestError when HTTP requests are blocked (tests)
 */
export async function httpFetch(url: string, init?: RequestInit): Promise<HttpResponse> {
  if (shouldBlockHttpRequests()) {
    throw new BlockedHttpRequestError(url)
  }
  return fetch(url, init)
}

/**
 * Parse a Retry-After header given in seconds or as an HTTP date.
 */
export function parseRetryAfter(value: string | null, now: Date = new Date()): number | undefined {
  if (!value) return undefined
  const seconds = Number.parseInt(value, 10)
  if (!Number.isNaN(seconds) && String(seconds) === value.trim()) {
    return seconds
  }
  const date = Date.parse(value)
  if (Number.isNaN(date)) return undefined
  return Math.max(0, Math.ceil((date - now.getTime()) / 1000))
}

/**
 * Handle HTTP error responses uniformly across all API modules.
 */
export async function handleHttpError(response: HttpResponse): Promise<Result<never>> {
  const errorText = await response.text()
  const status = response.status

  if (status === 429) {
    const quota = /quota|RESOURCE_EXHAUSTED/i.test(errorText)
    return {
      ok: false,
      error: {
        type: quota ? 'quota' : 'rate_limit',
        message: `${quota ? 'Quota exceeded' : 'Rate limited'}: ${errorText}`,
        status,
        retryAfter: parseRetryAfter(response.headers.get('retry-after'))
      }
    }
  }

  if (status === 401 || status === 403) {
    return {
      ok: false,
      error: { type: 'auth', message: `Authentication failed: ${errorText}`, status }
    }
  }

  if (status === 404) {
    return { ok: false, error: { type: 'not_found', message: `Not found: ${errorText}`, status } }
  }

  if (status === 400) {
    return {
      ok: false,
      error: { type: 'invalid_request', message: `Bad request: ${errorText}`, status }
    }
  }

  return {
    ok: false,
    error: { type: 'network', message: `API error ${status}: ${errorText}`, status }
  }
}

/**
 * Handle network errors uniformly across all API modules.
 */
export function handleNetworkError(error: unknown): Result<never> {
  if (error instanceof BlockedHttpRequestError) {
    throw error
  }
  const message = error instanceof Error ? error.message : String(error)
  return { ok: false, error: { type: 'network', message: `Network error: ${message}` } }
}
