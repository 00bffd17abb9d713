/**
 * In-process stand-in for httpFetch. Requests are recorded and answered by a
 * handler, so adapter tests never leave the process.
 */

import type { FetchFn, HttpResponse } from '../http'

export interface RecordedRequest {
  readonly url: string
  readonly method: string
  /** Lowercased header names */
  readonly headers: Readonly<Record<string, string>>
  readonly body: string
}

export type RouteHandler = (request: RecordedRequest) => HttpResponse

function toArrayBuffer(bytes: readonly number[]): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.length)
  new Uint8Array(buffer).set(bytes)
  return buffer
}

export function textResponse(
  text: string,
  status = 200,
  headers: Readonly<Record<string, string>> = {}
): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: { get: (name: string) => headers[name.toLowerCase()] ?? null },
    text: async () => text,
    json: async (): Promise<unknown> => JSON.parse(text),
    arrayBuffer: async () => toArrayBuffer([...new TextEncoder().encode(text)])
  }
}

export function jsonResponse(body: unknown, status = 200): HttpResponse {
  return textResponse(JSON.stringify(body), status, { 'content-type': 'application/json' })
}

export function bytesResponse(bytes: readonly number[], contentType: string | null): HttpResponse {
  return {
    ok: true,
    status: 200,
    headers: {
      get: (name: string) => (name.toLowerCase() === 'content-type' ? contentType : null)
    },
    text: async () => '',
    json: async (): Promise<unknown> => null,
    arrayBuffer: async () => toArrayBuffer(bytes)
  }
}

export function createFetchStub(handler: RouteHandler): {
  fetch: FetchFn
  requests: RecordedRequest[]
} {
  const requests: RecordedRequest[] = []
  const fetch: FetchFn = async (url, init) => {
    const request: RecordedRequest = {
      url,
      method: init?.method ?? 'GET',
      headers: Object.fromEntries(new Headers(init?.headers).entries()),
      body: typeof init?.body === 'string' ? init.body : ''
    }
    requests.push(request)
    return handler(request)
  }
  return { fetch, requests }
}
