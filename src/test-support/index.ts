/**
 * Test Support Module
 *
 * In-process providers and temp-directory helpers shared by the tests.
 */

import { mkdirSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

export type { FakeArtifact, FakePage } from './fakes'
export { FAKE_URL_PREFIX, FakeSourceProvider, FakeVectorStore, FakeVision } from './fakes'

/**
 * Create an isolated data directory. Call the returned function to remove it.
 */
export function createTempDataDir(prefix = 'notion-rag-test'): {
  dir: string
  cleanup: () => void
} {
  const dir = join(tmpdir(), `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2)}`)
  mkdirSync(dir, { recursive: true })
  return {
    dir,
    cleanup: () => rmSync(dir, { recursive: true, force: true })
  }
}

/** Sleep stand-in that records requested delays */
export function recordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = []
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms)
    }
  }
}

export type { RecordedRequest, RouteHandler } from './http'
export { bytesResponse, createFetchStub, jsonResponse, textResponse } from './http'
