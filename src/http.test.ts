import { describe, expect, it } from 'vitest'
import {
  BlockedHttpRequestError,
  handleHttpError,
  handleNetworkError,
  httpFetch,
  parseRetryAfter
} from './http'
import { textResponse } from './test-support'
import type { ApiError, Result } from './types'

// Helper to assert error result and get error
function assertError(result: Result<never>): ApiError {
  expect(result.ok).toBe(false)
  if (!result.ok) return result.error
  throw new Error('Expected error result')
}

describe('HTTP Utilities', () => {
  describe('httpFetch', () => {
    it('blocks real requests while tests run', async () => {
      await expect(httpFetch('https://api.notion.com/v1/pages/x')).rejects.toThrow(
        BlockedHttpRequestError
      )
    })
  })

  describe('parseRetryAfter', () => {
    const now = new Date('2026-02-03T09:00:00.000Z')

    it('reads delay seconds', () => {
      expect(parseRetryAfter('60', now)).toBe(60)
      expect(parseRetryAfter(' 5 ', now)).toBe(5)
    })

    it('reads an HTTP date relative to now', () => {
      expect(parseRetryAfter('Tue, 03 Feb 2026 09:00:30 GMT', now)).toBe(30)
      expect(parseRetryAfter('Tue, 03 Feb 2026 08:59:00 GMT', now)).toBe(0)
    })

    it('returns undefined for missing or unreadable values', () => {
      expect(parseRetryAfter(null, now)).toBeUndefined()
      expect(parseRetryAfter('', now)).toBeUndefined()
      expect(parseRetryAfter('soon', now)).toBeUndefined()
    })
  })

  describe('handleHttpError', () => {
    it('handles 429 rate limit error with retry-after', async () => {
      const error = assertError(
        await handleHttpError(textResponse('Too many requests', 429, { 'retry-after': '60' }))
      )

      expect(error).toEqual({
        type: 'rate_limit',
        message: 'Rate limited: Too many requests',
        status: 429,
        retryAfter: 60
      })
    })

    it('distinguishes exhausted quota from rate limiting', async () => {
      const error = assertError(
        await handleHttpError(textResponse('{"error":{"status":"RESOURCE_EXHAUSTED"}}', 429))
      )

      expect(error.type).toBe('quota')
      expect(error.message).toBe('Quota exceeded: {"error":{"status":"RESOURCE_EXHAUSTED"}}')
      expect(error.retryAfter).toBeUndefined()
    })

    it('handles 401 and 403 as auth errors', async () => {
      expect(assertError(await handleHttpError(textResponse('bad key', 401)))).toEqual({
        type: 'auth',
        message: 'Authentication failed: bad key',
        status: 401
      })
      expect(assertError(await handleHttpError(textResponse('no access', 403))).type).toBe('auth')
    })

    it('handles 404 not found', async () => {
      const error = assertError(await handleHttpError(textResponse('object_not_found', 404)))
      expect(error.type).toBe('not_found')
      expect(error.message).toBe('Not found: object_not_found')
    })

    it('handles 400 bad request', async () => {
      const error = assertError(await handleHttpError(textResponse('validation_error', 400)))
      expect(error.type).toBe('invalid_request')
      expect(error.message).toBe('Bad request: validation_error')
    })

    it('handles other status codes as network errors', async () => {
      const error = assertError(await handleHttpError(textResponse('Server error', 503)))
      expect(error).toEqual({ type: 'network', message: 'API error 503: Server error', status: 503 })
    })
  })

  describe('handleNetworkError', () => {
    it('wraps errors and other thrown values', () => {
      expect(assertError(handleNetworkError(new Error('Connection refused'))).message).toBe(
        'Network error: Connection refused'
      )
      expect(assertError(handleNetworkError('socket hang up')).message).toBe(
        'Network error: socket hang up'
      )
    })

    it('rethrows blocked requests', () => {
      expect(() => handleNetworkError(new BlockedHttpRequestError('https://example.test'))).toThrow(
        BlockedHttpRequestError
      )
    })
  })
})
