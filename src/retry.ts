/**
 * Retry with exponential backoff for provider calls that fail transiently.
 */

import { isRagError } from './errors'

export interface RetryOptions {
  readonly maxAttempts: number
  readonly baseDelayMs?: number
  readonly backoffFactor?: number
  /** Defaults to the `retryable` flag of RagErrors; other errors are not retried */
  readonly isRetryable?: (error: unknown) => boolean
  readonly onRetry?: (attempt: number, error: unknown, delayMs: number) => void
  readonly sleep?: ((ms: number) => Promise<void>) | undefined
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function defaultIsRetryable(error: unknown): boolean {
  return isRagError(error) && error.retryable
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const {
    maxAttempts,
    baseDelayMs = 1_000,
    backoffFactor = 2,
    isRetryable = defaultIsRetryable,
    onRetry,
    sleep: wait = sleep
  } = options

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn()
    } catch (error) {
      if (attempt >= maxAttempts || !isRetryable(error)) throw error
      const delayMs = baseDelayMs * backoffFactor ** (attempt - 1)
      onRetry?.(attempt, error, delayMs)
      await wait(delayMs)
    }
  }
}
