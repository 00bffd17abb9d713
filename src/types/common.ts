/**
 * Common Types
 *
 * Shared types used across multiple modules: Result, API errors, progress callbacks.
 */

// Result Types
export type ApiErrorType =
  | 'rate_limit'
  | 'auth'
  | 'quota'
  | 'not_found'
  | 'network'
  | 'invalid_response'
  | 'invalid_request'

export interface ApiError {
  readonly type: ApiErrorType
  readonly message: string
  readonly status?: number | undefined
  readonly retryAfter?: number | undefined
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ApiError }

/** Where a metered call was triggered from */
export type CallSource = 'cli' | 'api' | 'scheduler'
