/**
 * Error Taxonomy
 *
 * Every failure the engine reports to a caller is a RagError with a `kind`
 * discriminant. Provider adapters work with Result<T> internally and convert
 * at their public seam.
 */

import type { ApiError } from './types/common'
import type { InitResult, SyncResult } from './types/sync'

export type RagErrorKind =
  | 'UnknownLabel'
  | 'AmbiguousLabel'
  | 'DuplicateLabel'
  | 'SyncInProgress'
  | 'SourceFetchError'
  | 'VisionCallError'
  | 'UploadError'
  | 'ReindexConflict'
  | 'SyncFailed'
  | 'ProviderQuotaError'
  | 'ProviderError'
  | 'InvalidArgument'
  | 'UnknownModel'
  | 'StoreEmpty'
  | 'DocumentNotFound'
  | 'ConfigError'

export abstract class RagError extends Error {
  abstract readonly kind: RagErrorKind
  /** Whether repeating the same call later may succeed */
  readonly retryable: boolean = false
  readonly label: string | undefined
  readonly documentId: string | undefined

  constructor(message: string, context: { label?: string; documentId?: string } = {}) {
    super(message)
    this.name = new.target.name
    this.label = context.label
    this.documentId = context.documentId
  }
}

function formatLabels(labels: readonly string[]): string {
  return labels.length > 0 ? [...labels].sort().join(', ') : '(none)'
}

export class UnknownLabelError extends RagError {
  readonly kind = 'UnknownLabel' as const

  constructor(label: string, available: readonly string[]) {
    super(`Unknown label '${label}'. Available labels: ${formatLabels(available)}`, { label })
  }
}

export class AmbiguousLabelError extends RagError {
  readonly kind = 'AmbiguousLabel' as const
  readonly available: readonly string[]

  constructor(available: readonly string[]) {
    super(
      available.length === 0
        ? "No stores registered. Run 'init <label> <url>' first."
        : `Multiple stores registered. Specify one: ${formatLabels(available)}`
    )
    this.available = available
  }
}

export class DuplicateLabelError extends RagError {
  readonly kind = 'DuplicateLabel' as const

  constructor(label: string, detail?: string) {
    super(`Label '${label}' is already registered${detail ? ` (${detail})` : ''}`, { label })
  }
}

export class SyncInProgressError extends RagError {
  readonly kind = 'SyncInProgress' as const
  override readonly retryable = true

  constructor(label: string, operation: string) {
    super(`Another ${operation} is already running for '${label}'`, { label })
  }
}

export class SourceFetchError extends RagError {
  readonly kind = 'SourceFetchError' as const
  override readonly retryable = true

  constructor(documentId: string, message: string) {
    super(`Could not fetch content of ${documentId}: ${message}`, { documentId })
  }
}

export class VisionCallError extends RagError {
  readonly kind = 'VisionCallError' as const
  readonly imageUrl: string

  constructor(imageUrl: string, message: string) {
    super(message)
    this.imageUrl = imageUrl
  }
}

export class UploadError extends RagError {
  readonly kind = 'UploadError' as const

  constructor(documentId: string, message: string) {
    super(`Upload of ${documentId} failed: ${message}`, { documentId })
  }
}

export class ReindexConflictError extends RagError {
  readonly kind = 'ReindexConflict' as const
  /** Artifacts an operator must inspect; empty when rollback succeeded */
  readonly flagged: readonly string[]
  readonly rolledBack: boolean

  constructor(
    documentId: string,
    message: string,
    options: { flagged: readonly string[]; rolledBack: boolean }
  ) {
    super(
      options.rolledBack
        ? `Could not replace previous upload of ${documentId}, new upload rolled back: ${message}`
        : `Could not replace previous upload of ${documentId}, manual cleanup needed for ${options.flagged.join(', ')}: ${message}`,
      { documentId }
    )
    this.flagged = options.flagged
    this.rolledBack = options.rolledBack
  }
}

export class SyncFailedError extends RagError {
  readonly kind = 'SyncFailed' as const
  readonly result: InitResult | SyncResult

  constructor(label: string, result: InitResult | SyncResult) {
    const first = result.failures[0]
    super(
      `All ${result.pagesFailed} documents failed for '${label}'${first ? `: ${first.message}` : ''}`,
      { label }
    )
    this.result = result
  }
}

export class ProviderQuotaError extends RagError {
  readonly kind = 'ProviderQuotaError' as const
  override readonly retryable = true
  readonly retryAfterSeconds: number | undefined

  constructor(message: string, retryAfterSeconds?: number) {
    super(
      retryAfterSeconds !== undefined ? `${message} (retry after ${retryAfterSeconds}s)` : message
    )
    this.retryAfterSeconds = retryAfterSeconds
  }
}

export class ProviderError extends RagError {
  readonly kind = 'ProviderError' as const
  override readonly retryable: boolean
  readonly apiError: ApiError

  constructor(apiError: ApiError, context: string) {
    super(`${context}: ${apiError.message}`)
    this.apiError = apiError
    this.retryable = apiError.type === 'network'
  }
}

export class InvalidArgumentError extends RagError {
  readonly kind = 'InvalidArgument' as const
}

export class UnknownModelError extends RagError {
  readonly kind = 'UnknownModel' as const

  constructor(model: string) {
    super(`Unknown model or no pricing: ${model}`)
  }
}

export class StoreEmptyError extends RagError {
  readonly kind = 'StoreEmpty' as const

  constructor(label: string) {
    super(`Store '${label}' is empty. Run 'init' first to index documents.`, { label })
  }
}

export class DocumentNotFoundError extends RagError {
  readonly kind = 'DocumentNotFound' as const

  constructor(label: string, documentId: string) {
    super(`Document not found for page ID: ${documentId}`, { label, documentId })
  }
}

export class ConfigError extends RagError {
  readonly kind = 'ConfigError' as const
}

/**
 * Convert a provider Result error into the matching RagError.
 * Rate limits and quota exhaustion keep their retry-after hint.
 */
export function fromApiError(error: ApiError, context: string): RagError {
  if (error.type === 'rate_limit' || error.type === 'quota') {
    return new ProviderQuotaError(`${context}: ${error.message}`, error.retryAfter)
  }
  return new ProviderError(error, context)
}

/** Caller-facing error payload for an outer HTTP/CLI layer */
export interface ErrorPayload {
  readonly error: RagErrorKind | 'InternalError'
  readonly message: string
  readonly label?: string
  readonly documentId?: string
  readonly retryAfterSeconds?: number
}

export function toErrorPayload(error: unknown): ErrorPayload {
  if (!(error instanceof RagError)) {
    return {
      error: 'InternalError',
      message: error instanceof Error ? error.message : String(error)
    }
  }
  return {
    error: error.kind,
    message: error.message,
    ...(error.label !== undefined && { label: error.label }),
    ...(error.documentId !== undefined && { documentId: error.documentId }),
    ...(error instanceof ProviderQuotaError &&
      error.retryAfterSeconds !== undefined && { retryAfterSeconds: error.retryAfterSeconds })
  }
}

export function isRagError(error: unknown): error is RagError {
  return error instanceof RagError
}
