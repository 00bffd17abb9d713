/**
 * notion-rag Core Library
 *
 * Incremental sync of Notion databases into Gemini File Search stores,
 * grounded queries against them, and a local cost ledger.
 *
 * The CLI in ./cli.ts is one caller; an HTTP layer or scheduler would use
 * RagService the same way.
 *
 * @license AGPL-3.0
 */

// Document text assembly and image descriptions
export type { ImageKind, ParsedImageDescription } from './content'
export {
  assembleDocumentText,
  buildHeader,
  buildVisionPrompt,
  documentDisplayName,
  isSupportedImageType,
  normalizeMimeType,
  parseVisionResponse,
  renderDescribedImage,
  renderOmittedImage,
  stripCodeFence,
  SUPPORTED_IMAGE_TYPES
} from './content'
// Pricing and cost records
export * from './costs'
// Errors
export type { ErrorPayload, RagErrorKind } from './errors'
export {
  AmbiguousLabelError,
  ConfigError,
  DocumentNotFoundError,
  DuplicateLabelError,
  fromApiError,
  InvalidArgumentError,
  isRagError,
  ProviderError,
  ProviderQuotaError,
  RagError,
  ReindexConflictError,
  SourceFetchError,
  StoreEmptyError,
  SyncFailedError,
  SyncInProgressError,
  toErrorPayload,
  UnknownLabelError,
  UnknownModelError,
  UploadError,
  VisionCallError
} from './errors'
// HTTP helpers
export type { FetchFn, HttpResponse } from './http'
export { handleHttpError, handleNetworkError, httpFetch, parseRetryAfter } from './http'
// Cost ledger, billing and operation journal
export * from './ledger'
// Notion and Gemini adapters
export * from './providers'
// Query gateway
export * from './query'
// Store registry
export * from './registry'
// Service boundary
export type { RagProviders, RagServiceOptions } from './service'
export { createRagService, RagService, readSecrets } from './service'
// Sync orchestration
export * from './sync'
// Types
export type * from './types'

export const VERSION = '0.1.0'
