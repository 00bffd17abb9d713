/**
 * Indexing Pipeline
 *
 * Turns one source document into uploaded text:
 * fetch → describe images → assemble → count tokens → upload → replace prior
 * artifacts → record the embedding cost.
 *
 * The new artifact is uploaded before prior ones are deleted. If a prior
 * artifact cannot be deleted the new one is rolled back, so a document id
 * never has two discoverable versions unless both are flagged in the error.
 */

import {
  createCompletionCostRecord,
  createEmbeddingCostRecord,
  isPricedModel,
  nanosToMicros,
  sumCostsNanos
} from '../costs/calculator'
import type { CostRecord, CostSink } from '../costs/types'
import {
  isRagError,
  ReindexConflictError,
  SourceFetchError,
  UnknownModelError,
  UploadError,
  VisionCallError
} from '../errors'
import { assembleDocumentText, documentDisplayName } from '../content/document-text'
import { renderDescribedImage, renderOmittedImage } from '../content/image-text'
import { isSupportedImageType, parseVisionResponse } from '../content/vision'
import type { Journal } from '../ledger/journal'
import { withRetry } from '../retry'
import type { CallSource } from '../types/common'
import type {
  DocumentContent,
  ImageDescription,
  ImageRef,
  SourceDocument,
  SourceProvider,
  StoredDocument,
  UploadRequest,
  VectorStoreProvider,
  VisionProvider
} from '../types/providers'
import type { IndexOutcome, OmittedImage } from '../types/sync'

export interface IndexingModels {
  readonly embedding: string
  readonly vision: string
}

export interface IndexingPipelineOptions {
  readonly source: SourceProvider
  readonly vectorStore: VectorStoreProvider
  readonly vision: VisionProvider
  readonly journal: Journal
  readonly models: IndexingModels
  /** Attempts for retryable provider failures (default 3) */
  readonly maxAttempts?: number | undefined
  readonly retryDelayMs?: number | undefined
  readonly sleep?: ((ms: number) => Promise<void>) | undefined
}

/** Where and on whose behalf a document is indexed */
export interface IndexContext {
  readonly label: string
  readonly storeHandle: string
  readonly operation: 'init' | 'sync'
  readonly source: CallSource
  /** Receives every cost record produced for the document */
  readonly costs: CostSink
}

interface RenderedImage {
  readonly text: string
  readonly record: CostRecord | null
  readonly omitted: OmittedImage | null
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export class IndexingPipeline {
  private readonly options: IndexingPipelineOptions

  constructor(options: IndexingPipelineOptions) {
    if (!isPricedModel(options.models.embedding, 'embedding')) {
      throw new UnknownModelError(options.models.embedding)
    }
    if (!isPricedModel(options.models.vision, 'generation')) {
      throw new UnknownModelError(options.models.vision)
    }
    this.options = options
  }

  private retry<T>(fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      maxAttempts: this.options.maxAttempts ?? 3,
      baseDelayMs: this.options.retryDelayMs ?? 1_000,
      sleep: this.options.sleep
    })
  }

  /**
   * Index one document, replacing the artifacts listed in `known`.
   *
   * @throws SourceFetchError when the content cannot be fetched
   * @throws UploadError when the upload fails (nothing else changed)
   * @throws ReindexConflictError when a prior artifact cannot be removed
   */
  async indexDocument(
    context: IndexContext,
    document: SourceDocument,
    known: readonly StoredDocument[]
  ): Promise<IndexOutcome> {
    const { documentId } = document
    const content = await this.fetchContent(documentId)

    const parts: string[] = []
    const visionRecords: CostRecord[] = []
    const omittedImages: OmittedImage[] = []

    for (const segment of content.segments) {
      if (segment.kind === 'text') {
        parts.push(segment.text)
        continue
      }
      const rendered = await this.renderImage(context, documentId, segment.image, segment.indent)
      parts.push(rendered.text)
      if (rendered.record) visionRecords.push(rendered.record)
      if (rendered.omitted) omittedImages.push(rendered.omitted)
    }

    const title = content.title || document.title
    const text = assembleDocumentText(title, content.properties, parts)
    const tokens = await this.retry(() =>
      this.options.vectorStore.countTokens(this.options.models.embedding, text)
    )

    const lastModified = content.lastModified || document.lastModified
    const uploadedName = await this.upload(context, {
      documentId,
      lastModified,
      displayName: documentDisplayName(documentId, title),
      text
    })

    // Indexing is billed at upload, even when the replacement below is rolled back
    const embeddingRecord = createEmbeddingCostRecord(this.options.models.embedding, tokens, {
      label: context.label,
      documentId,
      source: context.source,
      operation: context.operation
    })
    await context.costs.record(embeddingRecord)

    const replaced = await this.replacePrior(context, documentId, uploadedName, known)

    return {
      documentId,
      uploadedName,
      replaced,
      tokens,
      embeddingCostMicros: embeddingRecord.costMicros,
      visionCostMicros: nanosToMicros(sumCostsNanos(visionRecords)),
      imagesDescribed: visionRecords.length,
      omittedImages
    }
  }

  private async fetchContent(documentId: string): Promise<DocumentContent> {
    try {
      return await this.retry(() => this.options.source.fetchContent(documentId))
    } catch (error) {
      if (error instanceof SourceFetchError) throw error
      if (!isRagError(error)) throw error
      throw new SourceFetchError(documentId, error.message)
    }
  }

  /**
   * Describe one image. A failed download or vision call leaves a placeholder;
   * the cost of a successful call is recorded before its text is used.
   */
  private async renderImage(
    context: IndexContext,
    documentId: string,
    image: ImageRef,
    indent: string
  ): Promise<RenderedImage> {
    const model = this.options.models.vision
    let description: ImageDescription
    try {
      const data = await this.options.source.loadImage(image)
      if (!isSupportedImageType(data.mimeType)) {
        throw new VisionCallError(image.url, `Image skipped: unsupported format (${data.mimeType})`)
      }
      description = await this.options.vision.describeImage(data, model, image.caption || undefined)
    } catch (error) {
      if (!isRagError(error)) throw error
      const omitted: OmittedImage = { url: image.url, caption: image.caption, reason: error.message }
      await this.options.journal.append({
        event: 'image_omitted',
        label: context.label,
        documentId,
        url: image.url,
        caption: image.caption,
        kind: error.kind,
        reason: error.message
      })
      return { text: renderOmittedImage(image, indent), record: null, omitted }
    }

    const record = createCompletionCostRecord('vision', model, description.usage, {
      label: context.label,
      documentId,
      source: context.source,
      operation: context.operation
    })
    await context.costs.record(record)

    const parsed = parseVisionResponse(description.text)
    return { text: renderDescribedImage(parsed, image, indent), record, omitted: null }
  }

  private async upload(
    context: IndexContext,
    request: UploadRequest
  ): Promise<string> {
    try {
      return await this.options.vectorStore.upload(context.storeHandle, request)
    } catch (error) {
      if (!isRagError(error)) throw error
      throw new UploadError(request.documentId, errorMessage(error))
    }
  }

  private async replacePrior(
    context: IndexContext,
    documentId: string,
    uploadedName: string,
    known: readonly StoredDocument[]
  ): Promise<string[]> {
    const replaced: string[] = []

    for (const prior of known) {
      if (prior.uploadedName === uploadedName) continue
      try {
        await this.options.vectorStore.delete(context.storeHandle, prior.uploadedName)
        replaced.push(prior.uploadedName)
      } catch (error) {
        if (!isRagError(error)) throw error
        throw await this.rollback(context, documentId, uploadedName, prior.uploadedName, error.message)
      }
    }

    return replaced
  }

  private async rollback(
    context: IndexContext,
    documentId: string,
    uploadedName: string,
    priorName: string,
    reason: string
  ): Promise<ReindexConflictError> {
    let rolledBack = true
    let rollbackError: string | undefined
    try {
      await this.options.vectorStore.delete(context.storeHandle, uploadedName)
    } catch (error) {
      if (!isRagError(error)) throw error
      rolledBack = false
      rollbackError = error.message
    }

    const conflict = new ReindexConflictError(documentId, reason, {
      flagged: rolledBack ? [] : [priorName, uploadedName],
      rolledBack
    })
    await this.options.journal.append({
      event: 'reindex_conflict',
      label: context.label,
      documentId,
      uploadedName,
      priorName,
      rolledBack,
      flagged: conflict.flagged,
      reason,
      ...(rollbackError !== undefined && { rollbackError })
    })
    return conflict
  }
}
