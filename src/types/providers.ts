/**
 * Provider Types
 *
 * Interfaces of the external collaborators: the source-document provider,
 * the vector-store provider and the vision subroutine.
 */

// =============================================================================
// SOURCE PROVIDER
// =============================================================================

/** Page properties kept for the indexed header (select, multi_select, url, rich_text) */
export type DocumentProperties = Readonly<Record<string, string | readonly string[]>>

/** One listed unit of source content */
export interface SourceDocument {
  readonly documentId: string
  /** ISO-8601 timestamp of the last edit reported by the source */
  readonly lastModified: string
  readonly title: string
  readonly properties: DocumentProperties
}

/** Reference to an image embedded in a document */
export interface ImageRef {
  readonly url: string
  readonly caption: string
}

export interface ImageData {
  readonly bytes: Uint8Array
  readonly mimeType: string
}

/**
 * Ordered piece of document content.
 * Text is already rendered; images are resolved to text by the indexing pipeline.
 */
export type ContentSegment =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'image'; readonly image: ImageRef; readonly indent: string }

export interface DocumentContent {
  readonly documentId: string
  readonly title: string
  readonly lastModified: string
  readonly properties: DocumentProperties
  readonly segments: readonly ContentSegment[]
}

export interface SourceProvider {
  /** Extract the collection id from a URL or raw id. Throws InvalidArgument. */
  parseCollectionId(urlOrId: string): string
  /** Canonical form of a document id or URL; unrecognized input comes back trimmed */
  normalizeDocumentId(urlOrId: string): string
  /** List documents, optionally only those modified on or after `since` */
  listDocuments(collectionId: string, since?: Date): Promise<SourceDocument[]>
  fetchContent(documentId: string): Promise<DocumentContent>
  loadImage(image: ImageRef): Promise<ImageData>
}

// =============================================================================
// VECTOR-STORE PROVIDER
// =============================================================================

export interface TokenUsage {
  readonly inputTokens: number
  readonly outputTokens: number
}

export interface StoreDescription {
  readonly storeHandle: string
  readonly displayName: string
  readonly documentCount: number
  readonly sizeBytes: number
}

/** Artifact uploaded to a store, with the metadata that tracks its source */
export interface StoredDocument {
  readonly documentId: string
  readonly uploadedName: string
  readonly displayName: string
  /** last_edited metadata; empty when the artifact carries none */
  readonly lastModified: string
  readonly sizeBytes: number
}

export interface UploadRequest {
  readonly documentId: string
  readonly lastModified: string
  readonly displayName: string
  readonly text: string
}

export interface QueryAnswer {
  readonly answer: string
  readonly grounding: unknown
  readonly usage: TokenUsage
}

export interface VectorStoreProvider {
  createStore(displayName: string): Promise<string>
  deleteStore(storeHandle: string): Promise<void>
  describeStores(): Promise<StoreDescription[]>
  listDocuments(storeHandle: string): Promise<StoredDocument[]>
  /** Returns the uploaded artifact name */
  upload(storeHandle: string, request: UploadRequest): Promise<string>
  delete(storeHandle: string, uploadedName: string): Promise<void>
  countTokens(model: string, text: string): Promise<number>
  query(storeHandle: string, text: string, model: string): Promise<QueryAnswer>
}

// =============================================================================
// VISION SUBROUTINE
// =============================================================================

export interface ImageDescription {
  /** Raw model answer (TYPE / DESCRIPTION / CODE sections) */
  readonly text: string
  readonly usage: TokenUsage
}

export interface VisionProvider {
  describeImage(image: ImageData, model: string, caption?: string): Promise<ImageDescription>
}
