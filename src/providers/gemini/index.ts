export type { CustomMetadata, GeminiClientConfig, GenerateResult, UploadFile } from './client'
export { GEMINI_API_URL, GeminiClient, parseGenerateResponse } from './client'
export {
  GeminiFileSearch,
  LAST_EDITED_KEY,
  PAGE_ID_KEY,
  toStoreDescription,
  toStoredDocument
} from './file-search'
export { GeminiVision } from './vision'
