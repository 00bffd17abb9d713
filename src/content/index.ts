export { assembleDocumentText, buildHeader, documentDisplayName } from './document-text'
export { renderDescribedImage, renderOmittedImage } from './image-text'
export type { ImageKind, ParsedImageDescription } from './vision'
export {
  buildVisionPrompt,
  isSupportedImageType,
  normalizeMimeType,
  parseVisionResponse,
  stripCodeFence,
  SUPPORTED_IMAGE_TYPES
} from './vision'
