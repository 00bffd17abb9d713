export type { LoadChildren, NotionBlock, PageMetadata } from './blocks'
export { imageUrl, parseBlock, parsePageProperties, plainText, renderBlocks } from './blocks'
export type { NotionClientConfig } from './client'
export { NOTION_API_URL, NOTION_VERSION, NotionClient } from './client'
export { extractNotionId, normalizeNotionId } from './ids'
export { NotionSource } from './source'
