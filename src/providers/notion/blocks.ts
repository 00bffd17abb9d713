/**
 * Notion Block Rendering
 *
 * Renders a block tree into ordered content segments. Text blocks become
 * Markdown-like lines, images stay as references for the indexing pipeline
 * to describe. Children are loaded on demand through `loadChildren`.
 */

import type { ContentSegment, DocumentProperties } from '../../types/providers'
import { arrayAt, booleanAt, isObject, type JsonObject, objectAt, stringAt } from '../json'

export interface NotionBlock {
  readonly id: string
  readonly type: string
  readonly hasChildren: boolean
  /** The type-specific payload (`block[block.type]`) */
  readonly data: JsonObject
}

export type LoadChildren = (blockId: string) => Promise<readonly NotionBlock[]>

/** Blocks whose children render at the parent's depth */
const TRANSPARENT_CONTAINERS = new Set(['table', 'column_list', 'column', 'synced_block'])

export function parseBlock(value: unknown): NotionBlock | null {
  const id = stringAt(value, 'id')
  const type = stringAt(value, 'type')
  if (!id || !type) return null
  return {
    id,
    type,
    hasChildren: booleanAt(value, 'has_children'),
    data: objectAt(value, type) ?? {}
  }
}

/**
 * Concatenate the plain text of a rich_text array.
 */
export function plainText(richText: readonly unknown[]): string {
  return richText.map((item) => stringAt(item, 'plain_text')).join('')
}

function richTextAt(data: JsonObject, key: string): string {
  return plainText(arrayAt(data, key))
}

/**
 * URL of a hosted (`file`) or `external` image, or '' when absent.
 */
export function imageUrl(data: JsonObject): string {
  return stringAt(objectAt(data, 'file'), 'url') || stringAt(objectAt(data, 'external'), 'url')
}

function text(value: string): ContentSegment {
  return { kind: 'text', text: value }
}

/**
 * Lines for a block itself, without its children.
 */
function renderOwnBlock(block: NotionBlock, indent: string): ContentSegment[] {
  const { data } = block

  switch (block.type) {
    case 'paragraph':
    case 'bulleted_list_item':
    case 'numbered_list_item':
    case 'to_do':
    case 'quote':
    case 'callout':
    case 'toggle': {
      const content = richTextAt(data, 'rich_text')
      if (!content) return []
      switch (block.type) {
        case 'bulleted_list_item':
          return [text(`${indent}- ${content}`)]
        case 'numbered_list_item':
          return [text(`${indent}1. ${content}`)]
        case 'to_do':
          return [text(`${indent}- [${data['checked'] === true ? 'x' : ' '}] ${content}`)]
        case 'callout':
          return [text(`${indent}> [!NOTE] ${content}`)]
        case 'toggle':
          return [text(`${indent}▶ ${content}`)]
        case 'quote':
          return [text(`${indent}> ${content}`)]
        default:
          return [text(`${indent}${content}`)]
      }
    }

    case 'heading_1':
    case 'heading_2':
    case 'heading_3': {
      const content = richTextAt(data, 'rich_text')
      const level = Number(block.type.slice(-1))
      return content ? [text(`\n${'#'.repeat(level)} ${content}`)] : []
    }

    case 'code': {
      const content = richTextAt(data, 'rich_text')
      if (!content) return []
      const caption = richTextAt(data, 'caption')
      const lines = [
        text(`${indent}\`\`\`${stringAt(data, 'language')}`),
        text(content),
        text(`${indent}\`\`\``)
      ]
      if (caption) lines.push(text(`${indent}[Code description: ${caption}]`))
      return lines
    }

    case 'table_row': {
      const cells = arrayAt(data, 'cells').map((cell) => (Array.isArray(cell) ? plainText(cell) : ''))
      return [text(`${indent}| ${cells.join(' | ')} |`)]
    }

    case 'divider':
      return [text(`${indent}---`)]

    case 'image': {
      const caption = richTextAt(data, 'caption')
      const url = imageUrl(data)
      if (!url) return [text(caption ? `${indent}[IMAGE: ${caption}]` : `${indent}[IMAGE]`)]
      return [{ kind: 'image', image: { url, caption }, indent }]
    }

    case 'bookmark': {
      const url = stringAt(data, 'url')
      const caption = richTextAt(data, 'caption')
      if (caption) return [text(`${indent}[REF: ${caption} - ${url}]`)]
      return url ? [text(`${indent}[REF: ${url}]`)] : []
    }

    case 'link_preview': {
      const url = stringAt(data, 'url')
      return url ? [text(`${indent}[LINK: ${url}]`)] : []
    }

    case 'file':
    case 'pdf': {
      const name = stringAt(data, 'name') || richTextAt(data, 'caption') || 'attachment'
      return [text(`${indent}[FILE: ${name}]`)]
    }

    case 'child_page':
      return [text(`${indent}[CHILD PAGE: ${stringAt(data, 'title')}]`)]

    case 'child_database':
      return [text(`${indent}[CHILD DB: ${stringAt(data, 'title')}]`)]

    default:
      return []
  }
}

/**
 * Render blocks and their descendants in document order.
 */
export async function renderBlocks(
  blocks: readonly NotionBlock[],
  loadChildren: LoadChildren,
  depth = 0
): Promise<ContentSegment[]> {
  const indent = '  '.repeat(depth)
  const segments: ContentSegment[] = []

  for (const block of blocks) {
    segments.push(...renderOwnBlock(block, indent))
    if (!block.hasChildren) continue

    const childDepth = TRANSPARENT_CONTAINERS.has(block.type) ? depth : depth + 1
    const children = await loadChildren(block.id)
    segments.push(...(await renderBlocks(children, loadChildren, childDepth)))
  }

  return segments
}

// =============================================================================
// PAGE PROPERTIES
// =============================================================================

export interface PageMetadata {
  readonly title: string
  readonly properties: DocumentProperties
}

/**
 * Read the title and the select, multi_select, url and rich_text properties.
 */
export function parsePageProperties(properties: JsonObject): PageMetadata {
  let title = ''
  const result: Record<string, string | readonly string[]> = {}

  for (const [name, property] of Object.entries(properties)) {
    if (!isObject(property)) continue
    switch (stringAt(property, 'type')) {
      case 'title':
        title = richTextAt(property, 'title')
        break
      case 'select': {
        const selected = stringAt(objectAt(property, 'select'), 'name')
        if (selected) result[name] = selected
        break
      }
      case 'multi_select':
        result[name] = arrayAt(property, 'multi_select')
          .map((option) => stringAt(option, 'name'))
          .filter((option) => option !== '')
        break
      case 'url':
        result[name] = stringAt(property, 'url')
        break
      case 'rich_text':
        result[name] = richTextAt(property, 'rich_text')
        break
    }
  }

  return { title, properties: result }
}
