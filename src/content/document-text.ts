/**
 * Document Text
 *
 * Assembles the uploaded text of a document: a bracketed header built from the
 * page title and properties, a `---` separator, then the rendered content.
 */

import type { DocumentProperties } from '../types/providers'

const DISPLAY_TITLE_LENGTH = 50

function stringProperty(properties: DocumentProperties, name: string): string {
  const value = properties[name]
  if (value === undefined) return ''
  return typeof value === 'string' ? value : value.join(', ')
}

export function buildHeader(title: string, properties: DocumentProperties): string {
  const lines = [`[Title: ${title}]`]

  const type = stringProperty(properties, 'Type')
  if (type) lines.push(`[Type: ${type}]`)

  const tags = stringProperty(properties, 'Tags')
  if (tags) lines.push(`[Tags: ${tags}]`)

  const reference = stringProperty(properties, 'URL')
  if (reference) lines.push(`[Reference: ${reference}]`)

  return lines.join('\n')
}

/**
 * Full upload text. `parts` are the rendered content segments in order;
 * empty parts are dropped.
 */
export function assembleDocumentText(
  title: string,
  properties: DocumentProperties,
  parts: readonly string[]
): string {
  const content = parts.filter((part) => part.length > 0).join('\n')
  return `${buildHeader(title, properties)}\n---\n${content}`
}

/** Display name of an uploaded artifact: `[documentId] title` (title truncated) */
export function documentDisplayName(documentId: string, title: string): string {
  return `[${documentId}] ${title.slice(0, DISPLAY_TITLE_LENGTH)}`
}
