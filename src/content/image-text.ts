/**
 * Image Text
 *
 * Renders an image segment as indexable text, either from its parsed
 * description or as a placeholder when the image was left out.
 */

import type { ImageRef } from '../types/providers'
import type { ParsedImageDescription } from './vision'

/**
 * Text for a described image. Terminal captures are inlined as a code block;
 * other images are wrapped in `**[Image: caption]**` markers.
 * Returns an empty string when the description carries nothing.
 */
export function renderDescribedImage(
  parsed: ParsedImageDescription,
  image: ImageRef,
  indent: string
): string {
  const parts: string[] = []

  if (parsed.kind === 'terminal') {
    if (parsed.description) {
      parts.push(`\n${indent}${parsed.description}`)
    }
    if (parsed.code) {
      parts.push(`\n${indent}\`\`\`\n${parsed.code}\n${indent}\`\`\`\n`)
    }
    return parts.join('\n')
  }

  const label = image.caption ? `Image: ${image.caption}` : 'Image'
  if (parsed.description) {
    parts.push(
      `\n\n${indent}**[${label}]**\n${indent}${parsed.description}\n${indent}**[/${label}]**\n\n`
    )
  }
  if (parsed.code) {
    parts.push(`${indent}\`\`\`\n${parsed.code}\n${indent}\`\`\`\n`)
  }
  return parts.join('\n')
}

/** Placeholder for an image that could not be described */
export function renderOmittedImage(image: ImageRef, indent: string): string {
  return image.caption ? `${indent}[IMAGE: ${image.caption}]` : `${indent}[IMAGE]`
}
