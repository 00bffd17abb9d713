/**
 * Image Description Format
 *
 * Prompt sent with each image and parser for the structured answer:
 *
 * ```
 * TYPE: terminal | diagram | other
 * DESCRIPTION: one or two sentences
 * CODE:
 * ```lang
 * extracted commands or output
 * ```
 * ```
 */

export type ImageKind = 'terminal' | 'diagram' | 'other'

export interface ParsedImageDescription {
  readonly kind: ImageKind
  readonly description: string
  readonly code: string
}

/** Image MIME types the vision model accepts */
export const SUPPORTED_IMAGE_TYPES: readonly string[] = [
  'image/png',
  'image/jpeg',
  'image/webp',
  'image/heic',
  'image/heif'
]

export function isSupportedImageType(mimeType: string): boolean {
  return SUPPORTED_IMAGE_TYPES.includes(mimeType)
}

/**
 * Normalize a Content-Type header to a bare MIME type.
 */
export function normalizeMimeType(contentType: string | null): string {
  if (!contentType) return 'image/png'
  return (contentType.split(';')[0] ?? '').trim().toLowerCase()
}

export function buildVisionPrompt(caption?: string): string {
  const prompt = [
    'Analyze this image and answer in exactly this format.',
    '',
    'TYPE: terminal or diagram or other',
    '(terminal = terminal/shell/command output/console capture, ' +
      'diagram = diagram/flowchart/architecture drawing, ' +
      'other = any other screenshot/table/chart)',
    '',
    'DESCRIPTION: one or two sentence summary of the key content (no code blocks)',
    '',
    'CODE:',
    'If there is code or command output, extract it wrapped in ```. Otherwise leave empty.',
    '',
    'Rules:',
    '- DESCRIPTION is at most two sentences. No long explanations',
    '- For terminal, keep DESCRIPTION short and put the key commands/output in CODE',
    '- For diagram, summarize the components and flow in DESCRIPTION',
    '- If there is no code, omit the CODE: line entirely'
  ].join('\n')

  return caption ? `${prompt}\n\nCaption for reference: ${caption}` : prompt
}

function parseKind(value: string): ImageKind {
  const lower = value.toLowerCase()
  if (lower.includes('terminal')) return 'terminal'
  if (lower.includes('diagram')) return 'diagram'
  return 'other'
}

/**
 * Remove a wrapping ``` fence and a short language line after it.
 */
export function stripCodeFence(code: string): string {
  if (!(code.startsWith('```') && code.endsWith('```'))) {
    return code
  }

  let inner = code.slice(3)
  if (inner.endsWith('```')) {
    inner = inner.slice(0, -3)
  }
  const firstNewline = inner.indexOf('\n')
  if (firstNewline !== -1) {
    const firstLine = inner.slice(0, firstNewline).trim()
    if (firstLine && firstLine.length < 20) {
      inner = inner.slice(firstNewline + 1)
    }
  }
  return inner.trim()
}

/**
 * Parse the model's answer. An answer with neither a description nor code
 * becomes a plain description of the whole text.
 */
export function parseVisionResponse(raw: string): ParsedImageDescription {
  let kind: ImageKind = 'other'
  let section: 'description' | 'code' | null = null
  const descriptionLines: string[] = []
  const codeLines: string[] = []

  for (const line of raw.trim().split('\n')) {
    const stripped = line.trim()
    const upper = stripped.toUpperCase()

    if (upper.startsWith('TYPE:')) {
      kind = parseKind(stripped.slice(5).trim())
      section = null
    } else if (upper.startsWith('DESCRIPTION:')) {
      descriptionLines.push(stripped.slice(12).trim())
      section = 'description'
    } else if (upper.startsWith('CODE:')) {
      const remainder = stripped.slice(5).trim()
      if (remainder) codeLines.push(remainder)
      section = 'code'
    } else if (section === 'description') {
      descriptionLines.push(line.trimEnd())
    } else if (section === 'code') {
      codeLines.push(line.trimEnd())
    }
  }

  const description = descriptionLines.join('\n').trim()
  const code = stripCodeFence(codeLines.join('\n').trim())

  if (!description && !code) {
    return { kind, description: raw.trim(), code: '' }
  }
  return { kind, description, code }
}
