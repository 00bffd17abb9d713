/**
 * Notion ID Parsing
 *
 * Accepts page/database URLs, 32-hex IDs and dashed UUIDs. IDs are returned
 * as 32 lowercase hex characters without dashes.
 */

const HEX_ID = /^[a-f0-9]{32}$/
const TRAILING_HEX_ID = /([a-f0-9]{32})$/
const UUID = /([a-f0-9]{8}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{12})/

function isUrl(value: string): boolean {
  return /^https?:\/\//.test(value) || value.includes('notion.so') || value.includes('notion.site')
}

/**
 * Extract the ID from a Notion URL or raw ID, or null when there is none.
 *
 * @example
 * extractNotionId('https://www.notion.so/team/Guide-0123456789abcdef0123456789abcdef?v=1')
 * // '0123456789abcdef0123456789abcdef'
 */
export function extractNotionId(urlOrId: string): string | null {
  const input = urlOrId.trim().toLowerCase()

  if (isUrl(input)) {
    const path = (input.split(/[?#]/)[0] ?? '').replace(/\/+$/, '')
    const trailing = TRAILING_HEX_ID.exec(path.replaceAll('-', ''))
    if (trailing?.[1]) return trailing[1]
    const uuid = UUID.exec(path)
    if (uuid?.[1]) return uuid[1].replaceAll('-', '')
    return null
  }

  const clean = input.replaceAll('-', '')
  return HEX_ID.test(clean) ? clean : null
}

/**
 * Canonical form of a page ID or URL. Input that holds no ID comes back trimmed.
 */
export function normalizeNotionId(urlOrId: string): string {
  return extractNotionId(urlOrId) ?? urlOrId.trim()
}
