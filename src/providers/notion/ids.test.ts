import { describe, expect, it } from 'vitest'
import { extractNotionId, normalizeNotionId } from './ids'

const ID = '0123456789abcdef0123456789abcdef'

describe('extractNotionId', () => {
  it('reads a raw 32-hex ID', () => {
    expect(extractNotionId(ID)).toBe(ID)
  })

  it('removes dashes from a UUID and lowercases it', () => {
    expect(extractNotionId('01234567-89AB-CDEF-0123-456789ABCDEF')).toBe(ID)
  })

  it('reads the trailing ID of a page URL with a title slug', () => {
    expect(extractNotionId(`https://www.notion.so/team/Deploy-Guide-${ID}?pvs=4`)).toBe(ID)
  })

  it('reads a database URL with a view parameter', () => {
    expect(extractNotionId(`https://www.notion.so/${ID}?v=fedcba9876543210fedcba9876543210`)).toBe(
      ID
    )
  })

  it('reads a dashed UUID inside a URL path', () => {
    expect(
      extractNotionId('https://acme.notion.site/01234567-89ab-cdef-0123-456789abcdef/')
    ).toBe(ID)
  })

  it('returns null for input without an ID', () => {
    expect(extractNotionId('not-an-id')).toBeNull()
    expect(extractNotionId('https://www.notion.so/team/Deploy-Guide')).toBeNull()
    expect(extractNotionId('0123456789abcdef')).toBeNull()
  })
})

describe('normalizeNotionId', () => {
  it('canonicalizes URLs and UUIDs', () => {
    expect(normalizeNotionId(`https://www.notion.so/Page-${ID}`)).toBe(ID)
    expect(normalizeNotionId('01234567-89ab-cdef-0123-456789abcdef')).toBe(ID)
  })

  it('returns unrecognized input trimmed', () => {
    expect(normalizeNotionId('  page-1 ')).toBe('page-1')
  })
})
