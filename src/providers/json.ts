/**
 * Readers for untyped API payloads.
 *
 * Responses are narrowed field by field instead of being cast, so a missing
 * or mistyped field becomes a default (or a Result error) at the seam.
 */

import type { HttpResponse } from '../http'
import type { Result } from '../types'

export type JsonObject = Record<string, unknown>

export function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function objectAt(value: unknown, key: string): JsonObject | undefined {
  if (!isObject(value)) return undefined
  const field = value[key]
  return isObject(field) ? field : undefined
}

export function stringAt(value: unknown, key: string): string {
  if (!isObject(value)) return ''
  const field = value[key]
  return typeof field === 'string' ? field : ''
}

export function booleanAt(value: unknown, key: string): boolean {
  return isObject(value) && value[key] === true
}

export function arrayAt(value: unknown, key: string): unknown[] {
  if (!isObject(value)) return []
  const field = value[key]
  return Array.isArray(field) ? field : []
}

/**
 * Read a count that may arrive as a number or as an int64 string.
 */
export function countAt(value: unknown, key: string): number {
  if (!isObject(value)) return 0
  const field = value[key]
  if (typeof field === 'number' && Number.isFinite(field)) return field
  if (typeof field === 'string' && /^\d+$/.test(field)) return Number.parseInt(field, 10)
  return 0
}

/**
 * Parse a response body as a JSON object.
 * An empty body reads as an empty object (DELETE responses).
 */
export async function readJsonObject(response: HttpResponse): Promise<Result<JsonObject>> {
  const text = await response.text()
  if (!text.trim()) return { ok: true, value: {} }
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    return {
      ok: false,
      error: { type: 'invalid_response', message: `Response is not JSON: ${text.slice(0, 200)}` }
    }
  }
  return isObject(parsed)
    ? { ok: true, value: parsed }
    : { ok: false, error: { type: 'invalid_response', message: 'Response is not a JSON object' } }
}
