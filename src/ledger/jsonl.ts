/**
 * JSONL helpers for the day-partitioned logs.
 */

import { existsSync } from 'node:fs'
import { appendFile, mkdir, readdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { isDayDir, utcDay } from './paths'

/**
 * Append one JSON line to `<logDir>/<day>/<fileName>`.
 * The line is written with a single append call.
 */
export async function appendJsonLine(
  logDir: string,
  fileName: string,
  timestamp: string,
  entry: object
): Promise<string> {
  const dir = join(logDir, utcDay(timestamp))
  await mkdir(dir, { recursive: true })
  const path = join(dir, fileName)
  await appendFile(path, `${JSON.stringify(entry)}\n`, 'utf-8')
  return path
}

/**
 * Read every line of `<logDir>/*\/<fileName>` in day order.
 * Lines that are blank or not valid JSON are skipped.
 */
export async function readJsonLines(logDir: string, fileName: string): Promise<unknown[]> {
  if (!existsSync(logDir)) {
    return []
  }

  const days = (await readdir(logDir, { withFileTypes: true }))
    .filter((entry) => entry.isDirectory() && isDayDir(entry.name))
    .map((entry) => entry.name)
    .sort()

  const values: unknown[] = []
  for (const day of days) {
    const path = join(logDir, day, fileName)
    if (!existsSync(path)) continue

    const content = await readFile(path, 'utf-8')
    for (const line of content.split('\n')) {
      const trimmed = line.trim()
      if (!trimmed) continue
      try {
        values.push(JSON.parse(trimmed))
      } catch {
        // Truncated line from an interrupted write
      }
    }
  }
  return values
}
