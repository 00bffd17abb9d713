/**
 * Store Registry
 *
 * Durable label → store mapping in `<dataDir>/stores.json`. Every mutation is
 * written (temp file + rename) before the call returns. Reads go to disk each
 * time, so a registry instance never serves stale state. Mutations run one at
 * a time per instance.
 */

import { randomUUID } from 'node:crypto'
import { existsSync } from 'node:fs'
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { AmbiguousLabelError, ConfigError, DuplicateLabelError, UnknownLabelError } from '../errors'
import { guardAgainstUserDataDir } from '../ledger/paths'
import type { RegistryFile, StoreRegistration } from '../types/registry'

export const REGISTRY_FILE = 'stores.json'

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Validate the parsed registry file.
 * Entries with missing fields are a corrupt registry, not something to skip.
 */
export function parseRegistryFile(value: unknown, path: string): RegistryFile {
  if (!isObject(value) || value['version'] !== 1 || !isObject(value['stores'])) {
    throw new ConfigError(`Invalid store registry at ${path}`)
  }

  const stores: Record<string, Omit<StoreRegistration, 'label'>> = {}
  for (const [label, entry] of Object.entries(value['stores'])) {
    if (
      !isObject(entry) ||
      typeof entry['collectionId'] !== 'string' ||
      typeof entry['storeHandle'] !== 'string' ||
      typeof entry['createdAt'] !== 'string'
    ) {
      throw new ConfigError(`Invalid store registry entry '${label}' at ${path}`)
    }
    stores[label] = {
      collectionId: entry['collectionId'],
      storeHandle: entry['storeHandle'],
      createdAt: entry['createdAt']
    }
  }
  return { version: 1, stores }
}

export interface RegisterInput {
  readonly label: string
  readonly collectionId: string
  readonly storeHandle: string
}

export class StoreRegistry {
  private readonly path: string
  private readonly now: () => Date
  private pending: Promise<unknown> = Promise.resolve()

  constructor(dataDir: string, now: () => Date = () => new Date()) {
    guardAgainstUserDataDir(dataDir)
    this.path = join(dataDir, REGISTRY_FILE)
    this.now = now
  }

  private async read(): Promise<RegistryFile> {
    if (!existsSync(this.path)) {
      return { version: 1, stores: {} }
    }
    const content = await readFile(this.path, 'utf-8')
    let parsed: unknown
    try {
      parsed = JSON.parse(content)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      throw new ConfigError(`Store registry at ${this.path} is not valid JSON: ${message}`)
    }
    return parseRegistryFile(parsed, this.path)
  }

  private async write(file: RegistryFile): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true })
    const tmpPath = `${this.path}.${randomUUID()}.tmp`
    await writeFile(tmpPath, `${JSON.stringify(file, null, 2)}\n`, 'utf-8')
    await rename(tmpPath, this.path)
  }

  /**
   * Run a read-modify-write after every earlier one has settled.
   */
  private serialize<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.pending.then(fn, fn)
    this.pending = run.catch(() => undefined)
    return run
  }

  /**
   * All registrations, sorted by label.
   */
  async list(): Promise<StoreRegistration[]> {
    const file = await this.read()
    return Object.entries(file.stores)
      .map(([label, entry]) => ({ label, ...entry }))
      .sort((a, b) => a.label.localeCompare(b.label))
  }

  async get(label: string): Promise<StoreRegistration | null> {
    const entry = (await this.read()).stores[label]
    return entry ? { label, ...entry } : null
  }

  /**
   * Look up a label, or pick the only registration when none is given.
   */
  async resolve(label?: string): Promise<StoreRegistration> {
    const all = await this.list()
    if (label !== undefined) {
      const found = all.find((registration) => registration.label === label)
      if (!found) {
        throw new UnknownLabelError(
          label,
          all.map((registration) => registration.label)
        )
      }
      return found
    }

    const [only, ...rest] = all
    if (!only || rest.length > 0) {
      throw new AmbiguousLabelError(all.map((registration) => registration.label))
    }
    return only
  }

  register(input: RegisterInput): Promise<StoreRegistration> {
    return this.serialize(() => this.registerNow(input))
  }

  private async registerNow(input: RegisterInput): Promise<StoreRegistration> {
    const file = await this.read()
    const existing = file.stores[input.label]
    if (existing) {
      throw new DuplicateLabelError(input.label, `collection ${existing.collectionId}`)
    }

    const entry = {
      collectionId: input.collectionId,
      storeHandle: input.storeHandle,
      createdAt: this.now().toISOString()
    }
    await this.write({ version: 1, stores: { ...file.stores, [input.label]: entry } })
    return { label: input.label, ...entry }
  }

  /**
   * Delete a registration. Returns false when the label was not registered.
   * The remote store is not consulted.
   */
  remove(label: string): Promise<boolean> {
    return this.serialize(() => this.removeNow(label))
  }

  private async removeNow(label: string): Promise<boolean> {
    const file = await this.read()
    if (!file.stores[label]) {
      return false
    }
    const stores = Object.fromEntries(
      Object.entries(file.stores).filter(([existing]) => existing !== label)
    )
    await this.write({ version: 1, stores })
    return true
  }
}
