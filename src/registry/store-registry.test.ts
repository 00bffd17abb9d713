import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  AmbiguousLabelError,
  ConfigError,
  DuplicateLabelError,
  UnknownLabelError
} from '../errors'
import { StoreRegistry } from './store-registry'

describe('StoreRegistry', () => {
  let testDir: string
  let registry: StoreRegistry

  beforeEach(() => {
    testDir = join(tmpdir(), `registry-test-${Date.now()}-${Math.random().toString(36).slice(2)}`)
    mkdirSync(testDir, { recursive: true })
    registry = new StoreRegistry(testDir, () => new Date('2026-01-01T00:00:00Z'))
  })

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true })
    }
  })

  describe('register', () => {
    it('should persist the registration before returning', async () => {
      const registration = await registry.register({
        label: 'docs',
        collectionId: 'abc',
        storeHandle: 'fileSearchStores/docs-1'
      })

      expect(registration).toEqual({
        label: 'docs',
        collectionId: 'abc',
        storeHandle: 'fileSearchStores/docs-1',
        createdAt: '2026-01-01T00:00:00.000Z'
      })
      expect(JSON.parse(readFileSync(join(testDir, 'stores.json'), 'utf-8'))).toEqual({
        version: 1,
        stores: {
          docs: {
            collectionId: 'abc',
            storeHandle: 'fileSearchStores/docs-1',
            createdAt: '2026-01-01T00:00:00.000Z'
          }
        }
      })
    })

    it('should be visible to a second instance', async () => {
      await registry.register({ label: 'docs', collectionId: 'abc', storeHandle: 's1' })

      const other = new StoreRegistry(testDir)
      expect((await other.get('docs'))?.storeHandle).toBe('s1')
    })

    it('should reject a duplicate label', async () => {
      await registry.register({ label: 'docs', collectionId: 'abc', storeHandle: 's1' })

      await expect(
        registry.register({ label: 'docs', collectionId: 'def', storeHandle: 's2' })
      ).rejects.toThrow(DuplicateLabelError)
    })

    it('should keep both entries when two labels register at once', async () => {
      const settled = await Promise.allSettled([
        registry.register({ label: 'a', collectionId: 'abc', storeHandle: 's1' }),
        registry.register({ label: 'b', collectionId: 'def', storeHandle: 's2' })
      ])

      expect(settled.map((result) => result.status)).toEqual(['fulfilled', 'fulfilled'])
      expect((await registry.list()).map((r) => r.label)).toEqual(['a', 'b'])
    })

    it('should keep working after a rejected registration', async () => {
      await registry.register({ label: 'docs', collectionId: 'abc', storeHandle: 's1' })

      const [duplicate, next] = await Promise.allSettled([
        registry.register({ label: 'docs', collectionId: 'def', storeHandle: 's2' }),
        registry.register({ label: 'wiki', collectionId: 'def', storeHandle: 's3' })
      ])

      expect(duplicate?.status).toBe('rejected')
      expect(next?.status).toBe('fulfilled')
      expect((await registry.list()).map((r) => r.label)).toEqual(['docs', 'wiki'])
    })

    it('should allow the same collection under two labels', async () => {
      await registry.register({ label: 'a', collectionId: 'abc', storeHandle: 's1' })
      await registry.register({ label: 'b', collectionId: 'abc', storeHandle: 's2' })

      expect((await registry.list()).map((r) => r.label)).toEqual(['a', 'b'])
    })
  })

  describe('resolve', () => {
    it('should reject a missing label when nothing is registered', async () => {
      await expect(registry.resolve()).rejects.toThrow(AmbiguousLabelError)
    })

    it('should pick the only registration', async () => {
      await registry.register({ label: 'docs', collectionId: 'abc', storeHandle: 's1' })

      expect((await registry.resolve()).label).toBe('docs')
    })

    it('should reject a missing label with several registrations', async () => {
      await registry.register({ label: 'b', collectionId: 'abc', storeHandle: 's1' })
      await registry.register({ label: 'a', collectionId: 'def', storeHandle: 's2' })

      await expect(registry.resolve()).rejects.toThrow(
        'Multiple stores registered. Specify one: a, b'
      )
    })

    it('should list available labels for an unknown label', async () => {
      await registry.register({ label: 'docs', collectionId: 'abc', storeHandle: 's1' })

      const error = await registry.resolve('wiki').catch((e: unknown) => e)
      expect(error).toBeInstanceOf(UnknownLabelError)
      expect(error).toHaveProperty('message', "Unknown label 'wiki'. Available labels: docs")
    })
  })

  describe('remove', () => {
    it('should delete the registration', async () => {
      await registry.register({ label: 'docs', collectionId: 'abc', storeHandle: 's1' })

      expect(await registry.remove('docs')).toBe(true)
      expect(await registry.get('docs')).toBeNull()
      expect(await registry.list()).toEqual([])
    })

    it('should not lose a registration made while another is removed', async () => {
      await registry.register({ label: 'a', collectionId: 'abc', storeHandle: 's1' })

      await Promise.all([
        registry.remove('a'),
        registry.register({ label: 'b', collectionId: 'def', storeHandle: 's2' })
      ])

      expect((await registry.list()).map((r) => r.label)).toEqual(['b'])
    })

    it('should return false for an unknown label', async () => {
      expect(await registry.remove('docs')).toBe(false)
    })
  })

  it('should reject a corrupt registry file', async () => {
    writeFileSync(join(testDir, 'stores.json'), '{"version":1,"stores":{"docs":{}}}')

    await expect(registry.list()).rejects.toThrow(ConfigError)
  })

  it('should reject a registry that is not JSON', async () => {
    writeFileSync(join(testDir, 'stores.json'), 'not json')

    await expect(registry.list()).rejects.toThrow('is not valid JSON')
  })
})
