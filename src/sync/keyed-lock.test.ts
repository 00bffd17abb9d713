import { describe, expect, it } from 'vitest'
import { SyncInProgressError } from '../errors'
import { KeyedLock } from './keyed-lock'

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {}
  const promise = new Promise<void>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

describe('KeyedLock', () => {
  it('should reject a second operation on a held key', async () => {
    const lock = new KeyedLock()
    const gate = deferred()

    const first = lock.run('docs', 'sync', () => gate.promise)

    await expect(lock.run('docs', 'init', async () => 'never')).rejects.toThrow(
      "Another sync is already running for 'docs'"
    )

    gate.resolve()
    await first
    await expect(lock.run('docs', 'init', async () => 'next')).resolves.toBe('next')
  })

  it('should run different keys concurrently', async () => {
    const lock = new KeyedLock()
    const gate = deferred()

    const first = lock.run('docs', 'sync', () => gate.promise)
    await expect(lock.run('wiki', 'sync', async () => 'done')).resolves.toBe('done')

    gate.resolve()
    await first
  })

  it('should release the key when the operation fails', async () => {
    const lock = new KeyedLock()

    await expect(
      lock.run('docs', 'sync', async () => {
        throw new Error('boom')
      })
    ).rejects.toThrow('boom')

    await expect(lock.run('docs', 'sync', async () => 1)).resolves.toBe(1)
  })

  it('should mark the rejection as retryable', async () => {
    const lock = new KeyedLock()
    const gate = deferred()
    const first = lock.run('docs', 'cleanup', () => gate.promise)

    const error = await lock.run('docs', 'sync', async () => 1).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(SyncInProgressError)
    expect(error).toHaveProperty('retryable', true)
    gate.resolve()
    await first
  })
})
