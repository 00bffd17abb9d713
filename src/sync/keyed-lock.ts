/**
 * Per-label mutual exclusion.
 *
 * At most one mutating operation holds a key at a time. A second request for
 * a held key is rejected immediately rather than queued.
 */

import { SyncInProgressError } from '../errors'

export class KeyedLock {
  private readonly held = new Map<string, string>()

  /**
   * Run `fn` while holding `key`.
   * @throws SyncInProgressError if the key is already held
   */
  async run<T>(key: string, operation: string, fn: () => Promise<T>): Promise<T> {
    const current = this.held.get(key)
    if (current !== undefined) {
      throw new SyncInProgressError(key, current)
    }

    this.held.set(key, operation)
    try {
      return await fn()
    } finally {
      this.held.delete(key)
    }
  }
}
