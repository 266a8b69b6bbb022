/**
 * Keyed Mutex
 *
 * Serialises async work per key. Work under different keys runs freely;
 * work under the same key runs one at a time, in call order.
 */

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>()

  /**
   * Run `fn` once every earlier holder of `key` has finished.
   * A rejection is passed to this caller only and does not block the queue.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()

    let release: () => void = () => {}
    const current = new Promise<void>((resolve) => {
      release = resolve
    })
    const tail = previous.then(() => current)
    this.tails.set(key, tail)

    await previous
    try {
      return await fn()
    } finally {
      release()
      // Drop the entry when nobody queued behind us
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key)
  }
}
