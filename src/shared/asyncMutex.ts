/**
 * Shared - Async Mutex
 *
 * Promise-chain lock that serializes async work inside one process.
 * Used where a timer can fire again before the previous run's awaits
 * have settled.
 */
export class AsyncMutex {
  #queue: Promise<void> = Promise.resolve()
  #holders = 0

  /** True while a call is running or waiting for the lock. */
  get isLocked(): boolean {
    return this.#holders > 0
  }

  /**
   * Execute `fn` while holding the lock.
   *
   * If another call is already running, this call waits for it first.
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release!: () => void
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })

    const previous = this.#queue
    this.#queue = gate
    this.#holders++

    await previous
    try {
      return await fn()
    } finally {
      this.#holders--
      release()
    }
  }
}
