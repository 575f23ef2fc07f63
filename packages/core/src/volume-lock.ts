/**
 * In-memory async mutex for one cache volume.
 *
 * Waiters are granted the lock strictly in arrival order. `acquire()`
 * returns an idempotent release function; releasing hands the lock directly
 * to the next waiter, so no later arrival can overtake it.
 */
export class VolumeLock {
  private held = false
  private readonly queue: Array<() => void> = []

  get locked(): boolean {
    return this.held
  }

  /** Number of callers blocked in `acquire()`. */
  get waiting(): number {
    return this.queue.length
  }

  async acquire(): Promise<() => void> {
    if (this.held) {
      await new Promise<void>(resolve => {
        this.queue.push(resolve)
      })
    } else {
      this.held = true
    }

    let released = false
    return () => {
      if (released) {
        return
      }

      released = true
      const next = this.queue.shift()
      if (next) {
        next()
      } else {
        this.held = false
      }
    }
  }
}
