/**
 * Deduplicates concurrent computations per key.
 *
 * The first caller for a key starts the computation; callers arriving while
 * it runs receive the same promise. The entry is removed once the
 * computation settles, so a later call after a failure starts over.
 */
export class SingleFlight<K, V> {
  private readonly flights = new Map<K, Promise<V>>()

  get size(): number {
    return this.flights.size
  }

  has(key: K): boolean {
    return this.flights.has(key)
  }

  run(key: K, compute: () => Promise<V>): Promise<V> {
    const existing = this.flights.get(key)
    if (existing) {
      return existing
    }

    // Started on the next microtask so the entry exists before compute runs
    const flight = Promise.resolve()
      .then(compute)
      .finally(() => {
        this.flights.delete(key)
      })
    this.flights.set(key, flight)
    return flight
  }
}
