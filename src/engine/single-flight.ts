/**
 * In-flight deduplication keyed by device identity.
 *
 * While a call for a key is pending, further calls for the same key receive
 * its promise instead of starting a second request. Used around DCR
 * registration (one IAT, one registration) and token refresh (one refresh
 * token presented at a time).
 */
export class SingleFlight<T> {
  private inFlight = new Map<string, Promise<T>>()

  run(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inFlight.get(key)
    if (existing) return existing

    const promise = fn().finally(() => {
      this.inFlight.delete(key)
    })
    this.inFlight.set(key, promise)
    return promise
  }

  isRunning(key: string): boolean {
    return this.inFlight.has(key)
  }
}
