/**
 * In-Flight Request Deduplication
 *
 * When identical work arrives concurrently (same key), the second caller
 * awaits the first caller's promise instead of starting a duplicate.
 */

export class InflightRegistry<T> {
  private readonly inflight = new Map<string, Promise<T>>();

  /**
   * Execute with in-flight deduplication.
   * If work for the same key is already in progress, returns the same promise.
   */
  run(key: string, execute: () => Promise<T>): Promise<T> {
    const existing = this.inflight.get(key);
    if (existing) return existing;

    const promise = execute().finally(() => this.inflight.delete(key));
    this.inflight.set(key, promise);
    return promise;
  }

  /** The in-flight promise for a key, if any */
  get(key: string): Promise<T> | undefined {
    return this.inflight.get(key);
  }

  /** Count of in-flight keys (for metrics/debugging) */
  get size(): number {
    return this.inflight.size;
  }
}
