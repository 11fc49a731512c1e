/**
 * Compute-once cache keyed by logical path. The pending promise is stored, so
 * concurrent first readers share a single load. A rejected load is evicted.
 */
export class ComputeOnceCache<V> {
  private readonly entries = new Map<string, Promise<V>>();

  get(key: string, compute: () => Promise<V>): Promise<V> {
    const existing = this.entries.get(key);
    if (existing) {
      return existing;
    }

    const pending = compute();
    this.entries.set(key, pending);
    void pending.catch(() => {
      this.entries.delete(key);
    });
    return pending;
  }
}
