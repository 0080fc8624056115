/**
 * Memoises loaders for the lifetime of a single risk run. A new cache is
 * created per evaluation, so nothing survives between dashboard refreshes.
 */
export class RunCache<T> {
  private store = new Map<string, Promise<T>>();

  get size() {
    return this.store.size;
  }

  withCache(key: string, loader: () => Promise<T>): Promise<T> {
    const cached = this.store.get(key);
    if (cached) return cached;
    // Failed loads are dropped so a later caller can try again.
    const pending = loader().catch((error: unknown) => {
      this.store.delete(key);
      throw error;
    });
    this.store.set(key, pending);
    return pending;
  }
}
