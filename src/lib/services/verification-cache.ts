/**
 * In-memory cache owned by one verifier instance.
 * Values may be promises so concurrent lookups share one in-flight probe.
 */
export class VerificationCache<V> {
  private entries = new Map<string, V>();

  get(key: string): V | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  set(key: string, value: V): void {
    this.entries.set(key, value);
  }

  /**
   * Return the cached value, or create, store and return it
   */
  getOrCreate(key: string, create: () => V): V {
    const existing = this.entries.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const value = create();
    this.entries.set(key, value);
    return value;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
