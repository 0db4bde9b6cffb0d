export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

/**
 * Key/value cache whose entries expire `ttlMs` after they were stored.
 * Expiry is measured against the injected clock, never the wall clock directly.
 */
export class TtlCache<K, V> {
  private readonly entries = new Map<K, CacheEntry<V>>();

  constructor(
    private readonly ttlMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt <= this.clock().getTime()) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: K, value: V): void {
    this.entries.set(key, {
      value,
      expiresAt: this.clock().getTime() + this.ttlMs
    });
  }

  get size(): number {
    return this.entries.size;
  }
}
