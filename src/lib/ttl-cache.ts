interface CacheEntry<V> {
  value: V
  insertedAt: number
}

export interface TtlCacheOptions {
  ttlMs: number
  /** Upper bound on stored entries; unbounded when omitted. */
  maxSize?: number
  /** Minimum spacing between sweeps of expired entries. */
  sweepIntervalMs?: number
  now?: () => number
}

/**
 * In-memory map whose entries go inert once older than the TTL.
 * Expired entries are dropped on read and by a lazy sweep; inserting past
 * `maxSize` evicts the single oldest entry first.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>()
  private readonly ttlMs: number
  private readonly maxSize: number
  private readonly sweepIntervalMs: number
  private readonly now: () => number
  private lastSweepAt: number

  constructor(options: TtlCacheOptions) {
    this.ttlMs = options.ttlMs
    this.maxSize = Math.max(1, options.maxSize ?? Number.POSITIVE_INFINITY)
    this.sweepIntervalMs = options.sweepIntervalMs ?? 0
    this.now = options.now ?? Date.now
    this.lastSweepAt = this.now()
  }

  get size(): number {
    return this.entries.size
  }

  get(key: string): V | undefined {
    this.maybeSweep()

    const entry = this.entries.get(key)
    if (!entry) {
      return undefined
    }

    if (this.isExpired(entry, this.now())) {
      this.entries.delete(key)
      return undefined
    }

    return entry.value
  }

  set(key: string, value: V): void {
    this.maybeSweep()

    if (!this.entries.has(key) && this.entries.size >= this.maxSize) {
      this.evictOldest()
    }

    // re-inserting keeps Map order equal to insertion-time order
    this.entries.delete(key)
    this.entries.set(key, { value, insertedAt: this.now() })
  }

  private isExpired(entry: CacheEntry<V>, now: number): boolean {
    return now - entry.insertedAt > this.ttlMs
  }

  private evictOldest(): void {
    const oldest = this.entries.keys().next()
    if (!oldest.done) {
      this.entries.delete(oldest.value)
    }
  }

  private maybeSweep(): void {
    const now = this.now()
    if (now - this.lastSweepAt < this.sweepIntervalMs) {
      return
    }

    this.lastSweepAt = now
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key)
      }
    }
  }
}
