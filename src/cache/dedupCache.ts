/**
 * Suppresses re-emission of items already surfaced within a time window.
 */
export interface DedupCache {
  seen(source: string, nativeId: string): boolean;
  mark(source: string, nativeId: string): void;
}

export interface TtlDedupCacheOptions {
  ttlMs?: number;
  /** Capacity bound; the least recently marked keys are evicted beyond it. */
  maxEntries?: number;
  /** Clock in epoch milliseconds. */
  now?: () => number;
}

/** `[key, lastSeenEpochMs]` pairs, oldest first. */
export type CacheSnapshot = Array<[string, number]>;

export const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_CACHE_MAX_ENTRIES = 50_000;

export function cacheKey(source: string, nativeId: string): string {
  return `${source}:${nativeId}`;
}

/**
 * In-memory TTL cache keyed on `source:nativeId`.
 *
 * Map insertion order doubles as recency order: `mark` re-inserts its key,
 * so the first key is always the least recently marked one. `seen` never
 * mutates, so an expired entry keeps its slot until it is re-marked,
 * swept or evicted.
 */
export class TtlDedupCache implements DedupCache {
  private readonly entries = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: TtlDedupCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.maxEntries = options.maxEntries ?? DEFAULT_CACHE_MAX_ENTRIES;
    this.now = options.now ?? Date.now;

    if (this.ttlMs <= 0) throw new Error(`ttlMs must be positive, got ${this.ttlMs}`);
    if (this.maxEntries < 1) throw new Error(`maxEntries must be at least 1, got ${this.maxEntries}`);
  }

  get size(): number {
    return this.entries.size;
  }

  seen(source: string, nativeId: string): boolean {
    const markedAt = this.entries.get(cacheKey(source, nativeId));
    return markedAt !== undefined && this.isFresh(markedAt, this.now());
  }

  mark(source: string, nativeId: string): void {
    const key = cacheKey(source, nativeId);
    this.entries.delete(key);
    this.entries.set(key, this.now());
    this.evictOverflow();
  }

  /**
   * Drop expired entries. Returns how many were removed.
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, markedAt] of this.entries) {
      if (!this.isFresh(markedAt, now)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Unexpired entries, least recently marked first.
   */
  snapshot(): CacheSnapshot {
    const now = this.now();
    const live: CacheSnapshot = [];
    for (const [key, markedAt] of this.entries) {
      if (this.isFresh(markedAt, now)) live.push([key, markedAt]);
    }
    return live;
  }

  /**
   * Load entries from a snapshot, skipping expired ones. Existing keys are overwritten.
   */
  restore(snapshot: CacheSnapshot): void {
    const now = this.now();
    const ordered = [...snapshot].sort((a, b) => a[1] - b[1]);
    for (const [key, markedAt] of ordered) {
      if (!this.isFresh(markedAt, now)) continue;
      this.entries.delete(key);
      this.entries.set(key, markedAt);
    }
    this.evictOverflow();
  }

  private isFresh(markedAt: number, now: number): boolean {
    return now - markedAt < this.ttlMs;
  }

  private evictOverflow(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) return;
      this.entries.delete(oldest.value);
    }
  }
}
