import type { ApodEntry, DateSelection } from '../types/nasa';

export const DEFAULT_CACHE_TTL_SECONDS = 3600;

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
}

interface CacheEntry {
  value: ApodEntry;
  storedAt: number;
}

export interface ApodCacheOptions {
  ttlSeconds?: number;
  now?: () => number;
}

export function selectionKey(selection: DateSelection): string {
  return selection.kind === 'latest' ? 'latest' : selection.date;
}

/**
 * In-memory TTL cache keyed by date selection. An entry goes stale once its
 * age exceeds the TTL; at exactly the TTL it is still served. Concurrent
 * misses for the same key each call fetchFn; the last one to settle wins.
 */
export class ApodCache {
  private map = new Map<string, CacheEntry>();
  private hits = 0;
  private misses = 0;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: ApodCacheOptions = {}) {
    this.ttlMs = (options.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS) * 1000;
    this.now = options.now ?? Date.now;
  }

  get(selection: DateSelection): ApodEntry | null {
    const key = selectionKey(selection);
    const entry = this.map.get(key);
    if (entry && this.now() - entry.storedAt <= this.ttlMs) {
      this.hits++;
      return entry.value;
    }
    if (entry) this.map.delete(key);
    this.misses++;
    return null;
  }

  set(selection: DateSelection, value: ApodEntry): void {
    this.map.set(selectionKey(selection), { value, storedAt: this.now() });
  }

  async getOrFetch(selection: DateSelection, fetchFn: (selection: DateSelection) => Promise<ApodEntry>): Promise<ApodEntry> {
    const cached = this.get(selection);
    if (cached) return cached;
    const value = await fetchFn(selection);
    this.set(selection, value);
    return value;
  }

  clear(): void {
    this.map.clear();
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses, size: this.map.size };
  }
}
