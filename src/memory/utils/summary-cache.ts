import { Clock, systemClock } from '../../common/clock/clock';

/**
 * LRU cache of conversation summaries keyed by (sessionId, turnCount).
 * Map insertion order doubles as recency order.
 */

interface SummaryEntry {
  sessionId: string;
  summary: string;
  expiresAt: number;
}

export interface SummaryCacheMetrics {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
  maxSize: number;
}

export class SummaryCache {
  private readonly entries = new Map<string, SummaryEntry>();

  private hits = 0;
  private misses = 0;
  private evictions = 0;

  /**
   * @param ttlMs 0 disables expiry
   */
  constructor(
    private readonly maxSize: number,
    private readonly ttlMs: number,
    private readonly clock: Clock = systemClock,
  ) {
    if (maxSize < 1) {
      throw new Error('SummaryCache maxSize must be at least 1');
    }
    if (ttlMs < 0) {
      throw new Error('SummaryCache ttlMs must be non-negative');
    }
  }

  static keyFor(sessionId: string, turnCount: number): string {
    return `${sessionId}_${turnCount}`;
  }

  get(sessionId: string, turnCount: number): string | undefined {
    const key = SummaryCache.keyFor(sessionId, turnCount);
    const entry = this.entries.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }

    // Move to the most recently used position
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;

    return entry.summary;
  }

  set(sessionId: string, turnCount: number, summary: string): void {
    const key = SummaryCache.keyFor(sessionId, turnCount);
    this.entries.delete(key);

    while (this.entries.size >= this.maxSize) {
      this.evictLeastRecent();
    }

    this.entries.set(key, {
      sessionId,
      summary,
      expiresAt: this.ttlMs > 0 ? this.clock.now() + this.ttlMs : 0,
    });
  }

  /**
   * Drop every summary of one session
   * @returns number of entries removed
   */
  forgetSession(sessionId: string): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.sessionId === sessionId) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  prune(): number {
    let pruned = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        pruned++;
      }
    }
    return pruned;
  }

  size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  getMetrics(): SummaryCacheMetrics {
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.entries.size,
      maxSize: this.maxSize,
    };
  }

  private isExpired(entry: SummaryEntry): boolean {
    return entry.expiresAt > 0 && this.clock.now() > entry.expiresAt;
  }

  private evictLeastRecent(): void {
    const oldestKey = this.entries.keys().next().value;
    if (oldestKey !== undefined) {
      this.entries.delete(oldestKey);
      this.evictions++;
    }
  }
}
