import { SummaryCache } from './summary-cache';
import { ManualClock } from '../../../test/helpers/manual-clock';

describe('SummaryCache', () => {
  let clock: ManualClock;

  beforeEach(() => {
    clock = new ManualClock();
  });

  it('should key entries by session and turn count', () => {
    expect(SummaryCache.keyFor('abc', 9)).toBe('abc_9');
  });

  it('should validate its limits', () => {
    expect(() => new SummaryCache(0, 1000, clock)).toThrow(
      'SummaryCache maxSize must be at least 1',
    );
    expect(() => new SummaryCache(10, -1, clock)).toThrow(
      'SummaryCache ttlMs must be non-negative',
    );
  });

  it('should count hits and misses', () => {
    const cache = new SummaryCache(10, 1000, clock);

    expect(cache.get('s1', 9)).toBeUndefined();
    cache.set('s1', 9, 'talked about tides');
    expect(cache.get('s1', 9)).toBe('talked about tides');
    expect(cache.get('s1', 10)).toBeUndefined();

    expect(cache.getMetrics()).toEqual({
      hits: 1,
      misses: 2,
      evictions: 0,
      size: 1,
      maxSize: 10,
    });
  });

  it('should expire entries after the TTL', () => {
    const cache = new SummaryCache(10, 1000, clock);
    cache.set('s1', 9, 'summary');

    clock.advance(1000);
    expect(cache.get('s1', 9)).toBe('summary');

    clock.advance(1);
    expect(cache.get('s1', 9)).toBeUndefined();
    expect(cache.size()).toBe(0);
  });

  it('should never expire entries with a zero TTL', () => {
    const cache = new SummaryCache(10, 0, clock);
    cache.set('s1', 9, 'summary');

    clock.advance(365 * 24 * 3600 * 1000);

    expect(cache.get('s1', 9)).toBe('summary');
  });

  it('should evict the least recently used entry', () => {
    const cache = new SummaryCache(2, 0, clock);
    cache.set('a', 1, 'A');
    cache.set('b', 1, 'B');
    cache.get('a', 1);

    cache.set('c', 1, 'C');

    expect(cache.get('b', 1)).toBeUndefined();
    expect(cache.get('a', 1)).toBe('A');
    expect(cache.get('c', 1)).toBe('C');
    expect(cache.getMetrics().evictions).toBe(1);
  });

  it('should overwrite an existing key without evicting', () => {
    const cache = new SummaryCache(2, 0, clock);
    cache.set('a', 1, 'old');
    cache.set('b', 1, 'B');

    cache.set('a', 1, 'new');

    expect(cache.get('a', 1)).toBe('new');
    expect(cache.getMetrics().evictions).toBe(0);
  });

  it('should forget only the given session', () => {
    const cache = new SummaryCache(10, 0, clock);
    cache.set('s1', 2, 'x');
    cache.set('s1', 3, 'y');
    cache.set('s10', 2, 'z');

    expect(cache.forgetSession('s1')).toBe(2);
    expect(cache.get('s10', 2)).toBe('z');
    expect(cache.size()).toBe(1);
  });

  it('should prune expired entries', () => {
    const cache = new SummaryCache(10, 100, clock);
    cache.set('old', 1, 'x');
    clock.advance(60);
    cache.set('new', 1, 'y');
    clock.advance(50);

    expect(cache.prune()).toBe(1);
    expect(cache.get('new', 1)).toBe('y');
  });
});
