import { Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AsyncMutex } from './async-mutex';
import { readNumber } from '../config/config.utils';

export const LOCK_DEFAULTS = {
  SHARD_COUNT: 16,
} as const;

export interface LockRegistryStats {
  shards: number;
  locks: number;
  busy: number;
  retired: number;
}

/**
 * Owns every lock of the session engine: the global session-creation lock
 * and one lazily created lock per session id.
 *
 * Per-key locks live in hash-sharded maps. Get-or-create happens in one
 * synchronous step, so two callers racing for a new key always end up on
 * the same mutex.
 */
@Injectable()
export class LockRegistry {
  private readonly logger = new Logger(LockRegistry.name);
  private readonly shards: Map<string, AsyncMutex>[];
  // Keys released while still held; dropped once the last holder leaves
  private readonly retired = new Set<string>();

  /** Guards the "id free?" check and registration during session creation */
  readonly creationLock = new AsyncMutex();

  constructor(@Optional() private readonly configService?: ConfigService) {
    const shardCount = Math.max(
      1,
      Math.floor(
        readNumber(this.configService, 'LOCK_SHARD_COUNT', LOCK_DEFAULTS.SHARD_COUNT),
      ),
    );
    this.shards = Array.from({ length: shardCount }, () => new Map<string, AsyncMutex>());
    this.logger.log(`Lock registry initialized with ${shardCount} shards`);
  }

  /**
   * Get the lock for a key, creating it on first use
   */
  forKey(key: string): AsyncMutex {
    const shard = this.shardFor(key);
    let mutex = shard.get(key);
    if (!mutex) {
      mutex = new AsyncMutex();
      shard.set(key, mutex);
    }
    this.retired.delete(key);
    return mutex;
  }

  /**
   * Run a task while holding the lock for `key`
   */
  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const mutex = this.forKey(key);
    try {
      return await mutex.runExclusive(task);
    } finally {
      this.dropIfRetired(key, mutex);
    }
  }

  /**
   * Forget the lock for a key. A lock that is held or has waiters is
   * retired instead and removed when it becomes idle.
   */
  release(key: string): void {
    const shard = this.shardFor(key);
    const mutex = shard.get(key);
    if (!mutex) return;

    if (mutex.isIdle()) {
      shard.delete(key);
      this.retired.delete(key);
      return;
    }

    this.retired.add(key);
  }

  has(key: string): boolean {
    return this.shardFor(key).has(key);
  }

  size(): number {
    return this.shards.reduce((total, shard) => total + shard.size, 0);
  }

  getStats(): LockRegistryStats {
    let busy = 0;
    for (const shard of this.shards) {
      for (const mutex of shard.values()) {
        if (mutex.isLocked()) busy++;
      }
    }

    return {
      shards: this.shards.length,
      locks: this.size(),
      busy,
      retired: this.retired.size,
    };
  }

  clear(): void {
    for (const shard of this.shards) {
      shard.clear();
    }
    this.retired.clear();
  }

  private dropIfRetired(key: string, mutex: AsyncMutex): void {
    if (!this.retired.has(key) || !mutex.isIdle()) return;

    const shard = this.shardFor(key);
    if (shard.get(key) === mutex) {
      shard.delete(key);
    }
    this.retired.delete(key);
  }

  private shardFor(key: string): Map<string, AsyncMutex> {
    return this.shards[fnv1a(key) % this.shards.length];
  }
}

// 32-bit FNV-1a
function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
