import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import {
  CreateSessionOptions,
  CreateSessionResult,
  SessionLookup,
  SessionRecord,
  SessionSnapshot,
  SessionStoreStats,
} from './interfaces/session.interface';
import { SessionConfig } from './interfaces/session-config.interface';
import { loadSessionConfig } from './session.config';
import { normalizeTimestamp } from './utils/timestamp';
import { LockRegistry } from '../locks/lock-registry';
import { SessionPersistenceService } from '../persistence/session-persistence.service';
import { CLOCK, Clock, systemClock } from '../common/clock/clock';

export interface RestoreResult {
  session: SessionRecord;
  restored: boolean;
}

/**
 * Authoritative in-memory table of sessions.
 *
 * Reads are synchronous: the expiry check, the `lastAccessed` renewal and
 * the metadata merge of `get` happen without yielding to the event loop.
 * Only registration of new ids is serialized, through the registry's
 * creation lock.
 */
@Injectable()
export class SessionStoreService {
  private readonly logger = new Logger(SessionStoreService.name);
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly config: SessionConfig;
  private readonly clock: Clock;

  private totalSessions = 0;
  private activeSessions = 0;
  private totalConversations = 0;
  private cleanupRuns = 0;

  constructor(
    private readonly locks: LockRegistry,
    private readonly persistence: SessionPersistenceService,
    @Optional() private readonly configService?: ConfigService,
    @Optional() @Inject(CLOCK) clock?: Clock,
  ) {
    this.config = loadSessionConfig(this.configService);
    this.clock = clock ?? systemClock;

    this.logger.log(
      `Session store initialized: ttl=${this.config.ttlMs}ms, maxExchanges=${this.config.maxExchanges}`,
    );
  }

  /**
   * Register a new session. A requested id that is already taken is
   * replaced by a generated one; callers must use the returned id.
   *
   * `onRegistered` runs inside the creation lock, right after the record
   * becomes visible. The durable write happens afterwards and never fails
   * the call.
   */
  async create(
    options: CreateSessionOptions = {},
    onRegistered?: (session: SessionRecord) => void,
  ): Promise<CreateSessionResult> {
    const session = await this.locks.creationLock.runExclusive(() => {
      const sessionId = this.claimId(options.sessionId);
      const now = new Date(this.clock.now());

      const record: SessionRecord = {
        sessionId,
        createdAt: now,
        updatedAt: now,
        lastAccessed: now,
        metadata: { ...(options.metadata ?? {}) },
        userInfo: {},
        facts: {},
        topics: [],
        messagesMetadata: [],
        enrichment: {},
      };

      this.sessions.set(sessionId, record);
      this.totalSessions++;
      this.activeSessions++;
      onRegistered?.(record);

      return record;
    });

    this.logger.log(`Session created: ${session.sessionId}`);

    await this.persistence.persistSession({
      sessionId: session.sessionId,
      createdAt: session.createdAt,
      lastAccessed: session.lastAccessed,
      metadata: session.metadata,
    });

    return { sessionId: session.sessionId, enrichment: session.enrichment };
  }

  /**
   * Look up a session, renewing its TTL. An expired session is deleted
   * and reported once as expired; later lookups report not_found.
   */
  get(sessionId: string, context?: Record<string, unknown>): SessionLookup {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return { valid: false, reason: 'not_found' };
    }

    const now = this.clock.now();
    const lastAccessed = session.lastAccessed.getTime();
    const idleMs = now - lastAccessed;

    if (idleMs > this.config.ttlMs) {
      this.delete(sessionId);
      this.logger.log(`Session expired: ${sessionId} (idle ${idleMs}ms)`);
      return {
        valid: false,
        reason: 'expired',
        expiredForMs: idleMs - this.config.ttlMs,
      };
    }

    // A clock stepping backwards never moves lastAccessed back
    session.lastAccessed = new Date(Math.max(now, lastAccessed));
    if (context) {
      Object.assign(session.metadata, context);
    }

    return {
      valid: true,
      session,
      remainingTtlMs: this.config.ttlMs - Math.max(0, idleMs),
    };
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /**
   * @returns false when the session did not exist
   */
  delete(sessionId: string): boolean {
    if (!this.sessions.delete(sessionId)) {
      return false;
    }
    this.activeSessions = Math.max(0, this.activeSessions - 1);
    this.logger.debug(`Session deleted: ${sessionId}`);
    return true;
  }

  /**
   * Delete every expired session
   * @returns ids of the removed sessions
   */
  sweepExpired(): string[] {
    const now = this.clock.now();
    const expired: string[] = [];

    for (const [sessionId, session] of this.sessions) {
      if (now - session.lastAccessed.getTime() > this.config.ttlMs) {
        expired.push(sessionId);
      }
    }

    for (const sessionId of expired) {
      this.delete(sessionId);
    }

    if (expired.length > 0) {
      this.logger.log(`Swept ${expired.length} expired sessions`);
    }
    return expired;
  }

  /**
   * Register a stored or legacy session. A live session with the same id
   * is kept and returned instead.
   */
  async restore(snapshot: SessionSnapshot): Promise<RestoreResult> {
    return this.locks.creationLock.runExclusive(() => {
      const existing = this.sessions.get(snapshot.sessionId);
      if (existing) {
        this.logger.warn(`Restore skipped, session already live: ${snapshot.sessionId}`);
        return { session: existing, restored: false };
      }

      const now = new Date(this.clock.now());
      const createdAt = normalizeTimestamp(snapshot.createdAt, now);
      const session: SessionRecord = {
        sessionId: snapshot.sessionId,
        createdAt,
        updatedAt: normalizeTimestamp(snapshot.updatedAt, createdAt),
        lastAccessed: normalizeTimestamp(snapshot.lastAccessed, createdAt),
        metadata: { ...(snapshot.metadata ?? {}) },
        userName: snapshot.userName,
        userInfo: { ...(snapshot.userInfo ?? {}) },
        facts: { ...(snapshot.facts ?? {}) },
        topics: [...(snapshot.topics ?? [])],
        messagesMetadata: (snapshot.messagesMetadata ?? [])
          .slice(-this.config.turnMetadataLimit)
          .map((turn) => ({ ...turn, timestamp: normalizeTimestamp(turn.timestamp, createdAt) })),
        enrichment: {},
      };

      this.sessions.set(session.sessionId, session);
      this.totalSessions++;
      this.activeSessions++;
      this.logger.log(`Session restored: ${session.sessionId}`);

      return { session, restored: true };
    });
  }

  incrementConversationCount(): void {
    this.totalConversations++;
  }

  incrementCleanupRuns(): void {
    this.cleanupRuns++;
  }

  sessionIds(): string[] {
    return Array.from(this.sessions.keys());
  }

  size(): number {
    return this.sessions.size;
  }

  /**
   * Counters, with the active count recomputed against the TTL now
   */
  stats(): SessionStoreStats {
    const now = this.clock.now();
    let active = 0;
    for (const session of this.sessions.values()) {
      if (now - session.lastAccessed.getTime() <= this.config.ttlMs) {
        active++;
      }
    }
    this.activeSessions = active;

    return {
      totalSessions: this.totalSessions,
      activeSessions: active,
      totalConversations: this.totalConversations,
      cleanupRuns: this.cleanupRuns,
      sessionsInMemory: this.sessions.size,
      ttlMs: this.config.ttlMs,
      maxExchanges: this.config.maxExchanges,
    };
  }

  getConfig(): SessionConfig {
    return { ...this.config };
  }

  clear(): void {
    this.sessions.clear();
    this.activeSessions = 0;
  }

  private claimId(requested: string | undefined): string {
    const trimmed = requested?.trim();
    if (trimmed && !this.sessions.has(trimmed)) {
      return trimmed;
    }

    let generated = uuidv4();
    while (this.sessions.has(generated)) {
      generated = uuidv4();
    }

    if (trimmed) {
      this.logger.warn(
        `Requested session id ${trimmed} is already in use, assigned ${generated}`,
      );
    }
    return generated;
  }
}
