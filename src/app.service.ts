import { Injectable, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  HealthCheckDto,
  HealthStatus,
  MemoryCheck,
  PersistenceCheck,
  SessionsCheck,
} from './common/dto/health-check.dto';
import { SessionService } from './session/session.service';
import { SessionEngineStats } from './session/interfaces/session.interface';
import { SessionPersistenceService } from './persistence/session-persistence.service';
import { readString } from './config/config.utils';

// Heap usage thresholds
const MEMORY_WARNING_THRESHOLD = 0.8;
const MEMORY_CRITICAL_THRESHOLD = 0.95;

export interface LivenessStatus {
  status: 'ok';
  timestamp: string;
}

@Injectable()
export class AppService {
  private readonly startTime = Date.now();

  constructor(
    private readonly sessionService: SessionService,
    private readonly persistence: SessionPersistenceService,
    @Optional() private readonly configService?: ConfigService,
  ) {}

  getHealth(): LivenessStatus {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  }

  async getDetailedHealth(): Promise<HealthCheckDto> {
    const memoryCheck = this.checkMemory();
    const persistenceCheck = await this.checkPersistence();
    const sessionsCheck = this.checkSessions();

    return {
      status: this.determineOverallStatus(memoryCheck, persistenceCheck),
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version ?? '0.1.0',
      environment: readString(this.configService, 'NODE_ENV', 'development') ?? 'development',
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      checks: {
        memory: memoryCheck,
        persistence: persistenceCheck,
        sessions: sessionsCheck,
      },
    };
  }

  getSessionStats(): SessionEngineStats {
    return this.sessionService.getStats();
  }

  private checkMemory(): MemoryCheck {
    const { heapUsed, heapTotal, rss } = process.memoryUsage();
    const percentage = heapTotal > 0 ? heapUsed / heapTotal : 0;

    let status: HealthStatus = 'healthy';
    if (percentage >= MEMORY_CRITICAL_THRESHOLD) {
      status = 'unhealthy';
    } else if (percentage >= MEMORY_WARNING_THRESHOLD) {
      status = 'degraded';
    }

    return {
      status,
      heapUsed,
      heapTotal,
      rss,
      percentage: Math.round(percentage * 100) / 100,
    };
  }

  /**
   * An unreachable sink only degrades the service unless turn writes are
   * required, in which case appends fail and the service is unhealthy.
   */
  private async checkPersistence(): Promise<PersistenceCheck> {
    const sink = this.persistence.sinkName;
    const persistTurns = this.persistence.persistTurnsEnabled;

    if (await this.persistence.isHealthy()) {
      return { status: 'healthy', sink, persistTurns };
    }

    return {
      status: persistTurns ? 'unhealthy' : 'degraded',
      sink,
      persistTurns,
      message: `Conversation sink ${sink} is not reachable`,
    };
  }

  private checkSessions(): SessionsCheck {
    const stats = this.sessionService.getStats();
    return {
      active: stats.activeSessions,
      inMemory: stats.sessionsInMemory,
      conversations: stats.conversationsInMemory,
      totalCreated: stats.totalSessions,
      cleanupRuns: stats.cleanupRuns,
      locks: stats.locks,
    };
  }

  private determineOverallStatus(
    memory: MemoryCheck,
    persistence: PersistenceCheck,
  ): HealthStatus {
    if (memory.status === 'unhealthy' || persistence.status === 'unhealthy') {
      return 'unhealthy';
    }
    if (memory.status === 'degraded' || persistence.status === 'degraded') {
      return 'degraded';
    }
    return 'healthy';
  }
}
