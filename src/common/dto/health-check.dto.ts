import { LockRegistryStats } from '../../locks/lock-registry';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface MemoryCheck {
  status: HealthStatus;
  heapUsed: number;
  heapTotal: number;
  rss: number;
  percentage: number;
}

export interface PersistenceCheck {
  status: HealthStatus;
  sink: string;
  persistTurns: boolean;
  message?: string;
}

export interface SessionsCheck {
  active: number;
  inMemory: number;
  conversations: number;
  totalCreated: number;
  cleanupRuns: number;
  locks: LockRegistryStats;
}

export interface HealthCheckDto {
  status: HealthStatus;
  timestamp: string;
  version: string;
  environment: string;
  uptime: number;
  checks: {
    memory: MemoryCheck;
    persistence: PersistenceCheck;
    sessions: SessionsCheck;
  };
}
