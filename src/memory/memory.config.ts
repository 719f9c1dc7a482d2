import { ConfigService } from '@nestjs/config';
import { MemoryConfig, SummaryConfig } from './interfaces/memory-config.interface';
import { MEMORY_DEFAULTS } from './memory.constants';
import { loadSessionConfig } from '../session/session.config';
import { readBoolean, readNumber, readString } from '../config/config.utils';

export function loadSummaryConfig(configService?: ConfigService): SummaryConfig {
  return {
    enabled: readBoolean(configService, 'SESSION_SUMMARY_ENABLED', MEMORY_DEFAULTS.SUMMARY_ENABLED),
    triggerCount: readNumber(
      configService,
      'SESSION_SUMMARY_TRIGGER_COUNT',
      MEMORY_DEFAULTS.SUMMARY_TRIGGER_COUNT,
    ),
    recentExchanges: Math.max(
      1,
      readNumber(
        configService,
        'SESSION_SUMMARY_RECENT_EXCHANGES',
        MEMORY_DEFAULTS.SUMMARY_RECENT_EXCHANGES,
      ),
    ),
    model: readString(configService, 'SESSION_SUMMARY_MODEL'),
    cacheTtlMs: readNumber(
      configService,
      'SESSION_SUMMARY_CACHE_TTL_MS',
      MEMORY_DEFAULTS.SUMMARY_CACHE_TTL_MS,
    ),
    cacheMaxSize: Math.max(
      1,
      readNumber(
        configService,
        'SESSION_SUMMARY_CACHE_MAX_SIZE',
        MEMORY_DEFAULTS.SUMMARY_CACHE_MAX_SIZE,
      ),
    ),
  };
}

export function loadMemoryConfig(configService?: ConfigService): MemoryConfig {
  const session = loadSessionConfig(configService);
  return {
    maxExchanges: session.maxExchanges,
    turnMetadataLimit: session.turnMetadataLimit,
    summary: loadSummaryConfig(configService),
  };
}
