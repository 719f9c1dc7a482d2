import { ConfigService } from '@nestjs/config';
import { SessionConfig } from './interfaces/session-config.interface';
import { SESSION_DEFAULTS } from './constants/session.constants';
import { readNumber } from '../config/config.utils';

export function loadSessionConfig(configService?: ConfigService): SessionConfig {
  return {
    ttlMs: readNumber(configService, 'SESSION_TTL_MS', SESSION_DEFAULTS.TTL_MS),
    maxExchanges: Math.max(
      1,
      Math.floor(
        readNumber(configService, 'SESSION_MAX_EXCHANGES', SESSION_DEFAULTS.MAX_EXCHANGES),
      ),
    ),
    cleanupIntervalMs: readNumber(
      configService,
      'SESSION_CLEANUP_INTERVAL_MS',
      SESSION_DEFAULTS.CLEANUP_INTERVAL_MS,
    ),
    turnMetadataLimit: readNumber(
      configService,
      'SESSION_TURN_METADATA_LIMIT',
      SESSION_DEFAULTS.TURN_METADATA_LIMIT,
    ),
  };
}
