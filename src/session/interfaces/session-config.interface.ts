export interface SessionConfig {
  ttlMs: number;
  maxExchanges: number;
  cleanupIntervalMs: number;
  turnMetadataLimit: number;
}
