export interface SummaryConfig {
  enabled: boolean;
  /** Summaries are used once the window holds more exchanges than this */
  triggerCount: number;
  /** Exchanges kept verbatim after the summary */
  recentExchanges: number;
  model?: string;
  cacheTtlMs: number;
  cacheMaxSize: number;
}

export interface MemoryConfig {
  maxExchanges: number;
  turnMetadataLimit: number;
  summary: SummaryConfig;
}
