/**
 * Read-side facade for the stats endpoints.
 *
 * @packageDocumentation
 */

import type { CacheStats, PromptCache } from '../cache/response-cache.js';
import type { ProviderHealth, ProviderHealthSnapshot } from '../providers/health.js';
import type { WriterStats } from '../storage/batch-writer.js';
import type { AuditQuery, AuditStore } from '../storage/store.js';
import type { AggregatedWindow, AuditRecord, CallEvent, TierMetrics } from '../types.js';
import type { AggregateTotals, MetricsAggregator } from './aggregator.js';
import { QueryCache } from './query-cache.js';

export interface StatsReport {
  generatedAt: number;
  totals: AggregateTotals;
  windows: AggregatedWindow[];
  tiers: TierMetrics[];
  cache: CacheStats | null;
  writer: WriterStats | null;
  providers: ProviderHealthSnapshot[];
}

export interface MetricsServiceDeps {
  aggregator: MetricsAggregator;
  cache?: PromptCache | null;
  writer?: { stats(): WriterStats };
  store?: AuditStore;
  health?: ProviderHealth;
  /** How long a computed report is reused (default: 1000) */
  queryCacheTtlMs?: number;
}

export class MetricsService {
  private readonly deps: MetricsServiceDeps;
  private readonly reports: QueryCache<StatsReport>;

  constructor(deps: MetricsServiceDeps) {
    this.deps = deps;
    this.reports = new QueryCache<StatsReport>(deps.queryCacheTtlMs ?? 1000);
  }

  stats(): StatsReport {
    return this.reports.get('stats', () => {
      const { aggregator, cache, writer, health } = this.deps;
      const now = Date.now();
      return {
        generatedAt: now,
        totals: aggregator.getTotals(),
        windows: aggregator.getWindows(now),
        tiers: aggregator.getTierTotals(),
        cache: cache ? cache.stats() : null,
        writer: writer ? writer.stats() : null,
        providers: health ? health.snapshot() : [],
      };
    });
  }

  windows(): AggregatedWindow[] {
    return this.stats().windows;
  }

  tiers(): TierMetrics[] {
    return this.stats().tiers;
  }

  recentCalls(limit: number): CallEvent[] {
    return this.deps.aggregator.getRecentCalls(limit);
  }

  /** Empty when no durable store is attached. */
  audit(query: AuditQuery): AuditRecord[] {
    return this.deps.store ? this.deps.store.query(query) : [];
  }

  auditSummary(range: Pick<AuditQuery, 'from' | 'to'>): TierMetrics[] {
    return this.deps.store ? this.deps.store.summarizeByTier(range) : [];
  }

  invalidate(): void {
    this.reports.invalidate();
  }
}
