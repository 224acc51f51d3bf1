/**
 * Metrics Aggregator
 *
 * In-memory rollup of call events: rolling windows, per-tier totals,
 * lifetime totals with a per-model breakdown, and a ring of recent calls.
 * `record` updates everything in one synchronous step, so readers never see
 * a window that disagrees with the totals.
 *
 * @packageDocumentation
 */

import type { AggregatedWindow, CallEvent, TierMetrics } from '../types.js';
import { RollingWindow } from './rolling-window.js';

export interface ModelTotals {
  model: string;
  calls: number;
  cacheHits: number;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
  savingsUsd: number;
}

export interface AggregateTotals {
  totalCalls: number;
  cacheHits: number;
  cacheMisses: number;
  /** Percentage of calls served from cache, 0 when there were no calls */
  hitRate: number;
  errors: number;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
  wouldBeCostUsd: number;
  savingsUsd: number;
  unpricedCalls: number;
  /** Calls answered by a different model than the one requested */
  modelOverrides: number;
  byModel: ModelTotals[];
}

export interface MetricsAggregatorOptions {
  /** Window lengths in seconds (default: 60, 300, 600) */
  windowsSeconds?: readonly number[];
  /** Size of the recent-calls ring (default: 100) */
  recentCallsLimit?: number;
}

type MutableTotals = Omit<AggregateTotals, 'hitRate' | 'cacheMisses' | 'byModel'>;

export class MetricsAggregator {
  private readonly windows = new Map<number, RollingWindow>();
  private readonly tiers = new Map<string, TierMetrics>();
  private readonly models = new Map<string, ModelTotals>();
  private readonly recentLimit: number;
  private recent: CallEvent[] = [];
  private totals: MutableTotals = emptyTotals();

  constructor(opts: MetricsAggregatorOptions = {}) {
    for (const seconds of opts.windowsSeconds ?? [60, 300, 600]) {
      this.windows.set(seconds, new RollingWindow(seconds * 1000));
    }
    this.recentLimit = opts.recentCallsLimit ?? 100;
  }

  record(event: CallEvent): void {
    for (const window of this.windows.values()) {
      window.add(event);
    }

    const tier = this.tiers.get(event.tier) ?? emptyTier(event.tier);
    addToTier(tier, event);
    this.tiers.set(event.tier, tier);

    const t = this.totals;
    t.totalCalls++;
    if (event.cacheHit) t.cacheHits++;
    if (!event.success) t.errors++;
    t.inputTokens += event.inputTokens;
    t.outputTokens += event.outputTokens;
    t.costUsd += event.costUsd ?? 0;
    t.wouldBeCostUsd += event.wouldBeCostUsd ?? 0;
    t.savingsUsd += event.savingsUsd;
    if (event.success && event.costUsd === null) t.unpricedCalls++;
    if (event.success && event.model !== event.requestedModel) t.modelOverrides++;

    if (event.success) {
      const model = this.models.get(event.model) ?? emptyModel(event.model);
      model.calls++;
      if (event.cacheHit) model.cacheHits++;
      model.inputTokens += event.inputTokens;
      model.outputTokens += event.outputTokens;
      model.costUsd += event.costUsd ?? 0;
      model.savingsUsd += event.savingsUsd;
      this.models.set(event.model, model);
    }

    this.recent.push(event);
    if (this.recent.length > this.recentLimit) {
      this.recent.splice(0, this.recent.length - this.recentLimit);
    }
  }

  /** Snapshot of one configured window; undefined for an unknown length. */
  getSnapshot(windowSeconds: number, now: number = Date.now()): AggregatedWindow | undefined {
    return this.windows.get(windowSeconds)?.snapshot(now);
  }

  getWindows(now: number = Date.now()): AggregatedWindow[] {
    return [...this.windows.values()].map((w) => w.snapshot(now));
  }

  getTierTotals(): TierMetrics[] {
    return [...this.tiers.values()]
      .map((tier) => ({ ...tier }))
      .sort((a, b) => a.tier.localeCompare(b.tier));
  }

  getTotals(): AggregateTotals {
    const t = this.totals;
    return {
      ...t,
      cacheMisses: t.totalCalls - t.cacheHits,
      hitRate: t.totalCalls > 0 ? (t.cacheHits / t.totalCalls) * 100 : 0,
      byModel: [...this.models.values()]
        .map((m) => ({ ...m }))
        .sort((a, b) => b.calls - a.calls || a.model.localeCompare(b.model)),
    };
  }

  /** Most recent first. */
  getRecentCalls(limit: number = this.recentLimit): CallEvent[] {
    const n = Math.max(0, Math.min(limit, this.recent.length));
    return this.recent.slice(this.recent.length - n).reverse();
  }

  reset(): void {
    for (const window of this.windows.values()) window.clear();
    this.tiers.clear();
    this.models.clear();
    this.recent = [];
    this.totals = emptyTotals();
  }
}

function emptyTotals(): MutableTotals {
  return {
    totalCalls: 0,
    cacheHits: 0,
    errors: 0,
    inputTokens: 0,
    outputTokens: 0,
    costUsd: 0,
    wouldBeCostUsd: 0,
    savingsUsd: 0,
    unpricedCalls: 0,
    modelOverrides: 0,
  };
}

function emptyTier(tier: string): TierMetrics {
  return {
    tier,
    calls: 0,
    cacheHits: 0,
    errors: 0,
    inputTokens: 0,
    outputTokens: 0,
    costUsd: 0,
    wouldBeCostUsd: 0,
    savingsUsd: 0,
    unpricedCalls: 0,
  };
}

function emptyModel(model: string): ModelTotals {
  return { model, calls: 0, cacheHits: 0, inputTokens: 0, outputTokens: 0, costUsd: 0, savingsUsd: 0 };
}

function addToTier(tier: TierMetrics, event: CallEvent): void {
  tier.calls++;
  if (event.cacheHit) tier.cacheHits++;
  if (!event.success) tier.errors++;
  tier.inputTokens += event.inputTokens;
  tier.outputTokens += event.outputTokens;
  tier.costUsd += event.costUsd ?? 0;
  tier.wouldBeCostUsd += event.wouldBeCostUsd ?? 0;
  tier.savingsUsd += event.savingsUsd;
  if (event.success && event.costUsd === null) tier.unpricedCalls++;
}
