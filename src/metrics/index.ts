/**
 * Metrics module exports.
 *
 * @packageDocumentation
 */

export { RollingWindow, percentile } from './rolling-window.js';
export { MetricsAggregator } from './aggregator.js';
export type { AggregateTotals, ModelTotals, MetricsAggregatorOptions } from './aggregator.js';
export { QueryCache } from './query-cache.js';
export { MetricsService } from './service.js';
export type { MetricsServiceDeps, StatsReport } from './service.js';
