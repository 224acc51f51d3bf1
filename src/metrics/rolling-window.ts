/**
 * Rolling time window over call events.
 *
 * Events live in a growable ring buffer ordered by arrival; running sums
 * are updated on add and on eviction, so a snapshot only walks the window
 * to compute latency percentiles.
 *
 * @packageDocumentation
 */

import type { AggregatedWindow, CallEvent } from '../types.js';

interface WindowSample {
  timestamp: number;
  latencyMs: number;
  cacheHit: boolean;
  success: boolean;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
  savingsUsd: number;
}

interface WindowSums {
  calls: number;
  cacheHits: number;
  errors: number;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
  savingsUsd: number;
  latencyMs: number;
}

const INITIAL_CAPACITY = 64;

export class RollingWindow {
  readonly durationMs: number;
  private ring: Array<WindowSample | undefined> = new Array<WindowSample | undefined>(INITIAL_CAPACITY);
  private head = 0;
  private length = 0;
  private newest = 0;
  private sums: WindowSums = emptySums();

  constructor(durationMs: number) {
    if (durationMs <= 0) throw new RangeError('durationMs must be positive');
    this.durationMs = durationMs;
  }

  get size(): number {
    return this.length;
  }

  add(event: CallEvent): void {
    this.newest = Math.max(this.newest, event.timestamp);
    if (event.timestamp < this.newest - this.durationMs) return;

    const sample: WindowSample = {
      timestamp: event.timestamp,
      latencyMs: event.latencyMs,
      cacheHit: event.cacheHit,
      success: event.success,
      inputTokens: event.inputTokens,
      outputTokens: event.outputTokens,
      costUsd: event.costUsd ?? 0,
      savingsUsd: event.savingsUsd,
    };

    if (this.length === this.ring.length) this.grow();
    this.ring[(this.head + this.length) % this.ring.length] = sample;
    this.length++;
    applySample(this.sums, sample, 1);

    this.prune(this.newest);
  }

  /** Evict samples older than `now - durationMs`. */
  prune(now: number): void {
    const cutoff = now - this.durationMs;
    while (this.length > 0) {
      const oldest = this.ring[this.head];
      if (!oldest || oldest.timestamp >= cutoff) break;
      applySample(this.sums, oldest, -1);
      this.ring[this.head] = undefined;
      this.head = (this.head + 1) % this.ring.length;
      this.length--;
    }
    if (this.length === 0) this.sums = emptySums();
  }

  snapshot(now: number = Date.now()): AggregatedWindow {
    this.prune(now);
    const s = this.sums;
    const minutes = this.durationMs / 60_000;
    const latencies = this.samples().map((x) => x.latencyMs).sort((a, b) => a - b);

    return {
      windowSeconds: Math.round(this.durationMs / 1000),
      totalCalls: s.calls,
      cacheHits: s.cacheHits,
      cacheHitRate: s.calls > 0 ? (s.cacheHits / s.calls) * 100 : 0,
      errors: s.errors,
      inputTokens: s.inputTokens,
      outputTokens: s.outputTokens,
      totalTokens: s.inputTokens + s.outputTokens,
      costUsd: s.costUsd,
      savingsUsd: s.savingsUsd,
      avgLatencyMs: s.calls > 0 ? Math.round(s.latencyMs / s.calls) : 0,
      p50LatencyMs: percentile(latencies, 0.5),
      p95LatencyMs: percentile(latencies, 0.95),
      p99LatencyMs: percentile(latencies, 0.99),
      callsPerMinute: s.calls / minutes,
      tokensPerMinute: (s.inputTokens + s.outputTokens) / minutes,
      costPerMinute: s.costUsd / minutes,
    };
  }

  clear(): void {
    this.ring = new Array<WindowSample | undefined>(INITIAL_CAPACITY);
    this.head = 0;
    this.length = 0;
    this.newest = 0;
    this.sums = emptySums();
  }

  private samples(): WindowSample[] {
    const out: WindowSample[] = [];
    for (let i = 0; i < this.length; i++) {
      const sample = this.ring[(this.head + i) % this.ring.length];
      if (sample) out.push(sample);
    }
    return out;
  }

  private grow(): void {
    const next = new Array<WindowSample | undefined>(this.ring.length * 2);
    const current = this.samples();
    current.forEach((sample, i) => {
      next[i] = sample;
    });
    this.ring = next;
    this.head = 0;
  }
}

function emptySums(): WindowSums {
  return { calls: 0, cacheHits: 0, errors: 0, inputTokens: 0, outputTokens: 0, costUsd: 0, savingsUsd: 0, latencyMs: 0 };
}

function applySample(sums: WindowSums, sample: WindowSample, sign: 1 | -1): void {
  sums.calls += sign;
  if (sample.cacheHit) sums.cacheHits += sign;
  if (!sample.success) sums.errors += sign;
  sums.inputTokens += sign * sample.inputTokens;
  sums.outputTokens += sign * sample.outputTokens;
  sums.costUsd += sign * sample.costUsd;
  sums.savingsUsd += sign * sample.savingsUsd;
  sums.latencyMs += sign * sample.latencyMs;
}

/** Nearest-rank percentile over an ascending array. */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return 0;
  const idx = Math.ceil(p * sorted.length) - 1;
  return sorted[Math.max(0, idx)] ?? 0;
}
