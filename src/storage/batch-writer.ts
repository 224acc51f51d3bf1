/**
 * Batch Persistence Writer
 *
 * Buffers call events and writes them to the audit store in bulk, either
 * when a batch fills up or on a periodic tick. Events are never dropped:
 * a failed batch goes back to the head of the buffer and is retried with
 * exponential backoff. After too many consecutive failures the writer
 * enters a degraded mode where producers are no longer slowed down.
 *
 * @packageDocumentation
 */

import type { CallEvent } from '../types.js';
import type { AuditSink } from './store.js';
import { createLogger, type Logger } from '../logger.js';

export interface BatchWriterOptions {
  /** Events per bulk write (default: 100) */
  batchSize?: number;
  /** Ms between periodic flushes (default: 5000) */
  flushIntervalMs?: number;
  /** Buffered events before enqueue starts waiting (default: 10000) */
  queueCapacity?: number;
  /** Max ms an enqueue waits for a flush when the queue is full (default: 250) */
  enqueueTimeoutMs?: number;
  /** Consecutive failed flushes before degraded mode (default: 5) */
  maxRetries?: number;
  /** First retry delay, doubled per failure (default: 500) */
  retryBaseDelayMs?: number;
  /** Records older than this are pruned hourly; 0 disables (default: 30) */
  retentionDays?: number;
  logger?: Logger;
}

export interface WriterStats {
  queued: number;
  written: number;
  /** Events the store already had (replayed batches) */
  duplicates: number;
  failedFlushes: number;
  consecutiveFailures: number;
  degraded: boolean;
  lastFlushAt: number | null;
  lastError: string | null;
}

const RETENTION_INTERVAL_MS = 60 * 60 * 1000;
const DAY_MS = 24 * 60 * 60 * 1000;

export class BatchWriter {
  private buffer: CallEvent[] = [];
  private inflight: Promise<void> | null = null;
  private waiters: Array<() => void> = [];
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private retentionTimer: ReturnType<typeof setInterval> | null = null;
  private retryTimer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private stopped = false;

  private written = 0;
  private duplicates = 0;
  private failedFlushes = 0;
  private consecutiveFailures = 0;
  private degraded = false;
  private lastFlushAt: number | null = null;
  private lastError: string | null = null;

  private readonly sink: AuditSink;
  private readonly batchSize: number;
  private readonly flushIntervalMs: number;
  private readonly queueCapacity: number;
  private readonly enqueueTimeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly retentionDays: number;
  private readonly log: Logger;

  constructor(sink: AuditSink, opts: BatchWriterOptions = {}) {
    this.sink = sink;
    this.batchSize = opts.batchSize ?? 100;
    this.flushIntervalMs = opts.flushIntervalMs ?? 5000;
    this.queueCapacity = opts.queueCapacity ?? 10_000;
    this.enqueueTimeoutMs = opts.enqueueTimeoutMs ?? 250;
    this.maxRetries = opts.maxRetries ?? 5;
    this.retryBaseDelayMs = opts.retryBaseDelayMs ?? 500;
    this.retentionDays = opts.retentionDays ?? 30;
    this.log = opts.logger ?? createLogger('writer');
  }

  /**
   * Accept an event. Resolves immediately while the queue has room;
   * otherwise waits for the next flush, at most `enqueueTimeoutMs`.
   * The event is buffered either way.
   */
  enqueue(event: CallEvent): Promise<void> {
    if (this.stopped) {
      return Promise.reject(new Error('BatchWriter is stopped'));
    }

    this.buffer.push(event);
    const overCapacity = this.buffer.length > this.queueCapacity;

    if (this.buffer.length >= this.batchSize || overCapacity) {
      this.requestFlush();
    }

    if (!overCapacity || this.degraded) {
      return Promise.resolve();
    }
    return this.waitForFlush(this.enqueueTimeoutMs);
  }

  /**
   * Write everything buffered. Concurrent callers share the in-flight
   * flush. Never rejects: failures are recorded and retried.
   */
  flush(): Promise<void> {
    if (this.inflight) return this.inflight;
    if (this.buffer.length === 0) return Promise.resolve();

    this.inflight = this.drain().finally(() => {
      this.inflight = null;
      this.releaseWaiters();
    });
    return this.inflight;
  }

  start(): void {
    if (this.running || this.stopped) return;
    this.running = true;

    this.flushTimer = setInterval(() => this.requestFlush(), this.flushIntervalMs);
    this.flushTimer.unref();

    if (this.retentionDays > 0) {
      this.applyRetention();
      this.retentionTimer = setInterval(() => this.applyRetention(), RETENTION_INTERVAL_MS);
      this.retentionTimer.unref();
    }
  }

  /**
   * Cancel the periodic task and write whatever is left.
   */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    this.running = false;
    this.clearTimers();

    if (this.inflight) await this.inflight;
    await this.flush();

    if (this.buffer.length > 0) {
      this.log.error(`Shutting down with ${this.buffer.length} unwritten event(s): ${this.lastError ?? 'unknown error'}`);
    }
    this.releaseWaiters();
  }

  /**
   * Delete audit records older than the retention period.
   */
  applyRetention(now: number = Date.now()): number {
    if (this.retentionDays <= 0) return 0;
    try {
      const removed = this.sink.pruneOlderThan(now - this.retentionDays * DAY_MS);
      if (removed > 0) {
        this.log.info(`Retention removed ${removed} record(s) older than ${this.retentionDays} day(s)`);
      }
      return removed;
    } catch (err) {
      this.log.warn(`Retention pass failed: ${errorMessage(err)}`);
      return 0;
    }
  }

  stats(): WriterStats {
    return {
      queued: this.buffer.length,
      written: this.written,
      duplicates: this.duplicates,
      failedFlushes: this.failedFlushes,
      consecutiveFailures: this.consecutiveFailures,
      degraded: this.degraded,
      lastFlushAt: this.lastFlushAt,
      lastError: this.lastError,
    };
  }

  isDegraded(): boolean {
    return this.degraded;
  }

  private requestFlush(): void {
    this.flush().catch((err: unknown) => {
      this.log.error(`Flush failed unexpectedly: ${errorMessage(err)}`);
    });
  }

  private async drain(): Promise<void> {
    // Let the current burst of enqueues land in this flush
    await Promise.resolve();

    while (this.buffer.length > 0) {
      const batch = this.buffer.splice(0, this.batchSize);
      try {
        const inserted = this.sink.insertBatch(batch, Date.now());
        this.written += inserted;
        this.duplicates += batch.length - inserted;
        this.lastFlushAt = Date.now();
        this.onSuccess();
      } catch (err) {
        this.buffer.unshift(...batch);
        this.onFailure(err);
        return;
      }
    }
  }

  private onSuccess(): void {
    this.consecutiveFailures = 0;
    if (this.degraded) {
      this.degraded = false;
      this.log.info('Audit store recovered, leaving degraded mode');
    }
  }

  private onFailure(err: unknown): void {
    this.failedFlushes++;
    this.consecutiveFailures++;
    this.lastError = errorMessage(err);

    if (!this.degraded && this.consecutiveFailures > this.maxRetries) {
      this.degraded = true;
      this.log.error(
        `Audit store failed ${this.consecutiveFailures} times in a row (${this.lastError}); ` +
          `entering degraded mode with ${this.buffer.length} event(s) buffered`,
      );
      return;
    }

    this.log.warn(`Flush of ${Math.min(this.buffer.length, this.batchSize)} event(s) failed: ${this.lastError}`);
    if (!this.degraded) this.scheduleRetry();
  }

  private scheduleRetry(): void {
    if (!this.running || this.retryTimer) return;
    const delay = this.retryBaseDelayMs * 2 ** (this.consecutiveFailures - 1);
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      this.requestFlush();
    }, delay);
    this.retryTimer.unref();
  }

  private waitForFlush(timeoutMs: number): Promise<void> {
    return new Promise((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        this.waiters = this.waiters.filter((w) => w !== done);
        resolve();
      };
      const timer = setTimeout(done, timeoutMs);
      this.waiters.push(done);
    });
  }

  private releaseWaiters(): void {
    const waiting = this.waiters;
    this.waiters = [];
    for (const release of waiting) release();
  }

  private clearTimers(): void {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    if (this.retentionTimer) {
      clearInterval(this.retentionTimer);
      this.retentionTimer = null;
    }
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
