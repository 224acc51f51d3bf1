/**
 * SQLite Audit Store
 *
 * Durable record of every call event, written in batches by the
 * BatchWriter and read back for range queries and reconciliation against
 * the in-memory metrics.
 *
 * @packageDocumentation
 */

import Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

import { SCHEMA_SQL, SCHEMA_VERSION } from './schema.js';
import type { AuditRecord, CallEvent, TierMetrics } from '../types.js';

/**
 * Default database path.
 */
export function getDefaultDbPath(): string {
  return path.join(os.homedir(), '.cachegate', 'audit.db');
}

export interface AuditQuery {
  /** Inclusive lower bound, ms since epoch */
  from?: number;
  /** Inclusive upper bound, ms since epoch */
  to?: number;
  tier?: string;
  limit?: number;
}

/**
 * Write side of the store, as seen by the BatchWriter.
 */
export interface AuditSink {
  /** Insert events in one transaction; returns rows actually inserted. */
  insertBatch(events: readonly CallEvent[], writtenAt: number): number;
  /** Delete records older than `cutoff`; returns rows deleted. */
  pruneOlderThan(cutoff: number): number;
}

interface AuditRow {
  eventId: string;
  timestamp: number;
  requestedModel: string;
  model: string;
  providerId: string;
  tier: string;
  inputTokens: number;
  outputTokens: number;
  costUsd: number | null;
  wouldBeCostUsd: number | null;
  savingsUsd: number;
  latencyMs: number;
  cacheHit: number;
  success: number;
  streamed: number;
  errorCode: string | null;
  source: string | null;
  agentType: string | null;
  writtenAt: number;
}

const SELECT_COLUMNS = `
  event_id as eventId, timestamp, requested_model as requestedModel, model, provider_id as providerId,
  tier, input_tokens as inputTokens, output_tokens as outputTokens, cost_usd as costUsd,
  would_be_cost_usd as wouldBeCostUsd, savings_usd as savingsUsd, latency_ms as latencyMs,
  cache_hit as cacheHit, success, streamed, error_code as errorCode, source, agent_type as agentType,
  written_at as writtenAt
`;

const DEFAULT_QUERY_LIMIT = 1000;

export class AuditStore implements AuditSink {
  private db: Database.Database;
  private readonly dbPath: string;
  private readonly insertStmt: Database.Statement<unknown[]>;

  /**
   * @param dbPath - SQLite file, or `:memory:`. Defaults to ~/.cachegate/audit.db
   */
  constructor(dbPath?: string) {
    this.dbPath = dbPath ?? getDefaultDbPath();

    if (this.dbPath !== ':memory:') {
      const dir = path.dirname(this.dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(SCHEMA_SQL);
    this.db.pragma(`user_version = ${SCHEMA_VERSION}`);

    this.insertStmt = this.db.prepare(`
      INSERT OR IGNORE INTO audit_records (
        event_id, timestamp, requested_model, model, provider_id, tier, input_tokens, output_tokens,
        cost_usd, would_be_cost_usd, savings_usd, latency_ms, cache_hit, success, streamed,
        error_code, source, agent_type, written_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
  }

  close(): void {
    this.db.close();
  }

  getDbPath(): string {
    return this.dbPath;
  }

  insertBatch(events: readonly CallEvent[], writtenAt: number = Date.now()): number {
    const insertAll = this.db.transaction((batch: readonly CallEvent[]) => {
      let inserted = 0;
      for (const e of batch) {
        const result = this.insertStmt.run(
          e.id,
          e.timestamp,
          e.requestedModel,
          e.model,
          e.providerId,
          e.tier,
          e.inputTokens,
          e.outputTokens,
          e.costUsd,
          e.wouldBeCostUsd,
          e.savingsUsd,
          Math.round(e.latencyMs),
          e.cacheHit ? 1 : 0,
          e.success ? 1 : 0,
          e.streamed ? 1 : 0,
          e.errorCode ?? null,
          e.source ?? null,
          e.agentType ?? null,
          writtenAt,
        );
        inserted += result.changes;
      }
      return inserted;
    });

    return insertAll(events);
  }

  /**
   * Records in a time range, oldest first.
   */
  query(options: AuditQuery = {}): AuditRecord[] {
    const { whereClause, params } = buildWhere(options);
    const stmt = this.db.prepare<unknown[], AuditRow>(`
      SELECT ${SELECT_COLUMNS}
      FROM audit_records
      ${whereClause}
      ORDER BY timestamp ASC, id ASC
      LIMIT ?
    `);

    return stmt.all(...params, options.limit ?? DEFAULT_QUERY_LIMIT).map(rowToRecord);
  }

  count(options: Omit<AuditQuery, 'limit'> = {}): number {
    const { whereClause, params } = buildWhere(options);
    const stmt = this.db.prepare<unknown[], { count: number }>(
      `SELECT COUNT(*) as count FROM audit_records ${whereClause}`,
    );
    return stmt.get(...params)?.count ?? 0;
  }

  /**
   * Per-tier totals over a time range, shaped like the in-memory tier
   * metrics so the two can be reconciled.
   */
  summarizeByTier(options: Pick<AuditQuery, 'from' | 'to'> = {}): TierMetrics[] {
    const { whereClause, params } = buildWhere(options);
    const stmt = this.db.prepare<unknown[], TierMetrics>(`
      SELECT
        tier,
        COUNT(*) as calls,
        TOTAL(cache_hit) as cacheHits,
        TOTAL(1 - success) as errors,
        TOTAL(input_tokens) as inputTokens,
        TOTAL(output_tokens) as outputTokens,
        TOTAL(cost_usd) as costUsd,
        TOTAL(would_be_cost_usd) as wouldBeCostUsd,
        TOTAL(savings_usd) as savingsUsd,
        TOTAL(CASE WHEN cost_usd IS NULL AND success = 1 THEN 1 ELSE 0 END) as unpricedCalls
      FROM audit_records
      ${whereClause}
      GROUP BY tier
      ORDER BY tier ASC
    `);
    return stmt.all(...params);
  }

  pruneOlderThan(cutoff: number): number {
    return this.db.prepare('DELETE FROM audit_records WHERE timestamp < ?').run(cutoff).changes;
  }
}

function buildWhere(options: Omit<AuditQuery, 'limit'>): { whereClause: string; params: unknown[] } {
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (options.from !== undefined) {
    conditions.push('timestamp >= ?');
    params.push(options.from);
  }

  if (options.to !== undefined) {
    conditions.push('timestamp <= ?');
    params.push(options.to);
  }

  if (options.tier) {
    conditions.push('tier = ?');
    params.push(options.tier);
  }

  const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  return { whereClause, params };
}

function rowToRecord(row: AuditRow): AuditRecord {
  const record: AuditRecord = {
    id: row.eventId,
    timestamp: row.timestamp,
    requestedModel: row.requestedModel,
    model: row.model,
    providerId: row.providerId,
    tier: row.tier,
    inputTokens: row.inputTokens,
    outputTokens: row.outputTokens,
    costUsd: row.costUsd,
    wouldBeCostUsd: row.wouldBeCostUsd,
    savingsUsd: row.savingsUsd,
    latencyMs: row.latencyMs,
    cacheHit: Boolean(row.cacheHit),
    success: Boolean(row.success),
    streamed: Boolean(row.streamed),
    writtenAt: row.writtenAt,
  };
  if (row.errorCode !== null) record.errorCode = row.errorCode;
  if (row.source !== null) record.source = row.source;
  if (row.agentType !== null) record.agentType = row.agentType;
  return record;
}
