/**
 * SQLite Storage Layer
 *
 * Persistent storage for execution records, provider weights and status
 * counts. Uses better-sqlite3 for synchronous SQLite operations.
 */

import Database from 'better-sqlite3';
import { ResultStatus, RESULT_STATUSES, emptyStatusCounts, type ExecutionRecord } from '../core/types.js';
import type { LearningWeight } from '../learning/types.js';
import { rowToRecord } from './serialization.js';
import type { RecordRow, StorageConfig, WeightRow } from './types.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS execution_records (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    id TEXT NOT NULL UNIQUE,
    chain_id TEXT NOT NULL,
    request_json TEXT NOT NULL,
    plan_json TEXT NOT NULL,
    status TEXT NOT NULL,
    score REAL NOT NULL,
    execution_time_ms REAL NOT NULL,
    providers_used TEXT NOT NULL,
    error TEXT,
    user_satisfaction INTEGER,
    learning_value TEXT NOT NULL,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_records_chain ON execution_records(chain_id, seq DESC);
  CREATE INDEX IF NOT EXISTS idx_records_status ON execution_records(status);

  CREATE TABLE IF NOT EXISTS provider_weights (
    provider_id TEXT PRIMARY KEY,
    use_count INTEGER NOT NULL DEFAULT 0,
    success_count INTEGER NOT NULL DEFAULT 0,
    avg_score REAL NOT NULL,
    avg_latency_ms REAL NOT NULL DEFAULT 0,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS learning_status_counts (
    status TEXT PRIMARY KEY,
    count INTEGER NOT NULL DEFAULT 0
  );
`;

export class SQLiteStorage {
  private db: Database.Database;

  constructor(config: StorageConfig) {
    this.db = new Database(config.sqlitePath);

    if (config.enableWAL && config.sqlitePath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }

    this.db.exec(SCHEMA);
  }

  /**
   * Run fn inside a single SQLite transaction
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // ==========================================
  // EXECUTION RECORDS
  // ==========================================

  appendRecord(record: ExecutionRecord): void {
    this.db.prepare(`
      INSERT INTO execution_records (
        id, chain_id, request_json, plan_json, status, score, execution_time_ms,
        providers_used, error, user_satisfaction, learning_value, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      record.id,
      record.chainId,
      JSON.stringify(record.request),
      JSON.stringify(record.plan),
      record.status,
      record.score,
      record.executionTimeMs,
      JSON.stringify(record.providersUsed),
      record.error ?? null,
      record.userSatisfaction ?? null,
      record.learningValue,
      record.createdAt.toISOString()
    );
  }

  getRecord(id: string): ExecutionRecord | null {
    const row = this.db.prepare('SELECT * FROM execution_records WHERE id = ?').get(id) as RecordRow | undefined;
    return row ? rowToRecord(row) : null;
  }

  /**
   * Records of a chain, newest first
   */
  getRecordsByChain(chainId: string, limit: number = 100): ExecutionRecord[] {
    const rows = this.db.prepare(`
      SELECT * FROM execution_records WHERE chain_id = ? ORDER BY seq DESC LIMIT ?
    `).all(chainId, limit) as RecordRow[];
    return rows.map(rowToRecord);
  }

  /**
   * Records with the given status, newest first
   */
  getRecordsByStatus(status: ResultStatus, limit: number = 100): ExecutionRecord[] {
    const rows = this.db.prepare(`
      SELECT * FROM execution_records WHERE status = ? ORDER BY seq DESC LIMIT ?
    `).all(status, limit) as RecordRow[];
    return rows.map(rowToRecord);
  }

  /**
   * Chain of the most recent record that used any of the providers
   */
  getLatestChainForProviders(providerIds: readonly string[]): string | null {
    if (providerIds.length === 0) return null;

    // Unresolved plans invoke nothing, so match the plan primary as well
    const placeholders = providerIds.map(() => '?').join(',');
    const row = this.db.prepare(`
      SELECT r.chain_id AS chain_id
      FROM execution_records r
      WHERE EXISTS (SELECT 1 FROM json_each(r.providers_used) p WHERE p.value IN (${placeholders}))
        OR json_extract(r.plan_json, '$.primary') IN (${placeholders})
      ORDER BY r.seq DESC
      LIMIT 1
    `).get(...providerIds, ...providerIds) as { chain_id: string } | undefined;

    return row?.chain_id ?? null;
  }

  countRecords(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS count FROM execution_records').get() as { count: number };
    return row.count;
  }

  // ==========================================
  // PROVIDER WEIGHTS
  // ==========================================

  getWeight(providerId: string): LearningWeight | null {
    const row = this.db.prepare('SELECT * FROM provider_weights WHERE provider_id = ?').get(providerId) as WeightRow | undefined;
    return row ? rowToWeight(row) : null;
  }

  getAllWeights(): LearningWeight[] {
    const rows = this.db.prepare('SELECT * FROM provider_weights ORDER BY provider_id').all() as WeightRow[];
    return rows.map(rowToWeight);
  }

  upsertWeight(weight: LearningWeight): void {
    this.db.prepare(`
      INSERT INTO provider_weights (provider_id, use_count, success_count, avg_score, avg_latency_ms, updated_at)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(provider_id) DO UPDATE SET
        use_count = excluded.use_count,
        success_count = excluded.success_count,
        avg_score = excluded.avg_score,
        avg_latency_ms = excluded.avg_latency_ms,
        updated_at = excluded.updated_at
    `).run(
      weight.providerId,
      weight.useCount,
      weight.successCount,
      weight.avgScore,
      weight.avgLatencyMs,
      weight.updatedAt.toISOString()
    );
  }

  // ==========================================
  // STATUS COUNTS
  // ==========================================

  incrementStatusCount(status: ResultStatus): void {
    this.db.prepare(`
      INSERT INTO learning_status_counts (status, count) VALUES (?, 1)
      ON CONFLICT(status) DO UPDATE SET count = count + 1
    `).run(status);
  }

  getStatusCounts(): Record<ResultStatus, number> {
    const counts = emptyStatusCounts();
    const rows = this.db.prepare('SELECT status, count FROM learning_status_counts').all() as { status: string; count: number }[];
    for (const row of rows) {
      const status = RESULT_STATUSES.find(s => s === row.status);
      if (status) counts[status] = row.count;
    }
    return counts;
  }

  close(): void {
    this.db.close();
  }
}

function rowToWeight(row: WeightRow): LearningWeight {
  return {
    providerId: row.provider_id,
    useCount: row.use_count,
    successCount: row.success_count,
    avgScore: row.avg_score,
    avgLatencyMs: row.avg_latency_ms,
    updatedAt: new Date(row.updated_at)
  };
}
