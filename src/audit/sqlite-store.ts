/**
 * SQLite Audit Store
 *
 * Same AuditLog contract as the JSONL log, stored with better-sqlite3 so
 * turns can be filtered. Plan, verdict and results are kept as JSON
 * columns; the fields worth filtering on get their own columns.
 */

import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import type { AuditLog } from '../core/audit.js';
import type { AuditRecord, VerdictStatus } from '../core/types.js';

export interface AuditQuery {
  confirmed?: boolean;
  status?: VerdictStatus;
  limit?: number;
}

interface AuditRow {
  id: string;
  timestamp: string;
  raw_input: string;
  confirmed: number;
  plan_json: string | null;
  verdict_json: string | null;
  results_json: string;
  error: string | null;
}

export class SqliteAuditLog implements AuditLog {
  private db: Database.Database;

  constructor(dbPath: string = ':memory:') {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.initialize();
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS turn_records (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        timestamp TEXT NOT NULL,
        raw_input TEXT NOT NULL,
        mode TEXT,
        verdict_status TEXT,
        confirmed INTEGER NOT NULL,
        plan_json TEXT,
        verdict_json TEXT,
        results_json TEXT NOT NULL,
        error TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_turn_confirmed ON turn_records(confirmed);
      CREATE INDEX IF NOT EXISTS idx_turn_verdict ON turn_records(verdict_status);
    `);
  }

  append(record: AuditRecord): void {
    this.db.prepare(`
      INSERT INTO turn_records
        (id, timestamp, raw_input, mode, verdict_status, confirmed, plan_json, verdict_json, results_json, error)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      record.id,
      record.timestamp,
      record.raw_input,
      record.plan?.mode ?? null,
      record.verdict?.status ?? null,
      record.confirmed ? 1 : 0,
      record.plan ? JSON.stringify(record.plan) : null,
      record.verdict ? JSON.stringify(record.verdict) : null,
      JSON.stringify(record.results),
      record.error ?? null,
    );
  }

  read(limit?: number): AuditRecord[] {
    return this.query({ limit });
  }

  /**
   * Newest `limit` matching records, oldest first.
   */
  query(options: AuditQuery = {}): AuditRecord[] {
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (options.confirmed !== undefined) {
      conditions.push('confirmed = ?');
      params.push(options.confirmed ? 1 : 0);
    }
    if (options.status) {
      conditions.push('verdict_status = ?');
      params.push(options.status);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const limit = options.limit ?? -1;

    const rows = this.db.prepare<Array<string | number>, AuditRow>(
      `SELECT * FROM turn_records ${where} ORDER BY seq DESC LIMIT ?`
    ).all(...params, limit);

    return rows.reverse().map(toRecord);
  }

  count(): number {
    const row = this.db.prepare<[], { count: number }>(
      'SELECT COUNT(*) as count FROM turn_records'
    ).get();
    return row?.count ?? 0;
  }

  close(): void {
    this.db.close();
  }
}

function toRecord(row: AuditRow): AuditRecord {
  return {
    id: row.id,
    timestamp: row.timestamp,
    raw_input: row.raw_input,
    plan: row.plan_json ? JSON.parse(row.plan_json) : null,
    verdict: row.verdict_json ? JSON.parse(row.verdict_json) : null,
    confirmed: row.confirmed === 1,
    results: JSON.parse(row.results_json),
    ...(row.error !== null ? { error: row.error } : {}),
  };
}
