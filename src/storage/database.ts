/**
 * Warden Database
 * SQLite history of gate runs and the alert each one produced
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import type { Alert, AlertEvaluation, GateRunOutcome, GateRunRecord } from '../types/index.js';

const RunRowSchema = z.object({
  id: z.string(),
  started_at: z.string(),
  mode: z.enum(['parallel', 'sequential']),
  success: z.number(),
  passed: z.number(),
  failed: z.number(),
  timed_out: z.number(),
  skipped: z.number(),
  duration_ms: z.number(),
  gate_names_json: z.string(),
  alert_json: z.string().nullable(),
  blocks_session: z.number(),
});

const AlertSchema = z.object({
  severity: z.enum(['CRITICAL', 'HIGH', 'MEDIUM', 'LOW', 'INFO']),
  category: z.enum(['failure-rate', 'timeout-rate']),
  message: z.string(),
  source: z.string(),
  timestamp: z.string(),
  context: z.record(z.unknown()).optional(),
});

export class WardenDatabase {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dbDir = dirname(dbPath);
      if (!existsSync(dbDir)) {
        mkdirSync(dbDir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.initialize();
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS gate_runs (
        id TEXT PRIMARY KEY,
        started_at TEXT NOT NULL,
        mode TEXT NOT NULL,
        success INTEGER NOT NULL,
        passed INTEGER NOT NULL DEFAULT 0,
        failed INTEGER NOT NULL DEFAULT 0,
        timed_out INTEGER NOT NULL DEFAULT 0,
        skipped INTEGER NOT NULL DEFAULT 0,
        duration_ms INTEGER NOT NULL DEFAULT 0,
        gate_names_json TEXT NOT NULL,
        alert_json TEXT,
        blocks_session INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX IF NOT EXISTS idx_gate_runs_started_at
        ON gate_runs(started_at DESC);
    `);
  }

  // ─── Runs ────────────────────────────────────────────────────

  recordRun(id: string, startedAt: string, outcome: GateRunOutcome, evaluation: AlertEvaluation): GateRunRecord {
    const count = (predicate: (status: string) => boolean): number =>
      outcome.results.filter(r => predicate(r.status)).length;

    const record: GateRunRecord = {
      id,
      started_at: startedAt,
      mode: outcome.mode,
      success: outcome.success,
      passed: count(s => s === 'passed'),
      failed: count(s => s === 'failed' || s === 'launch_error'),
      timed_out: count(s => s === 'timeout'),
      skipped: count(s => s === 'skipped'),
      duration_ms: outcome.duration_ms,
      gate_names: outcome.results.map(r => r.name),
      alert: evaluation.alert,
      blocks_session: evaluation.blocks_session,
    };

    this.db.prepare(`
      INSERT INTO gate_runs (id, started_at, mode, success, passed, failed, timed_out, skipped, duration_ms, gate_names_json, alert_json, blocks_session)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      record.id,
      record.started_at,
      record.mode,
      record.success ? 1 : 0,
      record.passed,
      record.failed,
      record.timed_out,
      record.skipped,
      record.duration_ms,
      JSON.stringify(record.gate_names),
      record.alert ? JSON.stringify(record.alert) : null,
      record.blocks_session ? 1 : 0,
    );

    return record;
  }

  getRecentRuns(limit: number = 10): GateRunRecord[] {
    const rows: unknown[] = this.db.prepare(`
      SELECT * FROM gate_runs ORDER BY started_at DESC, rowid DESC LIMIT ?
    `).all(limit);

    const records: GateRunRecord[] = [];
    for (const row of rows) {
      const record = this.rowToRun(row);
      if (record) records.push(record);
    }
    return records;
  }

  private rowToRun(row: unknown): GateRunRecord | null {
    const parsed = RunRowSchema.safeParse(row);
    if (!parsed.success) {
      console.error('[WARDEN] Skipping malformed gate run row:', parsed.error.message);
      return null;
    }
    const r = parsed.data;

    let alert: Alert | null = null;
    let gateNames: string[] = [];
    try {
      gateNames = z.array(z.string()).parse(JSON.parse(r.gate_names_json));
      alert = r.alert_json ? AlertSchema.parse(JSON.parse(r.alert_json)) : null;
    } catch (error) {
      console.error(`[WARDEN] Skipping gate run ${r.id}:`, error instanceof Error ? error.message : String(error));
      return null;
    }

    return {
      id: r.id,
      started_at: r.started_at,
      mode: r.mode,
      success: r.success === 1,
      passed: r.passed,
      failed: r.failed,
      timed_out: r.timed_out,
      skipped: r.skipped,
      duration_ms: r.duration_ms,
      gate_names: gateNames,
      alert,
      blocks_session: r.blocks_session === 1,
    };
  }

  // ─── Cleanup ─────────────────────────────────────────────────

  pruneRuns(keepCount: number = 200): number {
    const result = this.db.prepare(`
      DELETE FROM gate_runs WHERE id NOT IN (
        SELECT id FROM gate_runs ORDER BY started_at DESC, rowid DESC LIMIT ?
      )
    `).run(keepCount);
    return result.changes;
  }

  close(): void {
    this.db.close();
  }
}
