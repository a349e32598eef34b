/**
 * Warden Types
 * Core type definitions for gates, alerts, backups and handoffs
 */

// ─── Gates ───────────────────────────────────────────────────────

export interface Gate {
  readonly name: string;
  readonly description: string;
  readonly command: string;
  readonly required: boolean;
  readonly critical: boolean;
  readonly timeout_ms: number;
  readonly file_patterns: readonly string[];
}

export type GateStatus = 'passed' | 'failed' | 'timeout' | 'skipped' | 'launch_error';

export interface GateResult {
  readonly name: string;
  readonly status: GateStatus;
  readonly success: boolean;
  readonly timed_out: boolean;
  readonly exit_code: number | null;
  readonly duration_ms: number;
  readonly output: string;
  readonly truncated: boolean;
  readonly required: boolean;
  readonly critical: boolean;
  readonly error?: string;
}

export type ExecutionMode = 'parallel' | 'sequential';

export interface GateRunOutcome {
  success: boolean;
  mode: ExecutionMode;
  results: GateResult[];
  duration_ms: number;
  critical_failures: string[];
}

// ─── Alerts ──────────────────────────────────────────────────────

export type AlertSeverity = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW' | 'INFO';

export type AlertCategory = 'failure-rate' | 'timeout-rate';

export interface SeverityThreshold {
  failure_rate: number;
  timeout_rate: number;
}

export type ThresholdTable = Partial<Record<AlertSeverity, SeverityThreshold>>;

export interface GateRates {
  total: number;
  failed: number;
  timed_out: number;
  skipped: number;
  failure_rate: number;
  timeout_rate: number;
}

export interface Alert {
  severity: AlertSeverity;
  category: AlertCategory;
  message: string;
  source: string;
  timestamp: string;
  context?: Record<string, unknown>;
}

export interface AlertEvaluation {
  alert: Alert | null;
  blocks_session: boolean;
  rates: GateRates;
}

// ─── Backups ─────────────────────────────────────────────────────

export interface BackupMetadata {
  backup_id: string;
  timestamp: string;
  root_dir: string;
  files_backed_up: string[];
  reason: string;
  restore_command: string;
}

export type BackupCreateResult =
  | { success: true; metadata: BackupMetadata }
  | { success: false; error: string };

export type BackupRestoreResult =
  | { success: true; backup_id: string; target_dir: string; restored: string[] }
  | { success: false; error: string };

// ─── Handoffs ────────────────────────────────────────────────────

export interface Handoff {
  from_session: string;
  to_session: string;
  completed_tasks: string[];
  next_steps: string[];
  artifacts: string[];
  timestamp: string;
  context_snapshot: Record<string, unknown>;
  notes: string;
}

export interface StoredHandoff extends Handoff {
  id: string;
}

export interface SavedHandoff {
  handoff: StoredHandoff;
  markdown_path: string;
  json_path: string;
}

export interface SessionData {
  session_id?: string;
  to_session?: string;
  completed_tasks?: string | string[];
  next_steps?: string | string[];
  artifacts?: string[];
  context?: Record<string, unknown>;
  notes?: string;
}

// ─── Persisted Records ───────────────────────────────────────────

export interface RecordScan<T> {
  entries: T[];
  corrupt: string[];
  incomplete: string[];
}

export interface GateRunRecord {
  id: string;
  started_at: string;
  mode: ExecutionMode;
  success: boolean;
  passed: number;
  failed: number;
  timed_out: number;
  skipped: number;
  duration_ms: number;
  gate_names: string[];
  alert: Alert | null;
  blocks_session: boolean;
}

// ─── Config ──────────────────────────────────────────────────────

export interface OrchestratorSettings {
  mode: ExecutionMode;
  fail_fast: boolean;
  global_timeout_ms: number;
  max_concurrency: number;
}

export interface RetentionSettings {
  backups_keep: number;
  handoffs_keep: number;
  runs_keep: number;
}

export interface WardenConfig {
  data_dir: string;
  backups_dir: string;
  handoffs_dir: string;
  db_path: string;
  project_dir: string;
  gates: Gate[];
  thresholds: ThresholdTable;
  orchestrator: OrchestratorSettings;
  retention: RetentionSettings;
  context_files: string[];
  context_max_bytes: number;
  recent_files_window_ms: number;
}
