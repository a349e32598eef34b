import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { WardenMCPServer } from './mcp-server.js';
import { BackupManager } from '../storage/backup-store.js';
import { HandoffWriter } from '../storage/handoff-store.js';
import { WardenDatabase } from '../storage/database.js';
import { buildDefaults } from '../storage/config.js';
import type { WardenServices } from '../tools/shared.js';
import type { Gate, WardenConfig } from '../types/index.js';

function gate(name: string, command: string, overrides: Partial<Gate> = {}): Gate {
  return {
    name,
    description: '',
    command,
    required: true,
    critical: false,
    timeout_ms: 5_000,
    file_patterns: [],
    ...overrides,
  };
}

type CallResult = Awaited<ReturnType<WardenMCPServer['callTool']>>;

function payload(result: CallResult): Record<string, unknown> {
  const [first] = result.content;
  if (!first) throw new Error('empty tool response');
  return JSON.parse(first.text);
}

describe('WardenMCPServer', () => {
  let base: string;
  let project: string;
  let server: WardenMCPServer;
  const now = (): Date => new Date('2025-04-02T09:30:00.000Z');

  beforeEach(() => {
    base = mkdtempSync(join(tmpdir(), 'warden-server-'));
    project = join(base, 'project');
    mkdirSync(project);
    writeFileSync(join(project, 'CLAUDE.md'), '# project rules\n');
    writeFileSync(join(project, 'notes.md'), 'first draft\n');

    const config: WardenConfig = {
      ...buildDefaults(join(base, 'data')),
      project_dir: project,
      gates: [
        gate('typecheck', 'exit 1', { critical: true, file_patterns: ['*.ts'] }),
        gate('docs', 'exit 0', { file_patterns: ['*.md'] }),
        gate('always', 'echo ok'),
      ],
      orchestrator: { mode: 'sequential', fail_fast: true, global_timeout_ms: 10_000, max_concurrency: 2 },
      context_files: ['CLAUDE.md', '.context/missing.md'],
    };
    const services: WardenServices = {
      config,
      db: new WardenDatabase(':memory:'),
      backups: new BackupManager({ backupsDir: config.backups_dir, rootDir: project, now }),
      handoffs: new HandoffWriter({
        handoffsDir: config.handoffs_dir,
        contextFiles: config.context_files,
        contextRoot: project,
        now,
      }),
      now,
    };
    server = new WardenMCPServer(services);
  });

  afterEach(() => {
    server.close();
    rmSync(base, { recursive: true, force: true });
  });

  it('registers every tool', () => {
    expect(server.listTools().map(t => t.name)).toEqual([
      'warden_run_gates',
      'warden_gate_history',
      'warden_backup_create',
      'warden_backup_list',
      'warden_backup_restore',
      'warden_backup_prune',
      'warden_handoff_create',
      'warden_handoff_list',
      'warden_handoff_load',
      'warden_handoff_prune',
      'warden_pre_compact',
    ]);
  });

  it('reports unknown tools as errors', async () => {
    const result = await server.callTool('warden_nope', {});
    expect(result.isError).toBe(true);
    expect(payload(result)).toEqual({ error: 'Unknown tool: warden_nope' });
  });

  it('reports invalid input as errors', async () => {
    const result = await server.callTool('warden_run_gates', { mode: 'turbo' });
    expect(result.isError).toBe(true);
    expect(String(payload(result).error)).toMatch(/^Invalid input: mode: /);
  });

  describe('warden_run_gates', () => {
    it('runs the gates matching the change set and blocks on a critical failure', async () => {
      const result = payload(await server.callTool('warden_run_gates', { changed_files: ['src/app.ts'] }));

      expect(result.success).toBe(false);
      expect(result.blocks_session).toBe(true);
      expect(result.exit_code).toBe(1);
      expect(result.critical_failures).toEqual(['typecheck']);
      const lines = String(result.report).split('\n');
      expect(lines[0]).toBe('Quality Gates: 0 passed, 1 failed, 0 timeout, 1 skipped (sequential)');
      expect(lines[1]).toMatch(/^  \[FAIL\] typecheck \(\d+ms\) \{critical\}$/);
      expect(lines.slice(2)).toEqual([
        '     Exited with code 1',
        '  [SKIP] always (0ms)',
        '     Skipped: an earlier critical gate failed',
        'Critical gate failure: typecheck',
        '[CRITICAL] Failure rate: 50.0% >= 50.0%',
        'Session end blocked due to critical quality issues',
      ]);

      const history = payload(await server.callTool('warden_gate_history', {}));
      expect(history.count).toBe(1);
    });

    it('passes when only non-critical gates apply', async () => {
      const result = payload(await server.callTool('warden_run_gates', { changed_files: ['README.md'], mode: 'parallel' }));

      expect(result.success).toBe(true);
      expect(result.blocks_session).toBe(false);
      expect(result.exit_code).toBe(0);
      expect(result.alert).toBeNull();
    });

    it('returns early when no gate applies', async () => {
      const result = payload(await server.callTool('warden_run_gates', { changed_files: ['image.png'], gates: ['typecheck'] }));

      expect(result).toEqual({
        success: true,
        blocks_session: false,
        exit_code: 0,
        changed_files: ['image.png'],
        results: [],
        alert: null,
        report: 'No applicable quality gates',
      });
    });

    it('rejects unknown gate names', async () => {
      const result = await server.callTool('warden_run_gates', { gates: ['typecheck', 'lint'], all: true });
      expect(result.isError).toBe(true);
      expect(payload(result)).toEqual({ error: 'Unknown gate(s): lint' });
    });
  });

  describe('backups', () => {
    it('creates, lists and restores the latest backup', async () => {
      const created = payload(await server.callTool('warden_backup_create', { files: ['notes.md'] }));
      expect(created.success).toBe(true);

      writeFileSync(join(project, 'notes.md'), 'overwritten\n');

      const listed = payload(await server.callTool('warden_backup_list', {}));
      expect(listed.count).toBe(1);

      const restored = payload(await server.callTool('warden_backup_restore', {}));
      expect(restored).toEqual({
        success: true,
        backup_id: '20250402-093000-000',
        target_dir: project,
        restored: ['notes.md'],
      });
      expect(readFileSync(join(project, 'notes.md'), 'utf-8')).toBe('first draft\n');
    });

    it('reports when there is nothing to restore', async () => {
      expect(payload(await server.callTool('warden_backup_restore', {}))).toEqual({
        success: false,
        error: 'No backups found',
      });
    });
  });

  describe('handoffs', () => {
    it('creates a handoff and loads it back as the latest', async () => {
      const created = payload(await server.callTool('warden_handoff_create', {
        completed_tasks: '- wrote parser\n- fixed lexer',
        next_steps: ['add tests'],
        notes: 'check the cache',
      }));
      expect(created.handoff_id).toBe('handoff-20250402-093000-000-now');
      expect(created.completed_tasks).toBe(2);

      const loaded = payload(await server.callTool('warden_handoff_load', {}));
      expect(loaded.success).toBe(true);
      expect(loaded.age_hours).toBe(0);
      expect(String(loaded.handoff_markdown)).toContain('- [OK] fixed lexer\n');
    });

    it('reports a missing handoff', async () => {
      expect(payload(await server.callTool('warden_handoff_load', { handoff_id: 'handoff-missing' }))).toEqual({
        success: false,
        message: 'Handoff "handoff-missing" not found',
      });
    });
  });

  describe('warden_pre_compact', () => {
    it('writes a handoff and backs up the existing context files', async () => {
      const result = payload(await server.callTool('warden_pre_compact', { session_id: 'sess-7' }));

      expect(result.success).toBe(true);
      expect(result.handoff_id).toBe('handoff-20250402-093000-000-sess-7');
      expect(result.backup_error).toBeNull();
      expect(result.backup).toMatchObject({
        backup_id: '20250402-093000-000',
        files_backed_up: ['CLAUDE.md'],
        reason: 'pre-compact',
      });

      const loaded = payload(await server.callTool('warden_handoff_load', {}));
      expect(loaded.handoff).toMatchObject({
        from_session: 'sess-7',
        notes: 'Pre-compact snapshot - 2025-04-02T09:30:00.000Z',
        context_snapshot: { 'CLAUDE.md': '# project rules\n' },
      });
    });
  });
});
