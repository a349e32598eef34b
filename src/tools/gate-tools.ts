/**
 * Warden Gate Tools
 * run_gates, gate_history
 */

import { randomUUID } from 'crypto';
import { resolve } from 'path';
import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { AlertEvaluator, formatAlert } from '../gates/alerts.js';
import { findRecentFiles } from '../gates/changed-files.js';
import { GateOrchestrator } from '../gates/orchestrator.js';
import { formatGateReport } from '../gates/report.js';
import { selectApplicableGates } from '../gates/select.js';
import type { GateRunnerFn } from '../gates/runner.js';
import { parseInput, type ToolHandler, type WardenServices } from './shared.js';

const MAX_CHANGED_FILES = 50;

// ─── Tool Definitions ────────────────────────────────────────────

export const gateTools: Tool[] = [
  {
    name: 'warden_run_gates',
    description: 'Run the configured quality gates before ending a session. Returns per-gate results, the alert (if any) and whether session end is blocked.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        cwd: { type: 'string', description: 'Directory to run gate commands in (default: project directory)' },
        changed_files: { type: 'array', items: { type: 'string' }, description: 'Changed files used to select gates by file pattern. If omitted, recently modified files are used.' },
        gates: { type: 'array', items: { type: 'string' }, description: 'Only run these gates (by name)' },
        all: { type: 'boolean', description: 'Ignore file patterns and run every selected gate' },
        mode: { type: 'string', enum: ['parallel', 'sequential'], description: 'Execution mode (default from config)' },
        fail_fast: { type: 'boolean', description: 'Stop starting gates after a critical failure (default from config)' },
      },
    },
  },
  {
    name: 'warden_gate_history',
    description: 'List recent quality gate runs with their outcome and alert.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        limit: { type: 'number', description: 'Number of runs to return (default: 10)' },
      },
    },
  },
];

const RunGatesInput = z.object({
  cwd: z.string().optional(),
  changed_files: z.array(z.string()).optional(),
  gates: z.array(z.string()).optional(),
  all: z.boolean().default(false),
  mode: z.enum(['parallel', 'sequential']).optional(),
  fail_fast: z.boolean().optional(),
});

const HistoryInput = z.object({
  limit: z.number().int().positive().default(10),
});

// ─── Handler Factory ─────────────────────────────────────────────

export function createGateHandlers(services: WardenServices, runner?: GateRunnerFn): Record<string, ToolHandler> {
  const { config, db, now } = services;

  return {
    warden_run_gates: async (raw) => {
      const input = parseInput(RunGatesInput, raw);
      const startedAt = now().toISOString();
      const cwd = resolve(input.cwd ?? config.project_dir);

      let candidates = config.gates;
      if (input.gates) {
        const missing = input.gates.filter(name => !config.gates.some(g => g.name === name));
        if (missing.length > 0) {
          throw new Error(`Unknown gate(s): ${missing.join(', ')}`);
        }
        const wanted = new Set(input.gates);
        candidates = config.gates.filter(g => wanted.has(g.name));
      }

      let gates = candidates;
      let changedFiles: string[] = [];
      if (!input.all) {
        changedFiles = input.changed_files
          ?? await findRecentFiles(cwd, { window_ms: config.recent_files_window_ms, max_files: MAX_CHANGED_FILES, now });
        gates = selectApplicableGates(candidates, changedFiles);
      }

      if (gates.length === 0) {
        return {
          success: true,
          blocks_session: false,
          exit_code: 0,
          changed_files: changedFiles,
          results: [],
          alert: null,
          report: 'No applicable quality gates',
        };
      }

      const orchestrator = new GateOrchestrator(
        {
          ...config.orchestrator,
          mode: input.mode ?? config.orchestrator.mode,
          fail_fast: input.fail_fast ?? config.orchestrator.fail_fast,
          cwd,
        },
        runner,
      );
      const outcome = await orchestrator.run(gates);
      const evaluation = new AlertEvaluator(config.thresholds, 'quality-gates', now).evaluate(outcome.results);

      const record = db.recordRun(randomUUID(), startedAt, outcome, evaluation);
      db.pruneRuns(config.retention.runs_keep);

      const report = `${formatGateReport(outcome)}\n${formatAlert(evaluation)}`;
      console.error(`[WARDEN] Gate run ${record.id}: ${record.passed} passed, ${record.failed} failed, ${record.timed_out} timeout, ${record.skipped} skipped`);

      return {
        success: outcome.success,
        blocks_session: evaluation.blocks_session,
        exit_code: outcome.success && !evaluation.blocks_session ? 0 : 1,
        run_id: record.id,
        changed_files: changedFiles,
        results: outcome.results,
        critical_failures: outcome.critical_failures,
        rates: evaluation.rates,
        alert: evaluation.alert,
        report,
      };
    },

    warden_gate_history: async (raw) => {
      const input = parseInput(HistoryInput, raw);
      const runs = db.getRecentRuns(input.limit);
      return { success: true, count: runs.length, runs };
    },
  };
}
