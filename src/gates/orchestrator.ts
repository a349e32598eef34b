/**
 * Warden Gate Orchestrator
 * Runs gates in parallel or in sequence with fail-fast and a global deadline
 */

import { gateResult, runGate, type GateRunnerFn } from './runner.js';
import type { ExecutionMode, Gate, GateResult, GateRunOutcome } from '../types/index.js';

export interface OrchestratorOptions {
  mode: ExecutionMode;
  fail_fast: boolean;
  global_timeout_ms: number;
  max_concurrency: number;
  cwd: string;
  env?: NodeJS.ProcessEnv;
}

const SKIPPED_REASON = 'Skipped: an earlier critical gate failed';
const DEADLINE_REASON = 'Not started: run deadline exceeded';

export class GateOrchestrator {
  constructor(
    private readonly options: OrchestratorOptions,
    private readonly runner: GateRunnerFn = runGate,
  ) {}

  async run(gates: readonly Gate[]): Promise<GateRunOutcome> {
    const started = Date.now();
    const results: Array<GateResult | undefined> = gates.map(() => undefined);
    const controller = new AbortController();
    const deadline = setTimeout(() => controller.abort(), this.options.global_timeout_ms);
    let halted = false;

    // One step of either mode: decide whether gate `index` still starts,
    // run it, and trip fail-fast on a critical failure.
    const step = async (index: number): Promise<void> => {
      const gate = gates[index];
      if (halted) {
        results[index] = gateResult(gate, { status: 'skipped', exit_code: null, duration_ms: 0, error: SKIPPED_REASON });
        return;
      }
      if (controller.signal.aborted) {
        results[index] = gateResult(gate, { status: 'timeout', exit_code: null, duration_ms: 0, error: DEADLINE_REASON });
        return;
      }
      const result = await this.execute(gate, controller.signal);
      results[index] = result;
      if (this.options.fail_fast && gate.critical && !result.success) {
        halted = true;
      }
    };

    try {
      if (this.options.mode === 'sequential') {
        for (let i = 0; i < gates.length; i++) {
          await step(i);
        }
      } else {
        let next = 0;
        const worker = async (): Promise<void> => {
          while (next < gates.length) {
            const index = next++;
            await step(index);
          }
        };
        const width = Math.max(1, Math.min(this.options.max_concurrency, gates.length));
        await Promise.all(Array.from({ length: width }, () => worker()));
      }
    } finally {
      clearTimeout(deadline);
    }

    const ordered = results.map((result, i) =>
      result ?? gateResult(gates[i], { status: 'skipped', exit_code: null, duration_ms: 0, error: SKIPPED_REASON }),
    );
    const criticalFailures = ordered
      .filter(r => r.critical && !r.success && r.status !== 'skipped')
      .map(r => r.name);

    return {
      success: criticalFailures.length === 0,
      mode: this.options.mode,
      results: ordered,
      duration_ms: Date.now() - started,
      critical_failures: criticalFailures,
    };
  }

  private async execute(gate: Gate, signal: AbortSignal): Promise<GateResult> {
    const started = Date.now();
    try {
      return await this.runner(gate, { cwd: this.options.cwd, env: this.options.env, signal });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return gateResult(gate, {
        status: 'launch_error',
        exit_code: null,
        duration_ms: Date.now() - started,
        error: `Runner failed: ${message}`,
      });
    }
  }
}
