/**
 * Warden Gate Runner
 * Executes a single gate command with a hard wall-clock timeout
 */

import { spawn, type ChildProcess } from 'child_process';
import type { Gate, GateResult, GateStatus } from '../types/index.js';

export const MAX_OUTPUT_CHARS = 64_000;

// Shell exit codes for "found but not executable" and "not found"
const EXIT_NOT_EXECUTABLE = 126;
const EXIT_NOT_FOUND = 127;

export interface RunGateOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  maxOutputChars?: number;
}

export type GateRunnerFn = (gate: Gate, options: RunGateOptions) => Promise<GateResult>;

interface Settlement {
  status: GateStatus;
  exit_code: number | null;
  error?: string;
}

export function gateResult(gate: Gate, settlement: Settlement & { duration_ms: number; output?: string; truncated?: boolean }): GateResult {
  return {
    name: gate.name,
    status: settlement.status,
    success: settlement.status === 'passed',
    timed_out: settlement.status === 'timeout',
    exit_code: settlement.exit_code,
    duration_ms: settlement.duration_ms,
    output: settlement.output ?? '',
    truncated: settlement.truncated ?? false,
    required: gate.required,
    critical: gate.critical,
    ...(settlement.error !== undefined ? { error: settlement.error } : {}),
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Kill the gate's whole process group, so commands that fork (`sh -c "a && b"`)
 * do not outlive the timeout and hold the output pipes open.
 */
function killTree(child: ChildProcess): void {
  const pid = child.pid;
  if (pid !== undefined && process.platform !== 'win32') {
    try {
      process.kill(-pid, 'SIGKILL');
      return;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ESRCH') return;
      console.error(`[WARDEN] Process group kill failed for pid ${pid}:`, errorMessage(error));
    }
  }
  child.kill('SIGKILL');
}

function classifyExit(code: number | null, signal: NodeJS.Signals | null): Settlement {
  if (code === 0) return { status: 'passed', exit_code: 0 };
  if (code === EXIT_NOT_FOUND) {
    return { status: 'launch_error', exit_code: code, error: 'Command not found (exit 127)' };
  }
  if (code === EXIT_NOT_EXECUTABLE) {
    return { status: 'launch_error', exit_code: code, error: 'Command not executable (exit 126)' };
  }
  if (code === null) {
    return { status: 'failed', exit_code: null, error: `Terminated by ${signal ?? 'unknown signal'}` };
  }
  return { status: 'failed', exit_code: code, error: `Exited with code ${code}` };
}

/**
 * Run one gate. Always resolves: non-zero exits, timeouts and launch
 * failures are reported through the result's `status`.
 */
export function runGate(gate: Gate, options: RunGateOptions): Promise<GateResult> {
  const started = Date.now();
  const maxChars = options.maxOutputChars ?? MAX_OUTPUT_CHARS;

  return new Promise<GateResult>((resolve) => {
    let output = '';
    let truncated = false;
    let settled = false;
    let timer: NodeJS.Timeout | undefined;
    let child: ChildProcess | undefined;

    const onAbort = (): void => {
      if (child) killTree(child);
      settle({ status: 'timeout', exit_code: null, error: 'Aborted: run deadline exceeded' });
    };

    function settle(settlement: Settlement): void {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
      resolve(gateResult(gate, { ...settlement, duration_ms: Date.now() - started, output, truncated }));
    }

    function append(chunk: string): void {
      output += chunk;
      if (output.length > maxChars) {
        output = output.slice(output.length - maxChars);
        truncated = true;
      }
    }

    if (options.signal?.aborted) {
      settle({ status: 'timeout', exit_code: null, error: 'Aborted: run deadline exceeded' });
      return;
    }

    try {
      child = spawn(gate.command, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        shell: true,
        detached: process.platform !== 'win32',
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (error) {
      settle({ status: 'launch_error', exit_code: null, error: `Failed to launch: ${errorMessage(error)}` });
      return;
    }

    const proc = child;
    proc.stdout?.setEncoding('utf8');
    proc.stderr?.setEncoding('utf8');
    proc.stdout?.on('data', (chunk: string) => append(chunk));
    proc.stderr?.on('data', (chunk: string) => append(chunk));

    proc.on('error', (error) => {
      settle({ status: 'launch_error', exit_code: null, error: `Failed to launch: ${error.message}` });
    });

    proc.on('close', (code, signal) => {
      settle(classifyExit(code, signal));
    });

    timer = setTimeout(() => {
      killTree(proc);
      settle({ status: 'timeout', exit_code: null, error: `Timed out after ${gate.timeout_ms}ms` });
    }, gate.timeout_ms);

    options.signal?.addEventListener('abort', onAbort, { once: true });
  });
}
