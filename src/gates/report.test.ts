import { describe, it, expect } from 'vitest';
import { formatGateReport } from './report.js';
import { gateResult } from './runner.js';
import type { Gate, GateRunOutcome } from '../types/index.js';

function gate(name: string, overrides: Partial<Gate> = {}): Gate {
  return {
    name,
    description: '',
    command: 'true',
    required: true,
    critical: false,
    timeout_ms: 1_000,
    file_patterns: [],
    ...overrides,
  };
}

describe('formatGateReport', () => {
  it('summarizes counts and lists each gate in order', () => {
    const outcome: GateRunOutcome = {
      success: false,
      mode: 'sequential',
      duration_ms: 40,
      critical_failures: ['typecheck'],
      results: [
        gateResult(gate('typecheck', { critical: true }), {
          status: 'failed', exit_code: 2, duration_ms: 30, error: 'Exited with code 2',
        }),
        gateResult(gate('format', { required: false }), {
          status: 'skipped', exit_code: null, duration_ms: 0, error: 'Skipped: an earlier critical gate failed',
        }),
      ],
    };

    expect(formatGateReport(outcome)).toBe([
      'Quality Gates: 0 passed, 1 failed, 0 timeout, 1 skipped (sequential)',
      '  [FAIL] typecheck (30ms) {critical}',
      '     Exited with code 2',
      '  [SKIP] format (0ms) {optional}',
      '     Skipped: an earlier critical gate failed',
      'Critical gate failure: typecheck',
    ].join('\n'));
  });

  it('counts launch errors as failures and truncates long errors', () => {
    const longError = 'x'.repeat(150);
    const outcome: GateRunOutcome = {
      success: true,
      mode: 'parallel',
      duration_ms: 5,
      critical_failures: [],
      results: [
        gateResult(gate('lint'), { status: 'launch_error', exit_code: 127, duration_ms: 5, error: longError }),
        gateResult(gate('tests'), { status: 'passed', exit_code: 0, duration_ms: 4 }),
      ],
    };

    const lines = formatGateReport(outcome).split('\n');
    expect(lines[0]).toBe('Quality Gates: 1 passed, 1 failed, 0 timeout, 0 skipped (parallel)');
    expect(lines[1]).toBe('  [ERROR] lint (5ms)');
    expect(lines[2]).toBe(`     ${'x'.repeat(100)}`);
    expect(lines[3]).toBe('  [PASS] tests (4ms)');
    expect(lines).toHaveLength(4);
  });
});
