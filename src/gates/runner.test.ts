import { describe, it, expect } from 'vitest';
import { tmpdir } from 'os';
import { runGate } from './runner.js';
import type { Gate } from '../types/index.js';

function gate(overrides: Partial<Gate>): Gate {
  return {
    name: 'gate',
    description: '',
    command: 'true',
    required: true,
    critical: false,
    timeout_ms: 5_000,
    file_patterns: [],
    ...overrides,
  };
}

const cwd = tmpdir();

describe('runGate', () => {
  it('passes on exit code 0 and captures stdout', async () => {
    const result = await runGate(gate({ name: 'echo', command: 'echo hello' }), { cwd });

    expect(result.name).toBe('echo');
    expect(result.status).toBe('passed');
    expect(result.success).toBe(true);
    expect(result.timed_out).toBe(false);
    expect(result.exit_code).toBe(0);
    expect(result.output).toBe('hello\n');
    expect(result.error).toBeUndefined();
  });

  it('captures stderr alongside stdout', async () => {
    const result = await runGate(gate({ command: 'echo oops 1>&2' }), { cwd });
    expect(result.output).toBe('oops\n');
  });

  it('reports a non-zero exit as a failure without throwing', async () => {
    const result = await runGate(gate({ command: 'exit 3', critical: true }), { cwd });

    expect(result.status).toBe('failed');
    expect(result.success).toBe(false);
    expect(result.timed_out).toBe(false);
    expect(result.exit_code).toBe(3);
    expect(result.error).toBe('Exited with code 3');
    expect(result.critical).toBe(true);
  });

  it('times out slow commands with a hard deadline', async () => {
    const started = Date.now();
    const result = await runGate(gate({ command: 'sleep 5', timeout_ms: 200 }), { cwd });

    expect(result.status).toBe('timeout');
    expect(result.timed_out).toBe(true);
    expect(result.success).toBe(false);
    expect(result.exit_code).toBeNull();
    expect(result.error).toBe('Timed out after 200ms');
    expect(Date.now() - started).toBeLessThan(3_000);
  });

  it('stays timed out even when the command would have succeeded later', async () => {
    const result = await runGate(gate({ command: 'sleep 1; exit 0', timeout_ms: 100 }), { cwd });
    expect(result.status).toBe('timeout');
    expect(result.success).toBe(false);
  });

  it('classifies a missing command as a launch error', async () => {
    const result = await runGate(gate({ command: 'definitely-not-a-real-command-4821' }), { cwd });

    expect(result.status).toBe('launch_error');
    expect(result.success).toBe(false);
    expect(result.exit_code).toBe(127);
    expect(result.error).toBe('Command not found (exit 127)');
  });

  it('converts a spawn failure into a launch error result', async () => {
    const result = await runGate(gate({ command: 'echo never' }), { cwd: '/nonexistent/warden/dir' });

    expect(result.status).toBe('launch_error');
    expect(result.success).toBe(false);
    expect(result.exit_code).toBeNull();
    expect(result.error).toMatch(/^Failed to launch: /);
  });

  it('keeps only the tail of oversized output', async () => {
    const result = await runGate(gate({ command: 'printf abcdefghij' }), { cwd, maxOutputChars: 4 });

    expect(result.output).toBe('ghij');
    expect(result.truncated).toBe(true);
  });

  it('stops when the abort signal fires', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);

    const result = await runGate(gate({ command: 'sleep 5', timeout_ms: 10_000 }), { cwd, signal: controller.signal });

    expect(result.status).toBe('timeout');
    expect(result.timed_out).toBe(true);
    expect(result.error).toBe('Aborted: run deadline exceeded');
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await runGate(gate({ command: 'echo hi' }), { cwd, signal: controller.signal });

    expect(result.status).toBe('timeout');
    expect(result.output).toBe('');
  });
});
