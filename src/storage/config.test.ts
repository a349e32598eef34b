import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigError, DEFAULT_GATES, loadConfig } from './config.js';
import { DEFAULT_THRESHOLDS } from '../gates/alerts.js';

describe('loadConfig', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = mkdtempSync(join(tmpdir(), 'warden-config-'));
  });

  afterEach(() => {
    rmSync(dataDir, { recursive: true, force: true });
  });

  function writeConfig(value: unknown): void {
    writeFileSync(join(dataDir, 'config.json'), JSON.stringify(value));
  }

  it('writes defaults on first run and creates the store directories', () => {
    const config = loadConfig(dataDir);

    expect(config.gates).toEqual(DEFAULT_GATES);
    expect(config.thresholds).toEqual(DEFAULT_THRESHOLDS);
    expect(config.backups_dir).toBe(join(dataDir, 'backups'));
    expect(config.handoffs_dir).toBe(join(dataDir, 'handoffs'));
    expect(config.db_path).toBe(join(dataDir, 'state.db'));
    expect(existsSync(config.backups_dir)).toBe(true);
    expect(existsSync(config.handoffs_dir)).toBe(true);

    const written = JSON.parse(readFileSync(join(dataDir, 'config.json'), 'utf-8'));
    expect(written.gates).toEqual(DEFAULT_GATES);
    expect(written.retention).toEqual({ backups_keep: 10, handoffs_keep: 30, runs_keep: 200 });
    expect(written.backups_dir).toBeUndefined();
  });

  it('reads the same config back on the next load', () => {
    const first = loadConfig(dataDir);
    expect(loadConfig(dataDir)).toEqual(first);
  });

  it('applies gate and section defaults to a partial file', () => {
    writeConfig({
      gates: [{ name: 'lint', command: 'eslint .' }],
      orchestrator: { mode: 'sequential' },
    });

    const config = loadConfig(dataDir);

    expect(config.gates).toEqual([{
      name: 'lint',
      description: '',
      command: 'eslint .',
      required: true,
      critical: false,
      timeout_ms: 60_000,
      file_patterns: [],
    }]);
    expect(config.orchestrator).toEqual({
      mode: 'sequential',
      fail_fast: true,
      global_timeout_ms: 120_000,
      max_concurrency: 4,
    });
    expect(config.retention).toEqual({ backups_keep: 10, handoffs_keep: 30, runs_keep: 200 });
  });

  it('rejects unparsable JSON', () => {
    writeFileSync(join(dataDir, 'config.json'), '{ nope');
    expect(() => loadConfig(dataDir)).toThrow(ConfigError);
  });

  it('rejects duplicate gate names', () => {
    writeConfig({ gates: [{ name: 'a', command: 'true' }, { name: 'a', command: 'false' }] });
    expect(() => loadConfig(dataDir)).toThrow(
      `Invalid config: gates.1.name: Duplicate gate name: a (${join(dataDir, 'config.json')})`,
    );
  });

  it('rejects thresholds that rise as severity falls', () => {
    writeConfig({
      thresholds: {
        CRITICAL: { failure_rate: 0.2, timeout_rate: 0.2 },
        LOW: { failure_rate: 0.4, timeout_rate: 0.1 },
      },
    });
    expect(() => loadConfig(dataDir)).toThrow('LOW thresholds exceed CRITICAL thresholds');
  });

  it('rejects rates outside 0..1', () => {
    writeConfig({ thresholds: { HIGH: { failure_rate: 1.5, timeout_rate: 0.1 } } });
    expect(() => loadConfig(dataDir)).toThrow(ConfigError);
  });
});
