/**
 * Warden Gate Report
 * Plain-text summary of an orchestration run
 */

import type { GateResult, GateRunOutcome, GateStatus } from '../types/index.js';

const STATUS_TAGS: Record<GateStatus, string> = {
  passed: '[PASS]',
  failed: '[FAIL]',
  timeout: '[TIMEOUT]',
  skipped: '[SKIP]',
  launch_error: '[ERROR]',
};

const ERROR_PREVIEW_CHARS = 100;

function countStatus(results: readonly GateResult[], status: GateStatus): number {
  return results.filter(r => r.status === status).length;
}

export function formatGateReport(outcome: GateRunOutcome): string {
  const { results } = outcome;
  const failed = countStatus(results, 'failed') + countStatus(results, 'launch_error');
  const lines: string[] = [
    `Quality Gates: ${countStatus(results, 'passed')} passed, ${failed} failed, ` +
      `${countStatus(results, 'timeout')} timeout, ${countStatus(results, 'skipped')} skipped (${outcome.mode})`,
  ];

  for (const result of results) {
    const flags = [result.critical ? 'critical' : null, result.required ? null : 'optional'].filter(Boolean);
    const suffix = flags.length > 0 ? ` {${flags.join(', ')}}` : '';
    lines.push(`  ${STATUS_TAGS[result.status]} ${result.name} (${result.duration_ms}ms)${suffix}`);
    if (result.error) {
      lines.push(`     ${result.error.slice(0, ERROR_PREVIEW_CHARS)}`);
    }
  }

  if (!outcome.success) {
    lines.push(`Critical gate failure: ${outcome.critical_failures.join(', ')}`);
  }

  return lines.join('\n');
}
