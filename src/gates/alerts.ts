/**
 * Warden Alerts
 * Maps gate failure/timeout rates to a single severity
 */

import type {
  Alert,
  AlertCategory,
  AlertEvaluation,
  AlertSeverity,
  GateRates,
  GateResult,
  ThresholdTable,
} from '../types/index.js';

export const SEVERITY_ORDER: readonly AlertSeverity[] = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW', 'INFO'];

export const DEFAULT_THRESHOLDS: ThresholdTable = {
  CRITICAL: { failure_rate: 0.5, timeout_rate: 0.5 },
  HIGH: { failure_rate: 0.3, timeout_rate: 0.3 },
  MEDIUM: { failure_rate: 0.2, timeout_rate: 0.2 },
  LOW: { failure_rate: 0.05, timeout_rate: 0.1 },
};

export function computeGateRates(results: readonly GateResult[]): GateRates {
  const total = results.length;
  const failed = results.filter(r => r.status === 'failed' || r.status === 'launch_error').length;
  const timedOut = results.filter(r => r.timed_out).length;
  const skipped = results.filter(r => r.status === 'skipped').length;

  return {
    total,
    failed,
    timed_out: timedOut,
    skipped,
    failure_rate: total > 0 ? failed / total : 0,
    timeout_rate: total > 0 ? timedOut / total : 0,
  };
}

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

export class AlertEvaluator {
  constructor(
    private readonly thresholds: ThresholdTable = DEFAULT_THRESHOLDS,
    private readonly source: string = 'quality-gates',
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Walk severities from CRITICAL down and emit the first one whose
   * failure-rate or timeout-rate threshold is met. At most one alert per run.
   */
  evaluate(results: readonly GateResult[]): AlertEvaluation {
    const rates = computeGateRates(results);
    if (rates.total === 0) {
      return { alert: null, blocks_session: false, rates };
    }

    for (const severity of SEVERITY_ORDER) {
      const threshold = this.thresholds[severity];
      if (!threshold) continue;

      let category: AlertCategory | null = null;
      let value = 0;
      let limit = 0;
      if (rates.failure_rate >= threshold.failure_rate) {
        category = 'failure-rate';
        value = rates.failure_rate;
        limit = threshold.failure_rate;
      } else if (rates.timeout_rate >= threshold.timeout_rate) {
        category = 'timeout-rate';
        value = rates.timeout_rate;
        limit = threshold.timeout_rate;
      }
      if (!category) continue;

      const label = category === 'failure-rate' ? 'Failure rate' : 'Timeout rate';
      const alert: Alert = {
        severity,
        category,
        message: `${label}: ${percent(value)} >= ${percent(limit)}`,
        source: this.source,
        timestamp: this.now().toISOString(),
        context: {
          value,
          threshold: limit,
          total: rates.total,
          failed: rates.failed,
          timed_out: rates.timed_out,
        },
      };
      return { alert, blocks_session: severity === 'CRITICAL', rates };
    }

    return { alert: null, blocks_session: false, rates };
  }
}

export function formatAlert(evaluation: AlertEvaluation): string {
  if (!evaluation.alert) return 'No quality alerts';
  const line = `[${evaluation.alert.severity}] ${evaluation.alert.message}`;
  return evaluation.blocks_session ? `${line}\nSession end blocked due to critical quality issues` : line;
}
