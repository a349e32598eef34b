/**
 * Warden Gate Selection
 * Matches gate file patterns against the current change set
 */

import { minimatch } from 'minimatch';
import type { Gate } from '../types/index.js';

function toPosix(filePath: string): string {
  return filePath.replace(/\\/g, '/');
}

export function gateApplies(gate: Gate, changedFiles: readonly string[]): boolean {
  if (gate.file_patterns.length === 0) return true;

  return changedFiles.some(file => {
    const normalized = toPosix(file);
    // Patterns without a slash ("*.ts") match against the basename anywhere
    return gate.file_patterns.some(pattern => minimatch(normalized, pattern, { dot: true, matchBase: true }));
  });
}

export function selectApplicableGates(gates: readonly Gate[], changedFiles: readonly string[]): Gate[] {
  return gates.filter(gate => gateApplies(gate, changedFiles));
}
