import type { FeatureRow, RiskLabel } from './types.js';

export const CPU_THRESHOLD_PERCENT = 80;
export const MEMORY_THRESHOLD_KB = 100_000;
export const MINOR_FAULT_THRESHOLD = 1000;

export const NORMAL_BEHAVIOR = 'Normal behavior';

/** Training-label oracle for real records. */
export function deriveLabel(exitReason: string): RiskLabel {
  if (exitReason.includes('VIOLATION')) return 'Malicious';
  if (exitReason.includes('SIGNALED')) return 'Buggy';
  return 'Benign';
}

type ExplainableRow = Pick<FeatureRow, 'peak_cpu' | 'peak_memory_kb' | 'page_faults_minor' | 'exit_reason'>;

export function explainReasons(row: ExplainableRow): string[] {
  const reasons: string[] = [];
  if (row.peak_cpu > CPU_THRESHOLD_PERCENT) reasons.push('High CPU');
  if (row.peak_memory_kb > MEMORY_THRESHOLD_KB) reasons.push('High Memory');
  if (row.page_faults_minor > MINOR_FAULT_THRESHOLD) reasons.push('High Activity');
  if (row.exit_reason.includes('VIOLATION')) reasons.push('Syscall Violation');
  return reasons;
}

export function explainRisk(row: ExplainableRow): string {
  const reasons = explainReasons(row);
  return reasons.length ? reasons.join(' + ') : NORMAL_BEHAVIOR;
}
