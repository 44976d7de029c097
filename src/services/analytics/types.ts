export const RISK_LABELS = ['Benign', 'Buggy', 'Malicious'] as const;

export type RiskLabel = (typeof RISK_LABELS)[number];

export type ExitKind = 'exited' | 'error' | 'signaled' | 'violation' | 'unknown';

export interface RawRecord {
  source: string;
  modifiedAt: number;
  document: Record<string, unknown>;
}

export interface FeatureRow {
  source: string;
  timestamp: number;
  profile: string;
  program: string;
  exit_reason: string;
  blocked_syscall: string;
  termination_signal: string;
  exit_kind: ExitKind;
  runtime_ms: number;
  peak_cpu: number;
  peak_memory_kb: number;
  page_faults_minor: number;
  page_faults_major: number;
  mem_growth_rate: number;
  cpu_variance: number;
  sample_count: number;
}

export interface ProfileStats {
  count: number;
  avg_cpu: number;
  avg_mem: number;
}

export interface Statistics {
  total_runs: number;
  by_profile: Record<string, ProfileStats>;
  by_exit_reason: Record<string, number>;
  syscall_violations: number;
  avg_runtime_ms: number;
  avg_cpu_percent: number;
  avg_memory_kb: number;
  syscall_frequency: Record<string, number>;
}

export interface Prediction {
  prediction: RiskLabel;
  confidence: number;
  reason: string;
}

export type EnrichedRun = FeatureRow & Partial<Prediction>;

export type RowOutcome =
  | { ok: true; row: FeatureRow; prediction: Prediction }
  | { ok: false; row: FeatureRow; error: string };

export interface RunsReport {
  runs: EnrichedRun[];
  total: number;
  unenriched: number;
}

export type ClassifierPhase = 'seeded' | 'trained';

export interface ModelInfo {
  model: string;
  features: readonly string[];
  classes: readonly RiskLabel[];
  is_trained: boolean;
  phase: ClassifierPhase | null;
  training_rows: number;
  n_estimators: number;
}

export interface CacheEntry {
  rows: FeatureRow[];
  sourceCount: number;
  epoch: number;
}
