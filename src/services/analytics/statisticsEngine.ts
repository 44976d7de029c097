import { mean } from './math.js';
import type { FeatureRow, ProfileStats, Statistics } from './types.js';

export function emptyStatistics(): Statistics {
  return {
    total_runs: 0,
    by_profile: {},
    by_exit_reason: {},
    syscall_violations: 0,
    avg_runtime_ms: 0,
    avg_cpu_percent: 0,
    avg_memory_kb: 0,
    syscall_frequency: {}
  };
}

export function getSyscallFrequency(rows: FeatureRow[]): Record<string, number> {
  const counts = new Map<string, number>();
  for (const row of rows) {
    if (!row.blocked_syscall) continue;
    counts.set(row.blocked_syscall, (counts.get(row.blocked_syscall) ?? 0) + 1);
  }
  return Object.fromEntries(counts);
}

export function aggregate(rows: FeatureRow[]): Statistics {
  if (!rows.length) {
    return emptyStatistics();
  }

  const byProfile = new Map<string, FeatureRow[]>();
  const byExitReason = new Map<string, number>();

  for (const row of rows) {
    const group = byProfile.get(row.profile) ?? [];
    group.push(row);
    byProfile.set(row.profile, group);
    byExitReason.set(row.exit_reason, (byExitReason.get(row.exit_reason) ?? 0) + 1);
  }

  const profiles: Array<[string, ProfileStats]> = [...byProfile.entries()].map(([profile, group]) => [profile, {
    count: group.length,
    avg_cpu: mean(group.map((row) => row.peak_cpu)),
    avg_mem: mean(group.map((row) => row.peak_memory_kb))
  }]);

  return {
    total_runs: rows.length,
    by_profile: Object.fromEntries(profiles),
    by_exit_reason: Object.fromEntries(byExitReason),
    syscall_violations: rows.filter((row) => row.exit_reason.includes('VIOLATION')).length,
    avg_runtime_ms: mean(rows.map((row) => row.runtime_ms)),
    avg_cpu_percent: mean(rows.map((row) => row.peak_cpu)),
    avg_memory_kb: mean(rows.map((row) => row.peak_memory_kb)),
    syscall_frequency: getSyscallFrequency(rows)
  };
}
