import { test } from 'node:test';
import assert from 'node:assert/strict';
import { aggregate, emptyStatistics, getSyscallFrequency } from '../src/services/analytics/statisticsEngine.js';
import { makeRow } from './helpers.js';

test('Statistics aggregation', async (t) => {
  await t.test('empty input yields the zero form', () => {
    const stats = aggregate([]);

    assert.deepEqual(stats, emptyStatistics());
    assert.equal(stats.total_runs, 0);
    assert.deepEqual(stats.by_profile, {});
    assert.deepEqual(stats.by_exit_reason, {});
    assert.deepEqual(stats.syscall_frequency, {});
  });

  await t.test('single strict run', () => {
    const stats = aggregate([makeRow()]);

    assert.equal(stats.total_runs, 1);
    assert.equal(stats.avg_cpu_percent, 5);
    assert.equal(stats.avg_memory_kb, 200);
    assert.equal(stats.avg_runtime_ms, 10);
    assert.deepEqual(stats.by_profile, { strict: { count: 1, avg_cpu: 5, avg_mem: 200 } });
    assert.deepEqual(stats.by_exit_reason, { 'EXITED(0)': 1 });
    assert.equal(stats.syscall_violations, 0);
  });

  await t.test('groups by profile and exit reason', () => {
    const rows = [
      makeRow({ profile: 'strict', runtime_ms: 10, peak_cpu: 10, peak_memory_kb: 100 }),
      makeRow({ profile: 'strict', runtime_ms: 30, peak_cpu: 30, peak_memory_kb: 300, exit_reason: 'VIOLATION:execve', blocked_syscall: 'execve' }),
      makeRow({ profile: 'learning', runtime_ms: 60, peak_cpu: 95, peak_memory_kb: 500, exit_reason: 'VIOLATION:execve', blocked_syscall: 'execve' }),
      makeRow({ profile: 'learning', runtime_ms: 20, peak_cpu: 5, peak_memory_kb: 100, exit_reason: 'SIGNALED(9)' })
    ];

    const stats = aggregate(rows);

    assert.equal(stats.total_runs, 4);
    assert.deepEqual(stats.by_profile, {
      strict: { count: 2, avg_cpu: 20, avg_mem: 200 },
      learning: { count: 2, avg_cpu: 50, avg_mem: 300 }
    });
    assert.deepEqual(stats.by_exit_reason, { 'EXITED(0)': 1, 'VIOLATION:execve': 2, 'SIGNALED(9)': 1 });
    assert.equal(stats.syscall_violations, 2);
    assert.equal(stats.avg_runtime_ms, 30);
    assert.equal(stats.avg_cpu_percent, 35);
    assert.equal(stats.avg_memory_kb, 250);
    assert.deepEqual(stats.syscall_frequency, { execve: 2 });
  });
});

test('syscall frequency skips rows without a blocked syscall', () => {
  const frequency = getSyscallFrequency([
    makeRow({ blocked_syscall: 'socket' }),
    makeRow({ blocked_syscall: '' }),
    makeRow({ blocked_syscall: 'ptrace' }),
    makeRow({ blocked_syscall: 'socket' })
  ]);

  assert.deepEqual(frequency, { socket: 2, ptrace: 1 });
});
