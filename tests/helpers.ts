import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { RecordSource } from '../src/services/analytics/logStore.js';
import type { FeatureRow, RawRecord } from '../src/services/analytics/types.js';

export async function createLogDir() {
  return fs.mkdtemp(path.join(os.tmpdir(), 'sandbox-logs-'));
}

export async function removeLogDir(dir: string) {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeLog(dir: string, name: string, content: unknown) {
  const file = path.join(dir, name);
  await fs.writeFile(file, typeof content === 'string' ? content : JSON.stringify(content), 'utf8');
  return file;
}

export function makeRecord(document: Record<string, unknown>, overrides: Partial<Omit<RawRecord, 'document'>> = {}): RawRecord {
  return {
    source: overrides.source ?? 'memory://run.json',
    modifiedAt: overrides.modifiedAt ?? 1_700_000_000_000,
    document
  };
}

export function makeRow(overrides: Partial<FeatureRow> = {}): FeatureRow {
  return {
    source: 'memory://run.json',
    timestamp: 1_700_000_000_000,
    profile: 'strict',
    program: './hello',
    exit_reason: 'EXITED(0)',
    blocked_syscall: '',
    termination_signal: '',
    exit_kind: 'exited',
    runtime_ms: 10,
    peak_cpu: 5,
    peak_memory_kb: 200,
    page_faults_minor: 10,
    page_faults_major: 0,
    mem_growth_rate: 0,
    cpu_variance: 0,
    sample_count: 0,
    ...overrides
  };
}

export const strictRunDocument = {
  profile: 'strict',
  summary: {
    runtime_ms: 10,
    peak_cpu: 5,
    peak_memory_kb: 200,
    page_faults_minor: 10,
    page_faults_major: 0,
    exit_reason: 'EXITED(0)'
  }
};

export const violationRunDocument = {
  profile: 'learning',
  program: './spawner',
  summary: {
    runtime_ms: 40,
    peak_cpu: 95,
    peak_memory_kb: 900,
    page_faults_minor: 30,
    page_faults_major: 0,
    exit_reason: 'VIOLATION:execve',
    blocked_syscall: 'execve'
  }
};

/** In-process record source that counts how often it is loaded. */
export class MemorySource implements RecordSource {
  loads = 0;

  failWith: Error | null = null;

  constructor(public records: RawRecord[] = []) {}

  async count() {
    return this.records.length;
  }

  async load() {
    this.loads += 1;
    if (this.failWith) {
      throw this.failWith;
    }
    return [...this.records];
  }
}
