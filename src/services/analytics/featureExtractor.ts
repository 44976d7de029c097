import { z } from 'zod';
import { linearSlope, variance } from './math.js';
import type { ExitKind, FeatureRow, RawRecord } from './types.js';

/*
 * The monitor has written these fields both at the top level and under a
 * `summary` object, and under two names for CPU and memory. Every lookup
 * tries `summary` first, then the top level, and resolves to a default.
 */

const metricSchema = z.number().finite().nonnegative();
const textSchema = z.string();

const seriesSchema = z.array(z.unknown())
  .transform((values) => values.filter((value): value is number => typeof value === 'number' && Number.isFinite(value)))
  .catch([]);

const timelineSampleSchema = z.object({
  memory_kb: z.number().finite().optional().catch(undefined),
  cpu_percent: z.number().finite().optional().catch(undefined)
}).catch({});

const timelineSchema = z.union([
  z.array(timelineSampleSchema).transform((samples) => ({
    memory_kb: samples.flatMap((sample) => (sample.memory_kb === undefined ? [] : [sample.memory_kb])),
    cpu_percent: samples.flatMap((sample) => (sample.cpu_percent === undefined ? [] : [sample.cpu_percent]))
  })),
  z.object({ memory_kb: seriesSchema, cpu_percent: seriesSchema })
]).catch({ memory_kb: [], cpu_percent: [] });

const FIELD_ALIASES = {
  runtime_ms: ['runtime_ms'],
  peak_cpu: ['peak_cpu', 'cpu_usage_percent'],
  peak_memory_kb: ['peak_memory_kb', 'memory_peak_kb'],
  page_faults_minor: ['page_faults_minor'],
  page_faults_major: ['page_faults_major'],
  exit_reason: ['exit_reason'],
  blocked_syscall: ['blocked_syscall'],
  termination_signal: ['termination_signal']
} as const;

type AliasedField = keyof typeof FIELD_ALIASES;

function asObject(value: unknown): Record<string, unknown> | null {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : null;
}

// First value that passes `schema`, so an unusable summary entry defers to the top level.
function lookup<T>(scopes: Array<Record<string, unknown>>, field: AliasedField, schema: z.ZodType<T>): T | undefined {
  for (const scope of scopes) {
    for (const key of FIELD_ALIASES[field]) {
      const parsed = schema.safeParse(scope[key]);
      if (parsed.success) {
        return parsed.data;
      }
    }
  }
  return undefined;
}

function readMetric(scopes: Array<Record<string, unknown>>, field: AliasedField) {
  return lookup(scopes, field, metricSchema) ?? 0;
}

function readText(value: unknown, fallback: string) {
  const parsed = textSchema.safeParse(value);
  return parsed.success ? parsed.data : fallback;
}

export function classifyExit(exitReason: string): ExitKind {
  if (exitReason.includes('VIOLATION')) return 'violation';
  if (exitReason.includes('SIGNALED')) return 'signaled';
  const exited = /^EXITED\((-?\d+)\)$/.exec(exitReason);
  if (exited) {
    return Number(exited[1]) === 0 ? 'exited' : 'error';
  }
  return 'unknown';
}

export function extractFeatureRow(record: RawRecord): FeatureRow {
  const { document } = record;
  const summary = asObject(document.summary);
  const scopes = summary ? [summary, document] : [document];
  const timeline = timelineSchema.parse(document.timeline);
  const exitReason = lookup(scopes, 'exit_reason', textSchema) ?? 'UNKNOWN';

  return {
    source: record.source,
    timestamp: record.modifiedAt,
    profile: readText(document.profile, 'UNKNOWN'),
    program: readText(document.program, 'unknown'),
    exit_reason: exitReason,
    blocked_syscall: lookup(scopes, 'blocked_syscall', textSchema) ?? '',
    termination_signal: lookup(scopes, 'termination_signal', textSchema) ?? '',
    exit_kind: classifyExit(exitReason),
    runtime_ms: readMetric(scopes, 'runtime_ms'),
    peak_cpu: Math.min(100, readMetric(scopes, 'peak_cpu')),
    peak_memory_kb: readMetric(scopes, 'peak_memory_kb'),
    page_faults_minor: readMetric(scopes, 'page_faults_minor'),
    page_faults_major: readMetric(scopes, 'page_faults_major'),
    mem_growth_rate: linearSlope(timeline.memory_kb),
    cpu_variance: variance(timeline.cpu_percent),
    sample_count: timeline.memory_kb.length
  };
}

export function extractFeatures(records: RawRecord[]): FeatureRow[] {
  return records.map(extractFeatureRow);
}
