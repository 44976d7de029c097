export type DiagnosticStage = 'ingestion' | 'pipeline' | 'prediction' | 'api';

export type DiagnosticSample = {
  stage: DiagnosticStage;
  source: string;
  code: string;
  message: string;
  request_id: string | null;
  captured_at: string;
};

export type DiagnosticAggregate = {
  stage: DiagnosticStage;
  source: string;
  code: string;
  count: number;
  last_seen_at: string;
  sample: DiagnosticSample;
};

const MAX_SAMPLES = 2000;
const samples: DiagnosticSample[] = [];

export function recordDiagnostic(input: Omit<DiagnosticSample, 'captured_at' | 'request_id'> & { request_id?: string | null }) {
  if (samples.length >= MAX_SAMPLES) {
    samples.shift();
  }
  samples.push({
    ...input,
    request_id: input.request_id ?? null,
    captured_at: new Date().toISOString()
  });
}

export function getRecentDiagnostics(limit = 20): DiagnosticSample[] {
  return samples.slice(-limit).reverse();
}

export function getTopDiagnostics(sinceMs: number, limit = 10): DiagnosticAggregate[] {
  const cutoff = Date.now() - sinceMs;
  const aggregates = new Map<string, DiagnosticAggregate>();

  for (const sample of samples) {
    if (Date.parse(sample.captured_at) < cutoff) continue;
    const key = `${sample.stage}:${sample.source}:${sample.code}`;
    const existing = aggregates.get(key);
    if (existing) {
      existing.count += 1;
      existing.last_seen_at = sample.captured_at;
      existing.sample = sample;
    } else {
      aggregates.set(key, {
        stage: sample.stage,
        source: sample.source,
        code: sample.code,
        count: 1,
        last_seen_at: sample.captured_at,
        sample
      });
    }
  }

  return [...aggregates.values()].sort((a, b) => b.count - a.count).slice(0, limit);
}

export function clearDiagnostics() {
  samples.splice(0, samples.length);
}
