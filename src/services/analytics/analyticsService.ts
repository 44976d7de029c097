import { logger } from '../../utils/logger.js';
import { getRecentDiagnostics, getTopDiagnostics, recordDiagnostic } from '../../observability/errorTracker.js';
import { getDependencySnapshots, getRouteSnapshots } from '../../observability/metrics.js';
import { FeatureCache } from './featureCache.js';
import { LogStore } from './logStore.js';
import { MODEL_FEATURES, RiskClassifier } from './riskClassifier.js';
import { aggregate, emptyStatistics } from './statisticsEngine.js';
import type { EnrichedRun, FeatureRow, ModelInfo, RowOutcome, RunsReport, Statistics } from './types.js';

const DEFAULT_RUNS_LIMIT = 50;
const DIAGNOSTICS_WINDOW_MS = 24 * 3_600_000;

export interface AnalyticsServiceOptions {
  recentRunsLimit?: number;
}

export function emptyRunsReport(): RunsReport {
  return { runs: [], total: 0, unenriched: 0 };
}

export function emptyModelInfo(): ModelInfo {
  return {
    model: 'RandomForestClassifier',
    features: MODEL_FEATURES,
    classes: [],
    is_trained: false,
    phase: null,
    training_rows: 0,
    n_estimators: 0
  };
}

function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

function newestFirst(a: FeatureRow, b: FeatureRow) {
  return b.timestamp - a.timestamp || a.source.localeCompare(b.source);
}

/**
 * Boundary between the analytics core and the HTTP layer. Every payload is
 * computed from a single cache snapshot, and every method resolves to a
 * structurally valid payload even when the pipeline fails.
 */
export class AnalyticsService {
  private readonly recentRunsLimit: number;

  constructor(
    private readonly cache: FeatureCache,
    private readonly classifier: RiskClassifier,
    options: AnalyticsServiceOptions = {}
  ) {
    this.recentRunsLimit = options.recentRunsLimit ?? DEFAULT_RUNS_LIMIT;
  }

  async getStatistics(): Promise<Statistics> {
    try {
      const { rows } = await this.cache.getSnapshot();
      return aggregate(rows);
    } catch (error) {
      this.reportFailure('statistics', error);
      return emptyStatistics();
    }
  }

  async getRuns(limit = this.recentRunsLimit): Promise<RunsReport> {
    try {
      const { rows } = await this.cache.getSnapshot();
      return this.buildRunsReport(rows, limit);
    } catch (error) {
      this.reportFailure('runs', error);
      return emptyRunsReport();
    }
  }

  async getModelInfo(): Promise<ModelInfo> {
    try {
      await this.cache.getSnapshot();
      return this.classifier.describe();
    } catch (error) {
      this.reportFailure('model', error);
      return emptyModelInfo();
    }
  }

  async getDashboard(limit = this.recentRunsLimit): Promise<{ stats: Statistics; runs: RunsReport }> {
    try {
      const { rows } = await this.cache.getSnapshot();
      return { stats: aggregate(rows), runs: this.buildRunsReport(rows, limit) };
    } catch (error) {
      this.reportFailure('dashboard', error);
      return { stats: emptyStatistics(), runs: emptyRunsReport() };
    }
  }

  getDiagnostics() {
    const entry = this.cache.current;
    return {
      cache: entry ? { epoch: entry.epoch, source_count: entry.sourceCount, rows: entry.rows.length } : null,
      model: this.classifier.describe(),
      recent: getRecentDiagnostics(),
      top: getTopDiagnostics(DIAGNOSTICS_WINDOW_MS),
      routes: getRouteSnapshots(),
      dependencies: getDependencySnapshots()
    };
  }

  predictRows(rows: FeatureRow[]): RowOutcome[] {
    return rows.map((row): RowOutcome => {
      try {
        return { ok: true, row, prediction: this.classifier.predict(row) };
      } catch (error) {
        return { ok: false, row, error: errorMessage(error) };
      }
    });
  }

  private buildRunsReport(rows: FeatureRow[], limit: number): RunsReport {
    const recent = [...rows].sort(newestFirst).slice(0, limit);
    const outcomes = this.predictRows(recent);
    const runs: EnrichedRun[] = [];
    let unenriched = 0;

    for (const outcome of outcomes) {
      if (outcome.ok) {
        runs.push({ ...outcome.row, ...outcome.prediction });
        continue;
      }
      unenriched += 1;
      runs.push({ ...outcome.row });
      logger.warn('Run left without prediction', { source: outcome.row.source, error: outcome.error });
      recordDiagnostic({ stage: 'prediction', source: outcome.row.source, code: 'PREDICTION_FAILED', message: outcome.error });
    }

    return { runs, total: rows.length, unenriched };
  }

  private reportFailure(payload: string, error: unknown) {
    const message = errorMessage(error);
    logger.error('Analytics pipeline failed', { payload, message });
    recordDiagnostic({ stage: 'pipeline', source: payload, code: 'PIPELINE_FAILED', message });
  }
}

export interface AnalyticsPipelineConfig {
  logDir: string;
  recentRunsLimit?: number;
  maxTrainingRows?: number;
}

export function createAnalyticsService(config: AnalyticsPipelineConfig) {
  const classifier = new RiskClassifier({ maxTrainingRows: config.maxTrainingRows });
  const cache = new FeatureCache(new LogStore(config.logDir), classifier);
  return new AnalyticsService(cache, classifier, { recentRunsLimit: config.recentRunsLimit });
}
