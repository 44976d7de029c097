import { logger } from '../../utils/logger.js';
import { RandomForestClassifier, StandardScaler, type Matrix } from './randomForest.js';
import { deriveLabel, explainRisk } from './riskRules.js';
import type { ClassifierPhase, FeatureRow, ModelInfo, Prediction, RiskLabel } from './types.js';

export const MODEL_FEATURES = [
  'runtime_ms',
  'cpu_usage_percent',
  'memory_peak_kb',
  'page_faults_minor',
  'page_faults_major'
] as const;

export const MIN_TRAINING_ROWS = 5;

// Archetypes that keep the decision boundary meaningful before any real violation has been seen.
const SEED_FEATURES: Matrix = [
  [10, 5, 200, 10, 0],
  [50, 10, 1024, 50, 0],
  [5000, 99, 1024, 100, 0],
  [100, 10, 512000, 5000, 10],
  [200, 30, 400, 10000, 0]
];

const SEED_LABELS: RiskLabel[] = ['Benign', 'Benign', 'Malicious', 'Malicious', 'Malicious'];

type ClassifierInput = Pick<FeatureRow, 'runtime_ms' | 'peak_cpu' | 'peak_memory_kb' | 'page_faults_minor' | 'page_faults_major'>;

export interface RiskClassifierOptions {
  nEstimators?: number;
  randomState?: number;
  /** Keeps only the last N real rows when retraining; seed rows are always included. */
  maxTrainingRows?: number;
}

export function toFeatureVector(row: ClassifierInput): number[] {
  const vector = [row.runtime_ms, row.peak_cpu, row.peak_memory_kb, row.page_faults_minor, row.page_faults_major];
  if (vector.some((value) => typeof value !== 'number' || !Number.isFinite(value))) {
    throw new Error('Feature row contains non-numeric model inputs');
  }
  return vector;
}

/** Probability as a percentage with one decimal; exact halves round to the even digit. */
export function toPercent(probability: number) {
  const scaled = probability * 1000;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;
  const rounded = fraction > 0.5 || (fraction === 0.5 && floor % 2 === 1) ? floor + 1 : floor;
  return rounded / 10;
}

export class RiskClassifier {
  private scaler = new StandardScaler();

  private forest: RandomForestClassifier<RiskLabel>;

  private phase: ClassifierPhase | null = null;

  private trainingRows = 0;

  constructor(private readonly options: RiskClassifierOptions = {}) {
    this.forest = this.createForest();
    this.trainOnSeed();
  }

  get isTrained() {
    return this.phase !== null;
  }

  get currentPhase() {
    return this.phase;
  }

  private trainOnSeed() {
    this.fit(SEED_FEATURES, SEED_LABELS);
    this.phase = 'seeded';
    this.trainingRows = 0;
  }

  /**
   * Refits on the seed set plus every supplied row, labelled from its exit
   * reason. Returns false and keeps the current model when fewer than
   * MIN_TRAINING_ROWS rows are given.
   */
  train(rows: FeatureRow[]): boolean {
    if (rows.length < MIN_TRAINING_ROWS) {
      return false;
    }

    const limit = this.options.maxTrainingRows;
    const selected = limit && rows.length > limit ? latest(rows, limit) : rows;
    const features = selected.map(toFeatureVector);
    const labels = selected.map((row) => deriveLabel(row.exit_reason));

    this.fit([...SEED_FEATURES, ...features], [...SEED_LABELS, ...labels]);
    this.phase = 'trained';
    this.trainingRows = selected.length;

    logger.info('Risk model trained', {
      rows: selected.length,
      malicious: labels.filter((label) => label === 'Malicious').length,
      buggy: labels.filter((label) => label === 'Buggy').length
    });
    return true;
  }

  predict(row: FeatureRow): Prediction {
    if (!this.isTrained) {
      this.trainOnSeed();
    }

    const scaled = this.scaler.transformRow(toFeatureVector(row));
    const { label, probabilities } = this.forest.predict(scaled);
    const confidence = Math.max(...probabilities);

    return {
      prediction: label,
      confidence: toPercent(confidence),
      reason: this.explain(label, row)
    };
  }

  /** Rule-based cross-check; it never consults the model, so it may disagree with `prediction`. */
  explain(_prediction: RiskLabel, row: FeatureRow): string {
    return explainRisk(row);
  }

  describe(): ModelInfo {
    return {
      model: 'RandomForestClassifier',
      features: MODEL_FEATURES,
      classes: this.forest.classes,
      is_trained: this.isTrained,
      phase: this.phase,
      training_rows: this.trainingRows,
      n_estimators: this.forest.nEstimators
    };
  }

  private fit(features: Matrix, labels: RiskLabel[]) {
    const scaler = new StandardScaler().fit(features);
    const forest = this.createForest().fit(scaler.transform(features), labels);
    this.scaler = scaler;
    this.forest = forest;
  }

  private createForest() {
    return new RandomForestClassifier<RiskLabel>({
      nEstimators: this.options.nEstimators ?? 10,
      randomState: this.options.randomState ?? 42
    });
  }
}

function latest(rows: FeatureRow[], limit: number) {
  return [...rows].sort((a, b) => a.timestamp - b.timestamp).slice(-limit);
}
