export type Matrix = number[][];

/** Seeded uniform generator in [0, 1). */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export interface ScalerParams {
  means: number[];
  scales: number[];
}

/** Zero-mean, unit-variance scaling per column. Constant columns keep a scale of 1. */
export class StandardScaler {
  private params: ScalerParams | null = null;

  fit(matrix: Matrix): this {
    if (!matrix.length) {
      throw new Error('Cannot fit scaler on an empty matrix');
    }

    const width = matrix[0].length;
    const means: number[] = [];
    const scales: number[] = [];
    for (let column = 0; column < width; column += 1) {
      const values = matrix.map((row) => row[column]);
      const avg = values.reduce((sum, value) => sum + value, 0) / values.length;
      const spread = Math.sqrt(values.reduce((sum, value) => sum + (value - avg) ** 2, 0) / values.length);
      means.push(avg);
      scales.push(spread > 0 ? spread : 1);
    }

    this.params = { means, scales };
    return this;
  }

  transformRow(row: number[]): number[] {
    if (!this.params) {
      throw new Error('Scaler used before fit');
    }
    const { means, scales } = this.params;
    if (row.length !== means.length) {
      throw new Error(`Expected ${means.length} features, received ${row.length}`);
    }
    return row.map((value, column) => (value - means[column]) / scales[column]);
  }

  transform(matrix: Matrix): Matrix {
    return matrix.map((row) => this.transformRow(row));
  }

  getParams(): ScalerParams | null {
    return this.params ? { means: [...this.params.means], scales: [...this.params.scales] } : null;
  }
}

type TreeNode =
  | { kind: 'leaf'; distribution: number[] }
  | { kind: 'split'; feature: number; threshold: number; left: TreeNode; right: TreeNode };

interface SplitCandidate {
  feature: number;
  threshold: number;
  impurity: number;
}

function gini(counts: number[], total: number) {
  if (!total) return 0;
  return 1 - counts.reduce((sum, count) => sum + (count / total) ** 2, 0);
}

/** Fully grown CART tree on class indices, gini impurity, random feature subsets per node. */
class DecisionTree {
  private root: TreeNode | null = null;

  constructor(
    private readonly classCount: number,
    private readonly maxFeatures: number,
    private readonly random: () => number
  ) {}

  fit(matrix: Matrix, targets: number[], sample: number[]) {
    this.root = this.grow(matrix, targets, sample);
  }

  predictProba(row: number[]): number[] {
    let node = this.root;
    if (!node) {
      throw new Error('Tree used before fit');
    }
    while (node.kind === 'split') {
      node = row[node.feature] <= node.threshold ? node.left : node.right;
    }
    return node.distribution;
  }

  private grow(matrix: Matrix, targets: number[], sample: number[]): TreeNode {
    const counts = this.countClasses(targets, sample);
    const distribution = counts.map((count) => count / sample.length);
    const pure = counts.filter((count) => count > 0).length <= 1;
    if (sample.length < 2 || pure) {
      return { kind: 'leaf', distribution };
    }

    const split = this.findSplit(matrix, targets, sample);
    if (!split) {
      return { kind: 'leaf', distribution };
    }

    const left = sample.filter((index) => matrix[index][split.feature] <= split.threshold);
    const right = sample.filter((index) => matrix[index][split.feature] > split.threshold);
    return {
      kind: 'split',
      feature: split.feature,
      threshold: split.threshold,
      left: this.grow(matrix, targets, left),
      right: this.grow(matrix, targets, right)
    };
  }

  private countClasses(targets: number[], sample: number[]) {
    const counts = new Array<number>(this.classCount).fill(0);
    for (const index of sample) {
      counts[targets[index]] += 1;
    }
    return counts;
  }

  // Draws features in random order; past `maxFeatures` it only keeps going while no valid split exists.
  private findSplit(matrix: Matrix, targets: number[], sample: number[]): SplitCandidate | null {
    const features = this.shuffledFeatures(matrix[sample[0]].length);
    let best: SplitCandidate | null = null;

    for (let visited = 0; visited < features.length; visited += 1) {
      if (visited >= this.maxFeatures && best) break;
      const candidate = this.bestSplitOn(features[visited], matrix, targets, sample);
      if (candidate && (!best || candidate.impurity < best.impurity)) {
        best = candidate;
      }
    }

    return best;
  }

  private bestSplitOn(feature: number, matrix: Matrix, targets: number[], sample: number[]): SplitCandidate | null {
    const ordered = [...sample].sort((a, b) => matrix[a][feature] - matrix[b][feature]);
    const total = ordered.length;
    const leftCounts = new Array<number>(this.classCount).fill(0);
    const rightCounts = this.countClasses(targets, ordered);
    let best: SplitCandidate | null = null;

    for (let position = 0; position < total - 1; position += 1) {
      const index = ordered[position];
      leftCounts[targets[index]] += 1;
      rightCounts[targets[index]] -= 1;

      const current = matrix[index][feature];
      const next = matrix[ordered[position + 1]][feature];
      if (current === next) continue;

      const leftSize = position + 1;
      const rightSize = total - leftSize;
      const impurity = (leftSize * gini(leftCounts, leftSize) + rightSize * gini(rightCounts, rightSize)) / total;
      if (!best || impurity < best.impurity) {
        const midpoint = (current + next) / 2;
        best = { feature, threshold: midpoint < next ? midpoint : current, impurity };
      }
    }

    return best;
  }

  private shuffledFeatures(width: number) {
    const features = Array.from({ length: width }, (_, index) => index);
    for (let i = features.length - 1; i > 0; i -= 1) {
      const j = Math.floor(this.random() * (i + 1));
      [features[i], features[j]] = [features[j], features[i]];
    }
    return features;
  }
}

export interface RandomForestOptions {
  nEstimators?: number;
  randomState?: number;
  /** Features drawn per split; defaults to floor(sqrt(width)). */
  maxFeatures?: number;
}

/**
 * Bagged ensemble of decision trees. Class probabilities are the mean of the
 * trees' leaf distributions; classes are ordered alphabetically.
 */
export class RandomForestClassifier<Label extends string> {
  readonly nEstimators: number;

  readonly randomState: number;

  private trees: DecisionTree[] = [];

  private labels: Label[] = [];

  constructor(private readonly options: RandomForestOptions = {}) {
    this.nEstimators = options.nEstimators ?? 10;
    this.randomState = options.randomState ?? 42;
  }

  get classes(): readonly Label[] {
    return this.labels;
  }

  fit(matrix: Matrix, labels: Label[]): this {
    if (!matrix.length || matrix.length !== labels.length) {
      throw new Error(`Cannot fit forest on ${matrix.length} rows and ${labels.length} labels`);
    }

    const classes = [...new Set(labels)].sort();
    const classIndex = new Map<Label, number>(classes.map((label, index) => [label, index]));
    const targets = labels.map((label) => classIndex.get(label) ?? 0);
    const width = matrix[0].length;
    const maxFeatures = Math.max(1, Math.min(width, this.options.maxFeatures ?? Math.floor(Math.sqrt(width))));
    const random = mulberry32(this.randomState);

    const trees: DecisionTree[] = [];
    for (let t = 0; t < this.nEstimators; t += 1) {
      const sample = Array.from({ length: matrix.length }, () => Math.floor(random() * matrix.length));
      const tree = new DecisionTree(classes.length, maxFeatures, random);
      tree.fit(matrix, targets, sample);
      trees.push(tree);
    }

    this.labels = classes;
    this.trees = trees;
    return this;
  }

  predictProba(row: number[]): number[] {
    if (!this.trees.length) {
      throw new Error('Forest used before fit');
    }
    const totals = new Array<number>(this.labels.length).fill(0);
    for (const tree of this.trees) {
      tree.predictProba(row).forEach((probability, index) => {
        totals[index] += probability;
      });
    }
    return totals.map((total) => total / this.trees.length);
  }

  predict(row: number[]): { label: Label; probabilities: number[] } {
    const probabilities = this.predictProba(row);
    let bestIndex = 0;
    for (let index = 1; index < probabilities.length; index += 1) {
      if (probabilities[index] > probabilities[bestIndex]) {
        bestIndex = index;
      }
    }
    return { label: this.labels[bestIndex], probabilities };
  }
}
