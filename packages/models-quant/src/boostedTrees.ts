import { SeededRandom } from '@replenish/core';

export interface BoostingOptions {
  rounds?: number;
  learningRate?: number;
  maxDepth?: number;
  minLeafSize?: number;
  /** Share of rows drawn (without replacement) for each tree */
  rowSampleRate?: number;
  /** Share of features considered by each tree */
  featureSampleRate?: number;
  seed?: number;
}

type TreeNode =
  | { kind: 'leaf'; value: number }
  | { kind: 'split'; feature: number; threshold: number; left: TreeNode; right: TreeNode };

interface Split {
  feature: number;
  threshold: number;
  gain: number;
}

const DEFAULTS = {
  rounds: 100,
  learningRate: 0.1,
  maxDepth: 4,
  minLeafSize: 3,
  rowSampleRate: 0.8,
  featureSampleRate: 0.8,
  seed: 42,
} satisfies Required<BoostingOptions>;

const average = (targets: readonly number[], indices: readonly number[]): number =>
  indices.reduce((acc, index) => acc + targets[index], 0) / indices.length;

const findBestSplit = (
  features: readonly (readonly number[])[],
  targets: readonly number[],
  indices: readonly number[],
  candidates: readonly number[],
  minLeafSize: number
): Split | null => {
  const total = indices.reduce((acc, index) => acc + targets[index], 0);
  const count = indices.length;
  let best: Split | null = null;

  for (const feature of candidates) {
    const ordered = [...indices].sort((a, b) => features[a][feature] - features[b][feature]);
    let leftSum = 0;
    for (let i = 0; i < count - 1; i += 1) {
      leftSum += targets[ordered[i]];
      const leftCount = i + 1;
      const rightCount = count - leftCount;
      const current = features[ordered[i]][feature];
      const next = features[ordered[i + 1]][feature];
      if (current === next || leftCount < minLeafSize || rightCount < minLeafSize) {
        continue;
      }
      const rightSum = total - leftSum;
      // Reduction in squared error relative to a single leaf.
      const gain =
        (leftSum * leftSum) / leftCount + (rightSum * rightSum) / rightCount - (total * total) / count;
      if (gain > 1e-12 && (!best || gain > best.gain)) {
        best = { feature, threshold: (current + next) / 2, gain };
      }
    }
  }

  return best;
};

const buildTree = (
  features: readonly (readonly number[])[],
  targets: readonly number[],
  indices: readonly number[],
  candidates: readonly number[],
  depth: number,
  settings: Required<BoostingOptions>
): TreeNode => {
  const leaf: TreeNode = { kind: 'leaf', value: average(targets, indices) };
  if (depth >= settings.maxDepth || indices.length < 2 * settings.minLeafSize) {
    return leaf;
  }
  const split = findBestSplit(features, targets, indices, candidates, settings.minLeafSize);
  if (!split) {
    return leaf;
  }
  const left = indices.filter((index) => features[index][split.feature] <= split.threshold);
  const right = indices.filter((index) => features[index][split.feature] > split.threshold);
  return {
    kind: 'split',
    feature: split.feature,
    threshold: split.threshold,
    left: buildTree(features, targets, left, candidates, depth + 1, settings),
    right: buildTree(features, targets, right, candidates, depth + 1, settings),
  };
};

const evaluate = (node: TreeNode, row: readonly number[]): number => {
  let current = node;
  while (current.kind === 'split') {
    current = row[current.feature] <= current.threshold ? current.left : current.right;
  }
  return current.value;
};

/**
 * Squared-error gradient boosting over depth-limited regression trees. Row and
 * feature subsampling draw from a seeded source, so training is reproducible.
 */
export class GradientBoostedTrees {
  private constructor(
    private readonly base: number,
    private readonly trees: readonly TreeNode[],
    private readonly learningRate: number,
    readonly featureCount: number
  ) {}

  static train(
    features: readonly (readonly number[])[],
    targets: readonly number[],
    options: BoostingOptions = {}
  ): GradientBoostedTrees {
    const settings: Required<BoostingOptions> = { ...DEFAULTS, ...options };
    const rowCount = features.length;
    if (rowCount === 0 || rowCount !== targets.length) {
      throw new Error(`boosting needs aligned, non-empty training rows (got ${rowCount}/${targets.length})`);
    }
    const featureCount = features[0].length;
    const rng = new SeededRandom(settings.seed);
    const base = targets.reduce((acc, value) => acc + value, 0) / rowCount;
    const predictions = new Array<number>(rowCount).fill(base);
    const trees: TreeNode[] = [];
    const rowsPerTree = Math.max(1, Math.ceil(rowCount * settings.rowSampleRate));
    const featuresPerTree = Math.max(1, Math.ceil(featureCount * settings.featureSampleRate));

    for (let round = 0; round < settings.rounds; round += 1) {
      const residuals = targets.map((value, index) => value - predictions[index]);
      const rows = rng.sample(rowCount, rowsPerTree);
      const candidates = rng.sample(featureCount, featuresPerTree);
      const tree = buildTree(features, residuals, rows, candidates, 0, settings);
      trees.push(tree);
      for (let i = 0; i < rowCount; i += 1) {
        predictions[i] += settings.learningRate * evaluate(tree, features[i]);
      }
    }

    return new GradientBoostedTrees(base, trees, settings.learningRate, featureCount);
  }

  predict(row: readonly number[]): number {
    if (row.length !== this.featureCount) {
      throw new Error(`expected ${this.featureCount} features, got ${row.length}`);
    }
    return this.trees.reduce(
      (acc, tree) => acc + this.learningRate * evaluate(tree, row),
      this.base
    );
  }

  get treeCount(): number {
    return this.trees.length;
  }
}
