import { SeededRandom } from '@replenish/core';

export interface RecurrentOptions {
  hiddenSize?: number;
  /** Window length; defaults to min(30, ⌊n/2⌋) */
  lookback?: number;
  epochs?: number;
  batchSize?: number;
  learningRate?: number;
  seed?: number;
}

interface Layout {
  hidden: number;
  inputWeights: number;
  recurrentWeights: number;
  bias: number;
  outputWeights: number;
  outputBias: number;
  size: number;
}

const DEFAULTS = {
  hiddenSize: 8,
  epochs: 40,
  batchSize: 32,
  learningRate: 0.01,
  seed: 42,
};

const BETA1 = 0.9;
const BETA2 = 0.999;
const ADAM_EPSILON = 1e-8;
const GRADIENT_CLIP = 5;

const layoutFor = (hidden: number): Layout => {
  const inputWeights = 0;
  const recurrentWeights = inputWeights + hidden;
  const bias = recurrentWeights + hidden * hidden;
  const outputWeights = bias + hidden;
  const outputBias = outputWeights + hidden;
  return { hidden, inputWeights, recurrentWeights, bias, outputWeights, outputBias, size: outputBias + 1 };
};

/** Hidden states h_1..h_T for one window; states[0] is the zero state. */
const forward = (params: readonly number[], layout: Layout, window: readonly number[]): number[][] => {
  const { hidden } = layout;
  const states: number[][] = [new Array<number>(hidden).fill(0)];
  for (const input of window) {
    const previous = states[states.length - 1];
    const next = new Array<number>(hidden);
    for (let i = 0; i < hidden; i += 1) {
      let activation = params[layout.bias + i] + params[layout.inputWeights + i] * input;
      for (let j = 0; j < hidden; j += 1) {
        activation += params[layout.recurrentWeights + i * hidden + j] * previous[j];
      }
      next[i] = Math.tanh(activation);
    }
    states.push(next);
  }
  return states;
};

const readout = (params: readonly number[], layout: Layout, state: readonly number[]): number => {
  let output = params[layout.outputBias];
  for (let i = 0; i < layout.hidden; i += 1) {
    output += params[layout.outputWeights + i] * state[i];
  }
  return output;
};

/** Backpropagation through time for one window; adds into `gradient`, returns the squared error. */
const accumulateGradient = (
  params: readonly number[],
  layout: Layout,
  window: readonly number[],
  target: number,
  gradient: number[]
): number => {
  const { hidden } = layout;
  const states = forward(params, layout, window);
  const last = states[states.length - 1];
  const error = readout(params, layout, last) - target;

  gradient[layout.outputBias] += error;
  let upstream = new Array<number>(hidden);
  for (let i = 0; i < hidden; i += 1) {
    gradient[layout.outputWeights + i] += error * last[i];
    upstream[i] = error * params[layout.outputWeights + i];
  }

  for (let t = window.length; t >= 1; t -= 1) {
    const state = states[t];
    const previous = states[t - 1];
    const delta = state.map((value, i) => upstream[i] * (1 - value * value));
    for (let i = 0; i < hidden; i += 1) {
      gradient[layout.inputWeights + i] += delta[i] * window[t - 1];
      gradient[layout.bias + i] += delta[i];
      for (let j = 0; j < hidden; j += 1) {
        gradient[layout.recurrentWeights + i * hidden + j] += delta[i] * previous[j];
      }
    }
    const carried = new Array<number>(hidden).fill(0);
    for (let j = 0; j < hidden; j += 1) {
      for (let i = 0; i < hidden; i += 1) {
        carried[j] += params[layout.recurrentWeights + i * hidden + j] * delta[i];
      }
    }
    upstream = carried;
  }

  return error * error;
};

/**
 * Single-layer tanh recurrent network with a linear head, trained with Adam on
 * standardised lookback windows and rolled forward on its own predictions.
 */
export class RecurrentForecaster {
  private constructor(
    private readonly params: readonly number[],
    private readonly layout: Layout,
    private readonly center: number,
    private readonly spread: number,
    readonly lookback: number,
    readonly finalLoss: number
  ) {}

  static train(values: readonly number[], options: RecurrentOptions = {}): RecurrentForecaster {
    const hiddenSize = options.hiddenSize ?? DEFAULTS.hiddenSize;
    const epochs = options.epochs ?? DEFAULTS.epochs;
    const batchSize = options.batchSize ?? DEFAULTS.batchSize;
    const learningRate = options.learningRate ?? DEFAULTS.learningRate;
    const lookback = options.lookback ?? Math.min(30, Math.floor(values.length / 2));
    if (lookback < 1 || values.length <= lookback) {
      throw new Error(`recurrent model needs more than ${lookback} observations, got ${values.length}`);
    }

    const center = values.reduce((acc, value) => acc + value, 0) / values.length;
    const variance = values.reduce((acc, value) => acc + (value - center) ** 2, 0) / values.length;
    const spread = Math.sqrt(variance) || 1;
    const scaled = values.map((value) => (value - center) / spread);

    const windows: number[][] = [];
    const targets: number[] = [];
    for (let end = lookback; end < scaled.length; end += 1) {
      windows.push(scaled.slice(end - lookback, end));
      targets.push(scaled[end]);
    }

    const layout = layoutFor(hiddenSize);
    const rng = new SeededRandom(options.seed ?? DEFAULTS.seed);
    const limit = 1 / Math.sqrt(hiddenSize);
    const params = Array.from({ length: layout.size }, () => (rng.next() * 2 - 1) * limit);
    const firstMoment = new Array<number>(layout.size).fill(0);
    const secondMoment = new Array<number>(layout.size).fill(0);
    let step = 0;
    let epochLoss = 0;

    for (let epoch = 0; epoch < epochs; epoch += 1) {
      const order = windows.map((_, index) => index);
      for (let i = order.length - 1; i > 0; i -= 1) {
        const j = rng.int(i + 1);
        [order[i], order[j]] = [order[j], order[i]];
      }
      epochLoss = 0;

      for (let start = 0; start < order.length; start += batchSize) {
        const batch = order.slice(start, start + batchSize);
        const gradient = new Array<number>(layout.size).fill(0);
        for (const index of batch) {
          epochLoss += accumulateGradient(params, layout, windows[index], targets[index], gradient);
        }

        step += 1;
        for (let p = 0; p < layout.size; p += 1) {
          const g = Math.max(-GRADIENT_CLIP, Math.min(GRADIENT_CLIP, gradient[p] / batch.length));
          firstMoment[p] = BETA1 * firstMoment[p] + (1 - BETA1) * g;
          secondMoment[p] = BETA2 * secondMoment[p] + (1 - BETA2) * g * g;
          const corrected = firstMoment[p] / (1 - BETA1 ** step);
          const scale = secondMoment[p] / (1 - BETA2 ** step);
          params[p] -= (learningRate * corrected) / (Math.sqrt(scale) + ADAM_EPSILON);
        }
      }
      epochLoss /= windows.length;
    }

    if (params.some((value) => !Number.isFinite(value))) {
      throw new Error('recurrent training diverged');
    }

    return new RecurrentForecaster(params, layout, center, spread, lookback, epochLoss);
  }

  /** Autoregressive forecast seeded with the last `lookback` observations. */
  forecast(history: readonly number[], horizon: number): number[] {
    if (history.length < this.lookback) {
      throw new Error(`forecast needs ${this.lookback} observations of history, got ${history.length}`);
    }
    const window = history.slice(-this.lookback).map((value) => (value - this.center) / this.spread);
    const output: number[] = [];
    for (let step = 0; step < horizon; step += 1) {
      const states = forward(this.params, this.layout, window);
      const next = readout(this.params, this.layout, states[states.length - 1]);
      output.push(next * this.spread + this.center);
      window.shift();
      window.push(next);
    }
    return output;
  }
}
