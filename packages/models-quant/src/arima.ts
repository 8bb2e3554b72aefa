import { leastSquares } from './linearAlgebra';

const COEFFICIENT_LIMIT = 0.98;
const DEFAULT_RIDGE = 1e-4;

export interface ArimaOptions {
  /** Lag of the seasonal AR and MA terms; null fits ARIMA(1,1,1) only */
  seasonalPeriod?: number | null;
  ridge?: number;
}

export interface ArimaCoefficients {
  phi: number;
  theta: number;
  seasonalPhi: number;
  seasonalTheta: number;
}

export interface ArimaModel {
  coefficients: ArimaCoefficients;
  seasonalPeriod: number | null;
  /** Innovation variance of the differenced series */
  sigma2: number;
  /** One-step in-sample predictions aligned with the input, first value echoes it */
  fitted: number[];
  lastValue: number;
  differences: number[];
  residuals: number[];
}

export interface IntervalForecast {
  mean: number[];
  lower: number[];
  upper: number[];
}

const lagged = (values: readonly number[], index: number, lag: number): number =>
  index - lag >= 0 ? values[index - lag] : 0;

const firstDifferences = (values: readonly number[]): number[] =>
  values.slice(1).map((value, index) => value - values[index]);

/** Scales a pair so |a| + |b| stays below the stationarity limit. */
const constrainPair = (a: number, b: number): [number, number] => {
  const clippedA = Math.max(-COEFFICIENT_LIMIT, Math.min(COEFFICIENT_LIMIT, a));
  const clippedB = Math.max(-COEFFICIENT_LIMIT, Math.min(COEFFICIENT_LIMIT, b));
  const total = Math.abs(clippedA) + Math.abs(clippedB);
  if (total <= COEFFICIENT_LIMIT) {
    return [clippedA, clippedB];
  }
  const scale = COEFFICIENT_LIMIT / total;
  return [clippedA * scale, clippedB * scale];
};

const predictDifference = (
  differences: readonly number[],
  residuals: readonly number[],
  index: number,
  coefficients: ArimaCoefficients,
  seasonalPeriod: number | null
): number => {
  let prediction =
    coefficients.phi * lagged(differences, index, 1) + coefficients.theta * lagged(residuals, index, 1);
  if (seasonalPeriod !== null) {
    prediction +=
      coefficients.seasonalPhi * lagged(differences, index, seasonalPeriod) +
      coefficients.seasonalTheta * lagged(residuals, index, seasonalPeriod);
  }
  return prediction;
};

/** Stage one: long autoregression whose residuals stand in for the innovations. */
const proxyInnovations = (differences: readonly number[], order: number, ridge: number): number[] => {
  const rows: number[][] = [];
  const targets: number[] = [];
  for (let t = order; t < differences.length; t += 1) {
    rows.push(Array.from({ length: order }, (_, lag) => differences[t - lag - 1]));
    targets.push(differences[t]);
  }
  const weights = leastSquares(rows, targets, { ridge });
  if (!weights) {
    throw new Error('long autoregression is singular');
  }
  return differences.map((value, t) => {
    if (t < order) {
      return 0;
    }
    let prediction = 0;
    for (let lag = 0; lag < order; lag += 1) {
      prediction += weights[lag] * differences[t - lag - 1];
    }
    return value - prediction;
  });
};

/**
 * Fits ARIMA(1,1,1), optionally with seasonal AR and MA terms at one lag, to
 * the first differences using the two-stage Hannan-Rissanen regression.
 */
export const fitArima = (values: readonly number[], options: ArimaOptions = {}): ArimaModel => {
  if (values.length < 3) {
    throw new Error(`ARIMA needs at least 3 observations, got ${values.length}`);
  }
  const seasonalPeriod = options.seasonalPeriod ?? null;
  const ridge = options.ridge ?? DEFAULT_RIDGE;
  const differences = firstDifferences(values);
  const m = differences.length;
  const maxLag = seasonalPeriod ?? 1;
  if (m <= maxLag + 1) {
    throw new Error(`seasonal lag ${maxLag} leaves too few differenced observations (${m})`);
  }

  const longOrder = Math.max(1, Math.min(seasonalPeriod === null ? 8 : seasonalPeriod + 2, Math.floor(m / 3)));
  const innovations = proxyInnovations(differences, longOrder, ridge);

  const rows: number[][] = [];
  const targets: number[] = [];
  for (let t = maxLag; t < m; t += 1) {
    const row = [differences[t - 1], innovations[t - 1]];
    if (seasonalPeriod !== null) {
      row.push(differences[t - seasonalPeriod], innovations[t - seasonalPeriod]);
    }
    rows.push(row);
    targets.push(differences[t]);
  }
  const solved = leastSquares(rows, targets, { ridge });
  if (!solved || solved.some((value) => !Number.isFinite(value))) {
    throw new Error('ARMA regression is singular');
  }

  const seasonal = seasonalPeriod !== null;
  const [phi, seasonalPhi] = constrainPair(solved[0], seasonal ? solved[2] : 0);
  const [theta, seasonalTheta] = constrainPair(solved[1], seasonal ? solved[3] : 0);
  const coefficients: ArimaCoefficients = { phi, theta, seasonalPhi, seasonalTheta };

  const residuals: number[] = [];
  const predictions: number[] = [];
  for (let t = 0; t < m; t += 1) {
    const prediction = predictDifference(differences, residuals, t, coefficients, seasonalPeriod);
    predictions.push(prediction);
    residuals.push(differences[t] - prediction);
  }

  const scored = residuals.slice(maxLag);
  const sigma2 = scored.reduce((acc, value) => acc + value * value, 0) / scored.length;

  return {
    coefficients,
    seasonalPeriod,
    sigma2,
    fitted: [values[0], ...predictions.map((prediction, t) => values[t] + prediction)],
    lastValue: values[values.length - 1],
    differences,
    residuals,
  };
};

/** MA(∞) weights of the differenced process. */
export const psiWeights = (
  coefficients: ArimaCoefficients,
  seasonalPeriod: number | null,
  count: number
): number[] => {
  const psi: number[] = [];
  for (let j = 0; j < count; j += 1) {
    if (j === 0) {
      psi.push(1);
      continue;
    }
    let weight = coefficients.phi * psi[j - 1];
    if (j === 1) {
      weight += coefficients.theta;
    }
    if (seasonalPeriod !== null) {
      weight += coefficients.seasonalPhi * lagged(psi, j, seasonalPeriod);
      if (j === seasonalPeriod) {
        weight += coefficients.seasonalTheta;
      }
    }
    psi.push(weight);
  }
  return psi;
};

/**
 * Multi-step forecast in levels. The band widens with the cumulative ψ-weights,
 * which integrate the differenced process back to levels.
 */
export const forecastArima = (model: ArimaModel, horizon: number, z: number): IntervalForecast => {
  const differences = [...model.differences];
  const residuals = [...model.residuals];
  const psi = psiWeights(model.coefficients, model.seasonalPeriod, horizon);

  const mean: number[] = [];
  const lower: number[] = [];
  const upper: number[] = [];
  let level = model.lastValue;
  let cumulativePsi = 0;
  let variance = 0;

  for (let step = 0; step < horizon; step += 1) {
    const index = differences.length;
    const next = predictDifference(differences, residuals, index, model.coefficients, model.seasonalPeriod);
    differences.push(next);
    residuals.push(0);
    level += next;

    cumulativePsi += psi[step];
    variance += model.sigma2 * cumulativePsi * cumulativePsi;
    const width = z * Math.sqrt(variance);

    mean.push(level);
    lower.push(level - width);
    upper.push(level + width);
  }

  return { mean, lower, upper };
};
