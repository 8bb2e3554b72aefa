import { dot, leastSquares } from './linearAlgebra';
import type { IntervalForecast } from './arima';

export interface SeasonalComponent {
  name: 'weekly' | 'monthly' | 'yearly';
  /** Period in days */
  period: number;
  order: number;
}

export interface AdditiveOptions {
  includeSeasonality?: boolean;
  maxChangepoints?: number;
  /** Share of history that may hold changepoints */
  changepointRange?: number;
  changepointPenalty?: number;
  seasonalityPenalty?: number;
}

export interface AdditiveModel {
  changepoints: number[];
  components: SeasonalComponent[];
  coefficients: number[];
  /** In-sample fitted values in the original units */
  fitted: number[];
  residualStd: number;
  observations: number;
  predict: (dayOffset: number) => number;
}

const DEFAULTS = {
  includeSeasonality: true,
  maxChangepoints: 25,
  changepointRange: 0.8,
  changepointPenalty: 5,
  seasonalityPenalty: 0.01,
} satisfies Required<AdditiveOptions>;

/**
 * Fourier components the history can support: weekly for sub-weekly spacing
 * over at least two weeks, monthly for sub-monthly spacing over two months,
 * yearly over two years.
 */
export const seasonalComponents = (spacingDays: number, spanDays: number): SeasonalComponent[] => {
  const components: SeasonalComponent[] = [];
  if (spacingDays < 7 && spanDays >= 14) {
    components.push({ name: 'weekly', period: 7, order: 3 });
  }
  if (spacingDays < 28 && spanDays >= 61) {
    components.push({ name: 'monthly', period: 30.5, order: 5 });
  }
  if (spanDays >= 730) {
    components.push({ name: 'yearly', period: 365.25, order: 10 });
  }
  return components;
};

/** Changepoint positions (indices) evenly spread over the first `range` of history. */
export const changepointIndices = (observations: number, maxChangepoints: number, range: number): number[] => {
  const window = Math.floor(observations * range);
  const count = Math.min(maxChangepoints, window - 1);
  if (count <= 0) {
    return [];
  }
  return Array.from({ length: count }, (_, k) => Math.round(((k + 1) * (window - 1)) / count));
};

const fourierTerms = (dayOffset: number, components: readonly SeasonalComponent[]): number[] => {
  const terms: number[] = [];
  for (const component of components) {
    for (let j = 1; j <= component.order; j += 1) {
      const angle = (2 * Math.PI * j * dayOffset) / component.period;
      terms.push(Math.sin(angle), Math.cos(angle));
    }
  }
  return terms;
};

/**
 * Piecewise-linear trend with ridge-penalised slope changes plus Fourier
 * seasonality, fitted by least squares on max-scaled demand.
 */
export const fitAdditive = (
  dayOffsets: readonly number[],
  values: readonly number[],
  options: AdditiveOptions = {}
): AdditiveModel => {
  const settings = { ...DEFAULTS, ...options };
  const n = values.length;
  if (n < 3 || dayOffsets.length !== n) {
    throw new Error(`additive model needs at least 3 aligned observations, got ${n}`);
  }

  const origin = dayOffsets[0];
  const span = dayOffsets[n - 1] - origin || 1;
  const scale = Math.max(...values.map(Math.abs)) || 1;
  const spacing = span / (n - 1);
  const components = settings.includeSeasonality ? seasonalComponents(spacing, span) : [];
  const changepoints = changepointIndices(n, settings.maxChangepoints, settings.changepointRange).map(
    (index) => (dayOffsets[index] - origin) / span
  );

  const design = (dayOffset: number): number[] => {
    const t = (dayOffset - origin) / span;
    return [
      1,
      t,
      ...changepoints.map((point) => Math.max(t - point, 0)),
      ...fourierTerms(dayOffset - origin, components),
    ];
  };

  const rows = dayOffsets.map(design);
  const seasonalCount = rows[0].length - 2 - changepoints.length;
  const penalties = [
    0,
    0,
    ...changepoints.map(() => settings.changepointPenalty),
    ...new Array<number>(seasonalCount).fill(settings.seasonalityPenalty),
  ];
  const coefficients = leastSquares(
    rows,
    values.map((value) => value / scale),
    { ridge: penalties }
  );
  if (!coefficients || coefficients.some((value) => !Number.isFinite(value))) {
    throw new Error('trend regression is singular');
  }

  const predict = (dayOffset: number): number => dot(design(dayOffset), coefficients) * scale;
  const fitted = dayOffsets.map(predict);
  const squaredError = fitted.reduce((acc, value, index) => acc + (values[index] - value) ** 2, 0);

  return {
    changepoints,
    components,
    coefficients,
    fitted,
    residualStd: Math.sqrt(squaredError / n),
    observations: n,
    predict,
  };
};

/** Band half-width grows with the step: σ · z · √(1 + h / n). */
export const forecastAdditive = (
  model: AdditiveModel,
  futureOffsets: readonly number[],
  z: number
): IntervalForecast => {
  const mean = futureOffsets.map(model.predict);
  const widths = mean.map(
    (_, index) => model.residualStd * z * Math.sqrt(1 + (index + 1) / model.observations)
  );
  return {
    mean,
    lower: mean.map((value, index) => value - widths[index]),
    upper: mean.map((value, index) => value + widths[index]),
  };
};
