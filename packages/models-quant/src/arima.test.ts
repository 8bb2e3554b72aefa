import { describe, expect, it } from 'vitest';
import { fitArima, forecastArima, psiWeights } from './arima';

const trend = Array.from({ length: 30 }, (_, t) => 10 + 2 * t);

describe('fitArima', () => {
  it('reproduces a constant series with a zero-width band', () => {
    const model = fitArima(new Array<number>(30).fill(5));
    expect(model.coefficients).toEqual({ phi: 0, theta: 0, seasonalPhi: 0, seasonalTheta: 0 });
    expect(model.sigma2).toBe(0);
    expect(model.fitted).toEqual(new Array<number>(30).fill(5));

    const result = forecastArima(model, 3, 1.96);
    expect(result).toEqual({ mean: [5, 5, 5], lower: [5, 5, 5], upper: [5, 5, 5] });
  });

  it('keeps the autoregressive coefficient inside the stationarity limit', () => {
    const model = fitArima(trend);
    expect(model.coefficients.phi).toBeCloseTo(0.98, 6);
    expect(model.fitted).toHaveLength(30);
    expect(model.fitted[0]).toBe(10);
  });

  it('extrapolates an upward trend with a widening band', () => {
    const result = forecastArima(fitArima(trend), 5, 1.96);
    expect(result.mean[0]).toBeGreaterThan(69.5);
    expect(result.mean[0]).toBeLessThan(70.1);
    for (let i = 1; i < 5; i += 1) {
      expect(result.mean[i]).toBeGreaterThan(result.mean[i - 1]);
      expect(result.upper[i] - result.lower[i]).toBeGreaterThan(result.upper[i - 1] - result.lower[i - 1]);
    }
  });

  it('fits seasonal terms at the requested lag', () => {
    const weekly = Array.from({ length: 42 }, (_, t) => 20 + (t % 7 === 0 ? 8 : 0) + t * 0.1);
    const model = fitArima(weekly, { seasonalPeriod: 7 });
    expect(model.seasonalPeriod).toBe(7);
    const result = forecastArima(model, 14, 1.28);
    expect(result.mean).toHaveLength(14);
    result.mean.forEach((value, index) => {
      expect(result.lower[index]).toBeLessThanOrEqual(value);
      expect(result.upper[index]).toBeGreaterThanOrEqual(value);
    });
  });

  it('rejects histories that are too short', () => {
    expect(() => fitArima([1, 2])).toThrowError(/at least 3 observations/);
    expect(() => fitArima([1, 2, 3, 4, 5, 6, 7, 8], { seasonalPeriod: 7 })).toThrowError(/seasonal lag 7/);
  });
});

describe('psiWeights', () => {
  it('expands a non-seasonal ARMA(1,1)', () => {
    const weights = psiWeights({ phi: 0.5, theta: 0.2, seasonalPhi: 0, seasonalTheta: 0 }, null, 3);
    expect(weights[0]).toBe(1);
    expect(weights[1]).toBeCloseTo(0.7, 12);
    expect(weights[2]).toBeCloseTo(0.35, 12);
  });

  it('propagates the seasonal autoregression', () => {
    const weights = psiWeights({ phi: 0, theta: 0, seasonalPhi: 0.5, seasonalTheta: 0 }, 2, 5);
    expect(weights).toEqual([1, 0, 0.5, 0, 0.25]);
  });
});
