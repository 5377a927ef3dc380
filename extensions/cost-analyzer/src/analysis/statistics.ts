/**
 * Small statistical helpers shared by the detector and the rule engine.
 */

import type { SeriesBaseline } from "../types.js";

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Mean and sample standard deviation (n − 1) of a series.
 */
export function computeBaseline(values: readonly number[]): SeriesBaseline {
  const n = values.length;
  if (n === 0) return { mean: 0, stdDev: 0, count: 0 };

  const m = mean(values);
  const variance = n > 1 ? values.reduce((s, v) => s + (v - m) ** 2, 0) / (n - 1) : 0;
  return { mean: m, stdDev: Math.sqrt(variance), count: n };
}

/**
 * Quantile with linear interpolation between closest ranks.
 * `q` is a fraction in [0, 1]; an empty input yields 0.
 */
export function percentile(values: readonly number[], q: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * Math.min(1, Math.max(0, q));
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const lowerValue = sorted[lower] ?? 0;
  const upperValue = sorted[upper] ?? lowerValue;
  return lowerValue + (upperValue - lowerValue) * (position - lower);
}

/** Round a currency amount to cents. */
export function roundCurrency(value: number): number {
  return Math.round(value * 100) / 100;
}
