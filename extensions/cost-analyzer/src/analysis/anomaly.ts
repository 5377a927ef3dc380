/**
 * Daily cost anomaly detection using a standard-deviation threshold.
 *
 * Deviations are always measured against the baseline of the series being
 * scanned, and that baseline is returned alongside the findings.
 */

import type { Anomaly, AnomalyDetection, DailyCostSeries, SeriesBaseline } from "../types.js";
import { computeBaseline } from "./statistics.js";

export type AnomalyOptions = {
  /** Flag days whose |deviation| exceeds this many standard deviations (default: 2.0). */
  threshold?: number;
};

/**
 * Deviation of a value from a baseline in standard-deviation units, or
 * `null` when the baseline has no spread.
 */
export function deviationFrom(value: number, baseline: SeriesBaseline): number | null {
  if (baseline.stdDev === 0) return null;
  return (value - baseline.mean) / baseline.stdDev;
}

export function detectAnomalies(
  series: DailyCostSeries,
  options: AnomalyOptions = {},
): AnomalyDetection {
  const threshold = options.threshold ?? 2.0;
  if (series.length < 2) {
    return { status: "insufficient_data", points: series.length };
  }

  const baseline = computeBaseline(series.map((p) => p.totalCost));
  const anomalies: Anomaly[] = [];

  for (const point of series) {
    const deviation = deviationFrom(point.totalCost, baseline);
    if (deviation === null) break;
    if (Math.abs(deviation) > threshold) {
      anomalies.push({
        date: point.date,
        cost: point.totalCost,
        type: point.totalCost > baseline.mean ? "high" : "low",
        deviation,
      });
    }
  }

  return { status: "ok", anomalies, baseline, threshold };
}
