/**
 * Cost trend: compares the mean of the most recent window of days with the
 * mean of the earliest window.
 */

import type { DailyCostSeries, TrendAnalysis, TrendDirection } from "../types.js";
import { mean, roundCurrency } from "./statistics.js";

export type TrendOptions = {
  /** Days per comparison window (default: 7). Needs twice as many points. */
  windowDays?: number;
  /** Percent change beyond which the trend is no longer "stable" (default: 5). */
  stableBand?: number;
};

export function classifyChangeRate(changeRate: number, stableBand = 5): TrendDirection {
  if (changeRate > stableBand) return "increasing";
  if (changeRate < -stableBand) return "decreasing";
  return "stable";
}

/**
 * Calculate the trend of a daily cost series.
 */
export function calculateTrend(series: DailyCostSeries, options: TrendOptions = {}): TrendAnalysis {
  const windowDays = Math.max(1, Math.floor(options.windowDays ?? 7));
  const points = series.length;

  if (points < 2 || points < windowDays * 2) {
    return { status: "insufficient_data", points };
  }

  const costs = series.map((p) => p.totalCost);
  const earlierMean = mean(costs.slice(0, windowDays));
  const recentMean = mean(costs.slice(-windowDays));
  const changeRate = roundCurrency(earlierMean > 0 ? ((recentMean - earlierMean) / earlierMean) * 100 : 0);

  return {
    status: "ok",
    direction: classifyChangeRate(changeRate, options.stableBand),
    changeRate,
    recentMean,
    earlierMean,
    windowDays,
  };
}
