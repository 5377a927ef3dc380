/**
 * Cost analysis pipeline: normalize → aggregate → detect → recommend → plan.
 *
 * One call is one self-contained run. Configuration and logger come in as
 * arguments and nothing is cached between runs.
 */

import { DEFAULT_CONFIG } from "./config/loader.js";
import type { AnalyzerConfig } from "./config/schema.js";
import { aggregateCosts } from "./aggregation/aggregator.js";
import { calculateTrend } from "./analysis/trend.js";
import { detectAnomalies } from "./analysis/anomaly.js";
import { normalizeRecords, type NormalizeOptions } from "./ingest/normalize.js";
import { createSilentLogger, type CostAnalyzerLogger } from "./logging/logger.js";
import { generateRecommendations } from "./optimization/engine.js";
import { EMPTY_REPORT, planPriorities } from "./planner/planner.js";
import type { AnalysisResult, CostAggregates } from "./types.js";

export type AnalyzeOptions = {
  config?: AnalyzerConfig;
  logger?: CostAnalyzerLogger;
  normalize?: NormalizeOptions;
  /** Set to false when any input row is placeholder data. */
  authoritative?: boolean;
  now?: () => Date;
};

const EMPTY_AGGREGATES: CostAggregates = Object.freeze({
  services: [],
  regions: [],
  resources: [],
  daily: [],
  totalCost: 0,
  recordCount: 0,
  currency: "USD",
});

/**
 * Analyze raw billing rows and build the optimization report.
 */
export function analyzeCosts(rows: readonly unknown[], options: AnalyzeOptions = {}): AnalysisResult {
  const config = options.config ?? DEFAULT_CONFIG;
  const log = (options.logger ?? createSilentLogger()).child("analysis");
  const generatedAt = (options.now?.() ?? new Date()).toISOString();
  const authoritative = options.authoritative ?? true;

  const { records, dropped } = normalizeRecords(rows, options.normalize);
  if (dropped.length > 0) {
    log.warn(`Dropped ${dropped.length} malformed billing row(s)`, {
      dropped: dropped.length,
      firstReason: dropped[0]?.reason,
    });
  }

  const aggregation = aggregateCosts(records, { costThreshold: config.costThreshold });
  if (aggregation.status === "empty" || aggregation.services.length === 0) {
    log.info("No billable cost data to analyze", { rows: rows.length, records: records.length });
    return {
      status: "empty",
      generatedAt,
      aggregates: aggregation.status === "empty" ? EMPTY_AGGREGATES : stripStatus(aggregation),
      trend: { status: "insufficient_data", points: aggregation.status === "empty" ? 0 : aggregation.daily.length },
      anomalies: { status: "insufficient_data", points: aggregation.status === "empty" ? 0 : aggregation.daily.length },
      report: EMPTY_REPORT,
      dropped,
      authoritative,
    };
  }

  const aggregates = stripStatus(aggregation);
  log.debug("Aggregated billing records", {
    records: aggregates.recordCount,
    services: aggregates.services.length,
    regions: aggregates.regions.length,
    resources: aggregates.resources.length,
    days: aggregates.daily.length,
  });

  const trend = calculateTrend(aggregates.daily, { windowDays: config.trendWindowDays });
  const anomalies = detectAnomalies(aggregates.daily, { threshold: config.anomalyStdDevThreshold });
  if (anomalies.status === "ok" && anomalies.anomalies.length > 0) {
    log.info(`Detected ${anomalies.anomalies.length} cost anomal${anomalies.anomalies.length === 1 ? "y" : "ies"}`);
  }

  const recommendations = generateRecommendations(aggregates, trend, config);
  const report = planPriorities(recommendations, {
    topActionsCap: config.topActionsCap,
    resourceSavings: config.rules.resources,
  });
  log.info("Optimization report ready", {
    totalCost: aggregates.totalCost,
    potentialSavings: report.totalPotentialSavings,
    actions: report.priorityActions.length,
  });

  return {
    status: "ok",
    generatedAt,
    aggregates,
    trend,
    anomalies,
    report,
    dropped,
    authoritative,
  };
}

function stripStatus(result: CostAggregates & { status: "ok" }): CostAggregates {
  const { status: _status, ...aggregates } = result;
  return aggregates;
}
