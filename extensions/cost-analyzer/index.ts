/**
 * Cost Analyzer extension: billing aggregation, trend and anomaly
 * detection, optimization rules and priority planning.
 */

export * from "./src/types.js";
export * from "./src/errors.js";
export * from "./src/config/index.js";
export * from "./src/logging/index.js";
export * from "./src/providers/index.js";

export { normalizeRecords, rawCostRecordSchema, isCalendarDate } from "./src/ingest/normalize.js";
export type { NormalizeOptions, NormalizationResult, RawCostRecord } from "./src/ingest/normalize.js";
export { aggregateCosts, compareSummaries, sumTotals } from "./src/aggregation/aggregator.js";
export type { AggregationOptions } from "./src/aggregation/aggregator.js";
export { mean, computeBaseline, percentile, roundCurrency } from "./src/analysis/statistics.js";
export { calculateTrend, classifyChangeRate } from "./src/analysis/trend.js";
export type { TrendOptions } from "./src/analysis/trend.js";
export { detectAnomalies, deviationFrom } from "./src/analysis/anomaly.js";
export type { AnomalyOptions } from "./src/analysis/anomaly.js";
export {
  buildServiceFamilyTable,
  classifyService,
  evaluateGeneralRules,
  evaluateResourceRules,
  evaluateTrendRules,
  recommendationId,
} from "./src/optimization/rules.js";
export type { ServiceFamily, RuleFinding, ServiceRule } from "./src/optimization/rules.js";
export { generateRecommendations, recommendForService } from "./src/optimization/engine.js";
export type { RecommendationSet, EngineConfig } from "./src/optimization/engine.js";
export {
  EMPTY_REPORT,
  planPriorities,
  rankActions,
  dedupeRecommendations,
  quantifyResourceRecommendation,
  toPriorityOrdinal,
} from "./src/planner/planner.js";
export type { PlannerOptions } from "./src/planner/planner.js";
export { analyzeCosts } from "./src/analyzer.js";
export type { AnalyzeOptions } from "./src/analyzer.js";
export {
  formatOptimizationReportMarkdown,
  formatNotificationSummary,
  formatMoney,
  formatChangeRate,
  describeTrend,
} from "./src/reports/markdown.js";
export {
  buildWebhookPayload,
  fetchSender,
  notifyChannels,
  sendToChannel,
  DEFAULT_NOTIFICATION_TITLE,
} from "./src/notifications/webhook.js";
export type {
  NotificationChannel,
  NotificationRecord,
  NotificationStatus,
  NotifyOptions,
  WebhookSender,
  WebhookRequest,
} from "./src/notifications/webhook.js";
export {
  costAnalyzerTools,
  costAnalyzeTool,
  costAnomaliesTool,
  costAnalyzeInputSchema,
  costAnomaliesInputSchema,
} from "./src/tools.js";
export type { CostAnalyzeInput, CostAnomaliesInput, CostToolContext } from "./src/tools.js";
export { registerCostAnalyzerCli, defaultRange, resolveRange } from "./src/cli.js";
export type { CliDependencies } from "./src/cli.js";
