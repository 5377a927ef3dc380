/**
 * Optimization Rule Engine
 *
 * Runs the service, resource, portfolio and trend rules over one run's
 * aggregates and prices the service findings.
 */

import type { AnalyzerConfig } from "../config/schema.js";
import type {
  CostAggregates,
  Recommendation,
  ServiceCostSummary,
  TrendAnalysis,
} from "../types.js";
import { roundCurrency } from "../analysis/statistics.js";
import {
  buildServiceFamilyTable,
  classifyService,
  evaluateGeneralRules,
  evaluateResourceRules,
  evaluateTrendRules,
  recommendationId,
  type ServiceFamilyEntry,
} from "./rules.js";

export type RecommendationSet = {
  service: Record<string, Recommendation[]>;
  serviceSavings: Record<string, number>;
  resource: Recommendation[];
  general: Recommendation[];
  trend: Recommendation[];
};

export type EngineConfig = Pick<AnalyzerConfig, "rules" | "serviceFamilies">;

/**
 * Evaluate the family rule for one service. Every finding is kept; the
 * summed savings never exceed the service's total cost.
 */
export function recommendForService(
  summary: ServiceCostSummary,
  config: EngineConfig,
  table: readonly ServiceFamilyEntry[] = buildServiceFamilyTable(config.serviceFamilies),
): Recommendation[] {
  const { rule } = classifyService(summary.key, table);
  let remaining = summary.totalCost;

  return rule(summary, config.rules).map((finding) => {
    const savings = Math.min(roundCurrency(summary.totalCost * finding.savingsFraction), remaining);
    remaining -= savings;
    return {
      id: recommendationId("service", summary.key, finding.type),
      scope: "service",
      subject: summary.key,
      type: finding.type,
      priority: finding.priority,
      description: finding.description,
      suggestedAction: finding.suggestedAction,
      potentialSavings: savings,
      baselineCost: summary.totalCost,
      confidence: finding.confidence,
    };
  });
}

export function generateRecommendations(
  aggregates: CostAggregates,
  trend: TrendAnalysis,
  config: EngineConfig,
): RecommendationSet {
  const table = buildServiceFamilyTable(config.serviceFamilies);
  const service: Record<string, Recommendation[]> = {};
  const serviceSavings: Record<string, number> = {};

  for (const summary of aggregates.services) {
    const recs = recommendForService(summary, config, table);
    if (recs.length === 0) continue;
    service[summary.key] = recs;
    serviceSavings[summary.key] = roundCurrency(recs.reduce((sum, r) => sum + (r.potentialSavings ?? 0), 0));
  }

  return {
    service,
    serviceSavings,
    resource: evaluateResourceRules(aggregates.resources, config.rules.resources),
    general: evaluateGeneralRules(
      { totalCost: aggregates.totalCost, serviceCount: aggregates.services.length },
      config.rules.general,
    ),
    trend: evaluateTrendRules(trend, config.rules.trend),
  };
}
