/**
 * Priority Planner
 *
 * Prices resource recommendations, merges every recommendation source into
 * one ranked action list and totals the report's potential savings.
 */

import type { RuleParameters } from "../config/schema.js";
import type {
  OptimizationReport,
  PriorityAction,
  PriorityActionCategory,
  PriorityOrdinal,
  Recommendation,
} from "../types.js";
import { roundCurrency } from "../analysis/statistics.js";
import type { RecommendationSet } from "../optimization/engine.js";

export type PlannerOptions = {
  /** Maximum number of priority actions (default: 10). */
  topActionsCap?: number;
  resourceSavings?: Pick<RuleParameters["resources"], "highPrioritySavingsRate" | "mediumPrioritySavingsRate">;
};

export const EMPTY_REPORT: OptimizationReport = Object.freeze({
  totalPotentialSavings: 0,
  serviceRecommendations: {},
  serviceSavings: {},
  resourceRecommendations: [],
  generalRecommendations: [],
  trendRecommendations: [],
  priorityActions: [],
});

/**
 * Attach an estimated saving to a resource recommendation that has none:
 * high priority saves a larger share of the resource's cost than medium,
 * low priority is not priced.
 */
export function quantifyResourceRecommendation(
  rec: Recommendation,
  rates: NonNullable<PlannerOptions["resourceSavings"]> = {
    highPrioritySavingsRate: 0.2,
    mediumPrioritySavingsRate: 0.1,
  },
): Recommendation {
  if (rec.potentialSavings !== null) return rec;
  const baseline = rec.baselineCost ?? 0;
  const rate =
    rec.priority === "high"
      ? rates.highPrioritySavingsRate
      : rec.priority === "medium"
        ? rates.mediumPrioritySavingsRate
        : 0;
  return { ...rec, potentialSavings: Math.min(roundCurrency(baseline * rate), baseline) };
}

export function toPriorityOrdinal(rec: Recommendation): PriorityOrdinal {
  if (rec.scope === "trend" && rec.priority === "high") return 0;
  return rec.priority === "high" ? 1 : 2;
}

function categoryOf(rec: Recommendation, ordinal: PriorityOrdinal): PriorityActionCategory {
  switch (rec.scope) {
    case "trend":
      return ordinal === 0 ? "urgent_investigation" : "trend_monitoring";
    case "resource":
      return "resource_optimization";
    default:
      return "service_optimization";
  }
}

const savingsOf = (rec: Recommendation) => rec.potentialSavings ?? 0;

/**
 * Merge recommendations, dropping repeated ids (the larger saving wins).
 * First-seen order is kept for the survivors.
 */
export function dedupeRecommendations(recs: readonly Recommendation[]): Recommendation[] {
  const byId = new Map<string, Recommendation>();
  for (const rec of recs) {
    const existing = byId.get(rec.id);
    if (!existing || savingsOf(rec) > savingsOf(existing)) {
      byId.set(rec.id, rec);
    }
  }
  return [...byId.values()];
}

/**
 * Rank recommendations: ascending ordinal, then descending savings.
 * The sort is stable, so equal keys keep their merge order.
 */
export function rankActions(recs: readonly Recommendation[], cap: number): PriorityAction[] {
  return recs
    .map((rec): PriorityAction => {
      const ordinal = toPriorityOrdinal(rec);
      return {
        ordinal,
        category: categoryOf(rec, ordinal),
        ...(rec.subject !== undefined ? { subject: rec.subject } : {}),
        description: rec.description,
        suggestedAction: rec.suggestedAction,
        potentialSavings: savingsOf(rec),
        recommendationId: rec.id,
      };
    })
    .sort((a, b) => a.ordinal - b.ordinal || b.potentialSavings - a.potentialSavings)
    .slice(0, Math.max(0, cap));
}

/**
 * Build the optimization report from one run's recommendation set.
 */
export function planPriorities(set: RecommendationSet, options: PlannerOptions = {}): OptimizationReport {
  const cap = options.topActionsCap ?? 10;
  const resourceRecommendations = set.resource.map((rec) =>
    quantifyResourceRecommendation(rec, options.resourceSavings),
  );
  const serviceRecs = Object.values(set.service).flat();

  const merged = dedupeRecommendations([...set.trend, ...serviceRecs, ...resourceRecommendations]);
  const priorityActions = rankActions(merged, cap);

  const everyRecommendation = dedupeRecommendations([
    ...serviceRecs,
    ...resourceRecommendations,
    ...set.general,
    ...set.trend,
  ]);
  const totalPotentialSavings = roundCurrency(
    everyRecommendation.reduce((sum, rec) => sum + savingsOf(rec), 0),
  );

  return {
    totalPotentialSavings,
    serviceRecommendations: set.service,
    serviceSavings: set.serviceSavings,
    resourceRecommendations,
    generalRecommendations: set.general,
    trendRecommendations: set.trend,
    priorityActions,
  };
}
