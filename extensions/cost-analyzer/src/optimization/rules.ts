/**
 * Optimization rules.
 *
 * Service rules are grouped by family. Each family is an entry in an ordered
 * table of (predicate, rule) pairs; the first predicate that matches a
 * service name picks the rule, and services no family claims use the
 * generic rule. Rules only describe findings and their savings fraction;
 * the engine turns them into priced recommendations.
 */

import type { RuleParameters, ServiceFamilyPatterns } from "../config/schema.js";
import type {
  Confidence,
  Recommendation,
  RecommendationPriority,
  ResourceCostSummary,
  ServiceCostSummary,
  ServiceRecommendationType,
  TrendAnalysis,
} from "../types.js";
import { percentile } from "../analysis/statistics.js";

// =============================================================================
// Service Rules
// =============================================================================

export type ServiceFamily = "compute" | "database" | "storage" | "loadBalancer" | "generic";

/** A rule that fired for a service, before it is priced. */
export type RuleFinding = {
  type: ServiceRecommendationType;
  priority: RecommendationPriority;
  confidence: Confidence;
  /** Fraction of the service's total cost the action is expected to save. */
  savingsFraction: number;
  description: string;
  suggestedAction: string;
};

export type ServiceRule = (summary: ServiceCostSummary, params: RuleParameters) => RuleFinding[];

export type ServiceFamilyEntry = {
  family: ServiceFamily;
  matches: (service: string) => boolean;
  rule: ServiceRule;
};

const amount = (value: number) => value.toFixed(2);

export const computeRule: ServiceRule = (s, { compute: p }) => {
  const findings: RuleFinding[] = [];
  if (s.meanCost < p.rightSizingMaxMeanCost && s.recordCount > p.rightSizingMinRecords) {
    findings.push({
      type: "right_sizing",
      priority: "high",
      confidence: "medium",
      savingsFraction: p.rightSizingFraction,
      description: "Low average cost across many compute line items points to under-utilized instances",
      suggestedAction: "Downsize instance types or move suitable workloads to spot capacity",
    });
  }
  if (s.totalCost > p.reservedMinTotalCost) {
    findings.push({
      type: "reserved_capacity",
      priority: "medium",
      confidence: "high",
      savingsFraction: p.reservedFraction,
      description: `Compute spend of ${amount(s.totalCost)} is high enough to justify reserved capacity`,
      suggestedAction: "Commit to 1-year reserved instances or savings plans (typically 20-30% cheaper)",
    });
  }
  if (s.recordCount > p.spotMinRecords) {
    findings.push({
      type: "spot_capacity",
      priority: "medium",
      confidence: "low",
      savingsFraction: p.spotFraction,
      description: "Fault-tolerant workloads could run on spot or preemptible capacity",
      suggestedAction: "Move interruptible jobs to spot instances (typically 50-70% cheaper)",
    });
  }
  return findings;
};

export const databaseRule: ServiceRule = (s, { database: p }) => {
  const findings: RuleFinding[] = [];
  if (s.meanCost < p.rightSizingMaxMeanCost && s.recordCount > p.rightSizingMinRecords) {
    findings.push({
      type: "right_sizing",
      priority: "medium",
      confidence: "medium",
      savingsFraction: p.rightSizingFraction,
      description: "Database instances look over-provisioned for their spend pattern",
      suggestedAction: "Review CPU and memory utilization and move to smaller instance classes",
    });
  }
  if (s.totalCost > p.reservedMinTotalCost) {
    findings.push({
      type: "reserved_capacity",
      priority: "high",
      confidence: "high",
      savingsFraction: p.reservedFraction,
      description: `Database spend of ${amount(s.totalCost)} makes reserved instances worthwhile`,
      suggestedAction: "Purchase reserved database instances (typically 30-50% cheaper)",
    });
  }
  return findings;
};

export const storageRule: ServiceRule = (s, { storage: p }) => {
  const findings: RuleFinding[] = [
    {
      type: "storage_tiering",
      priority: "low",
      confidence: "medium",
      savingsFraction: p.tieringFraction,
      description: "Storage classes can be matched more closely to access patterns",
      suggestedAction: "Move infrequently accessed data to infrequent-access or archive tiers",
    },
  ];
  if (s.totalCost > p.lifecycleMinTotalCost) {
    findings.push({
      type: "lifecycle_policy",
      priority: "medium",
      confidence: "medium",
      savingsFraction: p.lifecycleFraction,
      description: `Storage spend of ${amount(s.totalCost)} warrants automated lifecycle management`,
      suggestedAction: "Configure transition and expiration rules (typically 20-40% storage savings)",
    });
  }
  return findings;
};

export const loadBalancerRule: ServiceRule = (s, { loadBalancer: p }) => {
  if (s.meanCost >= p.consolidationMaxMeanCost) return [];
  return [
    {
      type: "consolidation",
      priority: "medium",
      confidence: "medium",
      savingsFraction: p.consolidationFraction,
      description: "Low-traffic load balancers detected",
      suggestedAction: "Consolidate low-traffic load balancers to cut fixed hourly charges",
    },
  ];
};

export const genericRule: ServiceRule = (s, { generic: p }) => {
  if (s.totalCost <= p.monitoringMinTotalCost) return [];
  return [
    {
      type: "cost_monitoring",
      priority: "low",
      confidence: "low",
      savingsFraction: p.monitoringFraction,
      description: `${s.key} spend of ${amount(s.totalCost)} deserves closer monitoring`,
      suggestedAction: "Set cost alerts and usage monitoring for this service",
    },
  ];
};

const FAMILY_RULES: Record<Exclude<ServiceFamily, "generic">, ServiceRule> = {
  compute: computeRule,
  database: databaseRule,
  storage: storageRule,
  loadBalancer: loadBalancerRule,
};

const FAMILY_ORDER = ["compute", "database", "storage", "loadBalancer"] as const;

/**
 * Build the ordered family table from configured name patterns.
 */
export function buildServiceFamilyTable(patterns: ServiceFamilyPatterns): ServiceFamilyEntry[] {
  return FAMILY_ORDER.map((family) => {
    const needles = patterns[family];
    return {
      family,
      matches: (service: string) => needles.some((needle) => service.includes(needle)),
      rule: FAMILY_RULES[family],
    };
  });
}

export function classifyService(
  service: string,
  table: readonly ServiceFamilyEntry[],
): { family: ServiceFamily; rule: ServiceRule } {
  const entry = table.find((e) => e.matches(service));
  return entry ? { family: entry.family, rule: entry.rule } : { family: "generic", rule: genericRule };
}

// =============================================================================
// Resource Rules
// =============================================================================

export function recommendationId(scope: Recommendation["scope"], subject: string, type: string): string {
  return `${scope}:${subject}:${type}`;
}

/**
 * Flag resources above the high-cost percentile for review and the cheapest
 * resources below the idle percentile as possibly idle. Savings are left
 * unquantified; the priority planner prices them.
 */
export function evaluateResourceRules(
  resources: readonly ResourceCostSummary[],
  params: RuleParameters["resources"],
): Recommendation[] {
  if (resources.length === 0) return [];

  const totals = resources.map((r) => r.totalCost);
  const highCut = percentile(totals, params.highCostPercentile);
  const idleCut = percentile(totals, params.idlePercentile);
  const recommendations: Recommendation[] = [];

  for (const r of resources) {
    if (r.totalCost <= highCut) continue;
    recommendations.push({
      id: recommendationId("resource", r.key, "high_cost_review"),
      scope: "resource",
      subject: r.key,
      type: "high_cost_review",
      priority: r.totalCost > params.criticalCostThreshold ? "high" : "medium",
      description: `High-cost ${r.service} resource (${amount(r.totalCost)}); investigate its utilization`,
      suggestedAction: "Monitor utilization and consider resizing, rescheduling or replacing the resource",
      potentialSavings: null,
      baselineCost: r.totalCost,
      confidence: "medium",
    });
  }

  const idle = resources
    .filter((r) => r.totalCost < idleCut)
    .sort((a, b) => a.totalCost - b.totalCost || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
    .slice(0, params.idleLimit);

  for (const r of idle) {
    recommendations.push({
      id: recommendationId("resource", r.key, "idle_resource"),
      scope: "resource",
      subject: r.key,
      type: "idle_resource",
      priority: "low",
      description: `Low-cost ${r.service} resource (${amount(r.totalCost)}) may be idle or under-used`,
      suggestedAction: "Confirm the resource is still needed; delete or reconfigure it if not",
      potentialSavings: null,
      baselineCost: r.totalCost,
      confidence: "low",
    });
  }

  return recommendations;
}

// =============================================================================
// Portfolio Rules
// =============================================================================

export type PortfolioFacts = {
  totalCost: number;
  serviceCount: number;
};

/**
 * Portfolio-level recommendations. These are qualitative and carry no
 * savings figure.
 */
export function evaluateGeneralRules(
  facts: PortfolioFacts,
  params: RuleParameters["general"],
): Recommendation[] {
  const recommendations: Recommendation[] = [];

  if (facts.totalCost > params.governanceMinTotalCost) {
    recommendations.push({
      id: recommendationId("general", "portfolio", "cost_governance"),
      scope: "general",
      type: "cost_governance",
      priority: "high",
      description: `Total spend of ${amount(facts.totalCost)} calls for a cost governance process`,
      suggestedAction:
        "Set budgets and alert thresholds, review costs on a fixed cadence, and enforce cost-allocation tags",
      potentialSavings: null,
      confidence: "medium",
    });
  }

  if (facts.serviceCount > params.consolidationMinServices) {
    recommendations.push({
      id: recommendationId("general", "portfolio", "service_consolidation"),
      scope: "general",
      type: "service_consolidation",
      priority: "medium",
      description: `${facts.serviceCount} billed services in use; look for overlap`,
      suggestedAction:
        "Evaluate whether each service is still needed and reduce cross-service data transfer",
      potentialSavings: null,
      confidence: "low",
    });
  }

  recommendations.push({
    id: recommendationId("general", "portfolio", "monitoring_enhancement"),
    scope: "general",
    type: "monitoring_enhancement",
    priority: "medium",
    description: "Build out continuous cost monitoring",
    suggestedAction: "Publish a cost dashboard, automate periodic cost reports and schedule optimization reviews",
    potentialSavings: null,
    confidence: "medium",
  });

  return recommendations;
}

/**
 * Trend-driven recommendations: a steep rise calls for an urgent
 * investigation, a moderate rise for closer monitoring.
 */
export function evaluateTrendRules(trend: TrendAnalysis, params: RuleParameters["trend"]): Recommendation[] {
  if (trend.status !== "ok") return [];
  const rate = trend.changeRate;

  if (rate > params.spikeChangeRate) {
    return [
      {
        id: recommendationId("trend", "portfolio", "cost_spike_investigation"),
        scope: "trend",
        type: "cost_spike_investigation",
        priority: "high",
        description: `Daily cost rose ${rate.toFixed(1)}% between the earliest and latest ${trend.windowDays}-day windows`,
        suggestedAction: "Investigate newly created resources and usage spikes immediately",
        potentialSavings: null,
        confidence: "high",
      },
    ];
  }
  if (rate > params.monitoringChangeRate) {
    return [
      {
        id: recommendationId("trend", "portfolio", "cost_trend_monitoring"),
        scope: "trend",
        type: "cost_trend_monitoring",
        priority: "medium",
        description: `Daily cost is trending up (${rate.toFixed(1)}%)`,
        suggestedAction: "Find the drivers of the increase and set cost alerts",
        potentialSavings: null,
        confidence: "medium",
      },
    ];
  }
  return [];
}
