/**
 * Cost analyzer types: billing records, cost summaries, trend and anomaly
 * findings, recommendations and the optimization report.
 */

// =============================================================================
// Billing Records
// =============================================================================

/** Cloud providers the analyzer knows how to fetch from. */
export type CloudProvider = "aws" | "azure" | "gcp" | "aliyun" | "tencent" | "volcengine" | "file";

/**
 * One billed amount tied to a day, service, region and optionally a resource.
 * The atomic unit of all aggregation.
 */
export type CostRecord = {
  readonly date: string;
  readonly service: string;
  readonly region: string;
  readonly resourceId?: string;
  readonly cost: number;
  readonly currency: string;
  /** Provider the record was fetched from, when known. */
  readonly provider?: CloudProvider;
};

// =============================================================================
// Aggregates
// =============================================================================

/** Grouped sum keyed by service, region or resource id. */
export type CostSummary = {
  readonly key: string;
  readonly totalCost: number;
  readonly meanCost: number;
  readonly recordCount: number;
};

export type ServiceCostSummary = CostSummary;
export type RegionCostSummary = CostSummary;

/** Resource summaries also carry the service the resource is billed under. */
export type ResourceCostSummary = CostSummary & {
  readonly service: string;
};

export type DailyCostPoint = {
  readonly date: string;
  readonly totalCost: number;
};

/** Ascending by date, one entry per distinct date. */
export type DailyCostSeries = readonly DailyCostPoint[];

export type CostAggregates = {
  readonly services: readonly ServiceCostSummary[];
  readonly regions: readonly RegionCostSummary[];
  readonly resources: readonly ResourceCostSummary[];
  readonly daily: DailyCostSeries;
  /** Sum of every input record's cost, before threshold filtering. */
  readonly totalCost: number;
  readonly recordCount: number;
  readonly currency: string;
};

export type AggregationResult =
  | { readonly status: "empty" }
  | ({ readonly status: "ok" } & CostAggregates);

// =============================================================================
// Trend & Anomalies
// =============================================================================

export type TrendDirection = "increasing" | "decreasing" | "stable";

export type TrendAnalysis =
  | { readonly status: "insufficient_data"; readonly points: number }
  | {
      readonly status: "ok";
      readonly direction: TrendDirection;
      /** Percent change between the earliest and the most recent window. */
      readonly changeRate: number;
      readonly recentMean: number;
      readonly earlierMean: number;
      readonly windowDays: number;
    };

export type AnomalyType = "high" | "low";

export type Anomaly = {
  readonly date: string;
  readonly cost: number;
  readonly type: AnomalyType;
  /** Distance from the series mean in standard-deviation units. */
  readonly deviation: number;
};

export type SeriesBaseline = {
  readonly mean: number;
  readonly stdDev: number;
  readonly count: number;
};

export type AnomalyDetection =
  | { readonly status: "insufficient_data"; readonly points: number }
  | {
      readonly status: "ok";
      readonly anomalies: readonly Anomaly[];
      readonly baseline: SeriesBaseline;
      readonly threshold: number;
    };

// =============================================================================
// Recommendations
// =============================================================================

export type RecommendationScope = "service" | "resource" | "general" | "trend";

export type RecommendationPriority = "high" | "medium" | "low";

export type Confidence = "high" | "medium" | "low";

export type ServiceRecommendationType =
  | "right_sizing"
  | "reserved_capacity"
  | "spot_capacity"
  | "storage_tiering"
  | "lifecycle_policy"
  | "consolidation"
  | "cost_monitoring";

export type ResourceRecommendationType = "high_cost_review" | "idle_resource";

export type GeneralRecommendationType =
  | "cost_governance"
  | "service_consolidation"
  | "monitoring_enhancement";

export type TrendRecommendationType = "cost_spike_investigation" | "cost_trend_monitoring";

export type RecommendationType =
  | ServiceRecommendationType
  | ResourceRecommendationType
  | GeneralRecommendationType
  | TrendRecommendationType;

export type Recommendation = {
  /** Stable identity: `${scope}:${subject}:${type}`. */
  readonly id: string;
  readonly scope: RecommendationScope;
  /** Service name or resource id the recommendation targets. */
  readonly subject?: string;
  readonly type: RecommendationType;
  readonly priority: RecommendationPriority;
  readonly description: string;
  readonly suggestedAction: string;
  /** `null` when the saving is qualitative or not yet quantified. */
  readonly potentialSavings: number | null;
  /** Cost the saving is measured against. */
  readonly baselineCost?: number;
  readonly confidence: Confidence;
};

export type PriorityActionCategory =
  | "urgent_investigation"
  | "service_optimization"
  | "resource_optimization"
  | "trend_monitoring";

/** 0 = urgent trend-driven investigation, 1 = high, 2 = medium/low. */
export type PriorityOrdinal = 0 | 1 | 2;

export type PriorityAction = {
  readonly ordinal: PriorityOrdinal;
  readonly category: PriorityActionCategory;
  readonly subject?: string;
  readonly description: string;
  readonly suggestedAction: string;
  readonly potentialSavings: number;
  readonly recommendationId: string;
};

export type OptimizationReport = {
  readonly totalPotentialSavings: number;
  readonly serviceRecommendations: Readonly<Record<string, readonly Recommendation[]>>;
  /** Per-service sum of the service recommendations' savings. */
  readonly serviceSavings: Readonly<Record<string, number>>;
  readonly resourceRecommendations: readonly Recommendation[];
  readonly generalRecommendations: readonly Recommendation[];
  readonly trendRecommendations: readonly Recommendation[];
  readonly priorityActions: readonly PriorityAction[];
};

// =============================================================================
// Analysis Result
// =============================================================================

export type DroppedRecord = {
  readonly index: number;
  readonly reason: string;
};

export type AnalysisResult = {
  readonly status: "ok" | "empty";
  readonly generatedAt: string;
  readonly aggregates: CostAggregates;
  readonly trend: TrendAnalysis;
  readonly anomalies: AnomalyDetection;
  readonly report: OptimizationReport;
  /** Malformed input rows that were excluded before aggregation. */
  readonly dropped: readonly DroppedRecord[];
  /** False when any input came from placeholder (fallback) data. */
  readonly authoritative: boolean;
};
