/**
 * Cost Aggregator
 *
 * Groups billing records by service, region, resource and date. The cost
 * threshold applies to the aggregated service and region totals, so many
 * tiny records still surface when their sum is large enough.
 */

import type {
  AggregationResult,
  CostRecord,
  CostSummary,
  DailyCostPoint,
  ResourceCostSummary,
} from "../types.js";

export type AggregationOptions = {
  /** Minimum aggregated total for service and region summaries (default: 0.01). */
  costThreshold?: number;
};

type Bucket = { total: number; count: number };

function addTo(map: Map<string, Bucket>, key: string, cost: number): void {
  const bucket = map.get(key);
  if (bucket) {
    bucket.total += cost;
    bucket.count += 1;
  } else {
    map.set(key, { total: cost, count: 1 });
  }
}

/** Descending by total, ascending by key on ties. */
export function compareSummaries(a: CostSummary, b: CostSummary): number {
  if (a.totalCost !== b.totalCost) return b.totalCost - a.totalCost;
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

function toSummaries(map: Map<string, Bucket>, threshold: number): CostSummary[] {
  const summaries: CostSummary[] = [];
  for (const [key, { total, count }] of map) {
    if (total < threshold) continue;
    summaries.push({ key, totalCost: total, meanCost: total / count, recordCount: count });
  }
  return summaries.sort(compareSummaries);
}

/**
 * The service that carries the largest share of a resource's cost; ties go to
 * the alphabetically first service.
 */
function dominantService(costs: Map<string, number>): string {
  let best = "";
  let bestCost = -Infinity;
  for (const [service, cost] of costs) {
    if (cost > bestCost || (cost === bestCost && service < best)) {
      best = service;
      bestCost = cost;
    }
  }
  return best;
}

/**
 * Aggregate records into service, region, resource and daily summaries.
 */
export function aggregateCosts(
  records: readonly CostRecord[],
  options: AggregationOptions = {},
): AggregationResult {
  if (records.length === 0) return { status: "empty" };

  const threshold = options.costThreshold ?? 0.01;
  const services = new Map<string, Bucket>();
  const regions = new Map<string, Bucket>();
  const resources = new Map<string, Bucket>();
  const resourceServices = new Map<string, Map<string, number>>();
  const days = new Map<string, number>();
  const currencies = new Map<string, number>();
  let totalCost = 0;

  for (const record of records) {
    totalCost += record.cost;
    addTo(services, record.service, record.cost);
    addTo(regions, record.region, record.cost);
    days.set(record.date, (days.get(record.date) ?? 0) + record.cost);
    currencies.set(record.currency, (currencies.get(record.currency) ?? 0) + 1);

    if (record.resourceId) {
      addTo(resources, record.resourceId, record.cost);
      let byService = resourceServices.get(record.resourceId);
      if (!byService) {
        byService = new Map();
        resourceServices.set(record.resourceId, byService);
      }
      byService.set(record.service, (byService.get(record.service) ?? 0) + record.cost);
    }
  }

  const resourceSummaries: ResourceCostSummary[] = toSummaries(resources, -Infinity).map((s) => ({
    ...s,
    service: dominantService(resourceServices.get(s.key) ?? new Map()),
  }));

  const daily: DailyCostPoint[] = [...days.entries()]
    .map(([date, total]) => ({ date, totalCost: total }))
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

  // Most frequent currency labels the run; mixed-currency input is not converted.
  let currency = "USD";
  let currencyCount = 0;
  for (const [code, n] of currencies) {
    if (n > currencyCount) {
      currency = code;
      currencyCount = n;
    }
  }

  return {
    status: "ok",
    services: toSummaries(services, threshold),
    regions: toSummaries(regions, threshold),
    resources: resourceSummaries,
    daily,
    totalCost,
    recordCount: records.length,
    currency,
  };
}

/** Sum of totals over a set of summaries. */
export function sumTotals(summaries: readonly CostSummary[]): number {
  return summaries.reduce((sum, s) => sum + s.totalCost, 0);
}
