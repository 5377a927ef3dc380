import { describe, expect, it } from "vitest";
import type { CostRecord } from "../types.js";
import { aggregateCosts, sumTotals } from "./aggregator.js";

function record(overrides: Partial<CostRecord> & Pick<CostRecord, "service" | "cost">): CostRecord {
  return { date: "2024-01-01", region: "us-east-1", currency: "USD", ...overrides };
}

describe("aggregateCosts", () => {
  it("reports an empty dataset as a result variant", () => {
    expect(aggregateCosts([])).toEqual({ status: "empty" });
  });

  it("sums, averages and counts per service", () => {
    const result = aggregateCosts([
      record({ service: "Compute", cost: 10 }),
      record({ service: "Compute", cost: 5 }),
    ]);
    if (result.status !== "ok") throw new Error("expected aggregates");

    expect(result.services).toEqual([{ key: "Compute", totalCost: 15, meanCost: 7.5, recordCount: 2 }]);
    expect(result.totalCost).toBe(15);
    expect(result.recordCount).toBe(2);
  });

  it("applies the threshold to aggregated totals, not to single records", () => {
    const tiny = Array.from({ length: 4 }, () => record({ service: "Lambda", cost: 0.005 }));
    const result = aggregateCosts([...tiny, record({ service: "SNS", cost: 0.004 })]);
    if (result.status !== "ok") throw new Error("expected aggregates");

    expect(result.services.map((s) => s.key)).toEqual(["Lambda"]);
    expect(result.services[0]?.totalCost).toBeCloseTo(0.02, 10);
    // Total cost still includes the filtered service.
    expect(result.totalCost).toBeCloseTo(0.024, 10);
  });

  it("orders summaries by descending total, then by key", () => {
    const result = aggregateCosts([
      record({ service: "B", cost: 5, region: "eu-west-1" }),
      record({ service: "A", cost: 5, region: "us-west-2" }),
      record({ service: "C", cost: 9, region: "us-west-2" }),
    ]);
    if (result.status !== "ok") throw new Error("expected aggregates");

    expect(result.services.map((s) => s.key)).toEqual(["C", "A", "B"]);
    expect(result.regions.map((r) => [r.key, r.totalCost])).toEqual([
      ["us-west-2", 14],
      ["eu-west-1", 5],
    ]);
  });

  it("keeps per-service totals equal to the sum of their records", () => {
    const records = [
      record({ service: "EC2", cost: 3.25 }),
      record({ service: "EC2", cost: 1.75, date: "2024-01-02" }),
      record({ service: "S3", cost: 2 }),
    ];
    const result = aggregateCosts(records, { costThreshold: 0 });
    if (result.status !== "ok") throw new Error("expected aggregates");

    expect(sumTotals(result.services)).toBe(7);
    expect(sumTotals(result.regions)).toBe(7);
  });

  it("builds an ascending daily series", () => {
    const result = aggregateCosts([
      record({ service: "EC2", cost: 4, date: "2024-01-03" }),
      record({ service: "EC2", cost: 1, date: "2024-01-01" }),
      record({ service: "S3", cost: 2, date: "2024-01-01" }),
    ]);
    if (result.status !== "ok") throw new Error("expected aggregates");

    expect(result.daily).toEqual([
      { date: "2024-01-01", totalCost: 3 },
      { date: "2024-01-03", totalCost: 4 },
    ]);
  });

  it("summarizes resources under their dominant service", () => {
    const result = aggregateCosts([
      record({ service: "EC2", cost: 8, resourceId: "i-1" }),
      record({ service: "EBS", cost: 2, resourceId: "i-1" }),
      record({ service: "S3", cost: 0.001, resourceId: "bucket-a" }),
      record({ service: "S3", cost: 5 }),
    ]);
    if (result.status !== "ok") throw new Error("expected aggregates");

    expect(result.resources).toEqual([
      { key: "i-1", totalCost: 10, meanCost: 5, recordCount: 2, service: "EC2" },
      { key: "bucket-a", totalCost: 0.001, meanCost: 0.001, recordCount: 1, service: "S3" },
    ]);
  });

  it("labels the run with the most frequent currency", () => {
    const result = aggregateCosts([
      record({ service: "ECS", cost: 1, currency: "CNY" }),
      record({ service: "ECS", cost: 1, currency: "CNY" }),
      record({ service: "EC2", cost: 1 }),
    ]);
    expect(result.status === "ok" && result.currency).toBe("CNY");
  });
});
