import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { costAnalyzeTool, costAnalyzerTools, costAnomaliesTool } from "./tools.js";

const SAMPLE = fileURLToPath(new URL("./__fixtures__/billing-sample.json", import.meta.url));

const spikeRows = Array.from({ length: 14 }, (_, i) => ({
  date: `2024-01-${String(i + 1).padStart(2, "0")}`,
  service: "AWS Lambda",
  cost: i === 13 ? 500 : 100,
}));

function textOf(result: { content: Array<{ text: string }> }): string {
  return result.content.map((c) => c.text).join("\n");
}

describe("costAnalyzerTools", () => {
  it("registers both tools by name", () => {
    expect(costAnalyzerTools.map((t) => t.name)).toEqual(["cost_analyze", "cost_anomalies"]);
  });
});

describe("cost_analyze", () => {
  it("renders a markdown report for inline records", async () => {
    const text = textOf(await costAnalyzeTool.execute({ records: spikeRows }));
    expect(text.split("\n")[0]).toBe("# Cloud Cost Optimization Report");
    expect(text).toContain("Total cost: $1800.00 USD");
    expect(text).toContain("Records analyzed: 14");
  });

  it("returns the full result as JSON", async () => {
    const text = textOf(await costAnalyzeTool.execute({ records: spikeRows, format: "json" }));
    const parsed: unknown = JSON.parse(text);
    expect(parsed).toMatchObject({
      status: "ok",
      authoritative: true,
      aggregates: { totalCost: 1800, recordCount: 14, currency: "USD" },
      trend: { status: "ok", direction: "increasing" },
    });
  });

  it("reads an export from disk", async () => {
    const text = textOf(await costAnalyzeTool.execute({ inputPath: SAMPLE }));
    expect(text).toContain("Total cost: $101.05 USD");
    expect(text).toContain("Records analyzed: 6");
  });

  it("asks for input when none is given", async () => {
    expect(textOf(await costAnalyzeTool.execute({}))).toBe("Provide either `records` or `inputPath`.");
  });
});

describe("cost_anomalies", () => {
  it("lists anomalous days against the baseline", async () => {
    const text = textOf(await costAnomaliesTool.execute({ records: spikeRows }));
    expect(text).toBe(
      [
        "## Cost Anomalies",
        "Baseline: mean $128.57, std dev $106.90 over 14 days",
        "",
        "- 2024-01-14: $500.00 (high, 3.47 std dev)",
      ].join("\n"),
    );
  });

  it("honors a threshold override", async () => {
    const text = textOf(await costAnomaliesTool.execute({ records: spikeRows, threshold: 5 }));
    expect(text).toBe("No anomalies beyond 5 standard deviations.");
  });

  it("rejects a threshold that is not positive", async () => {
    const records = Array.from({ length: 14 }, (_, i) => ({
      date: `2024-01-${String(i + 1).padStart(2, "0")}`,
      service: "AWS Lambda",
      cost: i % 2 === 0 ? 100 : 101,
    }));

    for (const threshold of [0, -1]) {
      const text = textOf(await costAnomaliesTool.execute({ records, threshold }));
      expect(text).toBe("Invalid cost analyzer configuration:\nanomalyStdDevThreshold: Number must be greater than 0");
    }
  });

  it("needs at least two days", async () => {
    const text = textOf(
      await costAnomaliesTool.execute({ records: [{ date: "2024-01-01", service: "AWS Lambda", cost: 10 }] }),
    );
    expect(text).toBe("Not enough daily data for anomaly detection (1 days).");
  });

  it("asks for input when none is given", async () => {
    expect(textOf(await costAnomaliesTool.execute({}))).toBe("Provide either `records` or `inputPath`.");
  });
});
