/**
 * Cost analyzer tools: full optimization analysis and daily anomaly scan.
 */

import { Type, type Static } from "@sinclair/typebox";

import { analyzeCosts } from "./analyzer.js";
import { DEFAULT_CONFIG, resolveConfig } from "./config/loader.js";
import type { AnalyzerConfig } from "./config/schema.js";
import { ConfigurationError } from "./errors.js";
import type { CostAnalyzerLogger } from "./logging/logger.js";
import { readBillingFile } from "./providers/file.js";
import { formatMoney, formatOptimizationReportMarkdown } from "./reports/markdown.js";

const billingRowSchema = Type.Object({
  date: Type.String({ description: "Billing day in YYYY-MM-DD format" }),
  service: Type.String({ description: "Billed service name" }),
  region: Type.Optional(Type.String({ description: "Region. Default: global" })),
  resourceId: Type.Optional(Type.String({ description: "Resource identifier, when billed per resource" })),
  cost: Type.Number({ description: "Billed amount, non-negative" }),
  currency: Type.Optional(Type.String({ description: "Currency code. Default: USD" })),
});

const billingInputProperties = {
  records: Type.Optional(Type.Array(billingRowSchema, { description: "Billing rows to analyze" })),
  inputPath: Type.Optional(
    Type.String({ description: "Path to a JSON billing export (array of rows or { records: [...] })" }),
  ),
};

export const costAnalyzeInputSchema = Type.Object({
  ...billingInputProperties,
  format: Type.Optional(
    Type.Union([Type.Literal("markdown"), Type.Literal("json")], {
      description: "Output format. Default: markdown",
    }),
  ),
});

export const costAnomaliesInputSchema = Type.Object({
  ...billingInputProperties,
  threshold: Type.Optional(
    Type.Number({
      exclusiveMinimum: 0,
      description: "Standard deviations from the mean that count as anomalous, greater than 0. Default: 2",
    }),
  ),
});

export type CostAnalyzeInput = Static<typeof costAnalyzeInputSchema>;
export type CostAnomaliesInput = Static<typeof costAnomaliesInputSchema>;

export type CostToolContext = {
  config?: AnalyzerConfig;
  logger?: CostAnalyzerLogger;
};

type ToolResult = { content: Array<{ type: "text"; text: string }> };

const text = (value: string): ToolResult => ({ content: [{ type: "text" as const, text: value }] });

const MISSING_INPUT = "Provide either `records` or `inputPath`.";

async function loadRows(input: { records?: unknown[]; inputPath?: string }): Promise<unknown[] | undefined> {
  if (input.records) return input.records;
  if (input.inputPath) return readBillingFile(input.inputPath);
  return undefined;
}

export const costAnalyzeTool = {
  name: "cost_analyze",
  description:
    "Analyze cloud billing records: cost by service, region and resource, daily trend, anomalies, and a ranked list of optimization actions with estimated savings.",
  inputSchema: costAnalyzeInputSchema,
  execute: async (input: CostAnalyzeInput, context: CostToolContext = {}) => {
    const rows = await loadRows(input);
    if (!rows) return text(MISSING_INPUT);

    const result = analyzeCosts(rows, { config: context.config, logger: context.logger });
    if (input.format === "json") {
      return text(JSON.stringify(result, null, 2));
    }
    return text(formatOptimizationReportMarkdown(result));
  },
};

export const costAnomaliesTool = {
  name: "cost_anomalies",
  description:
    "Detect days whose total cloud cost deviates from the period mean by more than a threshold of standard deviations.",
  inputSchema: costAnomaliesInputSchema,
  execute: async (input: CostAnomaliesInput, context: CostToolContext = {}) => {
    const rows = await loadRows(input);
    if (!rows) return text(MISSING_INPUT);

    const base = context.config ?? DEFAULT_CONFIG;
    let config = base;
    if (input.threshold !== undefined) {
      try {
        config = resolveConfig({ ...base, anomalyStdDevThreshold: input.threshold });
      } catch (err) {
        if (err instanceof ConfigurationError) return text(err.message);
        throw err;
      }
    }
    const { anomalies } = analyzeCosts(rows, { config, logger: context.logger });

    if (anomalies.status === "insufficient_data") {
      return text(`Not enough daily data for anomaly detection (${anomalies.points} days).`);
    }
    if (anomalies.anomalies.length === 0) {
      return text(`No anomalies beyond ${anomalies.threshold} standard deviations.`);
    }

    const lines: string[] = [
      "## Cost Anomalies",
      `Baseline: mean ${formatMoney(anomalies.baseline.mean)}, std dev ${formatMoney(anomalies.baseline.stdDev)} over ${anomalies.baseline.count} days`,
      "",
    ];
    for (const a of anomalies.anomalies) {
      lines.push(`- ${a.date}: ${formatMoney(a.cost)} (${a.type}, ${a.deviation.toFixed(2)} std dev)`);
    }
    return text(lines.join("\n"));
  },
};

export const costAnalyzerTools = [costAnalyzeTool, costAnomaliesTool];
