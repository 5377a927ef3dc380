/**
 * Report formatting.
 *
 * Read-only views over an {@link AnalysisResult}: the full markdown report
 * and the short summary sent to notification channels.
 */

import type { AnalysisResult, AnomalyDetection, PriorityOrdinal, TrendAnalysis } from "../types.js";

const ORDINAL_LABEL: Record<PriorityOrdinal, string> = {
  0: "URGENT",
  1: "HIGH",
  2: "NORMAL",
};

const TOP_SERVICES = 10;
const SUMMARY_ACTIONS = 3;

export function formatMoney(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

export function formatChangeRate(rate: number): string {
  return `${rate > 0 ? "+" : ""}${rate.toFixed(2)}%`;
}

export function describeTrend(trend: TrendAnalysis): string {
  if (trend.status === "insufficient_data") {
    return `insufficient data (${trend.points} day${trend.points === 1 ? "" : "s"})`;
  }
  return `${trend.direction} (${formatChangeRate(trend.changeRate)})`;
}

function anomalyCount(detection: AnomalyDetection): number {
  return detection.status === "ok" ? detection.anomalies.length : 0;
}

// =============================================================================
// Markdown Report
// =============================================================================

export function formatOptimizationReportMarkdown(result: AnalysisResult): string {
  const { aggregates, report } = result;
  const lines: string[] = [
    "# Cloud Cost Optimization Report",
    "",
    `Generated: ${result.generatedAt}`,
    `Total cost: ${formatMoney(aggregates.totalCost)} ${aggregates.currency}`,
    `Records analyzed: ${aggregates.recordCount}`,
    `Potential savings: ${formatMoney(report.totalPotentialSavings)}`,
  ];
  if (result.dropped.length > 0) {
    lines.push(`Dropped rows: ${result.dropped.length}`);
  }
  if (!result.authoritative) {
    lines.push("", "> Placeholder data: figures are estimates, not live billing data.");
  }
  lines.push("");

  if (result.status === "empty") {
    lines.push("No billable cost data in the selected period.");
    return lines.join("\n");
  }

  lines.push(
    "## Top Services",
    "",
    "| Service | Total Cost | Records |",
    "|---------|------------|---------|",
    ...aggregates.services
      .slice(0, TOP_SERVICES)
      .map((s) => `| ${s.key} | ${formatMoney(s.totalCost)} | ${s.recordCount} |`),
    "",
  );

  if (aggregates.regions.length > 0) {
    lines.push(
      "## Regions",
      "",
      "| Region | Total Cost |",
      "|--------|------------|",
      ...aggregates.regions.map((r) => `| ${r.key} | ${formatMoney(r.totalCost)} |`),
      "",
    );
  }

  lines.push("## Cost Trend", "");
  if (result.trend.status === "ok") {
    lines.push(
      `Direction: ${describeTrend(result.trend)}`,
      `Recent ${result.trend.windowDays}-day mean: ${formatMoney(result.trend.recentMean)}, earlier: ${formatMoney(result.trend.earlierMean)}`,
    );
  } else {
    lines.push(`Not enough daily data for trend analysis (${result.trend.points} days).`);
  }
  lines.push("");

  lines.push("## Anomalies", "");
  if (result.anomalies.status === "insufficient_data") {
    lines.push(`Not enough daily data for anomaly detection (${result.anomalies.points} days).`);
  } else if (result.anomalies.anomalies.length === 0) {
    lines.push(`No daily cost beyond ${result.anomalies.threshold} standard deviations.`);
  } else {
    lines.push(
      "| Date | Cost | Type | Deviation |",
      "|------|------|------|-----------|",
      ...result.anomalies.anomalies.map(
        (a) => `| ${a.date} | ${formatMoney(a.cost)} | ${a.type} | ${a.deviation.toFixed(2)} |`,
      ),
    );
  }
  lines.push("");

  if (report.priorityActions.length > 0) {
    lines.push(
      "## Priority Actions",
      "",
      ...report.priorityActions.map((action, i) => {
        const target = action.subject ? ` ${action.subject}:` : "";
        const savings = action.potentialSavings > 0 ? ` (saves ${formatMoney(action.potentialSavings)})` : "";
        return `${i + 1}. **[${ORDINAL_LABEL[action.ordinal]}]**${target} ${action.suggestedAction}${savings}`;
      }),
      "",
    );
  }

  if (report.generalRecommendations.length > 0) {
    lines.push(
      "## General Recommendations",
      "",
      ...report.generalRecommendations.map((r) => `- ${r.description}: ${r.suggestedAction}`),
      "",
    );
  }

  return lines.join("\n").trimEnd();
}

// =============================================================================
// Notification Summary
// =============================================================================

export function formatNotificationSummary(result: AnalysisResult): string {
  const lines: string[] = [
    `**Cloud cost report** (${result.generatedAt.slice(0, 10)})`,
    `Total cost: ${formatMoney(result.aggregates.totalCost)} ${result.aggregates.currency}`,
    `Potential savings: ${formatMoney(result.report.totalPotentialSavings)}`,
    `Trend: ${describeTrend(result.trend)}`,
    `Anomalies: ${anomalyCount(result.anomalies)}`,
  ];
  if (!result.authoritative) {
    lines.push("Data: placeholder estimates");
  }

  const top = result.report.priorityActions.slice(0, SUMMARY_ACTIONS);
  if (top.length > 0) {
    lines.push("Top actions:");
    top.forEach((action, i) => {
      const savings = action.potentialSavings > 0 ? ` (saves ${formatMoney(action.potentialSavings)})` : "";
      lines.push(`${i + 1}. ${action.description}${savings}`);
    });
  }
  return lines.join("\n");
}
