/**
 * Cost analyzer CLI commands.
 */

import { Option, type Command } from "commander";

import { analyzeCosts } from "./analyzer.js";
import { loadConfig } from "./config/loader.js";
import type { AnalyzerConfig } from "./config/schema.js";
import { ConfigurationError, NotificationError } from "./errors.js";
import { isCalendarDate } from "./ingest/normalize.js";
import { createLogger, type CostAnalyzerLogger, type LogLevel, LOG_LEVELS } from "./logging/logger.js";
import { notifyChannels, type WebhookSender } from "./notifications/webhook.js";
import { createAwsCostExplorerProvider } from "./providers/aws.js";
import { withFallback } from "./providers/fallback.js";
import { filterRowsByDate, readBillingFile } from "./providers/file.js";
import { fetchFromProviders } from "./providers/multi.js";
import type { BillingProvider, FetchRequest } from "./providers/types.js";
import { formatMoney, formatOptimizationReportMarkdown } from "./reports/markdown.js";

export type CliDependencies = {
  env?: NodeJS.ProcessEnv;
  sender?: WebhookSender;
  /** Builds the live provider for `--provider aws`. */
  createProvider?: (logger: CostAnalyzerLogger) => BillingProvider;
  now?: () => Date;
};

const DEFAULT_LOOKBACK_DAYS = 30;

/**
 * Default fetch window: the `days` full days before today (UTC), end exclusive.
 */
export function defaultRange(now: Date, days = DEFAULT_LOOKBACK_DAYS): FetchRequest {
  const end = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
  const start = new Date(end.getTime() - days * 24 * 60 * 60 * 1000);
  return { start: start.toISOString().slice(0, 10), end: end.toISOString().slice(0, 10) };
}

export function resolveRange(opts: { start?: string; end?: string }, now: Date): FetchRequest {
  const fallback = defaultRange(now);
  const range = { start: opts.start ?? fallback.start, end: opts.end ?? fallback.end };
  const issues: string[] = [];
  if (!isCalendarDate(range.start)) issues.push(`--start: expected YYYY-MM-DD, got "${range.start}"`);
  if (!isCalendarDate(range.end)) issues.push(`--end: expected YYYY-MM-DD, got "${range.end}"`);
  if (issues.length === 0 && range.start >= range.end) issues.push("--start must be before --end");
  if (issues.length > 0) throw new ConfigurationError("Invalid date range", issues);
  return range;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function cliLogger(config: AnalyzerConfig, level?: string): CostAnalyzerLogger {
  return createLogger("cli", {
    level: level && isLogLevel(level) ? level : config.logging.level,
    redactPatterns: config.logging.redactPatterns,
    file: config.logging.file,
  });
}

type AnalyzeOpts = {
  input?: string;
  provider?: "aws";
  start?: string;
  end?: string;
  format: "markdown" | "json";
  config?: string;
  notify?: boolean;
  fallback?: boolean;
  logLevel?: string;
};

export function registerCostAnalyzerCli(program: Command, deps: CliDependencies = {}): void {
  const env = deps.env ?? process.env;
  const now = deps.now ?? (() => new Date());

  program
    .command("analyze")
    .description("Analyze billing data and print an optimization report")
    .option("--input <file>", "JSON billing export (array of rows or { records: [...] })")
    .addOption(new Option("--provider <name>", "Fetch live billing data").choices(["aws"]))
    .option("--start <date>", "First day to fetch, inclusive (YYYY-MM-DD)")
    .option("--end <date>", "Last day to fetch, exclusive (YYYY-MM-DD)")
    .addOption(new Option("--format <format>", "Output format").choices(["markdown", "json"]).default("markdown"))
    .option("--config <file>", "JSON configuration file")
    .option("--notify", "Send a summary to the configured webhook")
    .option("--fallback", "Use placeholder figures when the provider is unavailable")
    .addOption(new Option("--log-level <level>", "Log level").choices([...LOG_LEVELS]))
    .action(async (opts: AnalyzeOpts) => {
      const config = await loadConfig({ file: opts.config, env });
      const logger = cliLogger(config, opts.logLevel);

      try {
        let rows: unknown[];
        let authoritative = true;

        if (opts.input) {
          rows = await readBillingFile(opts.input);
          if (opts.start !== undefined || opts.end !== undefined) {
            rows = filterRowsByDate(rows, resolveRange(opts, now()));
          }
        } else if (opts.provider === "aws") {
          const range = resolveRange(opts, now());
          const live = deps.createProvider?.(logger) ?? createAwsCostExplorerProvider({ logger });
          const provider = opts.fallback ? withFallback(live, undefined, logger) : live;
          const fetched = await fetchFromProviders([provider], range, logger);
          const [firstError] = fetched.errors;
          if (firstError) throw firstError;
          rows = fetched.rows;
          authoritative = fetched.authoritative;
        } else {
          throw new ConfigurationError("Either --input <file> or --provider aws is required");
        }

        const result = analyzeCosts(rows, { config, logger, authoritative, now });
        console.log(opts.format === "json" ? JSON.stringify(result, null, 2) : formatOptimizationReportMarkdown(result));

        if (opts.notify) {
          const webhook = config.notifications.webhook;
          if (!webhook.enabled) {
            throw new NotificationError(
              "webhook",
              "no webhook configured; set notifications.webhook in the config file or COST_ANALYZER_WEBHOOK_URL",
            );
          }
          const records = await notifyChannels(result, [{ id: "webhook", config: webhook }], {
            sender: deps.sender,
            logger,
            now,
          });
          for (const record of records) {
            if (record.status === "failed") {
              logger.error(`Notification not delivered: ${record.error ?? "unknown error"}`);
            }
          }
        }
      } finally {
        await logger.close();
      }
    });

  program
    .command("anomalies")
    .description("List days whose total cost deviates from the period mean")
    .requiredOption("--input <file>", "JSON billing export")
    .option("--threshold <n>", "Standard deviations that count as anomalous", parseFloat)
    .option("--config <file>", "JSON configuration file")
    .action(async (opts: { input: string; threshold?: number; config?: string }) => {
      const overrides = opts.threshold !== undefined ? { anomalyStdDevThreshold: opts.threshold } : undefined;
      const config = await loadConfig({ file: opts.config, env, overrides });
      const logger = cliLogger(config);

      try {
        const rows = await readBillingFile(opts.input);
        const { anomalies } = analyzeCosts(rows, { config, logger, now });

        if (anomalies.status === "insufficient_data") {
          console.log(`Not enough daily data for anomaly detection (${anomalies.points} days).`);
          return;
        }
        console.log(
          `Baseline: mean ${formatMoney(anomalies.baseline.mean)}, std dev ${formatMoney(anomalies.baseline.stdDev)} (${anomalies.baseline.count} days)`,
        );
        if (anomalies.anomalies.length === 0) {
          console.log(`No anomalies beyond ${anomalies.threshold} standard deviations.`);
          return;
        }
        for (const a of anomalies.anomalies) {
          console.log(`[${a.type.toUpperCase()}] ${a.date}: ${formatMoney(a.cost)} (${a.deviation.toFixed(2)} std dev)`);
        }
      } finally {
        await logger.close();
      }
    });
}
