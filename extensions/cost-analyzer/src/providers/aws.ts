/**
 * AWS Cost Explorer billing provider.
 *
 * Fetches daily unblended cost grouped by service and region and flattens
 * the result pages into billing rows.
 */

import {
  CostExplorerClient,
  GetCostAndUsageCommand,
  type CostExplorerClientConfig,
  type GetCostAndUsageCommandInput,
  type GetCostAndUsageCommandOutput,
} from "@aws-sdk/client-cost-explorer";

import { UpstreamFetchError, formatErrorMessage } from "../errors.js";
import { createSilentLogger, type CostAnalyzerLogger } from "../logging/logger.js";
import { withRetry, type RetryConfig } from "./retry.js";
import type { BillingProvider, FetchRequest, ProviderBatch } from "./types.js";

export type CostMetric = "UnblendedCost" | "BlendedCost" | "AmortizedCost" | "NetUnblendedCost";

export type AwsCostProviderConfig = {
  id?: string;
  credentials?: CostExplorerClientConfig["credentials"];
  metric?: CostMetric;
  /** Safety stop for runaway pagination. */
  maxPages?: number;
  retry?: RetryConfig;
  logger?: CostAnalyzerLogger;
};

export type AwsBillingRow = {
  date: string;
  service: string;
  region: string;
  cost: string;
  currency: string;
  provider: "aws";
};

/**
 * Flatten one GetCostAndUsage page grouped by [SERVICE, REGION].
 */
export function parseCostAndUsage(
  output: Pick<GetCostAndUsageCommandOutput, "ResultsByTime">,
  metric: CostMetric = "UnblendedCost",
): AwsBillingRow[] {
  const rows: AwsBillingRow[] = [];
  for (const result of output.ResultsByTime ?? []) {
    const date = result.TimePeriod?.Start ?? "";
    for (const group of result.Groups ?? []) {
      const value = group.Metrics?.[metric];
      rows.push({
        date,
        service: group.Keys?.[0] ?? "Unknown",
        region: group.Keys?.[1] ?? "Unknown",
        cost: value?.Amount ?? "0",
        currency: value?.Unit ?? "USD",
        provider: "aws",
      });
    }
  }
  return rows;
}

export class AwsCostExplorerProvider implements BillingProvider {
  readonly id: string;
  readonly kind = "aws" as const;
  private client: CostExplorerClient;
  private metric: CostMetric;
  private maxPages: number;
  private retry?: RetryConfig;
  private logger: CostAnalyzerLogger;

  constructor(config: AwsCostProviderConfig = {}) {
    this.id = config.id ?? "aws";
    this.metric = config.metric ?? "UnblendedCost";
    this.maxPages = config.maxPages ?? 50;
    this.retry = config.retry;
    this.logger = (config.logger ?? createSilentLogger()).withContext({ providerId: this.id });

    // Cost Explorer is only served from us-east-1
    this.client = new CostExplorerClient({ region: "us-east-1", credentials: config.credentials });
  }

  async fetchRecords(request: FetchRequest): Promise<ProviderBatch> {
    const rows: AwsBillingRow[] = [];
    let nextPageToken: string | undefined;
    let page = 0;

    do {
      const input: GetCostAndUsageCommandInput = {
        TimePeriod: { Start: request.start, End: request.end },
        Granularity: "DAILY",
        Metrics: [this.metric],
        GroupBy: [
          { Type: "DIMENSION", Key: "SERVICE" },
          { Type: "DIMENSION", Key: "REGION" },
        ],
        NextPageToken: nextPageToken,
      };

      let output: GetCostAndUsageCommandOutput;
      try {
        output = await withRetry(() => this.client.send(new GetCostAndUsageCommand(input)), {
          label: "GetCostAndUsage",
          retry: this.retry,
          logger: this.logger,
        });
      } catch (err) {
        throw new UpstreamFetchError(this.id, `GetCostAndUsage failed: ${formatErrorMessage(err)}`, {
          cause: err,
        });
      }

      rows.push(...parseCostAndUsage(output, this.metric));
      nextPageToken = output.NextPageToken;
      page += 1;
    } while (nextPageToken && page < this.maxPages);

    if (nextPageToken) {
      this.logger.warn(`Stopped after ${this.maxPages} pages; remaining cost data was not fetched`);
    }
    this.logger.info(`Fetched ${rows.length} cost rows from Cost Explorer`, {
      start: request.start,
      end: request.end,
      pages: page,
    });

    return { providerId: this.id, rows, authoritative: true };
  }
}

export function createAwsCostExplorerProvider(config: AwsCostProviderConfig = {}): AwsCostExplorerProvider {
  return new AwsCostExplorerProvider(config);
}
