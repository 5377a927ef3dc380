/**
 * Placeholder billing data for when a live provider is unavailable.
 *
 * Rows produced here are estimates spread evenly over the requested days and
 * are always flagged `authoritative: false`, so reports can say so.
 */

import { formatErrorMessage } from "../errors.js";
import { roundCurrency } from "../analysis/statistics.js";
import { createSilentLogger, type CostAnalyzerLogger } from "../logging/logger.js";
import type { CloudProvider } from "../types.js";
import type { BillingProvider, FetchRequest, ProviderBatch } from "./types.js";

/** Monthly spend split by service and by region share. */
export type PlaceholderProfile = {
  services: Readonly<Record<string, number>>;
  regions: Readonly<Record<string, number>>;
};

export const PLACEHOLDER_PROFILES: Readonly<Partial<Record<CloudProvider, PlaceholderProfile>>> = {
  aws: {
    services: { EC2: 89.45, S3: 23.67, RDS: 34.56, Lambda: 9.1 },
    regions: { "us-east-1": 67.34, "us-west-2": 45.23, "eu-west-1": 32.12, "ap-southeast-1": 12.09 },
  },
  aliyun: {
    services: { ECS: 67.23, OSS: 12.45, RDS: 18.86 },
    regions: { "cn-hangzhou": 34.25, "cn-beijing": 28.13, "cn-shanghai": 21.67, "cn-shenzhen": 14.49 },
  },
  tencent: {
    services: { CVM: 45.67, COS: 8.9, CDB: 21.75 },
    regions: { "ap-beijing": 28.45, "ap-shanghai": 22.11, "ap-guangzhou": 18.34, "ap-singapore": 7.42 },
  },
  volcengine: {
    services: { ECS: 34.56, TOS: 6.78, RDS: 12.87 },
    regions: { "cn-north-1": 23.45, "cn-north-3": 18.32, "ap-southeast-1": 12.44 },
  },
};

const DAYS_PER_MONTH = 30;
const DAY_MS = 24 * 60 * 60 * 1000;

/** Calendar days in [start, end), as YYYY-MM-DD. */
export function daysInRange(request: FetchRequest): string[] {
  const days: string[] = [];
  const start = Date.parse(`${request.start}T00:00:00Z`);
  const end = Date.parse(`${request.end}T00:00:00Z`);
  if (Number.isNaN(start) || Number.isNaN(end)) return days;
  for (let t = start; t < end; t += DAY_MS) {
    days.push(new Date(t).toISOString().slice(0, 10));
  }
  return days;
}

/**
 * Spread a profile's monthly spend over each day in the range, one row per
 * service and region.
 */
export function buildPlaceholderRows(
  kind: CloudProvider,
  profile: PlaceholderProfile,
  request: FetchRequest,
): unknown[] {
  const regionTotal = Object.values(profile.regions).reduce((sum, v) => sum + v, 0);
  if (regionTotal <= 0) return [];

  const rows: unknown[] = [];
  for (const date of daysInRange(request)) {
    for (const [service, monthly] of Object.entries(profile.services)) {
      for (const [region, share] of Object.entries(profile.regions)) {
        rows.push({
          date,
          service,
          region,
          cost: roundCurrency(((monthly / DAYS_PER_MONTH) * share) / regionTotal),
          currency: "USD",
          provider: kind,
        });
      }
    }
  }
  return rows;
}

export class PlaceholderBillingProvider implements BillingProvider {
  readonly id: string;

  constructor(
    readonly kind: CloudProvider,
    private profile: PlaceholderProfile | undefined = PLACEHOLDER_PROFILES[kind],
  ) {
    this.id = `${kind}-placeholder`;
  }

  async fetchRecords(request: FetchRequest): Promise<ProviderBatch> {
    const profile = this.profile ?? PLACEHOLDER_PROFILES.aws;
    const rows = profile ? buildPlaceholderRows(this.kind, profile, request) : [];
    return { providerId: this.id, rows, authoritative: false };
  }
}

/**
 * Wrap a live provider so a failed fetch yields placeholder rows instead of
 * an error. The substitution is logged and the batch is non-authoritative.
 */
export function withFallback(
  primary: BillingProvider,
  fallback: BillingProvider = new PlaceholderBillingProvider(primary.kind),
  logger: CostAnalyzerLogger = createSilentLogger(),
): BillingProvider {
  return {
    id: primary.id,
    kind: primary.kind,
    async fetchRecords(request) {
      try {
        return await primary.fetchRecords(request);
      } catch (err) {
        logger.warn(`Provider ${primary.id} unavailable, using placeholder data`, {
          error: formatErrorMessage(err),
        });
        const batch = await fallback.fetchRecords(request);
        return { ...batch, providerId: primary.id, authoritative: false };
      }
    },
  };
}
