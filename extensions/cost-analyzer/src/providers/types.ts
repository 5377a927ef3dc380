/**
 * Billing provider contracts.
 *
 * Providers only fetch and shape rows. Validation happens in the ingest
 * step, so a provider may return rows the analyzer later drops.
 */

import type { CloudProvider } from "../types.js";
import type { UpstreamFetchError } from "../errors.js";

export type FetchRequest = {
  /** First day, inclusive (YYYY-MM-DD). */
  start: string;
  /** Last day, exclusive (YYYY-MM-DD). */
  end: string;
};

export type ProviderBatch = {
  providerId: string;
  rows: unknown[];
  /** False for placeholder figures substituted for live data. */
  authoritative: boolean;
};

export interface BillingProvider {
  readonly id: string;
  readonly kind: CloudProvider;
  fetchRecords(request: FetchRequest): Promise<ProviderBatch>;
}

export type ProviderOutcome =
  | ({ status: "fulfilled" } & ProviderBatch)
  | { status: "rejected"; providerId: string; error: UpstreamFetchError };

export type MultiProviderResult = {
  outcomes: ProviderOutcome[];
  /** Rows of every provider that succeeded, in provider order. */
  rows: unknown[];
  authoritative: boolean;
  errors: UpstreamFetchError[];
};
