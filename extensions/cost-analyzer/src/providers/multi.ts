/**
 * Concurrent fetch across billing providers.
 *
 * Every provider runs as an independent promise. One provider failing never
 * discards the rows of the others: its slot becomes an error entry.
 */

import { UpstreamFetchError, formatErrorMessage } from "../errors.js";
import { createSilentLogger, type CostAnalyzerLogger } from "../logging/logger.js";
import type {
  BillingProvider,
  FetchRequest,
  MultiProviderResult,
  ProviderOutcome,
} from "./types.js";

function toUpstreamError(providerId: string, reason: unknown): UpstreamFetchError {
  if (reason instanceof UpstreamFetchError) return reason;
  return new UpstreamFetchError(providerId, formatErrorMessage(reason), { cause: reason });
}

export async function fetchFromProviders(
  providers: readonly BillingProvider[],
  request: FetchRequest,
  logger: CostAnalyzerLogger = createSilentLogger(),
): Promise<MultiProviderResult> {
  const settled = await Promise.allSettled(providers.map((p) => p.fetchRecords(request)));

  const outcomes: ProviderOutcome[] = settled.map((result, i) => {
    const providerId = providers[i]?.id ?? `provider-${i}`;
    if (result.status === "fulfilled") {
      return { status: "fulfilled", ...result.value };
    }
    const error = toUpstreamError(providerId, result.reason);
    logger.error(`Billing fetch failed for ${providerId}`, { error: error.message });
    return { status: "rejected", providerId, error };
  });

  const rows: unknown[] = [];
  const errors: UpstreamFetchError[] = [];
  let authoritative = true;
  for (const outcome of outcomes) {
    if (outcome.status === "fulfilled") {
      rows.push(...outcome.rows);
      if (!outcome.authoritative) authoritative = false;
    } else {
      errors.push(outcome.error);
    }
  }

  logger.info(`Fetched billing rows from ${outcomes.length - errors.length}/${outcomes.length} provider(s)`, {
    rows: rows.length,
    failed: errors.length,
  });

  return { outcomes, rows, authoritative, errors };
}
