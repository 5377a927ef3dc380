/**
 * Billing row normalization.
 *
 * Providers hand over loosely-typed rows. Everything that reaches the
 * aggregator passes through here: well-formed rows become immutable
 * {@link CostRecord}s, malformed rows are dropped and counted with a reason.
 */

import { z } from "zod";
import type { CloudProvider, CostRecord, DroppedRecord } from "../types.js";

const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})(?:$|T)/;

/** True for `YYYY-MM-DD` strings (optionally followed by a time) naming a real day. */
export function isCalendarDate(value: string): boolean {
  const match = DATE_PREFIX.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

const optionalText = z
  .string()
  .trim()
  .nullish()
  .transform((v) => (v ? v : undefined));

export const rawCostRecordSchema = z.object({
  date: z
    .string()
    .trim()
    .refine(isCalendarDate, { message: "expected a YYYY-MM-DD calendar date" })
    .transform((v) => v.slice(0, 10)),
  service: z.string().trim().min(1, { message: "service is required" }),
  region: optionalText,
  resourceId: optionalText,
  cost: z
    .union([z.number(), z.string().trim().min(1).transform(Number)])
    .pipe(z.number().finite().nonnegative()),
  currency: optionalText,
  provider: z.enum(["aws", "azure", "gcp", "aliyun", "tencent", "volcengine", "file"]).optional(),
});

export type RawCostRecord = z.input<typeof rawCostRecordSchema>;

export type NormalizeOptions = {
  /** Currency for rows that do not name one. */
  defaultCurrency?: string;
  /** Region for rows that do not name one. */
  defaultRegion?: string;
  /** Stamped on records that carry no provider of their own. */
  provider?: CloudProvider;
};

export type NormalizationResult = {
  records: CostRecord[];
  dropped: DroppedRecord[];
};

/**
 * Validate and normalize raw billing rows.
 */
export function normalizeRecords(
  rows: readonly unknown[],
  options: NormalizeOptions = {},
): NormalizationResult {
  const { defaultCurrency = "USD", defaultRegion = "global", provider } = options;
  const records: CostRecord[] = [];
  const dropped: DroppedRecord[] = [];

  rows.forEach((row, index) => {
    const parsed = rawCostRecordSchema.safeParse(row);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const reason = issue
        ? `${issue.path.join(".") || "(row)"}: ${issue.message}`
        : "invalid record";
      dropped.push({ index, reason });
      return;
    }

    const { date, service, region, resourceId, cost, currency } = parsed.data;
    const recordProvider = parsed.data.provider ?? provider;
    records.push(
      Object.freeze({
        date,
        service,
        region: region ?? defaultRegion,
        cost,
        currency: currency ?? defaultCurrency,
        ...(resourceId ? { resourceId } : {}),
        ...(recordProvider ? { provider: recordProvider } : {}),
      }),
    );
  });

  return { records, dropped };
}
