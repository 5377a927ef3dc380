/**
 * JSON billing export provider.
 *
 * Accepts either a top-level array of rows or an object with a `records`
 * array, the shape produced by `cost-analyzer analyze --format json` inputs
 * and most billing export scripts.
 */

import { readFile } from "node:fs/promises";

import { InputReadError, UpstreamFetchError, formatErrorMessage } from "../errors.js";
import type { BillingProvider, FetchRequest, ProviderBatch } from "./types.js";

/**
 * Read billing rows from a JSON file.
 */
export async function readBillingFile(path: string): Promise<unknown[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new InputReadError(path, formatErrorMessage(err), { cause: err });
  }
  return parseBillingJson(text, path);
}

export function parseBillingJson(text: string, source = "input"): unknown[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new InputReadError(source, `invalid JSON: ${formatErrorMessage(err)}`, { cause: err });
  }

  if (Array.isArray(parsed)) return parsed;
  if (parsed && typeof parsed === "object" && "records" in parsed) {
    const records: unknown = Reflect.get(parsed, "records");
    if (Array.isArray(records)) return records;
  }
  throw new InputReadError(source, "expected an array of billing rows or an object with a \"records\" array");
}

/** Keep rows whose date falls in [start, end). Rows without a string date pass through for validation. */
export function filterRowsByDate(rows: readonly unknown[], request: FetchRequest): unknown[] {
  return rows.filter((row) => {
    if (!row || typeof row !== "object" || !("date" in row)) return true;
    const date: unknown = Reflect.get(row, "date");
    if (typeof date !== "string") return true;
    const day = date.slice(0, 10);
    return day >= request.start && day < request.end;
  });
}

export type FileProviderConfig = {
  id?: string;
  path: string;
  /** Apply the request's date range to the file's rows (default: true). */
  filterByDate?: boolean;
};

export class FileBillingProvider implements BillingProvider {
  readonly id: string;
  readonly kind = "file" as const;

  constructor(private config: FileProviderConfig) {
    this.id = config.id ?? "file";
  }

  async fetchRecords(request: FetchRequest): Promise<ProviderBatch> {
    let rows: unknown[];
    try {
      rows = await readBillingFile(this.config.path);
    } catch (err) {
      throw new UpstreamFetchError(this.id, formatErrorMessage(err), { cause: err });
    }
    const filtered = this.config.filterByDate === false ? rows : filterRowsByDate(rows, request);
    return { providerId: this.id, rows: filtered, authoritative: true };
  }
}

export function createFileBillingProvider(config: FileProviderConfig): FileBillingProvider {
  return new FileBillingProvider(config);
}
