/**
 * Error types for the cost analyzer.
 *
 * Only collaborator failures are thrown. Empty datasets and short series are
 * result variants, never errors.
 */

export type CostAnalyzerErrorCode =
  | "CONFIGURATION_INVALID"
  | "UPSTREAM_FETCH_FAILED"
  | "NOTIFICATION_FAILED"
  | "INPUT_UNREADABLE";

export class CostAnalyzerError extends Error {
  constructor(
    message: string,
    public readonly code: CostAnalyzerErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CostAnalyzerError";
  }
}

export class ConfigurationError extends CostAnalyzerError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n${issues.join("\n")}` : message, "CONFIGURATION_INVALID");
    this.name = "ConfigurationError";
  }
}

export class UpstreamFetchError extends CostAnalyzerError {
  constructor(public readonly providerId: string, message: string, options?: { cause?: unknown }) {
    super(`[${providerId}] ${message}`, "UPSTREAM_FETCH_FAILED", options);
    this.name = "UpstreamFetchError";
  }
}

export class InputReadError extends CostAnalyzerError {
  constructor(public readonly source: string, message: string, options?: { cause?: unknown }) {
    super(`${source}: ${message}`, "INPUT_UNREADABLE", options);
    this.name = "InputReadError";
  }
}

export class NotificationError extends CostAnalyzerError {
  constructor(public readonly channelId: string, message: string, options?: { cause?: unknown }) {
    super(`[${channelId}] ${message}`, "NOTIFICATION_FAILED", options);
    this.name = "NotificationError";
  }
}

/**
 * Format error message from any error type
 */
export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  try {
    return JSON.stringify(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}
