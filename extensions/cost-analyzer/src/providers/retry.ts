/**
 * Retry runner for billing API calls.
 *
 * Handles provider throttling, rate limiting and transient network errors
 * with exponential backoff and jitter.
 */

import { formatErrorMessage } from "../errors.js";
import type { CostAnalyzerLogger } from "../logging/logger.js";

export type RetryConfig = {
  /** Total calls, including the first (default: 3). */
  attempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  /** Fraction of the delay randomly added or removed, 0 to 1 (default: 0.2). */
  jitter?: number;
};

export type RetryInfo = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  err: unknown;
  label?: string;
};

export type RetryOptions = RetryConfig & {
  label?: string;
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (info: RetryInfo) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

export const RETRY_DEFAULTS: Required<RetryConfig> = {
  attempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitter: 0.2,
};

export function resolveRetryConfig(overrides: RetryConfig = {}): Required<RetryConfig> {
  const clamp = (value: number, low: number, high = Number.POSITIVE_INFINITY) =>
    Math.min(high, Math.max(low, value));
  const minDelayMs = clamp(Math.round(overrides.minDelayMs ?? RETRY_DEFAULTS.minDelayMs), 0);
  return {
    attempts: clamp(Math.round(overrides.attempts ?? RETRY_DEFAULTS.attempts), 1),
    minDelayMs,
    maxDelayMs: clamp(Math.round(overrides.maxDelayMs ?? RETRY_DEFAULTS.maxDelayMs), minDelayMs),
    jitter: clamp(overrides.jitter ?? RETRY_DEFAULTS.jitter, 0, 1),
  };
}

/**
 * Delay before retry number `attempt` (1-based): `minDelayMs * 2^(attempt-1)`,
 * jittered, then clamped to `[minDelayMs, maxDelayMs]`.
 */
export function backoffDelay(attempt: number, config: Required<RetryConfig>, random: () => number = Math.random): number {
  const base = Math.min(config.minDelayMs * 2 ** (attempt - 1), config.maxDelayMs);
  const jittered = Math.round(base * (1 + (random() * 2 - 1) * config.jitter));
  return Math.min(Math.max(jittered, config.minDelayMs), config.maxDelayMs);
}

const sleepFor = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function retryAsync<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const config = resolveRetryConfig(options);
  const sleep = options.sleep ?? sleepFor;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= config.attempts || (options.shouldRetry && !options.shouldRetry(err))) {
        throw err;
      }
      const delayMs = backoffDelay(attempt, config, options.random);
      options.onRetry?.({ attempt, maxAttempts: config.attempts, delayMs, err, label: options.label });
      await sleep(delayMs);
    }
  }
}

// =============================================================================
// Transient Error Detection
// =============================================================================

const TRANSIENT_PATTERN =
  /throttl|rate exceeded|too many requests|503|504|timeout|ECONNRESET|ETIMEDOUT|ServiceUnavailable|RequestLimitExceeded|LimitExceededException/i;

const TRANSIENT_CODES = new Set([
  "ThrottlingException",
  "Throttling",
  "TooManyRequestsException",
  "RequestLimitExceeded",
  "LimitExceededException",
  "ServiceUnavailable",
  "ServiceUnavailableException",
  "InternalError",
  "InternalServerError",
  "RequestTimeout",
  "ECONNRESET",
  "ETIMEDOUT",
  "ECONNREFUSED",
]);

/** Errors that will never succeed on retry. */
const PERMANENT_CODES = new Set([
  "AccessDeniedException",
  "UnrecognizedClientException",
  "InvalidClientTokenId",
  "ValidationException",
  "DataUnavailableException",
  "BillExpirationException",
]);

function readStringField(err: unknown, field: "code" | "name"): string | undefined {
  if (!err || typeof err !== "object" || !(field in err)) return undefined;
  const value: unknown = Reflect.get(err, field);
  return typeof value === "string" ? value : undefined;
}

function readStatusCode(err: unknown): number | undefined {
  if (!err || typeof err !== "object" || !("$metadata" in err)) return undefined;
  const metadata: unknown = Reflect.get(err, "$metadata");
  if (!metadata || typeof metadata !== "object" || !("httpStatusCode" in metadata)) return undefined;
  const status: unknown = Reflect.get(metadata, "httpStatusCode");
  return typeof status === "number" ? status : undefined;
}

export function isTransientError(err: unknown): boolean {
  if (!err) return false;

  const code = readStringField(err, "code") ?? readStringField(err, "name");
  if (code && PERMANENT_CODES.has(code)) return false;
  if (code && TRANSIENT_CODES.has(code)) return true;

  const status = readStatusCode(err);
  if (status === 429 || status === 500 || status === 502 || status === 503 || status === 504) {
    return true;
  }

  return TRANSIENT_PATTERN.test(formatErrorMessage(err));
}

/**
 * Run a billing API call with transient-error retries, logging each retry.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: { label?: string; retry?: RetryConfig; logger?: CostAnalyzerLogger; sleep?: RetryOptions["sleep"] } = {},
): Promise<T> {
  return retryAsync(fn, {
    ...options.retry,
    label: options.label,
    sleep: options.sleep,
    shouldRetry: isTransientError,
    onRetry: (info) => {
      options.logger?.warn(
        `${info.label ?? "operation"} failed transiently, retry ${info.attempt}/${info.maxAttempts} in ${info.delayMs}ms`,
        { error: formatErrorMessage(info.err) },
      );
    },
  });
}
