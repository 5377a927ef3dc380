/**
 * Configuration loading: defaults, then an optional JSON file, then
 * environment variables, then explicit overrides.
 */

import { readFile } from "node:fs/promises";
import { ConfigurationError, formatErrorMessage } from "../errors.js";
import { analyzerConfigSchema, type AnalyzerConfig } from "./schema.js";

export const CONFIG_ENV_PREFIX = "COST_ANALYZER_";

/**
 * Validate a raw configuration object and fill in defaults.
 */
export function resolveConfig(input: unknown = {}): AnalyzerConfig {
  const parsed = analyzerConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigurationError("Invalid cost analyzer configuration", issues);
  }
  return parsed.data;
}

export const DEFAULT_CONFIG: AnalyzerConfig = resolveConfig({});

/**
 * Read a JSON configuration file. Validation happens in {@link resolveConfig}.
 */
export async function readConfigFile(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file ${path}: ${formatErrorMessage(err)}`);
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Config file ${path} is not valid JSON: ${formatErrorMessage(err)}`);
  }
}

/**
 * Map `COST_ANALYZER_*` environment variables onto a partial config.
 * Values are coerced to numbers here and range-checked by the schema.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const num = (name: string): number | undefined => {
    const raw = env[`${CONFIG_ENV_PREFIX}${name}`];
    return raw === undefined || raw.trim() === "" ? undefined : Number(raw);
  };
  const str = (name: string): string | undefined => {
    const raw = env[`${CONFIG_ENV_PREFIX}${name}`]?.trim();
    return raw ? raw : undefined;
  };

  const webhookUrl = str("WEBHOOK_URL");
  const layer: Record<string, unknown> = {
    costThreshold: num("COST_THRESHOLD"),
    anomalyStdDevThreshold: num("ANOMALY_THRESHOLD"),
    trendWindowDays: num("TREND_WINDOW_DAYS"),
    topActionsCap: num("TOP_ACTIONS"),
    logging: { level: str("LOG_LEVEL") },
    notifications: webhookUrl ? { webhook: { enabled: true, url: webhookUrl } } : undefined,
  };
  return layer;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep-merge configuration layers. Later layers win; `undefined` never
 * overwrites a value and arrays are replaced, not concatenated.
 */
export function mergeConfigLayers(...layers: unknown[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const layer of layers) {
    if (!isPlainRecord(layer)) continue;
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      const existing = result[key];
      result[key] =
        isPlainRecord(existing) && isPlainRecord(value) ? mergeConfigLayers(existing, value) : value;
    }
  }
  return result;
}

export type LoadConfigOptions = {
  /** JSON file path. Falls back to `COST_ANALYZER_CONFIG`. */
  file?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Record<string, unknown>;
};

export async function loadConfig(options: LoadConfigOptions = {}): Promise<AnalyzerConfig> {
  const env = options.env ?? {};
  const file = options.file ?? env[`${CONFIG_ENV_PREFIX}CONFIG`];
  const fileLayer = file ? await readConfigFile(file) : {};
  if (!isPlainRecord(fileLayer)) {
    throw new ConfigurationError(`Config file ${file ?? ""} must contain a JSON object`);
  }
  return resolveConfig(mergeConfigLayers(fileLayer, configFromEnv(env), options.overrides));
}
