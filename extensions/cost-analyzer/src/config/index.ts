export {
  analyzerConfigSchema,
  ruleParametersSchema,
  serviceFamiliesSchema,
  webhookChannelSchema,
  loggingConfigSchema,
  type AnalyzerConfig,
  type AnalyzerConfigInput,
  type RuleParameters,
  type ServiceFamilyPatterns,
  type WebhookChannelConfig,
  type LoggingConfig,
} from "./schema.js";

export {
  CONFIG_ENV_PREFIX,
  DEFAULT_CONFIG,
  resolveConfig,
  readConfigFile,
  configFromEnv,
  mergeConfigLayers,
  loadConfig,
  type LoadConfigOptions,
} from "./loader.js";
