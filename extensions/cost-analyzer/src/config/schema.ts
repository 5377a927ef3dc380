/**
 * Cost Analyzer Configuration Schema
 *
 * Every heuristic constant of the rule engine lives here so it can be tuned
 * against real billing data without touching the rules themselves.
 */

import { z } from "zod";

// =============================================================================
// Zod Schemas
// =============================================================================

const fraction = z.number().min(0).max(1);
const amount = z.number().nonnegative();
const count = z.number().int().nonnegative();

export const computeRuleSchema = z.object({
  rightSizingMaxMeanCost: amount.default(50),
  rightSizingMinRecords: count.default(10),
  rightSizingFraction: fraction.default(0.3),
  reservedMinTotalCost: amount.default(500),
  reservedFraction: fraction.default(0.25),
  spotMinRecords: count.default(5),
  spotFraction: fraction.default(0.15),
});

export const databaseRuleSchema = z.object({
  rightSizingMaxMeanCost: amount.default(100),
  rightSizingMinRecords: count.default(5),
  rightSizingFraction: fraction.default(0.2),
  reservedMinTotalCost: amount.default(200),
  reservedFraction: fraction.default(0.4),
});

export const storageRuleSchema = z.object({
  tieringFraction: fraction.default(0.3),
  lifecycleMinTotalCost: amount.default(100),
  lifecycleFraction: fraction.default(0.25),
});

export const loadBalancerRuleSchema = z.object({
  consolidationMaxMeanCost: amount.default(20),
  consolidationFraction: fraction.default(0.4),
});

export const genericRuleSchema = z.object({
  monitoringMinTotalCost: amount.default(100),
  monitoringFraction: fraction.default(0.1),
});

export const resourceRuleSchema = z
  .object({
    highCostPercentile: fraction.default(0.8),
    idlePercentile: fraction.default(0.2),
    idleLimit: count.default(5),
    criticalCostThreshold: amount.default(1000),
    highPrioritySavingsRate: fraction.default(0.2),
    mediumPrioritySavingsRate: fraction.default(0.1),
  })
  .refine((r) => r.idlePercentile <= r.highCostPercentile, {
    message: "idlePercentile must not exceed highCostPercentile",
    path: ["idlePercentile"],
  });

export const generalRuleSchema = z.object({
  governanceMinTotalCost: amount.default(1000),
  consolidationMinServices: count.default(10),
});

export const trendRuleSchema = z.object({
  spikeChangeRate: z.number().default(20),
  monitoringChangeRate: z.number().default(10),
});

export const ruleParametersSchema = z.object({
  compute: computeRuleSchema.default({}),
  database: databaseRuleSchema.default({}),
  storage: storageRuleSchema.default({}),
  loadBalancer: loadBalancerRuleSchema.default({}),
  generic: genericRuleSchema.default({}),
  resources: resourceRuleSchema.default({}),
  general: generalRuleSchema.default({}),
  trend: trendRuleSchema.default({}),
});

const patterns = z.array(z.string().min(1));

/**
 * Case-sensitive substrings that map a billing service name onto a rule
 * family. Families are tried in declaration order.
 */
export const serviceFamiliesSchema = z.object({
  compute: patterns.default(["Elastic Compute Cloud", "EC2", "Compute Engine", "Virtual Machines"]),
  database: patterns.default(["Relational Database", "RDS", "Cloud SQL", "SQL Database"]),
  storage: patterns.default(["Simple Storage Service", "S3", "Cloud Storage", "Object Storage"]),
  loadBalancer: patterns.default(["Load Balancing", "Load Balancer", "ELB"]),
});

export const webhookChannelSchema = z
  .object({
    enabled: z.boolean().default(false),
    url: z.string().url().optional(),
    format: z.enum(["generic", "feishu"]).default("generic"),
    timeoutMs: z.number().int().positive().default(10_000),
  })
  .superRefine((channel, ctx) => {
    if (channel.enabled && !channel.url) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "url is required when the webhook is enabled",
        path: ["url"],
      });
    }
  });

export const loggingConfigSchema = z.object({
  level: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
  redactPatterns: z.array(z.string()).default([]),
  file: z.string().min(1).optional(),
});

export const analyzerConfigSchema = z.object({
  costThreshold: amount.default(0.01),
  anomalyStdDevThreshold: z.number().positive().default(2.0),
  trendWindowDays: z.number().int().positive().default(7),
  topActionsCap: z.number().int().positive().default(10),
  rules: ruleParametersSchema.default({}),
  serviceFamilies: serviceFamiliesSchema.default({}),
  notifications: z
    .object({
      webhook: webhookChannelSchema.default({}),
    })
    .default({}),
  logging: loggingConfigSchema.default({}),
});

export type AnalyzerConfig = z.infer<typeof analyzerConfigSchema>;
export type AnalyzerConfigInput = z.input<typeof analyzerConfigSchema>;
export type RuleParameters = AnalyzerConfig["rules"];
export type ServiceFamilyPatterns = AnalyzerConfig["serviceFamilies"];
export type WebhookChannelConfig = AnalyzerConfig["notifications"]["webhook"];
export type LoggingConfig = AnalyzerConfig["logging"];
