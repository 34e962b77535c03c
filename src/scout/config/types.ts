/**
 * Configuration types for the channel scout
 */

import { z } from "zod";

/**
 * Logging configuration
 */
export const LoggingConfigSchema = z.object({
  /** Log level */
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  /** Directory for log files */
  logDir: z.string().optional(),
  /** Enable structured JSON logging */
  jsonLogs: z.boolean().default(false),
  /** Include timestamps */
  timestamps: z.boolean().default(true),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/**
 * How the geography is walked
 */
export const ResolutionConfigSchema = z.object({
  /** Maximum waves per category slot */
  waveCap: z.number().int().min(1).default(3),
  /** A locality starts only once the previous one in its region is resolved */
  blockingLocalities: z.boolean().default(true),
  /** Category slots of one locality processed at the same time */
  slotConcurrency: z.number().int().min(1).default(1),
  /** Region ids processed first, in this order */
  regionOrder: z.array(z.string()).default([]),
});

export type ResolutionConfig = z.infer<typeof ResolutionConfigSchema>;

/**
 * Search and triage settings
 */
export const SearchConfigSchema = z.object({
  pagesPerQuery: z.number().int().min(1).default(4),
  maxPagesToFetch: z.number().int().min(1).default(25),
  /** Minimum triage score (0-10) for a result to be fetched */
  triageThreshold: z.number().min(0).max(10).default(4),
  triageBatchSize: z.number().int().min(1).default(30),
  /** Pages fetched and extracted at the same time */
  fetchConcurrency: z.number().int().min(1).default(4),
  maxQueries: z.number().int().min(1).default(8),
  /** Candidates without a handle that get follow-up searches */
  maxFollowups: z.number().int().min(0).default(5),
});

export type SearchConfig = z.infer<typeof SearchConfigSchema>;

/**
 * Minimum audience and activity a channel must show
 */
export const ChannelPolicySchema = z.object({
  minSubscribers: z.number().int().min(0).default(20_000),
  maxSubscribers: z.number().int().min(0).default(150_000),
  maxInactiveDays: z.number().int().min(0).default(30),
});

export type ChannelPolicy = z.infer<typeof ChannelPolicySchema>;

/**
 * Adversarial verification thresholds
 */
export const VerificationConfigSchema = z.object({
  minLocalityScore: z.number().min(0).max(1).default(0.4),
  minCategoryScore: z.number().min(0).max(1).default(0.3),
});

export type VerificationConfig = z.infer<typeof VerificationConfigSchema>;

/**
 * Rate limiter configuration
 */
export const RateLimitConfigSchema = z.object({
  /** Lower bound of the jittered spacing between any two permits (ms) */
  globalMinMs: z.number().min(0).default(2000),
  /** Upper bound of the jittered spacing between any two permits (ms) */
  globalMaxMs: z.number().min(0).default(4000),
  /** Spacing between two permits to the same destination (ms) */
  perDestinationMs: z.number().min(0).default(5000),
  /** How long a throttled destination stays closed (ms) */
  cooldownMs: z.number().min(0).default(60_000),
  /** Per-destination spacing overrides */
  destinationSpacingMs: z
    .record(z.string(), z.number().min(0))
    .default({ "search.brave.com": 12_000, oracle: 0 }),
  /** Destinations exempt from global pacing */
  unpacedDestinations: z.array(z.string()).default(["oracle"]),
  /** Throttling retries before a call counts as network-exhausted */
  maxThrottleRetries: z.number().int().min(0).default(3),
});

export type RateLimitConfig = z.infer<typeof RateLimitConfigSchema>;

/**
 * Per-call timeouts for capability clients
 */
export const TimeoutsConfigSchema = z.object({
  searchMs: z.number().int().min(1).default(20_000),
  fetchMs: z.number().int().min(1).default(20_000),
  channelMs: z.number().int().min(1).default(25_000),
  oracleMs: z.number().int().min(1).default(180_000),
});

export type TimeoutsConfig = z.infer<typeof TimeoutsConfigSchema>;

/**
 * Oracle (OpenAI-compatible chat endpoint) configuration
 */
export const OracleConfigSchema = z.object({
  endpoint: z.string().default("http://127.0.0.1:8081"),
  model: z.string().default("local"),
  temperature: z.number().min(0).max(2).default(0.2),
  maxTokens: z.number().int().min(1).default(4096),
  apiKey: z.string().optional(),
});

export type OracleConfig = z.infer<typeof OracleConfigSchema>;

/**
 * Patience budget per source tier; a tier that keeps finding nothing loses its queries
 */
export const BudgetConfigSchema = z.object({
  enabled: z.boolean().default(true),
  /** Starting patience of each tier */
  patienceInitial: z.number().int().min(1).default(30),
  /** Patience regained on a hit, capped at twice the starting value */
  patienceRecharge: z.number().int().min(0).default(20),
  /** Patience lost on a miss */
  patienceDrain: z.number().int().min(1).default(1),
  /** Queries of a tier whose predicted return falls below this are skipped */
  minRoi: z.number().min(0).default(0.05),
  /** Leading queries of a wave that run whatever the budget says */
  guaranteedQueries: z.number().int().min(0).default(3),
  /** Search queries for the whole run; 0 means no limit */
  globalBudget: z.number().int().min(0).default(5000),
});

export type BudgetConfig = z.infer<typeof BudgetConfigSchema>;

/**
 * Per-slot CSV files beside the run report
 */
export const ExportConfigSchema = z.object({
  csv: z.boolean().default(true),
});

export type ExportConfig = z.infer<typeof ExportConfigSchema>;

/**
 * Progress broadcast server
 */
export const ProgressConfigSchema = z.object({
  enabled: z.boolean().default(false),
  host: z.string().default("127.0.0.1"),
  port: z.number().int().min(0).default(3848),
});

export type ProgressConfig = z.infer<typeof ProgressConfigSchema>;

/**
 * Main scout configuration
 */
export const ScoutConfigSchema = z.object({
  /** Config version */
  version: z.literal(1).default(1),
  /** Geography file used when none is given on the command line */
  geographyPath: z.string().optional(),
  /** Directory that receives run reports */
  outputDir: z.string().optional(),
  logging: LoggingConfigSchema.default({}),
  resolution: ResolutionConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  channelPolicy: ChannelPolicySchema.default({}),
  verification: VerificationConfigSchema.default({}),
  rateLimit: RateLimitConfigSchema.default({}),
  timeouts: TimeoutsConfigSchema.default({}),
  oracle: OracleConfigSchema.default({}),
  budget: BudgetConfigSchema.default({}),
  exports: ExportConfigSchema.default({}),
  progress: ProgressConfigSchema.default({}),
});

export type ScoutConfig = z.infer<typeof ScoutConfigSchema>;

/**
 * Default configuration
 */
export function getDefaultConfig(): ScoutConfig {
  return ScoutConfigSchema.parse({});
}
