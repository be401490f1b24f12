/**
 * Configuration Module
 *
 * Reads the pipeline configuration from environment variables, validated
 * with zod. Every value has a default except the API keys and the artifact
 * bucket, which are optional until the component that needs them is built.
 */

import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from '../observability/index.js';

export type ReconcilerMode = 'llm' | 'rule_based';

/**
 * Resolved pipeline configuration
 */
export interface PipelineConfig {
  anthropic: {
    apiKey: string | undefined;
    model: string;
    maxTokens: number;
    temperature: number;
  };
  firecrawl: {
    apiKey: string | undefined;
    apiUrl: string;
    maxRetries: number;
    maxConcurrency: number;
  };
  timeouts: {
    crawlMs: number;
    llmMs: number;
  };
  extraction: {
    maxConcurrency: number;
  };
  discovery: {
    maxPaginationPages: number;
  };
  integration: {
    reconciler: ReconcilerMode;
    keyFields: string[];
  };
  stream: {
    pollIntervalMs: number;
    heartbeatIntervalMs: number;
  };
  storage: {
    bucket: string | undefined;
    region: string;
    prefix: string;
    endpoint: string | undefined;
  };
  logLevel: LogLevel;
}

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.string().trim().min(1).default('claude-sonnet-4-20250514'),
  ANTHROPIC_MAX_TOKENS: positiveInt(4096),
  ANTHROPIC_TEMPERATURE: z.coerce.number().min(0).max(1).default(0),
  FIRECRAWL_API_KEY: optionalString,
  FIRECRAWL_API_URL: z.string().url().default('https://api.firecrawl.dev'),
  CRAWL_TIMEOUT_MS: positiveInt(60000),
  CRAWL_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  CRAWL_MAX_CONCURRENCY: positiveInt(5),
  LLM_TIMEOUT_MS: positiveInt(120000),
  EXTRACTION_MAX_CONCURRENCY: positiveInt(5),
  MAX_PAGINATION_PAGES: positiveInt(1000),
  INTEGRATION_RECONCILER: z.enum(['llm', 'rule_based']).default('llm'),
  INTEGRATION_KEY_FIELDS: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? '')
        .split(',')
        .map((field) => field.trim())
        .filter((field) => field.length > 0)
    ),
  STREAM_POLL_INTERVAL_MS: positiveInt(500),
  STREAM_HEARTBEAT_MS: positiveInt(15000),
  S3_BUCKET: optionalString,
  AWS_REGION: z.string().trim().min(1).default('us-east-1'),
  S3_PREFIX: z.string().trim().min(1).default('tasks'),
  S3_ENDPOINT: optionalString,
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

/**
 * Raised when one or more environment variables are invalid
 */
export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Load configuration from an environment map
 *
 * @param env - Environment variables (default: process.env)
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;

  return {
    anthropic: {
      apiKey: vars.ANTHROPIC_API_KEY,
      model: vars.ANTHROPIC_MODEL,
      maxTokens: vars.ANTHROPIC_MAX_TOKENS,
      temperature: vars.ANTHROPIC_TEMPERATURE,
    },
    firecrawl: {
      apiKey: vars.FIRECRAWL_API_KEY,
      apiUrl: vars.FIRECRAWL_API_URL,
      maxRetries: vars.CRAWL_MAX_RETRIES,
      maxConcurrency: vars.CRAWL_MAX_CONCURRENCY,
    },
    timeouts: {
      crawlMs: vars.CRAWL_TIMEOUT_MS,
      llmMs: vars.LLM_TIMEOUT_MS,
    },
    extraction: {
      maxConcurrency: vars.EXTRACTION_MAX_CONCURRENCY,
    },
    discovery: {
      maxPaginationPages: vars.MAX_PAGINATION_PAGES,
    },
    integration: {
      reconciler: vars.INTEGRATION_RECONCILER,
      keyFields: vars.INTEGRATION_KEY_FIELDS,
    },
    stream: {
      pollIntervalMs: vars.STREAM_POLL_INTERVAL_MS,
      heartbeatIntervalMs: vars.STREAM_HEARTBEAT_MS,
    },
    storage: {
      bucket: vars.S3_BUCKET,
      region: vars.AWS_REGION,
      prefix: vars.S3_PREFIX,
      endpoint: vars.S3_ENDPOINT,
    },
    logLevel: vars.LOG_LEVEL,
  };
}
