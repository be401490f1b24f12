/**
 * Web Extraction Orchestrator - Main Entry Point
 *
 * Turns a target URL plus free-text requirements into structured tabular
 * data by running three stages per task:
 * - Page discovery: which pages (sub-pages, pagination) hold the data
 * - Content extraction: per-page fields and entities, on a bounded pool
 * - Result integration: deduplicated, reconciled dataset
 *
 * Crawling and LLM reasoning are delegated to CrawlerService and LLMService.
 *
 * Usage:
 * ```typescript
 * const { orchestrator } = createPipeline(loadConfig());
 * const created = orchestrator.createTask({ requirements: 'All posts with dates', targetUrl: 'https://example.com/blog' });
 * ```
 */

import type { StorageAdapter } from './types/index.js';
import type { PipelineConfig } from './config/index.js';
import { createConsoleLogger, defaultMetrics, type Logger, type Metrics } from './observability/index.js';
import { FirecrawlCrawlerService, type CrawlerService } from './crawler/index.js';
import { ClaudeLLMService, type LLMService } from './llm/index.js';
import { TaskStore } from './task-store/index.js';
import { PageDiscoveryStage } from './discovery/index.js';
import { ContentExtractionStage } from './extraction/index.js';
import { LLMReconciler, ResultIntegrationStage, RuleBasedReconciler, type Reconciler } from './integration/index.js';
import { TaskOrchestrator } from './orchestrator/index.js';
import { S3StorageAdapter } from './storage/index.js';

// Core Types
export type * from './types/index.js';

// Configuration
export { loadConfig, ConfigError, type PipelineConfig, type ReconcilerMode } from './config/index.js';

// Observability
export {
  createConsoleLogger,
  defaultLogger,
  defaultMetrics,
  describeError,
  LOG_LEVELS,
  type Logger,
  type Metrics,
  type LogLevel,
} from './observability/index.js';

// Shared helpers
export { withRetry, withTimeout, TimeoutError, AbortedError, type RetryOptions } from './utils/index.js';

// Collaborators
export {
  FirecrawlCrawlerService,
  type CrawlerService,
  type CrawlFormat,
  type CrawlOutcome,
  type CrawlOptions,
  type FirecrawlConfig,
} from './crawler/index.js';
export {
  ClaudeLLMService,
  AnthropicTransport,
  parseStructuredResponse,
  stripCodeFences,
  type LLMService,
  type LLMRequest,
  type LLMTransport,
  type ClaudeConfig,
} from './llm/index.js';

// Storage
export {
  S3StorageAdapter,
  MemoryStorageAdapter,
  createStorageAdapter,
  artifactFileName,
  type S3Config,
} from './storage/index.js';

// Prompts
export { buildPrompt, compilePrompt, loadPromptTemplate, getPromptsDir, type PromptName } from './prompts/index.js';

// Task Store
export { TaskStore, toStatusView, isTerminalStatus, type TaskPatch } from './task-store/index.js';

// Stages
export {
  PageDiscoveryStage,
  generatePaginationUrls,
  mergeDiscoveredPages,
  resolvePageUrl,
  type DiscoveryInput,
  type DiscoveryOutput,
  type DiscoveryStageOptions,
} from './discovery/index.js';
export {
  ContentExtractionStage,
  type ExtractionInput,
  type ExtractionOutput,
  type ExtractionStageOptions,
} from './extraction/index.js';
export {
  ResultIntegrationStage,
  RuleBasedReconciler,
  LLMReconciler,
  canonicalFieldName,
  CONFLICT_MARKER,
  type Reconciler,
  type ReconcileContext,
  type ReconcileResult,
  type IntegrationInput,
} from './integration/index.js';

// Orchestration
export {
  TaskOrchestrator,
  DEFAULT_PREVIEW_LIMIT,
  extractionProgress,
  type CreateTaskRequest,
  type CreateTaskResponse,
  type DatasetPreview,
  type OrchestratorDependencies,
  type Stage,
} from './orchestrator/index.js';
export { streamProgress, formatServerSentEvent, type ProgressEvent, type StreamOptions } from './progress/index.js';

// ============================================================================
// Wiring
// ============================================================================

/**
 * Collaborators that replace the ones built from configuration
 */
export interface PipelineOverrides {
  crawler?: CrawlerService;
  llm?: LLMService;
  reconciler?: Reconciler;
  /** Pass null to disable artifact storage even when a bucket is configured */
  storage?: StorageAdapter | null;
  store?: TaskStore;
  logger?: Logger;
  metrics?: Metrics;
  promptsDir?: string;
}

export interface Pipeline {
  orchestrator: TaskOrchestrator;
  store: TaskStore;
  crawler: CrawlerService;
  llm: LLMService;
  reconciler: Reconciler;
  storage: StorageAdapter | null;
}

/**
 * Build every component of the pipeline from configuration
 */
export function createPipeline(config: PipelineConfig, overrides: PipelineOverrides = {}): Pipeline {
  const loggerFor = (module: string): Logger => overrides.logger ?? createConsoleLogger(module, config.logLevel);
  const metrics = overrides.metrics ?? defaultMetrics;

  const crawler =
    overrides.crawler ??
    new FirecrawlCrawlerService(
      {
        apiKey: config.firecrawl.apiKey,
        apiUrl: config.firecrawl.apiUrl,
        timeoutMs: config.timeouts.crawlMs,
        maxRetries: config.firecrawl.maxRetries,
        maxConcurrency: config.firecrawl.maxConcurrency,
      },
      { logger: loggerFor('crawler'), metrics }
    );

  const llm =
    overrides.llm ??
    new ClaudeLLMService(
      {
        apiKey: config.anthropic.apiKey,
        model: config.anthropic.model,
        maxTokens: config.anthropic.maxTokens,
        temperature: config.anthropic.temperature,
        timeoutMs: config.timeouts.llmMs,
      },
      { logger: loggerFor('llm'), metrics }
    );

  const promptsDir = overrides.promptsDir;
  const reconcilerOptions = {
    keyFields: config.integration.keyFields,
    ...(promptsDir ? { promptsDir } : {}),
  };
  const reconciler =
    overrides.reconciler ??
    (config.integration.reconciler === 'llm'
      ? new LLMReconciler(llm, {
          ...reconcilerOptions,
          llmTimeoutMs: config.timeouts.llmMs,
          logger: loggerFor('integration'),
        })
      : new RuleBasedReconciler(reconcilerOptions));

  const storage =
    overrides.storage !== undefined
      ? overrides.storage
      : config.storage.bucket
        ? new S3StorageAdapter({
            bucket: config.storage.bucket,
            region: config.storage.region,
            prefix: config.storage.prefix,
            ...(config.storage.endpoint ? { endpoint: config.storage.endpoint, forcePathStyle: true } : {}),
          })
        : null;

  const store = overrides.store ?? new TaskStore(loggerFor('task-store'));

  const stageTimeouts = {
    crawlTimeoutMs: config.timeouts.crawlMs,
    llmTimeoutMs: config.timeouts.llmMs,
    ...(promptsDir ? { promptsDir } : {}),
  };

  const orchestrator = new TaskOrchestrator({
    store,
    discovery: new PageDiscoveryStage(crawler, llm, {
      ...stageTimeouts,
      maxPaginationPages: config.discovery.maxPaginationPages,
      logger: loggerFor('page_discovery'),
      metrics,
    }),
    extraction: new ContentExtractionStage(crawler, llm, {
      ...stageTimeouts,
      maxConcurrency: config.extraction.maxConcurrency,
      logger: loggerFor('content_extraction'),
      metrics,
    }),
    integration: new ResultIntegrationStage(reconciler, {
      logger: loggerFor('result_integration'),
      metrics,
    }),
    storage,
    logger: loggerFor('orchestrator'),
    metrics,
    stream: {
      pollIntervalMs: config.stream.pollIntervalMs,
      heartbeatIntervalMs: config.stream.heartbeatIntervalMs,
    },
  });

  return { orchestrator, store, crawler, llm, reconciler, storage };
}
