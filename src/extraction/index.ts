/**
 * Content Extraction Stage
 *
 * Runs one worker per discovered page on a bounded pool. Each worker crawls
 * its page as markdown and asks the LLM for page fields and row-level
 * entities. A page that fails yields an issue instead of a record; the stage
 * fails only when no page produced a record.
 */

import pLimit from 'p-limit';
import { z } from 'zod';
import type { DiscoveredPage, ExtractionRecord, FieldValue, ModuleResult, TaskId } from '../types/index.js';
import type { CrawlerService } from '../crawler/index.js';
import type { LLMService } from '../llm/index.js';
import { buildPrompt } from '../prompts/index.js';
import { defaultLogger, defaultMetrics, type Logger, type Metrics } from '../observability/index.js';
import { errorMessage, fail, resultMetadata, succeed, withTimeout } from '../utils/index.js';

// ============================================================================
// LLM Response Schema
// ============================================================================

export const FieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(FieldValueSchema), z.record(FieldValueSchema)])
);

export const ExtractionResponseSchema = z.object({
  fields: z.record(FieldValueSchema).default({}),
  entities: z.array(z.record(FieldValueSchema)).default([]),
  issues: z.array(z.string()).default([]),
});

export type ExtractionResponse = z.infer<typeof ExtractionResponseSchema>;

export const EXTRACTION_SCHEMA_HINT = `{
  "fields": { "<field_name>": "value" },
  "entities": [{ "<field_name>": "value" }],
  "issues": ["string"]
}`;

// ============================================================================
// Stage
// ============================================================================

export interface ExtractionInput {
  taskId: TaskId;
  pages: DiscoveredPage[];
  requirements: string;
  signal?: AbortSignal;
  /** Called after every page settles, successfully or not */
  onProgress?: (settled: number, total: number) => void;
}

export interface ExtractionOutput {
  /** Record of the first discovered page, null when that page failed */
  mainPageRecord: ExtractionRecord | null;
  subPageRecords: ExtractionRecord[];
  /** One `<url>: <reason>` entry per failed page, in discovery order */
  issues: string[];
  pagesProcessed: number;
  pagesFailed: number;
}

export interface ExtractionStageOptions {
  crawlTimeoutMs: number;
  llmTimeoutMs: number;
  /** Maximum pages in flight (default: 5) */
  maxConcurrency?: number;
  promptsDir?: string;
  logger?: Logger;
  metrics?: Metrics;
}

type PageOutcome = { ok: true; record: ExtractionRecord } | { ok: false; issue: string };

const DEFAULT_MAX_CONCURRENCY = 5;

export class ContentExtractionStage {
  private readonly maxConcurrency: number;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(
    private readonly crawler: CrawlerService,
    private readonly llm: LLMService,
    private readonly options: ExtractionStageOptions
  ) {
    this.maxConcurrency = Math.max(1, options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY);
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  async run(input: ExtractionInput): Promise<ModuleResult<ExtractionOutput>> {
    const startTime = Date.now();
    const { taskId, pages, requirements, signal, onProgress } = input;
    const total = pages.length;

    if (total === 0) {
      return fail('EXTRACTION_FAILED', 'No pages to extract', resultMetadata(taskId, 'content_extraction', startTime));
    }

    const poolSize = Math.min(this.maxConcurrency, total);
    this.logger.info('Starting content extraction', { taskId, pages: total, concurrency: poolSize });

    const limit = pLimit(poolSize);
    let settled = 0;
    const outcomes = await Promise.all(
      pages.map((page) =>
        limit(async () => {
          const outcome = await this.extractPage(taskId, page, requirements, signal);
          settled++;
          onProgress?.(settled, total);
          return outcome;
        })
      )
    );

    const records: Array<ExtractionRecord | null> = [];
    const issues: string[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        records.push(outcome.record);
      } else {
        records.push(null);
        issues.push(outcome.issue);
      }
    }

    const pagesFailed = issues.length;
    const pagesProcessed = total - pagesFailed;
    this.metrics.timing('extraction.duration', Date.now() - startTime);
    this.metrics.gauge('extraction.pages_failed', pagesFailed);

    if (pagesProcessed === 0) {
      this.logger.error('Every page failed extraction', { taskId, pages: total });
      return fail(
        'EXTRACTION_FAILED',
        `All ${total} pages failed extraction`,
        resultMetadata(taskId, 'content_extraction', startTime),
        { issues }
      );
    }

    const [mainPageRecord = null, ...rest] = records;
    const subPageRecords = rest.filter((record): record is ExtractionRecord => record !== null);

    this.logger.info('Content extraction complete', { taskId, pagesProcessed, pagesFailed });

    return succeed(
      { mainPageRecord, subPageRecords, issues, pagesProcessed, pagesFailed },
      resultMetadata(taskId, 'content_extraction', startTime)
    );
  }

  /**
   * Crawl and extract one page. Never throws.
   */
  private async extractPage(
    taskId: TaskId,
    page: DiscoveredPage,
    requirements: string,
    signal: AbortSignal | undefined
  ): Promise<PageOutcome> {
    const startTime = Date.now();
    const failPage = (reason: string): PageOutcome => {
      this.logger.warn('Page extraction failed', { taskId, url: page.url, reason });
      this.metrics.increment('extraction.page_failed');
      return { ok: false, issue: `${page.url}: ${reason}` };
    };

    if (signal?.aborted) {
      return failPage('cancelled');
    }

    try {
      const crawled = await withTimeout(
        (callSignal) => this.crawler.fetch([page.url], 'markdown', { signal: callSignal }),
        this.options.crawlTimeoutMs,
        `Crawl ${page.url}`,
        signal
      );
      const outcome = crawled[0];
      if (!outcome) {
        return failPage('crawler returned no outcome');
      }
      if (!outcome.ok) {
        return failPage(outcome.error);
      }

      if (signal?.aborted) {
        return failPage('cancelled');
      }

      const title = outcome.title ?? page.title;
      const instructions = await buildPrompt(
        'extraction',
        { page_url: page.url, page_title: title, requirements, schema_hint: EXTRACTION_SCHEMA_HINT },
        this.options.promptsDir
      );
      const result = await withTimeout(
        (callSignal) =>
          this.llm.run({
            taskId,
            instructions,
            content: outcome.content,
            schema: ExtractionResponseSchema,
            schemaHint: EXTRACTION_SCHEMA_HINT,
            signal: callSignal,
          }),
        this.options.llmTimeoutMs,
        `Extract ${page.url}`,
        signal
      );
      if (!result.success) {
        return failPage(result.error.message);
      }

      return {
        ok: true,
        record: {
          sourceUrl: page.url,
          title,
          extractedFields: result.data.fields,
          entities: result.data.entities,
          extractionMetadata: {
            durationMs: Date.now() - startTime,
            byteSize: Buffer.byteLength(outcome.content, 'utf-8'),
          },
          issues: result.data.issues,
        },
      };
    } catch (error) {
      return failPage(errorMessage(error));
    }
  }
}
