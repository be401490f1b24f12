/**
 * Crawler Module
 *
 * CrawlerService is the pipeline's only way to fetch page content. The
 * Firecrawl implementation scrapes each URL with `POST /v1/scrape`, retrying
 * per URL and bounding the number of concurrent requests. A failing URL is
 * reported in its outcome and never aborts the rest of the batch.
 *
 * Usage:
 * ```typescript
 * const crawler = new FirecrawlCrawlerService({ apiKey: process.env.FIRECRAWL_API_KEY });
 * const [outcome] = await crawler.fetch(['https://example.com'], 'markdown');
 * ```
 */

import axios, { type AxiosInstance } from 'axios';
import pLimit from 'p-limit';
import type { PipelineErrorCode } from '../types/index.js';
import { defaultLogger, defaultMetrics, type Logger, type Metrics } from '../observability/index.js';
import { AbortedError, errorMessage, withRetry } from '../utils/index.js';

// ============================================================================
// Service Contract
// ============================================================================

/**
 * Content format requested from the crawler
 */
export type CrawlFormat = 'markdown' | 'html';

export type CrawlErrorCode = Extract<PipelineErrorCode, 'CRAWL_ERROR' | 'TIMEOUT' | 'MISSING_API_KEY'>;

/**
 * Result of crawling one URL
 */
export type CrawlOutcome =
  | { ok: true; url: string; content: string; title: string | null }
  | { ok: false; url: string; error: string; code: CrawlErrorCode };

export interface CrawlOptions {
  signal?: AbortSignal;
}

/**
 * Fetches page content for a batch of URLs. Returns one outcome per URL, in
 * input order.
 */
export interface CrawlerService {
  readonly name: string;
  fetch(urls: string[], format: CrawlFormat, options?: CrawlOptions): Promise<CrawlOutcome[]>;
}

// ============================================================================
// Firecrawl Implementation
// ============================================================================

/**
 * Configuration for the Firecrawl crawler
 */
export interface FirecrawlConfig {
  /** Firecrawl API key (from FIRECRAWL_API_KEY env var) */
  apiKey?: string | undefined;
  /** Firecrawl API URL (default: https://api.firecrawl.dev) */
  apiUrl?: string;
  /** Per-request timeout in milliseconds (default: 60000) */
  timeoutMs?: number;
  /** Maximum retries per URL (default: 2) */
  maxRetries?: number;
  /** Maximum concurrent scrape requests (default: 5) */
  maxConcurrency?: number;
  /** Backoff between retries (default: 1s, 3s) */
  retryDelaysMs?: number[];
}

export interface FirecrawlDependencies {
  /** Preconfigured HTTP client, used instead of building one from the API key */
  client?: AxiosInstance;
  logger?: Logger;
  metrics?: Metrics;
}

interface FirecrawlScrapeResponse {
  success: boolean;
  data?: {
    markdown?: string;
    html?: string;
    metadata?: {
      title?: string;
      sourceURL?: string;
      statusCode?: number;
    };
  };
  error?: string;
}

const DEFAULT_API_URL = 'https://api.firecrawl.dev';
const DEFAULT_TIMEOUT_MS = 60000;
const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_MAX_CONCURRENCY = 5;
const RETRY_DELAYS_MS = [1000, 3000];

/**
 * Client errors other than 408 and 429 will not succeed on retry
 */
function isRetryableError(error: Error): boolean {
  if (error instanceof AbortedError || axios.isCancel(error)) {
    return false;
  }
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined && status >= 400 && status < 500) {
      return status === 408 || status === 429;
    }
  }
  return true;
}

function isTimeoutError(error: unknown): boolean {
  return axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT');
}

export class FirecrawlCrawlerService implements CrawlerService {
  readonly name = 'firecrawl';

  private readonly client: AxiosInstance | null;
  private readonly maxRetries: number;
  private readonly maxConcurrency: number;
  private readonly retryDelaysMs: number[];
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(config: FirecrawlConfig = {}, deps: FirecrawlDependencies = {}) {
    this.maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.maxConcurrency = Math.max(1, config.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY);
    this.retryDelaysMs = config.retryDelaysMs ?? RETRY_DELAYS_MS;
    this.logger = deps.logger ?? defaultLogger;
    this.metrics = deps.metrics ?? defaultMetrics;

    if (deps.client) {
      this.client = deps.client;
    } else if (config.apiKey) {
      this.client = axios.create({
        baseURL: config.apiUrl ?? DEFAULT_API_URL,
        timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${config.apiKey}`,
        },
      });
    } else {
      this.client = null;
    }
  }

  async fetch(urls: string[], format: CrawlFormat, options: CrawlOptions = {}): Promise<CrawlOutcome[]> {
    const client = this.client;
    if (!client) {
      return urls.map((url) => ({
        ok: false,
        url,
        error: 'FIRECRAWL_API_KEY is required. Set it in config or environment variable.',
        code: 'MISSING_API_KEY',
      }));
    }

    const limit = pLimit(Math.min(this.maxConcurrency, Math.max(urls.length, 1)));
    return Promise.all(urls.map((url) => limit(() => this.fetchOne(client, url, format, options.signal))));
  }

  private async fetchOne(
    client: AxiosInstance,
    url: string,
    format: CrawlFormat,
    signal: AbortSignal | undefined
  ): Promise<CrawlOutcome> {
    const startTime = Date.now();
    try {
      const data = await withRetry(() => this.scrapeUrl(client, url, format, signal), {
        maxRetries: this.maxRetries,
        delaysMs: this.retryDelaysMs,
        logger: this.logger,
        context: `Scrape ${url}`,
        shouldRetry: isRetryableError,
        signal,
      });

      const content = format === 'html' ? data.html : data.markdown;
      if (content === undefined) {
        throw new Error(`Scrape returned no ${format} content`);
      }

      this.metrics.timing('crawler.scrape.duration', Date.now() - startTime, { format });
      return { ok: true, url, content, title: data.metadata?.title ?? null };
    } catch (error) {
      this.metrics.increment('crawler.scrape.errors', { format });
      this.logger.warn('Scrape failed', { url, error: errorMessage(error) });
      return {
        ok: false,
        url,
        error: errorMessage(error),
        code: isTimeoutError(error) ? 'TIMEOUT' : 'CRAWL_ERROR',
      };
    }
  }

  private async scrapeUrl(
    client: AxiosInstance,
    url: string,
    format: CrawlFormat,
    signal: AbortSignal | undefined
  ): Promise<NonNullable<FirecrawlScrapeResponse['data']>> {
    this.logger.debug('Scraping URL', { url, format });

    // Discovery needs navigation and pagination links, so HTML keeps the full page
    const response = await client.post<FirecrawlScrapeResponse>(
      '/v1/scrape',
      {
        url,
        formats: [format],
        onlyMainContent: format === 'markdown',
      },
      { signal }
    );

    if (!response.data.success || !response.data.data) {
      throw new Error(`Scrape failed: ${response.data.error ?? 'Unknown error'}`);
    }

    return response.data.data;
  }
}
