/**
 * Page Discovery Stage
 *
 * Crawls the target page as HTML, asks the LLM which sub-pages and which
 * pagination sequence the requirements call for, and merges everything into
 * an ordered, duplicate-free page list that starts with the target.
 */

import { z } from 'zod';
import type { DiscoveredPage, ModuleResult, TaskId } from '../types/index.js';
import type { CrawlerService } from '../crawler/index.js';
import type { LLMService } from '../llm/index.js';
import { buildPrompt } from '../prompts/index.js';
import { defaultLogger, defaultMetrics, type Logger, type Metrics } from '../observability/index.js';
import { errorMessage, fail, resultMetadata, succeed, withTimeout } from '../utils/index.js';

// ============================================================================
// LLM Response Schema
// ============================================================================

export const PAGE_PLACEHOLDER = '{page}';

const PaginationSchema = z.object({
  urlPattern: z.string().refine((value) => value.includes(PAGE_PLACEHOLDER), {
    message: `urlPattern must contain ${PAGE_PLACEHOLDER}`,
  }),
  maxPage: z.coerce.number().int().min(1),
  firstPageUrl: z
    .string()
    .nullish()
    .transform((value) => value || undefined),
});

export const DiscoveryResponseSchema = z.object({
  links: z
    .array(
      z.object({
        url: z.string().min(1),
        title: z
          .string()
          .nullish()
          .transform((value) => value ?? ''),
      })
    )
    .default([]),
  pagination: PaginationSchema.nullish().transform((value) => value ?? null),
});

export type DiscoveryResponse = z.infer<typeof DiscoveryResponseSchema>;
export type PaginationInfo = z.infer<typeof PaginationSchema>;

export const DISCOVERY_SCHEMA_HINT = `{
  "links": [{ "url": "string", "title": "string" }],
  "pagination": { "urlPattern": "string containing {page}", "maxPage": 1, "firstPageUrl": "string (optional)" } | null
}`;

// ============================================================================
// URL Helpers
// ============================================================================

/**
 * Resolve `href` against `base` and normalize it. Returns null for
 * malformed URLs and for schemes other than http(s). Fragments are dropped.
 */
export function resolvePageUrl(href: string, base: string): string | null {
  let url: URL;
  try {
    url = new URL(href.trim(), base);
  } catch {
    return null;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return null;
  }
  url.hash = '';
  return url.toString();
}

/**
 * Expand a pagination pattern into the full page sequence. Page 1 is
 * `firstPageUrl` (or the target itself); pages 2..maxPage substitute the
 * page number into the pattern.
 *
 * @throws Error when maxPage exceeds `maxPages` or a generated URL is invalid
 */
export function generatePaginationUrls(pagination: PaginationInfo, targetUrl: string, maxPages: number): string[] {
  if (pagination.maxPage > maxPages) {
    throw new Error(`Pagination reports ${pagination.maxPage} pages, above the limit of ${maxPages}`);
  }

  const urls: string[] = [];
  const firstPage = resolvePageUrl(pagination.firstPageUrl ?? targetUrl, targetUrl);
  if (!firstPage) {
    throw new Error(`Invalid first page URL: ${pagination.firstPageUrl ?? targetUrl}`);
  }
  urls.push(firstPage);

  for (let page = 2; page <= pagination.maxPage; page++) {
    const raw = pagination.urlPattern.split(PAGE_PLACEHOLDER).join(String(page));
    const url = resolvePageUrl(raw, targetUrl);
    if (!url) {
      throw new Error(`Invalid pagination URL for page ${page}: ${raw}`);
    }
    urls.push(url);
  }

  return urls;
}

/**
 * Concatenate page lists, keeping the first occurrence of each URL. URLs
 * are compared in normalized form; the kept entry is left as given.
 */
export function mergeDiscoveredPages(...groups: DiscoveredPage[][]): DiscoveredPage[] {
  const seen = new Set<string>();
  const merged: DiscoveredPage[] = [];
  for (const group of groups) {
    for (const page of group) {
      const key = resolvePageUrl(page.url, page.url) ?? page.url;
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      merged.push(page);
    }
  }
  return merged;
}

// ============================================================================
// Stage
// ============================================================================

export interface DiscoveryInput {
  taskId: TaskId;
  targetUrl: string;
  requirements: string;
  signal?: AbortSignal;
}

export interface DiscoveryOutput {
  pages: DiscoveredPage[];
  /** Sub-page links accepted from the LLM reply */
  linksFound: number;
  /** Pages in the pagination sequence, page 1 included */
  paginationPages: number;
}

export interface DiscoveryStageOptions {
  crawlTimeoutMs: number;
  llmTimeoutMs: number;
  maxPaginationPages: number;
  promptsDir?: string;
  logger?: Logger;
  metrics?: Metrics;
}

export class PageDiscoveryStage {
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(
    private readonly crawler: CrawlerService,
    private readonly llm: LLMService,
    private readonly options: DiscoveryStageOptions
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  async run(input: DiscoveryInput): Promise<ModuleResult<DiscoveryOutput>> {
    const startTime = Date.now();
    const { taskId, targetUrl, requirements, signal } = input;
    const failDiscovery = (message: string, details?: unknown): ModuleResult<DiscoveryOutput> => {
      this.logger.warn('Page discovery failed', { taskId, targetUrl, error: message });
      this.metrics.increment('discovery.failed');
      return fail('DISCOVERY_FAILED', message, resultMetadata(taskId, 'page_discovery', startTime), details);
    };

    // Normalized form resolves links; the submitted string is crawled and listed first
    const target = resolvePageUrl(targetUrl, targetUrl);
    if (!target) {
      return failDiscovery(`Target URL is not an http(s) URL: ${targetUrl}`);
    }

    this.logger.info('Starting page discovery', { taskId, targetUrl: target });

    // 1. Main page, no retry at this level
    let html: string;
    let targetTitle: string;
    try {
      const outcomes = await withTimeout(
        (callSignal) => this.crawler.fetch([targetUrl], 'html', { signal: callSignal }),
        this.options.crawlTimeoutMs,
        `Crawl ${targetUrl}`,
        signal
      );
      const outcome = outcomes[0];
      if (!outcome) {
        return failDiscovery(`Crawler returned no outcome for ${targetUrl}`);
      }
      if (!outcome.ok) {
        return failDiscovery(`Failed to crawl ${targetUrl}: ${outcome.error}`, { code: outcome.code });
      }
      html = outcome.content;
      targetTitle = outcome.title ?? '';
    } catch (error) {
      return failDiscovery(`Failed to crawl ${targetUrl}: ${errorMessage(error)}`);
    }

    // 2. Links and pagination from the LLM
    let response: DiscoveryResponse;
    try {
      const instructions = await buildPrompt(
        'discovery',
        { target_url: target, requirements, schema_hint: DISCOVERY_SCHEMA_HINT },
        this.options.promptsDir
      );
      const result = await withTimeout(
        (callSignal) =>
          this.llm.run({
            taskId,
            instructions,
            content: html,
            schema: DiscoveryResponseSchema,
            schemaHint: DISCOVERY_SCHEMA_HINT,
            signal: callSignal,
          }),
        this.options.llmTimeoutMs,
        'Discovery LLM call',
        signal
      );
      if (!result.success) {
        return failDiscovery(`Link discovery failed: ${result.error.message}`, { code: result.error.code });
      }
      response = result.data;
    } catch (error) {
      return failDiscovery(`Link discovery failed: ${errorMessage(error)}`);
    }

    // 3. Pagination sequence
    let paginationUrls: string[] = [];
    if (response.pagination) {
      try {
        paginationUrls = generatePaginationUrls(response.pagination, target, this.options.maxPaginationPages);
      } catch (error) {
        return failDiscovery(errorMessage(error));
      }
    }

    // 4. Merge
    const links: DiscoveredPage[] = [];
    for (const link of response.links) {
      const url = resolvePageUrl(link.url, target);
      if (url) {
        links.push({ url, title: link.title });
      } else {
        this.logger.debug('Skipping unusable link', { taskId, href: link.url });
      }
    }

    const pages = mergeDiscoveredPages(
      [{ url: targetUrl, title: targetTitle }],
      links,
      paginationUrls.map((url, index) => ({ url, title: `Page ${index + 1}` }))
    );

    this.logger.info('Page discovery complete', {
      taskId,
      pages: pages.length,
      linksFound: links.length,
      paginationPages: paginationUrls.length,
    });
    this.metrics.timing('discovery.duration', Date.now() - startTime);
    this.metrics.gauge('discovery.pages', pages.length);

    return succeed(
      { pages, linksFound: links.length, paginationPages: paginationUrls.length },
      resultMetadata(taskId, 'page_discovery', startTime)
    );
  }
}
