/**
 * Integration Tests for the extraction pipeline
 *
 * Wires the real stages, store, orchestrator and storage through
 * createPipeline; only the crawler and the LLM are in-process fakes.
 */

import { describe, it, expect } from '@jest/globals';
import type { FieldMap, TaskId } from '../../src/types/index.js';
import { createPipeline, loadConfig, MemoryStorageAdapter, type Pipeline } from '../../src/index.js';
import { FakeCrawler, FakeLLM, createTestLogger, scriptedSite, unwrap, type LLMHandler } from '../helpers/index.js';

const BLOG = 'https://blog.example/posts';

function pageNumber(url: string): number {
  const match = /[?&]page=(\d+)/.exec(url);
  return match?.[1] ? Number(match[1]) : 1;
}

function postsFor(url: string): FieldMap[] {
  const page = pageNumber(url);
  const posts: FieldMap[] = [{ url: `https://blog.example/post/${page}`, 'Post Title': `Post ${page}` }];
  if (page === 2) {
    posts.push({ url: 'https://blog.example/post/1', 'Post Title': 'post 1 ' });
  }
  return posts;
}

function buildPipeline(
  crawler: FakeCrawler,
  handler: LLMHandler,
  env: Record<string, string> = {}
): { pipeline: Pipeline; llm: FakeLLM; storage: MemoryStorageAdapter } {
  const llm = new FakeLLM(handler);
  const storage = new MemoryStorageAdapter();
  const config = loadConfig({
    INTEGRATION_RECONCILER: 'rule_based',
    STREAM_POLL_INTERVAL_MS: '5',
    EXTRACTION_MAX_CONCURRENCY: '5',
    ...env,
  });
  const pipeline = createPipeline(config, { crawler, llm, storage, logger: createTestLogger() });
  return { pipeline, llm, storage };
}

async function run(pipeline: Pipeline, targetUrl: string, requirements: string): Promise<TaskId> {
  const { taskId } = unwrap(pipeline.orchestrator.createTask({ requirements, targetUrl }));
  await pipeline.orchestrator.whenSettled(taskId);
  return taskId;
}

describe('Pipeline Integration', () => {
  it('collects every post across 75 pages of pagination', async () => {
    const crawler = new FakeCrawler({ [BLOG]: { content: '<nav>1 2 3 ... 75</nav>', title: 'Posts' } });
    const { pipeline, llm, storage } = buildPipeline(
      crawler,
      scriptedSite({
        pagination: { urlPattern: `${BLOG}?page={page}`, maxPage: 75 },
        entitiesFor: postsFor,
      })
    );

    const taskId = await run(pipeline, BLOG, 'All post titles');

    const status = unwrap(pipeline.orchestrator.getStatus(taskId));
    expect(status).toMatchObject({
      status: 'completed',
      progress: 100,
      message: 'Completed: 75 records from 75 pages',
    });

    const dataset = unwrap(pipeline.orchestrator.getResult(taskId));
    expect(dataset.records).toHaveLength(75);
    expect(dataset.records[0]).toEqual({ url: 'https://blog.example/post/1', post_title: 'Post 1' });
    expect(dataset.records[74]).toEqual({ url: 'https://blog.example/post/75', post_title: 'Post 75' });
    expect(dataset.summary).toEqual({
      totalRecords: 75,
      duplicatesRemoved: 1,
      conflictsResolved: 1,
      conflictsRetained: 0,
    });
    expect(dataset.metadata).toMatchObject({
      fieldNames: ['url', 'post_title'],
      pagesProcessed: 75,
      pagesFailed: 0,
      issues: [],
      reconciler: 'rule_based',
    });
    expect(dataset.metadata.sourcePages).toHaveLength(75);
    expect(dataset.metadata.sourcePages[0]).toBe(BLOG);

    expect(crawler.crawledUrls('html')).toEqual([BLOG]);
    expect(crawler.crawledUrls('markdown')).toHaveLength(75);
    expect(llm.callsOf('extraction')).toHaveLength(75);
    expect(llm.maxInFlight).toBeLessThanOrEqual(5);

    const artifacts = (await storage.list(taskId)).map((artifact) => artifact.artifactType).sort();
    expect(artifacts).toEqual(['dataset', 'discovery', 'extraction', 'task']);
  });

  it('completes with the pages that succeeded', async () => {
    const links = Array.from({ length: 9 }, (_, i) => ({ url: `/item/${i + 1}`, title: `Item ${i + 1}` }));
    const crawler = new FakeCrawler();
    for (const failing of [3, 6, 9]) {
      crawler.setPage(`https://shop.example/item/${failing}`, { error: 'blocked by robots.txt' });
    }
    const { pipeline } = buildPipeline(crawler, scriptedSite({ links }));

    const taskId = await run(pipeline, 'https://shop.example/', 'Every product');

    const dataset = unwrap(pipeline.orchestrator.getResult(taskId));
    expect(dataset.records).toHaveLength(7);
    expect(dataset.metadata.pagesProcessed).toBe(7);
    expect(dataset.metadata.pagesFailed).toBe(3);
    expect(dataset.metadata.issues).toEqual([
      'https://shop.example/item/3: blocked by robots.txt',
      'https://shop.example/item/6: blocked by robots.txt',
      'https://shop.example/item/9: blocked by robots.txt',
    ]);
  });

  it('fails the task when no page can be extracted', async () => {
    const crawler = new FakeCrawler();
    const { pipeline } = buildPipeline(crawler, (call) => {
      if (call.kind === 'extraction') {
        throw new Error('model unavailable');
      }
      return scriptedSite({ links: [{ url: '/a' }] })(call);
    });

    const taskId = await run(pipeline, 'https://shop.example/', 'Every product');

    expect(unwrap(pipeline.orchestrator.getStatus(taskId))).toMatchObject({
      status: 'failed',
      progress: 69,
      message: 'Failed during content_extraction: All 2 pages failed extraction',
      error: { code: 'EXTRACTION_FAILED', stage: 'content_extraction', message: 'All 2 pages failed extraction' },
    });
  });

  it('renames synonymous fields with the LLM reconciler', async () => {
    const crawler = new FakeCrawler();
    const { pipeline } = buildPipeline(
      crawler,
      scriptedSite({
        links: [{ url: '/news/1' }],
        entitiesFor: (url) =>
          url.endsWith('/news/1')
            ? [{ url, headline: 'Second story' }]
            : [{ url, title: 'First story' }],
        aliases: { headline: 'title' },
      }),
      { INTEGRATION_RECONCILER: 'llm' }
    );

    const taskId = await run(pipeline, 'https://news.example/', 'Story titles');

    const dataset = unwrap(pipeline.orchestrator.getResult(taskId));
    expect(dataset.records).toEqual([
      { url: 'https://news.example/', title: 'First story' },
      { url: 'https://news.example/news/1', title: 'Second story' },
    ]);
    expect(dataset.metadata.reconciler).toBe('llm');
  });

  it('streams snapshots that only move forward', async () => {
    const crawler = new FakeCrawler({ 'https://shop.example/': { delayMs: 20 } });
    const { pipeline } = buildPipeline(crawler, scriptedSite({ links: [{ url: '/a' }, { url: '/b' }] }));
    const { taskId } = unwrap(
      pipeline.orchestrator.createTask({ requirements: 'Every product', targetUrl: 'https://shop.example/' })
    );

    const progress: number[] = [];
    const statuses: string[] = [];
    for await (const event of pipeline.orchestrator.streamProgress(taskId)) {
      if (event.type === 'snapshot') {
        progress.push(event.task.progress);
        statuses.push(event.task.status);
      }
    }

    expect(statuses[statuses.length - 1]).toBe('completed');
    expect(progress[progress.length - 1]).toBe(100);
    expect(progress).toEqual([...progress].sort((a, b) => a - b));
  });

  it('fails discovery cleanly without a crawler API key', async () => {
    const config = loadConfig({ INTEGRATION_RECONCILER: 'rule_based' });
    const pipeline = createPipeline(config, { storage: null, logger: createTestLogger() });

    const taskId = await run(pipeline, 'https://example.com/', 'Anything');

    expect(unwrap(pipeline.orchestrator.getStatus(taskId)).error).toEqual({
      code: 'DISCOVERY_FAILED',
      stage: 'page_discovery',
      message: 'Failed to crawl https://example.com/: FIRECRAWL_API_KEY is required. Set it in config or environment variable.',
    });
  });
});
