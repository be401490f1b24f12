/**
 * Task Orchestrator
 *
 * Owns the task lifecycle: validates and creates tasks, runs the
 * discovery → extraction → integration pipeline for each one in the
 * background, and answers status, stream, result and delete requests.
 *
 * Progress checkpoints:
 * - discovery    10
 * - extraction   30 … 69 as pages settle
 * - integration  70
 * - completed    100
 * A failed task keeps the progress it had when it failed.
 */

import { z } from 'zod';
import type {
  FailureStage,
  FieldMap,
  IntegratedDataset,
  ModuleError,
  ModuleResult,
  StorageAdapter,
  TaskId,
  TaskStatus,
  TaskStatusView,
} from '../types/index.js';
import type { DiscoveryInput, DiscoveryOutput } from '../discovery/index.js';
import type { ExtractionInput, ExtractionOutput } from '../extraction/index.js';
import type { IntegrationInput } from '../integration/index.js';
import { toStatusView, type TaskPatch, type TaskStore } from '../task-store/index.js';
import { streamProgress, type ProgressEvent, type StreamOptions } from '../progress/index.js';
import { defaultLogger, defaultMetrics, describeError, type Logger, type Metrics } from '../observability/index.js';
import { errorMessage, fail, resultMetadata, succeed } from '../utils/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Anything that runs one pipeline step and reports through ModuleResult
 */
export interface Stage<I, O> {
  run(input: I): Promise<ModuleResult<O>>;
}

export interface CreateTaskRequest {
  requirements: string;
  targetUrl: string;
  userId?: string;
}

export interface CreateTaskResponse {
  taskId: TaskId;
  status: TaskStatus;
  progress: number;
  message: string;
  createdAt: string;
}

/**
 * First rows of a completed dataset
 */
export interface DatasetPreview {
  fieldNames: string[];
  records: FieldMap[];
  totalRecords: number;
}

export const DEFAULT_PREVIEW_LIMIT = 5;

export interface OrchestratorDependencies {
  store: TaskStore;
  discovery: Stage<DiscoveryInput, DiscoveryOutput>;
  extraction: Stage<ExtractionInput, ExtractionOutput>;
  integration: Stage<IntegrationInput, IntegratedDataset>;
  /** Artifact storage; artifacts are skipped when absent */
  storage?: StorageAdapter | null;
  logger?: Logger;
  metrics?: Metrics;
  /** Defaults for streamProgress */
  stream?: Omit<StreamOptions, 'signal'>;
}

const CreateTaskSchema = z.object({
  requirements: z.string().trim().min(1, 'requirements must not be empty'),
  targetUrl: z
    .string()
    .trim()
    .min(1, 'targetUrl must not be empty')
    .refine(isHttpUrl, 'targetUrl must be an absolute http(s) URL'),
  userId: z.string().trim().min(1).optional(),
});

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export const PROGRESS = {
  discovery: 10,
  extractionStart: 30,
  extractionEnd: 69,
  integration: 70,
  completed: 100,
} as const;

/**
 * Progress while `settled` of `total` pages are done
 */
export function extractionProgress(settled: number, total: number): number {
  if (total <= 0) {
    return PROGRESS.extractionStart;
  }
  const span = PROGRESS.extractionEnd - PROGRESS.extractionStart;
  return PROGRESS.extractionStart + Math.floor((span * Math.min(settled, total)) / total);
}

/**
 * Raised inside a run once the task was deleted or its run aborted
 */
class RunStoppedError extends Error {
  constructor(taskId: TaskId) {
    super(`Run for task ${taskId} was stopped`);
    this.name = 'RunStoppedError';
  }
}

// ============================================================================
// Orchestrator
// ============================================================================

export class TaskOrchestrator {
  private readonly store: TaskStore;
  private readonly discovery: Stage<DiscoveryInput, DiscoveryOutput>;
  private readonly extraction: Stage<ExtractionInput, ExtractionOutput>;
  private readonly integration: Stage<IntegrationInput, IntegratedDataset>;
  private readonly storage: StorageAdapter | null;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly streamDefaults: Omit<StreamOptions, 'signal'>;

  private readonly runs = new Map<TaskId, Promise<void>>();
  private readonly controllers = new Map<TaskId, AbortController>();
  private readonly cleanups = new Map<TaskId, Promise<void>>();

  constructor(deps: OrchestratorDependencies) {
    this.store = deps.store;
    this.discovery = deps.discovery;
    this.extraction = deps.extraction;
    this.integration = deps.integration;
    this.storage = deps.storage ?? null;
    this.logger = deps.logger ?? defaultLogger;
    this.metrics = deps.metrics ?? defaultMetrics;
    this.streamDefaults = deps.stream ?? {};
  }

  // --------------------------------------------------------------------------
  // Lifecycle API
  // --------------------------------------------------------------------------

  /**
   * Validate the request, create a pending task and start its pipeline run
   */
  createTask(request: CreateTaskRequest): ModuleResult<CreateTaskResponse> {
    const startTime = Date.now();
    const parsed = CreateTaskSchema.safeParse(request);
    if (!parsed.success) {
      const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
      return fail('INVALID_ARGUMENT', issues.join('; '), resultMetadata('', 'orchestrator', startTime), issues);
    }

    const { requirements, targetUrl, userId } = parsed.data;
    const task = this.store.create(requirements, targetUrl, userId);
    this.logger.info('Task created', { taskId: task.id, userId: task.userId, targetUrl });
    this.startRun(task.id);

    return succeed(
      {
        taskId: task.id,
        status: task.status,
        progress: task.progress,
        message: task.message,
        createdAt: task.createdAt,
      },
      resultMetadata(task.id, 'orchestrator', startTime)
    );
  }

  getStatus(taskId: TaskId): ModuleResult<TaskStatusView> {
    const startTime = Date.now();
    const task = this.store.get(taskId);
    if (!task) {
      return fail('NOT_FOUND', `Task not found: ${taskId}`, resultMetadata(taskId, 'orchestrator', startTime));
    }
    return succeed(toStatusView(task), resultMetadata(taskId, 'orchestrator', startTime));
  }

  streamProgress(taskId: TaskId, options: StreamOptions = {}): AsyncGenerator<ProgressEvent, void, undefined> {
    return streamProgress(this.store, taskId, { ...this.streamDefaults, ...options });
  }

  getResult(taskId: TaskId): ModuleResult<IntegratedDataset> {
    const startTime = Date.now();
    const task = this.store.get(taskId);
    if (!task) {
      return fail('NOT_FOUND', `Task not found: ${taskId}`, resultMetadata(taskId, 'orchestrator', startTime));
    }
    if (task.status !== 'completed' || !task.result) {
      return fail(
        'NOT_READY',
        `Task ${taskId} is ${task.status}; results are available once it completes`,
        resultMetadata(taskId, 'orchestrator', startTime),
        { status: task.status }
      );
    }
    return succeed(task.result, resultMetadata(taskId, 'orchestrator', startTime));
  }

  /**
   * The first `limit` records of a completed task's dataset
   */
  getPreview(taskId: TaskId, limit: number = DEFAULT_PREVIEW_LIMIT): ModuleResult<DatasetPreview> {
    const startTime = Date.now();
    if (!Number.isInteger(limit) || limit < 1) {
      return fail(
        'INVALID_ARGUMENT',
        `limit must be a positive integer, got ${limit}`,
        resultMetadata(taskId, 'orchestrator', startTime)
      );
    }
    const result = this.getResult(taskId);
    if (!result.success) {
      return result;
    }
    const { records, metadata } = result.data;
    return succeed(
      { fieldNames: metadata.fieldNames, records: records.slice(0, limit), totalRecords: records.length },
      resultMetadata(taskId, 'orchestrator', startTime)
    );
  }

  /**
   * Cancel the run and remove the task. Its stored artifacts are removed
   * once the run has settled. Returns false for unknown ids.
   */
  deleteTask(taskId: TaskId): boolean {
    this.controllers.get(taskId)?.abort();
    const removed = this.store.delete(taskId);
    if (removed) {
      this.logger.info('Task deleted', { taskId });
      this.removeArtifacts(taskId);
    }
    return removed;
  }

  listTasks(): TaskStatusView[] {
    return this.store.list().map(toStatusView);
  }

  /**
   * Resolves once the task's run, and any artifact removal after a delete,
   * has finished (immediately if none is active)
   */
  async whenSettled(taskId: TaskId): Promise<void> {
    await this.runs.get(taskId);
    await this.cleanups.get(taskId);
  }

  /**
   * Wait for every active run; with `abort`, cancel them first
   */
  async shutdown(options: { abort?: boolean } = {}): Promise<void> {
    if (options.abort) {
      for (const controller of this.controllers.values()) {
        controller.abort();
      }
    }
    await Promise.all(this.runs.values());
    await Promise.all(this.cleanups.values());
  }

  // --------------------------------------------------------------------------
  // Pipeline
  // --------------------------------------------------------------------------

  private startRun(taskId: TaskId): void {
    const controller = new AbortController();
    this.controllers.set(taskId, controller);

    // Deferred so the caller observes the task as pending
    const run = Promise.resolve()
      .then(() => this.runPipeline(taskId, controller.signal))
      .catch((error: unknown) => {
        this.logger.error('Pipeline run could not record its outcome', { taskId, ...describeError(error) });
      })
      .finally(() => {
        this.runs.delete(taskId);
        this.controllers.delete(taskId);
      });

    this.runs.set(taskId, run);
  }

  private async runPipeline(taskId: TaskId, signal: AbortSignal): Promise<void> {
    const startTime = Date.now();
    const task = this.store.get(taskId);
    if (!task) {
      return;
    }
    const { targetUrl, requirements } = task;
    let stage: FailureStage = 'orchestrator';

    this.metrics.increment('pipeline.started');
    this.logger.info('Pipeline started', { taskId, targetUrl });

    try {
      // Discovery
      this.transition(taskId, {
        status: 'discovery',
        progress: PROGRESS.discovery,
        currentAgent: 'page_discovery',
        message: `Discovering pages on ${targetUrl}`,
      });
      stage = 'page_discovery';
      const discovery = await this.discovery.run({ taskId, targetUrl, requirements, signal });
      stage = 'orchestrator';
      this.ensureActive(taskId, signal);
      if (!discovery.success) {
        await this.failTask(taskId, 'page_discovery', discovery.error, startTime);
        return;
      }
      await this.saveArtifact(taskId, 'discovery', discovery.data);

      // Extraction
      const pages = discovery.data.pages;
      this.transition(taskId, {
        status: 'extraction',
        progress: PROGRESS.extractionStart,
        currentAgent: 'content_extraction',
        message: `Extracting content from ${pages.length} pages`,
      });
      stage = 'content_extraction';
      const extraction = await this.extraction.run({
        taskId,
        pages,
        requirements,
        signal,
        onProgress: (settled, total) => this.reportExtractionProgress(taskId, settled, total),
      });
      stage = 'orchestrator';
      this.ensureActive(taskId, signal);
      if (!extraction.success) {
        await this.failTask(taskId, 'content_extraction', extraction.error, startTime);
        return;
      }
      await this.saveArtifact(taskId, 'extraction', extraction.data);

      // Integration
      const { mainPageRecord, subPageRecords, issues, pagesProcessed, pagesFailed } = extraction.data;
      this.transition(taskId, {
        status: 'integration',
        progress: PROGRESS.integration,
        currentAgent: 'result_integration',
        message: `Integrating results from ${pagesProcessed} pages`,
      });
      stage = 'result_integration';
      const integration = await this.integration.run({
        taskId,
        requirements,
        mainPageRecord,
        subPageRecords,
        issues,
        pagesProcessed,
        pagesFailed,
        signal,
      });
      stage = 'orchestrator';
      this.ensureActive(taskId, signal);
      if (!integration.success) {
        await this.failTask(taskId, 'result_integration', integration.error, startTime);
        return;
      }
      await this.saveArtifact(taskId, 'dataset', integration.data);

      // Done
      const dataset = integration.data;
      this.transition(taskId, {
        status: 'completed',
        progress: PROGRESS.completed,
        message: `Completed: ${dataset.summary.totalRecords} records from ${pagesProcessed} pages`,
        result: dataset,
      });

      const duration = Date.now() - startTime;
      this.metrics.increment('pipeline.completed');
      this.metrics.timing('pipeline.duration', duration, { status: 'completed' });
      this.logger.info('Pipeline completed', {
        taskId,
        duration,
        records: dataset.summary.totalRecords,
        pagesFailed,
      });
      await this.saveTaskSnapshot(taskId);
    } catch (error) {
      if (error instanceof RunStoppedError) {
        this.metrics.increment('pipeline.cancelled');
        if (this.store.get(taskId)) {
          // Aborted by shutdown; the task itself survives
          await this.failTask(taskId, stage, { code: 'UNEXPECTED', message: 'Run was cancelled' }, startTime);
          return;
        }
        this.logger.info('Task removed during run; stopping', { taskId, stage });
        return;
      }
      this.logger.error('Unexpected pipeline error', { taskId, stage, ...describeError(error) });
      await this.failTask(taskId, stage, { code: 'UNEXPECTED', message: errorMessage(error) }, startTime);
    }
  }

  /**
   * Persist a state change, or stop the run if the task was deleted
   *
   * @throws RunStoppedError when the task no longer exists
   * @throws Error when the store refuses the transition
   */
  private transition(taskId: TaskId, patch: TaskPatch): void {
    const result = this.store.update(taskId, patch);
    if (result.success) {
      this.logger.debug('Task updated', { taskId, status: result.data.status, progress: result.data.progress });
      return;
    }
    if (result.error.code === 'NOT_FOUND') {
      throw new RunStoppedError(taskId);
    }
    throw new Error(result.error.message);
  }

  private ensureActive(taskId: TaskId, signal: AbortSignal): void {
    if (signal.aborted) {
      throw new RunStoppedError(taskId);
    }
  }

  private reportExtractionProgress(taskId: TaskId, settled: number, total: number): void {
    const result = this.store.update(taskId, {
      progress: extractionProgress(settled, total),
      message: `Extracting content from ${total} pages (${settled}/${total} settled)`,
    });
    if (!result.success && result.error.code !== 'NOT_FOUND') {
      this.logger.warn('Could not record extraction progress', { taskId, error: result.error.message });
    }
  }

  private async failTask(taskId: TaskId, stage: FailureStage, error: ModuleError, startTime: number): Promise<void> {
    const result = this.store.update(taskId, {
      status: 'failed',
      message: `Failed during ${stage}: ${error.message}`,
      error: { code: error.code, stage, message: error.message },
    });
    if (!result.success) {
      if (result.error.code !== 'NOT_FOUND') {
        this.logger.error('Could not mark task as failed', { taskId, stage, error: result.error.message });
      }
      return;
    }

    const duration = Date.now() - startTime;
    this.metrics.increment('pipeline.failed', { stage, code: error.code });
    this.metrics.timing('pipeline.duration', duration, { status: 'failed' });
    this.logger.warn('Pipeline failed', { taskId, stage, code: error.code, error: error.message, duration });
    await this.saveTaskSnapshot(taskId);
  }

  // --------------------------------------------------------------------------
  // Artifacts
  // --------------------------------------------------------------------------

  private async saveArtifact(taskId: TaskId, artifactType: string, data: unknown): Promise<void> {
    if (!this.storage) {
      return;
    }
    try {
      await this.storage.save(taskId, artifactType, JSON.stringify(data, null, 2), {
        contentType: 'application/json',
      });
    } catch (error) {
      this.logger.warn('Artifact save failed', { taskId, artifactType, error: errorMessage(error) });
      this.metrics.increment('artifacts.save_failed', { artifactType });
    }
  }

  private removeArtifacts(taskId: TaskId): void {
    const storage = this.storage;
    if (!storage) {
      return;
    }
    const cleanup: Promise<void> = (this.runs.get(taskId) ?? Promise.resolve())
      .then(() => storage.delete(taskId))
      .then(() => {
        this.logger.debug('Artifacts removed', { taskId });
      })
      .catch((error: unknown) => {
        this.logger.warn('Artifact removal failed', { taskId, error: errorMessage(error) });
        this.metrics.increment('artifacts.delete_failed');
      })
      .finally(() => {
        if (this.cleanups.get(taskId) === cleanup) {
          this.cleanups.delete(taskId);
        }
      });
    this.cleanups.set(taskId, cleanup);
  }

  private async saveTaskSnapshot(taskId: TaskId): Promise<void> {
    const task = this.store.get(taskId);
    if (task) {
      await this.saveArtifact(taskId, 'task', task);
    }
  }
}
