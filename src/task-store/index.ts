/**
 * Task Store Module
 *
 * Sole owner of task records. Every read hands out a copy and every
 * mutation runs synchronously, so a single update is atomic with respect to
 * any other caller on the event loop.
 *
 * Status moves forward only:
 * pending → discovery → extraction → integration → completed
 * with `failed` reachable from any non-terminal status.
 */

import { randomUUID } from 'crypto';
import type { ModuleResult, Task, TaskId, TaskStatus, TaskStatusView } from '../types/index.js';
import { defaultLogger, type Logger } from '../observability/index.js';
import { fail, resultMetadata, succeed } from '../utils/index.js';

/**
 * Fields a caller may change on an existing task
 */
export type TaskPatch = Partial<Pick<Task, 'status' | 'progress' | 'currentAgent' | 'message' | 'result' | 'error'>>;

const STATUS_RANK: Record<TaskStatus, number> = {
  pending: 0,
  discovery: 1,
  extraction: 2,
  integration: 3,
  completed: 4,
  failed: 4,
};

export function isTerminalStatus(status: TaskStatus): boolean {
  return status === 'completed' || status === 'failed';
}

/**
 * Project a task onto the view returned by status queries
 */
export function toStatusView(task: Task): TaskStatusView {
  return {
    taskId: task.id,
    status: task.status,
    progress: task.progress,
    currentAgent: task.currentAgent,
    message: task.message,
    error: task.error ?? null,
    hasResult: task.result !== undefined,
    createdAt: task.createdAt,
    updatedAt: task.updatedAt,
  };
}

function clampProgress(value: number): number {
  return Math.min(100, Math.max(0, Math.floor(value)));
}

/**
 * Reason a patch is refused, or null when it may be applied
 */
function transitionError(task: Task, patch: TaskPatch): string | null {
  if (isTerminalStatus(task.status)) {
    return `Task ${task.id} is already ${task.status}`;
  }

  const nextStatus = patch.status ?? task.status;
  if (STATUS_RANK[nextStatus] < STATUS_RANK[task.status]) {
    return `Cannot move task ${task.id} from ${task.status} back to ${nextStatus}`;
  }
  if (nextStatus === 'completed' && task.status !== 'integration') {
    return `Cannot complete task ${task.id} from ${task.status}`;
  }
  if (nextStatus === 'completed' && patch.result === undefined) {
    return 'A completed task requires a result';
  }
  if (nextStatus === 'failed' && patch.error === undefined) {
    return 'A failed task requires an error';
  }
  if (patch.result !== undefined && nextStatus !== 'completed') {
    return 'A result may only be set when the task completes';
  }
  if (patch.error !== undefined && nextStatus !== 'failed') {
    return 'An error may only be set when the task fails';
  }
  return null;
}

export class TaskStore {
  private readonly tasks = new Map<TaskId, Task>();
  private readonly logger: Logger;

  constructor(logger: Logger = defaultLogger) {
    this.logger = logger;
  }

  create(requirements: string, targetUrl: string, userId = 'anonymous'): Task {
    const now = new Date().toISOString();
    const task: Task = {
      id: randomUUID(),
      userId,
      requirements,
      targetUrl,
      status: 'pending',
      progress: 0,
      currentAgent: null,
      message: 'Task created',
      createdAt: now,
      updatedAt: now,
    };
    this.tasks.set(task.id, task);
    this.logger.debug('Task created', { taskId: task.id, userId, targetUrl });
    return structuredClone(task);
  }

  get(taskId: TaskId): Task | null {
    const task = this.tasks.get(taskId);
    return task ? structuredClone(task) : null;
  }

  update(taskId: TaskId, patch: TaskPatch): ModuleResult<Task> {
    const startTime = Date.now();
    const task = this.tasks.get(taskId);
    if (!task) {
      return fail('NOT_FOUND', `Task not found: ${taskId}`, resultMetadata(taskId, 'task-store', startTime));
    }

    const refusal = transitionError(task, patch);
    if (refusal) {
      this.logger.warn('Task update refused', { taskId, status: task.status, requested: patch.status, reason: refusal });
      return fail('INVALID_TRANSITION', refusal, resultMetadata(taskId, 'task-store', startTime));
    }

    if (patch.status !== undefined) {
      task.status = patch.status;
    }
    if (patch.progress !== undefined) {
      task.progress = Math.max(task.progress, clampProgress(patch.progress));
    }
    if (patch.currentAgent !== undefined) {
      task.currentAgent = patch.currentAgent;
    }
    if (patch.message !== undefined) {
      task.message = patch.message;
    }
    if (patch.result !== undefined) {
      task.result = structuredClone(patch.result);
    }
    if (patch.error !== undefined) {
      task.error = { ...patch.error };
    }

    const previous = Date.parse(task.updatedAt);
    task.updatedAt = new Date(Math.max(Date.now(), previous + 1)).toISOString();

    return succeed(structuredClone(task), resultMetadata(taskId, 'task-store', startTime));
  }

  delete(taskId: TaskId): boolean {
    const removed = this.tasks.delete(taskId);
    if (removed) {
      this.logger.debug('Task deleted', { taskId });
    }
    return removed;
  }

  list(): Task[] {
    return Array.from(this.tasks.values(), (task) => structuredClone(task));
  }

  size(): number {
    return this.tasks.size;
  }
}
