/**
 * Progress Streaming Module
 *
 * Pull-based progress feed for one task: polls the store, emits a snapshot
 * whenever (status, progress) changes, a heartbeat after a quiet interval,
 * and closes after the terminal snapshot.
 */

import type { TaskId, TaskStatusView } from '../types/index.js';
import { isTerminalStatus, toStatusView, type TaskStore } from '../task-store/index.js';

export type ProgressEvent =
  | { type: 'snapshot'; task: TaskStatusView }
  | { type: 'heartbeat'; taskId: TaskId; timestamp: string }
  | { type: 'error'; taskId: TaskId; error: { code: 'NOT_FOUND'; message: string } };

export interface StreamOptions {
  /** Store polling period (default: 500) */
  pollIntervalMs?: number;
  /** Quiet period before a heartbeat (default: 15000) */
  heartbeatIntervalMs?: number;
  /** Stops the stream without a closing event */
  signal?: AbortSignal;
}

const DEFAULT_POLL_INTERVAL_MS = 500;
const DEFAULT_HEARTBEAT_INTERVAL_MS = 15000;

/**
 * Resolve after `ms`, or as soon as the signal aborts
 */
function pause(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export async function* streamProgress(
  store: TaskStore,
  taskId: TaskId,
  options: StreamOptions = {}
): AsyncGenerator<ProgressEvent, void, undefined> {
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const heartbeatIntervalMs = options.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
  const { signal } = options;

  let last: Pick<TaskStatusView, 'status' | 'progress'> | null = null;
  let lastEmitAt = Date.now();

  while (!signal?.aborted) {
    const task = store.get(taskId);
    if (!task) {
      yield {
        type: 'error',
        taskId,
        error: {
          code: 'NOT_FOUND',
          message: last ? `Task ${taskId} was deleted` : `Task not found: ${taskId}`,
        },
      };
      return;
    }

    if (!last || last.status !== task.status || last.progress !== task.progress) {
      last = { status: task.status, progress: task.progress };
      lastEmitAt = Date.now();
      yield { type: 'snapshot', task: toStatusView(task) };
      if (isTerminalStatus(task.status)) {
        return;
      }
    } else if (Date.now() - lastEmitAt >= heartbeatIntervalMs) {
      lastEmitAt = Date.now();
      yield { type: 'heartbeat', taskId, timestamp: new Date().toISOString() };
    }

    await pause(pollIntervalMs, signal);
  }
}

/**
 * Encode an event as a Server-Sent Events frame
 */
export function formatServerSentEvent(event: ProgressEvent): string {
  return `event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`;
}
