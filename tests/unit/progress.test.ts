/**
 * Unit tests for the Progress Streaming Module
 */

import { describe, test, expect, beforeEach } from '@jest/globals';
import { TaskStore } from '../../src/task-store/index.js';
import { formatServerSentEvent, streamProgress, type ProgressEvent } from '../../src/progress/index.js';
import { createTestLogger, unwrap } from '../helpers/index.js';

const error = { code: 'UNEXPECTED', stage: 'orchestrator', message: 'stopped' } as const;

function describeEvent(event: ProgressEvent): string {
  switch (event.type) {
    case 'snapshot':
      return `${event.task.status}/${event.task.progress}`;
    case 'heartbeat':
      return 'heartbeat';
    case 'error':
      return `error: ${event.error.message}`;
  }
}

describe('Progress Streaming Module', () => {
  let store: TaskStore;

  beforeEach(() => {
    store = new TaskStore(createTestLogger());
  });

  test('reports an unknown task and closes', async () => {
    const events: ProgressEvent[] = [];
    for await (const event of streamProgress(store, 'missing', { pollIntervalMs: 5 })) {
      events.push(event);
    }

    expect(events).toEqual([
      { type: 'error', taskId: 'missing', error: { code: 'NOT_FOUND', message: 'Task not found: missing' } },
    ]);
  });

  test('emits one snapshot for a task that already finished', async () => {
    const { id } = store.create('a', 'https://example.com');
    unwrap(store.update(id, { status: 'failed', error }));

    const events: string[] = [];
    for await (const event of streamProgress(store, id, { pollIntervalMs: 5 })) {
      events.push(describeEvent(event));
    }

    expect(events).toEqual(['failed/0']);
  });

  test('emits a snapshot per status change and closes after the terminal one', async () => {
    const { id } = store.create('a', 'https://example.com');
    const steps = [
      () => store.update(id, { status: 'discovery', progress: 10 }),
      () => store.update(id, { status: 'extraction', progress: 30 }),
      () => store.update(id, { status: 'failed', error }),
    ];

    const events: string[] = [];
    for await (const event of streamProgress(store, id, { pollIntervalMs: 5 })) {
      events.push(describeEvent(event));
      steps.shift()?.();
    }

    expect(events).toEqual(['pending/0', 'discovery/10', 'extraction/30', 'failed/30']);
  });

  test('ignores updates that change neither status nor progress', async () => {
    const { id } = store.create('a', 'https://example.com');
    const events: string[] = [];

    for await (const event of streamProgress(store, id, { pollIntervalMs: 5, heartbeatIntervalMs: 60000 })) {
      events.push(describeEvent(event));
      if (events.length === 1) {
        unwrap(store.update(id, { message: 'Still waiting' }));
        setTimeout(() => unwrap(store.update(id, { progress: 5 })), 30);
      } else {
        unwrap(store.update(id, { status: 'failed', error }));
      }
    }

    expect(events).toEqual(['pending/0', 'pending/5', 'failed/5']);
  });

  test('sends heartbeats while nothing changes', async () => {
    const { id } = store.create('a', 'https://example.com');
    const events: string[] = [];

    for await (const event of streamProgress(store, id, { pollIntervalMs: 5, heartbeatIntervalMs: 10 })) {
      events.push(describeEvent(event));
      if (events.length === 3) {
        break;
      }
    }

    expect(events).toEqual(['pending/0', 'heartbeat', 'heartbeat']);
  });

  test('reports a task deleted mid-stream', async () => {
    const { id } = store.create('a', 'https://example.com');
    const events: string[] = [];

    for await (const event of streamProgress(store, id, { pollIntervalMs: 5 })) {
      events.push(describeEvent(event));
      store.delete(id);
    }

    expect(events).toEqual(['pending/0', `error: Task ${id} was deleted`]);
  });

  test('stops quietly when the signal aborts', async () => {
    const { id } = store.create('a', 'https://example.com');
    const controller = new AbortController();
    const events: string[] = [];

    for await (const event of streamProgress(store, id, { pollIntervalMs: 5, signal: controller.signal })) {
      events.push(describeEvent(event));
      controller.abort();
    }

    expect(events).toEqual(['pending/0']);
  });

  describe('formatServerSentEvent()', () => {
    test('frames the event type and JSON payload', () => {
      const frame = formatServerSentEvent({ type: 'heartbeat', taskId: 'task-1', timestamp: '2026-01-01T00:00:00.000Z' });

      expect(frame).toBe(
        'event: heartbeat\ndata: {"type":"heartbeat","taskId":"task-1","timestamp":"2026-01-01T00:00:00.000Z"}\n\n'
      );
    });
  });
});
