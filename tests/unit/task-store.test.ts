/**
 * Unit tests for the Task Store Module
 */

import { describe, test, expect, beforeEach } from '@jest/globals';
import type { IntegratedDataset, TaskError } from '../../src/types/index.js';
import { TaskStore, isTerminalStatus, toStatusView } from '../../src/task-store/index.js';
import { UUID_V4_PATTERN, createTestLogger, unwrap, unwrapError } from '../helpers/index.js';

const dataset: IntegratedDataset = {
  records: [{ title: 'A' }],
  summary: { totalRecords: 1, duplicatesRemoved: 0, conflictsResolved: 0, conflictsRetained: 0 },
  metadata: {
    fieldNames: ['title'],
    sourcePages: ['https://example.com'],
    pagesProcessed: 1,
    pagesFailed: 0,
    issues: [],
    reconciler: 'rule_based',
  },
};

const error: TaskError = { code: 'DISCOVERY_FAILED', stage: 'page_discovery', message: 'No pages' };

describe('Task Store Module', () => {
  let store: TaskStore;

  beforeEach(() => {
    store = new TaskStore(createTestLogger());
  });

  describe('create()', () => {
    test('creates a pending task with a UUID v4 id', () => {
      const task = store.create('product names', 'https://example.com', 'user-1');

      expect(task.id).toMatch(UUID_V4_PATTERN);
      expect(task).toMatchObject({
        userId: 'user-1',
        requirements: 'product names',
        targetUrl: 'https://example.com',
        status: 'pending',
        progress: 0,
        currentAgent: null,
        message: 'Task created',
      });
      expect(task.createdAt).toBe(task.updatedAt);
      expect(task.result).toBeUndefined();
      expect(task.error).toBeUndefined();
    });

    test('defaults the user to anonymous and issues distinct ids', () => {
      const first = store.create('a', 'https://example.com');
      const second = store.create('b', 'https://example.com');

      expect(first.userId).toBe('anonymous');
      expect(first.id).not.toBe(second.id);
      expect(store.size()).toBe(2);
    });
  });

  describe('get()', () => {
    test('returns null for an unknown id', () => {
      expect(store.get('missing')).toBeNull();
    });

    test('returns copies the caller cannot mutate', () => {
      const created = store.create('a', 'https://example.com');
      created.status = 'failed';

      const fetched = store.get(created.id);
      if (fetched) {
        fetched.message = 'changed';
      }

      expect(store.get(created.id)).toMatchObject({ status: 'pending', message: 'Task created' });
    });
  });

  describe('update()', () => {
    test('walks the full forward path to completion', () => {
      const { id } = store.create('a', 'https://example.com');

      unwrap(store.update(id, { status: 'discovery', currentAgent: 'page_discovery', progress: 10 }));
      unwrap(store.update(id, { status: 'extraction', currentAgent: 'content_extraction', progress: 30 }));
      unwrap(store.update(id, { status: 'integration', currentAgent: 'result_integration', progress: 70 }));
      const completed = unwrap(store.update(id, { status: 'completed', progress: 100, result: dataset }));

      expect(completed.status).toBe('completed');
      expect(completed.progress).toBe(100);
      expect(completed.result).toEqual(dataset);
    });

    test('reports NOT_FOUND for an unknown id', () => {
      expect(unwrapError(store.update('missing', { progress: 5 }))).toEqual({
        code: 'NOT_FOUND',
        message: 'Task not found: missing',
      });
    });

    test('refuses to move a task backwards', () => {
      const { id } = store.create('a', 'https://example.com');
      unwrap(store.update(id, { status: 'extraction' }));

      const refused = unwrapError(store.update(id, { status: 'discovery' }));

      expect(refused.code).toBe('INVALID_TRANSITION');
      expect(refused.message).toBe(`Cannot move task ${id} from extraction back to discovery`);
      expect(store.get(id)?.status).toBe('extraction');
    });

    test('refuses completion outside integration or without a result', () => {
      const { id } = store.create('a', 'https://example.com');

      expect(unwrapError(store.update(id, { status: 'completed', result: dataset })).message).toBe(
        `Cannot complete task ${id} from pending`
      );

      unwrap(store.update(id, { status: 'integration' }));
      expect(unwrapError(store.update(id, { status: 'completed' })).message).toBe(
        'A completed task requires a result'
      );
    });

    test('pairs errors with failure and results with completion', () => {
      const { id } = store.create('a', 'https://example.com');

      expect(unwrapError(store.update(id, { status: 'failed' })).message).toBe('A failed task requires an error');
      expect(unwrapError(store.update(id, { error })).message).toBe('An error may only be set when the task fails');
      expect(unwrapError(store.update(id, { result: dataset })).message).toBe(
        'A result may only be set when the task completes'
      );
    });

    test('allows failure from any non-terminal status', () => {
      const { id } = store.create('a', 'https://example.com');

      const failed = unwrap(store.update(id, { status: 'failed', error, message: 'Failed during page_discovery' }));

      expect(failed.status).toBe('failed');
      expect(failed.error).toEqual(error);
      expect(toStatusView(failed).error).toEqual(error);
    });

    test('treats terminal tasks as immutable', () => {
      const { id } = store.create('a', 'https://example.com');
      unwrap(store.update(id, { status: 'failed', error }));

      const refused = unwrapError(store.update(id, { message: 'again' }));

      expect(refused).toEqual({ code: 'INVALID_TRANSITION', message: `Task ${id} is already failed` });
    });

    test('floors, clamps and never lowers progress', () => {
      const { id } = store.create('a', 'https://example.com');

      expect(unwrap(store.update(id, { progress: 42.9 })).progress).toBe(42);
      expect(unwrap(store.update(id, { progress: 10 })).progress).toBe(42);
      expect(unwrap(store.update(id, { progress: 250 })).progress).toBe(100);
    });

    test('advances updatedAt strictly on every update', () => {
      const { id, updatedAt } = store.create('a', 'https://example.com');

      const first = unwrap(store.update(id, { message: 'one' }));
      const second = unwrap(store.update(id, { message: 'two' }));

      expect(Date.parse(first.updatedAt)).toBeGreaterThan(Date.parse(updatedAt));
      expect(Date.parse(second.updatedAt)).toBeGreaterThan(Date.parse(first.updatedAt));
    });
  });

  describe('delete() and list()', () => {
    test('removes tasks and reports whether one existed', () => {
      const { id } = store.create('a', 'https://example.com');
      store.create('b', 'https://example.com');

      expect(store.delete(id)).toBe(true);
      expect(store.delete(id)).toBe(false);
      expect(store.get(id)).toBeNull();
      expect(store.list().map((task) => task.requirements)).toEqual(['b']);
    });
  });

  describe('helpers', () => {
    test('isTerminalStatus() covers completed and failed only', () => {
      expect(isTerminalStatus('completed')).toBe(true);
      expect(isTerminalStatus('failed')).toBe(true);
      expect(isTerminalStatus('integration')).toBe(false);
    });

    test('toStatusView() flags a result without exposing it', () => {
      const { id } = store.create('a', 'https://example.com');
      unwrap(store.update(id, { status: 'integration' }));
      const task = unwrap(store.update(id, { status: 'completed', result: dataset }));

      const view = toStatusView(task);

      expect(view).toEqual({
        taskId: id,
        status: 'completed',
        progress: 0,
        currentAgent: null,
        message: 'Task created',
        error: null,
        hasResult: true,
        createdAt: task.createdAt,
        updatedAt: task.updatedAt,
      });
    });
  });
});
