/**
 * Unit tests for the Task Store
 * SQLite in-memory; each test gets a fresh database.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  initTaskStore,
  closeTaskStore,
  createTask,
  getTask,
  fetchTasks,
  updateTask,
  deleteTask,
  countTasks,
  resetTasks,
} from '../../src/tasks/store.js';

const CREATED = new Date('2026-03-01T09:00:00.000Z');
const UPDATED = new Date('2026-03-02T09:00:00.000Z');

describe('Task Store', () => {
  beforeEach(() => {
    initTaskStore(':memory:');
  });

  afterEach(() => {
    closeTaskStore();
  });

  it('throws when used before initialization', () => {
    closeTaskStore();
    expect(() => fetchTasks()).toThrow('Task store not initialized. Call initTaskStore first.');
    initTaskStore(':memory:');
  });

  describe('createTask', () => {
    it('applies defaults and assigns sequential ids', () => {
      const first = createTask({ title: 'First' }, CREATED);
      const second = createTask({ title: 'Second' }, CREATED);

      expect(first).toEqual({
        id: 1,
        title: 'First',
        description: null,
        status: 'todo',
        priority: 'medium',
        tags: [],
        assigned_to: null,
        due_date: null,
        created_at: '2026-03-01T09:00:00.000Z',
        updated_at: '2026-03-01T09:00:00.000Z',
      });
      expect(second.id).toBe(2);
    });

    it('round-trips every field including tag order', () => {
      const created = createTask(
        {
          title: 'Ship release notes',
          description: 'Draft and publish',
          status: 'in_progress',
          priority: 'high',
          tags: ['docs', 'release', 'Docs'],
          assigned_to: 'Ana',
          due_date: '2026-03-05T17:00:00Z',
        },
        CREATED
      );
      expect(getTask(created.id)).toEqual(created);
      expect(getTask(created.id)?.tags).toEqual(['docs', 'release', 'Docs']);
    });
  });

  describe('fetchTasks', () => {
    beforeEach(() => {
      createTask({ title: 'A', status: 'todo', priority: 'high' }, CREATED);
      createTask({ title: 'B', status: 'completed', priority: 'high' }, CREATED);
      createTask({ title: 'C', status: 'todo', priority: 'low' }, CREATED);
    });

    it('returns all tasks ordered by id', () => {
      expect(fetchTasks().map((t) => t.title)).toEqual(['A', 'B', 'C']);
    });

    it('filters by status, priority, or both', () => {
      expect(fetchTasks({ status: 'todo' }).map((t) => t.title)).toEqual(['A', 'C']);
      expect(fetchTasks({ priority: 'high' }).map((t) => t.title)).toEqual(['A', 'B']);
      expect(fetchTasks({ status: 'todo', priority: 'high' }).map((t) => t.title)).toEqual(['A']);
    });

    it('returns snapshots unaffected by later writes', () => {
      const snapshot = fetchTasks();
      updateTask(1, { status: 'completed' }, UPDATED);
      expect(snapshot[0]?.status).toBe('todo');
      expect(fetchTasks()[0]?.status).toBe('completed');
    });
  });

  describe('updateTask', () => {
    it('keeps absent fields, clears explicit nulls and bumps updated_at', () => {
      const created = createTask({ title: 'Task', description: 'details', assigned_to: 'Ana' }, CREATED);
      const updated = updateTask(created.id, { priority: 'urgent', assigned_to: null }, UPDATED);

      expect(updated).toEqual({
        ...created,
        priority: 'urgent',
        assigned_to: null,
        updated_at: '2026-03-02T09:00:00.000Z',
      });
      expect(getTask(created.id)).toEqual(updated);
    });

    it('returns null for a missing id', () => {
      expect(updateTask(99, { title: 'x' }, UPDATED)).toBeNull();
    });
  });

  describe('deleteTask', () => {
    it('removes the row and reports whether one existed', () => {
      const created = createTask({ title: 'Gone soon' }, CREATED);
      expect(deleteTask(created.id)).toBe(true);
      expect(getTask(created.id)).toBeNull();
      expect(deleteTask(created.id)).toBe(false);
    });
  });

  describe('resetTasks', () => {
    it('empties the store', () => {
      createTask({ title: 'A' }, CREATED);
      createTask({ title: 'B' }, CREATED);
      expect(countTasks()).toBe(2);
      resetTasks();
      expect(countTasks()).toBe(0);
      expect(fetchTasks()).toEqual([]);
    });

    it('restarts ids at 1', () => {
      createTask({ title: 'A' }, CREATED);
      createTask({ title: 'B' }, CREATED);
      resetTasks();
      expect(createTask({ title: 'C' }, CREATED).id).toBe(1);
    });
  });
});
