/**
 * Unit tests for the Task Seeder
 */

import { describe, it, expect, beforeEach, afterEach, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadSeedTemplates, seedTasks } from '../../src/tasks/seed.js';
import { initTaskStore, closeTaskStore, fetchTasks, createTask, countTasks } from '../../src/tasks/store.js';
import type { SeedTaskTemplate } from '../../src/shared/types.js';

const NOW = new Date('2026-03-10T12:00:00.000Z');

const TEMPLATES: SeedTaskTemplate[] = [
  {
    title: 'Overdue item',
    description: 'Past its due date',
    status: 'todo',
    priority: 'high',
    tags: ['bug'],
    assigned_to: 'Ana',
    due_in_days: -2,
    created_days_ago: 5,
  },
  {
    title: 'Open-ended item',
    description: 'No due date',
    status: 'in_progress',
    priority: 'low',
    tags: [],
    assigned_to: null,
    due_in_days: null,
    created_days_ago: 0,
  },
];

describe('loadSeedTemplates', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'seed-test-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads the bundled fixture', () => {
    const templates = loadSeedTemplates(join(process.cwd(), 'src/tasks/fixtures/seed-tasks.json'));
    expect(templates).toHaveLength(15);
    expect(templates[0]?.title).toBe('Fix session timeout on checkout page');
  });

  it('fails with seed_data_not_found for a missing file', () => {
    expect(() => loadSeedTemplates(join(dir, 'missing.json'))).toThrow(
      expect.objectContaining({ code: 'seed_data_not_found' })
    );
  });

  it('fails with seed_data_invalid for malformed JSON', () => {
    const file = join(dir, 'broken.json');
    writeFileSync(file, '[{"title": ');
    expect(() => loadSeedTemplates(file)).toThrow(
      expect.objectContaining({ code: 'seed_data_invalid', message: 'Seed data file is not valid JSON' })
    );
  });

  it('fails with seed_data_invalid when a template breaks the schema', () => {
    const file = join(dir, 'bad-status.json');
    writeFileSync(file, JSON.stringify([{ ...TEMPLATES[0], status: 'done' }]));
    expect(() => loadSeedTemplates(file)).toThrow(
      expect.objectContaining({
        code: 'seed_data_invalid',
        message: "Seed data invalid at 0.status: Field '0.status' must be one of: todo, in_progress, completed, archived",
      })
    );
  });

  it('rejects an empty fixture', () => {
    const file = join(dir, 'empty.json');
    writeFileSync(file, '[]');
    expect(() => loadSeedTemplates(file)).toThrow(expect.objectContaining({ code: 'seed_data_invalid' }));
  });
});

describe('seedTasks', () => {
  beforeEach(() => {
    initTaskStore(':memory:');
  });

  afterEach(() => {
    closeTaskStore();
  });

  it('inserts templates with dates relative to the seeding time', () => {
    expect(seedTasks(TEMPLATES, NOW)).toBe(2);

    const [overdue, openEnded] = fetchTasks();
    expect(overdue).toEqual({
      id: 1,
      title: 'Overdue item',
      description: 'Past its due date',
      status: 'todo',
      priority: 'high',
      tags: ['bug'],
      assigned_to: 'Ana',
      due_date: '2026-03-08T12:00:00.000Z',
      created_at: '2026-03-05T12:00:00.000Z',
      updated_at: '2026-03-05T12:00:00.000Z',
    });
    expect(openEnded?.due_date).toBeNull();
    expect(openEnded?.created_at).toBe('2026-03-10T12:00:00.000Z');
  });

  it('does nothing when the store already holds tasks', () => {
    createTask({ title: 'Existing' });
    expect(seedTasks(TEMPLATES, NOW)).toBe(0);
    expect(countTasks()).toBe(1);
  });
});
