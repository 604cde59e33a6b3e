/**
 * Task Seeder
 * Loads the seed fixture and populates an empty task store.
 * Due dates and creation times are day offsets from the seeding time, so every
 * episode starts with a mix of overdue, due-soon and far-off work.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { SeedTaskTemplate } from '../shared/types.js';
import { ErrorCodes } from '../shared/error-codes.js';
import { validateSeedTemplates } from '../contracts/validators/task.js';
import { countTasks, insertTaskRecord } from './store.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Throws an Error with a canonical code property for seed loading failures.
 */
function throwSeedError(code: string, message: string): never {
  throw Object.assign(new Error(message), { code });
}

/**
 * Load and validate seed templates.
 * Default path: SEED_DATA_PATH env or cwd/src/tasks/fixtures/seed-tasks.json.
 * @throws Error with code seed_data_not_found if the file is missing
 * @throws Error with code seed_data_invalid on malformed JSON or schema violations
 */
export function loadSeedTemplates(seedPath?: string): SeedTaskTemplate[] {
  const pathToLoad = seedPath ?? process.env.SEED_DATA_PATH ?? path.join(process.cwd(), 'src/tasks/fixtures/seed-tasks.json');
  let content: string;
  try {
    content = fs.readFileSync(pathToLoad, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throwSeedError(ErrorCodes.SEED_DATA_NOT_FOUND, `Seed data file not found: ${pathToLoad}`);
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throwSeedError(ErrorCodes.SEED_DATA_INVALID, 'Seed data file is not valid JSON');
  }

  const validation = validateSeedTemplates(raw);
  if (!validation.valid || validation.parsed === undefined) {
    const first = validation.errors[0];
    const where = first?.field_path ? ` at ${first.field_path}` : '';
    throwSeedError(ErrorCodes.SEED_DATA_INVALID, `Seed data invalid${where}: ${first?.message ?? 'unknown error'}`);
  }
  return validation.parsed;
}

/**
 * Insert the templates when the store is empty.
 *
 * @param templates - Validated seed templates
 * @param now - Reference time for due/creation offsets
 * @returns Number of tasks inserted (0 when the store already holds tasks)
 */
export function seedTasks(templates: readonly SeedTaskTemplate[], now: Date = new Date()): number {
  if (countTasks() > 0) return 0;

  const nowMs = now.getTime();
  for (const template of templates) {
    const createdAt = new Date(nowMs - template.created_days_ago * DAY_MS).toISOString();
    insertTaskRecord({
      title: template.title,
      description: template.description,
      status: template.status,
      priority: template.priority,
      tags: [...template.tags],
      assigned_to: template.assigned_to,
      due_date: template.due_in_days === null ? null : new Date(nowMs + template.due_in_days * DAY_MS).toISOString(),
      created_at: createdAt,
      updated_at: createdAt,
    });
  }
  return templates.length;
}
