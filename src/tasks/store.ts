/**
 * Task Store
 * SQLite-backed storage for task records
 *
 * Core guarantees:
 * - Snapshots: fetchTasks returns fresh objects ordered by id; callers never see later writes
 * - Tags stored as a JSON array string and round-tripped in order
 * - Timestamps stored as RFC3339 strings
 */

import Database from 'better-sqlite3';
import type { TaskCreateInput, TaskFilter, TaskRecord, TaskUpdateInput } from '../shared/types.js';
import { TASK_PRIORITIES, TASK_STATUSES } from '../shared/types.js';

let db: Database.Database | null = null;

function requireDb(): Database.Database {
  if (!db) {
    throw new Error('Task store not initialized. Call initTaskStore first.');
  }
  return db;
}

/**
 * Initialize the task store with SQLite.
 * Creates the tasks table and indexes if they don't exist.
 *
 * @param dbPath - Path to SQLite database file, or ':memory:' for in-memory
 */
export function initTaskStore(dbPath: string): void {
  db = new Database(dbPath);

  db.exec(`
    CREATE TABLE IF NOT EXISTS tasks (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      title TEXT NOT NULL,
      description TEXT,
      status TEXT NOT NULL,
      priority TEXT NOT NULL,
      tags TEXT NOT NULL DEFAULT '[]',
      assigned_to TEXT,
      due_date TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_tasks_status_priority
    ON tasks(status, priority)
  `);

  db.pragma('journal_mode = WAL');
}

/**
 * Close the database connection.
 * Call this during graceful shutdown.
 */
export function closeTaskStore(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Read a snapshot of tasks, optionally filtered by status and/or priority.
 *
 * @param filter - Optional status/priority equality filter
 * @returns Tasks ordered by id ascending
 */
export function fetchTasks(filter: TaskFilter = {}): TaskRecord[] {
  const database = requireDb();

  const clauses: string[] = [];
  const params: string[] = [];
  if (filter.status !== undefined) {
    clauses.push('status = ?');
    params.push(filter.status);
  }
  if (filter.priority !== undefined) {
    clauses.push('priority = ?');
    params.push(filter.priority);
  }
  const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';

  const rows = database
    .prepare(`SELECT ${TASK_COLUMNS} FROM tasks ${where} ORDER BY id ASC`)
    .all(...params) as TaskRow[];
  return rows.map(rowToTaskRecord);
}

/**
 * Get one task by id.
 *
 * @returns The TaskRecord or null if not found
 */
export function getTask(id: number): TaskRecord | null {
  const database = requireDb();
  const row = database.prepare(`SELECT ${TASK_COLUMNS} FROM tasks WHERE id = ?`).get(id) as TaskRow | undefined;
  return row ? rowToTaskRecord(row) : null;
}

/**
 * Insert a task. Defaults: status todo, priority medium, no tags.
 *
 * @param input - Validated create body
 * @param now - Timestamp used for created_at and updated_at
 * @returns The stored TaskRecord with its assigned id
 */
export function createTask(input: TaskCreateInput, now: Date = new Date()): TaskRecord {
  const timestamp = now.toISOString();
  return insertTaskRecord({
    title: input.title,
    description: input.description ?? null,
    status: input.status ?? 'todo',
    priority: input.priority ?? 'medium',
    tags: input.tags ?? [],
    assigned_to: input.assigned_to ?? null,
    due_date: input.due_date ?? null,
    created_at: timestamp,
    updated_at: timestamp,
  });
}

/**
 * Insert a fully-formed record with explicit timestamps (used by seeding).
 */
export function insertTaskRecord(record: Omit<TaskRecord, 'id'>): TaskRecord {
  const database = requireDb();
  const result = database
    .prepare(`
      INSERT INTO tasks (title, description, status, priority, tags, assigned_to, due_date, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `)
    .run(
      record.title,
      record.description,
      record.status,
      record.priority,
      JSON.stringify(record.tags),
      record.assigned_to,
      record.due_date,
      record.created_at,
      record.updated_at
    );
  return { id: Number(result.lastInsertRowid), ...record, tags: [...record.tags] };
}

/**
 * Apply a partial update. Absent fields are kept; explicit null clears a
 * nullable field. updated_at is always bumped.
 *
 * @returns The updated TaskRecord or null if the id does not exist
 */
export function updateTask(id: number, patch: TaskUpdateInput, now: Date = new Date()): TaskRecord | null {
  const current = getTask(id);
  if (current === null) return null;

  const next: TaskRecord = {
    ...current,
    title: patch.title ?? current.title,
    description: patch.description !== undefined ? patch.description : current.description,
    status: patch.status ?? current.status,
    priority: patch.priority ?? current.priority,
    tags: patch.tags !== undefined ? [...patch.tags] : current.tags,
    assigned_to: patch.assigned_to !== undefined ? patch.assigned_to : current.assigned_to,
    due_date: patch.due_date !== undefined ? patch.due_date : current.due_date,
    updated_at: now.toISOString(),
  };

  requireDb()
    .prepare(`
      UPDATE tasks
      SET title = ?, description = ?, status = ?, priority = ?, tags = ?,
          assigned_to = ?, due_date = ?, updated_at = ?
      WHERE id = ?
    `)
    .run(
      next.title,
      next.description,
      next.status,
      next.priority,
      JSON.stringify(next.tags),
      next.assigned_to,
      next.due_date,
      next.updated_at,
      id
    );

  return next;
}

/**
 * Delete a task.
 *
 * @returns true if a row was removed
 */
export function deleteTask(id: number): boolean {
  const result = requireDb().prepare('DELETE FROM tasks WHERE id = ?').run(id);
  return result.changes > 0;
}

export function countTasks(): number {
  const row = requireDb().prepare('SELECT COUNT(*) AS count FROM tasks').get() as { count: number };
  return row.count;
}

/**
 * Remove every task (episode reset). Ids restart at 1.
 */
export function resetTasks(): void {
  const database = requireDb();
  database.transaction(() => {
    database.exec('DELETE FROM tasks');
    database.exec("DELETE FROM sqlite_sequence WHERE name = 'tasks'");
  })();
}

// =============================================================================
// Internal helpers
// =============================================================================

const TASK_COLUMNS =
  'id, title, description, status, priority, tags, assigned_to, due_date, created_at, updated_at';

interface TaskRow {
  id: number;
  title: string;
  description: string | null;
  status: string;
  priority: string;
  tags: string;
  assigned_to: string | null;
  due_date: string | null;
  created_at: string;
  updated_at: string;
}

function parseTags(raw: string): string[] {
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((tag): tag is string => typeof tag === 'string') : [];
}

function rowToTaskRecord(row: TaskRow): TaskRecord {
  const status = TASK_STATUSES.find((s) => s === row.status);
  const priority = TASK_PRIORITIES.find((p) => p === row.priority);
  if (status === undefined || priority === undefined) {
    throw new Error(`Task ${row.id} has invalid status/priority: ${row.status}/${row.priority}`);
  }
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    status,
    priority,
    tags: parseTags(row.tags),
    assigned_to: row.assigned_to,
    due_date: row.due_date,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}
