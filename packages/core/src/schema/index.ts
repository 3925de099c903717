import { sql } from 'drizzle-orm';
import { sqliteTable, text, integer, check } from 'drizzle-orm/sqlite-core';

// ============ ENUMS (as const for TypeScript) ============

export const Priority = {
  HIGH: 1,
  MEDIUM: 2,
  LOW: 3,
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const PRIORITY_LABELS: Record<Priority, string> = {
  [Priority.HIGH]: 'high',
  [Priority.MEDIUM]: 'medium',
  [Priority.LOW]: 'low',
};

export function isPriority(value: unknown): value is Priority {
  return value === Priority.HIGH || value === Priority.MEDIUM || value === Priority.LOW;
}

// Column names as stored, for selection and sort-order clauses.
export const TaskColumn = {
  ID: '_id',
  DESCRIPTION: 'description',
  PRIORITY: 'priority',
  DUE_DATE: 'due_date',
} as const;

export type TaskColumn = (typeof TaskColumn)[keyof typeof TaskColumn];

// ============ TABLES ============

export const tasks = sqliteTable(
  'tasks',
  {
    id: integer(TaskColumn.ID).primaryKey({ autoIncrement: true }),
    description: text(TaskColumn.DESCRIPTION).notNull(),
    priority: integer(TaskColumn.PRIORITY).notNull(),
    dueDate: integer(TaskColumn.DUE_DATE, { mode: 'timestamp' }),
  },
  (table) => [
    check('tasks_description_check', sql`${table.description} <> ''`),
    check('tasks_priority_check', sql`${table.priority} IN (1, 2, 3)`),
  ]
);

/**
 * DDL for create-if-absent on first connection. Mirrors the `tasks` table above;
 * there is no migration history beyond this statement.
 */
export const CREATE_TASKS_TABLE = `
  CREATE TABLE IF NOT EXISTS tasks (
    ${TaskColumn.ID} INTEGER PRIMARY KEY AUTOINCREMENT,
    ${TaskColumn.DESCRIPTION} TEXT NOT NULL CHECK (${TaskColumn.DESCRIPTION} <> ''),
    ${TaskColumn.PRIORITY} INTEGER NOT NULL CHECK (${TaskColumn.PRIORITY} IN (1, 2, 3)),
    ${TaskColumn.DUE_DATE} INTEGER
  )
`;

// ============ TYPE INFERENCE ============

export type Task = typeof tasks.$inferSelect;
export type NewTask = typeof tasks.$inferInsert;

/** Field values accepted by an insert. The id is always assigned by the store. */
export type TaskValues = Omit<NewTask, 'id'>;

/** Field values accepted by an update; absent fields are left untouched. */
export type TaskUpdate = Partial<TaskValues>;

export type TaskField = keyof Task;

/** A row read through a projection: only the requested fields are present. */
export type TaskRow = Partial<Task>;

export const TASK_FIELDS: readonly TaskField[] = ['id', 'description', 'priority', 'dueDate'];

export function isTaskField(name: string): name is TaskField {
  return TASK_FIELDS.some((field) => field === name);
}
