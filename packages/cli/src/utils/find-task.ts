import { TASKS_URI, TaskColumn, parseTaskId, taskUri, type Task, type TaskProvider } from '@tasklist/core';

/**
 * Resolve a task by id, falling back to the first task (lowest id) whose description
 * contains the query.
 */
export function findTask(provider: TaskProvider, idOrQuery: string): Task | undefined {
  // First try exact ID match
  const id = parseTaskId(idOrQuery);
  if (id !== undefined) {
    const task = provider.query(taskUri(id)).first();
    if (task) return task;
  }

  // Then a description fragment
  return provider
    .query(TASKS_URI, {
      selection: `${TaskColumn.DESCRIPTION} LIKE ?`,
      selectionArgs: [`%${idOrQuery}%`],
      sortOrder: `${TaskColumn.ID} ASC`,
    })
    .first();
}
