import { Router } from 'express';
import {
  Priority,
  TASKS_URI,
  TaskColumn,
  isTaskField,
  parseTaskId,
  taskUri,
  type SelectionOptions,
  type TaskCursor,
  type TaskField,
  type TaskProvider,
} from '@tasklist/core';
import { z } from 'zod';
import * as chrono from 'chrono-node';
import { sendError } from './errors.js';

// Validation schemas
const priority = z.nativeEnum(Priority);

const dueDate = z
  .string()
  .min(1)
  .transform((value, ctx) => {
    const parsed = chrono.parseDate(value);
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Could not parse date: "${value}"` });
      return z.NEVER;
    }
    return parsed;
  });

const createTaskSchema = z
  .object({
    description: z.string().trim().min(1),
    priority: priority.default(Priority.MEDIUM),
    dueDate: dueDate.optional(),
  })
  .strict();

const updateTaskSchema = z
  .object({
    description: z.string().trim().min(1).optional(),
    priority: priority.optional(),
    dueDate: dueDate.nullable().optional(),
  })
  .strict();

const priorityParam = z.coerce.number().pipe(priority).optional();

const fieldsParam = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined) return undefined;
    const fields: TaskField[] = [];
    for (const name of value.split(',').map((part) => part.trim()).filter(Boolean)) {
      if (isTaskField(name)) {
        fields.push(name);
      } else {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown field: ${name}` });
      }
    }
    return fields;
  });

const idParamSchema = z.object({
  id: z.string().transform((value, ctx) => {
    const id = parseTaskId(value);
    if (id === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a task id: "${value}"` });
      return z.NEVER;
    }
    return id;
  }),
});

const listQuerySchema = z.object({
  priority: priorityParam,
  sort: z.enum(['id', 'priority', 'due']).default('id'),
  fields: fieldsParam,
});

const deleteQuerySchema = z.object({
  priority: priorityParam,
  all: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
});

const SORT_ORDERS = {
  id: `${TaskColumn.ID} ASC`,
  priority: `${TaskColumn.PRIORITY} ASC, ${TaskColumn.ID} ASC`,
  due: `${TaskColumn.DUE_DATE} IS NULL, ${TaskColumn.DUE_DATE} ASC, ${TaskColumn.ID} ASC`,
} as const;

function prioritySelection(value: Priority | undefined): SelectionOptions {
  if (value === undefined) return {};
  return { selection: `${TaskColumn.PRIORITY} = ?`, selectionArgs: [value] };
}

function readRows<Row>(cursor: TaskCursor<Row>): Row[] {
  try {
    return cursor.rows();
  } finally {
    cursor.close();
  }
}

export function taskRoutes(provider: TaskProvider): Router {
  const router = Router();

  // GET /api/tasks - List tasks
  router.get('/', (req, res) => {
    try {
      const { priority, sort, fields } = listQuerySchema.parse(req.query);
      const options = { ...prioritySelection(priority), sortOrder: SORT_ORDERS[sort] };

      const rows = fields
        ? readRows(provider.query(TASKS_URI, { ...options, projection: fields }))
        : readRows(provider.query(TASKS_URI, options));
      res.json(rows);
    } catch (error) {
      sendError(res, error, 'Failed to list tasks');
    }
  });

  // GET /api/tasks/:id - Get single task
  router.get('/:id', (req, res) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const [task] = readRows(provider.query(taskUri(id)));
      if (!task) {
        return res.status(404).json({ error: 'Task not found' });
      }
      res.json(task);
    } catch (error) {
      sendError(res, error, 'Failed to get task');
    }
  });

  // POST /api/tasks - Create task
  router.post('/', (req, res) => {
    try {
      const values = createTaskSchema.parse(req.body);
      const uri = provider.insert(TASKS_URI, values);
      const [task] = readRows(provider.query(uri));
      res.status(201).location(`/api/${uri}`).json(task);
    } catch (error) {
      sendError(res, error, 'Failed to create task');
    }
  });

  // PATCH /api/tasks/:id - Update task
  router.patch('/:id', (req, res) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const values = updateTaskSchema.parse(req.body);
      const uri = taskUri(id);

      if (provider.update(uri, values) === 0) {
        return res.status(404).json({ error: 'Task not found' });
      }

      const [task] = readRows(provider.query(uri));
      res.json(task);
    } catch (error) {
      sendError(res, error, 'Failed to update task');
    }
  });

  // DELETE /api/tasks/:id - Delete task
  router.delete('/:id', (req, res) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      if (provider.delete(taskUri(id)) === 0) {
        return res.status(404).json({ error: 'Task not found' });
      }
      res.status(204).send();
    } catch (error) {
      sendError(res, error, 'Failed to delete task');
    }
  });

  // DELETE /api/tasks?priority=3 or ?all=true - Bulk delete
  router.delete('/', (req, res) => {
    try {
      const { priority, all } = deleteQuerySchema.parse(req.query);
      if (priority === undefined && !all) {
        return res.status(400).json({ error: 'Pass priority or all=true to delete tasks in bulk' });
      }
      const deleted = provider.delete(TASKS_URI, prioritySelection(priority));
      res.json({ deleted });
    } catch (error) {
      sendError(res, error, 'Failed to delete tasks');
    }
  });

  return router;
}
