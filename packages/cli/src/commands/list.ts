import { Command } from 'commander';
import {
  PRIORITY_LABELS,
  TASKS_URI,
  TaskColumn,
  parseTaskId,
  taskUri,
  type SelectionOptions,
} from '@tasklist/core';
import { withProvider } from '../utils/context.js';
import { printTaskList, printTask, printError } from '../utils/output.js';
import { parsePriority } from '../utils/priority.js';

const SORT_ORDERS = new Map<string, string>([
  ['priority', `${TaskColumn.PRIORITY} ASC, ${TaskColumn.ID} ASC`],
  ['due', `${TaskColumn.DUE_DATE} IS NULL, ${TaskColumn.DUE_DATE} ASC, ${TaskColumn.ID} ASC`],
  ['id', `${TaskColumn.ID} ASC`],
]);

interface ListOptions {
  priority?: string;
  sort: string;
}

export function listCommand(): Command {
  return new Command('list')
    .alias('ls')
    .description('List tasks')
    .option('-P, --priority <priority>', 'Only tasks of this priority')
    .option('-s, --sort <order>', 'Sort by: priority, due, id', 'priority')
    .action((options: ListOptions) => {
      try {
        const sortOrder = SORT_ORDERS.get(options.sort);
        if (!sortOrder) {
          printError(`Unknown sort order: "${options.sort}" (use priority, due or id)`);
          process.exitCode = 1;
          return;
        }

        let title = 'All Tasks';
        let selection: SelectionOptions = {};
        if (options.priority !== undefined) {
          const priority = parsePriority(options.priority);
          if (priority === undefined) {
            printError(`Invalid priority: "${options.priority}"`);
            process.exitCode = 1;
            return;
          }
          title = `Priority: ${PRIORITY_LABELS[priority]}`;
          selection = { selection: `${TaskColumn.PRIORITY} = ?`, selectionArgs: [priority] };
        }

        const tasks = withProvider((provider) =>
          provider.query(TASKS_URI, { ...selection, sortOrder }).rows()
        );
        printTaskList(tasks, title);
      } catch (error) {
        printError(`Failed to list tasks: ${error}`);
        process.exitCode = 1;
      }
    });
}

export function showCommand(): Command {
  return new Command('show')
    .description('Show a single task')
    .argument('<id>', 'Task ID')
    .action((id: string) => {
      try {
        const taskId = parseTaskId(id);
        if (taskId === undefined) {
          printError(`Not a task ID: "${id}"`);
          process.exitCode = 1;
          return;
        }

        const task = withProvider((provider) => provider.query(taskUri(taskId)).first());
        if (!task) {
          printError(`Task not found: ${id}`);
          process.exitCode = 1;
          return;
        }
        printTask(task);
      } catch (error) {
        printError(`Failed to show task: ${error}`);
        process.exitCode = 1;
      }
    });
}
