import { Command } from 'commander';
import { taskUri } from '@tasklist/core';
import { withProvider } from '../utils/context.js';
import { findTask } from '../utils/find-task.js';
import { printSuccess, printError, printInfo } from '../utils/output.js';
import { parsePriority, priorityLabel } from '../utils/priority.js';

export function priorityCommand(): Command {
  return new Command('priority')
    .description('Change the priority of a task')
    .argument('<task>', 'Task ID or description fragment')
    .argument('<priority>', 'New priority (1/high, 2/medium, 3/low)')
    .action((taskQuery: string, level: string) => {
      try {
        const priority = parsePriority(level);
        if (priority === undefined) {
          printError(`Invalid priority: "${level}"`);
          process.exitCode = 1;
          return;
        }

        const updated = withProvider((provider) => {
          const task = findTask(provider, taskQuery);
          if (!task) return undefined;
          return provider.update(taskUri(task.id), { priority }) > 0 ? task : undefined;
        });

        if (!updated) {
          printError(`Task not found: "${taskQuery}"`);
          process.exitCode = 1;
          return;
        }
        printSuccess(`Updated: ${updated.description}`);
        printInfo(`Priority is now ${priorityLabel(priority)}`);
      } catch (error) {
        printError(`Failed to update task: ${error}`);
        process.exitCode = 1;
      }
    });
}
