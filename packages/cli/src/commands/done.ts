import { Command } from 'commander';
import { taskUri } from '@tasklist/core';
import { withProvider } from '../utils/context.js';
import { findTask } from '../utils/find-task.js';
import { printSuccess, printError } from '../utils/output.js';

export function doneCommand(): Command {
  return new Command('done')
    .description('Complete a task (removes it from the list)')
    .argument('<task>', 'Task ID or description fragment')
    .action((taskQuery: string) => {
      try {
        const completed = withProvider((provider) => {
          const task = findTask(provider, taskQuery);
          if (!task) return undefined;
          return provider.delete(taskUri(task.id)) > 0 ? task : undefined;
        });

        if (!completed) {
          printError(`Task not found: "${taskQuery}"`);
          process.exitCode = 1;
          return;
        }
        printSuccess(`Completed: ${completed.description}`);
      } catch (error) {
        printError(`Failed to complete task: ${error}`);
        process.exitCode = 1;
      }
    });
}
