import { Command } from 'commander';
import { Priority, TASKS_URI } from '@tasklist/core';
import { withProvider } from '../utils/context.js';
import { parseDueDate } from '../utils/due-dates.js';
import { printSuccess, printError, printTask } from '../utils/output.js';
import { parsePriority } from '../utils/priority.js';

interface AddOptions {
  priority: string;
  due?: string;
}

export function addCommand(): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<description>', 'What needs doing')
    .option('-P, --priority <priority>', 'Priority (1/high, 2/medium, 3/low)', String(Priority.MEDIUM))
    .option('-d, --due <date>', 'Due date (natural language: tomorrow, next monday, etc.)')
    .action((description: string, options: AddOptions) => {
      try {
        const priority = parsePriority(options.priority);
        if (priority === undefined) {
          printError(`Invalid priority: "${options.priority}" (use 1, 2, 3 or high, medium, low)`);
          process.exitCode = 1;
          return;
        }

        let dueDate: Date | undefined;
        if (options.due) {
          const parsed = parseDueDate(options.due);
          if (!parsed) {
            printError(`Could not parse date: "${options.due}"`);
            process.exitCode = 1;
            return;
          }
          dueDate = parsed;
        }

        const task = withProvider((provider) => {
          const uri = provider.insert(TASKS_URI, { description, priority, dueDate });
          return provider.query(uri).first();
        });

        if (task) {
          printSuccess(`Added task: ${task.description}`);
          printTask(task);
        }
      } catch (error) {
        printError(`Failed to add task: ${error}`);
        process.exitCode = 1;
      }
    });
}
