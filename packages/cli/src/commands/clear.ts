import { Command } from 'commander';
import { TASKS_URI, TaskColumn, type SelectionOptions } from '@tasklist/core';
import { withProvider } from '../utils/context.js';
import { printSuccess, printError, printWarning } from '../utils/output.js';
import { parsePriority } from '../utils/priority.js';

interface ClearOptions {
  priority?: string;
  yes?: boolean;
}

export function clearCommand(): Command {
  return new Command('clear')
    .description('Delete tasks in bulk')
    .option('-P, --priority <priority>', 'Only tasks of this priority')
    .option('-y, --yes', 'Confirm the deletion')
    .action((options: ClearOptions) => {
      try {
        if (!options.yes) {
          printWarning('Nothing deleted. Pass --yes to confirm.');
          return;
        }

        let selection: SelectionOptions = {};
        if (options.priority !== undefined) {
          const priority = parsePriority(options.priority);
          if (priority === undefined) {
            printError(`Invalid priority: "${options.priority}"`);
            process.exitCode = 1;
            return;
          }
          selection = { selection: `${TaskColumn.PRIORITY} = ?`, selectionArgs: [priority] };
        }

        const deleted = withProvider((provider) => provider.delete(TASKS_URI, selection));
        printSuccess(`Deleted ${deleted} task${deleted === 1 ? '' : 's'}`);
      } catch (error) {
        printError(`Failed to delete tasks: ${error}`);
        process.exitCode = 1;
      }
    });
}
