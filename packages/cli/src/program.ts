import { Command } from 'commander';
import { addCommand } from './commands/add.js';
import { listCommand, showCommand } from './commands/list.js';
import { doneCommand } from './commands/done.js';
import { priorityCommand } from './commands/priority.js';
import { clearCommand } from './commands/clear.js';
import { typeCommand } from './commands/type.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('tasks')
    .description('Single-user task list backed by SQLite')
    .version('0.1.0');

  program.addCommand(addCommand());
  program.addCommand(listCommand());
  program.addCommand(showCommand());
  program.addCommand(doneCommand());
  program.addCommand(priorityCommand());
  program.addCommand(clearCommand());
  program.addCommand(typeCommand());

  return program;
}
