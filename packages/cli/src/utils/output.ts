import chalk from 'chalk';
import Table from 'cli-table3';
import { Priority, type Task } from '@tasklist/core';
import { daysUntil, formatDueDate } from './due-dates.js';
import { priorityLabel } from './priority.js';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.log(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

function getPriorityColor(priority: number): (text: string) => string {
  switch (priority) {
    case Priority.HIGH:
      return chalk.red;
    case Priority.MEDIUM:
      return chalk.yellow;
    case Priority.LOW:
      return chalk.blue;
    default:
      return (t: string) => t;
  }
}

function getDueDateColor(dueDate: Date | null): (text: string) => string {
  if (!dueDate) return (t: string) => t;

  const days = daysUntil(dueDate);
  if (days < 0) return chalk.red; // Overdue
  if (days === 0) return chalk.yellow;
  return (t: string) => t;
}

export function printTaskList(tasks: Task[], title?: string): void {
  if (title) {
    console.log(chalk.bold(`\n${title}`));
    console.log(chalk.gray('─'.repeat(50)));
  }

  if (tasks.length === 0) {
    console.log(chalk.gray('  No tasks found'));
    return;
  }

  const table = new Table({
    head: ['ID', 'Task', 'Due', 'Pri'],
    colWidths: [6, 40, 12, 8],
    style: { head: ['cyan'] },
    chars: {
      top: '', 'top-mid': '', 'top-left': '', 'top-right': '',
      bottom: '', 'bottom-mid': '', 'bottom-left': '', 'bottom-right': '',
      left: '', 'left-mid': '', mid: '', 'mid-mid': '',
      right: '', 'right-mid': '', middle: ' ',
    },
  });

  for (const task of tasks) {
    const priorityColor = getPriorityColor(task.priority);
    const dueDateColor = getDueDateColor(task.dueDate);

    table.push([
      chalk.gray(String(task.id)),
      task.description.length > 38 ? task.description.slice(0, 35) + '...' : task.description,
      dueDateColor(formatDueDate(task.dueDate)),
      priorityColor(priorityLabel(task.priority)),
    ]);
  }

  console.log(table.toString());
  console.log(chalk.gray(`\n  ${tasks.length} task${tasks.length === 1 ? '' : 's'}`));
}

export function printTask(task: Task): void {
  console.log();
  console.log(chalk.bold(task.description));
  console.log(chalk.gray('─'.repeat(50)));
  console.log(`  ID:       ${chalk.gray(String(task.id))}`);
  console.log(`  Priority: ${getPriorityColor(task.priority)(priorityLabel(task.priority))}`);
  if (task.dueDate) {
    const color = getDueDateColor(task.dueDate);
    console.log(`  Due:      ${color(formatDueDate(task.dueDate))}`);
  }
  console.log();
}
