import { sql, type SQL } from 'drizzle-orm';
import { StoreError } from '../errors.js';
import type { Task, TaskField, TaskRow } from '../schema/index.js';

export type SelectionArg = string | number | null;

const QUOTES = new Set(["'", '"', '`']);

// `?` inside a quoted literal or identifier is text, not a parameter. A doubled quote
// closes and reopens the literal, which leaves the state unchanged.
function splitOnPlaceholders(clause: string): string[] {
  const parts: string[] = [];
  let quote: string | null = null;
  let start = 0;

  for (let i = 0; i < clause.length; i++) {
    const char = clause[i];
    if (quote) {
      if (char === quote) quote = null;
    } else if (QUOTES.has(char)) {
      quote = char;
    } else if (char === '?') {
      parts.push(clause.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(clause.slice(start));
  return parts;
}

/**
 * Turn a selection clause with positional `?` placeholders into a drizzle SQL fragment,
 * binding each argument as a parameter. An empty selection selects every row.
 */
export function selectionToSql(
  selection: string | null | undefined,
  selectionArgs: readonly SelectionArg[] = []
): SQL | undefined {
  const clause = selection?.trim() ?? '';
  const parts = clause === '' ? [] : splitOnPlaceholders(clause);
  const placeholders = Math.max(parts.length - 1, 0);

  if (placeholders !== selectionArgs.length) {
    throw new StoreError(
      `Selection has ${placeholders} placeholder(s) but ${selectionArgs.length} argument(s) were supplied`,
      'statement'
    );
  }
  if (clause === '') return undefined;

  const chunks: SQL[] = [];
  parts.forEach((part, index) => {
    chunks.push(sql.raw(part));
    if (index < selectionArgs.length) {
      chunks.push(sql`${selectionArgs[index]}`);
    }
  });
  return sql.join(chunks);
}

function copyField<K extends TaskField>(target: TaskRow, source: Task, field: K): void {
  target[field] = source[field];
}

export function project(row: Task, projection: readonly TaskField[]): TaskRow {
  const projected: TaskRow = {};
  for (const field of projection) copyField(projected, row, field);
  return projected;
}
