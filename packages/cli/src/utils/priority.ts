import { PRIORITY_LABELS, Priority, isPriority } from '@tasklist/core';

const BY_LABEL = new Map<string, Priority>([
  ['high', Priority.HIGH],
  ['medium', Priority.MEDIUM],
  ['low', Priority.LOW],
]);

/** Accepts 1-3 or a label (high, medium, low). */
export function parsePriority(input: string): Priority | undefined {
  const value = input.trim().toLowerCase();
  const byLabel = BY_LABEL.get(value);
  if (byLabel !== undefined) return byLabel;
  const numeric = Number(value);
  return isPriority(numeric) ? numeric : undefined;
}

export function priorityLabel(priority: number): string {
  return isPriority(priority) ? PRIORITY_LABELS[priority] : String(priority);
}
