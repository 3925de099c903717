import * as chrono from 'chrono-node';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Parse a natural-language due date ("tomorrow", "friday", "jul 4"), resolving forward. */
export function parseDueDate(input: string, now: Date = new Date()): Date | null {
  return chrono.parseDate(input, now, { forwardDate: true });
}

function startOfDay(date: Date): number {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate()).getTime();
}

/** Calendar days from `now` to `date`; negative once it has passed. */
export function daysUntil(date: Date, now: Date = new Date()): number {
  // Rounded: a day across a DST change is 23 or 25 hours long.
  return Math.round((startOfDay(date) - startOfDay(now)) / MS_PER_DAY);
}

export function formatDueDate(date: Date | null | undefined, now: Date = new Date()): string {
  if (!date) return '-';

  const days = daysUntil(date, now);
  if (days < 0) return `${-days}d overdue`;
  if (days === 0) return 'today';
  if (days === 1) return 'tomorrow';
  if (days <= 7) return date.toLocaleDateString('en-US', { weekday: 'short' });
  return date.toLocaleDateString('en-US', { month: 'short', day: 'numeric' });
}
