export const TASKS_AUTHORITY = 'tasklist';
export const TASKS_PATH = 'tasks';

/** Collection URI: every task. */
export const TASKS_URI = TASKS_PATH;

export const CONTENT_DIR_TYPE = `vnd.tasklist.cursor.dir/${TASKS_AUTHORITY}/${TASKS_PATH}`;
export const CONTENT_ITEM_TYPE = `vnd.tasklist.cursor.item/${TASKS_AUTHORITY}/${TASKS_PATH}`;

const CONTENT_SCHEME = 'content://';
const ID_SEGMENT = /^\d+$/;

export type CollectionMatch = { kind: 'collection' };
export type ItemMatch = { kind: 'item'; id: number };
export type UnknownMatch = { kind: 'unknown' };
export type ResourceMatch = CollectionMatch | ItemMatch | UnknownMatch;

/** Item URI for a single task. */
export function taskUri(id: number): string {
  return `${TASKS_PATH}/${id}`;
}

/** Task id from a single path segment of decimal digits, or undefined. */
export function parseTaskId(segment: string): number | undefined {
  if (!ID_SEGMENT.test(segment)) return undefined;
  const id = Number(segment);
  return Number.isSafeInteger(id) ? id : undefined;
}

/**
 * Path segments of a resource URI. Accepts `tasks/3` and `content://tasklist/tasks/3`;
 * empty segments are dropped. Returns null for a content URI of another authority.
 */
export function pathSegments(uri: string): string[] | null {
  let path = uri;
  if (path.startsWith(CONTENT_SCHEME)) {
    const rest = path.slice(CONTENT_SCHEME.length);
    const slash = rest.indexOf('/');
    const authority = slash === -1 ? rest : rest.slice(0, slash);
    if (authority !== TASKS_AUTHORITY) return null;
    path = slash === -1 ? '' : rest.slice(slash + 1);
  }
  return path.split('/').filter((segment) => segment.length > 0);
}

/**
 * Classify a URI against the two registered patterns, `tasks` and `tasks/#`,
 * where `#` is a single segment of decimal digits.
 */
export function matchUri(uri: string): ResourceMatch {
  const segments = pathSegments(uri);
  if (!segments || segments[0] !== TASKS_PATH) return { kind: 'unknown' };

  if (segments.length === 1) return { kind: 'collection' };

  if (segments.length === 2) {
    const id = parseTaskId(segments[1]);
    if (id !== undefined) return { kind: 'item', id };
  }

  return { kind: 'unknown' };
}
