import Database from 'better-sqlite3';

export type ResourceOperation = 'insert' | 'query' | 'update' | 'delete' | 'getType';

/**
 * Thrown when a URI does not resolve to a resource the requested operation accepts:
 * an unknown shape, an insert against an item, or an update against the collection.
 */
export class UnsupportedResourceError extends Error {
  readonly code = 'UNSUPPORTED_RESOURCE';

  constructor(
    public readonly uri: string,
    public readonly operation: ResourceOperation
  ) {
    super(`Unknown uri for ${operation}: ${uri}`);
    this.name = 'UnsupportedResourceError';
  }
}

/**
 * - constraint: the store rejected the values (NOT NULL, CHECK, UNIQUE, ...)
 * - statement: the request could not be turned into a valid statement
 * - infrastructure: the storage medium failed (I/O, permissions, corruption, closed handle)
 */
export type StoreErrorKind = 'constraint' | 'statement' | 'infrastructure';

export class StoreError extends Error {
  readonly code = 'STORE_ERROR';

  constructor(
    message: string,
    public readonly kind: StoreErrorKind,
    public readonly sqliteCode?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StoreError';
  }
}

const STATEMENT_CODES = new Set(['SQLITE_ERROR', 'SQLITE_RANGE', 'SQLITE_MISMATCH']);

export function classifySqliteCode(code: string): StoreErrorKind {
  if (code.startsWith('SQLITE_CONSTRAINT')) return 'constraint';
  if (STATEMENT_CODES.has(code)) return 'statement';
  return 'infrastructure';
}

type SqliteError = InstanceType<typeof Database.SqliteError>;

// drizzle may wrap driver errors, so look through the cause chain.
function findSqliteError(error: unknown): SqliteError | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 8 && current instanceof Error; depth++) {
    if (current instanceof Database.SqliteError) return current;
    current = current.cause;
  }
  return undefined;
}

export function toStoreError(error: unknown, fallback: StoreErrorKind = 'infrastructure'): StoreError {
  if (error instanceof StoreError) return error;

  const sqliteError = findSqliteError(error);
  if (sqliteError) {
    return new StoreError(sqliteError.message, classifySqliteCode(sqliteError.code), sqliteError.code, {
      cause: error,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new StoreError(message, fallback, undefined, { cause: error });
}
