import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from '../schema/index.js';
import { CREATE_TASKS_TABLE } from '../schema/index.js';
import { StoreError, toStoreError } from '../errors.js';
import { homedir } from 'os';
import { dirname, join } from 'path';
import { mkdirSync, existsSync } from 'fs';

const TASKLIST_DIR = join(homedir(), '.tasklist');
const DB_FILE = 'tasks.db';
const IN_MEMORY = ':memory:';

export function getDbPath(): string {
  return join(TASKLIST_DIR, DB_FILE);
}

export function ensureDbDir(path: string = getDbPath()): void {
  if (path === IN_MEMORY) return;
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

export type Db = BetterSQLite3Database<typeof schema>;

export type ConnectionMode = 'read' | 'write';

interface Connection {
  sqlite: Database.Database;
  db: Db;
}

/**
 * Owns the SQLite connection behind the task provider.
 *
 * The file is opened and the `tasks` table created on the first `getConnection` call,
 * then the same handle is handed out until `close`. better-sqlite3 runs every statement
 * synchronously and the connection uses `synchronous = FULL`, so a write has reached
 * disk by the time the call that issued it returns.
 */
export class TaskDatabase {
  private connection: Connection | null = null;

  constructor(readonly path: string = getDbPath()) {}

  get isOpen(): boolean {
    return this.connection !== null;
  }

  /**
   * Read and write callers share one handle: SQLite in WAL mode lets readers proceed
   * while a writer holds the lock, and serializes writers on its own.
   */
  getConnection(mode: ConnectionMode = 'read'): Db {
    if (!this.connection) {
      this.connection = this.open(mode);
    }
    return this.connection.db;
  }

  close(): void {
    if (!this.connection) return;
    const { sqlite } = this.connection;
    this.connection = null;
    try {
      sqlite.close();
    } catch (error) {
      throw toStoreError(error);
    }
  }

  private open(mode: ConnectionMode): Connection {
    let sqlite: Database.Database | undefined;
    try {
      ensureDbDir(this.path);
      sqlite = new Database(this.path);
      sqlite.pragma('journal_mode = WAL');
      sqlite.pragma('synchronous = FULL');
      sqlite.exec(CREATE_TASKS_TABLE);
      return { sqlite, db: drizzle(sqlite, { schema }) };
    } catch (error) {
      sqlite?.close();
      const { message, kind, sqliteCode } = toStoreError(error);
      throw new StoreError(
        `Failed to open task database at ${this.path} for ${mode}: ${message}`,
        kind,
        sqliteCode,
        { cause: error }
      );
    }
  }
}
