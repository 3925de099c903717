import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TaskDatabase } from '../src/db/client.js';
import { StoreError } from '../src/errors.js';
import { ChangeNotifier } from '../src/notifications/ChangeNotifier.js';
import { TaskProvider } from '../src/provider/TaskProvider.js';

describe('TaskDatabase', () => {
  let tempDir: string;
  let dbPath: string;
  let database: TaskDatabase;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'tasklist-db-test-'));
    dbPath = join(tempDir, 'tasks.db');
    database = new TaskDatabase(dbPath);
  });

  afterEach(() => {
    database.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('opens nothing until the first connection is requested', () => {
    expect(database.isOpen).toBe(false);
    expect(existsSync(dbPath)).toBe(false);

    database.getConnection();

    expect(database.isOpen).toBe(true);
    expect(existsSync(dbPath)).toBe(true);
  });

  it('hands out the same handle for reads and writes', () => {
    const first = database.getConnection('read');
    expect(database.getConnection('write')).toBe(first);
    expect(database.getConnection('read')).toBe(first);
  });

  it('creates the tasks table with the expected columns', () => {
    database.getConnection();

    const inspector = new Database(dbPath, { readonly: true });
    try {
      const columns = inspector
        .prepare("SELECT name FROM pragma_table_info('tasks') ORDER BY cid")
        .pluck()
        .all();
      expect(columns).toEqual(['_id', 'description', 'priority', 'due_date']);
    } finally {
      inspector.close();
    }
  });

  it('switches the file to WAL journaling', () => {
    database.getConnection();

    const inspector = new Database(dbPath, { readonly: true });
    try {
      expect(inspector.pragma('journal_mode', { simple: true })).toBe('wal');
    } finally {
      inspector.close();
    }
  });

  it('creates a missing parent directory', () => {
    const nestedPath = join(tempDir, 'nested', 'dir', 'tasks.db');
    const nested = new TaskDatabase(nestedPath);
    try {
      nested.getConnection();
      expect(existsSync(nestedPath)).toBe(true);
    } finally {
      nested.close();
    }
  });

  it('keeps rows across close and reopen', () => {
    const provider = new TaskProvider({ database, notifier: new ChangeNotifier() });
    provider.insert('tasks', { description: 'Survives restart', priority: 2 });

    database.close();
    expect(database.isOpen).toBe(false);

    const reopened = new TaskDatabase(dbPath);
    try {
      const again = new TaskProvider({ database: reopened, notifier: new ChangeNotifier() });
      expect(again.query('tasks').rows().map((task) => task.description)).toEqual(['Survives restart']);
    } finally {
      reopened.close();
    }
  });

  it('leaves existing rows alone when the table already exists', () => {
    const provider = new TaskProvider({ database, notifier: new ChangeNotifier() });
    provider.insert('tasks', { description: 'Existing', priority: 1 });
    database.close();

    expect(provider.query('tasks').count).toBe(1);
  });

  it('reports an unreadable file as an infrastructure failure', () => {
    writeFileSync(dbPath, 'this is not a sqlite database\n'.repeat(64));

    expect(() => database.getConnection()).toThrow(StoreError);
    expect(() => database.getConnection()).toThrow(expect.objectContaining({ kind: 'infrastructure' }));
    expect(database.isOpen).toBe(false);
  });

  it('can be closed more than once', () => {
    database.getConnection();
    database.close();
    expect(() => database.close()).not.toThrow();
  });
});
