import { eq, sql, type SQL } from 'drizzle-orm';
import type { TaskDatabase } from '../db/client.js';
import { StoreError, toStoreError } from '../errors.js';
import type { ChangeChannel, ChangeRegistry } from '../notifications/ChangeNotifier.js';
import {
  CONTENT_DIR_TYPE,
  CONTENT_ITEM_TYPE,
  TASKS_URI,
  taskUri,
} from '../resources/uri.js';
import {
  tasks,
  type Task,
  type TaskField,
  type TaskRow,
  type TaskUpdate,
  type TaskValues,
} from '../schema/index.js';
import { TaskCursor } from './TaskCursor.js';
import { route } from './routes.js';
import { project, selectionToSql, type SelectionArg } from './selection.js';

export interface SelectionOptions {
  /** SQL expression over the stored column names, with `?` placeholders. */
  selection?: string | null;
  selectionArgs?: readonly SelectionArg[];
}

export interface QueryOptions extends SelectionOptions {
  projection?: readonly TaskField[];
  /** Raw ORDER BY clause, e.g. `priority ASC`. */
  sortOrder?: string | null;
}

export interface TaskProviderDeps {
  database: TaskDatabase;
  notifier: ChangeChannel & ChangeRegistry;
}

/**
 * URI-addressed access to the `tasks` table.
 *
 * `tasks` addresses the collection and `tasks/<id>` a single task. On item URIs the
 * caller's selection is replaced by the id, so item reads and writes only ever touch
 * the addressed row. Successful mutations are broadcast on the change channel.
 */
export class TaskProvider {
  private readonly database: TaskDatabase;
  private readonly notifier: ChangeChannel & ChangeRegistry;

  constructor({ database, notifier }: TaskProviderDeps) {
    this.database = database;
    this.notifier = notifier;
  }

  /** Insert one task into the collection and return the new item URI. */
  insert(uri: string, values: TaskValues): string {
    return route(uri, 'insert', {
      collection: () => {
        const db = this.database.getConnection('write');
        const { lastInsertRowid } = this.attempt(() => db.insert(tasks).values(values).run());
        const itemUri = taskUri(Number(lastInsertRowid));
        this.notifier.notifyChange(itemUri, TASKS_URI);
        return itemUri;
      },
    });
  }

  query(uri: string, options?: QueryOptions & { projection?: undefined }): TaskCursor<Task>;
  query(uri: string, options: QueryOptions & { projection: readonly TaskField[] }): TaskCursor<TaskRow>;
  query(uri: string, options: QueryOptions = {}): TaskCursor<Task> | TaskCursor<TaskRow> {
    return route(uri, 'query', {
      collection: () =>
        this.openCursor(TASKS_URI, selectionToSql(options.selection, options.selectionArgs), options),
      item: ({ id }) => this.openCursor(taskUri(id), eq(tasks.id, id), options),
    });
  }

  /** Update the addressed task. Returns the number of rows changed (0 or 1). */
  update(uri: string, values: TaskUpdate): number {
    return route(uri, 'update', {
      item: ({ id }) => {
        if (!Object.values(values).some((value) => value !== undefined)) {
          throw new StoreError(`No values to update for ${uri}`, 'statement');
        }
        const db = this.database.getConnection('write');
        const { changes } = this.attempt(() =>
          db.update(tasks).set(values).where(eq(tasks.id, id)).run()
        );
        if (changes > 0) this.notifier.notifyChange(taskUri(id));
        return changes;
      },
    });
  }

  /**
   * Delete matching tasks. On the collection an empty selection deletes every task;
   * on an item URI the selection is ignored.
   */
  delete(uri: string, options: SelectionOptions = {}): number {
    return route(uri, 'delete', {
      collection: () =>
        this.deleteWhere(TASKS_URI, selectionToSql(options.selection, options.selectionArgs)),
      item: ({ id }) => this.deleteWhere(taskUri(id), eq(tasks.id, id)),
    });
  }

  getType(uri: string): string {
    return route(uri, 'getType', {
      collection: () => CONTENT_DIR_TYPE,
      item: () => CONTENT_ITEM_TYPE,
    });
  }

  private deleteWhere(notificationUri: string, where: SQL | undefined): number {
    const db = this.database.getConnection('write');
    const { changes } = this.attempt(() => db.delete(tasks).where(where).run());
    if (changes > 0) this.notifier.notifyChange(notificationUri);
    return changes;
  }

  private openCursor(
    notificationUri: string,
    where: SQL | undefined,
    { projection, sortOrder }: QueryOptions
  ): TaskCursor<Task> | TaskCursor<TaskRow> {
    const db = this.database.getConnection('read');
    const statement = this.attempt(() => {
      let query = db.select().from(tasks).where(where).$dynamic();
      if (sortOrder) {
        query = query.orderBy(sql.raw(sortOrder));
      }
      return query.prepare();
    });
    const load = (): Task[] => this.attempt(() => statement.all());

    if (projection) {
      return new TaskCursor(
        notificationUri,
        () => load().map((row) => project(row, projection)),
        this.notifier
      );
    }
    return new TaskCursor(notificationUri, load, this.notifier);
  }

  private attempt<T>(operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      throw toStoreError(error);
    }
  }
}
