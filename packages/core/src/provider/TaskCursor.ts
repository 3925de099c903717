import type { ChangeListener, ChangeRegistry } from '../notifications/ChangeNotifier.js';

/**
 * Result-set handle returned by `TaskProvider.query`.
 *
 * The statement is prepared up front, but rows are only read on first access and then
 * kept until `requery()`. `notificationUri` is the URI the cursor was produced for;
 * `subscribe` registers for changes scoped to it.
 */
export class TaskCursor<Row> implements Iterable<Row> {
  private cache: Row[] | null = null;
  private closed = false;
  private readonly subscriptions = new Set<() => void>();

  constructor(
    readonly notificationUri: string,
    private readonly load: () => Row[],
    private readonly registry: ChangeRegistry
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  get count(): number {
    return this.rows().length;
  }

  rows(): Row[] {
    this.assertOpen();
    if (!this.cache) {
      this.cache = this.load();
    }
    return this.cache;
  }

  first(): Row | undefined {
    return this.rows()[0];
  }

  [Symbol.iterator](): Iterator<Row> {
    return this.rows()[Symbol.iterator]();
  }

  /** Drop the cached rows; the next read runs the query again. */
  requery(): void {
    this.assertOpen();
    this.cache = null;
  }

  subscribe(listener: ChangeListener): () => void {
    this.assertOpen();
    const unsubscribe = this.registry.subscribe(this.notificationUri, (uri) => {
      if (!this.closed) listener(uri);
    });
    this.subscriptions.add(unsubscribe);
    return () => {
      unsubscribe();
      this.subscriptions.delete(unsubscribe);
    };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.cache = null;
    for (const unsubscribe of this.subscriptions) unsubscribe();
    this.subscriptions.clear();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error(`Cursor for ${this.notificationUri} is closed`);
    }
  }
}
