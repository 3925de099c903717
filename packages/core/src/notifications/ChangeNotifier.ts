import { pathSegments } from '../resources/uri.js';

export type ChangeListener = (uri: string) => void;

/** Minimal logging surface; `console` satisfies it. */
export interface Logger {
  warn(message: string, ...args: unknown[]): void;
}

/** Publish side, used by the provider after a successful mutation. */
export interface ChangeChannel {
  notifyChange(...uris: string[]): void;
}

/** Subscribe side, used by cursors and other observers. */
export interface ChangeRegistry {
  subscribe(uri: string, listener: ChangeListener): () => void;
}

function segmentsOf(uri: string): string[] {
  return pathSegments(uri) ?? [uri];
}

function isPrefix(prefix: string[], path: string[]): boolean {
  return prefix.length <= path.length && prefix.every((segment, i) => segment === path[i]);
}

/**
 * Observer registry keyed by resource URI.
 *
 * A broadcast reaches a listener when a published URI equals the listener's URI or is
 * an ancestor or descendant of it, so collection observers hear about item changes and
 * item observers hear about collection-wide deletes. Each listener is called at most once
 * per broadcast, with the first matching URI. Listeners run as microtasks after the
 * publishing call has returned; one that throws is logged and skipped.
 */
export class ChangeNotifier implements ChangeChannel, ChangeRegistry {
  private readonly listeners = new Map<string, Set<ChangeListener>>();

  constructor(private readonly logger: Logger = console) {}

  get listenerCount(): number {
    let count = 0;
    for (const set of this.listeners.values()) count += set.size;
    return count;
  }

  subscribe(uri: string, listener: ChangeListener): () => void {
    const key = segmentsOf(uri).join('/');
    let set = this.listeners.get(key);
    if (!set) {
      set = new Set();
      this.listeners.set(key, set);
    }
    set.add(listener);

    const registered = set;
    return () => {
      registered.delete(listener);
      if (registered.size === 0 && this.listeners.get(key) === registered) {
        this.listeners.delete(key);
      }
    };
  }

  notifyChange(...uris: string[]): void {
    const published = uris.map((uri) => ({ uri, segments: segmentsOf(uri) }));
    const notified = new Set<ChangeListener>();

    for (const [key, set] of this.listeners) {
      const observed = key.split('/');
      const hit = published.find(
        ({ segments }) => isPrefix(observed, segments) || isPrefix(segments, observed)
      );
      if (!hit) continue;

      for (const listener of set) {
        if (notified.has(listener)) continue;
        notified.add(listener);
        queueMicrotask(() => this.deliver(listener, hit.uri));
      }
    }
  }

  private deliver(listener: ChangeListener, uri: string): void {
    try {
      listener(uri);
    } catch (error) {
      this.logger.warn(`Change listener for ${uri} failed:`, error);
    }
  }
}
