import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ChangeNotifier, type Logger } from '../src/notifications/ChangeNotifier.js';

const flushNotifications = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('ChangeNotifier', () => {
  let logger: Logger;
  let notifier: ChangeNotifier;

  beforeEach(() => {
    logger = { warn: vi.fn() };
    notifier = new ChangeNotifier(logger);
  });

  it('notifies listeners of the exact uri', async () => {
    const listener = vi.fn();
    notifier.subscribe('tasks/1', listener);

    notifier.notifyChange('tasks/1');
    await flushNotifications();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith('tasks/1');
  });

  it('notifies collection listeners of item changes', async () => {
    const listener = vi.fn();
    notifier.subscribe('tasks', listener);

    notifier.notifyChange('tasks/3');
    await flushNotifications();

    expect(listener).toHaveBeenCalledWith('tasks/3');
  });

  it('notifies item listeners of collection-wide changes', async () => {
    const listener = vi.fn();
    notifier.subscribe('tasks/3', listener);

    notifier.notifyChange('tasks');
    await flushNotifications();

    expect(listener).toHaveBeenCalledWith('tasks');
  });

  it('does not notify listeners of sibling items', async () => {
    const listener = vi.fn();
    notifier.subscribe('tasks/1', listener);

    notifier.notifyChange('tasks/2');
    await flushNotifications();

    expect(listener).not.toHaveBeenCalled();
  });

  it('calls each listener once per broadcast', async () => {
    const listener = vi.fn();
    notifier.subscribe('tasks', listener);

    notifier.notifyChange('tasks/4', 'tasks');
    await flushNotifications();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith('tasks/4');
  });

  it('treats qualified and path uris as the same key', async () => {
    const listener = vi.fn();
    notifier.subscribe('content://tasklist/tasks', listener);

    notifier.notifyChange('tasks/8');
    await flushNotifications();

    expect(listener).toHaveBeenCalledWith('tasks/8');
  });

  it('delivers after the publishing call returns', async () => {
    const listener = vi.fn();
    notifier.subscribe('tasks', listener);

    notifier.notifyChange('tasks');
    expect(listener).not.toHaveBeenCalled();

    await flushNotifications();
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('logs a throwing listener and keeps delivering to the others', async () => {
    const failing = vi.fn(() => {
      throw new Error('boom');
    });
    const healthy = vi.fn();
    notifier.subscribe('tasks', failing);
    notifier.subscribe('tasks', healthy);

    expect(() => notifier.notifyChange('tasks')).not.toThrow();
    await flushNotifications();

    expect(healthy).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('Change listener for tasks failed:', expect.any(Error));
  });

  it('stops notifying after unsubscribe', async () => {
    const listener = vi.fn();
    const unsubscribe = notifier.subscribe('tasks', listener);
    expect(notifier.listenerCount).toBe(1);

    unsubscribe();
    notifier.notifyChange('tasks');
    await flushNotifications();

    expect(listener).not.toHaveBeenCalled();
    expect(notifier.listenerCount).toBe(0);
  });
});
