import { ChangeNotifier, TaskDatabase, TaskProvider, loadConfig } from '@tasklist/core';

/**
 * Open the configured database for the length of one command.
 */
export function withProvider<T>(run: (provider: TaskProvider) => T): T {
  const { dbPath } = loadConfig();
  const database = new TaskDatabase(dbPath);
  try {
    return run(new TaskProvider({ database, notifier: new ChangeNotifier() }));
  } finally {
    database.close();
  }
}
