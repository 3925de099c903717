// Database
export {
  TaskDatabase,
  getDbPath,
  ensureDbDir,
  type Db,
  type ConnectionMode,
} from './db/client.js';

// Schema
export * from './schema/index.js';

// Resources
export {
  TASKS_AUTHORITY,
  TASKS_PATH,
  TASKS_URI,
  CONTENT_DIR_TYPE,
  CONTENT_ITEM_TYPE,
  taskUri,
  matchUri,
  parseTaskId,
  pathSegments,
  type ResourceMatch,
  type CollectionMatch,
  type ItemMatch,
  type UnknownMatch,
} from './resources/uri.js';

// Notifications
export {
  ChangeNotifier,
  type ChangeListener,
  type ChangeChannel,
  type ChangeRegistry,
  type Logger,
} from './notifications/ChangeNotifier.js';

// Provider
export {
  TaskProvider,
  type QueryOptions,
  type SelectionOptions,
  type TaskProviderDeps,
} from './provider/TaskProvider.js';
export { TaskCursor } from './provider/TaskCursor.js';
export { type SelectionArg } from './provider/selection.js';

// Errors and configuration
export {
  UnsupportedResourceError,
  StoreError,
  toStoreError,
  classifySqliteCode,
  type StoreErrorKind,
  type ResourceOperation,
} from './errors.js';
export { loadConfig, ConfigError, DEFAULT_PORT, type TasklistConfig } from './config.js';
