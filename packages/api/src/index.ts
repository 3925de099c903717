import express from 'express';
import cors from 'cors';
import type { Server } from 'http';
import {
  ChangeNotifier,
  TaskDatabase,
  TaskProvider,
  loadConfig,
  type TasklistConfig,
} from '@tasklist/core';
import { taskRoutes } from './routes/tasks.js';
import { typeRoutes } from './routes/types.js';

export function createApp(provider: TaskProvider) {
  const app = express();

  app.use(cors());
  app.use(express.json());

  // API routes
  app.use('/api/tasks', taskRoutes(provider));
  app.use('/api/types', typeRoutes(provider));

  // Health check
  app.get('/api/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  return app;
}

/**
 * Open the database, serve the API and close the database again on SIGINT/SIGTERM.
 */
export function startServer(config: TasklistConfig = loadConfig()): Server {
  const database = new TaskDatabase(config.dbPath);
  const provider = new TaskProvider({ database, notifier: new ChangeNotifier() });

  const server = createApp(provider).listen(config.port, () => {
    console.log(`Task list API running at http://localhost:${config.port}`);
  });

  const shutdown = () => {
    server.close(() => {
      database.close();
      process.exit(0);
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  return server;
}
