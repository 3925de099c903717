import { z } from 'zod';
import { getDbPath } from './db/client.js';

export const DEFAULT_PORT = 3847;

const envSchema = z.object({
  TASKLIST_DB_PATH: z.string().min(1).default(getDbPath()),
  TASKLIST_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
});

export interface TasklistConfig {
  dbPath: string;
  port: number;
}

/**
 * Configuration validation error with field-level details.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly fields: Array<{ path: string; message: string }> = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Read `TASKLIST_*` settings from the environment, falling back to defaults. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TasklistConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigError(
      `Invalid configuration: ${fields.map((f) => `${f.path} ${f.message}`).join('; ')}`,
      fields
    );
  }
  return {
    dbPath: result.data.TASKLIST_DB_PATH,
    port: result.data.TASKLIST_PORT,
  };
}
