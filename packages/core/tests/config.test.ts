import { describe, it, expect } from 'vitest';
import { ConfigError, DEFAULT_PORT, loadConfig } from '../src/config.js';
import { getDbPath } from '../src/db/client.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({ dbPath: getDbPath(), port: DEFAULT_PORT });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({ TASKLIST_DB_PATH: '/var/lib/tasklist/tasks.db', TASKLIST_PORT: '8080' });
    expect(config).toEqual({ dbPath: '/var/lib/tasklist/tasks.db', port: 8080 });
  });

  it('ignores unrelated variables', () => {
    expect(loadConfig({ HOME: '/home/someone', TASKLIST_PORT: '9000' }).port).toBe(9000);
  });

  it('rejects a port that is not a number', () => {
    try {
      loadConfig({ TASKLIST_PORT: 'abc' });
      expect.unreachable('loadConfig should have failed');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.fields.map((field) => field.path)).toEqual(['TASKLIST_PORT']);
      }
    }
  });

  it('rejects a port out of range', () => {
    expect(() => loadConfig({ TASKLIST_PORT: '70000' })).toThrow(ConfigError);
  });

  it('rejects an empty database path', () => {
    expect(() => loadConfig({ TASKLIST_DB_PATH: '' })).toThrow(ConfigError);
  });
});
