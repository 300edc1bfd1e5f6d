/**
 * Environment-driven settings. `.env` is loaded by the entry point before this runs.
 */

import { homedir } from 'os';
import { join } from 'path';
import type { StoreScope } from './types.js';

export interface CliConfig {
  dbPath: string | null;
  defaultScope: StoreScope;
  debug: boolean;
}

// Helper to expand ~ in paths
export function expandPath(path: string, home: () => string = homedir): string {
  if (path === '~') return home();
  if (path.startsWith('~/')) {
    return join(home(), path.slice(2));
  }
  return path;
}

function isTruthy(value: string | undefined): boolean {
  return value === '1' || value?.toLowerCase() === 'true';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const dbPath = env.CLTODO_DB_PATH?.trim();
  return {
    dbPath: dbPath ? expandPath(dbPath) : null,
    defaultScope: isTruthy(env.CLTODO_GLOBAL) ? 'global' : 'project',
    debug: isTruthy(env.CLTODO_DEBUG),
  };
}
