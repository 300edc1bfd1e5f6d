/**
 * Where the database lives: project-local under the git root, or global under $HOME.
 */

import { existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { dirname, join, resolve } from 'path';
import type { StoreScope } from './types.js';
import { CltodoError, errorMessage } from './errors.js';

export const STORE_DIR = '.cltodo';
export const STORE_FILE = 'data.db';

export interface StorageLocator {
  /** Directory that holds the database file for the requested scope. */
  locate(scope: StoreScope): string;
}

export interface ResolvedStore {
  dbPath: string;
  created: boolean;
}

/**
 * Walk up from `start` to the nearest directory containing `.git`
 * (a directory in a normal checkout, a file in worktrees and submodules).
 */
export function findProjectRoot(start: string): string | null {
  let current = resolve(start);

  while (true) {
    if (existsSync(join(current, '.git'))) return current;
    const parent = dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export class FsStorageLocator implements StorageLocator {
  constructor(
    private readonly cwd: string = process.cwd(),
    private readonly home: () => string = homedir
  ) {}

  locate(scope: StoreScope): string {
    if (scope === 'project') {
      const root = findProjectRoot(this.cwd);
      if (root) return join(root, STORE_DIR);
    }
    return join(this.homeDir(), STORE_DIR);
  }

  private homeDir(): string {
    let home: string;
    try {
      home = this.home();
    } catch (error) {
      throw new CltodoError('HOME_UNAVAILABLE', `Cannot determine home directory: ${errorMessage(error)}`);
    }
    if (!home) {
      throw new CltodoError('HOME_UNAVAILABLE', 'Cannot determine home directory');
    }
    return home;
  }
}

// Always answers with the same directory; used for tests and explicit overrides
export class FixedStorageLocator implements StorageLocator {
  constructor(private readonly dir: string) {}

  locate(): string {
    return this.dir;
  }
}

/**
 * Make sure the store directory exists and report whether the database file
 * is about to be created by this invocation.
 */
export function prepareStore(dbPath: string): ResolvedStore {
  const dir = dirname(dbPath);
  try {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  } catch (error) {
    throw new CltodoError('STORE_UNAVAILABLE', `Cannot create store directory ${dir}: ${errorMessage(error)}`, { dir });
  }
  return { dbPath, created: !existsSync(dbPath) };
}

export function resolveStore(locator: StorageLocator, scope: StoreScope): ResolvedStore {
  return prepareStore(join(locator.locate(scope), STORE_FILE));
}
