/**
 * Opens the mood database and prepares its schema.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { getConfigDir } from '../config/config-paths.js';
import { PersistenceError, describeError } from '../../domain/errors.js';
import { SqliteMoodRepository } from './sqlite-mood-repository.js';

export interface MoodDatabase {
  db: Database.Database;
  repository: SqliteMoodRepository;
  path: string;
}

/**
 * Relative paths are taken relative to the config directory; `:memory:` is kept as is.
 */
export function resolveDatabasePath(dbPath: string, env: NodeJS.ProcessEnv = process.env): string {
  if (dbPath === ':memory:' || path.isAbsolute(dbPath)) {
    return dbPath;
  }
  return path.join(getConfigDir(env), dbPath);
}

export function openMoodDatabase(dbPath: string, env: NodeJS.ProcessEnv = process.env): MoodDatabase {
  const resolved = resolveDatabasePath(dbPath, env);
  let db: Database.Database | undefined;

  try {
    if (resolved !== ':memory:') {
      fs.mkdirSync(path.dirname(resolved), { recursive: true });
    }
    db = new Database(resolved);
    const repository = new SqliteMoodRepository(db);
    repository.initialize();
    return { db, repository, path: resolved };
  } catch (error) {
    db?.close();
    throw new PersistenceError(`Failed to open mood database at ${resolved}: ${describeError(error)}`, error);
  }
}
