import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { openMoodDatabase, resolveDatabasePath } from '../../../src/infra/persistence/database.js';
import { PersistenceError } from '../../../src/domain/errors.js';

describe('database', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'haven-db-'));
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('resolves relative paths inside the config directory', () => {
    const env = { HAVEN_CONFIG_DIR: dir };

    expect(resolveDatabasePath('mood.db', env)).toBe(path.join(dir, 'mood.db'));
    expect(resolveDatabasePath(':memory:', env)).toBe(':memory:');
    expect(resolveDatabasePath('/var/haven/mood.db', env)).toBe('/var/haven/mood.db');
  });

  it('creates the directory and the table', () => {
    const { db, repository, path: opened } = openMoodDatabase('nested/mood.db', { HAVEN_CONFIG_DIR: dir });
    try {
      expect(opened).toBe(path.join(dir, 'nested', 'mood.db'));
      expect(repository.getMoodHistory()).toEqual([]);
    } finally {
      db.close();
    }
  });

  it('closes the handle when the schema cannot be prepared', () => {
    const file = path.join(dir, 'mood.db');
    fs.writeFileSync(file, 'not a database\n'.repeat(512));
    const close = jest.spyOn(Database.prototype, 'close');

    expect(() => openMoodDatabase(file)).toThrow(PersistenceError);
    expect(close).toHaveBeenCalledTimes(1);
  });
});
