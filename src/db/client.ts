import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';

import * as schema from './schema';
import { StorageUnavailableError, describeError } from '../types/errors';

export type ArticleDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: ArticleDatabase;
  close(): void;
}

const IN_MEMORY = ':memory:';

/**
 * Open (creating if needed) the SQLite database and ensure the schema exists.
 * @throws StorageUnavailableError when the file cannot be opened or migrated
 */
export function openDatabase(filePath: string): DatabaseHandle {
  let sqlite: Database.Database | null = null;
  try {
    if (filePath !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    }
    sqlite = new Database(filePath);
    sqlite.pragma('journal_mode = WAL');
    sqlite.exec(schema.CREATE_ARTICLES_SQL);

    const connection = sqlite;
    return {
      db: drizzle(connection, { schema }),
      close: () => connection.close(),
    };
  } catch (error) {
    sqlite?.close();
    throw new StorageUnavailableError(`Cannot open database at ${filePath}: ${describeError(error)}`, { cause: error });
  }
}
