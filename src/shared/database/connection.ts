import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { InfrastructureError } from '../../domain/errors/InfrastructureError';
import { logger } from '../logger';

/**
 * Location of the schema, resolved the same way from src/ and from dist/
 */
export const SCHEMA_PATH = path.resolve(__dirname, '../../../db/schema.sql');

export type SqliteDatabase = Database.Database;

/**
 * Opens (or creates) the SQLite database and applies the schema
 *
 * Pass `:memory:` for a throwaway database in tests.
 *
 * @throws InfrastructureError if the file cannot be opened or the schema fails to apply
 */
export function openDatabase(databasePath: string): SqliteDatabase {
  try {
    if (databasePath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(databasePath)), { recursive: true });
    }

    const db = new Database(databasePath);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.exec(fs.readFileSync(SCHEMA_PATH, 'utf8'));

    logger.info({ msg: 'Database ready', databasePath });

    return db;
  } catch (error) {
    throw new InfrastructureError(`Failed to open database at ${databasePath}`, error);
  }
}
