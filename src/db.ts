import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { getStorageConfig } from './config';
import { runMigrations } from './migrate';
import { logger } from './utils/logger';

export type SqliteDatabase = Database.Database;

export const IN_MEMORY = ':memory:';

/**
 * Opens (creating if needed) the local purchase database and brings its
 * schema up to date before handing it out.
 */
export function openDatabase(filename: string = getStorageConfig().dbPath): SqliteDatabase {
  if (filename !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }

  const db = new Database(filename);
  if (filename !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }

  try {
    const report = runMigrations(db);
    if (report.applied.length > 0) {
      logger.info('Local database ready', { file: filename, from: report.from, to: report.to });
    }
  } catch (error) {
    db.close();
    throw error;
  }

  return db;
}
