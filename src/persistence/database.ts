import Database from 'better-sqlite3';
import { createLogger } from '../utils/logger.js';
import { join, dirname as pathDirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { mkdirSync } from 'node:fs';

const __filename = fileURLToPath(import.meta.url);
const __dirname = pathDirname(__filename);

const logger = createLogger({ component: 'database' });

export const DEFAULT_DATABASE_PATH = join(__dirname, '../../data', 'sleep-tracker.db');

/** Opens a fresh connection and migrates it. `:memory:` is accepted. */
export function openDatabase(dbPath: string): Database.Database {
  logger.info({ dbPath }, 'Initializing database');

  if (dbPath !== ':memory:') {
    // recursive mkdir is a no-op when the directory exists
    mkdirSync(pathDirname(dbPath), { recursive: true });
  }

  const connection = new Database(dbPath);
  connection.pragma('journal_mode = WAL');

  runMigrations(connection);

  return connection;
}

export function runMigrations(connection: Database.Database): void {
  logger.info('Running database migrations');

  // One row per tracked night; an open session has start == end
  connection.exec(`
    CREATE TABLE IF NOT EXISTS sleep_sessions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      start_time_milli INTEGER NOT NULL,
      end_time_milli INTEGER NOT NULL,
      quality_score INTEGER
    );

    CREATE INDEX IF NOT EXISTS idx_sleep_sessions_start ON sleep_sessions(start_time_milli);
  `);

  // Older files stored quality under the -1 sentinel
  connection.exec('UPDATE sleep_sessions SET quality_score = NULL WHERE quality_score < 0');

  logger.info('Database migrations completed');
}
