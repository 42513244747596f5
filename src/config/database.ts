import BetterSqlite3 from 'better-sqlite3';
import { drizzle, BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { sql } from 'drizzle-orm';
import fs from 'fs';
import path from 'path';
import * as schema from '../db/schema';
import { config } from './env';
import { logger } from '../utils/logger';

export type AppDatabase = BetterSQLite3Database<typeof schema>;

// Same relative location from src/config and dist/config
const MIGRATIONS_DIR = path.join(__dirname, '..', '..', 'migrations');

export interface DatabaseHandle {
  db: AppDatabase;
  sqlite: BetterSqlite3.Database;
}

/**
 * Apply every migration file in name order. Statements are idempotent.
 */
export function runMigrations(sqlite: BetterSqlite3.Database): void {
  const files = fs
    .readdirSync(MIGRATIONS_DIR)
    .filter((file) => file.endsWith('.sql'))
    .sort();

  for (const file of files) {
    sqlite.exec(fs.readFileSync(path.join(MIGRATIONS_DIR, file), 'utf8'));
    logger.debug(`Applied migration ${file}`);
  }
}

/**
 * Open a SQLite database and bring its schema up to date. `:memory:` gives
 * each caller its own private database.
 */
export function openDatabase(filename: string): DatabaseHandle {
  if (filename !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }

  const sqlite = new BetterSqlite3(filename);
  if (filename !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');

  runMigrations(sqlite);

  return { db: drizzle(sqlite, { schema }), sqlite };
}

class Database {
  private static instance: DatabaseHandle | undefined;

  private constructor() {}

  public static getInstance(): DatabaseHandle {
    if (!Database.instance) {
      Database.instance = openDatabase(config.databasePath);
      logger.info(`Database opened at ${config.databasePath}`);
    }

    return Database.instance;
  }

  public static healthCheck(db: AppDatabase = Database.getInstance().db): boolean {
    try {
      db.get(sql`SELECT 1`);
      return true;
    } catch (error) {
      logger.error('Database health check failed:', error);
      return false;
    }
  }

  public static disconnect(): void {
    if (Database.instance) {
      Database.instance.sqlite.close();
      Database.instance = undefined;
      logger.info('Database disconnected');
    }
  }
}

export default Database;
