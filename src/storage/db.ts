/**
 * Database Connection Factory for Cadence
 *
 * Opens SQLite databases through better-sqlite3 and wraps them with Drizzle
 * ORM. The schema in schema.sql is applied on every open, so a fresh file or
 * `:memory:` database is ready to use immediately.
 *
 * Usage:
 *   import { openDatabase } from '@/storage/db';
 *
 *   const { db, close } = openDatabase(config.database.path);
 *   const rows = await db.select().from(cards);
 *   close();
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';

const SCHEMA_SQL_PATH = fileURLToPath(new URL('./schema.sql', import.meta.url));

/**
 * Type alias for the Drizzle database instance.
 *
 * Use this type when you need to pass the database as a parameter
 * or store it in a variable with proper typing.
 *
 * @example
 * function countCards(database: AppDatabase) {
 *   return database.select().from(cards);
 * }
 */
export type AppDatabase = BetterSQLite3Database<typeof schema>;

/**
 * An open database: the Drizzle instance plus the raw connection it wraps.
 */
export interface DatabaseConnection {
  /** Drizzle ORM database instance */
  db: AppDatabase;
  /** Raw better-sqlite3 connection */
  sqlite: Database.Database;
  /** Closes the underlying connection */
  close(): void;
}

/**
 * Applies schema.sql to a raw connection. Every statement is idempotent.
 */
export function applySchema(sqlite: Database.Database): void {
  sqlite.exec(readFileSync(SCHEMA_SQL_PATH, 'utf8'));
}

/**
 * Opens (or creates) the SQLite database at `dbPath`.
 *
 * This factory function:
 * 1. Opens/creates the database file (or an in-memory database)
 * 2. Enables foreign key enforcement (disabled by default in SQLite)
 * 3. Applies the schema
 * 4. Wraps the connection with Drizzle ORM for type-safe queries
 *
 * @param dbPath - Path to the SQLite file, or ':memory:' for tests
 *
 * @example
 * // Testing with an in-memory database
 * const { db } = openDatabase(':memory:');
 */
export function openDatabase(dbPath: string = 'cadence.db'): DatabaseConnection {
  const sqlite = new Database(dbPath);

  sqlite.pragma('foreign_keys = ON');
  // WAL does not apply to in-memory databases
  if (dbPath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }

  applySchema(sqlite);

  return {
    db: drizzle(sqlite, { schema }),
    sqlite,
    close: () => sqlite.close(),
  };
}
