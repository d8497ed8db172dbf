import BetterSqlite3 from 'better-sqlite3'
import { drizzle } from 'drizzle-orm/better-sqlite3'
import * as schema from './schema'

export type Database = ReturnType<typeof createDb>

export interface OpenDatabaseOptions {
  /** How long a statement waits on a locked database before failing */
  busyTimeoutMs?: number
}

export function createDb(sqlite: BetterSqlite3.Database) {
  return drizzle(sqlite, { schema })
}

/**
 * Open a SQLite file (or ":memory:") with foreign keys enforced.
 * The caller owns the returned connection and must close it.
 */
export function openSqlite(
  path: string,
  options: OpenDatabaseOptions = {},
): BetterSqlite3.Database {
  const sqlite = new BetterSqlite3(path, { timeout: options.busyTimeoutMs ?? 5000 })
  if (path !== ':memory:') {
    sqlite.pragma('journal_mode = WAL')
  }
  sqlite.pragma('foreign_keys = ON')
  return sqlite
}

// Re-export schema for convenience
export * from './schema'
