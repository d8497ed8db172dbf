/**
 * SQL Batching Utilities
 *
 * Multi-row inserts bind one parameter per column per row. SQLite builds
 * before 3.32 cap a statement at 999 variables; we stay under that so the
 * warehouse file can be opened by older tooling as well.
 */

import { sql, type SQL } from 'drizzle-orm'
import type { SQLiteColumn } from 'drizzle-orm/sqlite-core'

const SQLITE_MAX_PARAMS = 999

/**
 * Compute the number of rows that fit in one statement.
 *
 * @param columnsPerRow - Number of bound columns per row
 * @returns Maximum rows per statement (at least 1)
 */
export function computeBatchSize(columnsPerRow: number): number {
  return Math.max(1, Math.floor(SQLITE_MAX_PARAMS / columnsPerRow))
}

/**
 * Split rows into chunks that each fit in a single statement.
 */
export function chunkRows<TRow>(rows: readonly TRow[], columnsPerRow: number): TRow[][] {
  const size = computeBatchSize(columnsPerRow)
  const chunks: TRow[][] = []
  for (let i = 0; i < rows.length; i += size) {
    chunks.push(rows.slice(i, i + size))
  }
  return chunks
}

/**
 * Reference the value proposed for a column inside ON CONFLICT DO UPDATE.
 */
export function excluded(column: SQLiteColumn): SQL {
  return sql.raw(`excluded."${column.name}"`)
}
