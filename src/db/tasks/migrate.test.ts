import { describe, it, expect } from 'vitest'
import { sql } from 'drizzle-orm'
import { createDb, type Database, openSqlite } from '@/db'
import { downStaging, downWarehouse, upStaging, upWarehouse } from './migrate'

function tableNames(db: Database): string[] {
  return db
    .all<{ name: string }>(
      sql`SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name`,
    )
    .map((row) => row.name)
}

function memoryDb(): Database {
  return createDb(openSqlite(':memory:'))
}

describe('warehouse migrations', () => {
  it('creates the warehouse tables and can run twice', () => {
    const db = memoryDb()
    upWarehouse(db)
    upWarehouse(db)

    expect(tableNames(db)).toEqual(['load_runs', 'station_availability', 'stations'])
  })

  it('enforces station constraints', () => {
    const sqlite = openSqlite(':memory:')
    upWarehouse(createDb(sqlite))

    const insert = sqlite.prepare(
      'INSERT INTO stations (station_id, latitude, longitude, capacity, created_at, updated_at) VALUES (?, ?, ?, ?, 0, 0)',
    )

    expect(() => insert.run('1', 95, 2, 10)).toThrow(/CHECK constraint failed: stations_latitude_check/)
    expect(() => insert.run('2', 48, 2, -1)).toThrow(/CHECK constraint failed: stations_capacity_check/)
    expect(insert.run('3', 48.85, 2.35, 10).changes).toBe(1)
  })

  it('surfaces the constraint failure through drizzle as the error cause', () => {
    const db = memoryDb()
    upWarehouse(db)

    expect(() =>
      db.run(
        sql`INSERT INTO stations (station_id, latitude, longitude, capacity, created_at, updated_at) VALUES ('1', 95, 2, 10, 0, 0)`,
      ),
    ).toThrow(
      expect.objectContaining({
        cause: expect.objectContaining({ message: expect.stringMatching(/CHECK constraint failed/) }),
      }),
    )
  })

  it('drops everything on down', () => {
    const db = memoryDb()
    upWarehouse(db)
    downWarehouse(db)

    expect(tableNames(db)).toEqual([])
  })
})

describe('staging migrations', () => {
  it('creates and drops the staging tables', () => {
    const db = memoryDb()
    upStaging(db)
    expect(tableNames(db)).toEqual(['staging_extractions', 'staging_snapshots'])

    downStaging(db)
    expect(tableNames(db)).toEqual([])
  })
})
