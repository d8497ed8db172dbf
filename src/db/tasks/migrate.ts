import { sql } from "drizzle-orm";
import type { Database } from "@/db";

export function upWarehouse(db: Database): void {
	db.run(sql`
    CREATE TABLE IF NOT EXISTS stations (
      station_id TEXT PRIMARY KEY,
      name TEXT,
      latitude REAL NOT NULL,
      longitude REAL NOT NULL,
      capacity INTEGER NOT NULL,
      arrondissement TEXT,
      insee_code TEXT,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL,

      CONSTRAINT stations_latitude_check CHECK (latitude BETWEEN -90 AND 90),
      CONSTRAINT stations_longitude_check CHECK (longitude BETWEEN -180 AND 180),
      CONSTRAINT stations_capacity_check CHECK (capacity >= 0)
    )
  `);

	db.run(sql`
    CREATE TABLE IF NOT EXISTS station_availability (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      station_id TEXT NOT NULL REFERENCES stations(station_id),
      bikes_available INTEGER NOT NULL,
      mechanical_bikes INTEGER NOT NULL,
      electric_bikes INTEGER NOT NULL,
      docks_available INTEGER NOT NULL,
      is_installed INTEGER NOT NULL,
      is_renting INTEGER NOT NULL,
      is_returning INTEGER NOT NULL,
      is_operational INTEGER NOT NULL,
      last_reported INTEGER NOT NULL,
      ingested_at INTEGER NOT NULL
    )
  `);

	db.run(sql`
    CREATE UNIQUE INDEX IF NOT EXISTS uq_availability_station_report
    ON station_availability(station_id, last_reported)
  `);

	db.run(sql`
    CREATE INDEX IF NOT EXISTS idx_availability_station_time
    ON station_availability(station_id, ingested_at)
  `);

	db.run(sql`
    CREATE TABLE IF NOT EXISTS load_runs (
      id TEXT PRIMARY KEY,
      batch_ref TEXT,
      status TEXT NOT NULL,
      accepted INTEGER NOT NULL DEFAULT 0,
      rejected INTEGER NOT NULL DEFAULT 0,
      upserted_stations INTEGER NOT NULL DEFAULT 0,
      inserted_facts INTEGER NOT NULL DEFAULT 0,
      skipped_duplicate_facts INTEGER NOT NULL DEFAULT 0,
      errors TEXT,
      failure TEXT,
      started_at INTEGER NOT NULL,
      completed_at INTEGER,

      CONSTRAINT load_runs_status_check CHECK (
        status IN ('running', 'done', 'failed')
      )
    )
  `);
}

export function upStaging(db: Database): void {
	db.run(sql`
    CREATE TABLE IF NOT EXISTS staging_extractions (
      id TEXT PRIMARY KEY,
      source TEXT NOT NULL,
      extracted_at INTEGER NOT NULL,
      record_count INTEGER NOT NULL,
      processed_at INTEGER,
      processed_by_run TEXT
    )
  `);

	db.run(sql`
    CREATE INDEX IF NOT EXISTS idx_staging_extractions_pending
    ON staging_extractions(processed_at, extracted_at)
  `);

	db.run(sql`
    CREATE TABLE IF NOT EXISTS staging_snapshots (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      extraction_id TEXT NOT NULL REFERENCES staging_extractions(id),
      record_ref TEXT NOT NULL,
      payload TEXT NOT NULL
    )
  `);

	db.run(sql`
    CREATE INDEX IF NOT EXISTS idx_staging_snapshots_extraction
    ON staging_snapshots(extraction_id)
  `);
}

export function downWarehouse(db: Database): void {
	db.run(sql`DROP TABLE IF EXISTS load_runs`);
	db.run(sql`DROP INDEX IF EXISTS idx_availability_station_time`);
	db.run(sql`DROP INDEX IF EXISTS uq_availability_station_report`);
	db.run(sql`DROP TABLE IF EXISTS station_availability`);
	db.run(sql`DROP TABLE IF EXISTS stations`);
}

export function downStaging(db: Database): void {
	db.run(sql`DROP INDEX IF EXISTS idx_staging_snapshots_extraction`);
	db.run(sql`DROP TABLE IF EXISTS staging_snapshots`);
	db.run(sql`DROP INDEX IF EXISTS idx_staging_extractions_pending`);
	db.run(sql`DROP TABLE IF EXISTS staging_extractions`);
}
