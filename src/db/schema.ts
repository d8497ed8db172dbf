import {
  sqliteTable,
  integer,
  real,
  text,
  index,
  uniqueIndex,
} from 'drizzle-orm/sqlite-core'

// ============================================================================
// Warehouse: station dimension
// ============================================================================

export const stations = sqliteTable('stations', {
  stationId: text('station_id').primaryKey(),
  name: text('name'),
  latitude: real('latitude').notNull(),
  longitude: real('longitude').notNull(),
  capacity: integer('capacity').notNull(),
  arrondissement: text('arrondissement'),
  inseeCode: text('insee_code'),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
})

// ============================================================================
// Warehouse: availability facts (append-only)
// ============================================================================

export const stationAvailability = sqliteTable(
  'station_availability',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    stationId: text('station_id')
      .notNull()
      .references(() => stations.stationId),
    bikesAvailable: integer('bikes_available').notNull(),
    mechanicalBikes: integer('mechanical_bikes').notNull(),
    electricBikes: integer('electric_bikes').notNull(),
    docksAvailable: integer('docks_available').notNull(),
    isInstalled: integer('is_installed', { mode: 'boolean' }).notNull(),
    isRenting: integer('is_renting', { mode: 'boolean' }).notNull(),
    isReturning: integer('is_returning', { mode: 'boolean' }).notNull(),
    isOperational: integer('is_operational', { mode: 'boolean' }).notNull(),
    lastReported: integer('last_reported', { mode: 'timestamp_ms' }).notNull(),
    ingestedAt: integer('ingested_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    stationReportIdx: uniqueIndex('uq_availability_station_report').on(
      table.stationId,
      table.lastReported,
    ),
    stationTimeIdx: index('idx_availability_station_time').on(
      table.stationId,
      table.ingestedAt,
    ),
  }),
)

// ============================================================================
// Warehouse: transform-load run bookkeeping
// ============================================================================

export const loadRuns = sqliteTable('load_runs', {
  id: text('id').primaryKey(),
  batchRef: text('batch_ref'),
  status: text('status', { enum: ['running', 'done', 'failed'] }).notNull(),
  accepted: integer('accepted').notNull().default(0),
  rejected: integer('rejected').notNull().default(0),
  upsertedStations: integer('upserted_stations').notNull().default(0),
  insertedFacts: integer('inserted_facts').notNull().default(0),
  skippedDuplicateFacts: integer('skipped_duplicate_facts').notNull().default(0),
  errors: text('errors'), // JSON array of { recordRef, reason }
  failure: text('failure'),
  startedAt: integer('started_at', { mode: 'timestamp_ms' }).notNull(),
  completedAt: integer('completed_at', { mode: 'timestamp_ms' }),
})

// ============================================================================
// Staging store
// ============================================================================

export const stagingExtractions = sqliteTable(
  'staging_extractions',
  {
    id: text('id').primaryKey(),
    source: text('source').notNull(),
    extractedAt: integer('extracted_at', { mode: 'timestamp_ms' }).notNull(),
    recordCount: integer('record_count').notNull(),
    processedAt: integer('processed_at', { mode: 'timestamp_ms' }),
    processedByRun: text('processed_by_run'),
  },
  (table) => ({
    pendingIdx: index('idx_staging_extractions_pending').on(
      table.processedAt,
      table.extractedAt,
    ),
  }),
)

export const stagingSnapshots = sqliteTable(
  'staging_snapshots',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    extractionId: text('extraction_id')
      .notNull()
      .references(() => stagingExtractions.id),
    recordRef: text('record_ref').notNull(),
    payload: text('payload').notNull(), // RawSnapshot as JSON
  },
  (table) => ({
    extractionIdx: index('idx_staging_snapshots_extraction').on(table.extractionId),
  }),
)

export type NewStationRow = typeof stations.$inferInsert
export type NewAvailabilityRow = typeof stationAvailability.$inferInsert
export type LoadRunRow = typeof loadRuns.$inferSelect
