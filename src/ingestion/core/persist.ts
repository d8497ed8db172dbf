/**
 * Persist Module for the Transform-Load Pipeline
 *
 * Applies one deduplicated batch to the warehouse in a single transaction:
 * station upserts first, then availability facts with duplicate reports
 * skipped. Nothing from the batch is visible unless everything succeeds.
 */

import type { Database } from '@/db'
import { stations, stationAvailability } from '@/db/schema'
import type { NewAvailabilityRow, NewStationRow } from '@/db/schema'
import { createLogger } from '@/utils/logger'
import { chunkRows, excluded } from './sql'
import type { DedupResult, NormalizedSnapshot, WriteOutcome } from './types'

const log = createLogger('db')

type Transaction = Parameters<Parameters<Database['transaction']>[0]>[0]

// ============================================================================
// Errors
// ============================================================================

/**
 * Raised when the batch transaction fails and was rolled back.
 */
export class WarehouseWriteError extends Error {
  constructor(
    message: string,
    readonly stage: 'stations' | 'facts',
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'WarehouseWriteError'
  }
}

// ============================================================================
// Row Mapping
// ============================================================================

export function toStationRow(snapshot: NormalizedSnapshot, now: Date): NewStationRow {
  return {
    stationId: snapshot.stationId,
    name: snapshot.name,
    latitude: snapshot.latitude,
    longitude: snapshot.longitude,
    capacity: snapshot.capacity,
    arrondissement: snapshot.arrondissement,
    inseeCode: snapshot.inseeCode,
    createdAt: now,
    updatedAt: now,
  }
}

export function toAvailabilityRow(snapshot: NormalizedSnapshot, now: Date): NewAvailabilityRow {
  return {
    stationId: snapshot.stationId,
    bikesAvailable: snapshot.mechanicalBikes + snapshot.electricBikes,
    mechanicalBikes: snapshot.mechanicalBikes,
    electricBikes: snapshot.electricBikes,
    docksAvailable: snapshot.docksAvailable,
    isInstalled: snapshot.isInstalled,
    isRenting: snapshot.isRenting,
    isReturning: snapshot.isReturning,
    isOperational: snapshot.isInstalled && snapshot.isRenting && snapshot.isReturning,
    lastReported: snapshot.lastReported,
    ingestedAt: now,
  }
}

const STATION_COLUMNS = 9
const AVAILABILITY_COLUMNS = 11

// ============================================================================
// Statements
// ============================================================================

/**
 * Insert-or-update stations keyed by station_id.
 * created_at is only ever written by the insert branch.
 */
function upsertStations(tx: Transaction, rows: NewStationRow[]): number {
  let upserted = 0
  for (const chunk of chunkRows(rows, STATION_COLUMNS)) {
    const result = tx
      .insert(stations)
      .values(chunk)
      .onConflictDoUpdate({
        target: stations.stationId,
        set: {
          name: excluded(stations.name),
          latitude: excluded(stations.latitude),
          longitude: excluded(stations.longitude),
          capacity: excluded(stations.capacity),
          arrondissement: excluded(stations.arrondissement),
          inseeCode: excluded(stations.inseeCode),
          updatedAt: excluded(stations.updatedAt),
        },
      })
      .run()
    upserted += result.changes
  }
  return upserted
}

/**
 * Insert facts, skipping any (station_id, last_reported) already present.
 */
function insertFacts(tx: Transaction, rows: NewAvailabilityRow[]): number {
  let inserted = 0
  for (const chunk of chunkRows(rows, AVAILABILITY_COLUMNS)) {
    const result = tx
      .insert(stationAvailability)
      .values(chunk)
      .onConflictDoNothing({
        target: [stationAvailability.stationId, stationAvailability.lastReported],
      })
      .run()
    inserted += result.changes
  }
  return inserted
}

// ============================================================================
// Batch Write
// ============================================================================

/**
 * Write a deduplicated batch in one transaction.
 *
 * @param db - Warehouse database
 * @param batch - Canonical stations and facts from the deduplicator
 * @param now - Commit time, used for updated_at/created_at and ingested_at
 * @throws WarehouseWriteError when the transaction was rolled back
 */
export function writeBatch(
  db: Database,
  batch: Pick<DedupResult, 'stations' | 'facts'>,
  now: Date = new Date(),
): WriteOutcome {
  const stationRows = batch.stations.map((s) => toStationRow(s, now))
  const factRows = batch.facts.map((s) => toAvailabilityRow(s, now))

  if (stationRows.length === 0 && factRows.length === 0) {
    return { upsertedStations: 0, insertedFacts: 0, skippedDuplicateFacts: 0 }
  }

  let stage: WarehouseWriteError['stage'] = 'stations'
  try {
    const outcome = db.transaction((tx) => {
      stage = 'stations'
      const upsertedStations = upsertStations(tx, stationRows)
      stage = 'facts'
      const insertedFacts = insertFacts(tx, factRows)
      return {
        upsertedStations,
        insertedFacts,
        skippedDuplicateFacts: factRows.length - insertedFacts,
      }
    })

    log.debug('Batch committed', { ...outcome })
    return outcome
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new WarehouseWriteError(
      `Warehouse transaction rolled back while writing ${stage}: ${message}`,
      stage,
      { cause: error },
    )
  }
}
