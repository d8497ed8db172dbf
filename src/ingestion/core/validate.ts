/**
 * Snapshot Validation
 *
 * Classifies one raw staging snapshot as accepted (normalized) or rejected.
 * Checks run in a fixed order and the first failure decides the reason.
 */

import {
  cleanString,
  toCoordinate,
  toCount,
  toFlag,
  toTimestamp,
} from './normalize'
import type {
  NormalizedSnapshot,
  RejectionReason,
  StagedSnapshot,
  ValidationOutcome,
  ValidationResult,
} from './types'

const COUNT_FIELDS = [
  'capacity',
  'mechanical_bikes',
  'electric_bikes',
  'docks_available',
] as const

function reject(
  recordRef: string,
  reason: RejectionReason,
  detail: string,
): ValidationResult {
  return { ok: false, rejection: { recordRef, reason, detail } }
}

/**
 * Validate and normalize one staged snapshot.
 */
export function validateSnapshot({ recordRef, raw }: StagedSnapshot): ValidationResult {
  const stationId = cleanString(raw.station_code)
  if (stationId === null) {
    return reject(recordRef, 'missing_id', 'station_code is empty or not a string')
  }

  const counts: Record<(typeof COUNT_FIELDS)[number], number> = {
    capacity: 0,
    mechanical_bikes: 0,
    electric_bikes: 0,
    docks_available: 0,
  }
  for (const field of COUNT_FIELDS) {
    const count = toCount(raw[field])
    if (count === null) {
      return reject(
        recordRef,
        'negative_count',
        `${field} is not a non-negative integer: ${JSON.stringify(raw[field] ?? null)}`,
      )
    }
    counts[field] = count
  }

  const latitude = toCoordinate(raw.latitude, 90)
  const longitude = toCoordinate(raw.longitude, 180)
  if (latitude === null || longitude === null) {
    return reject(
      recordRef,
      'bad_coordinates',
      `coordinates out of range: ${JSON.stringify([raw.latitude ?? null, raw.longitude ?? null])}`,
    )
  }

  const lastReported = toTimestamp(raw.last_reported)
  const extractedAt = toTimestamp(raw.extracted_at)
  if (lastReported === null || extractedAt === null) {
    return reject(recordRef, 'bad_timestamp', 'last_reported or extracted_at is not a timestamp')
  }
  if (extractedAt.getTime() < lastReported.getTime()) {
    return reject(
      recordRef,
      'bad_timestamp',
      `extracted_at ${extractedAt.toISOString()} precedes last_reported ${lastReported.toISOString()}`,
    )
  }

  const snapshot: NormalizedSnapshot = {
    recordRef,
    stationId,
    name: cleanString(raw.name),
    latitude,
    longitude,
    capacity: counts.capacity,
    arrondissement: cleanString(raw.arrondissement),
    inseeCode: cleanString(raw.insee_code),
    mechanicalBikes: counts.mechanical_bikes,
    electricBikes: counts.electric_bikes,
    docksAvailable: counts.docks_available,
    isInstalled: toFlag(raw.is_installed),
    isRenting: toFlag(raw.is_renting),
    isReturning: toFlag(raw.is_returning),
    lastReported,
    extractedAt,
  }

  return { ok: true, snapshot }
}

/**
 * Partition a batch into accepted and rejected snapshots.
 * Input order is preserved in both lists.
 */
export function validateBatch(snapshots: readonly StagedSnapshot[]): ValidationOutcome {
  const outcome: ValidationOutcome = { accepted: [], rejected: [] }

  for (const staged of snapshots) {
    const result = validateSnapshot(staged)
    if (result.ok) {
      outcome.accepted.push(result.snapshot)
    } else {
      outcome.rejected.push(result.rejection)
    }
  }

  return outcome
}
