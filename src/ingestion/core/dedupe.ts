/**
 * Batch Deduplication
 *
 * The source reports less often than we extract, so consecutive extractions
 * capture the same report. This module collapses them to one reading per
 * (station, report) for facts and one reading per station for the dimension.
 */

import type { DedupPolicy } from '@/config/schemas'
import type { DedupResult, NormalizedSnapshot } from './types'

/**
 * Stable serialization of a snapshot's values.
 * Keys are sorted and dates written as ISO strings; recordRef is left out
 * so identical readings serialize identically.
 */
export function serializeSnapshot(snapshot: NormalizedSnapshot): string {
  const entries = Object.entries(snapshot)
    .filter(([key]) => key !== 'recordRef')
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => [key, value instanceof Date ? value.toISOString() : value])
  return JSON.stringify(entries)
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Deterministic final ordering used when timestamps tie.
 */
function compareBySerialization(a: NormalizedSnapshot, b: NormalizedSnapshot): number {
  return (
    compareStrings(serializeSnapshot(a), serializeSnapshot(b)) ||
    compareStrings(a.recordRef, b.recordRef)
  )
}

/**
 * Positive when `a` should replace `b` as the representative of a fact group.
 */
export function compareFactCandidates(
  a: NormalizedSnapshot,
  b: NormalizedSnapshot,
  policy: DedupPolicy = 'latest-extraction',
): number {
  const byExtraction = a.extractedAt.getTime() - b.extractedAt.getTime()
  const ordered = policy === 'latest-extraction' ? byExtraction : -byExtraction
  return ordered || compareBySerialization(a, b)
}

/**
 * Positive when `a` is a newer view of the station than `b`.
 */
export function compareStationCandidates(
  a: NormalizedSnapshot,
  b: NormalizedSnapshot,
): number {
  return (
    a.extractedAt.getTime() - b.extractedAt.getTime() ||
    a.lastReported.getTime() - b.lastReported.getTime() ||
    compareBySerialization(a, b)
  )
}

function factKey(snapshot: NormalizedSnapshot): string {
  return `${snapshot.stationId}\u0000${snapshot.lastReported.getTime()}`
}

function pickWinners(
  snapshots: readonly NormalizedSnapshot[],
  keyOf: (snapshot: NormalizedSnapshot) => string,
  compare: (a: NormalizedSnapshot, b: NormalizedSnapshot) => number,
): Map<string, NormalizedSnapshot> {
  const winners = new Map<string, NormalizedSnapshot>()
  for (const snapshot of snapshots) {
    const key = keyOf(snapshot)
    const current = winners.get(key)
    if (!current || compare(snapshot, current) > 0) {
      winners.set(key, snapshot)
    }
  }
  return winners
}

export interface DedupOptions {
  policy?: DedupPolicy
}

/**
 * Collapse accepted snapshots of one batch.
 *
 * Output lists are sorted by station id (then report time for facts) so
 * writes happen in the same order whatever order staging returned.
 */
export function dedupeSnapshots(
  snapshots: readonly NormalizedSnapshot[],
  options: DedupOptions = {},
): DedupResult {
  const policy = options.policy ?? 'latest-extraction'

  const facts = [
    ...pickWinners(snapshots, factKey, (a, b) => compareFactCandidates(a, b, policy)).values(),
  ].sort(
    (a, b) =>
      compareStrings(a.stationId, b.stationId) ||
      a.lastReported.getTime() - b.lastReported.getTime(),
  )

  const stations = [
    ...pickWinners(snapshots, (s) => s.stationId, compareStationCandidates).values(),
  ].sort((a, b) => compareStrings(a.stationId, b.stationId))

  return {
    stations,
    facts,
    collapsed: snapshots.length - facts.length,
  }
}
