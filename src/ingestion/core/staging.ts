/**
 * Staging Store
 *
 * SQLite-backed store for raw extractions. Each extraction is one API pull;
 * a transform batch groups consecutive unprocessed extractions.
 */

import { and, asc, eq, gte, inArray, isNull, lte } from 'drizzle-orm'
import type { Database } from '@/db'
import { stagingExtractions, stagingSnapshots } from '@/db/schema'
import { chunkRows } from './sql'
import type {
  BatchLimits,
  NewExtraction,
  RawSnapshot,
  StagedBatch,
  StagedSnapshot,
  StagingStore,
} from './types'

/**
 * Raised when staged documents cannot be read back.
 */
export class StagingReadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StagingReadError'
  }
}

export function buildRecordRef(extractionId: string, index: number): string {
  return `${extractionId}#${index}`
}

function parsePayload(recordRef: string, payload: string): RawSnapshot {
  let parsed: unknown
  try {
    parsed = JSON.parse(payload)
  } catch (error) {
    throw new StagingReadError(`Staged document ${recordRef} is not valid JSON`, { cause: error })
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return {}
  }
  return Object.fromEntries(Object.entries(parsed))
}

export class SqliteStagingStore implements StagingStore {
  constructor(private readonly db: Database) {}

  async fetchNextBatch(limits: BatchLimits): Promise<StagedBatch | null> {
    const [first] = this.db
      .select({ id: stagingExtractions.id, extractedAt: stagingExtractions.extractedAt })
      .from(stagingExtractions)
      .where(isNull(stagingExtractions.processedAt))
      .orderBy(asc(stagingExtractions.extractedAt), asc(stagingExtractions.id))
      .limit(1)
      .all()

    if (!first) return null
    return this.loadBatch(first.id, first.extractedAt, limits)
  }

  async fetchBatch(ref: string, limits: BatchLimits): Promise<StagedBatch | null> {
    const [first] = this.db
      .select({ id: stagingExtractions.id, extractedAt: stagingExtractions.extractedAt })
      .from(stagingExtractions)
      .where(and(eq(stagingExtractions.id, ref), isNull(stagingExtractions.processedAt)))
      .limit(1)
      .all()

    if (!first) return null
    return this.loadBatch(first.id, first.extractedAt, limits)
  }

  async markProcessed(batch: StagedBatch, runId: string, at: Date): Promise<number> {
    if (batch.extractionIds.length === 0) return 0

    const result = this.db
      .update(stagingExtractions)
      .set({ processedAt: at, processedByRun: runId })
      .where(
        and(
          inArray(stagingExtractions.id, batch.extractionIds),
          isNull(stagingExtractions.processedAt),
        ),
      )
      .run()
    return result.changes
  }

  async stageExtraction(extraction: NewExtraction): Promise<void> {
    const rows = extraction.snapshots.map((snapshot, index) => ({
      extractionId: extraction.id,
      recordRef: buildRecordRef(extraction.id, index),
      payload: JSON.stringify(snapshot),
    }))

    this.db.transaction((tx) => {
      tx.insert(stagingExtractions)
        .values({
          id: extraction.id,
          source: extraction.source,
          extractedAt: extraction.extractedAt,
          recordCount: extraction.snapshots.length,
        })
        .run()

      for (const chunk of chunkRows(rows, 3)) {
        tx.insert(stagingSnapshots).values(chunk).run()
      }
    })
  }

  /**
   * The batch starting at `firstId`: unprocessed extractions within the
   * window, ordered by extraction time then id, capped at maxExtractions.
   */
  private loadBatch(firstId: string, firstAt: Date, limits: BatchLimits): StagedBatch {
    const windowEnd = new Date(firstAt.getTime() + limits.windowMs)

    const candidates = this.db
      .select({ id: stagingExtractions.id })
      .from(stagingExtractions)
      .where(
        and(
          isNull(stagingExtractions.processedAt),
          gte(stagingExtractions.extractedAt, firstAt),
          lte(stagingExtractions.extractedAt, windowEnd),
        ),
      )
      .orderBy(asc(stagingExtractions.extractedAt), asc(stagingExtractions.id))
      .all()

    // Extractions sharing firstAt but sorting before firstId belong to an earlier batch
    const startIndex = Math.max(
      candidates.findIndex((c) => c.id === firstId),
      0,
    )
    const extractionIds = candidates
      .slice(startIndex, startIndex + limits.maxExtractions)
      .map((c) => c.id)

    // Snapshots follow their extraction's position, then staging order
    const byExtraction = new Map<string, StagedSnapshot[]>(extractionIds.map((id) => [id, []]))
    for (const ids of chunkRows(extractionIds, 1)) {
      const rows = this.db
        .select({
          extractionId: stagingSnapshots.extractionId,
          recordRef: stagingSnapshots.recordRef,
          payload: stagingSnapshots.payload,
        })
        .from(stagingSnapshots)
        .where(inArray(stagingSnapshots.extractionId, ids))
        .orderBy(asc(stagingSnapshots.id))
        .all()

      for (const row of rows) {
        byExtraction.get(row.extractionId)?.push({
          recordRef: row.recordRef,
          raw: parsePayload(row.recordRef, row.payload),
        })
      }
    }
    const snapshots = extractionIds.flatMap((id) => byExtraction.get(id) ?? [])

    return { ref: firstId, extractionIds, snapshots }
  }
}
