/**
 * Ingestion Core Types
 *
 * Shared interfaces for the station-status transform-load pipeline.
 * Used by the extractor, the transform-load processor, the CLI and the scheduler.
 */

// ============================================================================
// Raw Snapshot - Staging contract
// ============================================================================

/**
 * A snapshot as produced by the extractor.
 * Values are kept as the API delivered them; the validator does the typing.
 */
export type ExtractedSnapshot = {
  station_code: string | number | null
  name: string | null
  latitude: number | string | null
  longitude: number | string | null
  capacity: number | string | null
  arrondissement: string | null
  insee_code: string | null
  mechanical_bikes: number | string | null
  electric_bikes: number | string | null
  docks_available: number | string | null
  is_installed: boolean | string | number | null
  is_renting: boolean | string | number | null
  is_returning: boolean | string | number | null
  last_reported: string | number | null
  extracted_at: string
}

/**
 * A snapshot as read back from staging.
 * Staging stores JSON documents, so nothing about the field types is trusted.
 */
export type RawSnapshot = Readonly<Record<string, unknown>>

/**
 * A raw snapshot together with the reference used to report on it.
 */
export interface StagedSnapshot {
  /** Stable reference to the staged document (`<extractionId>#<index>`) */
  recordRef: string
  raw: RawSnapshot
}

// ============================================================================
// Normalized Snapshot - Output of validation
// ============================================================================

export interface NormalizedSnapshot {
  recordRef: string
  stationId: string
  name: string | null
  latitude: number
  longitude: number
  capacity: number
  arrondissement: string | null
  inseeCode: string | null
  mechanicalBikes: number
  electricBikes: number
  docksAvailable: number
  isInstalled: boolean
  isRenting: boolean
  isReturning: boolean
  /** Source-asserted report time */
  lastReported: Date
  /** When the extractor captured the reading */
  extractedAt: Date
}

export type RejectionReason =
  | 'missing_id'
  | 'negative_count'
  | 'bad_coordinates'
  | 'bad_timestamp'

export interface Rejection {
  recordRef: string
  reason: RejectionReason
  /** Human-readable detail for logs; not part of the summary contract */
  detail: string
}

export type ValidationResult =
  | { ok: true; snapshot: NormalizedSnapshot }
  | { ok: false; rejection: Rejection }

export interface ValidationOutcome {
  accepted: NormalizedSnapshot[]
  rejected: Rejection[]
}

// ============================================================================
// Deduplication
// ============================================================================

/**
 * Canonical view of one batch.
 * `facts` holds one entry per (stationId, lastReported),
 * `stations` one entry per stationId.
 */
export interface DedupResult {
  stations: NormalizedSnapshot[]
  facts: NormalizedSnapshot[]
  /** Readings dropped because another observation of the same report won */
  collapsed: number
}

// ============================================================================
// Warehouse Writer
// ============================================================================

export interface WriteOutcome {
  upsertedStations: number
  insertedFacts: number
  skippedDuplicateFacts: number
}

// ============================================================================
// Staging Store
// ============================================================================

export interface BatchLimits {
  /** Maximum number of extractions in one batch */
  maxExtractions: number
  /** Extractions later than the first one by more than this are left for the next batch */
  windowMs: number
}

export interface StagedBatch {
  /** Batch reference: the id of the first extraction in the batch */
  ref: string
  extractionIds: string[]
  snapshots: StagedSnapshot[]
}

export interface NewExtraction {
  id: string
  source: string
  extractedAt: Date
  snapshots: ExtractedSnapshot[]
}

/**
 * Staging store contract.
 * Fetching and marking are both idempotent.
 */
export interface StagingStore {
  fetchNextBatch(limits: BatchLimits): Promise<StagedBatch | null>
  /** Returns null when the referenced batch no longer has unprocessed extractions */
  fetchBatch(ref: string, limits: BatchLimits): Promise<StagedBatch | null>
  markProcessed(batch: StagedBatch, runId: string, at: Date): Promise<number>
  stageExtraction(extraction: NewExtraction): Promise<void>
}

// ============================================================================
// Run Summary
// ============================================================================

export type RunState =
  | 'FETCHING'
  | 'VALIDATING'
  | 'DEDUPING'
  | 'WRITING'
  | 'DONE'
  | 'FAILED'

export type RunStatus = Extract<RunState, 'DONE' | 'FAILED'>

export interface RunSummaryError {
  recordRef: string
  reason: RejectionReason
}

export interface RunSummary {
  runId: string
  batchRef: string | null
  status: RunStatus
  accepted: number
  rejected: number
  upsertedStations: number
  insertedFacts: number
  skippedDuplicateFacts: number
  errors: RunSummaryError[]
  /** State the run was in when it failed, and why */
  failure?: { state: RunState; message: string; cause: unknown }
  startedAt: Date
  completedAt: Date
}
