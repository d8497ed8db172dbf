import type {
  ExtractedSnapshot,
  NormalizedSnapshot,
  StagedSnapshot,
} from '@/ingestion/core/types'

export const T1 = '2024-05-01T10:00:00.000Z'

export function createExtractedSnapshot(
  overrides: Partial<ExtractedSnapshot> = {},
): ExtractedSnapshot {
  return {
    station_code: '16107',
    name: 'Benjamin Godard - Victor Hugo',
    latitude: 48.865983,
    longitude: 2.275725,
    capacity: 35,
    arrondissement: 'Paris',
    insee_code: '75056',
    mechanical_bikes: 3,
    electric_bikes: 2,
    docks_available: 30,
    is_installed: 'OUI',
    is_renting: 'OUI',
    is_returning: 'OUI',
    last_reported: T1,
    extracted_at: T1,
    ...overrides,
  }
}

export function createStagedSnapshot(
  recordRef: string,
  overrides: Partial<ExtractedSnapshot> = {},
): StagedSnapshot {
  return { recordRef, raw: createExtractedSnapshot(overrides) }
}

export function createNormalizedSnapshot(
  overrides: Partial<NormalizedSnapshot> = {},
): NormalizedSnapshot {
  return {
    recordRef: 'ext_a#0',
    stationId: '16107',
    name: 'Benjamin Godard - Victor Hugo',
    latitude: 48.865983,
    longitude: 2.275725,
    capacity: 35,
    arrondissement: 'Paris',
    inseeCode: '75056',
    mechanicalBikes: 3,
    electricBikes: 2,
    docksAvailable: 30,
    isInstalled: true,
    isRenting: true,
    isReturning: true,
    lastReported: new Date(T1),
    extractedAt: new Date(T1),
    ...overrides,
  }
}

/**
 * ISO string `minutes` after `base`.
 */
export function minutesAfter(base: string, minutes: number): string {
  return new Date(new Date(base).getTime() + minutes * 60_000).toISOString()
}
