import { describe, it, expect } from 'vitest'
import { createStagedSnapshot, minutesAfter, T1 } from '@/test/fixtures'
import { validateBatch, validateSnapshot } from './validate'

function rejectionReason(result: ReturnType<typeof validateSnapshot>): string | null {
  return result.ok ? null : result.rejection.reason
}

describe('validateSnapshot', () => {
  it('normalizes a well-formed snapshot', () => {
    const result = validateSnapshot(
      createStagedSnapshot('ext_a#0', {
        station_code: ' 16107 ',
        latitude: '48.865983',
        capacity: '35',
        is_renting: 'NON',
        extracted_at: minutesAfter(T1, 1),
      }),
    )

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.snapshot).toEqual({
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
      isRenting: false,
      isReturning: true,
      lastReported: new Date(T1),
      extractedAt: new Date('2024-05-01T10:01:00.000Z'),
    })
  })

  it('accepts a numeric station code', () => {
    const result = validateSnapshot(createStagedSnapshot('r', { station_code: 16107 }))
    expect(result.ok && result.snapshot.stationId).toBe('16107')
  })

  it('rejects a missing or blank station code', () => {
    expect(rejectionReason(validateSnapshot(createStagedSnapshot('r', { station_code: null })))).toBe(
      'missing_id',
    )
    expect(rejectionReason(validateSnapshot(createStagedSnapshot('r', { station_code: '  ' })))).toBe(
      'missing_id',
    )
  })

  it('rejects a negative capacity', () => {
    const result = validateSnapshot(createStagedSnapshot('ext_a#3', { capacity: -1 }))
    expect(result).toEqual({
      ok: false,
      rejection: {
        recordRef: 'ext_a#3',
        reason: 'negative_count',
        detail: 'capacity is not a non-negative integer: -1',
      },
    })
  })

  it('rejects non-numeric and fractional counts as negative_count', () => {
    expect(
      rejectionReason(validateSnapshot(createStagedSnapshot('r', { electric_bikes: 'two' }))),
    ).toBe('negative_count')
    expect(
      rejectionReason(validateSnapshot(createStagedSnapshot('r', { docks_available: 1.5 }))),
    ).toBe('negative_count')
    expect(
      rejectionReason(validateSnapshot(createStagedSnapshot('r', { mechanical_bikes: null }))),
    ).toBe('negative_count')
  })

  it('rejects out-of-range or missing coordinates', () => {
    expect(rejectionReason(validateSnapshot(createStagedSnapshot('r', { latitude: 95 })))).toBe(
      'bad_coordinates',
    )
    expect(rejectionReason(validateSnapshot(createStagedSnapshot('r', { longitude: null })))).toBe(
      'bad_coordinates',
    )
  })

  it('rejects unparseable timestamps', () => {
    expect(
      rejectionReason(validateSnapshot(createStagedSnapshot('r', { last_reported: 'soon' }))),
    ).toBe('bad_timestamp')
  })

  it('rejects a report dated on a day the calendar does not have', () => {
    expect(
      rejectionReason(
        validateSnapshot(createStagedSnapshot('r', { last_reported: '2024-02-30T10:00:00Z' })),
      ),
    ).toBe('bad_timestamp')
  })

  it('rejects a count too large to store exactly', () => {
    const result = validateSnapshot(
      createStagedSnapshot('ext_a#4', { capacity: '1000000000000000000000' }),
    )
    expect(result).toEqual({
      ok: false,
      rejection: {
        recordRef: 'ext_a#4',
        reason: 'negative_count',
        detail: 'capacity is not a non-negative integer: "1000000000000000000000"',
      },
    })
  })

  it('stores a count of negative zero as zero', () => {
    const result = validateSnapshot(createStagedSnapshot('r', { electric_bikes: '-0' }))
    expect(result.ok && result.snapshot.electricBikes).toBe(0)
  })

  it('rejects a report newer than its extraction', () => {
    const result = validateSnapshot(
      createStagedSnapshot('r', { last_reported: minutesAfter(T1, 5), extracted_at: T1 }),
    )
    expect(rejectionReason(result)).toBe('bad_timestamp')
  })

  it('checks the station code before the counts', () => {
    const result = validateSnapshot(createStagedSnapshot('r', { station_code: '', capacity: -1 }))
    expect(rejectionReason(result)).toBe('missing_id')
  })

  it('checks the counts before the coordinates', () => {
    const result = validateSnapshot(createStagedSnapshot('r', { capacity: -1, latitude: 95 }))
    expect(rejectionReason(result)).toBe('negative_count')
  })

  it('checks the coordinates before the timestamps', () => {
    const result = validateSnapshot(
      createStagedSnapshot('r', { latitude: 95, last_reported: 'soon' }),
    )
    expect(rejectionReason(result)).toBe('bad_coordinates')
  })

  it('rejects an empty payload as missing_id', () => {
    expect(rejectionReason(validateSnapshot({ recordRef: 'r', raw: {} }))).toBe('missing_id')
  })
})

describe('validateBatch', () => {
  it('partitions snapshots and keeps input order', () => {
    const outcome = validateBatch([
      createStagedSnapshot('ext_a#0', { station_code: '1' }),
      createStagedSnapshot('ext_a#1', { capacity: -1 }),
      createStagedSnapshot('ext_a#2', { station_code: '2' }),
      createStagedSnapshot('ext_a#3', { latitude: 200 }),
    ])

    expect(outcome.accepted.map((s) => s.recordRef)).toEqual(['ext_a#0', 'ext_a#2'])
    expect(outcome.rejected.map((r) => [r.recordRef, r.reason])).toEqual([
      ['ext_a#1', 'negative_count'],
      ['ext_a#3', 'bad_coordinates'],
    ])
  })

  it('returns empty lists for an empty batch', () => {
    expect(validateBatch([])).toEqual({ accepted: [], rejected: [] })
  })
})
