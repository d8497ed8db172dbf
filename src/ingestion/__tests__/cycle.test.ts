import { describe, it, expect, vi } from 'vitest'
import { sql } from 'drizzle-orm'
import { pipelineEnvSchema } from '@/config/schemas'
import { createStagingDb, createTestConnector } from '@/test/db'
import { SqliteStagingStore } from '../core/staging'
import { type CycleResult, runEtlCycle, toCycleMessage } from '../cycle'
import { TransformLoadFailedError } from '../processor'

const CONFIG = pipelineEnvSchema.parse({
  VELIB_API_URL: 'https://opendata.example.test/api/records/1.0/search/',
  RETRY_ATTEMPTS: '2',
  RETRY_DELAY_MS: '5',
})

const CAPTURED_AT = new Date('2024-05-01T10:01:00.000Z')

function apiResponse(): Response {
  return new Response(
    JSON.stringify({
      nhits: 1,
      records: [
        {
          fields: {
            stationcode: '16107',
            name: 'Benjamin Godard - Victor Hugo',
            coordonnees_geo: [48.865983, 2.275725],
            capacity: 35,
            mechanical: 3,
            ebike: 2,
            numdocksavailable: 30,
            is_installed: 'OUI',
            is_renting: 'OUI',
            is_returning: 'OUI',
            duedate: '2024-05-01T10:00:00+00:00',
          },
        },
      ],
    }),
    { status: 200 },
  )
}

describe('runEtlCycle', () => {
  it('extracts and loads in one pass', async () => {
    const staging = new SqliteStagingStore(createStagingDb())
    const connector = createTestConnector()

    const result = await runEtlCycle({
      config: CONFIG,
      staging,
      warehouse: connector,
      fetchImpl: vi.fn().mockResolvedValue(apiResponse()),
      now: () => CAPTURED_AT,
    })

    expect(result.extraction?.recordCount).toBe(1)
    expect(result.extractionError).toBeNull()
    expect(result.attempts).toBe(1)
    expect(result.run).toMatchObject({
      batchRef: result.extraction?.extractionId,
      status: 'DONE',
      accepted: 1,
      upsertedStations: 1,
      insertedFacts: 1,
    })
  })

  it('still loads pending batches when extraction fails', async () => {
    const staging = new SqliteStagingStore(createStagingDb())
    const sleepImpl = vi.fn().mockResolvedValue(undefined)

    const result = await runEtlCycle({
      config: CONFIG,
      staging,
      warehouse: createTestConnector(),
      fetchImpl: vi.fn().mockResolvedValue(new Response(null, { status: 404 })),
      sleepImpl,
    })

    expect(result.extraction).toBeNull()
    expect(result.extractionError).toMatch(/HTTP 404/)
    expect(result.run.status).toBe('DONE')
    expect(result.run.batchRef).toBeNull()
  })

  it('retries a failed transform-load, then gives up', async () => {
    const staging = new SqliteStagingStore(createStagingDb())
    const connector = createTestConnector()
    connector.db.run(sql`DROP TABLE station_availability`)
    const sleepImpl = vi.fn().mockResolvedValue(undefined)

    await expect(
      runEtlCycle({
        config: CONFIG,
        staging,
        warehouse: connector,
        fetchImpl: vi.fn().mockResolvedValue(apiResponse()),
        sleepImpl,
        now: () => CAPTURED_AT,
      }),
    ).rejects.toBeInstanceOf(TransformLoadFailedError)

    expect(connector.opened).toBe(2)
    expect(sleepImpl).toHaveBeenCalledWith(5)
    expect(await staging.fetchNextBatch({ maxExtractions: 1, windowMs: 0 })).not.toBeNull()
  })
})

describe('toCycleMessage', () => {
  function createCycleResult(overrides: Partial<CycleResult> = {}): CycleResult {
    return {
      extraction: {
        extractionId: 'ext_1',
        extractedAt: CAPTURED_AT,
        recordCount: 3,
        reportedHits: 3,
        source: 'test',
      },
      extractionError: null,
      run: {
        runId: 'run_1',
        batchRef: 'ext_1',
        status: 'DONE',
        accepted: 2,
        rejected: 1,
        upsertedStations: 2,
        insertedFacts: 1,
        skippedDuplicateFacts: 1,
        errors: [{ recordRef: 'ext_1#2', reason: 'bad_coordinates' }],
        startedAt: CAPTURED_AT,
        completedAt: CAPTURED_AT,
      },
      attempts: 1,
      duration: 42,
      ...overrides,
    }
  }

  it('carries every run count and the rejected records', () => {
    expect(toCycleMessage(createCycleResult())).toEqual({
      extractionId: 'ext_1',
      extracted: 3,
      extractionError: null,
      runId: 'run_1',
      batchRef: 'ext_1',
      status: 'DONE',
      accepted: 2,
      rejected: 1,
      upsertedStations: 2,
      insertedFacts: 1,
      skippedDuplicateFacts: 1,
      errors: [{ recordRef: 'ext_1#2', reason: 'bad_coordinates' }],
      failure: null,
      attempts: 1,
      duration: 42,
    })
  })

  it('keeps the failure state and message but not its cause', () => {
    const base = createCycleResult()
    const message = toCycleMessage({
      ...base,
      extraction: null,
      extractionError: 'HTTP 503',
      run: {
        ...base.run,
        status: 'FAILED',
        failure: { state: 'WRITING', message: 'disk full', cause: new Error('disk full') },
      },
    })

    expect(message.extractionId).toBeNull()
    expect(message.extracted).toBe(0)
    expect(message.extractionError).toBe('HTTP 503')
    expect(message.failure).toEqual({ state: 'WRITING', message: 'disk full' })
  })
})
