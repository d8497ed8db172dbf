import { describe, it, expect, vi, afterEach } from 'vitest'
import { createLogger, formatLogEntry, parseLogTypes, resetLogConfig, sanitize } from './logger'
import { runWithContext } from './run-context'

describe('parseLogTypes', () => {
  it('enables everything by default', () => {
    expect(parseLogTypes(undefined)).toBe('all')
    expect(parseLogTypes('*')).toBe('all')
  })

  it('supports include and exclude lists', () => {
    expect(parseLogTypes('db,pipeline,bogus')).toEqual(new Set(['db', 'pipeline']))
    expect(parseLogTypes('*,-db,-cli')).toEqual(
      new Set(['pipeline', 'extract', 'scheduler']),
    )
    expect(parseLogTypes('none')).toEqual(new Set())
  })
})

describe('sanitize', () => {
  it('redacts sensitive keys at any depth', () => {
    expect(sanitize({ url: 'x', auth: { apiKey: 'test-secret', Token: 't' } })).toEqual({
      url: 'x',
      auth: { apiKey: '[REDACTED]', Token: '[REDACTED]' },
    })
  })

  it('writes dates as ISO strings and bigints with a suffix', () => {
    expect(sanitize({ at: new Date('2024-05-01T10:00:00Z'), n: 10n })).toEqual({
      at: '2024-05-01T10:00:00.000Z',
      n: '10n',
    })
  })

  it('serializes errors', () => {
    const result = sanitize(new Error('boom'))
    expect(result).toMatchObject({ name: 'Error', message: 'boom' })
  })
})

describe('formatLogEntry', () => {
  it('omits empty optional fields', () => {
    const entry = JSON.parse(formatLogEntry('info', 'hello'))
    expect(Object.keys(entry)).toEqual(['timestamp', 'level', 'message'])
  })

  it('includes logger type, run id and context', () => {
    const entry = JSON.parse(formatLogEntry('warn', 'rejected', { recordRef: 'e#1' }, 'pipeline', 'run_1'))
    expect(entry).toMatchObject({
      level: 'warn',
      loggerType: 'pipeline',
      runId: 'run_1',
      message: 'rejected',
      context: { recordRef: 'e#1' },
    })
  })
})

describe('Logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
    vi.restoreAllMocks()
    resetLogConfig()
  })

  it('tags lines with the active run id', () => {
    vi.stubEnv('LOG_LEVEL', 'info')
    resetLogConfig()
    const write = vi.spyOn(console, 'log').mockImplementation(() => {})

    runWithContext('run_abc', () => createLogger('pipeline').info('Batch fetched', { snapshots: 3 }))

    expect(write).toHaveBeenCalledTimes(1)
    const entry = JSON.parse(String(write.mock.calls[0]?.[0]))
    expect(entry).toMatchObject({
      level: 'info',
      loggerType: 'pipeline',
      runId: 'run_abc',
      message: 'Batch fetched',
      context: { snapshots: 3 },
    })
  })

  it('drops lines below the configured level', () => {
    vi.stubEnv('LOG_LEVEL', 'warn')
    resetLogConfig()
    const write = vi.spyOn(console, 'log').mockImplementation(() => {})

    createLogger('db').info('quiet')

    expect(write).not.toHaveBeenCalled()
  })

  it('drops lines of disabled logger types', () => {
    vi.stubEnv('LOG_LEVEL', 'debug')
    vi.stubEnv('LOG_TYPES', 'pipeline')
    resetLogConfig()
    const write = vi.spyOn(console, 'warn').mockImplementation(() => {})

    createLogger('db').warn('hidden')
    createLogger('pipeline').warn('shown')

    expect(write).toHaveBeenCalledTimes(1)
  })

  it('attaches errors under the error key', () => {
    vi.stubEnv('LOG_LEVEL', 'error')
    resetLogConfig()
    const write = vi.spyOn(console, 'error').mockImplementation(() => {})

    createLogger('scheduler').error('Worker error', { name: 'etl-cycle' }, new Error('exit 1'))

    const entry = JSON.parse(String(write.mock.calls[0]?.[0]))
    expect(entry.context.name).toBe('etl-cycle')
    expect(entry.context.error).toMatchObject({ name: 'Error', message: 'exit 1' })
  })

  it('merges child context', () => {
    vi.stubEnv('LOG_LEVEL', 'info')
    resetLogConfig()
    const write = vi.spyOn(console, 'log').mockImplementation(() => {})

    createLogger('cli').child({ operation: 'extract' }).info('done', { records: 2 })

    const entry = JSON.parse(String(write.mock.calls[0]?.[0]))
    expect(entry.context).toEqual({ operation: 'extract', records: 2 })
  })
})
