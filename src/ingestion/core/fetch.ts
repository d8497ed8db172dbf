/**
 * HTTP Retry with Exponential Backoff
 *
 * Used by the extractor to call the open-data API. Transient failures
 * (network errors, 429, 5xx) are retried; anything else fails at once.
 */

export interface RetryConfig {
  /** Maximum number of retry attempts after the first request */
  maxRetries: number
  /** Initial backoff delay in milliseconds */
  initialBackoffMs: number
  /** Maximum backoff delay in milliseconds */
  maxBackoffMs: number
  /** Per-request timeout in milliseconds */
  timeoutMs: number
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialBackoffMs: 1000,
  maxBackoffMs: 30000,
  timeoutMs: 60000,
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Error thrown when all retry attempts are exhausted.
 */
export class FetchRetryError extends Error {
  readonly url: string
  readonly attempts: number
  readonly lastStatus: number | null

  constructor(url: string, attempts: number, lastStatus: number | null, lastError: Error | null) {
    const statusInfo = lastStatus !== null ? ` (HTTP ${lastStatus})` : ''
    const errorInfo = lastError ? `: ${lastError.message}` : ''
    super(`Failed to fetch ${url} after ${attempts} attempts${statusInfo}${errorInfo}`, {
      cause: lastError ?? undefined,
    })
    this.name = 'FetchRetryError'
    this.url = url
    this.attempts = attempts
    this.lastStatus = lastStatus
  }
}

/**
 * Exponential backoff with up to 25% jitter, capped at maxBackoffMs.
 *
 * @param attempt - The current attempt number (0-indexed)
 */
export function calculateBackoff(
  attempt: number,
  config: RetryConfig,
  random: () => number = Math.random,
): number {
  const cappedDelay = Math.min(config.initialBackoffMs * Math.pow(2, attempt), config.maxBackoffMs)
  return Math.floor(cappedDelay + random() * 0.25 * cappedDelay)
}

/**
 * 429 and 5xx are worth another try.
 */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status < 600)
}

/**
 * Delay requested by a Retry-After header given in seconds, if any.
 */
export function parseRetryAfter(header: string | null): number | null {
  if (!header) return null
  const seconds = Number.parseInt(header, 10)
  return Number.isNaN(seconds) || seconds <= 0 ? null : seconds * 1000
}

export interface FetchWithRetryOptions {
  config?: Partial<RetryConfig>
  fetchImpl?: FetchLike
  init?: RequestInit
  /** Injected for tests */
  sleepImpl?: (ms: number) => Promise<void>
}

/**
 * Fetch a URL, retrying transient failures.
 *
 * @throws FetchRetryError when the last attempt fails or the status is not retryable
 */
export async function fetchWithRetry(
  url: string,
  options: FetchWithRetryOptions = {},
): Promise<Response> {
  const config = { ...DEFAULT_RETRY_CONFIG, ...options.config }
  const fetchImpl = options.fetchImpl ?? fetch
  const wait = options.sleepImpl ?? sleep

  let lastStatus: number | null = null
  let lastError: Error | null = null

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    let response: Response
    try {
      response = await fetchImpl(url, {
        ...options.init,
        signal: AbortSignal.timeout(config.timeoutMs),
      })
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error))
      if (attempt === config.maxRetries) break
      await wait(calculateBackoff(attempt, config))
      continue
    }

    if (response.ok) {
      return response
    }

    lastStatus = response.status
    if (!isRetryableStatus(response.status) || attempt === config.maxRetries) {
      throw new FetchRetryError(url, attempt + 1, response.status, null)
    }

    const retryAfter =
      response.status === 429 ? parseRetryAfter(response.headers.get('Retry-After')) : null
    await wait(retryAfter ?? calculateBackoff(attempt, config))
  }

  throw new FetchRetryError(url, config.maxRetries + 1, lastStatus, lastError)
}
