/**
 * ID Generation Utilities
 *
 * Time-sortable, prefixed IDs for runs and staged extractions, e.g.
 * `run_0CL2KwaB3cD5eF7gH9iJ1k`. Sorting ids sorts them by creation second.
 */

import { getRandomValues } from 'node:crypto'

/** Base62 alphabet: 0-9, A-Z, a-z (62 characters) */
const BASE62_ALPHABET =
  '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz'

/**
 * Encode a Unix timestamp (seconds) as a 6-character base62 string.
 */
export function encodeTimestampBase62(timestampSeconds: number): string {
  let n = Math.floor(timestampSeconds)
  let result = ''
  for (let i = 0; i < 6; i++) {
    result = BASE62_ALPHABET[n % 62] + result
    n = Math.floor(n / 62)
  }
  return result
}

/**
 * Random base62 string. Bytes >= 248 are rejected so every character is
 * equally likely (248 = 4 * 62).
 */
export function randomBase62(length: number): string {
  let result = ''
  while (result.length < length) {
    const bytes = getRandomValues(new Uint8Array(length * 2))
    for (const byte of bytes) {
      if (byte < 248) {
        result += BASE62_ALPHABET[byte % 62]
        if (result.length === length) break
      }
    }
  }
  return result
}

/**
 * Generate a prefixed, time-sortable ID.
 *
 * @example
 * generatePrefixedId('run') // "run_0CL2KwaB3cD5eF7gH9iJ1k"
 * generatePrefixedId('ext', new Date('2024-01-01T00:00:00Z'))
 */
export function generatePrefixedId(prefix: string, at: Date = new Date()): string {
  const timestamp = encodeTimestampBase62(Math.floor(at.getTime() / 1000))
  return `${prefix}_${timestamp}${randomBase62(16)}`
}
