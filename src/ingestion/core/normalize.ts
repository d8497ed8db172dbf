/**
 * Normalization Utilities
 *
 * Coercion helpers for values coming out of staging JSON.
 * Every helper returns null when the value cannot be coerced; the validator
 * decides what a null means for each field.
 */

// ============================================================================
// Numbers
// ============================================================================

/**
 * Coerces a JSON value to a finite number.
 * Handles formats like:
 * - 12 → 12
 * - "12" → 12
 * - " 48.85 " → 48.85
 * - "2,35" → 2.35 (comma decimal separator)
 *
 * Booleans, empty strings and anything non-numeric give null.
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null
  }

  if (typeof value !== 'string') return null

  const trimmed = value.trim()
  if (trimmed === '') return null

  const normalized = /^-?\d*,\d+$/.test(trimmed) ? trimmed.replace(',', '.') : trimmed

  // Number() accepts hex, exponents and "Infinity"; station feeds never send those
  if (!/^-?(\d+\.?\d*|\.\d+)$/.test(normalized)) return null

  const result = Number(normalized)
  return Number.isFinite(result) ? result : null
}

/**
 * Coerces a JSON value to a non-negative integer count.
 * "5" → 5, 5 → 5; -1, 2.5, "abc", null and integers past 2^53 give null.
 */
export function toCount(value: unknown): number | null {
  const n = toNumber(value)
  if (n === null || !Number.isSafeInteger(n) || n < 0) return null
  // -0 is stored as 0
  return n === 0 ? 0 : n
}

/**
 * Coerces a coordinate and checks it lies within ±limit degrees.
 */
export function toCoordinate(value: unknown, limit: 90 | 180): number | null {
  const n = toNumber(value)
  if (n === null || n < -limit || n > limit) return null
  return n
}

// ============================================================================
// Timestamps
// ============================================================================

/**
 * Parses a timestamp given as a Date, epoch milliseconds or an ISO-8601 string.
 * Strings without an offset are read as UTC, matching the source feed.
 */
export function toTimestamp(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value.getTime())
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null
    const date = new Date(value)
    return Number.isNaN(date.getTime()) ? null : date
  }

  if (typeof value !== 'string') return null

  const trimmed = value.trim()
  const match = /^(\d{4})-(\d{2})-(\d{2})/.exec(trimmed)
  if (!match) return null
  if (!isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))) return null

  const hasTime = trimmed.length > 10
  const hasOffset = /(Z|[+-]\d{2}:?\d{2})$/i.test(trimmed)
  const date = new Date(hasTime && !hasOffset ? `${trimmed}Z` : trimmed)

  return Number.isNaN(date.getTime()) ? null : date
}

/**
 * False for days the calendar does not have, like 2024-02-30,
 * which Date would otherwise roll into the next month.
 */
function isCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(0)
  date.setUTCFullYear(year, month - 1, day)
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  )
}

// ============================================================================
// Flags
// ============================================================================

const TRUE_FLAGS = new Set(['oui', 'true', 'yes', '1'])

/**
 * Normalizes a station status flag.
 * The feed sends "OUI"/"NON"; booleans and 1/0 are accepted too.
 * Anything unrecognized reads as false.
 */
export function toFlag(value: unknown): boolean {
  if (typeof value === 'boolean') return value
  if (typeof value === 'number') return value === 1
  if (typeof value === 'string') return TRUE_FLAGS.has(value.trim().toLowerCase())
  return false
}

// ============================================================================
// Strings
// ============================================================================

/**
 * Cleans and normalizes a string value.
 * - Trims whitespace
 * - Collapses multiple spaces
 * - Stringifies numbers (INSEE codes sometimes arrive numeric)
 * - Returns null for empty strings
 */
export function cleanString(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value)
  }
  if (typeof value !== 'string') return null

  const cleaned = value.trim().replace(/\s+/g, ' ')
  return cleaned.length > 0 ? cleaned : null
}
