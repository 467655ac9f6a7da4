import { ConfigurationError } from './errors.ts'
import type { THostFieldValue } from './types.ts'

const DURATION_UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  µs: 1e-3,
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
}

const DURATION_SEGMENT = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|ms|s|m|h)/y

const NUMERIC_STRING = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/

export function resolveFetch(override?: typeof fetch): typeof fetch {
  const resolved = override ?? (globalThis as unknown as { fetch?: typeof fetch }).fetch
  if (!resolved) {
    throw new ConfigurationError(
      'No fetch implementation available. Provide fetchImplementation or use Node.js >= 20.',
    )
  }
  return resolved
}

export function createTimeoutSignal(timeoutMs: number): {
  signal: AbortSignal
  cleanup: () => void
} {
  const controller = new AbortController()
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs)
  timeoutId.unref()
  return { signal: controller.signal, cleanup: () => clearTimeout(timeoutId) }
}

export function validateRequiredStrings<T extends Record<string, unknown>>(
  options: T,
  keys: Array<keyof T & string>,
): void {
  for (const key of keys) {
    if (!options[key] || typeof options[key] !== 'string') {
      throw new ConfigurationError(`${key} must be a non-empty string`)
    }
  }
}

export function validateUrl(name: string, value: string): void {
  try {
    new URL(value)
  } catch {
    throw new ConfigurationError(`Invalid ${name}: "${value}"`)
  }
}

/**
 * Parses a duration such as `20s`, `1m30s` or `250ms` into milliseconds.
 * A bare `0` is accepted. Returns null when the input is not a duration.
 */
export function parseDuration(input: string): number | null {
  const text = input.trim()
  if (text === '0') return 0
  if (text === '') return null

  let sign = 1
  let position = 0
  if (text[0] === '-' || text[0] === '+') {
    sign = text[0] === '-' ? -1 : 1
    position = 1
  }
  if (position === text.length) return null

  let totalMs = 0
  while (position < text.length) {
    DURATION_SEGMENT.lastIndex = position
    const match = DURATION_SEGMENT.exec(text)
    if (!match) return null
    const [segment, amount, unit] = match
    const unitMs = unit === undefined ? undefined : DURATION_UNIT_MS[unit]
    if (amount === undefined || unitMs === undefined) return null
    totalMs += Number(amount) * unitMs
    position += segment.length
  }
  return sign * totalMs
}

/**
 * Coerces a host field value to a finite float64.
 * Booleans map to 1/0; strings must be plain decimal numbers.
 */
export function toFloat64(value: THostFieldValue): number {
  switch (typeof value) {
    case 'number':
      if (!Number.isFinite(value)) throw new TypeError(`non-finite number ${value}`)
      return value
    case 'bigint': {
      const converted = Number(value)
      if (!Number.isFinite(converted)) throw new TypeError(`bigint ${value} exceeds float64 range`)
      return converted
    }
    case 'boolean':
      return value ? 1 : 0
    case 'string': {
      const trimmed = value.trim()
      if (!NUMERIC_STRING.test(trimmed)) {
        throw new TypeError(`unable to convert "${value}" to float64`)
      }
      return Number(trimmed)
    }
    default:
      throw new TypeError(`unsupported field type ${typeof value}`)
  }
}

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

/**
 * Formats an instant as RFC3339 with second precision in the zone `utcOffsetMinutes`
 * east of UTC: `2023-06-06T11:10:50Z` or `2023-06-06T14:10:50+03:00`.
 */
export function formatRfc3339(date: Date, utcOffsetMinutes = 0): string {
  const shifted = new Date(date.getTime() + utcOffsetMinutes * 60_000)
  const year = String(shifted.getUTCFullYear()).padStart(4, '0')
  const day = `${year}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`
  const time = `${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}:${pad(shifted.getUTCSeconds())}`
  const base = `${day}T${time}`
  if (utcOffsetMinutes === 0) return `${base}Z`

  const sign = utcOffsetMinutes < 0 ? '-' : '+'
  const absolute = Math.abs(utcOffsetMinutes)
  return `${base}${sign}${pad(Math.floor(absolute / 60))}:${pad(absolute % 60)}`
}
