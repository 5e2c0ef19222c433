/**
 * Time & Date Utilities
 *
 * Calendar dates and offset-aware instants as normalized, branded strings.
 * Uses Julian Day Number for all date arithmetic to avoid month-length edge cases.
 * Zero external dependencies.
 */

import { type Result, Ok, Err } from './result'
import { ParseError } from './errors'

export { ParseError } from './errors'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __instant: unique symbol

/** ISO 8601 calendar date: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/**
 * ISO 8601 instant with an explicit offset: YYYY-MM-DDTHH:MM:SS[.fraction]±HH:MM.
 * `Z` is normalized to `+00:00`.
 */
export type Instant = string & { readonly [__instant]: true }

// ============================================================================
// Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_LENGTHS[month - 1] ?? 0
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad3(n: number): string {
  if (n < 10) return '00' + n
  if (n < 100) return '0' + n
  return '' + n
}

function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

// ============================================================================
// Julian Day Number (for date arithmetic)
// ============================================================================

/** JDN of 1970-01-01 */
const UNIX_EPOCH_JDN = 2440588

const MS_PER_DAY = 86_400_000

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): { year: number; month: number; day: number } {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

// ============================================================================
// Parsing
// ============================================================================

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

const INSTANT_PATTERN =
  /^(\d{4}-\d{2}-\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:?\d{2})$/

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = DATE_PATTERN.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const [, y = '', m = '', d = ''] = match
  const year = parseInt(y, 10)
  const month = parseInt(m, 10)
  const day = parseInt(d, 10)

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(str as LocalDate)
}

function normalizeOffset(raw: string): string | null {
  if (raw === 'Z') return '+00:00'
  const sign = raw.charAt(0)
  const digits = raw.slice(1).replace(':', '')
  const hours = parseInt(digits.slice(0, 2), 10)
  const minutes = parseInt(digits.slice(2, 4), 10)
  if (hours > 23 || minutes > 59) return null
  if (hours === 0 && minutes === 0) return '+00:00'
  return `${sign}${pad2(hours)}:${pad2(minutes)}`
}

export function parseInstant(str: string): Result<Instant, ParseError> {
  const match = INSTANT_PATTERN.exec(str)
  if (!match) return Err(new ParseError(`Invalid instant format: '${str}'`))

  const [, datePart = '', h = '', mi = '', s = '00', fraction, rawOffset = ''] = match

  if (!parseDate(datePart).ok)
    return Err(new ParseError(`Invalid date in instant: '${str}'`))

  const hour = parseInt(h, 10)
  const minute = parseInt(mi, 10)
  const second = parseInt(s, 10)
  if (hour > 23 || minute > 59 || second > 59)
    return Err(new ParseError(`Invalid time in instant: '${str}'`))

  const offset = normalizeOffset(rawOffset)
  if (offset === null)
    return Err(new ParseError(`Invalid offset in instant: '${str}'`))

  const frac = fraction !== undefined ? `.${fraction}` : ''
  return Ok(`${datePart}T${pad2(hour)}:${pad2(minute)}:${pad2(second)}${frac}${offset}` as Instant)
}

// ============================================================================
// Input Collaborators
// ============================================================================

/**
 * Parses a due date from either `YYYY-MM-DD` or an offset-aware instant, in
 * which case the calendar date as written is kept (no conversion to UTC).
 * Empty input yields null; anything else unparseable throws.
 */
export function parseDueDate(input: string | null | undefined): LocalDate | null {
  if (input === null || input === undefined || input === '') return null

  const date = parseDate(input)
  if (date.ok) return date.value

  const instant = parseInstant(input)
  if (instant.ok) return dateOf(instant.value)

  throw new ParseError(`Invalid date: '${input}'`)
}

/** Empty input yields null; naive or malformed instants throw. */
export function parseInstantInput(input: string | null | undefined): Instant | null {
  if (input === null || input === undefined || input === '') return null
  const result = parseInstant(input)
  if (!result.ok) throw result.error
  return result.value
}

// ============================================================================
// Construction & Component Extraction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

export function yearOf(date: LocalDate): number {
  return parseInt(date.substring(0, 4), 10)
}

export function monthOf(date: LocalDate): number {
  return parseInt(date.substring(5, 7), 10)
}

export function dayOf(date: LocalDate): number {
  return parseInt(date.substring(8, 10), 10)
}

/** Calendar date of an instant in its own offset */
export function dateOf(instant: Instant): LocalDate {
  return instant.substring(0, 10) as LocalDate
}

export function offsetMinutesOf(instant: Instant): number {
  const offset = instant.slice(-6)
  const sign = offset.charAt(0) === '-' ? -1 : 1
  return sign * (parseInt(offset.substring(1, 3), 10) * 60 + parseInt(offset.substring(4, 6), 10))
}

export function instantFromDate(d: Date): Instant {
  return (
    `${pad4(d.getUTCFullYear())}-${pad2(d.getUTCMonth() + 1)}-${pad2(d.getUTCDate())}` +
    `T${pad2(d.getUTCHours())}:${pad2(d.getUTCMinutes())}:${pad2(d.getUTCSeconds())}` +
    `.${pad3(d.getUTCMilliseconds())}+00:00`
  ) as Instant
}

export function nowInstant(): Instant {
  return instantFromDate(new Date())
}

// ============================================================================
// Date Arithmetic (via JDN)
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  const jdn = dateToJDN(yearOf(date), monthOf(date), dayOf(date))
  const { year, month, day } = jdnToDate(jdn + n)
  return makeDate(year, month, day)
}

export function daysBetween(a: LocalDate, b: LocalDate): number {
  const jdnA = dateToJDN(yearOf(a), monthOf(a), dayOf(a))
  const jdnB = dateToJDN(yearOf(b), monthOf(b), dayOf(b))
  return jdnB - jdnA
}

// ============================================================================
// Instant Arithmetic
// ============================================================================

/** Milliseconds since the Unix epoch; fractions beyond milliseconds are truncated. */
export function instantToEpochMs(instant: Instant): number {
  const date = dateOf(instant)
  const days = dateToJDN(yearOf(date), monthOf(date), dayOf(date)) - UNIX_EPOCH_JDN
  const hour = parseInt(instant.substring(11, 13), 10)
  const minute = parseInt(instant.substring(14, 16), 10)
  const second = parseInt(instant.substring(17, 19), 10)

  let millis = 0
  if (instant.charAt(19) === '.') {
    const fraction = instant.substring(20, instant.length - 6)
    millis = parseInt((fraction + '00').substring(0, 3), 10)
  }

  const local = days * MS_PER_DAY + hour * 3_600_000 + minute * 60_000 + second * 1000 + millis
  return local - offsetMinutesOf(instant) * 60_000
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDates(a: LocalDate, b: LocalDate): number {
  return a < b ? -1 : a > b ? 1 : 0
}

export function compareInstants(a: Instant, b: Instant): number {
  return Math.sign(instantToEpochMs(a) - instantToEpochMs(b))
}
