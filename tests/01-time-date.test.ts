/**
 * Segment 01: Time & Date Utilities Tests
 *
 * Calendar dates, offset-aware instants and the input collaborators that the
 * entity modules use to read wire values.
 */

import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import {
  parseDate,
  parseInstant,
  parseDueDate,
  parseInstantInput,
  makeDate,
  addDays,
  daysBetween,
  isLeapYear,
  daysInMonth,
  dateOf,
  offsetMinutesOf,
  instantFromDate,
  instantToEpochMs,
  compareDates,
  compareInstants,
  ParseError,
  type Instant,
  type LocalDate,
} from '../src/time-date'
import type { Result } from '../src/result'

function unwrap<T>(result: Result<T, ParseError>): T {
  if (!result.ok) throw result.error
  return result.value
}

// ============================================================================
// 1. PARSING
// ============================================================================

describe('parseDate', () => {
  it('parses a standard date', () => {
    expect(unwrap(parseDate('2025-03-15'))).toBe('2025-03-15')
  })

  it('parses a leap day', () => {
    expect(unwrap(parseDate('2024-02-29'))).toBe('2024-02-29')
  })

  it.each([
    ['2023-02-29'],
    ['2025-04-31'],
    ['2025-13-01'],
    ['2025-00-10'],
    ['2025-01-00'],
    ['2025-3-15'],
    ['2025/03/15'],
    ['2025-03-15T10:00:00Z'],
    [''],
  ])('rejects %j', (input) => {
    const result = parseDate(input)
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error).toBeInstanceOf(ParseError)
  })
})

describe('parseInstant', () => {
  it('normalizes Z to +00:00', () => {
    expect(unwrap(parseInstant('2025-03-10T09:30:00Z'))).toBe('2025-03-10T09:30:00+00:00')
  })

  it('accepts a space separator, missing seconds and a compact offset', () => {
    expect(unwrap(parseInstant('2025-03-10 09:30+0530'))).toBe('2025-03-10T09:30:00+05:30')
  })

  it('keeps the fraction and normalizes -00:00', () => {
    expect(unwrap(parseInstant('2025-03-10T09:30:00.250-00:00'))).toBe('2025-03-10T09:30:00.250+00:00')
  })

  it('keeps a negative offset', () => {
    expect(unwrap(parseInstant('2025-03-10T23:30:00-05:00'))).toBe('2025-03-10T23:30:00-05:00')
  })

  it('re-parses its own output unchanged', () => {
    const offsetGen = fc.oneof(
      fc.constant('Z'),
      fc.tuple(fc.constantFrom('+', '-'), fc.integer({ min: 0, max: 14 }), fc.constantFrom(0, 30, 45)).map(
        ([sign, h, m]) => `${sign}${String(h).padStart(2, '0')}${String(m).padStart(2, '0')}`
      )
    )
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 60_000 }),
        fc.integer({ min: 0, max: 23 }),
        fc.integer({ min: 0, max: 59 }),
        offsetGen,
        (k, h, m, offset) => {
          const date = addDays(makeDate(1950, 1, 1), k)
          const raw = `${date} ${String(h).padStart(2, '0')}:${String(m).padStart(2, '0')}${offset}`
          const once = unwrap(parseInstant(raw))
          expect(unwrap(parseInstant(once))).toBe(once)
          expect(instantToEpochMs(unwrap(parseInstant(once)))).toBe(instantToEpochMs(once))
        }
      )
    )
  })

  it('rejects a naive timestamp', () => {
    expect(parseInstant('2025-03-10T09:30:00').ok).toBe(false)
  })

  it('rejects an impossible hour', () => {
    expect(parseInstant('2025-03-10T24:00:00Z').ok).toBe(false)
  })

  it('rejects an impossible offset', () => {
    expect(parseInstant('2025-03-10T10:00:00+25:00').ok).toBe(false)
  })

  it('rejects an impossible calendar date', () => {
    expect(parseInstant('2025-02-30T10:00:00Z').ok).toBe(false)
  })
})

describe('parseDueDate', () => {
  it('returns null for empty input', () => {
    expect(parseDueDate(null)).toBeNull()
    expect(parseDueDate(undefined)).toBeNull()
    expect(parseDueDate('')).toBeNull()
  })

  it('accepts a bare date', () => {
    expect(parseDueDate('2025-06-01')).toBe('2025-06-01')
  })

  it('keeps the calendar date of an instant as written', () => {
    expect(parseDueDate('2025-03-10T23:30:00-05:00')).toBe('2025-03-10')
  })

  it('throws ParseError for garbage', () => {
    expect(() => parseDueDate('tomorrow')).toThrow(ParseError)
    expect(() => parseDueDate('tomorrow')).toThrow("Invalid date: 'tomorrow'")
  })
})

describe('parseInstantInput', () => {
  it('returns null for empty input', () => {
    expect(parseInstantInput('')).toBeNull()
    expect(parseInstantInput(null)).toBeNull()
  })

  it('returns the normalized instant', () => {
    expect(parseInstantInput('2025-05-01T10:00:00Z')).toBe('2025-05-01T10:00:00+00:00')
  })

  it('throws for a naive timestamp', () => {
    expect(() => parseInstantInput('2025-05-01T10:00:00')).toThrow(
      "Invalid instant format: '2025-05-01T10:00:00'"
    )
  })
})

// ============================================================================
// 2. CALENDAR HELPERS
// ============================================================================

describe('Calendar helpers', () => {
  it('knows leap years', () => {
    expect(isLeapYear(2024)).toBe(true)
    expect(isLeapYear(2025)).toBe(false)
    expect(isLeapYear(1900)).toBe(false)
    expect(isLeapYear(2000)).toBe(true)
  })

  it('knows month lengths', () => {
    expect(daysInMonth(2024, 2)).toBe(29)
    expect(daysInMonth(2025, 2)).toBe(28)
    expect(daysInMonth(2025, 4)).toBe(30)
    expect(daysInMonth(2025, 12)).toBe(31)
  })

  it('makeDate pads components', () => {
    expect(makeDate(2025, 3, 5)).toBe('2025-03-05')
  })

  it('dateOf and offsetMinutesOf read an instant', () => {
    const instant = unwrap(parseInstant('2025-03-10T23:30:00-05:30'))
    expect(dateOf(instant)).toBe('2025-03-10')
    expect(offsetMinutesOf(instant)).toBe(-330)
  })

  it('instantFromDate renders UTC with milliseconds', () => {
    const d = new Date(Date.UTC(2025, 0, 2, 3, 4, 5, 6))
    expect(instantFromDate(d)).toBe('2025-01-02T03:04:05.006+00:00')
  })
})

// ============================================================================
// 3. ARITHMETIC
// ============================================================================

describe('Date arithmetic', () => {
  it('addDays crosses month ends', () => {
    expect(addDays('2024-02-28' as LocalDate, 1)).toBe('2024-02-29')
    expect(addDays('2025-02-28' as LocalDate, 1)).toBe('2025-03-01')
    expect(addDays('2025-01-31' as LocalDate, 30)).toBe('2025-03-02')
    expect(addDays('2025-12-31' as LocalDate, 1)).toBe('2026-01-01')
  })

  it('addDays goes backwards', () => {
    expect(addDays('2025-03-01' as LocalDate, -1)).toBe('2025-02-28')
  })

  it('daysBetween counts days', () => {
    expect(daysBetween('2025-01-01' as LocalDate, '2025-12-31' as LocalDate)).toBe(364)
    expect(daysBetween('2025-03-01' as LocalDate, '2025-02-01' as LocalDate)).toBe(-28)
  })

  it('addDays and daysBetween agree', () => {
    const base = makeDate(1900, 1, 1)
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 110_000 }), fc.integer({ min: -1000, max: 1000 }), (k, n) => {
        const d = addDays(base, k)
        const moved = addDays(d, n)
        expect(daysBetween(d, moved)).toBe(n)
        expect(parseDate(moved).ok).toBe(true)
      })
    )
  })

  it('compareDates orders lexically', () => {
    expect(compareDates('2025-01-02' as LocalDate, '2025-01-10' as LocalDate)).toBe(-1)
    expect(compareDates('2025-01-10' as LocalDate, '2025-01-10' as LocalDate)).toBe(0)
  })
})

describe('Instant arithmetic', () => {
  it('converts to epoch milliseconds across offsets', () => {
    expect(instantToEpochMs('1970-01-01T00:00:00+00:00' as Instant)).toBe(0)
    expect(instantToEpochMs('1970-01-01T01:00:00+01:00' as Instant)).toBe(0)
    expect(instantToEpochMs('1970-01-02T00:00:00.5+00:00' as Instant)).toBe(86_400_500)
  })

  it('agrees with Date for UTC instants', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 4_102_444_800_000 }), (ms) => {
        expect(instantToEpochMs(instantFromDate(new Date(ms)))).toBe(ms)
      })
    )
  })

  it('compares by absolute time, not by text', () => {
    const a = unwrap(parseInstant('2025-01-01T10:00:00+02:00'))
    const b = unwrap(parseInstant('2025-01-01T09:00:00Z'))
    expect(compareInstants(a, b)).toBe(-1)
    expect(compareInstants(b, a)).toBe(1)
  })
})
