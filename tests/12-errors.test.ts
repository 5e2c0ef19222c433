/**
 * Segment 12: Error System Tests
 *
 * Error classes, their codes and the HTTP status each code maps to.
 */

import { describe, it, expect } from 'vitest'
import {
  DuplicateKeyError,
  InvalidDataError,
  NotFoundError,
  ParseError,
  PlannerError,
  PlannerErrorCode,
  ValidationError,
  isPlannerError,
} from '../src/errors'
import { statusForCode } from '../src/http/errors'

describe('Error classes', () => {
  it.each([
    [new DuplicateKeyError('dup'), PlannerErrorCode.DUPLICATE_KEY, 'DuplicateKeyError'],
    [new NotFoundError('gone'), PlannerErrorCode.NOT_FOUND, 'NotFoundError'],
    [new InvalidDataError('bad'), PlannerErrorCode.INVALID_DATA, 'InvalidDataError'],
    [new ValidationError('nope'), PlannerErrorCode.VALIDATION, 'ValidationError'],
    [new ParseError('garbled'), PlannerErrorCode.PARSE_ERROR, 'ParseError'],
  ])('%s carries its code and name', (error, code, name) => {
    expect(error).toBeInstanceOf(PlannerError)
    expect(error).toBeInstanceOf(Error)
    expect(error.code).toBe(code)
    expect(error.name).toBe(name)
    expect(isPlannerError(error)).toBe(true)
  })

  it('isPlannerError rejects other errors', () => {
    expect(isPlannerError(new Error('plain'))).toBe(false)
    expect(isPlannerError('string')).toBe(false)
  })
})

describe('statusForCode', () => {
  it('maps input errors to 400 and missing records to 404', () => {
    expect(statusForCode(PlannerErrorCode.VALIDATION)).toBe(400)
    expect(statusForCode(PlannerErrorCode.PARSE_ERROR)).toBe(400)
    expect(statusForCode(PlannerErrorCode.INVALID_DATA)).toBe(400)
    expect(statusForCode(PlannerErrorCode.NOT_FOUND)).toBe(404)
    expect(statusForCode(PlannerErrorCode.DUPLICATE_KEY)).toBe(409)
  })
})
