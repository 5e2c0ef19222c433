/**
 * Field helpers shared by the entity modules.
 *
 * Parse failures from the date collaborators surface as ValidationError naming
 * the wire field, so callers see which input was rejected.
 */

import { ParseError, ValidationError } from '../errors'
import { parseDueDate, parseInstantInput, type Instant, type LocalDate } from '../time-date'

export function hasOwn(obj: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key)
}

/** Non-blank text; the value is kept as given. */
export function requireText(value: string | null | undefined, field: string): string {
  if (value === null || value === undefined || value.trim().length === 0) {
    throw new ValidationError(`${field} is required`)
  }
  return value
}

function rethrowAsValidation(e: unknown, field: string): never {
  if (e instanceof ParseError) {
    throw new ValidationError(`Invalid ${field}: ${e.message}`)
  }
  throw e
}

export function instantField(value: string | null | undefined, field: string): Instant | null {
  try {
    return parseInstantInput(value)
  } catch (e) {
    rethrowAsValidation(e, field)
  }
}

export function dueDateField(value: string | null | undefined, field: string): LocalDate | null {
  try {
    return parseDueDate(value)
  } catch (e) {
    rethrowAsValidation(e, field)
  }
}
