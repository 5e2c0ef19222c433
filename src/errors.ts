/**
 * Consolidated error system for the planner.
 *
 * All error classes extend PlannerError, which carries a typed error code.
 * The HTTP layer maps codes to status codes; nothing else inspects messages.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const PlannerErrorCode = {
  // Record store
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  NOT_FOUND: 'NOT_FOUND',
  INVALID_DATA: 'INVALID_DATA',

  // Domain input
  VALIDATION: 'VALIDATION',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',
} as const

export type PlannerErrorCode = (typeof PlannerErrorCode)[keyof typeof PlannerErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class PlannerError extends Error {
  readonly code: PlannerErrorCode

  constructor(code: PlannerErrorCode, message: string) {
    super(message)
    this.name = 'PlannerError'
    this.code = code
  }
}

// ============================================================================
// Record Store Errors
// ============================================================================

export class DuplicateKeyError extends PlannerError {
  constructor(message: string) {
    super(PlannerErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}

export class NotFoundError extends PlannerError {
  constructor(message: string) {
    super(PlannerErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class InvalidDataError extends PlannerError {
  constructor(message: string) {
    super(PlannerErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}

// ============================================================================
// Domain Errors
// ============================================================================

export class ValidationError extends PlannerError {
  constructor(message: string) {
    super(PlannerErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends PlannerError {
  constructor(message: string) {
    super(PlannerErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

export function isPlannerError(e: unknown): e is PlannerError {
  return e instanceof PlannerError
}
