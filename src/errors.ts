/**
 * Consolidated error system for the visit planner.
 *
 * All error classes extend VisitPlannerError, which carries a typed error code.
 * Modules re-export the classes they throw so callers can import them from
 * wherever they call.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const VisitPlannerErrorCode = {
  // Adapter layer
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  NOT_FOUND: 'NOT_FOUND',
  FOREIGN_KEY: 'FOREIGN_KEY',
  INVALID_DATA: 'INVALID_DATA',

  // Domain rules
  VALIDATION: 'VALIDATION',
  INVALID_STATE: 'INVALID_STATE',
  OUT_OF_RANGE: 'OUT_OF_RANGE',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',
} as const

export type VisitPlannerErrorCode = (typeof VisitPlannerErrorCode)[keyof typeof VisitPlannerErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class VisitPlannerError extends Error {
  readonly code: VisitPlannerErrorCode

  constructor(code: VisitPlannerErrorCode, message: string) {
    super(message)
    this.name = 'VisitPlannerError'
    this.code = code
  }
}

// ============================================================================
// Adapter Errors
// ============================================================================

export class DuplicateKeyError extends VisitPlannerError {
  constructor(message: string) {
    super(VisitPlannerErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}

export class NotFoundError extends VisitPlannerError {
  constructor(message: string) {
    super(VisitPlannerErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class ForeignKeyError extends VisitPlannerError {
  constructor(message: string) {
    super(VisitPlannerErrorCode.FOREIGN_KEY, message)
    this.name = 'ForeignKeyError'
  }
}

export class InvalidDataError extends VisitPlannerError {
  constructor(message: string) {
    super(VisitPlannerErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}

// ============================================================================
// Domain Errors
// ============================================================================

export class ValidationError extends VisitPlannerError {
  constructor(message: string) {
    super(VisitPlannerErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

/** Operation not allowed in the record's current lifecycle state */
export class InvalidStateError extends VisitPlannerError {
  constructor(message: string) {
    super(VisitPlannerErrorCode.INVALID_STATE, message)
    this.name = 'InvalidStateError'
  }
}

/** Month outside the contract's start..end months */
export class OutOfRangeError extends VisitPlannerError {
  constructor(message: string) {
    super(VisitPlannerErrorCode.OUT_OF_RANGE, message)
    this.name = 'OutOfRangeError'
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends VisitPlannerError {
  constructor(message: string) {
    super(VisitPlannerErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}
