/**
 * Consolidated error system for japan-holiday-rules.
 *
 * All error classes extend HolidayRulesError, which carries a typed error code.
 * Modules re-export the classes they throw so their import paths stay local.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const HolidayRulesErrorCode = {
  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',

  // Rule construction
  INVALID_RULE: 'INVALID_RULE',

  // Resolution engine
  RECURSIVE_LOOKUP: 'RECURSIVE_LOOKUP',
} as const

export type HolidayRulesErrorCode = (typeof HolidayRulesErrorCode)[keyof typeof HolidayRulesErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class HolidayRulesError extends Error {
  readonly code: HolidayRulesErrorCode

  constructor(code: HolidayRulesErrorCode, message: string) {
    super(message)
    this.name = 'HolidayRulesError'
    this.code = code
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends HolidayRulesError {
  constructor(message: string) {
    super(HolidayRulesErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Rule Errors
// ============================================================================

export class InvalidRuleError extends HolidayRulesError {
  constructor(message: string) {
    super(HolidayRulesErrorCode.INVALID_RULE, message)
    this.name = 'InvalidRuleError'
  }
}

// ============================================================================
// Engine Errors
// ============================================================================

/**
 * Thrown when a computed predicate evaluated during a holiday-only pass
 * asks for another lookup. Only substitute and national rules may query
 * neighbouring dates.
 */
export class RecursiveLookupError extends HolidayRulesError {
  constructor(message: string) {
    super(HolidayRulesErrorCode.RECURSIVE_LOOKUP, message)
    this.name = 'RecursiveLookupError'
  }
}
