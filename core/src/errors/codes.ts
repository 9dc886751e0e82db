/**
 * Unified error code constants for acqpar.
 *
 * Code format: {Category}{Number}
 * - P: Parser errors (P001-P099)
 * - V: Validation errors (V001-V099)
 * - E: Evaluation errors (E001-E099)
 * - R: Runtime errors (R001-R099)
 * - W: Warnings (W001-W099)
 */

// =============================================================================
// Parser Error Codes (P001-P099)
// =============================================================================

export const ParserErrorCode = {
  // P001-P009: Block Structure
  UNTERMINATED_BLOCK: 'P001',
  NESTED_BLOCK: 'P002',
  KEYWORD_OUTSIDE_BLOCK: 'P003',
  UNEXPECTED_END: 'P004',
  MISSING_IDENTIFIER: 'P005',
  DUPLICATE_PARAMETER: 'P006',
  FILE_LOAD_FAILED: 'P007',

  // P010-P019: Keywords
  UNKNOWN_KEYWORD: 'P010',
  DUPLICATE_KEYWORD: 'P011',
  KEYWORD_NOT_ALLOWED_IN_ALIAS: 'P012',
  MISSING_TYPE: 'P013',
  INVALID_TYPE: 'P014',
  UNEXPECTED_VALUE: 'P015',

  // P020-P029: Values
  INVALID_NUMBER: 'P020',
  INVALID_SUBRANGE: 'P021',
  INVALID_STRING: 'P022',
  MISSING_VALUE: 'P023',

  // P030-P039: Relation Expressions
  INVALID_EXPRESSION: 'P030',
  UNEXPECTED_TOKEN: 'P031',
  INVALID_ARRAY_INDEX: 'P032',
  INVALID_ASSIGNMENT_TARGET: 'P033',

  // P040-P049: Acquisition Files
  INVALID_JCAMP_ARRAY: 'P040',
  INVALID_DELAY_ENTRY: 'P041',

  // P050-P059: Engine Configuration
  INVALID_CONFIG_DOCUMENT: 'P050',
  INVALID_CONFIG_FIELD: 'P051',
  UNKNOWN_CONFIG_FIELD: 'P052',
} as const;

export type ParserErrorCodeValue = (typeof ParserErrorCode)[keyof typeof ParserErrorCode];

// =============================================================================
// Validation Error Codes (V001-V099)
// =============================================================================

export const ValidationErrorCode = {
  // V001-V009: Value Constraints
  VALUE_NOT_FINITE: 'V001',
  VALUE_BELOW_MINIMUM: 'V002',
  VALUE_ABOVE_MAXIMUM: 'V003',
  VALUE_NOT_INTEGER: 'V004',
  PARAMETER_NOT_EDITABLE: 'V005',
  UNKNOWN_PARAMETER: 'V006',

  // V010-V019: Table Structure
  UNREGISTERED_FUNCTION: 'V010',
  SELF_INVERSE_TARGET: 'V011',
} as const;

export type ValidationErrorCodeValue = (typeof ValidationErrorCode)[keyof typeof ValidationErrorCode];

// =============================================================================
// Evaluation Error Codes (E001-E099)
// =============================================================================

export const EvaluationErrorCode = {
  UNDEFINED_REFERENCE: 'E001',
  UNREGISTERED_FUNCTION: 'E002',
  DIVISION_BY_ZERO: 'E003',
  NON_FINITE_RESULT: 'E004',
  FUNCTION_FAILED: 'E005',
} as const;

export type EvaluationErrorCodeValue = (typeof EvaluationErrorCode)[keyof typeof EvaluationErrorCode];

// =============================================================================
// Runtime Error Codes (R001-R099)
// =============================================================================

export const RuntimeErrorCode = {
  // R001-R009: Resolution
  CYCLIC_DEPENDENCY: 'R001',
  CONFLICTING_INVERSE_TARGETS: 'R002',

  // R010-R019: Acquisition
  UNKNOWN_DSP_FIRMWARE: 'R010',
  UNKNOWN_DECIMATION: 'R011',
} as const;

export type RuntimeErrorCodeValue = (typeof RuntimeErrorCode)[keyof typeof RuntimeErrorCode];

// =============================================================================
// Warning Codes (W001-W099)
// =============================================================================

export const WarningCode = {
  MISSING_INVERSE_RELATION: 'W001',
  MISSING_FORWARD_RELATION: 'W002',
  INVERSE_TARGET_COLLISION: 'W003',
  UNREGISTERED_EXTERNAL_FUNCTION: 'W004',
  UNRENDERABLE_FORMAT: 'W005',
  UNREGISTERED_FUNCTION: 'W006',
} as const;

export type WarningCodeValue = (typeof WarningCode)[keyof typeof WarningCode];

// =============================================================================
// Combined Types
// =============================================================================

export type ErrorCode =
  | ParserErrorCodeValue
  | ValidationErrorCodeValue
  | EvaluationErrorCodeValue
  | RuntimeErrorCodeValue
  | WarningCodeValue;

/**
 * Maps error code prefixes to their categories.
 */
export const ERROR_CODE_CATEGORIES = {
  P: 'parser',
  V: 'validation',
  E: 'evaluation',
  R: 'runtime',
  W: 'validation',
} as const;

export type ErrorCategory = (typeof ERROR_CODE_CATEGORIES)[keyof typeof ERROR_CODE_CATEGORIES];

function isCategoryPrefix(prefix: string): prefix is keyof typeof ERROR_CODE_CATEGORIES {
  return prefix in ERROR_CODE_CATEGORIES;
}

/**
 * Gets the category for an error code.
 */
export function getErrorCategory(code: string): ErrorCategory {
  const prefix = code.charAt(0);
  return isCategoryPrefix(prefix) ? ERROR_CODE_CATEGORIES[prefix] : 'runtime';
}

/**
 * Gets the severity for an error code.
 */
export function getErrorSeverity(code: string): 'error' | 'warning' {
  return code.startsWith('W') ? 'warning' : 'error';
}
