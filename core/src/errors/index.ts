/**
 * acqpar Error System
 *
 * - P (Parser): definition, acquisition and config file errors
 * - V (Validation): value and table validation errors
 * - E (Evaluation): relation evaluation errors
 * - R (Runtime): resolution and lookup errors
 * - W (Warnings): soft warnings across all layers
 */

export type { AcqparErrorOptions, ErrorCategory, ErrorLocation, ErrorSeverity } from './types.js';
export { AcqparError, CycleError, EvaluationError, ParseError, isAcqparError } from './types.js';

export {
  ParserErrorCode,
  ValidationErrorCode,
  EvaluationErrorCode,
  RuntimeErrorCode,
  WarningCode,
  ERROR_CODE_CATEGORIES,
  getErrorCategory,
  getErrorSeverity,
} from './codes.js';
export type {
  ParserErrorCodeValue,
  ValidationErrorCodeValue,
  EvaluationErrorCodeValue,
  RuntimeErrorCodeValue,
  WarningCodeValue,
  ErrorCode,
} from './codes.js';

export type { ValidationIssue, ValidationResult } from './helpers.js';
export {
  createParserError,
  createEvaluationError,
  createCycleError,
  createRuntimeError,
  createValidationIssue,
  createErrorIssue,
  createWarningIssue,
  buildValidationResult,
  formatError,
  formatValidationIssue,
} from './helpers.js';
