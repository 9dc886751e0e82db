/**
 * Shared error types for the acqpar error system.
 *
 * Every failure raised by the library is an {@link AcqparError} carrying a
 * code from `codes.ts`. The three failure classes callers usually need to
 * tell apart have their own subclasses:
 * - ParseError: the definition file (or an acquisition file) is malformed
 * - EvaluationError: a relation could not be computed
 * - CycleError: relations depend on each other in a loop
 */

import { getErrorCategory, getErrorSeverity, type ErrorCategory } from './codes.js';

export type { ErrorCategory };

/**
 * Severity level for issues.
 */
export type ErrorSeverity = 'error' | 'warning';

/**
 * Location information for an error.
 */
export interface ErrorLocation {
  /** File path where the error occurred */
  filePath?: string;
  /** Parameter block name (e.g., "SWH") */
  block?: string;
  /** 1-based line number in the source text */
  line?: number;
  /** Element context (e.g., "REL of SWH", "keyword SUBRANGE") */
  context?: string;
}

export interface AcqparErrorOptions {
  location?: ErrorLocation;
  suggestion?: string;
  cause?: unknown;
}

/**
 * Base class for all acqpar errors.
 */
export class AcqparError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly location?: ErrorLocation;
  readonly suggestion?: string;

  constructor(code: string, message: string, options: AcqparErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'AcqparError';
    this.code = code;
    this.category = getErrorCategory(code);
    this.severity = getErrorSeverity(code);
    this.location = options.location;
    this.suggestion = options.suggestion;
  }
}

export class ParseError extends AcqparError {
  constructor(code: string, message: string, options: AcqparErrorOptions = {}) {
    super(code, message, options);
    this.name = 'ParseError';
  }
}

export class EvaluationError extends AcqparError {
  /** Canonical key of the reference or function that failed, when known */
  readonly subject?: string;

  constructor(code: string, message: string, options: AcqparErrorOptions & { subject?: string } = {}) {
    super(code, message, options);
    this.name = 'EvaluationError';
    this.subject = options.subject;
  }
}

export class CycleError extends AcqparError {
  /** Keys along the cycle, first key repeated at the end */
  readonly cycle: string[];

  constructor(code: string, message: string, cycle: string[], options: AcqparErrorOptions = {}) {
    super(code, message, options);
    this.name = 'CycleError';
    this.cycle = cycle;
  }
}

/**
 * Type guard to check if an error is an AcqparError.
 */
export function isAcqparError(error: unknown): error is AcqparError {
  return error instanceof AcqparError;
}
