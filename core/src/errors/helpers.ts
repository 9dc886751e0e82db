/**
 * Error creation helpers for the acqpar error system.
 *
 * Provides factory functions for creating structured errors with
 * consistent formatting across all error categories.
 */

import {
  AcqparError,
  CycleError,
  EvaluationError,
  ParseError,
  type ErrorLocation,
  type ErrorSeverity,
} from './types.js';

/**
 * Creates a parser error (P-code).
 */
export function createParserError(
  code: string,
  message: string,
  options: {
    filePath?: string;
    block?: string;
    line?: number;
    context?: string;
    suggestion?: string;
    cause?: unknown;
  } = {},
): ParseError {
  return new ParseError(code, message, {
    location: {
      filePath: options.filePath,
      block: options.block,
      line: options.line,
      context: options.context,
    },
    suggestion: options.suggestion,
    cause: options.cause,
  });
}

/**
 * Creates an evaluation error (E-code).
 */
export function createEvaluationError(
  code: string,
  message: string,
  options: {
    subject?: string;
    block?: string;
    context?: string;
    suggestion?: string;
    cause?: unknown;
  } = {},
): EvaluationError {
  return new EvaluationError(code, message, {
    subject: options.subject,
    location: {
      block: options.block,
      context: options.context,
    },
    suggestion: options.suggestion,
    cause: options.cause,
  });
}

/**
 * Creates a cycle error (R-code).
 */
export function createCycleError(code: string, cycle: string[]): CycleError {
  return new CycleError(code, `Circular relation dependency: ${cycle.join(' -> ')}`, cycle, {
    location: { block: cycle[0], context: 'relation graph' },
    suggestion: 'Break the loop by removing one REL, or edit one of these parameters in the same update.',
  });
}

/**
 * Creates a runtime error (R-code).
 */
export function createRuntimeError(
  code: string,
  message: string,
  options: {
    filePath?: string;
    block?: string;
    context?: string;
    suggestion?: string;
    cause?: unknown;
  } = {},
): AcqparError {
  return new AcqparError(code, message, {
    location: {
      filePath: options.filePath,
      block: options.block,
      context: options.context,
    },
    suggestion: options.suggestion,
    cause: options.cause,
  });
}

// =============================================================================
// Validation Issue Types
// =============================================================================

/**
 * A single validation issue (error or warning).
 */
export interface ValidationIssue {
  /** Unique error code for programmatic handling (e.g., "V010", "W003") */
  code: string;
  /** Human-readable error message */
  message: string;
  severity: ErrorSeverity;
  location: {
    filePath?: string;
    /** Parameter names involved, in table order */
    parameters: string[];
    context: string;
  };
  suggestion?: string;
}

/**
 * Result of validating a parameter table.
 */
export interface ValidationResult {
  /** True if there are no hard errors (warnings are allowed) */
  valid: boolean;
  issues: ValidationIssue[];
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

export function createValidationIssue(
  code: string,
  message: string,
  severity: ErrorSeverity,
  location: ValidationIssue['location'],
  suggestion?: string,
): ValidationIssue {
  return {
    code,
    message,
    severity,
    location,
    suggestion,
  };
}

export function createErrorIssue(
  code: string,
  message: string,
  location: ValidationIssue['location'],
  suggestion?: string,
): ValidationIssue {
  return createValidationIssue(code, message, 'error', location, suggestion);
}

export function createWarningIssue(
  code: string,
  message: string,
  location: ValidationIssue['location'],
  suggestion?: string,
): ValidationIssue {
  return createValidationIssue(code, message, 'warning', location, suggestion);
}

/**
 * Builds a ValidationResult from a list of issues.
 */
export function buildValidationResult(issues: ValidationIssue[]): ValidationResult {
  const errors = issues.filter((i) => i.severity === 'error');
  const warnings = issues.filter((i) => i.severity === 'warning');

  return {
    valid: errors.length === 0,
    issues,
    errors,
    warnings,
  };
}

// =============================================================================
// Error Formatting
// =============================================================================

function formatLocation(location: ErrorLocation): string[] {
  const parts: string[] = [];
  if (location.filePath) {
    parts.push(
      location.line !== undefined
        ? `  File: ${location.filePath}:${location.line}`
        : `  File: ${location.filePath}`,
    );
  } else if (location.line !== undefined) {
    parts.push(`  Line: ${location.line}`);
  }
  if (location.block) {
    parts.push(`  Block: ${location.block}`);
  }
  if (location.context) {
    parts.push(`  Context: ${location.context}`);
  }
  return parts;
}

/**
 * Formats an AcqparError for display.
 */
export function formatError(error: AcqparError): string {
  const parts: string[] = [`[${error.code}] ${error.message}`];
  if (error.location) {
    parts.push(...formatLocation(error.location));
  }
  if (error.suggestion) {
    parts.push(`  Suggestion: ${error.suggestion}`);
  }
  return parts.join('\n');
}

/**
 * Formats a ValidationIssue for display.
 */
export function formatValidationIssue(issue: ValidationIssue): string {
  const prefix = issue.severity === 'error' ? 'ERROR' : 'WARNING';
  const parts: string[] = [`${prefix} [${issue.code}]: ${issue.message}`];

  if (issue.location.filePath) {
    parts.push(`  File: ${issue.location.filePath}`);
  }
  if (issue.location.parameters.length > 0) {
    parts.push(`  Parameters: ${issue.location.parameters.join(', ')}`);
  }
  if (issue.location.context) {
    parts.push(`  Context: ${issue.location.context}`);
  }
  if (issue.suggestion) {
    parts.push(`  Suggestion: ${issue.suggestion}`);
  }

  return parts.join('\n');
}
