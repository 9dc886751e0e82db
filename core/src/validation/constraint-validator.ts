/**
 * Constraint Validator
 *
 * Checks a candidate value against a definition's declared type and
 * inclusive subrange. Pure; never throws for a bad value.
 */

import type { ParameterDefinition } from '../types.js';
import { ValidationErrorCode, type ValidationErrorCodeValue } from '../errors/index.js';

export type ConstraintResult =
  | { valid: true }
  | { valid: false; code: ValidationErrorCodeValue; reason: string };

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

export function validateValue(definition: ParameterDefinition, value: number): ConstraintResult {
  if (!Number.isFinite(value)) {
    return {
      valid: false,
      code: ValidationErrorCode.VALUE_NOT_FINITE,
      reason: `${definition.name} must be a finite number.`,
    };
  }

  if ((definition.type === 'int32' || definition.type === 'enumerated') && !Number.isInteger(value)) {
    return {
      valid: false,
      code: ValidationErrorCode.VALUE_NOT_INTEGER,
      reason: `${definition.name} is ${definition.type} and cannot take ${value}.`,
    };
  }

  if ((definition.type === 'int32' || definition.type === 'enumerated') && (value < INT32_MIN || value > INT32_MAX)) {
    return {
      valid: false,
      code: value < INT32_MIN ? ValidationErrorCode.VALUE_BELOW_MINIMUM : ValidationErrorCode.VALUE_ABOVE_MAXIMUM,
      reason: `${definition.name} = ${value} does not fit in a 32-bit integer.`,
    };
  }

  const range = definition.subrange;
  if (range) {
    if (value < range.min) {
      return {
        valid: false,
        code: ValidationErrorCode.VALUE_BELOW_MINIMUM,
        reason: `${definition.name} = ${value} is below the minimum ${range.min}.`,
      };
    }
    if (value > range.max) {
      return {
        valid: false,
        code: ValidationErrorCode.VALUE_ABOVE_MAXIMUM,
        reason: `${definition.name} = ${value} is above the maximum ${range.max}.`,
      };
    }
  }

  return { valid: true };
}

export function isValidValue(definition: ParameterDefinition, value: number): boolean {
  return validateValue(definition, value).valid;
}
