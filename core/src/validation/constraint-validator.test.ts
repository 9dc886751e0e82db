import { describe, expect, it } from 'vitest';
import { isValidValue, validateValue } from './constraint-validator.js';
import { ValidationErrorCode } from '../errors/index.js';
import type { ParameterDefinition } from '../types.js';

const swh: ParameterDefinition = {
  name: 'SWH',
  key: 'SWH',
  kind: 'typed',
  type: 'real32',
  subrange: { min: 0, max: 1e8 },
  editable: true,
};

const td: ParameterDefinition = {
  name: 'TD',
  key: 'TD',
  kind: 'typed',
  type: 'int32',
  subrange: { min: 1, max: 2147483647 },
  editable: true,
};

const digmod: ParameterDefinition = {
  name: 'DIGMOD',
  key: 'DIGMOD',
  kind: 'typed',
  type: 'enumerated',
  subrange: { min: 0, max: 3 },
  editable: true,
};

describe('validateValue', () => {
  it('accepts values inside the inclusive range', () => {
    expect(validateValue(swh, 0)).toEqual({ valid: true });
    expect(validateValue(swh, 500)).toEqual({ valid: true });
    expect(validateValue(swh, 1e8)).toEqual({ valid: true });
  });

  it('rejects values below the minimum', () => {
    expect(validateValue(swh, -1)).toEqual({
      valid: false,
      code: ValidationErrorCode.VALUE_BELOW_MINIMUM,
      reason: 'SWH = -1 is below the minimum 0.',
    });
  });

  it('rejects values above the maximum', () => {
    const result = validateValue(td, 2147483648);
    expect(result.valid).toBe(false);
    expect(result.valid ? undefined : result.code).toBe(ValidationErrorCode.VALUE_ABOVE_MAXIMUM);
  });

  it('rejects non-finite values before anything else', () => {
    for (const value of [Number.NaN, Number.POSITIVE_INFINITY]) {
      const result = validateValue(swh, value);
      expect(result.valid ? undefined : result.code).toBe(ValidationErrorCode.VALUE_NOT_FINITE);
    }
  });

  it('requires integers for int32 and enumerated types', () => {
    const result = validateValue(td, 1.5);
    expect(result.valid ? undefined : result.code).toBe(ValidationErrorCode.VALUE_NOT_INTEGER);
    expect(isValidValue(digmod, 2)).toBe(true);
    expect(isValidValue(digmod, 2.5)).toBe(false);
    expect(isValidValue(digmod, 4)).toBe(false);
  });

  it('holds int32 values to 32 bits when there is no SUBRANGE', () => {
    const ns: ParameterDefinition = { name: 'NS', key: 'NS', kind: 'typed', type: 'int32', editable: true };
    expect(validateValue(ns, 2 ** 40)).toEqual({
      valid: false,
      code: ValidationErrorCode.VALUE_ABOVE_MAXIMUM,
      reason: 'NS = 1099511627776 does not fit in a 32-bit integer.',
    });
    const below = validateValue(ns, -(2 ** 40));
    expect(below.valid ? undefined : below.code).toBe(ValidationErrorCode.VALUE_BELOW_MINIMUM);
    expect(validateValue(ns, 2147483647)).toEqual({ valid: true });
    expect(validateValue(ns, -2147483648)).toEqual({ valid: true });
  });

  it('accepts any finite number when there is no type or range', () => {
    const alias: ParameterDefinition = { name: 'RG', key: 'RG', kind: 'alias', editable: true };
    expect(isValidValue(alias, -1e30)).toBe(true);
  });
});
