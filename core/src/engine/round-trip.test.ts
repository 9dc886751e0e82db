import { describe, expect, it } from 'vitest';
import { checkRoundTrip, withinTolerance } from './round-trip.js';
import { parseDefinitionText } from '../parsing/definition-parser.js';
import type { ValueLookup } from '../types.js';

const table = parseDefinitionText(
  [
    'T_NAME X',
    '  TYPE R32',
    '  REL "X=A*2"',
    '  INV_REL "A=X/2.0001"',
    'END',
    'T_NAME Y',
    '  TYPE R32',
    '  REL "Y=A+1"',
    'END',
  ].join('\n'),
);

const lookup: ValueLookup = (ref) => (ref.key === 'A' ? 10 : undefined);

describe('checkRoundTrip', () => {
  it('reports the raw value the inverse would write back', () => {
    const definition = table.get('X');
    expect(definition).toBeDefined();
    if (!definition) {
      return;
    }
    const result = checkRoundTrip(definition, lookup, { tolerance: 1e-9 });
    expect(result?.displayed).toBe(20);
    expect(result?.consistent).toBe(false);
    expect(result?.deviations).toHaveLength(1);
    expect(result?.deviations[0].key).toBe('A');
    expect(result?.deviations[0].actual).toBe(10);
    expect(result?.deviations[0].expected).toBeCloseTo(9.9995, 10);
  });

  it('accepts differences inside the tolerance', () => {
    const definition = table.get('X');
    if (!definition) {
      throw new Error('X is missing');
    }
    expect(checkRoundTrip(definition, lookup, { tolerance: 1e-3 })?.consistent).toBe(true);
  });

  it('returns undefined without an INV_REL', () => {
    const definition = table.get('Y');
    if (!definition) {
      throw new Error('Y is missing');
    }
    expect(checkRoundTrip(definition, lookup, { tolerance: 1e-9 })).toBeUndefined();
  });
});

describe('withinTolerance', () => {
  it('uses an absolute bound near zero and a relative one above 1', () => {
    expect(withinTolerance(0, 5e-10, 1e-9)).toBe(true);
    expect(withinTolerance(0, 2e-9, 1e-9)).toBe(false);
    expect(withinTolerance(1e6, 1e6 + 5e-4, 1e-9)).toBe(true);
    expect(withinTolerance(1e6, 1e6 + 1e-2, 1e-9)).toBe(false);
  });
});
