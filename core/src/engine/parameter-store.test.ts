import { describe, expect, it } from 'vitest';
import { ParameterStore } from './parameter-store.js';
import { parseDefinitionText } from '../parsing/definition-parser.js';
import {
  AcqparError,
  CycleError,
  EvaluationErrorCode,
  ValidationErrorCode,
} from '../errors/index.js';
import { loadSampleTable, sampleFunctions } from '../../tests/sample-table.js';

function seededStore(values: Record<string, number> = { SW: 1000, SFO1: 400, TD: 65536, 'D[1]': 2 }) {
  const store = new ParameterStore(loadSampleTable(), { functions: sampleFunctions, initialValues: values });
  store.recomputeAll();
  return store;
}

function updateFailure(store: ParameterStore, changes: Record<string, number>): AcqparError {
  try {
    store.applyUpdate(changes);
  } catch (error) {
    if (error instanceof AcqparError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the update to be rejected');
}

describe('ParameterStore', () => {
  it('derives every REL parameter from loaded raw values', () => {
    const store = new ParameterStore(loadSampleTable(), {
      functions: sampleFunctions,
      initialValues: { SW: 1000, SFO1: 400, TD: 65536, 'D[1]': 2 },
    });
    const report = store.recomputeAll();
    expect(report.recomputed.map((change) => change.key)).toEqual(['SWH', 'DW', 'AQ', 'D[3]']);
    expect(store.get('SWH')).toBe(400000);
    expect(store.get('DW')).toBe(1.25);
    expect(store.get('AQ')).toBeCloseTo(0.08192, 12);
    expect(store.get('d3')).toBeCloseTo(1.91808, 12);
    expect(report.stale).toEqual([]);
  });

  it('propagates a raw edit to its dependents', () => {
    const store = seededStore();
    const report = store.applyUpdate({ SW: 2000 });
    expect(report.applied).toEqual([{ key: 'SW', previous: 1000, value: 2000 }]);
    expect(report.inverse).toEqual([]);
    expect(report.recomputed.map((change) => change.key)).toEqual(['SWH', 'DW', 'AQ', 'D[3]']);
    expect(store.get('SWH')).toBe(800000);
    expect(store.get('DW')).toBe(0.625);
    expect(store.get('AQ')).toBeCloseTo(0.04096, 12);
    expect(store.get('D[3]')).toBeCloseTo(1.95904, 12);
  });

  it('writes raw values back through INV_REL before recomputing', () => {
    const store = seededStore();
    const report = store.applyUpdate({ swh: 200000 });
    expect(report.inverse).toEqual([{ parameter: 'SWH', key: 'SW', previous: 1000, value: 500 }]);
    expect(store.get('SW')).toBe(500);
    expect(store.get('SWH')).toBe(200000);
    expect(store.get('DW')).toBe(2.5);
    expect(store.get('AQ')).toBeCloseTo(0.16384, 12);
  });

  it('accepts an in-range edit and rejects an out-of-range one', () => {
    const store = seededStore();
    const rejected = updateFailure(store, { SWH: -1 });
    expect(rejected.code).toBe(ValidationErrorCode.VALUE_BELOW_MINIMUM);
    expect(store.get('SWH')).toBe(400000);

    store.applyUpdate({ SWH: 500 });
    expect(store.get('SWH')).toBe(500);
    expect(store.get('SW')).toBe(1.25);
  });

  it('rejects edits to NONEDIT parameters without writing anything', () => {
    const store = seededStore();
    const error = updateFailure(store, { SW: 3000, DW: 3 });
    expect(error.code).toBe(ValidationErrorCode.PARAMETER_NOT_EDITABLE);
    expect(store.get('SW')).toBe(1000);
    expect(store.get('DW')).toBe(1.25);
  });

  it('rejects non-integer values for integer parameters', () => {
    expect(updateFailure(seededStore(), { TD: 1.5 }).code).toBe(ValidationErrorCode.VALUE_NOT_INTEGER);
  });

  it('rejects unknown names', () => {
    expect(updateFailure(seededStore(), { 'S W': 1 }).code).toBe(ValidationErrorCode.UNKNOWN_PARAMETER);
  });

  it('rejects an INV_REL result that violates the raw constraint', () => {
    const store = seededStore({ SW: 1000, SFO1: 1, TD: 65536, 'D[1]': 2 });
    const error = updateFailure(store, { SWH: 5e6 });
    expect(error.code).toBe(ValidationErrorCode.VALUE_ABOVE_MAXIMUM);
    expect(error.message).toBe('INV_REL of SWH produced an invalid value: SW = 5000000 is above the maximum 1000000.');
    expect(store.get('SWH')).toBe(1000);
  });

  it('keeps the last value and flags it stale when a computed value is out of range', () => {
    const store = seededStore();
    const report = store.applyUpdate({ d1: 0.01 });
    expect(report.stale.map((entry) => [entry.key, entry.code])).toEqual([
      ['D[3]', ValidationErrorCode.VALUE_BELOW_MINIMUM],
    ]);
    expect(store.get('D[1]')).toBe(0.01);
    expect(store.get('d3')).toBeCloseTo(1.91808, 12);
    expect(store.isStale('d3')).toBe(true);
  });

  it('flags parameters stale when their relation cannot be evaluated', () => {
    const warnings: string[] = [];
    const store = new ParameterStore(loadSampleTable(), {
      functions: sampleFunctions,
      initialValues: { SW: 1000, SFO1: 400, 'D[1]': 2 },
      logger: { warn: (message) => warnings.push(message) },
    });
    const report = store.recomputeAll();
    expect(report.stale.map((entry) => [entry.key, entry.code])).toEqual([
      ['AQ', EvaluationErrorCode.UNDEFINED_REFERENCE],
      ['D[3]', EvaluationErrorCode.UNDEFINED_REFERENCE],
    ]);
    expect(store.get('SWH')).toBe(400000);
    expect(store.get('AQ')).toBeUndefined();
    expect(warnings).toEqual([
      'Parameter AQ is stale: Reference "TD" has no value.',
      'Parameter D[3] is stale: Input AQ is stale.',
    ]);
  });

  it('keeps readers of a stale value stale instead of recomputing them', () => {
    const table = parseDefinitionText(
      'T_NAME TD\n  TYPE I32\nEND\n' +
        'T_NAME AQ\n  TYPE R32\n  REL "AQ=aqcalc(TD)"\nEND\n' +
        'T_NAME Z\n  TYPE R32\n  REL "Z=AQ*2"\nEND\n',
    );
    const store = new ParameterStore(table, { initialValues: { TD: 1, AQ: 5, Z: 10 } });
    const report = store.applyUpdate({ TD: 2 });
    expect(report.stale).toEqual([
      { key: 'AQ', code: EvaluationErrorCode.UNREGISTERED_FUNCTION, reason: expect.any(String) },
      { key: 'Z', code: EvaluationErrorCode.UNREGISTERED_FUNCTION, reason: 'Input AQ is stale.' },
    ]);
    expect(report.recomputed).toEqual([]);
    expect(store.get('AQ')).toBe(5);
    expect(store.get('Z')).toBe(10);
    expect(store.isStale('Z')).toBe(true);
  });

  it('rejects an update when a relation reads its own result', () => {
    const table = parseDefinitionText('T_NAME Y\n  TYPE R32\nEND\nT_NAME X\n  TYPE R32\n  REL "X = X * 2 + Y"\nEND\n');
    const store = new ParameterStore(table, { initialValues: { X: 3, Y: 1 } });
    expect(() => store.applyUpdate({ Y: 0 })).toThrow(CycleError);
    expect(store.snapshot()).toEqual({ X: 3, Y: 1 });
  });

  it('clears a stale flag once the value can be computed', () => {
    const store = seededStore({ SW: 1000, SFO1: 400, 'D[1]': 2 });
    expect(store.isStale('AQ')).toBe(true);
    store.applyUpdate({ TD: 32768 });
    expect(store.isStale('AQ')).toBe(false);
    expect(store.staleEntries()).toEqual([]);
    expect(store.get('AQ')).toBeCloseTo(0.04096, 12);
  });

  it('flags INV_REL targets stale when the inverse cannot be evaluated', () => {
    const store = new ParameterStore(loadSampleTable(), { functions: sampleFunctions, initialValues: { SW: 1000 } });
    const report = store.applyUpdate({ SWH: 100 });
    expect(report.inverse).toEqual([]);
    expect(report.stale[0]).toMatchObject({ key: 'SW', code: EvaluationErrorCode.UNDEFINED_REFERENCE });
    expect(store.get('SW')).toBe(1000);
    expect(store.get('SWH')).toBe(100);
  });

  it('leaves values untouched when the update hits a cycle', () => {
    const table = parseDefinitionText(
      'T_NAME X\n  TYPE R32\n  REL "X=Y+C"\nEND\nT_NAME Y\n  TYPE R32\n  REL "Y=X*2"\nEND\n',
    );
    const store = new ParameterStore(table, { initialValues: { C: 1, X: 1, Y: 2 } });
    expect(() => store.applyUpdate({ C: 5 })).toThrow(CycleError);
    expect(store.snapshot()).toEqual({ C: 1, X: 1, Y: 2 });
  });

  it('hands out frozen snapshots', () => {
    const store = seededStore();
    const snapshot = store.snapshot();
    expect(Object.isFrozen(snapshot)).toBe(true);
    store.applyUpdate({ SW: 2000 });
    expect(snapshot.SW).toBe(1000);
  });

  it('checks REL and INV_REL round trips', () => {
    const store = seededStore();
    const results = store.checkRoundTrips();
    expect(results.map((result) => [result.parameter, result.consistent])).toEqual([
      ['SWH', true],
      ['D[1]', true],
      ['D[3]', false],
    ]);
    expect(results[0].displayed).toBe(400000);
    expect(results[2].deviations.map((deviation) => deviation.key)).toEqual(['D[0]']);
  });
});
