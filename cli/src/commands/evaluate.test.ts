import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ValidationErrorCode } from '@acqpar/core';
import { runEvaluate } from './evaluate.js';
import {
  ACQUS,
  createTempWorkspace,
  DEFINITIONS,
  testConfig,
  VDLIST,
  type TempWorkspace,
} from './__testutils__/fixtures.js';

describe('runEvaluate', () => {
  let workspace: TempWorkspace;
  let definitionPath: string;
  let acqusPath: string;
  let vdlistPath: string;

  beforeEach(async () => {
    workspace = await createTempWorkspace('acqpar-evaluate-');
    definitionPath = await workspace.write('acqu.par', DEFINITIONS);
    acqusPath = await workspace.write('acqus', ACQUS);
    vdlistPath = await workspace.write('vdlist', VDLIST);
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  it('derives displayed values from acqus and the delay list', async () => {
    const result = await runEvaluate({ definitionPath, acqusPath, vdlistPath, assignments: [], config: testConfig() });
    expect(result.seeded).toBe(9);
    expect(result.update).toBeUndefined();
    expect(result.initial.recomputed.map((change) => change.key)).toEqual(['SWH', 'DW', 'DLY']);
    expect(result.parameters.map((parameter) => [parameter.name, parameter.display])).toEqual([
      ['SW', '20.0000 ppm'],
      ['SFO1', '400.0000000 MHz'],
      ['SWH', '8000.00 Hz'],
      ['DW', '62.500 usec'],
      ['d1', '2.00000000 sec'],
      ['DLY', '0.02'],
      ['RG', '101.0'],
    ]);
    expect(result.stale).toEqual([]);
    expect(result.roundTrips.map((check) => [check.parameter, check.consistent])).toEqual([
      ['SWH', true],
      ['D[1]', true],
    ]);
  });

  it('applies --set updates through INV_REL', async () => {
    const result = await runEvaluate({
      definitionPath,
      acqusPath,
      assignments: ['SWH=4000'],
      config: testConfig(),
    });
    expect(result.update?.inverse).toEqual([{ parameter: 'SWH', key: 'SW', previous: 20, value: 10 }]);
    const byName = new Map(result.parameters.map((parameter) => [parameter.name, parameter]));
    expect(byName.get('SW')?.value).toBe(10);
    expect(byName.get('DW')?.display).toBe('125.000 usec');
  });

  it('leaves relations unevaluated when none of their inputs are loaded', async () => {
    const result = await runEvaluate({ definitionPath, acqusPath, assignments: [], config: testConfig() });
    const dly = result.parameters.find((parameter) => parameter.name === 'DLY');
    expect(dly).toEqual({ name: 'DLY', key: 'DLY', section: 'Acquisition', value: undefined, display: undefined, stale: false });
  });

  it('flags a relation that fails to evaluate as stale', async () => {
    const result = await runEvaluate({ definitionPath, acqusPath, assignments: ['SW=0'], config: testConfig() });
    expect(result.stale.map((entry) => [entry.key, entry.code])).toEqual([['DW', 'E003']]);
    const byName = new Map(result.parameters.map((parameter) => [parameter.name, parameter]));
    expect(byName.get('SWH')?.value).toBe(0);
    expect(byName.get('DW')).toMatchObject({ value: 62.5, stale: true });
  });

  it('rejects an edit to a NONEDIT parameter', async () => {
    await expect(
      runEvaluate({ definitionPath, acqusPath, assignments: ['DW=5'], config: testConfig() }),
    ).rejects.toMatchObject({ code: ValidationErrorCode.PARAMETER_NOT_EDITABLE });
  });
});
