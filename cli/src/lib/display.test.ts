import { beforeAll, describe, expect, it } from 'vitest';
import chalk from 'chalk';
import type { ResolutionPlan, UpdateReport } from '@acqpar/core';
import {
  displayDescribeResult,
  displayEvaluateResult,
  displayOrderResult,
  displayValidateResult,
  type OutputLogger,
} from './display.js';

function capture(): { logger: OutputLogger; lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    logger: {
      info: (message: string) => {
        lines.push(message);
      },
    },
  };
}

function emptyPlan(overrides: Partial<ResolutionPlan> = {}): ResolutionPlan {
  return { changed: [], inverse: [], settled: [], order: [], layers: [], ...overrides };
}

function emptyReport(overrides: Partial<UpdateReport> = {}): UpdateReport {
  return { plan: emptyPlan(), applied: [], inverse: [], recomputed: [], stale: [], ...overrides };
}

describe('display helpers', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('prints validation issues after the summary', () => {
    const { logger, lines } = capture();
    displayValidateResult(
      {
        valid: false,
        path: '/defs/acqu.par',
        parameterCount: 2,
        sections: ['Acquisition'],
        errors: [
          {
            code: 'V011',
            message: 'INV_REL of A assigns to A itself.',
            severity: 'error',
            location: { parameters: ['A'], context: 'INV_REL "A=A*2"' },
          },
        ],
        warnings: [],
      },
      logger,
    );
    expect(lines).toEqual([
      'Invalid /defs/acqu.par',
      '  Parameters: 2',
      '  Sections: Acquisition',
      'ERROR [V011]: INV_REL of A assigns to A itself.\n  Parameters: A\n  Context: INV_REL "A=A*2"',
    ]);
  });

  it('prints a load failure as-is', () => {
    const { logger, lines } = capture();
    displayValidateResult({ valid: false, path: '/defs/broken.par', error: '[P001] Block "SW" is missing END.' }, logger);
    expect(lines).toEqual(['Invalid definition file: /defs/broken.par', '[P001] Block "SW" is missing END.']);
  });

  it('lists parameters per section', () => {
    const { logger, lines } = capture();
    displayDescribeResult(
      {
        path: '/defs/acqu.par',
        parameterCount: 2,
        sections: [
          {
            label: 'Acquisition',
            parameters: [
              { name: 'd1', key: 'D[1]', kind: 'typed', type: 'real32', range: '0 .. 10', editable: true, rel: 'd1=D[1]' },
              { name: 'DW', key: 'DW', kind: 'typed', type: 'real32', unit: 'usec', editable: false },
            ],
          },
        ],
      },
      logger,
    );
    expect(lines).toEqual([
      'Definition file: /defs/acqu.par',
      'Parameters: 2',
      '',
      '=== Acquisition ===',
      '  • d1 (D[1]): real32, range 0 .. 10',
      '      REL     d1=D[1]',
      '  • DW: real32, unit usec, NONEDIT',
    ]);
  });

  it('prints the recompute plan layer by layer', () => {
    const { logger, lines } = capture();
    displayOrderResult(
      {
        path: '/defs/acqu.par',
        plan: emptyPlan({
          changed: ['SWH'],
          inverse: [{ parameter: 'SWH', targets: ['SW'] }],
          settled: ['SWH', 'SW'],
          order: ['DW', 'AQ'],
          layers: [['DW'], ['AQ']],
        }),
      },
      logger,
    );
    expect(lines).toEqual([
      'Changed: SWH',
      'Inverse relations:',
      '  • SWH → SW',
      'Recompute order:',
      '  Layer 0: DW',
      '  Layer 1: AQ',
    ]);
  });

  it('says so when nothing needs recomputing', () => {
    const { logger, lines } = capture();
    displayOrderResult({ path: '/defs/acqu.par', plan: emptyPlan({ changed: ['RG'], settled: ['RG'] }) }, logger);
    expect(lines).toEqual(['Changed: RG', 'Nothing to recompute.']);
  });

  it('prints evaluated values with stale markers and mismatches', () => {
    const { logger, lines } = capture();
    displayEvaluateResult(
      {
        path: '/defs/acqu.par',
        seeded: 1,
        initial: emptyReport(),
        update: emptyReport({
          applied: [{ key: 'SW', previous: 20, value: 0 }],
        }),
        parameters: [
          { name: 'SW', key: 'SW', section: 'Acquisition', value: 0, display: '0.0000 ppm', stale: false },
          { name: 'DW', key: 'DW', section: 'Acquisition', value: 62.5, display: '62.500 usec', stale: true },
          { name: 'RG', key: 'RG', section: 'Receiver', stale: false },
        ],
        stale: [{ key: 'DW', code: 'E003', reason: 'Division by zero.' }],
        roundTrips: [
          { parameter: 'D[3]', displayed: 4, consistent: false, deviations: [{ key: 'L[22]', expected: 4, actual: 3 }] },
        ],
      },
      logger,
    );
    expect(lines).toEqual([
      'Definition file: /defs/acqu.par',
      'Seeded 1 raw value',
      'Set SW = 0',
      '',
      '=== Acquisition ===',
      '  SW         0.0000 ppm',
      '  DW         62.500 usec [stale]',
      '',
      '=== Receiver ===',
      '  RG         (unset)',
      '',
      'Stale parameters:',
      '  • DW [E003]: Division by zero.',
      '',
      'REL / INV_REL mismatches:',
      '  • D[3]: L[22] is 3, INV_REL gives 4',
    ]);
  });
});
