import { readFileSync } from 'node:fs';
import { describe, expect, it } from 'vitest';
import { parseDefinitionText } from './definition-parser.js';
import { serializeDefinition, serializeParameterTable } from './definition-serializer.js';
import { SAMPLE_DEFINITIONS } from '../../tests/fixture-paths.js';

describe('serializeParameterTable', () => {
  it('re-parses to identical definitions', () => {
    const table = parseDefinitionText(readFileSync(SAMPLE_DEFINITIONS, 'utf8'));
    const reparsed = parseDefinitionText(serializeParameterTable(table));
    expect(reparsed.list()).toEqual(table.list());
  });

  it('round-trips escapes, quoted classes and aliases', () => {
    const text = [
      'HEADER "Odd values"',
      'T_NAME cnst',
      '  TYPE ENUM',
      '  CLASS "ACQU EXT"',
      '  SUBRANGE -1.5 2e-3',
      '  TEXT "path C:\\\\data and \\"quotes\\""',
      '  NONEDIT',
      'END',
      'NAME ns',
      '  UNIT ""',
      'END',
      '',
    ].join('\n');
    const table = parseDefinitionText(text);
    expect(parseDefinitionText(serializeParameterTable(table)).list()).toEqual(table.list());
  });

  it('writes a HEADER only where the section changes', () => {
    const table = parseDefinitionText(
      'HEADER "A"\nNAME X\nEND\nNAME Y\nEND\nHEADER "B"\nNAME Z\nEND\n',
    );
    expect(serializeParameterTable(table)).toBe(
      ['HEADER\t\t"A"', 'NAME\t\tX', 'END', 'NAME\t\tY', 'END', 'HEADER\t\t"B"', 'NAME\t\tZ', 'END', ''].join('\n'),
    );
  });
});

describe('serializeDefinition', () => {
  it('writes keywords in canonical order', () => {
    const table = parseDefinitionText(readFileSync(SAMPLE_DEFINITIONS, 'utf8'));
    const swh = table.get('SWH');
    expect(swh).toBeDefined();
    if (!swh) {
      return;
    }
    expect(serializeDefinition(swh)).toBe(
      [
        'T_NAME\t\tSWH',
        '\t\tTYPE\tR32',
        '\t\tCLASS\tACQU',
        '\t\tSUBRANGE\t0 100000000',
        '\t\tREL\t"SWH=SW*SFO1"',
        '\t\tINV_REL\t"SW=SWH/SFO1"',
        '\t\tUNIT\t"Hz"',
        '\t\tFORMAT\t"%14.2f Hz"',
        '\t\tTEXT\t"spectral width in Hz"',
        'END',
      ].join('\n'),
    );
  });
});
