import { readFileSync } from 'node:fs';
import { parseDefinitionText } from '../src/parsing/definition-parser.js';
import { createFunctionRegistry } from '../src/expressions/functions.js';
import type { ParameterTable } from '../src/table/parameter-table.js';
import { SAMPLE_DEFINITIONS } from './fixture-paths.js';

export function loadSampleTable(): ParameterTable {
  return parseDefinitionText(readFileSync(SAMPLE_DEFINITIONS, 'utf8'), { filePath: SAMPLE_DEFINITIONS });
}

/** Acquisition time from time-domain size and spectral width in Hz. */
export const sampleFunctions = createFunctionRegistry({
  aqcalc: ([td, swh]) => td / (2 * swh),
});
