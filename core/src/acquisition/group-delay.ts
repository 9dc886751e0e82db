import { readFileSync } from 'node:fs';
import { createRuntimeError, RuntimeErrorCode } from '../errors/index.js';
import { createFunctionRegistry, type FunctionRegistry } from '../expressions/functions.js';

type GroupDelayTable = Map<number, Map<number, number>>;

const TABLE_URL = new URL('../../data/group-delay.json', import.meta.url);

let cachedTable: GroupDelayTable | undefined;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadGroupDelayTable(): GroupDelayTable {
  if (cachedTable) {
    return cachedTable;
  }
  const raw: unknown = JSON.parse(readFileSync(TABLE_URL, 'utf8'));
  if (!isRecord(raw)) {
    throw new Error('Group delay table must be a JSON object.');
  }
  const table: GroupDelayTable = new Map();
  for (const [firmware, entries] of Object.entries(raw)) {
    if (!isRecord(entries)) {
      throw new Error(`Group delay table entry ${firmware} must be an object.`);
    }
    const byDecimation = new Map<number, number>();
    for (const [decimation, delay] of Object.entries(entries)) {
      if (typeof delay !== 'number') {
        throw new Error(`Group delay for DSPFVS ${firmware}, DECIM ${decimation} must be a number.`);
      }
      byDecimation.set(Number(decimation), delay);
    }
    table.set(Number(firmware), byDecimation);
  }
  cachedTable = table;
  return table;
}

/** DSPFVS firmware versions with a known group delay table. */
export function supportedFirmwareVersions(): number[] {
  return Array.from(loadGroupDelayTable().keys()).sort((a, b) => a - b);
}

/**
 * Digital filter group delay, in points, for a decimation factor (DECIM) and
 * DSP firmware version (DSPFVS). No decimation means no delay.
 */
export function groupDelay(decim: number, dspfvs: number): number {
  if (decim === 1) {
    return 0;
  }
  const byDecimation = loadGroupDelayTable().get(dspfvs);
  if (!byDecimation) {
    throw createRuntimeError(RuntimeErrorCode.UNKNOWN_DSP_FIRMWARE, `No group delay table for DSPFVS ${dspfvs}.`, {
      context: 'group delay',
      suggestion: `Supported firmware versions: ${supportedFirmwareVersions().join(', ')}.`,
    });
  }
  const delay = byDecimation.get(Math.trunc(decim));
  if (delay === undefined) {
    throw createRuntimeError(
      RuntimeErrorCode.UNKNOWN_DECIMATION,
      `No group delay for DECIM ${decim} with DSPFVS ${dspfvs}.`,
      { context: 'group delay' },
    );
  }
  return delay;
}

/**
 * Functions derived from acquisition hardware constants, ready to merge into
 * a relation function registry.
 */
export const acquisitionFunctions: FunctionRegistry = createFunctionRegistry({
  grpdly: (args) => {
    if (args.length !== 2) {
      throw new Error(`expected 2 arguments (decim, dspfvs), received ${args.length}`);
    }
    return groupDelay(args[0], args[1]);
  },
});
