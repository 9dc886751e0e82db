import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { EngineConfig } from '@acqpar/core';

export const DEFINITIONS = [
  'HEADER "Acquisition"',
  'T_NAME SW',
  '  TYPE R32',
  '  SUBRANGE 0 1000000',
  '  UNIT "ppm"',
  '  FORMAT "%14.4f ppm"',
  'END',
  'T_NAME SFO1',
  '  TYPE R32',
  '  SUBRANGE 1 2000',
  '  FORMAT "%14.7f MHz"',
  'END',
  'T_NAME SWH',
  '  TYPE R32',
  '  SUBRANGE 0 1e8',
  '  REL "SWH=SW*SFO1"',
  '  INV_REL "SW=SWH/SFO1"',
  '  FORMAT "%14.2f Hz"',
  'END',
  'T_NAME DW',
  '  TYPE R32',
  '  REL "DW=1000000/(2*SW*SFO1)"',
  '  FORMAT "%14.3f usec"',
  '  NONEDIT',
  'END',
  'T_NAME d1',
  '  TYPE R32',
  '  SUBRANGE 0 1e38',
  '  REL "d1=D[1]"',
  '  INV_REL "D[1]=d1"',
  '  FORMAT "%14.8f sec"',
  'END',
  'T_NAME DLY',
  '  TYPE R32',
  '  REL "DLY=VD[0]*2"',
  '  NONEDIT',
  'END',
  'HEADER "Receiver"',
  'NAME RG',
  '  FORMAT "%14.1f"',
  '  TEXT "receiver gain"',
  'END',
  '',
].join('\n');

export const ACQUS = [
  '##TITLE= test parameters',
  '##$D= (0..3)',
  '0 2.0 0 0',
  '##$RG= 101',
  '##$SFO1= 400.0',
  '##$SW= 20.0',
  '##END=',
  '',
].join('\n');

export const VDLIST = '10m\n20m\n';

export function testConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return { arrayNames: ['D', 'L', 'P', 'PL'], tolerance: 1e-9, strictFunctions: false, ...overrides };
}

export interface TempWorkspace {
  dir: string;
  write(name: string, contents: string): Promise<string>;
  cleanup(): Promise<void>;
}

export async function createTempWorkspace(prefix: string): Promise<TempWorkspace> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  return {
    dir,
    async write(name, contents) {
      const path = join(dir, name);
      await writeFile(path, contents, 'utf8');
      return path;
    },
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}
