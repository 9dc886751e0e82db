import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { createParserError, ParserErrorCode } from '../errors/index.js';
import { parseJcampParameters, type JcampParameters } from './jcamp.js';
import { parseVariableDelayList } from './vdlist.js';

async function readText(filePath: string, label: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    throw createParserError(
      ParserErrorCode.FILE_LOAD_FAILED,
      `Could not read ${label}: ${error instanceof Error ? error.message : String(error)}`,
      { filePath, cause: error },
    );
  }
}

export async function loadAcquisitionFile(filePath: string): Promise<JcampParameters> {
  const absolute = resolve(filePath);
  return parseJcampParameters(await readText(absolute, 'acquisition parameters'), absolute);
}

export async function loadVariableDelayList(filePath: string): Promise<number[]> {
  const absolute = resolve(filePath);
  return parseVariableDelayList(await readText(absolute, 'variable delay list'), absolute);
}
