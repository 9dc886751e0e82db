import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { ParameterTable } from '../table/parameter-table.js';
import { createParserError, ParserErrorCode } from '../errors/index.js';
import { parseDefinitionText, type DefinitionParseOptions } from './definition-parser.js';

export interface DefinitionResourceReader {
  readFile(filePath: string): Promise<string>;
}

class NodeFilesystemReader implements DefinitionResourceReader {
  async readFile(filePath: string): Promise<string> {
    return readFile(filePath, 'utf8');
  }
}

const defaultReader = new NodeFilesystemReader();

export interface DefinitionLoadOptions extends Omit<DefinitionParseOptions, 'filePath'> {
  reader?: DefinitionResourceReader;
}

/**
 * Reads and parses a definition file from disk.
 */
export async function loadDefinitionFile(
  filePath: string,
  options: DefinitionLoadOptions = {},
): Promise<ParameterTable> {
  const reader = options.reader ?? defaultReader;
  const absolute = resolve(filePath);
  let contents: string;
  try {
    contents = await reader.readFile(absolute);
  } catch (error) {
    throw createParserError(
      ParserErrorCode.FILE_LOAD_FAILED,
      `Could not read definition file: ${error instanceof Error ? error.message : String(error)}`,
      { filePath: absolute, cause: error },
    );
  }
  return parseDefinitionText(contents, {
    filePath: absolute,
    arrayNames: options.arrayNames,
    logger: options.logger,
  });
}
