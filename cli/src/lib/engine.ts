import {
  acquisitionFunctions,
  canonicalKey,
  createFunctionRegistry,
  createParserError,
  loadDefinitionFile,
  ParserErrorCode,
  standardFunctions,
  type EngineConfig,
  type FunctionRegistry,
  type Logger,
  type ParameterTable,
} from '@acqpar/core';

/** Functions available to relations when run from the command line. */
export const cliFunctions: FunctionRegistry = createFunctionRegistry(standardFunctions, acquisitionFunctions);

export function loadTable(
  definitionPath: string,
  config: EngineConfig,
  logger?: Partial<Logger>,
): Promise<ParameterTable> {
  return loadDefinitionFile(definitionPath, { arrayNames: config.arrayNames, logger });
}

/** Splits repeated and comma-separated `--changed` values. */
export function parseChangedList(values: readonly string[]): string[] {
  return values
    .flatMap((value) => value.split(','))
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

/**
 * Parses `--set KEY=VALUE` flags into an update. Later flags for the same
 * parameter win.
 */
export function parseAssignments(values: readonly string[], arrayNames?: readonly string[]): Record<string, number> {
  const changes: Record<string, number> = {};
  for (const entry of values) {
    const separator = entry.indexOf('=');
    const name = separator > 0 ? entry.slice(0, separator).trim() : '';
    const raw = separator > 0 ? entry.slice(separator + 1).trim() : '';
    const value = Number(raw);
    const key = canonicalKey(name, arrayNames);
    if (key === undefined || raw.length === 0 || !Number.isFinite(value)) {
      throw createParserError(ParserErrorCode.INVALID_NUMBER, `Invalid --set value "${entry}".`, {
        context: '--set',
        suggestion: 'Use KEY=VALUE with a finite number, for example --set SW=20.',
      });
    }
    changes[key] = value;
  }
  return changes;
}
