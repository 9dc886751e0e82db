import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { createParserError, ParserErrorCode } from './errors/index.js';
import { DEFAULT_ARRAY_NAMES } from './parsing/canonical-keys.js';

export interface EngineConfig {
  /** Array names that short identifiers such as `d1` fold into */
  arrayNames: string[];
  /** Tolerance for REL / INV_REL round-trip checks, scaled by magnitude above 1 */
  tolerance: number;
  /** Treat calls to unregistered functions as table errors instead of warnings */
  strictFunctions: boolean;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  arrayNames: [...DEFAULT_ARRAY_NAMES],
  tolerance: 1e-9,
  strictFunctions: false,
});

const KNOWN_FIELDS = new Set(['arrayNames', 'tolerance', 'strictFunctions']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses engine configuration from YAML text. Missing fields take their
 * defaults; unknown fields are rejected.
 */
export function parseEngineConfig(contents: string, filePath?: string): EngineConfig {
  let raw: unknown;
  try {
    raw = parseYaml(contents);
  } catch (error) {
    throw createParserError(ParserErrorCode.INVALID_CONFIG_DOCUMENT, 'Engine config is not valid YAML.', {
      filePath,
      cause: error,
    });
  }
  if (raw === null || raw === undefined) {
    return { ...DEFAULT_ENGINE_CONFIG, arrayNames: [...DEFAULT_ENGINE_CONFIG.arrayNames] };
  }
  if (!isRecord(raw)) {
    throw createParserError(ParserErrorCode.INVALID_CONFIG_DOCUMENT, 'Engine config must be a YAML mapping.', {
      filePath,
    });
  }

  for (const field of Object.keys(raw)) {
    if (!KNOWN_FIELDS.has(field)) {
      throw createParserError(ParserErrorCode.UNKNOWN_CONFIG_FIELD, `Unknown engine config field "${field}".`, {
        filePath,
        context: field,
        suggestion: `Known fields: ${Array.from(KNOWN_FIELDS).join(', ')}.`,
      });
    }
  }

  return {
    arrayNames: parseArrayNames(raw.arrayNames, filePath),
    tolerance: parseTolerance(raw.tolerance, filePath),
    strictFunctions: parseBoolean(raw.strictFunctions, 'strictFunctions', DEFAULT_ENGINE_CONFIG.strictFunctions, filePath),
  };
}

function parseArrayNames(value: unknown, filePath: string | undefined): string[] {
  if (value === undefined) {
    return [...DEFAULT_ENGINE_CONFIG.arrayNames];
  }
  if (
    !Array.isArray(value) ||
    value.length === 0 ||
    !value.every((entry): entry is string => typeof entry === 'string' && /^[A-Za-z_]+$/.test(entry))
  ) {
    throw createParserError(
      ParserErrorCode.INVALID_CONFIG_FIELD,
      'arrayNames must be a non-empty list of alphabetic names.',
      { filePath, context: 'arrayNames' },
    );
  }
  return value.map((entry) => entry.toUpperCase());
}

function parseTolerance(value: unknown, filePath: string | undefined): number {
  if (value === undefined) {
    return DEFAULT_ENGINE_CONFIG.tolerance;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw createParserError(ParserErrorCode.INVALID_CONFIG_FIELD, 'tolerance must be a non-negative number.', {
      filePath,
      context: 'tolerance',
    });
  }
  return value;
}

function parseBoolean(value: unknown, field: string, fallback: boolean, filePath: string | undefined): boolean {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw createParserError(ParserErrorCode.INVALID_CONFIG_FIELD, `${field} must be true or false.`, {
      filePath,
      context: field,
    });
  }
  return value;
}

export async function loadEngineConfig(filePath: string): Promise<EngineConfig> {
  const absolute = resolve(filePath);
  let contents: string;
  try {
    contents = await readFile(absolute, 'utf8');
  } catch (error) {
    throw createParserError(
      ParserErrorCode.FILE_LOAD_FAILED,
      `Could not read engine config: ${error instanceof Error ? error.message : String(error)}`,
      { filePath: absolute, cause: error },
    );
  }
  return parseEngineConfig(contents, absolute);
}
