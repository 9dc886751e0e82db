/**
 * Reader for JCAMP-DX acquisition parameter files (`acqus`, `acqu2s`,
 * `procs`).
 *
 * Records of interest start with `##$KEY= value`. A value of the form
 * `(0..N)` opens an array whose N+1 entries follow on the same and next
 * lines. `<text>` is a string. Plain `##KEY= value` records are the JCAMP
 * core header and are kept separately. `$$` lines are comments.
 */

import { createParserError, ParserErrorCode } from '../errors/index.js';
import { DEFAULT_ARRAY_NAMES, canonicalKey, formatElementKey } from '../parsing/canonical-keys.js';

export type JcampValue = number | string;

export interface JcampParameters {
  /** Numeric `##$` records */
  scalars: Record<string, number>;
  /** `##$` records holding `(0..N)` numeric arrays */
  arrays: Record<string, number[]>;
  /** `##$` records holding strings, plus string arrays */
  strings: Record<string, string | string[]>;
  /** Core JCAMP `##` records such as TITLE and ORIGIN */
  headers: Record<string, string>;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const ARRAY_HEADER = /^\((\d+)\.\.(\d+)\)\s*(.*)$/;

/**
 * Numbers without a decimal point are integers, numbers with one are
 * floats, anything else stays text.
 */
export function coerceJcampValue(raw: string): JcampValue {
  const value = raw.trim();
  if (INTEGER_PATTERN.test(value)) {
    return Number.parseInt(value, 10);
  }
  if (FLOAT_PATTERN.test(value)) {
    return Number.parseFloat(value);
  }
  return value;
}

function splitRecord(line: string, prefixLength: number): [string, string] {
  const body = line.slice(prefixLength);
  const separator = body.indexOf('=');
  if (separator < 0) {
    return [body.trim(), ''];
  }
  return [body.slice(0, separator).trim(), body.slice(separator + 1).trim()];
}

function readStringTokens(text: string): string[] {
  return Array.from(text.matchAll(/<([^>]*)>/g), (match) => match[1]);
}

export function parseJcampParameters(text: string, filePath?: string): JcampParameters {
  const result: JcampParameters = { scalars: {}, arrays: {}, strings: {}, headers: {} };
  const lines = text.split(/\r?\n/);

  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index].trimEnd();

    if (line.startsWith('##$')) {
      const [key, value] = splitRecord(line, 3);
      const array = ARRAY_HEADER.exec(value);
      if (array) {
        const size = Number.parseInt(array[2], 10) + 1;
        const collected: string[] = [];
        let rest = array[3];
        const startLine = index + 1;
        const isStringArray = rest.startsWith('<') || (rest === '' && (lines[index + 1] ?? '').trimStart().startsWith('<'));

        for (;;) {
          collected.push(...(isStringArray ? readStringTokens(rest) : rest.split(/\s+/).filter(Boolean)));
          if (collected.length >= size) {
            break;
          }
          const next: string | undefined = lines[index + 1];
          if (next === undefined || next.startsWith('##')) {
            throw createParserError(
              ParserErrorCode.INVALID_JCAMP_ARRAY,
              `Array ${key} declares ${size} values but only ${collected.length} were found.`,
              { filePath, line: startLine, context: `##$${key}` },
            );
          }
          index += 1;
          rest = next.trim();
        }

        if (isStringArray) {
          result.strings[key] = collected.slice(0, size);
          continue;
        }
        result.arrays[key] = collected.slice(0, size).map((token) => {
          const parsed = coerceJcampValue(token);
          if (typeof parsed !== 'number') {
            throw createParserError(
              ParserErrorCode.INVALID_JCAMP_ARRAY,
              `Array ${key} holds a non-numeric value "${token}".`,
              { filePath, line: startLine, context: `##$${key}` },
            );
          }
          return parsed;
        });
        continue;
      }

      const unwrapped = value.startsWith('<') && value.endsWith('>') ? value.slice(1, -1) : value;
      const parsed = coerceJcampValue(unwrapped);
      if (typeof parsed === 'number') {
        result.scalars[key] = parsed;
      } else {
        result.strings[key] = parsed;
      }
      continue;
    }

    if (line.startsWith('##')) {
      const [key, value] = splitRecord(line, 2);
      result.headers[key] = value;
    }
  }

  return result;
}

/**
 * Flattens parsed acquisition parameters into engine values: scalars under
 * their canonical key, array entries as `NAME[i]`.
 */
export function toParameterValues(
  parameters: JcampParameters,
  arrayNames: readonly string[] = DEFAULT_ARRAY_NAMES,
): Record<string, number> {
  const values: Record<string, number> = {};
  for (const [name, value] of Object.entries(parameters.scalars)) {
    const key = canonicalKey(name, arrayNames);
    if (key !== undefined) {
      values[key] = value;
    }
  }
  for (const [name, entries] of Object.entries(parameters.arrays)) {
    entries.forEach((value, index) => {
      values[formatElementKey(name, index)] = value;
    });
  }
  return values;
}
