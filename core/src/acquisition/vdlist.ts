import { createParserError, ParserErrorCode } from '../errors/index.js';
import { formatElementKey } from '../parsing/canonical-keys.js';

const UNIT_SCALE: Record<string, number> = {
  n: 1e-9,
  u: 1e-6,
  m: 1e-3,
  k: 1e3,
};

const DELAY_PATTERN = /^([+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)([numk])?$/;

/**
 * Parses a variable delay list: whitespace-separated delays in seconds, each
 * optionally suffixed with n, u, m or k.
 */
export function parseVariableDelayList(text: string, filePath?: string): number[] {
  const delays: number[] = [];
  text.split(/\r?\n/).forEach((line, index) => {
    for (const token of line.trim().split(/\s+/).filter(Boolean)) {
      const match = DELAY_PATTERN.exec(token);
      if (!match) {
        throw createParserError(ParserErrorCode.INVALID_DELAY_ENTRY, `"${token}" is not a delay value.`, {
          filePath,
          line: index + 1,
          suggestion: 'Write delays as numbers in seconds, optionally suffixed with n, u, m or k.',
        });
      }
      const scale = match[2] ? UNIT_SCALE[match[2]] : 1;
      delays.push(Number.parseFloat(match[1]) * scale);
    }
  });
  return delays;
}

/**
 * Exposes a delay list to relations as `VD[0]`, `VD[1]`, ...
 */
export function delayListValues(delays: readonly number[], arrayName = 'VD'): Record<string, number> {
  const values: Record<string, number> = {};
  delays.forEach((delay, index) => {
    values[formatElementKey(arrayName, index)] = delay;
  });
  return values;
}
