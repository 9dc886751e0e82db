import { createParserError, ParserErrorCode } from '../errors/index.js';

export interface LineToken {
  value: string;
  quoted: boolean;
}

/**
 * Splits one line into whitespace-delimited tokens and double-quoted
 * strings. Inside quotes, `\"` and `\\` are escapes; any other backslash is
 * kept as written.
 */
export function tokenizeLine(text: string, line: number, filePath?: string): LineToken[] {
  const tokens: LineToken[] = [];
  let index = 0;

  while (index < text.length) {
    const char = text[index];
    if (char === ' ' || char === '\t' || char === '\r') {
      index += 1;
      continue;
    }

    if (char === '"') {
      let value = '';
      index += 1;
      let closed = false;
      while (index < text.length) {
        const current = text[index];
        if (current === '\\' && (text[index + 1] === '"' || text[index + 1] === '\\')) {
          value += text[index + 1];
          index += 2;
          continue;
        }
        if (current === '"') {
          closed = true;
          index += 1;
          break;
        }
        value += current;
        index += 1;
      }
      if (!closed) {
        throw createParserError(ParserErrorCode.INVALID_STRING, 'Unterminated string literal.', {
          filePath,
          line,
          context: text.trim(),
        });
      }
      tokens.push({ value, quoted: true });
      continue;
    }

    let end = index;
    while (end < text.length && !/[\s"]/.test(text[end])) {
      end += 1;
    }
    tokens.push({ value: text.slice(index, end), quoted: false });
    index = end;
  }

  return tokens;
}

export function quoteString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}
