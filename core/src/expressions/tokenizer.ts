import { createParserError, ParserErrorCode } from '../errors/index.js';

export type TokenType =
  | 'number'
  | 'identifier'
  | 'operator'
  | 'lparen'
  | 'rparen'
  | 'lbracket'
  | 'rbracket'
  | 'comma'
  | 'assign'
  | 'semicolon'
  | 'eof';

export interface Token {
  type: TokenType;
  text: string;
  /** 0-based offset into the expression source */
  offset: number;
}

const NUMBER_PATTERN = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*/;

const SINGLE_CHAR_TOKENS: Record<string, TokenType> = {
  '+': 'operator',
  '-': 'operator',
  '*': 'operator',
  '/': 'operator',
  '(': 'lparen',
  ')': 'rparen',
  '[': 'lbracket',
  ']': 'rbracket',
  ',': 'comma',
  '=': 'assign',
  ';': 'semicolon',
};

export function tokenizeExpression(source: string): Token[] {
  const tokens: Token[] = [];
  let offset = 0;

  while (offset < source.length) {
    const char = source[offset];
    if (/\s/.test(char)) {
      offset += 1;
      continue;
    }

    const rest = source.slice(offset);
    const number = NUMBER_PATTERN.exec(rest);
    if (number) {
      tokens.push({ type: 'number', text: number[0], offset });
      offset += number[0].length;
      continue;
    }

    const identifier = IDENTIFIER_PATTERN.exec(rest);
    if (identifier) {
      tokens.push({ type: 'identifier', text: identifier[0], offset });
      offset += identifier[0].length;
      continue;
    }

    const single = SINGLE_CHAR_TOKENS[char];
    if (single) {
      tokens.push({ type: single, text: char, offset });
      offset += 1;
      continue;
    }

    throw createParserError(
      ParserErrorCode.UNEXPECTED_TOKEN,
      `Unexpected character "${char}" at position ${offset + 1} in "${source}".`,
      { context: 'relation expression' },
    );
  }

  tokens.push({ type: 'eof', text: '', offset: source.length });
  return tokens;
}
