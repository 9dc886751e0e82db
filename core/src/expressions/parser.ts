/**
 * Recursive-descent parser for REL / INV_REL relation expressions.
 *
 * Grammar:
 *   relation  := statement (';' statement)* ';'?
 *   statement := (target '=')? expr
 *   target    := identifier | identifier '[' integer ']'
 *   expr      := term (('+' | '-') term)*
 *   term      := unary (('*' | '/') unary)*
 *   unary     := ('+' | '-') unary | primary
 *   primary   := number | call | element | identifier | '(' expr ')'
 *   call      := identifier '(' (expr (',' expr)*)? ')'
 *   element   := identifier '[' integer ']'
 */

import type { ExpressionNode, Relation, RelationStatement, ValueReference } from '../types.js';
import { createParserError, ParserErrorCode } from '../errors/index.js';
import { DEFAULT_ARRAY_NAMES, referenceForElement, referenceForIdentifier } from '../parsing/canonical-keys.js';
import { tokenizeExpression, type Token, type TokenType } from './tokenizer.js';

export interface RelationParseOptions {
  /** Array names that short identifiers such as `d1` fold into */
  arrayNames?: readonly string[];
  /**
   * Target for statements written without `target =`. Without an owner a
   * bare expression is rejected.
   */
  owner?: ValueReference;
}

class ExpressionParser {
  private position = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[],
    private readonly arrayNames: readonly string[],
  ) {}

  parseRelation(owner: ValueReference | undefined): RelationStatement[] {
    const statements: RelationStatement[] = [];
    while (this.peek().type !== 'eof') {
      statements.push(this.parseStatement(owner));
      if (this.peek().type === 'semicolon') {
        this.advance();
        continue;
      }
      this.expect('eof');
    }
    if (statements.length === 0) {
      throw this.error(ParserErrorCode.INVALID_EXPRESSION, 'Relation is empty.');
    }
    return statements;
  }

  parseStandalone(): ExpressionNode {
    const expression = this.parseExpression();
    this.expect('eof');
    return expression;
  }

  private parseStatement(owner: ValueReference | undefined): RelationStatement {
    const target = this.tryParseTarget();
    if (target) {
      return { target, expression: this.parseExpression() };
    }
    if (!owner) {
      throw this.error(
        ParserErrorCode.INVALID_ASSIGNMENT_TARGET,
        'Relation statement has no assignment target.',
      );
    }
    return { target: owner, expression: this.parseExpression() };
  }

  /**
   * Consumes `name =` or `name[n] =` when present; otherwise leaves the
   * position untouched.
   */
  private tryParseTarget(): ValueReference | undefined {
    const start = this.position;
    const name = this.peek();
    if (name.type !== 'identifier') {
      return undefined;
    }
    this.advance();
    let reference: ValueReference;
    if (this.peek().type === 'lbracket') {
      reference = referenceForElement(name.text, this.parseIndex(), undefined);
    } else {
      reference = referenceForIdentifier(name.text, this.arrayNames);
    }
    if (this.peek().type !== 'assign') {
      this.position = start;
      return undefined;
    }
    this.advance();
    return reference;
  }

  private parseExpression(): ExpressionNode {
    let left = this.parseTerm();
    for (;;) {
      const token = this.peek();
      if (token.type === 'operator' && (token.text === '+' || token.text === '-')) {
        this.advance();
        left = { type: 'binary', operator: token.text, left, right: this.parseTerm() };
        continue;
      }
      return left;
    }
  }

  private parseTerm(): ExpressionNode {
    let left = this.parseUnary();
    for (;;) {
      const token = this.peek();
      if (token.type === 'operator' && (token.text === '*' || token.text === '/')) {
        this.advance();
        left = { type: 'binary', operator: token.text, left, right: this.parseUnary() };
        continue;
      }
      return left;
    }
  }

  private parseUnary(): ExpressionNode {
    const token = this.peek();
    if (token.type === 'operator' && (token.text === '+' || token.text === '-')) {
      this.advance();
      return { type: 'unary', operator: token.text, operand: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): ExpressionNode {
    const token = this.peek();
    switch (token.type) {
      case 'number': {
        this.advance();
        return { type: 'number', value: Number(token.text), raw: token.text };
      }
      case 'lparen': {
        this.advance();
        const inner = this.parseExpression();
        this.expect('rparen');
        return inner;
      }
      case 'identifier': {
        this.advance();
        const next = this.peek();
        if (next.type === 'lparen') {
          return this.parseCall(token.text);
        }
        if (next.type === 'lbracket') {
          const index = this.parseIndex();
          return { type: 'reference', ref: referenceForElement(token.text, index, `${token.text}[${index}]`) };
        }
        return { type: 'reference', ref: referenceForIdentifier(token.text, this.arrayNames) };
      }
      default:
        throw this.unexpected(token);
    }
  }

  private parseCall(name: string): ExpressionNode {
    this.expect('lparen');
    const args: ExpressionNode[] = [];
    if (this.peek().type !== 'rparen') {
      args.push(this.parseExpression());
      while (this.peek().type === 'comma') {
        this.advance();
        args.push(this.parseExpression());
      }
    }
    this.expect('rparen');
    return { type: 'call', name, key: name.toLowerCase(), args };
  }

  private parseIndex(): number {
    this.expect('lbracket');
    const token = this.peek();
    if (token.type !== 'number' || !/^\d+$/.test(token.text)) {
      throw this.error(
        ParserErrorCode.INVALID_ARRAY_INDEX,
        `Array index must be a non-negative integer literal, found "${token.text}".`,
      );
    }
    this.advance();
    this.expect('rbracket');
    return Number.parseInt(token.text, 10);
  }

  private peek(): Token {
    return this.tokens[Math.min(this.position, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.peek();
    this.position += 1;
    return token;
  }

  private expect(type: TokenType): Token {
    const token = this.peek();
    if (token.type !== type) {
      throw this.unexpected(token);
    }
    return this.advance();
  }

  private unexpected(token: Token) {
    const found = token.type === 'eof' ? 'end of expression' : `"${token.text}"`;
    return this.error(
      ParserErrorCode.UNEXPECTED_TOKEN,
      `Unexpected ${found} at position ${token.offset + 1}.`,
    );
  }

  private error(code: string, message: string) {
    return createParserError(code, `${message} In relation "${this.source}".`, {
      context: 'relation expression',
    });
  }
}

/**
 * Parses a REL / INV_REL source string into statements.
 */
export function parseRelation(source: string, options: RelationParseOptions = {}): Relation {
  const parser = new ExpressionParser(
    source,
    tokenizeExpression(source),
    options.arrayNames ?? DEFAULT_ARRAY_NAMES,
  );
  return { source, statements: parser.parseRelation(options.owner) };
}

/**
 * Parses a single expression with no assignment.
 */
export function parseExpression(
  source: string,
  options: Pick<RelationParseOptions, 'arrayNames'> = {},
): ExpressionNode {
  const parser = new ExpressionParser(
    source,
    tokenizeExpression(source),
    options.arrayNames ?? DEFAULT_ARRAY_NAMES,
  );
  return parser.parseStandalone();
}
