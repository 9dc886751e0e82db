/**
 * Schema loader for instrument parameter definition files.
 *
 * The format is line oriented. Each block opens with `NAME <id>` or
 * `T_NAME <id>`, holds `KEYWORD value` lines and closes with `END`.
 * `HEADER "label"` lines between blocks label the following section.
 * Keywords and names are case-insensitive.
 */

import type {
  DefinitionKind,
  ParameterDefinition,
  ParameterType,
  Relation,
  Subrange,
  ValueReference,
} from '../types.js';
import type { Logger } from '../logger.js';
import { createParserError, ParseError, ParserErrorCode } from '../errors/index.js';
import { parseRelation } from '../expressions/parser.js';
import { ParameterTable, type ParameterTableEntry } from '../table/parameter-table.js';
import { DEFAULT_ARRAY_NAMES, isIdentifier, referenceForIdentifier } from './canonical-keys.js';
import { tokenizeLine, type LineToken } from './line-lexer.js';

export interface DefinitionParseOptions {
  /** Used only for error locations */
  filePath?: string;
  arrayNames?: readonly string[];
  logger?: Partial<Logger>;
}

export const BLOCK_KEYWORDS = [
  'TYPE',
  'CLASS',
  'SUBRANGE',
  'REL',
  'INV_REL',
  'UNIT',
  'FORMAT',
  'TEXT',
  'EXTFUNCT',
  'NONEDIT',
] as const;

export type BlockKeyword = (typeof BLOCK_KEYWORDS)[number];

/** Keywords a bare NAME block may override. */
const ALIAS_KEYWORDS: ReadonlySet<BlockKeyword> = new Set<BlockKeyword>(['UNIT', 'FORMAT', 'TEXT', 'NONEDIT']);

const TYPE_NAMES: Record<string, ParameterType> = {
  R32: 'real32',
  REAL32: 'real32',
  I32: 'int32',
  INT32: 'int32',
  ENUM: 'enumerated',
  ENUMERATED: 'enumerated',
};

const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

const KEYWORD_SET: ReadonlySet<string> = new Set(BLOCK_KEYWORDS);

function isBlockKeyword(value: string): value is BlockKeyword {
  return KEYWORD_SET.has(value);
}

interface OpenBlock {
  kind: DefinitionKind;
  name: string;
  owner: ValueReference;
  line: number;
  section?: string;
  seen: Set<BlockKeyword>;
  fields: Omit<ParameterDefinition, 'name' | 'key' | 'kind' | 'editable' | 'section'>;
  editable: boolean;
}

class DefinitionFileParser {
  private readonly entries: ParameterTableEntry[] = [];
  private readonly keys = new Map<string, string>();
  private block: OpenBlock | undefined;
  private section: string | undefined;

  constructor(
    private readonly filePath: string | undefined,
    private readonly arrayNames: readonly string[],
  ) {}

  parse(text: string): ParameterTableEntry[] {
    const lines = text.split('\n');
    lines.forEach((raw, index) => this.parseLine(raw, index + 1));

    if (this.block) {
      throw this.error(
        ParserErrorCode.UNTERMINATED_BLOCK,
        `Block "${this.block.name}" starting at line ${this.block.line} is missing END.`,
        this.block.line,
        { block: this.block.name, suggestion: 'Close every NAME/T_NAME block with an END line.' },
      );
    }
    return this.entries;
  }

  private parseLine(raw: string, line: number): void {
    const trimmed = raw.trim();
    if (trimmed.length === 0 || trimmed.startsWith('#')) {
      return;
    }

    const tokens = tokenizeLine(raw, line, this.filePath);
    const [head, ...values] = tokens;
    if (head.quoted) {
      throw this.error(ParserErrorCode.UNKNOWN_KEYWORD, `Expected a keyword, found string "${head.value}".`, line);
    }
    const keyword = head.value.toUpperCase();

    switch (keyword) {
      case 'NAME':
      case 'T_NAME':
        this.openBlock(keyword === 'T_NAME' ? 'typed' : 'alias', values, line);
        return;
      case 'END':
        this.closeBlock(values, line);
        return;
      case 'HEADER':
        this.parseHeader(values, line);
        return;
      default:
        break;
    }

    const block = this.block;
    if (!block) {
      throw this.error(
        isBlockKeyword(keyword) ? ParserErrorCode.KEYWORD_OUTSIDE_BLOCK : ParserErrorCode.UNKNOWN_KEYWORD,
        isBlockKeyword(keyword)
          ? `Keyword ${keyword} appears outside a NAME/T_NAME block.`
          : `Unknown keyword "${head.value}".`,
        line,
      );
    }
    if (!isBlockKeyword(keyword)) {
      throw this.error(ParserErrorCode.UNKNOWN_KEYWORD, `Unknown keyword "${head.value}".`, line, {
        block: block.name,
        suggestion: `Known keywords: ${BLOCK_KEYWORDS.join(', ')}.`,
      });
    }
    if (block.seen.has(keyword)) {
      throw this.error(ParserErrorCode.DUPLICATE_KEYWORD, `Keyword ${keyword} repeats in block "${block.name}".`, line, {
        block: block.name,
      });
    }
    if (block.kind === 'alias' && !ALIAS_KEYWORDS.has(keyword)) {
      throw this.error(
        ParserErrorCode.KEYWORD_NOT_ALLOWED_IN_ALIAS,
        `Keyword ${keyword} is not allowed in NAME block "${block.name}"; only UNIT, FORMAT, TEXT and NONEDIT may be overridden.`,
        line,
        { block: block.name, suggestion: 'Use T_NAME to define a typed parameter.' },
      );
    }
    block.seen.add(keyword);
    this.applyKeyword(block, keyword, values, line);
  }

  private openBlock(kind: DefinitionKind, values: LineToken[], line: number): void {
    if (this.block) {
      throw this.error(
        ParserErrorCode.NESTED_BLOCK,
        `Block "${this.block.name}" starting at line ${this.block.line} is missing END before a new block.`,
        line,
        { block: this.block.name },
      );
    }
    if (values.length === 0) {
      throw this.error(ParserErrorCode.MISSING_IDENTIFIER, 'Block start is missing a parameter name.', line);
    }
    const [nameToken, ...extra] = values;
    if (nameToken.quoted || !isIdentifier(nameToken.value)) {
      throw this.error(ParserErrorCode.MISSING_IDENTIFIER, `"${nameToken.value}" is not a valid parameter name.`, line);
    }
    if (extra.length > 0) {
      throw this.error(ParserErrorCode.UNEXPECTED_VALUE, `Unexpected text after block name "${nameToken.value}".`, line, {
        block: nameToken.value,
      });
    }
    this.block = {
      kind,
      name: nameToken.value,
      owner: referenceForIdentifier(nameToken.value, this.arrayNames),
      line,
      section: this.section,
      seen: new Set(),
      fields: {},
      editable: true,
    };
  }

  private closeBlock(values: LineToken[], line: number): void {
    const block = this.block;
    if (!block) {
      throw this.error(ParserErrorCode.UNEXPECTED_END, 'END without an open block.', line);
    }
    if (values.length > 0) {
      throw this.error(ParserErrorCode.UNEXPECTED_VALUE, 'Unexpected text after END.', line, { block: block.name });
    }
    if (block.kind === 'typed' && block.fields.type === undefined) {
      throw this.error(ParserErrorCode.MISSING_TYPE, `T_NAME block "${block.name}" has no TYPE.`, block.line, {
        block: block.name,
      });
    }

    const key = block.owner.key;
    const previous = this.keys.get(key);
    if (previous !== undefined) {
      throw this.error(
        ParserErrorCode.DUPLICATE_PARAMETER,
        `Parameter "${block.name}" is already defined as "${previous}".`,
        block.line,
        { block: block.name, suggestion: 'Names are case-insensitive; d1 and D1 are the same parameter.' },
      );
    }
    this.keys.set(key, block.name);

    const definition: ParameterDefinition = {
      name: block.name,
      key,
      kind: block.kind,
      ...block.fields,
      editable: block.editable,
      ...(block.section !== undefined ? { section: block.section } : {}),
    };
    this.entries.push({ definition, source: { filePath: this.filePath, line: block.line } });
    this.block = undefined;
  }

  private parseHeader(values: LineToken[], line: number): void {
    if (this.block) {
      throw this.error(ParserErrorCode.UNKNOWN_KEYWORD, 'HEADER is only allowed between blocks.', line, {
        block: this.block.name,
      });
    }
    this.section = this.singleValue('HEADER', values, line, undefined);
  }

  private applyKeyword(block: OpenBlock, keyword: BlockKeyword, values: LineToken[], line: number): void {
    const fields = block.fields;
    switch (keyword) {
      case 'TYPE': {
        const raw = this.singleValue(keyword, values, line, block.name);
        const type = TYPE_NAMES[raw.toUpperCase()];
        if (!type) {
          throw this.error(ParserErrorCode.INVALID_TYPE, `Unknown TYPE "${raw}".`, line, {
            block: block.name,
            suggestion: 'Use R32, I32 or ENUM.',
          });
        }
        fields.type = type;
        return;
      }
      case 'CLASS':
        fields.className = this.singleValue(keyword, values, line, block.name);
        return;
      case 'SUBRANGE':
        fields.subrange = this.parseSubrange(values, line, block.name);
        return;
      case 'REL':
        fields.rel = this.parseRelationValue(block, keyword, values, line);
        return;
      case 'INV_REL':
        fields.invRel = this.parseRelationValue(block, keyword, values, line);
        return;
      case 'UNIT':
        fields.unit = this.singleValue(keyword, values, line, block.name);
        return;
      case 'FORMAT':
        fields.format = this.singleValue(keyword, values, line, block.name);
        return;
      case 'TEXT':
        fields.text = this.singleValue(keyword, values, line, block.name);
        return;
      case 'EXTFUNCT':
        fields.extFunction = this.singleValue(keyword, values, line, block.name);
        return;
      case 'NONEDIT':
        if (values.length > 0) {
          throw this.error(ParserErrorCode.UNEXPECTED_VALUE, 'NONEDIT takes no value.', line, { block: block.name });
        }
        block.editable = false;
        return;
    }
  }

  private singleValue(keyword: string, values: LineToken[], line: number, block: string | undefined): string {
    if (values.length === 0) {
      throw this.error(ParserErrorCode.MISSING_VALUE, `${keyword} is missing its value.`, line, { block });
    }
    if (values.length > 1) {
      throw this.error(
        ParserErrorCode.UNEXPECTED_VALUE,
        `${keyword} takes one value; quote values that contain spaces.`,
        line,
        { block },
      );
    }
    return values[0].value;
  }

  private parseSubrange(values: LineToken[], line: number, block: string): Subrange {
    if (values.length !== 2) {
      throw this.error(ParserErrorCode.INVALID_SUBRANGE, 'SUBRANGE takes exactly two numbers: min max.', line, {
        block,
      });
    }
    const [min, max] = values.map((token) => this.parseNumber(token, line, block));
    if (min > max) {
      throw this.error(ParserErrorCode.INVALID_SUBRANGE, `SUBRANGE minimum ${min} exceeds maximum ${max}.`, line, {
        block,
      });
    }
    return { min, max };
  }

  private parseNumber(token: LineToken, line: number, block: string): number {
    const value = Number(token.value);
    if (token.quoted || !NUMBER_PATTERN.test(token.value) || !Number.isFinite(value)) {
      throw this.error(ParserErrorCode.INVALID_NUMBER, `"${token.value}" is not a finite number.`, line, { block });
    }
    return value;
  }

  private parseRelationValue(block: OpenBlock, keyword: BlockKeyword, values: LineToken[], line: number): Relation {
    const source = this.singleValue(keyword, values, line, block.name);
    try {
      return parseRelation(source, { arrayNames: this.arrayNames, owner: block.owner });
    } catch (error) {
      if (error instanceof ParseError) {
        throw this.error(error.code, `Invalid ${keyword} in block "${block.name}": ${error.message}`, line, {
          block: block.name,
          cause: error,
        });
      }
      throw error;
    }
  }

  private error(
    code: string,
    message: string,
    line: number,
    options: { block?: string; suggestion?: string; cause?: unknown } = {},
  ): ParseError {
    return createParserError(code, message, {
      filePath: this.filePath,
      line,
      block: options.block,
      suggestion: options.suggestion,
      cause: options.cause,
    });
  }
}

/**
 * Parses definition file text into a {@link ParameterTable}.
 *
 * @throws ParseError naming the offending block and line
 */
export function parseDefinitionText(text: string, options: DefinitionParseOptions = {}): ParameterTable {
  const arrayNames = options.arrayNames ?? DEFAULT_ARRAY_NAMES;
  const parser = new DefinitionFileParser(options.filePath, arrayNames);
  const entries = parser.parse(text);
  options.logger?.debug?.('parser.definitions.loaded', {
    filePath: options.filePath,
    parameters: entries.length,
  });
  return new ParameterTable(entries, arrayNames);
}
