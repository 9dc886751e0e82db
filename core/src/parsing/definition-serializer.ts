import type { ParameterDefinition, ParameterType } from '../types.js';
import type { ParameterTable } from '../table/parameter-table.js';
import { quoteString } from './line-lexer.js';

const TYPE_TOKENS: Record<ParameterType, string> = {
  real32: 'R32',
  int32: 'I32',
  enumerated: 'ENUM',
};

function formatNumber(value: number): string {
  return String(value);
}

function formatToken(value: string): string {
  return /^[^\s"]+$/.test(value) ? value : quoteString(value);
}

/**
 * Writes one definition as a NAME / T_NAME block.
 */
export function serializeDefinition(definition: ParameterDefinition): string {
  const lines: string[] = [`${definition.kind === 'typed' ? 'T_NAME' : 'NAME'}\t\t${definition.name}`];
  const field = (keyword: string, value: string) => lines.push(`\t\t${keyword}\t${value}`);

  if (definition.type) {
    field('TYPE', TYPE_TOKENS[definition.type]);
  }
  if (definition.className !== undefined) {
    field('CLASS', formatToken(definition.className));
  }
  if (definition.subrange) {
    field('SUBRANGE', `${formatNumber(definition.subrange.min)} ${formatNumber(definition.subrange.max)}`);
  }
  if (definition.rel) {
    field('REL', quoteString(definition.rel.source));
  }
  if (definition.invRel) {
    field('INV_REL', quoteString(definition.invRel.source));
  }
  if (definition.unit !== undefined) {
    field('UNIT', quoteString(definition.unit));
  }
  if (definition.format !== undefined) {
    field('FORMAT', quoteString(definition.format));
  }
  if (definition.text !== undefined) {
    field('TEXT', quoteString(definition.text));
  }
  if (definition.extFunction !== undefined) {
    field('EXTFUNCT', formatToken(definition.extFunction));
  }
  if (!definition.editable) {
    lines.push('\t\tNONEDIT');
  }
  lines.push('END');
  return lines.join('\n');
}

/**
 * Writes a whole table back to definition file text. A HEADER line is
 * emitted wherever the section label changes.
 */
export function serializeParameterTable(table: ParameterTable): string {
  const chunks: string[] = [];
  let section: string | undefined;
  for (const definition of table.list()) {
    if (definition.section !== undefined && definition.section !== section) {
      chunks.push(`HEADER\t\t${quoteString(definition.section)}`);
    }
    section = definition.section ?? section;
    chunks.push(serializeDefinition(definition));
  }
  return chunks.length > 0 ? `${chunks.join('\n')}\n` : '';
}
