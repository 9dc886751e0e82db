/**
 * printf-style rendering of FORMAT strings such as `"%14.2f Hz"`.
 *
 * Supports the flags `- + 0` and space, an optional width and precision, and
 * the conversions `f e E g G d i s`. A format must contain exactly one
 * conversion; `%%` is a literal percent sign.
 */

import type { ParameterDefinition } from '../types.js';

export type Conversion = 'f' | 'e' | 'E' | 'g' | 'G' | 'd' | 'i' | 's';

export interface ConversionSpec {
  leftAlign: boolean;
  plusSign: boolean;
  spaceSign: boolean;
  zeroPad: boolean;
  width?: number;
  precision?: number;
  conversion: Conversion;
}

export type FormatSegment = { kind: 'literal'; text: string } | { kind: 'value'; spec: ConversionSpec };

export interface ParsedDisplayFormat {
  source: string;
  segments: FormatSegment[];
}

const SPEC_PATTERN = /^%([-+ 0]*)(\d+)?(?:\.(\d+))?([feEgGdis])/;

export class DisplayFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DisplayFormatError';
  }
}

export function parseDisplayFormat(format: string): ParsedDisplayFormat {
  const segments: FormatSegment[] = [];
  let literal = '';
  let valueCount = 0;
  let index = 0;

  while (index < format.length) {
    const char = format[index];
    if (char !== '%') {
      literal += char;
      index += 1;
      continue;
    }
    if (format[index + 1] === '%') {
      literal += '%';
      index += 2;
      continue;
    }

    const match = SPEC_PATTERN.exec(format.slice(index));
    if (!match) {
      throw new DisplayFormatError(`Unsupported conversion at position ${index + 1} in "${format}".`);
    }
    if (literal) {
      segments.push({ kind: 'literal', text: literal });
      literal = '';
    }
    const flags = match[1];
    segments.push({
      kind: 'value',
      spec: {
        leftAlign: flags.includes('-'),
        plusSign: flags.includes('+'),
        spaceSign: flags.includes(' '),
        zeroPad: flags.includes('0'),
        width: match[2] !== undefined ? Number.parseInt(match[2], 10) : undefined,
        precision: match[3] !== undefined ? Number.parseInt(match[3], 10) : undefined,
        conversion: toConversion(match[4]),
      },
    });
    valueCount += 1;
    index += match[0].length;
  }
  if (literal) {
    segments.push({ kind: 'literal', text: literal });
  }
  if (valueCount !== 1) {
    throw new DisplayFormatError(`Format "${format}" must contain exactly one conversion, found ${valueCount}.`);
  }
  return { source: format, segments };
}

function toConversion(value: string): Conversion {
  switch (value) {
    case 'f':
    case 'e':
    case 'E':
    case 'g':
    case 'G':
    case 'd':
    case 'i':
    case 's':
      return value;
    default:
      throw new DisplayFormatError(`Unsupported conversion "%${value}".`);
  }
}

/** C-style exponent: at least two digits (`1.5e+03`). */
function padExponent(text: string): string {
  return text.replace(/e([+-])(\d)$/, 'e$10$2');
}

function formatGeneral(magnitude: number, precision: number): string {
  const significant = precision === 0 ? 1 : precision;
  if (magnitude === 0) {
    return '0';
  }
  const exponential = magnitude.toExponential(significant - 1);
  const exponent = Number.parseInt(exponential.slice(exponential.indexOf('e') + 1), 10);
  const text =
    exponent < -4 || exponent >= significant
      ? padExponent(exponential.replace(/\.?0+e/, 'e'))
      : magnitude.toFixed(Math.max(0, significant - 1 - exponent));
  return text.includes('e') || !text.includes('.') ? text : text.replace(/\.?0+$/, '');
}

function formatMagnitude(magnitude: number, spec: ConversionSpec): string {
  switch (spec.conversion) {
    case 'f':
      return magnitude.toFixed(spec.precision ?? 6);
    case 'e':
      return padExponent(magnitude.toExponential(spec.precision ?? 6));
    case 'E':
      return padExponent(magnitude.toExponential(spec.precision ?? 6)).toUpperCase();
    case 'g':
      return formatGeneral(magnitude, spec.precision ?? 6);
    case 'G':
      return formatGeneral(magnitude, spec.precision ?? 6).toUpperCase();
    case 'd':
    case 'i':
      return String(Math.round(magnitude));
    case 's':
      return String(magnitude);
  }
}

function renderValue(value: number, spec: ConversionSpec): string {
  const negative = value < 0 || Object.is(value, -0);
  const body = Number.isFinite(value)
    ? formatMagnitude(Math.abs(value), spec)
    : Number.isNaN(value)
      ? 'nan'
      : 'inf';
  const sign = negative ? '-' : spec.plusSign ? '+' : spec.spaceSign ? ' ' : '';
  const width = spec.width ?? 0;
  const length = sign.length + body.length;
  if (length >= width) {
    return sign + body;
  }
  const padding = width - length;
  if (spec.leftAlign) {
    return sign + body + ' '.repeat(padding);
  }
  if (spec.zeroPad && Number.isFinite(value) && spec.conversion !== 's') {
    return sign + '0'.repeat(padding) + body;
  }
  return ' '.repeat(padding) + sign + body;
}

export function renderDisplayFormat(format: ParsedDisplayFormat | string, value: number): string {
  const parsed = typeof format === 'string' ? parseDisplayFormat(format) : format;
  return parsed.segments
    .map((segment) => (segment.kind === 'literal' ? segment.text : renderValue(value, segment.spec)))
    .join('');
}

export function isRenderableFormat(format: string): boolean {
  try {
    parseDisplayFormat(format);
    return true;
  } catch (error) {
    if (error instanceof DisplayFormatError) {
      return false;
    }
    throw error;
  }
}

/**
 * Renders a value for display using the definition's FORMAT, or the plain
 * number followed by the unit when it has none.
 */
export function formatParameterValue(definition: ParameterDefinition, value: number): string {
  if (definition.format !== undefined) {
    return renderDisplayFormat(definition.format, value).trim();
  }
  return definition.unit ? `${value} ${definition.unit}` : String(value);
}
