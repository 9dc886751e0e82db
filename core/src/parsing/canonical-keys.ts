import type { ValueReference } from '../types.js';

/** Indexed raw parameter arrays that short names such as `d1` fold into. */
export const DEFAULT_ARRAY_NAMES: readonly string[] = ['D', 'L', 'P', 'PL'];

const ELEMENT_PATTERN = /^([A-Za-z_][A-Za-z0-9_]*)\[(\d+)\]$/;
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isIdentifier(value: string): boolean {
  return IDENTIFIER_PATTERN.test(value);
}

export function formatElementKey(array: string, index: number): string {
  return `${array.toUpperCase()}[${index}]`;
}

/**
 * Builds the canonical reference for a bare identifier. Identifiers made of a
 * configured array name followed only by digits (`d1`, `PL21`) become element
 * references; everything else is an upper-cased scalar.
 */
export function referenceForIdentifier(
  name: string,
  arrayNames: readonly string[] = DEFAULT_ARRAY_NAMES,
): ValueReference {
  const upper = name.toUpperCase();
  const candidates = [...arrayNames].map((entry) => entry.toUpperCase()).sort((a, b) => b.length - a.length);
  for (const array of candidates) {
    if (!upper.startsWith(array)) {
      continue;
    }
    const digits = upper.slice(array.length);
    if (digits.length > 0 && /^\d+$/.test(digits)) {
      const index = Number.parseInt(digits, 10);
      return { kind: 'element', key: formatElementKey(array, index), name, array, index };
    }
  }
  return { kind: 'scalar', key: upper, name };
}

export function referenceForElement(array: string, index: number, name?: string): ValueReference {
  const upper = array.toUpperCase();
  return {
    kind: 'element',
    key: formatElementKey(upper, index),
    name: name ?? `${array}[${index}]`,
    array: upper,
    index,
  };
}

/**
 * Canonical key for any parameter spelling: `sw` → `SW`, `d1` → `D[1]`,
 * `pl[2]` → `PL[2]`. Returns undefined for text that is not a name.
 */
export function canonicalKey(
  name: string,
  arrayNames: readonly string[] = DEFAULT_ARRAY_NAMES,
): string | undefined {
  const trimmed = name.trim();
  const element = ELEMENT_PATTERN.exec(trimmed);
  if (element) {
    return formatElementKey(element[1], Number.parseInt(element[2], 10));
  }
  if (!isIdentifier(trimmed)) {
    return undefined;
  }
  return referenceForIdentifier(trimmed, arrayNames).key;
}
