import type { DefinitionSource, ParameterDefinition } from '../types.js';
import { canonicalKey, DEFAULT_ARRAY_NAMES } from '../parsing/canonical-keys.js';

export interface ParameterTableEntry {
  definition: ParameterDefinition;
  source?: DefinitionSource;
}

/** Freezes a definition together with its subrange and relation trees. */
function deepFreeze<T extends object>(value: T): T {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  Object.freeze(value);
  return value;
}

/**
 * Frozen copy of a table, safe to hand to readers while the owner keeps
 * working.
 */
export interface ParameterTableSnapshot {
  readonly definitions: readonly Readonly<ParameterDefinition>[];
  readonly sections: readonly string[];
}

/**
 * Ordered, read-only collection of parameter definitions keyed by canonical
 * key. Insertion order is the display/edit order of the definition file.
 */
export class ParameterTable {
  private readonly entries: Map<string, ParameterTableEntry>;

  constructor(
    entries: Iterable<ParameterTableEntry>,
    private readonly arrayNames: readonly string[] = DEFAULT_ARRAY_NAMES,
  ) {
    this.entries = new Map();
    for (const entry of entries) {
      if (this.entries.has(entry.definition.key)) {
        throw new Error(`Duplicate parameter key "${entry.definition.key}".`);
      }
      this.entries.set(entry.definition.key, {
        definition: deepFreeze(structuredClone(entry.definition)),
        source: entry.source,
      });
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Looks up a definition by any spelling of its name (`sw`, `SW`, `d1`,
   * `D[1]`).
   */
  get(name: string): ParameterDefinition | undefined {
    const key = this.resolveKey(name);
    return key === undefined ? undefined : this.entries.get(key)?.definition;
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /** Where a definition was read from, when the table came from text. */
  locate(name: string): DefinitionSource | undefined {
    const key = this.resolveKey(name);
    return key === undefined ? undefined : this.entries.get(key)?.source;
  }

  resolveKey(name: string): string | undefined {
    if (this.entries.has(name)) {
      return name;
    }
    return canonicalKey(name, this.arrayNames);
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  list(): ParameterDefinition[] {
    return Array.from(this.entries.values(), (entry) => entry.definition);
  }

  snapshot(): ParameterTableSnapshot {
    const definitions = this.list().map((definition) => Object.freeze({ ...definition }));
    const sections: string[] = [];
    for (const definition of definitions) {
      if (definition.section !== undefined && !sections.includes(definition.section)) {
        sections.push(definition.section);
      }
    }
    return Object.freeze({
      definitions: Object.freeze(definitions),
      sections: Object.freeze(sections),
    });
  }
}
