import type { ParameterTable } from '../table/parameter-table.js';
import { collectReferences, relationTargets } from '../expressions/references.js';

/**
 * Forward (REL) and inverse (INV_REL) edges implied by a parameter table.
 */
export interface RelationGraph {
  /** Parameter key → keys its REL reads */
  reads: Map<string, string[]>;
  /** Parameter key → keys its REL writes (normally just itself) */
  writes: Map<string, string[]>;
  /** Value key → parameters whose REL reads it */
  readers: Map<string, string[]>;
  /** Value key → parameter whose REL writes it */
  producers: Map<string, string>;
  /** Parameter key → keys its INV_REL writes */
  inverseWrites: Map<string, string[]>;
  /** Parameters whose REL reads their own key only through an identity alias (`d1=D[1]`) */
  aliases: Set<string>;
}

function append(map: Map<string, string[]>, key: string, value: string): void {
  const list = map.get(key);
  if (list) {
    if (!list.includes(value)) {
      list.push(value);
    }
    return;
  }
  map.set(key, [value]);
}

export function buildRelationGraph(table: ParameterTable): RelationGraph {
  const graph: RelationGraph = {
    reads: new Map(),
    writes: new Map(),
    readers: new Map(),
    producers: new Map(),
    inverseWrites: new Map(),
    aliases: new Set(),
  };

  for (const definition of table.list()) {
    if (definition.rel) {
      const reads = collectReferences(definition.rel);
      const writes = relationTargets(definition.rel);
      graph.reads.set(definition.key, reads);
      graph.writes.set(definition.key, writes);
      if (
        reads.includes(definition.key) &&
        !collectReferences(definition.rel, { skipIdentityAliases: true }).includes(definition.key)
      ) {
        graph.aliases.add(definition.key);
      }
      for (const key of reads) {
        append(graph.readers, key, definition.key);
      }
      for (const key of writes) {
        if (!graph.producers.has(key)) {
          graph.producers.set(key, definition.key);
        }
      }
    }
    if (definition.invRel) {
      graph.inverseWrites.set(definition.key, relationTargets(definition.invRel));
    }
  }

  return graph;
}
